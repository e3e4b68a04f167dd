import { Injectable } from '@nestjs/common';

export type DedupState = 'processing' | 'done';

// Seconds
export const DEDUP_TTL = {
  PROCESSING: 120, // short, so a crashed run can be retried
  DONE: 24 * 3600,
};

const MAX_ENTRIES = 10_000;

interface Entry {
  state: DedupState;
  expiresAt: number;
}

/**
 * Two-phase dedup of Telegram updates kept in process memory.
 *
 * A message is marked `processing` when the pipeline starts and `done` once
 * it has been audited; a redelivered update finds either mark and is skipped.
 */
@Injectable()
export class MessageDedupService {
  private readonly entries = new Map<string, Entry>();

  static keyOf(conversationId: number, messageId: number): string {
    return `msg:${conversationId}:${messageId}`;
  }

  /** Current mark, or null when the message was never seen (or its mark expired). */
  get(key: string): DedupState | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.state;
  }

  mark(key: string, state: DedupState): void {
    const ttl = state === 'processing' ? DEDUP_TTL.PROCESSING : DEDUP_TTL.DONE;
    this.entries.delete(key);
    this.entries.set(key, { state, expiresAt: Date.now() + ttl * 1000 });

    // Map keeps insertion order, so the first key is the oldest
    while (this.entries.size > MAX_ENTRIES) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
