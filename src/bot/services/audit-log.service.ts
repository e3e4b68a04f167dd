import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { appendFile, readFile } from 'fs/promises';
import { botConfig } from '../../config/bot.config';
import { debugLog } from '../../common/utils/debug-logger';
import { AuditRecord } from '../contracts';
import { describeError } from '../errors';

/**
 * Append-only JSON-lines log of every inbound text message.
 *
 * Appends run one after another through a promise chain, so concurrent
 * messages never interleave within a line.
 */
@Injectable()
export class AuditLogService {
  private readonly logger = new Logger(AuditLogService.name);
  private readonly log = debugLog.dispatcher.child('audit');
  private queue: Promise<void> = Promise.resolve();

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {}

  get path(): string {
    return this.config.auditLogPath;
  }

  append(record: AuditRecord, cid?: string): Promise<void> {
    const line = JSON.stringify(record) + '\n';

    this.queue = this.queue.then(async () => {
      try {
        await appendFile(this.path, line, 'utf8');
        this.log.audit('Record appended', { messageId: record.message_id }, cid);
      } catch (err) {
        // Don't throw - a full disk must not stop the bot from replying
        this.logger.error(`Failed to append audit record: ${describeError(err)}`);
      }
    });

    return this.queue;
  }

  /** Records in file order; a missing file reads as empty. */
  async readAll(): Promise<AuditRecord[]> {
    await this.queue;

    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const records: AuditRecord[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      const parsed = parseLine(line);
      if (isAuditRecord(parsed)) records.push(parsed);
      else this.logger.warn('Skipping malformed audit line');
    }
    return records;
  }
}

// A crash mid-append can leave a truncated last line
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function isAuditRecord(value: unknown): value is AuditRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    'user_id' in value &&
    'chat_id' in value &&
    'message_id' in value &&
    'text' in value &&
    typeof value.text === 'string'
  );
}
