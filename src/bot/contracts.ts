/**
 * A text message as delivered by Telegram, reduced to what the pipeline
 * needs. Immutable once built by the adapter.
 */
export interface IncomingMessage {
  readonly senderId: number;
  readonly conversationId: number;
  readonly messageId: number;
  readonly text: string;
  readonly timestamp: string; // ISO-8601, from the Telegram message date
  readonly sender: SenderProfile;
}

export interface SenderProfile {
  readonly username: string | null;
  readonly firstName: string | null;
  readonly lastName: string | null;
}

/** One line of the audit file. Keys are the on-disk field names. */
export interface AuditRecord {
  timestamp: string;
  user_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  chat_id: number;
  message_id: number;
  text: string;
}

export type EnrichmentMode = 'summary' | 'article';

export interface Summary {
  /** 2-5 word headline from the model */
  headline: string;
  summary: string;
  /** `YYYY-MM-DD <headline>` */
  title: string;
}

/**
 * What a pipeline path produced for the inbox. `summary` is only set on the
 * titled paths.
 */
export interface EnrichmentResult {
  title?: string;
  summary?: Summary;
  body: string;
  sourceUrl?: string;
}

export interface NoteSubmission {
  title: string;
  content: string;
}

export interface NoteAuthor {
  name: string;
  hostname: string;
}

export interface ExtractedPage {
  url: string;
  pageTitle: string;
  /** Page text prefixed with url and title, ready for the summarizer */
  text: string;
}

export interface BotReply {
  text: string;
  parseMode?: 'Markdown' | 'MarkdownV2' | 'HTML';
}

export type DispatchState =
  | 'denied'
  | 'help'
  | 'stats'
  | 'unknown_command'
  | 'not_saved'
  | 'empty'
  | 'sent'
  | 'send_failed'
  | 'failed'
  | 'duplicate';

export interface DispatchOutcome {
  correlationId: string;
  state: DispatchState;
  replies: BotReply[];
  /** Set when a note reached the inbox */
  note?: NoteSubmission;
  /** Why the message was not saved, for the denied/empty/failed states */
  error?: Error;
}

export function toAuditRecord(m: IncomingMessage): AuditRecord {
  return {
    timestamp: m.timestamp,
    user_id: m.senderId,
    username: m.sender.username,
    first_name: m.sender.firstName,
    last_name: m.sender.lastName,
    chat_id: m.conversationId,
    message_id: m.messageId,
    text: m.text,
  };
}

/** `username` when set, else first name, as shown in note attribution. */
export function displayName(sender: SenderProfile): string {
  return sender.username ?? sender.firstName ?? 'unknown';
}
