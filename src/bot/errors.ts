/**
 * Error taxonomy of the relay pipeline.
 *
 * Stages do not throw these; they return them inside a StageResult so the
 * dispatcher can decide between falling back and reporting.
 */

export type StageResult<T, E extends Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export class AccessDeniedError extends Error {
  readonly code = 'ACCESS_DENIED';

  constructor(
    public readonly senderId: number,
    public readonly conversationId: number,
  ) {
    super(`Sender ${senderId} in chat ${conversationId} is not allow-listed`);
    this.name = 'AccessDeniedError';
  }
}

export class EmptyContentError extends Error {
  readonly code = 'EMPTY_CONTENT';

  constructor() {
    super('Message has no content to save');
    this.name = 'EmptyContentError';
  }
}

export class FetchError extends Error {
  readonly code = 'FETCH_FAILED';

  constructor(
    public readonly url: string,
    public readonly reason: string,
    public readonly status?: number,
  ) {
    super(`Could not fetch page: ${reason}`);
    this.name = 'FetchError';
  }
}

export type SummarizerErrorCode =
  | 'NOT_CONFIGURED'
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'INVALID_RESPONSE';

export class SummarizerError extends Error {
  constructor(
    public readonly code: SummarizerErrorCode,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'SummarizerError';
  }
}

export class SinkError extends Error {
  readonly code = 'SINK_FAILED';

  constructor(
    public readonly reason: string,
    public readonly status?: number,
  ) {
    super(status ? `Inbox API returned ${status}: ${reason}` : `Inbox API failed: ${reason}`);
    this.name = 'SinkError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
