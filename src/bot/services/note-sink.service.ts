import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios from 'axios';
import { botConfig } from '../../config/bot.config';
import { minuteStamp } from '../../common/utils/date-format';
import { debugLog } from '../../common/utils/debug-logger';
import { preview } from '../../common/utils/text';
import { EnrichmentResult, NoteAuthor, NoteSubmission } from '../contracts';
import { describeError, fail, ok, SinkError, StageResult } from '../errors';

interface InboxResponse {
  code?: number;
  msg?: string;
}

function isInboxResponse(value: unknown): value is InboxResponse {
  return typeof value === 'object' && value !== null && 'code' in value;
}

/**
 * Markdown note for the inbox.
 *
 *   titled:        ## <h>\n<s>\n\n## input via telegram\n<meta>\n<body>\n
 *   URL bookmark:  ## URL Bookmark\n<meta>\n<body>\n
 *   plain text:    ## input via telegram\n<meta>\n```\n<body>\n```
 */
export function formatNote(
  enrichment: EnrichmentResult,
  author: NoteAuthor,
  timezone?: string,
): NoteSubmission {
  const submitted = minuteStamp(timezone);
  const { summary, sourceUrl, body } = enrichment;

  let meta = `**SUBMIT:** ${submitted}\n**BY:** ${author.name}@${author.hostname}\n`;
  if (sourceUrl) {
    meta += `**SOURCE:** [${sourceUrl}](${sourceUrl})\n`;
  }

  let content: string;
  if (summary) {
    content = `## ${summary.headline}\n${summary.summary}\n\n## input via telegram\n${meta}\n${body}\n`;
  } else if (sourceUrl) {
    content = `## URL Bookmark\n${meta}\n${body}\n`;
  } else {
    content = `## input via telegram\n${meta}\n\`\`\`\n${body}\n\`\`\``;
  }

  const title =
    enrichment.title ??
    summary?.title ??
    (sourceUrl ? `URL: ${preview(sourceUrl, 30)}` : `telegram ${submitted}`);

  return { title, content };
}

/**
 * Client for the SiYuan cloud inbox ("cloud shorthand") API.
 */
@Injectable()
export class NoteSinkService {
  private readonly log = debugLog.sink;
  private readonly timeout = 15_000;

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {}

  async submit(
    enrichment: EnrichmentResult,
    author: NoteAuthor,
    cid?: string,
  ): Promise<StageResult<NoteSubmission, SinkError>> {
    const note = formatNote(enrichment, author, this.config.timezone);
    this.log.sink('Submitting note', { title: preview(note.title, 50) }, cid);

    try {
      const response = await axios.post<unknown>(this.config.siyuan.apiUrl, note, {
        timeout: this.timeout,
        headers: {
          Authorization: `token ${this.config.siyuan.token}`,
          'Content-Type': 'application/json',
        },
      });

      const data = response.data;
      if (isInboxResponse(data) && data.code !== 0) {
        const error = new SinkError(data.msg || `code ${data.code}`, response.status);
        this.log.err('Inbox rejected note', { reason: error.reason }, cid);
        return fail(error);
      }
    } catch (err) {
      const error = this.toSinkError(err);
      this.log.err('Inbox request failed', { reason: error.reason, status: error.status }, cid);
      return fail(error);
    }

    this.log.ok('Note stored', undefined, cid);
    return ok(note);
  }

  private toSinkError(err: unknown): SinkError {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status !== undefined) {
        return new SinkError(err.message, status);
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new SinkError(`timed out after ${this.timeout}ms`);
      }
      return new SinkError(err.code ?? err.message);
    }
    return new SinkError(describeError(err));
  }
}
