import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { botConfig } from '../config/bot.config';
import { debugLog } from '../common/utils/debug-logger';
import { preview } from '../common/utils/text';
import {
  BotReply,
  DispatchOutcome,
  DispatchState,
  displayName,
  EnrichmentMode,
  EnrichmentResult,
  IncomingMessage,
  toAuditRecord,
} from './contracts';
import { AccessDeniedError, describeError, EmptyContentError } from './errors';
import { AccessGuardService } from './services/access-guard.service';
import { AuditLogService } from './services/audit-log.service';
import { parseCommand } from './services/command-parser';
import { MessageDedupService } from './services/message-dedup.service';
import { Classification, classify } from './services/content-classifier';
import { NoteSinkService } from './services/note-sink.service';
import { SummarizeOptions, SummarizerService } from './services/summarizer.service';
import { SystemStatsService } from './services/system-stats.service';
import { WebExtractorService } from './services/web-extractor.service';

/** Title used in the success reply for links saved without a summary. */
export const URL_BOOKMARK_TITLE = 'URL bookmark';

type OutcomeExtras = Pick<DispatchOutcome, 'note' | 'error'>;

/**
 * Runs one Telegram message through the relay:
 *
 *   guard → command → classify → enrich → inbox → reply
 *
 * Every handled message ends with exactly one audit record, whatever path
 * it took. A redelivered update (same chat and message id) is skipped. Enrichment failures fall back to saving the raw text; only an
 * inbox failure is reported to the user as an error.
 */
@Injectable()
export class BotService {
  private readonly log = debugLog.dispatcher;

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
    private readonly guard: AccessGuardService,
    private readonly extractor: WebExtractorService,
    private readonly summarizer: SummarizerService,
    private readonly sink: NoteSinkService,
    private readonly audit: AuditLogService,
    private readonly stats: SystemStatsService,
    private readonly dedup: MessageDedupService,
  ) {}

  async handle(m: IncomingMessage): Promise<DispatchOutcome> {
    const cid = this.generateCorrelationId();
    const done = this.log.timer('Message handled', cid);

    this.log.separator(cid);
    this.log.recv(
      'Telegram message',
      this.config.debug
        ? { from: displayName(m.sender), text: preview(m.text, 50) }
        : { messageId: m.messageId },
      cid,
    );

    const dedupKey = MessageDedupService.keyOf(m.conversationId, m.messageId);
    const seen = this.dedup.get(dedupKey);
    if (seen) {
      this.log.guard('Duplicate ignored', { messageId: m.messageId, state: seen }, cid);
      done();
      return this.outcome(cid, 'duplicate', []);
    }
    this.dedup.mark(dedupKey, 'processing');

    try {
      return await this.process(m, cid);
    } catch (err) {
      this.log.err('Unhandled pipeline error', { error: describeError(err) }, cid);
      return this.outcome(cid, 'failed', [{ text: this.config.templates.sendFailed }], {
        error: err instanceof Error ? err : new Error(String(err)),
      });
    } finally {
      await this.audit.append(toAuditRecord(m), cid);
      this.dedup.mark(dedupKey, 'done');
      done();
    }
  }

  private async process(m: IncomingMessage, cid: string): Promise<DispatchOutcome> {
    const { templates } = this.config;

    // 1. Allow-lists
    if (!this.guard.permit(m.senderId, m.conversationId)) {
      const error = new AccessDeniedError(m.senderId, m.conversationId);
      this.log.guard('Denied', { senderId: m.senderId, chatId: m.conversationId }, cid);
      const replies = templates.accessDenied ? [{ text: templates.accessDenied }] : [];
      return this.outcome(cid, 'denied', replies, { error });
    }
    this.log.guard('Permitted', undefined, cid);

    // 2. Commands that never reach the inbox
    const { command, content } = parseCommand(m.text);
    switch (command) {
      case 'help':
        return this.outcome(cid, 'help', [{ text: templates.helpText }]);
      case 'stats': {
        const stats = await this.stats.collect();
        return this.outcome(cid, 'stats', [{ text: `\`\`\`\n${stats}\n\`\`\``, parseMode: 'Markdown' }]);
      }
      case 'unknown':
        return this.outcome(cid, 'unknown_command', [{ text: templates.generalHelp }]);
      case 'plain':
        if (!this.config.savePlainMessages) {
          return this.outcome(cid, 'not_saved', [{ text: templates.generalHelp }]);
        }
        break;
    }

    // 3. Classify
    const classification = classify(content);
    this.log.classify('Classified', { command, tag: classification.tag }, cid);
    if (classification.tag === 'EMPTY') {
      return this.outcome(cid, 'empty', [{ text: templates.missingContent }], {
        error: new EmptyContentError(),
      });
    }

    // 4. Enrich
    const mode: EnrichmentMode = command === 'article' ? 'article' : 'summary';
    const enrichment = await this.enrich(content, classification, mode, cid);

    // 5. Inbox
    const author = { name: displayName(m.sender), hostname: this.config.noteHostname };
    const sent = await this.sink.submit(enrichment, author, cid);
    if (!sent.ok) {
      return this.outcome(cid, 'send_failed', [{ text: templates.sendFailed }], {
        error: sent.error,
      });
    }

    this.log.ok('Saved to inbox', { title: preview(sent.value.title, 50) }, cid);
    return this.outcome(cid, 'sent', [{ text: this.successReply(enrichment) }], {
      note: sent.value,
    });
  }

  private async enrich(
    content: string,
    classification: Exclude<Classification, { tag: 'EMPTY' }>,
    mode: EnrichmentMode,
    cid: string,
  ): Promise<EnrichmentResult> {
    switch (classification.tag) {
      case 'URL': {
        const passThrough = { body: content, sourceUrl: classification.url };
        const page = await this.extractor.extract(classification.url, cid);
        if (!page.ok) {
          this.log.warn('Saving link without summary', { reason: page.error.reason }, cid);
          return passThrough;
        }
        return this.summarizeOr(page.value.text, { mode, scraped: true }, passThrough, cid);
      }
      case 'LONG_TEXT':
        return this.summarizeOr(content, { mode }, { body: content }, cid);
      case 'SHORT_TEXT':
        // Short notes are only rewritten when an article was asked for
        return mode === 'article'
          ? this.summarizeOr(content, { mode }, { body: content }, cid)
          : { body: content };
    }
  }

  private async summarizeOr(
    text: string,
    options: SummarizeOptions,
    passThrough: EnrichmentResult,
    cid: string,
  ): Promise<EnrichmentResult> {
    const result = await this.summarizer.summarize(text, options, cid);
    if (!result.ok) {
      this.log.warn('Saving without summary', { code: result.error.code }, cid);
      return passThrough;
    }
    return { ...passThrough, title: result.value.title, summary: result.value };
  }

  private successReply(enrichment: EnrichmentResult): string {
    const { sendSuccess, sendSuccessWithTitle } = this.config.templates;
    const title = enrichment.summary?.headline ?? (enrichment.sourceUrl ? URL_BOOKMARK_TITLE : null);
    return title === null ? sendSuccess : sendSuccessWithTitle.replace(/\{title\}/g, () => title);
  }

  private outcome(
    correlationId: string,
    state: DispatchState,
    replies: BotReply[],
    extras: OutcomeExtras = {},
  ): DispatchOutcome {
    return { correlationId, state, replies, ...extras };
  }

  private generateCorrelationId(): string {
    return randomUUID().substring(0, 8);
  }
}
