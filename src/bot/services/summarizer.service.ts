import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios from 'axios';
import { botConfig } from '../../config/bot.config';
import { dateStamp } from '../../common/utils/date-format';
import { debugLog } from '../../common/utils/debug-logger';
import { truncate } from '../../common/utils/text';
import { EnrichmentMode, Summary } from '../contracts';
import { describeError, fail, ok, StageResult, SummarizerError } from '../errors';
import { articleSystemPrompt, enrichmentUserPrompt, summarySystemPrompt } from './prompts';

export const MAX_PROMPT_CONTENT_LENGTH = 2048;

export interface SummarizeOptions {
  mode?: EnrichmentMode;
  /** Text comes from a scraped web page */
  scraped?: boolean;
}

interface ChatCompletionRequest {
  model: string;
  messages: { role: 'system' | 'user'; content: string }[];
  response_format: { type: 'json_object' };
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: string | null } }[];
}

interface HeadlinePayload {
  h: string;
  s: string;
}

function isHeadlinePayload(value: unknown): value is HeadlinePayload {
  if (typeof value !== 'object' || value === null) return false;
  if (!('h' in value) || !('s' in value)) return false;
  const { h, s } = value;
  return typeof h === 'string' && h.trim() !== '' && typeof s === 'string' && s.trim() !== '';
}

/**
 * Client for an OpenAI-compatible chat completions endpoint. Produces a
 * dated title plus summary (or article) for a block of text.
 */
@Injectable()
export class SummarizerService {
  private readonly logger = new Logger(SummarizerService.name);
  private readonly log = debugLog.enrichment.child('summarize');
  private readonly timeout = 30_000;

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {
    if (!config.openai.token) {
      this.logger.warn('OPENAI_TOKEN not set, AI summaries are disabled');
    }
  }

  async summarize(
    text: string,
    options: SummarizeOptions = {},
    cid?: string,
  ): Promise<StageResult<Summary, SummarizerError>> {
    const { token, model, baseUrl } = this.config.openai;
    const mode = options.mode ?? 'summary';

    if (!token) {
      return fail(new SummarizerError('NOT_CONFIGURED', 'OpenAI API key not configured'));
    }

    const content = truncate(text, MAX_PROMPT_CONTENT_LENGTH);
    const request: ChatCompletionRequest = {
      model,
      messages: [
        {
          role: 'system',
          content: mode === 'article' ? articleSystemPrompt() : summarySystemPrompt(),
        },
        {
          role: 'user',
          content: enrichmentUserPrompt(mode, content, options.scraped ?? false),
        },
      ],
      response_format: { type: 'json_object' },
    };

    this.log.link(`Requesting ${mode}`, { model, chars: content.length }, cid);

    let data: ChatCompletionResponse;
    try {
      const response = await axios.post<ChatCompletionResponse>(
        `${baseUrl}/chat/completions`,
        request,
        {
          timeout: this.timeout,
          headers: { Authorization: `Bearer ${token}` },
        },
      );
      data = response.data;
    } catch (err) {
      const error = this.toSummarizerError(err);
      this.log.warn(`${mode} request failed`, { code: error.code, status: error.status }, cid);
      return fail(error);
    }

    const payload = this.parsePayload(data);
    if (!payload) {
      this.log.warn('Unusable completion', undefined, cid);
      return fail(new SummarizerError('INVALID_RESPONSE', 'Completion did not contain {"h", "s"} JSON'));
    }

    const headline = payload.h.trim();
    const summary: Summary = {
      headline,
      summary: payload.s.trim(),
      title: `${dateStamp(this.config.timezone)} ${headline}`,
    };

    this.log.enrich(`Generated ${mode}`, this.config.debug ? { headline } : undefined, cid);
    return ok(summary);
  }

  private parsePayload(data: ChatCompletionResponse): HeadlinePayload | null {
    const raw = data?.choices?.[0]?.message?.content;
    if (typeof raw !== 'string') return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`Completion is not JSON: ${describeError(err)}`);
      return null;
    }
    return isHeadlinePayload(parsed) ? parsed : null;
  }

  private toSummarizerError(err: unknown): SummarizerError {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status !== undefined) {
        return new SummarizerError('HTTP_ERROR', `Completion API returned ${status}`, status);
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new SummarizerError('TIMEOUT', `No completion within ${this.timeout}ms`);
      }
      return new SummarizerError('HTTP_ERROR', err.code ?? err.message);
    }
    return new SummarizerError('HTTP_ERROR', describeError(err));
  }
}
