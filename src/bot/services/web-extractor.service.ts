import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios from 'axios';
import { convert, HtmlToTextOptions } from 'html-to-text';
import { botConfig } from '../../config/bot.config';
import { debugLog } from '../../common/utils/debug-logger';
import { truncate } from '../../common/utils/text';
import { ExtractedPage } from '../contracts';
import { describeError, fail, FetchError, ok, StageResult } from '../errors';

export const MAX_EXTRACTED_LENGTH = 2048;

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const REQUEST_HEADERS = {
  'User-Agent': USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  'Cache-Control': 'max-age=0',
};

const SKIPPED = ['script', 'style', 'noscript', 'template', 'svg', 'img', 'nav', 'header', 'footer'];

const HEADINGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

const TEXT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'a', options: { ignoreHref: true } },
    ...HEADINGS.map((selector) => ({ selector, options: { uppercase: false } })),
    ...SKIPPED.map((selector) => ({ selector, format: 'skip' })),
  ],
};

const TITLE_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  baseElements: { selectors: ['title'], returnDomByDefault: false },
};

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function extractTitle(html: string): string {
  return collapse(convert(html, TITLE_OPTIONS)) || 'No title';
}

/**
 * Visible text of an HTML document with entities decoded and whitespace
 * collapsed. Page chrome (header, nav, footer) is left out.
 */
export function htmlToText(html: string): string {
  return collapse(convert(html, TEXT_OPTIONS));
}

@Injectable()
export class WebExtractorService {
  private readonly log = debugLog.enrichment.child('extract');
  private readonly timeout = 10_000;
  private readonly maxBytes = 5 * 1024 * 1024;

  constructor(
    @Inject(botConfig.KEY)
    private readonly config: ConfigType<typeof botConfig>,
  ) {}

  async extract(url: string, cid?: string): Promise<StageResult<ExtractedPage, FetchError>> {
    this.log.link('Fetching page', this.config.debug ? { url } : undefined, cid);

    let html: string;
    try {
      const response = await axios.get<string>(url, {
        headers: REQUEST_HEADERS,
        timeout: this.timeout,
        maxContentLength: this.maxBytes,
        responseType: 'text',
        // Keep the body as text even when the server sends JSON
        transformResponse: (data: unknown) => data,
      });
      html = typeof response.data === 'string' ? response.data : String(response.data);
      this.log.link('Page received', { status: response.status }, cid);
    } catch (err) {
      const error = this.toFetchError(url, err);
      this.log.warn('Page fetch failed', { reason: error.reason, status: error.status }, cid);
      return fail(error);
    }

    const pageTitle = extractTitle(html);
    const visible = htmlToText(html);
    const text = truncate(
      `URL: ${url}\nTitle: ${pageTitle}\n\nContent:\n${visible}`,
      MAX_EXTRACTED_LENGTH,
    );

    this.log.enrich('Page extracted', { chars: text.length }, cid);
    return ok({ url, pageTitle, text });
  }

  private toFetchError(url: string, err: unknown): FetchError {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status !== undefined) {
        return new FetchError(url, `HTTP ${status}`, status);
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new FetchError(url, `timed out after ${this.timeout}ms`);
      }
      return new FetchError(url, err.code ?? err.message);
    }
    return new FetchError(url, describeError(err));
  }
}
