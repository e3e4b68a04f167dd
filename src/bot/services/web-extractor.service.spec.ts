import axios from 'axios';
import { botConfig } from '../../config/bot.config';
import { testBotConfig } from '../../testing/bot-config.fixture';
import { axiosResponse, httpError, networkError, timeoutError } from '../../testing/http-fixtures';
import { Test } from '@nestjs/testing';
import { FetchError } from '../errors';
import {
  extractTitle,
  htmlToText,
  MAX_EXTRACTED_LENGTH,
  WebExtractorService,
} from './web-extractor.service';

const PAGE = `<!doctype html>
<html>
  <head>
    <title>Tide tables &amp; moon</title>
    <style>body { color: red; }</style>
  </head>
  <body>
    <header>Site menu</header>
    <nav><a href="/">Home</a></nav>
    <h1>High   tide</h1>
    <script>window.track = "secret";</script>
    <p>Expected at 06:12 &ndash; low at 12:30.</p>
    <!-- hidden comment -->
    <footer>Copyright</footer>
  </body>
</html>`;

describe('htmlToText', () => {
  it('keeps visible text and drops scripts, styles and page chrome', () => {
    expect(htmlToText(PAGE)).toBe('High tide Expected at 06:12 – low at 12:30.');
  });

  it('does not leak attribute values into the text', () => {
    expect(htmlToText('<p><a title="a > b" href="/x">Link</a> text</p>')).toBe('Link text');
  });

  it('decodes named and numeric entities', () => {
    expect(htmlToText('<p>caf&eacute; &lt;b&gt; &#39;c&#39; &#x41; &copy;</p>')).toBe("café <b> 'c' A ©");
  });
});

describe('extractTitle', () => {
  it('reads and decodes the title element', () => {
    expect(extractTitle(PAGE)).toBe('Tide tables & moon');
  });

  it('falls back when there is no title', () => {
    expect(extractTitle('<p>no head</p>')).toBe('No title');
  });
});


describe('WebExtractorService', () => {
  let service: WebExtractorService;
  let get: jest.SpyInstance;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        WebExtractorService,
        { provide: botConfig.KEY, useValue: testBotConfig() },
      ],
    }).compile();

    service = moduleRef.get(WebExtractorService);
    get = jest.spyOn(axios, 'get');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the page text prefixed with url and title', async () => {
    get.mockResolvedValue(axiosResponse(PAGE));

    const result = await service.extract('https://example.com/page');

    expect(result).toEqual({
      ok: true,
      value: {
        url: 'https://example.com/page',
        pageTitle: 'Tide tables & moon',
        text:
          'URL: https://example.com/page\nTitle: Tide tables & moon\n\nContent:\n' +
          'High tide Expected at 06:12 – low at 12:30.',
      },
    });
    expect(get).toHaveBeenCalledWith(
      'https://example.com/page',
      expect.objectContaining({ timeout: 10_000, responseType: 'text' }),
    );
  });

  it('truncates long pages', async () => {
    get.mockResolvedValue(axiosResponse(`<p>${'word '.repeat(1000)}</p>`));

    const result = await service.extract('https://example.com/long');

    if (!result.ok) throw result.error;
    expect(result.value.text).toHaveLength(MAX_EXTRACTED_LENGTH);
    expect(result.value.text.endsWith('...')).toBe(true);
  });

  it('fails with the HTTP status on a non-2xx response', async () => {
    get.mockRejectedValue(httpError(404));

    const result = await service.extract('https://example.com/missing');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.error.status).toBe(404);
    expect(result.error.reason).toBe('HTTP 404');
  });

  it('fails on timeout', async () => {
    get.mockRejectedValue(timeoutError());

    const result = await service.extract('https://slow.example.com');

    if (result.ok) throw new Error('expected a failure');
    expect(result.error.reason).toBe('timed out after 10000ms');
  });

  it('fails on network errors without retrying', async () => {
    get.mockRejectedValue(networkError('ENOTFOUND'));

    const result = await service.extract('https://nowhere.invalid');

    if (result.ok) throw new Error('expected a failure');
    expect(result.error.reason).toBe('ENOTFOUND');
    expect(get).toHaveBeenCalledTimes(1);
  });
});
