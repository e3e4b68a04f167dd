import { EnrichmentMode } from '../contracts';

export const summarySystemPrompt = () =>
  'You are a summarization assistant. Create concise summaries that instantly reveal the relevant context when read.';

export const articleSystemPrompt = () =>
  'You are a personal assistant tasked with writing down given information into a concise article optimised for human readability and well formatted. You can use markdown syntax, emojis and whatever else is needed to format it well. For lists use bullet points.';

const SHAPES: Record<EnrichmentMode, string> = {
  summary:
    'Return in JSON like: {"h": "headline, max 2 to 5 words", "s": "summary telling what the given input is about, 1-3 sentences long."}',
  article:
    'Return in JSON like: {"h": "headline, max 2 to 5 words which let the reader understand at first glance what this article is about.", "s": "Article, max. 300 words."}',
};

const SCRAPED_HINTS: Record<EnrichmentMode, string> = {
  summary:
    'This is output from a scraped HTML page, try your best to tell what the content is about.',
  article:
    'This is output from a scraped HTML page, transform it into a well-structured article.',
};

export const enrichmentUserPrompt = (
  mode: EnrichmentMode,
  content: string,
  scraped: boolean,
) => {
  const parts = [SHAPES[mode]];
  if (scraped) parts.push(SCRAPED_HINTS[mode]);
  parts.push(`Content: ${content}`);
  return parts.join('\n\n');
};
