/**
 * Text Normalization Utilities
 *
 * Shared by the job parser, the resume parser, the ingester's dedup and the
 * alignment engine's keyword coverage.
 */

/**
 * Lowercase, collapse whitespace and drop punctuation other than the
 * characters that carry meaning in technology names (+ # . - /).
 * Used as the dedup key for capability statements and requirements.
 */
export function normalizeText(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s+#./-]/gu, ' ')
    .replace(/(^|\s)[./-]+|[./-]+(?=\s|$)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Replace typographic characters with ASCII and drop control characters,
 * keeping newlines and tabs.
 */
export function handleEncoding(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2013\u2014]/g, '-')
    .replace(/\u2026/g, '...')
    .replace(/\u00A0/g, ' ')
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '');
}

/**
 * Cleans whitespace while preserving paragraph structure
 */
export function cleanWhitespace(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, ' ')
    .replace(/[ ]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * All normalization steps applied before text goes to the model
 */
export function prepareForParsing(text: string): string {
  if (!text) {
    return '';
  }

  return cleanWhitespace(handleEncoding(text));
}

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in', 'into',
  'is', 'it', 'of', 'on', 'or', 'our', 'the', 'to', 'with', 'you', 'your', 'we'
]);

/**
 * Lowercased content words of a text
 */
export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(' ')
    .filter(token => token.length > 1 && !STOP_WORDS.has(token));
}

/**
 * Fraction of keywords that occur in the text, as whole words or phrases.
 * An empty keyword list counts as fully covered.
 */
export function keywordCoverage(text: string, keywords: string[]): number {
  const normalizedKeywords = keywords.map(normalizeText).filter(keyword => keyword.length > 0);
  if (normalizedKeywords.length === 0) {
    return 1;
  }

  const haystack = ` ${normalizeText(text)} `;
  const hits = normalizedKeywords.filter(keyword => haystack.includes(` ${keyword} `)).length;
  return hits / normalizedKeywords.length;
}
