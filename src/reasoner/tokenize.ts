import { normalizeText } from './text.js';

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'an', 'is', 'are', 'was', 'were', 'be', 'been', 'at', 'to', 'for', 'and', 'or',
  'in', 'on', 'of', 'by', 'with', 'from', 'as', 'it', 'its', 'this', 'that', 'there',
  'here', 'very', 'too', 'we', 'our', 'has', 'have', 'had', 'near', 'some'
]);

const MIN_TOKEN_LENGTH = 2;

// Order and duplicates are preserved.
export function tokenizeQuery(text: string): string[] {
  const t = normalizeText(text || '');
  if (!t) return [];
  return t.split(' ').filter(tok => tok.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(tok));
}

/**
 * Unigrams followed by adjacent n-gram phrases up to `maxWords` words,
 * e.g. ["blind", "curve", "blind curve"] for the default of 2.
 */
export function queryPhrases(tokens: string[], maxWords = 2): string[] {
  const phrases = [...tokens];
  for (let n = 2; n <= maxWords; n++) {
    for (let i = 0; i + n <= tokens.length; i++) phrases.push(tokens.slice(i, i + n).join(' '));
  }
  return phrases;
}
