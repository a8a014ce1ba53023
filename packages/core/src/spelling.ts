// Sentence-level spelling substitution

import type { ReadonlyAgreementTable } from './agreement.js';

/**
 * Whitespace tokenization; runs of spaces, tabs and newlines all separate
 */
export function tokenize(sentence: string): string[] {
  return sentence.split(/\s+/).filter((token) => token.length > 0);
}

export function replaceTokens(sentence: string, replace: (token: string) => string): string {
  return tokenize(sentence).map(replace).join(' ');
}

/** Replace each token by the canonical (first) new spelling */
export function normalizeSentence(sentence: string, table: ReadonlyAgreementTable): string {
  return replaceTokens(sentence, (token) => table.get(token)?.[0] ?? token);
}

/** Replace each token by the old spelling of a reverse table */
export function revertSentence(sentence: string, reverse: ReadonlyMap<string, string>): string {
  return replaceTokens(sentence, (token) => reverse.get(token) ?? token);
}
