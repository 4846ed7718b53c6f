/**
 * Tokenisation and overlap helpers shared by the lexical metric families.
 */

import stopWordList from './data/stop-words.json' with { type: 'json' };

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const WORD_PATTERN = /[a-z0-9]+(?:'[a-z]+)?/g;

/**
 * Lowercase and split on whitespace.
 */
export function whitespaceTokens(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Lowercase alphanumeric words, keeping simple contractions ("don't").
 */
export function wordTokens(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/**
 * Count the n-grams of a token sequence. Keys join tokens with a space.
 */
export function ngramCounts(tokens: readonly string[], n: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= tokens.length; i++) {
    const gram = tokens.slice(i, i + n).join(' ');
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Count the character n-grams of a string. Whitespace counts as a character.
 */
export function charNgramCounts(text: string, n: number): Map<string, number> {
  const chars = [...text];
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= chars.length; i++) {
    const gram = chars.slice(i, i + n).join('');
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Size of the multiset intersection of two count maps.
 */
export function clippedOverlap(a: Map<string, number>, b: Map<string, number>): number {
  let overlap = 0;
  for (const [gram, count] of a) {
    overlap += Math.min(count, b.get(gram) ?? 0);
  }
  return overlap;
}

export function totalCount(counts: Map<string, number>): number {
  let total = 0;
  for (const count of counts.values()) total += count;
  return total;
}

/**
 * Distinct tokens that carry meaning: not a stop word and longer than one character.
 */
export function contentWords(tokens: readonly string[]): string[] {
  return [...new Set(tokens.filter((t) => !STOP_WORDS.has(t) && t.length > 1))];
}

/**
 * Prefix-based stem match: "laptop" matches "laptops" and "return" matches
 * "returning". Both words must be longer than three characters.
 */
export function stemMatch(a: string, b: string): boolean {
  if (a === b) return true;
  if (a.length > 3 && b.length > 3) {
    const [short, long] = a.length <= b.length ? [a, b] : [b, a];
    return long.startsWith(short);
  }
  return false;
}

/**
 * Fraction of the query's content words that reappear (by stem) in the
 * response. A query with no content words scores 1.
 */
export function contentWordRecall(
  queryTokens: readonly string[],
  responseTokens: readonly string[],
): number {
  const queryContent = contentWords(queryTokens);
  if (queryContent.length === 0) {
    return 1;
  }
  const response = [...new Set(responseTokens)];
  const found = queryContent.filter((w) => response.some((r) => stemMatch(w, r))).length;
  return found / queryContent.length;
}

/**
 * Score an answer against an expected answer: 1 for a case and whitespace
 * insensitive match, `containedScore` when the expected text is contained in
 * the answer, otherwise the share of expected tokens present scaled by
 * `overlapScale`.
 */
export function matchCascade(
  answer: string,
  expected: string,
  scores: { containedScore: number; overlapScale: number },
): number {
  const answerNorm = answer.trim().toLowerCase();
  const expectedNorm = expected.trim().toLowerCase();
  if (answerNorm === expectedNorm) return 1;
  if (answerNorm.includes(expectedNorm)) return scores.containedScore;

  const expectedTokens = new Set(expectedNorm.split(/\s+/).filter(Boolean));
  if (expectedTokens.size === 0) return 0;
  const answerTokens = new Set(answerNorm.split(/\s+/).filter(Boolean));
  let overlap = 0;
  for (const token of expectedTokens) {
    if (answerTokens.has(token)) overlap++;
  }
  return Math.min(overlap / expectedTokens.size, 1) * scores.overlapScale;
}
