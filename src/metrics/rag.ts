/**
 * Lexical retrieval-augmented-generation metrics.
 *
 * Words are compared after stop-word removal with prefix stem matching, so
 * "laptops" in a context supports "laptop" in the answer.
 */

import type { MetricMap } from '../types.js';
import { MetricFamily } from './base.js';
import { contentWordRecall, contentWords, stemMatch, wordTokens } from './text.js';

export const RAG_METRIC_NAMES = [
  'faithfulness',
  'answer_relevancy',
  'context_precision',
  'context_recall',
] as const;

export type RagMetricName = (typeof RAG_METRIC_NAMES)[number];

export type RagScores = Record<RagMetricName, number | null>;

export interface RagSample {
  query: string;
  answer: string;
  contexts: readonly string[];
  /** Expected answer; precision and recall are null without it. */
  reference?: string | null;
}

/**
 * Replaces the lexical scorer, e.g. with an LLM-graded one. Metrics it
 * leaves out (or returns as null) keep their lexical value.
 */
export interface RagMetricsProvider {
  score(sample: RagSample): Promise<Partial<RagScores>>;
}

export interface RagMetricsOptions {
  /** Share of a unit's content words that must be covered to count it. */
  coverageThreshold?: number;
}

export class RagMetrics extends MetricFamily<RagSample> {
  readonly coverageThreshold: number;

  constructor(opts?: RagMetricsOptions) {
    super();
    this.coverageThreshold = opts?.coverageThreshold ?? 0.5;
  }

  protected getFields() {
    return { coverageThreshold: this.coverageThreshold };
  }
  protected getDefaults() {
    return { coverageThreshold: 0.5 };
  }

  zeroMetrics(): MetricMap {
    return { faithfulness: 0, answer_relevancy: 0, context_precision: 0, context_recall: 0 };
  }

  evaluate(sample: RagSample): MetricMap {
    return { ...this.score(sample) };
  }

  score(sample: RagSample): RagScores {
    const reference = sample.reference?.trim() ? sample.reference : null;
    return {
      faithfulness: faithfulness(sample.answer, sample.contexts),
      answer_relevancy: contentWordRecall(wordTokens(sample.query), wordTokens(sample.answer)),
      context_precision:
        reference === null ? null : contextPrecision(sample.contexts, reference, this.coverageThreshold),
      context_recall:
        reference === null ? null : contextRecall(sample.contexts, reference, this.coverageThreshold),
    };
  }

  async scoreAsync(sample: RagSample, provider?: RagMetricsProvider): Promise<RagScores> {
    const lexical = this.score(sample);
    if (!provider) {
      return lexical;
    }
    const external = await provider.score(sample);
    const merged: RagScores = { ...lexical };
    for (const name of RAG_METRIC_NAMES) {
      const value = external[name];
      if (typeof value === 'number') {
        merged[name] = value;
      }
    }
    return merged;
  }
}

function coverage(unitTokens: readonly string[], pool: readonly string[]): number | null {
  const words = contentWords(unitTokens);
  if (words.length === 0) return null;
  const poolSet = [...new Set(pool)];
  return words.filter((w) => poolSet.some((p) => stemMatch(w, p))).length / words.length;
}

/**
 * Share of the answer's content words found in the retrieved contexts.
 * 0 without contexts; 1 for an answer with no content words.
 */
export function faithfulness(answer: string, contexts: readonly string[]): number {
  if (contexts.length === 0) return 0;
  return coverage(wordTokens(answer), wordTokens(contexts.join(' '))) ?? 1;
}

/**
 * Average precision over the context ranking, where a context is relevant
 * when at least `threshold` of its content words appear in the reference.
 */
export function contextPrecision(
  contexts: readonly string[],
  reference: string,
  threshold = 0.5,
): number {
  const referenceTokens = wordTokens(reference);
  let relevantSoFar = 0;
  let precisionSum = 0;
  contexts.forEach((context, i) => {
    const covered = coverage(wordTokens(context), referenceTokens);
    if (covered !== null && covered >= threshold) {
      relevantSoFar++;
      precisionSum += relevantSoFar / (i + 1);
    }
  });
  return relevantSoFar === 0 ? 0 : precisionSum / relevantSoFar;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Share of reference sentences whose content words are covered by the
 * contexts to at least `threshold`.
 */
export function contextRecall(
  contexts: readonly string[],
  reference: string,
  threshold = 0.5,
): number {
  const sentences = splitSentences(reference);
  if (sentences.length === 0) return 0;
  const contextTokens = wordTokens(contexts.join(' '));
  const supported = sentences.filter(
    (s) => (coverage(wordTokens(s), contextTokens) ?? 1) >= threshold,
  ).length;
  return supported / sentences.length;
}
