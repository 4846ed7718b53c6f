/**
 * Ranking metrics for search systems: NDCG@k, MAP@k, MRR, Precision@k, Recall@k.
 *
 * The expected ranking is position-graded: its first item is the most
 * relevant and gets relevance `len(expected)`, the next `len - 1`, and so on.
 */

import type { MetricMap } from '../types.js';
import { MetricFamily } from './base.js';

export interface RankingSample {
  /** Document ids as returned by the system, best first. */
  predicted: readonly string[];
  /** Relevant document ids, most relevant first. */
  expected: readonly string[];
}

export interface RankingScores {
  ndcg_at_k: number;
  map_at_k: number;
  mrr: number;
  precision_at_k: number;
  recall_at_k: number;
}

export interface RankingMetricsOptions {
  /** Cut-off depth. */
  k?: number;
}

export class RankingMetrics extends MetricFamily<RankingSample> {
  readonly k: number;

  constructor(opts?: RankingMetricsOptions) {
    super();
    this.k = opts?.k ?? 10;
    if (!Number.isInteger(this.k) || this.k < 0) {
      throw new Error(`k must be a non-negative integer, got ${this.k}`);
    }
  }

  protected getFields() {
    return { k: this.k };
  }
  protected getDefaults() {
    return { k: 10 };
  }

  zeroMetrics(): MetricMap {
    return { ndcg_at_k: 0, map_at_k: 0, mrr: 0, precision_at_k: 0, recall_at_k: 0 };
  }

  evaluate(sample: RankingSample): MetricMap {
    return { ...this.score(sample.predicted, sample.expected) };
  }

  /**
   * Typed single-query scores.
   */
  score(predicted: readonly string[], expected: readonly string[]): RankingScores {
    const relevance = buildRelevanceMap(expected);
    const relevant = new Set(expected);
    return {
      ndcg_at_k: ndcgAtK(predicted, relevance, this.k),
      map_at_k: averagePrecisionAtK(predicted, relevant, this.k),
      mrr: reciprocalRank(predicted, relevance),
      precision_at_k: precisionAtK(predicted, relevant, this.k),
      recall_at_k: recallAtK(predicted, expected, this.k),
    };
  }

  /**
   * Macro-average over parallel lists of predicted and expected rankings.
   */
  evaluateRankings(
    predictedRankings: readonly (readonly string[])[],
    expectedRankings: readonly (readonly string[])[],
  ): MetricMap {
    if (predictedRankings.length !== expectedRankings.length) {
      throw new Error(
        'predicted and expected rankings must have the same length ' +
          `(${predictedRankings.length} != ${expectedRankings.length})`,
      );
    }
    return this.evaluateBatch(
      predictedRankings.map((predicted, i) => ({ predicted, expected: expectedRankings[i] ?? [] })),
    );
  }
}

export function buildRelevanceMap(expected: readonly string[]): Map<string, number> {
  const relevance = new Map<string, number>();
  expected.forEach((docId, idx) => {
    relevance.set(docId, expected.length - idx);
  });
  return relevance;
}

/**
 * Discounted cumulative gain over the first `k` relevances.
 */
export function dcg(relevances: readonly number[], k: number): number {
  let total = 0;
  relevances.slice(0, k).forEach((rel, i) => {
    total += rel / Math.log2(i + 2);
  });
  return total;
}

export function ndcgAtK(
  predicted: readonly string[],
  relevance: ReadonlyMap<string, number>,
  k: number,
): number {
  const predictedRels = predicted.slice(0, k).map((doc) => relevance.get(doc) ?? 0);
  const idealRels = [...relevance.values()].sort((a, b) => b - a).slice(0, k);
  const ideal = dcg(idealRels, k);
  if (ideal === 0) {
    return 0;
  }
  return dcg(predictedRels, k) / ideal;
}

export function reciprocalRank(
  predicted: readonly string[],
  relevance: ReadonlyMap<string, number>,
): number {
  const idx = predicted.findIndex((doc) => relevance.has(doc));
  return idx === -1 ? 0 : 1 / (idx + 1);
}

export function precisionAtK(
  predicted: readonly string[],
  relevant: ReadonlySet<string>,
  k: number,
): number {
  if (k === 0) return 0;
  const retrieved = predicted.slice(0, k);
  if (retrieved.length === 0) return 0;
  const hits = retrieved.filter((doc) => relevant.has(doc)).length;
  return hits / Math.min(k, retrieved.length);
}

export function recallAtK(
  predicted: readonly string[],
  expected: readonly string[],
  k: number,
): number {
  const relevant = new Set(expected);
  if (relevant.size === 0) return 0;
  const retrieved = new Set(predicted.slice(0, k));
  let found = 0;
  for (const doc of relevant) {
    if (retrieved.has(doc)) found++;
  }
  return found / relevant.size;
}

/**
 * AP@k with binary relevance, normalised by min(|relevant|, k).
 */
export function averagePrecisionAtK(
  predicted: readonly string[],
  relevant: ReadonlySet<string>,
  k: number,
): number {
  if (relevant.size === 0) return 0;
  let hits = 0;
  let sumPrecisions = 0;
  predicted.slice(0, k).forEach((doc, i) => {
    if (relevant.has(doc)) {
      hits++;
      sumPrecisions += hits / (i + 1);
    }
  });
  const denominator = Math.min(relevant.size, k);
  return denominator > 0 ? sumPrecisions / denominator : 0;
}
