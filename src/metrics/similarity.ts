/**
 * Reference-based text similarity for summarization: BLEU, ROUGE-1/2/L and,
 * with an embedding provider, BERTScore and embedding similarity.
 */

import { getLogger } from '../logger.js';
import type { MetricMap } from '../types.js';
import { MetricFamily } from './base.js';
import { type EmbeddingProvider, cosineSimilarity } from './providers.js';
import { clippedOverlap, ngramCounts, totalCount, whitespaceTokens } from './text.js';

export interface SimilaritySample {
  predicted: string;
  reference: string;
}

export interface SimilarityMetricsOptions {
  /** Highest n-gram order in BLEU. */
  bleuMaxN?: number;
}

export class SimilarityMetrics extends MetricFamily<SimilaritySample> {
  readonly bleuMaxN: number;

  constructor(opts?: SimilarityMetricsOptions) {
    super();
    this.bleuMaxN = opts?.bleuMaxN ?? 4;
  }

  protected getFields() {
    return { bleuMaxN: this.bleuMaxN };
  }
  protected getDefaults() {
    return { bleuMaxN: 4 };
  }

  zeroMetrics(): MetricMap {
    return {
      bleu: 0,
      rouge_1: 0,
      rouge_2: 0,
      rouge_l: 0,
      bert_score: null,
      semantic_similarity: null,
    };
  }

  evaluate(sample: SimilaritySample): MetricMap {
    const { predicted, reference } = sample;
    return {
      bleu: bleu(predicted, reference, this.bleuMaxN),
      rouge_1: rougeN(predicted, reference, 1),
      rouge_2: rougeN(predicted, reference, 2),
      rouge_l: rougeL(predicted, reference),
      bert_score: null,
      semantic_similarity: null,
    };
  }

  /**
   * `evaluate` plus the embedding-backed metrics. A provider failure leaves
   * those metrics null.
   */
  async evaluateAsync(sample: SimilaritySample, embeddings?: EmbeddingProvider): Promise<MetricMap> {
    const metrics = this.evaluate(sample);
    if (!embeddings) {
      return metrics;
    }
    try {
      metrics.semantic_similarity = await embeddingSimilarity(
        embeddings,
        sample.predicted,
        sample.reference,
      );
      metrics.bert_score = await greedyTokenF1(embeddings, sample.predicted, sample.reference);
    } catch (e) {
      getLogger().warn('Embedding provider failed, leaving embedding metrics null', {
        family: this.getSerializationName(),
        error: e instanceof Error ? e.message : String(e),
      });
    }
    return metrics;
  }

  /**
   * Average over parallel lists of predictions and references.
   */
  evaluateTexts(predictedList: readonly string[], referenceList: readonly string[]): MetricMap {
    if (predictedList.length !== referenceList.length) {
      throw new Error(
        'predicted and reference lists must have the same length ' +
          `(${predictedList.length} != ${referenceList.length})`,
      );
    }
    return this.evaluateBatch(
      predictedList.map((predicted, i) => ({ predicted, reference: referenceList[i] ?? '' })),
    );
  }
}

/**
 * Sentence BLEU without smoothing: the geometric mean of clipped n-gram
 * precisions times the brevity penalty. Any zero precision gives 0.
 */
export function bleu(hypothesis: string, reference: string, maxN = 4): number {
  const hyp = whitespaceTokens(hypothesis);
  const ref = whitespaceTokens(reference);
  if (hyp.length === 0 || ref.length === 0) return 0;

  let logSum = 0;
  for (let n = 1; n <= maxN; n++) {
    const hypGrams = ngramCounts(hyp, n);
    const hypTotal = totalCount(hypGrams);
    if (hypTotal === 0) return 0;
    const precision = clippedOverlap(hypGrams, ngramCounts(ref, n)) / hypTotal;
    if (precision === 0) return 0;
    logSum += Math.log(precision);
  }
  const brevityPenalty = hyp.length < ref.length ? Math.exp(1 - ref.length / hyp.length) : 1;
  return brevityPenalty * Math.exp(logSum / maxN);
}

export function rougeN(hypothesis: string, reference: string, n: number): number {
  const hypGrams = ngramCounts(whitespaceTokens(hypothesis), n);
  const refGrams = ngramCounts(whitespaceTokens(reference), n);
  const hypTotal = totalCount(hypGrams);
  const refTotal = totalCount(refGrams);
  if (hypTotal === 0 || refTotal === 0) return 0;
  const overlap = clippedOverlap(hypGrams, refGrams);
  return harmonic(overlap / hypTotal, overlap / refTotal);
}

export function lcsLength(a: readonly string[], b: readonly string[]): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const curr = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      curr[j] =
        a[i - 1] === b[j - 1]
          ? (prev[j - 1] ?? 0) + 1
          : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    prev = curr;
  }
  return prev[b.length] ?? 0;
}

export function rougeL(hypothesis: string, reference: string): number {
  const hyp = whitespaceTokens(hypothesis);
  const ref = whitespaceTokens(reference);
  if (hyp.length === 0 || ref.length === 0) return 0;
  const lcs = lcsLength(hyp, ref);
  return harmonic(lcs / hyp.length, lcs / ref.length);
}

function harmonic(precision: number, recall: number): number {
  return precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
}

async function embeddingSimilarity(
  provider: EmbeddingProvider,
  a: string,
  b: string,
): Promise<number | null> {
  const [vecA, vecB] = await provider.embed([a, b]);
  if (!vecA || !vecB) return null;
  return cosineSimilarity(vecA, vecB);
}

/**
 * BERTScore-style F1: each token is matched to its most similar token on the
 * other side; precision and recall are the mean best-match similarities.
 */
async function greedyTokenF1(
  provider: EmbeddingProvider,
  hypothesis: string,
  reference: string,
): Promise<number | null> {
  const hyp = whitespaceTokens(hypothesis);
  const ref = whitespaceTokens(reference);
  if (hyp.length === 0 || ref.length === 0) return null;

  const vectors = await provider.embed([...hyp, ...ref]);
  if (vectors.length !== hyp.length + ref.length) return null;
  const hypVecs = vectors.slice(0, hyp.length);
  const refVecs = vectors.slice(hyp.length);

  const bestMatch = (from: number[][], to: number[][]) =>
    from.reduce((sum, v) => sum + Math.max(...to.map((w) => cosineSimilarity(v, w))), 0) /
    from.length;
  return harmonic(bestMatch(hypVecs, refVecs), bestMatch(refVecs, hypVecs));
}
