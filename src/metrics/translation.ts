/**
 * Machine-translation metrics: BLEU, chrF++, TER and an optional learned
 * quality score.
 */

import { getLogger } from '../logger.js';
import type { MetricMap } from '../types.js';
import { MetricFamily } from './base.js';
import type { TranslationQualityProvider } from './providers.js';
import { bleu } from './similarity.js';
import { charNgramCounts, clippedOverlap, ngramCounts, totalCount, whitespaceTokens } from './text.js';

export interface TranslationSample {
  hypothesis: string;
  reference: string;
  /** Needed for the learned quality score only. */
  source?: string | null;
}

export interface TranslationMetricsOptions {
  bleuMaxN?: number;
  chrfCharN?: number;
  chrfWordN?: number;
  chrfBeta?: number;
}

export class TranslationMetrics extends MetricFamily<TranslationSample> {
  readonly bleuMaxN: number;
  readonly chrfCharN: number;
  readonly chrfWordN: number;
  readonly chrfBeta: number;

  constructor(opts?: TranslationMetricsOptions) {
    super();
    this.bleuMaxN = opts?.bleuMaxN ?? 4;
    this.chrfCharN = opts?.chrfCharN ?? 6;
    this.chrfWordN = opts?.chrfWordN ?? 2;
    this.chrfBeta = opts?.chrfBeta ?? 2;
  }

  protected getFields() {
    return {
      bleuMaxN: this.bleuMaxN,
      chrfCharN: this.chrfCharN,
      chrfWordN: this.chrfWordN,
      chrfBeta: this.chrfBeta,
    };
  }
  protected getDefaults() {
    return { bleuMaxN: 4, chrfCharN: 6, chrfWordN: 2, chrfBeta: 2 };
  }

  zeroMetrics(): MetricMap {
    return { sacrebleu: 0, chrf_plus_plus: 0, ter: 1, comet: null };
  }

  evaluate(sample: TranslationSample): MetricMap {
    return {
      sacrebleu: bleu(sample.hypothesis, sample.reference, this.bleuMaxN),
      chrf_plus_plus: chrfPlusPlus(sample.hypothesis, sample.reference, {
        charN: this.chrfCharN,
        wordN: this.chrfWordN,
        beta: this.chrfBeta,
      }),
      ter: translationEditRate(sample.hypothesis, sample.reference),
      comet: null,
    };
  }

  async evaluateAsync(
    sample: TranslationSample,
    quality?: TranslationQualityProvider,
  ): Promise<MetricMap> {
    const metrics = this.evaluate(sample);
    if (!quality || sample.source === null || sample.source === undefined) {
      return metrics;
    }
    try {
      metrics.comet = await quality.score({
        source: sample.source,
        hypothesis: sample.hypothesis,
        reference: sample.reference,
      });
    } catch (e) {
      getLogger().warn('Translation quality provider failed, leaving comet null', {
        error: e instanceof Error ? e.message : String(e),
      });
    }
    return metrics;
  }
}

/**
 * chrF++: character n-grams 1..charN plus word n-grams 1..wordN, pooled into
 * one precision and recall and combined as an F-beta score.
 */
export function chrfPlusPlus(
  hypothesis: string,
  reference: string,
  opts: { charN?: number; wordN?: number; beta?: number } = {},
): number {
  const { charN = 6, wordN = 2, beta = 2 } = opts;
  if (!hypothesis && !reference) return 1;
  if (!hypothesis || !reference) return 0;

  let matched = 0;
  let hypTotal = 0;
  let refTotal = 0;
  const pool = (hypGrams: Map<string, number>, refGrams: Map<string, number>) => {
    matched += clippedOverlap(hypGrams, refGrams);
    hypTotal += Math.max(totalCount(hypGrams), 1);
    refTotal += Math.max(totalCount(refGrams), 1);
  };

  for (let n = 1; n <= charN; n++) {
    pool(charNgramCounts(hypothesis, n), charNgramCounts(reference, n));
  }
  const hypWords = whitespaceTokens(hypothesis);
  const refWords = whitespaceTokens(reference);
  for (let n = 1; n <= wordN; n++) {
    pool(ngramCounts(hypWords, n), ngramCounts(refWords, n));
  }

  const precision = matched / hypTotal;
  const recall = matched / refTotal;
  if (precision + recall === 0) return 0;
  const betaSq = beta * beta;
  return ((1 + betaSq) * precision * recall) / (betaSq * precision + recall);
}

/**
 * Word-level Levenshtein distance divided by the reference length.
 */
export function translationEditRate(hypothesis: string, reference: string): number {
  const hyp = whitespaceTokens(hypothesis);
  const ref = whitespaceTokens(reference);
  if (ref.length === 0) {
    return hyp.length === 0 ? 0 : 1;
  }
  let row = Array.from({ length: ref.length + 1 }, (_, j) => j);
  for (let i = 1; i <= hyp.length; i++) {
    const next = [i];
    for (let j = 1; j <= ref.length; j++) {
      const substitution = (row[j - 1] ?? 0) + (hyp[i - 1] === ref[j - 1] ? 0 : 1);
      next[j] = Math.min(substitution, (row[j] ?? 0) + 1, (next[j - 1] ?? 0) + 1);
    }
    row = next;
  }
  return (row[ref.length] ?? 0) / ref.length;
}
