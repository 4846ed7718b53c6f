/**
 * Classification metrics over normalised label sets (single- or multi-label).
 */

import type { MetricMap } from '../types.js';
import { MetricFamily } from './base.js';
import { mean } from './batch.js';

export type Labels = string | readonly string[];

export interface ClassificationSample {
  predicted: Labels;
  expected: Labels;
  /** Predicted probability of the positive class. */
  probability?: number | null;
  /** Binary ground truth matching `probability`. */
  positive?: boolean | null;
}

export class ClassificationMetrics extends MetricFamily<ClassificationSample> {
  zeroMetrics(): MetricMap {
    return {
      precision: 0,
      recall: 0,
      f1: 0,
      accuracy: 0,
      macro_f1: 0,
      micro_f1: 0,
      weighted_f1: 0,
      cohens_kappa: 0,
      auc_roc: null,
      pr_auc: null,
    };
  }

  evaluate(sample: ClassificationSample): MetricMap {
    const predicted = toLabelSet(sample.predicted);
    const expected = toLabelSet(sample.expected);
    const precision = setPrecision(predicted, expected);
    const recall = setRecall(predicted, expected);
    return {
      precision,
      recall,
      f1: f1Score(precision, recall),
      accuracy: setsEqual(predicted, expected) ? 1 : 0,
    };
  }

  /**
   * Per-sample averages plus corpus-level F1 variants, Cohen's kappa and,
   * when every sample carries a probability and a binary truth, AUC-ROC and PR-AUC.
   */
  evaluateBatch(samples: readonly ClassificationSample[]): MetricMap {
    const withProbabilities = samples.every(
      (s) => typeof s.probability === 'number' && typeof s.positive === 'boolean',
    );
    return this.evaluateLabels(
      samples.map((s) => s.predicted),
      samples.map((s) => s.expected),
      withProbabilities ? samples.map((s) => s.probability ?? 0) : undefined,
      withProbabilities ? samples.map((s) => (s.positive ? 1 : 0)) : undefined,
    );
  }

  evaluateLabels(
    predictedList: readonly Labels[],
    expectedList: readonly Labels[],
    predictedProbs?: readonly number[],
    trueBinary?: readonly number[],
  ): MetricMap {
    if (predictedList.length !== expectedList.length) {
      throw new Error(
        'predicted and expected label lists must have the same length ' +
          `(${predictedList.length} != ${expectedList.length})`,
      );
    }
    if (predictedList.length === 0) {
      return this.zeroMetrics();
    }

    const predSets = predictedList.map(toLabelSet);
    const trueSets = expectedList.map(toLabelSet);
    const perSample = predSets.map((p, i) => {
      const t = trueSets[i] ?? new Set<string>();
      const precision = setPrecision(p, t);
      const recall = setRecall(p, t);
      return { precision, recall, f1: f1Score(precision, recall), accuracy: setsEqual(p, t) ? 1 : 0 };
    });

    const hasProbabilities = predictedProbs !== undefined && trueBinary !== undefined;
    return {
      precision: mean(perSample.map((s) => s.precision)),
      recall: mean(perSample.map((s) => s.recall)),
      f1: mean(perSample.map((s) => s.f1)),
      accuracy: mean(perSample.map((s) => s.accuracy)),
      macro_f1: macroF1(predSets, trueSets),
      micro_f1: microF1(predSets, trueSets),
      weighted_f1: weightedF1(predSets, trueSets),
      cohens_kappa: cohensKappa(predSets, trueSets),
      auc_roc: hasProbabilities ? aucRoc(predictedProbs, trueBinary) : null,
      pr_auc: hasProbabilities ? prAuc(predictedProbs, trueBinary) : null,
    };
  }
}

/**
 * Lowercased, trimmed label set. A bare string is a one-element set; empty
 * entries of a list are dropped.
 */
export function toLabelSet(labels: Labels): Set<string> {
  if (typeof labels === 'string') {
    return new Set([labels.trim().toLowerCase()]);
  }
  return new Set(labels.map((l) => l.trim().toLowerCase()).filter(Boolean));
}

function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let n = 0;
  for (const label of a) if (b.has(label)) n++;
  return n;
}

function setPrecision(predicted: ReadonlySet<string>, expected: ReadonlySet<string>): number {
  return predicted.size === 0 ? 0 : intersectionSize(predicted, expected) / predicted.size;
}

function setRecall(predicted: ReadonlySet<string>, expected: ReadonlySet<string>): number {
  return expected.size === 0 ? 0 : intersectionSize(predicted, expected) / expected.size;
}

function setsEqual(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && intersectionSize(a, b) === a.size;
}

export function f1Score(precision: number, recall: number): number {
  return precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
}

interface LabelCounts {
  tp: number;
  fp: number;
  fn: number;
}

function perLabelCounts(
  predSets: readonly ReadonlySet<string>[],
  trueSets: readonly ReadonlySet<string>[],
): Map<string, LabelCounts> {
  const counts = new Map<string, LabelCounts>();
  const entry = (label: string): LabelCounts => {
    let c = counts.get(label);
    if (!c) {
      c = { tp: 0, fp: 0, fn: 0 };
      counts.set(label, c);
    }
    return c;
  };
  predSets.forEach((pred, i) => {
    const truth = trueSets[i] ?? new Set<string>();
    for (const label of pred) {
      if (truth.has(label)) entry(label).tp++;
      else entry(label).fp++;
    }
    for (const label of truth) {
      if (!pred.has(label)) entry(label).fn++;
    }
  });
  return counts;
}

function labelF1({ tp, fp, fn }: LabelCounts): number {
  const precision = tp + fp > 0 ? tp / (tp + fp) : 0;
  const recall = tp + fn > 0 ? tp / (tp + fn) : 0;
  return f1Score(precision, recall);
}

export function macroF1(
  predSets: readonly ReadonlySet<string>[],
  trueSets: readonly ReadonlySet<string>[],
): number {
  const counts = [...perLabelCounts(predSets, trueSets).values()];
  return counts.length === 0 ? 0 : mean(counts.map(labelF1));
}

export function microF1(
  predSets: readonly ReadonlySet<string>[],
  trueSets: readonly ReadonlySet<string>[],
): number {
  const total: LabelCounts = { tp: 0, fp: 0, fn: 0 };
  for (const c of perLabelCounts(predSets, trueSets).values()) {
    total.tp += c.tp;
    total.fp += c.fp;
    total.fn += c.fn;
  }
  return labelF1(total);
}

export function weightedF1(
  predSets: readonly ReadonlySet<string>[],
  trueSets: readonly ReadonlySet<string>[],
): number {
  let weightedSum = 0;
  let totalSupport = 0;
  for (const c of perLabelCounts(predSets, trueSets).values()) {
    const support = c.tp + c.fn;
    weightedSum += labelF1(c) * support;
    totalSupport += support;
  }
  return totalSupport > 0 ? weightedSum / totalSupport : 0;
}

/**
 * Cohen's kappa on single labels: the alphabetically first label of each
 * set, or '' for an empty set.
 */
export function cohensKappa(
  predSets: readonly ReadonlySet<string>[],
  trueSets: readonly ReadonlySet<string>[],
): number {
  const n = predSets.length;
  if (n === 0) return 0;
  const firstLabel = (s: ReadonlySet<string> | undefined) => (s ? ([...s].sort()[0] ?? '') : '');
  const predLabels = predSets.map(firstLabel);
  const trueLabels = predSets.map((_, i) => firstLabel(trueSets[i]));

  const po = predLabels.filter((p, i) => p === trueLabels[i]).length / n;
  let pe = 0;
  for (const label of new Set([...predLabels, ...trueLabels])) {
    const pFreq = predLabels.filter((p) => p === label).length / n;
    const tFreq = trueLabels.filter((t) => t === label).length / n;
    pe += pFreq * tFreq;
  }
  if (pe === 1) return 1;
  return (po - pe) / (1 - pe);
}

function sortedByProbability(
  probs: readonly number[],
  truth: readonly number[],
): Array<[number, number]> {
  return probs
    .map((p, i): [number, number] => [p, truth[i] ?? 0])
    .sort((a, b) => b[0] - a[0]);
}

/**
 * Trapezoidal AUC-ROC for binary truth. Null for empty or mismatched inputs
 * or when only one class is present.
 */
export function aucRoc(probs: readonly number[], truth: readonly number[]): number | null {
  if (probs.length === 0 || probs.length !== truth.length) return null;
  const totalPos = truth.reduce((a, b) => a + b, 0);
  const totalNeg = truth.length - totalPos;
  if (totalPos === 0 || totalNeg === 0) return null;

  let tp = 0;
  let fp = 0;
  let prevFpr = 0;
  let prevTpr = 0;
  let auc = 0;
  for (const [, label] of sortedByProbability(probs, truth)) {
    if (label === 1) tp++;
    else fp++;
    const tpr = tp / totalPos;
    const fpr = fp / totalNeg;
    auc += ((fpr - prevFpr) * (tpr + prevTpr)) / 2;
    prevFpr = fpr;
    prevTpr = tpr;
  }
  return auc;
}

/**
 * Step-wise area under the precision-recall curve. Null without positives.
 */
export function prAuc(probs: readonly number[], truth: readonly number[]): number | null {
  if (probs.length === 0 || probs.length !== truth.length) return null;
  const totalPos = truth.reduce((a, b) => a + b, 0);
  if (totalPos === 0) return null;

  let tp = 0;
  let fp = 0;
  let prevRecall = 0;
  let auc = 0;
  for (const [, label] of sortedByProbability(probs, truth)) {
    if (label === 1) tp++;
    else fp++;
    const recall = tp / totalPos;
    auc += (recall - prevRecall) * (tp / (tp + fp));
    prevRecall = recall;
  }
  return auc;
}
