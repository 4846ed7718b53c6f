/**
 * Run-level summary: pass counts and one `avg_<metric>` per computed metric.
 */

import { averageMetricMaps } from '../metrics/batch.js';
import { ClassificationMetrics, type ClassificationSample } from '../metrics/classification.js';
import { coreScores } from '../scoring/composite.js';
import type { EvaluationResult, MetricMap, SummaryMetrics } from '../types.js';
import { isFiniteNumber } from '../types.js';

/**
 * The numbers a result contributes to averages: observed core scores and
 * every extended metric.
 */
function resultMetricMap(result: EvaluationResult): MetricMap {
  const map: MetricMap = {};
  for (const [name, value] of Object.entries(coreScores(result))) {
    if (value !== null) map[name] = value;
  }
  return { ...map, ...result.extendedMetrics };
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Corpus-level classification metrics (macro/micro/weighted F1, kappa,
 * AUC-ROC, PR-AUC) over the labels recorded on each result, or null when the
 * run recorded no labels.
 */
export function classificationRunMetrics(results: readonly EvaluationResult[]): MetricMap | null {
  const samples: ClassificationSample[] = [];
  for (const result of results) {
    const extended = result.extendedMetrics ?? {};
    const predicted = extended.predicted_labels;
    const expected = extended.expected_labels;
    if (!isStringList(predicted) || !isStringList(expected)) continue;
    const probability = extended.predicted_probability;
    const positive = extended.expected_positive;
    samples.push({
      predicted,
      expected,
      probability: isFiniteNumber(probability) ? probability : null,
      positive: typeof positive === 'boolean' ? positive : null,
    });
  }
  if (samples.length === 0) return null;
  return new ClassificationMetrics().evaluateBatch(samples);
}

export function aggregateRun(results: readonly EvaluationResult[]): SummaryMetrics {
  const total = results.length;
  const passed = results.filter((r) => r.passed).length;

  const averaged = averageMetricMaps(results.map(resultMetricMap));
  // run-level metrics only fill in names the per-case averages lack
  for (const [name, value] of Object.entries(classificationRunMetrics(results) ?? {})) {
    if (!(name in averaged)) averaged[name] = value;
  }

  const averages: Record<string, number | null> = {};
  for (const [name, value] of Object.entries(averaged)) {
    averages[`avg_${name}`] = isFiniteNumber(value) ? value : null;
  }

  return {
    totalCases: total,
    passedCases: passed,
    failedCases: total - passed,
    passRate: total === 0 ? 1 : passed / total,
    averages,
  };
}

/**
 * The flat snake_case map stored on a run and served to report consumers.
 */
export function toSummaryJSON(summary: SummaryMetrics): Record<string, number | null> {
  return {
    total_cases: summary.totalCases,
    passed_cases: summary.passedCases,
    failed_cases: summary.failedCases,
    pass_rate: summary.passRate,
    ...summary.averages,
  };
}

