/**
 * Per-case pass/fail.
 *
 * The composite is the mean of a case's primary metric values and must reach
 * COMPOSITE_THRESHOLD. A failed rule fails the case whatever the composite.
 */

import { LOWER_IS_BETTER } from '../metrics/batch.js';
import type { EvaluationResult, MetricMap } from '../types.js';
import { isFiniteNumber } from '../types.js';

export const COMPOSITE_THRESHOLD = 0.5;

/**
 * Extended metrics that are recorded but are not scores of the answer.
 * `safety_score` already folds in the two risk values.
 */
export const NON_COMPOSITE_METRICS: ReadonlySet<string> = new Set([
  'toxicity_score',
  'injection_risk',
  'predicted_probability',
]);

export const CORE_METRIC_NAMES = [
  'faithfulness',
  'answer_relevancy',
  'context_precision',
  'context_recall',
] as const;

export type CoreMetricName = (typeof CORE_METRIC_NAMES)[number];

type CoreFields = Pick<
  EvaluationResult,
  'faithfulness' | 'answerRelevancy' | 'contextPrecision' | 'contextRecall'
>;

export function coreScores(result: CoreFields): Record<CoreMetricName, number | null> {
  return {
    faithfulness: result.faithfulness,
    answer_relevancy: result.answerRelevancy,
    context_precision: result.contextPrecision,
    context_recall: result.contextRecall,
  };
}

/**
 * Values that take part in the composite: finite core scores and numeric
 * extended metrics. Lower-is-better metrics enter as `1 - min(v, 1)`;
 * booleans and label lists are ignored.
 */
export function compositeValues(core: CoreFields, extended: MetricMap | null): number[] {
  const values = Object.values(coreScores(core)).filter(isFiniteNumber);
  for (const [name, value] of Object.entries(extended ?? {})) {
    if (!isFiniteNumber(value) || NON_COMPOSITE_METRICS.has(name)) continue;
    values.push(LOWER_IS_BETTER.has(name) ? 1 - Math.min(value, 1) : value);
  }
  return values;
}

/**
 * Mean of the composite values, or null when there are none.
 */
export function compositeScore(core: CoreFields, extended: MetricMap | null): number | null {
  const values = compositeValues(core, extended);
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export interface CaseVerdict {
  passed: boolean;
  /** Set when the case fails and no earlier reason was recorded. */
  reason: string | null;
}

export function decideCase(
  core: CoreFields,
  extended: MetricMap | null,
  rulesPassed: boolean | null,
  ruleReasons: readonly string[],
): CaseVerdict {
  if (rulesPassed === false) {
    return { passed: false, reason: `Failure rule violation: ${ruleReasons.join('; ')}` };
  }
  const score = compositeScore(core, extended);
  if (score !== null && score < COMPOSITE_THRESHOLD) {
    return {
      passed: false,
      reason: `Composite score ${score.toFixed(3)} below ${COMPOSITE_THRESHOLD}`,
    };
  }
  return { passed: true, reason: null };
}

/**
 * Recompute `passed` from a stored result's values.
 */
export function isCasePassed(
  result: CoreFields & Pick<EvaluationResult, 'extendedMetrics' | 'rulesPassed'>,
): boolean {
  return decideCase(result, result.extendedMetrics, result.rulesPassed, []).passed;
}
