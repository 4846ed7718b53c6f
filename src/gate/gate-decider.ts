/**
 * Gate decision for a finished run.
 *
 * Every threshold in the run's snapshot is compared against the summary;
 * every case with a failed rule is listed. A threshold whose actual value is
 * missing never blocks, and neither does a missing snapshot.
 */

import { LOWER_IS_BETTER } from '../metrics/batch.js';
import type {
  EvaluationResult,
  GateDecision,
  GateThresholds,
  MetricBreach,
  RuleFailure,
  SummaryMetrics,
} from '../types.js';
import { isFiniteNumber } from '../types.js';

export const PASS_RATE = 'pass_rate';

/**
 * The summary value a threshold key is compared with: `pass_rate` itself,
 * `avg_<key>` for anything else.
 */
export function actualFor(key: string, summary: SummaryMetrics | null): number | null {
  if (!summary) return null;
  const value = key === PASS_RATE ? summary.passRate : summary.averages[`avg_${key}`];
  return isFiniteNumber(value) ? value : null;
}

export function findBreach(
  metric: string,
  actual: number,
  threshold: number,
): MetricBreach | null {
  if (LOWER_IS_BETTER.has(metric)) {
    return actual > threshold ? { metric, actual, threshold, delta: threshold - actual } : null;
  }
  return actual < threshold ? { metric, actual, threshold, delta: actual - threshold } : null;
}

export function decideGate(
  snapshot: GateThresholds | null,
  summary: SummaryMetrics | null,
  results: readonly EvaluationResult[],
): GateDecision {
  const metricFailures: MetricBreach[] = [];
  for (const [metric, threshold] of Object.entries(snapshot ?? {})) {
    const actual = actualFor(metric, summary);
    if (actual === null || !isFiniteNumber(threshold)) continue;
    const breach = findBreach(metric, actual, threshold);
    if (breach) metricFailures.push(breach);
  }

  const ruleFailures: RuleFailure[] = results
    .filter((r) => r.rulesPassed === false)
    .map((r) => ({ resultId: r.id, testCaseId: r.testCaseId, rulesDetail: r.rulesDetail }));

  return {
    passed: metricFailures.length === 0 && ruleFailures.length === 0,
    metricFailures,
    ruleFailures,
  };
}

export function gateDecisionToJSON(decision: GateDecision): Record<string, unknown> {
  return {
    passed: decision.passed,
    metric_failures: decision.metricFailures.map((b) => ({
      metric: b.metric,
      actual: b.actual,
      threshold: b.threshold,
      delta: b.delta,
    })),
    rule_failures: decision.ruleFailures.map((f) => ({
      result_id: f.resultId,
      test_case_id: f.testCaseId,
      rules_detail: f.rulesDetail,
    })),
  };
}
