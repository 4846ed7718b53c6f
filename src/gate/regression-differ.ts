/**
 * Compares a run with the latest passing run of the same test set.
 */

import { coreScores } from '../scoring/composite.js';
import type {
  EvaluationResult,
  EvaluationRun,
  RegressionDiff,
  RegressionItem,
  SummaryMetrics,
} from '../types.js';
import { isFiniteNumber } from '../types.js';
import { PASS_RATE } from './gate-decider.js';

/**
 * The most recently completed, passing run of the same test set other than
 * `run` itself. Ties on completion time go to the greater run id.
 */
export function selectBaseline(
  run: EvaluationRun,
  candidates: readonly EvaluationRun[],
): EvaluationRun | null {
  let best: EvaluationRun | null = null;
  let bestTime = -Infinity;
  for (const candidate of candidates) {
    if (
      candidate.id === run.id ||
      candidate.testSetId !== run.testSetId ||
      candidate.status !== 'completed' ||
      candidate.overallPassed !== true ||
      candidate.completedAt === null
    ) {
      continue;
    }
    const time = candidate.completedAt.getTime();
    if (best === null || time > bestTime || (time === bestTime && candidate.id > best.id)) {
      best = candidate;
      bestTime = time;
    }
  }
  return best;
}

/**
 * Finite core and extended metric values of a result.
 */
export function numericScores(result: EvaluationResult): Record<string, number> {
  const scores: Record<string, number> = {};
  const all = { ...coreScores(result), ...result.extendedMetrics };
  for (const [name, value] of Object.entries(all)) {
    if (isFiniteNumber(value)) scores[name] = value;
  }
  return scores;
}

function summaryValues(summary: SummaryMetrics | null): Record<string, number | null> {
  if (!summary) return {};
  return { ...summary.averages, [PASS_RATE]: summary.passRate };
}

/**
 * `current − baseline` for every `avg_*` key and `pass_rate` of either
 * summary; null when either side lacks the value.
 */
export function metricDeltas(
  current: SummaryMetrics | null,
  baseline: SummaryMetrics | null,
): Record<string, number | null> {
  const currentValues = summaryValues(current);
  const baselineValues = summaryValues(baseline);
  const deltas: Record<string, number | null> = {};
  for (const key of new Set([...Object.keys(currentValues), ...Object.keys(baselineValues)])) {
    const a = currentValues[key];
    const b = baselineValues[key];
    deltas[key] = isFiniteNumber(a) && isFiniteNumber(b) ? a - b : null;
  }
  return deltas;
}

export function diffRuns(
  current: EvaluationRun,
  currentResults: readonly EvaluationResult[],
  baseline: EvaluationRun | null,
  baselineResults: readonly EvaluationResult[],
): RegressionDiff {
  if (baseline === null) {
    return {
      baselineRunId: null,
      regressions: [],
      improvements: [],
      metricDeltas: {},
      gateBlocked: current.overallPassed === false,
    };
  }

  const baselineByCase = new Map(baselineResults.map((r) => [r.testCaseId, r]));
  const regressions: RegressionItem[] = [];
  const improvements: RegressionItem[] = [];
  for (const result of currentResults) {
    const before = baselineByCase.get(result.testCaseId);
    if (!before || before.passed === result.passed) continue;
    const item: RegressionItem = {
      testCaseId: result.testCaseId,
      query: result.query,
      failureReason: result.failureReason,
      currentScores: numericScores(result),
      baselineScores: numericScores(before),
    };
    (before.passed ? regressions : improvements).push(item);
  }

  return {
    baselineRunId: baseline.id,
    regressions,
    improvements,
    metricDeltas: metricDeltas(current.summaryMetrics, baseline.summaryMetrics),
    gateBlocked: regressions.length > 0,
  };
}

function itemToJSON(item: RegressionItem): Record<string, unknown> {
  return {
    test_case_id: item.testCaseId,
    query: item.query,
    failure_reason: item.failureReason,
    current_scores: item.currentScores,
    baseline_scores: item.baselineScores,
  };
}

export function regressionDiffToJSON(diff: RegressionDiff): Record<string, unknown> {
  return {
    baseline_run_id: diff.baselineRunId,
    regressions: diff.regressions.map(itemToJSON),
    improvements: diff.improvements.map(itemToJSON),
    metric_deltas: diff.metricDeltas,
    gate_blocked: diff.gateBlocked,
  };
}
