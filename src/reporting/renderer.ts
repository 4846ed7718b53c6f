/**
 * Terminal rendering of runs, gate decisions and regression diffs with
 * chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { numericScores } from '../gate/regression-differ.js';
import { LOWER_IS_BETTER } from '../metrics/batch.js';
import type {
  EvaluationResult,
  EvaluationRun,
  GateDecision,
  RegressionDiff,
  RegressionItem,
  SummaryMetrics,
} from '../types.js';
import { renderDuration, renderNumber, renderNumberDiff, renderPercentage } from './render-numbers.js';

export interface RunTableOptions {
  includeQuery?: boolean;
  includeOutput?: boolean;
  includeDurations?: boolean;
  includeReasons?: boolean;
  includeAverages?: boolean;
}

const PASS = chalk.green('✔');
const FAIL = chalk.red('✘');

/**
 * One row per result plus an averages row from the run's summary.
 */
export function renderRunTable(
  run: EvaluationRun,
  results: readonly EvaluationResult[],
  opts?: RunTableOptions,
): string {
  const includeDurations = opts?.includeDurations ?? true;
  const includeReasons = opts?.includeReasons ?? true;
  const includeAverages = opts?.includeAverages ?? true;

  const header = [chalk.bold('Case ID')];
  if (opts?.includeQuery) header.push('Query');
  if (opts?.includeOutput) header.push('Output');
  header.push('Scores', 'Rules', 'Passed');
  if (includeReasons) header.push('Reason');
  if (includeDurations) header.push('Duration');

  const table = new Table({ head: header, style: { head: [], border: [] } });

  for (const result of results) {
    const row = [chalk.bold(result.testCaseId)];
    if (opts?.includeQuery) row.push(result.query);
    if (opts?.includeOutput) row.push(result.rawOutput || '-');
    row.push(renderScores(numericScores(result)), renderRules(result), result.passed ? PASS : FAIL);
    if (includeReasons) row.push(result.failureReason ?? '-');
    if (includeDurations) row.push(renderDuration(result.durationMs));
    table.push(row);
  }

  if (includeAverages && run.summaryMetrics) {
    const row = [chalk.bold.italic('Averages')];
    if (opts?.includeQuery) row.push('');
    if (opts?.includeOutput) row.push('');
    row.push(renderAverages(run.summaryMetrics), '', renderPercentage(run.summaryMetrics.passRate));
    if (includeReasons) row.push('');
    if (includeDurations) row.push('');
    table.push(row);
  }

  return `${runTitle(run)}\n${table.toString()}`;
}

export function renderGateDecision(decision: GateDecision): string {
  const lines = [decision.passed ? chalk.green('Gate passed') : chalk.red('Gate blocked')];

  if (decision.metricFailures.length > 0) {
    const table = new Table({
      head: ['Metric', 'Actual', 'Threshold', 'Delta'],
      style: { head: [], border: [] },
    });
    for (const breach of decision.metricFailures) {
      table.push([
        breach.metric,
        renderNumber(breach.actual),
        renderNumber(breach.threshold),
        chalk.red(renderNumber(breach.delta)),
      ]);
    }
    lines.push(table.toString());
  }

  for (const failure of decision.ruleFailures) {
    const reasons = failure.rulesDetail.filter((r) => !r.passed).map((r) => `  - ${r.reason}`);
    lines.push(`${FAIL} ${chalk.bold(failure.testCaseId)}`, ...reasons);
  }

  return lines.join('\n');
}

export function renderRegressionDiff(diff: RegressionDiff): string {
  if (diff.baselineRunId === null) {
    return 'No baseline run to compare against';
  }
  const lines = [`Compared with baseline ${chalk.bold(diff.baselineRunId)}`];

  const deltas = Object.entries(diff.metricDeltas);
  if (deltas.length > 0) {
    const table = new Table({ head: ['Metric', 'Delta'], style: { head: [], border: [] } });
    for (const [metric, delta] of deltas) {
      table.push([metric, delta === null ? '-' : colourDelta(metric, delta)]);
    }
    lines.push(table.toString());
  }

  lines.push(...renderItems('Regressions', diff.regressions, FAIL));
  lines.push(...renderItems('Improvements', diff.improvements, PASS));
  lines.push(diff.gateBlocked ? chalk.red('Regression gate blocked') : chalk.green('No regressions'));
  return lines.join('\n');
}

function runTitle(run: EvaluationRun): string {
  const verdict = run.overallPassed === null ? '' : run.overallPassed ? ', passed' : ', blocked';
  return `Evaluation Run: ${run.id} (${run.status}${verdict})`;
}

function renderScores(scores: Record<string, number>): string {
  const entries = Object.entries(scores);
  if (entries.length === 0) return '-';
  return entries.map(([name, value]) => `${name}: ${renderNumber(value)}`).join('\n');
}

function renderRules(result: EvaluationResult): string {
  if (result.rulesPassed === null) return '-';
  return result.rulesDetail.map((r) => (r.passed ? PASS : FAIL)).join('');
}

function renderAverages(summary: SummaryMetrics): string {
  const entries = Object.entries(summary.averages).filter(
    (entry): entry is [string, number] => entry[1] !== null,
  );
  if (entries.length === 0) return '-';
  return entries.map(([name, value]) => `${name}: ${renderNumber(value)}`).join('\n');
}

function colourDelta(metric: string, delta: number): string {
  const text = renderNumberDiff(0, delta) ?? '0';
  if (delta === 0) return text;
  const better = LOWER_IS_BETTER.has(metric.replace(/^avg_/, '')) ? delta < 0 : delta > 0;
  return better ? chalk.green(text) : chalk.red(text);
}

function renderItems(title: string, items: readonly RegressionItem[], icon: string): string[] {
  if (items.length === 0) return [];
  const lines = [chalk.bold(`${title} (${items.length})`)];
  for (const item of items) {
    lines.push(`${icon} ${item.testCaseId}: ${item.query}`);
    if (item.failureReason) lines.push(`    ${item.failureReason}`);
  }
  return lines;
}
