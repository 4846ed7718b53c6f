/**
 * Tool-use metrics for agent systems.
 *
 * Calls are matched by name, or by name plus sorted arguments when
 * `matchArguments` is set. Duplicate calls count as many times as they occur.
 */

import type { MetricMap, ToolCall } from '../types.js';
import { isRecord } from '../types.js';
import { MetricFamily } from './base.js';
import { matchCascade } from './text.js';

export interface AgentSample {
  predictedToolCalls: readonly ToolCall[];
  expectedToolCalls: readonly ToolCall[];
  finalAnswer?: string | null;
  expectedAnswer?: string | null;
  minSteps?: number | null;
  actualSteps?: number | null;
  errorStates?: number | null;
  recoveredStates?: number | null;
}

export interface AgentMetricsOptions {
  matchArguments?: boolean;
  ordered?: boolean;
}

export class AgentMetrics extends MetricFamily<AgentSample> {
  readonly matchArguments: boolean;
  readonly ordered: boolean;

  constructor(opts?: AgentMetricsOptions) {
    super();
    this.matchArguments = opts?.matchArguments ?? false;
    this.ordered = opts?.ordered ?? false;
  }

  protected getFields() {
    return { matchArguments: this.matchArguments, ordered: this.ordered };
  }
  protected getDefaults() {
    return { matchArguments: false, ordered: false };
  }

  zeroMetrics(): MetricMap {
    return {
      tool_call_precision: 0,
      tool_call_recall: 0,
      tool_call_f1: 0,
      tool_call_accuracy: 0,
      argument_accuracy: 0,
      goal_accuracy: 0,
      step_efficiency: 0,
      error_recovery_rate: null,
    };
  }

  evaluate(sample: AgentSample): MetricMap {
    const predicted = sample.predictedToolCalls;
    const expected = sample.expectedToolCalls;
    const [precision, recall, f1] = this.toolCallF1(predicted, expected);
    return {
      tool_call_precision: precision,
      tool_call_recall: recall,
      tool_call_f1: f1,
      tool_call_accuracy: this.toolCallAccuracy(predicted, expected),
      argument_accuracy: argumentAccuracy(predicted, expected),
      goal_accuracy: goalAccuracy(sample.finalAnswer, sample.expectedAnswer),
      step_efficiency: stepEfficiency(sample.minSteps, sample.actualSteps),
      error_recovery_rate: errorRecoveryRate(sample.errorStates, sample.recoveredStates),
    };
  }

  callKey(call: ToolCall): string {
    if (this.matchArguments && call.arguments && Object.keys(call.arguments).length > 0) {
      return `${call.name}:${stableStringify(call.arguments)}`;
    }
    return call.name;
  }

  /**
   * Precision, recall and F1 over the multiset of call keys.
   */
  toolCallF1(
    predicted: readonly ToolCall[],
    expected: readonly ToolCall[],
  ): [precision: number, recall: number, f1: number] {
    if (predicted.length === 0 && expected.length === 0) return [1, 1, 1];
    if (predicted.length === 0 || expected.length === 0) return [0, 0, 0];

    const predictedCounts = countKeys(predicted.map((c) => this.callKey(c)));
    const expectedCounts = countKeys(expected.map((c) => this.callKey(c)));
    let truePositives = 0;
    for (const [key, count] of predictedCounts) {
      truePositives += Math.min(count, expectedCounts.get(key) ?? 0);
    }
    const precision = truePositives / predicted.length;
    const recall = truePositives / expected.length;
    if (precision + recall === 0) return [0, 0, 0];
    return [precision, recall, (2 * precision * recall) / (precision + recall)];
  }

  /**
   * 1 when the call keys match exactly (as a sequence when `ordered`, else as a multiset).
   */
  toolCallAccuracy(predicted: readonly ToolCall[], expected: readonly ToolCall[]): number {
    if (predicted.length === 0 && expected.length === 0) return 1;
    const predictedKeys = predicted.map((c) => this.callKey(c));
    const expectedKeys = expected.map((c) => this.callKey(c));
    if (!this.ordered) {
      predictedKeys.sort();
      expectedKeys.sort();
    }
    return arraysEqual(predictedKeys, expectedKeys) ? 1 : 0;
  }
}

/**
 * For each expected call with arguments, compare against the predicted call
 * of the same name at the same position among calls of that name.
 */
export function argumentAccuracy(
  predicted: readonly ToolCall[],
  expected: readonly ToolCall[],
): number {
  if (expected.length === 0) return 1;

  const predictedByName = groupArguments(predicted);
  let total = 0;
  let matching = 0;
  for (const [name, expectedArgList] of groupArguments(expected)) {
    const predictedArgList = predictedByName.get(name) ?? [];
    expectedArgList.forEach((expectedArgs, i) => {
      const predictedArgs = predictedArgList[i] ?? {};
      for (const [key, value] of Object.entries(expectedArgs)) {
        total++;
        if (key in predictedArgs && valuesMatch(predictedArgs[key], value)) {
          matching++;
        }
      }
    });
  }
  return total > 0 ? matching / total : 1;
}

export function goalAccuracy(
  finalAnswer: string | null | undefined,
  expectedAnswer: string | null | undefined,
): number {
  if (expectedAnswer === null || expectedAnswer === undefined) return 1;
  if (finalAnswer === null || finalAnswer === undefined) return 0;
  return matchCascade(finalAnswer, expectedAnswer, { containedScore: 0.9, overlapScale: 0.7 });
}

export function stepEfficiency(
  minSteps: number | null | undefined,
  actualSteps: number | null | undefined,
): number {
  if (minSteps === null || minSteps === undefined) return 1;
  if (actualSteps === null || actualSteps === undefined) return 1;
  if (actualSteps === 0) return minSteps === 0 ? 1 : 0;
  return Math.min(minSteps / actualSteps, 1);
}

/**
 * Null when there were no error states to recover from.
 */
export function errorRecoveryRate(
  errorStates: number | null | undefined,
  recoveredStates: number | null | undefined,
): number | null {
  if (errorStates === null || errorStates === undefined) return null;
  if (recoveredStates === null || recoveredStates === undefined) return null;
  if (errorStates === 0) return null;
  return Math.min(recoveredStates / errorStates, 1);
}

/**
 * Exact equality, then numeric equality, then trimmed case-insensitive text equality.
 */
export function valuesMatch(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  const numA = toNumber(a);
  const numB = toNumber(b);
  if (numA !== null && numB !== null) return numA === numB;
  return String(a).trim().toLowerCase() === String(b).trim().toLowerCase();
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function groupArguments(calls: readonly ToolCall[]): Map<string, Record<string, unknown>[]> {
  const grouped = new Map<string, Record<string, unknown>[]>();
  for (const call of calls) {
    const list = grouped.get(call.name) ?? [];
    list.push(call.arguments ?? {});
    grouped.set(call.name, list);
  }
  return grouped;
}

function countKeys(keys: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);
  return counts;
}

function arraysEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * JSON with object keys sorted at every level.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
