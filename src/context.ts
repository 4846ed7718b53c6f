/**
 * AsyncLocalStorage-scoped state for the case currently being scored.
 *
 * Adapters call setCaseAttribute() and incrementCaseMetric() while the
 * pipeline runs; the scorer stores whatever they recorded on the result,
 * including when the pipeline call fails.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface CaseIdentity {
  runId: string;
  testCaseId: string;
}

interface CaseRun extends CaseIdentity {
  attributes: Record<string, unknown>;
  metrics: Record<string, number>;
}

export type SettledCall<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface CaseRunCapture<T> {
  outcome: SettledCall<T>;
  attributes: Record<string, unknown>;
  metrics: Record<string, number>;
}

const caseRunStorage = new AsyncLocalStorage<CaseRun>();

/**
 * Run `fn` inside a fresh case scope. Never rejects: a failure of `fn` is
 * reported in `outcome` next to what was recorded before it.
 */
export async function withCaseRun<T>(
  identity: CaseIdentity,
  fn: () => Promise<T>,
): Promise<CaseRunCapture<T>> {
  const caseRun: CaseRun = { ...identity, attributes: {}, metrics: {} };
  let outcome: SettledCall<T>;
  try {
    outcome = { ok: true, value: await caseRunStorage.run(caseRun, fn) };
  } catch (error) {
    outcome = { ok: false, error };
  }
  return { outcome, attributes: caseRun.attributes, metrics: caseRun.metrics };
}

/**
 * Identity of the case being scored, or null outside of a case scope.
 */
export function currentCase(): CaseIdentity | null {
  const caseRun = caseRunStorage.getStore();
  return caseRun ? { runId: caseRun.runId, testCaseId: caseRun.testCaseId } : null;
}

/**
 * No-op outside of a case scope.
 */
export function setCaseAttribute(name: string, value: unknown): void {
  const caseRun = caseRunStorage.getStore();
  if (caseRun) {
    caseRun.attributes[name] = value;
  }
}

/**
 * Add to a counter such as `tokens_used`. No-op outside of a case scope.
 */
export function incrementCaseMetric(name: string, amount: number): void {
  const caseRun = caseRunStorage.getStore();
  if (!caseRun) return;
  const next = (caseRun.metrics[name] ?? 0) + amount;
  // a counter that never moved is not worth recording
  if (next === 0 && !(name in caseRun.metrics)) return;
  caseRun.metrics[name] = next;
}
