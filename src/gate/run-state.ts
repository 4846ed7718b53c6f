/**
 * Run lifecycle: PENDING → RUNNING → COMPLETED | GATE_BLOCKED | FAILED.
 * Cancellation moves PENDING or RUNNING to FAILED.
 */

import { InvalidRunTransitionError } from '../errors.js';
import type { EvaluationRun, RunStatus } from '../types.js';

const TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  pending: ['running', 'failed'],
  running: ['completed', 'gate_blocked', 'failed'],
  completed: [],
  gate_blocked: [],
  failed: [],
};

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RunStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * The run in its new state. Entering RUNNING sets `startedAt`; entering a
 * terminal state sets `completedAt`.
 */
export function transition(
  run: EvaluationRun,
  to: RunStatus,
  now: Date = new Date(),
): EvaluationRun {
  if (!canTransition(run.status, to)) {
    throw new InvalidRunTransitionError(run.status, to);
  }
  return {
    ...run,
    status: to,
    startedAt: to === 'running' ? now : run.startedAt,
    completedAt: isTerminal(to) ? now : run.completedAt,
  };
}
