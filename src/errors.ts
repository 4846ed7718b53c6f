/**
 * Error taxonomy of the evaluation engine.
 *
 * Only UnregisteredAdapterError, InvalidRunTransitionError and the store
 * lookup errors escape to callers. The others are recovered inside a case
 * and recorded as text.
 */

import type { RunStatus } from './types.js';

/**
 * The pipeline adapter threw or did not answer within the timeout.
 */
export class PipelineError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, opts?: { timedOut?: boolean; cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = 'PipelineError';
    this.timedOut = opts?.timedOut ?? false;
  }
}

/**
 * A metric family threw while scoring a case.
 */
export class MetricComputationError extends Error {
  readonly family: string;

  constructor(family: string, message: string, opts?: { cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = 'MetricComputationError';
    this.family = family;
  }
}

/**
 * A custom rule extension is missing or threw.
 */
export class CustomRuleExtensionError extends Error {
  readonly extensionId: string | null;

  constructor(extensionId: string | null, message: string, opts?: { cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = 'CustomRuleExtensionError';
    this.extensionId = extensionId;
  }
}

export class UnregisteredAdapterError extends Error {
  readonly adapterId: string;

  constructor(adapterId: string, registered: string[]) {
    super(
      `Unregistered adapter '${adapterId}'. ` +
        `Registered adapters: ${registered.length > 0 ? registered.join(', ') : '(none)'}`,
    );
    this.name = 'UnregisteredAdapterError';
    this.adapterId = adapterId;
  }
}

export class InvalidRunTransitionError extends Error {
  readonly from: RunStatus;
  readonly to: RunStatus;

  constructor(from: RunStatus, to: RunStatus) {
    super(`Cannot transition run from '${from}' to '${to}'`);
    this.name = 'InvalidRunTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class RunNotFoundError extends Error {
  constructor(runId: string) {
    super(`Evaluation run '${runId}' not found`);
    this.name = 'RunNotFoundError';
  }
}

export class TestSetNotFoundError extends Error {
  constructor(testSetId: string) {
    super(`Test set '${testSetId}' not found`);
    this.name = 'TestSetNotFoundError';
  }
}

/**
 * Coerce any thrown value into an Error.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
