/**
 * Persistence seam for test sets, runs and results.
 *
 * The engine only talks to EvaluationStore. InMemoryEvaluationStore backs
 * tests and single-process use; a database-backed store implements the same
 * interface.
 */

import { RunNotFoundError, TestSetNotFoundError } from './errors.js';
import type { EvaluationResult, EvaluationRun, RunStatus, TestSet } from './types.js';

export interface EvaluationStore {
  saveTestSet(testSet: TestSet): Promise<void>;
  /** Throws TestSetNotFoundError. */
  getTestSet(testSetId: string): Promise<TestSet>;
  saveRun(run: EvaluationRun): Promise<void>;
  /**
   * Save `run` only while the stored run is still in `expected` status.
   * Resolves false, saving nothing, when another writer moved it first.
   */
  saveRunIf(run: EvaluationRun, expected: RunStatus): Promise<boolean>;
  /** Throws RunNotFoundError. */
  getRun(runId: string): Promise<EvaluationRun>;
  listRuns(testSetId: string): Promise<EvaluationRun[]>;
  /** Insert or replace the result for `(runId, testCaseId)`. */
  upsertResult(result: EvaluationResult): Promise<void>;
  /** Results of a run in the order their cases were first stored. */
  listResults(runId: string): Promise<EvaluationResult[]>;
}

export class InMemoryEvaluationStore implements EvaluationStore {
  private readonly testSets = new Map<string, TestSet>();
  private readonly runs = new Map<string, EvaluationRun>();
  private readonly results = new Map<string, Map<string, EvaluationResult>>();

  async saveTestSet(testSet: TestSet): Promise<void> {
    this.testSets.set(testSet.id, testSet);
  }

  async getTestSet(testSetId: string): Promise<TestSet> {
    const testSet = this.testSets.get(testSetId);
    if (!testSet) throw new TestSetNotFoundError(testSetId);
    return testSet;
  }

  async saveRun(run: EvaluationRun): Promise<void> {
    this.runs.set(run.id, run);
  }

  async saveRunIf(run: EvaluationRun, expected: RunStatus): Promise<boolean> {
    const stored = this.runs.get(run.id);
    if (!stored) throw new RunNotFoundError(run.id);
    if (stored.status !== expected) return false;
    this.runs.set(run.id, run);
    return true;
  }

  async getRun(runId: string): Promise<EvaluationRun> {
    const run = this.runs.get(runId);
    if (!run) throw new RunNotFoundError(runId);
    return run;
  }

  async listRuns(testSetId: string): Promise<EvaluationRun[]> {
    return [...this.runs.values()].filter((run) => run.testSetId === testSetId);
  }

  async upsertResult(result: EvaluationResult): Promise<void> {
    let byCase = this.results.get(result.runId);
    if (!byCase) {
      byCase = new Map();
      this.results.set(result.runId, byCase);
    }
    byCase.set(result.testCaseId, result);
  }

  async listResults(runId: string): Promise<EvaluationResult[]> {
    return [...(this.results.get(runId)?.values() ?? [])];
  }
}
