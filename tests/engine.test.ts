import { afterEach, describe, expect, it, vi } from 'vitest';
import { createDefaultAdapterRegistry } from '../src/adapters/index.js';
import type { Settings } from '../src/config.js';
import { CANCELLED_MESSAGE, EvaluationEngine } from '../src/engine.js';
import {
  InvalidRunTransitionError,
  RunNotFoundError,
  TestSetNotFoundError,
  UnregisteredAdapterError,
} from '../src/errors.js';
import { type LogEntry, Logger, setLogger } from '../src/logger.js';
import { InMemoryEvaluationStore } from '../src/store.js';
import type { EvaluationResult, EvaluationRun, TestCase, TestSet } from '../src/types.js';

let previousLogger: Logger | null = null;

function recordLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  previousLogger = setLogger(new Logger({ minSeverity: 'debug', sink: (e) => entries.push(e) }));
  return entries;
}

afterEach(() => {
  if (previousLogger) {
    setLogger(previousLogger);
    previousLogger = null;
  }
});

const settings: Settings = {
  logLevel: 'info',
  pipelineTimeoutMs: 1000,
  maxConcurrency: 1,
  sessionTtlMs: 60_000,
  embeddingModel: 'test-model',
};

function spamCase(id: string, overrides: Partial<TestCase> = {}): TestCase {
  return {
    id,
    testSetId: 'inbox',
    query: `Classify message ${id}`,
    expectedOutput: 'spam',
    expectedLabels: ['spam'],
    failureRules: [],
    tags: [],
    ...overrides,
  };
}

const inbox: TestSet = {
  id: 'inbox',
  name: 'Inbox triage',
  systemType: 'classification',
  cases: [
    spamCase('case-1', { failureRules: [{ type: 'must_contain', value: 'spam' }] }),
    spamCase('case-2'),
  ],
};

const capitals: TestSet = {
  id: 'capitals',
  name: 'Capitals',
  systemType: 'rag',
  cases: [],
};

async function setup(
  adapters = createDefaultAdapterRegistry(),
  opts: { store?: InMemoryEvaluationStore; settings?: Settings } = {},
) {
  const store = opts.store ?? new InMemoryEvaluationStore();
  await store.saveTestSet(inbox);
  await store.saveTestSet(capitals);
  let tick = 0;
  let runNumber = 0;
  const engine = new EvaluationEngine({
    store,
    adapters,
    settings: opts.settings ?? settings,
    now: () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)),
    newId: () => `run-${++runNumber}`,
  });
  return { store, engine };
}

describe('createRun', () => {
  it('freezes thresholds over the system type defaults', async () => {
    const { engine } = await setup();
    const run = await engine.createRun('capitals', {
      adapterId: 'replay',
      thresholds: { faithfulness: 0.9 },
    });
    expect(run.id).toBe('run-1');
    expect(run.status).toBe('pending');
    expect(run.gateThresholdSnapshot).toEqual({
      faithfulness: 0.9,
      answer_relevancy: 0.7,
      context_precision: 0.6,
      context_recall: 0.6,
      pass_rate: 0.8,
    });
    expect(Object.isFrozen(run.gateThresholdSnapshot)).toBe(true);
    expect(run.pipelineConfig).toEqual({
      adapterId: 'replay',
      adapterOptions: {},
      metrics: ['faithfulness', 'answer_relevancy', 'context_precision', 'context_recall', 'rule_evaluation'],
      metricFamily: null,
      timeoutMs: 1000,
    });
  });

  it('uses the pass rate alone for non-RAG test sets', async () => {
    const { engine } = await setup();
    const run = await engine.createRun('inbox', { adapterId: 'replay', timeoutMs: 50 });
    expect(run.gateThresholdSnapshot).toEqual({ pass_rate: 0.8 });
    expect(run.pipelineConfig.timeoutMs).toBe(50);
    expect(run.pipelineConfig.metrics).toEqual([
      'precision',
      'recall',
      'f1',
      'accuracy',
      'macro_f1',
      'micro_f1',
      'weighted_f1',
      'cohens_kappa',
      'auc_roc',
      'pr_auc',
      'rule_evaluation',
    ]);
  });

  it('rejects unknown adapters, test sets and mismatched families', async () => {
    const { engine } = await setup();
    await expect(engine.createRun('inbox', { adapterId: 'http' })).rejects.toThrow(
      UnregisteredAdapterError,
    );
    await expect(engine.createRun('inbox', { adapterId: 'http' })).rejects.toThrow(
      "Unregistered adapter 'http'. Registered adapters: replay",
    );
    await expect(engine.createRun('missing', { adapterId: 'replay' })).rejects.toThrow(
      TestSetNotFoundError,
    );
    await expect(
      engine.createRun('inbox', {
        adapterId: 'replay',
        metricFamily: { name: 'RankingMetrics', arguments: null },
      }),
    ).rejects.toThrow("Metric family 'RankingMetrics' cannot score 'classification' test sets");
    await expect(
      engine.createRun('inbox', { adapterId: 'replay', systemType: 'rag' }),
    ).rejects.toThrow("Config is for 'rag' test sets but test set 'inbox' is 'classification'");
  });
});

describe('executeRun', () => {
  it('completes a run whose cases all pass', async () => {
    const { engine, store } = await setup();
    const created = await engine.createRun('inbox', { adapterId: 'replay' });
    const { run, decision } = await engine.executeRun(created.id);

    expect(run.status).toBe('completed');
    expect(run.overallPassed).toBe(true);
    expect(run.startedAt).toEqual(new Date(Date.UTC(2026, 0, 1, 0, 0, 1)));
    expect(run.completedAt).toEqual(new Date(Date.UTC(2026, 0, 1, 0, 0, 2)));
    expect(decision).toEqual({ passed: true, metricFailures: [], ruleFailures: [] });
    expect(run.summaryMetrics).toMatchObject({
      totalCases: 2,
      passedCases: 2,
      failedCases: 0,
      passRate: 1,
    });
    expect(run.summaryMetrics?.averages.avg_accuracy).toBe(1);
    expect(await store.getRun(created.id)).toEqual(run);

    const results = await store.listResults(created.id);
    expect(results.map((r) => r.testCaseId)).toEqual(['case-1', 'case-2']);
    expect(results[0]?.rulesPassed).toBe(true);
    expect(results[1]?.rulesPassed).toBeNull();
    expect(results[0]?.pipelineAttributes).toEqual({ replay_source: 'reference' });
  });

  it('blocks the gate when the pass rate falls short', async () => {
    const { engine } = await setup();
    const created = await engine.createRun('inbox', {
      adapterId: 'replay',
      adapterOptions: { answers: { 'case-2': 'ham' } },
    });
    const { run, decision } = await engine.executeRun(created.id);

    expect(run.status).toBe('gate_blocked');
    expect(run.overallPassed).toBe(false);
    expect(run.summaryMetrics?.passRate).toBe(0.5);
    expect(decision?.ruleFailures).toEqual([]);
    expect(decision?.metricFailures).toHaveLength(1);
    expect(decision?.metricFailures[0]).toMatchObject({ metric: 'pass_rate', actual: 0.5, threshold: 0.8 });
    expect(decision?.metricFailures[0]?.delta).toBeCloseTo(-0.3, 10);
    expect(await engine.evaluateGate(created.id)).toEqual(decision);
  });

  it('records the failing case reason', async () => {
    const { engine, store } = await setup();
    const created = await engine.createRun('inbox', {
      adapterId: 'replay',
      adapterOptions: { answers: { 'case-2': 'ham' } },
    });
    await engine.executeRun(created.id);
    const results = await store.listResults(created.id);
    expect(results[1]).toMatchObject({
      testCaseId: 'case-2',
      passed: false,
      failureReason: 'Composite score 0.000 below 0.5',
      rawOutput: 'ham',
      pipelineAttributes: { replay_source: 'recorded' },
    });
  });

  it('refuses to execute a run twice', async () => {
    const { engine } = await setup();
    const created = await engine.createRun('inbox', { adapterId: 'replay' });
    await engine.executeRun(created.id);
    await expect(engine.executeRun(created.id)).rejects.toThrow(InvalidRunTransitionError);
    await expect(engine.executeRun('run-404')).rejects.toThrow(RunNotFoundError);
  });

  it('ends FAILED when the adapter cannot be built', async () => {
    const logs = recordLogs();
    const adapters = createDefaultAdapterRegistry().register('broken', () => {
      throw new Error('no endpoint configured');
    });
    const { engine } = await setup(adapters);
    const created = await engine.createRun('inbox', { adapterId: 'broken' });
    const { run, decision } = await engine.executeRun(created.id);

    expect(decision).toBeNull();
    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe('no endpoint configured');
    expect(run.completedAt).not.toBeNull();
    expect(logs.find((e) => e.message === 'Evaluation run failed')).toMatchObject({
      severity: 'error',
      runId: created.id,
    });
  });

  it('closes the adapter after the run', async () => {
    const close = vi.fn();
    const adapters = createDefaultAdapterRegistry().register('closing', () => ({
      run: async () => ({ answer: 'spam', retrievedContexts: [], toolCalls: [], metadata: {} }),
      close,
    }));
    const { engine } = await setup(adapters);
    const created = await engine.createRun('inbox', { adapterId: 'closing' });
    await engine.executeRun(created.id);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('passes the session TTL from settings to adapter factories', async () => {
    const factory = vi.fn(() => ({
      run: async () => ({ answer: 'spam', retrievedContexts: [], toolCalls: [], metadata: {} }),
    }));
    const { engine } = await setup(createDefaultAdapterRegistry().register('env', factory));
    const created = await engine.createRun('inbox', { adapterId: 'env', adapterOptions: { a: 1 } });
    await engine.executeRun(created.id);
    expect(factory).toHaveBeenCalledWith({ a: 1 }, { sessionTtlMs: 60_000 });
  });
});

describe('cancellation', () => {
  it('stops before the next case once the run is cancelled', async () => {
    let engine: EvaluationEngine | null = null;
    const adapters = createDefaultAdapterRegistry().register('cancelling', () => ({
      run: async (_query, context) => {
        await engine?.cancelRun(context.runId);
        return { answer: 'spam', retrievedContexts: [], toolCalls: [], metadata: {} };
      },
    }));
    const built = await setup(adapters);
    engine = built.engine;
    const created = await built.engine.createRun('inbox', { adapterId: 'cancelling' });
    const { run, decision } = await built.engine.executeRun(created.id);

    expect(decision).toBeNull();
    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe(CANCELLED_MESSAGE);
    expect(run.summaryMetrics).toBeNull();
    const results = await built.store.listResults(created.id);
    expect(results.map((r) => r.testCaseId)).toEqual(['case-1']);
  });

  it('honours an aborted signal', async () => {
    const { engine, store } = await setup();
    const created = await engine.createRun('inbox', { adapterId: 'replay' });
    const controller = new AbortController();
    controller.abort();
    const { run } = await engine.executeRun(created.id, { signal: controller.signal });

    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe('Run cancelled');
    expect(await store.listResults(created.id)).toEqual([]);
  });

  it('cancels a pending run and refuses a finished one', async () => {
    const { engine } = await setup();
    const pending = await engine.createRun('inbox', { adapterId: 'replay' });
    const cancelled = await engine.cancelRun(pending.id);
    expect(cancelled.status).toBe('failed');
    expect(cancelled.completedAt).not.toBeNull();

    const finished = await engine.createRun('inbox', { adapterId: 'replay' });
    await engine.executeRun(finished.id);
    await expect(engine.cancelRun(finished.id)).rejects.toThrow(
      "Cannot transition run from 'completed' to 'failed'",
    );
  });
});

describe('concurrent writers', () => {
  class HookedStore extends InMemoryEvaluationStore {
    beforeListResults: (() => Promise<unknown>) | null = null;
    staleRun: EvaluationRun | null = null;
    failingCaseId: string | null = null;

    override async listResults(runId: string): Promise<EvaluationResult[]> {
      const hook = this.beforeListResults;
      this.beforeListResults = null;
      if (hook) await hook();
      return super.listResults(runId);
    }

    override async getRun(runId: string): Promise<EvaluationRun> {
      const stale = this.staleRun;
      this.staleRun = null;
      return stale ?? super.getRun(runId);
    }

    override async upsertResult(result: EvaluationResult): Promise<void> {
      if (result.testCaseId === this.failingCaseId) throw new Error('disk full');
      return super.upsertResult(result);
    }
  }

  it('keeps a cancellation that lands while the run is finishing', async () => {
    const store = new HookedStore();
    const { engine } = await setup(undefined, { store });
    const created = await engine.createRun('inbox', { adapterId: 'replay' });
    store.beforeListResults = () => engine.cancelRun(created.id);

    const { run, decision } = await engine.executeRun(created.id);
    expect(decision).toBeNull();
    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe(CANCELLED_MESSAGE);
    expect(run.summaryMetrics).toBeNull();
    expect(await store.getRun(created.id)).toEqual(run);
  });

  it('refuses a cancellation that lands after the run finished', async () => {
    const store = new HookedStore();
    const { engine } = await setup(undefined, { store });
    const created = await engine.createRun('inbox', { adapterId: 'replay' });
    const { run } = await engine.executeRun(created.id);
    store.staleRun = { ...run, status: 'running', completedAt: null };

    await expect(engine.cancelRun(created.id)).rejects.toThrow(
      "Cannot transition run from 'completed' to 'failed'",
    );
    expect(await store.getRun(created.id)).toEqual(run);
  });

  it('lets running cases settle before failing the run', async () => {
    recordLogs();
    const events: string[] = [];
    const adapters = createDefaultAdapterRegistry().register('slow', () => ({
      run: async (_query, context) => {
        events.push(`run ${context.testCaseId}`);
        if (context.testCaseId === 'c2') await new Promise((r) => setTimeout(r, 20));
        events.push(`done ${context.testCaseId}`);
        return { answer: 'spam', retrievedContexts: [], toolCalls: [], metadata: {} };
      },
      close: () => {
        events.push('close');
      },
    }));
    const store = new HookedStore();
    store.failingCaseId = 'c1';
    const { engine } = await setup(adapters, { store, settings: { ...settings, maxConcurrency: 2 } });
    await store.saveTestSet({
      id: 'batch',
      name: 'Batch',
      systemType: 'classification',
      cases: ['c1', 'c2', 'c3'].map((id) => spamCase(id, { testSetId: 'batch' })),
    });
    const created = await engine.createRun('batch', { adapterId: 'slow' });
    const { run } = await engine.executeRun(created.id);

    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe('disk full');
    expect(events).not.toContain('run c3');
    expect(events.indexOf('done c2')).toBeGreaterThan(-1);
    expect(events.indexOf('done c2')).toBeLessThan(events.indexOf('close'));
    expect(events.at(-1)).toBe('close');
    expect((await store.listResults(created.id)).map((r) => r.testCaseId)).toEqual(['c2']);
  });
});

describe('computeRegressionDiff', () => {
  it('compares against the latest passing run', async () => {
    const { engine } = await setup();
    const baseline = await engine.createRun('inbox', { adapterId: 'replay' });
    await engine.executeRun(baseline.id);
    const current = await engine.createRun('inbox', {
      adapterId: 'replay',
      adapterOptions: { answers: { 'case-2': 'ham' } },
    });
    await engine.executeRun(current.id);

    const diff = await engine.computeRegressionDiff(current.id);
    expect(diff.baselineRunId).toBe(baseline.id);
    expect(diff.gateBlocked).toBe(true);
    expect(diff.improvements).toEqual([]);
    expect(diff.regressions.map((r) => r.testCaseId)).toEqual(['case-2']);
    expect(diff.regressions[0]?.currentScores).toMatchObject({ accuracy: 0 });
    expect(diff.regressions[0]?.baselineScores).toMatchObject({ accuracy: 1 });
    expect(diff.metricDeltas.pass_rate).toBe(-0.5);
    expect(diff.metricDeltas.avg_accuracy).toBe(-0.5);
  });

  it('reports no baseline for the first run', async () => {
    const { engine } = await setup();
    const created = await engine.createRun('inbox', { adapterId: 'replay' });
    await engine.executeRun(created.id);
    expect(await engine.computeRegressionDiff(created.id)).toEqual({
      baselineRunId: null,
      regressions: [],
      improvements: [],
      metricDeltas: {},
      gateBlocked: false,
    });
  });
});
