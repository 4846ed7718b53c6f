/**
 * EvaluationEngine: creates runs, scores their cases, and decides gates.
 *
 * A run moves PENDING → RUNNING → COMPLETED | GATE_BLOCKED, or to FAILED
 * when it is cancelled or something outside a single case breaks. Cases are
 * scored through `p-limit`; one at a time unless settings raise the limit.
 */

import { randomUUID } from 'node:crypto';
import { type Span, SpanStatusCode, trace } from '@opentelemetry/api';
import pLimit from 'p-limit';
import { createDefaultAdapterRegistry } from './adapters/index.js';
import type { AdapterRegistry } from './adapters/registry.js';
import type { PipelineAdapter } from './adapters/types.js';
import { defaultMetrics, defaultThresholds, loadSettings, type Settings } from './config.js';
import { InvalidRunTransitionError, toError, UnregisteredAdapterError } from './errors.js';
import { aggregateRun } from './gate/aggregator.js';
import { decideGate } from './gate/gate-decider.js';
import { diffRuns, selectBaseline } from './gate/regression-differ.js';
import { isTerminal, transition } from './gate/run-state.js';
import { getLogger } from './logger.js';
import type { MetricFamilyRegistryEntry } from './metrics/registry.js';
import type { RuleEngine } from './rules/rule-engine.js';
import { CaseScorer } from './scoring/case-scorer.js';
import { type MetricProviders, resolveSystemFamily } from './scoring/dispatch.js';
import type { EvaluationStore } from './store.js';
import type {
  EvaluationResult,
  EvaluationRun,
  GateDecision,
  GateThresholds,
  MetricFamilySpec,
  RegressionDiff,
  RunStatus,
  SystemType,
  TestCase,
} from './types.js';

const tracer = trace.getTracer('evalgate');

export interface EvaluationEngineOptions {
  store: EvaluationStore;
  /** Defaults to the built-in adapters. */
  adapters?: AdapterRegistry;
  /** Defaults to `loadSettings()`. */
  settings?: Settings;
  ruleEngine?: RuleEngine;
  providers?: MetricProviders;
  metricFamilies?: Map<string, MetricFamilyRegistryEntry>;
  now?: () => Date;
  newId?: () => string;
}

/**
 * What a run is created from. Absent fields fall back to settings and the
 * test set's per-type defaults.
 */
export interface RunConfig {
  adapterId: string;
  adapterOptions?: Record<string, unknown>;
  /** When set, must match the test set's system type. */
  systemType?: SystemType | null;
  /** Merged over the default thresholds. */
  thresholds?: GateThresholds | null;
  metrics?: string[] | null;
  metricFamily?: MetricFamilySpec | null;
  timeoutMs?: number | null;
}

export interface ExecuteRunOptions {
  /** Checked before each case, like the stored status. */
  signal?: AbortSignal;
}

export interface RunOutcome {
  run: EvaluationRun;
  /** Null when the run ended FAILED. */
  decision: GateDecision | null;
}

export const CANCELLED_MESSAGE = 'Run cancelled';

export class EvaluationEngine {
  private readonly store: EvaluationStore;
  private readonly adapters: AdapterRegistry;
  private readonly settings: Settings;
  private readonly ruleEngine: RuleEngine | undefined;
  private readonly providers: MetricProviders;
  private readonly metricFamilies: Map<string, MetricFamilyRegistryEntry> | undefined;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(opts: EvaluationEngineOptions) {
    this.store = opts.store;
    this.adapters = opts.adapters ?? createDefaultAdapterRegistry();
    this.settings = opts.settings ?? loadSettings();
    this.ruleEngine = opts.ruleEngine;
    this.providers = opts.providers ?? {};
    this.metricFamilies = opts.metricFamilies;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  /**
   * A PENDING run with its gate thresholds frozen. Fails fast on an unknown
   * adapter or a metric family that cannot score the test set.
   */
  async createRun(testSetId: string, config: RunConfig): Promise<EvaluationRun> {
    const testSet = await this.store.getTestSet(testSetId);
    const { systemType } = testSet;
    if (config.systemType && config.systemType !== systemType) {
      throw new Error(
        `Config is for '${config.systemType}' test sets but test set '${testSetId}' is '${systemType}'`,
      );
    }
    if (!this.adapters.has(config.adapterId)) {
      throw new UnregisteredAdapterError(config.adapterId, this.adapters.ids());
    }
    const metricFamily = config.metricFamily ?? null;
    resolveSystemFamily(systemType, metricFamily, this.metricFamilies);

    const run: EvaluationRun = {
      id: this.newId(),
      testSetId,
      status: 'pending',
      gateThresholdSnapshot: Object.freeze({
        ...defaultThresholds(systemType),
        ...config.thresholds,
      }),
      summaryMetrics: null,
      pipelineConfig: {
        adapterId: config.adapterId,
        adapterOptions: { ...config.adapterOptions },
        metrics: config.metrics ? [...config.metrics] : defaultMetrics(systemType),
        metricFamily,
        timeoutMs: config.timeoutMs ?? this.settings.pipelineTimeoutMs,
      },
      overallPassed: null,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      errorMessage: null,
    };
    await this.store.saveRun(run);
    getLogger().info('Created evaluation run', { runId: run.id, testSetId, systemType });
    return run;
  }

  /**
   * Score every case of a PENDING run and decide its gate. Failures after
   * the run has started end it FAILED rather than rejecting.
   */
  async executeRun(runId: string, opts?: ExecuteRunOptions): Promise<RunOutcome> {
    return tracer.startActiveSpan('evalgate.run', async (span) => {
      span.setAttribute('evalgate.run_id', runId);
      try {
        const outcome = await this.execute(runId, opts?.signal);
        span.setAttribute('evalgate.status', outcome.run.status);
        return outcome;
      } catch (e) {
        recordFailure(span, e);
        throw e;
      } finally {
        span.end();
      }
    });
  }

  /**
   * PENDING or RUNNING → FAILED. A running execution stops before its next
   * case. Rejects with InvalidRunTransitionError once the run has finished,
   * including when it finishes while the cancellation is being saved.
   */
  async cancelRun(runId: string): Promise<EvaluationRun> {
    const run = await this.store.getRun(runId);
    const cancelled = await this.moveTo({ ...run, errorMessage: CANCELLED_MESSAGE }, 'failed');
    getLogger().info('Cancelled evaluation run', { runId });
    return cancelled;
  }

  /**
   * The gate decision of a stored run, recomputed from its results.
   */
  async evaluateGate(runId: string): Promise<GateDecision> {
    const run = await this.store.getRun(runId);
    const results = await this.store.listResults(runId);
    return decideGate(run.gateThresholdSnapshot, run.summaryMetrics ?? aggregateRun(results), results);
  }

  /**
   * Compare a run with the latest passing run of the same test set.
   */
  async computeRegressionDiff(runId: string): Promise<RegressionDiff> {
    const run = await this.store.getRun(runId);
    const baseline = selectBaseline(run, await this.store.listRuns(run.testSetId));
    const [currentResults, baselineResults] = await Promise.all([
      this.store.listResults(runId),
      baseline ? this.store.listResults(baseline.id) : Promise.resolve([]),
    ]);
    return diffRuns(run, currentResults, baseline, baselineResults);
  }

  private async execute(runId: string, signal: AbortSignal | undefined): Promise<RunOutcome> {
    const pending = await this.store.getRun(runId);
    const testSet = await this.store.getTestSet(pending.testSetId);
    const logger = getLogger().child({ runId });
    const running = await this.moveTo(pending, 'running');
    logger.info('Started evaluation run', { cases: testSet.cases.length });

    let adapter: PipelineAdapter | null = null;
    try {
      const config = running.pipelineConfig;
      adapter = this.adapters.create(config.adapterId, config.adapterOptions, {
        sessionTtlMs: this.settings.sessionTtlMs,
      });
      const scorer = new CaseScorer({
        systemType: testSet.systemType,
        metrics: config.metrics,
        adapter,
        family: resolveSystemFamily(testSet.systemType, config.metricFamily, this.metricFamilies),
        timeoutMs: config.timeoutMs,
        ruleEngine: this.ruleEngine,
        providers: this.providers,
      });

      const limit = pLimit(this.settings.maxConcurrency);
      let cancelled = false;
      let broken = false;
      // all cases settle before the run leaves RUNNING and the adapter closes
      const settled = await Promise.allSettled(
        testSet.cases.map((testCase) =>
          limit(async () => {
            if (cancelled || broken) return;
            try {
              if (signal?.aborted || (await this.store.getRun(runId)).status === 'failed') {
                cancelled = true;
                logger.info('Run cancelled, skipping remaining cases', { testCaseId: testCase.id });
                return;
              }
              await this.store.upsertResult(await scoreCase(scorer, testCase, runId));
            } catch (e) {
              broken = true;
              throw e;
            }
          }),
        ),
      );
      const rejection = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
      if (rejection) {
        throw rejection.reason;
      }

      const current = await this.store.getRun(runId);
      if (current.status === 'failed') {
        return { run: current, decision: null };
      }
      if (cancelled) {
        return { run: await this.fail(current, CANCELLED_MESSAGE), decision: null };
      }

      const results = await this.store.listResults(runId);
      const summary = aggregateRun(results);
      const decision = decideGate(current.gateThresholdSnapshot, summary, results);
      const finished = await this.moveTo(
        { ...current, summaryMetrics: summary, overallPassed: decision.passed },
        decision.passed ? 'completed' : 'gate_blocked',
      );
      logger.info('Finished evaluation run', {
        status: finished.status,
        passRate: summary.passRate,
        metricFailures: decision.metricFailures.length,
        ruleFailures: decision.ruleFailures.length,
      });
      return { run: finished, decision };
    } catch (e) {
      const current = await this.store.getRun(runId);
      if (e instanceof InvalidRunTransitionError && isTerminal(current.status)) {
        // cancelled while finishing
        logger.info('Run ended before it could finish', { status: current.status });
        return { run: current, decision: null };
      }
      logger.error('Evaluation run failed', e);
      if (isTerminal(current.status)) return { run: current, decision: null };
      return { run: await this.fail(current, toError(e).message), decision: null };
    } finally {
      await closeAdapter(adapter, runId);
    }
  }

  private async fail(run: EvaluationRun, message: string): Promise<EvaluationRun> {
    return this.moveTo({ ...run, errorMessage: message }, 'failed');
  }

  /**
   * Save `run` in status `to`. When another writer moved the stored run
   * first, the transition is retried from the stored status, so a finished
   * run is never overwritten.
   */
  private async moveTo(run: EvaluationRun, to: RunStatus): Promise<EvaluationRun> {
    let from = run.status;
    for (;;) {
      const next = transition({ ...run, status: from }, to, this.now());
      if (await this.store.saveRunIf(next, from)) {
        getLogger().debug('Run state changed', { runId: run.id, from, to });
        return next;
      }
      from = (await this.store.getRun(run.id)).status;
    }
  }
}

async function scoreCase(
  scorer: CaseScorer,
  testCase: TestCase,
  runId: string,
): Promise<EvaluationResult> {
  return tracer.startActiveSpan('evalgate.case', async (span) => {
    span.setAttributes({ 'evalgate.run_id': runId, 'evalgate.test_case_id': testCase.id });
    try {
      const result = await scorer.score(testCase, runId);
      span.setAttribute('evalgate.passed', result.passed);
      return result;
    } catch (e) {
      recordFailure(span, e);
      throw e;
    } finally {
      span.end();
    }
  });
}

function recordFailure(span: Span, e: unknown): void {
  const error = toError(e);
  span.recordException(error);
  span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
}

async function closeAdapter(adapter: PipelineAdapter | null, runId: string): Promise<void> {
  if (!adapter?.close) return;
  try {
    await adapter.close();
  } catch (e) {
    getLogger().warn('Adapter close failed', { runId, error: toError(e).message });
  }
}
