/**
 * Scores one test case of one run.
 *
 * The pipeline is called inside a case scope with a timeout. When it fails,
 * the case's stored text stands in for the answer so the metrics still run,
 * and the failure is recorded as the case's failure reason. Metric and rule
 * errors are recorded the same way; none of them abort the run.
 */

import { randomUUID } from 'node:crypto';
import { type PipelineAdapter, type PipelineOutput, parsePipelineOutput } from '../adapters/types.js';
import { withCaseRun } from '../context.js';
import { MetricComputationError, PipelineError, toError } from '../errors.js';
import { getLogger } from '../logger.js';
import { RAG_METRIC_NAMES, type RagScores } from '../metrics/rag.js';
import { SafetyMetrics } from '../metrics/safety.js';
import { RuleEngine, type RulesOutcome } from '../rules/rule-engine.js';
import type { EvaluationResult, MetricMap, SystemType, TestCase } from '../types.js';
import { decideCase } from './composite.js';
import {
  type FamilyScores,
  type MetricProviders,
  normalizeToolCalls,
  resolveSystemFamily,
  scoreWithFamily,
  type SystemFamily,
} from './dispatch.js';

export const DEFAULT_PIPELINE_TIMEOUT_MS = 30_000;

export const RULE_EVALUATION = 'rule_evaluation';
export const SAFETY = 'safety';

export interface CaseScorerOptions {
  systemType: SystemType;
  /** Requested metric names, e.g. `faithfulness` or `rule_evaluation`. */
  metrics: readonly string[];
  /** Null scores the stored text without calling a pipeline. */
  adapter: PipelineAdapter | null;
  /** Defaults to the system type's family. */
  family?: SystemFamily;
  timeoutMs?: number;
  ruleEngine?: RuleEngine;
  safety?: SafetyMetrics;
  providers?: MetricProviders;
}

interface PipelineCall {
  output: PipelineOutput;
  error: string | null;
  latencyMs: number | null;
  attributes: Record<string, unknown>;
  metrics: Record<string, number>;
}

const NO_CORE_SCORES: RagScores = {
  faithfulness: null,
  answer_relevancy: null,
  context_precision: null,
  context_recall: null,
};

/**
 * The case's stored text as a stand-in answer.
 */
export function storedOutput(testCase: TestCase): PipelineOutput {
  return {
    answer: testCase.expectedOutput ?? testCase.groundTruth ?? '',
    retrievedContexts: [...(testCase.context ?? [])],
    toolCalls: [],
    metadata: {},
  };
}

export class CaseScorer {
  readonly systemType: SystemType;
  readonly metrics: readonly string[];
  readonly timeoutMs: number;
  private readonly adapter: PipelineAdapter | null;
  private readonly family: SystemFamily;
  private readonly ruleEngine: RuleEngine;
  private readonly safety: SafetyMetrics;
  private readonly providers: MetricProviders;

  constructor(opts: CaseScorerOptions) {
    this.systemType = opts.systemType;
    this.metrics = opts.metrics;
    this.adapter = opts.adapter;
    this.family = opts.family ?? resolveSystemFamily(opts.systemType);
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_PIPELINE_TIMEOUT_MS;
    this.ruleEngine = opts.ruleEngine ?? new RuleEngine();
    this.safety = opts.safety ?? new SafetyMetrics();
    this.providers = opts.providers ?? {};
  }

  async score(testCase: TestCase, runId: string): Promise<EvaluationResult> {
    const t0 = performance.now();
    const logger = getLogger().child({ runId, testCaseId: testCase.id });

    const call = await this.callPipeline(testCase, runId);
    let failureReason: string | null = call.error === null ? null : `Pipeline error: ${call.error}`;
    if (call.error !== null) {
      logger.warn('Pipeline call failed, scoring stored text instead', { error: call.error });
    }
    const { output } = call;
    const toolCalls = normalizeToolCalls(output);

    // Metric family
    let core: RagScores = NO_CORE_SCORES;
    let extended: MetricMap | null = null;
    try {
      const scores = await this.scoreFamily(testCase, output);
      if (scores.kind === 'core') {
        core = scores.scores;
      } else {
        extended = scores.metrics;
      }
    } catch (e) {
      const error = new MetricComputationError(
        this.family.family.getSerializationName(),
        toError(e).message,
        { cause: e },
      );
      logger.error('Metric computation failed', error, { family: error.family });
      failureReason ??= `Metric computation error: ${error.message}`;
    }

    if (this.metrics.includes(SAFETY)) {
      try {
        extended = { ...extended, ...this.safety.evaluate(output.answer) };
      } catch (e) {
        logger.error('Metric computation failed', e, { family: this.safety.getSerializationName() });
        failureReason ??= `Metric computation error: ${toError(e).message}`;
      }
    }

    // Rules
    let rules: RulesOutcome | null = null;
    if (this.metrics.includes(RULE_EVALUATION) && testCase.failureRules.length > 0) {
      try {
        rules = this.ruleEngine.evaluate(testCase.failureRules, {
          output: output.answer,
          toolCalls,
          faithfulness: core.faithfulness,
          latencyMs: call.latencyMs,
        });
      } catch (e) {
        logger.error('Rule evaluation failed', e);
        failureReason ??= `Rule evaluation failed: ${toError(e).message}`;
      }
    }

    const coreFields = {
      faithfulness: core.faithfulness,
      answerRelevancy: core.answer_relevancy,
      contextPrecision: core.context_precision,
      contextRecall: core.context_recall,
    };
    const rulesPassed = rules?.rulesPassed ?? null;
    const verdict = decideCase(
      coreFields,
      extended,
      rulesPassed,
      (rules?.details ?? []).filter((d) => !d.passed).map((d) => d.reason),
    );
    failureReason ??= verdict.reason;

    return {
      id: randomUUID(),
      runId,
      testCaseId: testCase.id,
      query: testCase.query,
      ...coreFields,
      extendedMetrics: extended,
      rulesPassed,
      rulesDetail: rules?.details ?? [],
      passed: verdict.passed,
      failureReason,
      rawOutput: output.answer,
      rawContexts: output.retrievedContexts,
      toolCalls,
      pipelineMetrics: call.metrics,
      pipelineAttributes: call.attributes,
      durationMs: Math.round(performance.now() - t0),
    };
  }

  private async scoreFamily(
    testCase: TestCase,
    output: PipelineOutput,
  ): Promise<FamilyScores> {
    const scores = await scoreWithFamily(this.family, testCase, output, this.providers);
    if (scores.kind === 'extended') {
      return scores;
    }
    // core scores are only kept when requested
    const requested: RagScores = { ...NO_CORE_SCORES };
    for (const name of RAG_METRIC_NAMES) {
      if (this.metrics.includes(name)) {
        requested[name] = scores.scores[name];
      }
    }
    return { kind: 'core', scores: requested };
  }

  private async callPipeline(testCase: TestCase, runId: string): Promise<PipelineCall> {
    const adapter = this.adapter;
    if (adapter === null) {
      return {
        output: storedOutput(testCase),
        error: null,
        latencyMs: null,
        attributes: {},
        metrics: {},
      };
    }
    const started = performance.now();
    const { outcome, attributes, metrics } = await withCaseRun(
      { runId, testCaseId: testCase.id },
      () =>
        callWithTimeout(
          async (signal) =>
            parsePipelineOutput(
              await adapter.run(testCase.query, {
                runId,
                testCaseId: testCase.id,
                contexts: testCase.context ?? [],
                conversationTurns: testCase.conversationTurns ?? [],
                reference: testCase.expectedOutput ?? testCase.groundTruth ?? null,
                signal,
              }),
            ),
          this.timeoutMs,
        ),
    );
    const latencyMs = performance.now() - started;
    if (outcome.ok) {
      return { output: outcome.value, error: null, latencyMs, attributes, metrics };
    }
    return {
      output: storedOutput(testCase),
      error: toError(outcome.error).message,
      latencyMs,
      attributes,
      metrics,
    };
  }
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`. Rejects with a
 * PipelineError on timeout or when `fn` rejects.
 */
export async function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new PipelineError(`Pipeline call timed out after ${timeoutMs}ms`, { timedOut: true }));
      controller.abort();
    }, timeoutMs);
  });
  const pending = Promise.resolve().then(() => fn(controller.signal));
  // a call that loses the race may still reject later
  pending.catch((e: unknown) => {
    if (controller.signal.aborted) {
      getLogger().debug('Pipeline call failed after timeout', { error: toError(e).message });
    }
  });
  try {
    return await Promise.race([pending, timeout]);
  } catch (e) {
    if (e instanceof PipelineError) throw e;
    throw new PipelineError(toError(e).message, { cause: e });
  } finally {
    clearTimeout(timer);
  }
}
