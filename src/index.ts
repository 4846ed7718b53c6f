/**
 * evalgate: quality gates for AI pipelines.
 *
 * @example
 * ```ts
 * import {
 *   EvaluationEngine,
 *   InMemoryEvaluationStore,
 *   loadTestSetFromFile,
 *   renderGateDecision,
 * } from 'evalgate';
 *
 * const store = new InMemoryEvaluationStore();
 * const testSet = loadTestSetFromFile('capitals.yaml');
 * await store.saveTestSet(testSet);
 *
 * const engine = new EvaluationEngine({ store });
 * const run = await engine.createRun(testSet.id, { adapterId: 'replay' });
 * const { decision } = await engine.executeRun(run.id);
 * if (decision) console.log(renderGateDecision(decision));
 * ```
 */

export * from './adapters/index.js';
export type { GateConfig, Settings } from './config.js';
export {
  DEFAULT_METRICS,
  defaultMetrics,
  defaultThresholds,
  embeddingProviderFromSettings,
  loadGateConfigFromFile,
  loadGateConfigFromObject,
  loadGateConfigFromText,
  loadSettings,
  loggerFromSettings,
} from './config.js';
export type { CaseIdentity } from './context.js';
export { currentCase, incrementCaseMetric, setCaseAttribute } from './context.js';
export type { EvaluationEngineOptions, ExecuteRunOptions, RunConfig, RunOutcome } from './engine.js';
export { CANCELLED_MESSAGE, EvaluationEngine } from './engine.js';
export {
  CustomRuleExtensionError,
  InvalidRunTransitionError,
  MetricComputationError,
  PipelineError,
  RunNotFoundError,
  TestSetNotFoundError,
  toError,
  UnregisteredAdapterError,
} from './errors.js';
export * from './gate/index.js';
export type { LogEntry, LoggerConfig, LogSink, Severity } from './logger.js';
export { consoleSink, getLogger, Logger, setLogger } from './logger.js';
export * from './metrics/index.js';
export * from './reporting/index.js';
export * from './rules/index.js';
export * from './scoring/index.js';
export * from './serialization/index.js';
export type { EvaluationStore } from './store.js';
export { InMemoryEvaluationStore } from './store.js';
export * from './types.js';
