export type { CaseScorerOptions } from './case-scorer.js';
export {
  CaseScorer,
  callWithTimeout,
  DEFAULT_PIPELINE_TIMEOUT_MS,
  RULE_EVALUATION,
  SAFETY,
  storedOutput,
} from './case-scorer.js';
export type { CaseVerdict, CoreMetricName } from './composite.js';
export {
  COMPOSITE_THRESHOLD,
  CORE_METRIC_NAMES,
  compositeScore,
  compositeValues,
  coreScores,
  decideCase,
  isCasePassed,
  NON_COMPOSITE_METRICS,
} from './composite.js';
export type { FamilyKind, FamilyScores, MetricProviders, SystemFamily } from './dispatch.js';
export {
  FAMILY_KIND_BY_SYSTEM_TYPE,
  normalizeToolCalls,
  resolveSystemFamily,
  scoreWithFamily,
} from './dispatch.js';
