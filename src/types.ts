/**
 * Core type definitions for the evaluation and release-gate engine.
 */

import type { FailureRule } from './rules/schema.js';

// -- Closed enums with explicit wire tables --

export const SYSTEM_TYPES = [
  'rag',
  'agent',
  'chatbot',
  'code_gen',
  'search',
  'classification',
  'summarization',
  'translation',
  'custom',
] as const;

export type SystemType = (typeof SYSTEM_TYPES)[number];

export const RUN_STATUSES = ['pending', 'running', 'completed', 'gate_blocked', 'failed'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

/**
 * Version of the wire tables below. Bump when a stored string changes;
 * renaming a variant in code must never change its stored string.
 */
export const WIRE_FORMAT_VERSION = 1;

export const SYSTEM_TYPE_WIRE: Readonly<Record<SystemType, string>> = Object.freeze({
  rag: 'rag',
  agent: 'agent',
  chatbot: 'chatbot',
  code_gen: 'code_gen',
  search: 'search',
  classification: 'classification',
  summarization: 'summarization',
  translation: 'translation',
  custom: 'custom',
});

export const RUN_STATUS_WIRE: Readonly<Record<RunStatus, string>> = Object.freeze({
  pending: 'pending',
  running: 'running',
  completed: 'completed',
  gate_blocked: 'gate_blocked',
  failed: 'failed',
});

function invertTable<T extends string>(
  variants: readonly T[],
  table: Readonly<Record<T, string>>,
): Map<string, T> {
  const inverse = new Map<string, T>();
  for (const variant of variants) {
    const wire = table[variant];
    if (inverse.has(wire)) {
      throw new Error(`Duplicate wire value '${wire}'`);
    }
    inverse.set(wire, variant);
  }
  return inverse;
}

const SYSTEM_TYPE_BY_WIRE = invertTable(SYSTEM_TYPES, SYSTEM_TYPE_WIRE);
const RUN_STATUS_BY_WIRE = invertTable(RUN_STATUSES, RUN_STATUS_WIRE);

export function serializeSystemType(value: SystemType): string {
  return SYSTEM_TYPE_WIRE[value];
}

export function parseSystemType(wire: string): SystemType {
  const value = SYSTEM_TYPE_BY_WIRE.get(wire);
  if (value === undefined) {
    throw new Error(
      `Unknown system type '${wire}'. Valid choices: ${[...SYSTEM_TYPE_BY_WIRE.keys()].join(', ')}`,
    );
  }
  return value;
}

export function serializeRunStatus(value: RunStatus): string {
  return RUN_STATUS_WIRE[value];
}

export function parseRunStatus(wire: string): RunStatus {
  const value = RUN_STATUS_BY_WIRE.get(wire);
  if (value === undefined) {
    throw new Error(
      `Unknown run status '${wire}'. Valid choices: ${[...RUN_STATUS_BY_WIRE.keys()].join(', ')}`,
    );
  }
  return value;
}

// -- Pipeline records --

/**
 * A tool call as metrics and rules see it.
 */
export interface ToolCall {
  name: string;
  arguments?: Record<string, unknown>;
}

export type TurnRole = 'user' | 'assistant' | 'system';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

// -- Test cases --

/**
 * System-specific expectation fields. Only the ones relevant to the test
 * set's system type are read.
 */
export interface CaseExpectations {
  expectedToolCalls?: ToolCall[];
  minSteps?: number;
  actualSteps?: number;
  errorsEncountered?: number;
  errorsRecovered?: number;
  knowledgeEntities?: string[];
  requiredKeywords?: string[];
  disallowedKeywords?: string[];
  testResults?: boolean[];
  sourceText?: string;
  /** Binary ground truth for probability-based metrics (AUC-ROC, PR-AUC). */
  positive?: boolean;
  /** Language of the expected code, e.g. `javascript` or `python`. */
  language?: string;
}

export interface TestCase {
  id: string;
  testSetId: string;
  query: string;
  expectedOutput?: string | null;
  groundTruth?: string | null;
  context?: string[] | null;
  failureRules: FailureRule[];
  tags: string[];
  expectedLabels?: string[] | null;
  expectedRanking?: string[] | null;
  conversationTurns?: ConversationTurn[] | null;
  expectations?: CaseExpectations | null;
}

export interface TestSet {
  id: string;
  name: string;
  systemType: SystemType;
  cases: TestCase[];
}

// -- Runs and results --

/**
 * Per-metric minimum acceptable values, keyed by metric name
 * (`faithfulness`, `ndcg_at_k`, ...) or `pass_rate`.
 */
export type GateThresholds = Readonly<Record<string, number>>;

export interface PipelineConfig {
  adapterId: string;
  adapterOptions: Record<string, unknown>;
  metrics: string[];
  metricFamily: MetricFamilySpec | null;
  timeoutMs: number;
}

/**
 * Serializable description of a configured metric family.
 */
export interface MetricFamilySpec {
  name: string;
  arguments: Record<string, unknown> | null;
}

export interface SummaryMetrics {
  totalCases: number;
  passedCases: number;
  failedCases: number;
  passRate: number;
  /** `avg_<metric>` → mean over finite observations, or null when there were none. */
  averages: Record<string, number | null>;
}

export interface EvaluationRun {
  id: string;
  testSetId: string;
  status: RunStatus;
  gateThresholdSnapshot: GateThresholds | null;
  summaryMetrics: SummaryMetrics | null;
  pipelineConfig: PipelineConfig;
  overallPassed: boolean | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  errorMessage: string | null;
}

export interface RuleResult {
  rule: FailureRule;
  passed: boolean;
  reason: string;
}

/**
 * Value recorded in an extended metric map. Numbers take part in the
 * composite score and aggregation; other values are kept for audit only.
 */
export type MetricValue = number | boolean | string | string[] | null;

export type MetricMap = Record<string, MetricValue>;

export interface EvaluationResult {
  id: string;
  runId: string;
  testCaseId: string;
  query: string;
  faithfulness: number | null;
  answerRelevancy: number | null;
  contextPrecision: number | null;
  contextRecall: number | null;
  extendedMetrics: MetricMap | null;
  /** Null when rule evaluation was not requested or the case has no rules. */
  rulesPassed: boolean | null;
  rulesDetail: RuleResult[];
  passed: boolean;
  failureReason: string | null;
  rawOutput: string;
  rawContexts: string[];
  toolCalls: ToolCall[];
  pipelineMetrics: Record<string, number>;
  pipelineAttributes: Record<string, unknown>;
  durationMs: number;
}

// -- Gate and regression outputs --

export interface MetricBreach {
  metric: string;
  actual: number;
  threshold: number;
  delta: number;
}

export interface RuleFailure {
  resultId: string;
  testCaseId: string;
  rulesDetail: RuleResult[];
}

export interface GateDecision {
  passed: boolean;
  metricFailures: MetricBreach[];
  ruleFailures: RuleFailure[];
}

export interface RegressionItem {
  testCaseId: string;
  query: string;
  failureReason: string | null;
  currentScores: Record<string, number>;
  baselineScores: Record<string, number>;
}

export interface RegressionDiff {
  baselineRunId: string | null;
  regressions: RegressionItem[];
  improvements: RegressionItem[];
  metricDeltas: Record<string, number | null>;
  gateBlocked: boolean;
}

/**
 * Narrow an unknown value to a plain string-keyed object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True for numbers that can take part in an average.
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
