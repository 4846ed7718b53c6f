/**
 * Process settings from the environment and gate configuration files.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_SESSION_TTL_MS } from './adapters/chat-session.js';
import { Logger, type Severity } from './logger.js';
import { OpenAIEmbeddingProvider } from './metrics/providers.js';
import { RAG_METRIC_NAMES } from './metrics/rag.js';
import { deserializeMetricFamilySpec } from './metrics/registry.js';
import { DEFAULT_PIPELINE_TIMEOUT_MS, RULE_EVALUATION } from './scoring/case-scorer.js';
import { resolveSystemFamily } from './scoring/dispatch.js';
import { type FileFormat, inferFormat, parseDocument } from './serialization/format.js';
import type { GateThresholds, MetricFamilySpec, SystemType } from './types.js';
import { SYSTEM_TYPES } from './types.js';

// -- Environment --

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsSchema = z.object({
  EVALGATE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  EVALGATE_PIPELINE_TIMEOUT_MS: positiveInt(DEFAULT_PIPELINE_TIMEOUT_MS),
  EVALGATE_MAX_CONCURRENCY: positiveInt(1),
  EVALGATE_SESSION_TTL_MS: positiveInt(DEFAULT_SESSION_TTL_MS),
  EVALGATE_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
});

export interface Settings {
  logLevel: Severity;
  pipelineTimeoutMs: number;
  maxConcurrency: number;
  sessionTtlMs: number;
  embeddingModel: string;
}

/**
 * Settings from `EVALGATE_*` variables. Empty variables count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('EVALGATE_') && value !== ''),
  );
  const parsed = settingsSchema.parse(present);
  return {
    logLevel: parsed.EVALGATE_LOG_LEVEL,
    pipelineTimeoutMs: parsed.EVALGATE_PIPELINE_TIMEOUT_MS,
    maxConcurrency: parsed.EVALGATE_MAX_CONCURRENCY,
    sessionTtlMs: parsed.EVALGATE_SESSION_TTL_MS,
    embeddingModel: parsed.EVALGATE_EMBEDDING_MODEL,
  };
}

export function loggerFromSettings(settings: Settings): Logger {
  return new Logger({ minSeverity: settings.logLevel });
}

/**
 * Embedding provider for the configured model. The `openai` package is only
 * loaded when the first embedding is requested.
 */
export function embeddingProviderFromSettings(settings: Settings): OpenAIEmbeddingProvider {
  return new OpenAIEmbeddingProvider({ model: settings.embeddingModel });
}

// -- Defaults per system type --

const PASS_RATE_THRESHOLD = 0.8;

const RAG_THRESHOLDS: GateThresholds = {
  faithfulness: 0.7,
  answer_relevancy: 0.7,
  context_precision: 0.6,
  context_recall: 0.6,
  pass_rate: PASS_RATE_THRESHOLD,
};

/**
 * Gate thresholds applied when a config names none. RAG-scored types get
 * the four core thresholds; every type gets `pass_rate`.
 */
export function defaultThresholds(systemType: SystemType): GateThresholds {
  if (systemType === 'rag' || systemType === 'custom') return { ...RAG_THRESHOLDS };
  return { pass_rate: PASS_RATE_THRESHOLD };
}

export const DEFAULT_METRICS: Readonly<Partial<Record<SystemType, readonly string[]>>> = {
  rag: [...RAG_METRIC_NAMES, RULE_EVALUATION],
  agent: ['tool_call_f1', 'tool_call_accuracy', 'goal_accuracy', 'step_efficiency', RULE_EVALUATION],
  chatbot: ['coherence', 'knowledge_retention', 'role_adherence', 'response_relevance', RULE_EVALUATION],
  search: ['ndcg_at_k', 'map_at_k', 'mrr', 'precision_at_k', 'recall_at_k', RULE_EVALUATION],
};

/**
 * Requested metrics when a config names none: the table above, or the
 * outputs of the type's metric family plus `rule_evaluation`.
 */
export function defaultMetrics(systemType: SystemType): string[] {
  const listed = DEFAULT_METRICS[systemType];
  if (listed) return [...listed];
  const { family } = resolveSystemFamily(systemType);
  return [...Object.keys(family.zeroMetrics()), RULE_EVALUATION];
}

// -- Gate config files --

const gateConfigFileSchema = z
  .object({
    adapter: z
      .object({
        id: z.string().min(1),
        options: z.record(z.string(), z.unknown()).optional().default({}),
      })
      .strict(),
    system_type: z.enum(SYSTEM_TYPES).optional(),
    thresholds: z.record(z.string(), z.number()).optional(),
    metrics: z.array(z.string()).optional(),
    metric_family: z.unknown().optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

/**
 * A parsed gate config. Absent fields fall back to settings and per-type
 * defaults when a run is created.
 */
export interface GateConfig {
  adapterId: string;
  adapterOptions: Record<string, unknown>;
  systemType: SystemType | null;
  thresholds: GateThresholds | null;
  metrics: string[] | null;
  metricFamily: MetricFamilySpec | null;
  timeoutMs: number | null;
}

export function loadGateConfigFromFile(path: string, opts?: { fmt?: FileFormat }): GateConfig {
  const fmt = opts?.fmt ?? inferFormat(path);
  return loadGateConfigFromText(readFileSync(path, 'utf-8'), fmt);
}

export function loadGateConfigFromText(content: string, fmt: FileFormat = 'yaml'): GateConfig {
  return loadGateConfigFromObject(parseDocument(content, fmt));
}

export function loadGateConfigFromObject(data: unknown): GateConfig {
  const parsed = gateConfigFileSchema.parse(data);
  return {
    adapterId: parsed.adapter.id,
    adapterOptions: parsed.adapter.options,
    systemType: parsed.system_type ?? null,
    thresholds: parsed.thresholds ?? null,
    metrics: parsed.metrics ?? null,
    metricFamily:
      parsed.metric_family === undefined || parsed.metric_family === null
        ? null
        : deserializeMetricFamilySpec(parsed.metric_family),
    timeoutMs: parsed.timeout_ms ?? null,
  };
}
