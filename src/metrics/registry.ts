/**
 * Metric family specs and the registry that turns them back into instances.
 *
 * A spec is written in config files in one of two short forms:
 * - `'RankingMetrics'`: default options
 * - `{ RankingMetrics: { k: 5 } }`: options by name
 */

import { z } from 'zod';
import type { MetricFamilySpec } from '../types.js';
import { isRecord } from '../types.js';
import { AgentMetrics } from './agent.js';
import type { MetricFamily } from './base.js';
import { ClassificationMetrics } from './classification.js';
import { CodeMetrics } from './code.js';
import { ConversationMetrics } from './conversation.js';
import { RagMetrics } from './rag.js';
import { RankingMetrics } from './ranking.js';
import { SafetyMetrics } from './safety.js';
import { SimilarityMetrics } from './similarity.js';
import { TranslationMetrics } from './translation.js';

/** A family of any sample type. */
export type AnyMetricFamily = MetricFamily<never>;

export interface MetricFamilyRegistryEntry {
  name: string;
  create: (options: Record<string, unknown>) => AnyMetricFamily;
}

const keywordList = z.array(z.string()).optional();

function entry<TSchema extends z.ZodTypeAny>(
  name: string,
  optionsSchema: TSchema,
  construct: (options: z.infer<TSchema>) => AnyMetricFamily,
): MetricFamilyRegistryEntry {
  return { name, create: (options) => construct(optionsSchema.parse(options)) };
}

export const DEFAULT_METRIC_FAMILIES: readonly MetricFamilyRegistryEntry[] = [
  entry(
    RagMetrics.getSerializationName(),
    z.object({ coverageThreshold: z.number().min(0).max(1).optional() }).strict(),
    (o) => new RagMetrics(o),
  ),
  entry(
    AgentMetrics.getSerializationName(),
    z.object({ matchArguments: z.boolean().optional(), ordered: z.boolean().optional() }).strict(),
    (o) => new AgentMetrics(o),
  ),
  entry(
    ConversationMetrics.getSerializationName(),
    z.object({ requiredKeywords: keywordList, disallowedKeywords: keywordList }).strict(),
    (o) => new ConversationMetrics(o),
  ),
  entry(
    RankingMetrics.getSerializationName(),
    z.object({ k: z.number().int().nonnegative().optional() }).strict(),
    (o) => new RankingMetrics(o),
  ),
  entry(
    ClassificationMetrics.getSerializationName(),
    z.object({}).strict(),
    () => new ClassificationMetrics(),
  ),
  entry(
    CodeMetrics.getSerializationName(),
    z.object({ k: z.number().int().positive().optional(), language: z.string().optional() }).strict(),
    (o) => new CodeMetrics(o),
  ),
  entry(
    SimilarityMetrics.getSerializationName(),
    z.object({ bleuMaxN: z.number().int().positive().optional() }).strict(),
    (o) => new SimilarityMetrics(o),
  ),
  entry(
    TranslationMetrics.getSerializationName(),
    z
      .object({
        bleuMaxN: z.number().int().positive().optional(),
        chrfCharN: z.number().int().positive().optional(),
        chrfWordN: z.number().int().nonnegative().optional(),
        chrfBeta: z.number().positive().optional(),
      })
      .strict(),
    (o) => new TranslationMetrics(o),
  ),
  entry(
    SafetyMetrics.getSerializationName(),
    z.object({ additionalToxicKeywords: keywordList }).strict(),
    (o) => new SafetyMetrics(o),
  ),
];

/**
 * Registry keyed by serialization name. Custom entries take precedence and
 * must not repeat a name among themselves.
 */
export function buildMetricFamilyRegistry(
  customEntries: readonly MetricFamilyRegistryEntry[] = [],
): Map<string, MetricFamilyRegistryEntry> {
  const registry = new Map<string, MetricFamilyRegistryEntry>();
  for (const custom of customEntries) {
    if (registry.has(custom.name)) {
      throw new Error(`Duplicate metric family name: '${custom.name}'`);
    }
    registry.set(custom.name, custom);
  }
  for (const builtin of DEFAULT_METRIC_FAMILIES) {
    if (!registry.has(builtin.name)) {
      registry.set(builtin.name, builtin);
    }
  }
  return registry;
}

export function createMetricFamily(
  spec: MetricFamilySpec,
  registry: Map<string, MetricFamilyRegistryEntry> = buildMetricFamilyRegistry(),
): AnyMetricFamily {
  const found = registry.get(spec.name);
  if (!found) {
    throw new Error(
      `Metric family '${spec.name}' is not in the registry. ` +
        `Valid choices: ${[...registry.keys()].join(', ')}.`,
    );
  }
  try {
    return found.create(spec.arguments ?? {});
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    throw new Error(`Failed to instantiate metric family '${spec.name}': ${error.message}`);
  }
}

/**
 * Parse a raw config value (string or single-key object) into a spec.
 */
export function deserializeMetricFamilySpec(value: unknown): MetricFamilySpec {
  if (typeof value === 'string') {
    return { name: value, arguments: null };
  }
  if (isRecord(value)) {
    const [name, ...rest] = Object.keys(value);
    if (name === undefined || rest.length > 0) {
      throw new Error(
        `Expected a single key containing the metric family name, found keys ${JSON.stringify(Object.keys(value))}`,
      );
    }
    const rawValue = value[name];
    if (rawValue === undefined || rawValue === null) {
      return { name, arguments: null };
    }
    if (isRecord(rawValue)) {
      return { name, arguments: rawValue };
    }
    throw new Error(`Options of metric family '${name}' must be a mapping of option names`);
  }
  throw new Error(`Invalid metric family spec: ${JSON.stringify(value)}`);
}

/**
 * Short form of a spec for config files.
 */
export function serializeMetricFamilySpec(spec: MetricFamilySpec): unknown {
  return spec.arguments === null ? spec.name : { [spec.name]: spec.arguments };
}
