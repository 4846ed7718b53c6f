/**
 * Zod schemas for the failure-rule DSL.
 *
 * A rule is `{ type, ...fields }`. Known types are validated strictly enough
 * to catch typos in required fields; extra fields pass through because custom
 * extensions read their own. Rules with a type outside KNOWN_RULE_TYPES are
 * kept as-is and skipped by the engine.
 */

import { z } from 'zod';

const substringRule = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), value: z.string() }).passthrough();

const toolRule = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), tool: z.string() }).passthrough();

const regexRule = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), pattern: z.string() }).passthrough();

export const knownRuleSchema = z.discriminatedUnion('type', [
  substringRule('must_contain'),
  substringRule('must_not_contain'),
  toolRule('must_call_tool'),
  toolRule('must_not_call_tool'),
  regexRule('regex_must_match'),
  regexRule('regex_must_not_match'),
  z
    .object({ type: z.literal('max_hallucination_risk'), threshold: z.number().optional() })
    .passthrough(),
  z.object({ type: z.literal('must_refuse') }).passthrough(),
  z
    .object({ type: z.literal('must_return_label'), labels: z.array(z.string()).optional() })
    .passthrough(),
  z.object({ type: z.literal('max_latency_ms'), threshold: z.number().optional() }).passthrough(),
  z.object({ type: z.literal('must_not_contain_pii') }).passthrough(),
  z
    .object({
      type: z.literal('json_schema_valid'),
      schema: z.record(z.string(), z.unknown()).optional(),
    })
    .passthrough(),
  z.object({ type: z.literal('max_token_count'), max_tokens: z.number().optional() }).passthrough(),
  z.object({ type: z.literal('must_cite_source'), pattern: z.string().optional() }).passthrough(),
  z
    .object({
      type: z.literal('semantic_similarity_above'),
      expected: z.string().optional(),
      threshold: z.number().optional(),
    })
    .passthrough(),
  z.object({ type: z.literal('custom'), extension: z.string().optional() }).passthrough(),
]);

export type KnownRule = z.infer<typeof knownRuleSchema>;

export type RuleType = KnownRule['type'];

export const KNOWN_RULE_TYPES: ReadonlySet<string> = new Set<string>(
  knownRuleSchema.options.map((option) => option.shape.type.value),
);

export const unknownRuleSchema = z
  .object({ type: z.string() })
  .passthrough()
  .refine((rule) => !KNOWN_RULE_TYPES.has(rule.type), {
    message: 'Rule of a known type is missing required fields',
  });

export type UnknownRule = z.infer<typeof unknownRuleSchema>;

export const failureRuleSchema = z.union([knownRuleSchema, unknownRuleSchema]);

export type FailureRule = KnownRule | UnknownRule;

export const failureRulesSchema = z.array(failureRuleSchema);

/**
 * Narrow a rule to one the engine has semantics for.
 */
export function isKnownRule(rule: FailureRule): rule is KnownRule {
  return knownRuleSchema.safeParse(rule).success;
}

/**
 * Validate a raw rule list, e.g. one read from a test-set file.
 */
export function parseFailureRules(raw: unknown): FailureRule[] {
  return failureRulesSchema.parse(raw);
}
