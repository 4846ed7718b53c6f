export type { CustomRuleExtension, CustomRuleFunction, RuleVerdict } from './extensions.js';
export { RuleExtensionRegistry } from './extensions.js';
export type { RuleEngineOptions, RuleInput, RulesOutcome } from './rule-engine.js';
export {
  DEFAULT_CITATION_MARKERS,
  DEFAULT_HALLUCINATION_THRESHOLD,
  DEFAULT_MAX_LATENCY_MS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_SIMILARITY_THRESHOLD,
  jaccardSimilarity,
  REFUSAL_PHRASES,
  RULE_PII_PATTERNS,
  RuleEngine,
} from './rule-engine.js';
export type { FailureRule, KnownRule, RuleType, UnknownRule } from './schema.js';
export {
  failureRuleSchema,
  failureRulesSchema,
  isKnownRule,
  KNOWN_RULE_TYPES,
  parseFailureRules,
} from './schema.js';
