export type { AgentMetricsOptions, AgentSample } from './agent.js';
export {
  AgentMetrics,
  argumentAccuracy,
  errorRecoveryRate,
  goalAccuracy,
  stepEfficiency,
  valuesMatch,
} from './agent.js';
export { MetricFamily } from './base.js';
export { averageMetricMaps, LOWER_IS_BETTER, meanOfFinite } from './batch.js';
export type { ClassificationSample, Labels } from './classification.js';
export {
  aucRoc,
  ClassificationMetrics,
  cohensKappa,
  macroF1,
  microF1,
  prAuc,
  toLabelSet,
  weightedF1,
} from './classification.js';
export type { CodeMetricsOptions, CodeSample } from './code.js';
export { CodeMetrics, checkSyntax, extractCode, hasCodeBlock, passAtK, scanSecurity } from './code.js';
export type { ConversationMetricsOptions, ConversationSample } from './conversation.js';
export { ConversationMetrics } from './conversation.js';
export type {
  EmbeddingProvider,
  OpenAIEmbeddingProviderOptions,
  TranslationQualityInput,
  TranslationQualityProvider,
} from './providers.js';
export { cosineSimilarity, OpenAIEmbeddingProvider } from './providers.js';
export type { RagMetricName, RagMetricsOptions, RagMetricsProvider, RagSample, RagScores } from './rag.js';
export { RAG_METRIC_NAMES, RagMetrics } from './rag.js';
export type { RankingMetricsOptions, RankingSample, RankingScores } from './ranking.js';
export { RankingMetrics } from './ranking.js';
export type { AnyMetricFamily, MetricFamilyRegistryEntry } from './registry.js';
export {
  buildMetricFamilyRegistry,
  createMetricFamily,
  DEFAULT_METRIC_FAMILIES,
  deserializeMetricFamilySpec,
  serializeMetricFamilySpec,
} from './registry.js';
export type { SafetyMetricsOptions } from './safety.js';
export { detectPii, injectionRisk, SafetyMetrics } from './safety.js';
export type { SimilarityMetricsOptions, SimilaritySample } from './similarity.js';
export { bleu, rougeL, rougeN, SimilarityMetrics } from './similarity.js';
export type { TranslationMetricsOptions, TranslationSample } from './translation.js';
export { chrfPlusPlus, translationEditRate, TranslationMetrics } from './translation.js';
