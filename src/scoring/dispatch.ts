/**
 * Which metric family scores which system type, and how a test case plus a
 * pipeline answer become that family's sample.
 */

import type { PipelineOutput } from '../adapters/types.js';
import { AgentMetrics, type AgentSample } from '../metrics/agent.js';
import { ClassificationMetrics, type ClassificationSample, type Labels, toLabelSet } from '../metrics/classification.js';
import { CodeMetrics, type CodeSample } from '../metrics/code.js';
import { ConversationMetrics, type ConversationSample } from '../metrics/conversation.js';
import type { EmbeddingProvider, TranslationQualityProvider } from '../metrics/providers.js';
import { RagMetrics, type RagMetricsProvider, type RagSample, type RagScores } from '../metrics/rag.js';
import { RankingMetrics } from '../metrics/ranking.js';
import { createMetricFamily, type MetricFamilyRegistryEntry } from '../metrics/registry.js';
import { SimilarityMetrics } from '../metrics/similarity.js';
import { TranslationMetrics } from '../metrics/translation.js';
import type {
  ConversationTurn,
  MetricFamilySpec,
  MetricMap,
  SystemType,
  TestCase,
  ToolCall,
} from '../types.js';
import { isRecord } from '../types.js';

export type SystemFamily =
  | { kind: 'rag'; family: RagMetrics }
  | { kind: 'agent'; family: AgentMetrics }
  | { kind: 'conversation'; family: ConversationMetrics }
  | { kind: 'ranking'; family: RankingMetrics }
  | { kind: 'classification'; family: ClassificationMetrics }
  | { kind: 'code'; family: CodeMetrics }
  | { kind: 'similarity'; family: SimilarityMetrics }
  | { kind: 'translation'; family: TranslationMetrics };

export type FamilyKind = SystemFamily['kind'];

export const FAMILY_KIND_BY_SYSTEM_TYPE: Readonly<Record<SystemType, FamilyKind>> = {
  rag: 'rag',
  agent: 'agent',
  chatbot: 'conversation',
  search: 'ranking',
  classification: 'classification',
  code_gen: 'code',
  summarization: 'similarity',
  translation: 'translation',
  custom: 'rag',
};

/**
 * The family for a system type: the configured one when a spec is given,
 * otherwise the type's default. A configured family of the wrong kind is rejected.
 */
export function resolveSystemFamily(
  systemType: SystemType,
  spec: MetricFamilySpec | null = null,
  registry?: Map<string, MetricFamilyRegistryEntry>,
): SystemFamily {
  const configured = spec ? createMetricFamily(spec, registry) : null;
  const pick = <T>(cls: abstract new (...args: never[]) => T): T | null => {
    if (configured === null) return null;
    if (configured instanceof cls) return configured;
    throw new Error(
      `Metric family '${configured.getSerializationName()}' cannot score '${systemType}' test sets`,
    );
  };
  switch (FAMILY_KIND_BY_SYSTEM_TYPE[systemType]) {
    case 'rag':
      return { kind: 'rag', family: pick(RagMetrics) ?? new RagMetrics() };
    case 'agent':
      return { kind: 'agent', family: pick(AgentMetrics) ?? new AgentMetrics() };
    case 'conversation':
      return { kind: 'conversation', family: pick(ConversationMetrics) ?? new ConversationMetrics() };
    case 'ranking':
      return { kind: 'ranking', family: pick(RankingMetrics) ?? new RankingMetrics() };
    case 'classification':
      return {
        kind: 'classification',
        family: pick(ClassificationMetrics) ?? new ClassificationMetrics(),
      };
    case 'code':
      return { kind: 'code', family: pick(CodeMetrics) ?? new CodeMetrics() };
    case 'similarity':
      return { kind: 'similarity', family: pick(SimilarityMetrics) ?? new SimilarityMetrics() };
    case 'translation':
      return { kind: 'translation', family: pick(TranslationMetrics) ?? new TranslationMetrics() };
  }
}

export interface MetricProviders {
  embeddings?: EmbeddingProvider;
  translationQuality?: TranslationQualityProvider;
  rag?: RagMetricsProvider;
}

export type FamilyScores =
  | { kind: 'core'; scores: RagScores }
  | { kind: 'extended'; metrics: MetricMap };

// -- sample builders --

function referenceText(testCase: TestCase): string {
  return testCase.expectedOutput ?? testCase.groundTruth ?? '';
}

function metadataNumber(metadata: Record<string, unknown>, key: string): number | null {
  const value = metadata[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isBooleanList(value: unknown): value is boolean[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'boolean');
}

/**
 * Adapter tool calls (`{ tool, args }`) as metrics and rules see them.
 */
export function normalizeToolCalls(output: PipelineOutput): ToolCall[] {
  return output.toolCalls.map((call) =>
    call.args && isRecord(call.args) ? { name: call.tool, arguments: call.args } : { name: call.tool },
  );
}

export function ragSample(testCase: TestCase, output: PipelineOutput): RagSample {
  return {
    query: testCase.query,
    answer: output.answer,
    contexts: output.retrievedContexts.length > 0 ? output.retrievedContexts : (testCase.context ?? []),
    reference: testCase.groundTruth ?? testCase.expectedOutput ?? null,
  };
}

export function agentSample(testCase: TestCase, output: PipelineOutput): AgentSample {
  const expectations = testCase.expectations ?? {};
  const { metadata } = output;
  return {
    predictedToolCalls: normalizeToolCalls(output),
    expectedToolCalls: expectations.expectedToolCalls ?? [],
    finalAnswer: output.answer,
    expectedAnswer: testCase.expectedOutput ?? testCase.groundTruth ?? null,
    minSteps: expectations.minSteps ?? null,
    actualSteps: expectations.actualSteps ?? metadataNumber(metadata, 'steps'),
    errorStates: expectations.errorsEncountered ?? metadataNumber(metadata, 'errors_encountered'),
    recoveredStates: expectations.errorsRecovered ?? metadataNumber(metadata, 'errors_recovered'),
  };
}

/**
 * The dialogue to score: the adapter's history when it reports one, else the
 * case's stored turns followed by this exchange.
 */
export function conversationSample(testCase: TestCase, output: PipelineOutput): ConversationSample {
  const turns: ConversationTurn[] = output.turnHistory ?? [
    ...(testCase.conversationTurns ?? []),
    { role: 'user', content: testCase.query },
    { role: 'assistant', content: output.answer },
  ];
  return {
    turns,
    expectedFinalResponse: testCase.expectedOutput ?? null,
    entities: testCase.expectations?.knowledgeEntities ?? null,
  };
}

/**
 * Predicted labels come from `metadata.labels` when the adapter reports
 * them, else from the answer text.
 */
export function classificationSample(testCase: TestCase, output: PipelineOutput): ClassificationSample {
  const { metadata } = output;
  const reported = metadata.labels;
  const predicted: Labels =
    typeof reported === 'string' || isStringList(reported) ? reported : output.answer;
  return {
    predicted,
    expected: testCase.expectedLabels ?? referenceText(testCase),
    probability: metadataNumber(metadata, 'probability'),
    positive: testCase.expectations?.positive ?? null,
  };
}

export function codeSample(testCase: TestCase, output: PipelineOutput): CodeSample {
  const expectations = testCase.expectations ?? {};
  const reported = output.metadata.test_results;
  return {
    output: output.answer,
    testResults: expectations.testResults ?? (isBooleanList(reported) ? reported : null),
    language: expectations.language ?? null,
  };
}

/**
 * The ranking to score: `metadata.ranking` when reported, else the ids or
 * texts of the retrieved contexts in order.
 */
export function rankingPrediction(output: PipelineOutput): string[] {
  const reported = output.metadata.ranking;
  return isStringList(reported) ? reported : output.retrievedContexts;
}

// -- evaluation --

/**
 * Score one case with its system family.
 */
export async function scoreWithFamily(
  systemFamily: SystemFamily,
  testCase: TestCase,
  output: PipelineOutput,
  providers: MetricProviders = {},
): Promise<FamilyScores> {
  switch (systemFamily.kind) {
    case 'rag':
      return {
        kind: 'core',
        scores: await systemFamily.family.scoreAsync(ragSample(testCase, output), providers.rag),
      };
    case 'agent':
      return { kind: 'extended', metrics: systemFamily.family.evaluate(agentSample(testCase, output)) };
    case 'conversation': {
      const expectations = testCase.expectations ?? {};
      const family =
        expectations.requiredKeywords || expectations.disallowedKeywords
          ? new ConversationMetrics({
              requiredKeywords: expectations.requiredKeywords ?? systemFamily.family.requiredKeywords,
              disallowedKeywords:
                expectations.disallowedKeywords ?? systemFamily.family.disallowedKeywords,
            })
          : systemFamily.family;
      return { kind: 'extended', metrics: family.evaluate(conversationSample(testCase, output)) };
    }
    case 'ranking':
      return {
        kind: 'extended',
        metrics: systemFamily.family.evaluate({
          predicted: rankingPrediction(output),
          expected: testCase.expectedRanking ?? [],
        }),
      };
    case 'classification': {
      const sample = classificationSample(testCase, output);
      return {
        kind: 'extended',
        metrics: {
          ...systemFamily.family.evaluate(sample),
          predicted_labels: [...toLabelSet(sample.predicted)].sort(),
          expected_labels: [...toLabelSet(sample.expected)].sort(),
          predicted_probability: sample.probability ?? null,
          ...(typeof sample.positive === 'boolean' ? { expected_positive: sample.positive } : {}),
        },
      };
    }
    case 'code':
      return { kind: 'extended', metrics: systemFamily.family.evaluate(codeSample(testCase, output)) };
    case 'similarity':
      return {
        kind: 'extended',
        metrics: await systemFamily.family.evaluateAsync(
          { predicted: output.answer, reference: referenceText(testCase) },
          providers.embeddings,
        ),
      };
    case 'translation':
      return {
        kind: 'extended',
        metrics: await systemFamily.family.evaluateAsync(
          {
            hypothesis: output.answer,
            reference: referenceText(testCase),
            source: testCase.expectations?.sourceText ?? null,
          },
          providers.translationQuality,
        ),
      };
  }
}
