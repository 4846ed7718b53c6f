/**
 * Multi-turn conversation metrics for chatbot systems.
 */

import type { ConversationTurn, MetricMap } from '../types.js';
import { MetricFamily } from './base.js';
import { contentWordRecall, matchCascade, wordTokens } from './text.js';

export interface ConversationSample {
  turns: readonly ConversationTurn[];
  /** Compared against the last assistant turn for `conversation_completion`. */
  expectedFinalResponse?: string | null;
  /** Facts the assistant should restate somewhere in the conversation. */
  entities?: readonly string[] | null;
}

export interface ConversationMetricsOptions {
  /** Keywords the persona must use. */
  requiredKeywords?: readonly string[];
  /** Keywords the persona must avoid. */
  disallowedKeywords?: readonly string[];
}

export class ConversationMetrics extends MetricFamily<ConversationSample> {
  readonly requiredKeywords: readonly string[];
  readonly disallowedKeywords: readonly string[];

  constructor(opts?: ConversationMetricsOptions) {
    super();
    this.requiredKeywords = (opts?.requiredKeywords ?? []).map((k) => k.toLowerCase());
    this.disallowedKeywords = (opts?.disallowedKeywords ?? []).map((k) => k.toLowerCase());
  }

  protected getFields() {
    return { requiredKeywords: this.requiredKeywords, disallowedKeywords: this.disallowedKeywords };
  }
  protected getDefaults() {
    return { requiredKeywords: [], disallowedKeywords: [] };
  }

  zeroMetrics(): MetricMap {
    return {
      coherence: 0,
      knowledge_retention: 0,
      role_adherence: 0,
      response_relevance: 0,
      conversation_completion: 0,
      avg_turn_quality: 0,
    };
  }

  evaluate(sample: ConversationSample): MetricMap {
    const coherence = turnCoherence(sample.turns);
    const relevance = responseRelevance(sample.turns);
    return {
      coherence,
      knowledge_retention: knowledgeRetention(sample.turns, sample.entities ?? []),
      role_adherence: this.roleAdherence(sample.turns),
      response_relevance: relevance,
      conversation_completion: conversationCompletion(sample.turns, sample.expectedFinalResponse),
      avg_turn_quality: (coherence + relevance) / 2,
    };
  }

  /**
   * Every missed required keyword and every used disallowed keyword costs one
   * check. A single violation out of `n` checks scores `(n - 1) / n`.
   */
  roleAdherence(turns: readonly ConversationTurn[]): number {
    const required = this.requiredKeywords;
    const disallowed = this.disallowedKeywords;
    const totalChecks = required.length + disallowed.length;
    if (totalChecks === 0) return 1;

    const botText = assistantText(turns);
    let score = 1;
    for (const keyword of required) {
      if (!botText.includes(keyword)) score -= 1;
    }
    for (const keyword of disallowed) {
      if (botText.includes(keyword)) score -= 1;
    }
    return Math.max(0, score / totalChecks + (totalChecks - 1) / totalChecks);
  }
}

function assistantText(turns: readonly ConversationTurn[]): string {
  return turns
    .filter((t) => t.role === 'assistant')
    .map((t) => t.content.toLowerCase())
    .join(' ');
}

/**
 * Mean content-word recall of everything said so far into each assistant turn.
 */
export function turnCoherence(turns: readonly ConversationTurn[]): number {
  if (turns.length < 2) return 1;
  const scores: number[] = [];
  const contextTokens: string[] = [];
  for (const turn of turns) {
    const tokens = wordTokens(turn.content);
    if (turn.role === 'assistant' && contextTokens.length > 0) {
      scores.push(contentWordRecall(contextTokens, tokens));
    }
    contextTokens.push(...tokens);
  }
  return scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 1;
}

/**
 * Mean content-word recall of the latest user turn into each assistant reply.
 */
export function responseRelevance(turns: readonly ConversationTurn[]): number {
  const scores: number[] = [];
  let lastUserTokens: string[] = [];
  for (const turn of turns) {
    if (turn.role === 'user') {
      lastUserTokens = wordTokens(turn.content);
    } else if (turn.role === 'assistant' && lastUserTokens.length > 0) {
      scores.push(contentWordRecall(lastUserTokens, wordTokens(turn.content)));
    }
  }
  return scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 0;
}

export function knowledgeRetention(
  turns: readonly ConversationTurn[],
  entities: readonly string[],
): number {
  if (entities.length === 0) return 1;
  const botText = assistantText(turns);
  const found = entities.filter((e) => botText.includes(e.toLowerCase())).length;
  return found / entities.length;
}

export function conversationCompletion(
  turns: readonly ConversationTurn[],
  expected: string | null | undefined,
): number {
  if (expected === null || expected === undefined) return 1;
  const last = turns.filter((t) => t.role === 'assistant').at(-1);
  if (!last) return 0;
  return matchCascade(last.content, expected, { containedScore: 0.8, overlapScale: 0.6 });
}
