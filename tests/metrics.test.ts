import { describe, expect, it } from 'vitest';
import {
  AgentMetrics,
  argumentAccuracy,
  errorRecoveryRate,
  goalAccuracy,
  stepEfficiency,
} from '../src/metrics/agent.js';
import { aucRoc, ClassificationMetrics, prAuc, toLabelSet } from '../src/metrics/classification.js';
import { ConversationMetrics } from '../src/metrics/conversation.js';
import { RankingMetrics } from '../src/metrics/ranking.js';
import type { ConversationTurn } from '../src/types.js';

// ============ Ranking ============

describe('RankingMetrics', () => {
  const ranking = new RankingMetrics();

  it('scores a relevant but misordered ranking below ideal', () => {
    const scores = ranking.score(['doc-012', 'doc-001', 'doc-005'], ['doc-001', 'doc-012']);
    expect(scores.mrr).toBe(1);
    expect(scores.ndcg_at_k).toBeLessThan(1);
    // DCG = 1 + 2/log2(3), ideal = 2 + 1/log2(3)
    expect(scores.ndcg_at_k).toBeCloseTo((1 + 2 / Math.log2(3)) / (2 + 1 / Math.log2(3)), 10);
    expect(scores.precision_at_k).toBeCloseTo(2 / 3, 10);
    expect(scores.recall_at_k).toBe(1);
    expect(scores.map_at_k).toBe(1);
  });

  it('gives NDCG 1 for the ideal ordering', () => {
    const scores = ranking.score(['doc-001', 'doc-012'], ['doc-001', 'doc-012']);
    expect(scores.ndcg_at_k).toBe(1);
    expect(scores.mrr).toBe(1);
  });

  it('gives MRR 0 when nothing relevant is retrieved', () => {
    const scores = ranking.score(['x', 'y'], ['doc-001']);
    expect(scores.mrr).toBe(0);
    expect(scores.ndcg_at_k).toBe(0);
    expect(scores.precision_at_k).toBe(0);
  });

  it('truncates at k', () => {
    const top1 = new RankingMetrics({ k: 1 });
    const scores = top1.score(['x', 'doc-001'], ['doc-001']);
    expect(scores.precision_at_k).toBe(0);
    expect(scores.recall_at_k).toBe(0);
    expect(scores.mrr).toBe(0.5);
  });

  it('gives precision 0 at k = 0', () => {
    expect(new RankingMetrics({ k: 0 }).score(['doc-001'], ['doc-001']).precision_at_k).toBe(0);
  });

  it('rejects a negative k', () => {
    expect(() => new RankingMetrics({ k: -1 })).toThrow('k must be a non-negative integer, got -1');
  });

  it('macro-averages rankings and rejects mismatched lengths', () => {
    const result = ranking.evaluateRankings([['a'], ['x']], [['a'], ['b']]);
    expect(result.mrr).toBe(0.5);
    expect(() => ranking.evaluateRankings([['a']], [])).toThrow(
      'predicted and expected rankings must have the same length (1 != 0)',
    );
  });

  it('returns zero metrics for an empty batch', () => {
    expect(ranking.evaluateBatch([])).toEqual({
      ndcg_at_k: 0,
      map_at_k: 0,
      mrr: 0,
      precision_at_k: 0,
      recall_at_k: 0,
    });
  });

  it('serializes non-default options only', () => {
    expect(ranking.asSpec()).toEqual({ name: 'RankingMetrics', arguments: null });
    expect(new RankingMetrics({ k: 5 }).asSpec()).toEqual({
      name: 'RankingMetrics',
      arguments: { k: 5 },
    });
    expect(new RankingMetrics({ k: 5 }).toString()).toBe('RankingMetrics(k=5)');
  });
});

// ============ Agent ============

describe('AgentMetrics', () => {
  it('matches calls by name regardless of arguments', () => {
    const agent = new AgentMetrics();
    const result = agent.evaluate({
      predictedToolCalls: [{ name: 'calculator', arguments: { expression: '247*389' } }],
      expectedToolCalls: [{ name: 'calculator' }],
    });
    expect(result.tool_call_f1).toBe(1);
    expect(result.tool_call_accuracy).toBe(1);
    expect(result.argument_accuracy).toBe(1);
    expect(result.goal_accuracy).toBe(1);
    expect(result.step_efficiency).toBe(1);
    expect(result.error_recovery_rate).toBeNull();
  });

  it('includes arguments in the key when matchArguments is set', () => {
    const agent = new AgentMetrics({ matchArguments: true });
    expect(
      agent.toolCallF1(
        [{ name: 'calculator', arguments: { expression: '247*389' } }],
        [{ name: 'calculator' }],
      ),
    ).toEqual([0, 0, 0]);
    expect(
      agent.toolCallF1(
        [{ name: 'search', arguments: { b: 2, a: 1 } }],
        [{ name: 'search', arguments: { a: 1, b: 2 } }],
      ),
    ).toEqual([1, 1, 1]);
  });

  it('handles empty call lists', () => {
    const agent = new AgentMetrics();
    expect(agent.toolCallF1([], [])).toEqual([1, 1, 1]);
    expect(agent.toolCallF1([{ name: 'a' }], [])).toEqual([0, 0, 0]);
    expect(agent.toolCallF1([], [{ name: 'a' }])).toEqual([0, 0, 0]);
  });

  it('counts duplicate calls as many times as they occur', () => {
    const [precision, recall, f1] = new AgentMetrics().toolCallF1(
      [{ name: 'a' }, { name: 'a' }],
      [{ name: 'a' }],
    );
    expect(precision).toBe(0.5);
    expect(recall).toBe(1);
    expect(f1).toBeCloseTo(2 / 3, 10);
  });

  it('compares call order only when ordered', () => {
    const predicted = [{ name: 'b' }, { name: 'a' }];
    const expected = [{ name: 'a' }, { name: 'b' }];
    expect(new AgentMetrics().toolCallAccuracy(predicted, expected)).toBe(1);
    expect(new AgentMetrics({ ordered: true }).toolCallAccuracy(predicted, expected)).toBe(0);
  });

  it('compares argument values tolerantly', () => {
    const expected = [{ name: 'search', arguments: { q: 'cats', limit: 5 } }];
    expect(argumentAccuracy([{ name: 'search', arguments: { q: 'Cats ', limit: '5' } }], expected)).toBe(1);
    expect(argumentAccuracy([{ name: 'search', arguments: { q: 'cats', limit: '6' } }], expected)).toBe(0.5);
    expect(argumentAccuracy([], expected)).toBe(0);
  });

  it('grades the final answer', () => {
    expect(goalAccuracy(' 42 ', '42')).toBe(1);
    expect(goalAccuracy('The answer is 42', '42')).toBe(0.9);
    expect(goalAccuracy('answer 41', 'answer 42')).toBeCloseTo(0.35, 10);
    expect(goalAccuracy(null, '42')).toBe(0);
    expect(goalAccuracy('anything', null)).toBe(1);
  });

  it('computes step efficiency and error recovery', () => {
    expect(stepEfficiency(2, 4)).toBe(0.5);
    expect(stepEfficiency(5, 2)).toBe(1);
    expect(stepEfficiency(3, 0)).toBe(0);
    expect(stepEfficiency(0, 0)).toBe(1);
    expect(stepEfficiency(null, 4)).toBe(1);
    expect(errorRecoveryRate(4, 3)).toBe(0.75);
    expect(errorRecoveryRate(2, 5)).toBe(1);
    expect(errorRecoveryRate(0, 0)).toBeNull();
    expect(errorRecoveryRate(undefined, 1)).toBeNull();
  });

  it('renders options in toString', () => {
    expect(new AgentMetrics({ matchArguments: true }).toString()).toBe(
      'AgentMetrics(matchArguments=true)',
    );
  });
});

// ============ Classification ============

describe('ClassificationMetrics', () => {
  const classification = new ClassificationMetrics();

  it('normalises label sets', () => {
    expect(toLabelSet([' Cat ', '', 'DOG'])).toEqual(new Set(['cat', 'dog']));
    expect(toLabelSet(' Spam')).toEqual(new Set(['spam']));
  });

  it('scores a single sample', () => {
    expect(classification.evaluate({ predicted: ['cat', 'dog'], expected: 'cat' })).toEqual({
      precision: 0.5,
      recall: 1,
      f1: 2 / 3,
      accuracy: 0,
    });
  });

  it('computes corpus-level F1 variants and kappa', () => {
    const result = classification.evaluateLabels(['cat', 'dog', 'cat'], ['cat', 'dog', 'dog']);
    expect(result.accuracy).toBeCloseTo(2 / 3, 10);
    expect(result.macro_f1).toBeCloseTo(2 / 3, 10);
    expect(result.micro_f1).toBeCloseTo(2 / 3, 10);
    expect(result.weighted_f1).toBeCloseTo(2 / 3, 10);
    expect(result.cohens_kappa).toBeCloseTo(0.4, 10);
    expect(result.auc_roc).toBeNull();
    expect(result.pr_auc).toBeNull();
  });

  it('gives kappa 1 for perfect agreement', () => {
    expect(classification.evaluateLabels(['a', 'b'], ['a', 'b']).cohens_kappa).toBe(1);
    expect(classification.evaluateLabels(['a', 'a'], ['a', 'a']).cohens_kappa).toBe(1);
  });

  it('computes AUC-ROC and PR-AUC from probabilities', () => {
    const result = classification.evaluateBatch([
      { predicted: 'pos', expected: 'pos', probability: 0.9, positive: true },
      { predicted: 'pos', expected: 'neg', probability: 0.8, positive: false },
      { predicted: 'neg', expected: 'pos', probability: 0.3, positive: true },
      { predicted: 'neg', expected: 'neg', probability: 0.1, positive: false },
    ]);
    expect(result.auc_roc).toBeCloseTo(0.75, 10);
    expect(result.pr_auc).toBeCloseTo(0.5 + 0.5 * (2 / 3), 10);
  });

  it('returns null areas for degenerate inputs', () => {
    expect(aucRoc([], [])).toBeNull();
    expect(aucRoc([0.5], [1, 0])).toBeNull();
    expect(aucRoc([0.5, 0.4], [1, 1])).toBeNull();
    expect(prAuc([0.5, 0.4], [0, 0])).toBeNull();
  });

  it('returns zeros for an empty batch and rejects mismatched lengths', () => {
    expect(classification.evaluateBatch([])).toEqual(classification.zeroMetrics());
    expect(() => classification.evaluateLabels(['a'], [])).toThrow(
      'predicted and expected label lists must have the same length (1 != 0)',
    );
  });
});

// ============ Conversation ============

describe('ConversationMetrics', () => {
  const turns: ConversationTurn[] = [
    { role: 'user', content: 'Can you recommend a laptop for programming?' },
    { role: 'assistant', content: 'I recommend these laptops for programming work.' },
  ];

  it('scores an on-topic exchange', () => {
    const result = new ConversationMetrics().evaluate({ turns });
    expect(result).toEqual({
      coherence: 1,
      knowledge_retention: 1,
      role_adherence: 1,
      response_relevance: 1,
      conversation_completion: 1,
      avg_turn_quality: 1,
    });
  });

  it('measures knowledge retention over assistant turns', () => {
    const result = new ConversationMetrics().evaluate({ turns, entities: ['laptop', 'budget'] });
    expect(result.knowledge_retention).toBe(0.5);
  });

  it('penalises persona violations', () => {
    const ok = new ConversationMetrics({
      requiredKeywords: ['recommend'],
      disallowedKeywords: ['guarantee'],
    });
    expect(ok.roleAdherence(turns)).toBe(1);
    const violated = new ConversationMetrics({
      requiredKeywords: ['recommend'],
      disallowedKeywords: ['Laptops'],
    });
    expect(violated.roleAdherence(turns)).toBe(0.5);
  });

  it('grades completion against the expected final response', () => {
    const metrics = new ConversationMetrics();
    const completion = (expected: string) =>
      metrics.evaluate({ turns, expectedFinalResponse: expected }).conversation_completion;
    expect(completion('i recommend these laptops for programming work.')).toBe(1);
    expect(completion('laptops')).toBe(0.8);
    expect(completion('cheap laptops today')).toBeCloseTo(0.2, 10);
    expect(
      metrics.evaluate({ turns: [turns[0] ?? { role: 'user', content: '' }], expectedFinalResponse: 'x' })
        .conversation_completion,
    ).toBe(0);
  });

  it('handles a conversation without a user turn', () => {
    const result = new ConversationMetrics().evaluate({
      turns: [{ role: 'assistant', content: 'Hello there.' }],
    });
    expect(result.coherence).toBe(1);
    expect(result.response_relevance).toBe(0);
    expect(result.avg_turn_quality).toBe(0.5);
  });
});
