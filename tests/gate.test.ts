import { describe, expect, it } from 'vitest';
import { InvalidRunTransitionError } from '../src/errors.js';
import { aggregateRun, toSummaryJSON } from '../src/gate/aggregator.js';
import { decideGate, gateDecisionToJSON } from '../src/gate/gate-decider.js';
import { diffRuns, regressionDiffToJSON, selectBaseline } from '../src/gate/regression-differ.js';
import { canTransition, isTerminal, transition } from '../src/gate/run-state.js';
import type { EvaluationResult, EvaluationRun, SummaryMetrics } from '../src/types.js';

function makeResult(overrides: Partial<EvaluationResult> = {}): EvaluationResult {
  return {
    id: 'result-1',
    runId: 'run-1',
    testCaseId: 'case-1',
    query: 'q',
    faithfulness: null,
    answerRelevancy: null,
    contextPrecision: null,
    contextRecall: null,
    extendedMetrics: null,
    rulesPassed: null,
    rulesDetail: [],
    passed: true,
    failureReason: null,
    rawOutput: '',
    rawContexts: [],
    toolCalls: [],
    pipelineMetrics: {},
    pipelineAttributes: {},
    durationMs: 1,
    ...overrides,
  };
}

function makeRun(overrides: Partial<EvaluationRun> = {}): EvaluationRun {
  return {
    id: 'run-1',
    testSetId: 'set-1',
    status: 'pending',
    gateThresholdSnapshot: null,
    summaryMetrics: null,
    pipelineConfig: {
      adapterId: 'replay',
      adapterOptions: {},
      metrics: [],
      metricFamily: null,
      timeoutMs: 1000,
    },
    overallPassed: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    startedAt: null,
    completedAt: null,
    errorMessage: null,
    ...overrides,
  };
}

function summary(passRate: number, averages: Record<string, number | null>): SummaryMetrics {
  return { totalCases: 2, passedCases: 1, failedCases: 1, passRate, averages };
}

// ============ RunAggregator ============

describe('aggregateRun', () => {
  it('treats an empty run as fully passing', () => {
    expect(aggregateRun([])).toEqual({
      totalCases: 0,
      passedCases: 0,
      failedCases: 0,
      passRate: 1,
      averages: {},
    });
  });

  it('averages finite observations only', () => {
    const result = aggregateRun([
      makeResult({ faithfulness: 0.8, answerRelevancy: 0.6, passed: true }),
      makeResult({ id: 'result-2', answerRelevancy: 0.4, passed: false }),
    ]);
    expect(result).toEqual({
      totalCases: 2,
      passedCases: 1,
      failedCases: 1,
      passRate: 0.5,
      averages: { avg_faithfulness: 0.8, avg_answer_relevancy: 0.5 },
    });
  });

  it('keeps a metric without finite values as null and drops non-numeric ones', () => {
    const { averages } = aggregateRun([
      makeResult({ extendedMetrics: { mrr: 1, error_recovery_rate: null, syntax_valid: true } }),
      makeResult({ extendedMetrics: { mrr: Number.NaN, error_recovery_rate: null, syntax_valid: false } }),
      makeResult({ extendedMetrics: { mrr: null, security_issues: ['eval: dynamic code'] } }),
    ]);
    expect(averages).toEqual({ avg_mrr: 1, avg_error_recovery_rate: null });
  });

  it('adds corpus-level classification metrics', () => {
    const { averages } = aggregateRun([
      makeResult({
        extendedMetrics: {
          precision: 1,
          predicted_labels: ['spam'],
          expected_labels: ['spam'],
          predicted_probability: null,
        },
      }),
      makeResult({
        extendedMetrics: {
          precision: 0,
          predicted_labels: ['ham'],
          expected_labels: ['spam'],
          predicted_probability: null,
        },
      }),
    ]);
    expect(averages.avg_precision).toBe(0.5);
    expect(averages.avg_macro_f1).toBeCloseTo(1 / 3, 10);
    expect(averages.avg_micro_f1).toBe(0.5);
    expect(averages.avg_weighted_f1).toBeCloseTo(2 / 3, 10);
    expect(averages.avg_cohens_kappa).toBe(0);
    expect(averages.avg_auc_roc).toBeNull();
    expect(averages.avg_predicted_probability).toBeNull();
  });

  it('flattens a summary to snake_case', () => {
    expect(toSummaryJSON(summary(0.5, { avg_mrr: 0.25 }))).toEqual({
      total_cases: 2,
      passed_cases: 1,
      failed_cases: 1,
      pass_rate: 0.5,
      avg_mrr: 0.25,
    });
  });
});

// ============ Run state ============

describe('run state machine', () => {
  it('allows only the documented transitions', () => {
    expect(canTransition('pending', 'running')).toBe(true);
    expect(canTransition('pending', 'failed')).toBe(true);
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('running', 'gate_blocked')).toBe(true);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(isTerminal('gate_blocked')).toBe(true);
    expect(isTerminal('running')).toBe(false);
  });

  it('stamps start and completion times', () => {
    const started = transition(makeRun(), 'running', new Date('2026-01-01T00:01:00Z'));
    expect(started.status).toBe('running');
    expect(started.startedAt).toEqual(new Date('2026-01-01T00:01:00Z'));
    expect(started.completedAt).toBeNull();

    const done = transition(started, 'completed', new Date('2026-01-01T00:02:00Z'));
    expect(done.startedAt).toEqual(new Date('2026-01-01T00:01:00Z'));
    expect(done.completedAt).toEqual(new Date('2026-01-01T00:02:00Z'));
  });

  it('refuses to leave a terminal state', () => {
    const run = makeRun({ status: 'completed' });
    expect(() => transition(run, 'running')).toThrow(InvalidRunTransitionError);
    expect(() => transition(run, 'failed')).toThrow(
      "Cannot transition run from 'completed' to 'failed'",
    );
  });
});

// ============ GateDecider ============

describe('decideGate', () => {
  it('blocks on a threshold breached by any amount', () => {
    const decision = decideGate(
      { faithfulness: 0.7, pass_rate: 0.8 },
      summary(1, { avg_faithfulness: 0.69 }),
      [],
    );
    expect(decision.passed).toBe(false);
    expect(decision.ruleFailures).toEqual([]);
    expect(decision.metricFailures).toHaveLength(1);
    expect(decision.metricFailures[0]).toMatchObject({
      metric: 'faithfulness',
      actual: 0.69,
      threshold: 0.7,
    });
    expect(decision.metricFailures[0]?.delta).toBeCloseTo(-0.01, 10);
  });

  it('passes a value equal to its threshold', () => {
    expect(decideGate({ mrr: 0.5 }, summary(1, { avg_mrr: 0.5 }), []).passed).toBe(true);
  });

  it('never blocks on a missing value or snapshot', () => {
    const empty = aggregateRun([]);
    expect(decideGate({ pass_rate: 0.8, faithfulness: 0.7 }, empty, [])).toEqual({
      passed: true,
      metricFailures: [],
      ruleFailures: [],
    });
    expect(decideGate(null, summary(0, {}), []).passed).toBe(true);
    expect(decideGate({ mrr: 0.5 }, summary(1, { avg_mrr: null }), []).passed).toBe(true);
    expect(decideGate({ mrr: 0.5 }, null, []).passed).toBe(true);
  });

  it('compares lower-is-better metrics inverted', () => {
    const blocked = decideGate({ ter: 0.3 }, summary(1, { avg_ter: 0.5 }), []);
    expect(blocked.passed).toBe(false);
    expect(blocked.metricFailures[0]?.delta).toBeCloseTo(-0.2, 10);
    expect(decideGate({ ter: 0.3 }, summary(1, { avg_ter: 0.2 }), []).passed).toBe(true);
  });

  it('lists every case with a failed rule', () => {
    const rulesDetail = [
      { rule: { type: 'must_contain', value: 'x' }, passed: false, reason: 'missing' },
    ];
    const decision = decideGate({}, summary(1, {}), [
      makeResult({ id: 'r1', testCaseId: 'c1', rulesPassed: false, rulesDetail }),
      makeResult({ id: 'r2', testCaseId: 'c2', rulesPassed: true }),
      makeResult({ id: 'r3', testCaseId: 'c3', rulesPassed: null }),
    ]);
    expect(decision.passed).toBe(false);
    expect(decision.ruleFailures).toEqual([{ resultId: 'r1', testCaseId: 'c1', rulesDetail }]);
    expect(gateDecisionToJSON(decision)).toEqual({
      passed: false,
      metric_failures: [],
      rule_failures: [{ result_id: 'r1', test_case_id: 'c1', rules_detail: rulesDetail }],
    });
  });
});

// ============ RegressionDiffer ============

describe('selectBaseline', () => {
  const current = makeRun({ id: 'run-9', status: 'running' });
  const at = (iso: string) => new Date(iso);

  it('picks the latest completed and passing run of the same test set', () => {
    const candidates = [
      makeRun({ id: 'run-1', status: 'completed', overallPassed: true, completedAt: at('2026-01-02T00:00:00Z') }),
      makeRun({ id: 'run-2', status: 'completed', overallPassed: true, completedAt: at('2026-01-03T00:00:00Z') }),
      makeRun({ id: 'run-3', status: 'gate_blocked', overallPassed: false, completedAt: at('2026-01-04T00:00:00Z') }),
      makeRun({ id: 'run-4', testSetId: 'other', status: 'completed', overallPassed: true, completedAt: at('2026-01-05T00:00:00Z') }),
      makeRun({ id: 'run-5', status: 'completed', overallPassed: true, completedAt: null }),
      makeRun({ id: 'run-9', status: 'completed', overallPassed: true, completedAt: at('2026-01-06T00:00:00Z') }),
    ];
    expect(selectBaseline(current, candidates)?.id).toBe('run-2');
  });

  it('breaks completion-time ties by run id', () => {
    const sameTime = at('2026-01-02T00:00:00Z');
    const candidates = [
      makeRun({ id: 'run-b', status: 'completed', overallPassed: true, completedAt: sameTime }),
      makeRun({ id: 'run-c', status: 'completed', overallPassed: true, completedAt: sameTime }),
      makeRun({ id: 'run-a', status: 'completed', overallPassed: true, completedAt: sameTime }),
    ];
    expect(selectBaseline(current, candidates)?.id).toBe('run-c');
  });

  it('returns null without candidates', () => {
    expect(selectBaseline(current, [])).toBeNull();
  });
});

describe('diffRuns', () => {
  it('is empty without a baseline and mirrors the run verdict', () => {
    const passing = makeRun({ status: 'completed', overallPassed: true });
    expect(diffRuns(passing, [makeResult()], null, [])).toEqual({
      baselineRunId: null,
      regressions: [],
      improvements: [],
      metricDeltas: {},
      gateBlocked: false,
    });
    const blocked = makeRun({ status: 'gate_blocked', overallPassed: false });
    expect(diffRuns(blocked, [], null, []).gateBlocked).toBe(true);
  });

  it('classifies regressions and improvements', () => {
    const current = makeRun({
      id: 'run-2',
      status: 'completed',
      overallPassed: true,
      summaryMetrics: summary(0.5, { avg_faithfulness: 0.6, avg_mrr: null }),
    });
    const baseline = makeRun({
      id: 'run-1',
      status: 'completed',
      overallPassed: true,
      summaryMetrics: summary(1, { avg_faithfulness: 0.9, avg_context_recall: 0.5 }),
    });
    const currentResults = [
      makeResult({
        testCaseId: 'case-1',
        query: 'first',
        passed: false,
        faithfulness: 0.2,
        failureReason: 'Composite score 0.200 below 0.5',
      }),
      makeResult({ testCaseId: 'case-2', query: 'second', passed: true, extendedMetrics: { mrr: 1, labels: ['a'] } }),
      makeResult({ testCaseId: 'case-3', passed: true }),
      makeResult({ testCaseId: 'case-4', passed: false }),
    ];
    const baselineResults = [
      makeResult({ testCaseId: 'case-1', passed: true, faithfulness: 0.9 }),
      makeResult({ testCaseId: 'case-2', passed: false, extendedMetrics: { mrr: 0 } }),
      makeResult({ testCaseId: 'case-3', passed: true }),
    ];

    const diff = diffRuns(current, currentResults, baseline, baselineResults);
    expect(diff.baselineRunId).toBe('run-1');
    expect(diff.gateBlocked).toBe(true);
    expect(diff.regressions).toEqual([
      {
        testCaseId: 'case-1',
        query: 'first',
        failureReason: 'Composite score 0.200 below 0.5',
        currentScores: { faithfulness: 0.2 },
        baselineScores: { faithfulness: 0.9 },
      },
    ]);
    expect(diff.improvements).toEqual([
      {
        testCaseId: 'case-2',
        query: 'second',
        failureReason: null,
        currentScores: { mrr: 1 },
        baselineScores: { mrr: 0 },
      },
    ]);
    expect(Object.keys(diff.metricDeltas).sort()).toEqual([
      'avg_context_recall',
      'avg_faithfulness',
      'avg_mrr',
      'pass_rate',
    ]);
    expect(diff.metricDeltas.pass_rate).toBe(-0.5);
    expect(diff.metricDeltas.avg_faithfulness).toBeCloseTo(-0.3, 10);
    expect(diff.metricDeltas.avg_mrr).toBeNull();
    expect(diff.metricDeltas.avg_context_recall).toBeNull();

    expect(regressionDiffToJSON(diff)).toMatchObject({
      baseline_run_id: 'run-1',
      gate_blocked: true,
      improvements: [
        {
          test_case_id: 'case-2',
          query: 'second',
          failure_reason: null,
          current_scores: { mrr: 1 },
          baseline_scores: { mrr: 0 },
        },
      ],
    });
  });

  it('does not block when nothing regressed', () => {
    const current = makeRun({ id: 'run-2', overallPassed: false });
    const baseline = makeRun({ id: 'run-1', overallPassed: true });
    const diff = diffRuns(current, [makeResult({ passed: true })], baseline, [makeResult({ passed: false })]);
    expect(diff.gateBlocked).toBe(false);
    expect(diff.improvements).toHaveLength(1);
    expect(diff.metricDeltas).toEqual({});
  });
});
