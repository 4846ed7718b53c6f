import { stripVTControlCharacters } from 'node:util';
import { describe, expect, it } from 'vitest';
import {
  renderDuration,
  renderGateDecision,
  renderNumber,
  renderNumberDiff,
  renderPercentage,
  renderRegressionDiff,
  renderRunTable,
} from '../src/reporting/index.js';
import type { EvaluationResult, EvaluationRun } from '../src/types.js';

const plain = stripVTControlCharacters;

describe('render-numbers', () => {
  it('formats numbers', () => {
    expect(renderNumber(1234)).toBe('1,234');
    expect(renderNumber(0.5)).toBe('0.500');
    expect(renderNumber(12.345)).toBe('12.3');
    expect(renderNumber(1234.5)).toBe('1,234.5');
    expect(renderNumber(0.01234)).toBe('0.0123');
    expect(renderNumber(-0.25)).toBe('-0.250');
  });

  it('formats percentages', () => {
    expect(renderPercentage(0.875)).toBe('87.5%');
    expect(renderPercentage(1)).toBe('100.0%');
  });

  it('formats differences', () => {
    expect(renderNumberDiff(1, 1)).toBeNull();
    expect(renderNumberDiff(3, 5)).toBe('+2');
    expect(renderNumberDiff(5, 3)).toBe('-2');
    expect(renderNumberDiff(0.5, 0.75)).toBe('+0.250 / +50.0%');
    expect(renderNumberDiff(0.8, 0.6)).toBe('-0.200 / -25.0%');
    expect(renderNumberDiff(0, 0.5)).toBe('+0.500');
  });

  it('formats durations given in milliseconds', () => {
    expect(renderDuration(0)).toBe('0ms');
    expect(renderDuration(0.25)).toBe('250µs');
    expect(renderDuration(12.34)).toBe('12.3ms');
    expect(renderDuration(1500)).toBe('1.5s');
  });
});

const run: EvaluationRun = {
  id: 'run-7',
  testSetId: 'capitals',
  status: 'gate_blocked',
  gateThresholdSnapshot: { pass_rate: 0.8 },
  summaryMetrics: {
    totalCases: 2,
    passedCases: 1,
    failedCases: 1,
    passRate: 0.5,
    averages: { avg_faithfulness: 0.75, avg_mrr: null },
  },
  pipelineConfig: {
    adapterId: 'replay',
    adapterOptions: {},
    metrics: ['faithfulness'],
    metricFamily: null,
    timeoutMs: 1000,
  },
  overallPassed: false,
  createdAt: new Date('2026-01-01T00:00:00Z'),
  startedAt: new Date('2026-01-01T00:00:01Z'),
  completedAt: new Date('2026-01-01T00:00:02Z'),
  errorMessage: null,
};

function result(overrides: Partial<EvaluationResult>): EvaluationResult {
  return {
    id: 'r1',
    runId: 'run-7',
    testCaseId: 'paris',
    query: 'Capital of France?',
    faithfulness: 1,
    answerRelevancy: null,
    contextPrecision: null,
    contextRecall: null,
    extendedMetrics: null,
    rulesPassed: null,
    rulesDetail: [],
    passed: true,
    failureReason: null,
    rawOutput: 'Paris',
    rawContexts: [],
    toolCalls: [],
    pipelineMetrics: {},
    pipelineAttributes: {},
    durationMs: 12.34,
    ...overrides,
  };
}

const missingParis = {
  rule: { type: 'must_contain', value: 'Paris' },
  passed: false,
  reason: "Output is missing required substring: 'Paris'",
};

describe('renderRunTable', () => {
  it('lists each case and the averages', () => {
    const text = plain(
      renderRunTable(run, [
        result({}),
        result({
          id: 'r2',
          testCaseId: 'berlin',
          faithfulness: 0.5,
          passed: false,
          failureReason: 'Composite score 0.500 below 0.5',
          rulesPassed: false,
          rulesDetail: [missingParis],
        }),
      ]),
    );
    const lines = text.split('\n');
    expect(lines[0]).toBe('Evaluation Run: run-7 (gate_blocked, blocked)');
    expect(text).toContain('faithfulness: 1');
    expect(text).toContain('faithfulness: 0.500');
    expect(text).toContain('Composite score 0.500 below 0.5');
    expect(text).toContain('12.3ms');
    expect(text).toContain('avg_faithfulness: 0.750');
    expect(text).toContain('50.0%');
    expect(text).not.toContain('avg_mrr');
  });

  it('drops optional columns', () => {
    const text = plain(
      renderRunTable({ ...run, summaryMetrics: null }, [result({})], {
        includeDurations: false,
        includeReasons: false,
      }),
    );
    expect(text).not.toContain('Duration');
    expect(text).not.toContain('Reason');
    expect(text).not.toContain('Averages');
  });

  it('adds query and output columns on request', () => {
    const text = plain(renderRunTable(run, [result({})], { includeQuery: true, includeOutput: true }));
    expect(text).toContain('Capital of France?');
    expect(text).toContain('Paris');
  });
});

describe('renderGateDecision', () => {
  it('says when the gate passed', () => {
    expect(plain(renderGateDecision({ passed: true, metricFailures: [], ruleFailures: [] }))).toBe(
      'Gate passed',
    );
  });

  it('lists failed rules per case', () => {
    const text = renderGateDecision({
      passed: false,
      metricFailures: [],
      ruleFailures: [{ resultId: 'r2', testCaseId: 'berlin', rulesDetail: [missingParis] }],
    });
    expect(plain(text)).toBe(
      "Gate blocked\n✘ berlin\n  - Output is missing required substring: 'Paris'",
    );
  });

  it('tabulates metric breaches', () => {
    const text = plain(
      renderGateDecision({
        passed: false,
        metricFailures: [{ metric: 'pass_rate', actual: 0.5, threshold: 0.8, delta: -0.3 }],
        ruleFailures: [],
      }),
    );
    expect(text.split('\n')[0]).toBe('Gate blocked');
    expect(text).toContain('pass_rate');
    expect(text).toContain('-0.300');
  });
});

describe('renderRegressionDiff', () => {
  it('notes a missing baseline', () => {
    expect(
      renderRegressionDiff({
        baselineRunId: null,
        regressions: [],
        improvements: [],
        metricDeltas: {},
        gateBlocked: false,
      }),
    ).toBe('No baseline run to compare against');
  });

  it('lists regressions and deltas', () => {
    const text = plain(
      renderRegressionDiff({
        baselineRunId: 'run-6',
        regressions: [
          {
            testCaseId: 'berlin',
            query: 'Capital of Germany?',
            failureReason: 'Composite score 0.200 below 0.5',
            currentScores: { faithfulness: 0.2 },
            baselineScores: { faithfulness: 0.9 },
          },
        ],
        improvements: [],
        metricDeltas: { pass_rate: -0.5, avg_mrr: null },
        gateBlocked: true,
      }),
    );
    const lines = text.split('\n');
    expect(lines[0]).toBe('Compared with baseline run-6');
    expect(text).toContain('-0.500');
    expect(text).toContain('Regressions (1)\n✘ berlin: Capital of Germany?\n    Composite score 0.200 below 0.5');
    expect(text).not.toContain('Improvements');
    expect(lines.at(-1)).toBe('Regression gate blocked');
  });
});
