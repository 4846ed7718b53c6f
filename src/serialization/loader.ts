/**
 * YAML/JSON loading and saving for test sets.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import type { CaseExpectations, TestCase, TestSet } from '../types.js';
import {
  type FileFormat,
  inferFormat,
  parseDocument,
  stemOf,
  stringifyDocument,
} from './format.js';
import { type TestCaseFile, testSetFileSchema } from './schema.js';

export interface LoadOptions {
  /** File format. If not specified, inferred from file extension. */
  fmt?: FileFormat;
  /** Used when the file has no `id`. Defaults to the name. */
  defaultId?: string;
  /** Used when the file has no `name`. */
  defaultName?: string;
}

/**
 * Load a TestSet from a file. The file stem names sets that carry no name.
 */
export function loadTestSetFromFile(path: string, opts?: LoadOptions): TestSet {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadTestSetFromText(content, { ...opts, fmt, defaultName: opts?.defaultName ?? stemOf(path) });
}

export function loadTestSetFromText(content: string, opts?: LoadOptions): TestSet {
  return loadTestSetFromObject(parseDocument(content, opts?.fmt ?? 'yaml'), opts);
}

/**
 * Load a TestSet from a plain object (after parsing YAML/JSON). Cases
 * without an id are numbered `case-1`, `case-2`, ... by position.
 */
export function loadTestSetFromObject(data: unknown, opts?: LoadOptions): TestSet {
  const parsed = testSetFileSchema.parse(data);
  const name = parsed.name ?? opts?.defaultName ?? 'test-set';
  const id = parsed.id ?? opts?.defaultId ?? name;

  const seen = new Set<string>();
  const cases = parsed.cases.map((row, index) => {
    const testCase = caseFromFile(row, id, row.id ?? `case-${index + 1}`);
    if (seen.has(testCase.id)) {
      throw new Error(`Duplicate case id '${testCase.id}' in test set '${name}'`);
    }
    seen.add(testCase.id);
    return testCase;
  });

  return { id, name, systemType: parsed.system_type, cases };
}

function caseFromFile(row: TestCaseFile, testSetId: string, id: string): TestCase {
  return {
    id,
    testSetId,
    query: row.query,
    expectedOutput: row.expected_output ?? null,
    groundTruth: row.ground_truth ?? null,
    context: row.context ?? null,
    failureRules: row.failure_rules,
    tags: row.tags,
    expectedLabels: row.expected_labels ?? null,
    expectedRanking: row.expected_ranking ?? null,
    conversationTurns: row.conversation_turns ?? null,
    expectations: row.expectations
      ? {
          expectedToolCalls: row.expectations.expected_tool_calls,
          minSteps: row.expectations.min_steps,
          actualSteps: row.expectations.actual_steps,
          errorsEncountered: row.expectations.errors_encountered,
          errorsRecovered: row.expectations.errors_recovered,
          knowledgeEntities: row.expectations.knowledge_entities,
          requiredKeywords: row.expectations.required_keywords,
          disallowedKeywords: row.expectations.disallowed_keywords,
          testResults: row.expectations.test_results,
          sourceText: row.expectations.source_text,
          positive: row.expectations.positive,
          language: row.expectations.language,
        }
      : null,
  };
}

/**
 * Save a TestSet to a file. Empty and absent fields are left out.
 */
export function saveTestSetToFile(testSet: TestSet, path: string, opts?: { fmt?: FileFormat }): void {
  const fmt = opts?.fmt ?? inferFormat(path);
  writeFileSync(path, stringifyDocument(serializeTestSet(testSet), fmt), 'utf-8');
}

export function serializeTestSet(testSet: TestSet): Record<string, unknown> {
  return {
    id: testSet.id,
    name: testSet.name,
    system_type: testSet.systemType,
    cases: testSet.cases.map(serializeCase),
  };
}

function serializeCase(c: TestCase): Record<string, unknown> {
  const data: Record<string, unknown> = { id: c.id, query: c.query };
  if (c.expectedOutput != null) data.expected_output = c.expectedOutput;
  if (c.groundTruth != null) data.ground_truth = c.groundTruth;
  if (c.context != null) data.context = c.context;
  if (c.failureRules.length > 0) data.failure_rules = c.failureRules;
  if (c.tags.length > 0) data.tags = c.tags;
  if (c.expectedLabels != null) data.expected_labels = c.expectedLabels;
  if (c.expectedRanking != null) data.expected_ranking = c.expectedRanking;
  if (c.conversationTurns != null) data.conversation_turns = c.conversationTurns;
  if (c.expectations != null) {
    const expectations = serializeExpectations(c.expectations);
    if (Object.keys(expectations).length > 0) data.expectations = expectations;
  }
  return data;
}

function serializeExpectations(e: CaseExpectations): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    expected_tool_calls: e.expectedToolCalls,
    min_steps: e.minSteps,
    actual_steps: e.actualSteps,
    errors_encountered: e.errorsEncountered,
    errors_recovered: e.errorsRecovered,
    knowledge_entities: e.knowledgeEntities,
    required_keywords: e.requiredKeywords,
    disallowed_keywords: e.disallowedKeywords,
    test_results: e.testResults,
    source_text: e.sourceText,
    positive: e.positive,
    language: e.language,
  };
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}
