/**
 * Zod schemas for the test-set file format.
 *
 * Files use snake_case keys; the loader maps them onto the camelCase
 * TestSet and TestCase records.
 */

import { z } from 'zod';
import { failureRulesSchema } from '../rules/schema.js';
import { SYSTEM_TYPES } from '../types.js';

const stringList = z.array(z.string());

export const toolCallSchema = z
  .object({
    name: z.string(),
    arguments: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export const conversationTurnSchema = z
  .object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
  })
  .strict();

export const expectationsSchema = z
  .object({
    expected_tool_calls: z.array(toolCallSchema).optional(),
    min_steps: z.number().int().nonnegative().optional(),
    actual_steps: z.number().int().nonnegative().optional(),
    errors_encountered: z.number().int().nonnegative().optional(),
    errors_recovered: z.number().int().nonnegative().optional(),
    knowledge_entities: stringList.optional(),
    required_keywords: stringList.optional(),
    disallowed_keywords: stringList.optional(),
    test_results: z.array(z.boolean()).optional(),
    source_text: z.string().optional(),
    positive: z.boolean().optional(),
    language: z.string().optional(),
  })
  .strict();

export const testCaseFileSchema = z
  .object({
    id: z.string().min(1).optional(),
    query: z.string(),
    expected_output: z.string().optional().nullable(),
    ground_truth: z.string().optional().nullable(),
    context: stringList.optional().nullable(),
    failure_rules: failureRulesSchema.optional().default([]),
    tags: stringList.optional().default([]),
    expected_labels: stringList.optional().nullable(),
    expected_ranking: stringList.optional().nullable(),
    conversation_turns: z.array(conversationTurnSchema).optional().nullable(),
    expectations: expectationsSchema.optional().nullable(),
  })
  .strict();

export const testSetFileSchema = z
  .object({
    $schema: z.string().optional(),
    id: z.string().min(1).optional(),
    name: z.string().optional().nullable(),
    system_type: z.enum(SYSTEM_TYPES).optional().default('rag'),
    cases: z.array(testCaseFileSchema),
  })
  .strict();

export type TestCaseFile = z.infer<typeof testCaseFileSchema>;
export type TestSetFile = z.infer<typeof testSetFileSchema>;
