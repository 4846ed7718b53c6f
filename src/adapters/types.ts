/**
 * The contract between the engine and the pipeline under test.
 */

import { z } from 'zod';
import type { ConversationTurn } from '../types.js';

/**
 * A tool call as the pipeline reports it.
 */
export interface AdapterToolCall {
  tool: string;
  args?: Record<string, unknown>;
  result?: unknown;
}

export interface PipelineContext {
  runId: string;
  testCaseId: string;
  /** Contexts stored on the test case, if any. */
  contexts: readonly string[];
  /** Prior dialogue stored on the test case, if any. */
  conversationTurns: readonly ConversationTurn[];
  /** The case's stored expected text; replay adapters answer with it. */
  reference: string | null;
  /** Aborted when the scorer gives up on the call. */
  signal?: AbortSignal;
}

export interface PipelineOutput {
  answer: string;
  retrievedContexts: string[];
  toolCalls: AdapterToolCall[];
  metadata: Record<string, unknown>;
  turnHistory?: ConversationTurn[];
}

const pipelineOutputSchema = z.object({
  answer: z.string(),
  retrievedContexts: z.array(z.string()).default([]),
  toolCalls: z
    .array(
      z.object({
        tool: z.string(),
        args: z.record(z.string(), z.unknown()).optional(),
        result: z.unknown().optional(),
      }),
    )
    .default([]),
  metadata: z.record(z.string(), z.unknown()).default({}),
  turnHistory: z
    .array(z.object({ role: z.enum(['user', 'assistant', 'system']), content: z.string() }))
    .optional(),
});

/**
 * Check what an adapter returned. Missing lists and metadata default to
 * empty; anything else malformed throws.
 */
export function parsePipelineOutput(value: unknown): PipelineOutput {
  const parsed = pipelineOutputSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new Error(`Malformed pipeline output (${issues.join('; ')})`);
  }
  return parsed.data;
}

export interface PipelineAdapter {
  run(query: string, context: PipelineContext): Promise<PipelineOutput>;
  /** Release held resources once the run is over. */
  close?(): Promise<void> | void;
}

/**
 * Process settings an adapter may need when it is built.
 */
export interface AdapterEnvironment {
  sessionTtlMs: number;
}

export type AdapterFactory = (
  options: Record<string, unknown>,
  env: AdapterEnvironment,
) => PipelineAdapter;
