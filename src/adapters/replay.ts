/**
 * Answers from stored text instead of calling a pipeline. Used for dry runs
 * and for checking a test set against itself.
 */

import { z } from 'zod';
import { setCaseAttribute } from '../context.js';
import type { PipelineAdapter, PipelineContext, PipelineOutput } from './types.js';

export const replayOptionsSchema = z
  .object({
    /** Recorded answers by test case id; other cases replay their reference text. */
    answers: z.record(z.string(), z.string()).optional(),
  })
  .strict();

export type ReplayOptions = z.infer<typeof replayOptionsSchema>;

export class ReplayAdapter implements PipelineAdapter {
  private readonly answers: Readonly<Record<string, string>>;

  constructor(opts: ReplayOptions = {}) {
    this.answers = opts.answers ?? {};
  }

  static fromOptions(options: Record<string, unknown>): ReplayAdapter {
    return new ReplayAdapter(replayOptionsSchema.parse(options));
  }

  async run(_query: string, context: PipelineContext): Promise<PipelineOutput> {
    const recorded = this.answers[context.testCaseId];
    setCaseAttribute('replay_source', recorded === undefined ? 'reference' : 'recorded');
    return {
      answer: recorded ?? context.reference ?? '',
      retrievedContexts: [...context.contexts],
      toolCalls: [],
      metadata: {},
    };
  }
}
