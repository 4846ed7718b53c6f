/**
 * Multi-turn adapter around a responder function.
 *
 * Dialogue history is kept per run, so consecutive cases of one run continue
 * the same conversation. A case that brings its own turns starts over from
 * them. Cases of a run must therefore be scored in order.
 */

import { incrementCaseMetric, setCaseAttribute } from '../context.js';
import type { ConversationTurn } from '../types.js';
import { SessionStore } from './session-store.js';
import type {
  AdapterFactory,
  PipelineAdapter,
  PipelineContext,
  PipelineOutput,
} from './types.js';

export type ChatResponder = (
  query: string,
  history: readonly ConversationTurn[],
  context: PipelineContext,
) => Promise<string> | string;

export interface ChatSessionAdapterOptions {
  respond: ChatResponder;
  /** Idle time after which a run's dialogue is dropped. */
  sessionTtlMs?: number;
  sessions?: SessionStore<ConversationTurn[]>;
}

export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

export class ChatSessionAdapter implements PipelineAdapter {
  private readonly respond: ChatResponder;
  private readonly sessions: SessionStore<ConversationTurn[]>;

  /**
   * A registry factory; the session TTL comes from the engine's settings.
   */
  static factory(respond: ChatResponder): AdapterFactory {
    return (_options, env) => new ChatSessionAdapter({ respond, sessionTtlMs: env.sessionTtlMs });
  }

  constructor(opts: ChatSessionAdapterOptions) {
    this.respond = opts.respond;
    this.sessions =
      opts.sessions ??
      new SessionStore<ConversationTurn[]>({ ttlMs: opts.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS });
    this.sessions.start();
  }

  async run(query: string, context: PipelineContext): Promise<PipelineOutput> {
    const history =
      context.conversationTurns.length > 0
        ? [...context.conversationTurns]
        : (this.sessions.get(context.runId) ?? []);
    const answer = await this.respond(query, history, context);
    const updated: ConversationTurn[] = [
      ...history,
      { role: 'user', content: query },
      { role: 'assistant', content: answer },
    ];
    this.sessions.set(context.runId, updated);

    const turnNumber = updated.filter((t) => t.role === 'assistant').length;
    setCaseAttribute('session_id', context.runId);
    incrementCaseMetric('turns', 1);
    return {
      answer,
      retrievedContexts: [],
      toolCalls: [],
      metadata: { session_id: context.runId, turn_number: turnNumber },
      turnHistory: updated,
    };
  }

  /**
   * Forget a run's dialogue.
   */
  endSession(runId: string): boolean {
    return this.sessions.delete(runId);
  }

  close(): void {
    this.sessions.close();
  }
}
