import { type ChatResponder, ChatSessionAdapter } from './chat-session.js';
import { AdapterRegistry } from './registry.js';
import { ReplayAdapter } from './replay.js';

export type { ChatResponder, ChatSessionAdapterOptions } from './chat-session.js';
export { ChatSessionAdapter, DEFAULT_SESSION_TTL_MS } from './chat-session.js';
export { AdapterRegistry, DEFAULT_ADAPTER_ENVIRONMENT } from './registry.js';
export type { ReplayOptions } from './replay.js';
export { ReplayAdapter, replayOptionsSchema } from './replay.js';
export type { SessionStoreOptions } from './session-store.js';
export { SessionStore } from './session-store.js';
export type {
  AdapterEnvironment,
  AdapterFactory,
  AdapterToolCall,
  PipelineAdapter,
  PipelineContext,
  PipelineOutput,
} from './types.js';
export { parsePipelineOutput } from './types.js';

export interface DefaultAdapterOptions {
  /** Registers `chat-session` around this responder. */
  chatResponder?: ChatResponder;
}

/**
 * A registry holding the built-in adapters: `replay`, and `chat-session`
 * when a responder is given.
 */
export function createDefaultAdapterRegistry(opts: DefaultAdapterOptions = {}): AdapterRegistry {
  const registry = new AdapterRegistry().register('replay', (options) =>
    ReplayAdapter.fromOptions(options),
  );
  if (opts.chatResponder) {
    registry.register('chat-session', ChatSessionAdapter.factory(opts.chatResponder));
  }
  return registry;
}
