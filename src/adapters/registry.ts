/**
 * Adapters are looked up by a stable identifier, never by module path.
 */

import { UnregisteredAdapterError } from '../errors.js';
import { DEFAULT_SESSION_TTL_MS } from './chat-session.js';
import type { AdapterEnvironment, AdapterFactory, PipelineAdapter } from './types.js';

export const DEFAULT_ADAPTER_ENVIRONMENT: AdapterEnvironment = {
  sessionTtlMs: DEFAULT_SESSION_TTL_MS,
};

export class AdapterRegistry {
  private readonly factories = new Map<string, AdapterFactory>();

  register(id: string, factory: AdapterFactory): this {
    if (this.factories.has(id)) {
      throw new Error(`Duplicate adapter id: '${id}'`);
    }
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  ids(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build an adapter. Unknown ids fail with UnregisteredAdapterError.
   */
  create(
    id: string,
    options: Record<string, unknown> = {},
    env: AdapterEnvironment = DEFAULT_ADAPTER_ENVIRONMENT,
  ): PipelineAdapter {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new UnregisteredAdapterError(id, this.ids());
    }
    return factory(options, env);
  }
}
