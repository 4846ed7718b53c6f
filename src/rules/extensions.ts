/**
 * Extension point for `custom` failure rules.
 *
 * Extensions are registered under a stable identifier and selected by the
 * rule's `extension` field.
 */

import { CustomRuleExtensionError } from '../errors.js';
import type { ToolCall } from '../types.js';
import type { FailureRule } from './schema.js';

export interface RuleVerdict {
  passed: boolean;
  reason: string;
}

export interface CustomRuleExtension {
  evaluate(output: string, toolCalls: readonly ToolCall[], rule: FailureRule): RuleVerdict;
}

/**
 * Plain functions are accepted wherever an extension is.
 */
export type CustomRuleFunction = CustomRuleExtension['evaluate'];

export class RuleExtensionRegistry {
  private readonly extensions = new Map<string, CustomRuleExtension>();

  register(id: string, extension: CustomRuleExtension | CustomRuleFunction): this {
    if (this.extensions.has(id)) {
      throw new Error(`Duplicate rule extension id: '${id}'`);
    }
    this.extensions.set(
      id,
      typeof extension === 'function' ? { evaluate: extension } : extension,
    );
    return this;
  }

  has(id: string): boolean {
    return this.extensions.has(id);
  }

  ids(): string[] {
    return [...this.extensions.keys()];
  }

  /**
   * Look up an extension, throwing CustomRuleExtensionError for unknown ids.
   */
  resolve(id: string): CustomRuleExtension {
    const extension = this.extensions.get(id);
    if (!extension) {
      throw new CustomRuleExtensionError(
        id,
        `Rule extension '${id}' is not registered. ` +
          `Registered extensions: ${this.ids().join(', ') || '(none)'}`,
      );
    }
    return extension;
  }
}
