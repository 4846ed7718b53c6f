/**
 * Base class for metric families.
 *
 * A family scores one sample into a flat metric map and averages a batch.
 * Families are configured through constructor options and serialise to a
 * MetricFamilySpec so a run's pipeline_config records exactly how its
 * metrics were computed.
 */

import type { MetricFamilySpec, MetricMap } from '../types.js';
import { isRecord } from '../types.js';
import { averageMetricMaps } from './batch.js';

export abstract class MetricFamily<TSample> {
  /**
   * Name used in specs and registries. Defaults to the constructor name.
   */
  static getSerializationName(): string {
    // biome-ignore lint/complexity/noThisInStatic: `this` refers to the subclass
    return this.name;
  }

  getSerializationName(): string {
    return this.constructor.name;
  }

  /**
   * Metric names this family produces, with the value an empty batch yields.
   */
  abstract zeroMetrics(): MetricMap;

  abstract evaluate(sample: TSample): MetricMap;

  /**
   * Average per-sample maps, skipping missing and non-finite values.
   * An empty batch yields `zeroMetrics()`.
   */
  evaluateBatch(samples: readonly TSample[]): MetricMap {
    if (samples.length === 0) {
      return this.zeroMetrics();
    }
    return averageMetricMaps(
      samples.map((sample) => this.evaluate(sample)),
      Object.keys(this.zeroMetrics()),
    );
  }

  /**
   * Constructor options that define this instance. Override in subclasses.
   */
  protected getFields(): Record<string, unknown> {
    return {};
  }

  /**
   * Default values of the fields. Override in subclasses.
   */
  protected getDefaults(): Record<string, unknown> {
    return {};
  }

  /**
   * The fields that differ from their defaults.
   */
  buildSerializationArguments(): Record<string, unknown> {
    const defaults = this.getDefaults();
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.getFields())) {
      if (key in defaults && deepEqual(value, defaults[key])) {
        continue;
      }
      result[key] = value;
    }
    return result;
  }

  asSpec(): MetricFamilySpec {
    const args = this.buildSerializationArguments();
    return {
      name: this.getSerializationName(),
      arguments: Object.keys(args).length === 0 ? null : args,
    };
  }

  toString(): string {
    const argStr = Object.entries(this.buildSerializationArguments())
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(', ');
    return `${this.getSerializationName()}(${argStr})`;
  }
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((val, i) => deepEqual(val, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    return (
      aKeys.length === Object.keys(b).length && aKeys.every((key) => deepEqual(a[key], b[key]))
    );
  }
  return false;
}
