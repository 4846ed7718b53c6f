/**
 * Averaging helpers shared by metric families and the run aggregator.
 */

import type { MetricMap } from '../types.js';
import { isFiniteNumber } from '../types.js';

/** Metrics where a lower value is better; gates and composites invert them. */
export const LOWER_IS_BETTER: ReadonlySet<string> = new Set(['ter', 'toxicity_score', 'injection_risk']);

/**
 * Arithmetic mean of the finite numbers in `values`, or null if there are none.
 */
export function meanOfFinite(values: Iterable<unknown>): number | null {
  let sum = 0;
  let count = 0;
  for (const value of values) {
    if (isFiniteNumber(value)) {
      sum += value;
      count++;
    }
  }
  return count > 0 ? sum / count : null;
}

/**
 * Average several metric maps key by key. A key with no finite observation
 * averages to null. Non-numeric values (labels, issue lists) are dropped.
 */
export function averageMetricMaps(maps: readonly MetricMap[], keys?: readonly string[]): MetricMap {
  const names = keys ?? [...new Set(maps.flatMap((m) => Object.keys(m)))];
  const averaged: MetricMap = {};
  for (const name of names) {
    const observed = maps.map((m) => m[name]);
    if (observed.some((v) => v !== null && v !== undefined && typeof v !== 'number')) {
      continue;
    }
    averaged[name] = meanOfFinite(observed);
  }
  return averaged;
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}
