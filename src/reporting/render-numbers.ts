/**
 * Number, percentage and duration formatting for terminal reports.
 */

const VALUE_SIG_FIGS = 3;
const DIFF_SIG_FIGS = 3;
const PERC_DECIMALS = 1;

/**
 * Integers with thousands separators; other values with at least one
 * decimal and three significant figures.
 */
export function renderNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Number.isInteger(value)) return withCommas(value, 0);

  const abs = Math.abs(value);
  const magnitude = Math.floor(Math.log10(abs));
  const decimals =
    abs >= 1 ? Math.max(1, VALUE_SIG_FIGS - (magnitude + 1)) : VALUE_SIG_FIGS - 1 - magnitude;
  return withCommas(value, decimals);
}

/**
 * A 0–1 fraction as a percentage, e.g. `0.875` → `87.5%`.
 */
export function renderPercentage(value: number): string {
  return `${(value * 100).toFixed(PERC_DECIMALS)}%`;
}

/**
 * Signed change from `oldVal` to `newVal`, with the relative change when it
 * is meaningful. Null when nothing changed.
 */
export function renderNumberDiff(oldVal: number, newVal: number): string | null {
  if (oldVal === newVal) return null;
  const delta = newVal - oldVal;
  if (Number.isInteger(oldVal) && Number.isInteger(newVal)) {
    return delta > 0 ? `+${delta}` : `${delta}`;
  }
  let abs = Math.abs(delta).toPrecision(DIFF_SIG_FIGS);
  if (!abs.includes('e') && !abs.includes('.')) abs += '.0';
  const signed = `${delta > 0 ? '+' : '-'}${abs}`;
  if (oldVal === 0) return signed;
  const relative = (delta / Math.abs(oldVal)) * 100;
  const perc = `${relative > 0 ? '+' : ''}${relative.toFixed(PERC_DECIMALS)}%`;
  return perc === '+0.0%' || perc === '-0.0%' ? signed : `${signed} / ${perc}`;
}

/**
 * A duration in milliseconds: `µs` below 1ms, `ms` below 1s, else `s`.
 */
export function renderDuration(ms: number): string {
  if (ms === 0) return '0ms';
  const abs = Math.abs(ms);
  if (abs < 1) return `${withCommas(ms * 1000, 0)}µs`;
  if (abs < 1000) return `${withCommas(ms, 1)}ms`;
  return `${withCommas(ms / 1000, 1)}s`;
}

function withCommas(value: number, decimals: number): string {
  const [intPart = '0', fraction] = Math.abs(value).toFixed(decimals).split('.');
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  return fraction ? `${sign}${grouped}.${fraction}` : `${sign}${grouped}`;
}
