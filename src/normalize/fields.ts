import type { RawRecord } from '../types/payload';

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Integer column: truncates floats, `undefined` when the value is not numeric. */
export function toInt(value: unknown): number | undefined {
  const n = toNumber(value);
  return n === null ? undefined : Math.trunc(n);
}

/** Float column: NaN, infinities and missing values all become `null`. */
export function toFloat(value: unknown): number | null {
  return toNumber(value);
}

export function toBool(value: unknown, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  return Boolean(value);
}

/**
 * Resolve a `{ value, displayName }` descriptor to its display name.
 * Plain values pass through untouched; missing values become `null`.
 */
export function displayName(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (isRecord(value)) return value.displayName ?? null;
  return value;
}
