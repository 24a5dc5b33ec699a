// =====================================================
// Field Normalizers
// =====================================================
// Pure, per-field conversions. Bad input becomes null so a
// single odd field never rejects the whole record.

import type { RawRecord } from '../../scouting-api/types';

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(raw: RawRecord, key: string): string | null {
  const value = raw[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function readNumber(raw: RawRecord, key: string): number | null {
  return toNumber(raw[key]);
}

export function readInteger(raw: RawRecord, key: string): number | null {
  const value = toNumber(raw[key]);
  return value !== null && Number.isInteger(value) ? value : null;
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Booleans pass through; "true"/"false" in any case are coerced.
 */
export function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return null;
}

/**
 * Truncate an ISO-8601 timestamp ("1995-06-26T00:00:00") to its
 * date part. Anything that is not a valid calendar date is null.
 */
export function toDateOnly(value: unknown): string | null {
  if (typeof value !== 'string') return null;

  const match = DATE_PREFIX.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  const valid =
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day);

  return valid ? `${year}-${month}-${day}` : null;
}

/**
 * Nested payloads arrive either structured or as JSON text.
 * Both are re-serialized to compact JSON; malformed text is null.
 */
export function toCanonicalJson(value: unknown): string | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'string') {
    if (value.trim() === '') return null;
    try {
      return JSON.stringify(JSON.parse(value));
    } catch {
      return null;
    }
  }

  try {
    return JSON.stringify(value) ?? null;
  } catch {
    return null;
  }
}

/**
 * Parse a nested payload into a structure (for reading ids out of it).
 */
export function parseNested(value: unknown): unknown {
  const json = toCanonicalJson(value);
  return json === null ? null : JSON.parse(json);
}
