/**
 * Tolerant coercion helpers for provider payloads.
 * None of these throw; anything unusable becomes the supplied default.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Finite numbers and numeric strings coerce; everything else is `fallback`. */
export function coerceFloat(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function coerceInt(value: unknown, fallback = 0): number {
  const parsed = coerceFloat(value, Number.NaN);
  return Number.isNaN(parsed) ? fallback : Math.trunc(parsed);
}

export function clamp(value: number, low = 0, high = 1): number {
  return Math.max(low, Math.min(high, value));
}

/** Trimmed string form of a scalar; objects and arrays yield ''. */
export function coerceText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/** Positive integer ids in first-seen order, duplicates dropped. */
export function cleanEvidenceIds(values: unknown): number[] {
  if (!Array.isArray(values)) return [];
  const cleaned: number[] = [];
  for (const value of values) {
    const id = coerceFloat(value, Number.NaN);
    if (Number.isInteger(id) && id > 0 && !cleaned.includes(id)) {
      cleaned.push(id);
    }
  }
  return cleaned;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
