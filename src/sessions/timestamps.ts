/**
 * Timestamp normalization for history sources that disagree on units.
 */

/** Values above this are taken to be milliseconds. */
const MILLISECOND_THRESHOLD = 1e12;

/**
 * Convert a raw timestamp into whole unix seconds.
 *
 * - numbers: seconds, or milliseconds when above 10^12
 * - digit-only strings: parsed as numbers
 * - ISO-8601 strings: parsed; strings without an offset are read as UTC
 * - anything else: 0
 */
export function normalizeTimestamp(raw: unknown): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw < 0) return 0;
    const value = Math.trunc(raw);
    return value > MILLISECOND_THRESHOLD ? Math.trunc(value / 1000) : value;
  }

  if (typeof raw !== 'string') return 0;

  const cleaned = raw.trim();
  if (cleaned === '') return 0;
  if (/^\d+$/.test(cleaned)) {
    return normalizeTimestamp(Number(cleaned));
  }

  const hasOffset = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(cleaned);
  const hasTime = cleaned.includes('T') || cleaned.includes(' ');
  const iso = hasOffset || !hasTime ? cleaned : `${cleaned}Z`;
  const millis = Date.parse(iso);
  if (Number.isNaN(millis)) return 0;
  return Math.max(0, Math.floor(millis / 1000));
}
