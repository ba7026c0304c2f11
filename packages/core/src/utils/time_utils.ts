/**
 * UTC timestamp in the document format: YYYY-MM-DDTHH:MM:SSZ (no fraction).
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const TIMESTAMP_PARTS = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

/**
 * True when `value` is an ISO 8601 timestamp naming a real instant:
 * `2025-02-29T10:00:00Z` and `2025-01-15T24:00:00Z` are not.
 */
export function isValidTimestamp(value: string): boolean {
  const match = TIMESTAMP_PARTS.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = Number(match[7] ?? 0);
  const offsetMinute = Number(match[8] ?? 0);
  if (year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined || second === undefined) {
    return false;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    hour < 24 && minute < 60 && second < 60 &&
    offsetHour < 24 && offsetMinute < 60;
}
