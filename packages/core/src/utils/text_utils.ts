/**
 * Text helpers for task result output.
 *
 * @module utils/text_utils
 */

import { isValidTimestamp } from './time_utils';

/**
 * ISO 8601 timestamps as printed by the workflow steps:
 * YYYY-MM-DDTHH:MM:SS, optional fraction, then `Z` or `±HH:MM`.
 */
const ISO_TIMESTAMP_PATTERN = /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})/g;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

export const EMAIL_REDACTED = '[EMAIL_REDACTED]';

function findTimestamps(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }
  return (text.match(ISO_TIMESTAMP_PATTERN) ?? []).filter(isValidTimestamp);
}

/**
 * Returns the first valid ISO 8601 timestamp in `text`, or null.
 * Timestamp-shaped text naming no real date (`2025-13-45T...`) is skipped.
 *
 * @example
 * extractStartTimestamp('2025-11-27T21:54:22Z start\n2025-11-27T22:10:00Z done') // '2025-11-27T21:54:22Z'
 */
export function extractStartTimestamp(text: string | null | undefined): string | null {
  return findTimestamps(text)[0] ?? null;
}

/**
 * Returns the last valid ISO 8601 timestamp in `text`, or null.
 */
export function extractEndTimestamp(text: string | null | undefined): string | null {
  const timestamps = findTimestamps(text);
  return timestamps[timestamps.length - 1] ?? null;
}

/**
 * Redacts e-mail addresses before text is written to a shared repository.
 *
 * @example
 * maskSensitiveData('Owner updated to user@example.com') // 'Owner updated to [EMAIL_REDACTED]'
 */
export function maskSensitiveData(text: string): string;
export function maskSensitiveData(text: null): null;
export function maskSensitiveData(text: string | null): string | null;
export function maskSensitiveData(text: string | null): string | null {
  if (text === null) {
    return null;
  }
  return text.replace(EMAIL_PATTERN, EMAIL_REDACTED);
}
