/**
 * Key sequencing for wildcard key patterns.
 *
 * A `?` in a key is replaced with a UTC timestamp (`YYYYMMDDhhmmss.mmm`), so
 * keys generated from one pattern sort in the order they were created. Two
 * resolutions within the same millisecond produce the same key.
 */

export const KEY_WILDCARD = '?';

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/**
 * Format a date as `YYYYMMDDhhmmss.mmm` in UTC.
 */
export function formatSequence(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1, 2) +
    pad(date.getUTCDate(), 2) +
    pad(date.getUTCHours(), 2) +
    pad(date.getUTCMinutes(), 2) +
    pad(date.getUTCSeconds(), 2) +
    '.' +
    pad(date.getUTCMilliseconds(), 3)
  );
}

/**
 * Replace the first `?` in `pattern` with the current timestamp. Patterns
 * without a wildcard are returned unchanged.
 *
 * @example
 * ```typescript
 * resolveKey('ITEM_?'); // 'ITEM_20240131093015.042'
 * resolveKey('OPT_1');  // 'OPT_1'
 * ```
 */
export function resolveKey(pattern: string, now: () => Date = () => new Date()): string {
  const index = pattern.indexOf(KEY_WILDCARD);
  if (index < 0) {
    return pattern;
  }
  return pattern.slice(0, index) + formatSequence(now()) + pattern.slice(index + KEY_WILDCARD.length);
}
