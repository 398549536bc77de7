/**
 * Array Utility Functions
 *
 * Generic helpers for array manipulation.
 *
 * @module utils/array_utils
 */

/**
 * Collects the defined, non-empty ids once each, keeping first-seen order.
 *
 * @example
 * uniqueValues(['u1', null, 'u2', 'u1']) // ['u1', 'u2']
 */
export function uniqueValues(values: Array<string | null | undefined>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== null && value !== undefined && value !== '') {
      seen.add(value);
    }
  }
  return Array.from(seen);
}

/**
 * Sorts a copy of `items` by an ISO timestamp field.
 */
export function sortByTimestamp<T>(
  items: T[],
  pick: (item: T) => string,
  direction: 'asc' | 'desc'
): T[] {
  const sign = direction === 'asc' ? 1 : -1;
  return [...items].sort((a, b) => sign * pick(a).localeCompare(pick(b)));
}
