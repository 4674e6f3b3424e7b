/**
 * Result Limiting
 */

import { McpError } from '../shared/errors/index.js';

function* take<T>(items: Iterable<T>, n: number): Generator<T> {
  let count = 0;
  for (const item of items) {
    yield item;
    count++;
    // Stop before pulling another item from upstream
    if (count >= n) {
      return;
    }
  }
}

/**
 * Yield at most `n` items, lazily.
 *
 * When `n` is 0, null or undefined the input is returned as is (no limit).
 *
 * @throws McpError with code INVALID_ARGUMENT if `n` is negative or fractional
 */
export function limit<T>(items: Iterable<T>, n?: number | null): Iterable<T> {
  if (n === undefined || n === null || n === 0) {
    return items;
  }
  if (!Number.isInteger(n) || n < 0) {
    throw McpError.invalidArgument(`Limit must be a non-negative integer, got ${n}`, { limit: n });
  }
  return take(items, n);
}
