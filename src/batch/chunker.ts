/**
 * Splitting batch requests into service-sized pieces.
 */

import { MapperError } from '../error/error.js';

/**
 * Keys per BatchGetItem request
 */
export const BATCH_GET_ITEM_CHUNK_SIZE = 100;

/**
 * Splits an array into chunks of at most `size` items.
 *
 * @example
 * ```typescript
 * chunk([1, 2, 3, 4, 5], 2);
 * // [[1, 2], [3, 4], [5]]
 * ```
 */
export function chunk<T>(array: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new MapperError({ code: 'InvalidArgument', message: `Chunk size must be a positive integer, got ${size}` });
  }

  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}
