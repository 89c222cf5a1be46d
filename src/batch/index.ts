/**
 * Batch helpers
 */

export { chunk, BATCH_GET_ITEM_CHUNK_SIZE } from './chunker.js';
