/**
 * Engine: binding, persistence, search and streams.
 * @module engine
 */

export type { EngineOptions, WriteOptions, LoadOptions } from './engine.js';
export { Engine } from './engine.js';
export type { EngineEvents, EngineEvent } from './hooks.js';
export { Hooks } from './hooks.js';
export { createTableRequest, validateTable, isTableActive, streamViewType } from './tables.js';
export type { SearchProjection, ScanOptions, QueryOptions, PreparedSearch, PageFetcher } from './search.js';
export { SearchIterator, validateKeyCondition, prepareQuery, prepareScan, queryPages, scanPages } from './search.js';
