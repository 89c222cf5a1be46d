/**
 * Testing utilities: an in-memory session and shared test models.
 * @module testing
 */

export type { MockOperation, RecordedCall, MockSessionOptions } from './mock.js';
export { MockSession, mockStreamArn } from './mock.js';
export type { StreamRecordFields } from './fixtures.js';
export { User, Tweet, streamRecord } from './fixtures.js';
