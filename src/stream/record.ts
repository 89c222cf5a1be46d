/**
 * Stream records, reshaped from GetRecords output.
 * @module stream/record
 */

import type { AttributeMap } from '../typedefs/wire.js';
import type { RawStreamRecord } from '../session/types.js';

export type StreamEventType = 'insert' | 'modify' | 'remove';

export interface RecordMeta {
  createdAt: Date;
  sequenceNumber: string;
  event: {
    id: string;
    type: StreamEventType;
    version: string;
  };
}

/**
 * One change, with its images still in wire format.
 */
export interface StreamRecord {
  key: AttributeMap | null;
  new: AttributeMap | null;
  old: AttributeMap | null;
  meta: RecordMeta;
}

const EVENT_TYPES: Record<RawStreamRecord['eventName'], StreamEventType> = {
  INSERT: 'insert',
  MODIFY: 'modify',
  REMOVE: 'remove',
};

export function reformatRecord(record: RawStreamRecord): StreamRecord {
  return {
    key: record.dynamodb.Keys ?? null,
    new: record.dynamodb.NewImage ?? null,
    old: record.dynamodb.OldImage ?? null,
    meta: {
      createdAt: record.dynamodb.ApproximateCreationDateTime,
      sequenceNumber: record.dynamodb.SequenceNumber,
      event: {
        id: record.eventID,
        type: EVENT_TYPES[record.eventName],
        version: record.eventVersion,
      },
    },
  };
}

/**
 * Orders sequence numbers, which are decimal strings of varying length.
 */
export function compareSequenceNumbers(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
