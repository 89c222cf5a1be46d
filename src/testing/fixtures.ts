/**
 * Test models and stream record builders.
 */

import type { RawStreamRecord, StreamEventName } from '../session/types.js';
import type { AttributeMap } from '../typedefs/wire.js';
import { BaseModel } from '../models/model.js';
import { Column } from '../models/column.js';
import { defineMeta } from '../models/meta.js';
import { GlobalSecondaryIndex, LocalSecondaryIndex } from '../models/indexes.js';
import { DateTimeType, IntegerType, StringType } from '../typedefs/scalars.js';
import { ListType, MapType, SetType } from '../typedefs/collections.js';

export class User extends BaseModel {
  static readonly meta = defineMeta({
    tableName: 'users',
    columns: {
      id: new Column(new StringType(), { hashKey: true }),
      email: new Column(new StringType()),
      age: new Column(new IntegerType()),
      joined: new Column(new DateTimeType(), { name: 'j' }),
      tags: new Column(new SetType(new StringType())),
      visits: new Column(new IntegerType()),
      profile: new Column(new MapType({ bio: new StringType(), links: new ListType(new StringType()) })),
    },
    indexes: {
      byEmail: new GlobalSecondaryIndex({ hashKey: 'email', projection: 'keys' }),
    },
    stream: { include: ['new', 'old'] },
  });

  declare id: string;
  declare email?: string;
  declare age?: number;
  declare joined?: Date;
  declare tags?: Set<string>;
  declare visits?: number;
  declare profile?: { bio?: string; links?: string[] };
}

export class Tweet extends BaseModel {
  static readonly meta = defineMeta({
    tableName: 'tweets',
    columns: {
      account: new Column(new StringType(), { hashKey: true }),
      id: new Column(new StringType(), { rangeKey: true }),
      content: new Column(new StringType()),
      createdAt: new Column(new DateTimeType()),
      likes: new Column(new IntegerType()),
    },
    indexes: {
      byCreation: new LocalSecondaryIndex({ rangeKey: 'createdAt', projection: 'keys' }),
      byContent: new GlobalSecondaryIndex({ hashKey: 'content', projection: ['likes'] }),
    },
  });

  declare account: string;
  declare id: string;
  declare content?: string;
  declare createdAt?: Date;
  declare likes?: number;
}

export interface StreamRecordFields {
  sequenceNumber: string;
  createdAt: Date;
  eventName?: StreamEventName;
  keys?: AttributeMap;
  newImage?: AttributeMap;
  oldImage?: AttributeMap;
}

/**
 * A GetRecords entry; the event id is derived from the sequence number.
 */
export function streamRecord(fields: StreamRecordFields): RawStreamRecord {
  return {
    eventID: `event-${fields.sequenceNumber}`,
    eventName: fields.eventName ?? 'INSERT',
    eventVersion: '1.1',
    dynamodb: {
      ApproximateCreationDateTime: fields.createdAt,
      SequenceNumber: fields.sequenceNumber,
      Keys: fields.keys,
      NewImage: fields.newImage,
      OldImage: fields.oldImage,
    },
  };
}
