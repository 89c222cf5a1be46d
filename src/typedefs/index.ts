/**
 * Type Engine
 *
 * Column types and the engine that dumps and loads their wire values.
 */

export type { BackingType, PathSegment, TypeDefinition, ValueOf } from './types.js';
export {
  StringType,
  UUIDType,
  NumberType,
  IntegerType,
  BinaryType,
  BooleanType,
  DateTimeType,
  TimestampType,
} from './scalars.js';
export type { MapSchema, MapValue } from './collections.js';
export { SetType, ListType, MapType, DynamicMapType } from './collections.js';
export { TypeEngine } from './engine.js';
export type { AttributeMap, WireTag } from './wire.js';
export { isAttributeValue, isAttributeMap, wireTag } from './wire.js';
