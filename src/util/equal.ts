/**
 * Structural equality over the values stored in models and conditions:
 * primitives, Dates, byte arrays, Sets, arrays and plain objects.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }

  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array && b instanceof Uint8Array) || a.length !== b.length) {
      return false;
    }
    return a.every((byte, i) => byte === b[i]);
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set && b instanceof Set) || a.size !== b.size) {
      return false;
    }
    for (const item of a) {
      if (!b.has(item) && ![...b].some(other => deepEqual(item, other))) {
        return false;
      }
    }
    return true;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!(Array.isArray(a) && Array.isArray(b)) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  const aKeys = Object.keys(a).filter(key => Reflect.get(a, key) !== undefined);
  const bKeys = Object.keys(b).filter(key => Reflect.get(b, key) !== undefined);
  if (aKeys.length !== bKeys.length) {
    return false;
  }
  return aKeys.every(key => bKeys.includes(key) && deepEqual(Reflect.get(a, key), Reflect.get(b, key)));
}
