/**
 * Tests for ReferenceTracker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReferenceTracker } from '../reference.js';
import { InvalidConditionError, InvalidModelError } from '../../error/categories.js';
import { User } from '../../testing/fixtures.js';

const { age, email, profile } = User.meta.columns;

describe('ReferenceTracker', () => {
  let tracker: ReferenceTracker;

  beforeEach(() => {
    tracker = new ReferenceTracker();
  });

  describe('nameRef', () => {
    it('should allocate a name placeholder for a column', () => {
      const ref = tracker.nameRef(email);

      expect(ref.name).toBe('#n0');
      expect(tracker.attributeNames).toEqual({ '#n0': 'email' });
    });

    it('should reuse the placeholder for the same attribute name', () => {
      tracker.nameRef(email);
      const again = tracker.nameRef(email);

      expect(again.name).toBe('#n0');
      expect(tracker.valueRef(age, [], 30).name).toBe(':v1');
    });

    it('should use the wire name of a renamed column', () => {
      tracker.nameRef(User.meta.columns.joined);

      expect(tracker.attributeNames).toEqual({ '#n0': 'j' });
    });

    it('should attach list indexes to the previous segment', () => {
      const ref = tracker.nameRef(profile, ['links', 2]);

      expect(ref.name).toBe('#n0.#n1[2]');
      expect(ref.placeholders).toEqual(['#n0', '#n1']);
      expect(tracker.attributeNames).toEqual({ '#n0': 'profile', '#n1': 'links' });
    });

    it('should reject a negative list index', () => {
      expect(() => tracker.nameRef(profile, ['links', -1])).toThrow(InvalidConditionError);
    });
  });

  describe('valueRef', () => {
    it('should dump values through the column type', () => {
      const ref = tracker.valueRef(age, [], 30);

      expect(ref).toEqual({ kind: 'value', name: ':v0', value: { N: '30' } });
      expect(tracker.attributeValues).toEqual({ ':v0': { N: '30' } });
    });

    it('should dump values through the type at a path', () => {
      tracker.valueRef(profile, ['links', 0], 'https://example.com');

      expect(tracker.attributeValues).toEqual({ ':v0': { S: 'https://example.com' } });
    });

    it('should never de-duplicate values', () => {
      const first = tracker.valueRef(age, [], 1);
      const second = tracker.valueRef(age, [], 1);

      expect(first.name).toBe(':v0');
      expect(second.name).toBe(':v1');
    });

    it('should leave a missing value out of the emitted values', () => {
      const ref = tracker.valueRef(email, [], undefined);

      expect(ref.value).toBeUndefined();
      expect(tracker.attributeValues).toEqual({});
    });

    it('should take dumped values as they are', () => {
      tracker.valueRef(age, [], { N: '7' }, { dumped: true });

      expect(tracker.attributeValues).toEqual({ ':v0': { N: '7' } });
    });

    it('should reject a value the column type does not accept', () => {
      expect(() => tracker.valueRef(age, [], 'thirty')).toThrow(InvalidModelError);
    });
  });

  describe('popRefs', () => {
    it('should keep a shared name until every reference is released', () => {
      const first = tracker.nameRef(email);
      const second = tracker.nameRef(email);

      tracker.popRefs(first);
      expect(tracker.attributeNames).toEqual({ '#n0': 'email' });

      tracker.popRefs(second);
      expect(tracker.attributeNames).toEqual({});
    });

    it('should ignore a reference released twice', () => {
      const first = tracker.nameRef(email);
      tracker.nameRef(email);

      tracker.popRefs(first);
      tracker.popRefs(first);

      expect(tracker.attributeNames).toEqual({ '#n0': 'email' });
    });

    it('should release values', () => {
      const ref = tracker.valueRef(age, [], 3);
      tracker.popRefs(ref);

      expect(tracker.attributeValues).toEqual({});
    });

    it('should never reissue a released index', () => {
      tracker.popRefs(tracker.nameRef(email));

      expect(tracker.nameRef(email).name).toBe('#n1');
    });
  });

  describe('rollback', () => {
    it('should release everything allocated since the checkpoint', () => {
      tracker.nameRef(age);
      const mark = tracker.checkpoint();
      tracker.nameRef(email);
      tracker.valueRef(email, [], 'user@example.com');

      tracker.rollback(mark);

      expect(tracker.attributeNames).toEqual({ '#n0': 'age' });
      expect(tracker.attributeValues).toEqual({});
    });
  });
});
