/**
 * Tests for ExpressionRenderer
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ExpressionRenderer } from '../renderer.js';
import { ChangeTracker } from '../../tracking/tracker.js';
import { stageAction } from '../../models/model.js';
import { add, del } from '../../models/actions.js';
import { InvalidConditionError } from '../../error/categories.js';
import { User } from '../../testing/fixtures.js';

const { age, email, id } = User.meta.columns;

describe('ExpressionRenderer', () => {
  let tracker: ChangeTracker;
  let renderer: ExpressionRenderer;
  let unsubscribe: () => void;

  beforeEach(() => {
    tracker = new ChangeTracker();
    renderer = new ExpressionRenderer(tracker);
    unsubscribe = User.meta.observe((obj, column) => tracker.mark(obj, column));
  });

  afterEach(() => {
    unsubscribe();
  });

  describe('update', () => {
    it('should set changed values and remove deleted ones', () => {
      const user = new User({ id: 'u1' });
      user.age = 30;
      delete user.email;

      expect(renderer.render(user, { update: true })).toEqual({
        UpdateExpression: 'SET #n0=:v1 REMOVE #n2',
        ExpressionAttributeNames: { '#n0': 'age', '#n2': 'email' },
        ExpressionAttributeValues: { ':v1': { N: '30' } },
      });
    });

    it('should render actions after set and remove', () => {
      const user = new User({ id: 'u1' });
      user.age = 30;
      delete user.email;
      stageAction(user, 'visits', add(2));
      stageAction(user, 'tags', del(new Set(['old'])));

      expect(renderer.render(user, { update: true })).toEqual({
        UpdateExpression: 'SET #n0=:v1 REMOVE #n2 ADD #n5 :v6 DELETE #n3 :v4',
        ExpressionAttributeNames: { '#n0': 'age', '#n2': 'email', '#n3': 'tags', '#n5': 'visits' },
        ExpressionAttributeValues: { ':v1': { N: '30' }, ':v4': { SS: ['old'] }, ':v6': { N: '2' } },
      });
    });

    it('should never update key columns', () => {
      const user = new User({ id: 'u1' });

      expect(renderer.render(user, { update: true })).toEqual({});
    });

    it('should remove a collection that was emptied', () => {
      const user = new User({ id: 'u1', tags: new Set() });

      expect(renderer.render(user, { update: true }).UpdateExpression).toBe('REMOVE #n0');
    });
  });

  describe('condition', () => {
    it('should render the condition before the update', () => {
      const user = new User({ id: 'u1', age: 30 });

      expect(renderer.render(user, { condition: age.lt(30), update: true })).toEqual({
        ConditionExpression: '(#n0 < :v1)',
        UpdateExpression: 'SET #n0=:v2',
        ExpressionAttributeNames: { '#n0': 'age' },
        ExpressionAttributeValues: { ':v1': { N: '30' }, ':v2': { N: '30' } },
      });
    });

    it('should add the snapshot to the condition when atomic', () => {
      const user = new User({ id: 'u1', email: 'user@example.com' });
      tracker.sync(user);
      user.age = 31;

      expect(renderer.render(user, { condition: id.exists(), atomic: true })).toEqual({
        ConditionExpression: '((attribute_exists(#n0)) AND (#n1 = :v2))',
        ExpressionAttributeNames: { '#n0': 'id', '#n1': 'email' },
        ExpressionAttributeValues: { ':v2': { S: 'user@example.com' } },
      });
    });

    it('should expect a missing item for an object that was never synced', () => {
      const user = new User({ id: 'u1' });

      const rendered = renderer.render(user, { atomic: true });

      expect(rendered.ConditionExpression).toContain('(attribute_not_exists(#n4))');
      expect(rendered.ExpressionAttributeNames?.['#n4']).toBe('id');
      expect(rendered.ExpressionAttributeValues).toBeUndefined();
    });

    it('should require an object for atomic conditions and updates', () => {
      expect(() => renderer.render(undefined, { atomic: true })).toThrow(InvalidConditionError);
      expect(() => renderer.render(undefined, { update: true })).toThrow(InvalidConditionError);
    });
  });

  describe('search expressions', () => {
    it('should render the filter before the key condition', () => {
      expect(renderer.render(undefined, { key: id.eq('u1'), filter: age.gt(18) })).toEqual({
        FilterExpression: '(#n0 > :v1)',
        KeyConditionExpression: '(#n2 = :v3)',
        ExpressionAttributeNames: { '#n0': 'age', '#n2': 'id' },
        ExpressionAttributeValues: { ':v1': { N: '18' }, ':v3': { S: 'u1' } },
      });
    });

    it('should render the same condition identically each time', () => {
      const filter = age.gt(18).and(email.beginsWith('a'));
      const other = new ExpressionRenderer(new ChangeTracker());

      const first = renderer.render(undefined, { filter });
      const second = other.render(undefined, { filter });

      expect(first).toEqual({
        FilterExpression: '((#n0 > :v1) AND (begins_with(#n2, :v3)))',
        ExpressionAttributeNames: { '#n0': 'age', '#n2': 'email' },
        ExpressionAttributeValues: { ':v1': { N: '18' }, ':v3': { S: 'a' } },
      });
      expect(second).toEqual(first);
    });

    it('should render equal conditions identically', () => {
      const first = renderer.render(undefined, { filter: age.gt(18).and(email.beginsWith('a')) });
      const second = renderer.render(undefined, { filter: age.gt(18).and(email.beginsWith('a')) });

      expect(second).toEqual(first);
    });

    it('should render projections without duplicates', () => {
      expect(renderer.render(undefined, { projection: [email, age, email] })).toEqual({
        ProjectionExpression: '#n0, #n1',
        ExpressionAttributeNames: { '#n0': 'email', '#n1': 'age' },
      });
    });

    it('should reject an empty projection', () => {
      expect(() => renderer.render(undefined, { projection: [] })).toThrow(InvalidConditionError);
    });

    it('should render nothing when nothing is requested', () => {
      expect(renderer.render(undefined, {})).toEqual({});
    });
  });
});
