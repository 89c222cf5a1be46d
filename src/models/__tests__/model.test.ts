/**
 * Tests for BaseModel and staged actions
 */

import { describe, it, expect, vi } from 'vitest';
import { BaseModel, isModelClass, metaOf, pendingAction, stageAction } from '../model.js';
import { add, del, remove, set } from '../actions.js';
import { InvalidModelError } from '../../error/categories.js';
import { User } from '../../testing/fixtures.js';

const { age, tags, visits } = User.meta.columns;

describe('BaseModel', () => {
  it('should store column values from the constructor', () => {
    const user = new User({ id: 'u1', age: 3 });

    expect(user.id).toBe('u1');
    expect(user.age).toBe(3);
    expect(user.email).toBeUndefined();
    expect('age' in user).toBe(true);
    expect('email' in user).toBe(false);
  });

  it('should delete a column set to a missing value', () => {
    const user = new User({ id: 'u1', age: 3 });
    user.age = undefined;

    expect('age' in user).toBe(false);
  });

  it('should notify observers of every column change', () => {
    const observer = vi.fn();
    const unsubscribe = User.meta.observe(observer);
    try {
      const user = new User({ id: 'u1' });
      user.age = 4;
      delete user.age;

      expect(observer).toHaveBeenCalledTimes(3);
      expect(observer).toHaveBeenNthCalledWith(2, user, age, 4);
      expect(observer).toHaveBeenNthCalledWith(3, user, age, undefined);
    } finally {
      unsubscribe();
    }
  });

  it('should stop notifying after unsubscribing', () => {
    const observer = vi.fn();
    User.meta.observe(observer)();

    new User({ id: 'u1' });

    expect(observer).not.toHaveBeenCalled();
  });

  it('should describe itself by its stored columns', () => {
    expect(new User({ id: 'u1', age: 3 }).toString()).toBe('User(id=u1, age=3)');
  });

  it('should find the meta of a class and its objects', () => {
    class Plain {}

    expect(metaOf(User)).toBe(User.meta);
    expect(metaOf(new User({ id: 'u1' }))).toBe(User.meta);
    expect(() => metaOf(Plain)).toThrow(InvalidModelError);
  });

  it('should only accept classes that declare their own meta', () => {
    class Admin extends User {}

    expect(isModelClass(User)).toBe(true);
    expect(isModelClass(Admin)).toBe(false);
    expect(isModelClass(BaseModel)).toBe(false);
    expect(isModelClass({})).toBe(false);
  });
});

describe('stageAction', () => {
  it('should apply set and remove immediately', () => {
    const user = new User({ id: 'u1' });

    stageAction(user, 'age', set(5));
    expect(user.age).toBe(5);

    stageAction(user, 'age', remove());
    expect(user.age).toBeUndefined();
    expect(pendingAction(user, age)).toBeUndefined();
  });

  it('should keep add and delete pending', () => {
    const user = new User({ id: 'u1' });

    stageAction(user, 'visits', add(1));
    stageAction(user, 'tags', del(new Set(['old'])));

    expect(pendingAction(user, visits)?.type).toBe('add');
    expect(pendingAction(user, tags)?.value).toEqual(new Set(['old']));
    expect(user.visits).toBeUndefined();
  });

  it('should stage an action assigned to a field', () => {
    const user = new User({ id: 'u1' });
    Reflect.set(user, 'visits', add(2));

    expect(pendingAction(user, visits)?.value).toBe(2);
  });

  it('should drop a pending action when the field is assigned', () => {
    const user = new User({ id: 'u1' });
    stageAction(user, 'visits', add(1));
    user.visits = 10;

    expect(pendingAction(user, visits)).toBeUndefined();
  });

  it('should only add to numbers and sets', () => {
    const user = new User({ id: 'u1' });

    expect(() => stageAction(user, 'email', add('x'))).toThrow(
      "Can't ADD to email: only numbers and sets support ADD"
    );
  });

  it('should only delete from sets', () => {
    const user = new User({ id: 'u1' });

    expect(() => stageAction(user, 'visits', del(new Set([1])))).toThrow(
      "Can't DELETE from visits: only sets support DELETE"
    );
  });

  it('should require a value for add', () => {
    const user = new User({ id: 'u1' });

    expect(() => stageAction(user, 'visits', add(undefined))).toThrow('ADD on visits needs a value');
  });
});
