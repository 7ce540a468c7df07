import { describe, test, expect } from 'vitest';
import { EntityIdAllocator } from './entity-id';
import { INDEX_BITS } from './constants';

describe('EntityIdAllocator', () => {
  test('allocates sequential indices', () => {
    const ids = new EntityIdAllocator();
    expect(ids.allocate()).toBe(0);
    expect(ids.allocate()).toBe(1);
    expect(ids.getActiveCount()).toBe(2);
  });

  test('reuses the lowest freed index with a bumped generation', () => {
    const ids = new EntityIdAllocator();
    const a = ids.allocate();
    const b = ids.allocate();
    ids.allocate();
    ids.free(b);
    ids.free(a);

    const reused = ids.allocate();
    expect(ids.getIndex(reused)).toBe(0);
    expect(ids.getGeneration(reused)).toBe(1);
    expect(reused).toBe((1 << INDEX_BITS) | 0);
    expect(ids.isValid(a)).toBe(false);
    expect(ids.isValid(reused)).toBe(true);
  });

  test('freeing a stale id does nothing', () => {
    const ids = new EntityIdAllocator();
    const a = ids.allocate();
    ids.free(a);
    ids.free(a);
    expect(ids.getActiveCount()).toBe(0);
    expect(ids.allocate()).toBe(1 << INDEX_BITS);
    expect(ids.allocate()).toBe(1);
  });

  test('throws when capacity is exhausted', () => {
    const ids = new EntityIdAllocator(2);
    ids.allocate();
    ids.allocate();
    expect(() => ids.allocate()).toThrow(/Entity limit exceeded/);
  });

  test('reset forgets everything', () => {
    const ids = new EntityIdAllocator();
    ids.free(ids.allocate());
    ids.reset();
    expect(ids.allocate()).toBe(0);
  });
});
