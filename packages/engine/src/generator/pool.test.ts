import { describe, expect, it } from 'vitest';

import { DEFAULT_PLATFORM_TUNING } from '@skyclimb/game-spec';

import { createPlatform } from '../platform';

import { PlatformPool } from './pool';

function platform(id: number) {
  return createPlatform(id, { x: 0, y: 0, width: 100, height: 20, kind: 'plain' }, DEFAULT_PLATFORM_TUNING);
}

describe('PlatformPool', () => {
  it('deactivates released platforms and hands them back last in, first out', () => {
    const pool = new PlatformPool(5);
    const first = platform(1);
    const second = platform(2);
    expect(pool.release(first)).toBe(true);
    expect(pool.release(second)).toBe(true);
    expect(first.active).toBe(false);
    expect(pool.take()).toBe(second);
    expect(pool.take()).toBe(first);
    expect(pool.take()).toBeUndefined();
  });

  it('drops platforms beyond its capacity', () => {
    const pool = new PlatformPool(1);
    expect(pool.release(platform(1))).toBe(true);
    const extra = platform(2);
    expect(pool.release(extra)).toBe(false);
    expect(extra.active).toBe(false);
    expect(pool.size).toBe(1);
  });

  it('trims down to the kept count', () => {
    const pool = new PlatformPool(10);
    for (let id = 1; id <= 6; id += 1) {
      pool.release(platform(id));
    }
    expect(pool.trim(4)).toBe(2);
    expect(pool.size).toBe(4);
    expect(pool.trim(10)).toBe(0);

    pool.setCapacity(2);
    expect(pool.maxSize).toBe(2);
    expect(pool.release(platform(9))).toBe(false);
  });
});
