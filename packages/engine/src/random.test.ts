import { describe, expect, it } from 'vitest';

import { createRng, pickWeighted, randomInt, type Rng } from './random';

function sequence(values: number[]): Rng {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

describe('random', () => {
  it('repeats the same stream for the same seed', () => {
    const a = createRng('layout-seed');
    const b = createRng('layout-seed');
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(createRng('other-seed')()).not.toBe(first[0]);
  });

  it('draws integers inclusive of both ends', () => {
    expect(randomInt(sequence([0]), 60, 100)).toBe(60);
    expect(randomInt(sequence([0.999999]), 60, 100)).toBe(100);
    expect(randomInt(sequence([0.5]), 40, 115.2)).toBe(78);
    expect(randomInt(sequence([0.5]), 10, 10)).toBe(10);
  });

  it('picks weighted entries by cumulative weight', () => {
    const entries = [
      { value: 'a', weight: 1 },
      { value: 'b', weight: 0 },
      { value: 'c', weight: 3 },
    ];
    expect(pickWeighted(sequence([0.1]), entries)).toBe('a');
    expect(pickWeighted(sequence([0.3]), entries)).toBe('c');
    expect(pickWeighted(sequence([0.5]), [{ value: 'x', weight: 0 }])).toBeNull();
  });
});
