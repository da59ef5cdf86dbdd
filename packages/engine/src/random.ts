import seedrandom from 'seedrandom';

/** Uniform source in [0, 1). */
export type Rng = () => number;

export function createRng(seed: string): Rng {
  const prng = seedrandom(seed);
  return () => prng();
}

/** Integer in [min, max], both ends inclusive after rounding inward. */
export function randomInt(rng: Rng, min: number, max: number): number {
  const low = Math.ceil(min);
  const high = Math.floor(max);
  if (high <= low) {
    return low;
  }
  return low + Math.floor(rng() * (high - low + 1));
}

export function randomSign(rng: Rng): -1 | 1 {
  return rng() < 0.5 ? -1 : 1;
}

export interface WeightedEntry<T> {
  value: T;
  weight: number;
}

export function pickWeighted<T>(rng: Rng, entries: readonly WeightedEntry<T>[]): T | null {
  const total = entries.reduce((sum, entry) => sum + Math.max(0, entry.weight), 0);
  if (total <= 0) {
    return null;
  }

  let roll = rng() * total;
  for (const entry of entries) {
    const weight = Math.max(0, entry.weight);
    if (weight === 0) {
      continue;
    }
    if (roll < weight) {
      return entry.value;
    }
    roll -= weight;
  }

  const last = [...entries].reverse().find((entry) => entry.weight > 0);
  return last ? last.value : null;
}
