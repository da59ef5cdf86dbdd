import { SPECIAL_KINDS, type GeneratorParamsT, type PlatformKindT, type SpecialKind } from '@skyclimb/game-spec';

import { pickWeighted, type Rng } from '../random';

export interface ProgressSnapshot {
  /** Monotonically non-decreasing climb height. */
  height: number;
  unlockedKinds: ReadonlySet<PlatformKindT>;
}

/**
 * Plain by default; with `specialChance` a weighted pick among the unlocked
 * special kinds instead.
 */
export function selectKind(rng: Rng, progress: ProgressSnapshot, params: GeneratorParamsT): PlatformKindT {
  const candidates = SPECIAL_KINDS.filter(
    (kind) => progress.unlockedKinds.has(kind) && params.kindWeights[kind] > 0,
  ).map((kind) => ({ value: kind, weight: params.kindWeights[kind] }));

  if (candidates.length === 0) {
    return 'plain';
  }
  if (rng() >= params.specialChance) {
    return 'plain';
  }
  return pickWeighted<SpecialKind>(rng, candidates) ?? 'plain';
}
