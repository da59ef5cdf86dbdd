import type { GeneratorParamsT } from './generator';
import { SPECIAL_KINDS, type PlatformKindT, type SpecialKind } from './platforms';

export interface Milestone {
  height: number;
  title: string;
}

export const MILESTONES: readonly Milestone[] = [
  { height: 1000, title: 'First Conveyor Platforms' },
  { height: 2000, title: 'Breakable Platforms Introduced' },
  { height: 3000, title: 'Moving Platforms Appear' },
  { height: 3500, title: 'Vertical Platforms Added' },
  { height: 3750, title: 'Bouncy Platforms Available' },
  { height: 4000, title: 'Hazardous Platforms - Danger Zone!' },
  { height: 5000, title: 'Master Climber' },
  { height: 7500, title: 'Platform Expert' },
  { height: 10000, title: 'Sky Walker' },
];

export type UnlockHeights = GeneratorParamsT['unlockHeights'];

function normalizeHeight(height: number): number {
  if (!Number.isFinite(height)) {
    return 0;
  }
  return Math.max(0, height);
}

/** Plain platforms are always available; the rest unlock at their height. */
export function unlockedKindsAt(height: number, unlockHeights: UnlockHeights): Set<PlatformKindT> {
  const progress = normalizeHeight(height);
  const kinds = new Set<PlatformKindT>(['plain']);
  for (const kind of SPECIAL_KINDS) {
    if (progress >= unlockHeights[kind]) {
      kinds.add(kind);
    }
  }
  return kinds;
}

export function nextUnlock(
  height: number,
  unlockHeights: UnlockHeights,
): { kind: SpecialKind; height: number } | null {
  const progress = normalizeHeight(height);
  let next: { kind: SpecialKind; height: number } | null = null;
  for (const kind of SPECIAL_KINDS) {
    const threshold = unlockHeights[kind];
    if (threshold <= progress) {
      continue;
    }
    if (!next || threshold < next.height) {
      next = { kind, height: threshold };
    }
  }
  return next;
}

export function milestonesUpTo(height: number): Milestone[] {
  const progress = normalizeHeight(height);
  return MILESTONES.filter((milestone) => milestone.height <= progress);
}
