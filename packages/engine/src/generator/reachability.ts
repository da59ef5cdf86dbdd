import type { SafeReach } from '@skyclimb/game-spec';

import type { Position } from '../geometry';
import { isHazardous, restingPosition, type Platform } from '../platform';

/**
 * Whether a single jump from `from` lands on (toX, toY). Climbing is bounded
 * by the safe vertical reach; anything level or lower is reachable by falling.
 */
export function isReachable(reach: SafeReach, from: Position, toX: number, toY: number): boolean {
  const dx = Math.abs(toX - from.x);
  const dy = from.y - toY;
  if (dx > reach.horizontal) {
    return false;
  }
  return dy <= 0 || dy <= reach.vertical;
}

/** Platforms a player can stand on and jump from. */
export function isSupport(platform: Platform): boolean {
  return platform.active && !isHazardous(platform);
}

/**
 * Supporting platforms within `radius` of the point on both axes that are
 * also inside the safe reach envelope. A platform at the point counts itself.
 */
export function countNearby(
  platforms: readonly Platform[],
  reach: SafeReach,
  radius: number,
  x: number,
  y: number,
): number {
  let count = 0;
  for (const platform of platforms) {
    if (!isSupport(platform)) {
      continue;
    }
    const position = restingPosition(platform);
    const dx = Math.abs(position.x - x);
    const dy = Math.abs(position.y - y);
    if (dx > radius || dy > radius) {
      continue;
    }
    if (dx <= reach.horizontal && dy <= reach.vertical) {
      count += 1;
    }
  }
  return count;
}

/** True when an active platform sits closer than `minDistance` on both axes. */
export function overlapsAny(platforms: readonly Platform[], x: number, y: number, minDistance: number): boolean {
  return platforms.some((platform) => {
    if (!platform.active) {
      return false;
    }
    const position = restingPosition(platform);
    return Math.abs(position.x - x) < minDistance && Math.abs(position.y - y) < minDistance;
  });
}
