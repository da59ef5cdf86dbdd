import {
  actorFeetY,
  distance,
  isSupport,
  restingPosition,
  type GameWorld,
  type HorizontalInput,
  type Platform,
  type TickInput,
} from '@skyclimb/engine';

/** Platforms less than this far above the feet count as the one being stood on. */
const MIN_CLIMB = 10;
/** Horizontal slack before steering kicks in. */
const STEER_DEADZONE = 4;

/**
 * Scripted player: from the ground it picks the nearest platform it can
 * reach above itself, jumps, and steers toward it until it lands.
 */
export class Autopilot {
  target: Platform | null = null;

  decide(world: GameWorld): TickInput {
    const { actor } = world;

    if (actor.grounded || !this.target?.active) {
      this.target = actor.grounded ? this.pickTarget(world) : null;
    }

    const target = this.target;
    if (!target) {
      return { direction: 0, jump: false };
    }

    const dx = restingPosition(target).x - actor.x;
    const direction: HorizontalInput = Math.abs(dx) <= STEER_DEADZONE ? 0 : dx > 0 ? 1 : -1;
    return { direction, jump: actor.grounded };
  }

  reset(): void {
    this.target = null;
  }

  private pickTarget(world: GameWorld): Platform | null {
    const { actor, generator } = world;
    const feet = { x: actor.x, y: actorFeetY(actor) };

    let best: Platform | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const platform of world.platforms) {
      if (!isSupport(platform)) {
        continue;
      }
      const position = restingPosition(platform);
      if (position.y > feet.y - MIN_CLIMB) {
        continue;
      }
      if (!generator.isReachable(feet, position.x, position.y)) {
        continue;
      }
      const gap = distance(feet, position);
      if (gap < bestDistance) {
        bestDistance = gap;
        best = platform;
      }
    }
    return best;
  }
}
