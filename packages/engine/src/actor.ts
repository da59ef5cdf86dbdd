import type { ActorPhysicsT, PlayfieldT } from '@skyclimb/game-spec';

import type { Rect } from './geometry';
import type { Platform } from './platform';

export type HorizontalInput = -1 | 0 | 1;

export interface Actor {
  x: number;
  y: number;
  vx: number;
  vy: number;
  readonly width: number;
  readonly height: number;
  grounded: boolean;
  /** Grounded state at the end of the previous tick. */
  wasGrounded: boolean;
  /** Conveyor the actor is standing on, if any. */
  surface: Platform | null;
  /** Sticky until the game loop calls `clearHazard`. */
  hazardTouched: boolean;
}

export function createActor(x: number, y: number, physics: ActorPhysicsT): Actor {
  return {
    x,
    y,
    vx: 0,
    vy: 0,
    width: physics.width,
    height: physics.height,
    grounded: false,
    wasGrounded: false,
    surface: null,
    hazardTouched: false,
  };
}

export function actorRect(actor: Actor): Rect {
  return {
    x: actor.x - actor.width / 2,
    y: actor.y - actor.height / 2,
    w: actor.width,
    h: actor.height,
  };
}

export function actorFeetY(actor: Actor): number {
  return actor.y + actor.height / 2;
}

/**
 * Integrates one tick. Grounded is cleared here and only restored by a
 * landing resolved later in the same tick.
 */
export function stepActor(actor: Actor, physics: ActorPhysicsT, playfield: PlayfieldT): void {
  actor.wasGrounded = actor.grounded;

  actor.vy += physics.gravity;
  actor.x += actor.vx;
  actor.y += actor.vy;

  const halfWidth = actor.width / 2;
  if (actor.x < halfWidth) {
    actor.x = halfWidth;
  } else if (actor.x > playfield.width - halfWidth) {
    actor.x = playfield.width - halfWidth;
  }

  const surface = actor.surface?.state;
  if (surface && surface.kind === 'conveyor') {
    actor.vx += surface.speed * surface.direction * physics.surfacePushFactor;
    if (Math.abs(actor.vx) > physics.maxSurfaceSpeed) {
      actor.vx = Math.sign(actor.vx) * physics.maxSurfaceSpeed;
    }
  }

  actor.grounded = false;
}

/** Launches only from the ground; returns whether the jump happened. */
export function jump(actor: Actor, physics: ActorPhysicsT): boolean {
  if (!actor.grounded) {
    return false;
  }
  actor.vy = physics.jumpVelocity;
  actor.grounded = false;
  return true;
}

export function moveHorizontal(actor: Actor, direction: HorizontalInput, physics: ActorPhysicsT): void {
  if (direction !== 0) {
    actor.vx = direction * physics.horizontalSpeed;
    return;
  }
  // Idle on a conveyor keeps whatever the belt has built up.
  if (actor.surface) {
    return;
  }
  actor.vx = 0;
}

export function clearHazard(actor: Actor): void {
  actor.hazardTouched = false;
}
