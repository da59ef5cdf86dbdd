import type { ActorPhysicsT, PlatformKindT } from '@skyclimb/game-spec';

import { actorFeetY, actorRect, type Actor } from './actor';
import { rectsOverlap } from './geometry';
import { platformRect, tickDisplacement, type Platform } from './platform';

export type LandingResult =
  | { landed: false }
  | { landed: true; kind: PlatformKindT; platformId: number };

const NO_LANDING: LandingResult = { landed: false };

export function isLandingCandidate(platform: Platform, actor: Actor, physics: ActorPhysicsT): boolean {
  if (!platform.active) {
    return false;
  }

  const platformBox = platformRect(platform);
  const actorBox = actorRect(actor);
  if (!rectsOverlap(platformBox, actorBox)) {
    return false;
  }

  // Falling or resting, with the actor's top not below the platform: blocks
  // landings while jumping up through a platform.
  if (actor.vy >= 0 && actorBox.y <= platformBox.y + platformBox.h) {
    return true;
  }

  return (
    platform.state.kind === 'conveyor' &&
    actor.wasGrounded &&
    actor.vy >= 0 &&
    Math.abs(actorFeetY(actor) - platform.y) <= physics.conveyorContactTolerance
  );
}

/** Applies the landing effect of `platform` to `actor`. */
export function applyLanding(platform: Platform, actor: Actor, physics: ActorPhysicsT): void {
  actor.y = platform.y - actor.height / 2 + physics.landingOverlap;

  const { state } = platform;
  if (state.kind === 'bouncy') {
    actor.vy = physics.jumpVelocity * state.multiplier;
    actor.grounded = false;
    return;
  }

  actor.vy = 0;
  actor.grounded = true;

  switch (state.kind) {
    case 'conveyor':
      actor.vx += state.speed * state.direction;
      actor.surface = platform;
      return;
    case 'breakable':
      if (!state.stepped) {
        state.stepped = true;
        state.timer = 0;
      }
      return;
    case 'horizontal':
    case 'vertical': {
      const delta = tickDisplacement(platform);
      actor.x += delta.x;
      actor.y += delta.y;
      return;
    }
    case 'hazardous':
      actor.hazardTouched = true;
      return;
    case 'plain':
      return;
  }
}

/**
 * Lands the actor on at most one platform per tick. Platforms are checked in
 * the order given and the first candidate wins, so the caller's ordering
 * decides which of two overlapping platforms is authoritative.
 */
export function resolveLanding(actor: Actor, platforms: readonly Platform[], physics: ActorPhysicsT): LandingResult {
  actor.surface = null;

  for (const platform of platforms) {
    if (!isLandingCandidate(platform, actor, physics)) {
      continue;
    }
    applyLanding(platform, actor, physics);
    return { landed: true, kind: platform.state.kind, platformId: platform.id };
  }

  return NO_LANDING;
}
