import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ACTOR_PHYSICS,
  DEFAULT_PLATFORM_TUNING,
  type PlatformKindT,
  type PlayfieldT,
} from '@skyclimb/game-spec';

import { createActor, stepActor } from './actor';
import { createPlatform, type Platform } from './platform';
import { resolveLanding } from './resolver';

const physics = DEFAULT_ACTOR_PHYSICS;
const playfield: PlayfieldT = { width: 800, height: 600 };

function platform(kind: PlatformKindT, id = 1, x = 100, y = 350): Platform {
  return createPlatform(id, { x, y, width: 100, height: 20, kind }, DEFAULT_PLATFORM_TUNING);
}

function fallingActor() {
  const actor = createActor(100, 340, physics);
  actor.vy = 5;
  return actor;
}

describe('resolver', () => {
  it('snaps a falling actor onto the platform top', () => {
    const actor = fallingActor();
    const result = resolveLanding(actor, [platform('plain')], physics);
    expect(result).toEqual({ landed: true, kind: 'plain', platformId: 1 });
    expect(actor.y).toBe(335);
    expect(actor.vy).toBe(0);
    expect(actor.grounded).toBe(true);
  });

  it('lets a rising actor pass through from below', () => {
    const actor = createActor(100, 360, physics);
    actor.vy = -5;
    expect(resolveLanding(actor, [platform('plain')], physics)).toEqual({ landed: false });
    expect(actor.y).toBe(360);
  });

  it('ignores platforms that are not touched or not active', () => {
    const far = fallingActor();
    expect(resolveLanding(far, [platform('plain', 1, 400)], physics).landed).toBe(false);

    const broken = platform('breakable');
    broken.active = false;
    expect(resolveLanding(fallingActor(), [broken], physics).landed).toBe(false);
  });

  it('launches off a bouncy platform instead of grounding', () => {
    const actor = fallingActor();
    resolveLanding(actor, [platform('bouncy')], physics);
    expect(actor.vy).toBe(-24);
    expect(actor.grounded).toBe(false);
  });

  it('adds belt speed and remembers the conveyor as the surface', () => {
    const belt = platform('conveyor');
    const actor = fallingActor();
    resolveLanding(actor, [belt], physics);
    expect(actor.vx).toBe(3.5);
    expect(actor.surface).toBe(belt);
  });

  it('keeps a resting actor on a conveyor across ticks', () => {
    const belt = platform('conveyor');
    const actor = fallingActor();
    resolveLanding(actor, [belt], physics);

    stepActor(actor, physics, playfield);
    const result = resolveLanding(actor, [belt], physics);
    expect(result.landed).toBe(true);
    expect(actor.grounded).toBe(true);
    expect(actor.surface).toBe(belt);
    expect(actor.y).toBe(335);
  });

  it('starts the break timer on the first contact only', () => {
    const crumbling = platform('breakable');
    resolveLanding(fallingActor(), [crumbling], physics);
    expect(crumbling.state).toEqual({ kind: 'breakable', stepped: true, timer: 0, delay: 1 });

    if (crumbling.state.kind === 'breakable') {
      crumbling.state.timer = 0.4;
    }
    resolveLanding(fallingActor(), [crumbling], physics);
    expect(crumbling.state).toMatchObject({ timer: 0.4 });
  });

  it('carries the actor with a moving platform', () => {
    const actor = fallingActor();
    resolveLanding(actor, [platform('horizontal')], physics);
    expect(actor.x).toBe(101);

    const rider = fallingActor();
    resolveLanding(rider, [platform('vertical')], physics);
    expect(rider.y).toBeCloseTo(335.8, 6);
  });

  it('flags hazard contact on the actor', () => {
    const actor = fallingActor();
    const result = resolveLanding(actor, [platform('hazardous')], physics);
    expect(result).toEqual({ landed: true, kind: 'hazardous', platformId: 1 });
    expect(actor.hazardTouched).toBe(true);
  });

  it('resolves against the first qualifying platform in order', () => {
    const actor = fallingActor();
    const result = resolveLanding(actor, [platform('bouncy', 5, 90, 352), platform('plain', 6)], physics);
    expect(result).toEqual({ landed: true, kind: 'bouncy', platformId: 5 });
    expect(actor.y).toBe(337);
  });

  it('clears the surface when nothing is landed on', () => {
    const belt = platform('conveyor');
    const actor = createActor(500, 100, physics);
    actor.surface = belt;
    resolveLanding(actor, [belt], physics);
    expect(actor.surface).toBeNull();
  });
});
