import { describe, expect, it } from 'vitest';

import { DEFAULT_ACTOR_PHYSICS, DEFAULT_PLATFORM_TUNING, type PlayfieldT } from '@skyclimb/game-spec';

import { createActor, jump, moveHorizontal, stepActor } from './actor';
import { createPlatform } from './platform';

const physics = DEFAULT_ACTOR_PHYSICS;
const playfield: PlayfieldT = { width: 800, height: 600 };

describe('actor', () => {
  it('applies gravity before moving and clears grounded', () => {
    const actor = createActor(100, 100, physics);
    actor.grounded = true;
    stepActor(actor, physics, playfield);
    expect(actor.vy).toBe(0.5);
    expect(actor.y).toBe(100.5);
    expect(actor.grounded).toBe(false);
    expect(actor.wasGrounded).toBe(true);
  });

  it('keeps the actor inside the playfield horizontally', () => {
    const actor = createActor(10, 100, physics);
    actor.vx = -3;
    stepActor(actor, physics, playfield);
    expect(actor.x).toBe(16);

    const right = createActor(790, 100, physics);
    right.vx = 3;
    stepActor(right, physics, playfield);
    expect(right.x).toBe(784);
  });

  it('only jumps from the ground', () => {
    const actor = createActor(100, 100, physics);
    expect(jump(actor, physics)).toBe(false);
    expect(actor.vy).toBe(0);

    actor.grounded = true;
    expect(jump(actor, physics)).toBe(true);
    expect(actor.vy).toBe(-12);
    expect(actor.grounded).toBe(false);
  });

  it('accumulates conveyor push up to the surface speed cap', () => {
    const conveyor = createPlatform(
      1,
      { x: 200, y: 300, width: 100, height: 20, kind: 'conveyor' },
      DEFAULT_PLATFORM_TUNING,
    );
    const actor = createActor(200, 285, physics);
    actor.vx = 3.5;
    actor.surface = conveyor;

    stepActor(actor, physics, playfield);
    expect(actor.vx).toBe(5.25);
    stepActor(actor, physics, playfield);
    expect(actor.vx).toBe(7);
    stepActor(actor, physics, playfield);
    expect(actor.vx).toBe(8);
  });

  it('keeps belt momentum when idle on a conveyor and stops otherwise', () => {
    const conveyor = createPlatform(
      1,
      { x: 200, y: 300, width: 100, height: 20, kind: 'conveyor' },
      DEFAULT_PLATFORM_TUNING,
    );
    const actor = createActor(200, 285, physics);
    actor.vx = 5;
    actor.surface = conveyor;
    moveHorizontal(actor, 0, physics);
    expect(actor.vx).toBe(5);

    actor.surface = null;
    moveHorizontal(actor, 0, physics);
    expect(actor.vx).toBe(0);

    moveHorizontal(actor, -1, physics);
    expect(actor.vx).toBe(-3);
  });
});
