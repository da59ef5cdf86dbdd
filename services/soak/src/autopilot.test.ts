import { describe, expect, it } from 'vitest';

import { GameWorld } from '@skyclimb/engine';

import { Autopilot } from './autopilot';

function standingWorld(): GameWorld {
  const world = new GameWorld({ seed: 'autopilot' });
  world.generator.reset();
  world.generator.addStartPlatform(400, 550);
  world.actor.y = 535;
  world.actor.grounded = true;
  return world;
}

describe('Autopilot', () => {
  it('waits while falling with nothing chosen', () => {
    const world = new GameWorld({ seed: 'autopilot' });
    expect(new Autopilot().decide(world)).toEqual({ direction: 0, jump: false });
  });

  it('jumps toward the nearest reachable platform above', () => {
    const world = standingWorld();
    const near = world.generator.addStartPlatform(460, 470);
    world.generator.addStartPlatform(250, 460);
    world.generator.addStartPlatform(400, 200);

    const pilot = new Autopilot();
    expect(pilot.decide(world)).toEqual({ direction: 1, jump: true });
    expect(pilot.target).toBe(near);
  });

  it('holds its target while airborne and stops steering once above it', () => {
    const world = standingWorld();
    const target = world.generator.addStartPlatform(402, 470);
    const pilot = new Autopilot();

    expect(pilot.decide(world)).toEqual({ direction: 0, jump: true });
    world.actor.grounded = false;
    world.actor.x = 380;
    expect(pilot.decide(world)).toEqual({ direction: 1, jump: false });
    expect(pilot.target).toBe(target);
  });

  it('stands still when nothing is in reach', () => {
    const world = standingWorld();
    world.generator.addStartPlatform(400, 300);
    expect(new Autopilot().decide(world)).toEqual({ direction: 0, jump: false });
  });
});
