import { describe, expect, it } from 'vitest';

import { DT, GameWorld, type TickInput } from './world';

const idle: TickInput = { direction: 0, jump: false };

function positions(world: GameWorld) {
  return world.platforms.map((platform) => [platform.x, platform.y, platform.state.kind]);
}

describe('GameWorld', () => {
  it('starts on a wide platform with the layout generated ahead', () => {
    const world = new GameWorld({ seed: 'world-start' });
    const [start] = world.platforms;
    expect(start).toMatchObject({ x: 400, y: 550, width: 200 });
    expect(world.actor).toMatchObject({ x: 400, y: 500 });
    expect(world.status).toBe('playing');
    expect(world.generator.highestY).toBeLessThanOrEqual(-1000);
  });

  it('lands the idle actor within the first ticks', () => {
    const world = new GameWorld({ seed: 'world-landing' });
    let landed = false;
    for (let tick = 0; tick < 30 && !landed; tick += 1) {
      landed = world.step(idle).landing.landed;
    }
    expect(landed).toBe(true);
    expect(world.actor.grounded).toBe(true);
    expect(world.tracker.statistics().platformsLandedOn).toBe(1);
    expect(world.status).toBe('playing');
  });

  it('drops the ground when the landed platform breaks in the same tick', () => {
    const world = new GameWorld({ seed: 'world-breakable' });
    for (const platform of world.platforms) {
      platform.state = { kind: 'breakable', stepped: false, timer: 0, delay: DT };
    }

    let report = world.step(idle);
    for (let tick = 0; tick < 30 && !report.landing.landed; tick += 1) {
      report = world.step(idle);
    }
    expect(report.landing.landed).toBe(true);
    if (!report.landing.landed) {
      return;
    }

    const { platformId } = report.landing;
    expect(world.platforms.find((platform) => platform.id === platformId)?.active ?? false).toBe(false);
    expect(world.actor.grounded).toBe(false);
    expect(world.actor.surface).toBeNull();
    expect(world.step({ direction: 0, jump: true }).jumped).toBe(false);
  });

  it('keeps an idle actor drifting on a conveyor across ticks', () => {
    const world = new GameWorld({ seed: 'world-conveyor' });
    world.generator.reset();
    const start = world.generator.addStartPlatform(400, 550);
    start.state = { kind: 'conveyor', speed: 3.5, direction: 1 };
    world.actor.y = 535;
    world.actor.vy = 0;
    world.actor.vx = 0;
    world.actor.grounded = true;
    world.actor.surface = start;

    const speeds: number[] = [];
    for (let tick = 0; tick < 5; tick += 1) {
      expect(world.step(idle).landing.landed).toBe(true);
      speeds.push(world.actor.vx);
    }
    expect(speeds[0]).toBeCloseTo(5.25);
    expect(speeds[1]).toBeCloseTo(10.5);
    expect(speeds.slice(2).every((vx) => Math.abs(vx - 11.5) < 1e-9)).toBe(true);
    expect(world.actor.x).toBeCloseTo(438.75);
  });

  it('ignores ticks while paused', () => {
    const world = new GameWorld({ seed: 'world-pause' });
    world.step(idle);
    world.pause();
    const report = world.step(idle);
    expect(report).toMatchObject({ tick: 1, status: 'paused', generator: null });
    world.resume();
    expect(world.step(idle).tick).toBe(2);
  });

  it('ends the game when the actor falls out of view', () => {
    const world = new GameWorld({ seed: 'world-fall' });
    world.actor.y = 2000;
    const report = world.step(idle);
    expect(report.gameOver).toBe('fell');
    expect(world.status).toBe('game_over');
    expect(world.step(idle)).toMatchObject({ tick: 1, status: 'game_over', gameOver: 'fell' });
  });

  it('ends the game on hazard contact', () => {
    const world = new GameWorld({ seed: 'world-hazard' });
    world.actor.hazardTouched = true;
    expect(world.step(idle).gameOver).toBe('hazard');
    expect(world.gameOverReason).toBe('hazard');
  });

  it('restarts with a fresh start platform and score', () => {
    const world = new GameWorld({ seed: 'world-restart' });
    world.actor.y = 2000;
    world.step(idle);
    world.restart();
    expect(world.status).toBe('playing');
    expect(world.ticks).toBe(0);
    expect(world.score).toBe(0);
    expect(world.platforms[0]).toMatchObject({ x: 400, y: 550, width: 200 });
    expect(world.actor).toMatchObject({ x: 400, y: 500, vy: 0 });
  });

  it('builds the same layout for the same seed', () => {
    expect(positions(new GameWorld({ seed: 'twin' }))).toEqual(positions(new GameWorld({ seed: 'twin' })));
  });
});
