import type { PlatformKindT, PlatformTuningT, PlayfieldT } from '@skyclimb/game-spec';

import type { Position, Rect } from './geometry';

export type Direction = -1 | 1;

export type PlatformState =
  | { kind: 'plain' }
  | { kind: 'conveyor'; speed: number; direction: Direction }
  | { kind: 'breakable'; stepped: boolean; timer: number; delay: number }
  | { kind: 'horizontal'; origin: number; direction: Direction; speed: number; range: number }
  | { kind: 'vertical'; origin: number; direction: Direction; speed: number; range: number }
  | { kind: 'bouncy'; multiplier: number }
  | { kind: 'hazardous' };

/**
 * A platform in world space: `x` is the horizontal centre, `y` the top
 * surface (smaller y is higher). Kind-specific data lives in `state` only,
 * so switching kind replaces every field of the previous one.
 */
export interface Platform {
  readonly id: number;
  x: number;
  y: number;
  width: number;
  height: number;
  active: boolean;
  state: PlatformState;
}

export interface PlatformSpawn {
  x: number;
  y: number;
  width: number;
  height: number;
  kind: PlatformKindT;
}

/** Even x pushes right, odd x pushes left. */
export function conveyorDirection(x: number): Direction {
  return Math.abs(Math.round(x)) % 2 === 0 ? 1 : -1;
}

export function initialState(kind: PlatformKindT, x: number, y: number, tuning: PlatformTuningT): PlatformState {
  switch (kind) {
    case 'plain':
      return { kind };
    case 'conveyor':
      return { kind, speed: tuning.conveyorSpeed, direction: conveyorDirection(x) };
    case 'breakable':
      return { kind, stepped: false, timer: 0, delay: tuning.breakDelaySec };
    case 'horizontal':
      return {
        kind,
        origin: x,
        direction: 1,
        speed: tuning.horizontalSpeed,
        range: tuning.horizontalRange,
      };
    case 'vertical':
      return {
        kind,
        origin: y,
        direction: 1,
        speed: tuning.verticalSpeed,
        range: tuning.verticalRange,
      };
    case 'bouncy':
      return { kind, multiplier: tuning.bounceMultiplier };
    case 'hazardous':
      return { kind };
  }
}

export function createPlatform(id: number, spawn: PlatformSpawn, tuning: PlatformTuningT): Platform {
  return {
    id,
    x: spawn.x,
    y: spawn.y,
    width: spawn.width,
    height: spawn.height,
    active: true,
    state: initialState(spawn.kind, spawn.x, spawn.y, tuning),
  };
}

/** Reinitialises a pooled platform in place for a new position and kind. */
export function resetPlatform(platform: Platform, spawn: PlatformSpawn, tuning: PlatformTuningT): Platform {
  platform.x = spawn.x;
  platform.y = spawn.y;
  platform.width = spawn.width;
  platform.height = spawn.height;
  platform.active = true;
  platform.state = initialState(spawn.kind, spawn.x, spawn.y, tuning);
  return platform;
}

export function platformKind(platform: Platform): PlatformKindT {
  return platform.state.kind;
}

export function platformRect(platform: Platform): Rect {
  return {
    x: platform.x - platform.width / 2,
    y: platform.y,
    w: platform.width,
    h: platform.height,
  };
}

/**
 * Where the platform sits when not displaced by its own motion. Placement and
 * reachability are computed against this point.
 */
export function restingPosition(platform: Platform): Position {
  const { state } = platform;
  if (state.kind === 'horizontal') {
    return { x: state.origin, y: platform.y };
  }
  if (state.kind === 'vertical') {
    return { x: platform.x, y: state.origin };
  }
  return { x: platform.x, y: platform.y };
}

/** Displacement the platform applies to itself each tick. */
export function tickDisplacement(platform: Platform): Position {
  const { state } = platform;
  if (state.kind === 'horizontal') {
    return { x: state.speed * state.direction, y: 0 };
  }
  if (state.kind === 'vertical') {
    return { x: 0, y: state.speed * state.direction };
  }
  return { x: 0, y: 0 };
}

export function isHazardous(platform: Platform): boolean {
  return platform.state.kind === 'hazardous';
}

/** Advances timers and motion by one tick of `dt` seconds. */
export function stepPlatform(
  platform: Platform,
  dt: number,
  playfield: PlayfieldT,
  tuning: PlatformTuningT,
): void {
  if (!platform.active) {
    return;
  }

  const { state } = platform;
  switch (state.kind) {
    case 'breakable': {
      if (!state.stepped) {
        return;
      }
      state.timer += dt;
      if (state.timer >= state.delay) {
        platform.active = false;
      }
      return;
    }
    case 'horizontal': {
      platform.x += state.speed * state.direction;
      if (platform.x >= state.origin + state.range) {
        state.direction = -1;
      } else if (platform.x <= state.origin - state.range) {
        state.direction = 1;
      }

      const margin = platform.width / 2 + tuning.boundsPadding;
      if (platform.x < margin) {
        platform.x = margin;
        state.direction = 1;
      } else if (platform.x > playfield.width - margin) {
        platform.x = playfield.width - margin;
        state.direction = -1;
      }
      return;
    }
    case 'vertical': {
      platform.y += state.speed * state.direction;
      if (platform.y >= state.origin + state.range) {
        state.direction = -1;
      } else if (platform.y <= state.origin - state.range) {
        state.direction = 1;
      }
      return;
    }
    case 'plain':
    case 'conveyor':
    case 'bouncy':
    case 'hazardous':
      return;
  }
}
