import {
  DEFAULT_GENERATOR_PARAMS,
  DEFAULT_PLATFORM_TUNING,
  safeReach,
  type GeneratorParamsT,
  type PlatformKindT,
  type PlatformTuningT,
  type PlayfieldT,
  type SafeReach,
} from '@skyclimb/game-spec';
import { createSilentLogger, type Logger } from '@skyclimb/logger';

import { clamp, distance, type Position } from '../geometry';
import {
  createPlatform,
  resetPlatform,
  restingPosition,
  stepPlatform,
  type Platform,
} from '../platform';
import { randomInt, randomSign, type Rng } from '../random';

import { PlatformPool } from './pool';
import { countNearby, isReachable, isSupport, overlapsAny } from './reachability';
import { selectKind, type ProgressSnapshot } from './selection';

export interface GeneratorOptions {
  params?: GeneratorParamsT;
  tuning?: PlatformTuningT;
  playfield?: PlayfieldT;
  /** Anchor used when no live platform exists yet. Defaults to the playfield's horizontal centre at y = 0. */
  origin?: Position;
  rng?: Rng;
  logger?: Logger;
}

export interface GeneratorUpdate {
  frontierY: number;
  cleanupThresholdY: number;
  progress: ProgressSnapshot;
  /** Seconds per tick for platform timers. */
  dt?: number;
}

export interface GeneratorTickReport {
  generated: number;
  recycled: number;
  /** Hazardous platforms that scrolled away this tick. */
  hazardsPassed: number;
  validated: boolean;
  repaired: number;
}

export interface LowDensityArea {
  platform: Platform;
  density: number;
}

export interface LayoutIssues {
  unreachable: Platform[];
  lowDensity: LowDensityArea[];
}

export interface MemoryStats {
  live: number;
  inactive: number;
  total: number;
  created: number;
  /** Platforms that have left the live list. */
  cleaned: number;
  reused: number;
  maxLive: number;
  /** Share of spawns served from the pool, in percent. */
  reuseEfficiency: number;
}

export interface CleanupSettings {
  cleanupMargin?: number;
  maxInactive?: number;
}

const DEFAULT_PLAYFIELD: PlayfieldT = { width: 800, height: 600 };
const FALLBACK_NUDGES = [40, -40, 80, -80] as const;

/**
 * Procedural platform layout that stays ahead of the camera. Every platform
 * it places is reachable from a lower platform under the safe reach envelope;
 * the periodic validation pass repairs anything that slipped through.
 *
 * The live list keeps insertion order, which is also the collision order the
 * resolver uses to pick between overlapping platforms.
 */
export class PlatformGenerator {
  readonly params: GeneratorParamsT;
  readonly tuning: PlatformTuningT;
  readonly playfield: PlayfieldT;
  readonly reach: SafeReach;

  private readonly origin: Position;
  private readonly rng: Rng;
  private readonly logger: Logger;
  private readonly pool: PlatformPool;
  private live: Platform[] = [];
  private nextId = 1;
  private highestGeneratedY: number | null = null;
  private spawnedSinceValidation = 0;
  private readonly counters = {
    created: 0,
    reused: 0,
    cleaned: 0,
    maxLive: 0,
  };

  constructor(options: GeneratorOptions = {}) {
    this.params = { ...(options.params ?? DEFAULT_GENERATOR_PARAMS) };
    this.tuning = options.tuning ?? DEFAULT_PLATFORM_TUNING;
    this.playfield = options.playfield ?? DEFAULT_PLAYFIELD;
    this.reach = safeReach(this.params);
    this.origin = options.origin ?? { x: Math.round(this.playfield.width / 2), y: 0 };
    this.rng = options.rng ?? Math.random;
    this.logger = options.logger ?? createSilentLogger();
    this.pool = new PlatformPool(this.params.maxInactive);
  }

  /** Live platforms in collision order. Broken platforms stay here, inactive, until recycled. */
  get platforms(): readonly Platform[] {
    return this.live;
  }

  get inactiveCount(): number {
    return this.pool.size;
  }

  get cleanupMargin(): number {
    return this.params.cleanupMargin;
  }

  /** Smallest y ever generated, or null before the first platform. */
  get highestY(): number | null {
    return this.highestGeneratedY;
  }

  frontierFor(cameraY: number): number {
    return cameraY - this.params.generationBuffer;
  }

  cleanupThresholdFor(screenBottomY: number): number {
    return screenBottomY + this.params.cleanupMargin;
  }

  horizontalBounds(width = this.params.platformWidth): { min: number; max: number } {
    const margin = width / 2 + this.params.edgePadding;
    return { min: margin, max: this.playfield.width - margin };
  }

  highestPlatform(): Platform | null {
    let highest: Platform | null = null;
    for (const platform of this.live) {
      if (!platform.active) {
        continue;
      }
      if (!highest || restingPosition(platform).y < restingPosition(highest).y) {
        highest = platform;
      }
    }
    return highest;
  }

  addStartPlatform(x: number, y: number): Platform {
    return this.spawn({ x, y }, 'plain', this.params.startPlatformWidth);
  }

  isReachable(from: Position, toX: number, toY: number): boolean {
    return isReachable(this.reach, from, toX, toY);
  }

  positionOverlapsExisting(x: number, y: number, minDistance = this.params.minSeparation): boolean {
    return overlapsAny(this.live, x, y, minDistance);
  }

  countNearby(x: number, y: number): number {
    return countNearby(this.live, this.reach, this.params.densityRadius, x, y);
  }

  selectKind(progress: ProgressSnapshot): PlatformKindT {
    return selectKind(this.rng, progress, this.params);
  }

  /**
   * Tries random offsets at least `minHorizontalOffset` and at most the safe
   * horizontal reach away from the anchor. An offset that would leave the
   * playfield is mirrored, then shrunk, so the result always stays in bounds.
   */
  findReachablePosition(anchor: Position, targetY: number): Position | null {
    const y = Math.max(targetY, Math.ceil(anchor.y - this.reach.vertical));
    const bounds = this.horizontalBounds();
    const maxOffset = this.reach.horizontal;
    const minOffset = Math.min(this.params.minHorizontalOffset, maxOffset);

    for (let attempt = 0; attempt < this.params.placementAttempts; attempt += 1) {
      const offset = randomSign(this.rng) * randomInt(this.rng, minOffset, maxOffset);
      const x = this.offsetWithinBounds(anchor.x, offset, bounds);
      if (this.isReachable(anchor, x, y) && !this.positionOverlapsExisting(x, y)) {
        return { x, y };
      }
    }
    return null;
  }

  /**
   * Extends the layout upward from the highest live platform until the chain
   * passes `targetY`. Returns how many platforms were placed, fillers and
   * safety platforms included.
   */
  generateUpTo(targetY: number, progress: ProgressSnapshot): number {
    let anchor = this.generationAnchor();
    if (targetY >= anchor.y) {
      return 0;
    }

    let placed = 0;
    // Set after an unguarded hazard: the next platform comes off the same
    // anchor and is plain, so the hazard is never the only way up.
    let plainNext = false;
    while (anchor.y > targetY) {
      const gap = randomInt(this.rng, this.params.minVerticalGap, this.params.maxVerticalGap);
      const position = this.findReachablePosition(anchor, anchor.y - gap) ?? this.fallbackPosition(anchor);
      const kind = plainNext ? 'plain' : this.selectKind(progress);
      plainNext = false;
      const platform = this.spawn(position, kind);
      placed += 1;

      if (kind === 'hazardous') {
        const safety = this.addSafetyPlatform(platform, anchor);
        if (safety) {
          placed += 1;
          anchor = restingPosition(safety);
        } else {
          this.logger.debug({ x: platform.x, y: platform.y }, 'No safety spot beside hazard');
          plainNext = true;
        }
        continue;
      }

      if (kind === 'plain') {
        placed += this.ensureMinimumDensity(position);
      }
      anchor = restingPosition(platform);
    }

    this.logger.debug({ targetY, placed, live: this.live.length }, 'Generated platforms');
    return placed;
  }

  /** Adds plain fillers above `host` until its density reaches the minimum. */
  ensureMinimumDensity(host: Position): number {
    const density = this.countNearby(host.x, host.y);
    const needed = this.params.minPlatformsInRange - density;
    let added = 0;
    for (let i = 0; i < needed; i += 1) {
      const position = this.findSafePlatformPosition(host);
      if (!position) {
        this.logger.debug({ host, density }, 'No room for density filler');
        break;
      }
      this.spawn(position, 'plain');
      added += 1;
    }
    return added;
  }

  /** A clear spot above `host` and reachable from it, or null. */
  findSafePlatformPosition(host: Position): Position | null {
    const bounds = this.horizontalBounds();
    for (let attempt = 0; attempt < this.params.fillerAttempts; attempt += 1) {
      const offsetX = randomInt(this.rng, -this.params.fillerMaxOffsetX, this.params.fillerMaxOffsetX);
      const rise = randomInt(this.rng, this.params.fillerMinRise, this.params.fillerMaxRise);
      const x = clamp(host.x + offsetX, bounds.min, bounds.max);
      const y = host.y - rise;
      if (!this.positionOverlapsExisting(x, y) && this.isReachable(host, x, y)) {
        return { x, y };
      }
    }
    return null;
  }

  /**
   * Places a plain platform beside a hazard so the hazard is never the only
   * way up. The side facing the anchor is tried first, then the other side,
   * then both sides again above and below the hazard. Every candidate must be
   * reachable from `anchor`.
   */
  addSafetyPlatform(hazard: Platform, anchor: Position): Platform | null {
    const bounds = this.horizontalBounds();
    const facing = anchor.x <= hazard.x ? -1 : 1;
    const sides = [facing, -facing];
    const lifts = [0, -this.params.hazardVerticalOffset, this.params.hazardVerticalOffset];

    for (const lift of lifts) {
      for (const side of sides) {
        const x = hazard.x + side * this.params.hazardSafetyDistance;
        const y = hazard.y + lift;
        if (x < bounds.min || x > bounds.max) {
          continue;
        }
        if (this.positionOverlapsExisting(x, y) || !this.isReachable(anchor, x, y)) {
          continue;
        }
        return this.spawn({ x, y }, 'plain');
      }
    }
    return null;
  }

  /**
   * Flags platforms that no lower supporting platform can reach, and
   * platforms whose surroundings are below the minimum density. Platforms at
   * the lowest level are the floor and are never flagged unreachable.
   */
  validateLayout(): LayoutIssues {
    const issues: LayoutIssues = { unreachable: [], lowDensity: [] };
    const candidates = this.live
      .filter((platform) => platform.active)
      .map((platform) => ({ platform, position: restingPosition(platform) }))
      .sort((a, b) => b.position.y - a.position.y);

    const floor = candidates[0];
    if (!floor) {
      return issues;
    }

    for (const { platform, position } of candidates) {
      if (position.y < floor.position.y) {
        const supported = candidates.some(
          (other) =>
            other.platform !== platform &&
            isSupport(other.platform) &&
            other.position.y > position.y &&
            this.isReachable(other.position, position.x, position.y),
        );
        if (!supported) {
          issues.unreachable.push(platform);
        }
      }

      const density = this.countNearby(position.x, position.y);
      if (density < this.params.minPlatformsInRange) {
        issues.lowDensity.push({ platform, density });
      }
    }

    return issues;
  }

  /** Inserts bridging and filler platforms for the issues found. Returns how many were added. */
  repairLayout(issues: LayoutIssues): number {
    let added = 0;

    for (const platform of issues.unreachable) {
      const target = restingPosition(platform);
      const below = this.nearestLowerSupport(target);
      if (!below) {
        continue;
      }
      const midpoint = {
        x: Math.round((below.x + target.x) / 2),
        y: Math.round((below.y + target.y) / 2),
      };
      if (this.positionOverlapsExisting(midpoint.x, midpoint.y)) {
        continue;
      }
      this.spawn(midpoint, 'plain');
      added += 1;
    }

    for (const { platform, density } of issues.lowDensity) {
      const host = restingPosition(platform);
      const needed = this.params.minPlatformsInRange - density;
      for (let i = 0; i < needed; i += 1) {
        const position = this.findSafePlatformPosition(host);
        if (!position) {
          break;
        }
        this.spawn(position, 'plain');
        added += 1;
      }
    }

    if (added > 0) {
      this.logger.debug(
        { unreachable: issues.unreachable.length, lowDensity: issues.lowDensity.length, added },
        'Repaired platform layout',
      );
    }
    return added;
  }

  /** Moves platforms below `thresholdY` into the pool, or drops them once it is full. */
  recycleBelow(thresholdY: number): number {
    return this.recycle(thresholdY).recycled;
  }

  /** Shrinks the inactive pool to `keepCount`; returns how many were dropped. */
  forceCleanup(keepCount = 10): number {
    const dropped = this.pool.trim(keepCount);
    if (dropped > 0) {
      this.logger.debug({ dropped, kept: this.pool.size }, 'Trimmed inactive platform pool');
    }
    return dropped;
  }

  setCleanupSettings(settings: CleanupSettings): void {
    if (settings.cleanupMargin !== undefined) {
      this.params.cleanupMargin = settings.cleanupMargin;
    }
    if (settings.maxInactive !== undefined) {
      this.params.maxInactive = settings.maxInactive;
      this.pool.setCapacity(settings.maxInactive);
    }
  }

  updatePlatforms(dt: number): void {
    for (const platform of this.live) {
      stepPlatform(platform, dt, this.playfield, this.tuning);
    }
  }

  /**
   * One generator tick: extend past the frontier, recycle behind the cleanup
   * threshold, validate on cadence, then advance platform timers and motion.
   */
  update(input: GeneratorUpdate): GeneratorTickReport {
    const generated = this.generateUpTo(input.frontierY, input.progress);
    const { recycled, hazards } = this.recycle(input.cleanupThresholdY);

    let validated = false;
    let repaired = 0;
    if (this.spawnedSinceValidation >= this.params.validationInterval) {
      this.spawnedSinceValidation = 0;
      validated = true;
      const issues = this.validateLayout();
      if (issues.unreachable.length > 0 || issues.lowDensity.length > this.params.lowDensityTolerance) {
        repaired = this.repairLayout(issues);
      }
    }

    this.updatePlatforms(input.dt ?? 1 / 60);
    return { generated, recycled, hazardsPassed: hazards, validated, repaired };
  }

  /** Conservative placement one minimum gap up, always reachable from the anchor. */
  fallbackPosition(anchor: Position): Position {
    const bounds = this.horizontalBounds();
    const y = anchor.y - this.params.minVerticalGap;
    const base = clamp(
      anchor.x + randomInt(this.rng, -this.params.fallbackOffset, this.params.fallbackOffset),
      bounds.min,
      bounds.max,
    );

    if (this.positionOverlapsExisting(base, y)) {
      for (const nudge of FALLBACK_NUDGES) {
        const x = base + nudge;
        if (x < bounds.min || x > bounds.max) {
          continue;
        }
        if (!this.positionOverlapsExisting(x, y) && this.isReachable(anchor, x, y)) {
          return { x, y };
        }
      }
    }

    this.logger.debug({ anchor, x: base, y }, 'Using fallback platform position');
    return { x: base, y };
  }
  /** Drops every platform and counter; the next generation starts from the origin. */
  reset(): void {
    this.live = [];
    this.pool.clear();
    this.nextId = 1;
    this.highestGeneratedY = null;
    this.spawnedSinceValidation = 0;
    this.counters.created = 0;
    this.counters.reused = 0;
    this.counters.cleaned = 0;
    this.counters.maxLive = 0;
  }

  memoryStats(): MemoryStats {
    const { created, reused, cleaned, maxLive } = this.counters;
    return {
      live: this.live.length,
      inactive: this.pool.size,
      total: this.live.length + this.pool.size,
      created,
      cleaned,
      reused,
      maxLive,
      reuseEfficiency: (reused / Math.max(1, created + reused)) * 100,
    };
  }

  private recycle(thresholdY: number): { recycled: number; hazards: number } {
    const kept: Platform[] = [];
    let recycled = 0;
    let hazards = 0;
    for (const platform of this.live) {
      if (platform.y > thresholdY) {
        if (platform.state.kind === 'hazardous') {
          hazards += 1;
        }
        this.pool.release(platform);
        recycled += 1;
        continue;
      }
      kept.push(platform);
    }

    if (recycled > 0) {
      this.live = kept;
      this.counters.cleaned += recycled;
    }
    this.counters.maxLive = Math.max(this.counters.maxLive, this.live.length);
    return { recycled, hazards };
  }

  private spawnOf(position: Position, kind: PlatformKindT, width = this.params.platformWidth) {
    return { x: position.x, y: position.y, width, height: this.params.platformHeight, kind };
  }

  private spawn(position: Position, kind: PlatformKindT, width = this.params.platformWidth): Platform {
    const spawn = this.spawnOf(position, kind, width);
    const pooled = this.pool.take();
    let platform: Platform;
    if (pooled) {
      platform = resetPlatform(pooled, spawn, this.tuning);
      this.counters.reused += 1;
    } else {
      platform = createPlatform(this.nextId, spawn, this.tuning);
      this.nextId += 1;
      this.counters.created += 1;
    }

    this.live.push(platform);
    this.spawnedSinceValidation += 1;
    this.counters.maxLive = Math.max(this.counters.maxLive, this.live.length);
    if (this.highestGeneratedY === null || position.y < this.highestGeneratedY) {
      this.highestGeneratedY = position.y;
    }
    return platform;
  }

  /** Highest live platform that can be stood on, or the synthetic origin. */
  private generationAnchor(): Position {
    let anchor: Position | null = null;
    for (const platform of this.live) {
      if (!isSupport(platform)) {
        continue;
      }
      const position = restingPosition(platform);
      if (!anchor || position.y < anchor.y) {
        anchor = position;
      }
    }
    if (anchor) {
      return anchor;
    }
    return { x: this.origin.x, y: this.highestGeneratedY ?? this.origin.y };
  }

  private offsetWithinBounds(anchorX: number, offset: number, bounds: { min: number; max: number }): number {
    const forward = anchorX + offset;
    if (forward >= bounds.min && forward <= bounds.max) {
      return forward;
    }
    const mirrored = anchorX - offset;
    if (mirrored >= bounds.min && mirrored <= bounds.max) {
      return mirrored;
    }
    return clamp(forward, bounds.min, bounds.max);
  }

  private nearestLowerSupport(target: Position): Position | null {
    let nearest: Position | null = null;
    let best = Number.POSITIVE_INFINITY;
    for (const platform of this.live) {
      if (!isSupport(platform)) {
        continue;
      }
      const position = restingPosition(platform);
      if (position.y <= target.y) {
        continue;
      }
      const gap = distance(position, target);
      if (gap < best) {
        best = gap;
        nearest = position;
      }
    }
    return nearest;
  }
}
