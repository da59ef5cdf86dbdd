import { parseGameSettings, type GameSettingsInput, type GameSettingsT, type Milestone } from '@skyclimb/game-spec';
import { createSilentLogger, type Logger } from '@skyclimb/logger';

import { createActor, jump, moveHorizontal, stepActor, type Actor, type HorizontalInput } from './actor';
import { Camera } from './camera';
import { PlatformGenerator, type GeneratorTickReport } from './generator';
import type { Platform } from './platform';
import { ProgressTracker } from './progress';
import { createRng, type Rng } from './random';
import { resolveLanding, type LandingResult } from './resolver';

export const TICK_HZ = 60;
export const DT = 1 / TICK_HZ;

/** Distance above the camera that the first generation pass fills. */
export const INITIAL_GENERATION_HEIGHT = 1000;

export type GameStatus = 'playing' | 'paused' | 'game_over';
export type GameOverReason = 'hazard' | 'fell';

export interface TickInput {
  direction: HorizontalInput;
  jump: boolean;
}

export interface TickReport {
  tick: number;
  status: GameStatus;
  landing: LandingResult;
  jumped: boolean;
  milestones: Milestone[];
  generator: GeneratorTickReport | null;
  gameOver: GameOverReason | null;
}

export interface GameWorldOptions {
  settings?: GameSettingsInput | GameSettingsT;
  seed?: string;
  rng?: Rng;
  logger?: Logger;
}

/**
 * One climbing session: actor, camera, progress and the generated layout,
 * stepped together at a fixed tick.
 */
export class GameWorld {
  readonly settings: GameSettingsT;
  readonly camera: Camera;
  readonly tracker: ProgressTracker;
  readonly generator: PlatformGenerator;

  actor: Actor;
  status: GameStatus = 'playing';
  gameOverReason: GameOverReason | null = null;
  ticks = 0;

  private readonly logger: Logger;

  constructor(options: GameWorldOptions = {}) {
    this.settings = parseGameSettings(options.settings ?? {});
    this.logger = options.logger ?? createSilentLogger();
    const { playfield, physics, tuning, generator, camera, scoring } = this.settings;

    this.camera = new Camera(playfield, camera);
    this.tracker = new ProgressTracker(scoring, generator.unlockHeights);
    this.generator = new PlatformGenerator({
      params: generator,
      tuning,
      playfield,
      rng: options.rng ?? createRng(options.seed ?? 'skyclimb'),
      logger: this.logger,
    });
    this.actor = createActor(playfield.width / 2, playfield.height - 100, physics);
    this.init();
  }

  get platforms(): readonly Platform[] {
    return this.generator.platforms;
  }

  get score(): number {
    return this.tracker.score;
  }

  step(input: TickInput): TickReport {
    if (this.status !== 'playing') {
      return {
        tick: this.ticks,
        status: this.status,
        landing: { landed: false },
        jumped: false,
        milestones: [],
        generator: null,
        gameOver: this.gameOverReason,
      };
    }

    const { physics, playfield } = this.settings;
    this.ticks += 1;

    const jumped = input.jump ? jump(this.actor, physics) : false;
    moveHorizontal(this.actor, input.direction, physics);
    stepActor(this.actor, physics, playfield);

    const landing = resolveLanding(this.actor, this.generator.platforms, physics);
    if (landing.landed) {
      this.tracker.recordLanding(landing.kind);
    }

    this.camera.update(this.actor);
    const milestones = this.tracker.update(this.camera);
    for (const milestone of milestones) {
      this.logger.info({ height: milestone.height, title: milestone.title }, 'Milestone reached');
    }

    const generator = this.generator.update({
      frontierY: this.generator.frontierFor(this.camera.y),
      cleanupThresholdY: this.generator.cleanupThresholdFor(this.camera.screenBottomY()),
      progress: this.tracker.snapshot(),
      dt: DT,
    });
    for (let i = 0; i < generator.hazardsPassed; i += 1) {
      this.tracker.recordHazardAvoided();
    }
    // A breakable can give way during the update above; the actor must not
    // keep a jump off a platform that is gone.
    if (landing.landed && !this.generator.platforms.some((p) => p.id === landing.platformId && p.active)) {
      this.actor.grounded = false;
      this.actor.surface = null;
    }

    let gameOver: GameOverReason | null = null;
    if (this.actor.hazardTouched) {
      gameOver = 'hazard';
    } else if (this.camera.isBelowScreen(this.actor)) {
      gameOver = 'fell';
    }
    if (gameOver) {
      this.endGame(gameOver);
    }

    return { tick: this.ticks, status: this.status, landing, jumped, milestones, generator, gameOver };
  }

  pause(): void {
    if (this.status === 'playing') {
      this.status = 'paused';
    }
  }

  resume(): void {
    if (this.status === 'paused') {
      this.status = 'playing';
    }
  }

  restart(): void {
    this.generator.reset();
    this.camera.reset();
    this.tracker.reset();
    const { playfield, physics } = this.settings;
    this.actor = createActor(playfield.width / 2, playfield.height - 100, physics);
    this.status = 'playing';
    this.gameOverReason = null;
    this.ticks = 0;
    this.init();
  }

  private init(): void {
    const { playfield } = this.settings;
    this.generator.addStartPlatform(playfield.width / 2, playfield.height - 50);
    const placed = this.generator.generateUpTo(
      this.camera.y - INITIAL_GENERATION_HEIGHT,
      this.tracker.snapshot(),
    );
    this.logger.debug({ placed }, 'Initial layout generated');
  }

  private endGame(reason: GameOverReason): void {
    this.status = 'game_over';
    this.gameOverReason = reason;
    this.logger.info(
      { reason, tick: this.ticks, score: this.tracker.score, maxHeight: this.tracker.maxHeight },
      'Game over',
    );
  }
}
