import { createHash } from 'node:crypto';

import { GameWorld, type MemoryStats, type Platform } from '@skyclimb/engine';
import type { Logger } from '@skyclimb/logger';
import stringify from 'fast-json-stable-stringify';

import { Autopilot } from './autopilot';
import type { SoakConfig } from './config';
import { recordRun, type SoakMetrics } from './metrics';

export type RunOutcome = 'survived' | 'fell' | 'hazard';

export interface RunSummary {
  seed: string;
  outcome: RunOutcome;
  ticks: number;
  maxHeight: number;
  score: number;
  milestones: string[];
  landings: number;
  validations: number;
  repairs: number;
  hazardsPassed: number;
  memory: MemoryStats;
  /** Stable hash of the live layout at the end of the run. */
  signature: string;
}

export interface SoakReport {
  runs: RunSummary[];
  bestHeight: number;
  survived: number;
}

export interface SoakDeps {
  logger: Logger;
  metrics?: SoakMetrics;
}

export function layoutSignature(platforms: readonly Platform[]): string {
  const core = stringify(
    platforms.map((platform) => ({
      x: platform.x,
      y: platform.y,
      width: platform.width,
      active: platform.active,
      state: platform.state,
    })),
  );
  const hash = createHash('sha1');
  hash.update(core);
  return hash.digest('hex');
}

export function runOnce(seed: string, config: SoakConfig, logger: Logger): RunSummary {
  const world = new GameWorld({
    seed,
    settings: { generator: config.generator },
    logger: logger.child({ seed }),
  });
  const pilot = new Autopilot();
  const milestones: string[] = [];
  let validations = 0;
  let repairs = 0;
  let hazardsPassed = 0;

  while (world.status === 'playing' && world.ticks < config.ticksPerRun) {
    const report = world.step(pilot.decide(world));
    milestones.push(...report.milestones.map((milestone) => milestone.title));
    if (report.generator) {
      validations += report.generator.validated ? 1 : 0;
      repairs += report.generator.repaired;
      hazardsPassed += report.generator.hazardsPassed;
    }
  }

  const stats = world.tracker.statistics();
  return {
    seed,
    outcome: world.gameOverReason ?? 'survived',
    ticks: world.ticks,
    maxHeight: stats.maxHeight,
    score: stats.score,
    milestones,
    landings: stats.platformsLandedOn,
    validations,
    repairs,
    hazardsPassed,
    memory: world.generator.memoryStats(),
    signature: layoutSignature(world.platforms),
  };
}

/** Runs `config.runs` autopiloted sessions, each seeded from the base seed and its index. */
export function runSoak(config: SoakConfig, deps: SoakDeps): SoakReport {
  const { logger, metrics } = deps;
  const runs: RunSummary[] = [];

  for (let index = 0; index < config.runs; index += 1) {
    const seed = `${config.seed}-${index}`;
    const startedAt = process.hrtime.bigint();
    const summary = runOnce(seed, config, logger);
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    runs.push(summary);
    if (metrics) {
      recordRun(metrics, summary);
    }
    logger.info(
      {
        seed,
        outcome: summary.outcome,
        ticks: summary.ticks,
        maxHeight: Math.round(summary.maxHeight),
        score: summary.score,
        repairs: summary.repairs,
        live: summary.memory.live,
        elapsedMs: Math.round(elapsedMs),
      },
      'Soak run finished',
    );
  }

  return {
    runs,
    bestHeight: runs.reduce((best, run) => Math.max(best, run.maxHeight), 0),
    survived: runs.filter((run) => run.outcome === 'survived').length,
  };
}
