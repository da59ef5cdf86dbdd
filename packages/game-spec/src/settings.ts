import { z } from 'zod';

import { ConfigError, describeIssues } from './errors';
import { GeneratorParams, type GeneratorParamsT } from './generator';
import { ActorPhysics } from './physics';
import { PlatformTuning } from './platforms';

export const Playfield = z.object({
  width: z.number().gt(0).default(800),
  height: z.number().gt(0).default(600),
});

export type PlayfieldT = z.infer<typeof Playfield>;

export const CameraSettings = z.object({
  followRatio: z.number().min(0).max(1).default(0.3),
  scrollSpeed: z.number().min(0).default(1),
  autoScroll: z.boolean().default(false),
  fallMargin: z.number().min(0).default(50),
});

export type CameraSettingsT = z.infer<typeof CameraSettings>;

export const ScoringSettings = z.object({
  heightMultiplier: z.number().min(0).default(1),
  milestoneBonus: z.number().int().min(0).default(100),
  hazardAvoidedBonus: z.number().int().min(0).default(50),
  targetHeight: z.number().gt(0).default(10000),
});

export type ScoringSettingsT = z.infer<typeof ScoringSettings>;

export const GameSettings = z.object({
  playfield: Playfield.default({}),
  physics: ActorPhysics.default({}),
  tuning: PlatformTuning.default({}),
  generator: GeneratorParams.default({}),
  camera: CameraSettings.default({}),
  scoring: ScoringSettings.default({}),
});

export type GameSettingsInput = z.input<typeof GameSettings>;
export type GameSettingsT = z.infer<typeof GameSettings>;

export function parseGameSettings(input: unknown = {}): GameSettingsT {
  const result = GameSettings.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid game settings: ${describeIssues(result.error.issues)}`, result.error.issues);
  }
  return result.data;
}

export function parseGeneratorParams(input: unknown = {}): GeneratorParamsT {
  const result = GeneratorParams.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid generator parameters: ${describeIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return result.data;
}
