import { z } from 'zod';

import { DEFAULT_ACTOR_PHYSICS, maxHorizontalReach, maxJumpHeight } from './physics';

const UnlockHeights = z.object({
  conveyor: z.number().min(0).default(1000),
  breakable: z.number().min(0).default(2000),
  horizontal: z.number().min(0).default(3000),
  vertical: z.number().min(0).default(3500),
  bouncy: z.number().min(0).default(3750),
  hazardous: z.number().min(0).default(4000),
});

const KindWeights = z.object({
  conveyor: z.number().min(0).default(1),
  breakable: z.number().min(0).default(1),
  horizontal: z.number().min(0).default(1),
  vertical: z.number().min(0).default(1),
  bouncy: z.number().min(0).default(1),
  hazardous: z.number().min(0).default(1),
});

const GeneratorParamsShape = z.object({
  platformWidth: z.number().gt(0).default(100),
  platformHeight: z.number().gt(0).default(20),
  startPlatformWidth: z.number().gt(0).default(200),
  edgePadding: z.number().min(0).default(20),

  minVerticalGap: z.number().gt(0).default(60),
  maxVerticalGap: z.number().gt(0).default(100),
  maxJumpHeight: z.number().gt(0).default(maxJumpHeight(DEFAULT_ACTOR_PHYSICS)),
  maxHorizontalReach: z.number().gt(0).default(maxHorizontalReach(DEFAULT_ACTOR_PHYSICS)),
  safetyMargin: z.number().gt(0).lt(1).default(0.8),

  minHorizontalOffset: z.number().min(0).default(40),
  placementAttempts: z.number().int().gt(0).default(10),
  fallbackOffset: z.number().min(0).default(60),
  minSeparation: z.number().gt(0).default(80),

  minPlatformsInRange: z.number().int().min(0).default(2),
  densityRadius: z.number().gt(0).default(200),
  fillerAttempts: z.number().int().gt(0).default(20),
  fillerMaxOffsetX: z.number().gt(0).default(110),
  fillerMinRise: z.number().gt(0).default(20),
  fillerMaxRise: z.number().gt(0).default(100),

  hazardSafetyDistance: z.number().gt(0).default(110),
  hazardVerticalOffset: z.number().gt(0).default(40),

  generationBuffer: z.number().gt(0).default(800),
  cleanupMargin: z.number().min(0).default(200),
  maxInactive: z.number().int().min(0).default(50),

  validationInterval: z.number().int().gt(0).default(10),
  lowDensityTolerance: z.number().int().min(0).default(2),

  specialChance: z.number().min(0).max(1).default(0.3),
  unlockHeights: UnlockHeights.default({}),
  kindWeights: KindWeights.default({}),
});

export const GeneratorParams = GeneratorParamsShape.superRefine((params, ctx) => {
  const safeVertical = params.maxJumpHeight * params.safetyMargin;
  const safeHorizontal = params.maxHorizontalReach * params.safetyMargin;

  if (params.maxVerticalGap < params.minVerticalGap) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxVerticalGap'],
      message: 'maxVerticalGap must not be smaller than minVerticalGap',
    });
  }
  if (params.maxVerticalGap > safeVertical) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxVerticalGap'],
      message: `maxVerticalGap ${params.maxVerticalGap} exceeds safe vertical reach ${safeVertical}`,
    });
  }
  if (2 * params.minVerticalGap <= safeVertical) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minVerticalGap'],
      message: `two minimum gaps (${2 * params.minVerticalGap}) must exceed safe vertical reach ${safeVertical}`,
    });
  }
  if (params.minHorizontalOffset > safeHorizontal) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minHorizontalOffset'],
      message: `minHorizontalOffset exceeds safe horizontal reach ${safeHorizontal}`,
    });
  }
  if (params.fallbackOffset > safeHorizontal) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['fallbackOffset'],
      message: `fallbackOffset exceeds safe horizontal reach ${safeHorizontal}`,
    });
  }
  if (params.fillerMaxOffsetX > safeHorizontal || params.fillerMaxRise > safeVertical) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['fillerMaxRise'],
      message: 'filler offsets must stay inside the safe reach envelope',
    });
  }
  if (params.hazardVerticalOffset >= params.minVerticalGap) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['hazardVerticalOffset'],
      message: 'hazardVerticalOffset must be smaller than minVerticalGap so safety platforms stay above the anchor',
    });
  }
  if (params.fillerMaxRise < params.fillerMinRise) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['fillerMaxRise'],
      message: 'fillerMaxRise must not be smaller than fillerMinRise',
    });
  }
});

export type GeneratorParamsInput = z.input<typeof GeneratorParams>;
export type GeneratorParamsT = z.infer<typeof GeneratorParams>;

export const DEFAULT_GENERATOR_PARAMS: GeneratorParamsT = GeneratorParams.parse({});

export interface SafeReach {
  vertical: number;
  horizontal: number;
}

export function safeReach(params: GeneratorParamsT): SafeReach {
  return {
    vertical: params.maxJumpHeight * params.safetyMargin,
    horizontal: params.maxHorizontalReach * params.safetyMargin,
  };
}

/**
 * True when no single jump can clear two consecutive minimum gaps, so the
 * generated chain cannot be skipped by over-jumping an intermediate platform.
 */
export function gapsPreventSkipping(params: GeneratorParamsT): boolean {
  return 2 * params.minVerticalGap > safeReach(params).vertical;
}
