import { z } from 'zod';

export const PLATFORM_KINDS = [
  'plain',
  'conveyor',
  'breakable',
  'horizontal',
  'vertical',
  'bouncy',
  'hazardous',
] as const;

export const PlatformKind = z.enum(PLATFORM_KINDS);

export type PlatformKindT = z.infer<typeof PlatformKind>;
export type SpecialKind = Exclude<PlatformKindT, 'plain'>;

export const SPECIAL_KINDS: readonly SpecialKind[] = PLATFORM_KINDS.filter(
  (kind): kind is SpecialKind => kind !== 'plain',
);

export function isSpecialKind(kind: PlatformKindT): kind is SpecialKind {
  return kind !== 'plain';
}

export const PlatformTuning = z.object({
  conveyorSpeed: z.number().gt(0).default(3.5),
  breakDelaySec: z.number().gt(0).default(1),
  horizontalSpeed: z.number().gt(0).default(1),
  horizontalRange: z.number().gt(0).default(100),
  verticalSpeed: z.number().gt(0).default(0.8),
  verticalRange: z.number().gt(0).default(80),
  bounceMultiplier: z.number().gt(1).default(2),
  boundsPadding: z.number().min(0).default(10),
});

export type PlatformTuningT = z.infer<typeof PlatformTuning>;

export const DEFAULT_PLATFORM_TUNING: PlatformTuningT = PlatformTuning.parse({});
