import { z } from 'zod';

const EnvSchema = z.object({
  SOAK_SEED: z.string().optional(),
  SOAK_RUNS: z.string().optional(),
  SOAK_TICKS: z.string().optional(),
  SOAK_VALIDATION_INTERVAL: z.string().optional(),
  SOAK_MAX_INACTIVE: z.string().optional(),
  SOAK_METRICS_FILE: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

export interface SoakConfig {
  seed: string;
  runs: number;
  ticksPerRun: number;
  generator: {
    validationInterval: number;
    maxInactive: number;
  };
  metricsFile: string | null;
  logLevel: string;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function positive(value: number, fallback: number): number {
  return value > 0 ? value : fallback;
}

function trimmedOr(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SoakConfig {
  const parsed = EnvSchema.parse(env);
  const metricsFile = parsed.SOAK_METRICS_FILE?.trim();

  return {
    seed: trimmedOr(parsed.SOAK_SEED, 'soak'),
    runs: positive(parseInteger(parsed.SOAK_RUNS, 3), 3),
    ticksPerRun: positive(parseInteger(parsed.SOAK_TICKS, 3_600), 3_600),
    generator: {
      validationInterval: positive(parseInteger(parsed.SOAK_VALIDATION_INTERVAL, 10), 10),
      maxInactive: Math.max(0, parseInteger(parsed.SOAK_MAX_INACTIVE, 50)),
    },
    metricsFile: metricsFile && metricsFile.length > 0 ? metricsFile : null,
    logLevel: trimmedOr(parsed.LOG_LEVEL, 'info').toLowerCase(),
  };
}
