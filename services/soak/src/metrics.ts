import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { RunSummary } from './runner';

export interface SoakMetrics {
  registry: Registry;
  runsTotal: Counter<'outcome'>;
  ticksTotal: Counter;
  repairsTotal: Counter;
  runTicks: Histogram;
  maxHeight: Gauge;
  livePlatforms: Gauge;
  reuseEfficiency: Gauge;
}

export function createSoakMetrics(options: { defaultMetrics?: boolean } = {}): SoakMetrics {
  const registry = new Registry();
  if (options.defaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  return {
    registry,
    runsTotal: new Counter({
      name: 'soak_runs_total',
      help: 'Completed soak runs by outcome',
      labelNames: ['outcome'],
      registers: [registry],
    }),
    ticksTotal: new Counter({
      name: 'soak_ticks_total',
      help: 'Simulation ticks stepped across all runs',
      registers: [registry],
    }),
    repairsTotal: new Counter({
      name: 'soak_layout_repairs_total',
      help: 'Platforms inserted by layout repair',
      registers: [registry],
    }),
    runTicks: new Histogram({
      name: 'soak_run_ticks',
      help: 'Ticks survived per run',
      buckets: [60, 300, 600, 1200, 3600, 7200, 18000],
      registers: [registry],
    }),
    maxHeight: new Gauge({
      name: 'soak_max_height',
      help: 'Best height reached by the last run',
      registers: [registry],
    }),
    livePlatforms: new Gauge({
      name: 'soak_live_platforms',
      help: 'Live platforms at the end of the last run',
      registers: [registry],
    }),
    reuseEfficiency: new Gauge({
      name: 'soak_pool_reuse_percent',
      help: 'Share of spawns served from the platform pool in the last run',
      registers: [registry],
    }),
  };
}

export function recordRun(metrics: SoakMetrics, summary: RunSummary): void {
  metrics.runsTotal.labels(summary.outcome).inc();
  metrics.ticksTotal.inc(summary.ticks);
  metrics.repairsTotal.inc(summary.repairs);
  metrics.runTicks.observe(summary.ticks);
  metrics.maxHeight.set(summary.maxHeight);
  metrics.livePlatforms.set(summary.memory.live);
  metrics.reuseEfficiency.set(summary.memory.reuseEfficiency);
}
