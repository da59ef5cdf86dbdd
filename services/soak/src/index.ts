import 'dotenv/config';

import { writeFile } from 'node:fs/promises';

import { closeLogger, makeLogger } from '@skyclimb/logger';

import { loadConfig } from './config';
import { createSoakMetrics } from './metrics';
import { runSoak } from './runner';

const config = loadConfig();
const logger = makeLogger('soak', { level: config.logLevel });

async function main() {
  logger.info(
    {
      seed: config.seed,
      runs: config.runs,
      ticksPerRun: config.ticksPerRun,
      generator: config.generator,
    },
    'Starting soak runs',
  );

  const metrics = createSoakMetrics({ defaultMetrics: true });
  const report = runSoak(config, { logger, metrics });

  logger.info(
    { bestHeight: Math.round(report.bestHeight), survived: report.survived, runs: report.runs.length },
    'Soak complete',
  );

  if (config.metricsFile) {
    await writeFile(config.metricsFile, await metrics.registry.metrics(), 'utf8');
    logger.info({ file: config.metricsFile }, 'Wrote metrics snapshot');
  }
}

main()
  .then(() => closeLogger('soak'))
  .catch((error) => {
    logger.fatal({ err: error }, 'Soak run failed');
    closeLogger('soak')
      .catch((err) => console.error('Failed to close logger', err))
      .finally(() => process.exit(1));
  });
