import { closeLogger } from '@rp/logger';
import { vec2 } from '@rp/sim';

import { loadConfig } from './config';
import { readInputScript, readLevel, readRoster } from './loader';
import { logger } from './logger';
import { startMetricsServer, type MetricsServerHandle } from './metrics-server';
import { runPlaytest } from './runner';

let metricsServer: MetricsServerHandle | null = null;

async function main() {
  const config = loadConfig();
  logger.info(
    {
      levelPath: config.levelPath,
      tickHz: config.tickHz,
      maxTicks: config.maxTicks,
      speedOfLight: config.lorentz.speedOfLight,
      seed: config.seed,
    },
    'Starting playtest',
  );

  const [level, roster, script] = await Promise.all([
    readLevel(config.levelPath),
    readRoster(config.enemyManifestPath, config.tickHz),
    readInputScript(config.inputScriptPath),
  ]);

  const report = runPlaytest({
    level,
    roster,
    script,
    maxTicks: config.maxTicks,
    settings: {
      tickHz: config.tickHz,
      gravity: vec2(0, config.gravityY),
      lorentz: config.lorentz,
      tileSize: config.tileSize,
      seed: config.seed,
    },
    log: logger,
  });
  logger.info({ report }, 'Playtest finished');

  if (config.metricsPort === null) {
    closeLogger('playtester');
    return;
  }

  metricsServer = await startMetricsServer(config.metricsPort, report);
  logger.info({ port: config.metricsPort }, 'Serving playtest metrics');

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await metricsServer?.close();
    } catch (error) {
      logger.error({ err: error }, 'Failed to stop metrics server cleanly');
    } finally {
      closeLogger('playtester');
      process.exit(0);
    }
  };

  (['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logger.fatal({ err: error }, 'Unexpected shutdown error');
        process.exit(1);
      });
    });
  });
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Playtest failed');
  (metricsServer?.close() ?? Promise.resolve())
    .catch((err) => logger.error({ err }, 'Failed to stop metrics server after failure'))
    .finally(() => process.exit(1));
});
