import { closeLogger } from '@rp/logger';

import { loadConfig } from './config';
import { logger } from './logger';
import { processLevel } from './process';

async function main() {
  const config = loadConfig();
  logger.info(
    {
      levelPath: config.levelPath,
      levelIdentifier: config.levelIdentifier,
      assetRoot: config.assetRoot,
      outputDir: config.outputDir,
    },
    'Processing level',
  );

  await processLevel(config, { logger });
  closeLogger('level-processor');
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Level processing failed');
  closeLogger('level-processor');
  process.exit(1);
});
