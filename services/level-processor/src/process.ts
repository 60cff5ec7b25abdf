import { promises as fs } from 'node:fs';

import { parseLdtkLevels, type LdtkLevelT, type ProcessedLevelT } from '@rp/level-spec';
import type { Logger } from '@rp/logger';
import { ZodError } from 'zod';

import { assembleLevel, LevelAssemblyError, selectLevel, type TilesetSource } from './assembler';
import type { ProcessorConfig } from './config';
import { readEnemyManifest, unknownSpawnLabels } from './enemies';
import { fileTilesetSource } from './images';
import { saveLevel } from './store';

export async function readLdtkLevels(levelPath: string): Promise<LdtkLevelT[]> {
  const raw = await fs.readFile(levelPath, 'utf8');
  try {
    return parseLdtkLevels(JSON.parse(raw));
  } catch (error) {
    if (error instanceof ZodError || error instanceof SyntaxError) {
      throw new LevelAssemblyError('Parse', `${levelPath}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

export interface ProcessOptions {
  logger: Logger;
  tilesets?: TilesetSource;
}

export async function processLevel(config: ProcessorConfig, options: ProcessOptions): Promise<ProcessedLevelT> {
  const { logger } = options;
  const tilesets = options.tilesets ?? fileTilesetSource(config.assetRoot);

  const levels = await readLdtkLevels(config.levelPath);
  const source = selectLevel(levels, config.levelIdentifier);
  logger.debug({ identifier: source.identifier, candidates: levels.length }, 'Selected level');

  const assembled = await assembleLevel(source, tilesets);

  if (config.enemyManifestPath) {
    const roster = await readEnemyManifest(config.enemyManifestPath, logger);
    for (const label of unknownSpawnLabels(assembled.enemy_spawns, roster)) {
      logger.warn({ label, level: assembled.name }, 'Enemy spawn label missing from manifest');
    }
  }

  const level = await saveLevel(config.outputDir, assembled);
  logger.info(
    {
      level: level.name,
      gridSize: level.grid_size,
      colliders: level.terrain_colliders.length,
      tiles: level.terrain_tileset.depth,
      enemies: level.enemy_spawns.length,
      outputDir: config.outputDir,
    },
    'Level assembled',
  );
  return level;
}
