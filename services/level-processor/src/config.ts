import 'dotenv/config';

import path from 'node:path';

import { z } from 'zod';

const DEFAULT_LEVEL_IDENTIFIER = 'Level_0';
const DEFAULT_OUTPUT_DIR = './out/levels';

const EnvSchema = z.object({
  LEVEL_PATH: z.string().optional(),
  ENEMY_MANIFEST_PATH: z.string().optional(),
  ASSET_ROOT: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),
  LEVEL_IDENTIFIER: z.string().optional(),
});

export interface ProcessorConfig {
  levelPath: string;
  enemyManifestPath: string | null;
  /** Directory tileset paths are resolved against; LDtk stores them relative to the level file. */
  assetRoot: string;
  outputDir: string;
  levelIdentifier: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function trimmed(value: string | undefined): string | null {
  const result = value?.trim() ?? '';
  return result.length > 0 ? result : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProcessorConfig {
  const parsed = EnvSchema.parse(env);

  const levelPath = trimmed(parsed.LEVEL_PATH);
  if (!levelPath) {
    throw new ConfigError('LEVEL_PATH must point at an .ldtk project or .ldtkl level');
  }

  return {
    levelPath,
    enemyManifestPath: trimmed(parsed.ENEMY_MANIFEST_PATH),
    assetRoot: trimmed(parsed.ASSET_ROOT) ?? path.dirname(levelPath),
    outputDir: trimmed(parsed.OUTPUT_DIR) ?? DEFAULT_OUTPUT_DIR,
    levelIdentifier: trimmed(parsed.LEVEL_IDENTIFIER) ?? DEFAULT_LEVEL_IDENTIFIER,
  };
}
