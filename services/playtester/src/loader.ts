import { promises as fs } from 'node:fs';

import { ProcessedLevel, type ProcessedLevelT } from '@rp/level-spec';
import { parseEnemyManifest, type EnemyRoster, type InputCmd } from '@rp/sim';
import { z } from 'zod';

const InputCommand = z
  .object({
    t: z.number().int().min(0),
    left: z.boolean().optional(),
    right: z.boolean().optional(),
    jump: z.boolean().optional(),
    run: z.boolean().optional(),
  })
  .strict();

const InputScriptFile = z.array(InputCommand);

/** Hold right and run for the whole playtest. */
export const DEFAULT_SCRIPT: readonly InputCmd[] = [{ t: 0, right: true }];

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON`, { cause: error });
  }
}

export async function readLevel(levelPath: string): Promise<ProcessedLevelT> {
  const result = ProcessedLevel.safeParse(await readJson(levelPath));
  if (!result.success) {
    throw new Error(`${levelPath} is not a processed level: ${result.error.message}`, { cause: result.error });
  }
  return result.data;
}

export async function readRoster(manifestPath: string | null, tickHz?: number): Promise<EnemyRoster> {
  if (!manifestPath) {
    return new Map();
  }
  return parseEnemyManifest(await readJson(manifestPath), tickHz);
}

export async function readInputScript(scriptPath: string | null): Promise<readonly InputCmd[]> {
  if (!scriptPath) {
    return DEFAULT_SCRIPT;
  }
  const result = InputScriptFile.safeParse(await readJson(scriptPath));
  if (!result.success) {
    throw new Error(`${scriptPath} is not an input script: ${result.error.message}`, { cause: result.error });
  }
  return result.data;
}
