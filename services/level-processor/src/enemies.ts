import { promises as fs } from 'node:fs';

import type { EnemySpawnT } from '@rp/level-spec';
import type { Logger } from '@rp/logger';
import { EnemyManifestError, parseEnemyManifest, type EnemyRoster } from '@rp/sim';

export async function readEnemyManifest(manifestPath: string, logger: Logger): Promise<EnemyRoster> {
  const raw = await fs.readFile(manifestPath, 'utf8');

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new EnemyManifestError('Parse', `${manifestPath} is not valid JSON: ${String(error)}`);
  }

  const roster = parseEnemyManifest(document);
  for (const enemy of roster.values()) {
    logger.debug({ label: enemy.label, name: enemy.name, animations: [...enemy.animations.keys()] }, 'Loaded enemy');
  }
  logger.info({ path: manifestPath, enemies: roster.size }, 'Enemy manifest loaded');
  return roster;
}

/** Labels spawned by the level that the roster cannot instantiate. */
export function unknownSpawnLabels(spawns: readonly EnemySpawnT[], roster: EnemyRoster): string[] {
  return [...new Set(spawns.map((spawn) => spawn.label).filter((label) => !roster.has(label)))];
}
