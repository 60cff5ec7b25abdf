import { promises as fs } from 'node:fs';
import path from 'node:path';

import { ProcessedLevel, type ProcessedLevelT } from '@rp/level-spec';
import { PIXEL_FORMATS, pixelSize, type ArrayImage } from '@rp/sim';
import stringify from 'fast-json-stable-stringify';

import { LevelAssemblyError, type AssembledLevel } from './assembler';

export const LEVEL_FILE = 'level.json';
export const TILESET_FILE = 'tileset.bin';

export interface StoredLevel {
  level: ProcessedLevelT;
  atlas: ArrayImage;
}

/**
 * Writes `level.json` (stable key order, so reprocessing an unchanged level
 * gives an identical file) and the raw atlas layers beside it.
 */
export async function saveLevel(outputDir: string, assembled: AssembledLevel): Promise<ProcessedLevelT> {
  const { terrain_atlas: atlas, ...rest } = assembled;
  const level = ProcessedLevel.parse({
    ...rest,
    terrain_tileset: {
      file: TILESET_FILE,
      width: atlas.width,
      height: atlas.height,
      depth: atlas.depth,
      format: atlas.format,
    },
  });

  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(path.join(outputDir, TILESET_FILE), atlas.data);
  await fs.writeFile(path.join(outputDir, LEVEL_FILE), `${stringify(level)}\n`, 'utf8');
  return level;
}

export async function readProcessedLevel(levelPath: string): Promise<ProcessedLevelT> {
  const raw = await fs.readFile(levelPath, 'utf8');
  const result = ProcessedLevel.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new LevelAssemblyError('Parse', `${levelPath}: ${result.error.message}`, { cause: result.error });
  }
  return result.data;
}

export async function loadLevel(outputDir: string): Promise<StoredLevel> {
  const level = await readProcessedLevel(path.join(outputDir, LEVEL_FILE));
  const descriptor = level.terrain_tileset;

  const format = PIXEL_FORMATS.find((candidate) => candidate === descriptor.format);
  if (!format) {
    throw new LevelAssemblyError('Parse', `unknown tileset format ${descriptor.format}`);
  }

  const px = pixelSize(format);
  const data = new Uint8Array(await fs.readFile(path.join(outputDir, descriptor.file)));
  const expected = descriptor.width * descriptor.height * descriptor.depth * (px ?? 0);
  if (px === null || data.byteLength !== expected) {
    throw new LevelAssemblyError(
      'Parse',
      `${descriptor.file} holds ${data.byteLength} bytes, expected ${descriptor.depth} ${descriptor.width}x${descriptor.height} ${format} layers`,
    );
  }

  return {
    level,
    atlas: {
      width: descriptor.width,
      height: descriptor.height,
      depth: descriptor.depth,
      format,
      data,
      sampler: 'nearest',
      usage: 'render-world',
    },
  };
}
