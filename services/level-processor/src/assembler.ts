import type { EnemySpawnT, LdtkLayerT, LdtkLevelT, LdtkTileT, ProcessedLevelT, TerrainColliderT } from '@rp/level-spec';
import {
  CollisionGrid,
  TilesetAtlasBuilder,
  TilesetError,
  type ArrayImage,
  type SourceImage,
} from '@rp/sim';

export const ENTITIES_LAYER = 'Entities';
export const TERRAIN_LAYER = 'Terrain';
export const TERRAIN_TILES_LAYER = 'TerrainTiles';
export const PLAYER_SPAWN = 'Player_Spawn';
export const ENEMY_SPAWN = 'Enemy_Spawn';

export type LevelAssemblyErrorCode =
  | 'MissingLevel'
  | 'MissingLayer'
  | 'MissingEntity'
  | 'MissingTileset'
  | 'Parse'
  | 'Tileset';

export class LevelAssemblyError extends Error {
  readonly code: LevelAssemblyErrorCode;

  constructor(code: LevelAssemblyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LevelAssemblyError';
    this.code = code;
  }
}

/** Loads tileset images by the path the level editor stored for them. */
export interface TilesetSource {
  load(relativePath: string): Promise<SourceImage>;
}

/** A processed level whose terrain atlas has not been written anywhere yet. */
export type AssembledLevel = Omit<ProcessedLevelT, 'terrain_tileset'> & {
  terrain_atlas: ArrayImage;
};

export function selectLevel(levels: readonly LdtkLevelT[], identifier: string): LdtkLevelT {
  if (levels.length === 1) {
    return levels[0];
  }
  const level = levels.find((candidate) => candidate.identifier === identifier);
  if (!level) {
    const known = levels.map((candidate) => candidate.identifier).join(', ');
    throw new LevelAssemblyError('MissingLevel', `level ${identifier} not found (have: ${known})`);
  }
  return level;
}

function findLayer(level: LdtkLevelT, identifier: string): LdtkLayerT {
  const layer = level.layer_instances?.find((candidate) => candidate.identifier === identifier);
  if (!layer) {
    throw new LevelAssemblyError('MissingLayer', `level ${level.identifier} has no ${identifier} layer`);
  }
  return layer;
}

// Math.trunc keeps the sign of zero; adding 0 normalises -0.
const toCells = (px: number, gridSize: number): number => Math.trunc(px / gridSize) + 0;

/** LDtk counts rows downward; the world counts them upward. */
const flipRow = (layer: LdtkLayerT, y: number): number => layer.c_hei - y - 1;

function playerSpawn(entities: LdtkLayerT): [number, number] {
  const spawn = entities.entity_instances.find((entity) => entity.identifier === PLAYER_SPAWN);
  if (!spawn) {
    throw new LevelAssemblyError('MissingEntity', `${ENTITIES_LAYER} layer has no ${PLAYER_SPAWN}`);
  }
  return [spawn.grid[0], flipRow(entities, spawn.grid[1])];
}

function enemySpawns(entities: LdtkLayerT): EnemySpawnT[] {
  return entities.entity_instances
    .filter((entity) => entity.identifier === ENEMY_SPAWN)
    .map((entity): EnemySpawnT => {
      const label = entity.fields.label;
      return {
        label: typeof label === 'string' && label.length > 0 ? label : entity.identifier,
        position: [entity.grid[0], flipRow(entities, entity.grid[1])],
      };
    });
}

function terrainColliders(terrain: LdtkLayerT): TerrainColliderT[] {
  const { c_wid: width, c_hei: height } = terrain;
  if (terrain.int_grid_csv.length !== width * height) {
    throw new LevelAssemblyError(
      'Parse',
      `${TERRAIN_LAYER} grid holds ${terrain.int_grid_csv.length} cells, expected ${width * height}`,
    );
  }

  const grid = CollisionGrid.empty({ min: { x: 0, y: 0 }, max: { x: width, y: height } });
  terrain.int_grid_csv.forEach((value, index) => {
    const x = index % width;
    const y = Math.floor(index / width);
    grid.set({ x, y: flipRow(terrain, y) }, value !== 0);
  });

  return grid.build().map((rect): TerrainColliderT => ({
    min: [rect.min.x, rect.min.y],
    max: [rect.max.x, rect.max.y],
  }));
}

function flipRows<T>(data: T[], width: number, height: number): void {
  for (let y = 0; y < Math.floor(height / 2); y += 1) {
    const top = y * width;
    const bottom = (height - 1 - y) * width;
    for (let x = 0; x < width; x += 1) {
      const swap = data[top + x];
      data[top + x] = data[bottom + x];
      data[bottom + x] = swap;
    }
  }
}

async function terrainTiles(
  layer: LdtkLayerT,
  tilesets: TilesetSource,
): Promise<{ tiledata: (number | null)[]; atlas: ArrayImage }> {
  if (!layer.tileset_rel_path) {
    throw new LevelAssemblyError('MissingTileset', `${TERRAIN_TILES_LAYER} layer has no tileset`);
  }
  const image = await tilesets.load(layer.tileset_rel_path);

  const { c_wid: width, c_hei: height, grid_size: tileSize } = layer;
  const tiles: LdtkTileT[] = layer.grid_tiles.length > 0 ? layer.grid_tiles : layer.auto_layer_tiles;

  try {
    const builder = TilesetAtlasBuilder.create({ x: tileSize, y: tileSize }, image.format);
    const atlasIndex = new Map<number, number>();
    const tiledata = new Array<number | null>(width * height).fill(null);

    for (const tile of tiles) {
      let index = atlasIndex.get(tile.t);
      if (index === undefined) {
        index = builder.addTile(image, { x: tile.src[0], y: tile.src[1] });
        atlasIndex.set(tile.t, index);
      }

      const cellX = Math.floor(tile.px[0] / tileSize);
      const cellY = Math.floor(tile.px[1] / tileSize);
      if (cellX < 0 || cellY < 0 || cellX >= width || cellY >= height) {
        throw new LevelAssemblyError(
          'Parse',
          `tile ${tile.t} at pixel (${tile.px[0]}, ${tile.px[1]}) lies outside the ${width}x${height} layer`,
        );
      }
      tiledata[cellX + width * cellY] = index;
    }

    flipRows(tiledata, width, height);
    return { tiledata, atlas: builder.build() };
  } catch (error) {
    if (error instanceof TilesetError) {
      throw new LevelAssemblyError('Tileset', `${TERRAIN_TILES_LAYER}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Turns one editor level into its runtime form: reduced terrain colliders,
 * a deduplicated tile atlas, and the player and enemy spawn cells.
 */
export async function assembleLevel(level: LdtkLevelT, tilesets: TilesetSource): Promise<AssembledLevel> {
  const entities = findLayer(level, ENTITIES_LAYER);
  const terrain = findLayer(level, TERRAIN_LAYER);
  const tileLayer = findLayer(level, TERRAIN_TILES_LAYER);

  if (tileLayer.c_wid !== terrain.c_wid || tileLayer.c_hei !== terrain.c_hei) {
    throw new LevelAssemblyError(
      'Parse',
      `${TERRAIN_TILES_LAYER} is ${tileLayer.c_wid}x${tileLayer.c_hei} but ${TERRAIN_LAYER} is ${terrain.c_wid}x${terrain.c_hei}`,
    );
  }

  const player_spawn = playerSpawn(entities);
  const terrain_colliders = terrainColliders(terrain);
  const { tiledata, atlas } = await terrainTiles(tileLayer, tilesets);

  return {
    name: level.identifier,
    grid_size: [terrain.c_wid, terrain.c_hei],
    grid_offset: [
      toCells(terrain.px_total_offset_x, terrain.grid_size),
      toCells(-terrain.px_total_offset_y, terrain.grid_size),
    ],
    player_spawn,
    enemy_spawns: enemySpawns(entities),
    terrain_atlas: atlas,
    terrain_tiledata: tiledata,
    terrain_colliders,
  };
}
