import { parseLdtkLevels, type LdtkLevelT } from '@rp/level-spec';
import { TilesetError, type SourceImage } from '@rp/sim';
import { describe, expect, it, vi } from 'vitest';

import { assembleLevel, LevelAssemblyError, selectLevel } from './assembler';

// 4x2 single-channel sheet holding two 2x2 tiles side by side.
const sheet: SourceImage = {
  width: 4,
  height: 2,
  format: 'r8unorm',
  data: Uint8Array.from([0, 1, 2, 3, 4, 5, 6, 7]),
};

function tilesetSource(image: SourceImage = sheet) {
  return { load: vi.fn(async (_relativePath: string) => image) };
}

interface LayerOverrides {
  entities?: unknown[];
  csv?: number[];
  tilesetPath?: string | null;
  gridTiles?: unknown[];
  autoLayerTiles?: unknown[];
  offset?: [number, number];
}

function ldtkLevel(overrides: LayerOverrides = {}, identifier = 'Level_0'): LdtkLevelT {
  const grid = { __cWid: 3, __cHei: 2, __gridSize: 2 };
  const [level] = parseLdtkLevels({
    identifier,
    layerInstances: [
      {
        __identifier: 'Entities',
        __type: 'Entities',
        ...grid,
        entityInstances: overrides.entities ?? [
          { __identifier: 'Player_Spawn', __grid: [0, 0] },
          {
            __identifier: 'Enemy_Spawn',
            __grid: [2, 1],
            fieldInstances: [{ __identifier: 'label', __value: 'slime' }],
          },
          { __identifier: 'Enemy_Spawn', __grid: [1, 0] },
        ],
      },
      {
        __identifier: 'Terrain',
        __type: 'IntGrid',
        ...grid,
        __pxTotalOffsetX: overrides.offset?.[0] ?? 0,
        __pxTotalOffsetY: overrides.offset?.[1] ?? 0,
        // Top row first, as the editor stores it.
        intGridCsv: overrides.csv ?? [1, 0, 0, 1, 1, 1],
      },
      {
        __identifier: 'TerrainTiles',
        __type: 'Tiles',
        ...grid,
        __tilesetRelPath: overrides.tilesetPath === undefined ? 'tiles/terrain.png' : overrides.tilesetPath,
        gridTiles: overrides.gridTiles ?? [
          { px: [0, 0], src: [0, 0], t: 0 },
          { px: [0, 2], src: [2, 0], t: 1 },
          { px: [2, 2], src: [0, 0], t: 0 },
          { px: [4, 2], src: [2, 0], t: 1 },
        ],
        autoLayerTiles: overrides.autoLayerTiles ?? [],
      },
    ],
  });
  return level;
}

// Bare level of the given size whose only tiles are `gridTiles`.
function sizedLevel(width: number, height: number, gridTiles: unknown[]): LdtkLevelT {
  const grid = { __cWid: width, __cHei: height, __gridSize: 2 };
  const [level] = parseLdtkLevels({
    identifier: 'Sized',
    layerInstances: [
      {
        __identifier: 'Entities',
        __type: 'Entities',
        ...grid,
        entityInstances: [{ __identifier: 'Player_Spawn', __grid: [0, 0] }],
      },
      {
        __identifier: 'Terrain',
        __type: 'IntGrid',
        ...grid,
        intGridCsv: new Array<number>(width * height).fill(0),
      },
      {
        __identifier: 'TerrainTiles',
        __type: 'Tiles',
        ...grid,
        __tilesetRelPath: 'tiles/terrain.png',
        gridTiles,
      },
    ],
  });
  return level;
}

describe('assembleLevel', () => {
  it('assembles colliders, tiles and spawns with rows counted upward', async () => {
    const tilesets = tilesetSource();
    const level = await assembleLevel(ldtkLevel(), tilesets);

    expect(tilesets.load).toHaveBeenCalledWith('tiles/terrain.png');
    expect(level.name).toBe('Level_0');
    expect(level.grid_size).toEqual([3, 2]);
    expect(level.grid_offset).toEqual([0, 0]);
    expect(level.player_spawn).toEqual([0, 1]);
    expect(level.enemy_spawns).toEqual([
      { label: 'slime', position: [2, 0] },
      { label: 'Enemy_Spawn', position: [1, 1] },
    ]);
    expect(level.terrain_colliders).toEqual([
      { min: [0, 0], max: [3, 1] },
      { min: [0, 1], max: [1, 2] },
    ]);
    expect(level.terrain_tiledata).toEqual([1, 0, 1, 0, null, null]);
  });

  it('copies each source tile into the atlas once', async () => {
    const { terrain_atlas: atlas } = await assembleLevel(ldtkLevel(), tilesetSource());

    expect(atlas.width).toBe(2);
    expect(atlas.height).toBe(2);
    expect(atlas.depth).toBe(2);
    expect(atlas.format).toBe('r8unorm');
    expect([...atlas.data]).toEqual([0, 1, 4, 5, 2, 3, 6, 7]);
  });

  it('falls back to auto-layer tiles when no tiles were painted', async () => {
    const level = await assembleLevel(
      ldtkLevel({ gridTiles: [], autoLayerTiles: [{ px: [2, 0], src: [2, 0], t: 9 }] }),
      tilesetSource(),
    );

    expect(level.terrain_tiledata).toEqual([null, null, null, null, 0, null]);
    expect([...level.terrain_atlas.data]).toEqual([2, 3, 6, 7]);
  });

  it('leaves a single-row tile layer as it is', async () => {
    const level = await assembleLevel(
      sizedLevel(3, 1, [
        { px: [0, 0], src: [0, 0], t: 0 },
        { px: [4, 0], src: [2, 0], t: 1 },
      ]),
      tilesetSource(),
    );

    expect(level.terrain_tiledata).toEqual([0, null, 1]);
  });

  it('keeps the middle row of an odd-height layer in place', async () => {
    const level = await assembleLevel(
      sizedLevel(2, 3, [
        { px: [0, 0], src: [0, 0], t: 0 },
        { px: [2, 2], src: [2, 0], t: 1 },
        { px: [2, 4], src: [0, 0], t: 0 },
      ]),
      tilesetSource(),
    );

    expect(level.terrain_tiledata).toEqual([null, 0, null, 1, 0, null]);
  });

  it('converts the terrain pixel offset into cells', async () => {
    const level = await assembleLevel(ldtkLevel({ offset: [-4, 6] }), tilesetSource());
    expect(level.grid_offset).toEqual([-2, -3]);
  });

  it('fails on a missing layer', async () => {
    const [level] = parseLdtkLevels({ identifier: 'Bare', layerInstances: [] });
    await expect(assembleLevel(level, tilesetSource())).rejects.toMatchObject({
      name: 'LevelAssemblyError',
      code: 'MissingLayer',
    });
  });

  it('fails without a player spawn', async () => {
    const level = ldtkLevel({ entities: [{ __identifier: 'Enemy_Spawn', __grid: [0, 0] }] });
    await expect(assembleLevel(level, tilesetSource())).rejects.toMatchObject({ code: 'MissingEntity' });
  });

  it('fails without a tileset path and never loads an image', async () => {
    const tilesets = tilesetSource();
    await expect(assembleLevel(ldtkLevel({ tilesetPath: null }), tilesets)).rejects.toMatchObject({
      code: 'MissingTileset',
    });
    expect(tilesets.load).not.toHaveBeenCalled();
  });

  it('fails on a terrain grid of the wrong size', async () => {
    await expect(assembleLevel(ldtkLevel({ csv: [1, 1] }), tilesetSource())).rejects.toMatchObject({
      code: 'Parse',
    });
  });

  it('fails on tiles placed outside the layer', async () => {
    const level = ldtkLevel({ gridTiles: [{ px: [6, 0], src: [0, 0], t: 0 }] });
    await expect(assembleLevel(level, tilesetSource())).rejects.toMatchObject({ code: 'Parse' });
  });

  it('wraps atlas failures', async () => {
    const level = ldtkLevel({ gridTiles: [{ px: [0, 0], src: [4, 0], t: 0 }] });
    const error: unknown = await assembleLevel(level, tilesetSource()).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(LevelAssemblyError);
    expect(error).toMatchObject({ code: 'Tileset' });
    if (error instanceof LevelAssemblyError) {
      expect(error.cause).toBeInstanceOf(TilesetError);
      expect(error.cause).toMatchObject({ code: 'InvalidSourceOffset' });
    }
  });
});

describe('selectLevel', () => {
  const first = ldtkLevel({}, 'Level_0');
  const second = ldtkLevel({}, 'Level_1');

  it('takes a standalone level whatever its identifier', () => {
    expect(selectLevel([second], 'Level_0')).toBe(second);
  });

  it('picks a project level by identifier', () => {
    expect(selectLevel([first, second], 'Level_1')).toBe(second);
  });

  it('fails on an unknown identifier', () => {
    expect(() => selectLevel([first, second], 'Level_9')).toThrow(
      new LevelAssemblyError('MissingLevel', 'level Level_9 not found (have: Level_0, Level_1)'),
    );
  });
});
