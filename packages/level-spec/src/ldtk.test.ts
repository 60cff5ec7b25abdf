import { describe, expect, it } from 'vitest';

import { parseLdtkLevels } from './ldtk';

const levelDocument = {
  identifier: 'Level_0',
  worldX: 256,
  worldY: 0,
  layerInstances: [
    {
      __identifier: 'Entities',
      __type: 'Entities',
      __cWid: 2,
      __cHei: 2,
      __gridSize: 16,
      entityInstances: [
        {
          __identifier: 'Enemy_Spawn',
          __grid: [1, 0],
          fieldInstances: [{ __identifier: 'label', __value: 'slime' }],
        },
      ],
    },
    {
      __identifier: 'TerrainTiles',
      __type: 'Tiles',
      __cWid: 2,
      __cHei: 2,
      __gridSize: 16,
      __pxTotalOffsetX: -32,
      __tilesetRelPath: 'tiles/terrain.png',
      gridTiles: [{ px: [16, 0], src: [32, 48], t: 11, f: 1 }],
    },
  ],
};

describe('ldtk', () => {
  it('normalises a standalone level', () => {
    const [level] = parseLdtkLevels(levelDocument);

    expect(level.identifier).toBe('Level_0');
    expect(level.world_x).toBe(256);
    expect(level.layer_instances).toHaveLength(2);

    const [entities, tiles] = level.layer_instances ?? [];
    expect(entities.entity_instances).toEqual([
      { identifier: 'Enemy_Spawn', grid: [1, 0], fields: { label: 'slime' } },
    ]);
    expect(entities.tileset_rel_path).toBeNull();
    expect(tiles.px_total_offset_x).toBe(-32);
    expect(tiles.px_total_offset_y).toBe(0);
    expect(tiles.tileset_rel_path).toBe('tiles/terrain.png');
    expect(tiles.grid_tiles).toEqual([{ px: [16, 0], src: [32, 48], t: 11, flip: 1 }]);
    expect(tiles.auto_layer_tiles).toEqual([]);
    expect(tiles.int_grid_csv).toEqual([]);
  });

  it('returns every level of a project', () => {
    const levels = parseLdtkLevels({
      levels: [levelDocument, { identifier: 'Level_1', layerInstances: null }],
    });
    expect(levels.map((level) => level.identifier)).toEqual(['Level_0', 'Level_1']);
    expect(levels[1].layer_instances).toBeNull();
  });

  it('rejects layers without a grid size', () => {
    expect(() =>
      parseLdtkLevels({
        identifier: 'Broken',
        layerInstances: [{ __identifier: 'Terrain', __cWid: 1, __cHei: 1 }],
      }),
    ).toThrow();
  });
});
