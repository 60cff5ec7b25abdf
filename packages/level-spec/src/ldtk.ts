import { z } from 'zod';

const GridPoint = z.tuple([z.number().int(), z.number().int()]);

const FieldInstance = z.object({
  __identifier: z.string(),
  __value: z.unknown(),
});

const Tile = z
  .object({
    px: GridPoint,
    src: GridPoint,
    t: z.number().int().min(0),
    f: z.number().int().min(0).max(3).default(0),
  })
  .transform((tile) => ({
    px: tile.px,
    src: tile.src,
    t: tile.t,
    flip: tile.f,
  }));

const EntityInstance = z
  .object({
    __identifier: z.string(),
    __grid: GridPoint,
    fieldInstances: z.array(FieldInstance).default([]),
  })
  .transform((entity) => ({
    identifier: entity.__identifier,
    grid: entity.__grid,
    fields: Object.fromEntries(
      entity.fieldInstances.map((field): [string, unknown] => [field.__identifier, field.__value]),
    ),
  }));

const LayerInstance = z
  .object({
    __identifier: z.string(),
    __type: z.string().optional(),
    __cWid: z.number().int().min(0),
    __cHei: z.number().int().min(0),
    __gridSize: z.number().int().gt(0),
    __pxTotalOffsetX: z.number().int().default(0),
    __pxTotalOffsetY: z.number().int().default(0),
    __tilesetRelPath: z.string().nullable().optional(),
    intGridCsv: z.array(z.number().int()).default([]),
    gridTiles: z.array(Tile).default([]),
    autoLayerTiles: z.array(Tile).default([]),
    entityInstances: z.array(EntityInstance).default([]),
  })
  .transform((layer) => ({
    identifier: layer.__identifier,
    type: layer.__type ?? null,
    c_wid: layer.__cWid,
    c_hei: layer.__cHei,
    grid_size: layer.__gridSize,
    px_total_offset_x: layer.__pxTotalOffsetX,
    px_total_offset_y: layer.__pxTotalOffsetY,
    tileset_rel_path: layer.__tilesetRelPath ?? null,
    int_grid_csv: layer.intGridCsv,
    grid_tiles: layer.gridTiles,
    auto_layer_tiles: layer.autoLayerTiles,
    entity_instances: layer.entityInstances,
  }));

/** A single level, either a standalone `.ldtkl` file or one entry of a project's `levels`. */
export const LdtkLevel = z
  .object({
    identifier: z.string(),
    worldX: z.number().int().default(0),
    worldY: z.number().int().default(0),
    layerInstances: z.array(LayerInstance).nullable().default(null),
  })
  .transform((level) => ({
    identifier: level.identifier,
    world_x: level.worldX,
    world_y: level.worldY,
    layer_instances: level.layerInstances,
  }));

export const LdtkProject = z.object({
  levels: z.array(LdtkLevel),
});

export type LdtkTileT = z.infer<typeof Tile>;
export type LdtkEntityT = z.infer<typeof EntityInstance>;
export type LdtkLayerT = z.infer<typeof LayerInstance>;
export type LdtkLevelT = z.infer<typeof LdtkLevel>;
export type LdtkProjectT = z.infer<typeof LdtkProject>;

function isProjectDocument(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'levels' in raw;
}

/**
 * Parses an LDtk document. Projects (`.ldtk`) yield every embedded level; a
 * standalone level file (`.ldtkl`) yields itself.
 */
export function parseLdtkLevels(raw: unknown): LdtkLevelT[] {
  if (isProjectDocument(raw)) {
    return LdtkProject.parse(raw).levels;
  }
  return [LdtkLevel.parse(raw)];
}
