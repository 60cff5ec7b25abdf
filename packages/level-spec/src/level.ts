import { z } from 'zod';

const IVec2 = z.tuple([z.number().int(), z.number().int()]);
const UVec2 = z.tuple([z.number().int().min(0), z.number().int().min(0)]);

export const TerrainCollider = z.object({
  min: UVec2,
  max: UVec2,
});

export const EnemySpawn = z.object({
  label: z.string(),
  position: IVec2,
});

export const TilesetDescriptor = z.object({
  file: z.string(),
  width: z.number().int().gt(0),
  height: z.number().int().gt(0),
  depth: z.number().int().min(0),
  format: z.string(),
});

/** A level after processing: colliders reduced, tiles packed into a layered atlas. */
export const ProcessedLevel = z
  .object({
    name: z.string(),
    grid_size: UVec2,
    grid_offset: IVec2,
    player_spawn: IVec2,
    enemy_spawns: z.array(EnemySpawn).default([]),
    terrain_tileset: TilesetDescriptor,
    terrain_tiledata: z.array(z.number().int().min(0).nullable()),
    terrain_colliders: z.array(TerrainCollider),
  })
  .superRefine((level, ctx) => {
    const [width, height] = level.grid_size;

    if (level.terrain_tiledata.length !== width * height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['terrain_tiledata'],
        message: `expected ${width * height} tiles, got ${level.terrain_tiledata.length}`,
      });
    }

    level.terrain_tiledata.forEach((tile, index) => {
      if (tile !== null && tile >= level.terrain_tileset.depth) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['terrain_tiledata', index],
          message: `tile ${tile} outside tileset depth ${level.terrain_tileset.depth}`,
        });
      }
    });

    level.terrain_colliders.forEach((collider, index) => {
      const [minX, minY] = collider.min;
      const [maxX, maxY] = collider.max;
      if (maxX <= minX || maxY <= minY || maxX > width || maxY > height) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['terrain_colliders', index],
          message: 'collider must be non-empty and inside the grid',
        });
      }
    });
  });

export type TerrainColliderT = z.infer<typeof TerrainCollider>;
export type EnemySpawnT = z.infer<typeof EnemySpawn>;
export type TilesetDescriptorT = z.infer<typeof TilesetDescriptor>;
export type ProcessedLevelT = z.infer<typeof ProcessedLevel>;

export function levelBounds(level: Pick<ProcessedLevelT, 'grid_offset' | 'grid_size'>): {
  min: [number, number];
  max: [number, number];
} {
  const [ox, oy] = level.grid_offset;
  const [w, h] = level.grid_size;
  return { min: [ox, oy], max: [ox + w, oy + h] };
}
