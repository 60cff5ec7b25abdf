import { z } from 'zod';

const Vec2 = z.tuple([z.number(), z.number()]);
const UVec2 = z.tuple([z.number().int().min(0), z.number().int().min(0)]);

export const REQUIRED_ENEMY_ANIMATIONS = ['idle', 'walk', 'jump', 'peak', 'fall'] as const;

export type EnemyAnimationName = (typeof REQUIRED_ENEMY_ANIMATIONS)[number];

const EnemyAtlasLayout = z.object({
  rows: z.number().int().gt(0),
  cols: z.number().int().gt(0),
  size: UVec2,
});

const EnemyAnimation = z
  .object({
    start: z.number().int().min(0),
    end: z.number().int().min(0),
    frame_millis: z.number().int().gt(0),
  })
  .refine((animation) => animation.end >= animation.start, {
    message: 'animation end must not precede its start',
  });

const RectangleCollider = z.object({
  shape: z.literal('Rectangle'),
  width: z.number().gt(0),
  height: z.number().gt(0),
  offset: Vec2.default([0, 0]),
});

const CapsuleCollider = z.object({
  shape: z.literal('Capsule'),
  radius: z.number().gt(0),
  height: z.number().min(0),
  offset: Vec2.default([0, 0]),
});

export const EnemyCollider = z.discriminatedUnion('shape', [RectangleCollider, CapsuleCollider]);

export const EnemyMovement = z
  .object({
    max_speed: z.number().min(0).default(1),
    accel_air: z.number().min(0).default(0.1),
    accel_ground: z.number().min(0).default(1),
    jump_strength: z.number().min(0).default(20),
    damping_factor_air: z.number().min(0).default(0.9),
    damping_factor_ground: z.number().min(0).default(0.9),
    max_slope_angle: z.number().min(0).default((45 * Math.PI) / 180),
  })
  .default({});

export const Enemy = z.object({
  name: z.string(),
  size: Vec2,
  atlas: z.string().min(1),
  atlas_layout: EnemyAtlasLayout,
  atlas_animations: z.record(z.string(), EnemyAnimation),
  collider: EnemyCollider,
  movement: EnemyMovement,
});

/** Enemy definitions keyed by the label level spawns refer to. */
export const EnemyManifest = z.record(z.string(), Enemy);

export type EnemyAnimationT = z.infer<typeof EnemyAnimation>;
export type EnemyColliderT = z.infer<typeof EnemyCollider>;
export type EnemyMovementT = z.infer<typeof EnemyMovement>;
export type EnemyT = z.infer<typeof Enemy>;
export type EnemyManifestT = z.infer<typeof EnemyManifest>;
