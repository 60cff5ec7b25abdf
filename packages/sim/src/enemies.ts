import {
  EnemyManifest,
  REQUIRED_ENEMY_ANIMATIONS,
  type EnemyAnimationName,
  type EnemyColliderT,
  type EnemyManifestT,
  type EnemyMovementT,
  type EnemyT,
} from '@rp/level-spec';

import { Animation } from './animation';
import type { CharacterControllerSettings } from './controller';
import { vec2, type Vec2 } from './math';
import { capsule, rectangle, type ColliderShape } from './physics/shapes';

/** Enemies jump for a fixed number of ticks; their manifests carry no jump window. */
export const ENEMY_JUMP_TICKS = 4;

/** Mass `jump_strength` is measured against. */
export const ENEMY_MASS = 1.5;

const DEFAULT_TICK_HZ = 60;

export type EnemyManifestErrorCode = 'Parse' | 'MissingAnimation';

export class EnemyManifestError extends Error {
  readonly code: EnemyManifestErrorCode;
  readonly label?: string;

  constructor(code: EnemyManifestErrorCode, message: string, label?: string) {
    super(message);
    this.name = 'EnemyManifestError';
    this.code = code;
    this.label = label;
  }
}

export interface AtlasGrid {
  rows: number;
  cols: number;
  tileSize: Vec2;
}

export interface EnemyDefinition {
  label: string;
  name: string;
  size: Vec2;
  atlas: string;
  atlasLayout: AtlasGrid;
  animations: ReadonlyMap<EnemyAnimationName, Animation>;
  collider: ColliderShape;
  /** Offset of the collider from the sprite's center. */
  colliderOffset: Vec2;
  controller: CharacterControllerSettings;
}

export type EnemyRoster = ReadonlyMap<string, EnemyDefinition>;

export function enemyCollider(collider: EnemyColliderT): ColliderShape {
  switch (collider.shape) {
    case 'Rectangle':
      return rectangle(collider.width, collider.height);
    case 'Capsule':
      return capsule(collider.radius, collider.height);
  }
}

/**
 * `jump_strength` is a single impulse on an enemy of `ENEMY_MASS`; the controller
 * applies its jump per tick, so the impulse is spread over the jump window.
 */
export function enemyControllerSettings(
  movement: EnemyMovementT,
  tickHz = DEFAULT_TICK_HZ,
): CharacterControllerSettings {
  return {
    maxSpeed: movement.max_speed,
    accelAir: movement.accel_air,
    accelGround: movement.accel_ground,
    decelGround: movement.accel_ground,
    dampingAir: movement.damping_factor_air,
    dampingGround: movement.damping_factor_ground,
    jumpImpulse: (movement.jump_strength * tickHz) / (ENEMY_MASS * ENEMY_JUMP_TICKS),
    jumpMinTicks: ENEMY_JUMP_TICKS,
    jumpMaxTicks: ENEMY_JUMP_TICKS,
    maxSlopeAngle: movement.max_slope_angle,
  };
}

function enemyAnimations(label: string, enemy: EnemyT): Map<EnemyAnimationName, Animation> {
  const animations = new Map<EnemyAnimationName, Animation>();
  for (const name of REQUIRED_ENEMY_ANIMATIONS) {
    const range = enemy.atlas_animations[name];
    if (!range) {
      throw new EnemyManifestError('MissingAnimation', `enemy ${label} is missing its ${name} animation`, label);
    }
    animations.set(name, Animation.fromFrameRange(range.start, range.end, range.frame_millis));
  }
  return animations;
}

export function enemyDefinition(label: string, enemy: EnemyT, tickHz = DEFAULT_TICK_HZ): EnemyDefinition {
  return {
    label,
    name: enemy.name,
    size: vec2(enemy.size[0], enemy.size[1]),
    atlas: enemy.atlas,
    atlasLayout: {
      rows: enemy.atlas_layout.rows,
      cols: enemy.atlas_layout.cols,
      tileSize: vec2(enemy.atlas_layout.size[0], enemy.atlas_layout.size[1]),
    },
    animations: enemyAnimations(label, enemy),
    collider: enemyCollider(enemy.collider),
    colliderOffset: vec2(enemy.collider.offset[0], enemy.collider.offset[1]),
    controller: enemyControllerSettings(enemy.movement, tickHz),
  };
}

export function buildEnemyRoster(manifest: EnemyManifestT, tickHz = DEFAULT_TICK_HZ): Map<string, EnemyDefinition> {
  const roster = new Map<string, EnemyDefinition>();
  for (const [label, enemy] of Object.entries(manifest)) {
    roster.set(label, enemyDefinition(label, enemy, tickHz));
  }
  return roster;
}

/** Validates a decoded manifest document and builds its roster for a `tickHz` physics rate. */
export function parseEnemyManifest(raw: unknown, tickHz = DEFAULT_TICK_HZ): Map<string, EnemyDefinition> {
  const parsed = EnemyManifest.safeParse(raw);
  if (!parsed.success) {
    throw new EnemyManifestError('Parse', `invalid enemy manifest: ${parsed.error.message}`);
  }
  return buildEnemyRoster(parsed.data, tickHz);
}
