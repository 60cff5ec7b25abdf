/**
 * The simulation world: level colliders, the player and enemies, stepped on a
 * fixed physics tick with animation advanced once per rendered frame.
 */

import { levelBounds, type ProcessedLevelT } from '@rp/level-spec';

import {
  setAnimation,
  syncSpriteAtlases,
  updateAnimationPlayers,
  type Animation,
  type AnimationEvent,
} from './animation';
import { toCollider, type LevelRect } from './collision-grid';
import { isGrounded, stepControllers, type CharacterIntent } from './controller';
import type { EnemyRoster } from './enemies';
import {
  DEFAULT_LORENTZ_SETTINGS,
  identityFactor,
  updateLengthContraction,
  updateLevelLengthContraction,
  updateLorentzFactors,
  type LorentzFactor,
  type LorentzSettings,
  type Viewport,
} from './lorentz';
import { add, vec2, ZERO, type Vec2 } from './math';
import { levelGeometryLayers } from './physics/layers';
import { halfExtents, type ColliderShape } from './physics/shapes';
import { PhysicsWorld, SKIN_WIDTH } from './physics/world';
import { createEnemy, createPlayer, motionKey, PLAYER_COLLIDER, type GameEntity } from './spawn';
import { selectMotionAnimation, updateFacing } from './sprite-state';
import { DEFAULT_WANDER_SETTINGS, updateWander, type WanderSettings } from './wander';

/** Longest frame the accumulator takes in one update, in milliseconds. */
export const MAX_FRAME_DELTA_MS = 250;

export interface GameSettings {
  tickHz: number;
  gravity: Vec2;
  lorentz: LorentzSettings;
  /** World units per level cell. */
  tileSize: number;
  wander: WanderSettings;
  /** Seeds every enemy's random walk. */
  seed: string;
  windowSize: Vec2;
}

export const DEFAULT_GAME_SETTINGS: GameSettings = {
  tickHz: 60,
  gravity: vec2(0, -9.8),
  lorentz: DEFAULT_LORENTZ_SETTINGS,
  tileSize: 1,
  wander: DEFAULT_WANDER_SETTINGS,
  seed: 'level',
  windowSize: vec2(1280, 720),
};

/** Anything with a `warn` method; pino loggers qualify. */
export interface WarnSink {
  warn(details: object, message: string): void;
}

export interface SpawnReport {
  colliders: number;
  enemies: number;
  /** Spawn labels with no enemy definition. */
  skipped: string[];
}

const hasLorentz = (entity: GameEntity): entity is GameEntity & { lorentz: LorentzFactor } =>
  entity.lorentz !== null;

export type AnimationListener = (event: AnimationEvent<number>) => void;

export class GameWorld {
  readonly settings: GameSettings;
  readonly physics = new PhysicsWorld();
  readonly animations = new Map<string, Animation>();
  readonly viewport: Viewport;

  /** World-space extent of the loaded level's cells. */
  bounds: { min: Vec2; max: Vec2 } = { min: ZERO, max: ZERO };
  /** Contraction of the level geometry, which is at rest. */
  levelLorentz: LorentzFactor = identityFactor();
  player: GameEntity | null = null;
  enemies: GameEntity[] = [];
  paused = false;

  private ticks = 0;
  private accumulator = 0;
  private nextEntityId = 1;
  private readonly listeners = new Set<AnimationListener>();

  constructor(settings: Partial<GameSettings> = {}) {
    this.settings = { ...DEFAULT_GAME_SETTINGS, ...settings };
    this.viewport = { windowSize: this.settings.windowSize, visibleArea: this.settings.windowSize };
  }

  get dt(): number {
    return 1 / this.settings.tickHz;
  }

  get tick(): number {
    return this.ticks;
  }

  get entities(): GameEntity[] {
    return this.player ? [this.player, ...this.enemies] : [...this.enemies];
  }

  onAnimationEvent(listener: AnimationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Position standing `shape` on the bottom edge of `cell`, for a level placed at `offset`. */
  spawnPosition(offset: readonly [number, number], cell: readonly [number, number], shape: ColliderShape): Vec2 {
    const { tileSize } = this.settings;
    return vec2(
      (offset[0] + cell[0] + 0.5) * tileSize,
      (offset[1] + cell[1]) * tileSize + halfExtents(shape).y + SKIN_WIDTH,
    );
  }

  /**
   * Replaces the current level: terrain colliders, the player at its spawn and
   * every enemy spawn whose label the roster knows.
   */
  loadLevel(level: ProcessedLevelT, roster: EnemyRoster, log?: WarnSink): SpawnReport {
    this.physics.clear();
    this.enemies = [];
    this.levelLorentz = identityFactor();
    this.ticks = 0;
    this.accumulator = 0;

    const { tileSize } = this.settings;
    const cells = levelBounds(level);
    this.bounds = {
      min: vec2(cells.min[0] * tileSize, cells.min[1] * tileSize),
      max: vec2(cells.max[0] * tileSize, cells.max[1] * tileSize),
    };
    const origin = this.bounds.min;

    for (const { min, max } of level.terrain_colliders) {
      const rect: LevelRect = { min: { x: min[0], y: min[1] }, max: { x: max[0], y: max[1] } };
      const collider = toCollider(rect, tileSize);
      this.physics.addStaticCollider(add(origin, collider.translation), collider.shape, levelGeometryLayers());
    }

    this.player = createPlayer(
      this.allocateId(),
      this.spawnPosition(level.grid_offset, level.player_spawn, PLAYER_COLLIDER),
      this.animations,
    );

    const skipped: string[] = [];
    for (const spawn of level.enemy_spawns) {
      const definition = roster.get(spawn.label);
      if (!definition) {
        log?.warn({ label: spawn.label, position: spawn.position }, 'Unknown enemy label, skipping spawn');
        skipped.push(spawn.label);
        continue;
      }
      const position = this.spawnPosition(level.grid_offset, spawn.position, definition.collider);
      this.enemies.push(createEnemy(this.allocateId(), definition, position, this.animations, this.settings.seed));
    }

    return { colliders: this.physics.colliderCount, enemies: this.enemies.length, skipped };
  }

  setPlayerIntent(intent: CharacterIntent): void {
    if (this.player) {
      this.player.body.intent = { ...intent };
    }
  }

  /** One physics tick. */
  fixedStep(): void {
    const { settings } = this;

    for (const enemy of this.enemies) {
      if (enemy.wanderer) {
        updateWander(enemy.wanderer, enemy.body.intent, settings.wander);
      }
    }

    stepControllers(
      this.entities.map((entity) => entity.body),
      { world: this.physics, gravity: settings.gravity, dt: this.dt },
    );

    const observerVelocity = this.player ? this.player.body.velocity : ZERO;
    const level = { body: { velocity: ZERO }, lorentz: this.levelLorentz };
    const relativistic = this.enemies.filter(hasLorentz);
    updateLorentzFactors(observerVelocity, [level, ...relativistic], settings.lorentz);
    this.levelLorentz = level.lorentz;

    if (this.player) {
      updateLevelLengthContraction(this.levelLorentz, this.viewport, this.player);
    }
    updateLengthContraction(relativistic);

    this.ticks += 1;
  }

  /** Per-frame presentation: motion animation choice, playback and sprite sync. */
  animate(deltaMs: number): void {
    for (const entity of this.entities) {
      updateFacing(entity.sprite, entity.body.intent.movement);
      const motion = selectMotionAnimation(isGrounded(entity.body), entity.body.velocity);
      setAnimation(entity.player, motionKey(entity, motion));
    }

    const animated = this.entities.map((entity) => ({ id: entity.id, player: entity.player, sprite: entity.sprite }));
    updateAnimationPlayers(deltaMs, this.animations, animated, (event) => {
      for (const listener of this.listeners) {
        listener(event);
      }
    });
    syncSpriteAtlases(animated);
  }

  /**
   * Advances by a wall-clock frame: as many fixed ticks as the accumulated time
   * covers, then one animation update. Returns the number of ticks run.
   */
  update(deltaMs: number): number {
    if (this.paused) {
      return 0;
    }

    const frameMs = Math.min(Math.max(deltaMs, 0), MAX_FRAME_DELTA_MS);
    this.accumulator += frameMs / 1000;

    let steps = 0;
    while (this.accumulator >= this.dt) {
      this.accumulator -= this.dt;
      this.fixedStep();
      steps += 1;
    }

    this.animate(frameMs);
    return steps;
  }

  private allocateId(): number {
    const id = this.nextEntityId;
    this.nextEntityId += 1;
    return id;
  }
}
