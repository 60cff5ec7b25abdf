import { createAnimationPlayer, type Animation, type AnimationPlayer } from './animation';
import { characterController, type CharacterControllerSettings, type ControllerBody } from './controller';
import type { EnemyDefinition } from './enemies';
import { identityFactor, type LorentzFactor } from './lorentz';
import { add, degToRad, ONE, sub, vec2, ZERO, type Vec2 } from './math';
import { enemyLayers, playerLayers } from './physics/layers';
import { capsule } from './physics/shapes';
import { animationKey, playerAnimations, type MotionAnimation } from './sprite-state';
import { createWanderer, type Wanderer } from './wander';

export const PLAYER_LABEL = 'player';

export const PLAYER_CONTROLLER: CharacterControllerSettings = {
  maxSpeed: 20,
  accelAir: 3.5,
  accelGround: 35,
  decelGround: 20,
  dampingAir: 0.3,
  dampingGround: 0.9,
  jumpImpulse: 65,
  jumpMinTicks: 4,
  jumpMaxTicks: 8,
  maxSlopeAngle: degToRad(60),
};

export const PLAYER_COLLIDER = capsule(0.2, 0.45);

/** The player's capsule sits below the center of its sprite. */
export const PLAYER_COLLIDER_OFFSET = vec2(0, -0.55);

export interface SpriteView {
  atlasIndex: number;
  flipX: boolean;
  /** Sprite center relative to the body, the negated collider offset. */
  offset: Vec2;
}

export interface GameEntity {
  id: number;
  kind: 'player' | 'enemy';
  /** Player label or the enemy's manifest label. */
  label: string;
  body: ControllerBody;
  /** Present on everything contracted relative to the player. */
  lorentz: LorentzFactor | null;
  scale: Vec2;
  sprite: SpriteView;
  player: AnimationPlayer;
  wanderer: Wanderer | null;
}

export type AnimationRegistry = Map<string, Animation>;

/** Registers the animations of `owner` under namespaced keys. */
export function registerAnimations(
  registry: AnimationRegistry,
  owner: string,
  animations: ReadonlyMap<string, Animation>,
): void {
  for (const [name, animation] of animations) {
    registry.set(animationKey(owner, name), animation);
  }
}

/** Animation key for `motion`; sheets without a run cycle reuse their walk cycle. */
export function motionKey(entity: Pick<GameEntity, 'kind' | 'label'>, motion: MotionAnimation): string {
  const name = entity.kind === 'enemy' && motion === 'run' ? 'walk' : motion;
  return animationKey(entity.label, name);
}

export function createPlayer(id: number, position: Vec2, registry: AnimationRegistry): GameEntity {
  if (!registry.has(animationKey(PLAYER_LABEL, 'idle'))) {
    registerAnimations(registry, PLAYER_LABEL, playerAnimations());
  }
  return {
    id,
    kind: 'player',
    label: PLAYER_LABEL,
    body: characterController(PLAYER_CONTROLLER, PLAYER_COLLIDER, playerLayers(), position),
    lorentz: null,
    scale: ONE,
    sprite: { atlasIndex: 0, flipX: false, offset: sub(ZERO, PLAYER_COLLIDER_OFFSET) },
    player: createAnimationPlayer(animationKey(PLAYER_LABEL, 'idle'), registry),
    wanderer: null,
  };
}

export function createEnemy(
  id: number,
  definition: EnemyDefinition,
  position: Vec2,
  registry: AnimationRegistry,
  seed: string,
): GameEntity {
  if (!registry.has(animationKey(definition.label, 'idle'))) {
    registerAnimations(registry, definition.label, definition.animations);
  }
  return {
    id,
    kind: 'enemy',
    label: definition.label,
    body: characterController(definition.controller, definition.collider, enemyLayers(), position),
    lorentz: identityFactor(),
    scale: ONE,
    sprite: { atlasIndex: 0, flipX: false, offset: sub(ZERO, definition.colliderOffset) },
    player: createAnimationPlayer(animationKey(definition.label, 'idle'), registry),
    wanderer: createWanderer(`${seed}|${definition.label}|${id}`),
  };
}

export const spritePosition = (entity: Pick<GameEntity, 'body' | 'sprite'>): Vec2 =>
  add(entity.body.position, entity.sprite.offset);
