/**
 * Kinematic character controller.
 *
 * Each fixed tick runs, in order: {@link resetJumpState}, {@link updateGrounded},
 * {@link applyGravity}, {@link applyMovementDamping}, {@link applyIntents},
 * {@link handleCollisions} and {@link applyMoveAndSlide}. Velocities are in
 * world units per second; `dt` is in seconds.
 */

import { add, angleBetween, DOWN, isZero, scale, UP, vec2, ZERO, type Vec2 } from './math';
import { filterFromMask, PhysicsLayer, type CollisionLayers, type SpatialQueryFilter } from './physics/layers';
import { scaleShape, type ColliderShape } from './physics/shapes';
import type { MoveAndSlideOutput, PhysicsWorld } from './physics/world';

export const CASTER_SHAPE_SCALE = 0.99;
export const CASTER_MAX_DISTANCE = 0.1;

export interface CharacterControllerSettings {
  /** Acceleration while airborne. */
  accelAir: number;
  /** Acceleration while grounded. */
  accelGround: number;
  /** Deceleration while grounded with no movement intent. */
  decelGround: number;
  /** Exponential velocity falloff per second while airborne. */
  dampingAir: number;
  /** Exponential velocity falloff per second while grounded. */
  dampingGround: number;
  /**
   * Impulse applied each tick of a jump, for between `jumpMinTicks` and
   * `jumpMaxTicks` ticks depending on how long the jump intent is held.
   */
  jumpImpulse: number;
  jumpMinTicks: number;
  /** At or below `jumpMinTicks`, every jump lasts exactly `jumpMinTicks`. */
  jumpMaxTicks: number;
  /** Steepest surface, in radians, the character can stand on. */
  maxSlopeAngle: number;
  /** Top speed the character can accelerate itself to on the ground. */
  maxSpeed: number;
}

export interface CharacterIntent {
  /** Horizontal direction in [-1, 1]. */
  movement: number;
  jump: boolean;
}

export interface JumpState {
  /** Ground normal captured when the jump started. */
  normal: Vec2 | null;
  ticks: number;
}

export interface GroundCaster {
  shape: ColliderShape;
  maxDistance: number;
  filter: SpatialQueryFilter;
}

export interface ControllerBody {
  settings: CharacterControllerSettings;
  collider: ColliderShape;
  layers: CollisionLayers;
  caster: GroundCaster;
  position: Vec2;
  velocity: Vec2;
  intent: CharacterIntent;
  /** Contact normal while grounded. */
  groundNormal: Vec2 | null;
  jump: JumpState;
  pendingMove: MoveAndSlideOutput | null;
}

export type ControllerState = 'airborne' | 'grounded' | 'jumping';

export function characterController(
  settings: CharacterControllerSettings,
  collider: ColliderShape,
  layers: CollisionLayers,
  position: Vec2 = ZERO,
): ControllerBody {
  return {
    settings,
    collider,
    layers,
    caster: {
      shape: scaleShape(collider, vec2(CASTER_SHAPE_SCALE, CASTER_SHAPE_SCALE)),
      maxDistance: CASTER_MAX_DISTANCE,
      filter: filterFromMask(PhysicsLayer.LevelGeometry),
    },
    position,
    velocity: ZERO,
    intent: { movement: 0, jump: false },
    groundNormal: null,
    jump: { normal: null, ticks: 0 },
    pendingMove: null,
  };
}

export const isGrounded = (body: ControllerBody): boolean => body.groundNormal !== null;

export function controllerState(body: ControllerBody): ControllerState {
  if (body.jump.normal !== null) {
    return 'jumping';
  }
  return isGrounded(body) ? 'grounded' : 'airborne';
}

function effectiveMaxTicks(settings: CharacterControllerSettings): number {
  return Math.max(settings.jumpMaxTicks, settings.jumpMinTicks);
}

/** Clears a finished jump once the character is back on the ground with the intent released. */
export function resetJumpState(bodies: Iterable<ControllerBody>): void {
  for (const body of bodies) {
    if (!body.intent.jump && isGrounded(body) && body.jump.ticks >= body.settings.jumpMinTicks) {
      body.jump = { normal: null, ticks: 0 };
    }
  }
}

export function updateGrounded(bodies: Iterable<ControllerBody>, world: PhysicsWorld): void {
  for (const body of bodies) {
    const { shape, maxDistance, filter } = body.caster;
    const hits = world.shapeCast(shape, body.position, DOWN, maxDistance, filter);
    const ground = hits.find((hit) => Math.abs(angleBetween(hit.normal, UP)) < body.settings.maxSlopeAngle);
    body.groundNormal = ground ? ground.normal : null;
  }
}

export function applyGravity(bodies: Iterable<ControllerBody>, gravity: Vec2, dt: number): void {
  const dv = scale(gravity, dt);
  for (const body of bodies) {
    if (!isGrounded(body)) {
      body.velocity = add(body.velocity, dv);
    }
  }
}

export function applyMovementDamping(bodies: Iterable<ControllerBody>, dt: number): void {
  for (const body of bodies) {
    const damping = isGrounded(body) ? body.settings.dampingGround : body.settings.dampingAir;
    body.velocity = vec2(body.velocity.x * (1 / (1 + damping * dt)), body.velocity.y);
  }
}

export function applyIntents(bodies: Iterable<ControllerBody>, dt: number): void {
  for (const body of bodies) {
    const { settings, intent, jump } = body;
    let { x: vx, y: vy } = body.velocity;

    if (body.groundNormal !== null) {
      const accel = intent.movement === 0 ? settings.decelGround : settings.accelGround;
      const dv = accel * dt;
      const target = intent.movement * settings.maxSpeed;
      const diff = target - vx;

      if (Math.abs(diff) < dv) {
        vx = target;
      } else {
        vx += Math.sign(diff) * dv;
      }

      if (intent.jump && jump.ticks === 0) {
        jump.normal = body.groundNormal;
      }
    } else {
      vx += intent.movement * settings.accelAir * dt;
    }

    // Impulse lasts at least jumpMinTicks and at most jumpMaxTicks.
    if (
      jump.normal !== null &&
      jump.ticks < effectiveMaxTicks(settings) &&
      (intent.jump || jump.ticks < settings.jumpMinTicks)
    ) {
      const impulse = dt * settings.jumpImpulse;
      vx += impulse * jump.normal.x;
      vy += impulse * jump.normal.y;
      jump.ticks += 1;
    } else {
      jump.normal = null;
    }

    body.velocity = vec2(vx, vy);
  }
}

/** Sweeps each moving body and stores the result without committing it. */
export function handleCollisions(bodies: Iterable<ControllerBody>, world: PhysicsWorld, dt: number): void {
  for (const body of bodies) {
    if (isZero(body.velocity)) {
      continue;
    }
    body.pendingMove = world.moveAndSlide(
      body.collider,
      body.position,
      body.velocity,
      dt,
      filterFromMask(body.layers.filters),
    );
  }
}

export function applyMoveAndSlide(bodies: Iterable<ControllerBody>): void {
  for (const body of bodies) {
    if (body.pendingMove) {
      body.position = body.pendingMove.position;
      body.velocity = body.pendingMove.projectedVelocity;
      body.pendingMove = null;
    }
  }
}

export interface ControllerStep {
  world: PhysicsWorld;
  gravity: Vec2;
  dt: number;
}

/** Runs the controller pipeline for one fixed tick. */
export function stepControllers(bodies: readonly ControllerBody[], step: ControllerStep): void {
  resetJumpState(bodies);
  updateGrounded(bodies, step.world);
  applyGravity(bodies, step.gravity, step.dt);
  applyMovementDamping(bodies, step.dt);
  applyIntents(bodies, step.dt);
  handleCollisions(bodies, step.world, step.dt);
  applyMoveAndSlide(bodies);
}
