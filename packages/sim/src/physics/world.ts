/**
 * Kinematic collision world over static axis-aligned boxes.
 *
 * Characters are swept as the bounding box of their shape. Queries never
 * mutate the world; bodies commit their own positions.
 */

import { add, vec2, type Vec2 } from '../math';
import { passesFilter, type CollisionLayers, type SpatialQueryFilter } from './layers';
import { halfExtents, type ColliderShape } from './shapes';

/** Gap kept between a swept shape and whatever it stopped against. */
export const SKIN_WIDTH = 0.001;

export interface StaticCollider {
  readonly id: number;
  readonly center: Vec2;
  readonly halfExtents: Vec2;
  readonly layers: CollisionLayers;
}

export interface ShapeHit {
  readonly colliderId: number;
  /** Distance travelled along the cast direction before contact. */
  readonly distance: number;
  /** Outward surface normal of the collider that was hit. */
  readonly normal: Vec2;
}

export interface MoveAndSlideOutput {
  readonly position: Vec2;
  /** Velocity with the components blocked by contacts removed. */
  readonly projectedVelocity: Vec2;
}

interface SweepHit {
  distance: number;
  normal: Vec2;
}

function sweepBox(origin: Vec2, half: Vec2, direction: Vec2, target: StaticCollider): SweepHit | null {
  const lo = vec2(
    target.center.x - target.halfExtents.x - half.x,
    target.center.y - target.halfExtents.y - half.y,
  );
  const hi = vec2(
    target.center.x + target.halfExtents.x + half.x,
    target.center.y + target.halfExtents.y + half.y,
  );

  let enter = -Infinity;
  let exit = Infinity;
  let normal: Vec2 = vec2(0, 0);

  for (const axis of ['x', 'y'] as const) {
    const o = origin[axis];
    const d = direction[axis];

    if (d === 0) {
      // Touching edges do not count as overlap.
      if (o <= lo[axis] || o >= hi[axis]) {
        return null;
      }
      continue;
    }

    const t1 = (lo[axis] - o) / d;
    const t2 = (hi[axis] - o) / d;
    const near = Math.min(t1, t2);
    const far = Math.max(t1, t2);

    if (near > enter) {
      enter = near;
      normal = axis === 'x' ? vec2(-Math.sign(d), 0) : vec2(0, -Math.sign(d));
    }
    exit = Math.min(exit, far);
  }

  // Shapes that start inside a collider ignore it so they can move out.
  if (enter < 0 || enter >= exit) {
    return null;
  }
  return { distance: Math.max(0, enter), normal };
}

export class PhysicsWorld {
  private readonly colliders = new Map<number, StaticCollider>();
  private nextId = 1;

  get colliderCount(): number {
    return this.colliders.size;
  }

  addStaticCollider(center: Vec2, shape: ColliderShape, layers: CollisionLayers): number {
    const id = this.nextId;
    this.nextId += 1;
    this.colliders.set(id, { id, center, halfExtents: halfExtents(shape), layers });
    return id;
  }

  removeCollider(id: number): boolean {
    return this.colliders.delete(id);
  }

  clear(): void {
    this.colliders.clear();
  }

  getCollider(id: number): StaticCollider | undefined {
    return this.colliders.get(id);
  }

  /**
   * Sweeps `shape` from `origin` along `direction` (unit length) and returns
   * every hit within `maxDistance`, nearest first.
   */
  shapeCast(
    shape: ColliderShape,
    origin: Vec2,
    direction: Vec2,
    maxDistance: number,
    filter: SpatialQueryFilter,
  ): ShapeHit[] {
    const half = halfExtents(shape);
    const hits: ShapeHit[] = [];

    for (const collider of this.colliders.values()) {
      if (!passesFilter(collider.id, collider.layers.memberships, filter)) {
        continue;
      }
      const hit = sweepBox(origin, half, direction, collider);
      if (hit && hit.distance <= maxDistance) {
        hits.push({ colliderId: collider.id, distance: hit.distance, normal: hit.normal });
      }
    }

    return hits.sort((a, b) => a.distance - b.distance || a.colliderId - b.colliderId);
  }

  /**
   * Moves `shape` by `velocity * dt`, horizontal component first, stopping
   * each axis at the first contact and dropping the blocked velocity component.
   */
  moveAndSlide(
    shape: ColliderShape,
    position: Vec2,
    velocity: Vec2,
    dt: number,
    filter: SpatialQueryFilter,
  ): MoveAndSlideOutput {
    let current = position;
    let vx = velocity.x;
    let vy = velocity.y;

    const dx = vx * dt;
    if (dx !== 0) {
      const direction = vec2(Math.sign(dx), 0);
      const [hit] = this.shapeCast(shape, current, direction, Math.abs(dx) + SKIN_WIDTH, filter);
      if (hit) {
        current = add(current, vec2(direction.x * Math.max(0, hit.distance - SKIN_WIDTH), 0));
        vx = 0;
      } else {
        current = add(current, vec2(dx, 0));
      }
    }

    const dy = vy * dt;
    if (dy !== 0) {
      const direction = vec2(0, Math.sign(dy));
      const [hit] = this.shapeCast(shape, current, direction, Math.abs(dy) + SKIN_WIDTH, filter);
      if (hit) {
        current = add(current, vec2(0, direction.y * Math.max(0, hit.distance - SKIN_WIDTH)));
        vy = 0;
      } else {
        current = add(current, vec2(0, dy));
      }
    }

    return { position: current, projectedVelocity: vec2(vx, vy) };
  }
}
