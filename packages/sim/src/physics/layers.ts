export const PhysicsLayer = {
  LevelGeometry: 1 << 0,
  Player: 1 << 1,
  Enemy: 1 << 2,
} as const;

export type PhysicsLayerName = keyof typeof PhysicsLayer;

/** What a collider is (`memberships`) and what it interacts with (`filters`), as bit masks. */
export interface CollisionLayers {
  readonly memberships: number;
  readonly filters: number;
}

export interface SpatialQueryFilter {
  /** Only colliders whose memberships intersect this mask are reported. */
  readonly mask: number;
  readonly excluded?: ReadonlySet<number>;
}

export const levelGeometryLayers = (): CollisionLayers => ({
  memberships: PhysicsLayer.LevelGeometry,
  filters: PhysicsLayer.Player | PhysicsLayer.Enemy,
});

export const playerLayers = (): CollisionLayers => ({
  memberships: PhysicsLayer.Player,
  filters: PhysicsLayer.LevelGeometry,
});

export const enemyLayers = (): CollisionLayers => ({
  memberships: PhysicsLayer.Enemy,
  filters: PhysicsLayer.LevelGeometry,
});

export function filterFromMask(mask: number, excluded?: Iterable<number>): SpatialQueryFilter {
  return { mask, excluded: excluded ? new Set(excluded) : undefined };
}

export function passesFilter(id: number, memberships: number, filter: SpatialQueryFilter): boolean {
  if ((memberships & filter.mask) === 0) {
    return false;
  }
  return !filter.excluded?.has(id);
}
