import { vec2, type Vec2 } from '../math';

export interface RectangleShape {
  kind: 'rectangle';
  width: number;
  height: number;
}

/** A capsule standing upright: a segment of `length` swept by `radius`. */
export interface CapsuleShape {
  kind: 'capsule';
  radius: number;
  length: number;
}

export type ColliderShape = RectangleShape | CapsuleShape;

export const rectangle = (width: number, height: number): RectangleShape => ({
  kind: 'rectangle',
  width,
  height,
});

export const capsule = (radius: number, length: number): CapsuleShape => ({
  kind: 'capsule',
  radius,
  length,
});

/** Half size of the shape's axis-aligned bounding box. */
export function halfExtents(shape: ColliderShape): Vec2 {
  switch (shape.kind) {
    case 'rectangle':
      return vec2(shape.width / 2, shape.height / 2);
    case 'capsule':
      return vec2(shape.radius, shape.radius + shape.length / 2);
  }
}

/** Scales a shape about its center. Capsules keep their roundness by scaling the radius uniformly. */
export function scaleShape(shape: ColliderShape, factor: Vec2): ColliderShape {
  switch (shape.kind) {
    case 'rectangle':
      return rectangle(shape.width * factor.x, shape.height * factor.y);
    case 'capsule':
      return capsule(shape.radius * Math.min(factor.x, factor.y), shape.length * factor.y);
  }
}
