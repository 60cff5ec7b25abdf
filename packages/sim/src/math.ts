/**
 * 2D vector helpers. Y points up, matching the level's cell coordinates.
 * All functions return new values.
 */

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export const vec2 = (x: number, y: number): Vec2 => ({ x, y });

export const ZERO: Vec2 = { x: 0, y: 0 };
export const ONE: Vec2 = { x: 1, y: 1 };
export const UP: Vec2 = { x: 0, y: 1 };
export const DOWN: Vec2 = { x: 0, y: -1 };

export const add = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y });

export const sub = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y });

export const scale = (v: Vec2, s: number): Vec2 => ({ x: v.x * s, y: v.y * s });

export const mul = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x * b.x, y: a.y * b.y });

export const dot = (a: Vec2, b: Vec2): number => a.x * b.x + a.y * b.y;

export const length = (v: Vec2): number => Math.hypot(v.x, v.y);

export const abs = (v: Vec2): Vec2 => ({ x: Math.abs(v.x), y: Math.abs(v.y) });

export const recip = (v: Vec2): Vec2 => ({ x: 1 / v.x, y: 1 / v.y });

export const isZero = (v: Vec2): boolean => v.x === 0 && v.y === 0;

/** Unit direction and length; the zero vector yields a zero direction. */
export function normalizeAndLength(v: Vec2): [Vec2, number] {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) {
    return [ZERO, len];
  }
  return [scale(v, 1 / len), len];
}

/** Unsigned angle between two vectors in radians, in [0, π]. */
export function angleBetween(a: Vec2, b: Vec2): number {
  const [na] = normalizeAndLength(a);
  const [nb] = normalizeAndLength(b);
  const cos = Math.max(-1, Math.min(1, dot(na, nb)));
  return Math.acos(cos);
}

export const degToRad = (degrees: number): number => (degrees * Math.PI) / 180;

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);
