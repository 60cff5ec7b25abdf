import { abs, clamp as clampValue, normalizeAndLength, ONE, recip, scale, sub, vec2, type Vec2 } from './math';

export interface LorentzSettings {
  /** Speed at which contraction becomes total; a gameplay constant, not 299792458. */
  speedOfLight: number;
  /**
   * Upper bound on the factor, keeping it finite as speed approaches `speedOfLight`.
   * Values below 1 act as 1.
   */
  clamp: number;
}

export const DEFAULT_LORENTZ_SETTINGS: LorentzSettings = {
  speedOfLight: 50,
  clamp: 100,
};

export interface LorentzFactor {
  scalar: number;
  /** Per-axis contraction, every component at least 1. */
  vector: Vec2;
}

export const identityFactor = (): LorentzFactor => ({ scalar: 1, vector: ONE });

/** Factor for a body moving at `relativeVelocity` with respect to the observer. */
export function computeLorentzFactor(relativeVelocity: Vec2, settings: LorentzSettings): LorentzFactor {
  const { speedOfLight: c, clamp } = settings;
  const [direction, speed] = normalizeAndLength(relativeVelocity);
  const beta = Math.min(speed, c) / c;
  const gamma = clampValue(1 / Math.sqrt(1 - beta * beta), 1, Math.max(clamp, 1));
  const stretch = abs(scale(direction, gamma - 1));
  return { scalar: gamma, vector: vec2(stretch.x + 1, stretch.y + 1) };
}

export interface Relativistic {
  body: { readonly velocity: Vec2 };
  lorentz: LorentzFactor;
}

export function updateLorentzFactors(
  observerVelocity: Vec2,
  targets: Iterable<Relativistic>,
  settings: LorentzSettings,
): void {
  for (const target of targets) {
    target.lorentz = computeLorentzFactor(sub(observerVelocity, target.body.velocity), settings);
  }
}

export interface Viewport {
  /** Window size in pixels. */
  windowSize: Vec2;
  /** Visible area of the orthographic projection. */
  visibleArea: Vec2;
}

export interface Scaled {
  scale: Vec2;
}

/** Widens the view along the motion axis and stretches the player by the same factor. */
export function updateLevelLengthContraction(level: LorentzFactor, viewport: Viewport, player: Scaled): void {
  viewport.visibleArea = vec2(viewport.windowSize.x * level.vector.x, viewport.windowSize.y * level.vector.y);
  player.scale = level.vector;
}

/** Contracts every body but the level geometry by its own factor. */
export function updateLengthContraction(targets: Iterable<Scaled & { lorentz: LorentzFactor }>): void {
  for (const target of targets) {
    target.scale = recip(target.lorentz.vector);
  }
}
