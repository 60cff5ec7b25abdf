import { Animation } from './animation';
import type { Vec2 } from './math';

export const MOTION_ANIMATIONS = ['idle', 'walk', 'run', 'jump', 'peak', 'fall'] as const;

export type MotionAnimation = (typeof MOTION_ANIMATIONS)[number];

/** Marker carried by footstep frames. */
export const STEP_MARKER = 0;

const IDLE_BELOW = 0.1;
const WALK_BELOW = 10;
const PEAK_BELOW = 0.5;

export interface SpriteFacing {
  flipX: boolean;
}

/** Picks the motion animation for a body from its contact and velocity. */
export function selectMotionAnimation(grounded: boolean, velocity: Vec2): MotionAnimation {
  if (grounded) {
    const vx = Math.abs(velocity.x);
    if (vx < IDLE_BELOW) {
      return 'idle';
    }
    return vx < WALK_BELOW ? 'walk' : 'run';
  }

  if (Math.abs(velocity.y) < PEAK_BELOW) {
    return 'peak';
  }
  return velocity.y > 0 ? 'jump' : 'fall';
}

/** Faces the sprite along the movement intent; no intent keeps the current facing. */
export function updateFacing(sprite: SpriteFacing, movement: number): void {
  if (movement !== 0) {
    sprite.flipX = movement < 0;
  }
}

export const animationKey = (owner: string, name: string): string => `${owner}/${name}`;

/** Animations of the player sprite sheet, keyed by motion. */
export function playerAnimations(): Map<MotionAnimation, Animation> {
  return new Map<MotionAnimation, Animation>([
    ['idle', Animation.fromFrameRange(0, 4, 250)],
    ['walk', Animation.fromFrameRange(4, 12, 50).withMarker(STEP_MARKER, [2, 6])],
    ['run', Animation.fromFrameRange(12, 20, 50).withMarker(STEP_MARKER, [3, 7])],
    ['jump', Animation.fromFrameRange(20, 21, 50)],
    ['peak', Animation.fromFrameRange(21, 22, 50)],
    ['fall', Animation.fromFrameRange(22, 23, 50)],
  ]);
}
