/**
 * Frame-timed sprite animation. Each frame names an atlas index, a duration
 * and the markers fired when playback enters it.
 */

export interface Frame {
  readonly index: number;
  readonly durationMs: number;
  readonly markers: readonly number[];
}

export class Animation {
  readonly frames: readonly Frame[];

  constructor(frames: readonly Frame[]) {
    this.frames = frames;
  }

  /** One frame per atlas index in `[start, end)`, all of the same duration. */
  static fromFrameRange(start: number, end: number, frameMillis: number): Animation {
    const frames: Frame[] = [];
    for (let index = start; index < end; index += 1) {
      frames.push({ index, durationMs: frameMillis, markers: [] });
    }
    return new Animation(frames);
  }

  /** Copy with `marker` added to the frames at the given positions. */
  withMarker(marker: number, frameIndices: Iterable<number>): Animation {
    const targets = new Set(frameIndices);
    for (const position of targets) {
      if (position < 0 || position >= this.frames.length) {
        throw new RangeError(`frame ${position} is outside an animation of ${this.frames.length} frames`);
      }
    }
    return new Animation(
      this.frames.map((frame, position) =>
        targets.has(position) ? { ...frame, markers: [...frame.markers, marker] } : frame,
      ),
    );
  }
}

/** One-shot timer: elapsed time stops at the duration. */
export class Timer {
  readonly durationMs: number;
  private elapsed = 0;

  constructor(durationMs = 0) {
    this.durationMs = durationMs;
  }

  get elapsedMs(): number {
    return this.elapsed;
  }

  get finished(): boolean {
    return this.elapsed >= this.durationMs;
  }

  tick(deltaMs: number): this {
    this.elapsed = Math.min(this.elapsed + deltaMs, this.durationMs);
    return this;
  }
}

export interface AnimationPlayerState {
  frameIndex: number;
  atlasIndex: number;
  timer: Timer;
  /** Set whenever the atlas index may have moved; cleared by sprite sync. */
  changed: boolean;
}

export interface AnimationPlayer {
  /** Key into the animation set. */
  animation: string;
  /** Keep the current frame when the animation is swapped. */
  retainState: boolean;
  /** Set when `animation` was replaced since the last update. */
  animationChanged: boolean;
  state: AnimationPlayerState;
}

export interface AnimationEvent<Target> {
  target: Target;
  marker: number;
}

export interface SpriteAtlas {
  atlasIndex: number;
}

export interface Animated<Target> {
  id: Target;
  player: AnimationPlayer;
}

export type AnimationSet = ReadonlyMap<string, Animation>;

export function initialState(animation: Animation | undefined): AnimationPlayerState {
  const first = animation?.frames[0];
  if (!first) {
    return { frameIndex: 0, atlasIndex: 0, timer: new Timer(), changed: true };
  }
  return { frameIndex: 0, atlasIndex: first.index, timer: new Timer(first.durationMs), changed: true };
}

export function createAnimationPlayer(
  animation: string,
  animations: AnimationSet,
  retainState = false,
): AnimationPlayer {
  return {
    animation,
    retainState,
    animationChanged: false,
    state: initialState(animations.get(animation)),
  };
}

/** Swaps the animation; a no-op when the key is unchanged. */
export function setAnimation(player: AnimationPlayer, animation: string): void {
  if (player.animation === animation) {
    return;
  }
  player.animation = animation;
  player.animationChanged = true;
}

function goToNextFrame(state: AnimationPlayerState, animation: Animation): readonly number[] {
  if (animation.frames.length === 0) {
    return [];
  }
  const frameIndex = (state.frameIndex + 1) % animation.frames.length;
  const frame = animation.frames[frameIndex];
  state.frameIndex = frameIndex;
  state.atlasIndex = frame.index;
  state.timer = new Timer(frame.durationMs);
  state.changed = true;
  return frame.markers;
}

/**
 * Advances every player by `deltaMs`. A player whose animation was swapped
 * restarts on its first frame without ticking; players whose animation is
 * not in the set are left alone.
 */
export function updateAnimationPlayers<Target>(
  deltaMs: number,
  animations: AnimationSet,
  entities: Iterable<Animated<Target>>,
  emit: (event: AnimationEvent<Target>) => void,
): void {
  for (const { id, player } of entities) {
    const animation = animations.get(player.animation);
    if (!animation) {
      continue;
    }

    if (player.animationChanged) {
      player.animationChanged = false;
      if (!player.retainState) {
        player.state = initialState(animation);
        continue;
      }
    }

    if (player.state.timer.tick(deltaMs).finished) {
      for (const marker of goToNextFrame(player.state, animation)) {
        emit({ target: id, marker });
      }
    }
  }
}

export function syncSpriteAtlases(
  entities: Iterable<{ player: AnimationPlayer; sprite: SpriteAtlas }>,
): void {
  for (const { player, sprite } of entities) {
    if (player.state.changed) {
      sprite.atlasIndex = player.state.atlasIndex;
      player.state.changed = false;
    }
  }
}
