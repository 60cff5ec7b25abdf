import { describe, expect, it } from 'vitest';

import { ENEMY_JUMP_TICKS, ENEMY_MASS, EnemyManifestError, parseEnemyManifest } from './enemies';

const slime = {
  name: 'Slime',
  size: [1, 0.75],
  atlas: 'images/slime.png',
  atlas_layout: { rows: 1, cols: 12, size: [16, 16] },
  atlas_animations: {
    idle: { start: 0, end: 4, frame_millis: 200 },
    walk: { start: 4, end: 8, frame_millis: 100 },
    jump: { start: 8, end: 9, frame_millis: 100 },
    peak: { start: 9, end: 10, frame_millis: 100 },
    fall: { start: 10, end: 12, frame_millis: 100 },
  },
  collider: { shape: 'Capsule', radius: 0.3, height: 0.2 },
  movement: { max_speed: 2 },
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof EnemyManifestError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('enemies', () => {
  it('builds definitions with movement defaults', () => {
    const roster = parseEnemyManifest({ slime });
    const definition = roster.get('slime');

    expect(definition?.name).toBe('Slime');
    expect(definition?.collider).toEqual({ kind: 'capsule', radius: 0.3, length: 0.2 });
    expect(definition?.colliderOffset).toEqual({ x: 0, y: 0 });
    expect(definition?.atlasLayout).toEqual({ rows: 1, cols: 12, tileSize: { x: 16, y: 16 } });
    expect(definition?.controller).toEqual({
      maxSpeed: 2,
      accelAir: 0.1,
      accelGround: 1,
      decelGround: 1,
      dampingAir: 0.9,
      dampingGround: 0.9,
      jumpImpulse: 200,
      jumpMinTicks: 4,
      jumpMaxTicks: 4,
      maxSlopeAngle: (45 * Math.PI) / 180,
    });
    expect(definition?.animations.get('fall')?.frames.map((frame) => frame.index)).toEqual([10, 11]);
  });

  it('spreads the jump impulse over the jump window at the physics rate', () => {
    const at60 = parseEnemyManifest({ slime }).get('slime')?.controller;
    const at120 = parseEnemyManifest({ slime }, 120).get('slime')?.controller;

    expect(at120?.jumpImpulse).toBe(400);
    // Velocity gained over the whole window equals jump_strength / ENEMY_MASS.
    expect(((at60?.jumpImpulse ?? 0) * ENEMY_JUMP_TICKS) / 60).toBeCloseTo(20 / ENEMY_MASS, 10);
  });

  it('reads rectangle colliders with an offset', () => {
    const roster = parseEnemyManifest({
      box: { ...slime, collider: { shape: 'Rectangle', width: 1, height: 2, offset: [0, -0.5] } },
    });
    expect(roster.get('box')?.collider).toEqual({ kind: 'rectangle', width: 1, height: 2 });
    expect(roster.get('box')?.colliderOffset).toEqual({ x: 0, y: -0.5 });
  });

  it('fails when a required animation is missing', () => {
    const { peak: _peak, ...animations } = slime.atlas_animations;
    expect(codeOf(() => parseEnemyManifest({ slime: { ...slime, atlas_animations: animations } }))).toBe(
      'MissingAnimation',
    );
  });

  it('wraps schema failures as parse errors', () => {
    expect(codeOf(() => parseEnemyManifest({ slime: { ...slime, collider: { shape: 'Sphere' } } }))).toBe('Parse');
    expect(codeOf(() => parseEnemyManifest([]))).toBe('Parse');
  });
});
