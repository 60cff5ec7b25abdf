import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';

const ORIGINAL_ENV = { ...process.env };

const KEYS = [
  'PROCESSED_LEVEL_PATH',
  'ENEMY_MANIFEST_PATH',
  'INPUT_SCRIPT_PATH',
  'TICK_HZ',
  'MAX_TICKS',
  'SPEED_OF_LIGHT',
  'LORENTZ_CLAMP',
  'GRAVITY_Y',
  'TILE_SIZE',
  'SEED',
  'METRICS_PORT',
];

describe('playtester config', () => {
  beforeEach(() => {
    vi.resetModules();
    process.env = { ...ORIGINAL_ENV };
    for (const key of KEYS) {
      delete process.env[key];
    }
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  it('requires a processed level', async () => {
    const { loadConfig } = await import('../src/config');
    expect(() => loadConfig()).toThrowError('PROCESSED_LEVEL_PATH must point at a processed level.json');
  });

  it('provides defaults when env is missing', async () => {
    process.env.PROCESSED_LEVEL_PATH = 'out/levels/Level_0/level.json';
    const { loadConfig } = await import('../src/config');

    expect(loadConfig()).toEqual({
      levelPath: 'out/levels/Level_0/level.json',
      enemyManifestPath: null,
      inputScriptPath: null,
      tickHz: 60,
      maxTicks: 3600,
      lorentz: { speedOfLight: 50, clamp: 100 },
      gravityY: -9.8,
      tileSize: 1,
      seed: 'playtest',
      metricsPort: null,
    });
  });

  it('respects environment overrides', async () => {
    Object.assign(process.env, {
      PROCESSED_LEVEL_PATH: 'level.json',
      ENEMY_MANIFEST_PATH: 'assets/enemies.json',
      INPUT_SCRIPT_PATH: 'scripts/jump.json',
      TICK_HZ: '120',
      MAX_TICKS: '600',
      SPEED_OF_LIGHT: '25.5',
      LORENTZ_CLAMP: '10',
      GRAVITY_Y: '-20',
      TILE_SIZE: '2',
      SEED: 'fixed',
      METRICS_PORT: '9464',
    });
    const { loadConfig } = await import('../src/config');
    const config = loadConfig();

    expect(config.enemyManifestPath).toBe('assets/enemies.json');
    expect(config.inputScriptPath).toBe('scripts/jump.json');
    expect(config.tickHz).toBe(120);
    expect(config.maxTicks).toBe(600);
    expect(config.lorentz).toEqual({ speedOfLight: 25.5, clamp: 10 });
    expect(config.gravityY).toBe(-20);
    expect(config.tileSize).toBe(2);
    expect(config.seed).toBe('fixed');
    expect(config.metricsPort).toBe(9464);
  });

  it('falls back on invalid numbers', async () => {
    const { loadConfig } = await import('../src/config');
    const config = loadConfig({
      PROCESSED_LEVEL_PATH: 'level.json',
      TICK_HZ: 'fast',
      MAX_TICKS: '-5',
      SPEED_OF_LIGHT: '0',
      GRAVITY_Y: 'down',
      METRICS_PORT: 'none',
    });

    expect(config.tickHz).toBe(60);
    expect(config.maxTicks).toBe(3600);
    expect(config.lorentz.speedOfLight).toBe(50);
    expect(config.gravityY).toBe(-9.8);
    expect(config.metricsPort).toBeNull();
  });

  it('keeps the Lorentz clamp at 1 or above', async () => {
    const { loadConfig } = await import('../src/config');

    expect(loadConfig({ PROCESSED_LEVEL_PATH: 'level.json', LORENTZ_CLAMP: '0.5' }).lorentz.clamp).toBe(100);
    expect(loadConfig({ PROCESSED_LEVEL_PATH: 'level.json', LORENTZ_CLAMP: '1' }).lorentz.clamp).toBe(1);
  });
});
