import 'dotenv/config';

import { z } from 'zod';

const EnvSchema = z.object({
  PROCESSED_LEVEL_PATH: z.string().optional(),
  ENEMY_MANIFEST_PATH: z.string().optional(),
  INPUT_SCRIPT_PATH: z.string().optional(),
  TICK_HZ: z.string().optional(),
  MAX_TICKS: z.string().optional(),
  SPEED_OF_LIGHT: z.string().optional(),
  LORENTZ_CLAMP: z.string().optional(),
  GRAVITY_Y: z.string().optional(),
  TILE_SIZE: z.string().optional(),
  SEED: z.string().optional(),
  METRICS_PORT: z.string().optional(),
});

export interface PlaytesterConfig {
  /** Processed `level.json`. */
  levelPath: string;
  enemyManifestPath: string | null;
  inputScriptPath: string | null;
  tickHz: number;
  maxTicks: number;
  lorentz: {
    speedOfLight: number;
    clamp: number;
  };
  gravityY: number;
  tileSize: number;
  seed: string;
  /** Serve `/metrics` after the run when set. */
  metricsPort: number | null;
}

function optionalString(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const safePositive = (value: number, fallback: number): number =>
  Number.isFinite(value) && value > 0 ? value : fallback;

const safeAtLeast = (value: number, min: number, fallback: number): number =>
  Number.isFinite(value) && value >= min ? value : fallback;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlaytesterConfig {
  const parsed = EnvSchema.parse(env);

  const levelPath = optionalString(parsed.PROCESSED_LEVEL_PATH);
  if (!levelPath) {
    throw new Error('PROCESSED_LEVEL_PATH must point at a processed level.json');
  }

  const metricsPort = parseInteger(parsed.METRICS_PORT, 0);

  return {
    levelPath,
    enemyManifestPath: optionalString(parsed.ENEMY_MANIFEST_PATH),
    inputScriptPath: optionalString(parsed.INPUT_SCRIPT_PATH),
    tickHz: safePositive(parseInteger(parsed.TICK_HZ, 60), 60),
    maxTicks: safePositive(parseInteger(parsed.MAX_TICKS, 3600), 3600),
    lorentz: {
      speedOfLight: safePositive(parseNumber(parsed.SPEED_OF_LIGHT, 50), 50),
      clamp: safeAtLeast(parseNumber(parsed.LORENTZ_CLAMP, 100), 1, 100),
    },
    gravityY: parseNumber(parsed.GRAVITY_Y, -9.8),
    tileSize: safePositive(parseNumber(parsed.TILE_SIZE, 1), 1),
    seed: optionalString(parsed.SEED) ?? 'playtest',
    metricsPort: metricsPort > 0 ? metricsPort : null,
  };
}
