import type { ProcessedLevelT } from '@rp/level-spec';
import {
  controllerState,
  GameWorld,
  InputScript,
  intentFromInput,
  spritePosition,
  STEP_MARKER,
  type ControllerState,
  type EnemyRoster,
  type GameEntity,
  type GameSettings,
  type InputCmd,
  type SpawnReport,
  type WarnSink,
} from '@rp/sim';

import { recordAnimationEvent, recordFixedStep } from './metrics';

export type PlaytestOutcome = 'completed' | 'fell';

export interface PlaytestOptions {
  level: ProcessedLevelT;
  roster: EnemyRoster;
  script: readonly InputCmd[];
  maxTicks: number;
  settings?: Partial<GameSettings>;
  log?: WarnSink;
}

export interface EntitySnapshot {
  label: string;
  position: [number, number];
  spritePosition: [number, number];
  velocity: [number, number];
  state: ControllerState;
  animation: string;
  scale: [number, number];
}

export interface PlaytestReport {
  level: string;
  outcome: PlaytestOutcome;
  ticks: number;
  scriptFinished: boolean;
  spawn: SpawnReport;
  /** Step markers fired by the player's walk and run cycles. */
  footsteps: number;
  player: EntitySnapshot;
  levelLorentz: { scalar: number; vector: [number, number] };
  enemies: EntitySnapshot[];
}

function snapshot(entity: GameEntity): EntitySnapshot {
  const { body } = entity;
  const sprite = spritePosition(entity);
  return {
    label: entity.label,
    position: [body.position.x, body.position.y],
    spritePosition: [sprite.x, sprite.y],
    velocity: [body.velocity.x, body.velocity.y],
    state: controllerState(body),
    animation: entity.player.animation,
    scale: [entity.scale.x, entity.scale.y],
  };
}

/**
 * Plays a processed level headless: one animation update per fixed tick, the
 * player driven by `script`. Stops after `maxTicks` or once the player drops
 * a full cell below the level.
 */
export function runPlaytest(options: PlaytestOptions): PlaytestReport {
  const world = new GameWorld(options.settings);
  const spawn = world.loadLevel(options.level, options.roster, options.log);

  const player = world.player;
  if (!player) {
    throw new Error(`level ${options.level.name} spawned no player`);
  }

  let footsteps = 0;
  const unsubscribe = world.onAnimationEvent((event) => {
    recordAnimationEvent(event.marker);
    if (event.target === player.id && event.marker === STEP_MARKER) {
      footsteps += 1;
    }
  });

  const floorY = world.bounds.min.y - world.settings.tileSize;
  const script = new InputScript(options.script);
  const frameMs = world.dt * 1000;
  let outcome: PlaytestOutcome = 'completed';

  try {
    while (world.tick < options.maxTicks) {
      world.setPlayerIntent(intentFromInput(script.advance(world.tick)));

      const startedAt = process.hrtime.bigint();
      world.fixedStep();
      recordFixedStep(startedAt);
      world.animate(frameMs);

      if (player.body.position.y < floorY) {
        outcome = 'fell';
        break;
      }
    }
  } finally {
    unsubscribe();
  }

  return {
    level: options.level.name,
    outcome,
    ticks: world.tick,
    scriptFinished: script.finished,
    spawn,
    footsteps,
    player: snapshot(player),
    levelLorentz: {
      scalar: world.levelLorentz.scalar,
      vector: [world.levelLorentz.vector.x, world.levelLorentz.vector.y],
    },
    enemies: world.enemies.map(snapshot),
  };
}
