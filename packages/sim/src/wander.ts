import seedrandom from 'seedrandom';

import type { CharacterIntent } from './controller';

export interface WanderSettings {
  /** Shortest time, in fixed ticks, between direction changes. */
  minTicks: number;
  maxTicks: number;
  /** Chance of jumping at each direction change. */
  jumpChance: number;
}

export const DEFAULT_WANDER_SETTINGS: WanderSettings = {
  minTicks: 30,
  maxTicks: 120,
  jumpChance: 0.15,
};

export interface Wanderer {
  rng: () => number;
  ticksLeft: number;
}

const DIRECTIONS = [-1, 0, 1] as const;

export function createWanderer(seed: string): Wanderer {
  return { rng: seedrandom(seed), ticksLeft: 0 };
}

/** Random walk: holds a direction for a random number of ticks, jumping now and then. */
export function updateWander(wanderer: Wanderer, intent: CharacterIntent, settings: WanderSettings): void {
  if (wanderer.ticksLeft > 0) {
    wanderer.ticksLeft -= 1;
    intent.jump = false;
    return;
  }

  const { rng } = wanderer;
  const span = Math.max(0, settings.maxTicks - settings.minTicks);
  intent.movement = DIRECTIONS[Math.floor(rng() * DIRECTIONS.length)];
  intent.jump = rng() < settings.jumpChance;
  wanderer.ticksLeft = settings.minTicks + Math.floor(rng() * (span + 1));
}
