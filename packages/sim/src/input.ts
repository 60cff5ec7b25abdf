import type { CharacterIntent } from './controller';

/** Movement scale while a walk key is held. */
export const WALK_SCALE = 0.25;

const LEFT_KEYS = ['KeyA', 'ArrowLeft'];
const RIGHT_KEYS = ['KeyD', 'ArrowRight'];
const WALK_KEYS = ['ShiftLeft', 'ShiftRight'];
const JUMP_KEY = 'Space';

/** Intent from the set of held key codes (`KeyboardEvent.code`). */
export function keyboardIntent(pressed: ReadonlySet<string>): CharacterIntent {
  const anyPressed = (keys: readonly string[]) => keys.some((key) => pressed.has(key));
  const left = anyPressed(LEFT_KEYS);
  const right = anyPressed(RIGHT_KEYS);
  const run = !anyPressed(WALK_KEYS);
  return intentFromInput({ left, right, run, jump: pressed.has(JUMP_KEY) });
}

/** A change to the held inputs, taking effect at fixed tick `t`. */
export type InputCmd = {
  t: number;
  left?: boolean;
  right?: boolean;
  jump?: boolean;
  run?: boolean;
};

export interface InputState {
  left: boolean;
  right: boolean;
  jump: boolean;
  run: boolean;
}

const INPUT_KEYS = ['left', 'right', 'jump', 'run'] as const;

export function defaultInput(): InputState {
  return { left: false, right: false, jump: false, run: true };
}

export function intentFromInput(input: InputState): CharacterIntent {
  const direction = Number(input.right) - Number(input.left);
  return { movement: direction * (input.run ? 1 : WALK_SCALE), jump: input.jump };
}

export function applyCommand(previous: InputState, command?: InputCmd): InputState {
  const next = { ...previous };
  if (!command) {
    return next;
  }
  for (const key of INPUT_KEYS) {
    const value = command[key];
    if (value !== undefined) {
      next[key] = value;
    }
  }
  return next;
}

/** Folds commands sharing a tick together, later ones winning; negative ticks are dropped. */
export function mergeCommands(commands: readonly InputCmd[]): InputCmd[] {
  const map = new Map<number, InputCmd>();
  for (const command of commands) {
    if (command.t < 0) {
      continue;
    }
    const merged: InputCmd = { ...(map.get(command.t) ?? { t: command.t }) };
    for (const key of INPUT_KEYS) {
      const value = command[key];
      if (value !== undefined) {
        merged[key] = value;
      }
    }
    map.set(command.t, merged);
  }
  return Array.from(map.values()).sort((a, b) => a.t - b.t);
}

/** Replays a scripted input path tick by tick. */
export class InputScript {
  private readonly commands: InputCmd[];
  private cursor = 0;
  private state = defaultInput();

  constructor(commands: readonly InputCmd[]) {
    this.commands = mergeCommands(commands);
  }

  get finished(): boolean {
    return this.cursor >= this.commands.length;
  }

  /** Applies every command due at or before `tick` and returns the held inputs. */
  advance(tick: number): InputState {
    let next = this.commands[this.cursor];
    while (next && next.t <= tick) {
      this.state = applyCommand(this.state, next);
      this.cursor += 1;
      next = this.commands[this.cursor];
    }
    return { ...this.state };
  }
}
