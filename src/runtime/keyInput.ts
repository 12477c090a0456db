import { isDirection } from '../core/direction';
import type { Direction, PlayerIntent } from '../core/types';

/** Shape of the key object node:readline passes to 'keypress' listeners. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type SessionCommand =
  | { kind: 'intent'; intent: PlayerIntent }
  | { kind: 'restart' }
  | { kind: 'toggle-hints' }
  | { kind: 'quit' };

const PLACE_KEYS: Record<string, Direction> = {
  w: 'up',
  a: 'left',
  s: 'down',
  d: 'right',
};

export function commandFromKeypress(key: KeyPress | null | undefined): SessionCommand | null {
  if (!key?.name) {
    return null;
  }

  const name = key.name;
  if (key.ctrl && name === 'c') {
    return { kind: 'quit' };
  }

  if (isDirection(name)) {
    return key.ctrl || key.meta
      ? { kind: 'intent', intent: { kind: 'place-tower', direction: name } }
      : { kind: 'intent', intent: { kind: 'move', direction: name } };
  }

  if (Object.hasOwn(PLACE_KEYS, name)) {
    return { kind: 'intent', intent: { kind: 'place-tower', direction: PLACE_KEYS[name] } };
  }

  switch (name) {
    case 'space':
      return { kind: 'intent', intent: { kind: 'skip' } };
    case 'r':
      return { kind: 'restart' };
    case 'h':
      return { kind: 'toggle-hints' };
    case 'q':
    case 'escape':
      return { kind: 'quit' };
    default:
      return null;
  }
}

/**
 * Line-oriented commands for piped input: `up`, `place left`, `skip`, `restart`, `quit`.
 */
export function commandFromLine(line: string): SessionCommand | null {
  const [verb = '', argument] = line.trim().toLowerCase().split(/\s+/);

  if (isDirection(verb)) {
    return { kind: 'intent', intent: { kind: 'move', direction: verb } };
  }

  if ((verb === 'place' || verb === 'tower') && argument !== undefined && isDirection(argument)) {
    return { kind: 'intent', intent: { kind: 'place-tower', direction: argument } };
  }

  switch (verb) {
    case 'skip':
    case 'wait':
      return { kind: 'intent', intent: { kind: 'skip' } };
    case 'restart':
      return { kind: 'restart' };
    case 'hints':
      return { kind: 'toggle-hints' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return null;
  }
}
