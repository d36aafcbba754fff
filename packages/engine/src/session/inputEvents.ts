import { GROUP_COUNT, PADS_PER_GROUP, groupAt, isPadIndex, type Group } from '../model/groups.js';
import { InputOutOfRangeError } from '../util/errors.js';
import type { Command } from './commands.js';

/** Raw pad event from the input boundary; group and pad are plain indices. */
export interface InputEvent {
  type: 'PRESS' | 'RELEASE';
  group: number;
  pad: number;
  timestamp: number;
}

export type InputValidation =
  | { ok: true; group: Group; pad: number }
  | { ok: false; error: InputOutOfRangeError };

export function validateInput(event: InputEvent): InputValidation {
  const group = groupAt(event.group);
  if (!group) return { ok: false, error: new InputOutOfRangeError('group', event.group, GROUP_COUNT - 1) };
  if (!isPadIndex(event.pad)) return { ok: false, error: new InputOutOfRangeError('pad', event.pad, PADS_PER_GROUP - 1) };
  return { ok: true, group, pad: event.pad };
}

export function inputToCommand(event: InputEvent, group: Group, pad: number): Command {
  return event.type === 'PRESS'
    ? { type: 'PadPress', group, pad, timestamp: event.timestamp }
    : { type: 'PadRelease', group, pad, timestamp: event.timestamp };
}
