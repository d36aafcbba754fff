import type { Group } from '../model/groups.js';

/**
 * Everything that can change session state. Key bindings, the input boundary
 * and the clock all reduce to these.
 */
export type Command =
  // Transport
  | { type: 'PlayStop' }
  | { type: 'ToggleRecord' }
  | { type: 'ClearPattern' }
  | { type: 'Rewind' }
  // Navigation
  | { type: 'NextGroup' }
  | { type: 'PrevGroup' }
  | { type: 'SelectGroup'; group: Group }
  | { type: 'PatternPrev' }
  | { type: 'PatternNext' }
  | { type: 'SelectPattern'; index: number }
  // Tempo
  | { type: 'TempoUp' }
  | { type: 'TempoDown' }
  | { type: 'SetTempo'; bpm: number }
  // Mixer
  | { type: 'MasterVolUp' }
  | { type: 'MasterVolDown' }
  | { type: 'MasterMuteToggle' }
  | { type: 'GroupVolUp'; group: Group }
  | { type: 'GroupVolDown'; group: Group }
  | { type: 'GroupMuteToggle'; group: Group }
  // Pads; group defaults to the selected one
  | { type: 'PadPress'; pad: number; group?: Group; timestamp?: number }
  | { type: 'PadRelease'; pad: number; group?: Group; timestamp?: number }
  // Clock
  | { type: 'Tick' };

export type CommandType = Command['type'];
