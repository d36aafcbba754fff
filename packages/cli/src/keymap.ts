/**
 * Key bindings: turns terminal keypresses into session commands.
 *
 * Keys are identified by a short id: a single printable character (" " for
 * space) or a name such as Tab, BackTab, Left, Esc or F1.
 */

import { GROUPS, type Command } from '@stepdeck/engine';

export interface KeyBindings {
  transport: { playStop: string; record: string; clear: string; rewind: string };
  navigation: {
    nextGroup: string;
    prevGroup: string;
    nextPattern: string;
    prevPattern: string;
    tempoUp: string;
    tempoDown: string;
  };
  volume: {
    masterUp: string;
    masterDown: string;
    masterMute: string;
    groupUp: string[];
    groupDown: string[];
    groupMute: string[];
  };
  /** Key id to pad index. */
  pads: Record<string, number>;
  quit: string;
}

export type KeyAction =
  | { kind: 'command'; command: Command }
  | { kind: 'pad'; pad: number }
  | { kind: 'quit' };

/** Shape of the key object emitted by readline's keypress event. */
export interface KeypressLike {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

const NAMED_KEYS: Record<string, string> = {
  escape: 'Esc',
  return: 'Enter',
  enter: 'Enter',
  backspace: 'Backspace',
  left: 'Left',
  right: 'Right',
  up: 'Up',
  down: 'Down',
  home: 'Home',
  end: 'End',
  pageup: 'PageUp',
  pagedown: 'PageDown',
  delete: 'Delete',
  insert: 'Insert',
};

const KEY_NAMES = new Set(['Tab', 'BackTab', ...Object.values(NAMED_KEYS)]);

export function isKeyId(value: string): boolean {
  if (value.length === 1) return true;
  if (KEY_NAMES.has(value)) return true;
  const fn = /^F(\d{1,2})$/.exec(value);
  return fn !== null && Number(fn[1]) >= 1 && Number(fn[1]) <= 12;
}

/** Key id for a readline keypress, or null for keys that cannot be bound. */
export function keyIdFromKeypress(str: string | undefined, key: KeypressLike | undefined): string | null {
  if (key?.ctrl && key.name === 'c') return 'Ctrl+C';
  const name = key?.name;
  if (name === 'tab') return key?.shift ? 'BackTab' : 'Tab';
  if (name === 'space') return ' ';
  if (name && NAMED_KEYS[name]) return NAMED_KEYS[name];
  if (name && /^f\d{1,2}$/.test(name)) return name.toUpperCase();
  if (key?.ctrl || key?.meta) return null;
  if (str !== undefined && str.length === 1) return str;
  return null;
}

/** Every (key, action label) pair the bindings declare, in declaration order. */
function bindingEntries(b: KeyBindings): Array<[string, string, KeyAction]> {
  const entries: Array<[string, string, KeyAction]> = [
    [b.transport.playStop, 'transport.playStop', { kind: 'command', command: { type: 'PlayStop' } }],
    [b.transport.record, 'transport.record', { kind: 'command', command: { type: 'ToggleRecord' } }],
    [b.transport.clear, 'transport.clear', { kind: 'command', command: { type: 'ClearPattern' } }],
    [b.transport.rewind, 'transport.rewind', { kind: 'command', command: { type: 'Rewind' } }],
    [b.navigation.nextGroup, 'navigation.nextGroup', { kind: 'command', command: { type: 'NextGroup' } }],
    [b.navigation.prevGroup, 'navigation.prevGroup', { kind: 'command', command: { type: 'PrevGroup' } }],
    [b.navigation.nextPattern, 'navigation.nextPattern', { kind: 'command', command: { type: 'PatternNext' } }],
    [b.navigation.prevPattern, 'navigation.prevPattern', { kind: 'command', command: { type: 'PatternPrev' } }],
    [b.navigation.tempoUp, 'navigation.tempoUp', { kind: 'command', command: { type: 'TempoUp' } }],
    [b.navigation.tempoDown, 'navigation.tempoDown', { kind: 'command', command: { type: 'TempoDown' } }],
    [b.volume.masterUp, 'volume.masterUp', { kind: 'command', command: { type: 'MasterVolUp' } }],
    [b.volume.masterDown, 'volume.masterDown', { kind: 'command', command: { type: 'MasterVolDown' } }],
    [b.volume.masterMute, 'volume.masterMute', { kind: 'command', command: { type: 'MasterMuteToggle' } }],
  ];
  GROUPS.forEach((group, i) => {
    const up = b.volume.groupUp[i];
    const down = b.volume.groupDown[i];
    const mute = b.volume.groupMute[i];
    if (up !== undefined) entries.push([up, `volume.groupUp[${i}]`, { kind: 'command', command: { type: 'GroupVolUp', group } }]);
    if (down !== undefined) entries.push([down, `volume.groupDown[${i}]`, { kind: 'command', command: { type: 'GroupVolDown', group } }]);
    if (mute !== undefined) entries.push([mute, `volume.groupMute[${i}]`, { kind: 'command', command: { type: 'GroupMuteToggle', group } }]);
  });
  for (const [key, pad] of Object.entries(b.pads)) {
    entries.push([key, `pads.${key}`, { kind: 'pad', pad }]);
  }
  entries.push([b.quit, 'quit', { kind: 'quit' }]);
  return entries;
}

/** Keys bound to more than one action. */
export function keyBindingConflicts(b: KeyBindings): string[] {
  const owners = new Map<string, string>();
  const problems: string[] = [];
  for (const [key, label] of bindingEntries(b)) {
    const owner = owners.get(key);
    if (owner) problems.push(`key ${JSON.stringify(key)} is bound to both ${owner} and ${label}`);
    else owners.set(key, label);
  }
  return problems;
}

function keyLabel(id: string): string {
  return id === ' ' ? 'Space' : id;
}

/** One-line controls legend for the bound transport and navigation keys. */
export function controlsLegend(b: KeyBindings): string {
  const { transport: t, navigation: n } = b;
  return [
    `${keyLabel(t.playStop)}:Play/Stop`,
    `${keyLabel(t.record)}:Rec`,
    `${keyLabel(t.clear)}:Clear`,
    `${keyLabel(t.rewind)}:Rewind`,
    `${keyLabel(n.prevGroup)}/${keyLabel(n.nextGroup)}:Group`,
    `${keyLabel(n.prevPattern)}/${keyLabel(n.nextPattern)}:Pattern`,
    `${keyLabel(n.tempoDown)}/${keyLabel(n.tempoUp)}:Tempo`,
    `${keyLabel(b.quit)}:Quit`,
  ].join('  ');
}

export class KeyMap {
  private bindings = new Map<string, KeyAction>();
  private padKeys = new Map<number, string>();

  static fromBindings(b: KeyBindings): KeyMap {
    const map = new KeyMap();
    for (const [key, , action] of bindingEntries(b)) map.bind(key, action);
    return map;
  }

  bind(key: string, action: KeyAction): void {
    this.bindings.set(key, action);
    if (action.kind === 'pad' && !this.padKeys.has(action.pad)) this.padKeys.set(action.pad, key);
  }

  /** Ctrl+C always quits, whatever the bindings say. */
  lookup(keyId: string): KeyAction | undefined {
    if (keyId === 'Ctrl+C') return { kind: 'quit' };
    return this.bindings.get(keyId);
  }

  /** Key shown on a pad in the view. */
  keyForPad(pad: number): string {
    return this.padKeys.get(pad) ?? '';
  }

  get size(): number {
    return this.bindings.size;
  }
}

export default KeyMap;
