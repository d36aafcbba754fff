import { loadDefaultConfig } from '../src/config';
import { KeyMap, isKeyId, keyBindingConflicts, keyIdFromKeypress } from '../src/keymap';

describe('keyIdFromKeypress', () => {
  test('maps readline key names to key ids', () => {
    expect(keyIdFromKeypress(' ', { name: 'space', sequence: ' ' })).toBe(' ');
    expect(keyIdFromKeypress('\t', { name: 'tab' })).toBe('Tab');
    expect(keyIdFromKeypress(undefined, { name: 'tab', shift: true })).toBe('BackTab');
    expect(keyIdFromKeypress(undefined, { name: 'right' })).toBe('Right');
    expect(keyIdFromKeypress(undefined, { name: 'f3' })).toBe('F3');
    expect(keyIdFromKeypress('\x1b', { name: 'escape' })).toBe('Esc');
  });

  test('printable characters are their own id', () => {
    expect(keyIdFromKeypress('M', { name: 'm', shift: true })).toBe('M');
    expect(keyIdFromKeypress('!', undefined)).toBe('!');
    expect(keyIdFromKeypress(';', { sequence: ';' })).toBe(';');
  });

  test('ctrl+c is reported, other control chords are not', () => {
    expect(keyIdFromKeypress('\x03', { name: 'c', ctrl: true })).toBe('Ctrl+C');
    expect(keyIdFromKeypress('\x01', { name: 'a', ctrl: true })).toBeNull();
  });
});

describe('isKeyId', () => {
  test('accepts characters, named keys and F1-F12', () => {
    for (const id of [' ', 'r', '/', 'Tab', 'BackTab', 'Esc', 'Left', 'F1', 'F12']) expect(isKeyId(id)).toBe(true);
  });

  test('rejects unknown names', () => {
    for (const id of ['', 'Space', 'F13', 'F0', 'ctrl+x']) expect(isKeyId(id)).toBe(false);
  });
});

describe('KeyMap', () => {
  const bindings = loadDefaultConfig().keyBindings;
  const map = KeyMap.fromBindings(bindings);

  test('default transport and navigation keys', () => {
    expect(map.lookup(' ')).toEqual({ kind: 'command', command: { type: 'PlayStop' } });
    expect(map.lookup('r')).toEqual({ kind: 'command', command: { type: 'ToggleRecord' } });
    expect(map.lookup('BackTab')).toEqual({ kind: 'command', command: { type: 'PrevGroup' } });
    expect(map.lookup('Up')).toEqual({ kind: 'command', command: { type: 'TempoUp' } });
  });

  test('group volume keys follow group order', () => {
    expect(map.lookup('2')).toEqual({ kind: 'command', command: { type: 'GroupVolUp', group: 'BASS' } });
    expect(map.lookup('$')).toEqual({ kind: 'command', command: { type: 'GroupVolDown', group: 'VOCAL' } });
    expect(map.lookup('F1')).toEqual({ kind: 'command', command: { type: 'GroupMuteToggle', group: 'DRUMS' } });
  });

  test('pad keys cover all 16 pads', () => {
    const keys = ['7', '8', '9', '0', 'u', 'i', 'o', 'p', 'j', 'k', 'l', ';', 'm', ',', '.', '/'];
    keys.forEach((key, pad) => {
      expect(map.lookup(key)).toEqual({ kind: 'pad', pad });
      expect(map.keyForPad(pad)).toBe(key);
    });
  });

  test('Esc and Ctrl+C quit, unbound keys do nothing', () => {
    expect(map.lookup('Esc')).toEqual({ kind: 'quit' });
    expect(map.lookup('Ctrl+C')).toEqual({ kind: 'quit' });
    expect(map.lookup('x')).toBeUndefined();
  });

  test('the defaults have no conflicting keys', () => {
    expect(keyBindingConflicts(bindings)).toEqual([]);
  });

  test('a key bound twice is a conflict', () => {
    const clash = { ...bindings, transport: { ...bindings.transport, rewind: 'r' } };
    expect(keyBindingConflicts(clash)).toEqual(['key "r" is bound to both transport.record and transport.rewind']);
  });
});
