import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from '@stepdeck/engine/util';
import { loadConfig, loadDefaultConfig, mergeConfig, validateConfig, writeExampleConfig } from '../src/config';

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  return [];
}

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stepdeck-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('built-in defaults', () => {
    const config = loadDefaultConfig();
    expect(config.audio).toEqual({
      defaultTempo: 120,
      stepsPerBeat: 4,
      stepsPerPattern: 16,
      masterVolume: 0.7,
      groupVolume: 0.8,
    });
    expect(config.ui.flashDurationMs).toBe(150);
    expect(config.keyBindings.transport.playStop).toBe(' ');
    expect(config.keyBindings.pads['7']).toBe(0);
    expect(config.samples).toEqual({ DRUMS: {}, BASS: {}, LEAD: {}, VOCAL: {} });
  });

  test('without a config file the defaults apply', () => {
    const loaded = loadConfig(undefined, dir);
    expect(loaded.source).toBeUndefined();
    expect(loaded.baseDir).toBe(dir);
    expect(loaded.config).toEqual(loadDefaultConfig());
  });

  test('stepdeck.config.json in the working directory is merged over the defaults', () => {
    writeFileSync(
      join(dir, 'stepdeck.config.json'),
      JSON.stringify({ audio: { defaultTempo: 140 }, samples: { DRUMS: { '0': 'kits/kick.wav' } } })
    );
    const loaded = loadConfig(undefined, dir);
    expect(loaded.source).toBe(join(dir, 'stepdeck.config.json'));
    expect(loaded.config.audio.defaultTempo).toBe(140);
    expect(loaded.config.audio.stepsPerBeat).toBe(4);
    expect(loaded.config.samples.DRUMS).toEqual({ '0': 'kits/kick.wav' });
  });

  test('an explicit path that does not exist is an error', () => {
    expect(() => loadConfig('missing.json', dir)).toThrow(ConfigError);
  });

  test('invalid JSON is a config error', () => {
    writeFileSync(join(dir, 'bad.json'), '{ audio: ');
    expect(() => loadConfig('bad.json', dir)).toThrow(ConfigError);
  });

  test('reports every invalid field at once', () => {
    const value = mergeConfig(JSON.parse(readFileSync(join(__dirname, '..', 'config', 'default.config.json'), 'utf8')), {
      audio: { defaultTempo: 20, stepsPerBeat: 2.5 },
      keyBindings: { transport: { record: 'Record' } },
      samples: { PIANO: {}, BASS: { '16': 'x.wav' } },
      ui: { flashDurationMs: -1 },
    });
    expect(problemsOf(() => validateConfig(value))).toEqual([
      'audio.defaultTempo must be a number in 60..300, got 20',
      'audio.stepsPerBeat must be an integer in 1..16, got 2.5',
      'keyBindings.transport.record is not a valid key: "Record"',
      'ui.flashDurationMs must be a number in 0..5000, got -1',
      'samples.BASS: pad "16" is not in 0..15',
      'samples.PIANO is not a group (expected one of DRUMS, BASS, LEAD, VOCAL)',
    ]);
  });

  test('replacing the pad map drops the default pad keys', () => {
    const pads: Record<string, number> = {};
    'asdfghjkzxcvbnm,'.split('').forEach((key, pad) => {
      pads[key] = pad;
    });
    const value = mergeConfig(JSON.parse(readFileSync(join(__dirname, '..', 'config', 'default.config.json'), 'utf8')), {
      keyBindings: { pads, transport: { clear: 'C', rewind: 'Z' } },
    });
    const config = validateConfig(value);
    expect(Object.keys(config.keyBindings.pads)).toHaveLength(16);
    expect(config.keyBindings.pads['7']).toBeUndefined();
  });

  test('conflicting key bindings are rejected', () => {
    writeFileSync(join(dir, 'clash.json'), JSON.stringify({ keyBindings: { quit: 'r' } }));
    expect(problemsOf(() => loadConfig('clash.json', dir))).toEqual([
      'key "r" is bound to both transport.record and quit',
    ]);
  });

  test('generate-config output loads back as the defaults', () => {
    const out = writeExampleConfig(join(dir, 'example.json'));
    expect(loadConfig(out, dir).config).toEqual(loadDefaultConfig());
  });
});
