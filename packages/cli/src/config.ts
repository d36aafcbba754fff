/**
 * stepdeck.config.json loading.
 *
 * The user file is merged over the built-in defaults and the result is
 * validated as a whole; every problem is reported in one ConfigError.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { GROUPS, MAX_STEPS_PER_PATTERN, PADS_PER_GROUP, TEMPO_MAX, TEMPO_MIN, type Group } from '@stepdeck/engine';
import { ConfigError, createLogger } from '@stepdeck/engine/util';
import { isKeyId, keyBindingConflicts, type KeyBindings } from './keymap.js';

const log = createLogger('config');

export const CONFIG_FILE_NAME = 'stepdeck.config.json';
export const EXAMPLE_CONFIG_FILE_NAME = 'stepdeck.config.example.json';
export const DEFAULT_CONFIG_PATH = join(__dirname, '..', 'config', 'default.config.json');

export interface AudioConfig {
  defaultTempo: number;
  stepsPerBeat: number;
  stepsPerPattern: number;
  masterVolume: number;
  groupVolume: number;
  /** Command line used instead of the platform player, e.g. "mpv --really-quiet". */
  player?: string;
}

/** Per group, pad index (as a string key) to sample file path. */
export type SampleMap = Record<Group, Record<string, string>>;

export interface UIConfig {
  flashDurationMs: number;
}

export interface StepDeckConfig {
  audio: AudioConfig;
  keyBindings: KeyBindings;
  samples: SampleMap;
  ui: UIConfig;
}

export interface LoadedConfig {
  config: StepDeckConfig;
  /** File the user settings came from; undefined when only defaults apply. */
  source?: string;
  /** Directory relative sample paths resolve against. */
  baseDir: string;
}

type Obj = Record<string, unknown>;

function isObj(value: unknown): value is Obj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Objects merge key by key; arrays and scalars replace. The pad map is replaced
// whole so remapping a pad does not leave its old key bound.
export function mergeConfig(base: unknown, override: unknown, path = ''): unknown {
  if (override === undefined) return base;
  if (!isObj(base) || !isObj(override) || path === 'keyBindings.pads') return override;
  const out: Obj = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = mergeConfig(base[key], value, path ? `${path}.${key}` : key);
  }
  return out;
}

class Reader {
  readonly problems: string[] = [];

  section(parent: Obj, key: string, where: string): Obj {
    const value = parent[key];
    if (isObj(value)) return value;
    this.problems.push(`${where} must be an object`);
    return {};
  }

  number(obj: Obj, key: string, where: string, min: number, max: number, integer = false): number {
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max || (integer && !Number.isInteger(value))) {
      this.problems.push(`${where} must be ${integer ? 'an integer' : 'a number'} in ${min}..${max}, got ${JSON.stringify(value)}`);
      return min;
    }
    return value;
  }

  key(obj: Obj, name: string, where: string): string {
    const value = obj[name];
    if (typeof value !== 'string' || !isKeyId(value)) {
      this.problems.push(`${where} is not a valid key: ${JSON.stringify(value)}`);
      return '';
    }
    return value;
  }

  keyList(obj: Obj, name: string, where: string): string[] {
    const value = obj[name];
    if (!Array.isArray(value) || value.length !== GROUPS.length) {
      this.problems.push(`${where} must list ${GROUPS.length} keys, one per group`);
      return [];
    }
    return value.map((item: unknown, i: number) => this.key({ item }, 'item', `${where}[${i}]`));
  }
}

function readKeyBindings(r: Reader, root: Obj): KeyBindings {
  const kb = r.section(root, 'keyBindings', 'keyBindings');
  const transport = r.section(kb, 'transport', 'keyBindings.transport');
  const navigation = r.section(kb, 'navigation', 'keyBindings.navigation');
  const volume = r.section(kb, 'volume', 'keyBindings.volume');
  const padsRaw = r.section(kb, 'pads', 'keyBindings.pads');

  const pads: Record<string, number> = {};
  for (const [key, pad] of Object.entries(padsRaw)) {
    if (!isKeyId(key)) r.problems.push(`keyBindings.pads: ${JSON.stringify(key)} is not a valid key`);
    else pads[key] = r.number(padsRaw, key, `keyBindings.pads.${key}`, 0, PADS_PER_GROUP - 1, true);
  }

  const t = 'keyBindings.transport';
  const n = 'keyBindings.navigation';
  const v = 'keyBindings.volume';
  return {
    transport: {
      playStop: r.key(transport, 'playStop', `${t}.playStop`),
      record: r.key(transport, 'record', `${t}.record`),
      clear: r.key(transport, 'clear', `${t}.clear`),
      rewind: r.key(transport, 'rewind', `${t}.rewind`),
    },
    navigation: {
      nextGroup: r.key(navigation, 'nextGroup', `${n}.nextGroup`),
      prevGroup: r.key(navigation, 'prevGroup', `${n}.prevGroup`),
      nextPattern: r.key(navigation, 'nextPattern', `${n}.nextPattern`),
      prevPattern: r.key(navigation, 'prevPattern', `${n}.prevPattern`),
      tempoUp: r.key(navigation, 'tempoUp', `${n}.tempoUp`),
      tempoDown: r.key(navigation, 'tempoDown', `${n}.tempoDown`),
    },
    volume: {
      masterUp: r.key(volume, 'masterUp', `${v}.masterUp`),
      masterDown: r.key(volume, 'masterDown', `${v}.masterDown`),
      masterMute: r.key(volume, 'masterMute', `${v}.masterMute`),
      groupUp: r.keyList(volume, 'groupUp', `${v}.groupUp`),
      groupDown: r.keyList(volume, 'groupDown', `${v}.groupDown`),
      groupMute: r.keyList(volume, 'groupMute', `${v}.groupMute`),
    },
    pads,
    quit: r.key(kb, 'quit', 'keyBindings.quit'),
  };
}

function readSamples(r: Reader, root: Obj): SampleMap {
  const samples: SampleMap = { DRUMS: {}, BASS: {}, LEAD: {}, VOCAL: {} };
  const raw = root.samples;
  if (raw === undefined) return samples;
  if (!isObj(raw)) {
    r.problems.push('samples must be an object');
    return samples;
  }
  for (const [group, pads] of Object.entries(raw)) {
    const target = GROUPS.find(g => g === group);
    if (!target) {
      r.problems.push(`samples.${group} is not a group (expected one of ${GROUPS.join(', ')})`);
      continue;
    }
    if (!isObj(pads)) {
      r.problems.push(`samples.${group} must be an object`);
      continue;
    }
    for (const [pad, path] of Object.entries(pads)) {
      const index = Number(pad);
      if (!/^\d+$/.test(pad) || index >= PADS_PER_GROUP) {
        r.problems.push(`samples.${group}: pad ${JSON.stringify(pad)} is not in 0..${PADS_PER_GROUP - 1}`);
      } else if (typeof path !== 'string' || path.length === 0) {
        r.problems.push(`samples.${group}.${pad} must be a file path`);
      } else {
        samples[target][String(index)] = path;
      }
    }
  }
  return samples;
}

/** Validates a merged configuration value. */
export function validateConfig(value: unknown, source?: string): StepDeckConfig {
  if (!isObj(value)) throw new ConfigError(['configuration must be a JSON object'], source);
  const r = new Reader();

  const audioRaw = r.section(value, 'audio', 'audio');
  const audio: AudioConfig = {
    defaultTempo: r.number(audioRaw, 'defaultTempo', 'audio.defaultTempo', TEMPO_MIN, TEMPO_MAX),
    stepsPerBeat: r.number(audioRaw, 'stepsPerBeat', 'audio.stepsPerBeat', 1, 16, true),
    stepsPerPattern: r.number(audioRaw, 'stepsPerPattern', 'audio.stepsPerPattern', 1, MAX_STEPS_PER_PATTERN, true),
    masterVolume: r.number(audioRaw, 'masterVolume', 'audio.masterVolume', 0, 1),
    groupVolume: r.number(audioRaw, 'groupVolume', 'audio.groupVolume', 0, 1),
  };
  const player = audioRaw.player;
  if (typeof player === 'string' && player.trim()) audio.player = player.trim();
  else if (player !== undefined) r.problems.push('audio.player must be a non-empty command line');

  const keyBindings = readKeyBindings(r, value);
  const uiRaw = r.section(value, 'ui', 'ui');
  const ui: UIConfig = { flashDurationMs: r.number(uiRaw, 'flashDurationMs', 'ui.flashDurationMs', 0, 5000) };
  const samples = readSamples(r, value);

  if (r.problems.length === 0) r.problems.push(...keyBindingConflicts(keyBindings));
  if (r.problems.length > 0) throw new ConfigError(r.problems, source);
  return { audio, keyBindings, samples, ui };
}

function readJson(path: string): unknown {
  const src = readFileSync(path, 'utf8');
  try {
    return JSON.parse(src);
  } catch (err) {
    throw new ConfigError([`not valid JSON: ${err instanceof Error ? err.message : String(err)}`], path);
  }
}

export function loadDefaultConfig(): StepDeckConfig {
  return validateConfig(readJson(DEFAULT_CONFIG_PATH), DEFAULT_CONFIG_PATH);
}

/**
 * Loads the configuration. An explicit path must exist; without one,
 * stepdeck.config.json in `cwd` is used when present.
 */
export function loadConfig(path?: string, cwd: string = process.cwd()): LoadedConfig {
  const defaults = readJson(DEFAULT_CONFIG_PATH);
  let source: string | undefined;
  if (path) {
    source = resolve(cwd, path);
    if (!existsSync(source)) throw new ConfigError([`file not found`], source);
  } else {
    const candidate = join(cwd, CONFIG_FILE_NAME);
    if (existsSync(candidate)) source = candidate;
  }

  if (!source) {
    log.debug('no config file, using defaults');
    return { config: validateConfig(defaults, DEFAULT_CONFIG_PATH), baseDir: cwd };
  }
  log.info(`loading config from ${source}`);
  const merged = mergeConfig(defaults, readJson(source));
  return { config: validateConfig(merged, source), source, baseDir: dirname(source) };
}

/** Writes the default configuration as an editable example. Returns the path written. */
export function writeExampleConfig(outPath: string = EXAMPLE_CONFIG_FILE_NAME): string {
  const config = loadDefaultConfig();
  writeFileSync(outPath, JSON.stringify(config, null, 2) + '\n', 'utf8');
  return outPath;
}
