/*
 * Pattern bank JSON import. Validates the whole document first and reports
 * every problem at once.
 */
import { readFileSync } from 'fs';
import { PATTERN_BANK_FORMAT, type PatternBankDocument, type PatternEntry, type StepHitEntry } from '../export/jsonExport.js';
import {
  GROUPS,
  MAX_PATTERNS,
  MAX_STEPS_PER_PATTERN,
  isGroup,
  isPadIndex,
  isPatternIndex,
  isStepsPerPattern,
  type Group,
} from '../model/groups.js';
import { PatternStore } from '../pattern/patternStore.js';
import { PatternFormatError } from '../util/errors.js';
import { warn } from '../util/diag.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readHit(raw: unknown, where: string, errors: string[]): StepHitEntry | null {
  if (typeof raw === 'number') {
    if (!isPadIndex(raw)) {
      errors.push(`${where}: pad ${raw} is not an integer in 0..15`);
      return null;
    }
    return raw;
  }
  if (isRecord(raw)) {
    const { pad, velocity } = raw;
    if (!isPadIndex(pad)) {
      errors.push(`${where}: pad ${JSON.stringify(pad)} is not an integer in 0..15`);
      return null;
    }
    if (typeof velocity !== 'number' || !(velocity > 0 && velocity <= 1)) {
      errors.push(`${where}: velocity ${JSON.stringify(velocity)} must be a number in (0, 1]`);
      return null;
    }
    return { pad, velocity };
  }
  errors.push(`${where}: hit must be a pad index or { pad, velocity }`);
  return null;
}

function readGroup(group: Group, raw: unknown, stepsPerPattern: number, errors: string[]): PatternEntry[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    errors.push(`groups.${group} must be an array`);
    return [];
  }
  if (raw.length > MAX_PATTERNS) errors.push(`groups.${group} has ${raw.length} patterns, at most ${MAX_PATTERNS} allowed`);

  const entries: PatternEntry[] = [];
  const seen = new Set<number>();
  let lastIndex = -1;
  raw.forEach((item: unknown, i: number) => {
    const where = `groups.${group}[${i}]`;
    if (!isRecord(item)) {
      errors.push(`${where} must be an object`);
      return;
    }
    const { index, steps } = item;
    if (!isPatternIndex(index)) {
      errors.push(`${where}.index ${JSON.stringify(index)} is not an integer in 0..${MAX_PATTERNS - 1}`);
      return;
    }
    if (seen.has(index)) errors.push(`${where}.index ${index} is duplicated`);
    else if (index < lastIndex) errors.push(`${where}.index ${index} is out of order`);
    seen.add(index);
    lastIndex = Math.max(lastIndex, index);

    if (!Array.isArray(steps)) {
      errors.push(`${where}.steps must be an array`);
      return;
    }
    if (steps.length !== stepsPerPattern) {
      errors.push(`${where}.steps has ${steps.length} steps, expected ${stepsPerPattern}`);
      return;
    }
    const parsedSteps: StepHitEntry[][] = steps.map((step: unknown, s: number) => {
      if (!Array.isArray(step)) {
        errors.push(`${where}.steps[${s}] must be an array`);
        return [];
      }
      const hits: StepHitEntry[] = [];
      step.forEach((hit: unknown, h: number) => {
        const parsed = readHit(hit, `${where}.steps[${s}][${h}]`, errors);
        if (parsed !== null) hits.push(parsed);
      });
      return hits;
    });
    entries.push({ index, steps: parsedSteps });
  });
  return entries;
}

/** Validates an already-parsed JSON value as a pattern bank document. */
export function parsePatternBank(value: unknown): PatternBankDocument {
  const errors: string[] = [];
  if (!isRecord(value)) throw new PatternFormatError(['document must be an object']);

  if (value.format !== PATTERN_BANK_FORMAT) errors.push(`format must be '${PATTERN_BANK_FORMAT}'`);
  const version = value.version;
  if (version !== 1) errors.push(`unsupported version ${JSON.stringify(version)}`);
  const stepsPerPattern = value.stepsPerPattern;
  if (!isStepsPerPattern(stepsPerPattern)) {
    errors.push(`stepsPerPattern must be an integer in 1..${MAX_STEPS_PER_PATTERN}`);
    throw new PatternFormatError(errors);
  }
  const groups = value.groups;
  if (!isRecord(groups)) {
    errors.push('missing or invalid `groups` object');
    throw new PatternFormatError(errors);
  }
  for (const key of Object.keys(groups)) {
    if (!isGroup(key)) warn('import', `unknown group '${key}' ignored`);
  }

  const doc: PatternBankDocument = {
    format: PATTERN_BANK_FORMAT,
    version: 1,
    stepsPerPattern,
    groups: {
      DRUMS: readGroup('DRUMS', groups.DRUMS, stepsPerPattern, errors),
      BASS: readGroup('BASS', groups.BASS, stepsPerPattern, errors),
      LEAD: readGroup('LEAD', groups.LEAD, stepsPerPattern, errors),
      VOCAL: readGroup('VOCAL', groups.VOCAL, stepsPerPattern, errors),
    },
  };
  if (errors.length > 0) throw new PatternFormatError(errors);
  return doc;
}

export function patternStoreFromDocument(doc: PatternBankDocument): PatternStore {
  const store = new PatternStore(doc.stepsPerPattern);
  for (const group of GROUPS) {
    for (const entry of doc.groups[group]) {
      const pattern = store.get(group, entry.index);
      entry.steps.forEach((hits, step) => {
        for (const hit of hits) {
          if (typeof hit === 'number') pattern.setHit(step, hit);
          else pattern.setHit(step, hit.pad, hit.velocity);
        }
      });
    }
  }
  return store;
}

/** Reads, validates and loads a pattern bank file. */
export function loadPatternsJSON(path: string): PatternStore {
  const src = readFileSync(path, 'utf8');
  let value: unknown;
  try {
    value = JSON.parse(src);
  } catch (err) {
    throw new PatternFormatError([`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return patternStoreFromDocument(parsePatternBank(value));
}
