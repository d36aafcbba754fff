/*
 * Pattern bank JSON export.
 *
 * Per group, an ordered list of pattern entries; each entry a list of steps;
 * each step a list of hits. A full-velocity hit is written as a bare pad
 * index, any other hit as { pad, velocity }.
 */
import { writeFileSync } from 'fs';
import { GROUPS, type Group } from '../model/groups.js';
import type { PatternBankView } from '../pattern/patternStore.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('export');

export const PATTERN_BANK_FORMAT = 'stepdeck-patterns';
export const PATTERN_BANK_VERSION = 1;

export type StepHitEntry = number | { pad: number; velocity: number };

export interface PatternEntry {
  index: number;
  steps: StepHitEntry[][];
}

export interface PatternBankDocument {
  format: typeof PATTERN_BANK_FORMAT;
  version: number;
  stepsPerPattern: number;
  groups: Record<Group, PatternEntry[]>;
}

export interface ExportOptions {
  /** Also write patterns that were visited but hold no hits. */
  includeEmpty?: boolean;
  verbose?: boolean;
}

function serializeGroup(store: PatternBankView, group: Group, includeEmpty: boolean): PatternEntry[] {
  const entries: PatternEntry[] = [];
  for (const [index, pattern] of store.entries(group)) {
    if (!includeEmpty && pattern.isEmpty()) continue;
    const steps: StepHitEntry[][] = [];
    for (let step = 0; step < pattern.length; step++) {
      steps.push(pattern.hitsAt(step).map(h => (h.velocity === 1 ? h.pad : { pad: h.pad, velocity: h.velocity })));
    }
    entries.push({ index, steps });
  }
  return entries;
}

export function serializePatterns(store: PatternBankView, opts: ExportOptions = {}): PatternBankDocument {
  const includeEmpty = opts.includeEmpty === true;
  return {
    format: PATTERN_BANK_FORMAT,
    version: PATTERN_BANK_VERSION,
    stepsPerPattern: store.stepsPerPattern,
    groups: {
      DRUMS: serializeGroup(store, 'DRUMS', includeEmpty),
      BASS: serializeGroup(store, 'BASS', includeEmpty),
      LEAD: serializeGroup(store, 'LEAD', includeEmpty),
      VOCAL: serializeGroup(store, 'VOCAL', includeEmpty),
    },
  };
}

export function exportPatternsJSON(store: PatternBankView, outPath: string, opts: ExportOptions = {}): string {
  const path = outPath.toLowerCase().endsWith('.json') ? outPath : `${outPath}.json`;
  const doc = serializePatterns(store, opts);
  writeFileSync(path, JSON.stringify(doc, null, 2), 'utf8');

  if (opts.verbose) {
    const counts = GROUPS.map(g => `${g}=${doc.groups[g].length}`).join(' ');
    log.info(`Wrote pattern bank to ${path} (${counts})`);
  }
  return path;
}
