import { existsSync } from 'fs';
import { basename, extname, resolve } from 'path';
import { GROUPS, SampleBank, type SampleHandle } from '@stepdeck/engine';
import { createLogger, warn } from '@stepdeck/engine/util';
import type { SampleMap } from './config.js';

const log = createLogger('cli:samples');

export interface SampleLoadReport {
  bank: SampleBank<SampleHandle>;
  loaded: number;
  /** Configured paths that do not exist; their pads stay empty. */
  missing: string[];
}

/** Display name for a sample file: its base name without extension. */
export function sampleName(path: string): string {
  return basename(path, extname(path));
}

/**
 * Assigns configured sample files to pads. Relative paths resolve against
 * `baseDir`. A missing file leaves its pad empty and is reported, not thrown.
 */
export function loadSampleBank(
  samples: SampleMap,
  baseDir: string,
  exists: (path: string) => boolean = existsSync
): SampleLoadReport {
  const bank = new SampleBank<SampleHandle>();
  const missing: string[] = [];
  let loaded = 0;

  for (const group of GROUPS) {
    for (const [padKey, file] of Object.entries(samples[group])) {
      const pad = Number(padKey);
      const path = resolve(baseDir, file);
      if (!exists(path)) {
        warn('samples', 'sample file not found', { file: path, group, pad });
        missing.push(path);
        continue;
      }
      const name = sampleName(path);
      bank.assign(group, pad, { name, path }, name);
      loaded++;
    }
  }

  log.info(`loaded ${loaded} sample(s)${missing.length ? `, ${missing.length} missing` : ''}`);
  return { bank, loaded, missing };
}
