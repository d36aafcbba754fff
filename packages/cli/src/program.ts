import { Command } from 'commander';
import { existsSync } from 'fs';
import {
  GROUPS,
  PatternStore,
  type PatternBankView,
  TEMPO_MAX,
  TEMPO_MIN,
  clampTempo,
  loadPatternsJSON,
} from '@stepdeck/engine';
import {
  ConfigError,
  PatternFormatError,
  StepDeckError,
  configureLogging,
  errorMessage,
  loadLoggingFromEnv,
} from '@stepdeck/engine/util';
import { loadConfig, writeExampleConfig, CONFIG_FILE_NAME, EXAMPLE_CONFIG_FILE_NAME } from './config.js';
import { runLiveSession } from './liveSession.js';
import { SystemAudioSink } from './nodeAudioPlayer.js';
import { loadSampleBank } from './sampleLoader.js';

export const DEFAULT_PATTERNS_FILE = 'stepdeck.patterns.json';

type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
};

interface PlayOptions {
  config?: string;
  patterns: string;
  tempo?: string;
  steps?: string;
}

/** Per-group summary lines for a pattern bank. */
export function summarizePatterns(store: PatternBankView): string[] {
  const lines = [`stepsPerPattern: ${store.stepsPerPattern}`];
  for (const group of GROUPS) {
    const entries = store.entries(group).filter(([, p]) => !p.isEmpty());
    const hits = entries.reduce((n, [, p]) => n + p.hitCount(), 0);
    const indices = entries.map(([i]) => String(i + 1).padStart(2, '0')).join(', ');
    lines.push(`${group}: ${entries.length} pattern(s), ${hits} hit(s)${indices ? ` [${indices}]` : ''}`);
  }
  return lines;
}

function reportFailure(prefix: string, err: unknown, debug: boolean): void {
  if (err instanceof ConfigError || err instanceof PatternFormatError) {
    console.error(err.message);
  } else if (debug && err instanceof Error) {
    console.error(prefix, err.stack ?? err.message);
  } else {
    console.error(prefix, errorMessage(err));
  }
  process.exitCode = 2;
}

function parseTempo(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const bpm = Number(value);
  if (value.trim() === '' || !Number.isFinite(bpm)) {
    throw new StepDeckError('CONFIG', `--tempo must be a number, got '${value}'`);
  }
  return clampTempo(bpm);
}

/**
 * Loads the pattern bank at `path`, or starts an empty one with `steps` steps
 * per pattern. A bank on disk keeps its own length.
 */
export function openPatternBank(path: string, steps: number, requestedSteps?: number): PatternStore {
  if (!existsSync(path)) return new PatternStore(steps);
  const store = loadPatternsJSON(path);
  if (requestedSteps !== undefined && requestedSteps !== store.stepsPerPattern) {
    console.warn(`--steps ${requestedSteps} ignored: ${path} uses ${store.stepsPerPattern} steps per pattern`);
  }
  return store;
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new StepDeckError('CONFIG', `${flag} must be a positive integer, got '${value}'`);
  return n;
}

export function createProgram(): Command {
  const program = new Command();
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .name('stepdeck')
    .description('Terminal step sequencer and sample pad player')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)');

  program.hook('preAction', () => {
    loadLoggingFromEnv();
    const opts = globals();
    if (opts.debug) configureLogging({ level: 'debug' });
    else if (opts.verbose) configureLogging({ level: 'info' });
  });

  program
    .command('play')
    .description('Start a live session: pads, transport and recording from the keyboard')
    .option('-c, --config <file>', `Configuration file (default: ./${CONFIG_FILE_NAME} if present)`)
    .option('-p, --patterns <file>', 'Pattern bank loaded at start and saved on quit', DEFAULT_PATTERNS_FILE)
    .option('-t, --tempo <bpm>', `Starting tempo (${TEMPO_MIN}-${TEMPO_MAX})`)
    .option('-s, --steps <n>', 'Steps per pattern for a new pattern bank')
    .action(async (options: PlayOptions) => {
      try {
        const tempo = parseTempo(options.tempo);
        const requestedSteps = parsePositiveInt(options.steps, '--steps');
        if (!process.stdin.isTTY) {
          throw new StepDeckError('CONFIG', 'play needs an interactive terminal');
        }
        const { config, baseDir } = loadConfig(options.config);
        if (tempo !== undefined) config.audio.defaultTempo = tempo;

        const store = openPatternBank(options.patterns, requestedSteps ?? config.audio.stepsPerPattern, requestedSteps);
        const { bank, missing } = loadSampleBank(config.samples, baseDir);
        if (missing.length > 0) console.warn(`${missing.length} sample file(s) not found; those pads are empty`);

        const sink = new SystemAudioSink({ player: config.audio.player });
        const saved = await runLiveSession({ config, bank, sink, store, patternsPath: options.patterns });
        if (saved) console.log(`Patterns saved to ${saved}`);
      } catch (err) {
        reportFailure('Failed to start session:', err, globals().debug === true);
      }
    });

  program
    .command('generate-config')
    .description('Write the default configuration as an editable example')
    .argument('[output]', 'Output file path', EXAMPLE_CONFIG_FILE_NAME)
    .action((output: string) => {
      try {
        const path = writeExampleConfig(output);
        console.log(`Generated example config at ${path}`);
        console.log(`Rename to ${CONFIG_FILE_NAME} and edit to customize`);
      } catch (err) {
        reportFailure('Failed to write config:', err, globals().debug === true);
      }
    });

  program
    .command('verify')
    .description('Validate a pattern bank file; exit 0 if valid, non-zero if invalid')
    .argument('<file>', 'Path to the pattern bank JSON')
    .action((file: string) => {
      try {
        const store = loadPatternsJSON(file);
        console.log(`OK: ${file} is a valid pattern bank (${store.patternCount()} pattern(s))`);
        process.exitCode = 0;
      } catch (err) {
        if (err instanceof PatternFormatError) {
          console.error(`Validation failed for ${file}:`);
          for (const p of err.problems) console.error('  -', p);
          process.exitCode = 2;
          return;
        }
        reportFailure('Error reading file:', err, globals().debug === true);
      }
    });

  program
    .command('inspect')
    .description('Print a per-group summary of a pattern bank file')
    .argument('<file>', 'Path to the pattern bank JSON')
    .action((file: string) => {
      try {
        for (const line of summarizePatterns(loadPatternsJSON(file))) console.log(line);
      } catch (err) {
        reportFailure('Failed to inspect file:', err, globals().debug === true);
      }
    });

  return program;
}

export default createProgram;
