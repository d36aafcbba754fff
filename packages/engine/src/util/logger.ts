/**
 * StepDeck Engine Logger
 *
 * Centralized logging utility for the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (clock, sequencer, mixer, dispatcher, session, cli, ...)
 * - Structured logging support
 * - Safe production defaults (error-only)
 * - Environment overrides for headless runs
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@stepdeck/engine/util/logger';
 *
 * const log = createLogger('clock');
 *
 * log.debug('Starting clock');
 * log.info({ event: 'started', bpm: 120 });
 * log.warn('Tick backlog dropped');
 * log.error('Sink failed', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: true,
};

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && levelOrder.some(l => l === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['clock', 'sequencer'],
 *   timestamps: false
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('info')) {
    console.info('[StepDeck] Logging configured:', config);
  }
}

/**
 * Load logging configuration from the environment.
 * Looks for STEPDECK_LOG_LEVEL and STEPDECK_LOG_MODULES (comma separated).
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const level = env.STEPDECK_LOG_LEVEL;
  const modulesStr = env.STEPDECK_LOG_MODULES;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (isLogLevel(level) || modules) {
    configureLogging({
      level: isLogLevel(level) ? level : config.level,
      modules,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

function output(level: Exclude<LogLevel, 'none'>, module: string | undefined, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module ?? 'StepDeck'}]`;
  switch (level) {
    case 'error':
      console.error(prefix, ...args);
      break;
    case 'warn':
      console.warn(prefix, ...args);
      break;
    case 'info':
      console.info(prefix, ...args);
      break;
    default:
      console.log(prefix, ...args);
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'clock', 'sequencer', 'mixer', 'cli')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) {
        output('error', module, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) {
        output('warn', module, args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) {
        output('info', module, args);
      }
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) {
        output('debug', module, args);
      }
    },
  };
}

export default createLogger;
