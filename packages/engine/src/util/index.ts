/**
 * Utility modules for the StepDeck engine.
 */

// Logger - centralized logging system
export {
  createLogger,
  configureLogging,
  loadLoggingFromEnv,
  getLoggingConfig,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';

// Diagnostics - structured error/warning reporting
export {
  formatDiagnostic,
  info,
  warn,
  error,
  type DiagLevel,
  type DiagMeta,
} from './diag.js';

export {
  StepDeckError,
  InputOutOfRangeError,
  ConfigError,
  PatternFormatError,
  errorMessage,
  type StepDeckErrorCode,
} from './errors.js';
