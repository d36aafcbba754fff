export {
  serializePatterns,
  exportPatternsJSON,
  PATTERN_BANK_FORMAT,
  PATTERN_BANK_VERSION,
  type PatternBankDocument,
  type PatternEntry,
  type StepHitEntry,
  type ExportOptions,
} from './jsonExport.js';
