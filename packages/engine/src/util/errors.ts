/**
 * Error taxonomy shared by the engine and the CLI.
 *
 * Range problems on continuous controls (tempo, pattern index) are clamped and
 * never surface here; these classes cover input that is rejected outright.
 */

export type StepDeckErrorCode = 'INPUT_OUT_OF_RANGE' | 'CONFIG' | 'PATTERN_FORMAT';

export class StepDeckError extends Error {
  readonly code: StepDeckErrorCode;

  constructor(code: StepDeckErrorCode, message: string) {
    super(message);
    this.name = 'StepDeckError';
    this.code = code;
  }
}

/** A pad or group index outside its valid bounds, rejected at the input boundary. */
export class InputOutOfRangeError extends StepDeckError {
  readonly field: 'group' | 'pad';
  readonly value: number;

  constructor(field: 'group' | 'pad', value: number, max: number) {
    super('INPUT_OUT_OF_RANGE', `${field} index ${value} is outside 0..${max}`);
    this.name = 'InputOutOfRangeError';
    this.field = field;
    this.value = value;
  }
}

export class ConfigError extends StepDeckError {
  readonly problems: string[];

  constructor(problems: string[], source?: string) {
    super('CONFIG', `Configuration invalid${source ? ` (${source})` : ''}:\n` + problems.map(p => ` - ${p}`).join('\n'));
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class PatternFormatError extends StepDeckError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('PATTERN_FORMAT', 'Pattern bank validation failed:\n' + problems.map(p => ` - ${p}`).join('\n'));
    this.name = 'PatternFormatError';
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
