import { Pattern, type PatternView } from './pattern.js';
import {
  DEFAULT_STEPS_PER_PATTERN,
  GROUPS,
  MAX_PATTERNS,
  MAX_STEPS_PER_PATTERN,
  isStepsPerPattern,
  isPatternIndex,
  type Group,
} from '../model/groups.js';

/** Read-only access to a pattern bank, as handed out by a session. */
export interface PatternBankView {
  readonly stepsPerPattern: number;
  peek(group: Group, index: number): PatternView | undefined;
  entries(group: Group): Array<[number, PatternView]>;
  patternCount(): number;
}

/**
 * Per-group pattern banks. Patterns are created empty on first access and are
 * never removed for the lifetime of the store.
 */
export class PatternStore implements PatternBankView {
  readonly stepsPerPattern: number;
  private banks: Record<Group, Map<number, Pattern>>;

  constructor(stepsPerPattern: number = DEFAULT_STEPS_PER_PATTERN) {
    if (!isStepsPerPattern(stepsPerPattern)) {
      throw new RangeError(`stepsPerPattern must be an integer in 1..${MAX_STEPS_PER_PATTERN}, got ${stepsPerPattern}`);
    }
    this.stepsPerPattern = stepsPerPattern;
    this.banks = { DRUMS: new Map(), BASS: new Map(), LEAD: new Map(), VOCAL: new Map() };
  }

  private checkIndex(index: number): void {
    if (!isPatternIndex(index)) {
      throw new RangeError(`Pattern index ${index} is outside 0..${MAX_PATTERNS - 1}`);
    }
  }

  /** Returns the pattern, creating an empty one the first time an index is visited. */
  get(group: Group, index: number): Pattern {
    this.checkIndex(index);
    const bank = this.banks[group];
    let pattern = bank.get(index);
    if (!pattern) {
      pattern = new Pattern(this.stepsPerPattern);
      bank.set(index, pattern);
    }
    return pattern;
  }

  /** Returns the pattern only if it has been created. */
  peek(group: Group, index: number): Pattern | undefined {
    this.checkIndex(index);
    return this.banks[group].get(index);
  }

  has(group: Group, index: number): boolean {
    return this.peek(group, index) !== undefined;
  }

  clear(group: Group, index: number): void {
    this.peek(group, index)?.clear();
  }

  /** Created patterns of a group ordered by index. */
  entries(group: Group): Array<[number, Pattern]> {
    return Array.from(this.banks[group].entries()).sort((a, b) => a[0] - b[0]);
  }

  patternCount(): number {
    return GROUPS.reduce((n, g) => n + this.banks[g].size, 0);
  }
}

export default PatternStore;
