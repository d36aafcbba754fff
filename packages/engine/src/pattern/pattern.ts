import { PADS_PER_GROUP, isPadIndex } from '../model/groups.js';

export interface StepHit {
  pad: number;
  /** 0 < velocity <= 1; 1 is a full-velocity hit. */
  velocity: number;
}

/** Read-only access to a pattern. Only the sequencer writes hits. */
export interface PatternView {
  readonly length: number;
  hasHit(step: number, pad: number): boolean;
  hitsAt(step: number): StepHit[];
  padsAt(step: number): number[];
  isEmpty(): boolean;
  hitCount(): number;
  toGrid(): boolean[][];
}

/**
 * Fixed-length step grid for one group. Each step maps pad index to velocity.
 * The length is set at construction and never changes.
 */
export class Pattern implements PatternView {
  readonly length: number;
  private steps: Array<Map<number, number>>;

  constructor(length: number) {
    if (!Number.isInteger(length) || length < 1) {
      throw new RangeError(`Pattern length must be a positive integer, got ${length}`);
    }
    this.length = length;
    this.steps = Array.from({ length }, () => new Map<number, number>());
  }

  private checkStep(step: number): void {
    if (!Number.isInteger(step) || step < 0 || step >= this.length) {
      throw new RangeError(`Step ${step} is outside 0..${this.length - 1}`);
    }
  }

  setHit(step: number, pad: number, velocity = 1): void {
    this.checkStep(step);
    if (!isPadIndex(pad)) throw new RangeError(`Pad ${pad} is outside 0..${PADS_PER_GROUP - 1}`);
    if (!(velocity > 0 && velocity <= 1)) throw new RangeError(`Velocity ${velocity} is outside (0, 1]`);
    this.steps[step].set(pad, velocity);
  }

  clearHit(step: number, pad: number): void {
    this.checkStep(step);
    this.steps[step].delete(pad);
  }

  hasHit(step: number, pad: number): boolean {
    this.checkStep(step);
    return this.steps[step].has(pad);
  }

  /** Hits at a step, ordered by pad index. */
  hitsAt(step: number): StepHit[] {
    this.checkStep(step);
    return Array.from(this.steps[step].entries())
      .sort((a, b) => a[0] - b[0])
      .map(([pad, velocity]) => ({ pad, velocity }));
  }

  /** Pad indices hit at a step, ordered. */
  padsAt(step: number): number[] {
    return this.hitsAt(step).map(h => h.pad);
  }

  clear(): void {
    for (const step of this.steps) step.clear();
  }

  isEmpty(): boolean {
    return this.steps.every(s => s.size === 0);
  }

  hitCount(): number {
    return this.steps.reduce((n, s) => n + s.size, 0);
  }

  /** Grid view for rendering: grid[pad][step]. */
  toGrid(): boolean[][] {
    return Array.from({ length: PADS_PER_GROUP }, (_, pad) =>
      this.steps.map(s => s.has(pad))
    );
  }
}

export default Pattern;
