import { clamp } from '../model/groups.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('clock');

export const TEMPO_MIN = 60;
export const TEMPO_MAX = 300;
export const DEFAULT_TEMPO = 120;
export const DEFAULT_STEPS_PER_BEAT = 4;

export type TimerHandle = ReturnType<typeof setTimeout> | number;

export interface StepClockOptions {
  bpm?: number;
  stepsPerBeat?: number;
  /** Monotonic time source in milliseconds. */
  now?: () => number;
  setTimeout?: (handler: () => void, timeout: number) => TimerHandle;
  clearTimeout?: (id: TimerHandle) => void;
}

export interface ClockTick {
  /** Ticks emitted since the clock was last started. */
  count: number;
  /** Deadline this tick was scheduled for. */
  scheduledAt: number;
  intervalMs: number;
}

export type ClockTickHandler = (tick: ClockTick) => void;

export function clampTempo(bpm: number): number {
  if (Number.isNaN(bpm)) return DEFAULT_TEMPO;
  return clamp(bpm, TEMPO_MIN, TEMPO_MAX);
}

/** Duration of one step in milliseconds. */
export function stepIntervalMs(bpm: number, stepsPerBeat: number): number {
  return 60_000 / bpm / stepsPerBeat;
}

/**
 * Emits one tick per step while running.
 *
 * Deadlines are chained from the previous deadline, not from when the callback
 * ran, so handler latency does not accumulate. A tempo change only affects the
 * next interval computed. If the loop falls behind by a whole interval or more
 * the missed ticks are dropped rather than fired in a burst.
 */
export class StepClock {
  private bpmValue: number;
  readonly stepsPerBeat: number;
  private handler: ClockTickHandler | null = null;
  private timer: TimerHandle | null = null;
  private running = false;
  private deadline = 0;
  private count = 0;
  private droppedTotal = 0;
  private opts: StepClockOptions;

  constructor(opts: StepClockOptions = {}) {
    this.opts = opts;
    this.bpmValue = clampTempo(opts.bpm ?? DEFAULT_TEMPO);
    const spb = opts.stepsPerBeat ?? DEFAULT_STEPS_PER_BEAT;
    if (!Number.isInteger(spb) || spb < 1) {
      throw new RangeError(`stepsPerBeat must be a positive integer, got ${spb}`);
    }
    this.stepsPerBeat = spb;
  }

  get bpm(): number {
    return this.bpmValue;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Ticks dropped because the loop lagged, since construction. */
  get dropped(): number {
    return this.droppedTotal;
  }

  get intervalMs(): number {
    return stepIntervalMs(this.bpmValue, this.stepsPerBeat);
  }

  /** Sets the tempo, clamped to [TEMPO_MIN, TEMPO_MAX]. Returns the stored value. */
  setTempo(bpm: number): number {
    const next = clampTempo(bpm);
    if (next !== bpm) log.debug(`tempo ${bpm} clamped to ${next}`);
    this.bpmValue = next;
    return next;
  }

  onTick(handler: ClockTickHandler | null): void {
    this.handler = handler;
  }

  /** Starts emitting. The first tick is due immediately. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.count = 0;
    this.deadline = this.now();
    this.arm();
  }

  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      if (this.opts.clearTimeout) this.opts.clearTimeout(this.timer);
      else clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private now(): number {
    return this.opts.now ? this.opts.now() : performance.now();
  }

  private arm(): void {
    const delay = Math.max(0, this.deadline - this.now());
    const fire = () => this.fire();
    this.timer = this.opts.setTimeout ? this.opts.setTimeout(fire, delay) : setTimeout(fire, delay);
  }

  private fire(): void {
    this.timer = null;
    if (!this.running) return;

    const tick: ClockTick = { count: ++this.count, scheduledAt: this.deadline, intervalMs: this.intervalMs };
    if (this.handler) {
      try {
        this.handler(tick);
      } catch (e) {
        log.error('Tick handler error', e);
      }
    }
    if (!this.running) return;

    const interval = this.intervalMs;
    this.deadline += interval;
    const lag = this.now() - this.deadline;
    if (lag >= interval) {
      // Skip whole missed intervals; the latest one still fires, late.
      const missed = Math.floor(lag / interval);
      this.droppedTotal += missed;
      this.deadline += missed * interval;
      log.warn(`clock lagged, dropped ${missed} tick(s)`);
    }
    this.arm();
  }
}

export default StepClock;
