export {
  StepClock,
  clampTempo,
  stepIntervalMs,
  TEMPO_MIN,
  TEMPO_MAX,
  DEFAULT_TEMPO,
  DEFAULT_STEPS_PER_BEAT,
} from './stepClock.js';

export type { StepClockOptions, ClockTick, ClockTickHandler, TimerHandle } from './stepClock.js';
