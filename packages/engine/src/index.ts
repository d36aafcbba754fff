export {
  GROUPS,
  GROUP_COUNT,
  PADS_PER_GROUP,
  MAX_PATTERNS,
  DEFAULT_STEPS_PER_PATTERN,
  MAX_STEPS_PER_PATTERN,
  isGroup,
  groupIndex,
  groupAt,
  isPadIndex,
  isPatternIndex,
  isStepsPerPattern,
  cycleGroup,
  clamp,
  type Group,
} from './model/groups.js';

export { Pattern, type PatternView, type StepHit } from './pattern/pattern.js';
export { PatternStore, type PatternBankView } from './pattern/patternStore.js';

export {
  Mixer,
  VOLUME_STEP,
  DEFAULT_MASTER_GAIN,
  DEFAULT_GROUP_GAIN,
  type MixerSnapshot,
  type ChannelSnapshot,
  type MixerOptions,
} from './mixer/mixer.js';

export * from './scheduler/index.js';

export { SampleBank, defaultPadName, type SampleHandle, type SampleResolver } from './samples/sampleBank.js';
export { PlaybackDispatcher, type AudioSink, type TriggerResult } from './audio/playbackDispatcher.js';

export { Sequencer, TEMPO_STEP, type SequencerOptions } from './sequencer/sequencer.js';
export type { TransportMode, TransportSnapshot, GroupCursor, StepAdvancedEvent } from './sequencer/transport.js';

export { EventBus, type StepDeckEvents } from './events/eventBus.js';

export { Session, type SessionOptions, type SessionSnapshot } from './session/session.js';
export type { Command, CommandType } from './session/commands.js';
export { validateInput, inputToCommand, type InputEvent, type InputValidation } from './session/inputEvents.js';

export * from './export/index.js';
export * from './import/index.js';
