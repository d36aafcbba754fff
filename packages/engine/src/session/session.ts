/**
 * Session - the one context object that owns transport, patterns, mixer and
 * clock for a run of the sequencer.
 *
 * Commands from the keyboard and ticks from the clock enter the same FIFO queue
 * and are applied one at a time. A command dispatched while the queue is being
 * drained (for example from an event listener) is appended and applied after
 * the current one, never re-entrantly.
 */

import { PlaybackDispatcher, type AudioSink } from '../audio/playbackDispatcher.js';
import { EventBus } from '../events/eventBus.js';
import { Mixer, VOLUME_STEP, type MixerSnapshot } from '../mixer/mixer.js';
import { PADS_PER_GROUP, groupIndex, isPadIndex } from '../model/groups.js';
import { PatternStore, type PatternBankView } from '../pattern/patternStore.js';
import type { SampleHandle, SampleResolver } from '../samples/sampleBank.js';
import { StepClock, type StepClockOptions } from '../scheduler/stepClock.js';
import { Sequencer, TEMPO_STEP } from '../sequencer/sequencer.js';
import type { TransportSnapshot } from '../sequencer/transport.js';
import { InputOutOfRangeError } from '../util/errors.js';
import { createLogger } from '../util/logger.js';
import type { Command } from './commands.js';
import { inputToCommand, validateInput, type InputEvent, type InputValidation } from './inputEvents.js';

const log = createLogger('session');

export interface SessionOptions<H = SampleHandle> {
  resolver: SampleResolver<H>;
  sink: AudioSink<H>;
  /** Existing pattern bank, e.g. one loaded from disk. */
  store?: PatternStore;
  stepsPerPattern?: number;
  tempo?: number;
  masterGain?: number;
  groupGain?: number;
  /** Steps per beat and timer injection for the clock. */
  clock?: Omit<StepClockOptions, 'bpm'>;
  bus?: EventBus;
}

export interface SessionSnapshot {
  transport: TransportSnapshot;
  mixer: MixerSnapshot;
}

export class Session<H = SampleHandle> {
  readonly bus: EventBus;
  /** Read-only; pattern contents change only through commands. */
  readonly store: PatternBankView;
  readonly mixer: Mixer;
  readonly clock: StepClock;
  readonly dispatcher: PlaybackDispatcher<H>;
  readonly sequencer: Sequencer<H>;
  private queue: Command[] = [];
  private draining = false;
  private disposed = false;

  constructor(opts: SessionOptions<H>) {
    this.bus = opts.bus ?? new EventBus();
    const store = opts.store ?? new PatternStore(opts.stepsPerPattern);
    this.store = store;
    if (opts.store && opts.stepsPerPattern !== undefined && opts.stepsPerPattern !== opts.store.stepsPerPattern) {
      log.warn(`stepsPerPattern ${opts.stepsPerPattern} ignored, pattern bank uses ${opts.store.stepsPerPattern}`);
    }
    this.mixer = new Mixer({ masterGain: opts.masterGain, groupGain: opts.groupGain });
    this.dispatcher = new PlaybackDispatcher<H>(opts.resolver, opts.sink);
    this.sequencer = new Sequencer<H>({
      store,
      mixer: this.mixer,
      dispatcher: this.dispatcher,
      bus: this.bus,
      tempo: opts.tempo,
    });
    this.clock = new StepClock({ ...opts.clock, bpm: this.sequencer.tempoBpm });
    this.clock.onTick(() => this.dispatch({ type: 'Tick' }));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  snapshot(): SessionSnapshot {
    return { transport: this.sequencer.snapshot(), mixer: this.mixer.snapshot() };
  }

  /** Queues a command and drains the queue unless a drain is already running. */
  dispatch(command: Command): void {
    if (this.disposed) {
      log.debug(`command ${command.type} after dispose ignored`);
      return;
    }
    this.queue.push(command);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        try {
          this.apply(next);
        } catch (e) {
          log.error(`Command ${next.type} failed`, e);
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  /**
   * Entry point for raw pad events. Out-of-range indices are rejected here and
   * never reach sequencer state.
   */
  handleInput(event: InputEvent): InputValidation {
    const checked = validateInput(event);
    if (!checked.ok) {
      log.debug(checked.error.message);
      this.bus.emit('input:rejected', { message: checked.error.message, group: event.group, pad: event.pad });
      return checked;
    }
    this.dispatch(inputToCommand(event, checked.group, checked.pad));
    return checked;
  }

  dispose(): void {
    if (this.disposed) return;
    this.clock.stop();
    this.dispatcher.silence();
    this.queue = [];
    this.disposed = true;
    this.bus.clear();
  }

  private emitMixer(): void {
    this.bus.emit('mixer:changed', this.mixer.snapshot());
  }

  private syncTempo(): void {
    this.clock.setTempo(this.sequencer.tempoBpm);
  }

  private acceptPad(pad: number): boolean {
    if (isPadIndex(pad)) return true;
    const error = new InputOutOfRangeError('pad', pad, PADS_PER_GROUP - 1);
    log.debug(error.message);
    this.bus.emit('input:rejected', { message: error.message, group: groupIndex(this.sequencer.currentGroup), pad });
    return false;
  }

  private apply(command: Command): void {
    const seq = this.sequencer;
    switch (command.type) {
      case 'Tick':
        seq.onTick();
        return;
      case 'PlayStop':
        if (seq.togglePlay() === 'playing') this.clock.start();
        else this.clock.stop();
        return;
      case 'ToggleRecord':
        seq.toggleRecord();
        return;
      case 'ClearPattern':
        seq.clearPattern();
        return;
      case 'Rewind':
        seq.rewind();
        return;
      case 'NextGroup':
        seq.nextGroup();
        return;
      case 'PrevGroup':
        seq.prevGroup();
        return;
      case 'SelectGroup':
        seq.selectGroup(command.group);
        return;
      case 'PatternPrev':
        seq.navigatePattern(-1);
        return;
      case 'PatternNext':
        seq.navigatePattern(1);
        return;
      case 'SelectPattern':
        seq.selectPattern(command.index);
        return;
      case 'TempoUp':
        seq.adjustTempo(TEMPO_STEP);
        this.syncTempo();
        return;
      case 'TempoDown':
        seq.adjustTempo(-TEMPO_STEP);
        this.syncTempo();
        return;
      case 'SetTempo':
        seq.setTempo(command.bpm);
        this.syncTempo();
        return;
      case 'MasterVolUp':
        this.mixer.adjustMasterVolume(VOLUME_STEP);
        this.emitMixer();
        return;
      case 'MasterVolDown':
        this.mixer.adjustMasterVolume(-VOLUME_STEP);
        this.emitMixer();
        return;
      case 'MasterMuteToggle':
        this.mixer.toggleMasterMute();
        this.emitMixer();
        return;
      case 'GroupVolUp':
        this.mixer.adjustGroupVolume(command.group, VOLUME_STEP);
        this.emitMixer();
        return;
      case 'GroupVolDown':
        this.mixer.adjustGroupVolume(command.group, -VOLUME_STEP);
        this.emitMixer();
        return;
      case 'GroupMuteToggle':
        this.mixer.toggleGroupMute(command.group);
        this.emitMixer();
        return;
      case 'PadPress':
        if (!this.acceptPad(command.pad)) return;
        seq.onPadPressed(command.pad, command.group ?? seq.currentGroup);
        return;
      case 'PadRelease':
        if (!this.acceptPad(command.pad)) return;
        seq.onPadReleased(command.pad, command.group ?? seq.currentGroup);
        return;
      default: {
        const unhandled: never = command;
        log.warn('Unhandled command', unhandled);
      }
    }
  }
}

export default Session;
