/**
 * Sequencer - transport state machine and step playback
 *
 * States are STOPPED|PLAYING x RECORD_OFF|RECORD_ON. Every group runs its own
 * active pattern with its own step pointer; all pointers advance together on a
 * tick. The sequencer is the only writer of pattern contents.
 */

import type { PlaybackDispatcher, TriggerResult } from '../audio/playbackDispatcher.js';
import type { EventBus } from '../events/eventBus.js';
import type { Mixer } from '../mixer/mixer.js';
import { GROUPS, MAX_PATTERNS, clamp, cycleGroup, type Group } from '../model/groups.js';
import type { PatternView } from '../pattern/pattern.js';
import type { PatternStore } from '../pattern/patternStore.js';
import type { SampleHandle } from '../samples/sampleBank.js';
import { DEFAULT_TEMPO, clampTempo } from '../scheduler/stepClock.js';
import { createLogger } from '../util/logger.js';
import type { GroupCursor, TransportMode, TransportSnapshot } from './transport.js';

const log = createLogger('sequencer');

export const TEMPO_STEP = 5;

export interface SequencerOptions<H = SampleHandle> {
  store: PatternStore;
  mixer: Mixer;
  dispatcher: PlaybackDispatcher<H>;
  bus?: EventBus;
  tempo?: number;
}

function freshCursor(): GroupCursor {
  return { patternIndex: 0, stepIndex: 0, lastTickedStep: null };
}

export class Sequencer<H = SampleHandle> {
  private mode: TransportMode = 'stopped';
  private recording = false;
  private group: Group = 'DRUMS';
  private tempo: number;
  private cursors: Record<Group, GroupCursor> = {
    DRUMS: freshCursor(),
    BASS: freshCursor(),
    LEAD: freshCursor(),
    VOCAL: freshCursor(),
  };
  private store: PatternStore;
  private mixer: Mixer;
  private dispatcher: PlaybackDispatcher<H>;
  private bus?: EventBus;

  constructor(opts: SequencerOptions<H>) {
    this.store = opts.store;
    this.mixer = opts.mixer;
    this.dispatcher = opts.dispatcher;
    this.bus = opts.bus;
    this.tempo = clampTempo(opts.tempo ?? DEFAULT_TEMPO);
  }

  get transportMode(): TransportMode {
    return this.mode;
  }

  get isPlaying(): boolean {
    return this.mode === 'playing';
  }

  get isRecording(): boolean {
    return this.recording;
  }

  get currentGroup(): Group {
    return this.group;
  }

  get tempoBpm(): number {
    return this.tempo;
  }

  get stepsPerPattern(): number {
    return this.store.stepsPerPattern;
  }

  cursor(group: Group = this.group): Readonly<GroupCursor> {
    return { ...this.cursors[group] };
  }

  /** The selected group's active pattern. */
  activePattern(): PatternView {
    return this.patternFor(this.group);
  }

  patternFor(group: Group): PatternView {
    return this.store.get(group, this.cursors[group].patternIndex);
  }

  snapshot(): TransportSnapshot {
    const cursor = this.cursors[this.group];
    return {
      mode: this.mode,
      recording: this.recording,
      group: this.group,
      patternIndex: cursor.patternIndex,
      currentStepIndex: cursor.stepIndex,
      tempoBpm: this.tempo,
      stepsPerPattern: this.store.stepsPerPattern,
    };
  }

  private emitTransport(): void {
    this.bus?.emit('transport:changed', this.snapshot());
  }

  // ---------- Transport ----------

  togglePlay(): TransportMode {
    if (this.mode === 'playing') {
      this.mode = 'stopped';
      this.dispatcher.silence();
    } else {
      this.mode = 'playing';
      for (const g of GROUPS) this.cursors[g].lastTickedStep = null;
    }
    log.debug(`transport ${this.mode}`);
    this.emitTransport();
    return this.mode;
  }

  toggleRecord(): boolean {
    this.recording = !this.recording;
    log.debug(`recording ${this.recording ? 'on' : 'off'}`);
    this.emitTransport();
    return this.recording;
  }

  /** Moves the selected group's step pointer back to the first step. */
  rewind(): void {
    const cursor = this.cursors[this.group];
    cursor.stepIndex = 0;
    cursor.lastTickedStep = null;
    this.emitTransport();
  }

  setTempo(bpm: number): number {
    const next = clampTempo(bpm);
    if (next !== bpm) log.debug(`tempo ${bpm} clamped to ${next}`);
    this.tempo = next;
    this.emitTransport();
    return next;
  }

  adjustTempo(delta: number): number {
    return this.setTempo(this.tempo + delta);
  }

  // ---------- Navigation ----------

  selectGroup(group: Group): void {
    this.group = group;
    this.emitTransport();
  }

  nextGroup(): Group {
    this.selectGroup(cycleGroup(this.group, 1));
    return this.group;
  }

  prevGroup(): Group {
    this.selectGroup(cycleGroup(this.group, -1));
    return this.group;
  }

  /** Steps the active pattern index by one, wrapping between 0 and MAX_PATTERNS - 1. */
  navigatePattern(direction: 1 | -1): number {
    const cursor = this.cursors[this.group];
    cursor.patternIndex = (cursor.patternIndex + direction + MAX_PATTERNS) % MAX_PATTERNS;
    this.emitTransport();
    return cursor.patternIndex;
  }

  /** Jumps to a pattern index, clamped to the valid range. */
  selectPattern(index: number): number {
    const cursor = this.cursors[this.group];
    const next = Number.isFinite(index) ? clamp(Math.trunc(index), 0, MAX_PATTERNS - 1) : cursor.patternIndex;
    if (next !== index) log.debug(`pattern index ${index} clamped to ${next}`);
    cursor.patternIndex = next;
    this.emitTransport();
    return next;
  }

  clearPattern(): void {
    const patternIndex = this.cursors[this.group].patternIndex;
    this.store.clear(this.group, patternIndex);
    this.bus?.emit('pattern:changed', { group: this.group, patternIndex });
  }

  // ---------- Playback ----------

  private fire(group: Group, pad: number, velocity: number): TriggerResult<H> {
    const gain = this.mixer.effectiveGain(group) * velocity;
    const result = this.dispatcher.trigger(group, pad, gain);
    this.bus?.emit('pad:triggered', { group, pad, gain, result: result.status });
    return result;
  }

  /**
   * Plays the hits at every group's current step, reports the selected group's
   * step, then advances all step pointers. No-op while stopped.
   */
  onTick(): Array<TriggerResult<H>> {
    if (this.mode !== 'playing') return [];

    const results: Array<TriggerResult<H>> = [];
    for (const group of GROUPS) {
      const cursor = this.cursors[group];
      const pattern = this.store.peek(group, cursor.patternIndex);
      if (!pattern) continue;
      for (const hit of pattern.hitsAt(cursor.stepIndex)) {
        results.push(this.fire(group, hit.pad, hit.velocity));
      }
    }

    const active = this.cursors[this.group];
    this.bus?.emit('step:advanced', {
      currentStepIndex: active.stepIndex,
      group: this.group,
      patternIndex: active.patternIndex,
      transportMode: this.mode,
      recording: this.recording,
    });

    const length = this.store.stepsPerPattern;
    for (const group of GROUPS) {
      const cursor = this.cursors[group];
      cursor.lastTickedStep = cursor.stepIndex;
      cursor.stepIndex = (cursor.stepIndex + 1) % length;
    }
    return results;
  }

  /**
   * Live pad press: always sounds. While recording and playing the hit is also
   * written at the step most recently played for that group.
   *
   * Before the first tick after play the hit goes to the current pointer,
   * which is the step the next tick plays, so that press sounds twice.
   */
  onPadPressed(pad: number, group: Group = this.group, velocity = 1): TriggerResult<H> {
    const result = this.fire(group, pad, velocity);

    if (this.recording && this.mode === 'playing') {
      const cursor = this.cursors[group];
      const step = cursor.lastTickedStep ?? cursor.stepIndex;
      this.store.get(group, cursor.patternIndex).setHit(step, pad, velocity);
      log.debug(`recorded ${group}:${pad} at step ${step}`);
      this.bus?.emit('pattern:changed', { group, patternIndex: cursor.patternIndex });
    }
    return result;
  }

  onPadReleased(pad: number, group: Group = this.group): void {
    this.bus?.emit('pad:released', { group, pad });
  }
}

export default Sequencer;
