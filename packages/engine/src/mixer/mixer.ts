/**
 * Mixer - master and per-group gain/mute state
 *
 * The effective gain of a trigger is masterGain * groupGain, or 0 when either
 * the master or the group is muted.
 */

import { clamp, type Group } from '../model/groups.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('mixer');

export const VOLUME_STEP = 0.05;
export const DEFAULT_MASTER_GAIN = 0.7;
export const DEFAULT_GROUP_GAIN = 0.8;

export interface ChannelSnapshot {
  gain: number;
  muted: boolean;
}

export interface MixerSnapshot {
  master: ChannelSnapshot;
  groups: Record<Group, ChannelSnapshot>;
}

export interface MixerOptions {
  masterGain?: number;
  groupGain?: number;
}

// Gains are kept at 1/100 resolution so repeated +/- steps land on exact values.
function normalizeGain(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(clamp(value, 0, 1) * 100) / 100;
}

export class Mixer {
  private master: ChannelSnapshot;
  private groups: Record<Group, ChannelSnapshot>;

  constructor(opts: MixerOptions = {}) {
    const groupGain = normalizeGain(opts.groupGain ?? DEFAULT_GROUP_GAIN);
    this.master = { gain: normalizeGain(opts.masterGain ?? DEFAULT_MASTER_GAIN), muted: false };
    this.groups = {
      DRUMS: { gain: groupGain, muted: false },
      BASS: { gain: groupGain, muted: false },
      LEAD: { gain: groupGain, muted: false },
      VOCAL: { gain: groupGain, muted: false },
    };
  }

  get masterGain(): number {
    return this.master.gain;
  }

  get masterMuted(): boolean {
    return this.master.muted;
  }

  groupGain(group: Group): number {
    return this.groups[group].gain;
  }

  isGroupMuted(group: Group): boolean {
    return this.groups[group].muted;
  }

  setMasterVolume(gain: number): void {
    this.master.gain = normalizeGain(gain);
  }

  adjustMasterVolume(delta: number): number {
    this.setMasterVolume(this.master.gain + delta);
    log.debug(`master volume ${this.master.gain}`);
    return this.master.gain;
  }

  toggleMasterMute(): boolean {
    this.master.muted = !this.master.muted;
    return this.master.muted;
  }

  setGroupVolume(group: Group, gain: number): void {
    this.groups[group].gain = normalizeGain(gain);
  }

  adjustGroupVolume(group: Group, delta: number): number {
    this.setGroupVolume(group, this.groups[group].gain + delta);
    log.debug(`${group} volume ${this.groups[group].gain}`);
    return this.groups[group].gain;
  }

  toggleGroupMute(group: Group): boolean {
    const channel = this.groups[group];
    channel.muted = !channel.muted;
    return channel.muted;
  }

  /** Gain applied to a trigger in this group. Pure read of current state. */
  effectiveGain(group: Group): number {
    const channel = this.groups[group];
    if (this.master.muted || channel.muted) return 0;
    return this.master.gain * channel.gain;
  }

  snapshot(): MixerSnapshot {
    const copy = (g: Group): ChannelSnapshot => ({ ...this.groups[g] });
    return {
      master: { ...this.master },
      groups: { DRUMS: copy('DRUMS'), BASS: copy('BASS'), LEAD: copy('LEAD'), VOCAL: copy('VOCAL') },
    };
  }
}

export default Mixer;
