/**
 * Node.js audio sink - plays sample files through the system audio player.
 * Works on Windows/Mac/Linux without requiring native compilation.
 *
 * Every trigger spawns one short-lived player process, so pads overlap freely.
 * macOS (afplay) and PulseAudio (paplay) honour the gain; aplay and the
 * PowerShell SoundPlayer play at full volume.
 */

import { spawn } from 'child_process';
import type { AudioSink, SampleHandle } from '@stepdeck/engine';
import { createLogger, errorMessage } from '@stepdeck/engine/util';

const log = createLogger('cli:audio');

/** The parts of a ChildProcess the sink uses. */
export interface PlayerProcess {
  on(event: 'close' | 'error', listener: (arg?: unknown) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type Spawner = (command: string, args: string[]) => PlayerProcess;

export interface PlayerCommand {
  command: string;
  args: string[];
  /** Whether the player applies the requested gain. */
  honoursGain: boolean;
}

export interface SystemAudioSinkOptions {
  platform?: NodeJS.Platform;
  /** Command line replacing the platform player; the file path is appended. */
  player?: string;
  spawn?: Spawner;
  /** Oldest sounds are cut once this many players are running. */
  maxVoices?: number;
}

const defaultSpawner: Spawner = (command, args) => {
  const child = spawn(command, args, { stdio: 'ignore' });
  return {
    on: (event, listener) => child.on(event, listener),
    kill: (signal) => child.kill(signal),
  };
};

/** Player invocation for one sample at one gain. */
export function playerCommand(platform: NodeJS.Platform, path: string, gain: number, override?: string): PlayerCommand {
  if (override) {
    const [command, ...args] = override.trim().split(/\s+/);
    return { command, args: [...args, path], honoursGain: false };
  }
  if (platform === 'darwin') {
    return { command: 'afplay', args: ['-v', gain.toFixed(2), path], honoursGain: true };
  }
  if (platform === 'win32') {
    return {
      command: 'powershell',
      args: ['-NoProfile', '-Command', '& { param([string]$p) (New-Object Media.SoundPlayer $p).PlaySync() }', path],
      honoursGain: false,
    };
  }
  // paplay volume is linear, 65536 = 100%
  return { command: 'paplay', args: [`--volume=${Math.round(gain * 65536)}`, path], honoursGain: true };
}

export class SystemAudioSink implements AudioSink<SampleHandle> {
  private platform: NodeJS.Platform;
  private player?: string;
  private spawner: Spawner;
  private maxVoices: number;
  private active = new Set<PlayerProcess>();
  private useAplay = false;
  private warnedGain = false;

  constructor(opts: SystemAudioSinkOptions = {}) {
    this.platform = opts.platform ?? process.platform;
    this.player = opts.player;
    this.spawner = opts.spawn ?? defaultSpawner;
    this.maxVoices = opts.maxVoices ?? 32;
  }

  get activeCount(): number {
    return this.active.size;
  }

  play(handle: SampleHandle, gain: number): void {
    if (gain <= 0) return;
    const cmd = this.useAplay
      ? { command: 'aplay', args: ['-q', handle.path], honoursGain: false }
      : playerCommand(this.platform, handle.path, gain, this.player);

    if (!cmd.honoursGain && gain < 1 && !this.warnedGain) {
      this.warnedGain = true;
      log.warn(`${cmd.command} ignores volume; samples play at full level`);
    }
    this.launch(cmd, handle, gain);
  }

  stopAll(): void {
    for (const proc of this.active) proc.kill();
    this.active.clear();
  }

  private launch(cmd: PlayerCommand, handle: SampleHandle, gain: number): void {
    if (this.active.size >= this.maxVoices) {
      const oldest = this.active.values().next();
      if (!oldest.done) {
        oldest.value.kill();
        this.active.delete(oldest.value);
      }
    }

    const proc = this.spawner(cmd.command, cmd.args);
    this.active.add(proc);
    proc.on('close', () => {
      this.active.delete(proc);
    });
    proc.on('error', (err) => {
      this.active.delete(proc);
      // No PulseAudio: fall back to ALSA for the rest of the session.
      if (cmd.command === 'paplay' && !this.useAplay) {
        log.warn('paplay unavailable, falling back to aplay');
        this.useAplay = true;
        this.play(handle, gain);
        return;
      }
      log.error(`Failed to play ${handle.path}: ${errorMessage(err)}`);
    });
  }
}

export default SystemAudioSink;
