/**
 * Playback boundary: resolves a (group, pad) to a sample and hands it to the
 * audio sink at the requested gain. Fire-and-forget.
 */

import type { Group } from '../model/groups.js';
import type { SampleHandle, SampleResolver } from '../samples/sampleBank.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('dispatcher');

export interface AudioSink<H = SampleHandle> {
  /** Starts playback and returns without waiting for it to finish. */
  play(handle: H, gain: number): void;
  /** Cuts every sound still sounding. */
  stopAll?(): void;
}

export type TriggerResult<H = SampleHandle> =
  | { status: 'played'; group: Group; pad: number; gain: number; handle: H }
  | { status: 'empty'; group: Group; pad: number; gain: number };

export class PlaybackDispatcher<H = SampleHandle> {
  constructor(private resolver: SampleResolver<H>, private sink: AudioSink<H>) {}

  trigger(group: Group, pad: number, gain: number): TriggerResult<H> {
    const handle = this.resolver.resolve(group, pad);
    if (handle === undefined) {
      log.debug(`empty pad ${group}:${pad}`);
      return { status: 'empty', group, pad, gain };
    }
    try {
      this.sink.play(handle, gain);
    } catch (e) {
      log.error(`Sink failed for ${group}:${pad}`, e);
    }
    return { status: 'played', group, pad, gain, handle };
  }

  silence(): void {
    if (typeof this.sink.stopAll !== 'function') return;
    try {
      this.sink.stopAll();
    } catch (e) {
      log.error('Sink failed to stop', e);
    }
  }
}

export default PlaybackDispatcher;
