/**
 * Interactive session: raw-mode keypresses in, terminal frames out.
 */

import { emitKeypressEvents } from 'readline';
import {
  PADS_PER_GROUP,
  Session,
  exportPatternsJSON,
  groupIndex,
  type AudioSink,
  type PatternStore,
  type SampleBank,
  type SampleHandle,
} from '@stepdeck/engine';
import { createLogger } from '@stepdeck/engine/util';
import type { StepDeckConfig } from './config.js';
import { KeyMap, controlsLegend, keyIdFromKeypress, type KeypressLike } from './keymap.js';
import { TerminalView, type FrameInput } from './terminalView.js';

const log = createLogger('cli:live');

type Schedule = (fn: () => void, ms: number) => void;

export interface LiveControllerOptions {
  config: StepDeckConfig;
  bank: SampleBank<SampleHandle>;
  sink: AudioSink<SampleHandle>;
  store: PatternStore;
  /** Timer for pad release and flash expiry. */
  schedule?: Schedule;
  now?: () => number;
}

/**
 * Wires a Session to key ids and tracks what the view needs between frames.
 * Terminals report no key release, so a release is sent once the flash ends.
 */
export class LiveController {
  readonly session: Session<SampleHandle>;
  readonly keymap: KeyMap;
  private legend: string;
  private bank: SampleBank<SampleHandle>;
  private flashMs: number;
  private schedule: Schedule;
  private now: () => number;
  private flashing = new Set<number>();
  private message?: string;

  constructor(opts: LiveControllerOptions) {
    const { audio } = opts.config;
    this.bank = opts.bank;
    this.flashMs = opts.config.ui.flashDurationMs;
    this.schedule = opts.schedule ?? ((fn, ms) => void setTimeout(fn, ms));
    this.now = opts.now ?? (() => Date.now());
    this.keymap = KeyMap.fromBindings(opts.config.keyBindings);
    this.legend = controlsLegend(opts.config.keyBindings);
    this.session = new Session<SampleHandle>({
      resolver: opts.bank,
      sink: opts.sink,
      store: opts.store,
      tempo: audio.defaultTempo,
      masterGain: audio.masterVolume,
      groupGain: audio.groupVolume,
      clock: { stepsPerBeat: audio.stepsPerBeat },
    });

    const bus = this.session.bus;
    bus.on('pad:triggered', e => {
      if (e.group === this.session.sequencer.currentGroup) {
        this.flashing.add(e.pad);
        this.schedule(() => this.flashing.delete(e.pad), this.flashMs);
      }
      if (e.result === 'empty') this.message = `${e.group} pad ${e.pad + 1} is empty`;
    });
    bus.on('pad:released', e => {
      if (e.group === this.session.sequencer.currentGroup) this.flashing.delete(e.pad);
    });
    bus.on('transport:changed', () => this.flashing.clear());
    bus.on('input:rejected', e => {
      this.message = e.message;
    });
  }

  /** Applies one key. Returns 'quit' when the session should end. */
  handleKey(keyId: string): 'quit' | undefined {
    const action = this.keymap.lookup(keyId);
    if (!action) return undefined;
    this.message = undefined;

    switch (action.kind) {
      case 'quit':
        return 'quit';
      case 'command':
        this.session.dispatch(action.command);
        return undefined;
      case 'pad': {
        const group = groupIndex(this.session.sequencer.currentGroup);
        const press = this.session.handleInput({ type: 'PRESS', group, pad: action.pad, timestamp: this.now() });
        if (press.ok) {
          this.schedule(() => {
            this.session.handleInput({ type: 'RELEASE', group, pad: action.pad, timestamp: this.now() });
          }, this.flashMs);
        }
        return undefined;
      }
    }
  }

  frame(): FrameInput {
    const seq = this.session.sequencer;
    const group = seq.currentGroup;
    const padNames: string[] = [];
    const padKeys: string[] = [];
    for (let pad = 0; pad < PADS_PER_GROUP; pad++) {
      padNames.push(this.bank.nameOf(group, pad));
      padKeys.push(this.keymap.keyForPad(pad));
    }
    return {
      transport: seq.snapshot(),
      mixer: this.session.mixer.snapshot(),
      pattern: seq.activePattern(),
      padNames,
      padKeys,
      flashing: new Set(this.flashing),
      legend: this.legend,
      message: this.message,
    };
  }
}

export interface RunLiveOptions extends LiveControllerOptions {
  /** Pattern bank written here when the session ends. */
  patternsPath?: string;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
}

/** Runs until the quit key. Resolves with the path patterns were saved to, if any. */
export function runLiveSession(opts: RunLiveOptions): Promise<string | undefined> {
  const input = opts.input ?? process.stdin;
  const view = new TerminalView(opts.output ?? process.stdout);
  const controller = new LiveController(opts);
  const { session } = controller;

  let redrawPending = false;
  const redraw = () => {
    if (redrawPending) return;
    redrawPending = true;
    setImmediate(() => {
      redrawPending = false;
      if (!session.isDisposed) view.draw(controller.frame());
    });
  };
  session.bus.on('step:advanced', redraw);
  session.bus.on('pad:triggered', redraw);
  session.bus.on('pad:released', redraw);
  session.bus.on('mixer:changed', redraw);
  session.bus.on('transport:changed', redraw);
  session.bus.on('pattern:changed', redraw);
  session.bus.on('input:rejected', redraw);

  return new Promise((resolve, reject) => {
    const finish = () => {
      input.off('keypress', onKey);
      if (input.isTTY) input.setRawMode(false);
      input.pause();
      session.dispose();
      view.showCursor();
      if (!opts.patternsPath) {
        resolve(undefined);
        return;
      }
      try {
        resolve(exportPatternsJSON(session.store, opts.patternsPath));
      } catch (err) {
        reject(err);
      }
    };

    const onKey = (str: string | undefined, key: KeypressLike | undefined) => {
      const id = keyIdFromKeypress(str, key);
      if (id === null) return;
      log.debug(`key ${JSON.stringify(id)}`);
      if (controller.handleKey(id) === 'quit') finish();
      else redraw();
    };

    emitKeypressEvents(input);
    if (input.isTTY) input.setRawMode(true);
    input.on('keypress', onKey);
    input.resume();
    view.hideCursor();
    view.draw(controller.frame());
  });
}
