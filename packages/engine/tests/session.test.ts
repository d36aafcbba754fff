import { Session } from '../src/session/session';
import type { MixerSnapshot } from '../src/mixer/mixer';
import { ManualTimer, RecordingSink, resolverWithEmpty } from './helpers/fakes';

function setup(empty: Parameters<typeof resolverWithEmpty>[0] = []) {
  const timer = new ManualTimer();
  const sink = new RecordingSink();
  const session = new Session({
    resolver: resolverWithEmpty(empty),
    sink,
    clock: { stepsPerBeat: 4, now: timer.now, setTimeout: timer.setTimeout, clearTimeout: timer.clearTimeout },
  });
  return { timer, sink, session };
}

describe('Session', () => {
  test('PlayStop drives the clock and ticks advance the pointer', () => {
    const { timer, session } = setup();
    session.dispatch({ type: 'PlayStop' });
    expect(session.clock.isRunning).toBe(true);

    timer.advance(375);
    expect(session.sequencer.cursor().stepIndex).toBe(4);

    session.dispatch({ type: 'PlayStop' });
    expect(session.clock.isRunning).toBe(false);
    timer.advance(1000);
    expect(session.sequencer.cursor().stepIndex).toBe(4);
  });

  test('tempo commands retune the clock', () => {
    const { session } = setup();
    session.dispatch({ type: 'TempoUp' });
    expect(session.sequencer.tempoBpm).toBe(125);
    expect(session.clock.bpm).toBe(125);
    session.dispatch({ type: 'SetTempo', bpm: 400 });
    expect(session.clock.bpm).toBe(300);
    session.dispatch({ type: 'TempoDown' });
    expect(session.clock.bpm).toBe(295);
  });

  test('mixer commands emit the new mixer state', () => {
    const { session } = setup();
    const snapshots: MixerSnapshot[] = [];
    session.bus.on('mixer:changed', s => snapshots.push(s));
    session.dispatch({ type: 'MasterVolUp' });
    session.dispatch({ type: 'GroupVolDown', group: 'BASS' });
    session.dispatch({ type: 'GroupMuteToggle', group: 'LEAD' });
    expect(snapshots.map(s => s.master.gain)).toEqual([0.75, 0.75, 0.75]);
    expect(snapshots[1].groups.BASS.gain).toBe(0.75);
    expect(snapshots[2].groups.LEAD.muted).toBe(true);
  });

  test('commands from listeners run after the current one', () => {
    const { session, sink } = setup();
    let toggled = false;
    session.bus.on('pad:triggered', () => {
      if (toggled) return;
      toggled = true;
      session.dispatch({ type: 'MasterMuteToggle' });
    });
    session.dispatch({ type: 'PadPress', pad: 0 });
    session.dispatch({ type: 'PadPress', pad: 0 });
    expect(sink.plays.map(p => p.gain)).toEqual([0.7 * 0.8, 0]);
  });

  test('out-of-range input is rejected without touching state', () => {
    const { session, sink } = setup();
    const rejected = jest.fn();
    session.bus.on('input:rejected', rejected);
    const before = session.snapshot();

    const badPad = session.handleInput({ type: 'PRESS', group: 0, pad: 16, timestamp: 0 });
    const badGroup = session.handleInput({ type: 'PRESS', group: 4, pad: 0, timestamp: 0 });
    session.dispatch({ type: 'PadPress', pad: -1 });

    expect(badPad.ok).toBe(false);
    expect(badGroup.ok).toBe(false);
    expect(rejected.mock.calls.map(c => c[0])).toEqual([
      { message: 'pad index 16 is outside 0..15', group: 0, pad: 16 },
      { message: 'group index 4 is outside 0..3', group: 4, pad: 0 },
      { message: 'pad index -1 is outside 0..15', group: 0, pad: -1 },
    ]);
    expect(sink.plays).toHaveLength(0);
    expect(session.snapshot()).toEqual(before);
  });

  test('a press on an empty pad makes no sound', () => {
    const { session, sink } = setup([['BASS', 7]]);
    const result = session.handleInput({ type: 'PRESS', group: 1, pad: 7, timestamp: 0 });
    expect(result).toEqual({ ok: true, group: 'BASS', pad: 7 });
    expect(sink.plays).toHaveLength(0);
  });

  test('live recording lands on the last played step and plays back', () => {
    const { timer, session, sink } = setup();
    session.dispatch({ type: 'ToggleRecord' });
    session.dispatch({ type: 'PlayStop' });
    timer.advance(130);
    session.handleInput({ type: 'PRESS', group: 0, pad: 4, timestamp: timer.now() });
    expect(session.store.peek('DRUMS', 0)?.padsAt(1)).toEqual([4]);

    timer.advance(1995);
    expect(sink.plays.map(p => p.handle.name)).toEqual(['DRUMS-4', 'DRUMS-4']);
  });

  test('the pattern bank is exposed read-only', () => {
    const { session } = setup();
    type Writers = Extract<keyof typeof session.store, 'get' | 'clear'>;
    const readOnly: [Writers] extends [never] ? true : false = true;
    expect(readOnly).toBe(true);
    expect(session.store.patternCount()).toBe(0);
  });

  test('dispose stops the clock and ignores later commands', () => {
    const { timer, session, sink } = setup();
    session.dispatch({ type: 'PlayStop' });
    session.dispose();
    expect(session.isDisposed).toBe(true);
    expect(session.clock.isRunning).toBe(false);
    expect(sink.stops).toBe(1);

    session.dispatch({ type: 'PadPress', pad: 0 });
    timer.advance(500);
    expect(sink.plays).toHaveLength(0);
  });
});
