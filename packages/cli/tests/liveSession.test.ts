import { PatternStore, SampleBank, type SampleHandle } from '@stepdeck/engine';
import { loadDefaultConfig } from '../src/config';
import { LiveController } from '../src/liveSession';
import { renderFrame } from '../src/terminalView';
import { fakeSpawner } from './helpers/fakeProcess';
import { SystemAudioSink } from '../src/nodeAudioPlayer';

function setup() {
  const bank = new SampleBank<SampleHandle>();
  bank.assign('DRUMS', 0, { name: 'kick', path: '/kits/kick.wav' }, 'kick');
  const { spawn, procs } = fakeSpawner();
  const scheduled: Array<{ fn: () => void; ms: number }> = [];
  const store = new PatternStore(16);
  const controller = new LiveController({
    config: loadDefaultConfig(),
    bank,
    sink: new SystemAudioSink({ platform: 'darwin', spawn }),
    store,
    schedule: (fn, ms) => scheduled.push({ fn, ms }),
    now: () => 1000,
  });
  return { controller, procs, scheduled, store };
}

describe('LiveController', () => {
  test('pad keys sound the pad in the selected group at the configured gain', () => {
    const { controller, procs } = setup();
    controller.handleKey('7');
    expect(procs.map(p => p.args)).toEqual([['-v', '0.56', '/kits/kick.wav']]);
  });

  test('a pad press is released after the flash duration', () => {
    const { controller, scheduled } = setup();
    const released = jest.fn();
    controller.session.bus.on('pad:released', released);

    controller.handleKey('8');
    expect(controller.frame().flashing.has(1)).toBe(true);
    expect(scheduled.map(s => s.ms)).toEqual([150, 150]);

    for (const s of scheduled) s.fn();
    expect(released).toHaveBeenCalledWith({ group: 'DRUMS', pad: 1 });
    expect(controller.frame().flashing.size).toBe(0);
  });

  test('an empty pad shows a message', () => {
    const { controller } = setup();
    controller.handleKey('/');
    expect(controller.frame().message).toBe('DRUMS pad 16 is empty');
  });

  test('command keys reach the session', () => {
    const { controller } = setup();
    controller.handleKey('Tab');
    controller.handleKey('Right');
    controller.handleKey('Up');
    controller.handleKey('F2');
    const { transport, mixer } = controller.frame();
    expect(transport.group).toBe('BASS');
    expect(transport.patternIndex).toBe(1);
    expect(transport.tempoBpm).toBe(125);
    expect(mixer.groups.BASS.muted).toBe(true);
  });

  test('quit keys end the session, unbound keys are ignored', () => {
    const { controller } = setup();
    expect(controller.handleKey('x')).toBeUndefined();
    expect(controller.handleKey('Esc')).toBe('quit');
    expect(controller.handleKey('Ctrl+C')).toBe('quit');
  });

  test('recording through keys writes the pattern', () => {
    const { controller } = setup();
    controller.handleKey('r');
    controller.handleKey(' ');
    controller.handleKey('9');
    controller.handleKey(' ');
    expect(controller.session.store.peek('DRUMS', 0)?.padsAt(0)).toEqual([2]);
  });
});

describe('renderFrame', () => {
  test('draws transport, groups, the step grid, pads, mixer and legend', () => {
    const { controller, store } = setup();
    store.get('DRUMS', 1).setHit(4, 0);
    store.get('DRUMS', 1).setHit(0, 1);
    controller.handleKey('Right');

    const lines = renderFrame(controller.frame());
    expect(lines[0]).toBe('StepDeck  STOPPED  120 BPM');
    expect(lines[1]).toBe('[DRUMS]  BASS   LEAD   VOCAL   Pattern 02/99');
    expect(lines[2]).toBe('Step        v---|----|----|----');
    expect(lines[3]).toBe(' 1 kick     :...|#...|....|....');
    expect(lines[4]).toBe(' 2 Snare    @...|....|....|....');
    expect(lines[18]).toBe('16 FX4      :...|....|....|....');
    expect(lines[19]).toBe('');
    expect(lines[20]).toBe(' [7] kick      [8] Snare     [9] HiHat     [0] OpenHat');
    expect(lines[25]).toBe('Master 70%  DRUMS 80%  BASS 80%  LEAD 80%  VOCAL 80%');
    expect(lines[26]).toBe('Space:Play/Stop  r:Rec  c:Clear  z:Rewind  BackTab/Tab:Group  Left/Right:Pattern  Down/Up:Tempo  Esc:Quit');
    expect(lines).toHaveLength(27);
  });

  test('the step marker follows the pointer', () => {
    const { controller, store } = setup();
    store.get('DRUMS', 0).setHit(1, 0);
    controller.handleKey(' ');
    controller.session.dispatch({ type: 'Tick' });
    controller.handleKey(' ');

    const lines = renderFrame(controller.frame());
    expect(lines[0]).toBe('StepDeck  STOPPED  120 BPM');
    expect(lines[2]).toBe('Step        -v--|----|----|----');
    expect(lines[3]).toBe(' 1 kick     .@..|....|....|....');
  });
});
