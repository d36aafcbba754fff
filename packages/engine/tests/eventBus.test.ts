import { EventBus } from '../src/events/eventBus';

describe('EventBus', () => {
  test('delivers payloads to subscribers', () => {
    const bus = new EventBus();
    const cb = jest.fn();
    bus.on('pad:released', cb);
    bus.emit('pad:released', { group: 'BASS', pad: 3 });
    expect(cb).toHaveBeenCalledWith({ group: 'BASS', pad: 3 });
  });

  test('unsubscribe stops delivery', () => {
    const bus = new EventBus();
    const cb = jest.fn();
    const off = bus.on('pad:released', cb);
    off();
    bus.emit('pad:released', { group: 'BASS', pad: 3 });
    expect(cb).not.toHaveBeenCalled();
    expect(bus.listenerCount('pad:released')).toBe(0);
  });

  test('once fires a single time', () => {
    const bus = new EventBus();
    const cb = jest.fn();
    bus.once('pattern:changed', cb);
    bus.emit('pattern:changed', { group: 'DRUMS', patternIndex: 0 });
    bus.emit('pattern:changed', { group: 'DRUMS', patternIndex: 1 });
    expect(cb).toHaveBeenCalledTimes(1);
  });

  test('a throwing listener does not block the others', () => {
    const bus = new EventBus();
    const after = jest.fn();
    bus.on('pad:released', () => {
      throw new Error('listener failed');
    });
    bus.on('pad:released', after);
    bus.emit('pad:released', { group: 'LEAD', pad: 0 });
    expect(after).toHaveBeenCalledTimes(1);
  });

  test('off without a callback removes every listener for the event', () => {
    const bus = new EventBus();
    bus.on('pad:released', jest.fn());
    bus.on('pad:released', jest.fn());
    bus.on('pattern:changed', jest.fn());
    expect(bus.listenerCount('pad:released')).toBe(2);
    bus.off('pad:released');
    expect(bus.listenerCount('pad:released')).toBe(0);
    expect(bus.listenerCount('pattern:changed')).toBe(1);
    bus.clear();
    expect(bus.listenerCount('pattern:changed')).toBe(0);
  });

  test('events with different payload shapes share one bus', () => {
    const bus = new EventBus();
    const rejected: number[] = [];
    const triggered: string[] = [];
    bus.on('input:rejected', e => rejected.push(e.group));
    bus.on('pad:triggered', e => triggered.push(e.group));
    bus.emit('input:rejected', { message: 'group 7 is out of range', group: 7, pad: 0 });
    bus.emit('pad:triggered', { group: 'VOCAL', pad: 2, gain: 0.56, result: 'played' });
    expect(rejected).toEqual([7]);
    expect(triggered).toEqual(['VOCAL']);
  });
});
