/**
 * Rendering feed: typed pub/sub from the engine to whatever draws it.
 */

import type { Group } from '../model/groups.js';
import type { MixerSnapshot } from '../mixer/mixer.js';
import type { StepAdvancedEvent, TransportSnapshot } from '../sequencer/transport.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('event-bus');

export interface StepDeckEvents {
  // Emitted once per clock tick for the selected group
  'step:advanced': StepAdvancedEvent;

  // Pad events
  'pad:triggered': { group: Group; pad: number; gain: number; result: 'played' | 'empty' };
  'pad:released': { group: Group; pad: number };

  // State changes
  'mixer:changed': MixerSnapshot;
  'transport:changed': TransportSnapshot;
  'pattern:changed': { group: Group; patternIndex: number };

  // Boundary rejections
  'input:rejected': { message: string; group: number; pad: number };
}

type EventCallback<T> = (data: T) => void;
type EventName = keyof StepDeckEvents;
type ListenerMap = { [K in EventName]: Set<EventCallback<StepDeckEvents[K]>> };

function emptyListeners(): ListenerMap {
  return {
    'step:advanced': new Set(),
    'pad:triggered': new Set(),
    'pad:released': new Set(),
    'mixer:changed': new Set(),
    'transport:changed': new Set(),
    'pattern:changed': new Set(),
    'input:rejected': new Set(),
  };
}

/**
 * EventBus class - lightweight pub/sub system
 */
export class EventBus {
  private listeners: ListenerMap = emptyListeners();

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends EventName>(eventName: K, callback: EventCallback<StepDeckEvents[K]>): () => void {
    this.listeners[eventName].add(callback);
    return () => this.off(eventName, callback);
  }

  /**
   * Subscribe to an event (once)
   * Automatically unsubscribes after first invocation
   */
  once<K extends EventName>(eventName: K, callback: EventCallback<StepDeckEvents[K]>): void {
    const unsubscribe = this.on(eventName, (data) => {
      unsubscribe();
      callback(data);
    });
  }

  /**
   * Emit an event. A throwing listener is logged and does not stop the others.
   */
  emit<K extends EventName>(eventName: K, data: StepDeckEvents[K]): void {
    const callbacks: Set<EventCallback<StepDeckEvents[K]>> = this.listeners[eventName];
    for (const callback of Array.from(callbacks)) {
      try {
        callback(data);
      } catch (error) {
        log.error(`Error in event listener for ${eventName}:`, error);
      }
    }
  }

  /**
   * Unsubscribe from an event
   * @param callback The callback to remove (if not provided, removes all)
   */
  off<K extends EventName>(eventName: K, callback?: EventCallback<StepDeckEvents[K]>): void {
    const callbacks: Set<EventCallback<StepDeckEvents[K]>> = this.listeners[eventName];
    if (callback) callbacks.delete(callback);
    else callbacks.clear();
  }

  clear(): void {
    this.listeners = emptyListeners();
  }

  listenerCount(eventName: EventName): number {
    return this.listeners[eventName].size;
  }
}
