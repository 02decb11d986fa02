/**
 * Event Bus
 * Synchronous publish/subscribe with an ordered, durable history.
 * Systems publish during a tick; observers and tools read the history after.
 */

import type { EventPayload, EventType, SimEvent } from './types.js';
import { canonicalJson } from './world.js';

export type EventHandler = (event: SimEvent) => void;
export type Clock = () => number;

/**
 * Build a frozen event
 */
export function createEvent(
  type: EventType,
  tick: number,
  payload: EventPayload = {},
  timestamp: number = Date.now()
): SimEvent {
  return Object.freeze({
    type,
    tick,
    payload: Object.freeze({ ...payload }),
    timestamp,
  });
}

/**
 * Event equality ignores the creation timestamp
 */
export function eventsEqual(a: SimEvent, b: SimEvent): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

export class EventBus {
  private handlers: Map<EventType, EventHandler[]> = new Map();
  private history: SimEvent[] = [];
  private readonly clock: Clock;

  constructor(clock: Clock = Date.now) {
    this.clock = clock;
  }

  /**
   * Register a handler for one event type
   * @returns Unsubscribe function
   */
  subscribe(type: EventType, handler: EventHandler): () => void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);

    return () => {
      const current = this.handlers.get(type);
      if (!current) return;
      const index = current.indexOf(handler);
      if (index >= 0) current.splice(index, 1);
    };
  }

  /**
   * Append to history, then invoke matching handlers in subscription order.
   * A failing handler is logged and does not stop the others.
   */
  publish(event: SimEvent): void {
    this.history.push(event);

    const list = this.handlers.get(event.type);
    if (!list) return;

    for (const handler of [...list]) {
      try {
        handler(event);
      } catch (error) {
        console.error(`[EventBus] Handler for ${event.type} failed:`, error);
      }
    }
  }

  /**
   * Create an event stamped with the bus clock and publish it
   */
  emit(type: EventType, tick: number, payload: EventPayload = {}): SimEvent {
    const event = createEvent(type, tick, payload, this.clock());
    this.publish(event);
    return event;
  }

  getHistory(): SimEvent[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Current history length, for rolling back an aborted tick
   */
  mark(): number {
    return this.history.length;
  }

  since(mark: number): SimEvent[] {
    return this.history.slice(mark);
  }

  rollbackTo(mark: number): void {
    if (mark < this.history.length) {
      this.history.length = Math.max(0, mark);
    }
  }

  subscriberCount(type: EventType): number {
    return this.handlers.get(type)?.length ?? 0;
  }
}
