/**
 * Broadcast Observer
 * Pushes serialized ticks and lifecycle status to connected clients
 */

import type { WorldState } from '../core/types.js';
import { serializeWorldState, type WorldSnapshot } from '../server/state-serializer.js';
import type { SimulationObserver } from './types.js';

export type BroadcastMessage =
  | { type: 'tick'; data: WorldSnapshot }
  | { type: 'status'; data: { status: 'started' | 'ended'; tick: number } };

export type Broadcaster = (message: BroadcastMessage) => void;

export class BroadcastObserver implements SimulationObserver {
  readonly name = 'BroadcastObserver';

  private readonly send: Broadcaster;

  constructor(send: Broadcaster) {
    this.send = send;
  }

  onSimulationStart(initialState: WorldState): void {
    this.send({ type: 'status', data: { status: 'started', tick: initialState.tick } });
    this.send({ type: 'tick', data: serializeWorldState(initialState) });
  }

  onTick(_previousState: WorldState, newState: WorldState): void {
    this.send({ type: 'tick', data: serializeWorldState(newState) });
  }

  onSimulationEnd(finalState: WorldState): void {
    this.send({ type: 'status', data: { status: 'ended', tick: finalState.tick } });
  }
}
