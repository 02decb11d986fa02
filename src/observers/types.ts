/**
 * Observer protocol
 * Passive watchers of tick-boundary transitions. Observers receive frozen
 * snapshots and have no path back into the pipeline.
 */

import type { SimulationConfig, WorldState } from '../core/types.js';
import type { ObserverError } from '../core/errors.js';

export type HookResult = void | Promise<void>;

export interface SimulationObserver {
  readonly name: string;
  /** Called once, before the first tick is applied */
  onSimulationStart?(initialState: WorldState, config: Readonly<SimulationConfig>): HookResult;
  /** Called once per committed tick, after the history push */
  onTick?(previousState: WorldState, newState: WorldState): HookResult;
  /** Called once when the simulation is explicitly ended */
  onSimulationEnd?(finalState: WorldState): HookResult;
}

export type ObserverHook = 'onSimulationStart' | 'onTick' | 'onSimulationEnd';

/**
 * A swallowed observer failure
 */
export interface ObserverFailure {
  observer: string;
  hook: ObserverHook;
  tick: number;
  timedOut: boolean;
  error: ObserverError;
}
