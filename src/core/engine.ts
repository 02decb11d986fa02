/**
 * System Pipeline Executor
 * Runs the fixed system order over a working graph and commits the result
 * as the next frozen WorldState.
 *
 * Tick order:
 *   1. Vitality        7. ControlRatio
 *   2. Territory       8. Metabolism
 *   3. Production      9. Survival
 *   4. Solidarity     10. Struggle
 *   5. ImperialRent   11. Consciousness
 *   6. Decomposition  12. Contradiction
 */

import type { Entity, EntityId, SimEvent, SimulationConfig, WorldState } from './types.js';
import { WorkingGraph } from './graph.js';
import { SeededRNG } from './rng.js';
import { ServiceContainer, resolveConfig } from './services.js';
import { SimulationError, SystemFailureError } from './errors.js';
import { getEntityCount, toWorldStateData, worldStateFromData } from './world.js';
import { VitalitySystem } from '../systems/vitality.js';
import { TerritorySystem } from '../systems/territory.js';
import { ProductionSystem } from '../systems/production.js';
import { SolidaritySystem } from '../systems/solidarity.js';
import { ImperialRentSystem } from '../systems/imperial-rent.js';
import { DecompositionSystem } from '../systems/decomposition.js';
import { ControlRatioSystem } from '../systems/control-ratio.js';
import { MetabolismSystem } from '../systems/metabolism.js';
import { SurvivalSystem } from '../systems/survival.js';
import { StruggleSystem } from '../systems/struggle.js';
import { ConsciousnessSystem } from '../systems/consciousness.js';
import { ContradictionSystem } from '../systems/contradiction.js';

/**
 * Per-tick context handed to every system
 */
export interface TickContext {
  readonly tick: number; // tick being produced
  readonly rng: SeededRNG;
  readonly config: Readonly<SimulationConfig>;
}

export interface System {
  readonly name: string;
  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void;
}

/**
 * Bump whenever DEFAULT_SYSTEMS changes order or membership: replays across
 * versions are not comparable.
 */
export const SYSTEM_ORDER_VERSION = '1.0.0';

export const DEFAULT_SYSTEMS: readonly System[] = Object.freeze([
  new VitalitySystem(),
  new TerritorySystem(),
  new ProductionSystem(),
  new SolidaritySystem(),
  new ImperialRentSystem(),
  new DecompositionSystem(),
  new ControlRatioSystem(),
  new MetabolismSystem(),
  new SurvivalSystem(),
  new StruggleSystem(),
  new ConsciousnessSystem(),
  new ContradictionSystem(),
]);

export interface StepOptions {
  services?: ServiceContainer;
  systems?: readonly System[];
}

/**
 * Produce the successor of `state`. Pure with respect to the state: the
 * input is never touched and the same inputs give an equal output.
 *
 * A failing system aborts the whole tick: the working graph is dropped,
 * events published during the tick are rolled back from the bus, and the
 * error is rethrown annotated with the tick and the system name.
 */
export function step(
  state: WorldState,
  config: Partial<SimulationConfig> = {},
  options: StepOptions = {}
): WorldState {
  const resolved = resolveConfig(config);
  const services = options.services ?? ServiceContainer.create({ config: resolved });
  const systems = options.systems ?? DEFAULT_SYSTEMS;
  const nextTick = state.tick + 1;

  if (getEntityCount(state) === 0) {
    return worldStateFromData({ ...toWorldStateData(state), tick: nextTick, events: [] });
  }

  const graph = WorkingGraph.fromWorldState(state);
  const rng = new SeededRNG(state.rngState);
  const context: TickContext = { tick: nextTick, rng, config: resolved };
  const bus = services.eventBus;
  const mark = bus.mark();

  for (const system of systems) {
    try {
      system.step(graph, services, context);
    } catch (error) {
      bus.rollbackTo(mark);
      throw annotateFailure(error, nextTick, system.name);
    }
  }

  const events = bus.since(mark);

  try {
    return worldStateFromData({
      tick: nextTick,
      entities: toEntityRecord(graph.entityList()),
      relationships: graph.allEdges(),
      economy: graph.economy,
      events,
      eventLog: appendEventLog(state.eventLog, events, resolved.eventLogLimit),
      rngState: rng.getState(),
    });
  } catch (error) {
    bus.rollbackTo(mark);
    throw annotateFailure(error, nextTick, 'commit');
  }
}

function annotateFailure(error: unknown, tick: number, system: string): SimulationError {
  const failure = error instanceof SimulationError ? error : new SystemFailureError(error);
  return failure.annotate(tick, system);
}

function toEntityRecord(entities: Entity[]): Record<EntityId, Entity> {
  const record: Record<EntityId, Entity> = {};
  for (const entity of entities) {
    record[entity.id] = entity;
  }
  return record;
}

/**
 * Cumulative "Tick N: TYPE" log, trimmed to the newest `limit` lines
 * (0 keeps everything)
 */
export function appendEventLog(
  log: readonly string[],
  events: readonly SimEvent[],
  limit: number
): string[] {
  const next = [...log, ...events.map((event) => `Tick ${event.tick}: ${event.type.toUpperCase()}`)];
  return limit > 0 && next.length > limit ? next.slice(next.length - limit) : next;
}
