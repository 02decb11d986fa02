/**
 * Simulation
 * Owns one run: its services, undo/redo history and observers.
 * Ticks go through the pure engine step; observers hear about them only
 * after the new state is committed to history.
 */

import type { Checkpoint, EventType, SimEvent, SimulationConfig, WorldState } from './types.js';
import { hashState } from './rng.js';
import { getAggregateTension, getSocialClasses, getTotalWealth } from './world.js';
import { step, type System } from './engine.js';
import { ServiceContainer, type ServiceOptions } from './services.js';
import { NotFoundError, SimulationEndedError } from './errors.js';
import {
  canRedo,
  canUndo,
  createHistoryStack,
  getStateAtTick,
  protectTick,
  pruneHistory,
  pushState,
  redo,
  undo,
  unprotectTick,
  type HistoryStack,
} from '../history/stack.js';
import { createCheckpoint, loadCheckpoint, saveCheckpoint, type PersistenceSink } from '../history/checkpoint.js';
import type { AutoCheckpointer } from '../history/auto-checkpoint.js';
import { ObserverNotifier } from '../observers/notifier.js';
import type { ObserverFailure, SimulationObserver } from '../observers/types.js';

/**
 * Tick metrics for logging/debugging
 */
export interface TickMetrics {
  tick: number;
  stateHash: string;
  eventCount: number;
  eventTypes: EventType[];
}

export interface SimulationSummary {
  tick: number;
  ended: boolean;
  activeClasses: number;
  totalClasses: number;
  totalWealth: number;
  aggregateTension: number;
  imperialRentPool: number;
  superWageRate: number;
  repressionLevel: number;
  overshootRatio: number;
  terminalDecision: string;
  historyDepth: number;
  canUndo: boolean;
  canRedo: boolean;
  recentEvents: string[];
}

export interface SimulationOptions extends ServiceOptions {
  observers?: SimulationObserver[];
  systems?: readonly System[];
  autoCheckpointer?: AutoCheckpointer | null;
}

/**
 * Simulation class manages the world state and tick execution
 */
export class Simulation {
  private state: WorldState;
  private history: HistoryStack;
  private readonly services: ServiceContainer;
  private readonly systems: readonly System[] | undefined;
  private readonly notifier: ObserverNotifier;
  private readonly autoCheckpointer: AutoCheckpointer | null;
  private tickHistory: string[] = []; // State hashes for determinism verification
  private started = false;
  private ended = false;

  constructor(initialState: WorldState, options: SimulationOptions = {}) {
    this.services = ServiceContainer.create(options);
    this.systems = options.systems;
    this.autoCheckpointer = options.autoCheckpointer ?? null;

    const config = this.services.config;
    this.state = initialState;
    this.history = pushState(createHistoryStack(config.maxHistoryDepth), initialState);
    this.notifier = new ObserverNotifier({
      timeoutMs: config.observerTimeoutMs,
      rethrow: config.rethrowObserverErrors,
    });

    for (const observer of options.observers ?? []) {
      this.notifier.add(observer);
    }
  }

  /**
   * Restore a run from a stored checkpoint. Options override the stored
   * config field by field.
   */
  static fromCheckpoint(sink: PersistenceSink, key: string, options: SimulationOptions = {}): Simulation {
    const checkpoint = loadCheckpoint(sink, key);
    console.log(`[Simulation] Restored ${key} at tick ${checkpoint.state.tick}`);
    return new Simulation(checkpoint.state, {
      ...options,
      config: { ...checkpoint.config, ...options.config },
    });
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  /**
   * Get current world state (frozen)
   */
  getState(): WorldState {
    return this.state;
  }

  getTick(): number {
    return this.state.tick;
  }

  getConfig(): Readonly<SimulationConfig> {
    return this.services.config;
  }

  getServices(): ServiceContainer {
    return this.services;
  }

  getHistory(): HistoryStack {
    return this.history;
  }

  /**
   * Every event published on this run's bus, in publish order
   */
  getEventHistory(): SimEvent[] {
    return this.services.eventBus.getHistory();
  }

  /**
   * Get tick history hashes for determinism verification
   */
  getTickHistory(): string[] {
    return [...this.tickHistory];
  }

  isEnded(): boolean {
    return this.ended;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Notify observers that the run is starting. Called automatically by the
   * first tick; calling it again is a no-op.
   */
  start(): void {
    this.assertNotEnded();
    if (this.started) return;
    this.started = true;
    this.notifier.notifyStart(this.state, this.services.config);
  }

  /**
   * Execute one simulation tick
   * A failing system leaves the current state untouched and rethrows.
   * Observers hear about a committed tick before the auto-checkpoint runs,
   * so a failing sink surfaces its error without hiding the tick.
   */
  tick(): TickMetrics {
    this.assertNotEnded();
    this.start();

    const previous = this.state;
    const next = step(previous, this.services.config, { services: this.services, systems: this.systems });

    this.history = pushState(this.history, next);
    this.state = next;

    const stateHash = hashState(next);
    this.tickHistory.push(stateHash);

    try {
      this.notifier.notifyTick(previous, next);
    } finally {
      this.autoCheckpointer?.onStep(next, this.services.config);
    }

    return {
      tick: next.tick,
      stateHash,
      eventCount: next.events.length,
      eventTypes: next.events.map((e) => e.type),
    };
  }

  /**
   * Run simulation for N ticks
   */
  run(ticks: number): TickMetrics[] {
    const allMetrics: TickMetrics[] = [];

    for (let i = 0; i < ticks; i++) {
      allMetrics.push(this.tick());
    }

    return allMetrics;
  }

  /**
   * End the run. Observers get onSimulationEnd exactly once; further
   * ticks throw SimulationEndedError and further calls are no-ops.
   */
  end(): WorldState {
    if (this.ended) return this.state;
    this.start();
    this.ended = true;
    this.notifier.notifyEnd(this.state);
    console.log(`[Simulation] Ended at tick ${this.state.tick}`);
    return this.state;
  }

  // ============================================================================
  // History
  // ============================================================================

  canUndo(): boolean {
    return canUndo(this.history);
  }

  canRedo(): boolean {
    return canRedo(this.history);
  }

  undo(): WorldState {
    const move = undo(this.history);
    this.history = move.stack;
    this.state = move.state;
    return this.state;
  }

  redo(): WorldState {
    const move = redo(this.history);
    this.history = move.stack;
    this.state = move.state;
    return this.state;
  }

  getStateAtTick(tick: number): WorldState | undefined {
    return getStateAtTick(this.history, tick);
  }

  protectTick(tick: number): void {
    if (getStateAtTick(this.history, tick) === undefined) {
      throw new NotFoundError('History entry for tick', String(tick));
    }
    this.history = protectTick(this.history, tick);
  }

  unprotectTick(tick: number): void {
    this.history = unprotectTick(this.history, tick);
  }

  pruneHistory(keepCount?: number): number {
    const before = this.history.entries.length;
    this.history = pruneHistory(this.history, keepCount);
    return before - this.history.entries.length;
  }

  // ============================================================================
  // Observers
  // ============================================================================

  addObserver(observer: SimulationObserver): void {
    this.notifier.add(observer);
  }

  removeObserver(observer: SimulationObserver | string): boolean {
    return this.notifier.remove(observer);
  }

  getObservers(): readonly SimulationObserver[] {
    return this.notifier.list();
  }

  getObserverFailures(): ObserverFailure[] {
    return this.notifier.getFailures();
  }

  /**
   * Wait for async observer hooks still in flight
   */
  flush(): Promise<void> {
    return this.notifier.flush();
  }

  // ============================================================================
  // Checkpoints
  // ============================================================================

  saveCheckpoint(sink: PersistenceSink, key: string, description: string = ''): Checkpoint {
    const checkpoint = createCheckpoint(this.state, this.services.config, description);
    saveCheckpoint(sink, key, checkpoint);
    return checkpoint;
  }

  // ============================================================================
  // Summary
  // ============================================================================

  /**
   * Get simulation summary for current state
   */
  getSummary(): SimulationSummary {
    const classes = getSocialClasses(this.state);
    const { economy } = this.state;

    return {
      tick: this.state.tick,
      ended: this.ended,
      activeClasses: classes.filter((c) => c.active).length,
      totalClasses: classes.length,
      totalWealth: round(getTotalWealth(this.state)),
      aggregateTension: round(getAggregateTension(this.state)),
      imperialRentPool: round(economy.imperialRentPool),
      superWageRate: round(economy.currentSuperWageRate),
      repressionLevel: round(economy.repressionLevel),
      overshootRatio: round(economy.overshootRatio),
      terminalDecision: economy.terminalDecision,
      historyDepth: this.history.entries.length,
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      recentEvents: this.state.eventLog.slice(-10),
    };
  }

  private assertNotEnded(): void {
    if (this.ended) {
      throw new SimulationEndedError();
    }
  }
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Run two simulations from the same factory and compare tick hashes
 * Returns true if both runs produce identical results
 */
export function verifyDeterminism(
  createState: () => WorldState,
  ticks: number,
  config: Partial<SimulationConfig> = {}
): boolean {
  const sim1 = new Simulation(createState(), { config });
  const sim2 = new Simulation(createState(), { config });

  const history1 = sim1.run(ticks).map((m) => m.stateHash);
  const history2 = sim2.run(ticks).map((m) => m.stateHash);

  if (history1.length !== history2.length) return false;

  for (let i = 0; i < history1.length; i++) {
    if (history1[i] !== history2[i]) return false;
  }

  return true;
}
