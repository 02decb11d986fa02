/**
 * Simulation Controller
 * Orchestrates simulation lifecycle: init, tick, start/pause/resume, speed,
 * undo/redo and checkpoint restore
 */

import { Simulation, type SimulationOptions, type TickMetrics } from '../../core/simulation.js';
import type { Coefficients, DeepReadonly, SimulationConfig, WorldState } from '../../core/types.js';
import { ConfigurationError } from '../../core/errors.js';
import { applyOverrides } from '../../config/overrides.js';
import { observerSettings } from '../../config/env.js';
import { getScenario } from '../../scenarios/index.js';
import { AutoCheckpointer } from '../../history/auto-checkpoint.js';
import { FileCheckpointSink } from '../../history/sinks.js';
import { BroadcastObserver } from '../../observers/broadcast.js';
import { DatabaseObserver } from '../../observers/database.js';
import { EndgameDetector } from '../../observers/endgame.js';
import { MetricsObserver } from '../../observers/metrics.js';
import { TopologyMonitor } from '../../observers/topology.js';
import { CausalChainObserver } from '../../observers/causal.js';
import type { SimulationObserver } from '../../observers/types.js';
import { SqliteCheckpointSink, createDatabase } from '../../storage/database.js';
import { serializeWorldState } from '../state-serializer.js';
import { state, config, broadcast } from '../state.js';

/**
 * Open the database (if enabled) and pick the checkpoint sink
 */
export function initializeStorage(): void {
  if (config.DB_ENABLED && !state.database) {
    state.database = createDatabase(config.DB_PATH, config.DB_SNAPSHOT_INTERVAL);
    if (state.database) {
      console.log(`[Database] Initialized at ${config.DB_PATH} (snapshot every ${config.DB_SNAPSHOT_INTERVAL} ticks)`);
    }
  }

  if (!state.checkpoints) {
    state.checkpoints = state.database
      ? new SqliteCheckpointSink(state.database)
      : new FileCheckpointSink(config.CHECKPOINT_DIR);
  }
}

function buildOptions(
  simConfig: Partial<SimulationConfig>,
  coefficients?: DeepReadonly<Coefficients>
): SimulationOptions {
  const metrics = new MetricsObserver();
  const endgame = new EndgameDetector();
  const topology = new TopologyMonitor();
  const causal = new CausalChainObserver();
  const observers: SimulationObserver[] = [metrics, endgame, topology, causal, new BroadcastObserver(broadcast)];

  if (state.database) {
    observers.push(new DatabaseObserver(state.database, state.scenario));
  }

  endgame.subscribe((result) => {
    broadcast({ type: 'endgame', data: result });
    pauseSimulation();
  });
  topology.subscribe((transition) => broadcast({ type: 'phase_transition', data: transition }));
  causal.subscribe((chain) => broadcast({ type: 'causal_chain', data: chain }));

  state.metrics = metrics;
  state.endgame = endgame;

  return {
    config: { ...simConfig, ...observerSettings(config) },
    coefficients,
    database: state.database,
    observers,
    autoCheckpointer: state.checkpoints
      ? new AutoCheckpointer(state.checkpoints, {
          interval: config.CHECKPOINT_INTERVAL,
          retention: config.CHECKPOINT_RETENTION,
        })
      : null,
  };
}

/**
 * End the current run (observers see onSimulationEnd) and stop the timer
 */
function retireSimulation(): void {
  stopInterval();
  if (state.simulation && !state.simulation.isEnded()) {
    state.simulation.end();
  }
}

/**
 * Initialize or reinitialize the simulation from a named scenario
 */
export function initializeSimulation(scenarioName: string = state.scenario): Simulation {
  const factory = getScenario(scenarioName);
  if (!factory) {
    throw new ConfigurationError(`Unknown scenario: ${scenarioName}`);
  }

  retireSimulation();

  const scenario = factory({ seed: config.SEED });
  state.scenario = scenarioName;
  const simulation = new Simulation(
    scenario.state,
    buildOptions(scenario.config, applyOverrides(scenario.coefficients))
  );
  simulation.start();

  state.simulation = simulation;
  state.status = 'paused';

  console.log(`[SimulationController] Simulation initialized (scenario ${scenarioName})`);
  return simulation;
}

/**
 * Replace the running simulation with one restored from a checkpoint
 */
export function restoreCheckpoint(key: string): Simulation {
  if (!state.checkpoints) {
    throw new ConfigurationError('Checkpoint storage not initialized');
  }

  const sink = state.checkpoints;
  retireSimulation();

  const simulation = Simulation.fromCheckpoint(sink, key, buildOptions({}));
  simulation.start();

  state.simulation = simulation;
  state.status = 'paused';
  broadcast({ type: 'tick', data: serializeWorldState(simulation.getState()) });
  return simulation;
}

/**
 * Advance the simulation synchronously (API step / run)
 */
export function stepSimulation(count: number = 1): TickMetrics[] {
  const simulation = state.simulation ?? initializeSimulation();
  const results: TickMetrics[] = [];

  for (let i = 0; i < count; i++) {
    if (state.endgame?.isGameOver) break;
    results.push(simulation.tick());
  }

  return results;
}

/**
 * Execute a single simulation tick (interval callback)
 */
export function runTick(): void {
  if (!state.simulation || state.status !== 'running') return;

  try {
    state.simulation.tick();
  } catch (error) {
    console.error('[SimulationController] Tick error:', error);
    pauseSimulation();
  }
}

export function undoTick(): WorldState | null {
  const simulation = state.simulation;
  if (!simulation?.canUndo()) return null;
  const restored = simulation.undo();
  broadcast({ type: 'tick', data: serializeWorldState(restored) });
  return restored;
}

export function redoTick(): WorldState | null {
  const simulation = state.simulation;
  if (!simulation?.canRedo()) return null;
  const restored = simulation.redo();
  broadcast({ type: 'tick', data: serializeWorldState(restored) });
  return restored;
}

function tickIntervalMs(): number {
  return Math.max(10, Math.round(config.TICK_INTERVAL_MS / state.timeScale));
}

function stopInterval(): void {
  if (state.tickInterval) {
    clearInterval(state.tickInterval);
    state.tickInterval = null;
  }
}

/**
 * Start the simulation
 */
export function startSimulation(): void {
  if (state.status === 'running') return;

  if (!state.simulation) {
    initializeSimulation();
  }

  state.status = 'running';
  state.tickInterval = setInterval(runTick, tickIntervalMs());

  broadcast({ type: 'status', data: { status: 'running' } });
  console.log(`[SimulationController] Simulation started (${state.timeScale}x speed)`);
}

/**
 * Pause the simulation
 */
export function pauseSimulation(): void {
  if (state.status !== 'running') return;

  state.status = 'paused';
  stopInterval();

  broadcast({ type: 'status', data: { status: 'paused' } });
  console.log('[SimulationController] Simulation paused');
}

/**
 * Resume a paused simulation
 */
export function resumeSimulation(): void {
  if (state.status !== 'paused') return;

  state.status = 'running';
  state.tickInterval = setInterval(runTick, tickIntervalMs());

  broadcast({ type: 'status', data: { status: 'running' } });
  console.log('[SimulationController] Simulation resumed');
}

/**
 * Set simulation speed (1x-10x)
 */
export function setSpeed(scale: number): void {
  state.timeScale = Math.max(1, Math.min(10, scale));

  if (state.status === 'running' && state.tickInterval) {
    clearInterval(state.tickInterval);
    state.tickInterval = setInterval(runTick, tickIntervalMs());
  }

  console.log(`[SimulationController] Speed set to ${state.timeScale}x`);
}

/**
 * End the run and release storage
 */
export function shutdownSimulation(): void {
  retireSimulation();
  state.status = 'stopped';

  if (state.database) {
    state.database.close();
    state.database = null;
    console.log('[Database] Closed');
  }
}
