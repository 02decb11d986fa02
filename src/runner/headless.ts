#!/usr/bin/env node
/**
 * Headless Runner
 * CLI for running simulations without a server
 */

import { Simulation } from '../core/simulation.js';
import { DEFAULT_CONFIG } from '../core/world.js';
import { SCENARIOS, getScenario } from '../scenarios/index.js';
import { applyOverrides } from '../config/overrides.js';
import { env, observerSettings } from '../config/env.js';
import { AutoCheckpointer } from '../history/auto-checkpoint.js';
import { FileCheckpointSink } from '../history/sinks.js';
import { EndgameDetector } from '../observers/endgame.js';
import { MetricsObserver } from '../observers/metrics.js';
import { TopologyMonitor } from '../observers/topology.js';
import { CausalChainObserver } from '../observers/causal.js';
import { DatabaseObserver } from '../observers/database.js';
import { createDatabase } from '../storage/database.js';
import type { SimulationObserver } from '../observers/types.js';

interface RunOptions {
  seed: number;
  ticks: number;
  scenario: string;
  verbose: boolean;
  logInterval: number;
  checkpointDir: string | null;
  checkpointInterval: number;
  dbPath: string | null;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  const options: RunOptions = {
    seed: env.SEED,
    ticks: 100,
    scenario: 'imperial',
    verbose: false,
    logInterval: 10,
    checkpointDir: null,
    checkpointInterval: env.CHECKPOINT_INTERVAL,
    dbPath: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--seed':
        options.seed = parseInt(next, 10);
        i++;
        break;
      case '--ticks':
        options.ticks = parseInt(next, 10);
        i++;
        break;
      case '--scenario':
        options.scenario = next;
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--log-interval':
        options.logInterval = Math.max(1, parseInt(next, 10));
        i++;
        break;
      case '--checkpoint-dir':
        options.checkpointDir = next;
        i++;
        break;
      case '--checkpoint-interval':
        options.checkpointInterval = parseInt(next, 10);
        i++;
        break;
      case '--db':
        options.dbPath = next;
        i++;
        break;
      case '--help':
      case '-h':
        console.log(`
Dialectic Simulation Runner

Usage: npm run simulate -- [options]

Options:
  --seed <number>              Random seed (default: ${DEFAULT_CONFIG.seed})
  --ticks <number>             Number of ticks to run (default: 100)
  --scenario <name>            One of: ${Object.keys(SCENARIOS).join(', ')} (default: imperial)
  --verbose, -v                Print every event as it happens
  --log-interval <n>           Log summary every N ticks (default: 10)
  --checkpoint-dir <path>      Write auto-checkpoints into this directory
  --checkpoint-interval <n>    Ticks between auto-checkpoints (default: ${env.CHECKPOINT_INTERVAL})
  --db <path>                  Record the run into a SQLite database
  --help, -h                   Show this help

Examples:
  npm run simulate -- --seed 42 --ticks 500
  npm run simulate -- --scenario two-node --ticks 100 --verbose
  npm run simulate -- --checkpoint-dir ./checkpoints --checkpoint-interval 25
        `);
        process.exit(0);
    }
  }

  return options;
}

function formatNumber(value: number): string {
  return value.toFixed(4).padStart(10);
}

async function main() {
  const options = parseArgs();

  const factory = getScenario(options.scenario);
  if (!factory) {
    throw new Error(`Unknown scenario "${options.scenario}" (available: ${Object.keys(SCENARIOS).join(', ')})`);
  }

  console.log('='.repeat(60));
  console.log('Dialectic Simulation');
  console.log('='.repeat(60));
  console.log(`Scenario: ${options.scenario}`);
  console.log(`Seed: ${options.seed}`);
  console.log(`Ticks: ${options.ticks}`);
  console.log(`Checkpoints: ${options.checkpointDir ?? 'Disabled'}`);
  console.log('');

  const scenario = factory({ seed: options.seed });
  const coefficients = applyOverrides(scenario.coefficients);

  const metrics = new MetricsObserver();
  const endgame = new EndgameDetector();
  const topology = new TopologyMonitor();
  const observers: SimulationObserver[] = [metrics, endgame, topology, new CausalChainObserver()];

  const database = options.dbPath ? createDatabase(options.dbPath, env.DB_SNAPSHOT_INTERVAL) : null;
  if (database) {
    observers.push(new DatabaseObserver(database, options.scenario));
  }

  const autoCheckpointer = options.checkpointDir
    ? new AutoCheckpointer(new FileCheckpointSink(options.checkpointDir), {
        interval: options.checkpointInterval,
        retention: env.CHECKPOINT_RETENTION,
      })
    : null;

  const sim = new Simulation(scenario.state, {
    config: { ...scenario.config, ...observerSettings() },
    coefficients,
    database,
    observers,
    autoCheckpointer,
  });

  console.log('Initial State:');
  console.log('-'.repeat(60));
  printSummary(sim);
  console.log('');

  const startTime = Date.now();

  for (let i = 0; i < options.ticks && !endgame.isGameOver; i++) {
    const tick = sim.tick();

    if (options.verbose && tick.eventCount > 0) {
      console.log(`  [Tick ${tick.tick}] Events: ${tick.eventTypes.join(', ')}`);
    }

    if (tick.tick % options.logInterval === 0) {
      console.log(`\nTick ${tick.tick}:`);
      console.log('-'.repeat(60));
      printSummary(sim);
    }
  }

  const finalState = sim.end();
  await sim.flush();
  database?.close();

  const elapsed = Math.max(1, Date.now() - startTime);
  const ticksRun = sim.getTickHistory().length;

  console.log('');
  console.log('='.repeat(60));
  console.log('Simulation Complete');
  console.log('='.repeat(60));
  console.log(`Total ticks: ${ticksRun}`);
  console.log(`Elapsed time: ${elapsed}ms`);
  console.log(`Performance: ${((ticksRun / elapsed) * 1000).toFixed(1)} ticks/sec`);
  const result = endgame.getResult();
  console.log(`Outcome: ${result ? `${result.outcome} at tick ${result.tick}` : 'undecided'}`);
  console.log(`Solidarity phase: ${topology.getPhase() ?? 'n/a'}`);
  console.log('');

  console.log('Final State:');
  console.log('-'.repeat(60));
  printSummary(sim);

  const summary = metrics.getSummary();
  console.log('');
  console.log('Event Totals:');
  for (const [type, count] of Object.entries(summary.eventsByType)) {
    console.log(`  ${type.padEnd(28)} ${count}`);
  }

  const failures = sim.getObserverFailures();
  if (failures.length > 0) {
    console.log(`Observer failures: ${failures.length}`);
  }

  // Verify determinism
  console.log('');
  console.log('Determinism Check:');
  const history = sim.getTickHistory();
  console.log(`  State hashes collected: ${history.length}`);
  console.log(`  Final hash: ${history[history.length - 1] ?? 'n/a'} (tick ${finalState.tick})`);
}

function printSummary(sim: Simulation) {
  const summary = sim.getSummary();
  const state = sim.getState();

  console.log(
    `  Wealth: ${formatNumber(summary.totalWealth)} | Tension: ${formatNumber(summary.aggregateTension)} | Pool: ${formatNumber(summary.imperialRentPool)}`
  );
  console.log(
    `  Wage rate: ${formatNumber(summary.superWageRate)} | Repression: ${formatNumber(summary.repressionLevel)} | Overshoot: ${formatNumber(summary.overshootRatio)}`
  );

  console.log('  Classes:');
  for (const entity of Object.values(state.entities)) {
    if (entity.kind !== 'social_class') continue;
    const status = entity.active ? '' : ' (inactive)';
    console.log(
      `    ${entity.id} ${entity.role.padEnd(22)} wealth ${formatNumber(entity.wealth)} | CC ${entity.ideology.classConsciousness.toFixed(2)} | NI ${entity.ideology.nationalIdentity.toFixed(2)}${status}`
    );
  }

  if (summary.recentEvents.length > 0) {
    console.log(`  Recent Events: ${summary.recentEvents.slice(-3).join(', ')}`);
  }
}

main().catch((error) => {
  console.error('Simulation failed:', error);
  process.exit(1);
});
