/**
 * Database Observer
 * Records runs, interval snapshots and every committed event into SQLite
 */

import type { SimulationConfig, WorldState } from '../core/types.js';
import type { SimulationDatabase } from '../storage/database.js';
import type { SimulationObserver } from './types.js';

export class DatabaseObserver implements SimulationObserver {
  readonly name = 'DatabaseObserver';

  private readonly database: SimulationDatabase;
  private readonly scenario: string;
  private runId: number | null = null;

  constructor(database: SimulationDatabase, scenario: string = 'custom') {
    this.database = database;
    this.scenario = scenario;
  }

  getRunId(): number | null {
    return this.runId;
  }

  onSimulationStart(initialState: WorldState, config: Readonly<SimulationConfig>): void {
    this.runId = this.database.startRun(config.seed, { ...config }, this.scenario);
    this.database.recordSnapshot(initialState, true);
    console.log(`[Database] Started run ${this.runId} (seed ${config.seed})`);
  }

  onTick(_previousState: WorldState, newState: WorldState): void {
    if (this.runId === null) return;
    this.database.recordEvents(newState.events, newState.tick);
    this.database.recordSnapshot(newState);
  }

  onSimulationEnd(finalState: WorldState): void {
    if (this.runId === null) return;
    this.database.recordSnapshot(finalState, true);
    this.database.endRun(finalState.tick);
    console.log(`[Database] Ended run ${this.runId} at tick ${finalState.tick}`);
    this.runId = null;
  }
}
