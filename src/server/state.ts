/**
 * Server state and configuration
 * Centralized state management for the API server
 */

import { WebSocket } from 'ws';
import type { Simulation } from '../core/simulation.js';
import type { SimulationDatabase } from '../storage/database.js';
import type { PersistenceSink } from '../history/checkpoint.js';
import type { MetricsObserver } from '../observers/metrics.js';
import type { EndgameDetector } from '../observers/endgame.js';
import { env } from '../config/env.js';

// ============================================================================
// Types
// ============================================================================

export type SimulationStatus = 'stopped' | 'running' | 'paused';

export interface ServerState {
  status: SimulationStatus;
  simulation: Simulation | null;
  scenario: string;
  metrics: MetricsObserver | null;
  endgame: EndgameDetector | null;
  timeScale: number;
  tickInterval: NodeJS.Timeout | null;
  database: SimulationDatabase | null;
  checkpoints: PersistenceSink | null;
}

export interface ClientMessage {
  type: string;
  [key: string]: unknown;
}

// ============================================================================
// Configuration
// ============================================================================

export const config = {
  PORT: env.PORT,
  SEED: env.SEED,
  DB_PATH: env.DB_PATH,
  DB_ENABLED: env.DB_ENABLED,
  DB_SNAPSHOT_INTERVAL: env.DB_SNAPSHOT_INTERVAL,
  CHECKPOINT_DIR: env.CHECKPOINT_DIR,
  CHECKPOINT_INTERVAL: env.CHECKPOINT_INTERVAL,
  CHECKPOINT_RETENTION: env.CHECKPOINT_RETENTION,
  OBSERVER_TIMEOUT_MS: env.OBSERVER_TIMEOUT_MS,
  OBSERVER_RETHROW: env.OBSERVER_RETHROW,
  TICK_INTERVAL_MS: env.TICK_INTERVAL_MS,
};

// ============================================================================
// Server State
// ============================================================================

export const state: ServerState = {
  status: 'stopped',
  simulation: null,
  scenario: 'imperial',
  metrics: null,
  endgame: null,
  timeScale: 1,
  tickInterval: null,
  database: null,
  checkpoints: null,
};

// ============================================================================
// WebSocket Clients
// ============================================================================

export const clients = new Set<WebSocket>();

/**
 * Broadcast a message to all connected WebSocket clients
 */
export function broadcast(message: object): void {
  const data = JSON.stringify(message);
  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  }
}
