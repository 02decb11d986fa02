/**
 * Environment configuration
 * Reads .env.local once; every entry point takes its settings from here
 */

import dotenv from 'dotenv';
import type { SimulationConfig } from '../core/types.js';

dotenv.config({ path: '.env.local' });

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export interface EnvConfig {
  PORT: number;
  SEED: number;
  DB_ENABLED: boolean;
  DB_PATH: string;
  DB_SNAPSHOT_INTERVAL: number;
  CHECKPOINT_DIR: string;
  CHECKPOINT_INTERVAL: number;
  CHECKPOINT_RETENTION: number;
  OBSERVER_TIMEOUT_MS: number;
  OBSERVER_RETHROW: boolean;
  TICK_INTERVAL_MS: number;
}

export const env: Readonly<EnvConfig> = Object.freeze({
  PORT: readInt('PORT', 3001),
  SEED: readInt('SEED', 12345),
  DB_ENABLED: process.env.DB_ENABLED !== 'false',
  DB_PATH: process.env.DB_PATH || 'simulation.db',
  DB_SNAPSHOT_INTERVAL: readInt('DB_SNAPSHOT_INTERVAL', 10),
  CHECKPOINT_DIR: process.env.CHECKPOINT_DIR || 'checkpoints',
  CHECKPOINT_INTERVAL: readInt('CHECKPOINT_INTERVAL', 50),
  CHECKPOINT_RETENTION: readInt('CHECKPOINT_RETENTION', 5),
  OBSERVER_TIMEOUT_MS: readInt('OBSERVER_TIMEOUT_MS', 2000),
  OBSERVER_RETHROW: process.env.OBSERVER_RETHROW === 'true',
  TICK_INTERVAL_MS: readInt('TICK_INTERVAL_MS', 1000),
});

/**
 * The observer policy an entry point hands to its Simulation
 */
export function observerSettings(
  source: Readonly<Pick<EnvConfig, 'OBSERVER_TIMEOUT_MS' | 'OBSERVER_RETHROW'>> = env
): Pick<SimulationConfig, 'observerTimeoutMs' | 'rethrowObserverErrors'> {
  return {
    observerTimeoutMs: source.OBSERVER_TIMEOUT_MS,
    rethrowObserverErrors: source.OBSERVER_RETHROW,
  };
}
