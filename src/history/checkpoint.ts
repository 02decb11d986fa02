/**
 * Checkpoints
 * Durable snapshots of a world state plus the config it ran under, written
 * to and read from a PersistenceSink as JSON.
 */

import type { Checkpoint, SimulationConfig, WorldState } from '../core/types.js';
import {
  CheckpointCorruptedError,
  CheckpointNotFoundError,
  CheckpointSchemaError,
  SimulationError,
} from '../core/errors.js';
import { CheckpointSchema, formatIssues } from '../core/schema.js';
import { worldStateFromData } from '../core/world.js';

export const SCHEMA_VERSION = '1.0.0';

/**
 * Key/value store for serialized checkpoints
 */
export interface PersistenceSink {
  write(key: string, data: string): void;
  read(key: string): string | null;
  exists(key: string): boolean;
  list(): string[];
  remove(key: string): boolean;
}

export function createCheckpoint(
  state: WorldState,
  config: SimulationConfig,
  description: string = '',
  now: Date = new Date()
): Checkpoint {
  return {
    metadata: {
      createdAt: now.toISOString(),
      tick: state.tick,
      description,
      schemaVersion: SCHEMA_VERSION,
    },
    state,
    config: { ...config },
  };
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return JSON.stringify(checkpoint, null, 2);
}

export function saveCheckpoint(sink: PersistenceSink, key: string, checkpoint: Checkpoint): void {
  sink.write(key, serializeCheckpoint(checkpoint));
  console.log(`[Checkpoint] Saved ${key} (tick ${checkpoint.metadata.tick})`);
}

/**
 * Read and validate a checkpoint.
 * Throws CheckpointNotFoundError, CheckpointCorruptedError (not JSON) or
 * CheckpointSchemaError (wrong version or shape).
 */
export function loadCheckpoint(sink: PersistenceSink, key: string): Checkpoint {
  const raw = sink.read(key);
  if (raw === null) {
    throw new CheckpointNotFoundError(key);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CheckpointCorruptedError(key, error);
  }

  return validateCheckpointData(parsed, key);
}

/**
 * Check the schema version, then the full shape, then rebuild the frozen
 * world state (which re-runs the referential checks).
 */
export function validateCheckpointData(data: unknown, key: string = '(inline)'): Checkpoint {
  const version = readSchemaVersion(data);
  if (version !== SCHEMA_VERSION) {
    throw new CheckpointSchemaError(key, [
      `schemaVersion: expected ${SCHEMA_VERSION}, got ${version ?? 'none'}`,
    ]);
  }

  const parsed = CheckpointSchema.safeParse(data);
  if (!parsed.success) {
    throw new CheckpointSchemaError(key, formatIssues(parsed.error));
  }

  let state: WorldState;
  try {
    state = worldStateFromData(parsed.data.state);
  } catch (error) {
    if (error instanceof SimulationError) {
      throw new CheckpointSchemaError(key, [error.message]);
    }
    throw error;
  }

  return {
    metadata: parsed.data.metadata,
    state,
    config: parsed.data.config,
  };
}

function readSchemaVersion(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('metadata' in data)) return null;
  const metadata = data.metadata;
  if (typeof metadata !== 'object' || metadata === null || !('schemaVersion' in metadata)) return null;
  return typeof metadata.schemaVersion === 'string' ? metadata.schemaVersion : null;
}
