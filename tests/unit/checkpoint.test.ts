/**
 * Checkpoint and Sink Tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  SCHEMA_VERSION,
  createCheckpoint,
  loadCheckpoint,
  saveCheckpoint,
  serializeCheckpoint,
  validateCheckpointData,
} from '../../src/history/checkpoint.js';
import { FileCheckpointSink, MemoryCheckpointSink, assertCheckpointKey } from '../../src/history/sinks.js';
import {
  CheckpointCorruptedError,
  CheckpointNotFoundError,
  CheckpointSchemaError,
  ConfigurationError,
} from '../../src/core/errors.js';
import {
  DEFAULT_CONFIG,
  createRelationship,
  createSocialClass,
  createWorldState,
  worldStatesEqual,
} from '../../src/core/world.js';
import type { WorldState } from '../../src/core/types.js';
import { captureError } from '../helpers/world.js';

function sampleState(): WorldState {
  return createWorldState({
    tick: 7,
    entities: [
      createSocialClass({ id: 'C001', name: 'Worker', role: 'periphery_proletariat', wealth: 0.5 }),
      createSocialClass({ id: 'C002', name: 'Owner', role: 'core_bourgeoisie', wealth: 0.5 }),
    ],
    relationships: [createRelationship('C001', 'C002', 'exploitation', { tension: 0.25 })],
  });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createCheckpoint', () => {
  it('stamps metadata with the tick and schema version', () => {
    const checkpoint = createCheckpoint(sampleState(), DEFAULT_CONFIG, 'before crisis', new Date(0));

    expect(checkpoint.metadata).toEqual({
      createdAt: '1970-01-01T00:00:00.000Z',
      tick: 7,
      description: 'before crisis',
      schemaVersion: SCHEMA_VERSION,
    });
    expect(checkpoint.config).not.toBe(DEFAULT_CONFIG);
  });
});

describe('save and load', () => {
  it('round-trips through a memory sink', () => {
    const sink = new MemoryCheckpointSink();
    const state = sampleState();
    saveCheckpoint(sink, 'cp-1', createCheckpoint(state, DEFAULT_CONFIG));

    const loaded = loadCheckpoint(sink, 'cp-1');

    expect(worldStatesEqual(loaded.state, state)).toBe(true);
    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.metadata.tick).toBe(7);
    expect(Object.isFrozen(loaded.state)).toBe(true);
  });

  it('throws CheckpointNotFoundError for a missing key', () => {
    const error = captureError(() => loadCheckpoint(new MemoryCheckpointSink(), 'missing'));

    expect(error).toBeInstanceOf(CheckpointNotFoundError);
    expect(error instanceof CheckpointNotFoundError ? error.key : null).toBe('missing');
  });

  it('throws CheckpointCorruptedError for data that is not JSON', () => {
    const sink = new MemoryCheckpointSink();
    sink.write('broken', '{"metadata": ');

    expect(() => loadCheckpoint(sink, 'broken')).toThrow(CheckpointCorruptedError);
  });

  it('rejects a different schema version', () => {
    const sink = new MemoryCheckpointSink();
    const checkpoint = createCheckpoint(sampleState(), DEFAULT_CONFIG);
    const data = JSON.parse(serializeCheckpoint(checkpoint));
    data.metadata.schemaVersion = '0.9.0';
    sink.write('old', JSON.stringify(data));

    const error = captureError(() => loadCheckpoint(sink, 'old'));

    expect(error).toBeInstanceOf(CheckpointSchemaError);
    expect(error instanceof CheckpointSchemaError ? error.issues : []).toEqual([
      `schemaVersion: expected ${SCHEMA_VERSION}, got 0.9.0`,
    ]);
  });

  it('rejects data without metadata', () => {
    const error = captureError(() => validateCheckpointData({ state: {} }));

    expect(error instanceof CheckpointSchemaError ? error.issues : []).toEqual([
      `schemaVersion: expected ${SCHEMA_VERSION}, got none`,
    ]);
  });

  it('rejects a checkpoint whose state has the wrong shape', () => {
    const checkpoint = createCheckpoint(sampleState(), DEFAULT_CONFIG);
    const data = JSON.parse(serializeCheckpoint(checkpoint));
    data.state.tick = -1;

    expect(() => validateCheckpointData(data, 'bad-tick')).toThrow(CheckpointSchemaError);
  });

  it('rejects a checkpoint whose relationships dangle', () => {
    const checkpoint = createCheckpoint(sampleState(), DEFAULT_CONFIG);
    const data = JSON.parse(serializeCheckpoint(checkpoint));
    data.state.relationships[0].targetId = 'C009';

    expect(() => validateCheckpointData(data)).toThrow(CheckpointSchemaError);
  });
});

describe('checkpoint keys', () => {
  it('accepts plain names and rejects path-like ones', () => {
    expect(() => assertCheckpointKey('auto-00000010')).not.toThrow();
    expect(() => assertCheckpointKey('run_1.final')).not.toThrow();
    expect(() => assertCheckpointKey('../escape')).toThrow(ConfigurationError);
    expect(() => assertCheckpointKey('a/b')).toThrow(ConfigurationError);
    expect(() => assertCheckpointKey('')).toThrow(ConfigurationError);
  });

  it('the memory sink validates keys on write', () => {
    expect(() => new MemoryCheckpointSink().write('.hidden', '{}')).toThrow(ConfigurationError);
  });
});

describe('MemoryCheckpointSink', () => {
  it('lists keys in sorted order and removes them', () => {
    const sink = new MemoryCheckpointSink();
    sink.write('b', '1');
    sink.write('a', '2');

    expect(sink.list()).toEqual(['a', 'b']);
    expect(sink.remove('a')).toBe(true);
    expect(sink.remove('a')).toBe(false);
    expect(sink.exists('b')).toBe(true);
    expect(sink.read('a')).toBeNull();
  });
});

describe('FileCheckpointSink', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'dialectic-cp-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('writes one JSON file per key', () => {
    const sink = new FileCheckpointSink(directory);
    sink.write('cp-2', '{}');
    sink.write('cp-1', '{}');

    expect(fs.readdirSync(directory).sort()).toEqual(['cp-1.json', 'cp-2.json']);
    expect(sink.list()).toEqual(['cp-1', 'cp-2']);
    expect(sink.read('cp-1')).toBe('{}');
    expect(sink.read('cp-3')).toBeNull();
  });

  it('removes files', () => {
    const sink = new FileCheckpointSink(directory);
    sink.write('cp', '{}');

    expect(sink.remove('cp')).toBe(true);
    expect(sink.exists('cp')).toBe(false);
    expect(sink.remove('cp')).toBe(false);
  });

  it('creates the directory when missing', () => {
    const nested = path.join(directory, 'a', 'b');
    new FileCheckpointSink(nested);

    expect(fs.existsSync(nested)).toBe(true);
  });

  it('round-trips a checkpoint through disk', () => {
    const sink = new FileCheckpointSink(directory);
    const state = sampleState();
    saveCheckpoint(sink, 'disk', createCheckpoint(state, { ...DEFAULT_CONFIG, seed: 99 }));

    const loaded = loadCheckpoint(new FileCheckpointSink(directory), 'disk');

    expect(worldStatesEqual(loaded.state, state)).toBe(true);
    expect(loaded.config.seed).toBe(99);
  });

  it('rejects keys that would leave the directory', () => {
    const sink = new FileCheckpointSink(directory);

    expect(() => sink.write('../outside', '{}')).toThrow(ConfigurationError);
  });
});
