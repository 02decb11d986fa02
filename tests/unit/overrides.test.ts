/**
 * Coefficient Overrides Tests
 * Each test works on its own overrides file in a temp directory
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  addOverride,
  applyOverrides,
  clearOverrides,
  getCoefficient,
  loadOverrides,
  removeOverride,
} from '../../src/config/overrides.js';
import { DEFAULT_COEFFICIENTS } from '../../src/core/coefficients.js';
import { ConfigurationError } from '../../src/core/errors.js';

let directory: string;
let file: string;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  directory = fs.mkdtempSync(path.join(os.tmpdir(), 'dialectic-overrides-'));
  file = path.join(directory, 'coefficient-overrides.json');
});

afterEach(() => {
  fs.rmSync(directory, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('loadOverrides', () => {
  it('returns an empty set when the file is missing', () => {
    const data = loadOverrides(file);

    expect(data.version).toBe(1);
    expect(data.overrides).toEqual([]);
  });

  it('returns an empty set for a malformed file', () => {
    fs.writeFileSync(file, '{"version": "one"}');

    expect(loadOverrides(file).overrides).toEqual([]);
  });

  it('returns an empty set for a file that is not JSON', () => {
    fs.writeFileSync(file, 'not json');

    expect(loadOverrides(file).overrides).toEqual([]);
  });
});

describe('addOverride', () => {
  it('records the old value from the defaults', () => {
    expect(addOverride({ path: 'economy.extractionEfficiency', newValue: 0.9, source: 'test' }, file)).toBe(true);

    const [override] = loadOverrides(file).overrides;
    expect(override.path).toBe('economy.extractionEfficiency');
    expect(override.oldValue).toBe(0.8);
    expect(override.newValue).toBe(0.9);
    expect(override.source).toBe('test');
  });

  it('replaces an earlier override for the same path', () => {
    addOverride({ path: 'survival.steepnessK', newValue: 12, source: 'test' }, file);
    addOverride({ path: 'survival.steepnessK', newValue: 8, source: 'test' }, file);

    const overrides = loadOverrides(file).overrides;
    expect(overrides).toHaveLength(1);
    expect(overrides[0].newValue).toBe(8);
  });

  it('rejects unknown paths without touching the file', () => {
    expect(addOverride({ path: 'economy.missing', newValue: 1, source: 'test' }, file)).toBe(false);
    expect(addOverride({ path: 'economy', newValue: 1, source: 'test' }, file)).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });
});

describe('removeOverride and clearOverrides', () => {
  it('removes a single path', () => {
    addOverride({ path: 'survival.steepnessK', newValue: 12, source: 'test' }, file);
    addOverride({ path: 'behavioral.lossAversionLambda', newValue: 2, source: 'test' }, file);

    expect(removeOverride('survival.steepnessK', file)).toBe(true);
    expect(removeOverride('survival.steepnessK', file)).toBe(false);
    expect(loadOverrides(file).overrides.map((o) => o.path)).toEqual(['behavioral.lossAversionLambda']);
  });

  it('clears every override', () => {
    addOverride({ path: 'survival.steepnessK', newValue: 12, source: 'test' }, file);

    expect(clearOverrides(file)).toBe(true);
    expect(loadOverrides(file).overrides).toEqual([]);
  });
});

describe('applyOverrides', () => {
  it('patches a copy of the base coefficients', () => {
    addOverride({ path: 'survival.steepnessK', newValue: 12, source: 'test' }, file);

    const coefficients = applyOverrides(DEFAULT_COEFFICIENTS, loadOverrides(file).overrides);

    expect(coefficients.survival.steepnessK).toBe(12);
    expect(DEFAULT_COEFFICIENTS.survival.steepnessK).toBe(10);
    expect(Object.isFrozen(coefficients.survival)).toBe(true);
  });

  it('skips overrides whose path no longer exists', () => {
    const coefficients = applyOverrides(DEFAULT_COEFFICIENTS, [
      { path: 'economy.retired', oldValue: null, newValue: 1, appliedAt: '', source: 'test' },
    ]);

    expect(coefficients).toEqual(DEFAULT_COEFFICIENTS);
  });

  it('throws ConfigurationError when a value leaves its range', () => {
    expect(() =>
      applyOverrides(DEFAULT_COEFFICIENTS, [
        { path: 'economy.extractionEfficiency', oldValue: 0.8, newValue: 1.5, appliedAt: '', source: 'test' },
      ])
    ).toThrow(ConfigurationError);
  });
});

describe('getCoefficient', () => {
  it('reads dotted paths', () => {
    expect(getCoefficient(DEFAULT_COEFFICIENTS, 'control.prisonersPerEnforcer')).toBe(20);
    expect(getCoefficient(DEFAULT_COEFFICIENTS, 'control')).toBeUndefined();
    expect(getCoefficient(DEFAULT_COEFFICIENTS, 'control.prisonersPerEnforcer.deeper')).toBeUndefined();
  });
});
