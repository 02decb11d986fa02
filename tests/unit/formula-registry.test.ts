/**
 * Formula Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { FormulaRegistry } from '../../src/core/formula-registry.js';
import { FORMULA_NAMES, imperialRent } from '../../src/core/formulas.js';
import { NotFoundError } from '../../src/core/errors.js';

describe('FormulaRegistry', () => {
  it('withDefaults registers every known formula', () => {
    const registry = FormulaRegistry.withDefaults();

    expect(registry.list()).toEqual([...FORMULA_NAMES].sort());
    expect(registry.get('imperialRent')).toBe(imperialRent);
  });

  it('an empty registry throws NotFoundError on lookup', () => {
    const registry = new FormulaRegistry();

    expect(() => registry.get('imperialRent')).toThrow(NotFoundError);
    expect(registry.tryGet('imperialRent')).toBeUndefined();
    expect(registry.list()).toEqual([]);
  });

  it('register replaces a formula', () => {
    const registry = FormulaRegistry.withDefaults();
    registry.register('imperialRent', () => 42);

    expect(registry.get('imperialRent')(0.8, 1, 0)).toBe(42);
  });

  it('unregister removes a formula', () => {
    const registry = FormulaRegistry.withDefaults();

    expect(registry.unregister('overshootRatio')).toBe(true);
    expect(registry.unregister('overshootRatio')).toBe(false);
    expect(registry.has('overshootRatio')).toBe(false);
  });

  it('has rejects unknown names', () => {
    expect(FormulaRegistry.withDefaults().has('notAFormula')).toBe(false);
  });

  it('registries are independent', () => {
    const a = FormulaRegistry.withDefaults();
    const b = FormulaRegistry.withDefaults();
    a.register('valueTransfer', () => -1);

    expect(b.get('valueTransfer')(100, 2)).toBe(50);
  });
});
