/**
 * Formula Registry
 * Named, hot-swappable pure functions. Every ServiceContainer owns its own
 * registry, so swapping a formula in one run never leaks into another.
 */

import { DEFAULT_FORMULAS, FORMULA_NAMES, type FormulaName, type Formulas } from './formulas.js';
import { NotFoundError } from './errors.js';

export class FormulaRegistry {
  private readonly formulas: Formulas = { ...DEFAULT_FORMULAS };
  private readonly registered: Set<FormulaName> = new Set();

  /**
   * Registry pre-loaded with every default formula
   */
  static withDefaults(): FormulaRegistry {
    const registry = new FormulaRegistry();
    for (const name of FORMULA_NAMES) {
      registry.registered.add(name);
    }
    return registry;
  }

  /**
   * Register or replace a formula
   */
  register<K extends FormulaName>(name: K, fn: Formulas[K]): void {
    this.formulas[name] = fn;
    this.registered.add(name);
  }

  /**
   * Look up a formula; throws NotFoundError for unknown names
   */
  get<K extends FormulaName>(name: K): Formulas[K] {
    if (!this.registered.has(name)) {
      throw new NotFoundError('Formula', name);
    }
    return this.formulas[name];
  }

  /**
   * Option-style lookup for callers that expect absence
   */
  tryGet<K extends FormulaName>(name: K): Formulas[K] | undefined {
    return this.registered.has(name) ? this.formulas[name] : undefined;
  }

  has(name: string): boolean {
    return FORMULA_NAMES.some((known) => known === name && this.registered.has(known));
  }

  unregister(name: FormulaName): boolean {
    return this.registered.delete(name);
  }

  /**
   * Registered names, sorted
   */
  list(): FormulaName[] {
    return FORMULA_NAMES.filter((name) => this.registered.has(name)).sort();
  }
}
