/**
 * Service Container
 * Per-simulation bundle of config, coefficients, event bus, formula registry
 * and optional database. Nothing here is shared between containers.
 */

import type { Coefficients, DeepReadonly, SimulationConfig } from './types.js';
import type { FormulaName, Formulas } from './formulas.js';
import type { SimulationDatabase } from '../storage/database.js';
import { DEFAULT_CONFIG } from './world.js';
import { DEFAULT_COEFFICIENTS, resolveCoefficients } from './coefficients.js';
import { EventBus, type Clock } from './events.js';
import { FormulaRegistry } from './formula-registry.js';
import { ConfigurationError } from './errors.js';
import { SimulationConfigSchema, formatIssues } from './schema.js';

export interface ServiceOptions {
  config?: Partial<SimulationConfig>;
  coefficients?: DeepReadonly<Coefficients>;
  formulas?: FormulaRegistry;
  database?: SimulationDatabase | null;
  clock?: Clock;
}

export class ServiceContainer {
  readonly config: Readonly<SimulationConfig>;
  readonly coefficients: DeepReadonly<Coefficients>;
  readonly eventBus: EventBus;
  readonly formulas: FormulaRegistry;
  readonly database: SimulationDatabase | null;

  private constructor(
    config: Readonly<SimulationConfig>,
    coefficients: DeepReadonly<Coefficients>,
    eventBus: EventBus,
    formulas: FormulaRegistry,
    database: SimulationDatabase | null
  ) {
    this.config = config;
    this.coefficients = coefficients;
    this.eventBus = eventBus;
    this.formulas = formulas;
    this.database = database;
  }

  /**
   * Build an independent container. Config and coefficients are validated;
   * each call gets a fresh bus and (unless given) a fresh default registry.
   */
  static create(options: ServiceOptions = {}): ServiceContainer {
    const config = resolveConfig(options.config);
    const coefficients =
      options.coefficients === undefined ? DEFAULT_COEFFICIENTS : resolveCoefficients(options.coefficients);

    return new ServiceContainer(
      config,
      coefficients,
      new EventBus(options.clock),
      options.formulas ?? FormulaRegistry.withDefaults(),
      options.database ?? null
    );
  }

  /**
   * Formula lookup for systems: a missing formula is a configuration fault
   */
  requireFormula<K extends FormulaName>(name: K): Formulas[K] {
    const fn = this.formulas.tryGet(name);
    if (fn === undefined) {
      throw new ConfigurationError(`Formula not registered: ${name}`);
    }
    return fn;
  }
}

/**
 * Merge a partial config over the defaults and validate it
 */
export function resolveConfig(partial: Partial<SimulationConfig> = {}): Readonly<SimulationConfig> {
  const merged = { ...DEFAULT_CONFIG, ...partial };
  const parsed = SimulationConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid simulation config: ${formatIssues(parsed.error).join('; ')}`);
  }
  return Object.freeze(parsed.data);
}
