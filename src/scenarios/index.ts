/**
 * Scenario factories
 * Each returns the initial world, the config it should run under and the
 * coefficient set, ready to hand to `new Simulation(...)`.
 */

import type { Coefficients, DeepReadonly, SimulationConfig, WorldState } from '../core/types.js';
import { DEFAULT_CONFIG, createRelationship, createSocialClass, createTerritory, createWorldState } from '../core/world.js';
import { DEFAULT_COEFFICIENTS, resolveCoefficients } from '../core/coefficients.js';

export interface Scenario {
  state: WorldState;
  config: SimulationConfig;
  coefficients: DeepReadonly<Coefficients>;
}

export interface ScenarioOverrides {
  seed?: number;
  config?: Partial<SimulationConfig>;
  coefficients?: DeepReadonly<Coefficients>;
}

export type ScenarioFactory = (overrides?: ScenarioOverrides) => Scenario;

function resolveScenarioSettings(overrides: ScenarioOverrides): Pick<Scenario, 'config' | 'coefficients'> {
  const config = { ...DEFAULT_CONFIG, ...overrides.config };
  if (overrides.seed !== undefined) config.seed = overrides.seed;
  return {
    config,
    coefficients:
      overrides.coefficients === undefined ? DEFAULT_COEFFICIENTS : resolveCoefficients(overrides.coefficients),
  };
}

/**
 * Minimal extraction loop: a periphery worker and a core owner joined by a
 * single exploitation edge
 */
export function createTwoNodeScenario(overrides: ScenarioOverrides = {}): Scenario {
  const { config, coefficients } = resolveScenarioSettings(overrides);

  const worker = createSocialClass({
    id: 'C001',
    name: 'Periphery Worker',
    role: 'periphery_proletariat',
    wealth: 0.5,
    subsistenceThreshold: 0.3,
    organization: coefficients.survival.defaultOrganization,
    repressionFaced: coefficients.survival.defaultRepression,
  });

  const owner = createSocialClass({
    id: 'C002',
    name: 'Core Owner',
    role: 'core_bourgeoisie',
    wealth: 0.9,
    subsistenceThreshold: 0.1,
    organization: 0.8,
    repressionFaced: 0.1,
  });

  const state = createWorldState({
    entities: [worker, owner],
    relationships: [
      createRelationship('C001', 'C002', 'exploitation', {
        valueFlow: 0.2,
        tension: 0.3,
        description: 'Surplus extraction from periphery labour',
      }),
    ],
    economy: {
      imperialRentPool: coefficients.economy.initialRentPool,
      initialRentPool: coefficients.economy.initialRentPool,
      currentSuperWageRate: coefficients.economy.superWageRate,
    },
    seed: config.seed,
  });

  return { state, config, coefficients };
}

/**
 * The full imperial circuit: periphery worker, comprador, core bourgeoisie
 * and labor aristocracy, with two tenanted territories
 */
export function createImperialCircuitScenario(overrides: ScenarioOverrides = {}): Scenario {
  const { config, coefficients } = resolveScenarioSettings(overrides);

  const worker = createSocialClass({
    id: 'C001',
    name: 'Periphery Proletariat',
    role: 'periphery_proletariat',
    wealth: 0.5,
    population: 10,
    subsistenceThreshold: 0.3,
    organization: 0.2,
    repressionFaced: 0.5,
    ideology: { classConsciousness: 0.3, nationalIdentity: 0.2 },
  });

  const comprador = createSocialClass({
    id: 'C002',
    name: 'Comprador Bourgeoisie',
    role: 'comprador_bourgeoisie',
    wealth: 0.4,
    population: 2,
    subsistenceThreshold: 0.02,
    organization: 0.5,
    repressionFaced: 0.2,
    ideology: { classConsciousness: 0.1, nationalIdentity: 0.6 },
  });

  const core = createSocialClass({
    id: 'C003',
    name: 'Core Bourgeoisie',
    role: 'core_bourgeoisie',
    wealth: 2.0,
    population: 1,
    subsistenceThreshold: 0.1,
    organization: 0.8,
    repressionFaced: 0.1,
    ideology: { classConsciousness: 0.1, nationalIdentity: 0.4 },
  });

  const aristocracy = createSocialClass({
    id: 'C004',
    name: 'Labor Aristocracy',
    role: 'labor_aristocracy',
    wealth: 0.6,
    population: 10,
    subsistenceThreshold: 0.2,
    organization: 0.3,
    repressionFaced: 0.3,
    ideology: { classConsciousness: 0.4, nationalIdentity: 0.3 },
  });

  const periphery = createTerritory({
    id: 'T001',
    name: 'Periphery Farmland',
    sectorType: 'agricultural',
    profile: 'low',
    population: 500,
    biocapacity: 80,
    maxBiocapacity: 100,
  });

  const metropole = createTerritory({
    id: 'T002',
    name: 'Metropole Residential',
    sectorType: 'residential',
    profile: 'high',
    rentLevel: 2,
    population: 300,
    biocapacity: 40,
    maxBiocapacity: 50,
  });

  const state = createWorldState({
    entities: [worker, comprador, core, aristocracy, periphery, metropole],
    relationships: [
      createRelationship('C001', 'C002', 'exploitation', { valueFlow: 0.2, tension: 0.2 }),
      createRelationship('C002', 'C003', 'tribute', { tension: 0.1 }),
      createRelationship('C003', 'C004', 'wages', { tension: 0.1 }),
      createRelationship('C003', 'C002', 'client_state', { subsidyCap: 0.1 }),
      createRelationship('C004', 'C001', 'solidarity', { solidarityStrength: 0.2 }),
      createRelationship('C001', 'T001', 'tenancy'),
      createRelationship('C004', 'T002', 'tenancy'),
      createRelationship('T002', 'T001', 'adjacency'),
    ],
    economy: {
      imperialRentPool: coefficients.economy.initialRentPool,
      initialRentPool: coefficients.economy.initialRentPool,
      currentSuperWageRate: coefficients.economy.superWageRate,
    },
    seed: config.seed,
  });

  return { state, config, coefficients };
}

export const SCENARIOS: Readonly<Record<string, ScenarioFactory>> = Object.freeze({
  'two-node': createTwoNodeScenario,
  imperial: createImperialCircuitScenario,
});

export function getScenario(name: string): ScenarioFactory | undefined {
  return Object.hasOwn(SCENARIOS, name) ? SCENARIOS[name] : undefined;
}
