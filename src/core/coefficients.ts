/**
 * Coefficients
 * Default tunable parameters, grouped by the system that reads them
 */

import type { Coefficients, DeepReadonly } from './types.js';
import { ConfigurationError } from './errors.js';
import { CoefficientsSchema, formatIssues } from './schema.js';

export const DEFAULT_COEFFICIENTS: DeepReadonly<Coefficients> = deepFreeze({
  economy: {
    extractionEfficiency: 0.8,
    compradorCut: 0.15,
    superWageRate: 0.2,
    initialRentPool: 100,
    poolHighThreshold: 0.7,
    poolLowThreshold: 0.3,
    poolCriticalThreshold: 0.1,
    minWageRate: 0.05,
    maxWageRate: 0.35,
    subsidyConversionRate: 0.1,
    subsidyTriggerThreshold: 0.8,
    baseSubsistence: 0.0005,
    baseLaborPower: 1.0,
  },
  survival: {
    steepnessK: 10,
    defaultSubsistence: 0.3,
    defaultOrganization: 0.1,
    defaultRepression: 0.5,
  },
  solidarity: {
    activationThreshold: 0.3,
    massAwakeningThreshold: 0.6,
    negligibleTransmission: 0.01,
  },
  behavioral: {
    lossAversionLambda: 2.25,
  },
  tension: {
    accumulationRate: 0.05,
    solidarityDampening: 0.5,
  },
  consciousness: {
    agitationDecay: 0.1,
    routingScale: 0.1,
  },
  territory: {
    heatDecayRate: 0.1,
    highProfileHeatGain: 0.15,
    evictionHeatThreshold: 0.8,
    rentSpikeMultiplier: 1.5,
    maxRentLevel: 10,
    displacementRate: 0.1,
    heatSpilloverRate: 0.05,
  },
  struggle: {
    sparkProbabilityScale: 0.1,
    resistanceThreshold: 0.1,
    wealthDestructionRate: 0.05,
    solidarityGainPerUprising: 0.2,
  },
  metabolism: {
    entropyFactor: 1.2,
  },
  control: {
    prisonersPerEnforcer: 20,
    enforcerFraction: 0.3,
    revolutionOrganizationThreshold: 0.5,
  },
});

function deepFreeze(coefficients: Coefficients): DeepReadonly<Coefficients> {
  for (const group of Object.values(coefficients)) {
    Object.freeze(group);
  }
  return Object.freeze(coefficients);
}

/**
 * Plain, mutable copy of a coefficient set (for applying overrides)
 */
export function cloneCoefficients(source: DeepReadonly<Coefficients> = DEFAULT_COEFFICIENTS): Coefficients {
  return {
    economy: { ...source.economy },
    survival: { ...source.survival },
    solidarity: { ...source.solidarity },
    behavioral: { ...source.behavioral },
    tension: { ...source.tension },
    consciousness: { ...source.consciousness },
    territory: { ...source.territory },
    struggle: { ...source.struggle },
    metabolism: { ...source.metabolism },
    control: { ...source.control },
  };
}

/**
 * Validate an arbitrary value as a coefficient set and freeze it.
 * Throws ConfigurationError when a value is missing or out of range.
 */
export function resolveCoefficients(candidate: unknown): DeepReadonly<Coefficients> {
  const parsed = CoefficientsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid coefficients: ${formatIssues(parsed.error).join('; ')}`);
  }
  return deepFreeze(parsed.data);
}
