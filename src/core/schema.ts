/**
 * Runtime schemas
 * zod definitions for world-state input, coefficients and checkpoints
 */

import { z } from 'zod';
import type {
  Coefficients,
  Economy,
  Entity,
  Relationship,
  SimEvent,
  SimulationConfig,
} from './types.js';

export const SOCIAL_CLASS_ID = /^C[0-9]{3}$/;
export const TERRITORY_ID = /^T[0-9]{3}$/;

const probability = z.number().min(0).max(1);
const nonNegative = z.number().finite().min(0);

// ============================================================================
// Entities
// ============================================================================

const IdeologySchema = z.object({
  classConsciousness: probability,
  nationalIdentity: probability,
  agitation: nonNegative,
});

const SocialClassSchema = z.object({
  kind: z.literal('social_class'),
  id: z.string().regex(SOCIAL_CLASS_ID, 'social class id must match C###'),
  name: z.string(),
  role: z.enum([
    'periphery_proletariat',
    'comprador_bourgeoisie',
    'core_bourgeoisie',
    'labor_aristocracy',
    'internal_proletariat',
    'carceral_enforcer',
  ]),
  wealth: nonNegative,
  ideology: IdeologySchema,
  pAcquiescence: probability,
  pRevolution: probability,
  subsistenceThreshold: nonNegative,
  organization: probability,
  repressionFaced: probability,
  active: z.boolean(),
  sBio: nonNegative,
  sClass: nonNegative,
  subsistenceMultiplier: z.number().finite().positive(),
  population: z.number().finite().min(1),
  wagesReceived: nonNegative,
});

const TerritorySchema = z.object({
  kind: z.literal('territory'),
  id: z.string().regex(TERRITORY_ID, 'territory id must match T###'),
  name: z.string(),
  sectorType: z.enum(['industrial', 'residential', 'agricultural', 'commercial', 'university', 'docks']),
  profile: z.enum(['low', 'high']),
  heat: probability,
  rentLevel: nonNegative,
  population: nonNegative,
  biocapacity: nonNegative,
  maxBiocapacity: nonNegative,
  regenerationRate: probability,
  extractionIntensity: probability,
  underEviction: z.boolean(),
  active: z.boolean(),
});

export const EntitySchema: z.ZodType<Entity> = z.discriminatedUnion('kind', [
  SocialClassSchema,
  TerritorySchema,
]);

export const RelationshipSchema: z.ZodType<Relationship> = z.object({
  sourceId: z.string().min(1),
  targetId: z.string().min(1),
  kind: z.enum(['exploitation', 'tribute', 'wages', 'client_state', 'solidarity', 'tenancy', 'adjacency']),
  valueFlow: nonNegative,
  tension: probability,
  description: z.string(),
  solidarityStrength: probability,
  subsidyCap: nonNegative,
});

export const EconomySchema: z.ZodType<Economy> = z.object({
  imperialRentPool: nonNegative,
  initialRentPool: nonNegative,
  currentSuperWageRate: probability,
  repressionLevel: probability,
  overshootRatio: nonNegative,
  decompositionOccurred: z.boolean(),
  terminalDecision: z.enum(['none', 'revolution', 'genocide']),
});

const EventValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const EventTypeSchema = z.enum([
  'surplus_extraction',
  'imperial_subsidy',
  'economic_crisis',
  'consciousness_transmission',
  'mass_awakening',
  'excessive_force',
  'uprising',
  'solidarity_spike',
  'power_vacuum',
  'rupture',
  'entity_death',
  'eviction',
  'class_decomposition',
  'control_ratio_crisis',
  'terminal_decision',
  'ecological_overshoot',
]);

export const EventSchema: z.ZodType<SimEvent> = z.object({
  type: EventTypeSchema,
  tick: z.number().int().min(0),
  payload: z.record(EventValueSchema),
  timestamp: z.number(),
});

export const RNGStateSchema = z.object({
  s0: z.number().int().min(0),
  s1: z.number().int().min(0),
});

/**
 * Construction input: entities arrive as a list so that id collisions are
 * detectable before they are keyed.
 */
export const WorldStateInputSchema = z.object({
  tick: z.number().int().min(0),
  entities: z.array(EntitySchema),
  relationships: z.array(RelationshipSchema),
  economy: EconomySchema,
  events: z.array(EventSchema),
  eventLog: z.array(z.string()),
  rngState: RNGStateSchema,
});

/**
 * Serialized snapshot: entities keyed by id
 */
export const WorldStateDataSchema = z.object({
  tick: z.number().int().min(0),
  entities: z.record(EntitySchema),
  relationships: z.array(RelationshipSchema),
  economy: EconomySchema,
  events: z.array(EventSchema),
  eventLog: z.array(z.string()),
  rngState: RNGStateSchema,
});

// ============================================================================
// Configuration
// ============================================================================

export const SimulationConfigSchema: z.ZodType<SimulationConfig> = z.object({
  seed: z.number().int(),
  weeksPerYear: z.number().int().positive(),
  maxHistoryDepth: z.number().int().positive(),
  observerTimeoutMs: z.number().int().positive(),
  rethrowObserverErrors: z.boolean(),
  eventLogLimit: z.number().int().min(0),
});

const rate = probability;
const positive = z.number().finite().positive();

export const CoefficientsSchema: z.ZodType<Coefficients> = z.object({
  economy: z.object({
    extractionEfficiency: rate,
    compradorCut: rate,
    superWageRate: rate,
    initialRentPool: nonNegative,
    poolHighThreshold: nonNegative,
    poolLowThreshold: nonNegative,
    poolCriticalThreshold: nonNegative,
    minWageRate: rate,
    maxWageRate: rate,
    subsidyConversionRate: rate,
    subsidyTriggerThreshold: nonNegative,
    baseSubsistence: nonNegative,
    baseLaborPower: nonNegative,
  }),
  survival: z.object({
    steepnessK: positive,
    defaultSubsistence: nonNegative,
    defaultOrganization: rate,
    defaultRepression: rate,
  }),
  solidarity: z.object({
    activationThreshold: rate,
    massAwakeningThreshold: rate,
    negligibleTransmission: nonNegative,
  }),
  behavioral: z.object({
    lossAversionLambda: positive,
  }),
  tension: z.object({
    accumulationRate: rate,
    solidarityDampening: rate,
  }),
  consciousness: z.object({
    agitationDecay: rate,
    routingScale: rate,
  }),
  territory: z.object({
    heatDecayRate: rate,
    highProfileHeatGain: rate,
    evictionHeatThreshold: rate,
    rentSpikeMultiplier: positive,
    maxRentLevel: positive,
    displacementRate: rate,
    heatSpilloverRate: rate,
  }),
  struggle: z.object({
    sparkProbabilityScale: rate,
    resistanceThreshold: nonNegative,
    wealthDestructionRate: rate,
    solidarityGainPerUprising: rate,
  }),
  metabolism: z.object({
    entropyFactor: positive,
  }),
  control: z.object({
    prisonersPerEnforcer: positive,
    enforcerFraction: rate,
    revolutionOrganizationThreshold: rate,
  }),
});

// ============================================================================
// Checkpoints
// ============================================================================

export const CheckpointMetadataSchema = z.object({
  createdAt: z.string().datetime(),
  tick: z.number().int().min(0),
  description: z.string(),
  schemaVersion: z.string(),
});

export const CheckpointSchema = z.object({
  metadata: CheckpointMetadataSchema,
  state: WorldStateDataSchema,
  config: SimulationConfigSchema,
});

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
