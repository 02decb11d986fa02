/**
 * Core types for the dialectic simulation
 * Canonical data structures shared by the engine, systems and observers
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type EntityId = string;
export type RelationshipKey = string; // `${sourceId}->${targetId}:${kind}`

/**
 * Recursively readonly view of a value. Committed world states are exposed
 * through this type and are frozen at runtime as well.
 */
export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

// ============================================================================
// Entities
// ============================================================================

export type SocialRole =
  | 'periphery_proletariat'
  | 'comprador_bourgeoisie'
  | 'core_bourgeoisie'
  | 'labor_aristocracy'
  | 'internal_proletariat'
  | 'carceral_enforcer';

export type SectorType =
  | 'industrial'
  | 'residential'
  | 'agricultural'
  | 'commercial'
  | 'university'
  | 'docks';

export type TerritoryProfile = 'low' | 'high';

/**
 * Multi-axis ideology of a social class
 */
export interface IdeologicalProfile {
  classConsciousness: number; // 0 = false consciousness, 1 = revolutionary
  nationalIdentity: number; // 0 = internationalist, 1 = chauvinist
  agitation: number; // unbounded political energy from crisis, >= 0
}

export interface SocialClass {
  kind: 'social_class';
  id: EntityId;
  name: string;
  role: SocialRole;
  wealth: number;
  ideology: IdeologicalProfile;
  pAcquiescence: number; // P(S|A)
  pRevolution: number; // P(S|R)
  subsistenceThreshold: number;
  organization: number;
  repressionFaced: number;
  active: boolean;
  sBio: number; // biological consumption per tick
  sClass: number; // class-reproduction consumption per tick
  subsistenceMultiplier: number;
  population: number;
  wagesReceived: number; // wages observed on the previous tick
}

export interface Territory {
  kind: 'territory';
  id: EntityId;
  name: string;
  sectorType: SectorType;
  profile: TerritoryProfile;
  heat: number;
  rentLevel: number;
  population: number;
  biocapacity: number;
  maxBiocapacity: number;
  regenerationRate: number;
  extractionIntensity: number;
  underEviction: boolean;
  active: boolean;
}

export type Entity = SocialClass | Territory;
export type EntityKind = Entity['kind'];

// ============================================================================
// Relationships
// ============================================================================

export type RelationshipKind =
  | 'exploitation'
  | 'tribute'
  | 'wages'
  | 'client_state'
  | 'solidarity'
  | 'tenancy'
  | 'adjacency';

export interface Relationship {
  sourceId: EntityId;
  targetId: EntityId;
  kind: RelationshipKind;
  valueFlow: number; // >= 0
  tension: number; // [0, 1]
  description: string;
  solidarityStrength: number; // [0, 1], only meaningful on solidarity edges
  subsidyCap: number; // only meaningful on client_state edges
}

// ============================================================================
// Economy
// ============================================================================

export type TerminalDecision = 'none' | 'revolution' | 'genocide';

export interface Economy {
  imperialRentPool: number;
  initialRentPool: number;
  currentSuperWageRate: number;
  repressionLevel: number;
  overshootRatio: number;
  decompositionOccurred: boolean;
  terminalDecision: TerminalDecision;
}

// ============================================================================
// Events
// ============================================================================

export type EventType =
  | 'surplus_extraction'
  | 'imperial_subsidy'
  | 'economic_crisis'
  | 'consciousness_transmission'
  | 'mass_awakening'
  | 'excessive_force'
  | 'uprising'
  | 'solidarity_spike'
  | 'power_vacuum'
  | 'rupture'
  | 'entity_death'
  | 'eviction'
  | 'class_decomposition'
  | 'control_ratio_crisis'
  | 'terminal_decision'
  | 'ecological_overshoot';

export type EventValue = string | number | boolean | null;
export type EventPayload = Readonly<Record<string, EventValue>>;

export interface SimEvent {
  readonly type: EventType;
  readonly tick: number;
  readonly payload: EventPayload;
  readonly timestamp: number; // ms since epoch, ignored by equality
}

// ============================================================================
// World State
// ============================================================================

export interface RNGState {
  s0: number;
  s1: number;
}

/**
 * Plain (mutable) shape of a world snapshot, used for construction input
 * and for serialization.
 */
export interface WorldStateData {
  tick: number;
  entities: Record<EntityId, Entity>;
  relationships: Relationship[];
  economy: Economy;
  events: SimEvent[];
  eventLog: string[];
  rngState: RNGState;
}

/**
 * Committed, immutable snapshot of the world at one tick
 */
export type WorldState = DeepReadonly<WorldStateData>;

// ============================================================================
// Configuration
// ============================================================================

export interface SimulationConfig {
  seed: number;
  weeksPerYear: number;
  maxHistoryDepth: number;
  observerTimeoutMs: number;
  rethrowObserverErrors: boolean;
  eventLogLimit: number; // 0 = unlimited
}

// ============================================================================
// Coefficients (tunable, frozen per run)
// ============================================================================

export interface EconomyCoefficients {
  extractionEfficiency: number;
  compradorCut: number;
  superWageRate: number;
  initialRentPool: number;
  poolHighThreshold: number;
  poolLowThreshold: number;
  poolCriticalThreshold: number;
  minWageRate: number;
  maxWageRate: number;
  subsidyConversionRate: number;
  subsidyTriggerThreshold: number;
  baseSubsistence: number;
  baseLaborPower: number;
}

export interface SurvivalCoefficients {
  steepnessK: number;
  defaultSubsistence: number;
  defaultOrganization: number;
  defaultRepression: number;
}

export interface SolidarityCoefficients {
  activationThreshold: number;
  massAwakeningThreshold: number;
  negligibleTransmission: number;
}

export interface BehavioralCoefficients {
  lossAversionLambda: number;
}

export interface TensionCoefficients {
  accumulationRate: number;
  solidarityDampening: number;
}

export interface ConsciousnessCoefficients {
  agitationDecay: number;
  routingScale: number;
}

export interface TerritoryCoefficients {
  heatDecayRate: number;
  highProfileHeatGain: number;
  evictionHeatThreshold: number;
  rentSpikeMultiplier: number;
  maxRentLevel: number;
  displacementRate: number;
  heatSpilloverRate: number;
}

export interface StruggleCoefficients {
  sparkProbabilityScale: number;
  resistanceThreshold: number;
  wealthDestructionRate: number;
  solidarityGainPerUprising: number;
}

export interface MetabolismCoefficients {
  entropyFactor: number;
}

export interface ControlCoefficients {
  prisonersPerEnforcer: number;
  enforcerFraction: number;
  revolutionOrganizationThreshold: number;
}

export interface Coefficients {
  economy: EconomyCoefficients;
  survival: SurvivalCoefficients;
  solidarity: SolidarityCoefficients;
  behavioral: BehavioralCoefficients;
  tension: TensionCoefficients;
  consciousness: ConsciousnessCoefficients;
  territory: TerritoryCoefficients;
  struggle: StruggleCoefficients;
  metabolism: MetabolismCoefficients;
  control: ControlCoefficients;
}

// ============================================================================
// Checkpoints
// ============================================================================

export interface CheckpointMetadata {
  createdAt: string; // ISO-8601
  tick: number;
  description: string;
  schemaVersion: string;
}

export interface Checkpoint {
  metadata: CheckpointMetadata;
  state: WorldState;
  config: SimulationConfig;
}
