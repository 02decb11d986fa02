/**
 * World state construction, validation and read-only views
 */

import type {
  DeepReadonly,
  Economy,
  Entity,
  EntityId,
  IdeologicalProfile,
  Relationship,
  RelationshipKind,
  RNGState,
  SimEvent,
  SimulationConfig,
  SocialClass,
  SocialRole,
  Territory,
  WorldState,
  WorldStateData,
} from './types.js';
import { ValidationError } from './errors.js';
import { SeededRNG } from './rng.js';
import { WorldStateInputSchema, formatIssues } from './schema.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: SimulationConfig = {
  seed: 12345,
  weeksPerYear: 52,
  maxHistoryDepth: 100,
  observerTimeoutMs: 2000,
  rethrowObserverErrors: false,
  eventLogLimit: 1000,
};

/**
 * Per-role consumption multipliers: richer classes burn more to reproduce
 * themselves
 */
export const ROLE_SUBSISTENCE_MULTIPLIERS: Record<SocialRole, number> = {
  periphery_proletariat: 1.5,
  internal_proletariat: 1.5,
  carceral_enforcer: 3,
  labor_aristocracy: 5,
  comprador_bourgeoisie: 10,
  core_bourgeoisie: 20,
};

export function createEconomy(overrides: Partial<Economy> = {}): Economy {
  return {
    imperialRentPool: 100,
    initialRentPool: 100,
    currentSuperWageRate: 0.2,
    repressionLevel: 0.5,
    overshootRatio: 0,
    decompositionOccurred: false,
    terminalDecision: 'none',
    ...overrides,
  };
}

// ============================================================================
// Entity / Relationship Factories
// ============================================================================

export type SocialClassInit = Pick<SocialClass, 'id' | 'name' | 'role'> &
  Partial<Omit<SocialClass, 'kind' | 'id' | 'name' | 'role' | 'ideology'>> & {
    ideology?: Partial<IdeologicalProfile>;
  };

export function createSocialClass(init: SocialClassInit): SocialClass {
  const { ideology, ...fields } = init;
  return {
    kind: 'social_class',
    wealth: 0,
    pAcquiescence: 0,
    pRevolution: 0,
    subsistenceThreshold: 0.3,
    organization: 0.1,
    repressionFaced: 0.5,
    active: true,
    sBio: 0.01,
    sClass: 0,
    subsistenceMultiplier: ROLE_SUBSISTENCE_MULTIPLIERS[init.role],
    population: 1,
    wagesReceived: 0,
    ...fields,
    ideology: {
      classConsciousness: 0,
      nationalIdentity: 0.5,
      agitation: 0,
      ...ideology,
    },
  };
}

export type TerritoryInit = Pick<Territory, 'id' | 'name'> &
  Partial<Omit<Territory, 'kind' | 'id' | 'name'>>;

export function createTerritory(init: TerritoryInit): Territory {
  return {
    kind: 'territory',
    sectorType: 'industrial',
    profile: 'low',
    heat: 0,
    rentLevel: 1,
    population: 0,
    biocapacity: 100,
    maxBiocapacity: 100,
    regenerationRate: 0.02,
    extractionIntensity: 0,
    underEviction: false,
    active: true,
    ...init,
  };
}

/**
 * Create a directed relationship. Self-loops are rejected immediately.
 */
export function createRelationship(
  sourceId: EntityId,
  targetId: EntityId,
  kind: RelationshipKind,
  fields: Partial<Omit<Relationship, 'sourceId' | 'targetId' | 'kind'>> = {}
): Relationship {
  if (sourceId === targetId) {
    throw new ValidationError([`relationship ${sourceId}->${targetId} is a self-loop`]);
  }
  return {
    sourceId,
    targetId,
    kind,
    valueFlow: 0,
    tension: 0,
    description: '',
    solidarityStrength: 0,
    subsidyCap: 0,
    ...fields,
  };
}

// ============================================================================
// WorldState Construction
// ============================================================================

export interface WorldStateInput {
  tick?: number;
  entities: ReadonlyArray<DeepReadonly<Entity>>;
  relationships?: ReadonlyArray<DeepReadonly<Relationship>>;
  economy?: Partial<DeepReadonly<Economy>>;
  events?: ReadonlyArray<SimEvent>;
  eventLog?: readonly string[];
  rngState?: RNGState;
  seed?: number;
}

/**
 * Validate input and build a frozen WorldState.
 * Throws ValidationError for out-of-range fields, malformed ids, duplicate
 * entity ids, dangling relationship endpoints and self-loops.
 */
export function createWorldState(input: WorldStateInput): WorldState {
  const parsed = WorldStateInputSchema.safeParse({
    tick: input.tick ?? 0,
    entities: input.entities,
    relationships: input.relationships ?? [],
    economy: { ...createEconomy(), ...input.economy },
    events: input.events ?? [],
    eventLog: input.eventLog ?? [],
    rngState: input.rngState ?? SeededRNG.stateFromSeed(input.seed ?? DEFAULT_CONFIG.seed),
  });

  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }

  const data = parsed.data;
  const issues: string[] = [];
  const entities: Record<EntityId, Entity> = {};

  for (const entity of data.entities) {
    if (Object.hasOwn(entities, entity.id)) {
      issues.push(`duplicate entity id: ${entity.id}`);
      continue;
    }
    entities[entity.id] = entity;
  }

  data.relationships.forEach((rel, index) => {
    if (rel.sourceId === rel.targetId) {
      issues.push(`relationships.${index}: self-loop on ${rel.sourceId}`);
    }
    if (!Object.hasOwn(entities, rel.sourceId)) {
      issues.push(`relationships.${index}: unknown source ${rel.sourceId}`);
    }
    if (!Object.hasOwn(entities, rel.targetId)) {
      issues.push(`relationships.${index}: unknown target ${rel.targetId}`);
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return freezeWorldState({
    tick: data.tick,
    entities,
    relationships: data.relationships,
    economy: data.economy,
    events: data.events,
    eventLog: data.eventLog,
    rngState: data.rngState,
  });
}

/**
 * Rebuild a WorldState from keyed snapshot data (checkpoint load, graph commit)
 */
export function worldStateFromData(data: DeepReadonly<WorldStateData>): WorldState {
  return createWorldState({
    tick: data.tick,
    entities: Object.values(data.entities),
    relationships: data.relationships,
    economy: data.economy,
    events: data.events,
    eventLog: data.eventLog,
    rngState: data.rngState,
  });
}

/**
 * Deep, mutable copy of a committed state (for serialization or editing)
 */
export function toWorldStateData(state: WorldState): WorldStateData {
  const entities: Record<EntityId, Entity> = {};
  for (const [id, entity] of Object.entries(state.entities)) {
    entities[id] = copyEntity(entity);
  }
  return {
    tick: state.tick,
    entities,
    relationships: state.relationships.map((rel) => ({ ...rel })),
    economy: { ...state.economy },
    events: state.events.map((event) => ({ ...event, payload: { ...event.payload } })),
    eventLog: [...state.eventLog],
    rngState: { ...state.rngState },
  };
}

export function copyEntity(entity: DeepReadonly<Entity>): Entity {
  if (entity.kind === 'social_class') {
    return { ...entity, ideology: { ...entity.ideology } };
  }
  return { ...entity };
}

function freezeDeep(value: unknown): void {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    freezeDeep(child);
  }
}

function freezeWorldState(data: WorldStateData): WorldState {
  freezeDeep(data);
  const state: WorldState = data;
  return state;
}

// ============================================================================
// Derived Views
// ============================================================================

export type ReadonlySocialClass = DeepReadonly<SocialClass>;
export type ReadonlyTerritory = DeepReadonly<Territory>;

export const CLASS_RELATION_KINDS: ReadonlySet<RelationshipKind> = new Set([
  'exploitation',
  'tribute',
  'wages',
  'client_state',
]);

export function getSocialClasses(state: WorldState): ReadonlySocialClass[] {
  return Object.values(state.entities).filter(
    (e): e is ReadonlySocialClass => e.kind === 'social_class'
  );
}

export function getTerritories(state: WorldState): ReadonlyTerritory[] {
  return Object.values(state.entities).filter(
    (e): e is ReadonlyTerritory => e.kind === 'territory'
  );
}

export function getActiveEntities(state: WorldState): Array<DeepReadonly<Entity>> {
  return Object.values(state.entities).filter((e) => e.active);
}

export function getEntityCount(state: WorldState): number {
  return Object.keys(state.entities).length;
}

export function getRelationshipsOfKind(
  state: WorldState,
  kind: RelationshipKind
): Array<DeepReadonly<Relationship>> {
  return state.relationships.filter((rel) => rel.kind === kind);
}

export function getTotalWealth(state: WorldState): number {
  return getSocialClasses(state)
    .filter((c) => c.active)
    .reduce((sum, c) => sum + c.wealth, 0);
}

/**
 * Mean tension over class relationships (exploitation, tribute, wages,
 * client state); 0 when there are none
 */
export function getAggregateTension(state: WorldState): number {
  const relations = state.relationships.filter((rel) => CLASS_RELATION_KINDS.has(rel.kind));
  if (relations.length === 0) return 0;
  return relations.reduce((sum, rel) => sum + rel.tension, 0) / relations.length;
}

// ============================================================================
// Structural Equality
// ============================================================================

/**
 * Canonical JSON with sorted keys and without event timestamps
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (key, v: unknown) => {
    if (key === 'timestamp') return undefined;
    if (v !== null && typeof v === 'object' && !Array.isArray(v)) {
      return Object.fromEntries(
        Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return v;
  });
}

export function worldStatesEqual(a: WorldState, b: WorldState): boolean {
  return canonicalJson(a) === canonicalJson(b);
}
