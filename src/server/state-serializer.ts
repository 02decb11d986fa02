/**
 * State Serializer
 * Converts world states to JSON-serializable snapshots for API and WebSocket clients
 */

import type {
  EventPayload,
  EventType,
  RelationshipKind,
  SectorType,
  SocialRole,
  TerritoryProfile,
  WorldState,
} from '../core/types.js';
import { getAggregateTension, getSocialClasses, getTerritories, getTotalWealth } from '../core/world.js';

export interface SocialClassSnapshot {
  id: string;
  name: string;
  role: SocialRole;
  active: boolean;
  wealth: number;
  population: number;
  organization: number;
  repressionFaced: number;
  pAcquiescence: number;
  pRevolution: number;
  ideology: {
    classConsciousness: number;
    nationalIdentity: number;
    agitation: number;
  };
}

export interface TerritorySnapshot {
  id: string;
  name: string;
  sectorType: SectorType;
  profile: TerritoryProfile;
  active: boolean;
  heat: number;
  rentLevel: number;
  population: number;
  biocapacity: number;
  maxBiocapacity: number;
  underEviction: boolean;
}

export interface RelationshipSnapshot {
  sourceId: string;
  targetId: string;
  kind: RelationshipKind;
  valueFlow: number;
  tension: number;
  solidarityStrength: number;
}

export interface EventSnapshot {
  type: EventType;
  tick: number;
  payload: EventPayload;
}

export interface WorldSnapshot {
  tick: number;
  totals: {
    wealth: number;
    aggregateTension: number;
    activeClasses: number;
  };
  economy: {
    imperialRentPool: number;
    currentSuperWageRate: number;
    repressionLevel: number;
    overshootRatio: number;
    decompositionOccurred: boolean;
    terminalDecision: string;
  };
  classes: SocialClassSnapshot[];
  territories: TerritorySnapshot[];
  relationships: RelationshipSnapshot[];
  events: EventSnapshot[];
}

export function serializeWorldState(state: WorldState): WorldSnapshot {
  const classes = getSocialClasses(state);

  return {
    tick: state.tick,
    totals: {
      wealth: getTotalWealth(state),
      aggregateTension: getAggregateTension(state),
      activeClasses: classes.filter((c) => c.active).length,
    },
    economy: { ...state.economy },
    classes: classes.map((c) => ({
      id: c.id,
      name: c.name,
      role: c.role,
      active: c.active,
      wealth: c.wealth,
      population: c.population,
      organization: c.organization,
      repressionFaced: c.repressionFaced,
      pAcquiescence: c.pAcquiescence,
      pRevolution: c.pRevolution,
      ideology: { ...c.ideology },
    })),
    territories: getTerritories(state).map((t) => ({
      id: t.id,
      name: t.name,
      sectorType: t.sectorType,
      profile: t.profile,
      active: t.active,
      heat: t.heat,
      rentLevel: t.rentLevel,
      population: t.population,
      biocapacity: t.biocapacity,
      maxBiocapacity: t.maxBiocapacity,
      underEviction: t.underEviction,
    })),
    relationships: state.relationships.map((r) => ({
      sourceId: r.sourceId,
      targetId: r.targetId,
      kind: r.kind,
      valueFlow: r.valueFlow,
      tension: r.tension,
      solidarityStrength: r.solidarityStrength,
    })),
    events: state.events.map((e) => ({ type: e.type, tick: e.tick, payload: e.payload })),
  };
}
