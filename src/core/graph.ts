/**
 * Working Graph
 * Mutable per-tick arena the systems read and write. Entities are keyed by
 * id; relationships live in an ordered list and reference entities by id.
 * Converted from and back into an immutable WorldState at tick boundaries.
 */

import type {
  Economy,
  Entity,
  EntityId,
  Relationship,
  RelationshipKind,
  SocialClass,
  SocialRole,
  Territory,
  WorldState,
} from './types.js';
import { CLASS_RELATION_KINDS, copyEntity } from './world.js';
import { ValidationError } from './errors.js';

export class WorkingGraph {
  private readonly nodes: Map<EntityId, Entity>;
  private readonly edges: Relationship[];
  readonly economy: Economy;

  private constructor(nodes: Map<EntityId, Entity>, edges: Relationship[], economy: Economy) {
    this.nodes = nodes;
    this.edges = edges;
    this.economy = economy;
  }

  static fromWorldState(state: WorldState): WorkingGraph {
    const nodes = new Map<EntityId, Entity>();
    for (const [id, entity] of Object.entries(state.entities)) {
      nodes.set(id, copyEntity(entity));
    }
    const edges = state.relationships.map((rel) => ({ ...rel }));
    return new WorkingGraph(nodes, edges, { ...state.economy });
  }

  // ==========================================================================
  // Nodes
  // ==========================================================================

  get nodeCount(): number {
    return this.nodes.size;
  }

  getNode(id: EntityId): Entity | undefined {
    return this.nodes.get(id);
  }

  getSocialClass(id: EntityId): SocialClass | undefined {
    const node = this.nodes.get(id);
    return node?.kind === 'social_class' ? node : undefined;
  }

  getTerritory(id: EntityId): Territory | undefined {
    const node = this.nodes.get(id);
    return node?.kind === 'territory' ? node : undefined;
  }

  /**
   * Social classes in insertion order; inactive ones only when asked
   */
  socialClasses(includeInactive: boolean = false): SocialClass[] {
    const result: SocialClass[] = [];
    for (const node of this.nodes.values()) {
      if (node.kind === 'social_class' && (includeInactive || node.active)) {
        result.push(node);
      }
    }
    return result;
  }

  territories(includeInactive: boolean = false): Territory[] {
    const result: Territory[] = [];
    for (const node of this.nodes.values()) {
      if (node.kind === 'territory' && (includeInactive || node.active)) {
        result.push(node);
      }
    }
    return result;
  }

  classesWithRole(role: SocialRole): SocialClass[] {
    return this.socialClasses().filter((c) => c.role === role);
  }

  isActive(id: EntityId): boolean {
    return this.nodes.get(id)?.active ?? false;
  }

  /**
   * Add a new entity created during the tick. Ids must be unique.
   */
  addNode(entity: Entity): void {
    if (this.nodes.has(entity.id)) {
      throw new ValidationError([`duplicate entity id: ${entity.id}`]);
    }
    this.nodes.set(entity.id, entity);
  }

  /**
   * Smallest unused social class id (C###)
   */
  nextSocialClassId(): EntityId {
    for (let n = 1; n < 1000; n++) {
      const id = `C${String(n).padStart(3, '0')}`;
      if (!this.nodes.has(id)) return id;
    }
    throw new ValidationError(['social class id space exhausted']);
  }

  // ==========================================================================
  // Edges
  // ==========================================================================

  get edgeCount(): number {
    return this.edges.length;
  }

  allEdges(): Relationship[] {
    return this.edges;
  }

  edgesOfKind(kind: RelationshipKind): Relationship[] {
    return this.edges.filter((e) => e.kind === kind);
  }

  inEdges(id: EntityId, kind?: RelationshipKind): Relationship[] {
    return this.edges.filter((e) => e.targetId === id && (kind === undefined || e.kind === kind));
  }

  outEdges(id: EntityId, kind?: RelationshipKind): Relationship[] {
    return this.edges.filter((e) => e.sourceId === id && (kind === undefined || e.kind === kind));
  }

  findEdge(sourceId: EntityId, targetId: EntityId, kind: RelationshipKind): Relationship | undefined {
    return this.edges.find(
      (e) => e.sourceId === sourceId && e.targetId === targetId && e.kind === kind
    );
  }

  addEdge(edge: Relationship): void {
    if (edge.sourceId === edge.targetId) {
      throw new ValidationError([`relationship ${edge.sourceId}->${edge.targetId} is a self-loop`]);
    }
    this.edges.push(edge);
  }

  /**
   * Mean tension over class relationships; same rule as getAggregateTension
   */
  aggregateTension(): number {
    const relations = this.edges.filter((e) => CLASS_RELATION_KINDS.has(e.kind));
    if (relations.length === 0) return 0;
    return relations.reduce((sum, e) => sum + e.tension, 0) / relations.length;
  }

  /**
   * Edge whose endpoints are both active
   */
  isLive(edge: Relationship): boolean {
    return this.isActive(edge.sourceId) && this.isActive(edge.targetId);
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  entityList(): Entity[] {
    return Array.from(this.nodes.values());
  }
}
