/**
 * Topology Monitor
 * Tracks how the solidarity network condenses: connected components,
 * percolation (largest component / all classes), liquidity and a seeded
 * purge test. A change of phase between ticks is reported as a
 * PhaseTransition to subscribers.
 *
 *   gaseous       percolation < 0.1   atomized cells
 *   transitional  0.1 .. 0.5          emerging network
 *   liquid        >= 0.5              a giant component spans the movement
 */

import type { SimulationConfig, WorldState } from '../core/types.js';
import { SeededRNG } from '../core/rng.js';
import { getSocialClasses } from '../core/world.js';
import type { SimulationObserver } from './types.js';

// ============================================================================
// Thresholds
// ============================================================================

export const GASEOUS_THRESHOLD = 0.1;
export const CONDENSATION_THRESHOLD = 0.5;
export const BRITTLE_MULTIPLIER = 2;
export const POTENTIAL_MIN_STRENGTH = 0.1; // sympathizers
export const ACTUAL_MIN_STRENGTH = 0.5; // cadre
export const DEFAULT_REMOVAL_RATE = 0.2;
export const DEFAULT_SURVIVAL_THRESHOLD = 0.4;

export type TopologyPhase = 'gaseous' | 'transitional' | 'liquid';

export interface TopologySnapshot {
  tick: number;
  numComponents: number;
  maxComponentSize: number;
  totalNodes: number;
  percolationRatio: number;
  potentialLiquidity: number;
  actualLiquidity: number;
  isResilient: boolean | null; // null on ticks without a purge test
  phase: TopologyPhase;
}

export interface PhaseTransition {
  tick: number;
  previousPhase: TopologyPhase;
  newPhase: TopologyPhase;
  percolationRatio: number;
  numComponents: number;
  largestComponentSize: number;
  cadreDensity: number; // actual / potential liquidity
  isResilient: boolean | null;
}

export interface ResilienceResult {
  isResilient: boolean;
  originalMaxComponent: number;
  postPurgeMaxComponent: number;
  removed: string[];
}

export interface TopologyMonitorOptions {
  resilienceInterval?: number; // 0 disables the purge test
  removalRate?: number;
  survivalThreshold?: number;
}

type TransitionListener = (transition: PhaseTransition) => void;

// ============================================================================
// Graph Analysis
// ============================================================================

/**
 * Connected components of the solidarity network over every social class.
 * Edges at or below minStrength are ignored; direction is ignored.
 */
export function solidarityComponents(
  state: WorldState,
  minStrength: number = 0,
  excluded: ReadonlySet<string> = new Set()
): string[][] {
  const classIds = getSocialClasses(state)
    .map((c) => c.id)
    .filter((id) => !excluded.has(id));

  const neighbours = new Map<string, string[]>(classIds.map((id) => [id, []]));
  for (const rel of state.relationships) {
    if (rel.kind !== 'solidarity' || rel.solidarityStrength <= minStrength) continue;
    const a = neighbours.get(rel.sourceId);
    const b = neighbours.get(rel.targetId);
    if (!a || !b) continue;
    a.push(rel.targetId);
    b.push(rel.sourceId);
  }

  const seen = new Set<string>();
  const components: string[][] = [];

  for (const start of classIds) {
    if (seen.has(start)) continue;
    seen.add(start);
    const component: string[] = [];
    const queue = [start];
    while (queue.length > 0) {
      const id = queue.pop();
      if (id === undefined) break;
      component.push(id);
      for (const next of neighbours.get(id) ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
    components.push(component);
  }

  return components;
}

function largestSize(components: string[][]): number {
  return components.reduce((max, c) => Math.max(max, c.length), 0);
}

/**
 * Solidarity edges above the sympathizer and cadre strengths
 */
export function solidarityLiquidity(state: WorldState): { potential: number; actual: number } {
  let potential = 0;
  let actual = 0;
  for (const rel of state.relationships) {
    if (rel.kind !== 'solidarity') continue;
    if (rel.solidarityStrength > POTENTIAL_MIN_STRENGTH) potential++;
    if (rel.solidarityStrength > ACTUAL_MIN_STRENGTH) actual++;
  }
  return { potential, actual };
}

export function classifyPhase(percolationRatio: number): TopologyPhase {
  if (percolationRatio < GASEOUS_THRESHOLD) return 'gaseous';
  if (percolationRatio < CONDENSATION_THRESHOLD) return 'transitional';
  return 'liquid';
}

/**
 * Remove a share of the classes at random and check whether the largest
 * component keeps at least survivalThreshold of its size.
 * The state is not touched.
 */
export function testResilience(
  state: WorldState,
  rng: SeededRNG,
  removalRate: number = DEFAULT_REMOVAL_RATE,
  survivalThreshold: number = DEFAULT_SURVIVAL_THRESHOLD
): ResilienceResult {
  const nodes = getSocialClasses(state).map((c) => c.id);
  if (nodes.length === 0) {
    return { isResilient: true, originalMaxComponent: 0, postPurgeMaxComponent: 0, removed: [] };
  }

  const originalMax = largestSize(solidarityComponents(state));

  // Partial Fisher-Yates: the first `count` slots are the sample
  const pool = [...nodes];
  const count = Math.min(nodes.length, Math.max(1, Math.floor(nodes.length * removalRate)));
  for (let i = 0; i < count; i++) {
    const j = rng.randomInt(i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  const removed = pool.slice(0, count);

  const postMax = largestSize(solidarityComponents(state, 0, new Set(removed)));

  return {
    isResilient: postMax >= originalMax * survivalThreshold,
    originalMaxComponent: originalMax,
    postPurgeMaxComponent: postMax,
    removed,
  };
}

// ============================================================================
// Observer
// ============================================================================

export class TopologyMonitor implements SimulationObserver {
  readonly name = 'TopologyMonitor';

  private history: TopologySnapshot[] = [];
  private pending: PhaseTransition[] = [];
  private listeners: Set<TransitionListener> = new Set();
  private previousPercolation = 0;
  private previousPhase: TopologyPhase | null = null;
  private seed = 0;
  private readonly resilienceInterval: number;
  private readonly removalRate: number;
  private readonly survivalThreshold: number;

  constructor(options: TopologyMonitorOptions = {}) {
    this.resilienceInterval = options.resilienceInterval ?? 5;
    this.removalRate = options.removalRate ?? DEFAULT_REMOVAL_RATE;
    this.survivalThreshold = options.survivalThreshold ?? DEFAULT_SURVIVAL_THRESHOLD;
  }

  getHistory(): TopologySnapshot[] {
    return [...this.history];
  }

  getPhase(): TopologyPhase | null {
    return this.previousPhase;
  }

  /**
   * Transitions since the last call
   */
  drainTransitions(): PhaseTransition[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  subscribe(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onSimulationStart(initialState: WorldState, config: Readonly<SimulationConfig>): void {
    this.history = [];
    this.pending = [];
    this.previousPercolation = 0;
    this.previousPhase = null;
    this.seed = config.seed;
    this.record(initialState, true);
  }

  onTick(_previousState: WorldState, newState: WorldState): void {
    this.record(newState, false);
  }

  onSimulationEnd(): void {
    const first = this.history[0];
    const last = this.history[this.history.length - 1];
    if (!first || !last) {
      console.log('[Topology] No snapshots recorded');
      return;
    }
    console.log(
      `[Topology] Summary (${this.history.length} snapshots): ` +
        `percolation ${first.percolationRatio.toFixed(2)} -> ${last.percolationRatio.toFixed(2)}, ` +
        `components ${first.numComponents} -> ${last.numComponents}`
    );
  }

  private record(state: WorldState, isStart: boolean): void {
    const components = solidarityComponents(state);
    const totalNodes = getSocialClasses(state).length;
    const maxComponentSize = largestSize(components);
    const percolationRatio = totalNodes > 0 ? Math.min(1, maxComponentSize / totalNodes) : 0;
    const { potential, actual } = solidarityLiquidity(state);

    let isResilient: boolean | null = null;
    const due = isStart || (state.tick > 0 && state.tick % this.resilienceInterval === 0);
    if (this.resilienceInterval > 0 && due) {
      // Seeded from the run seed and tick so replays purge the same classes
      const rng = new SeededRNG(this.seed + state.tick);
      isResilient = testResilience(state, rng, this.removalRate, this.survivalThreshold).isResilient;
    }

    const snapshot: TopologySnapshot = {
      tick: state.tick,
      numComponents: components.length,
      maxComponentSize,
      totalNodes,
      percolationRatio,
      potentialLiquidity: potential,
      actualLiquidity: actual,
      isResilient,
      phase: classifyPhase(percolationRatio),
    };

    this.logNarratives(snapshot);

    if (this.previousPhase !== null && snapshot.phase !== this.previousPhase) {
      this.emit({
        tick: snapshot.tick,
        previousPhase: this.previousPhase,
        newPhase: snapshot.phase,
        percolationRatio,
        numComponents: snapshot.numComponents,
        largestComponentSize: maxComponentSize,
        cadreDensity: potential > 0 ? actual / potential : 0,
        isResilient,
      });
    }

    this.previousPercolation = percolationRatio;
    this.previousPhase = snapshot.phase;
    this.history.push(snapshot);
  }

  private logNarratives(snapshot: TopologySnapshot): void {
    if (this.previousPercolation < CONDENSATION_THRESHOLD && snapshot.percolationRatio >= CONDENSATION_THRESHOLD) {
      console.log(
        `[Topology] Condensation at tick ${snapshot.tick} ` +
          `(percolation=${snapshot.percolationRatio.toFixed(2)}, largest=${snapshot.maxComponentSize})`
      );
    }

    const { potentialLiquidity: potential, actualLiquidity: actual } = snapshot;
    if (potential > 0 && (actual === 0 || potential > actual * BRITTLE_MULTIPLIER)) {
      console.log(`[Topology] Movement is broad but brittle (potential=${potential}, actual=${actual})`);
    }

    if (snapshot.isResilient === false) {
      console.warn(
        `[Topology] A purge would break the movement at tick ${snapshot.tick} ` +
          `(percolation=${snapshot.percolationRatio.toFixed(2)})`
      );
    }
  }

  private emit(transition: PhaseTransition): void {
    this.pending.push(transition);
    console.log(`[Topology] Phase ${transition.previousPhase} -> ${transition.newPhase} at tick ${transition.tick}`);
    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (error) {
        console.error('[Topology] Listener error:', error);
      }
    }
  }
}
