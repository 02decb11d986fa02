/**
 * Causal Chain Observer
 * Watches a rolling window of ticks for the shock pattern:
 *
 *   tick N     the rent pool falls by 20% or more on the next tick
 *   tick N+1   the super-wage rate is then cut (austerity)
 *   tick N+2   the highest P(S|R) rises (radicalization)
 *
 * A detected chain is logged as [NARRATIVE_JSON] and handed to subscribers.
 */

import type { WorldState } from '../core/types.js';
import { getSocialClasses } from '../core/world.js';
import type { SimulationObserver } from './types.js';

export const CRASH_THRESHOLD = -0.2;
export const CAUSAL_BUFFER_SIZE = 5;

export interface CausalSnapshot {
  tick: number;
  pool: number;
  wage: number;
  pRevolution: number; // highest across social classes
}

export type CausalNodeType = 'ECONOMIC_SHOCK' | 'AUSTERITY_RESPONSE' | 'RADICALIZATION';

export interface CausalNode {
  id: string;
  type: CausalNodeType;
  tick: number;
  data: Record<string, number>;
}

export interface CausalEdge {
  source: string;
  target: string;
  relation: 'TRIGGERS_REACTION' | 'CAUSES_RADICALIZATION';
}

export interface CausalChain {
  pattern: 'SHOCK_DOCTRINE';
  causalGraph: {
    nodes: CausalNode[];
    edges: CausalEdge[];
  };
}

type ChainListener = (chain: CausalChain) => void;

export function snapshotOf(state: WorldState): CausalSnapshot {
  const classes = getSocialClasses(state);
  return {
    tick: state.tick,
    pool: state.economy.imperialRentPool,
    wage: state.economy.currentSuperWageRate,
    pRevolution: classes.reduce((max, c) => Math.max(max, c.pRevolution), 0),
  };
}

export function isShockChain(crash: CausalSnapshot, austerity: CausalSnapshot, radical: CausalSnapshot): boolean {
  if (crash.pool <= 0) return false;

  const poolChange = (austerity.pool - crash.pool) / crash.pool;
  if (poolChange > CRASH_THRESHOLD) return false;
  if (radical.wage >= austerity.wage) return false;
  return radical.pRevolution > austerity.pRevolution;
}

export function buildChain(crash: CausalSnapshot, austerity: CausalSnapshot, radical: CausalSnapshot): CausalChain {
  const shockId = `shock_t${crash.tick}`;
  const austerityId = `austerity_t${austerity.tick}`;
  const radicalId = `radical_t${radical.tick}`;

  return {
    pattern: 'SHOCK_DOCTRINE',
    causalGraph: {
      nodes: [
        {
          id: shockId,
          type: 'ECONOMIC_SHOCK',
          tick: crash.tick,
          data: {
            poolBefore: crash.pool,
            poolAfter: austerity.pool,
            dropPercent: Math.round(((austerity.pool - crash.pool) / crash.pool) * 1000) / 10,
          },
        },
        {
          id: austerityId,
          type: 'AUSTERITY_RESPONSE',
          tick: austerity.tick,
          data: { wageBefore: austerity.wage, wageAfter: radical.wage },
        },
        {
          id: radicalId,
          type: 'RADICALIZATION',
          tick: radical.tick,
          data: { pRevolutionBefore: austerity.pRevolution, pRevolutionAfter: radical.pRevolution },
        },
      ],
      edges: [
        { source: shockId, target: austerityId, relation: 'TRIGGERS_REACTION' },
        { source: austerityId, target: radicalId, relation: 'CAUSES_RADICALIZATION' },
      ],
    },
  };
}

export class CausalChainObserver implements SimulationObserver {
  readonly name = 'CausalChainObserver';

  private buffer: CausalSnapshot[] = [];
  private chains: CausalChain[] = [];
  private listeners: Set<ChainListener> = new Set();
  private lastReportedCrash = -1;

  getChains(): CausalChain[] {
    return [...this.chains];
  }

  getBuffer(): CausalSnapshot[] {
    return [...this.buffer];
  }

  subscribe(listener: ChainListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onSimulationStart(initialState: WorldState): void {
    this.buffer = [snapshotOf(initialState)];
    this.chains = [];
    this.lastReportedCrash = -1;
  }

  onTick(_previousState: WorldState, newState: WorldState): void {
    this.buffer.push(snapshotOf(newState));
    if (this.buffer.length > CAUSAL_BUFFER_SIZE) {
      this.buffer.shift();
    }
    this.detect();
  }

  /**
   * First matching window wins; a crash tick is reported once even while
   * it stays in the buffer
   */
  private detect(): void {
    for (let i = 0; i + 2 < this.buffer.length; i++) {
      const [crash, austerity, radical] = [this.buffer[i], this.buffer[i + 1], this.buffer[i + 2]];
      if (crash.tick <= this.lastReportedCrash) continue;
      if (!isShockChain(crash, austerity, radical)) continue;

      const chain = buildChain(crash, austerity, radical);
      this.lastReportedCrash = crash.tick;
      this.chains.push(chain);
      console.warn(`[NARRATIVE_JSON] ${JSON.stringify(chain)}`);

      for (const listener of this.listeners) {
        try {
          listener(chain);
        } catch (error) {
          console.error('[Causal] Listener error:', error);
        }
      }
      return;
    }
  }
}
