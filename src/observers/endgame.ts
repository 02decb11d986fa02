/**
 * Endgame Detector
 * Watches committed ticks for the three terminal outcomes. Checked in
 * priority order; the first outcome reached is final.
 */

import type { WorldState } from '../core/types.js';
import { getSocialClasses } from '../core/world.js';
import { PROLETARIAN_ROLES } from '../systems/shared.js';
import { solidarityComponents } from './topology.js';
import type { SimulationObserver } from './types.js';

export type GameOutcome = 'revolutionary_victory' | 'ecological_collapse' | 'fascist_consolidation';

export interface EndgameResult {
  outcome: GameOutcome;
  tick: number;
}

export const PERCOLATION_THRESHOLD = 0.7;
export const CONSCIOUSNESS_THRESHOLD = 0.8;
export const OVERSHOOT_THRESHOLD = 2.0;
export const OVERSHOOT_CONSECUTIVE_TICKS = 5;
export const FASCIST_CLASS_THRESHOLD = 3;

type EndgameListener = (result: EndgameResult) => void;

/**
 * Share of social classes in the largest connected component of the
 * solidarity network (edges with positive strength, direction ignored)
 */
export function solidarityPercolation(state: WorldState): number {
  const components = solidarityComponents(state);
  if (components.length === 0) return 0;
  const largest = components.reduce((max, c) => Math.max(max, c.length), 0);
  return largest / components.reduce((sum, c) => sum + c.length, 0);
}

export function averageProletarianConsciousness(state: WorldState): number {
  const proletarians = getSocialClasses(state).filter((c) => c.active && PROLETARIAN_ROLES.has(c.role));
  if (proletarians.length === 0) return 0;
  return proletarians.reduce((sum, c) => sum + c.ideology.classConsciousness, 0) / proletarians.length;
}

export function countFascistClasses(state: WorldState): number {
  return getSocialClasses(state).filter(
    (c) => c.active && c.ideology.nationalIdentity > c.ideology.classConsciousness
  ).length;
}

export class EndgameDetector implements SimulationObserver {
  readonly name = 'EndgameDetector';

  private result: EndgameResult | null = null;
  private overshootStreak = 0;
  private listeners: Set<EndgameListener> = new Set();

  get outcome(): GameOutcome | null {
    return this.result?.outcome ?? null;
  }

  get isGameOver(): boolean {
    return this.result !== null;
  }

  getResult(): EndgameResult | null {
    return this.result;
  }

  subscribe(listener: EndgameListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onSimulationStart(): void {
    this.result = null;
    this.overshootStreak = 0;
  }

  onTick(_previousState: WorldState, newState: WorldState): void {
    if (this.result !== null) return;

    // Streak is tracked every tick, even when a higher-priority check wins
    const ecological = this.checkEcologicalCollapse(newState);

    let outcome: GameOutcome | null = null;
    if (this.checkRevolutionaryVictory(newState)) {
      outcome = 'revolutionary_victory';
    } else if (ecological) {
      outcome = 'ecological_collapse';
    } else if (countFascistClasses(newState) >= FASCIST_CLASS_THRESHOLD) {
      outcome = 'fascist_consolidation';
    }

    if (outcome === null) return;

    const result = { outcome, tick: newState.tick };
    this.result = result;
    console.log(`[Endgame] ${outcome} at tick ${newState.tick}`);

    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (error) {
        console.error('[Endgame] Listener error:', error);
      }
    }
  }

  private checkRevolutionaryVictory(state: WorldState): boolean {
    return (
      solidarityPercolation(state) >= PERCOLATION_THRESHOLD &&
      averageProletarianConsciousness(state) > CONSCIOUSNESS_THRESHOLD
    );
  }

  private checkEcologicalCollapse(state: WorldState): boolean {
    this.overshootStreak = state.economy.overshootRatio > OVERSHOOT_THRESHOLD ? this.overshootStreak + 1 : 0;
    return this.overshootStreak >= OVERSHOOT_CONSECUTIVE_TICKS;
  }
}
