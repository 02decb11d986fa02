/**
 * Metrics Observer
 * Records per-tick aggregates and notifies listeners as ticks arrive
 */

import type { EventType, WorldState } from '../core/types.js';
import { hashState } from '../core/rng.js';
import { getActiveEntities, getAggregateTension, getTotalWealth } from '../core/world.js';
import type { SimulationObserver } from './types.js';

/**
 * Aggregates of a single committed tick
 */
export interface TickRecord {
  tick: number;
  stateHash: string;
  activeEntities: number;
  totalWealth: number;
  aggregateTension: number;
  imperialRentPool: number;
  eventCount: number;
}

export interface MetricsSummary {
  ticksRecorded: number;
  firstTick: number | null;
  lastTick: number | null;
  wealthChange: number;
  peakTension: number;
  totalEvents: number;
  eventsByType: Partial<Record<EventType, number>>;
  recentTicks: TickRecord[];
}

type TickListener = (record: TickRecord) => void;

const MAX_RECORDS = 500;

export class MetricsObserver implements SimulationObserver {
  readonly name = 'MetricsObserver';

  private records: TickRecord[] = [];
  private listeners: Set<TickListener> = new Set();
  private eventsByType: Partial<Record<EventType, number>> = {};
  private totalEvents = 0;
  private initialWealth: number | null = null;

  onSimulationStart(initialState: WorldState): void {
    this.reset();
    this.initialWealth = getTotalWealth(initialState);
  }

  onTick(_previousState: WorldState, newState: WorldState): void {
    const record: TickRecord = {
      tick: newState.tick,
      stateHash: hashState(newState),
      activeEntities: getActiveEntities(newState).length,
      totalWealth: getTotalWealth(newState),
      aggregateTension: getAggregateTension(newState),
      imperialRentPool: newState.economy.imperialRentPool,
      eventCount: newState.events.length,
    };

    for (const event of newState.events) {
      this.eventsByType[event.type] = (this.eventsByType[event.type] ?? 0) + 1;
    }
    this.totalEvents += newState.events.length;

    this.records.push(record);
    // Keep only the most recent records
    if (this.records.length > MAX_RECORDS) {
      this.records.shift();
    }

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        console.error('[Metrics] Listener error:', error);
      }
    }
  }

  /**
   * Subscribe to new tick records
   */
  subscribe(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getRecent(limit: number = 10): TickRecord[] {
    return this.records.slice(-limit);
  }

  getSummary(): MetricsSummary {
    const first = this.records[0];
    const last = this.records[this.records.length - 1];
    const baseline = this.initialWealth ?? first?.totalWealth ?? 0;

    return {
      ticksRecorded: this.records.length,
      firstTick: first?.tick ?? null,
      lastTick: last?.tick ?? null,
      wealthChange: last ? last.totalWealth - baseline : 0,
      peakTension: this.records.reduce((peak, r) => Math.max(peak, r.aggregateTension), 0),
      totalEvents: this.totalEvents,
      eventsByType: { ...this.eventsByType },
      recentTicks: this.getRecent(10),
    };
  }

  reset(): void {
    this.records = [];
    this.eventsByType = {};
    this.totalEvents = 0;
    this.initialWealth = null;
  }
}
