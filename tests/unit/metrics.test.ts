/**
 * Metrics Observer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { MetricsObserver } from '../../src/observers/metrics.js';
import { createEvent } from '../../src/core/events.js';
import { hashState } from '../../src/core/rng.js';
import { createRelationship, createSocialClass, createWorldState } from '../../src/core/world.js';
import type { SimEvent, WorldState } from '../../src/core/types.js';

function world(tick: number, workerWealth: number, tension: number, events: SimEvent[] = []): WorldState {
  return createWorldState({
    tick,
    entities: [
      createSocialClass({ id: 'C001', name: 'Worker', role: 'periphery_proletariat', wealth: workerWealth }),
      createSocialClass({ id: 'C002', name: 'Owner', role: 'core_bourgeoisie', wealth: 0.5 }),
    ],
    relationships: [createRelationship('C001', 'C002', 'exploitation', { tension })],
    economy: { imperialRentPool: 90 },
    events,
  });
}

describe('MetricsObserver', () => {
  it('records aggregates for each committed tick', () => {
    const metrics = new MetricsObserver();
    const next = world(1, 0.25, 0.4, [createEvent('surplus_extraction', 1, {}, 0)]);

    metrics.onSimulationStart(world(0, 0.5, 0));
    metrics.onTick(world(0, 0.5, 0), next);

    expect(metrics.getRecent()).toEqual([
      {
        tick: 1,
        stateHash: hashState(next),
        activeEntities: 2,
        totalWealth: 0.75,
        aggregateTension: 0.4,
        imperialRentPool: 90,
        eventCount: 1,
      },
    ]);
  });

  it('summarizes the run', () => {
    const metrics = new MetricsObserver();
    const extraction = createEvent('surplus_extraction', 1, {}, 0);
    const uprising = createEvent('uprising', 2, {}, 0);

    metrics.onSimulationStart(world(0, 0.5, 0));
    metrics.onTick(world(0, 0.5, 0), world(1, 0.25, 0.6, [extraction]));
    metrics.onTick(world(1, 0.25, 0.6), world(2, 0.5, 0.3, [extraction, uprising]));

    const summary = metrics.getSummary();
    expect(summary.ticksRecorded).toBe(2);
    expect(summary.firstTick).toBe(1);
    expect(summary.lastTick).toBe(2);
    expect(summary.wealthChange).toBe(0);
    expect(summary.peakTension).toBe(0.6);
    expect(summary.totalEvents).toBe(3);
    expect(summary.eventsByType).toEqual({ surplus_extraction: 2, uprising: 1 });
  });

  it('has an empty summary before any tick', () => {
    const summary = new MetricsObserver().getSummary();

    expect(summary.ticksRecorded).toBe(0);
    expect(summary.firstTick).toBeNull();
    expect(summary.wealthChange).toBe(0);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const metrics = new MetricsObserver();
    const listener = vi.fn();
    const unsubscribe = metrics.subscribe(listener);

    metrics.onTick(world(0, 0.5, 0), world(1, 0.5, 0));
    unsubscribe();
    metrics.onTick(world(1, 0.5, 0), world(2, 0.5, 0));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].tick).toBe(1);
  });

  it('a throwing subscriber does not stop recording', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const metrics = new MetricsObserver();
    metrics.subscribe(() => {
      throw new Error('listener failure');
    });

    metrics.onTick(world(0, 0.5, 0), world(1, 0.5, 0));

    expect(metrics.getRecent()).toHaveLength(1);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });

  it('onSimulationStart resets earlier records', () => {
    const metrics = new MetricsObserver();
    metrics.onTick(world(0, 0.5, 0), world(1, 0.5, 0));

    metrics.onSimulationStart(world(0, 0.5, 0));

    expect(metrics.getSummary().ticksRecorded).toBe(0);
  });
});
