/**
 * Two-node Scenario
 * A single exploitation edge run for 100 ticks with every observer attached
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { Simulation } from '../../src/core/simulation.js';
import { getAggregateTension, getRelationshipsOfKind } from '../../src/core/world.js';
import { createTwoNodeScenario } from '../../src/scenarios/index.js';
import { EndgameDetector } from '../../src/observers/endgame.js';
import { MetricsObserver } from '../../src/observers/metrics.js';
import { classById } from '../helpers/world.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('two-node scenario', () => {
  function runScenario() {
    const scenario = createTwoNodeScenario();
    const metrics = new MetricsObserver();
    const endgame = new EndgameDetector();
    const simulation = new Simulation(scenario.state, {
      config: scenario.config,
      coefficients: scenario.coefficients,
      observers: [metrics, endgame],
    });
    simulation.run(100);
    return { simulation, metrics, endgame };
  }

  it('extracts from the worker on the first tick', () => {
    const scenario = createTwoNodeScenario();
    const simulation = new Simulation(scenario.state, { config: scenario.config });

    simulation.tick();

    const worker = classById(simulation.getState(), 'C001');
    expect(worker.wealth).toBeCloseTo(0.09985, 10);
    expect(simulation.getState().events.map((e) => e.type)).toContain('surplus_extraction');
  });

  it('reaches tick 100 with the worker dead and the owner alive', () => {
    const { simulation } = runScenario();
    const state = simulation.getState();

    expect(state.tick).toBe(100);
    expect(classById(state, 'C001').active).toBe(false);
    expect(classById(state, 'C001').wealth).toBeLessThan(0.5);
    expect(classById(state, 'C002').active).toBe(true);
  });

  it('records the worker death at tick 4', () => {
    const { simulation } = runScenario();

    const deaths = simulation.getEventHistory().filter((e) => e.type === 'entity_death');

    expect(deaths.map((e) => e.tick)).toEqual([4]);
    expect(simulation.getStateAtTick(3)?.entities['C001']?.active).toBe(true);
  });

  it('the exploitation edge carries no flow once the worker is dead', () => {
    const { simulation } = runScenario();

    const [edge] = getRelationshipsOfKind(simulation.getState(), 'exploitation');
    expect(edge.valueFlow).toBe(0);
  });

  it('accumulates tension on the exploitation edge', () => {
    const { simulation } = runScenario();

    expect(getAggregateTension(simulation.getState())).toBeGreaterThan(0.3);
  });

  it('ends without a terminal outcome', () => {
    const { endgame, metrics } = runScenario();

    expect(endgame.getResult()).toBeNull();
    expect(metrics.getSummary().ticksRecorded).toBe(100);
    expect(metrics.getSummary().lastTick).toBe(100);
  });
});
