/**
 * Engine Tests
 * Pipeline execution, purity and failure rollback
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SYSTEMS, appendEventLog, step, type System } from '../../src/core/engine.js';
import { createEvent } from '../../src/core/events.js';
import { ConfigurationError, SimulationError, SystemFailureError, ValidationError } from '../../src/core/errors.js';
import { createSocialClass, createWorldState, worldStatesEqual } from '../../src/core/world.js';
import { createTwoNodeScenario } from '../../src/scenarios/index.js';
import { captureError, classById, createServices } from '../helpers/world.js';

const emitting: System = {
  name: 'Emitting',
  step(_graph, services, context) {
    services.eventBus.emit('uprising', context.tick, { targetId: 'C001' });
  },
};

const failing: System = {
  name: 'Failing',
  step() {
    throw new Error('boom');
  },
};

describe('step', () => {
  it('runs the twelve systems in their fixed order', () => {
    expect(DEFAULT_SYSTEMS.map((s) => s.name)).toEqual([
      'Vitality',
      'Territory',
      'Production',
      'Solidarity',
      'ImperialRent',
      'Decomposition',
      'ControlRatio',
      'Metabolism',
      'Survival',
      'Struggle',
      'Consciousness',
      'Contradiction',
    ]);
  });

  it('advances the tick and never touches the input', () => {
    const { state, config } = createTwoNodeScenario();
    const before = JSON.stringify(state);

    const next = step(state, config);

    expect(next.tick).toBe(1);
    expect(JSON.stringify(state)).toBe(before);
    expect(Object.isFrozen(next)).toBe(true);
    expect(classById(next, 'C001').wealth).toBeCloseTo(0.09985, 10);
  });

  it('stamps every event with the produced tick', () => {
    const { state, config } = createTwoNodeScenario();
    const next = step(state, config);

    expect(next.events.map((e) => e.type)).toContain('surplus_extraction');
    expect(next.events.every((e) => e.tick === 1)).toBe(true);
    expect(next.eventLog).toContain('Tick 1: SURPLUS_EXTRACTION');
  });

  it('is deterministic for equal inputs', () => {
    const { state, config } = createTwoNodeScenario();
    expect(worldStatesEqual(step(state, config), step(state, config))).toBe(true);
  });

  it('advances an empty world with no events', () => {
    const next = step(createWorldState({ entities: [], eventLog: ['Tick 0: RUPTURE'] }));

    expect(next.tick).toBe(1);
    expect(next.events).toEqual([]);
    expect(next.eventLog).toEqual(['Tick 0: RUPTURE']);
  });

  it('runs a custom pipeline and returns only this tick\'s events', () => {
    const { state, config } = createTwoNodeScenario();
    const services = createServices();
    services.eventBus.emit('rupture', 0);

    const next = step(state, config, { services, systems: [emitting] });

    expect(next.events.map((e) => e.type)).toEqual(['uprising']);
    expect(services.eventBus.getHistory()).toHaveLength(2);
  });

  describe('failures', () => {
    it('aborts the tick, rolls back its events and annotates the error', () => {
      const { state, config } = createTwoNodeScenario();
      const services = createServices();

      const error = captureError(() => step(state, config, { services, systems: [emitting, failing] }));

      expect(error).toBeInstanceOf(SystemFailureError);
      if (!(error instanceof SimulationError)) return;
      expect(error.tick).toBe(1);
      expect(error.system).toBe('Failing');
      expect(error.message).toBe('boom');
      expect(error.describe()).toBe('SYSTEM_FAILURE in Failing at tick 1: boom');
      expect(services.eventBus.getHistory()).toEqual([]);
      expect(state.tick).toBe(0);
    });

    it('keeps the class of a simulation error', () => {
      const { state, config } = createTwoNodeScenario();
      const misconfigured: System = {
        name: 'Misconfigured',
        step() {
          throw new ConfigurationError('missing coefficient');
        },
      };

      const error = captureError(() => step(state, config, { systems: [misconfigured] }));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof SimulationError ? error.system : null).toBe('Misconfigured');
    });

    it('rejects an invalid result at commit', () => {
      const { state, config } = createTwoNodeScenario();
      const corrupting: System = {
        name: 'Corrupting',
        step(graph) {
          const worker = graph.getSocialClass('C001');
          if (worker) worker.wealth = -1;
        },
      };

      const error = captureError(() => step(state, config, { systems: [corrupting] }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof SimulationError ? error.system : null).toBe('commit');
    });

    it('rejects a new entity with a duplicate id', () => {
      const { state, config } = createTwoNodeScenario();
      const duplicating: System = {
        name: 'Duplicating',
        step(graph) {
          graph.addNode(createSocialClass({ id: 'C001', name: 'Clone', role: 'periphery_proletariat' }));
        },
      };

      expect(() => step(state, config, { systems: [duplicating] })).toThrow(ValidationError);
    });
  });
});

describe('appendEventLog', () => {
  const events = [createEvent('uprising', 3, {}, 0), createEvent('rupture', 3, {}, 0)];

  it('appends one line per event', () => {
    expect(appendEventLog(['Tick 1: EVICTION'], events, 0)).toEqual([
      'Tick 1: EVICTION',
      'Tick 3: UPRISING',
      'Tick 3: RUPTURE',
    ]);
  });

  it('keeps only the newest lines under a limit', () => {
    expect(appendEventLog(['Tick 1: EVICTION'], events, 2)).toEqual(['Tick 3: UPRISING', 'Tick 3: RUPTURE']);
  });
});
