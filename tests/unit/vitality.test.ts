/**
 * Vitality System Tests
 */

import { describe, it, expect } from 'vitest';
import { VitalitySystem } from '../../src/systems/vitality.js';
import { createSocialClass } from '../../src/core/world.js';
import type { SocialClass } from '../../src/core/types.js';
import { buildGraph, createServices, eventTypes, tickContext } from '../helpers/world.js';

function worker(overrides: Partial<SocialClass> = {}): SocialClass {
  return createSocialClass({ id: 'C001', name: 'Worker', role: 'periphery_proletariat', wealth: 0.5, ...overrides });
}

describe('VitalitySystem', () => {
  const system = new VitalitySystem();

  it('charges base subsistence scaled by the role multiplier', () => {
    const graph = buildGraph([worker()]);
    const services = createServices();

    system.step(graph, services, tickContext());

    expect(graph.getSocialClass('C001')?.wealth).toBeCloseTo(0.49925, 10);
    expect(graph.getSocialClass('C001')?.active).toBe(true);
    expect(eventTypes(services)).toEqual([]);
  });

  it('kills a class that cannot cover its consumption', () => {
    const graph = buildGraph([worker({ wealth: 0.0105 })]);
    const services = createServices();

    system.step(graph, services, tickContext(4));

    const cls = graph.getSocialClass('C001');
    expect(cls?.active).toBe(false);
    expect(cls?.wealth).toBeCloseTo(0.00975, 10);

    const [death] = services.eventBus.getHistory();
    expect(death.type).toBe('entity_death');
    expect(death.tick).toBe(4);
    expect(death.payload.entityId).toBe('C001');
    expect(death.payload.role).toBe('periphery_proletariat');
    expect(death.payload.consumptionNeeds).toBe(0.01);
  });

  it('never drives wealth below zero', () => {
    const graph = buildGraph([worker({ wealth: 0.0001 })]);
    system.step(graph, createServices(), tickContext());

    expect(graph.getSocialClass('C001')?.wealth).toBe(0);
  });

  it('counts class reproduction in the consumption needs', () => {
    const graph = buildGraph([worker({ sClass: 0.6 })]);
    system.step(graph, createServices(), tickContext());

    expect(graph.getSocialClass('C001')?.active).toBe(false);
  });

  it('leaves dead classes alone', () => {
    const graph = buildGraph([worker({ active: false, wealth: 0.2 })]);
    const services = createServices();
    system.step(graph, services, tickContext());

    expect(graph.getSocialClass('C001')?.wealth).toBe(0.2);
    expect(eventTypes(services)).toEqual([]);
  });
});
