/**
 * Survival System Tests
 */

import { describe, it, expect } from 'vitest';
import { SurvivalSystem } from '../../src/systems/survival.js';
import { createSocialClass } from '../../src/core/world.js';
import { buildGraph, createServices, tickContext } from '../helpers/world.js';

describe('SurvivalSystem', () => {
  const system = new SurvivalSystem();

  it('computes both survival probabilities for living classes', () => {
    const graph = buildGraph([
      createSocialClass({
        id: 'C001',
        name: 'Worker',
        role: 'periphery_proletariat',
        wealth: 0.3,
        subsistenceThreshold: 0.3,
        organization: 0.1,
        repressionFaced: 0.5,
      }),
    ]);

    system.step(graph, createServices(), tickContext());

    expect(graph.getSocialClass('C001')?.pAcquiescence).toBe(0.5);
    expect(graph.getSocialClass('C001')?.pRevolution).toBeCloseTo(0.2, 5);
  });

  it('skips dead classes', () => {
    const graph = buildGraph([
      createSocialClass({ id: 'C001', name: 'Dead', role: 'periphery_proletariat', wealth: 0.3, active: false }),
    ]);

    system.step(graph, createServices(), tickContext());

    expect(graph.getSocialClass('C001')?.pAcquiescence).toBe(0);
    expect(graph.getSocialClass('C001')?.pRevolution).toBe(0);
  });

  it('uses whatever formula is registered', () => {
    const services = createServices();
    services.formulas.register('revolutionProbability', () => 0.75);
    const graph = buildGraph([
      createSocialClass({ id: 'C001', name: 'Worker', role: 'periphery_proletariat', wealth: 0.3 }),
    ]);

    system.step(graph, services, tickContext());

    expect(graph.getSocialClass('C001')?.pRevolution).toBe(0.75);
  });
});
