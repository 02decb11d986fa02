/**
 * Territory System Tests
 */

import { describe, it, expect } from 'vitest';
import { TerritorySystem } from '../../src/systems/territory.js';
import { createRelationship, createTerritory } from '../../src/core/world.js';
import { buildGraph, createServices, eventTypes, tickContext } from '../helpers/world.js';

describe('TerritorySystem', () => {
  const system = new TerritorySystem();

  it('heats high-profile territories and cools low-profile ones', () => {
    const graph = buildGraph([
      createTerritory({ id: 'T001', name: 'Hot', profile: 'high', heat: 0 }),
      createTerritory({ id: 'T002', name: 'Cool', profile: 'low', heat: 0.5 }),
    ]);

    system.step(graph, createServices(), tickContext());

    expect(graph.getTerritory('T001')?.heat).toBeCloseTo(0.15, 10);
    expect(graph.getTerritory('T002')?.heat).toBeCloseTo(0.45, 10);
  });

  it('starts an eviction when heat crosses the threshold', () => {
    const graph = buildGraph([
      createTerritory({ id: 'T001', name: 'Hot', profile: 'high', heat: 0.7, population: 100 }),
    ]);
    const services = createServices();

    system.step(graph, services, tickContext(2));

    const territory = graph.getTerritory('T001');
    expect(territory?.underEviction).toBe(true);
    expect(territory?.rentLevel).toBe(1.5);
    expect(territory?.population).toBe(90);

    const [eviction] = services.eventBus.getHistory();
    expect(eviction.type).toBe('eviction');
    expect(eviction.payload.territoryId).toBe('T001');
    expect(eviction.payload.population).toBe(100);
  });

  it('keeps displacing without repeating the eviction event', () => {
    const graph = buildGraph([
      createTerritory({ id: 'T001', name: 'Hot', profile: 'high', heat: 0.9, underEviction: true, rentLevel: 2, population: 50 }),
    ]);
    const services = createServices();

    system.step(graph, services, tickContext());

    expect(graph.getTerritory('T001')?.rentLevel).toBe(3);
    expect(graph.getTerritory('T001')?.population).toBe(45);
    expect(eventTypes(services)).toEqual([]);
  });

  it('caps rent at maxRentLevel however long the eviction lasts', () => {
    const graph = buildGraph([
      createTerritory({ id: 'T001', name: 'Hot', profile: 'high', heat: 0.9, underEviction: true, rentLevel: 8, population: 50 }),
    ]);
    const services = createServices();

    system.step(graph, services, tickContext(1));
    expect(graph.getTerritory('T001')?.rentLevel).toBe(10);

    system.step(graph, services, tickContext(2));
    expect(graph.getTerritory('T001')?.rentLevel).toBe(10);
  });

  it('spills heat along adjacency from pre-spill values', () => {
    const graph = buildGraph(
      [
        createTerritory({ id: 'T001', name: 'Hot', profile: 'high', heat: 0.5 }),
        createTerritory({ id: 'T002', name: 'Cool', profile: 'low', heat: 0.4 }),
      ],
      [createRelationship('T001', 'T002', 'adjacency'), createRelationship('T002', 'T001', 'adjacency')]
    );

    system.step(graph, createServices(), tickContext());

    // T001: 0.65 + 0.36 * 0.05; T002: 0.36 + 0.65 * 0.05
    expect(graph.getTerritory('T001')?.heat).toBeCloseTo(0.668, 10);
    expect(graph.getTerritory('T002')?.heat).toBeCloseTo(0.3925, 10);
  });

  it('ignores adjacency to an inactive territory', () => {
    const graph = buildGraph(
      [
        createTerritory({ id: 'T001', name: 'Hot', profile: 'high', heat: 0.5 }),
        createTerritory({ id: 'T002', name: 'Gone', profile: 'low', heat: 0, active: false }),
      ],
      [createRelationship('T001', 'T002', 'adjacency')]
    );

    system.step(graph, createServices(), tickContext());

    expect(graph.getTerritory('T002')?.heat).toBe(0);
  });
});
