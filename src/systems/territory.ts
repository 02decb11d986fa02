/**
 * Territory System
 * Spatial layer: heat follows operational profile, hot territories enter
 * eviction, and heat leaks into adjacent territories.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { EntityId } from '../core/types.js';
import { clamp } from './shared.js';

export class TerritorySystem implements System {
  readonly name = 'Territory';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    this.updateHeat(graph, services);
    this.processEvictions(graph, services, context);
    this.spillHeat(graph, services);
  }

  /**
   * High profile: heat += gain. Low profile: heat *= (1 - decay).
   */
  private updateHeat(graph: WorkingGraph, services: ServiceContainer): void {
    const { highProfileHeatGain, heatDecayRate } = services.coefficients.territory;

    for (const territory of graph.territories()) {
      const heat =
        territory.profile === 'high'
          ? territory.heat + highProfileHeatGain
          : territory.heat * (1 - heatDecayRate);
      territory.heat = clamp(heat, 0, 1);
    }
  }

  /**
   * Once heat crosses the threshold a territory stays under eviction:
   * rent spikes (up to maxRentLevel) and population is displaced every tick.
   */
  private processEvictions(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const { evictionHeatThreshold, rentSpikeMultiplier, maxRentLevel, displacementRate } = services.coefficients.territory;

    for (const territory of graph.territories()) {
      if (territory.heat >= evictionHeatThreshold && !territory.underEviction) {
        territory.underEviction = true;
        services.eventBus.emit('eviction', context.tick, {
          territoryId: territory.id,
          heat: territory.heat,
          population: territory.population,
        });
      }

      if (territory.underEviction) {
        territory.rentLevel = Math.min(maxRentLevel, territory.rentLevel * rentSpikeMultiplier);
        territory.population = Math.floor(territory.population * (1 - displacementRate));
      }
    }
  }

  /**
   * Spillover is computed from pre-spill heat so edge order does not matter
   */
  private spillHeat(graph: WorkingGraph, services: ServiceContainer): void {
    const { heatSpilloverRate } = services.coefficients.territory;
    const incoming = new Map<EntityId, number>();

    for (const edge of graph.edgesOfKind('adjacency')) {
      const source = graph.getTerritory(edge.sourceId);
      const target = graph.getTerritory(edge.targetId);
      if (!source || !target || !source.active || !target.active) continue;

      incoming.set(target.id, (incoming.get(target.id) ?? 0) + source.heat * heatSpilloverRate);
    }

    for (const [id, spill] of incoming) {
      const territory = graph.getTerritory(id);
      if (territory) {
        territory.heat = Math.min(1, territory.heat + spill);
      }
    }
  }
}
