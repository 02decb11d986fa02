/**
 * Production System
 * Workers generate wealth from labor applied to the land they occupy:
 *   produced = (baseLaborPower / weeksPerYear) * population * (biocapacity / maxBiocapacity)
 *
 * Only active producers with a tenancy edge produce. Bourgeois classes
 * extract value but do not create it. Total production per territory sets
 * its extraction intensity for the metabolism system.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { EntityId } from '../core/types.js';
import { PRODUCER_ROLES } from './shared.js';

export class ProductionSystem implements System {
  readonly name = 'Production';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const laborPerTick = services.coefficients.economy.baseLaborPower / context.config.weeksPerYear;
    const produced = new Map<EntityId, number>();

    for (const cls of graph.socialClasses()) {
      if (!PRODUCER_ROLES.has(cls.role)) continue;

      const tenancy = graph.outEdges(cls.id, 'tenancy')[0];
      const territory = tenancy ? graph.getTerritory(tenancy.targetId) : undefined;
      if (!territory || !territory.active) continue;

      const bioRatio = territory.maxBiocapacity > 0 ? territory.biocapacity / territory.maxBiocapacity : 0;
      const value = laborPerTick * cls.population * bioRatio;
      cls.wealth += value;

      if (value > 0) {
        produced.set(territory.id, (produced.get(territory.id) ?? 0) + value);
      }
    }

    for (const territory of graph.territories()) {
      const total = produced.get(territory.id) ?? 0;
      territory.extractionIntensity =
        territory.maxBiocapacity > 0 ? Math.min(1, total / territory.maxBiocapacity) : 0;
    }
  }
}
