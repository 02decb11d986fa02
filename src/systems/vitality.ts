/**
 * Vitality System
 * Every living class pays the cost of its own reproduction each tick.
 * A class whose wealth no longer covers its consumption needs dies; it stays
 * in the graph as an inactive node.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import { consumptionNeeds } from './shared.js';

export class VitalitySystem implements System {
  readonly name = 'Vitality';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const { baseSubsistence } = services.coefficients.economy;

    for (const cls of graph.socialClasses()) {
      const cost = baseSubsistence * cls.subsistenceMultiplier;
      cls.wealth = Math.max(0, cls.wealth - cost);

      const needs = consumptionNeeds(cls);
      if (cls.wealth < needs) {
        cls.active = false;
        services.eventBus.emit('entity_death', context.tick, {
          entityId: cls.id,
          role: cls.role,
          wealth: cls.wealth,
          consumptionNeeds: needs,
        });
      }
    }
  }
}
