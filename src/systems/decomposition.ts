/**
 * Decomposition System
 * When super-wages can no longer sustain the labor aristocracy it breaks
 * apart: a fraction becomes carceral enforcers, the rest falls into the
 * internal proletariat. Happens at most once per run.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { SocialClass, SocialRole } from '../core/types.js';
import { createSocialClass } from '../core/world.js';
import { consumptionNeeds } from './shared.js';

export class DecompositionSystem implements System {
  readonly name = 'Decomposition';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    if (graph.economy.decompositionOccurred) return;

    const aristocracy = graph.classesWithRole('labor_aristocracy')[0];
    if (!aristocracy || !this.isCollapsing(aristocracy)) return;

    const { enforcerFraction } = services.coefficients.control;
    const source = {
      id: aristocracy.id,
      population: aristocracy.population,
      wealth: aristocracy.wealth,
    };

    const toEnforcers = Math.max(1, Math.floor(source.population * enforcerFraction));
    const toProletariat = Math.max(1, Math.floor(source.population * (1 - enforcerFraction)));

    const enforcer = this.absorb(graph, 'carceral_enforcer', 'Carceral Enforcers', aristocracy, {
      population: toEnforcers,
      wealth: source.wealth * enforcerFraction,
    });
    const proletariat = this.absorb(graph, 'internal_proletariat', 'Internal Proletariat', aristocracy, {
      population: toProletariat,
      wealth: source.wealth * (1 - enforcerFraction),
    });

    aristocracy.active = false;
    aristocracy.wealth = 0;
    graph.economy.decompositionOccurred = true;

    services.eventBus.emit('class_decomposition', context.tick, {
      sourceId: source.id,
      sourcePopulation: source.population,
      sourceWealth: source.wealth,
      enforcerId: enforcer.id,
      enforcerPopulation: toEnforcers,
      proletariatId: proletariat.id,
      proletariatPopulation: toProletariat,
    });
  }

  /**
   * Wealth below subsistence plus two ticks of consumption
   */
  private isCollapsing(aristocracy: SocialClass): boolean {
    return aristocracy.wealth < aristocracy.subsistenceThreshold + 2 * consumptionNeeds(aristocracy);
  }

  /**
   * Fold a share into an existing class of the role (waking it if dormant),
   * or create one with a fresh id
   */
  private absorb(
    graph: WorkingGraph,
    role: SocialRole,
    name: string,
    origin: SocialClass,
    share: { population: number; wealth: number }
  ): SocialClass {
    const existing = graph.socialClasses(true).find((c) => c.role === role);
    if (existing) {
      existing.population += share.population;
      existing.wealth += share.wealth;
      existing.active = true;
      return existing;
    }

    const created = createSocialClass({
      id: graph.nextSocialClassId(),
      name,
      role,
      population: share.population,
      wealth: share.wealth,
      organization: origin.organization,
      repressionFaced: origin.repressionFaced,
      subsistenceThreshold: origin.subsistenceThreshold,
      sBio: origin.sBio,
      ideology: { ...origin.ideology },
    });
    graph.addNode(created);
    return created;
  }
}
