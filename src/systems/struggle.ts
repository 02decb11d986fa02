/**
 * Struggle System
 * State violence is the spark, accumulated agitation the fuel.
 *
 *   spark    = rng < repressionFaced * sparkProbabilityScale
 *   uprising = (spark || P(S|R) > P(S|A)) && agitation > resistanceThreshold
 *
 * An uprising burns wealth but leaves lasting solidarity behind: incoming
 * solidarity edges strengthen and the class gains consciousness. Runs after
 * Survival, whose probabilities it reads.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { SocialClass } from '../core/types.js';
import { PROLETARIAN_ROLES, clamp } from './shared.js';

export class StruggleSystem implements System {
  readonly name = 'Struggle';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const { sparkProbabilityScale, resistanceThreshold } = services.coefficients.struggle;

    for (const cls of graph.socialClasses()) {
      if (!PROLETARIAN_ROLES.has(cls.role)) continue;

      // exactly one draw per eligible class, spark or not
      const sparkProbability = cls.repressionFaced * sparkProbabilityScale;
      const spark = context.rng.random() < sparkProbability;

      if (spark) {
        services.eventBus.emit('excessive_force', context.tick, {
          targetId: cls.id,
          repression: cls.repressionFaced,
          sparkProbability,
        });
      }

      const pressure = cls.pRevolution > cls.pAcquiescence;
      if ((spark || pressure) && cls.ideology.agitation > resistanceThreshold) {
        this.rise(graph, services, context, cls, spark ? 'spark' : 'revolutionary_pressure');
      }
    }

    this.checkPowerVacuum(graph, services, context);
  }

  private rise(
    graph: WorkingGraph,
    services: ServiceContainer,
    context: TickContext,
    cls: SocialClass,
    trigger: string
  ): void {
    const { wealthDestructionRate, solidarityGainPerUprising } = services.coefficients.struggle;

    const wealthBefore = cls.wealth;
    cls.wealth = wealthBefore * (1 - wealthDestructionRate);

    let solidarityGained = 0;
    let edgesUpdated = 0;
    for (const edge of graph.inEdges(cls.id, 'solidarity')) {
      const before = edge.solidarityStrength;
      edge.solidarityStrength = Math.min(1, before + solidarityGainPerUprising);
      solidarityGained += edge.solidarityStrength - before;
      edgesUpdated++;
    }

    const consciousnessBefore = cls.ideology.classConsciousness;
    cls.ideology.classConsciousness = clamp(consciousnessBefore + solidarityGainPerUprising * 0.5, 0, 1);

    services.eventBus.emit('uprising', context.tick, {
      targetId: cls.id,
      trigger,
      agitation: cls.ideology.agitation,
      wealthBefore,
      wealthAfter: cls.wealth,
      solidarityGained,
      edgesUpdated,
      consciousnessBefore,
      consciousnessAfter: cls.ideology.classConsciousness,
    });

    if (solidarityGained > 0) {
      services.eventBus.emit('solidarity_spike', context.tick, {
        targetId: cls.id,
        solidarityGained,
        edgesAffected: edgesUpdated,
      });
    }
  }

  /**
   * A comprador that has died or can no longer cover its subsistence leaves
   * the imperial circuit without its local manager
   */
  private checkPowerVacuum(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const comprador = graph.socialClasses(true).find((c) => c.role === 'comprador_bourgeoisie');
    if (!comprador) return;
    if (comprador.active && comprador.wealth >= comprador.subsistenceThreshold) return;

    const periphery = graph.classesWithRole('periphery_proletariat')[0];
    const revolutionaryCapacity = periphery
      ? periphery.organization * periphery.ideology.classConsciousness
      : 0;

    services.eventBus.emit('power_vacuum', context.tick, {
      compradorId: comprador.id,
      compradorActive: comprador.active,
      compradorWealth: comprador.wealth,
      subsistenceThreshold: comprador.subsistenceThreshold,
      revolutionaryCapacity,
    });
  }
}
