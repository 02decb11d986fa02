/**
 * Consciousness System
 * Falling wages produce agitation. Where solidarity reaches a class the
 * agitation becomes class consciousness; where it does not, it becomes
 * national identity.
 *
 * Wages are read off incoming wages edges (the ImperialRent system records
 * each payment in valueFlow) and compared with the previous tick's figure
 * kept on the class as wagesReceived.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { SocialClass } from '../core/types.js';

export class ConsciousnessSystem implements System {
  readonly name = 'Consciousness';

  step(graph: WorkingGraph, services: ServiceContainer, _context: TickContext): void {
    const route = services.requireFormula('ideologicalRouting');
    const { activationThreshold } = services.coefficients.solidarity;
    const { agitationDecay, routingScale } = services.coefficients.consciousness;
    const { lossAversionLambda } = services.coefficients.behavioral;

    for (const cls of graph.socialClasses()) {
      const wages = graph.inEdges(cls.id, 'wages').reduce((sum, e) => sum + e.valueFlow, 0);
      const wageChange = wages - cls.wagesReceived;
      cls.wagesReceived = wages;

      const routed = route({
        wageChange,
        solidarityPressure: this.solidarityPressure(graph, cls, activationThreshold),
        classConsciousness: cls.ideology.classConsciousness,
        nationalIdentity: cls.ideology.nationalIdentity,
        agitation: cls.ideology.agitation,
        agitationDecay,
        lossAversionLambda,
        routingScale,
      });

      cls.ideology = {
        classConsciousness: routed.classConsciousness,
        nationalIdentity: routed.nationalIdentity,
        agitation: routed.agitation,
      };
    }
  }

  /**
   * Sum of incoming solidarity strength from living, conscious sources
   */
  private solidarityPressure(graph: WorkingGraph, cls: SocialClass, activationThreshold: number): number {
    let pressure = 0;
    for (const edge of graph.inEdges(cls.id, 'solidarity')) {
      if (edge.solidarityStrength <= 0) continue;
      const source = graph.getSocialClass(edge.sourceId);
      if (!source || !source.active) continue;
      if (source.ideology.classConsciousness > activationThreshold) {
        pressure += edge.solidarityStrength;
      }
    }
    return pressure;
  }
}
