/**
 * Contradiction System
 * Tension builds on every live relationship in proportion to the wealth gap
 * between its endpoints. Solidarity dampens it. Crossing 1 is a rupture.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import { clamp } from './shared.js';

export class ContradictionSystem implements System {
  readonly name = 'Contradiction';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const { accumulationRate, solidarityDampening } = services.coefficients.tension;

    for (const edge of graph.allEdges()) {
      if (!graph.isLive(edge)) continue;
      const source = graph.getSocialClass(edge.sourceId);
      const target = graph.getSocialClass(edge.targetId);
      if (!source || !target) continue;

      const gap = Math.abs(source.wealth - target.wealth);
      const damping = 1 - edge.solidarityStrength * solidarityDampening;
      const before = edge.tension;
      edge.tension = clamp(before + accumulationRate * gap * damping, 0, 1);

      if (before < 1 && edge.tension >= 1) {
        services.eventBus.emit('rupture', context.tick, {
          sourceId: edge.sourceId,
          targetId: edge.targetId,
          kind: edge.kind,
          wealthGap: gap,
        });
      }
    }
  }
}
