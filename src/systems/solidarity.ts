/**
 * Solidarity System
 * Consciousness travels along solidarity edges from classes that have
 * already woken up. Deltas are computed from start-of-phase values and
 * applied together, so edge order never matters.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { EntityId } from '../core/types.js';
import { clamp } from './shared.js';

export class SolidaritySystem implements System {
  readonly name = 'Solidarity';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const transmit = services.requireFormula('solidarityTransmission');
    const { activationThreshold, massAwakeningThreshold, negligibleTransmission } =
      services.coefficients.solidarity;

    const deltas = new Map<EntityId, number>();

    for (const edge of graph.edgesOfKind('solidarity')) {
      if (!graph.isLive(edge)) continue;
      const source = graph.getSocialClass(edge.sourceId);
      const target = graph.getSocialClass(edge.targetId);
      if (!source || !target) continue;

      const delta = transmit(
        source.ideology.classConsciousness,
        target.ideology.classConsciousness,
        edge.solidarityStrength,
        activationThreshold
      );
      if (Math.abs(delta) < negligibleTransmission) continue;

      deltas.set(target.id, (deltas.get(target.id) ?? 0) + delta);
      services.eventBus.emit('consciousness_transmission', context.tick, {
        sourceId: source.id,
        targetId: target.id,
        delta,
        solidarityStrength: edge.solidarityStrength,
      });
    }

    for (const [id, delta] of deltas) {
      const target = graph.getSocialClass(id);
      if (!target) continue;

      const before = target.ideology.classConsciousness;
      const after = clamp(before + delta, 0, 1);
      target.ideology.classConsciousness = after;

      if (before < massAwakeningThreshold && after >= massAwakeningThreshold) {
        services.eventBus.emit('mass_awakening', context.tick, {
          targetId: id,
          consciousnessBefore: before,
          consciousnessAfter: after,
        });
      }
    }
  }
}
