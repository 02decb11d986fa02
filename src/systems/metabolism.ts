/**
 * Metabolism System
 * Territories regenerate toward their maximum biocapacity and are depleted
 * by extraction (inflated by entropy). Overshoot compares what living
 * classes consume against what the land still holds.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import { clamp, consumptionNeeds } from './shared.js';

export class MetabolismSystem implements System {
  readonly name = 'Metabolism';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const delta = services.requireFormula('biocapacityDelta');
    const overshoot = services.requireFormula('overshootRatio');
    const { entropyFactor } = services.coefficients.metabolism;

    const territories = graph.territories();
    if (territories.length === 0) return;

    let totalBiocapacity = 0;
    for (const territory of territories) {
      const change = delta(
        territory.regenerationRate,
        territory.maxBiocapacity,
        territory.extractionIntensity,
        territory.biocapacity,
        entropyFactor
      );
      territory.biocapacity = clamp(territory.biocapacity + change, 0, territory.maxBiocapacity);
      totalBiocapacity += territory.biocapacity;
    }

    const consumption = graph.socialClasses().reduce((sum, c) => sum + consumptionNeeds(c), 0);
    const ratio = overshoot(consumption, totalBiocapacity);
    graph.economy.overshootRatio = ratio;

    if (ratio > 1) {
      services.eventBus.emit('ecological_overshoot', context.tick, {
        overshootRatio: ratio,
        consumption,
        biocapacity: totalBiocapacity,
      });
    }
  }
}
