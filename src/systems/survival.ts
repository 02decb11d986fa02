/**
 * Survival System
 * Each living class weighs its odds: P(S|A), survival through compliance,
 * against P(S|R), survival through organized resistance.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';

export class SurvivalSystem implements System {
  readonly name = 'Survival';

  step(graph: WorkingGraph, services: ServiceContainer, _context: TickContext): void {
    const acquiescence = services.requireFormula('acquiescenceProbability');
    const revolution = services.requireFormula('revolutionProbability');
    const { steepnessK } = services.coefficients.survival;

    for (const cls of graph.socialClasses()) {
      cls.pAcquiescence = acquiescence(cls.wealth, cls.subsistenceThreshold, steepnessK);
      cls.pRevolution = revolution(cls.organization, cls.repressionFaced);
    }
  }
}
