/**
 * Control Ratio System
 * One enforcer can hold a fixed number of prisoners. When the prisoner
 * population outgrows that capacity the carceral state is in crisis, and
 * the first crisis forces a terminal decision:
 *   - average prisoner organization >= threshold: revolution
 *   - otherwise: genocide
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import type { TerminalDecision } from '../core/types.js';
import { PRISONER_ROLES } from './shared.js';

export class ControlRatioSystem implements System {
  readonly name = 'ControlRatio';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const { prisonersPerEnforcer, revolutionOrganizationThreshold } = services.coefficients.control;
    const classes = graph.socialClasses();

    const enforcerPopulation = classes
      .filter((c) => c.role === 'carceral_enforcer')
      .reduce((sum, c) => sum + c.population, 0);

    let prisonerPopulation = 0;
    let organizationSum = 0;
    for (const cls of classes) {
      if (!PRISONER_ROLES.has(cls.role)) continue;
      prisonerPopulation += cls.population;
      organizationSum += cls.population * cls.organization;
    }

    if (prisonerPopulation === 0) return;

    const capacity = enforcerPopulation * prisonersPerEnforcer;
    if (prisonerPopulation <= capacity) return;

    services.eventBus.emit('control_ratio_crisis', context.tick, {
      enforcerPopulation,
      prisonerPopulation,
      capacity,
      ratio: enforcerPopulation > 0 ? prisonerPopulation / enforcerPopulation : null,
      overCapacityBy: prisonerPopulation - capacity,
    });

    if (graph.economy.terminalDecision !== 'none') return;

    const averageOrganization = organizationSum / prisonerPopulation;
    const outcome: TerminalDecision =
      averageOrganization >= revolutionOrganizationThreshold ? 'revolution' : 'genocide';
    graph.economy.terminalDecision = outcome;

    services.eventBus.emit('terminal_decision', context.tick, {
      outcome,
      averageOrganization,
      prisonerPopulation,
      enforcerPopulation,
    });
  }
}
