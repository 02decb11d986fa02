/**
 * Imperial Rent System
 * The four-phase imperial circuit, followed by the ruling class's policy
 * response to the state of the rent pool:
 *
 *   1. Extraction  periphery worker -> owner   (exploitation edges)
 *   2. Tribute     comprador -> core           (tribute edges, fills the pool)
 *   3. Wages       core -> labor aristocracy   (wages edges, drains the pool)
 *   4. Subsidy     core -> client state        (client_state edges, wealth becomes repression)
 *   5. Policy      bourgeoisieDecision(poolRatio, aggregateTension)
 *
 * Every phase records what moved along an edge in its valueFlow; an edge
 * that moved nothing this tick reads zero.
 */

import type { System, TickContext } from '../core/engine.js';
import type { WorkingGraph } from '../core/graph.js';
import type { ServiceContainer } from '../core/services.js';
import { BOURGEOIS_ROLES, clamp } from './shared.js';

const REPORTABLE_FLOW = 0.01;

export class ImperialRentSystem implements System {
  readonly name = 'ImperialRent';

  step(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    this.extract(graph, services, context);
    this.payTribute(graph, services);
    this.payWages(graph);
    this.subsidizeClientStates(graph, services, context);
    this.applyPolicy(graph, services, context);
  }

  private extract(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const imperialRent = services.requireFormula('imperialRent');
    const alpha = services.coefficients.economy.extractionEfficiency;

    for (const edge of graph.edgesOfKind('exploitation')) {
      edge.valueFlow = 0;
      if (!graph.isLive(edge)) continue;
      const worker = graph.getSocialClass(edge.sourceId);
      const owner = graph.getSocialClass(edge.targetId);
      if (!worker || !owner) continue;

      const rent = Math.min(
        imperialRent(alpha, worker.wealth, worker.ideology.classConsciousness),
        worker.wealth
      );
      worker.wealth = Math.max(0, worker.wealth - rent);
      owner.wealth += rent;
      edge.valueFlow = rent;

      if (rent > REPORTABLE_FLOW) {
        services.eventBus.emit('surplus_extraction', context.tick, {
          sourceId: worker.id,
          targetId: owner.id,
          amount: rent,
        });
      }
    }
  }

  /**
   * The comprador keeps its cut; the rest goes up the chain and into the pool
   */
  private payTribute(graph: WorkingGraph, services: ServiceContainer): void {
    const { compradorCut } = services.coefficients.economy;

    for (const edge of graph.edgesOfKind('tribute')) {
      edge.valueFlow = 0;
      if (!graph.isLive(edge)) continue;
      const comprador = graph.getSocialClass(edge.sourceId);
      const core = graph.getSocialClass(edge.targetId);
      if (!comprador || !core || comprador.wealth <= 0) continue;

      const kept = comprador.wealth * compradorCut;
      const tribute = comprador.wealth - kept;
      comprador.wealth = kept;
      core.wealth += tribute;
      edge.valueFlow = tribute;
      graph.economy.imperialRentPool += tribute;
    }
  }

  /**
   * Super-wages are paid out of the pool and can never exceed it
   */
  private payWages(graph: WorkingGraph): void {
    const rate = graph.economy.currentSuperWageRate;

    for (const edge of graph.edgesOfKind('wages')) {
      edge.valueFlow = 0;
      if (!graph.isLive(edge)) continue;
      const payer = graph.getSocialClass(edge.sourceId);
      const receiver = graph.getSocialClass(edge.targetId);
      if (!payer || !receiver) continue;

      const wages = Math.max(0, Math.min(payer.wealth * rate, graph.economy.imperialRentPool));
      payer.wealth = Math.max(0, payer.wealth - wages);
      receiver.wealth += wages;
      edge.valueFlow = wages;
      graph.economy.imperialRentPool = Math.max(0, graph.economy.imperialRentPool - wages);
    }
  }

  /**
   * An unstable client state (P(S|R) / P(S|A) at or above the trigger)
   * receives a subsidy that is converted into repression, not wealth.
   */
  private subsidizeClientStates(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const acquiescence = services.requireFormula('acquiescenceProbability');
    const revolution = services.requireFormula('revolutionProbability');
    const { subsidyTriggerThreshold, subsidyConversionRate } = services.coefficients.economy;
    const { steepnessK } = services.coefficients.survival;

    for (const edge of graph.edgesOfKind('client_state')) {
      edge.valueFlow = 0;
      if (!graph.isLive(edge)) continue;
      const patron = graph.getSocialClass(edge.sourceId);
      const client = graph.getSocialClass(edge.targetId);
      if (!patron || !client) continue;

      const pAcq = acquiescence(client.wealth, client.subsistenceThreshold, steepnessK);
      const pRev = revolution(client.organization, client.repressionFaced);
      const stability = pAcq > 0 ? pRev / pAcq : pRev > 0 ? 1 : 0;
      if (stability < subsidyTriggerThreshold) continue;

      const subsidy = Math.min(edge.subsidyCap, patron.wealth * subsidyConversionRate);
      if (subsidy <= REPORTABLE_FLOW) continue;

      patron.wealth = Math.max(0, patron.wealth - subsidy);
      const repressionBefore = client.repressionFaced;
      client.repressionFaced = Math.min(1, repressionBefore + subsidy * subsidyConversionRate);
      edge.valueFlow = subsidy;

      services.eventBus.emit('imperial_subsidy', context.tick, {
        sourceId: patron.id,
        targetId: client.id,
        amount: subsidy,
        stabilityRatio: stability,
        repressionBefore,
        repressionAfter: client.repressionFaced,
      });
    }
  }

  private applyPolicy(graph: WorkingGraph, services: ServiceContainer, context: TickContext): void {
    const decide = services.requireFormula('bourgeoisieDecision');
    const economy = services.coefficients.economy;
    const pool = graph.economy;

    const poolRatio = pool.initialRentPool > 0 ? pool.imperialRentPool / pool.initialRentPool : 0;
    const tension = graph.aggregateTension();
    const policy = decide(poolRatio, tension, {
      high: economy.poolHighThreshold,
      low: economy.poolLowThreshold,
      critical: economy.poolCriticalThreshold,
    });

    pool.currentSuperWageRate = clamp(
      pool.currentSuperWageRate + policy.wageDelta,
      economy.minWageRate,
      economy.maxWageRate
    );

    if (policy.repressionDelta !== 0) {
      pool.repressionLevel = clamp(pool.repressionLevel + policy.repressionDelta, 0, 1);
      for (const cls of graph.socialClasses()) {
        if (BOURGEOIS_ROLES.has(cls.role)) continue;
        cls.repressionFaced = clamp(cls.repressionFaced + policy.repressionDelta, 0, 1);
      }
    }

    if (policy.decision === 'crisis') {
      services.eventBus.emit('economic_crisis', context.tick, {
        poolRatio,
        aggregateTension: tension,
        wageRate: pool.currentSuperWageRate,
        repressionLevel: pool.repressionLevel,
      });
    }
  }
}
