/**
 * Formulas
 * Pure numeric functions consumed by systems through the FormulaRegistry.
 * Each can be swapped at runtime for calibration or experiments.
 */

export const LOSS_AVERSION_COEFFICIENT = 2.25;
const EPSILON = 1e-6;
const OVERSHOOT_CAP = 999;

// ============================================================================
// Value Extraction
// ============================================================================

/**
 * Imperial rent: alpha * wages * (1 - consciousness), never negative
 */
export function imperialRent(alpha: number, wages: number, consciousness: number): number {
  return Math.max(0, alpha * wages * (1 - consciousness));
}

/**
 * Value transferred under unequal exchange: production * (1 - 1/ratio)
 */
export function valueTransfer(productionValue: number, exchangeRatio: number): number {
  if (exchangeRatio <= 0) return 0;
  return productionValue * (1 - 1 / exchangeRatio);
}

// ============================================================================
// Survival Calculus
// ============================================================================

/**
 * P(S|A): sigmoid survival through compliance, 0.5 at the threshold
 */
export function acquiescenceProbability(
  wealth: number,
  subsistenceThreshold: number,
  steepnessK: number
): number {
  const exponent = Math.max(-500, Math.min(500, -steepnessK * (wealth - subsistenceThreshold)));
  return 1 / (1 + Math.exp(exponent));
}

/**
 * P(S|R): organization against repression, capped at 1
 */
export function revolutionProbability(cohesion: number, repression: number): number {
  if (cohesion <= 0) return 0;
  return Math.min(1, cohesion / (repression + EPSILON));
}

/**
 * Wealth at which P(S|A) equals P(S|R), clamped to [0, 1]
 */
export function crossoverThreshold(
  cohesion: number,
  repression: number,
  subsistenceThreshold: number,
  steepnessK: number
): number {
  const pRevolution = revolutionProbability(cohesion, repression);
  if (pRevolution <= 0) return 0;
  if (pRevolution >= 1) return 1;

  const crossover = subsistenceThreshold - Math.log(1 / pRevolution - 1) / steepnessK;
  return Math.max(0, Math.min(1, crossover));
}

/**
 * Losses weigh lambda times more than gains
 */
export function lossAversion(value: number, lambda: number = LOSS_AVERSION_COEFFICIENT): number {
  return value < 0 ? value * lambda : value;
}

// ============================================================================
// Consciousness
// ============================================================================

export interface DriftInput {
  coreWages: number;
  valueProduced: number;
  consciousness: number;
  sensitivity: number;
  decay: number;
  solidarityPressure: number;
  wageChange: number;
  lossAversionLambda: number;
}

/**
 * dPsi/dt = k(1 - W/V) - lambda*Psi, bent by falling wages: with solidarity
 * the crisis pushes consciousness up, without it pushes it down.
 * Returns 0 when nothing was produced.
 */
export function consciousnessDrift(input: DriftInput): number {
  if (input.valueProduced <= 0) return 0;

  const wageRatio = input.coreWages / input.valueProduced;
  let drift = input.sensitivity * (1 - wageRatio) - input.decay * input.consciousness;

  if (input.wageChange < 0) {
    const agitationEnergy = Math.abs(input.wageChange) * input.lossAversionLambda;
    drift +=
      input.solidarityPressure > 0
        ? agitationEnergy * Math.min(1, input.solidarityPressure)
        : -agitationEnergy;
  }

  return drift;
}

/**
 * Consciousness delta carried along a solidarity edge. Zero unless the
 * source is strictly above the activation threshold and the edge has
 * strength.
 */
export function solidarityTransmission(
  sourceConsciousness: number,
  targetConsciousness: number,
  strength: number,
  activationThreshold: number
): number {
  if (sourceConsciousness <= activationThreshold) return 0;
  if (strength <= 0) return 0;
  return strength * (sourceConsciousness - targetConsciousness);
}

export interface RoutingInput {
  wageChange: number;
  solidarityPressure: number;
  classConsciousness: number;
  nationalIdentity: number;
  agitation: number;
  agitationDecay: number;
  lossAversionLambda: number;
  routingScale: number;
}

export interface RoutingResult {
  classConsciousness: number;
  nationalIdentity: number;
  agitation: number;
}

/**
 * Falling wages generate agitation; solidarity routes it into class
 * consciousness, its absence into national identity
 */
export function ideologicalRouting(input: RoutingInput): RoutingResult {
  let classConsciousness = input.classConsciousness;
  let nationalIdentity = input.nationalIdentity;
  let agitation = input.agitation;

  if (input.wageChange < 0) {
    agitation += Math.abs(input.wageChange) * input.lossAversionLambda;
  }

  if (agitation > 0) {
    const solidarityFactor = Math.min(1, input.solidarityPressure);
    classConsciousness = Math.min(1, classConsciousness + agitation * solidarityFactor * input.routingScale);
    nationalIdentity = Math.min(1, nationalIdentity + agitation * (1 - solidarityFactor) * input.routingScale);
    agitation = Math.max(0, agitation * (1 - input.agitationDecay));
  }

  return { classConsciousness, nationalIdentity, agitation };
}

// ============================================================================
// Dynamic Balance
// ============================================================================

export type BourgeoisieDecisionKind = 'no_change' | 'bribery' | 'austerity' | 'iron_fist' | 'crisis';

export interface BourgeoisieDecision {
  decision: BourgeoisieDecisionKind;
  wageDelta: number;
  repressionDelta: number;
}

export interface PoolThresholds {
  high: number;
  low: number;
  critical: number;
}

/**
 * Ruling-class policy from the rent pool ratio and aggregate tension
 */
export function bourgeoisieDecision(
  poolRatio: number,
  aggregateTension: number,
  thresholds: PoolThresholds = { high: 0.7, low: 0.3, critical: 0.1 }
): BourgeoisieDecision {
  if (poolRatio < thresholds.critical) {
    return { decision: 'crisis', wageDelta: -0.15, repressionDelta: 0.2 };
  }
  if (poolRatio >= thresholds.high && aggregateTension < 0.3) {
    return { decision: 'bribery', wageDelta: 0.05, repressionDelta: 0 };
  }
  if (poolRatio < thresholds.low) {
    return aggregateTension > 0.5
      ? { decision: 'iron_fist', wageDelta: 0, repressionDelta: 0.1 }
      : { decision: 'austerity', wageDelta: -0.05, repressionDelta: 0 };
  }
  return { decision: 'no_change', wageDelta: 0, repressionDelta: 0 };
}

// ============================================================================
// Metabolic Rift
// ============================================================================

/**
 * Regeneration (none at or above max) minus extraction inflated by entropy
 */
export function biocapacityDelta(
  regenerationRate: number,
  maxBiocapacity: number,
  extractionIntensity: number,
  currentBiocapacity: number,
  entropyFactor: number = 1.2
): number {
  const regeneration = currentBiocapacity >= maxBiocapacity ? 0 : regenerationRate * maxBiocapacity;
  return regeneration - extractionIntensity * currentBiocapacity * entropyFactor;
}

export function overshootRatio(totalConsumption: number, totalBiocapacity: number): number {
  if (totalBiocapacity <= 0) return OVERSHOOT_CAP;
  return totalConsumption / totalBiocapacity;
}

// ============================================================================
// Registry Shape
// ============================================================================

/**
 * Named formula signatures known to the engine
 */
export interface Formulas {
  imperialRent: typeof imperialRent;
  valueTransfer: typeof valueTransfer;
  acquiescenceProbability: typeof acquiescenceProbability;
  revolutionProbability: typeof revolutionProbability;
  crossoverThreshold: typeof crossoverThreshold;
  lossAversion: typeof lossAversion;
  consciousnessDrift: typeof consciousnessDrift;
  solidarityTransmission: typeof solidarityTransmission;
  ideologicalRouting: typeof ideologicalRouting;
  bourgeoisieDecision: typeof bourgeoisieDecision;
  biocapacityDelta: typeof biocapacityDelta;
  overshootRatio: typeof overshootRatio;
}

export type FormulaName = keyof Formulas;

export const FORMULA_NAMES: readonly FormulaName[] = [
  'imperialRent',
  'valueTransfer',
  'acquiescenceProbability',
  'revolutionProbability',
  'crossoverThreshold',
  'lossAversion',
  'consciousnessDrift',
  'solidarityTransmission',
  'ideologicalRouting',
  'bourgeoisieDecision',
  'biocapacityDelta',
  'overshootRatio',
];

export const DEFAULT_FORMULAS: Readonly<Formulas> = Object.freeze({
  imperialRent,
  valueTransfer,
  acquiescenceProbability,
  revolutionProbability,
  crossoverThreshold,
  lossAversion,
  consciousnessDrift,
  solidarityTransmission,
  ideologicalRouting,
  bourgeoisieDecision,
  biocapacityDelta,
  overshootRatio,
});
