/**
 * Formula Tests
 * Pure numeric functions used by the systems
 */

import { describe, it, expect } from 'vitest';
import {
  acquiescenceProbability,
  biocapacityDelta,
  bourgeoisieDecision,
  consciousnessDrift,
  crossoverThreshold,
  ideologicalRouting,
  imperialRent,
  lossAversion,
  overshootRatio,
  revolutionProbability,
  solidarityTransmission,
  valueTransfer,
  type DriftInput,
} from '../../src/core/formulas.js';

describe('value extraction', () => {
  it('imperialRent scales with wages and unconsciousness', () => {
    expect(imperialRent(0.8, 0.5, 0)).toBeCloseTo(0.4, 10);
    expect(imperialRent(0.8, 0.5, 0.5)).toBeCloseTo(0.2, 10);
    expect(imperialRent(0.8, 0.5, 1)).toBe(0);
  });

  it('imperialRent is never negative', () => {
    expect(imperialRent(0.8, 0.5, 1.5)).toBe(0);
  });

  it('valueTransfer follows the exchange ratio', () => {
    expect(valueTransfer(100, 2)).toBe(50);
    expect(valueTransfer(100, 1)).toBe(0);
    expect(valueTransfer(100, 0)).toBe(0);
  });
});

describe('survival calculus', () => {
  it('acquiescence is one half at the threshold', () => {
    expect(acquiescenceProbability(0.3, 0.3, 10)).toBe(0.5);
  });

  it('acquiescence rises with wealth', () => {
    expect(acquiescenceProbability(0.2, 0.3, 10)).toBeLessThan(0.5);
    expect(acquiescenceProbability(0.4, 0.3, 10)).toBeGreaterThan(0.5);
  });

  it('acquiescence stays finite at extreme inputs', () => {
    expect(acquiescenceProbability(1000, 0, 10)).toBeCloseTo(1, 10);
    expect(acquiescenceProbability(-1000, 0, 10)).toBeCloseTo(0, 10);
  });

  it('revolution probability is organization over repression, capped', () => {
    expect(revolutionProbability(0, 0.5)).toBe(0);
    expect(revolutionProbability(0.1, 0.5)).toBeCloseTo(0.2, 5);
    expect(revolutionProbability(0.8, 0.1)).toBe(1);
    expect(revolutionProbability(0.5, 0)).toBe(1);
  });

  it('crossover is the wealth where both probabilities meet', () => {
    const crossover = crossoverThreshold(0.1, 0.5, 0.3, 10);

    expect(acquiescenceProbability(crossover, 0.3, 10)).toBeCloseTo(revolutionProbability(0.1, 0.5), 6);
    expect(crossover).toBeCloseTo(0.161, 3);
  });

  it('crossover clamps at the extremes', () => {
    expect(crossoverThreshold(0, 0.5, 0.3, 10)).toBe(0);
    expect(crossoverThreshold(0.9, 0.1, 0.3, 10)).toBe(1);
  });

  it('lossAversion weighs losses by lambda', () => {
    expect(lossAversion(-1)).toBe(-2.25);
    expect(lossAversion(-1, 3)).toBe(-3);
    expect(lossAversion(1)).toBe(1);
  });
});

describe('consciousness', () => {
  const base: DriftInput = {
    coreWages: 0.5,
    valueProduced: 1,
    consciousness: 0.2,
    sensitivity: 0.1,
    decay: 0.1,
    solidarityPressure: 0,
    wageChange: 0,
    lossAversionLambda: 2.25,
  };

  it('drift is zero when nothing was produced', () => {
    expect(consciousnessDrift({ ...base, valueProduced: 0 })).toBe(0);
  });

  it('drift balances exploitation against decay', () => {
    expect(consciousnessDrift(base)).toBeCloseTo(0.03, 10);
  });

  it('falling wages push drift up with solidarity and down without', () => {
    expect(consciousnessDrift({ ...base, wageChange: -0.1, solidarityPressure: 0.5 })).toBeCloseTo(0.1425, 10);
    expect(consciousnessDrift({ ...base, wageChange: -0.1 })).toBeCloseTo(-0.195, 10);
  });

  it('transmission needs an awakened source and a real edge', () => {
    expect(solidarityTransmission(0.5, 0.1, 0.5, 0.3)).toBeCloseTo(0.2, 10);
    expect(solidarityTransmission(0.3, 0.1, 0.5, 0.3)).toBe(0);
    expect(solidarityTransmission(0.5, 0.1, 0, 0.3)).toBe(0);
  });

  it('transmission can pull a more conscious target down', () => {
    expect(solidarityTransmission(0.5, 0.9, 0.5, 0.3)).toBeCloseTo(-0.2, 10);
  });

  describe('ideologicalRouting', () => {
    const routing = {
      wageChange: -0.1,
      solidarityPressure: 1,
      classConsciousness: 0.2,
      nationalIdentity: 0.3,
      agitation: 0,
      agitationDecay: 0.1,
      lossAversionLambda: 2.25,
      routingScale: 0.1,
    };

    it('routes agitation into class consciousness under solidarity', () => {
      const result = ideologicalRouting(routing);

      expect(result.classConsciousness).toBeCloseTo(0.2225, 10);
      expect(result.nationalIdentity).toBeCloseTo(0.3, 10);
      expect(result.agitation).toBeCloseTo(0.2025, 10);
    });

    it('routes agitation into national identity without solidarity', () => {
      const result = ideologicalRouting({ ...routing, solidarityPressure: 0 });

      expect(result.classConsciousness).toBeCloseTo(0.2, 10);
      expect(result.nationalIdentity).toBeCloseTo(0.3225, 10);
    });

    it('leaves a calm class unchanged', () => {
      expect(ideologicalRouting({ ...routing, wageChange: 0.1 })).toEqual({
        classConsciousness: 0.2,
        nationalIdentity: 0.3,
        agitation: 0,
      });
    });

    it('caps both axes at 1', () => {
      const result = ideologicalRouting({
        ...routing,
        solidarityPressure: 0.5,
        classConsciousness: 0.99,
        nationalIdentity: 0.99,
        agitation: 10,
      });

      expect(result.classConsciousness).toBe(1);
      expect(result.nationalIdentity).toBe(1);
    });
  });
});

describe('bourgeoisieDecision', () => {
  it('declares crisis below the critical ratio', () => {
    expect(bourgeoisieDecision(0.05, 0)).toEqual({ decision: 'crisis', wageDelta: -0.15, repressionDelta: 0.2 });
  });

  it('bribes when the pool is full and tension low', () => {
    expect(bourgeoisieDecision(0.8, 0.2).decision).toBe('bribery');
    expect(bourgeoisieDecision(0.8, 0.3).decision).toBe('no_change');
  });

  it('chooses iron fist or austerity on a low pool', () => {
    expect(bourgeoisieDecision(0.2, 0.6)).toEqual({ decision: 'iron_fist', wageDelta: 0, repressionDelta: 0.1 });
    expect(bourgeoisieDecision(0.2, 0.4)).toEqual({ decision: 'austerity', wageDelta: -0.05, repressionDelta: 0 });
  });

  it('holds steady in between', () => {
    expect(bourgeoisieDecision(0.5, 0.1).decision).toBe('no_change');
  });

  it('honors custom thresholds', () => {
    expect(bourgeoisieDecision(0.5, 0.1, { high: 0.4, low: 0.2, critical: 0.05 }).decision).toBe('bribery');
  });
});

describe('metabolic rift', () => {
  it('regenerates below max and not at max', () => {
    expect(biocapacityDelta(0.02, 100, 0, 50)).toBeCloseTo(2, 10);
    expect(biocapacityDelta(0.02, 100, 0, 100)).toBe(0);
  });

  it('extraction is inflated by entropy', () => {
    expect(biocapacityDelta(0.02, 100, 0.1, 50, 1.2)).toBeCloseTo(-4, 10);
  });

  it('overshoot compares consumption to biocapacity', () => {
    expect(overshootRatio(10, 5)).toBe(2);
    expect(overshootRatio(1, 0)).toBe(999);
  });
});
