/**
 * Endgame Detector Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  EndgameDetector,
  averageProletarianConsciousness,
  countFascistClasses,
  solidarityPercolation,
} from '../../src/observers/endgame.js';
import { createRelationship, createSocialClass, createWorldState } from '../../src/core/world.js';
import type { IdeologicalProfile, Relationship, SocialClass, SocialRole, WorldState } from '../../src/core/types.js';

function cls(id: string, role: SocialRole, ideology: Partial<IdeologicalProfile>): SocialClass {
  return createSocialClass({ id, name: id, role, ideology });
}

function world(
  tick: number,
  entities: SocialClass[],
  relationships: Relationship[] = [],
  overshootRatio: number = 0
): WorldState {
  return createWorldState({ tick, entities, relationships, economy: { overshootRatio } });
}

const awake = { classConsciousness: 0.9, nationalIdentity: 0.1 };
const calm = { classConsciousness: 0.5, nationalIdentity: 0.1 };
const reactionary = { classConsciousness: 0, nationalIdentity: 0.5 };

function revolutionaryWorld(tick: number, overshootRatio: number = 0): WorldState {
  return world(
    tick,
    [cls('C001', 'periphery_proletariat', awake), cls('C002', 'internal_proletariat', awake)],
    [createRelationship('C001', 'C002', 'solidarity', { solidarityStrength: 0.5 })],
    overshootRatio
  );
}

function overshootWorld(tick: number, fascists: number = 0): WorldState {
  const entities = [cls('C001', 'periphery_proletariat', calm)];
  for (let i = 0; i < fascists; i++) {
    entities.push(cls(`C00${i + 2}`, 'labor_aristocracy', reactionary));
  }
  return world(tick, entities, [], 3);
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('endgame measures', () => {
  it('percolation is the largest solidarity component over all classes', () => {
    const state = world(
      0,
      [cls('C001', 'periphery_proletariat', calm), cls('C002', 'periphery_proletariat', calm), cls('C003', 'core_bourgeoisie', calm)],
      [createRelationship('C002', 'C001', 'solidarity', { solidarityStrength: 0.2 })]
    );

    expect(solidarityPercolation(state)).toBeCloseTo(2 / 3, 10);
  });

  it('ignores solidarity edges with no strength', () => {
    const state = world(
      0,
      [cls('C001', 'periphery_proletariat', calm), cls('C002', 'periphery_proletariat', calm)],
      [createRelationship('C001', 'C002', 'solidarity')]
    );

    expect(solidarityPercolation(state)).toBe(0.5);
  });

  it('percolation is 0 without classes', () => {
    expect(solidarityPercolation(world(0, []))).toBe(0);
  });

  it('averages consciousness over active proletarian classes only', () => {
    const state = world(0, [
      cls('C001', 'periphery_proletariat', { classConsciousness: 0.6 }),
      cls('C002', 'internal_proletariat', { classConsciousness: 0.2 }),
      cls('C003', 'core_bourgeoisie', { classConsciousness: 1 }),
    ]);

    expect(averageProletarianConsciousness(state)).toBeCloseTo(0.4, 10);
  });

  it('counts classes whose national identity exceeds their consciousness', () => {
    const state = world(0, [
      cls('C001', 'periphery_proletariat', reactionary),
      cls('C002', 'labor_aristocracy', reactionary),
      cls('C003', 'periphery_proletariat', calm),
    ]);

    expect(countFascistClasses(state)).toBe(2);
  });
});

describe('EndgameDetector', () => {
  it('reports revolutionary victory', () => {
    const detector = new EndgameDetector();

    detector.onTick(revolutionaryWorld(0), revolutionaryWorld(1));

    expect(detector.getResult()).toEqual({ outcome: 'revolutionary_victory', tick: 1 });
    expect(detector.isGameOver).toBe(true);
  });

  it('reports fascist consolidation at three fascist classes', () => {
    const detector = new EndgameDetector();
    const state = world(4, [
      cls('C001', 'labor_aristocracy', reactionary),
      cls('C002', 'labor_aristocracy', reactionary),
      cls('C003', 'carceral_enforcer', reactionary),
    ]);

    detector.onTick(state, state);

    expect(detector.outcome).toBe('fascist_consolidation');
  });

  it('needs five consecutive overshoot ticks for ecological collapse', () => {
    const detector = new EndgameDetector();

    for (let tick = 1; tick <= 4; tick++) {
      detector.onTick(overshootWorld(tick - 1), overshootWorld(tick));
    }
    expect(detector.outcome).toBeNull();

    detector.onTick(overshootWorld(4), overshootWorld(5));
    expect(detector.getResult()).toEqual({ outcome: 'ecological_collapse', tick: 5 });
  });

  it('a tick at or below the threshold resets the streak', () => {
    const detector = new EndgameDetector();
    const recovered = world(5, [cls('C001', 'periphery_proletariat', calm)], [], 2);

    for (let tick = 1; tick <= 4; tick++) {
      detector.onTick(overshootWorld(tick - 1), overshootWorld(tick));
    }
    detector.onTick(overshootWorld(4), recovered);
    for (let tick = 6; tick <= 9; tick++) {
      detector.onTick(overshootWorld(tick - 1), overshootWorld(tick));
    }

    expect(detector.outcome).toBeNull();
  });

  it('revolution takes priority over ecological collapse', () => {
    const detector = new EndgameDetector();

    for (let tick = 1; tick <= 4; tick++) {
      detector.onTick(overshootWorld(tick - 1), overshootWorld(tick));
    }
    detector.onTick(overshootWorld(4), revolutionaryWorld(5, 3));

    expect(detector.outcome).toBe('revolutionary_victory');
  });

  it('ecological collapse takes priority over fascism', () => {
    const detector = new EndgameDetector();

    for (let tick = 1; tick <= 4; tick++) {
      detector.onTick(overshootWorld(tick - 1, 2), overshootWorld(tick, 2));
    }
    expect(detector.outcome).toBeNull();

    detector.onTick(overshootWorld(4, 3), overshootWorld(5, 3));
    expect(detector.outcome).toBe('ecological_collapse');
  });

  it('the first outcome is final and listeners hear it once', () => {
    const detector = new EndgameDetector();
    const listener = vi.fn();
    detector.subscribe(listener);
    const fascist = world(2, [
      cls('C001', 'labor_aristocracy', reactionary),
      cls('C002', 'labor_aristocracy', reactionary),
      cls('C003', 'labor_aristocracy', reactionary),
    ]);

    detector.onTick(revolutionaryWorld(0), revolutionaryWorld(1));
    detector.onTick(revolutionaryWorld(1), fascist);

    expect(detector.getResult()).toEqual({ outcome: 'revolutionary_victory', tick: 1 });
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ outcome: 'revolutionary_victory', tick: 1 });
  });

  it('a throwing listener does not prevent the outcome', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const detector = new EndgameDetector();
    detector.subscribe(() => {
      throw new Error('listener failure');
    });

    detector.onTick(revolutionaryWorld(0), revolutionaryWorld(1));

    expect(detector.outcome).toBe('revolutionary_victory');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('onSimulationStart clears a previous result', () => {
    const detector = new EndgameDetector();
    detector.onTick(revolutionaryWorld(0), revolutionaryWorld(1));

    detector.onSimulationStart();

    expect(detector.getResult()).toBeNull();
  });
});
