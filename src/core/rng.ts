/**
 * Seeded Random Number Generator for deterministic simulation
 * Uses xoroshiro64* over two 32-bit words; the state lives in the WorldState
 * so that replaying (or undoing to) a snapshot reproduces the same draws
 */

import type { RNGState } from './types.js';

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

export class SeededRNG {
  private state: RNGState;

  constructor(seedOrState: number | RNGState) {
    this.state =
      typeof seedOrState === 'number'
        ? SeededRNG.stateFromSeed(seedOrState)
        : { s0: seedOrState.s0 >>> 0, s1: seedOrState.s1 >>> 0 };

    if (this.state.s0 === 0 && this.state.s1 === 0) {
      this.state.s1 = 1; // all-zero state is a fixed point
    }
  }

  /**
   * Derive an initial state from a numeric seed (murmur-style avalanche)
   */
  static stateFromSeed(seed: number): RNGState {
    let s = seed >>> 0;

    s = Math.imul((s >>> 16) ^ s, 0x45d9f3b) >>> 0;
    s = Math.imul((s >>> 16) ^ s, 0x45d9f3b) >>> 0;
    s = ((s >>> 16) ^ s) >>> 0;
    const s0 = s;

    s = Math.imul((s >>> 16) ^ s, 0x45d9f3b) >>> 0;
    s = Math.imul((s >>> 16) ^ s, 0x45d9f3b) >>> 0;
    s = ((s >>> 16) ^ s) >>> 0;
    const s1 = s;

    return { s0: s0 || 1, s1: s1 || 1 };
  }

  /**
   * Get current state for serialization
   */
  getState(): RNGState {
    return { ...this.state };
  }

  /**
   * Generate next random uint32
   */
  private next(): number {
    const s0 = this.state.s0;
    let s1 = this.state.s1;
    const result = Math.imul(s0, 0x9e3779bb) >>> 0;

    s1 = (s1 ^ s0) >>> 0;
    this.state.s0 = (rotl(s0, 26) ^ s1 ^ (s1 << 9)) >>> 0;
    this.state.s1 = rotl(s1, 13);

    return result;
  }

  /**
   * Generate random float in [0, 1)
   */
  random(): number {
    return this.next() / 0x100000000;
  }

  /**
   * Generate random float in [min, max)
   */
  randomRange(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  /**
   * Generate random integer in [min, max] inclusive
   */
  randomInt(min: number, max: number): number {
    return Math.floor(this.randomRange(min, max + 1));
  }

  /**
   * Generate random boolean with given probability
   */
  randomBool(probability: number = 0.5): boolean {
    return this.random() < probability;
  }

  /**
   * Pick random element from array
   */
  pick<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new Error('Cannot pick from empty array');
    }
    return array[this.randomInt(0, array.length - 1)];
  }
}

/**
 * Create a hash from state for determinism verification.
 * Event timestamps are wall-clock values and are left out.
 */
export function hashState(obj: unknown): string {
  const str = JSON.stringify(obj, (key, value: unknown) => {
    if (key === 'timestamp') return undefined;
    if (value instanceof Map) {
      return Array.from(value.entries()).sort((a, b) =>
        String(a[0]).localeCompare(String(b[0]))
      );
    }
    return value;
  });

  // djb2
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16);
}
