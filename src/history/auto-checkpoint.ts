/**
 * Auto-checkpointing
 * Writes a checkpoint every N ticks and keeps only the newest ones.
 */

import type { SimulationConfig, WorldState } from '../core/types.js';
import { createCheckpoint, saveCheckpoint, type PersistenceSink } from './checkpoint.js';

export interface AutoCheckpointPolicy {
  enabled: boolean;
  interval: number; // ticks between checkpoints
  retention: number; // checkpoints kept, 0 = unlimited
  prefix: string;
}

export const DEFAULT_AUTO_CHECKPOINT_POLICY: AutoCheckpointPolicy = {
  enabled: true,
  interval: 10,
  retention: 5,
  prefix: 'auto',
};

export type StepFn = (state: WorldState, config: SimulationConfig) => WorldState;

export class AutoCheckpointer {
  private readonly sink: PersistenceSink;
  readonly policy: AutoCheckpointPolicy;

  constructor(sink: PersistenceSink, policy: Partial<AutoCheckpointPolicy> = {}) {
    this.sink = sink;
    this.policy = { ...DEFAULT_AUTO_CHECKPOINT_POLICY, ...policy };
  }

  /**
   * Zero-padded so lexical key order is tick order
   */
  keyFor(tick: number): string {
    return `${this.policy.prefix}-${String(tick).padStart(8, '0')}`;
  }

  /**
   * Call after each committed tick. Returns the key written, or null.
   */
  onStep(state: WorldState, config: SimulationConfig): string | null {
    const { enabled, interval } = this.policy;
    if (!enabled || interval <= 0 || state.tick === 0 || state.tick % interval !== 0) {
      return null;
    }
    const key = this.keyFor(state.tick);
    saveCheckpoint(this.sink, key, createCheckpoint(state, config, `auto checkpoint at tick ${state.tick}`));
    this.enforceRetention();
    return key;
  }

  /**
   * Checkpoint now, regardless of interval or enabled flag
   */
  forceCheckpoint(state: WorldState, config: SimulationConfig, description: string = 'manual checkpoint'): string {
    const key = this.keyFor(state.tick);
    saveCheckpoint(this.sink, key, createCheckpoint(state, config, description));
    this.enforceRetention();
    return key;
  }

  listCheckpointKeys(): string[] {
    const prefix = `${this.policy.prefix}-`;
    return this.sink
      .list()
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  getLatestCheckpointKey(): string | null {
    const keys = this.listCheckpointKeys();
    return keys.length > 0 ? keys[keys.length - 1] : null;
  }

  /**
   * Wrap a step function so every call is followed by onStep
   */
  wrapStep(stepFn: StepFn): StepFn {
    return (state, config) => {
      const next = stepFn(state, config);
      this.onStep(next, config);
      return next;
    };
  }

  private enforceRetention(): void {
    const { retention } = this.policy;
    if (retention <= 0) return;

    const keys = this.listCheckpointKeys();
    for (const key of keys.slice(0, Math.max(0, keys.length - retention))) {
      this.sink.remove(key);
    }
  }
}
