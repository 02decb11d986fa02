/**
 * History Stack Tests
 */

import { describe, it, expect } from 'vitest';
import {
  canRedo,
  canUndo,
  createHistoryStack,
  getCurrentState,
  getStateAtTick,
  protectTick,
  pruneHistory,
  pushState,
  redo,
  undo,
  unprotectTick,
  type HistoryStack,
} from '../../src/history/stack.js';
import { BoundaryError } from '../../src/core/errors.js';
import { createSocialClass, createWorldState } from '../../src/core/world.js';
import type { WorldState } from '../../src/core/types.js';

function stateAt(tick: number): WorldState {
  return createWorldState({
    tick,
    entities: [createSocialClass({ id: 'C001', name: 'Worker', role: 'periphery_proletariat' })],
  });
}

function stackOf(ticks: number[], maxDepth: number = 100): HistoryStack {
  return ticks.reduce((stack, tick) => pushState(stack, stateAt(tick)), createHistoryStack(maxDepth));
}

const ticksOf = (stack: HistoryStack) => stack.entries.map((e) => e.tick);

describe('HistoryStack', () => {
  it('starts empty', () => {
    const stack = createHistoryStack();

    expect(stack.currentIndex).toBe(-1);
    expect(getCurrentState(stack)).toBeUndefined();
    expect(canUndo(stack)).toBe(false);
    expect(canRedo(stack)).toBe(false);
  });

  it('push moves the cursor to the new entry', () => {
    const stack = stackOf([0, 1, 2]);

    expect(stack.currentIndex).toBe(2);
    expect(getCurrentState(stack)?.tick).toBe(2);
  });

  it('operations return new stacks', () => {
    const original = stackOf([0, 1]);
    const pushed = pushState(original, stateAt(2));

    expect(ticksOf(original)).toEqual([0, 1]);
    expect(ticksOf(pushed)).toEqual([0, 1, 2]);
    expect(Object.isFrozen(pushed)).toBe(true);
  });

  it('undo and redo walk the timeline', () => {
    const stack = stackOf([0, 1, 2]);

    const back = undo(stack);
    expect(back.state.tick).toBe(1);
    expect(canRedo(back.stack)).toBe(true);

    const forward = redo(back.stack);
    expect(forward.state.tick).toBe(2);
    expect(canRedo(forward.stack)).toBe(false);
  });

  it('undo at the first entry and redo at the last throw BoundaryError', () => {
    const single = stackOf([0]);

    expect(() => undo(single)).toThrow(BoundaryError);
    expect(() => redo(single)).toThrow(BoundaryError);
    expect(() => undo(createHistoryStack())).toThrow(BoundaryError);
  });

  it('pushing after an undo discards the abandoned future', () => {
    const stack = stackOf([0, 1, 2]);
    const rewound = undo(undo(stack).stack).stack;
    const branched = pushState(rewound, stateAt(5));

    expect(ticksOf(branched)).toEqual([0, 5]);
    expect(canRedo(branched)).toBe(false);
    expect(() => redo(branched)).toThrow(BoundaryError);
  });

  it('looks up states by tick', () => {
    const stack = stackOf([0, 1, 2]);

    expect(getStateAtTick(stack, 1)?.tick).toBe(1);
    expect(getStateAtTick(stack, 9)).toBeUndefined();
  });

  describe('pruning', () => {
    it('keeps the newest entries within maxDepth', () => {
      const stack = stackOf([0, 1, 2, 3, 4], 3);

      expect(ticksOf(stack)).toEqual([2, 3, 4]);
      expect(stack.currentIndex).toBe(2);
    });

    it('never drops a protected tick', () => {
      let stack = stackOf([0, 1], 3);
      stack = protectTick(stack, 0);
      stack = [2, 3, 4].reduce((s, tick) => pushState(s, stateAt(tick)), stack);

      expect(ticksOf(stack)).toEqual([0, 3, 4]);
    });

    it('may stay above the target when entries are pinned', () => {
      let stack = stackOf([0, 1, 2, 3]);
      stack = protectTick(protectTick(stack, 0), 1);

      expect(ticksOf(pruneHistory(stack, 1))).toEqual([0, 1, 3]);
    });

    it('never drops the current entry', () => {
      const stack = stackOf([0, 1, 2, 3]);
      const rewound = undo(undo(stack).stack).stack;
      const pruned = pruneHistory(rewound, 1);

      expect(ticksOf(pruned)).toEqual([1]);
      expect(getCurrentState(pruned)?.tick).toBe(1);
    });

    it('unprotect makes a tick prunable again', () => {
      let stack = protectTick(stackOf([0, 1, 2]), 0);
      stack = unprotectTick(stack, 0);

      expect(ticksOf(pruneHistory(stack, 1))).toEqual([2]);
    });

    it('protect and unprotect are idempotent', () => {
      const stack = protectTick(stackOf([0]), 0);

      expect(protectTick(stack, 0)).toBe(stack);
      expect(unprotectTick(stackOf([0]), 0).protectedTicks.size).toBe(0);
    });
  });
});
