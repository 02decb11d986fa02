/**
 * History Stack
 * Immutable undo/redo timeline of committed world states.
 *
 * Every operation returns a new stack. Pushing after an undo discards the
 * abandoned future. Pruning drops the oldest entries first and never drops
 * a protected tick or the current entry.
 */

import type { WorldState } from '../core/types.js';
import { BoundaryError } from '../core/errors.js';

export interface HistoryEntry {
  readonly tick: number;
  readonly state: WorldState;
}

export interface HistoryStack {
  readonly entries: readonly HistoryEntry[];
  readonly currentIndex: number; // -1 when empty
  readonly maxDepth: number;
  readonly protectedTicks: ReadonlySet<number>;
}

export interface HistoryMove {
  stack: HistoryStack;
  state: WorldState;
}

export function createHistoryStack(maxDepth: number = 100): HistoryStack {
  return Object.freeze({
    entries: Object.freeze([]),
    currentIndex: -1,
    maxDepth: Math.max(1, maxDepth),
    protectedTicks: new Set<number>(),
  });
}

function withChanges(stack: HistoryStack, changes: Partial<HistoryStack>): HistoryStack {
  return Object.freeze({ ...stack, ...changes });
}

/**
 * Append a state after the current entry. Redo history is discarded, then
 * the stack is pruned back to maxDepth.
 */
export function pushState(stack: HistoryStack, state: WorldState): HistoryStack {
  const kept = stack.entries.slice(0, stack.currentIndex + 1);
  const entries = Object.freeze([...kept, Object.freeze({ tick: state.tick, state })]);
  const pushed = withChanges(stack, { entries, currentIndex: entries.length - 1 });
  return entries.length > stack.maxDepth ? pruneHistory(pushed) : pushed;
}

export function canUndo(stack: HistoryStack): boolean {
  return stack.currentIndex > 0;
}

export function canRedo(stack: HistoryStack): boolean {
  return stack.currentIndex >= 0 && stack.currentIndex < stack.entries.length - 1;
}

/**
 * Move the cursor back one entry; throws BoundaryError at the earliest entry
 */
export function undo(stack: HistoryStack): HistoryMove {
  if (!canUndo(stack)) {
    throw new BoundaryError('undo');
  }
  const currentIndex = stack.currentIndex - 1;
  return { stack: withChanges(stack, { currentIndex }), state: stack.entries[currentIndex].state };
}

/**
 * Move the cursor forward one entry; throws BoundaryError at the latest entry
 */
export function redo(stack: HistoryStack): HistoryMove {
  if (!canRedo(stack)) {
    throw new BoundaryError('redo');
  }
  const currentIndex = stack.currentIndex + 1;
  return { stack: withChanges(stack, { currentIndex }), state: stack.entries[currentIndex].state };
}

export function getCurrentState(stack: HistoryStack): WorldState | undefined {
  return stack.currentIndex >= 0 ? stack.entries[stack.currentIndex].state : undefined;
}

export function getStateAtTick(stack: HistoryStack, tick: number): WorldState | undefined {
  return stack.entries.find((entry) => entry.tick === tick)?.state;
}

export function protectTick(stack: HistoryStack, tick: number): HistoryStack {
  if (stack.protectedTicks.has(tick)) return stack;
  return withChanges(stack, { protectedTicks: new Set([...stack.protectedTicks, tick]) });
}

export function unprotectTick(stack: HistoryStack, tick: number): HistoryStack {
  if (!stack.protectedTicks.has(tick)) return stack;
  const protectedTicks = new Set(stack.protectedTicks);
  protectedTicks.delete(tick);
  return withChanges(stack, { protectedTicks });
}

/**
 * Drop the oldest removable entries until at most `keepCount` remain.
 * Protected ticks and the current entry are never removed, so the result
 * can stay above `keepCount` when too many entries are pinned.
 */
export function pruneHistory(stack: HistoryStack, keepCount: number = stack.maxDepth): HistoryStack {
  let excess = stack.entries.length - Math.max(0, keepCount);
  if (excess <= 0) return stack;

  const current: HistoryEntry | undefined = stack.entries[stack.currentIndex];
  const entries: HistoryEntry[] = [];

  for (const entry of stack.entries) {
    const removable = entry !== current && !stack.protectedTicks.has(entry.tick);
    if (excess > 0 && removable) {
      excess--;
      continue;
    }
    entries.push(entry);
  }

  return withChanges(stack, {
    entries: Object.freeze(entries),
    currentIndex: current === undefined ? -1 : entries.indexOf(current),
  });
}
