/**
 * Observer Notifier
 * Fans committed ticks out to observers in registration order and keeps
 * their failures away from the caller of step().
 */

import type { SimulationConfig, WorldState } from '../core/types.js';
import { ObserverError } from '../core/errors.js';
import type { HookResult, ObserverFailure, ObserverHook, SimulationObserver } from './types.js';

export interface NotifierOptions {
  timeoutMs: number;
  /** Rethrow synchronous hook errors after the notification pass */
  rethrow: boolean;
}

const MAX_FAILURES = 100;

export class ObserverTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Observer hook timed out after ${timeoutMs}ms`);
    this.name = 'ObserverTimeoutError';
  }
}

export class ObserverNotifier {
  private observers: SimulationObserver[] = [];
  private pending: Set<Promise<void>> = new Set();
  private failures: ObserverFailure[] = [];
  private options: NotifierOptions;

  constructor(options: NotifierOptions) {
    this.options = { ...options };
  }

  add(observer: SimulationObserver): void {
    this.observers.push(observer);
  }

  /**
   * Remove by instance or by name. Returns false when nothing matched.
   */
  remove(observer: SimulationObserver | string): boolean {
    const index = this.observers.findIndex((o) =>
      typeof observer === 'string' ? o.name === observer : o === observer
    );
    if (index === -1) return false;
    this.observers.splice(index, 1);
    return true;
  }

  list(): readonly SimulationObserver[] {
    return [...this.observers];
  }

  notifyStart(initialState: WorldState, config: Readonly<SimulationConfig>): void {
    this.dispatch('onSimulationStart', initialState.tick, (o) => o.onSimulationStart?.(initialState, config));
  }

  notifyTick(previousState: WorldState, newState: WorldState): void {
    this.dispatch('onTick', newState.tick, (o) => o.onTick?.(previousState, newState));
  }

  notifyEnd(finalState: WorldState): void {
    this.dispatch('onSimulationEnd', finalState.tick, (o) => o.onSimulationEnd?.(finalState));
  }

  /**
   * Wait for every outstanding async hook to settle or time out
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  getFailures(): ObserverFailure[] {
    return [...this.failures];
  }

  clearFailures(): void {
    this.failures = [];
  }

  private dispatch(hook: ObserverHook, tick: number, invoke: (observer: SimulationObserver) => HookResult): void {
    let firstSyncError: ObserverError | null = null;

    for (const observer of [...this.observers]) {
      let result: HookResult;
      try {
        result = invoke(observer);
      } catch (error) {
        const failure = this.record(observer, hook, tick, error, false);
        firstSyncError ??= failure;
        continue;
      }

      if (result instanceof Promise) {
        this.track(observer, hook, tick, result);
      }
    }

    if (this.options.rethrow && firstSyncError !== null) {
      throw firstSyncError;
    }
  }

  private track(observer: SimulationObserver, hook: ObserverHook, tick: number, result: Promise<void>): void {
    const tracked: Promise<void> = withTimeout(result, this.options.timeoutMs)
      .then(
        () => undefined,
        (error: unknown) => {
          this.record(observer, hook, tick, error, error instanceof ObserverTimeoutError);
        }
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private record(
    observer: SimulationObserver,
    hook: ObserverHook,
    tick: number,
    cause: unknown,
    timedOut: boolean
  ): ObserverError {
    const error = new ObserverError(observer.name, hook, cause);
    error.annotate(tick, observer.name);
    console.error(`[Observer] ${observer.name}.${hook} failed at tick ${tick}:`, cause);

    this.failures.push({ observer: observer.name, hook, tick, timedOut, error });
    if (this.failures.length > MAX_FAILURES) {
      this.failures.shift();
    }
    return error;
  }
}

/**
 * Reject with ObserverTimeoutError when the promise has not settled in time.
 * A non-positive timeout disables the bound.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ObserverTimeoutError(timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) clearTimeout(timer);
  });
}
