/**
 * Error taxonomy for the simulation core
 *
 * Every error carries a stable `code`. Errors raised while a tick is running
 * are annotated with the tick number and the failing system's name so the
 * failure can be reproduced from the same state.
 */

export type SimulationErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'BOUNDARY_ERROR'
  | 'NOT_FOUND'
  | 'CHECKPOINT_NOT_FOUND'
  | 'CHECKPOINT_CORRUPTED'
  | 'CHECKPOINT_SCHEMA'
  | 'OBSERVER_ERROR'
  | 'SYSTEM_FAILURE'
  | 'SIMULATION_ENDED';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;
  tick: number | null = null;
  system: string | null = null;

  constructor(code: SimulationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SimulationError';
    this.code = code;
  }

  /**
   * Attach tick/system context (first annotation wins)
   */
  annotate(tick: number, system: string): this {
    if (this.tick === null) this.tick = tick;
    if (this.system === null) this.system = system;
    return this;
  }

  describe(): string {
    const where = this.system !== null ? ` in ${this.system}` : '';
    const when = this.tick !== null ? ` at tick ${this.tick}` : '';
    return `${this.code}${where}${when}: ${this.message}`;
  }
}

export class ValidationError extends SimulationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('VALIDATION_ERROR', `Invalid world state: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ConfigurationError extends SimulationError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

export class BoundaryError extends SimulationError {
  readonly direction: 'undo' | 'redo';

  constructor(direction: 'undo' | 'redo') {
    super(
      'BOUNDARY_ERROR',
      direction === 'undo' ? 'Already at the earliest history entry' : 'Already at the latest history entry'
    );
    this.name = 'BoundaryError';
    this.direction = direction;
  }
}

export class NotFoundError extends SimulationError {
  constructor(what: string, key: string) {
    super('NOT_FOUND', `${what} not found: ${key}`);
    this.name = 'NotFoundError';
  }
}

export class CheckpointNotFoundError extends SimulationError {
  readonly key: string;

  constructor(key: string) {
    super('CHECKPOINT_NOT_FOUND', `Checkpoint not found: ${key}`);
    this.name = 'CheckpointNotFoundError';
    this.key = key;
  }
}

export class CheckpointCorruptedError extends SimulationError {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    super('CHECKPOINT_CORRUPTED', `Checkpoint is not valid JSON: ${key}`, { cause });
    this.name = 'CheckpointCorruptedError';
    this.key = key;
  }
}

export class CheckpointSchemaError extends SimulationError {
  readonly key: string;
  readonly issues: string[];

  constructor(key: string, issues: string[]) {
    super('CHECKPOINT_SCHEMA', `Checkpoint ${key} failed schema validation: ${issues.join('; ')}`);
    this.name = 'CheckpointSchemaError';
    this.key = key;
    this.issues = issues;
  }
}

export class ObserverError extends SimulationError {
  readonly observer: string;
  readonly hook: string;

  constructor(observer: string, hook: string, cause: unknown) {
    super('OBSERVER_ERROR', `Observer ${observer}.${hook} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'ObserverError';
    this.observer = observer;
    this.hook = hook;
  }
}

export class SystemFailureError extends SimulationError {
  constructor(cause: unknown) {
    super('SYSTEM_FAILURE', errorMessage(cause), { cause });
    this.name = 'SystemFailureError';
  }
}

export class SimulationEndedError extends SimulationError {
  constructor() {
    super('SIMULATION_ENDED', 'Simulation has already ended');
    this.name = 'SimulationEndedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
