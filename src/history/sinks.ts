/**
 * Persistence sinks for checkpoints: a directory of JSON files and an
 * in-memory map. The SQLite sink lives with the database in storage/.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { PersistenceSink } from './checkpoint.js';
import { ConfigurationError } from '../core/errors.js';

const KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertCheckpointKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new ConfigurationError(`Invalid checkpoint key: ${JSON.stringify(key)}`);
  }
}

/**
 * One `<key>.json` file per checkpoint. Writes go to a temp file that is
 * renamed into place, so a reader never sees a half-written checkpoint.
 */
export class FileCheckpointSink implements PersistenceSink {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
    fs.mkdirSync(this.directory, { recursive: true });
  }

  private fileFor(key: string): string {
    assertCheckpointKey(key);
    return path.join(this.directory, `${key}.json`);
  }

  write(key: string, data: string): void {
    const target = this.fileFor(key);
    const temp = path.join(this.directory, `.${key}.${process.pid}.tmp`);
    fs.writeFileSync(temp, data, 'utf-8');
    fs.renameSync(temp, target);
  }

  read(key: string): string | null {
    const file = this.fileFor(key);
    if (!fs.existsSync(file)) return null;
    return fs.readFileSync(file, 'utf-8');
  }

  exists(key: string): boolean {
    return fs.existsSync(this.fileFor(key));
  }

  list(): string[] {
    return fs
      .readdirSync(this.directory)
      .filter((name) => name.endsWith('.json') && !name.startsWith('.'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  remove(key: string): boolean {
    const file = this.fileFor(key);
    if (!fs.existsSync(file)) return false;
    fs.unlinkSync(file);
    return true;
  }
}

export class MemoryCheckpointSink implements PersistenceSink {
  private readonly store = new Map<string, string>();

  write(key: string, data: string): void {
    assertCheckpointKey(key);
    this.store.set(key, data);
  }

  read(key: string): string | null {
    return this.store.get(key) ?? null;
  }

  exists(key: string): boolean {
    return this.store.has(key);
  }

  list(): string[] {
    return Array.from(this.store.keys()).sort();
  }

  remove(key: string): boolean {
    return this.store.delete(key);
  }
}
