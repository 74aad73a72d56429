/**
 * Persistence of the bonded device set.
 *
 * Identifiers are kept as a string array under one well-known key of a
 * key-value store, so any store (a JSON file, a browser localStorage
 * wrapper, a database row) can back it.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

export const BONDED_DEVICE_IDS_KEY = 'bondedDeviceIDs';

/**
 * Minimal interface the manager needs to remember bonded devices.
 */
export interface BondStore {
  loadIdentifiers(): Set<string>;
  saveIdentifiers(identifiers: ReadonlySet<string>): void;
}

/**
 * Synchronous key-value store holding JSON-compatible values.
 */
export interface KeyValueStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private values = new Map<string, unknown>();

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }
}

/**
 * Key-value store persisted as a single JSON object on disk.
 *
 * The file is read on every access so several processes see each other's
 * writes.
 */
export class JsonFileStore implements KeyValueStore {
  constructor(private readonly filePath: string) {}

  get(key: string): unknown {
    return this.readAll()[key];
  }

  set(key: string, value: unknown): void {
    const values = this.readAll();
    values[key] = value;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(values, null, 2) + '\n', 'utf8');
  }

  private readAll(): Record<string, unknown> {
    if (!existsSync(this.filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      console.warn(
        `Ignoring unreadable settings file ${this.filePath}: ` +
          (error instanceof Error ? error.message : String(error))
      );
      return {};
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      console.warn(`Ignoring settings file ${this.filePath}: not a JSON object`);
      return {};
    }
    return Object.fromEntries(Object.entries(parsed));
  }
}

/**
 * BondStore on top of a key-value store.
 */
export class KeyValueBondStore implements BondStore {
  constructor(
    private readonly store: KeyValueStore = new MemoryKeyValueStore(),
    private readonly key: string = BONDED_DEVICE_IDS_KEY
  ) {}

  loadIdentifiers(): Set<string> {
    const value = this.store.get(this.key);
    if (!Array.isArray(value)) {
      return new Set();
    }
    return new Set(value.filter((item): item is string => typeof item === 'string'));
  }

  saveIdentifiers(identifiers: ReadonlySet<string>): void {
    this.store.set(this.key, [...identifiers]);
  }
}

/**
 * Bond store persisted in a JSON settings file.
 */
export function createFileBondStore(filePath: string): BondStore {
  return new KeyValueBondStore(new JsonFileStore(filePath));
}
