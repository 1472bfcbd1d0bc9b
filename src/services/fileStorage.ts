/**
 * StateStorage adapters for the zustand persist middleware.
 *
 * File storage keeps one `<name>.json` per store inside a data directory.
 * Writes go to `<name>.json.tmp` first and the previous file is kept as
 * `<name>.json.bak`, so a crash mid-write never leaves a truncated store.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync, copyFileSync } from 'node:fs';
import { join } from 'node:path';
import type { StateStorage } from 'zustand/middleware';

export function storageFilePath(directory: string, name: string): string {
  return join(directory, `${name}.json`);
}

export function createFileStateStorage(directory: string): StateStorage {
  return {
    getItem(name: string): string | null {
      const filePath = storageFilePath(directory, name);
      if (!existsSync(filePath)) return null;
      return readFileSync(filePath, 'utf8');
    },
    setItem(name: string, value: string): void {
      mkdirSync(directory, { recursive: true });
      const filePath = storageFilePath(directory, name);
      const tmpPath = `${filePath}.tmp`;

      writeFileSync(tmpPath, value, 'utf8');
      if (existsSync(filePath)) {
        copyFileSync(filePath, `${filePath}.bak`);
      }
      renameSync(tmpPath, filePath);
    },
    removeItem(name: string): void {
      rmSync(storageFilePath(directory, name), { force: true });
    },
  };
}

// ---------------------------------------------------------------------------
// In-process storage (tests, ephemeral trainers)
// ---------------------------------------------------------------------------

export interface MemoryStateStorage extends StateStorage {
  /** Raw serialized values by store name */
  readonly entries: Map<string, string>;
}

export function createMemoryStateStorage(options: { async?: boolean } = {}): MemoryStateStorage {
  const entries = new Map<string, string>();

  if (options.async) {
    return {
      entries,
      getItem: async (name) => entries.get(name) ?? null,
      setItem: async (name, value) => {
        entries.set(name, value);
      },
      removeItem: async (name) => {
        entries.delete(name);
      },
    };
  }

  return {
    entries,
    getItem: (name) => entries.get(name) ?? null,
    setItem: (name, value) => {
      entries.set(name, value);
    },
    removeItem: (name) => {
      entries.delete(name);
    },
  };
}
