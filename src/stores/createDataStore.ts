/**
 * Generic DataStore
 *
 * A zustand vanilla store holding an immutable item list plus the actions to
 * change it. Equality is decided by the store key's comparer, so adding an
 * item that is already present is a no-op. Persistent stores use the persist
 * middleware: every change writes the whole collection, hydration merges the
 * stored items into whatever is already in memory.
 */

import { createStore, type Mutate, type StoreApi } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';

export type Comparer<T> = (a: T, b: T) => boolean;

export interface StoreKeyOptions<T> {
  name: string;
  comparer: Comparer<T>;
  /** Validates a persisted record; null drops it. */
  revive: (raw: unknown) => T | null;
}

/**
 * Identifies one kind of store. Instances cached per provider live on the key
 * itself, so lookups stay fully typed without a type-erased registry.
 */
export class StoreKey<T> {
  readonly name: string;
  readonly comparer: Comparer<T>;
  readonly revive: (raw: unknown) => T | null;

  /** @internal provider caches */
  readonly inMemoryInstances = new WeakMap<object, DataStore<T>>();
  /** @internal */
  readonly persistentInstances = new WeakMap<object, PersistentDataStore<T>>();
  /** @internal */
  readonly pendingInstances = new WeakMap<object, Promise<PersistentDataStore<T>>>();

  constructor(options: StoreKeyOptions<T>) {
    this.name = options.name;
    this.comparer = options.comparer;
    this.revive = options.revive;
  }
}

export interface DataStoreState<T> {
  items: readonly T[];

  add: (item: T) => boolean;
  addRange: (items: readonly T[]) => number;
  /** Replaces the stored item equal to `item`. */
  update: (item: T) => boolean;
  remove: (item: T) => boolean;
  removeRange: (items: readonly T[]) => number;
  removeWhere: (predicate: (item: T) => boolean) => number;
  clear: () => void;
}

interface PersistedItems<T> {
  items: readonly T[];
}

export type DataStore<T> = StoreApi<DataStoreState<T>>;

export type PersistentDataStore<T> = Mutate<
  StoreApi<DataStoreState<T>>,
  [['zustand/persist', PersistedItems<T>]]
>;

export interface PersistentStoreOptions {
  autoLoad?: boolean;
}

// ---------------------------------------------------------------------------
// Shared state creator
// ---------------------------------------------------------------------------

type SetItems<T> = (partial: Pick<DataStoreState<T>, 'items'>) => void;

function withoutDuplicates<T>(existing: readonly T[], incoming: readonly T[], comparer: Comparer<T>): T[] {
  const accepted: T[] = [];
  for (const item of incoming) {
    const known = existing.some((other) => comparer(other, item)) || accepted.some((other) => comparer(other, item));
    if (!known) accepted.push(item);
  }
  return accepted;
}

function dataStoreState<T>(
  comparer: Comparer<T>,
  set: SetItems<T>,
  get: () => DataStoreState<T>
): DataStoreState<T> {
  return {
    items: [],

    add: (item) => get().addRange([item]) === 1,

    addRange: (items) => {
      const current = get().items;
      const accepted = withoutDuplicates(current, items, comparer);
      if (accepted.length === 0) return 0;
      set({ items: [...current, ...accepted] });
      return accepted.length;
    },

    update: (item) => {
      const current = get().items;
      const index = current.findIndex((other) => comparer(other, item));
      if (index === -1) return false;
      const next = [...current];
      next[index] = item;
      set({ items: next });
      return true;
    },

    remove: (item) => get().removeWhere((other) => comparer(other, item)) > 0,

    removeRange: (items) => get().removeWhere((other) => items.some((item) => comparer(other, item))),

    removeWhere: (predicate) => {
      const current = get().items;
      const kept = current.filter((item) => !predicate(item));
      const removed = current.length - kept.length;
      if (removed > 0) set({ items: kept });
      return removed;
    },

    clear: () => {
      set({ items: [] });
    },
  };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createInMemoryStore<T>(key: StoreKey<T>): DataStore<T> {
  return createStore<DataStoreState<T>>()((set, get) => dataStoreState(key.comparer, set, get));
}

export function reviveItems<T>(key: StoreKey<T>, persisted: unknown): T[] {
  if (typeof persisted !== 'object' || persisted === null || !('items' in persisted)) return [];
  const raw = persisted.items;
  if (!Array.isArray(raw)) {
    console.warn(`[DataStore] Ignoring "${key.name}": stored items are not a list`);
    return [];
  }

  const items: T[] = [];
  raw.forEach((entry: unknown, index) => {
    const item = key.revive(entry);
    if (item === null) {
      console.warn(`[DataStore] Skipping invalid record #${index} in "${key.name}"`);
    } else {
      items.push(item);
    }
  });
  return items;
}

export function createPersistentStore<T>(
  key: StoreKey<T>,
  storage: StateStorage,
  options: PersistentStoreOptions = {}
): PersistentDataStore<T> {
  return createStore<DataStoreState<T>>()(
    persist((set, get) => dataStoreState(key.comparer, set, get), {
      name: key.name,
      version: 1,
      storage: createJSONStorage<PersistedItems<T>>(() => storage),
      skipHydration: options.autoLoad === false,
      partialize: (state): PersistedItems<T> => ({ items: state.items }),
      merge: (persisted, current) => {
        const stored = reviveItems(key, persisted);
        return {
          ...current,
          items: [...current.items, ...withoutDuplicates(current.items, stored, key.comparer)],
        };
      },
      onRehydrateStorage: () => (_state, error) => {
        if (error) {
          console.error(`[DataStore] Failed to load "${key.name}":`, error);
        }
      },
    })
  );
}

/** Loads stored items into a persistent store (persist rehydrate). */
export async function loadStore<T>(store: PersistentDataStore<T>): Promise<void> {
  await store.persist.rehydrate();
}
