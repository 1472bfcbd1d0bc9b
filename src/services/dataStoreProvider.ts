/**
 * DataStore Provider
 *
 * Hands out in-memory and persistent DataStores per StoreKey. Singleton
 * requests are cached, so every service asking for the same key shares one
 * store; concurrent async first access shares a single pending creation.
 */

import type { StateStorage } from 'zustand/middleware';
import {
  createInMemoryStore,
  createPersistentStore,
  loadStore,
  type DataStore,
  type PersistentDataStore,
  type StoreKey,
} from '@/stores/createDataStore';
import { DataStoreError } from './errors';
import { createMemoryStateStorage } from './fileStorage';

export interface InMemoryStoreRequest {
  isSingleton?: boolean;
}

export interface PersistentStoreRequest {
  isSingleton?: boolean;
  autoLoad?: boolean;
}

interface Registration {
  name: string;
  kind: 'inMemory' | 'persistent';
  release: () => void;
}

export class DataStoreProvider {
  /** Keyed by StoreKey identity, matching the per-key instance caches. */
  private readonly registrations = new Map<object, Registration>();

  constructor(private readonly storage: StateStorage = createMemoryStateStorage()) {}

  getInMemory<T>(key: StoreKey<T>, request: InMemoryStoreRequest = {}): DataStore<T> {
    const isSingleton = request.isSingleton ?? true;
    if (!isSingleton) return createInMemoryStore(key);

    const existing = key.inMemoryInstances.get(this);
    if (existing) return existing;

    const store = createInMemoryStore(key);
    key.inMemoryInstances.set(this, store);
    this.register(key, 'inMemory', () => key.inMemoryInstances.delete(this));
    return store;
  }

  getPersistent<T>(key: StoreKey<T>, request: PersistentStoreRequest = {}): PersistentDataStore<T> {
    const isSingleton = request.isSingleton ?? true;
    const autoLoad = request.autoLoad ?? true;
    if (!isSingleton) return createPersistentStore(key, this.storage, { autoLoad });

    const existing = key.persistentInstances.get(this);
    if (existing) return existing;

    const store = createPersistentStore(key, this.storage, { autoLoad });
    key.persistentInstances.set(this, store);
    this.register(key, 'persistent', () => {
      key.persistentInstances.delete(this);
      key.pendingInstances.delete(this);
    });
    console.log(`[DataStore] Created persistent store "${key.name}"`);
    return store;
  }

  /**
   * Like getPersistent, but resolves once stored items are loaded. Needed for
   * async storages, where hydration finishes after creation.
   */
  getPersistentAsync<T>(key: StoreKey<T>, request: PersistentStoreRequest = {}): Promise<PersistentDataStore<T>> {
    const isSingleton = request.isSingleton ?? true;
    const autoLoad = request.autoLoad ?? true;

    const create = async (): Promise<PersistentDataStore<T>> => {
      const store = this.getPersistent(key, { isSingleton, autoLoad: false });
      if (autoLoad) await loadStore(store);
      return store;
    };

    if (!isSingleton) return create();

    const pending = key.pendingInstances.get(this);
    if (pending) return pending;

    const existing = key.persistentInstances.get(this);
    if (existing) return Promise.resolve(existing);

    const creation = create().finally(() => key.pendingInstances.delete(this));
    key.pendingInstances.set(this, creation);
    return creation;
  }

  /** Registered singleton for `key`, persistent preferred over in-memory. */
  getDataStore<T>(key: StoreKey<T>): DataStore<T> {
    const store = key.persistentInstances.get(this) ?? key.inMemoryInstances.get(this);
    if (store) return store;

    const registered = [...this.registrations.values()].map((registration) => registration.name);
    throw new DataStoreError(
      key.name,
      `No DataStore registered for "${key.name}". ` +
        `Request it through getInMemory() or getPersistent() first. ` +
        `Registered stores: ${registered.length > 0 ? registered.join(', ') : '(none)'}`
    );
  }

  hasDataStore<T>(key: StoreKey<T>): boolean {
    return this.registrations.has(key);
  }

  removeSingleton<T>(key: StoreKey<T>): boolean {
    const registration = this.registrations.get(key);
    if (!registration) return false;

    registration.release();
    this.registrations.delete(key);
    return true;
  }

  clearAll(): void {
    this.registrations.forEach((registration) => registration.release());
    this.registrations.clear();
  }

  private register<T>(key: StoreKey<T>, kind: Registration['kind'], release: () => void): void {
    const previous = this.registrations.get(key);
    if (previous && previous.kind !== kind) {
      // Same key as both flavours: release both together.
      this.registrations.set(key, {
        name: key.name,
        kind,
        release: () => {
          previous.release();
          release();
        },
      });
      return;
    }
    this.registrations.set(key, { name: key.name, kind, release });
  }
}
