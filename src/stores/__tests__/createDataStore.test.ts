import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMemoryStateStorage, type MemoryStateStorage } from '@/services/fileStorage';
import { StoreKey, createInMemoryStore, createPersistentStore, loadStore } from '../createDataStore';

interface Note {
  id: string;
  text: string;
}

function reviveNote(raw: unknown): Note | null {
  if (typeof raw !== 'object' || raw === null) return null;
  if (!('id' in raw) || !('text' in raw)) return null;
  const { id, text } = raw;
  return typeof id === 'string' && typeof text === 'string' ? { id, text } : null;
}

const NOTES = new StoreKey<Note>({
  name: 'notes',
  comparer: (a, b) => a.id === b.id,
  revive: reviveNote,
});

const note = (id: string, text = id): Note => ({ id, text });

describe('createInMemoryStore', () => {
  it('adds items once per comparer identity', () => {
    const store = createInMemoryStore(NOTES);

    expect(store.getState().add(note('a'))).toBe(true);
    expect(store.getState().add(note('a', 'other'))).toBe(false);
    expect(store.getState().items).toEqual([note('a')]);
  });

  it('skips duplicates inside one range', () => {
    const store = createInMemoryStore(NOTES);
    expect(store.getState().addRange([note('a'), note('b'), note('a')])).toBe(2);
    expect(store.getState().items.map((item) => item.id)).toEqual(['a', 'b']);
  });

  it('replaces an existing item on update', () => {
    const store = createInMemoryStore(NOTES);
    store.getState().addRange([note('a'), note('b')]);

    expect(store.getState().update(note('a', 'changed'))).toBe(true);
    expect(store.getState().update(note('z'))).toBe(false);
    expect(store.getState().items).toEqual([note('a', 'changed'), note('b')]);
  });

  it('removes items', () => {
    const store = createInMemoryStore(NOTES);
    store.getState().addRange([note('a'), note('b'), note('c'), note('d')]);

    expect(store.getState().remove(note('a'))).toBe(true);
    expect(store.getState().remove(note('a'))).toBe(false);
    expect(store.getState().removeRange([note('b'), note('x')])).toBe(1);
    expect(store.getState().removeWhere((item) => item.id === 'c')).toBe(1);
    expect(store.getState().items).toEqual([note('d')]);

    store.getState().clear();
    expect(store.getState().items).toEqual([]);
  });

  it('notifies subscribers only on real changes', () => {
    const store = createInMemoryStore(NOTES);
    const listener = vi.fn();
    store.subscribe(listener);

    store.getState().add(note('a'));
    store.getState().add(note('a'));
    store.getState().removeWhere(() => false);

    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('createPersistentStore', () => {
  let storage: MemoryStateStorage;

  beforeEach(() => {
    storage = createMemoryStateStorage();
  });

  it('writes the collection on every change', () => {
    const store = createPersistentStore(NOTES, storage);
    store.getState().add(note('a'));

    expect(JSON.parse(storage.entries.get('notes') ?? 'null')).toEqual({
      state: { items: [note('a')] },
      version: 1,
    });
  });

  it('loads stored items on creation', () => {
    storage.entries.set('notes', JSON.stringify({ state: { items: [note('a'), note('b')] }, version: 1 }));
    const store = createPersistentStore(NOTES, storage);

    expect(store.getState().items).toEqual([note('a'), note('b')]);
  });

  it('waits for load when autoLoad is off', async () => {
    storage.entries.set('notes', JSON.stringify({ state: { items: [note('a')] }, version: 1 }));
    const store = createPersistentStore(NOTES, storage, { autoLoad: false });
    expect(store.getState().items).toEqual([]);

    await loadStore(store);
    expect(store.getState().items).toEqual([note('a')]);
  });

  it('merges stored items into items added before loading', async () => {
    storage.entries.set('notes', JSON.stringify({ state: { items: [note('a', 'stored'), note('b')] }, version: 1 }));
    const store = createPersistentStore(NOTES, storage, { autoLoad: false });
    store.getState().add(note('a', 'memory'));

    await loadStore(store);
    expect(store.getState().items).toEqual([note('a', 'memory'), note('b')]);
  });

  it('skips invalid records and keeps the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    storage.entries.set('notes', JSON.stringify({ state: { items: [note('a'), { id: 1 }] }, version: 1 }));

    const store = createPersistentStore(NOTES, storage);

    expect(store.getState().items).toEqual([note('a')]);
    expect(warn).toHaveBeenCalledWith('[DataStore] Skipping invalid record #1 in "notes"');
    warn.mockRestore();
  });

  it('starts empty when the stored items are not a list', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    storage.entries.set('notes', JSON.stringify({ state: { items: 'broken' }, version: 1 }));

    expect(createPersistentStore(NOTES, storage).getState().items).toEqual([]);
    warn.mockRestore();
  });

  it('logs a corrupt file and leaves the store as it was', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    storage.entries.set('notes', '{"state": {"items": [');
    const store = createPersistentStore(NOTES, storage, { autoLoad: false });
    store.getState().add(note('a'));

    await loadStore(store);

    expect(store.getState().items).toEqual([note('a')]);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toBe('[DataStore] Failed to load "notes":');
    error.mockRestore();
  });

  it('loads asynchronous storage through loadStore', async () => {
    const asyncStorage = createMemoryStateStorage({ async: true });
    asyncStorage.entries.set('notes', JSON.stringify({ state: { items: [note('a')] }, version: 1 }));
    const store = createPersistentStore(NOTES, asyncStorage, { autoLoad: false });

    await loadStore(store);
    expect(store.getState().items).toEqual([note('a')]);
  });
});
