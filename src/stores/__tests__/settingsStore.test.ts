import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryStateStorage, type MemoryStateStorage } from '@/services/fileStorage';
import { DEFAULT_SETTINGS, createSettingsStore, engineOptionsFrom, sanitizeSettings } from '../settingsStore';

describe('settingsStore', () => {
  let storage: MemoryStateStorage;

  beforeEach(() => {
    storage = createMemoryStateStorage();
  });

  it('has correct default values', () => {
    const state = createSettingsStore(storage).getState();
    expect(state.caseSensitivity).toBe('strict');
    expect(state.mustCorrectErrors).toBe(true);
    expect(state.lineBreaksAreTargets).toBe(true);
    expect(state.maxBlockLength).toBe(24);
    expect(state.recentSessionCount).toBe(10);
  });

  it('updates evaluation settings', () => {
    const store = createSettingsStore(storage);
    store.getState().setCaseSensitivity('ignoreCase');
    store.getState().setMustCorrectErrors(false);
    store.getState().setLineBreaksAreTargets(false);

    expect(engineOptionsFrom(store.getState())).toEqual({ mustCorrectErrors: false, lineBreaksAreTargets: false });
    expect(store.getState().caseSensitivity).toBe('ignoreCase');
  });

  it('clamps numeric settings', () => {
    const store = createSettingsStore(storage);
    store.getState().setMaxBlockLength(0);
    store.getState().setRecentSessionCount(500);

    expect(store.getState().maxBlockLength).toBe(1);
    expect(store.getState().recentSessionCount).toBe(100);

    store.getState().setMaxBlockLength(32.4);
    expect(store.getState().maxBlockLength).toBe(32);
  });

  it('persists only the settings values', () => {
    const store = createSettingsStore(storage);
    store.getState().setMaxBlockLength(40);

    expect(JSON.parse(storage.entries.get('settings') ?? 'null')).toEqual({
      state: { ...DEFAULT_SETTINGS, maxBlockLength: 40 },
      version: 1,
    });
  });

  it('restores stored settings in a new store', () => {
    createSettingsStore(storage).getState().setCaseSensitivity('ignoreCase');

    expect(createSettingsStore(storage).getState().caseSensitivity).toBe('ignoreCase');
  });

  it('ignores malformed stored values', () => {
    storage.entries.set(
      'settings',
      JSON.stringify({ state: { caseSensitivity: 'loose', maxBlockLength: 999, mustCorrectErrors: 'yes' }, version: 1 })
    );
    const state = createSettingsStore(storage).getState();

    expect(state.caseSensitivity).toBe('strict');
    expect(state.mustCorrectErrors).toBe(true);
    expect(state.maxBlockLength).toBe(200);
  });

  it('resets to defaults', () => {
    const store = createSettingsStore(storage);
    store.getState().setRecentSessionCount(3);
    store.getState().resetSettings();

    expect(store.getState().recentSessionCount).toBe(10);
  });

  it('sanitizes non-objects to nothing', () => {
    expect(sanitizeSettings('x')).toEqual({});
    expect(sanitizeSettings({ recentSessionCount: 0 })).toEqual({ recentSessionCount: 1 });
  });
});
