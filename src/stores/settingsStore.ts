import { create } from 'zustand';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import type { CaseSensitivity, EngineOptions, TrainerSettings } from '@/types';
import { SETTINGS_STORAGE_NAME } from '@/constants/storage';
import { createMemoryStateStorage } from '@/services/fileStorage';
import { isFiniteNumber, isRecord } from '@/utils/guards';

interface SettingsState extends TrainerSettings {
  // Evaluation setters
  setCaseSensitivity: (caseSensitivity: CaseSensitivity) => void;
  setMustCorrectErrors: (enabled: boolean) => void;
  setLineBreaksAreTargets: (enabled: boolean) => void;

  // Lesson setters
  setMaxBlockLength: (length: number) => void;

  // History setters
  setRecentSessionCount: (count: number) => void;

  // Reset
  resetSettings: () => void;
}

export const DEFAULT_SETTINGS: TrainerSettings = {
  caseSensitivity: 'strict',
  mustCorrectErrors: true,
  lineBreaksAreTargets: true,
  maxBlockLength: 24,
  recentSessionCount: 10,
};

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, Math.round(value)));

export function createSettingsStore(storage: StateStorage = createMemoryStateStorage()) {
  return create<SettingsState>()(
    persist(
      (set) => ({
        ...DEFAULT_SETTINGS,

        // Evaluation
        setCaseSensitivity: (caseSensitivity) => set({ caseSensitivity }),
        setMustCorrectErrors: (mustCorrectErrors) => set({ mustCorrectErrors }),
        setLineBreaksAreTargets: (lineBreaksAreTargets) => set({ lineBreaksAreTargets }),

        // Lessons
        setMaxBlockLength: (length) => set({ maxBlockLength: clamp(length, 1, 200) }),

        // History
        setRecentSessionCount: (count) => set({ recentSessionCount: clamp(count, 1, 100) }),

        resetSettings: () => set({ ...DEFAULT_SETTINGS }),
      }),
      {
        name: SETTINGS_STORAGE_NAME,
        storage: createJSONStorage<TrainerSettings>(() => storage),
        version: 1,
        merge: (persisted, current) => ({ ...current, ...sanitizeSettings(persisted) }),
        partialize: (state): TrainerSettings => ({
          caseSensitivity: state.caseSensitivity,
          mustCorrectErrors: state.mustCorrectErrors,
          lineBreaksAreTargets: state.lineBreaksAreTargets,
          maxBlockLength: state.maxBlockLength,
          recentSessionCount: state.recentSessionCount,
        }),
      }
    )
  );
}

/** Keeps only well-formed values from a stored settings object. */
export function sanitizeSettings(raw: unknown): Partial<TrainerSettings> {
  if (!isRecord(raw)) return {};
  const settings: Partial<TrainerSettings> = {};

  if (raw.caseSensitivity === 'strict' || raw.caseSensitivity === 'ignoreCase') {
    settings.caseSensitivity = raw.caseSensitivity;
  }
  if (typeof raw.mustCorrectErrors === 'boolean') settings.mustCorrectErrors = raw.mustCorrectErrors;
  if (typeof raw.lineBreaksAreTargets === 'boolean') settings.lineBreaksAreTargets = raw.lineBreaksAreTargets;
  if (isFiniteNumber(raw.maxBlockLength)) settings.maxBlockLength = clamp(raw.maxBlockLength, 1, 200);
  if (isFiniteNumber(raw.recentSessionCount)) settings.recentSessionCount = clamp(raw.recentSessionCount, 1, 100);

  return settings;
}

export type SettingsStore = ReturnType<typeof createSettingsStore>;

export function engineOptionsFrom(settings: TrainerSettings): EngineOptions {
  return {
    mustCorrectErrors: settings.mustCorrectErrors,
    lineBreaksAreTargets: settings.lineBreaksAreTargets,
  };
}
