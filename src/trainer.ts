/**
 * Wires stores, settings and services into one trainer instance.
 */

import type { StateStorage } from 'zustand/middleware';
import type { Clock } from '@/types';
import { resolveDataDirectory } from '@/constants/storage';
import { LESSONS, LESSON_GUIDES, MODULES } from '@/stores/contentStores';
import { TRAINING_SESSIONS } from '@/stores/sessionStore';
import { createSettingsStore, engineOptionsFrom } from '@/stores/settingsStore';
import { ContentImportService } from '@/services/contentImportService';
import { ContentQueryService } from '@/services/contentQueryService';
import { DataStoreProvider } from '@/services/dataStoreProvider';
import { createFileStateStorage } from '@/services/fileStorage';
import { LessonLibrary } from '@/services/lessonLibrary';
import { SessionQueryService } from '@/services/sessionQueryService';
import { StatisticsQueryService } from '@/services/statisticsQueryService';
import { TrainingSessionCoordinator } from '@/services/trainingSessionCoordinator';
import { TypingEngine } from '@/utils/typingEngine';

export interface TrainerOptions {
  /** Directory for the JSON store files; defaults to the configured data directory. */
  dataDirectory?: string;
  /** Overrides file storage entirely (tests, in-memory trainers). */
  storage?: StateStorage;
  clock?: Clock;
}

function resolveStorage(options: TrainerOptions): { storage: StateStorage; dataDirectory: string | null } {
  if (options.storage) return { storage: options.storage, dataDirectory: null };

  const dataDirectory = options.dataDirectory ?? resolveDataDirectory();
  return { storage: createFileStateStorage(dataDirectory), dataDirectory };
}

export function createTrainer(options: TrainerOptions = {}) {
  const { storage, dataDirectory } = resolveStorage(options);

  const provider = new DataStoreProvider(storage);
  const settings = createSettingsStore(storage);

  const modules = provider.getPersistent(MODULES);
  const lessons = provider.getPersistent(LESSONS);
  const guides = provider.getPersistent(LESSON_GUIDES);
  const sessions = provider.getPersistent(TRAINING_SESSIONS);

  const coordinator = new TrainingSessionCoordinator({
    modules,
    lessons,
    sessions,
    clock: options.clock,
    engineOptions: () => engineOptionsFrom(settings.getState()),
  });

  return {
    dataDirectory,
    provider,
    settings,
    stores: { modules, lessons, guides, sessions },
    coordinator,
    lessonLibrary: new LessonLibrary({
      lessons,
      guides,
      maxBlockLength: () => settings.getState().maxBlockLength,
    }),
    contentImport: new ContentImportService({ modules, lessons, guides, outputFolderPath: dataDirectory }),
    contentQueries: new ContentQueryService({ modules, lessons, guides, sessions }),
    sessionQueries: new SessionQueryService({
      sessions,
      modules,
      lessons,
      recentSessionCount: () => settings.getState().recentSessionCount,
    }),
    statistics: new StatisticsQueryService({ sessions, modules, lessons }),
    /** Free-practice engine honouring the configured case sensitivity. */
    createTypingEngine: () => new TypingEngine({ caseSensitivity: settings.getState().caseSensitivity }),
  };
}

export type Trainer = ReturnType<typeof createTrainer>;
