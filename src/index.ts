export type * from './types';

export { createTrainer, type Trainer, type TrainerOptions } from './trainer';

// Keyboard
export {
  LAYOUT_NAME,
  NO_MODIFIERS,
  chordFromKeyboardEvent,
  findChordForGrapheme,
  formatModifiers,
  isKeyId,
  isModifierKey,
  mapChordToGrapheme,
} from './utils/keyboardLayout';
export { createKeyStroke, formatKeyStroke } from './utils/keyStroke';
export { interpretChord } from './utils/inputInterpreter';
export { InputBuffer, type KeyMapper } from './utils/inputBuffer';

// Engines
export { TypingEngine, type TypingEngineOptions } from './utils/typingEngine';
export { createTypingEngineState, describeTypingState, startTypingState } from './utils/typingEngineState';
export {
  DEFAULT_ENGINE_OPTIONS,
  createInitialState,
  createTargetSequence,
  createTrainingState,
  expectedSymbol,
  processInput,
  systemClock,
  type ProcessResult,
} from './utils/trainingEngine';

// Lessons and records
export {
  DEFAULT_MAX_BLOCK_LENGTH,
  createLesson,
  createLessonMetaData,
  createModuleGuide,
  describeLesson,
  lessonFromText,
  wrapText,
} from './utils/lessonFactory';
export { metricsFromBlocks } from './utils/lessonMetrics';
export {
  createLessonData,
  createLessonGuideData,
  createModuleData,
  generateLessonId,
} from './utils/contentRecords';
export {
  completeSession,
  countErrors,
  createTrainingSession,
  reopenSession,
  sessionAccuracy,
  sessionDuration,
} from './utils/sessionRecords';
export { visibleSymbol } from './utils/symbols';
export { composeText, graphemeLength, splitGraphemes } from './utils/graphemes';

// Stores
export {
  StoreKey,
  createInMemoryStore,
  createPersistentStore,
  loadStore,
  type DataStore,
  type DataStoreState,
  type PersistentDataStore,
} from './stores/createDataStore';
export { LESSONS, LESSON_GUIDES, MODULES } from './stores/contentStores';
export { TRAINING_SESSIONS } from './stores/sessionStore';
export { DEFAULT_SETTINGS, createSettingsStore, type SettingsStore } from './stores/settingsStore';

// Services
export { DataStoreError, SessionError, ValidationError, userMessage, type SessionErrorCode } from './services/errors';
export { createFileStateStorage, createMemoryStateStorage } from './services/fileStorage';
export { DataStoreProvider } from './services/dataStoreProvider';
export { LessonLibrary } from './services/lessonLibrary';
export {
  ContentImportService,
  type ContentImportRequest,
  type ContentImportResult,
} from './services/contentImportService';
export { TrainingSessionCoordinator, type CoordinatorState } from './services/trainingSessionCoordinator';
export { ContentQueryService, createPreviewText } from './services/contentQueryService';
export { SessionQueryService, calculateMetrics } from './services/sessionQueryService';
export { StatisticsQueryService } from './services/statisticsQueryService';

// React
export { useTrainingSession, type TrainingProgress } from './hooks/useTrainingSession';
export { useTypingPractice, type PracticeCompletion, type TypingPracticeOptions } from './hooks/useTypingPractice';
