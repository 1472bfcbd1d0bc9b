/**
 * Training Session Coordinator
 *
 * Runs one guided training session at a time: starts it for a lesson, feeds
 * key chords through the interpreter and the training engine, records every
 * input and evaluation, and persists the session when it starts, completes
 * or is cancelled. Runtime state lives in a zustand store so UIs can
 * subscribe to it.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
  Clock,
  EngineOptions,
  EvaluationEvent,
  KeyChord,
  LessonData,
  ModuleData,
  TrainingSession,
  TrainingState,
} from '@/types';
import type { DataStore } from '@/stores/createDataStore';
import { nextSessionId } from '@/stores/sessionStore';
import { interpretChord } from '@/utils/inputInterpreter';
import {
  completeSession,
  createStoredEvaluation,
  createStoredInput,
  createTrainingSession,
  recordActivity,
} from '@/utils/sessionRecords';
import {
  DEFAULT_ENGINE_OPTIONS,
  createInitialState,
  createTargetSequence,
  processInput,
  systemClock,
} from '@/utils/trainingEngine';
import { SessionError } from './errors';

export interface CoordinatorState {
  session: TrainingSession | null;
  state: TrainingState | null;
  lastEvaluation: EvaluationEvent | null;
}

export interface CoordinatorDeps {
  modules: DataStore<ModuleData>;
  lessons: DataStore<LessonData>;
  sessions: DataStore<TrainingSession>;
  clock?: Clock;
  engineOptions?: () => EngineOptions;
}

export class TrainingSessionCoordinator {
  readonly store: StoreApi<CoordinatorState>;
  private readonly clock: Clock;

  constructor(private readonly deps: CoordinatorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.store = createStore<CoordinatorState>()(() => ({
      session: null,
      state: null,
      lastEvaluation: null,
    }));
  }

  get currentSession(): TrainingSession | null {
    return this.store.getState().session;
  }

  get currentState(): TrainingState | null {
    return this.store.getState().state;
  }

  get isSessionRunning(): boolean {
    const { session } = this.store.getState();
    return session !== null && !session.isCompleted;
  }

  startSession(moduleId: string, lessonId: string): TrainingSession {
    if (moduleId.trim() === '' || lessonId.trim() === '') {
      throw new SessionError('INVALID_ARGUMENT', 'moduleId and lessonId must not be empty');
    }
    if (this.isSessionRunning) {
      throw new SessionError('SESSION_RUNNING', 'A session is already running');
    }

    const lesson = this.deps.lessons.getState().items.find((entry) => entry.lessonId === lessonId);
    if (!lesson) {
      throw new SessionError('LESSON_NOT_FOUND', `Lesson '${lessonId}' not found`);
    }
    const moduleData = this.deps.modules.getState().items.find((entry) => entry.moduleId === moduleId);
    if (!moduleData) {
      throw new SessionError('MODULE_NOT_FOUND', `Module '${moduleId}' not found`);
    }
    if (lesson.moduleId !== moduleId) {
      throw new SessionError(
        'LESSON_MODULE_MISMATCH',
        `Lesson '${lessonId}' belongs to module '${lesson.moduleId}', not '${moduleId}'`
      );
    }

    const startedAt = this.clock.now();
    const sequence = createTargetSequence(lesson.exerciseText, this.engineOptions());
    const session = createTrainingSession({
      id: nextSessionId(this.deps.sessions.getState().items),
      moduleId,
      lessonId,
      startedAt,
    });

    this.deps.sessions.getState().add(session);
    this.store.setState({
      session,
      state: createInitialState(sequence, startedAt),
      lastEvaluation: null,
    });

    console.log(`[Session] Started session ${session.id} for ${moduleId}/${lessonId}`);
    return session;
  }

  processInput(chord: KeyChord): EvaluationEvent | null {
    const { session, state } = this.store.getState();
    if (!session || !state || session.isCompleted) {
      throw new SessionError('NO_SESSION', 'No session is running');
    }

    const now = this.clock.now();
    const event = interpretChord(chord);
    const result = processInput(state, event, now, this.engineOptions());
    const evaluation = result.evaluation;

    let updated = recordActivity(
      session,
      createStoredInput(event, now),
      evaluation ? createStoredEvaluation(evaluation) : null
    );

    if (result.state.isCompleted && result.state.endTime !== null) {
      updated = completeSession(updated, result.state.endTime);
      this.deps.sessions.getState().update(updated);
      console.log(`[Session] Completed session ${updated.id} with ${result.state.errors} errors`);
    }

    this.store.setState({ session: updated, state: result.state, lastEvaluation: evaluation });
    return evaluation;
  }

  /** Stops the running session and keeps what was typed so far. */
  cancelSession(): TrainingSession | null {
    const { session } = this.store.getState();
    if (!session || session.isCompleted) return null;

    this.deps.sessions.getState().update(session);
    this.store.setState({ session: null, state: null, lastEvaluation: null });
    console.log(`[Session] Cancelled session ${session.id}`);
    return session;
  }

  private engineOptions(): EngineOptions {
    return this.deps.engineOptions?.() ?? DEFAULT_ENGINE_OPTIONS;
  }
}
