import { useCallback, useMemo, useState } from 'react';
import { useStore } from 'zustand';
import type { EvaluationEvent, KeyChord, KeyboardEventLike, TrainingSession } from '@/types';
import type { TrainingSessionCoordinator } from '@/services/trainingSessionCoordinator';
import { userMessage } from '@/services/errors';
import { chordFromKeyboardEvent, findChordForGrapheme } from '@/utils/keyboardLayout';
import { expectedSymbol } from '@/utils/trainingEngine';

export interface TrainingProgress {
  position: number;
  total: number;
  errors: number;
  corrections: number;
  isErrorActive: boolean;
  isCompleted: boolean;
}

/**
 * Binds a TrainingSessionCoordinator to React. State comes straight from the
 * coordinator's store; coordinator errors end up in `error` instead of being
 * thrown into the render tree.
 */
export function useTrainingSession(coordinator: TrainingSessionCoordinator) {
  const session = useStore(coordinator.store, (s) => s.session);
  const state = useStore(coordinator.store, (s) => s.state);
  const lastEvaluation = useStore(coordinator.store, (s) => s.lastEvaluation);
  const [error, setError] = useState<string | null>(null);

  const progress = useMemo<TrainingProgress | null>(() => {
    if (!state) return null;
    return {
      position: state.currentTargetIndex,
      total: state.sequence.symbols.length,
      errors: state.errors,
      corrections: state.corrections,
      isErrorActive: state.isErrorActive,
      isCompleted: state.isCompleted,
    };
  }, [state]);

  const expectedGrapheme = state ? (expectedSymbol(state)?.grapheme ?? null) : null;
  const expectedChord = expectedGrapheme !== null ? findChordForGrapheme(expectedGrapheme) : null;

  const start = useCallback(
    (moduleId: string, lessonId: string): TrainingSession | null => {
      try {
        const started = coordinator.startSession(moduleId, lessonId);
        setError(null);
        return started;
      } catch (err) {
        console.warn('[Session] Could not start session:', err);
        setError(userMessage(err));
        return null;
      }
    },
    [coordinator]
  );

  const handleChord = useCallback(
    (chord: KeyChord): EvaluationEvent | null => {
      if (!coordinator.isSessionRunning) return null;
      try {
        const evaluation = coordinator.processInput(chord);
        setError(null);
        return evaluation;
      } catch (err) {
        console.warn('[Session] Input rejected:', err);
        setError(userMessage(err));
        return null;
      }
    },
    [coordinator]
  );

  const handleKeyDown = useCallback(
    (event: KeyboardEventLike): EvaluationEvent | null => {
      const chord = chordFromKeyboardEvent(event);
      return chord ? handleChord(chord) : null;
    },
    [handleChord]
  );

  const cancel = useCallback(() => {
    setError(null);
    return coordinator.cancelSession();
  }, [coordinator]);

  return {
    session,
    state,
    lastEvaluation,
    progress,
    expectedGrapheme,
    expectedChord,
    error,
    start,
    handleChord,
    handleKeyDown,
    cancel,
  };
}
