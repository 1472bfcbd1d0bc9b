/**
 * Training Engine
 *
 * Pure reducer over guided-training input. With mustCorrectErrors a wrong
 * character blocks progress until it is removed with Backspace; every state
 * transition returns a new, validated TrainingState.
 */

import type {
  Clock,
  EngineOptions,
  EvaluationEvent,
  InputEvent,
  TargetSequence,
  TargetSymbol,
  TrainingState,
} from '@/types';
import { ValidationError } from '@/services/errors';
import { composeText, splitGraphemes } from './graphemes';

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  mustCorrectErrors: true,
  lineBreaksAreTargets: true,
};

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface ProcessResult {
  state: TrainingState;
  evaluation: EvaluationEvent | null;
}

// ---------------------------------------------------------------------------
// Target sequence
// ---------------------------------------------------------------------------

export function normalizeLineBreaks(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function createTargetSequence(
  text: string,
  options: Pick<EngineOptions, 'lineBreaksAreTargets'> = DEFAULT_ENGINE_OPTIONS
): TargetSequence {
  let normalized = composeText(normalizeLineBreaks(text));
  if (!options.lineBreaksAreTargets) {
    normalized = normalized.replace(/\n/g, ' ');
  }

  const symbols: TargetSymbol[] = splitGraphemes(normalized).map((grapheme, index) => ({ index, grapheme }));

  return validateSequence({ symbols });
}

export function validateSequence(sequence: TargetSequence): TargetSequence {
  if (sequence.symbols.length === 0) {
    throw new ValidationError('sequence', 'target sequence must contain at least one symbol');
  }
  sequence.symbols.forEach((symbol, position) => {
    if (symbol.index !== position) {
      throw new ValidationError('sequence', `symbol at position ${position} has index ${symbol.index}`);
    }
    if (symbol.grapheme.length === 0) {
      throw new ValidationError('sequence', `symbol ${position} has an empty grapheme`);
    }
  });
  return sequence;
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export function createTrainingState(state: TrainingState): TrainingState {
  const length = state.sequence.symbols.length;
  const counters = ['totalInputs', 'errors', 'corrections', 'backspaces'] as const;

  for (const counter of counters) {
    if (!Number.isInteger(state[counter]) || state[counter] < 0) {
      throw new ValidationError(counter, 'must be a non-negative integer');
    }
  }
  if (state.currentTargetIndex < 0 || state.currentTargetIndex > length) {
    throw new ValidationError('currentTargetIndex', `must be within 0..${length}`);
  }
  if (state.isCompleted !== (state.currentTargetIndex === length)) {
    throw new ValidationError('isCompleted', 'must be set exactly when the sequence is exhausted');
  }
  if (state.isCompleted !== (state.endTime !== null)) {
    throw new ValidationError('endTime', 'must be set exactly when the session is completed');
  }
  if (state.endTime !== null && state.endTime < state.startTime) {
    throw new ValidationError('endTime', 'must not be before startTime');
  }
  if (state.isErrorActive && state.errorPosition !== state.currentTargetIndex) {
    throw new ValidationError('errorPosition', 'an active error must sit at the current index');
  }
  if (!state.isErrorActive && state.errorPosition !== -1) {
    throw new ValidationError('errorPosition', 'must be -1 while no error is active');
  }

  return Object.freeze({ ...state });
}

export function createInitialState(sequence: TargetSequence, startTime: number): TrainingState {
  return createTrainingState({
    sequence: validateSequence(sequence),
    currentTargetIndex: 0,
    startTime,
    endTime: null,
    isErrorActive: false,
    errorPosition: -1,
    totalInputs: 0,
    errors: 0,
    corrections: 0,
    backspaces: 0,
    isCompleted: false,
  });
}

export function expectedSymbol(state: TrainingState): TargetSymbol | null {
  return state.sequence.symbols[state.currentTargetIndex] ?? null;
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function processInput(
  state: TrainingState,
  input: InputEvent,
  now: number,
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): ProcessResult {
  if (state.isCompleted) {
    return { state, evaluation: null };
  }

  const counted = { ...state, totalInputs: state.totalInputs + 1 };

  switch (input.kind) {
    case 'ignored':
      return { state: createTrainingState(counted), evaluation: null };

    case 'backspace': {
      const backspaced = { ...counted, backspaces: counted.backspaces + 1 };
      if (!state.isErrorActive) {
        return { state: createTrainingState(backspaced), evaluation: null };
      }

      const position = state.errorPosition;
      return {
        state: createTrainingState({
          ...backspaced,
          corrections: backspaced.corrections + 1,
          isErrorActive: false,
          errorPosition: -1,
        }),
        evaluation: {
          tokenIndex: position,
          expected: state.sequence.symbols[position].grapheme,
          actual: '',
          outcome: 'corrected',
        },
      };
    }

    case 'character': {
      if (state.isErrorActive) {
        return { state: createTrainingState(counted), evaluation: null };
      }

      const index = state.currentTargetIndex;
      const expected = state.sequence.symbols[index].grapheme;

      if (input.grapheme === expected) {
        return {
          state: advance(counted, now),
          evaluation: { tokenIndex: index, expected, actual: input.grapheme, outcome: 'correct' },
        };
      }

      const evaluation: EvaluationEvent = {
        tokenIndex: index,
        expected,
        actual: input.grapheme,
        outcome: 'incorrect',
      };
      const withError = { ...counted, errors: counted.errors + 1 };

      if (!options.mustCorrectErrors) {
        return { state: advance(withError, now), evaluation };
      }
      return {
        state: createTrainingState({ ...withError, isErrorActive: true, errorPosition: index }),
        evaluation,
      };
    }
  }
}

function advance(state: TrainingState, now: number): TrainingState {
  const nextIndex = state.currentTargetIndex + 1;
  const isCompleted = nextIndex === state.sequence.symbols.length;
  return createTrainingState({
    ...state,
    currentTargetIndex: nextIndex,
    isCompleted,
    endTime: isCompleted ? now : null,
  });
}
