import type { TypingEngineState } from '@/types';

/** Positions in the target text are counted in code points. */
export function codePoints(text: string): string[] {
  return Array.from(text);
}

/**
 * Builds a validated, frozen engine snapshot. Error positions are copied and
 * sorted so callers can keep mutating their own list.
 */
export function createTypingEngineState(fields: TypingEngineState): TypingEngineState {
  const { targetText, correctPrefixLength, errorCount, nextIndex } = fields;

  if (correctPrefixLength < 0) throw new RangeError('correctPrefixLength must not be negative');
  if (errorCount < 0) throw new RangeError('errorCount must not be negative');
  if (nextIndex < 0) throw new RangeError('nextIndex must not be negative');
  if (nextIndex > codePoints(targetText).length) {
    throw new RangeError('nextIndex must not point past the end of the target text');
  }
  if (errorCount !== fields.errorPositions.length) {
    throw new RangeError('errorCount must match the number of error positions');
  }

  return Object.freeze({
    ...fields,
    errorPositions: Object.freeze([...fields.errorPositions].sort((a, b) => a - b)),
  });
}

export function startTypingState(targetText: string): TypingEngineState {
  const chars = codePoints(targetText);
  return createTypingEngineState({
    targetText,
    inputText: '',
    correctPrefixLength: 0,
    errorCount: 0,
    nextIndex: 0,
    isComplete: chars.length === 0,
    errorPositions: [],
    expectedNextChar: chars[0] ?? null,
    lastInputChar: null,
  });
}

export function describeTypingState(state: TypingEngineState): string {
  return (
    `TypingState: len(Target)=${codePoints(state.targetText).length}, len(Input)=${codePoints(state.inputText).length}, ` +
    `CorrectPrefix=${state.correctPrefixLength}, Errors=${state.errorCount}, ` +
    `NextIndex=${state.nextIndex}, Complete=${state.isComplete}`
  );
}
