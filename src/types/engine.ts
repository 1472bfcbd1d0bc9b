/**
 * Engine type definitions: free typing (TypingEngine) and guided training
 * (trainingEngine reducer).
 */

export type CaseSensitivity = 'strict' | 'ignoreCase';

export interface TypingEngineState {
  targetText: string;
  inputText: string;
  correctPrefixLength: number;
  errorCount: number;
  nextIndex: number;
  isComplete: boolean;
  /** Ascending */
  errorPositions: readonly number[];
  expectedNextChar: string | null;
  lastInputChar: string | null;
}

export type LessonCompletedListener = (success: boolean) => void;

export interface TargetSymbol {
  index: number;
  grapheme: string;
}

export interface TargetSequence {
  symbols: readonly TargetSymbol[];
}

export interface TrainingState {
  sequence: TargetSequence;
  currentTargetIndex: number;
  startTime: number;
  endTime: number | null;
  isErrorActive: boolean;
  /** -1 while no error is active */
  errorPosition: number;
  totalInputs: number;
  errors: number;
  corrections: number;
  backspaces: number;
  isCompleted: boolean;
}

export type EvaluationOutcome = 'correct' | 'incorrect' | 'corrected';

export interface EvaluationEvent {
  tokenIndex: number;
  expected: string;
  actual: string;
  outcome: EvaluationOutcome;
}

export interface EngineOptions {
  mustCorrectErrors: boolean;
  lineBreaksAreTargets: boolean;
}

export interface Clock {
  now(): number;
}
