/**
 * Factories for recorded training data. A session's endedAt only exists
 * together with isCompleted; completeSession / reopenSession keep the two in
 * step.
 */

import type {
  EvaluationEvent,
  EvaluationOutcome,
  InputEvent,
  InputEventKind,
  ModifierState,
  StoredEvaluation,
  StoredInput,
  TrainingSession,
} from '@/types';
import { ValidationError } from '@/services/errors';
import { isFiniteNumber, isRecord, isString } from './guards';
import { isKeyId } from './keyboardLayout';

export function createStoredInput(event: InputEvent, timestamp: number): StoredInput {
  if (!Number.isFinite(timestamp)) {
    throw new ValidationError('timestamp', 'must be a finite epoch value');
  }
  return {
    timestamp,
    key: event.chord.key,
    modifiers: { ...event.chord.modifiers },
    kind: event.kind,
    grapheme: event.kind === 'character' ? event.grapheme : '',
  };
}

export function createStoredEvaluation(evaluation: EvaluationEvent): StoredEvaluation {
  if (!Number.isInteger(evaluation.tokenIndex) || evaluation.tokenIndex < 0) {
    throw new ValidationError('tokenIndex', 'must be a non-negative integer');
  }
  if (evaluation.expected.length === 0) {
    throw new ValidationError('expected', 'must not be empty');
  }
  return {
    tokenIndex: evaluation.tokenIndex,
    expected: evaluation.expected,
    actual: evaluation.actual,
    outcome: evaluation.outcome,
  };
}

export function createTrainingSession(fields: {
  id: number;
  moduleId: string;
  lessonId: string;
  startedAt: number;
}): TrainingSession {
  if (fields.moduleId.trim() === '') throw new ValidationError('moduleId', 'must not be empty');
  if (fields.lessonId.trim() === '') throw new ValidationError('lessonId', 'must not be empty');
  if (!Number.isFinite(fields.startedAt)) throw new ValidationError('startedAt', 'must be a finite epoch value');

  return {
    ...fields,
    endedAt: null,
    isCompleted: false,
    inputs: [],
    evaluations: [],
  };
}

export function completeSession(session: TrainingSession, endedAt: number): TrainingSession {
  if (endedAt < session.startedAt) {
    throw new ValidationError('endedAt', 'must not be before startedAt');
  }
  return { ...session, isCompleted: true, endedAt };
}

export function reopenSession(session: TrainingSession): TrainingSession {
  return { ...session, isCompleted: false, endedAt: null };
}

export function recordActivity(
  session: TrainingSession,
  input: StoredInput,
  evaluation: StoredEvaluation | null
): TrainingSession {
  return {
    ...session,
    inputs: [...session.inputs, input],
    evaluations: evaluation ? [...session.evaluations, evaluation] : session.evaluations,
  };
}

export function sessionDuration(session: TrainingSession): number | null {
  if (!session.isCompleted || session.endedAt === null) return null;
  return session.endedAt - session.startedAt;
}

export function countErrors(session: TrainingSession): number {
  return session.evaluations.filter((evaluation) => evaluation.outcome === 'incorrect').length;
}

/** 1 - errors/inputs; 0 for a session without inputs. */
export function sessionAccuracy(session: TrainingSession): number {
  const inputs = session.inputs.length;
  return inputs > 0 ? 1 - countErrors(session) / inputs : 0;
}

export function lastTrainedAt(session: TrainingSession): number {
  return session.endedAt ?? session.startedAt;
}

// ---------------------------------------------------------------------------
// Revivers
// ---------------------------------------------------------------------------

const INPUT_KINDS: readonly InputEventKind[] = ['character', 'backspace', 'ignored'];
const OUTCOMES: readonly EvaluationOutcome[] = ['correct', 'incorrect', 'corrected'];

function reviveModifiers(raw: unknown): ModifierState | null {
  if (!isRecord(raw)) return null;
  const { shift, altGr } = raw;
  if (typeof shift !== 'boolean' || typeof altGr !== 'boolean') return null;
  return { shift, altGr };
}

function reviveStoredInput(raw: unknown): StoredInput | null {
  if (!isRecord(raw)) return null;
  const { timestamp, key, kind, grapheme } = raw;
  const modifiers = reviveModifiers(raw.modifiers);
  if (!isFiniteNumber(timestamp) || !isString(key) || !isKeyId(key) || !modifiers) return null;

  const matchedKind = INPUT_KINDS.find((candidate) => candidate === kind);
  if (!matchedKind || !isString(grapheme)) return null;

  return { timestamp, key, modifiers, kind: matchedKind, grapheme };
}

function reviveStoredEvaluation(raw: unknown): StoredEvaluation | null {
  if (!isRecord(raw)) return null;
  const { tokenIndex, expected, actual, outcome } = raw;
  const matchedOutcome = OUTCOMES.find((candidate) => candidate === outcome);
  if (!isFiniteNumber(tokenIndex) || !isString(expected) || !isString(actual) || !matchedOutcome) return null;
  if (tokenIndex < 0 || expected.length === 0) return null;

  return { tokenIndex, expected, actual, outcome: matchedOutcome };
}

function reviveList<T>(raw: unknown, revive: (entry: unknown) => T | null): T[] | null {
  if (!Array.isArray(raw)) return null;
  const items: T[] = [];
  for (const entry of raw) {
    const item = revive(entry);
    if (item === null) return null;
    items.push(item);
  }
  return items;
}

export function reviveTrainingSession(raw: unknown): TrainingSession | null {
  if (!isRecord(raw)) return null;
  const { id, lessonId, moduleId, startedAt, endedAt, isCompleted } = raw;

  if (!isFiniteNumber(id) || !isString(lessonId) || !isString(moduleId) || !isFiniteNumber(startedAt)) return null;
  if (typeof isCompleted !== 'boolean') return null;
  if (endedAt !== null && !isFiniteNumber(endedAt)) return null;
  // endedAt and isCompleted must agree
  if ((endedAt !== null) !== isCompleted) return null;

  const inputs = reviveList(raw.inputs, reviveStoredInput);
  const evaluations = reviveList(raw.evaluations, reviveStoredEvaluation);
  if (!inputs || !evaluations) return null;

  return { id, lessonId, moduleId, startedAt, endedAt, isCompleted, inputs, evaluations };
}
