import type { KeyId, KeyStroke, ModifierState } from '@/types';
import { ValidationError } from '@/services/errors';
import { NO_MODIFIERS, formatModifiers } from './keyboardLayout';

/** Largest offset from the epoch a `Date` can hold. */
const MAX_TIMESTAMP = 8.64e15;

export function createKeyStroke(
  key: KeyId,
  char: string | null,
  modifiers: ModifierState = NO_MODIFIERS,
  timestamp: number = Date.now()
): KeyStroke {
  if (!Number.isFinite(timestamp) || Math.abs(timestamp) > MAX_TIMESTAMP) {
    throw new ValidationError('timestamp', 'must be a finite epoch value within the Date range');
  }
  if (char !== null && Array.from(char).length !== 1) {
    throw new ValidationError('char', `expected a single character, got "${char}"`);
  }
  return { key, char, modifiers: { ...modifiers }, timestamp };
}

/** `[2024-05-01T08:30:00Z] Key=KeyA Mods=Shift Char='A'` */
export function formatKeyStroke(stroke: KeyStroke): string {
  const time = new Date(stroke.timestamp).toISOString().replace(/\.\d{3}Z$/, 'Z');
  const char = stroke.char === null ? '<none>' : `'${stroke.char}'`;
  return `[${time}] Key=${stroke.key} Mods=${formatModifiers(stroke.modifiers)} Char=${char}`;
}
