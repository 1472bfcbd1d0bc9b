import type { InputEvent, KeyChord } from '@/types';
import { mapChordToGrapheme } from './keyboardLayout';

/**
 * Turns a physical chord into a training input event.
 * Backspace is its own kind; anything without a printable result is ignored.
 */
export function interpretChord(chord: KeyChord): InputEvent {
  if (chord.key === 'Backspace') {
    return { kind: 'backspace', chord };
  }

  const grapheme = mapChordToGrapheme(chord);
  if (grapheme === null) {
    return { kind: 'ignored', chord };
  }
  return { kind: 'character', grapheme, chord };
}
