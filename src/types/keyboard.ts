/**
 * Keyboard type definitions
 *
 * Keys are physical positions named after KeyboardEvent.code, so the
 * DE-QWERTZ layout decides which character a position produces.
 */

export type LetterKey =
  | 'KeyA' | 'KeyB' | 'KeyC' | 'KeyD' | 'KeyE' | 'KeyF' | 'KeyG' | 'KeyH' | 'KeyI'
  | 'KeyJ' | 'KeyK' | 'KeyL' | 'KeyM' | 'KeyN' | 'KeyO' | 'KeyP' | 'KeyQ' | 'KeyR'
  | 'KeyS' | 'KeyT' | 'KeyU' | 'KeyV' | 'KeyW' | 'KeyX' | 'KeyY' | 'KeyZ';

export type DigitKey =
  | 'Digit0' | 'Digit1' | 'Digit2' | 'Digit3' | 'Digit4'
  | 'Digit5' | 'Digit6' | 'Digit7' | 'Digit8' | 'Digit9';

export type PunctuationKey =
  | 'Backquote'
  | 'Minus'
  | 'Equal'
  | 'BracketLeft'
  | 'BracketRight'
  | 'Semicolon'
  | 'Quote'
  | 'Backslash'
  | 'IntlBackslash'
  | 'Comma'
  | 'Period'
  | 'Slash';

export type ControlKey = 'Space' | 'Enter' | 'Tab' | 'Backspace' | 'Escape';

export type ModifierKey =
  | 'ShiftLeft'
  | 'ShiftRight'
  | 'ControlLeft'
  | 'ControlRight'
  | 'AltLeft'
  | 'AltRight';

export type KeyId = LetterKey | DigitKey | PunctuationKey | ControlKey | ModifierKey;

export interface ModifierState {
  shift: boolean;
  altGr: boolean;
}

export interface KeyChord {
  key: KeyId;
  modifiers: ModifierState;
}

export interface KeyStroke {
  key: KeyId;
  /** Character reported by the input source, if any. */
  char: string | null;
  modifiers: ModifierState;
  /** Epoch milliseconds */
  timestamp: number;
}

export type InputEvent =
  | { kind: 'character'; grapheme: string; chord: KeyChord }
  | { kind: 'backspace'; chord: KeyChord }
  | { kind: 'ignored'; chord: KeyChord };

export type InputEventKind = InputEvent['kind'];

/** Minimal shape of a DOM KeyboardEvent, so callers outside the browser can build one. */
export interface KeyboardEventLike {
  code: string;
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  getModifierState?: (key: string) => boolean;
}
