/**
 * DE-QWERTZ layout
 *
 * Maps physical key chords to the characters they produce and back. The
 * table itself lives in constants/deQwertzLayout.json.
 */

import layoutData from '@/constants/deQwertzLayout.json';
import type { KeyChord, KeyId, KeyboardEventLike, ModifierState } from '@/types';

interface LayoutEntry {
  base: string;
  shift: string;
  altGr?: string;
}

const LAYOUT: Readonly<Record<string, LayoutEntry | undefined>> = layoutData.keys;

export const LAYOUT_NAME = layoutData.name;

export const NO_MODIFIERS: ModifierState = Object.freeze({ shift: false, altGr: false });

const KEY_IDS = [
  'KeyA', 'KeyB', 'KeyC', 'KeyD', 'KeyE', 'KeyF', 'KeyG', 'KeyH', 'KeyI',
  'KeyJ', 'KeyK', 'KeyL', 'KeyM', 'KeyN', 'KeyO', 'KeyP', 'KeyQ', 'KeyR',
  'KeyS', 'KeyT', 'KeyU', 'KeyV', 'KeyW', 'KeyX', 'KeyY', 'KeyZ',
  'Digit0', 'Digit1', 'Digit2', 'Digit3', 'Digit4',
  'Digit5', 'Digit6', 'Digit7', 'Digit8', 'Digit9',
  'Backquote', 'Minus', 'Equal', 'BracketLeft', 'BracketRight', 'Semicolon',
  'Quote', 'Backslash', 'IntlBackslash', 'Comma', 'Period', 'Slash',
  'Space', 'Enter', 'Tab', 'Backspace', 'Escape',
  'ShiftLeft', 'ShiftRight', 'ControlLeft', 'ControlRight', 'AltLeft', 'AltRight',
] as const satisfies readonly KeyId[];

const KEY_ID_SET: ReadonlySet<string> = new Set(KEY_IDS);

export function isKeyId(value: string): value is KeyId {
  return KEY_ID_SET.has(value);
}

export function isModifierKey(key: KeyId): boolean {
  return key.startsWith('Shift') || key.startsWith('Control') || key.startsWith('Alt');
}

/**
 * Character produced by a chord, or null for keys without a printable result.
 * AltGr wins over Shift; an AltGr chord without an AltGr symbol yields null.
 */
export function mapChordToGrapheme(chord: KeyChord): string | null {
  const entry = LAYOUT[chord.key];
  if (!entry) return null;

  if (chord.modifiers.altGr) {
    return entry.altGr ?? null;
  }
  return chord.modifiers.shift ? entry.shift : entry.base;
}

// ---------------------------------------------------------------------------
// Reverse lookup (grapheme -> chord), base layer preferred over shift/AltGr
// ---------------------------------------------------------------------------

const REVERSE_LAYOUT: ReadonlyMap<string, KeyChord> = buildReverseLayout();

function buildReverseLayout(): Map<string, KeyChord> {
  const reverse = new Map<string, KeyChord>();
  const layers: Array<{ pick: (entry: LayoutEntry) => string | undefined; modifiers: ModifierState }> = [
    { pick: (entry) => entry.base, modifiers: NO_MODIFIERS },
    { pick: (entry) => entry.shift, modifiers: { shift: true, altGr: false } },
    { pick: (entry) => entry.altGr, modifiers: { shift: false, altGr: true } },
  ];

  for (const layer of layers) {
    for (const key of KEY_IDS) {
      const entry = LAYOUT[key];
      if (!entry) continue;
      const grapheme = layer.pick(entry);
      if (grapheme !== undefined && !reverse.has(grapheme)) {
        reverse.set(grapheme, { key, modifiers: layer.modifiers });
      }
    }
  }
  return reverse;
}

export function findChordForGrapheme(grapheme: string): KeyChord | null {
  return REVERSE_LAYOUT.get(grapheme) ?? null;
}

/**
 * Chord for a DOM keyboard event. AltGr is reported either as the AltGraph
 * modifier or as Ctrl+Alt (Windows). Unknown codes yield null.
 */
export function chordFromKeyboardEvent(event: KeyboardEventLike): KeyChord | null {
  if (!isKeyId(event.code)) return null;

  const altGr = event.getModifierState?.('AltGraph') === true || (event.ctrlKey && event.altKey);
  return {
    key: event.code,
    modifiers: { shift: event.shiftKey, altGr },
  };
}

export function formatModifiers(modifiers: ModifierState): string {
  if (modifiers.shift && modifiers.altGr) return 'Shift+AltGr';
  if (modifiers.shift) return 'Shift';
  if (modifiers.altGr) return 'AltGr';
  return 'None';
}
