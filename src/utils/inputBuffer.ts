import type { KeyChord, KeyStroke } from '@/types';
import { mapChordToGrapheme } from './keyboardLayout';

export type KeyMapper = (chord: KeyChord) => string | null;

/**
 * Raw keystroke log plus the text it produced. The stroke's own char wins;
 * the layout mapper only fills in for strokes that arrived without one.
 */
export class InputBuffer {
  private readonly strokeLog: KeyStroke[] = [];
  private text = '';

  constructor(private readonly mapper: KeyMapper = mapChordToGrapheme) {}

  get strokes(): readonly KeyStroke[] {
    return this.strokeLog;
  }

  get currentInput(): string {
    return this.text;
  }

  add(stroke: KeyStroke): void {
    this.strokeLog.push(stroke);

    if (stroke.char !== null) {
      this.text += stroke.char;
      return;
    }

    const mapped = this.mapper({ key: stroke.key, modifiers: stroke.modifiers });
    if (mapped !== null) {
      this.text += mapped;
    }
  }

  clear(): void {
    this.strokeLog.length = 0;
    this.text = '';
  }
}
