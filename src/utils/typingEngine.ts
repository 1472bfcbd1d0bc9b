/**
 * Typing Engine
 *
 * Compares keystrokes against a target text one position at a time. Wrong
 * characters are recorded and skipped over; once the last position has been
 * typed the lesson-completed listeners fire exactly once.
 */

import type { CaseSensitivity, KeyStroke, LessonCompletedListener, TypingEngineState } from '@/types';
import { InputBuffer, type KeyMapper } from './inputBuffer';
import { codePoints, createTypingEngineState, startTypingState } from './typingEngineState';

export interface TypingEngineOptions {
  caseSensitivity?: CaseSensitivity;
  mapper?: KeyMapper;
}

export class TypingEngine {
  private readonly buffer: InputBuffer;
  private readonly caseSensitivity: CaseSensitivity;
  private readonly listeners = new Set<LessonCompletedListener>();

  private target = '';
  private targetChars: string[] = [];
  private errors: number[] = [];
  private prefixLength = 0;
  private nextIndex = 0;
  private expectedNext: string | null = null;
  private lastInput: string | null = null;
  private completedRaised = false;

  private current: TypingEngineState = startTypingState('');

  constructor(options: TypingEngineOptions = {}) {
    this.buffer = new InputBuffer(options.mapper);
    this.caseSensitivity = options.caseSensitivity ?? 'strict';
  }

  get state(): TypingEngineState {
    return this.current;
  }

  reset(targetText: string): void {
    this.target = targetText;
    this.targetChars = codePoints(targetText);
    this.buffer.clear();
    this.errors = [];
    this.prefixLength = 0;
    this.nextIndex = 0;
    this.lastInput = null;
    this.expectedNext = this.targetChars[0] ?? null;
    this.completedRaised = false;

    this.updateState();
  }

  process(stroke: KeyStroke): void {
    if (this.current.isComplete) return;

    this.buffer.add(stroke);

    const typed = stroke.char;
    this.lastInput = typed;

    if (typed === null || this.expectedNext === null) {
      this.updateState();
      return;
    }

    if (this.charsEqual(typed, this.expectedNext)) {
      this.prefixLength++;
    } else {
      this.errors.push(this.nextIndex);
    }

    this.nextIndex++;
    this.expectedNext = this.targetChars[this.nextIndex] ?? null;

    this.updateState();

    if (this.current.isComplete && !this.completedRaised) {
      this.completedRaised = true;
      const success = this.errors.length === 0;
      this.listeners.forEach((listener) => listener(success));
    }
  }

  onLessonCompleted(listener: LessonCompletedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private charsEqual(typed: string, expected: string): boolean {
    if (this.caseSensitivity === 'strict') return typed === expected;
    return typed.toUpperCase() === expected.toUpperCase();
  }

  private updateState(): void {
    this.current = createTypingEngineState({
      targetText: this.target,
      inputText: this.buffer.currentInput,
      correctPrefixLength: this.prefixLength,
      errorCount: this.errors.length,
      nextIndex: this.nextIndex,
      isComplete: this.nextIndex >= this.targetChars.length,
      errorPositions: this.errors,
      expectedNextChar: this.expectedNext,
      lastInputChar: this.lastInput,
    });
  }
}
