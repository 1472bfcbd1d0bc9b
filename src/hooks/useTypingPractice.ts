import { useCallback, useEffect, useRef, useState } from 'react';
import type { CaseSensitivity, KeyStroke, TypingEngineState } from '@/types';
import { TypingEngine } from '@/utils/typingEngine';

export interface PracticeCompletion {
  success: boolean;
}

export interface TypingPracticeOptions {
  caseSensitivity?: CaseSensitivity;
}

/**
 * Free typing against a target text. The engine lives in a ref; every
 * stroke copies its frozen state into React state.
 */
export function useTypingPractice(targetText: string, options: TypingPracticeOptions = {}) {
  const caseSensitivity = options.caseSensitivity ?? 'strict';
  const engineRef = useRef<TypingEngine | null>(null);
  const [state, setState] = useState<TypingEngineState | null>(null);
  const [completion, setCompletion] = useState<PracticeCompletion | null>(null);

  useEffect(() => {
    const engine = new TypingEngine({ caseSensitivity });
    const unsubscribe = engine.onLessonCompleted((success) => {
      console.log(`[Practice] Lesson completed (${success ? 'no errors' : 'with errors'})`);
      setCompletion({ success });
    });

    engine.reset(targetText);
    engineRef.current = engine;
    setState(engine.state);
    setCompletion(null);

    return () => {
      unsubscribe();
      engineRef.current = null;
    };
  }, [targetText, caseSensitivity]);

  const handleStroke = useCallback((stroke: KeyStroke) => {
    const engine = engineRef.current;
    if (!engine) return;

    engine.process(stroke);
    setState(engine.state);
  }, []);

  const reset = useCallback(() => {
    const engine = engineRef.current;
    if (!engine) return;

    engine.reset(targetText);
    setState(engine.state);
    setCompletion(null);
  }, [targetText]);

  return { state, completion, handleStroke, reset };
}
