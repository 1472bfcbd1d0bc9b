import type { CaseSensitivity } from './engine';

export type * from './keyboard';
export type * from './engine';
export type * from './lesson';
export type * from './content';
export type * from './progress';

export interface TrainerSettings {
  // Evaluation
  caseSensitivity: CaseSensitivity;
  mustCorrectErrors: boolean;
  lineBreaksAreTargets: boolean;

  // Lessons
  maxBlockLength: number;

  // History
  recentSessionCount: number;
}
