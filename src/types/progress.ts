/**
 * Training progress type definitions: recorded sessions and the read models
 * built from them.
 */

import type { EvaluationOutcome } from './engine';
import type { InputEventKind, KeyId, ModifierState } from './keyboard';

export interface StoredInput {
  timestamp: number;
  key: KeyId;
  modifiers: ModifierState;
  kind: InputEventKind;
  /** '' unless kind is 'character' */
  grapheme: string;
}

export interface StoredEvaluation {
  tokenIndex: number;
  expected: string;
  actual: string;
  outcome: EvaluationOutcome;
}

export interface TrainingSession {
  id: number;
  lessonId: string;
  moduleId: string;
  startedAt: number;
  /** Only set on completed sessions */
  endedAt: number | null;
  isCompleted: boolean;
  inputs: readonly StoredInput[];
  evaluations: readonly StoredEvaluation[];
}

// ---------------------------------------------------------------------------
// Content read models
// ---------------------------------------------------------------------------

export interface ModuleProgressSummary {
  sessions: number;
  completed: number;
  lastTrained: number;
}

export interface LessonProgressSummary {
  sessions: number;
  completed: number;
  bestAccuracy: number;
  bestDuration: number | null;
  lastTrained: number;
}

export interface ModuleListItem {
  moduleId: string;
  title: string;
  description: string | null;
  lessonCount: number;
  progress: ModuleProgressSummary | null;
}

export interface LessonListItem {
  lessonId: string;
  moduleId: string;
  title: string;
  description: string | null;
  textLength: number;
  progress: LessonProgressSummary | null;
}

export interface LessonDetails {
  lessonId: string;
  moduleId: string;
  title: string;
  description: string | null;
  previewText: string;
  hasGuide: boolean;
  progress: LessonProgressSummary | null;
}

export interface LessonGuideView {
  lessonId: string;
  title: string;
  markdown: string;
}

// ---------------------------------------------------------------------------
// Session read models
// ---------------------------------------------------------------------------

export interface SessionFilter {
  moduleId?: string;
  lessonId?: string;
  /** Inclusive bounds on startedAt, epoch ms */
  from?: number;
  to?: number;
  onlyCompleted?: boolean;
}

export interface SessionListItem {
  sessionId: number;
  startedAt: number;
  endedAt: number | null;
  moduleId: string;
  lessonId: string;
  moduleTitle: string;
  lessonTitle: string;
  isCompleted: boolean;
  totalInputs: number;
  totalErrors: number;
  duration: number | null;
}

export interface SessionHeader {
  startedAt: number;
  endedAt: number | null;
  moduleTitle: string;
  lessonTitle: string;
  moduleId: string;
  lessonId: string;
}

export interface SessionEventRow {
  index: number;
  tokenIndex: number;
  expected: string;
  actual: string;
  outcome: EvaluationOutcome;
  isError: boolean;
}

export interface SessionErrorRow {
  index: number;
  tokenIndex: number;
  expected: string;
  actual: string;
}

export interface SessionMetrics {
  totalInputs: number;
  totalErrors: number;
  accuracy: number;
  duration: number | null;
  inputsPerMinute: number | null;
}

export interface SessionDetail {
  sessionId: number;
  header: SessionHeader;
  events: SessionEventRow[];
  errors: SessionErrorRow[];
  metrics: SessionMetrics;
}

// ---------------------------------------------------------------------------
// Statistics read models
// ---------------------------------------------------------------------------

export type StatisticsFilter = Omit<SessionFilter, 'onlyCompleted'>;

export interface ModuleStatRow {
  moduleId: string;
  moduleTitle: string;
  sessions: number;
  completed: number;
  avgErrors: number;
  avgAccuracy: number;
  bestDuration: number | null;
  lastTrained: number;
}

export interface LessonStatRow extends ModuleStatRow {
  lessonId: string;
  lessonTitle: string;
}

export interface StatisticsDashboard {
  modules: ModuleStatRow[];
  lessons: LessonStatRow[];
}

export interface ErrorHeatmapRow {
  expected: string;
  actual: string;
  count: number;
}

export interface ErrorHeatmap {
  rows: ErrorHeatmapRow[];
  hintText: string;
}
