/**
 * Session read models: history lists, filters and the per-session detail
 * view with its metrics.
 */

import type {
  LessonData,
  ModuleData,
  SessionDetail,
  SessionErrorRow,
  SessionEventRow,
  SessionFilter,
  SessionListItem,
  SessionMetrics,
  TrainingSession,
} from '@/types';
import type { DataStore } from '@/stores/createDataStore';
import { isBlank } from '@/utils/guards';
import { countErrors, sessionAccuracy, sessionDuration } from '@/utils/sessionRecords';
import { visibleSymbol } from '@/utils/symbols';

export interface SessionQueryDeps {
  sessions: DataStore<TrainingSession>;
  modules: DataStore<ModuleData>;
  lessons: DataStore<LessonData>;
  /** Default size of the recent-sessions list. */
  recentSessionCount?: () => number;
}

const DEFAULT_RECENT_COUNT = 10;
const MS_PER_MINUTE = 60_000;

export function matchesFilter(session: TrainingSession, filter: SessionFilter): boolean {
  if (!isBlank(filter.moduleId) && session.moduleId !== filter.moduleId) return false;
  if (!isBlank(filter.lessonId) && session.lessonId !== filter.lessonId) return false;
  if (filter.from !== undefined && session.startedAt < filter.from) return false;
  if (filter.to !== undefined && session.startedAt > filter.to) return false;
  if (filter.onlyCompleted !== undefined && session.isCompleted !== filter.onlyCompleted) return false;
  return true;
}

const newestFirst = (a: TrainingSession, b: TrainingSession) => b.startedAt - a.startedAt;

export function calculateMetrics(session: TrainingSession): SessionMetrics {
  const totalInputs = session.inputs.length;
  const duration = sessionDuration(session);

  return {
    totalInputs,
    totalErrors: countErrors(session),
    accuracy: sessionAccuracy(session),
    duration,
    inputsPerMinute: duration !== null && duration > 0 ? totalInputs / (duration / MS_PER_MINUTE) : null,
  };
}

export class SessionQueryService {
  constructor(private readonly deps: SessionQueryDeps) {}

  getRecent(take: number = this.deps.recentSessionCount?.() ?? DEFAULT_RECENT_COUNT): SessionListItem[] {
    return [...this.deps.sessions.getState().items]
      .sort(newestFirst)
      .slice(0, Math.max(0, take))
      .map((session) => this.toListItem(session));
  }

  getByFilter(filter: SessionFilter): SessionListItem[] {
    return this.deps.sessions
      .getState()
      .items.filter((session) => matchesFilter(session, filter))
      .sort(newestFirst)
      .map((session) => this.toListItem(session));
  }

  getDetail(sessionId: number): SessionDetail | null {
    const session = this.deps.sessions.getState().items.find((entry) => entry.id === sessionId);
    if (!session) return null;

    const events: SessionEventRow[] = [...session.evaluations]
      .sort((a, b) => a.tokenIndex - b.tokenIndex)
      .map((evaluation, index) => ({
        index,
        tokenIndex: evaluation.tokenIndex,
        expected: visibleSymbol(evaluation.expected, ''),
        actual: visibleSymbol(evaluation.actual, ''),
        outcome: evaluation.outcome,
        isError: evaluation.outcome === 'incorrect',
      }));

    const errors: SessionErrorRow[] = session.evaluations
      .filter((evaluation) => evaluation.outcome === 'incorrect')
      .map((evaluation, index) => ({
        index,
        tokenIndex: evaluation.tokenIndex,
        expected: visibleSymbol(evaluation.expected, ''),
        actual: visibleSymbol(evaluation.actual, ''),
      }));

    return {
      sessionId,
      header: {
        startedAt: session.startedAt,
        endedAt: session.endedAt,
        moduleTitle: this.moduleTitle(session.moduleId),
        lessonTitle: this.lessonTitle(session.lessonId),
        moduleId: session.moduleId,
        lessonId: session.lessonId,
      },
      events,
      errors,
      metrics: calculateMetrics(session),
    };
  }

  getLast(): SessionListItem | null {
    const [last] = [...this.deps.sessions.getState().items].sort(newestFirst);
    return last ? this.toListItem(last) : null;
  }

  private toListItem(session: TrainingSession): SessionListItem {
    return {
      sessionId: session.id,
      startedAt: session.startedAt,
      endedAt: session.endedAt,
      moduleId: session.moduleId,
      lessonId: session.lessonId,
      moduleTitle: this.moduleTitle(session.moduleId),
      lessonTitle: this.lessonTitle(session.lessonId),
      isCompleted: session.isCompleted,
      totalInputs: session.inputs.length,
      totalErrors: countErrors(session),
      duration: sessionDuration(session),
    };
  }

  private moduleTitle(moduleId: string): string {
    return this.deps.modules.getState().items.find((module) => module.moduleId === moduleId)?.title ?? moduleId;
  }

  private lessonTitle(lessonId: string): string {
    return this.deps.lessons.getState().items.find((lesson) => lesson.lessonId === lessonId)?.title ?? lessonId;
  }
}
