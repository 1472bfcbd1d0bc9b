/**
 * Statistics read models: per-module and per-lesson dashboards and the
 * expected/actual error heatmap.
 */

import type {
  ErrorHeatmap,
  ErrorHeatmapRow,
  LessonData,
  LessonStatRow,
  ModuleData,
  ModuleStatRow,
  StatisticsDashboard,
  StatisticsFilter,
  TrainingSession,
} from '@/types';
import type { DataStore } from '@/stores/createDataStore';
import { countErrors, lastTrainedAt, sessionAccuracy, sessionDuration } from '@/utils/sessionRecords';
import { visibleSymbol } from '@/utils/symbols';
import { matchesFilter } from './sessionQueryService';

export const HEATMAP_SIZE = 50;
export const EMPTY_HEATMAP_HINT = 'No error data yet. Train a few lessons to see statistics.';

export interface StatisticsQueryDeps {
  sessions: DataStore<TrainingSession>;
  modules: DataStore<ModuleData>;
  lessons: DataStore<LessonData>;
}

type GroupStats = Omit<ModuleStatRow, 'moduleId' | 'moduleTitle'>;

function groupBy<K, V>(items: readonly V[], keyOf: (item: V) => K): Map<K, V[]> {
  const groups = new Map<K, V[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

function summarize(sessions: readonly TrainingSession[]): GroupStats {
  let bestDuration: number | null = null;
  for (const session of sessions) {
    const duration = sessionDuration(session);
    if (duration !== null && (bestDuration === null || duration < bestDuration)) {
      bestDuration = duration;
    }
  }

  return {
    sessions: sessions.length,
    completed: sessions.filter((session) => session.isCompleted).length,
    avgErrors: average(sessions.map(countErrors)),
    avgAccuracy: average(sessions.map(sessionAccuracy)),
    bestDuration,
    lastTrained: Math.max(...sessions.map(lastTrainedAt)),
  };
}

export class StatisticsQueryService {
  constructor(private readonly deps: StatisticsQueryDeps) {}

  buildDashboard(filter: StatisticsFilter = {}): StatisticsDashboard {
    const sessions = this.filtered(filter);
    const modules = this.deps.modules.getState().items;
    const lessons = this.deps.lessons.getState().items;

    const moduleRows: ModuleStatRow[] = [...groupBy(sessions, (session) => session.moduleId)].map(
      ([moduleId, group]) => ({
        moduleId,
        moduleTitle: modules.find((module) => module.moduleId === moduleId)?.title ?? moduleId,
        ...summarize(group),
      })
    );

    const lessonRows: LessonStatRow[] = [
      ...groupBy(sessions, (session) => `${session.moduleId}\u0000${session.lessonId}`).values(),
    ].map((group) => {
      const { moduleId, lessonId } = group[0];
      return {
        moduleId,
        moduleTitle: modules.find((module) => module.moduleId === moduleId)?.title ?? moduleId,
        lessonId,
        lessonTitle: lessons.find((lesson) => lesson.lessonId === lessonId)?.title ?? lessonId,
        ...summarize(group),
      };
    });

    return {
      modules: moduleRows.sort((a, b) => b.sessions - a.sessions),
      lessons: lessonRows.sort((a, b) => b.sessions - a.sessions),
    };
  }

  buildErrorHeatmap(filter: StatisticsFilter = {}): ErrorHeatmap {
    const errors = this.filtered(filter)
      .flatMap((session) => session.evaluations)
      .filter((evaluation) => evaluation.outcome === 'incorrect')
      .map((evaluation) => ({
        expected: visibleSymbol(evaluation.expected),
        actual: visibleSymbol(evaluation.actual),
      }));

    const rows: ErrorHeatmapRow[] = [...groupBy(errors, (pair) => `${pair.expected}\u0000${pair.actual}`).values()]
      .map((group) => ({ expected: group[0].expected, actual: group[0].actual, count: group.length }))
      .sort((a, b) => b.count - a.count)
      .slice(0, HEATMAP_SIZE);

    return {
      rows,
      hintText: rows.length === 0 ? EMPTY_HEATMAP_HINT : `Top ${rows.length} most frequent errors`,
    };
  }

  private filtered(filter: StatisticsFilter): TrainingSession[] {
    return this.deps.sessions.getState().items.filter((session) => matchesFilter(session, filter));
  }
}
