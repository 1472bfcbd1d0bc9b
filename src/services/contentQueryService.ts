/**
 * Content read models: module and lesson lists with training progress,
 * lesson details and guides.
 */

import type {
  LessonData,
  LessonDetails,
  LessonGuideData,
  LessonGuideView,
  LessonListItem,
  LessonProgressSummary,
  ModuleData,
  ModuleListItem,
  ModuleProgressSummary,
  TrainingSession,
} from '@/types';
import type { DataStore } from '@/stores/createDataStore';
import { splitGraphemes } from '@/utils/graphemes';
import { isBlank } from '@/utils/guards';
import { lastTrainedAt, sessionAccuracy, sessionDuration } from '@/utils/sessionRecords';
import { LINE_BREAK_SYMBOL } from '@/utils/symbols';

export const PREVIEW_LENGTH = 120;

export interface ContentQueryDeps {
  modules: DataStore<ModuleData>;
  lessons: DataStore<LessonData>;
  guides: DataStore<LessonGuideData>;
  sessions: DataStore<TrainingSession>;
}

const orNull = (text: string) => (isBlank(text) ? null : text);

export function createPreviewText(text: string, maxLength = PREVIEW_LENGTH): string {
  if (isBlank(text)) return '';

  const graphemes = splitGraphemes(text);
  const preview = graphemes.slice(0, maxLength).join('').replace(/\n/g, LINE_BREAK_SYMBOL);
  return graphemes.length > maxLength ? `${preview}...` : preview;
}

export class ContentQueryService {
  constructor(private readonly deps: ContentQueryDeps) {}

  getModules(): ModuleListItem[] {
    const lessons = this.deps.lessons.getState().items;

    return [...this.deps.modules.getState().items]
      .sort((a, b) => a.order - b.order || a.title.localeCompare(b.title))
      .map((module) => ({
        moduleId: module.moduleId,
        title: module.title,
        description: orNull(module.description),
        lessonCount: lessons.filter((lesson) => lesson.moduleId === module.moduleId).length,
        progress: this.moduleProgress(module.moduleId),
      }));
  }

  getLessonsByModule(moduleId: string): LessonListItem[] {
    if (isBlank(moduleId)) return [];

    return this.deps.lessons
      .getState()
      .items.filter((lesson) => lesson.moduleId === moduleId)
      .sort((a, b) => a.difficulty - b.difficulty || a.title.localeCompare(b.title))
      .map((lesson) => ({
        lessonId: lesson.lessonId,
        moduleId: lesson.moduleId,
        title: lesson.title,
        description: orNull(lesson.description),
        textLength: lesson.exerciseText.length,
        progress: this.lessonProgress(lesson.lessonId),
      }));
  }

  getLessonDetails(moduleId: string, lessonId: string): LessonDetails | null {
    if (isBlank(moduleId) || isBlank(lessonId)) return null;

    const lesson = this.deps.lessons
      .getState()
      .items.find((entry) => entry.lessonId === lessonId && entry.moduleId === moduleId);
    if (!lesson) return null;

    return {
      lessonId: lesson.lessonId,
      moduleId: lesson.moduleId,
      title: lesson.title,
      description: orNull(lesson.description),
      previewText: createPreviewText(lesson.exerciseText),
      hasGuide: this.deps.guides.getState().items.some((guide) => guide.lessonId === lessonId),
      progress: this.lessonProgress(lessonId),
    };
  }

  getLessonGuide(lessonId: string): LessonGuideView | null {
    if (isBlank(lessonId)) return null;

    const guide = this.deps.guides.getState().items.find((entry) => entry.lessonId === lessonId);
    if (!guide) return null;

    const lesson = this.deps.lessons.getState().items.find((entry) => entry.lessonId === lessonId);
    return {
      lessonId,
      title: lesson?.title ?? lessonId,
      markdown: guide.guideMarkdown,
    };
  }

  private moduleProgress(moduleId: string): ModuleProgressSummary | null {
    const sessions = this.deps.sessions.getState().items.filter((session) => session.moduleId === moduleId);
    if (sessions.length === 0) return null;

    return {
      sessions: sessions.length,
      completed: sessions.filter((session) => session.isCompleted).length,
      lastTrained: Math.max(...sessions.map(lastTrainedAt)),
    };
  }

  private lessonProgress(lessonId: string): LessonProgressSummary | null {
    const sessions = this.deps.sessions.getState().items.filter((session) => session.lessonId === lessonId);
    if (sessions.length === 0) return null;

    const completed = sessions.filter((session) => session.isCompleted);
    let bestAccuracy = 0;
    let bestDuration: number | null = null;

    for (const session of completed) {
      bestAccuracy = Math.max(bestAccuracy, sessionAccuracy(session));
      const duration = sessionDuration(session);
      if (duration !== null && (bestDuration === null || duration < bestDuration)) {
        bestDuration = duration;
      }
    }

    return {
      sessions: sessions.length,
      completed: completed.length,
      bestAccuracy,
      bestDuration,
      lastTrained: Math.max(...sessions.map(lastTrainedAt)),
    };
  }
}
