/**
 * Lesson Library
 *
 * Title-addressed access to lessons for free practice. Lessons are stored as
 * LessonData in the shared content stores and turned into block lessons on
 * read, wrapped at the configured block length.
 */

import type { Lesson, LessonData, LessonGuideData, LessonMetaData, ModuleGuide } from '@/types';
import type { DataStore } from '@/stores/createDataStore';
import { createLessonData, generateLessonId } from '@/utils/contentRecords';
import { createLessonMetaData, createModuleGuide, lessonFromText } from '@/utils/lessonFactory';
import { normalizeLineBreaks } from '@/utils/trainingEngine';
import { ValidationError } from './errors';

export interface LessonLibraryDeps {
  lessons: DataStore<LessonData>;
  guides: DataStore<LessonGuideData>;
  maxBlockLength: () => number;
}

const sameTitle = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

export class LessonLibrary {
  constructor(private readonly deps: LessonLibraryDeps) {}

  loadAll(): Lesson[] {
    return [...this.deps.lessons.getState().items]
      .sort((a, b) => a.title.localeCompare(b.title))
      .map((data) => this.toLesson(data));
  }

  loadLesson(title: string): Lesson | null {
    const data = this.findByTitle(title);
    return data ? this.toLesson(data) : null;
  }

  createLesson(meta: LessonMetaData, text: string, overwrite = false): Lesson {
    if (meta.moduleId.trim() === '') {
      throw new ValidationError('moduleId', 'a lesson must belong to a module');
    }

    const { lessons } = this.deps;
    const existing = this.findByTitle(meta.title);
    if (existing && !overwrite) {
      throw new ValidationError('title', `a lesson titled "${meta.title}" already exists`);
    }

    const usedIds = new Set(lessons.getState().items.map((lesson) => lesson.lessonId));
    if (existing) usedIds.delete(existing.lessonId);

    const data = createLessonData({
      lessonId: existing?.lessonId ?? generateLessonId(meta.moduleId, meta.title, usedIds),
      moduleId: meta.moduleId,
      title: meta.title,
      description: meta.description,
      difficulty: meta.difficulty,
      tags: meta.tags,
      exerciseText: normalizeLineBreaks(text),
    });

    if (existing) {
      lessons.getState().update(data);
    } else {
      lessons.getState().add(data);
    }
    console.log(`[Lessons] Saved "${data.title}" as ${data.lessonId}`);

    return this.toLesson(data);
  }

  deleteLesson(title: string): boolean {
    const data = this.findByTitle(title);
    if (!data) return false;

    this.deps.lessons.getState().remove(data);
    this.deps.guides.getState().removeWhere((guide) => guide.lessonId === data.lessonId);
    return true;
  }

  loadGuide(title: string): ModuleGuide | null {
    const data = this.findByTitle(title);
    if (!data) return null;

    const guide = this.deps.guides.getState().items.find((entry) => entry.lessonId === data.lessonId);
    return guide ? createModuleGuide(data.title, guide.guideMarkdown) : null;
  }

  private findByTitle(title: string): LessonData | undefined {
    const wanted = title.trim();
    return this.deps.lessons.getState().items.find((lesson) => sameTitle(lesson.title, wanted));
  }

  private toLesson(data: LessonData): Lesson {
    const meta = createLessonMetaData({
      title: data.title,
      description: data.description,
      difficulty: data.difficulty,
      tags: data.tags,
      moduleId: data.moduleId,
    });
    return lessonFromText(meta, data.exerciseText, this.deps.maxBlockLength());
  }
}
