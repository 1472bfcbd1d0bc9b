/**
 * Content record factories, comparers and revivers for modules, lessons and
 * lesson guides.
 */

import type { LessonData, LessonGuideData, ModuleData } from '@/types';
import { ValidationError } from '@/services/errors';
import { composeText } from './graphemes';
import { isBlank, isFiniteNumber, isRecord, isString, isStringArray, optionalString } from './guards';

function requireText(field: string, value: string): string {
  if (isBlank(value)) {
    throw new ValidationError(field, 'must not be empty');
  }
  return value;
}

function requireCount(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(field, 'must be a non-negative integer');
  }
  return value;
}

export function createModuleData(fields: {
  moduleId: string;
  title: string;
  description?: string;
  order?: number;
}): ModuleData {
  return {
    moduleId: requireText('moduleId', fields.moduleId),
    title: requireText('title', fields.title),
    description: fields.description ?? '',
    order: requireCount('order', fields.order ?? 0),
  };
}

export function createLessonData(fields: {
  lessonId: string;
  moduleId: string;
  title: string;
  description?: string;
  difficulty?: number;
  tags?: readonly string[];
  exerciseText: string;
}): LessonData {
  if (fields.exerciseText.length === 0) {
    throw new ValidationError('exerciseText', 'must not be empty');
  }
  return {
    lessonId: requireText('lessonId', fields.lessonId),
    moduleId: requireText('moduleId', fields.moduleId),
    title: requireText('title', fields.title),
    description: fields.description ?? '',
    difficulty: requireCount('difficulty', fields.difficulty ?? 0),
    tags: [...(fields.tags ?? [])],
    exerciseText: composeText(fields.exerciseText),
  };
}

export function createLessonGuideData(fields: { lessonId: string; guideMarkdown?: string }): LessonGuideData {
  return {
    lessonId: requireText('lessonId', fields.lessonId),
    guideMarkdown: fields.guideMarkdown ?? '',
  };
}

// ---- comparers ----

export const sameModule = (a: ModuleData, b: ModuleData): boolean => a.moduleId === b.moduleId;
export const sameLesson = (a: LessonData, b: LessonData): boolean => a.lessonId === b.lessonId;
export const sameGuide = (a: LessonGuideData, b: LessonGuideData): boolean => a.lessonId === b.lessonId;

// ---- revivers ----

/** Runs a factory over untrusted input, mapping validation failures to null. */
function attempt<T>(build: () => T): T | null {
  try {
    return build();
  } catch (error) {
    if (error instanceof ValidationError) return null;
    throw error;
  }
}

export function reviveModuleData(raw: unknown): ModuleData | null {
  if (!isRecord(raw)) return null;
  const { moduleId, title } = raw;
  if (!isString(moduleId) || !isString(title)) return null;

  const description = optionalString(raw.description);
  const order = isFiniteNumber(raw.order) ? raw.order : 0;
  return attempt(() => createModuleData({ moduleId, title, description, order }));
}

export function reviveLessonData(raw: unknown): LessonData | null {
  if (!isRecord(raw)) return null;
  const { lessonId, moduleId, title, exerciseText } = raw;
  if (!isString(lessonId) || !isString(moduleId) || !isString(title) || !isString(exerciseText)) return null;

  const description = optionalString(raw.description);
  const difficulty = isFiniteNumber(raw.difficulty) ? raw.difficulty : 0;
  const tags = isStringArray(raw.tags) ? raw.tags : [];
  return attempt(() =>
    createLessonData({ lessonId, moduleId, title, exerciseText, description, difficulty, tags })
  );
}

export function reviveLessonGuideData(raw: unknown): LessonGuideData | null {
  if (!isRecord(raw)) return null;
  const { lessonId } = raw;
  if (!isString(lessonId)) return null;

  const guideMarkdown = optionalString(raw.guideMarkdown);
  return attempt(() => createLessonGuideData({ lessonId, guideMarkdown }));
}

// ---- ids ----

export function sanitizeForId(text: string): string {
  return text.replace(/[^a-zA-Z0-9]/g, '_').toLowerCase();
}

/** `${moduleId}_${sanitized title}`, suffixed with _1, _2, ... until unused. */
export function generateLessonId(moduleId: string, title: string, usedIds: ReadonlySet<string>): string {
  const baseId = `${moduleId}_${sanitizeForId(title)}`;
  let lessonId = baseId;
  let counter = 1;
  while (usedIds.has(lessonId)) {
    lessonId = `${baseId}_${counter}`;
    counter++;
  }
  return lessonId;
}

/** First integer inside a module id (`M03_Umlaute` -> 3), 0 without one. */
export function orderFromModuleId(moduleId: string): number {
  const match = /\d+/.exec(moduleId);
  return match ? Number.parseInt(match[0], 10) : 0;
}
