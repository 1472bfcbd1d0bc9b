/**
 * Content Import
 *
 * Reads curated modules, lessons and guides from three JSON files and writes
 * them into the content stores. Problems with single records become warnings;
 * anything that makes the import as a whole impossible ends up in
 * `errorMessage` instead of being thrown.
 */

import { readFile } from 'node:fs/promises';
import type { LessonData, LessonGuideData, ModuleData } from '@/types';
import type { DataStore } from '@/stores/createDataStore';
import {
  createLessonData,
  createLessonGuideData,
  createModuleData,
  generateLessonId,
  orderFromModuleId,
} from '@/utils/contentRecords';
import { isBlank, isFiniteNumber, isRecord, isString, isStringArray } from '@/utils/guards';
import { normalizeLineBreaks } from '@/utils/trainingEngine';
import { ValidationError, describeError } from './errors';

export interface ContentImportRequest {
  modulesPath: string;
  lessonsPath: string;
  guidesPath: string;
  overwriteExisting: boolean;
}

export interface ContentImportResult {
  success: boolean;
  modulesImported: number;
  lessonsImported: number;
  guidesImported: number;
  warnings: string[];
  outputFolderPath: string | null;
  errorMessage: string | null;
}

export interface ContentImportDeps {
  modules: DataStore<ModuleData>;
  lessons: DataStore<LessonData>;
  guides: DataStore<LessonGuideData>;
  /** Where the stores keep their files, reported back to the caller. */
  outputFolderPath: string | null;
}

// ---------------------------------------------------------------------------
// Import file shapes
// ---------------------------------------------------------------------------

interface ModuleImport {
  moduleId: string;
  title: string;
  description: string;
}

interface LessonImport {
  lessonId: string | null;
  moduleId: string;
  title: string;
  description: string;
  difficulty: number;
  tags: string[];
  exerciseText: string;
}

interface GuideImport {
  lessonId: string | null;
  lessonTitle: string | null;
  guideMarkdown: string;
}

class ImportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImportFormatError';
  }
}

class ImportFileNotFoundError extends Error {
  constructor(public path: string) {
    super(path);
    this.name = 'ImportFileNotFoundError';
  }
}

function requireString(record: Record<string, unknown>, field: string, where: string): string {
  const value = record[field];
  if (!isString(value)) throw new ImportFormatError(`${where}: "${field}" must be a string`);
  return value;
}

function optionalText(record: Record<string, unknown>, field: string, where: string): string | null {
  const value = record[field];
  if (value === undefined || value === null) return null;
  if (!isString(value)) throw new ImportFormatError(`${where}: "${field}" must be a string`);
  return value;
}

function parseList<T>(json: string, label: string, parse: (record: Record<string, unknown>, where: string) => T): T[] {
  const data: unknown = JSON.parse(json);
  if (data === null) return [];
  if (!Array.isArray(data)) throw new ImportFormatError(`${label} must contain a JSON array`);

  return data.map((entry: unknown, index) => {
    const where = `${label}[${index}]`;
    if (!isRecord(entry)) throw new ImportFormatError(`${where} must be an object`);
    return parse(entry, where);
  });
}

const parseModule = (record: Record<string, unknown>, where: string): ModuleImport => ({
  moduleId: requireString(record, 'moduleId', where),
  title: requireString(record, 'title', where),
  description: optionalText(record, 'description', where) ?? '',
});

function parseLesson(record: Record<string, unknown>, where: string): LessonImport {
  const { difficulty, tags } = record;
  if (difficulty !== undefined && !isFiniteNumber(difficulty)) {
    throw new ImportFormatError(`${where}: "difficulty" must be a number`);
  }
  if (tags !== undefined && !isStringArray(tags)) {
    throw new ImportFormatError(`${where}: "tags" must be a list of strings`);
  }
  return {
    lessonId: optionalText(record, 'lessonId', where),
    moduleId: requireString(record, 'moduleId', where),
    title: requireString(record, 'title', where),
    description: optionalText(record, 'description', where) ?? '',
    difficulty: difficulty ?? 0,
    tags: tags ?? [],
    exerciseText: requireString(record, 'exerciseText', where),
  };
}

const parseGuide = (record: Record<string, unknown>, where: string): GuideImport => ({
  lessonId: optionalText(record, 'lessonId', where),
  lessonTitle: optionalText(record, 'lessonTitle', where),
  guideMarkdown: optionalText(record, 'guideMarkdown', where) ?? '',
});

async function readImportFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      throw new ImportFileNotFoundError(path);
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class ContentImportService {
  constructor(private readonly deps: ContentImportDeps) {}

  async importContent(request: ContentImportRequest): Promise<ContentImportResult> {
    const warnings: string[] = [];

    try {
      if (!request.overwriteExisting && this.hasExistingContent()) {
        return this.failure(
          'Content already exists. Enable "overwrite existing content" to replace it.'
        );
      }

      const moduleImports = parseList(await readImportFile(request.modulesPath), 'modules', parseModule);
      const lessonImports = parseList(await readImportFile(request.lessonsPath), 'lessons', parseLesson);
      const guideImports = parseList(await readImportFile(request.guidesPath), 'guides', parseGuide);

      const modules = moduleImports.map((entry) =>
        createModuleData({
          moduleId: entry.moduleId,
          title: entry.title,
          description: entry.description,
          order: orderFromModuleId(entry.moduleId),
        })
      );
      const lessons = this.mapLessons(lessonImports, modules, warnings);
      const guides = this.mapGuides(guideImports, lessons, warnings);

      const { modules: moduleStore, lessons: lessonStore, guides: guideStore } = this.deps;
      if (request.overwriteExisting) {
        moduleStore.getState().clear();
        lessonStore.getState().clear();
        guideStore.getState().clear();
      }

      const modulesImported = moduleStore.getState().addRange(modules);
      const lessonsImported = lessonStore.getState().addRange(lessons);
      const guidesImported = guideStore.getState().addRange(guides);

      console.log(
        `[Import] Imported ${modulesImported} modules, ${lessonsImported} lessons, ${guidesImported} guides` +
          (warnings.length > 0 ? ` with ${warnings.length} warnings` : '')
      );

      return {
        success: true,
        modulesImported,
        lessonsImported,
        guidesImported,
        warnings,
        outputFolderPath: this.deps.outputFolderPath,
        errorMessage: null,
      };
    } catch (error) {
      console.error('[Import] Content import failed:', error);
      return this.failure(importErrorMessage(error), warnings);
    }
  }

  private hasExistingContent(): boolean {
    const { modules, lessons, guides } = this.deps;
    return (
      modules.getState().items.length > 0 ||
      lessons.getState().items.length > 0 ||
      guides.getState().items.length > 0
    );
  }

  private mapLessons(imports: LessonImport[], modules: ModuleData[], warnings: string[]): LessonData[] {
    const moduleIds = new Set(modules.map((module) => module.moduleId));
    const usedIds = new Set<string>();
    const lessons: LessonData[] = [];

    for (const entry of imports) {
      if (!moduleIds.has(entry.moduleId)) {
        warnings.push(`Lesson '${entry.title}' references unknown module '${entry.moduleId}'`);
        continue;
      }

      const lessonId =
        entry.lessonId === null || isBlank(entry.lessonId)
          ? generateLessonId(entry.moduleId, entry.title, usedIds)
          : entry.lessonId;

      if (usedIds.has(lessonId)) {
        warnings.push(`Duplicate lesson id '${lessonId}'. Lesson '${entry.title}' is skipped.`);
        continue;
      }

      try {
        lessons.push(
          createLessonData({
            lessonId,
            moduleId: entry.moduleId,
            title: entry.title,
            description: entry.description,
            difficulty: entry.difficulty,
            tags: entry.tags,
            exerciseText: normalizeLineBreaks(entry.exerciseText),
          })
        );
        usedIds.add(lessonId);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        warnings.push(`Lesson '${entry.title}' is skipped: ${error.getUserMessage()}`);
      }
    }

    return lessons;
  }

  private mapGuides(imports: GuideImport[], lessons: LessonData[], warnings: string[]): LessonGuideData[] {
    const lessonIds = new Set(lessons.map((lesson) => lesson.lessonId));
    const idsByTitle = new Map(lessons.map((lesson) => [lesson.title.toLowerCase(), lesson.lessonId]));
    const guides: LessonGuideData[] = [];

    for (const entry of imports) {
      let lessonId = entry.lessonId;

      if (isBlank(lessonId) && entry.lessonTitle !== null && !isBlank(entry.lessonTitle)) {
        const mapped = idsByTitle.get(entry.lessonTitle.toLowerCase());
        if (mapped === undefined) {
          warnings.push(`Guide for lesson '${entry.lessonTitle}' could not be matched`);
          continue;
        }
        lessonId = mapped;
      }

      if (lessonId === null || isBlank(lessonId)) {
        warnings.push('Guide without lessonId and lessonTitle is skipped');
        continue;
      }

      if (!lessonIds.has(lessonId)) {
        warnings.push(`Guide references unknown lesson id '${lessonId}'`);
        continue;
      }

      guides.push(createLessonGuideData({ lessonId, guideMarkdown: entry.guideMarkdown }));
    }

    return guides;
  }

  private failure(errorMessage: string, warnings: string[] = []): ContentImportResult {
    return {
      success: false,
      modulesImported: 0,
      lessonsImported: 0,
      guidesImported: 0,
      warnings,
      outputFolderPath: null,
      errorMessage,
    };
  }
}

function importErrorMessage(error: unknown): string {
  if (error instanceof ImportFileNotFoundError) return `File not found: ${error.path}`;
  if (error instanceof SyntaxError || error instanceof ImportFormatError) {
    return `Invalid JSON format: ${error.message}`;
  }
  if (error instanceof ValidationError) return `Import failed: ${error.getUserMessage()}`;
  return `Import failed: ${describeError(error)}`;
}
