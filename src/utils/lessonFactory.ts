/**
 * Lesson Factory
 *
 * Builds lessons either from prepared blocks or from free text that gets
 * word-wrapped into blocks of a maximum length.
 */

import type { Lesson, LessonMetaData, ModuleGuide } from '@/types';
import { ValidationError } from '@/services/errors';
import { composeText, splitGraphemes } from './graphemes';
import { metricsFromBlocks } from './lessonMetrics';

export const DEFAULT_MAX_BLOCK_LENGTH = 24;

export function createLessonMetaData(
  fields: Pick<LessonMetaData, 'title'> & Partial<LessonMetaData>
): LessonMetaData {
  if (fields.title.trim() === '') {
    throw new ValidationError('title', 'lesson title must not be empty');
  }
  const difficulty = fields.difficulty ?? 0;
  if (!Number.isFinite(difficulty) || difficulty < 0) {
    throw new ValidationError('difficulty', 'must be zero or positive');
  }

  return {
    title: fields.title.trim(),
    description: fields.description ?? '',
    difficulty,
    tags: [...(fields.tags ?? [])],
    moduleId: fields.moduleId ?? '',
  };
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function createLesson(meta: LessonMetaData, blocks: readonly string[]): Lesson {
  if (meta.title.trim() === '') {
    throw new ValidationError('title', 'lesson title must not be empty');
  }

  const cleaned = blocks.map((block) => composeText(collapseWhitespace(block))).filter((block) => block.length > 0);

  return Object.freeze({
    meta,
    blocks: Object.freeze(cleaned),
    targetText: cleaned.join(' '),
    metrics: metricsFromBlocks(cleaned),
  });
}

export function lessonFromText(
  meta: LessonMetaData,
  text: string,
  maxBlockLength: number = DEFAULT_MAX_BLOCK_LENGTH
): Lesson {
  return createLesson(meta, wrapText(text, maxBlockLength));
}

/**
 * Soft word wrap: words are packed into blocks of at most `maxBlockLength`
 * graphemes; a single word longer than that is cut into hard chunks.
 */
export function wrapText(text: string, maxBlockLength: number): string[] {
  const max = Math.max(1, Math.floor(maxBlockLength));
  const normalized = collapseWhitespace(text);
  if (normalized === '') return [];

  const blocks: string[] = [];
  let line = '';
  let lineLength = 0;

  const flush = () => {
    if (lineLength > 0) {
      blocks.push(line);
      line = '';
      lineLength = 0;
    }
  };

  for (const word of normalized.split(' ')) {
    const graphemes = splitGraphemes(word);
    if (graphemes.length > max) {
      flush();
      for (let start = 0; start < graphemes.length; start += max) {
        blocks.push(graphemes.slice(start, start + max).join(''));
      }
      continue;
    }

    if (lineLength === 0) {
      line = word;
      lineLength = graphemes.length;
    } else if (lineLength + 1 + graphemes.length <= max) {
      line += ` ${word}`;
      lineLength += 1 + graphemes.length;
    } else {
      flush();
      line = word;
      lineLength = graphemes.length;
    }
  }
  flush();

  return blocks;
}

export function describeLesson(lesson: Lesson): string {
  return `Lesson(Title='${lesson.meta.title}', Blocks=${lesson.metrics.blockCount}, Characters=${lesson.metrics.characterCount})`;
}

export function createModuleGuide(title: string, bodyMarkdown = ''): ModuleGuide {
  return { title, bodyMarkdown };
}
