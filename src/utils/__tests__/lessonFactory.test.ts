import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/services/errors';
import {
  collapseWhitespace,
  createLesson,
  createLessonMetaData,
  createModuleGuide,
  describeLesson,
  lessonFromText,
  wrapText,
} from '../lessonFactory';
import { metricsFromBlocks } from '../lessonMetrics';

const meta = createLessonMetaData({ title: ' Grundreihe ', moduleId: 'M01' });

describe('createLessonMetaData', () => {
  it('trims the title and fills defaults', () => {
    expect(meta).toEqual({ title: 'Grundreihe', description: '', difficulty: 0, tags: [], moduleId: 'M01' });
  });

  it('rejects a blank title', () => {
    expect(() => createLessonMetaData({ title: '   ' })).toThrow(ValidationError);
  });

  it('rejects negative difficulty', () => {
    expect(() => createLessonMetaData({ title: 'x', difficulty: -1 })).toThrow(ValidationError);
  });
});

describe('wrapText', () => {
  it('packs words into blocks up to the maximum length', () => {
    expect(wrapText('asdf jklö asdf jklö', 9)).toEqual(['asdf jklö', 'asdf jklö']);
  });

  it('collapses whitespace first', () => {
    expect(wrapText('  a \n\t b  ', 10)).toEqual(['a b']);
  });

  it('hard-splits words longer than a block', () => {
    expect(wrapText('ab Donaudampfschiff', 5)).toEqual(['ab', 'Donau', 'dampf', 'schif', 'f']);
  });

  it('returns no blocks for blank text', () => {
    expect(wrapText(' \n ', 10)).toEqual([]);
  });

  it('hard-splits without breaking surrogate pairs or combining marks', () => {
    expect(wrapText('\u{1F600}\u{1F600}\u{1F600}', 1)).toEqual(['\u{1F600}', '\u{1F600}', '\u{1F600}']);
    expect(wrapText('q\u0307q\u0307', 1)).toEqual(['q\u0307', 'q\u0307']);
  });

  it('measures block length in graphemes', () => {
    expect(wrapText('\u{1F600}\u{1F600} ab', 5)).toEqual(['\u{1F600}\u{1F600} ab']);
  });

  it('treats a maximum below one as one', () => {
    expect(wrapText('ab', 0)).toEqual(['a', 'b']);
  });
});

describe('createLesson', () => {
  it('cleans blocks and joins them into the target text', () => {
    const lesson = createLesson(meta, ['  fff  jjj ', '', 'ddd']);

    expect(lesson.blocks).toEqual(['fff jjj', 'ddd']);
    expect(lesson.targetText).toBe('fff jjj ddd');
    expect(lesson.metrics).toEqual({ blockCount: 2, characterCount: 11, isEmpty: false });
  });

  it('builds a lesson from free text', () => {
    const lesson = lessonFromText(meta, 'eins zwei drei', 9);
    expect(lesson.blocks).toEqual(['eins zwei', 'drei']);
    expect(describeLesson(lesson)).toBe("Lesson(Title='Grundreihe', Blocks=2, Characters=14)");
  });

  it('rejects a blank title', () => {
    expect(() => createLesson({ ...meta, title: '' }, ['a'])).toThrow(ValidationError);
  });
});

describe('helpers', () => {
  it('computes metrics without joining', () => {
    expect(metricsFromBlocks([])).toEqual({ blockCount: 0, characterCount: 0, isEmpty: true });
    expect(metricsFromBlocks(['ab', 'c'])).toEqual({ blockCount: 2, characterCount: 4, isEmpty: false });
  });

  it('collapses runs of whitespace', () => {
    expect(collapseWhitespace(' a\t\tb \n c ')).toBe('a b c');
  });

  it('creates a module guide', () => {
    expect(createModuleGuide('Umlaute')).toEqual({ title: 'Umlaute', bodyMarkdown: '' });
  });
});
