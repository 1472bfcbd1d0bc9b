import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/services/errors';
import {
  createLessonData,
  createModuleData,
  generateLessonId,
  orderFromModuleId,
  reviveLessonData,
  reviveLessonGuideData,
  reviveModuleData,
  sanitizeForId,
} from '../contentRecords';

describe('content record factories', () => {
  it('fills optional module fields', () => {
    expect(createModuleData({ moduleId: 'M01', title: 'Grundreihe' })).toEqual({
      moduleId: 'M01',
      title: 'Grundreihe',
      description: '',
      order: 0,
    });
  });

  it('rejects blank ids and titles', () => {
    expect(() => createModuleData({ moduleId: ' ', title: 'x' })).toThrow(ValidationError);
    expect(() => createLessonData({ lessonId: 'L1', moduleId: 'M01', title: '', exerciseText: 'a' })).toThrow(
      'must not be empty'
    );
  });

  it('rejects empty exercise text but keeps whitespace-only text', () => {
    expect(() => createLessonData({ lessonId: 'L1', moduleId: 'M01', title: 'x', exerciseText: '' })).toThrow(
      ValidationError
    );
    expect(createLessonData({ lessonId: 'L1', moduleId: 'M01', title: 'x', exerciseText: '  ' }).exerciseText).toBe(
      '  '
    );
  });

  it('stores exercise text in composed form', () => {
    expect(
      createLessonData({ lessonId: 'L1', moduleId: 'M01', title: 'x', exerciseText: 'a\u0308' }).exerciseText
    ).toBe('\u00e4');
  });

  it('rejects fractional difficulty', () => {
    expect(() =>
      createLessonData({ lessonId: 'L1', moduleId: 'M01', title: 'x', exerciseText: 'a', difficulty: 1.5 })
    ).toThrow(ValidationError);
  });
});

describe('revivers', () => {
  it('revives a stored module and defaults missing fields', () => {
    expect(reviveModuleData({ moduleId: 'M02', title: 'Oberreihe' })).toEqual({
      moduleId: 'M02',
      title: 'Oberreihe',
      description: '',
      order: 0,
    });
  });

  it('drops malformed records', () => {
    expect(reviveModuleData(null)).toBeNull();
    expect(reviveModuleData({ moduleId: 3, title: 'x' })).toBeNull();
    expect(reviveModuleData({ moduleId: '', title: 'x' })).toBeNull();
    expect(reviveLessonData({ lessonId: 'L1', moduleId: 'M01', title: 'x' })).toBeNull();
    expect(reviveLessonGuideData([])).toBeNull();
  });

  it('ignores tags that are not a string list', () => {
    const lesson = reviveLessonData({
      lessonId: 'L1',
      moduleId: 'M01',
      title: 'x',
      exerciseText: 'asdf',
      tags: ['a', 1],
    });
    expect(lesson?.tags).toEqual([]);
  });

  it('revives a guide', () => {
    expect(reviveLessonGuideData({ lessonId: 'L1', guideMarkdown: '# Tipp' })).toEqual({
      lessonId: 'L1',
      guideMarkdown: '# Tipp',
    });
  });
});

describe('lesson ids', () => {
  it('replaces everything but ASCII letters and digits', () => {
    expect(sanitizeForId('Übung 1: ÄÖ')).toBe('_bung_1____');
  });

  it('appends a counter until the id is unused', () => {
    const used = new Set(['M01_f_und_j', 'M01_f_und_j_1']);
    expect(generateLessonId('M01', 'F und J', new Set())).toBe('M01_f_und_j');
    expect(generateLessonId('M01', 'F und J', used)).toBe('M01_f_und_j_2');
  });

  it('reads the module order from its first number', () => {
    expect(orderFromModuleId('M03_Umlaute')).toBe(3);
    expect(orderFromModuleId('Sonderzeichen')).toBe(0);
  });
});
