import { describe, it, expect, beforeEach } from 'vitest';
import type {
  EvaluationOutcome,
  InputEvent,
  LessonData,
  LessonGuideData,
  ModuleData,
  TrainingSession,
} from '@/types';
import { LESSONS, LESSON_GUIDES, MODULES } from '@/stores/contentStores';
import { createInMemoryStore, type DataStore } from '@/stores/createDataStore';
import { TRAINING_SESSIONS } from '@/stores/sessionStore';
import { createLessonData, createLessonGuideData, createModuleData } from '@/utils/contentRecords';
import {
  completeSession,
  createStoredEvaluation,
  createStoredInput,
  createTrainingSession,
  recordActivity,
} from '@/utils/sessionRecords';
import { ContentQueryService, createPreviewText } from '../contentQueryService';
import { SessionQueryService, calculateMetrics } from '../sessionQueryService';
import { EMPTY_HEATMAP_HINT, StatisticsQueryService } from '../statisticsQueryService';

const typed: InputEvent = { kind: 'character', grapheme: 'x', chord: { key: 'KeyX', modifiers: { shift: false, altGr: false } } };

type Attempt = [expected: string, actual: string, outcome: EvaluationOutcome];

function session(
  id: number,
  moduleId: string,
  lessonId: string,
  startedAt: number,
  attempts: Attempt[],
  endedAt: number | null = null
): TrainingSession {
  let result = createTrainingSession({ id, moduleId, lessonId, startedAt });
  attempts.forEach(([expected, actual, outcome], tokenIndex) => {
    result = recordActivity(
      result,
      createStoredInput(typed, startedAt + tokenIndex + 1),
      createStoredEvaluation({ tokenIndex, expected, actual, outcome })
    );
  });
  return endedAt === null ? result : completeSession(result, endedAt);
}

describe('query services', () => {
  let modules: DataStore<ModuleData>;
  let lessons: DataStore<LessonData>;
  let guides: DataStore<LessonGuideData>;
  let sessions: DataStore<TrainingSession>;

  beforeEach(() => {
    modules = createInMemoryStore(MODULES);
    lessons = createInMemoryStore(LESSONS);
    guides = createInMemoryStore(LESSON_GUIDES);
    sessions = createInMemoryStore(TRAINING_SESSIONS);

    modules.getState().addRange([
      createModuleData({ moduleId: 'M02', title: 'Oberreihe', order: 2 }),
      createModuleData({ moduleId: 'M01', title: 'Grundreihe', description: 'asdf jklö', order: 1 }),
    ]);
    lessons.getState().addRange([
      createLessonData({ lessonId: 'L2', moduleId: 'M01', title: 'Ringfinger', difficulty: 2, exerciseText: 'sl' }),
      createLessonData({ lessonId: 'L1', moduleId: 'M01', title: 'Zeigefinger', difficulty: 1, exerciseText: 'fj\nfj' }),
      createLessonData({ lessonId: 'L3', moduleId: 'M02', title: 'Oben', exerciseText: 'qp' }),
    ]);
    guides.getState().add(createLessonGuideData({ lessonId: 'L1', guideMarkdown: '# Zeigefinger' }));

    sessions.getState().addRange([
      session(1, 'M01', 'L1', 1_000, [['f', 'f', 'correct'], ['j', 'k', 'incorrect']], 61_000),
      session(2, 'M01', 'L1', 100_000, [['f', 'f', 'correct'], ['j', 'j', 'correct']], 130_000),
      session(3, 'M01', 'L2', 200_000, [[' ', 'x', 'incorrect'], ['s', '', 'corrected']]),
    ]);
  });

  describe('ContentQueryService', () => {
    let service: ContentQueryService;

    beforeEach(() => {
      service = new ContentQueryService({ modules, lessons, guides, sessions });
    });

    it('lists modules by order with lesson counts and progress', () => {
      expect(service.getModules()).toEqual([
        {
          moduleId: 'M01',
          title: 'Grundreihe',
          description: 'asdf jklö',
          lessonCount: 2,
          progress: { sessions: 3, completed: 2, lastTrained: 200_000 },
        },
        { moduleId: 'M02', title: 'Oberreihe', description: null, lessonCount: 1, progress: null },
      ]);
    });

    it('lists lessons of a module by difficulty', () => {
      const items = service.getLessonsByModule('M01');

      expect(items.map((item) => item.lessonId)).toEqual(['L1', 'L2']);
      expect(items[0].progress).toEqual({
        sessions: 2,
        completed: 2,
        bestAccuracy: 1,
        bestDuration: 30_000,
        lastTrained: 130_000,
      });
      expect(items[1].progress).toEqual({
        sessions: 1,
        completed: 0,
        bestAccuracy: 0,
        bestDuration: null,
        lastTrained: 200_000,
      });
      expect(service.getLessonsByModule('')).toEqual([]);
    });

    it('returns lesson details with a preview', () => {
      expect(service.getLessonDetails('M01', 'L1')).toMatchObject({
        title: 'Zeigefinger',
        description: null,
        previewText: 'fj↵fj',
        hasGuide: true,
      });
      expect(service.getLessonDetails('M02', 'L1')).toBeNull();
    });

    it('returns a guide with its lesson title', () => {
      expect(service.getLessonGuide('L1')).toEqual({ lessonId: 'L1', title: 'Zeigefinger', markdown: '# Zeigefinger' });
      expect(service.getLessonGuide('L2')).toBeNull();
    });

    it('cuts long previews', () => {
      expect(createPreviewText('abcdef', 4)).toBe('abcd...');
      expect(createPreviewText('   ')).toBe('');
    });

    it('cuts previews on grapheme boundaries', () => {
      expect(createPreviewText('\u{1F600}\u{1F600}b', 1)).toBe('\u{1F600}...');
      expect(createPreviewText('q\u0307r', 1)).toBe('q\u0307...');
    });
  });

  describe('SessionQueryService', () => {
    let service: SessionQueryService;

    beforeEach(() => {
      service = new SessionQueryService({ sessions, modules, lessons });
    });

    it('lists the most recent sessions first', () => {
      expect(service.getRecent(2).map((item) => item.sessionId)).toEqual([3, 2]);
      expect(service.getRecent(-1)).toEqual([]);
      expect(service.getLast()).toMatchObject({ sessionId: 3, lessonTitle: 'Ringfinger', isCompleted: false });
    });

    it('filters sessions', () => {
      expect(service.getByFilter({ lessonId: 'L1' }).map((item) => item.sessionId)).toEqual([2, 1]);
      expect(service.getByFilter({ onlyCompleted: false }).map((item) => item.sessionId)).toEqual([3]);
      expect(service.getByFilter({ from: 50_000, to: 150_000 }).map((item) => item.sessionId)).toEqual([2]);
    });

    it('builds a session detail', () => {
      const detail = service.getDetail(3);

      expect(detail?.header).toEqual({
        startedAt: 200_000,
        endedAt: null,
        moduleTitle: 'Grundreihe',
        lessonTitle: 'Ringfinger',
        moduleId: 'M01',
        lessonId: 'L2',
      });
      expect(detail?.events).toEqual([
        { index: 0, tokenIndex: 0, expected: '␣', actual: 'x', outcome: 'incorrect', isError: true },
        { index: 1, tokenIndex: 1, expected: 's', actual: '', outcome: 'corrected', isError: false },
      ]);
      expect(detail?.errors).toEqual([{ index: 0, tokenIndex: 0, expected: '␣', actual: 'x' }]);
      expect(service.getDetail(99)).toBeNull();
    });

    it('computes metrics', () => {
      const [first] = sessions.getState().items;
      expect(calculateMetrics(first)).toEqual({
        totalInputs: 2,
        totalErrors: 1,
        accuracy: 0.5,
        duration: 60_000,
        inputsPerMinute: 2,
      });
    });

    it('returns null on an empty history', () => {
      sessions.getState().clear();
      expect(service.getLast()).toBeNull();
    });
  });

  describe('StatisticsQueryService', () => {
    let service: StatisticsQueryService;

    beforeEach(() => {
      service = new StatisticsQueryService({ sessions, modules, lessons });
    });

    it('groups sessions by module and lesson', () => {
      const dashboard = service.buildDashboard();

      expect(dashboard.modules).toEqual([
        {
          moduleId: 'M01',
          moduleTitle: 'Grundreihe',
          sessions: 3,
          completed: 2,
          avgErrors: 2 / 3,
          avgAccuracy: (0.5 + 1 + 0.5) / 3,
          bestDuration: 30_000,
          lastTrained: 200_000,
        },
      ]);
      expect(dashboard.lessons.map((row) => [row.lessonId, row.sessions])).toEqual([
        ['L1', 2],
        ['L2', 1],
      ]);
    });

    it('applies the filter', () => {
      expect(service.buildDashboard({ lessonId: 'L2' }).modules[0].sessions).toBe(1);
      expect(service.buildDashboard({ moduleId: 'M02' })).toEqual({ modules: [], lessons: [] });
    });

    it('counts error pairs for the heatmap', () => {
      sessions.getState().add(session(4, 'M01', 'L1', 300_000, [['j', 'k', 'incorrect'], ['f', '', 'incorrect']]));

      expect(service.buildErrorHeatmap()).toEqual({
        rows: [
          { expected: 'j', actual: 'k', count: 2 },
          { expected: '␣', actual: 'x', count: 1 },
          { expected: 'f', actual: '<empty>', count: 1 },
        ],
        hintText: 'Top 3 most frequent errors',
      });
    });

    it('keeps only the most frequent error pairs', () => {
      const repeated: Attempt[] = Array.from({ length: 3 }, () => ['a', 'b', 'incorrect']);
      const distinct: Attempt[] = Array.from({ length: 60 }, (_, i) => ['a', `z${i}`, 'incorrect']);
      sessions.getState().add(session(4, 'M01', 'L1', 300_000, [...repeated, ...distinct]));

      const heatmap = service.buildErrorHeatmap();

      expect(heatmap.rows).toHaveLength(50);
      expect(heatmap.rows[0]).toEqual({ expected: 'a', actual: 'b', count: 3 });
      expect(heatmap.hintText).toBe('Top 50 most frequent errors');
    });

    it('shows line breaks and tabs as symbols', () => {
      sessions.getState().add(
        session(4, 'M02', 'L3', 300_000, [
          ['\n', '\t', 'incorrect'],
          ['\r', 'q', 'incorrect'],
        ])
      );

      expect(service.buildErrorHeatmap({ lessonId: 'L3' }).rows).toEqual([
        { expected: '↵', actual: '⇥', count: 1 },
        { expected: '↵', actual: 'q', count: 1 },
      ]);
    });

    it('shows a hint without errors', () => {
      expect(service.buildErrorHeatmap({ lessonId: 'L3' })).toEqual({ rows: [], hintText: EMPTY_HEATMAP_HINT });
    });
  });
});
