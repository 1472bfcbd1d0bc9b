import type { LessonData, LessonGuideData, ModuleData } from '@/types';
import { StoreKey } from './createDataStore';
import {
  reviveLessonData,
  reviveLessonGuideData,
  reviveModuleData,
  sameGuide,
  sameLesson,
  sameModule,
} from '@/utils/contentRecords';

export const MODULES = new StoreKey<ModuleData>({
  name: 'modules',
  comparer: sameModule,
  revive: reviveModuleData,
});

export const LESSONS = new StoreKey<LessonData>({
  name: 'lessons',
  comparer: sameLesson,
  revive: reviveLessonData,
});

export const LESSON_GUIDES = new StoreKey<LessonGuideData>({
  name: 'lessonGuides',
  comparer: sameGuide,
  revive: reviveLessonGuideData,
});
