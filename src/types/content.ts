/**
 * Curated content records as stored in the content stores.
 */

export interface ModuleData {
  moduleId: string;
  title: string;
  description: string;
  order: number;
}

export interface LessonData {
  lessonId: string;
  moduleId: string;
  title: string;
  description: string;
  difficulty: number;
  tags: readonly string[];
  exerciseText: string;
}

export interface LessonGuideData {
  lessonId: string;
  guideMarkdown: string;
}
