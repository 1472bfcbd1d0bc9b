export interface LessonMetaData {
  title: string;
  description: string;
  difficulty: number;
  tags: readonly string[];
  moduleId: string;
}

export interface LessonMetrics {
  blockCount: number;
  /** Length of the joined target text, separators included */
  characterCount: number;
  isEmpty: boolean;
}

export interface Lesson {
  meta: LessonMetaData;
  blocks: readonly string[];
  targetText: string;
  metrics: LessonMetrics;
}

export interface ModuleGuide {
  title: string;
  bodyMarkdown: string;
}
