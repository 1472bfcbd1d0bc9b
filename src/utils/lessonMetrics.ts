import type { LessonMetrics } from '@/types';
import { graphemeLength } from './graphemes';

/** Metrics of the text `blocks.join(' ')` without building it. */
export function metricsFromBlocks(blocks: readonly string[]): LessonMetrics {
  const blockCount = blocks.length;
  const characterCount =
    blockCount === 0 ? 0 : blocks.reduce((sum, block) => sum + graphemeLength(block), 0) + (blockCount - 1);

  return {
    blockCount,
    characterCount,
    isEmpty: characterCount === 0,
  };
}
