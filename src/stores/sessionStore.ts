/**
 * Training session store key
 *
 * Sessions are identified by a numeric id assigned on first save.
 */

import type { TrainingSession } from '@/types';
import { StoreKey } from './createDataStore';
import { reviveTrainingSession } from '@/utils/sessionRecords';

export const TRAINING_SESSIONS = new StoreKey<TrainingSession>({
  name: 'trainingSessions',
  comparer: (a, b) => a.id === b.id,
  revive: reviveTrainingSession,
});

export function nextSessionId(sessions: readonly TrainingSession[]): number {
  return sessions.reduce((max, session) => Math.max(max, session.id), 0) + 1;
}
