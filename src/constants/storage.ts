import { homedir } from 'node:os';
import { join } from 'node:path';

export const DATA_DIR_ENV = 'QWERTZ_TRAINER_DATA_DIR';

export const SETTINGS_STORAGE_NAME = 'settings';

export function resolveDataDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[DATA_DIR_ENV];
  if (configured && configured.trim() !== '') return configured;
  return join(homedir(), '.qwertz-trainer');
}
