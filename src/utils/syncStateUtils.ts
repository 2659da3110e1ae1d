import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { SyncState } from '../types';
import { createEmptySyncStats, SyncStatsSchema } from './backupUtils';
import { createLogger } from './logger';

const logger = createLogger('sync.state');

const SyncStateSchema = z.object({
  lastSyncTime: z.string().nullable(),
  stats: SyncStatsSchema,
});

export interface SyncStateStore {
  load: () => Promise<SyncState>;
  save: (state: SyncState) => Promise<void>;
}

export const createInitialSyncState = (): SyncState => ({
  lastSyncTime: null,
  stats: createEmptySyncStats(),
});

// Sync state persisted as JSON between CLI runs
export const createFileSyncStateStore = (filePath: string): SyncStateStore => {
  const load = async (): Promise<SyncState> => {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch {
      // First run: nothing saved yet
      return createInitialSyncState();
    }

    try {
      const result = SyncStateSchema.safeParse(JSON.parse(text));
      if (result.success) return result.data;
      logger.warn(`Ignoring invalid sync state in ${filePath}`);
    } catch (error) {
      logger.warn(`Ignoring unreadable sync state in ${filePath}:`, error);
    }
    return createInitialSyncState();
  };

  const save = async (state: SyncState): Promise<void> => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
  };

  return { load, save };
};
