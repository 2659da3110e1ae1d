import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { AppConfig } from '@/config';
import type { LeetCodeClient } from '@/services/leetcodeClient';
import { createSheetsClient, SheetsClient } from '@/services/sheetsClient';
import { createSyncManager } from '@/services/syncManager';
import type { RawProblem, SyncState } from '@/types';
import { readBackup, writeBackup } from '@/utils/backupUtils';
import { createInitialSyncState, SyncStateStore } from '@/utils/syncStateUtils';
import { createTestConfig } from '../helpers/factories';
import { createInMemorySpreadsheet, InMemorySpreadsheet } from '../helpers/inMemorySpreadsheet';

const NOW = new Date('2024-01-03T10:15:00Z');
const STAMP = '2024-01-03 10:15:00';

const TWO_SUM: RawProblem = {
  title: 'Two Sum',
  problemId: '1',
  difficulty: 'Easy',
  topics: ['Array', 'Hash Table'],
  dateSolved: '2024-01-02',
};
const VALID_PARENTHESES: RawProblem = {
  title: 'Valid Parentheses',
  problemId: '20',
  difficulty: 'Easy',
  topics: ['Stack'],
  dateSolved: '2024-01-03',
};

interface MemoryStateStore extends SyncStateStore {
  current: () => SyncState;
}

const createMemoryStateStore = (initial: SyncState = createInitialSyncState()): MemoryStateStore => {
  let saved = structuredClone(initial);
  return {
    current: () => saved,
    load: async () => structuredClone(saved),
    save: async (state) => {
      saved = structuredClone(state);
    },
  };
};

const fetchSolved = vi.fn<[], Promise<RawProblem[]>>();
const leetcodeConnected = vi.fn<[], Promise<boolean>>();

const fakeLeetCode: LeetCodeClient = {
  username: 'test-user',
  graphql: async () => null,
  getUserStatistics: async () => null,
  getUserSubmissions: async () => [],
  getProblemDetails: async () => null,
  getAllSolvedProblems: fetchSolved,
  testConnection: leetcodeConnected,
};

let dir: string;
let spreadsheet: InMemorySpreadsheet;
let sheets: SheetsClient;
let stateStore: MemoryStateStore;

const managerWith = (config: Partial<AppConfig> = {}) =>
  createSyncManager({
    config: createTestConfig({
      backup: { enabled: false, path: path.join(dir, 'backups'), retentionDays: 30 },
      ...config,
    }),
    leetcode: fakeLeetCode,
    sheets,
    stateStore,
    now: () => NOW,
  });

const problemTitles = (): string[] =>
  (spreadsheet.sheets.get('Problems') ?? []).slice(1).map((row) => String(row[0]));

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracker-sync-'));
  spreadsheet = createInMemorySpreadsheet('Test Tracker');
  sheets = createSheetsClient(spreadsheet, { timezone: 'UTC', now: () => NOW });
  stateStore = createMemoryStateStore();
  fetchSolved.mockReset();
  fetchSolved.mockResolvedValue([TWO_SUM, VALID_PARENTHESES]);
  leetcodeConnected.mockReset();
  leetcodeConnected.mockResolvedValue(true);
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('testConnections', () => {
  it('reports each service', async () => {
    leetcodeConnected.mockResolvedValue(false);
    expect(await managerWith().testConnections()).toEqual({ leetcode: false, googleSheets: true });
  });
});

describe('syncAllData', () => {
  it('writes every worksheet and records the sync', async () => {
    expect(await managerWith().syncAllData()).toBe(true);

    expect(problemTitles()).toEqual(['Two Sum', 'Valid Parentheses']);
    expect(spreadsheet.sheets.get('Analytics')?.map((row) => row[0])).toEqual([
      'Topic',
      'Array',
      'Hash Table',
      'Stack',
    ]);
    expect(spreadsheet.sheets.get('Progress')).toHaveLength(3);
    expect(spreadsheet.sheets.get('Summary')?.[3]).toEqual(['Current Streak', 2]);
    expect(stateStore.current()).toEqual({
      lastSyncTime: '2024-01-03T10:15:00.000Z',
      stats: { totalProblems: 2, newProblems: 2, updatedProblems: 0, errors: 0, lastSync: STAMP },
    });
  });

  it('counts problems already in the sheet as updated', async () => {
    const manager = managerWith();
    await manager.syncAllData();
    fetchSolved.mockResolvedValue([TWO_SUM, VALID_PARENTHESES, { title: 'LRU Cache', difficulty: 'Medium' }]);

    expect(await manager.syncAllData(true)).toBe(true);
    expect(stateStore.current().stats).toMatchObject({ totalProblems: 3, newProblems: 1, updatedProblems: 2 });
  });

  it('always fetches the full solved list and says so', async () => {
    await managerWith().syncAllData();
    await managerWith().syncAllData(true);

    expect(fetchSolved).toHaveBeenCalledTimes(2);
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/ - INFO - Fetching all solved problems from LeetCode$/));
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Fetching all solved problems from LeetCode (forced full sync)'),
    );
  });

  it('stops when a service is unreachable', async () => {
    leetcodeConnected.mockResolvedValue(false);

    expect(await managerWith().syncAllData()).toBe(false);
    expect(fetchSolved).not.toHaveBeenCalled();
    expect(stateStore.current().stats.errors).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Connection test failed for: leetcode'));
  });

  it('fails when LeetCode returns nothing', async () => {
    fetchSolved.mockResolvedValue([]);

    expect(await managerWith().syncAllData()).toBe(false);
    expect(stateStore.current().stats.errors).toBe(1);
  });

  it('fails when no fetched problem survives validation', async () => {
    fetchSolved.mockResolvedValue([{ difficulty: 'Easy' }]);
    expect(await managerWith().syncAllData()).toBe(false);
  });

  it('fails without recording success when a sheet write fails', async () => {
    await sheets.ensureSheetsExist();
    spreadsheet.failOn.add('writeRows');

    expect(await managerWith().syncAllData()).toBe(false);
    expect(stateStore.current().lastSyncTime).toBeNull();
    expect(stateStore.current().stats.errors).toBe(1);
  });

  it('leaves the sheets alone when the Problems sheet cannot be read', async () => {
    await managerWith().syncAllData();
    spreadsheet.failOn.add('readRows');
    fetchSolved.mockResolvedValue([VALID_PARENTHESES]);

    expect(await managerWith().syncAllData()).toBe(false);
    expect(problemTitles()).toEqual(['Two Sum', 'Valid Parentheses']);
    expect(stateStore.current().stats.errors).toBe(1);
  });

  it('resolves false when the sync state cannot be saved', async () => {
    const failingSave = vi.fn<[SyncState], Promise<void>>().mockRejectedValue(new Error('EACCES'));
    stateStore = { ...createMemoryStateStore(), save: failingSave };

    await expect(managerWith().syncAllData()).resolves.toBe(false);
    expect(failingSave).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Failed to save sync state:'),
      expect.any(Error),
    );
  });

  it('counts an error when fetching throws', async () => {
    fetchSolved.mockRejectedValue(new Error('socket hang up'));

    expect(await managerWith().syncAllData()).toBe(false);
    expect(stateStore.current().stats.errors).toBe(1);
  });

  it('writes a backup and prunes old ones when backups are enabled', async () => {
    const backupDir = path.join(dir, 'backups');
    await fs.mkdir(backupDir);
    await fs.writeFile(path.join(backupDir, 'backup_leetcode_data_20231101_000000.json'), '{}', 'utf-8');

    const manager = managerWith({ backup: { enabled: true, path: backupDir, retentionDays: 30 } });
    expect(await manager.syncAllData()).toBe(true);

    expect(await fs.readdir(backupDir)).toEqual(['backup_leetcode_data_20240103_101500.json']);
    const backup = await readBackup(path.join(backupDir, 'backup_leetcode_data_20240103_101500.json'));
    expect(backup.problemsCount).toBe(2);
    expect(backup.syncStats.totalProblems).toBe(2);
  });
});

describe('incrementalSync', () => {
  it('adds only problems missing from the sheet', async () => {
    await sheets.ensureSheetsExist();
    fetchSolved.mockResolvedValue([TWO_SUM]);
    await managerWith().syncAllData();
    fetchSolved.mockResolvedValue([TWO_SUM, VALID_PARENTHESES]);

    expect(await managerWith().incrementalSync()).toBe(true);

    expect(problemTitles()).toEqual(['Two Sum', 'Valid Parentheses']);
    expect(stateStore.current().stats).toMatchObject({ totalProblems: 2, newProblems: 1, updatedProblems: 0 });
  });

  it('succeeds without writing when nothing is new', async () => {
    await managerWith().syncAllData();
    spreadsheet.failOn.add('writeRows');

    expect(await managerWith().incrementalSync()).toBe(true);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('No new problems to sync'));
  });

  it('fails when LeetCode returns nothing', async () => {
    fetchSolved.mockResolvedValue([]);
    expect(await managerWith().incrementalSync()).toBe(false);
  });

  it('keeps the existing rows when the Problems sheet cannot be read', async () => {
    fetchSolved.mockResolvedValue([TWO_SUM, { title: 'LRU Cache', difficulty: 'Medium' }]);
    await managerWith().syncAllData();
    spreadsheet.failOn.add('readRows');
    fetchSolved.mockResolvedValue([VALID_PARENTHESES]);

    expect(await managerWith().incrementalSync()).toBe(false);

    expect(problemTitles()).toEqual(['Two Sum', 'LRU Cache']);
    expect(fetchSolved).toHaveBeenCalledTimes(1);
    expect(stateStore.current().stats.errors).toBe(1);
  });

  it('resolves false when the sync state cannot be saved', async () => {
    await sheets.ensureSheetsExist();
    stateStore = {
      ...createMemoryStateStore(),
      save: vi.fn<[SyncState], Promise<void>>().mockRejectedValue(new Error('EACCES')),
    };

    await expect(managerWith().incrementalSync()).resolves.toBe(false);
  });
});

describe('getSyncStatus', () => {
  it('combines saved state and live connection checks', async () => {
    stateStore = createMemoryStateStore({
      lastSyncTime: '2024-01-02T08:00:00.000Z',
      stats: { totalProblems: 5, newProblems: 1, updatedProblems: 4, errors: 0, lastSync: '2024-01-02 08:00:00' },
    });

    expect(await managerWith().getSyncStatus()).toEqual({
      lastSyncTime: '2024-01-02T08:00:00.000Z',
      syncStats: { totalProblems: 5, newProblems: 1, updatedProblems: 4, errors: 0, lastSync: '2024-01-02 08:00:00' },
      connections: { leetcode: true, googleSheets: true },
      configLoaded: true,
    });
  });
});

describe('backupData', () => {
  it('dumps the Problems worksheet to the given file', async () => {
    await managerWith().syncAllData();
    const file = path.join(dir, 'manual.json');

    expect(await managerWith().backupData(file)).toBe(file);
    const backup = await readBackup(file);
    expect(backup.backupTimestamp).toBe('2024-01-03T10:15:00.000Z');
    expect(backup.problemsData.map((problem) => problem.title)).toEqual(['Two Sum', 'Valid Parentheses']);
  });

  it('writes nothing when the Problems sheet cannot be read', async () => {
    await managerWith().syncAllData();
    spreadsheet.failOn.add('readRows');
    const file = path.join(dir, 'manual.json');

    expect(await managerWith().backupData(file)).toBeNull();
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('uses a stamped name under the backup path by default', async () => {
    await managerWith().syncAllData();
    expect(await managerWith().backupData()).toBe(
      path.join(dir, 'backups', 'backup_leetcode_data_20240103_101500.json'),
    );
  });
});

describe('restoreData', () => {
  it('rewrites the sheets from a backup', async () => {
    const file = path.join(dir, 'restore.json');
    await writeBackup(file, {
      backupTimestamp: '2024-01-01T00:00:00.000Z',
      syncStats: createInitialSyncState().stats,
      problemsCount: 1,
      problemsData: [{ ...VALID_PARENTHESES, topics: 'Stack' }],
    });

    expect(await managerWith().restoreData(file)).toBe(true);
    expect(problemTitles()).toEqual(['Valid Parentheses']);
  });

  it('refuses a backup without problems', async () => {
    const file = path.join(dir, 'empty.json');
    await writeBackup(file, {
      backupTimestamp: '2024-01-01T00:00:00.000Z',
      syncStats: createInitialSyncState().stats,
      problemsCount: 0,
      problemsData: [],
    });

    expect(await managerWith().restoreData(file)).toBe(false);
  });

  it('fails for a missing file', async () => {
    expect(await managerWith().restoreData(path.join(dir, 'missing.json'))).toBe(false);
  });
});

describe('cleanupOldData', () => {
  it('keeps problems solved within the window', async () => {
    fetchSolved.mockResolvedValue([
      { title: 'Old', difficulty: 'Easy', dateSolved: '2023-06-01' },
      { title: 'Recent', difficulty: 'Easy', dateSolved: '2024-01-01' },
      { title: 'Undated', difficulty: 'Easy' },
    ]);
    await managerWith().syncAllData();

    expect(await managerWith().cleanupOldData(30)).toBe(true);
    expect(problemTitles()).toEqual(['Recent']);
  });

  it('fails without writing when the Problems sheet cannot be read', async () => {
    await managerWith().syncAllData();
    spreadsheet.failOn.add('readRows');
    spreadsheet.failOn.add('clearSheet');

    expect(await managerWith().cleanupOldData(30)).toBe(false);
    expect(problemTitles()).toEqual(['Two Sum', 'Valid Parentheses']);
  });

  it('does nothing when every problem is recent', async () => {
    await managerWith().syncAllData();
    spreadsheet.failOn.add('clearSheet');

    expect(await managerWith().cleanupOldData(30)).toBe(true);
    expect(problemTitles()).toEqual(['Two Sum', 'Valid Parentheses']);
  });
});
