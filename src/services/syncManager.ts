import { generateAnalytics } from '../analytics/analytics';
import { validateProblemData } from '../analytics/normalizer';
import { createTopicMapping } from '../analytics/topicMapper';
import { AppConfig } from '../config';
import {
  AnalyticsReport,
  ConnectionResults,
  ProblemRecord,
  RawProblem,
  SyncState,
  SyncStatus,
} from '../types';
import { buildBackup, defaultBackupPath, pruneBackups, readBackup, writeBackup } from '../utils/backupUtils';
import { formatTimestamp, subtractDaysKey, getTodayKey } from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { createFileSyncStateStore, SyncStateStore } from '../utils/syncStateUtils';
import { createLeetCodeClient, LeetCodeClient } from './leetcodeClient';
import { createSheetsClient, SheetsClient } from './sheetsClient';
import { createGoogleSheetsGateway } from './spreadsheetGateway';

const logger = createLogger('sync');

export interface SyncManagerDeps {
  config: AppConfig;
  leetcode: LeetCodeClient;
  sheets: SheetsClient;
  stateStore: SyncStateStore;
  now?: () => Date;
}

export interface SyncManager {
  testConnections: () => Promise<ConnectionResults>;
  syncAllData: (forceFullSync?: boolean) => Promise<boolean>;
  incrementalSync: () => Promise<boolean>;
  getSyncStatus: () => Promise<SyncStatus>;
  backupData: (backupPath?: string) => Promise<string | null>;
  restoreData: (backupPath: string) => Promise<boolean>;
  cleanupOldData: (daysToKeep?: number) => Promise<boolean>;
}

const titleOf = (problem: RawProblem): string => {
  return typeof problem.title === 'string' ? problem.title.trim() : '';
};

export const createSyncManager = (deps: SyncManagerDeps): SyncManager => {
  const { config, leetcode, sheets, stateStore } = deps;
  const now = deps.now ?? (() => new Date());
  const timezone = config.sync.timezone;
  const topicMapping = createTopicMapping(config.topicMapping);

  let state: SyncState | null = null;

  const loadState = async (): Promise<SyncState> => {
    if (!state) state = await stateStore.load();
    return state;
  };

  const recordError = async (): Promise<void> => {
    try {
      const current = await loadState();
      current.stats.errors += 1;
      await stateStore.save(current);
    } catch (error) {
      logger.error('Failed to save sync state:', error);
    }
  };

  // Problems already in the sheet, or null (logged) when the sheet could not be read
  const readExistingProblems = async (): Promise<RawProblem[] | null> => {
    const existing = await sheets.getExistingProblems();
    if (!existing) logger.error('Could not read the Problems sheet; leaving the spreadsheet unchanged');
    return existing;
  };

  const testConnections = async (): Promise<ConnectionResults> => {
    const [leetcodeOk, sheetsOk] = await Promise.all([leetcode.testConnection(), sheets.testConnection()]);
    logger.info(`LeetCode connection test: ${leetcodeOk ? 'PASSED' : 'FAILED'}`);
    logger.info(`Google Sheets connection test: ${sheetsOk ? 'PASSED' : 'FAILED'}`);
    return { leetcode: leetcodeOk, googleSheets: sheetsOk };
  };

  const analyze = (problems: readonly ProblemRecord[]): AnalyticsReport => {
    return generateAnalytics(problems, { topicMapping, now: now(), timezone });
  };

  // Writes every worksheet, stopping at the first one that fails
  const updateSheets = async (problems: readonly ProblemRecord[], report: AnalyticsReport): Promise<boolean> => {
    const steps: [string, () => Promise<boolean>][] = [
      ['required sheets', () => sheets.ensureSheetsExist()],
      ['Problems sheet', () => sheets.updateProblemsSheet(problems)],
      ['Analytics sheet', () => sheets.updateAnalyticsSheet(report.topicAnalytics)],
      ['Progress sheet', () => sheets.updateProgressSheet(report.progressData)],
      ['Summary sheet', () => sheets.updateSummarySheet(report)],
    ];

    for (const [name, step] of steps) {
      if (!(await step())) {
        logger.error(`Failed to update ${name}`);
        return false;
      }
    }
    logger.info('Successfully updated all Google Sheets');
    return true;
  };

  const fetchProblems = async (forceFullSync: boolean): Promise<RawProblem[]> => {
    logger.info(
      forceFullSync
        ? 'Fetching all solved problems from LeetCode (forced full sync)'
        : 'Fetching all solved problems from LeetCode',
    );
    const problems = await leetcode.getAllSolvedProblems();
    logger.info(`Fetched ${problems.length} problems from LeetCode`);
    return problems;
  };

  const recordSuccess = async (totalProblems: number, newProblems: number, updatedProblems: number): Promise<void> => {
    const current = await loadState();
    const finishedAt = now();
    current.lastSyncTime = finishedAt.toISOString();
    current.stats = {
      totalProblems,
      newProblems,
      updatedProblems,
      errors: 0,
      lastSync: formatTimestamp(finishedAt, timezone),
    };
    await stateStore.save(current);
  };

  const backupData = async (backupPath?: string): Promise<string | null> => {
    try {
      const target = backupPath ?? defaultBackupPath(config.backup.path, now(), timezone);
      const problems = await readExistingProblems();
      if (!problems) return null;
      const current = await loadState();
      await writeBackup(target, buildBackup(problems, current.stats, now()));
      return target;
    } catch (error) {
      logger.error('Backup failed:', error);
      return null;
    }
  };

  const backupAfterSync = async (): Promise<void> => {
    if (!config.backup.enabled) return;
    const written = await backupData();
    if (!written) return;
    try {
      await pruneBackups(config.backup.path, config.backup.retentionDays, now(), timezone);
    } catch (error) {
      logger.warn('Failed to prune old backups:', error);
    }
  };

  const syncAllData = async (forceFullSync = false): Promise<boolean> => {
    const startedAt = Date.now();
    logger.info('Starting LeetCode data synchronization');

    try {
      const connections = await testConnections();
      const failed = Object.entries(connections)
        .filter(([, ok]) => !ok)
        .map(([service]) => service);
      if (failed.length) {
        logger.error(`Connection test failed for: ${failed.join(', ')}`);
        await recordError();
        return false;
      }

      const fetched = await fetchProblems(forceFullSync);
      if (!fetched.length) {
        logger.warn('No problems data fetched from LeetCode');
        await recordError();
        return false;
      }

      const problems = validateProblemData(fetched);
      if (!problems.length) {
        logger.error('No valid problems data after validation');
        await recordError();
        return false;
      }

      const existing = await readExistingProblems();
      if (!existing) {
        await recordError();
        return false;
      }
      const existingTitles = new Set(existing.map(titleOf));
      const report = analyze(problems);
      if (!(await updateSheets(problems, report))) {
        await recordError();
        return false;
      }

      const updated = problems.filter((problem) => existingTitles.has(problem.title)).length;
      await recordSuccess(problems.length, problems.length - updated, updated);

      const seconds = ((Date.now() - startedAt) / 1000).toFixed(2);
      logger.info(`Sync completed successfully in ${seconds} seconds`);
      logger.info(`Synced ${problems.length} problems`);

      await backupAfterSync();
      return true;
    } catch (error) {
      logger.error('Sync failed with error:', error);
      await recordError();
      return false;
    }
  };

  const incrementalSync = async (): Promise<boolean> => {
    logger.info('Starting incremental synchronization');

    try {
      const existing = await readExistingProblems();
      if (!existing) {
        await recordError();
        return false;
      }
      const existingTitles = new Set(existing.map(titleOf));

      const fetched = await fetchProblems(false);
      if (!fetched.length) {
        logger.warn('No problems data fetched from LeetCode');
        await recordError();
        return false;
      }

      const fresh = fetched.filter((problem) => !existingTitles.has(titleOf(problem)));
      if (!fresh.length) {
        logger.info('No new problems to sync');
        return true;
      }
      logger.info(`Found ${fresh.length} new problems to sync`);

      const problems = validateProblemData([...existing, ...fresh]);
      const report = analyze(problems);
      if (!(await updateSheets(problems, report))) {
        await recordError();
        return false;
      }

      await recordSuccess(problems.length, fresh.length, 0);
      logger.info(`Incremental sync completed: ${fresh.length} new problems added`);
      await backupAfterSync();
      return true;
    } catch (error) {
      logger.error('Incremental sync failed:', error);
      await recordError();
      return false;
    }
  };

  const getSyncStatus = async (): Promise<SyncStatus> => {
    const current = await loadState();
    return {
      lastSyncTime: current.lastSyncTime,
      syncStats: { ...current.stats },
      connections: await testConnections(),
      configLoaded: true,
    };
  };

  const restoreData = async (backupPath: string): Promise<boolean> => {
    try {
      const backup = await readBackup(backupPath);
      if (!backup.problemsData.length) {
        logger.error('No problems data found in backup');
        return false;
      }

      const problems = validateProblemData(backup.problemsData);
      if (!(await updateSheets(problems, analyze(problems)))) {
        logger.error('Failed to restore data to sheets');
        return false;
      }

      logger.info(`Data restored successfully from backup: ${backupPath}`);
      return true;
    } catch (error) {
      logger.error('Restore failed:', error);
      return false;
    }
  };

  const cleanupOldData = async (daysToKeep = 365): Promise<boolean> => {
    try {
      const cutoff = subtractDaysKey(getTodayKey(now(), timezone), daysToKeep);
      const existing = await readExistingProblems();
      if (!existing) {
        await recordError();
        return false;
      }
      const problems = validateProblemData(existing);
      const recent = problems.filter((problem) => problem.dateSolved && problem.dateSolved >= cutoff);

      if (recent.length === problems.length) {
        logger.info('No old data to clean up');
        return true;
      }

      logger.info(`Cleaning up old data: keeping ${recent.length} out of ${problems.length} problems`);
      if (!(await updateSheets(recent, analyze(recent)))) {
        logger.error('Failed to update sheets during cleanup');
        return false;
      }

      logger.info('Data cleanup completed successfully');
      return true;
    } catch (error) {
      logger.error('Data cleanup failed:', error);
      return false;
    }
  };

  return {
    testConnections,
    syncAllData,
    incrementalSync,
    getSyncStatus,
    backupData,
    restoreData,
    cleanupOldData,
  };
};

// Wires the real LeetCode, Google Sheets and state-file collaborators from configuration
export const createSyncManagerFromConfig = async (config: AppConfig): Promise<SyncManager> => {
  const { leetcode: leetcodeConfig, googleSheets, sync } = config;
  const hasSession = Boolean(leetcodeConfig.sessionId && leetcodeConfig.csrfToken);

  const leetcode = createLeetCodeClient({
    username: leetcodeConfig.username,
    sessionId: hasSession ? leetcodeConfig.sessionId : undefined,
    csrfToken: hasSession ? leetcodeConfig.csrfToken : undefined,
    timeoutMs: sync.timeout * 1000,
    maxRetries: sync.maxRetries,
    maxWorkers: leetcodeConfig.maxWorkers,
    timezone: sync.timezone,
  });
  logger.info('LeetCode client initialized');

  const gateway = await createGoogleSheetsGateway(googleSheets);
  const sheets = createSheetsClient(gateway, { timezone: sync.timezone });
  logger.info('Google Sheets client initialized');

  return createSyncManager({
    config,
    leetcode,
    sheets,
    stateStore: createFileSyncStateStore(sync.stateFile),
  });
};
