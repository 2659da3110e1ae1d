import fs from 'node:fs/promises';
import path from 'node:path';
import { parse, subDays } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import { z } from 'zod';
import { BackupFile, RawProblem, SyncStats } from '../types';
import { DEFAULT_TIMEZONE, formatFileStamp } from './dateUtils';
import { createLogger } from './logger';

const logger = createLogger('backup');

const BACKUP_FILE_PATTERN = /^backup_leetcode_data_(\d{8}_\d{6})\.json$/;

export const SyncStatsSchema = z.object({
  totalProblems: z.number().int().nonnegative(),
  newProblems: z.number().int().nonnegative(),
  updatedProblems: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  lastSync: z.string().nullable(),
});

const BackupFileSchema = z.object({
  backupTimestamp: z.string(),
  syncStats: SyncStatsSchema,
  problemsCount: z.number().int().nonnegative(),
  problemsData: z.array(z.record(z.unknown())),
});

export const createEmptySyncStats = (): SyncStats => ({
  totalProblems: 0,
  newProblems: 0,
  updatedProblems: 0,
  errors: 0,
  lastSync: null,
});

// backups/backup_leetcode_data_20240103_101500.json
export const defaultBackupPath = (
  directory: string,
  now: Date = new Date(),
  timezone: string = DEFAULT_TIMEZONE,
): string => {
  return path.join(directory, `backup_leetcode_data_${formatFileStamp(now, timezone)}.json`);
};

export const buildBackup = (problems: RawProblem[], syncStats: SyncStats, now: Date = new Date()): BackupFile => ({
  backupTimestamp: now.toISOString(),
  syncStats: { ...syncStats },
  problemsCount: problems.length,
  problemsData: problems,
});

export const writeBackup = async (filePath: string, backup: BackupFile): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(backup, null, 2)}\n`, 'utf-8');
  logger.info(`Backup created successfully at: ${filePath}`);
};

/**
 * Reads a backup written by `writeBackup`. Throws when the file is missing,
 * is not JSON, or does not have the backup shape.
 */
export const readBackup = async (filePath: string): Promise<BackupFile> => {
  const text = await fs.readFile(filePath, 'utf-8');
  const result = BackupFileSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid backup file ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
};

// The time encoded in a backup file name, or null for files that are not backups
export const parseBackupFileTime = (fileName: string, timezone: string = DEFAULT_TIMEZONE): Date | null => {
  const match = BACKUP_FILE_PATTERN.exec(fileName);
  if (!match) return null;
  const local = parse(match[1], 'yyyyMMdd_HHmmss', new Date());
  if (Number.isNaN(local.getTime())) return null;
  return fromZonedTime(local, timezone);
};

/**
 * Deletes backup files in `directory` whose name stamp is older than
 * `retentionDays` before `now`. Other files are left alone.
 */
export const pruneBackups = async (
  directory: string,
  retentionDays: number,
  now: Date = new Date(),
  timezone: string = DEFAULT_TIMEZONE,
): Promise<string[]> => {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    logger.warn(`Cannot read backup directory ${directory}:`, error);
    return [];
  }

  const cutoff = subDays(now, retentionDays);
  const removed: string[] = [];
  for (const name of entries.sort()) {
    const createdAt = parseBackupFileTime(name, timezone);
    if (!createdAt || createdAt >= cutoff) continue;

    const filePath = path.join(directory, name);
    await fs.unlink(filePath);
    removed.push(filePath);
  }

  if (removed.length) {
    logger.info(`Removed ${removed.length} backups older than ${retentionDays} days`);
  }
  return removed;
};
