export * from './analytics';
export * from './types';
export { checkMissingEnvVars, ConfigError, createEnvTemplate, ENV_TEMPLATE, formatConfigSummary, loadConfig } from './config';
export type { AppConfig, LoadConfigOptions } from './config';
export { createLeetCodeClient, LeetCodeApiError } from './services/leetcodeClient';
export type { LeetCodeClient, LeetCodeClientOptions } from './services/leetcodeClient';
export { createSheetsClient, SHEET_HEADERS, SHEET_NAMES } from './services/sheetsClient';
export type { SheetsClient } from './services/sheetsClient';
export { createGoogleSheetsGateway } from './services/spreadsheetGateway';
export type { CellValue, SpreadsheetGateway } from './services/spreadsheetGateway';
export { createSyncManager, createSyncManagerFromConfig } from './services/syncManager';
export type { SyncManager, SyncManagerDeps } from './services/syncManager';
export { buildBackup, defaultBackupPath, pruneBackups, readBackup, writeBackup } from './utils/backupUtils';
export { mapWithConcurrency } from './utils/concurrency';
export { configureLogging, createLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export { parseNumericValue } from './utils/numberUtils';
export { createFileSyncStateStore } from './utils/syncStateUtils';
export type { SyncStateStore } from './utils/syncStateUtils';
