import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_TIMEZONE, SyncInterval } from './utils/dateUtils';
import { createLogger, LogLevel } from './utils/logger';

const logger = createLogger('config');

export const DEFAULT_ENV_FILE = '.env';
export const DEFAULT_TEMPLATE_FILE = '.env.example';

const SYNC_INTERVALS: readonly [SyncInterval, ...SyncInterval[]] = ['hourly', 'daily', 'weekly'];
const LEVELS: readonly [LogLevel, ...LogLevel[]] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

export interface AppConfig {
  leetcode: {
    username: string;
    sessionId?: string;
    csrfToken?: string;
    maxWorkers: number;
  };
  googleSheets: {
    spreadsheetId: string;
    credentialsPath?: string;
    credentialsJson?: string;
  };
  sync: {
    interval: SyncInterval;
    maxRetries: number;
    timeout: number; // seconds
    timezone: string;
    stateFile: string;
  };
  backup: {
    enabled: boolean;
    path: string;
    retentionDays: number;
  };
  logging: {
    level: LogLevel;
    file?: string;
  };
  topicMapping: Record<string, string>;
}

type Section = Exclude<keyof AppConfig, 'topicMapping'>;

// Environment variable → [section, key] in the config file and in AppConfig
export const ENV_VARS: Record<string, [Section, string]> = {
  LEETCODE_USERNAME: ['leetcode', 'username'],
  LEETCODE_SESSION_ID: ['leetcode', 'sessionId'],
  LEETCODE_CSRF_TOKEN: ['leetcode', 'csrfToken'],
  LEETCODE_MAX_WORKERS: ['leetcode', 'maxWorkers'],
  GOOGLE_SHEETS_ID: ['googleSheets', 'spreadsheetId'],
  GOOGLE_CREDENTIALS_PATH: ['googleSheets', 'credentialsPath'],
  GOOGLE_CREDENTIALS_JSON: ['googleSheets', 'credentialsJson'],
  SYNC_INTERVAL: ['sync', 'interval'],
  MAX_RETRIES: ['sync', 'maxRetries'],
  TIMEOUT: ['sync', 'timeout'],
  TIMEZONE: ['sync', 'timezone'],
  SYNC_STATE_FILE: ['sync', 'stateFile'],
  BACKUP_ENABLED: ['backup', 'enabled'],
  BACKUP_PATH: ['backup', 'path'],
  BACKUP_RETENTION_DAYS: ['backup', 'retentionDays'],
  LOG_LEVEL: ['logging', 'level'],
  LOG_FILE: ['logging', 'file'],
};

// Missing values become '' so sibling checks (such as the credentials rule) still run
const requiredText = z.preprocess((value) => value ?? '', z.string().trim().min(1, 'Required'));

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const count = (fallback: number, min = 1) => z.coerce.number().int().min(min).default(fallback);

const flag = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
    z.boolean().default(fallback),
  );

const ConfigSchema = z.object({
  leetcode: z.object({
    username: requiredText,
    sessionId: optionalText,
    csrfToken: optionalText,
    maxWorkers: count(5),
  }),
  googleSheets: z
    .object({
      spreadsheetId: requiredText,
      credentialsPath: optionalText,
      credentialsJson: optionalText,
    })
    .refine((sheets) => Boolean(sheets.credentialsPath || sheets.credentialsJson), {
      message: 'Required unless GOOGLE_CREDENTIALS_JSON is set',
      path: ['credentialsPath'],
    }),
  sync: z.object({
    interval: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(SYNC_INTERVALS).default('daily'),
    ),
    maxRetries: count(3),
    timeout: count(30),
    timezone: z.string().trim().min(1).default(DEFAULT_TIMEZONE),
    stateFile: z.string().trim().min(1).default('./.sync-state.json'),
  }),
  backup: z.object({
    enabled: flag(true),
    path: z.string().trim().min(1).default('./backups'),
    retentionDays: count(30),
  }),
  logging: z.object({
    level: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      z.enum(LEVELS).default('INFO'),
    ),
    file: optionalText,
  }),
  topicMapping: z.record(z.string()).default({}),
});

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `- ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const labelFor = (issuePath: (string | number)[]): string => {
  const key = issuePath.join('.');
  const match = Object.entries(ENV_VARS).find(([, [section, field]]) => `${section}.${field}` === key);
  return match ? match[0] : key || '(config)';
};

const readEnvFile = (envFile: string | undefined): Record<string, string> => {
  const file = envFile ?? DEFAULT_ENV_FILE;
  if (!fs.existsSync(file)) {
    if (envFile) logger.warn(`Environment file ${file} not found, using system environment`);
    return {};
  }
  logger.info(`Loaded environment variables from ${file}`);
  return dotenv.parse(fs.readFileSync(file));
};

const readConfigFile = (configPath: string | undefined): Record<string, unknown> => {
  if (!configPath) return {};
  if (!fs.existsSync(configPath)) {
    throw new ConfigError([`Configuration file not found: ${configPath}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Configuration file ${configPath} is not valid JSON: ${reason}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`Configuration file ${configPath} must contain a JSON object`]);
  }
  logger.info(`Loaded configuration from ${configPath}`);
  return parsed;
};

/**
 * Builds the configuration from, in priority order: `env`, the .env file
 * (never overriding `env`), the JSON config file, then defaults.
 *
 * @throws ConfigError listing every invalid or missing value
 */
export const loadConfig = (options: LoadConfigOptions = {}): AppConfig => {
  const env: Record<string, string | undefined> = {
    ...readEnvFile(options.envFile),
    ...(options.env ?? process.env),
  };
  const file = readConfigFile(options.configPath);

  const raw: Record<string, Record<string, unknown>> = {
    leetcode: {},
    googleSheets: {},
    sync: {},
    backup: {},
    logging: {},
  };
  for (const [variable, [section, key]] of Object.entries(ENV_VARS)) {
    const fromEnv = env[variable]?.trim();
    const fileSection = file[section];
    raw[section][key] = fromEnv ? fromEnv : isRecord(fileSection) ? fileSection[key] : undefined;
  }

  const result = ConfigSchema.safeParse({ ...raw, topicMapping: file.topicMapping });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${labelFor(issue.path)}: ${issue.message}`);
    logger.error('Failed to load configuration');
    throw new ConfigError(issues);
  }

  logger.info('Configuration loaded successfully');
  return result.data;
};

export const REQUIRED_ENV_VARS: Record<string, string> = {
  LEETCODE_USERNAME: 'Your LeetCode username',
  GOOGLE_SHEETS_ID: 'Your Google Sheets spreadsheet ID',
  GOOGLE_CREDENTIALS_PATH: 'Path to Google service account JSON file (OR use GOOGLE_CREDENTIALS_JSON)',
};

// "VAR: description" for each required variable the environment does not set
export const checkMissingEnvVars = (env: NodeJS.ProcessEnv = process.env): string[] => {
  const isSet = (name: string): boolean => Boolean(env[name]?.trim());
  return Object.entries(REQUIRED_ENV_VARS)
    .filter(([name]) => {
      if (name === 'GOOGLE_CREDENTIALS_PATH') return !isSet(name) && !isSet('GOOGLE_CREDENTIALS_JSON');
      return !isSet(name);
    })
    .map(([name, description]) => `${name}: ${description}`);
};

export const ENV_TEMPLATE = `# LeetCode Sheets Tracker environment variables

# LeetCode
LEETCODE_USERNAME=your_username_here
# Optional, for private submission data
LEETCODE_SESSION_ID=
LEETCODE_CSRF_TOKEN=
LEETCODE_MAX_WORKERS=5

# Google Sheets (set GOOGLE_CREDENTIALS_PATH or GOOGLE_CREDENTIALS_JSON)
GOOGLE_SHEETS_ID=your_spreadsheet_id_here
GOOGLE_CREDENTIALS_PATH=path/to/service_account.json
GOOGLE_CREDENTIALS_JSON=

# Synchronization
SYNC_INTERVAL=daily
MAX_RETRIES=3
TIMEOUT=30
TIMEZONE=UTC
SYNC_STATE_FILE=./.sync-state.json

# Backups
BACKUP_ENABLED=true
BACKUP_PATH=./backups
BACKUP_RETENTION_DAYS=30

# Logging (DEBUG, INFO, WARNING, ERROR)
LOG_LEVEL=INFO
LOG_FILE=

# Copy this file to .env and fill in your values
`;

export const createEnvTemplate = (filePath: string = DEFAULT_TEMPLATE_FILE): void => {
  const directory = path.dirname(filePath);
  if (directory) fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(filePath, ENV_TEMPLATE, 'utf-8');
  logger.info(`Environment template created at ${filePath}`);
};

const setOrNot = (value: string | undefined): string => (value ? 'SET' : 'NOT SET');

export const formatConfigSummary = (config: AppConfig, env: NodeJS.ProcessEnv = process.env): string => {
  const { leetcode, googleSheets, sync, backup, logging } = config;
  const credentials = googleSheets.credentialsPath ? 'PATH' : googleSheets.credentialsJson ? 'JSON' : 'NOT SET';

  const lines = [
    '=== LeetCode Sheets Tracker Configuration ===',
    '',
    'LeetCode:',
    `  Username: ${leetcode.username}`,
    `  Session ID: ${setOrNot(leetcode.sessionId)}`,
    `  CSRF Token: ${setOrNot(leetcode.csrfToken)}`,
    `  Max Workers: ${leetcode.maxWorkers}`,
    '',
    'Google Sheets:',
    `  Spreadsheet ID: ${googleSheets.spreadsheetId}`,
    `  Credentials: ${credentials}`,
    '',
    'Synchronization:',
    `  Interval: ${sync.interval}`,
    `  Max Retries: ${sync.maxRetries}`,
    `  Timeout: ${sync.timeout}s`,
    `  Timezone: ${sync.timezone}`,
    '',
    'Backup:',
    `  Enabled: ${backup.enabled ? 'yes' : 'no'}`,
    `  Path: ${backup.path}`,
    `  Retention: ${backup.retentionDays} days`,
    '',
    'Logging:',
    `  Level: ${logging.level}`,
    `  File: ${logging.file ?? 'none'}`,
    '',
  ];

  const missing = checkMissingEnvVars(env);
  if (missing.length) {
    lines.push('⚠️  Missing required environment variables:', ...missing.map((item) => `  - ${item}`));
  } else {
    lines.push('✅ All required environment variables are set');
  }
  return lines.join('\n');
};
