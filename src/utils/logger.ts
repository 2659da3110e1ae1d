import fs from 'node:fs';
import path from 'node:path';
import { formatInTimeZone } from 'date-fns-tz';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

interface LoggingSettings {
  level: LogLevel;
  file?: string;
  timezone: string;
}

const settings: LoggingSettings = { level: 'INFO', timezone: 'UTC' };

const severity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

// "2026-01-31 18:04:05,123" in the configured timezone
const stamp = (): string => formatInTimeZone(new Date(), settings.timezone, 'yyyy-MM-dd HH:mm:ss,SSS');

const stringifyDetail = (detail: unknown): string => {
  if (detail instanceof Error) return detail.stack ?? detail.message;
  if (typeof detail === 'string') return detail;
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
};

export const configureLogging = (next: Partial<LoggingSettings>): void => {
  if (next.level) settings.level = next.level;
  if (next.timezone) settings.timezone = next.timezone;
  if ('file' in next) settings.file = next.file;
  if (settings.file) {
    fs.mkdirSync(path.dirname(settings.file), { recursive: true });
  }
};

export const getLogLevel = (): LogLevel => settings.level;

export const createLogger = (scope: string): Logger => {
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (severity(level) < severity(settings.level)) return;

    const line = `${stamp()} - ${scope} - ${level} - ${message}`;
    if (level === 'ERROR') {
      console.error(line, ...details);
    } else if (level === 'WARNING') {
      console.warn(line, ...details);
    } else {
      console.log(line, ...details);
    }

    if (settings.file) {
      const suffix = details.length ? ` ${details.map(stringifyDetail).join(' ')}` : '';
      try {
        fs.appendFileSync(settings.file, `${line}${suffix}\n`, 'utf-8');
      } catch (error) {
        console.error(`Error writing log file ${settings.file}:`, error);
        settings.file = undefined;
      }
    }
  };

  return {
    debug: (message, ...details) => write('DEBUG', message, details),
    info: (message, ...details) => write('INFO', message, details),
    warn: (message, ...details) => write('WARNING', message, details),
    error: (message, ...details) => write('ERROR', message, details),
  };
};
