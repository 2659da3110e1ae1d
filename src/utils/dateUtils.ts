import { toZonedTime, formatInTimeZone } from 'date-fns-tz';
import {
  addDays,
  addHours,
  addWeeks,
  differenceInCalendarDays,
  format,
  isValid,
  parse,
  parseISO,
  startOfDay,
  startOfHour,
  startOfISOWeek,
  startOfMonth,
  subDays,
} from 'date-fns';

export const DEFAULT_TIMEZONE = 'UTC';

export type SyncInterval = 'hourly' | 'daily' | 'weekly';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Get current zoned date
export const getNow = (timezone: string = DEFAULT_TIMEZONE, now: Date = new Date()): Date => {
  return toZonedTime(now, timezone);
};

// Calendar day: "2026-01-31"
export const getTodayKey = (now: Date = new Date(), timezone: string = DEFAULT_TIMEZONE): string => {
  return formatInTimeZone(now, timezone, 'yyyy-MM-dd');
};

// "2026-01-31 18:04:05"
export const formatTimestamp = (now: Date = new Date(), timezone: string = DEFAULT_TIMEZONE): string => {
  return formatInTimeZone(now, timezone, 'yyyy-MM-dd HH:mm:ss');
};

// "20260131_180405", used in backup file names
export const formatFileStamp = (now: Date = new Date(), timezone: string = DEFAULT_TIMEZONE): string => {
  return formatInTimeZone(now, timezone, 'yyyyMMdd_HHmmss');
};

/**
 * Converts a LeetCode submission timestamp (epoch seconds, number or string)
 * into a calendar day in the given timezone. Returns '' when it cannot be parsed.
 */
export const epochSecondsToDateKey = (timestamp: unknown, timezone: string = DEFAULT_TIMEZONE): string => {
  const seconds = typeof timestamp === 'number' ? timestamp : Number(String(timestamp ?? '').trim());
  if (!Number.isFinite(seconds) || seconds <= 0) return '';
  const date = new Date(seconds * 1000);
  if (!isValid(date)) return '';
  return formatInTimeZone(date, timezone, 'yyyy-MM-dd');
};

// Strict "YYYY-MM-DD" that is also a real calendar date (rejects 2024-02-30)
export const isDateKey = (value: string): boolean => {
  if (!DATE_KEY_PATTERN.test(value)) return false;
  return isValid(parse(value, 'yyyy-MM-dd', new Date()));
};

// Monday of the ISO week containing the date: "2024-01-01"
export const getWeekStartKey = (dateKey: string): string => {
  return format(startOfISOWeek(parseISO(dateKey)), 'yyyy-MM-dd');
};

// First of the month: "2024-01-01"
export const getMonthStartKey = (dateKey: string): string => {
  return format(startOfMonth(parseISO(dateKey)), 'yyyy-MM-dd');
};

// Monthly: "2024-01"
export const getMonthKey = (dateKey: string): string => {
  return format(parseISO(dateKey), 'yyyy-MM');
};

export const getDayName = (dateKey: string): string => {
  return format(parseISO(dateKey), 'EEEE');
};

// Whole calendar days from `earlier` to `later` (both "YYYY-MM-DD")
export const daysBetween = (later: string, earlier: string): number => {
  return differenceInCalendarDays(parseISO(later), parseISO(earlier));
};

export const subtractDaysKey = (dateKey: string, days: number): string => {
  return format(subDays(parseISO(dateKey), days), 'yyyy-MM-dd');
};

// Calculate milliseconds until the next scheduled sync
export const getTimeUntilNextSync = (
  interval: SyncInterval,
  timezone: string = DEFAULT_TIMEZONE,
  current: Date = new Date(),
): number => {
  const now = getNow(timezone, current);
  let nextRun: Date;

  if (interval === 'hourly') {
    nextRun = startOfHour(addHours(now, 1));
  } else if (interval === 'daily') {
    nextRun = startOfDay(addDays(now, 1));
  } else {
    // Next ISO week starts on Monday
    nextRun = startOfISOWeek(addWeeks(now, 1));
  }

  return nextRun.getTime() - now.getTime();
};
