import {
  ComplexityTrend,
  DailyProgressEntry,
  DifficultyCounts,
  DifficultyKey,
  DifficultyProgression,
  ProblemRecord,
  ProgressMetrics,
  SolvingPatterns,
  StreakResult,
} from '../types';
import {
  DEFAULT_TIMEZONE,
  daysBetween,
  formatTimestamp,
  getDayName,
  getMonthKey,
  getMonthStartKey,
  getTodayKey,
  getWeekStartKey,
} from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { ratio } from '../utils/numberUtils';

const logger = createLogger('analytics.progress');

export const MIN_TREND_SAMPLE = 10;
const TREND_THRESHOLD = 0.2;

const DIFFICULTY_SCORES: Record<DifficultyKey, number> = { easy: 1, medium: 2, hard: 3 };

export interface ProgressOptions {
  now?: Date;
  timezone?: string;
}

const difficultyKey = (problem: ProblemRecord): DifficultyKey | null => {
  const key = problem.difficulty.toLowerCase();
  return key === 'easy' || key === 'medium' || key === 'hard' ? key : null;
};

const difficultyScore = (problem: ProblemRecord): number => {
  const key = difficultyKey(problem);
  return key ? DIFFICULTY_SCORES[key] : 0;
};

const sumBy = (counts: Map<string, number>, anchor: (date: string) => string, target: string): number => {
  let total = 0;
  for (const [date, count] of counts) {
    if (anchor(date) === target) total += count;
  }
  return total;
};

/**
 * Problems that carry a solve date, oldest first. Array.prototype.sort is
 * stable, so same-day problems keep their input order.
 */
export const sortByDateSolved = (problems: readonly ProblemRecord[]): ProblemRecord[] => {
  return problems
    .filter((problem) => problem.dateSolved)
    .sort((a, b) => (a.dateSolved < b.dateSolved ? -1 : a.dateSolved > b.dateSolved ? 1 : 0));
};

/**
 * Streaks over distinct solve days. Several solves on one day count as one day;
 * the run continues only when the next day is exactly one calendar day later.
 * The latest run is "current" only if it ended today or yesterday.
 */
export const calculateStreaks = (dates: readonly string[], today: string): StreakResult => {
  const streakByDate = new Map<string, number>();
  const distinct = [...new Set(dates.filter(Boolean))].sort();

  let run = 0;
  let longestStreak = 0;
  let previous: string | null = null;

  for (const date of distinct) {
    run = previous !== null && daysBetween(date, previous) === 1 ? run + 1 : 1;
    longestStreak = Math.max(longestStreak, run);
    streakByDate.set(date, run);
    previous = date;
  }

  const currentStreak = previous !== null && daysBetween(today, previous) <= 1 ? run : 0;
  return { currentStreak, longestStreak, streakByDate };
};

/**
 * One entry per solve day with week (Monday-anchored) and month totals and a
 * running cumulative count. `streakByDate` fills each entry's streak column.
 */
export const calculateDailyProgress = (
  problems: readonly ProblemRecord[],
  streakByDate: ReadonlyMap<string, number> = new Map(),
): DailyProgressEntry[] => {
  const dailyCounts = new Map<string, number>();
  for (const problem of problems) {
    if (!problem.dateSolved) continue;
    dailyCounts.set(problem.dateSolved, (dailyCounts.get(problem.dateSolved) ?? 0) + 1);
  }

  const entries: DailyProgressEntry[] = [];
  let totalSolved = 0;

  for (const date of [...dailyCounts.keys()].sort()) {
    const dailyCount = dailyCounts.get(date) ?? 0;
    totalSolved += dailyCount;

    entries.push({
      date,
      dailyCount,
      weeklyCount: sumBy(dailyCounts, getWeekStartKey, getWeekStartKey(date)),
      monthlyCount: sumBy(dailyCounts, getMonthStartKey, getMonthStartKey(date)),
      streak: streakByDate.get(date) ?? 0,
      totalSolved,
    });
  }

  return entries;
};

export const analyzeSolvingPatterns = (problems: readonly ProblemRecord[]): SolvingPatterns => {
  const dayPatterns = new Map<string, number>();
  const difficultyTrends: SolvingPatterns['difficultyTrends'] = [];

  for (const problem of problems) {
    if (!problem.dateSolved) continue;
    const dayName = getDayName(problem.dateSolved);
    dayPatterns.set(dayName, (dayPatterns.get(dayName) ?? 0) + 1);
    difficultyTrends.push({ date: problem.dateSolved, difficulty: problem.difficulty.toLowerCase() });
  }

  // Strictly greater keeps the first day encountered on ties
  let mostProductiveDay = '';
  let best = 0;
  for (const [day, count] of dayPatterns) {
    if (count > best) {
      mostProductiveDay = day;
      best = count;
    }
  }

  return {
    mostProductiveDay,
    dayDistribution: Object.fromEntries(dayPatterns),
    difficultyTrends,
  };
};

export const calculateDifficultyRatio = (problems: readonly ProblemRecord[]): DifficultyCounts => {
  const counts: DifficultyCounts = { easy: 0, medium: 0, hard: 0 };
  for (const problem of problems) {
    const key = difficultyKey(problem);
    if (key) counts[key] += 1;
  }

  return {
    easy: ratio(counts.easy, problems.length),
    medium: ratio(counts.medium, problems.length),
    hard: ratio(counts.hard, problems.length),
  };
};

/**
 * Compares the mean difficulty score of the older half of the (date-sorted)
 * problems with the newer half; the newer half takes the extra problem.
 */
export const calculateComplexityTrend = (problems: readonly ProblemRecord[]): ComplexityTrend => {
  if (problems.length < MIN_TREND_SAMPLE) return 'Insufficient data';

  const midPoint = Math.floor(problems.length / 2);
  const mean = (slice: readonly ProblemRecord[]): number =>
    slice.reduce((sum, problem) => sum + difficultyScore(problem), 0) / slice.length;

  const firstAverage = mean(problems.slice(0, midPoint));
  const secondAverage = mean(problems.slice(midPoint));

  if (secondAverage > firstAverage + TREND_THRESHOLD) return 'Improving - solving harder problems';
  if (secondAverage < firstAverage - TREND_THRESHOLD) return 'Focusing on easier problems';
  return 'Consistent difficulty level';
};

export const analyzeDifficultyProgression = (problems: readonly ProblemRecord[]): DifficultyProgression => {
  const monthly = new Map<string, DifficultyCounts>();

  for (const problem of problems) {
    const key = difficultyKey(problem);
    if (!problem.dateSolved || !key) continue;

    const month = getMonthKey(problem.dateSolved);
    let counts = monthly.get(month);
    if (!counts) {
      counts = { easy: 0, medium: 0, hard: 0 };
      monthly.set(month, counts);
    }
    counts[key] += 1;
  }

  return {
    monthlyBreakdown: Object.fromEntries(monthly),
    difficultyRatio: calculateDifficultyRatio(problems),
    complexityTrend: calculateComplexityTrend(problems),
  };
};

/**
 * Daily progress, streaks, weekday patterns and difficulty progression for a
 * set of normalized problems. Problems without a solve date only count towards
 * `totalProblems`.
 */
export const calculateProgressMetrics = (
  problems: readonly ProblemRecord[],
  options: ProgressOptions = {},
): ProgressMetrics => {
  const now = options.now ?? new Date();
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;

  const sorted = sortByDateSolved(problems);
  const streaks = calculateStreaks(
    sorted.map((problem) => problem.dateSolved),
    getTodayKey(now, timezone),
  );

  const metrics: ProgressMetrics = {
    totalProblems: problems.length,
    totalSolved: sorted.length,
    currentStreak: streaks.currentStreak,
    longestStreak: streaks.longestStreak,
    dailyProgress: calculateDailyProgress(sorted, streaks.streakByDate),
    patterns: analyzeSolvingPatterns(sorted),
    difficultyProgression: analyzeDifficultyProgression(sorted),
    lastUpdated: formatTimestamp(now, timezone),
  };

  logger.info(
    `Calculated progress metrics: ${metrics.currentStreak} day streak, ${metrics.totalSolved} total solved`,
  );
  return metrics;
};
