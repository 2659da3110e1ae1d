import { AnalyticsOptions, AnalyticsReport, ProblemRecord } from '../types';
import { DEFAULT_TIMEZONE, formatTimestamp } from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { calculateProgressMetrics } from './progressAnalyzer';
import { categorizeByTopic } from './topicAggregator';

const logger = createLogger('analytics');

/**
 * Builds the full report written to the spreadsheet: per-topic stats, one
 * progress row per solve day and the dashboard summary.
 */
export const generateAnalytics = (
  problems: readonly ProblemRecord[],
  options: AnalyticsOptions = {},
): AnalyticsReport => {
  const now = options.now ?? new Date();
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;

  logger.info(`Generating analytics for ${problems.length} problems`);

  const topicAnalytics = categorizeByTopic(problems, options.topicMapping);
  const progress = calculateProgressMetrics(problems, { now, timezone });

  const report: AnalyticsReport = {
    topicAnalytics,
    progressData: progress.dailyProgress,
    summaryStats: {
      totalProblems: problems.length,
      totalSolved: progress.totalSolved,
      currentStreak: progress.currentStreak,
      longestStreak: progress.longestStreak,
      lastUpdated: formatTimestamp(now, timezone),
    },
    patterns: progress.patterns,
    difficultyProgression: progress.difficultyProgression,
  };

  logger.info('Analytics generation completed');
  return report;
};
