import { describe, it, expect } from 'vitest';
import { generateAnalytics } from '@/analytics/analytics';
import { validateProblemData } from '@/analytics/normalizer';
import { createTopicMapping } from '@/analytics/topicMapper';

const NOW = new Date('2024-01-03T09:30:00Z');

describe('generateAnalytics', () => {
  const problems = validateProblemData([
    { title: 'Two Sum', difficulty: 'Easy', topics: ['Array', 'Hash Table'], dateSolved: '2024-01-01' },
    { title: 'Coin Change', difficulty: 'Medium', topics: ['DP'], dateSolved: '2024-01-02' },
    { title: 'Edit Distance', difficulty: 'Hard', topics: ['Dynamic Programming'], dateSolved: '2024-01-03' },
    { title: 'Valid Parentheses', difficulty: 'Easy', topics: ['Stack'] },
  ]);

  it('assembles topics, progress and summary', () => {
    const report = generateAnalytics(problems, {
      topicMapping: createTopicMapping({ DP: 'Dynamic Programming' }),
      now: NOW,
      timezone: 'UTC',
    });

    expect(Object.keys(report.topicAnalytics)).toEqual(['Array', 'Hash Table', 'Dynamic Programming', 'Stack']);
    expect(report.topicAnalytics['Dynamic Programming']).toEqual({
      total: 2,
      solved: 2,
      easy: 0,
      medium: 1,
      hard: 1,
      lastSolved: '2024-01-03',
    });
    expect(report.progressData.map((entry) => [entry.date, entry.totalSolved])).toEqual([
      ['2024-01-01', 1],
      ['2024-01-02', 2],
      ['2024-01-03', 3],
    ]);
    expect(report.summaryStats).toEqual({
      totalProblems: 4,
      totalSolved: 3,
      currentStreak: 3,
      longestStreak: 3,
      lastUpdated: '2024-01-03 09:30:00',
    });
    expect(report.patterns.mostProductiveDay).toBe('Monday');
    expect(report.difficultyProgression.complexityTrend).toBe('Insufficient data');
  });

  it('produces an empty report for no problems', () => {
    const report = generateAnalytics([], { now: NOW });

    expect(report.topicAnalytics).toEqual({});
    expect(report.progressData).toEqual([]);
    expect(report.summaryStats).toEqual({
      totalProblems: 0,
      totalSolved: 0,
      currentStreak: 0,
      longestStreak: 0,
      lastUpdated: '2024-01-03 09:30:00',
    });
  });

  it('gives the same report for the same input and clock', () => {
    const options = { now: NOW, timezone: 'UTC' };
    expect(generateAnalytics(problems, options)).toEqual(generateAnalytics(problems, options));
  });

  it('does not modify its input', () => {
    const before = JSON.stringify(problems);
    generateAnalytics(problems, { now: NOW });
    expect(JSON.stringify(problems)).toBe(before);
  });
});
