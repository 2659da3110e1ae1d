import {
  AnalyticsReport,
  DailyProgressEntry,
  ProblemRecord,
  RawProblem,
  TopicAnalytics,
} from '../types';
import { DEFAULT_TIMEZONE, formatTimestamp } from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { ratio } from '../utils/numberUtils';
import { CellValue, SpreadsheetGateway } from './spreadsheetGateway';

const logger = createLogger('sheets');

export const SHEET_NAMES = {
  problems: 'Problems',
  analytics: 'Analytics',
  progress: 'Progress',
  summary: 'Summary',
} as const;

export type SheetName = (typeof SHEET_NAMES)[keyof typeof SHEET_NAMES];

export const SHEET_HEADERS: Record<SheetName, string[]> = {
  Problems: ['Problem Name', 'Difficulty', 'Topics', 'Date Solved', 'Attempts', 'Status', 'Problem ID', 'Last Updated'],
  Analytics: ['Topic', 'Total Problems', 'Solved', 'Percentage', 'Last Solved', 'Easy', 'Medium', 'Hard'],
  Progress: ['Date', 'Daily Count', 'Weekly Count', 'Monthly Count', 'Streak', 'Total Solved', 'Last Updated'],
  Summary: ['Metric', 'Value'],
};

const NEW_SHEET_ROWS = 1000;
const NEW_SHEET_COLUMNS = 20;

export interface SheetsClientOptions {
  timezone?: string;
  now?: () => Date;
}

export interface SheetsClient {
  ensureSheetsExist: () => Promise<boolean>;
  updateProblemsSheet: (problems: readonly ProblemRecord[]) => Promise<boolean>;
  updateAnalyticsSheet: (topicAnalytics: TopicAnalytics) => Promise<boolean>;
  updateProgressSheet: (progressData: readonly DailyProgressEntry[]) => Promise<boolean>;
  updateSummarySheet: (report: AnalyticsReport) => Promise<boolean>;
  // `null` when the worksheet exists but cannot be read
  getExistingProblems: () => Promise<RawProblem[] | null>;
  testConnection: () => Promise<boolean>;
}

// 1 → "A", 26 → "Z", 27 → "AA"
export const columnLetter = (column: number): string => {
  let letters = '';
  let n = column;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
};

const rowRange = (firstRow: number, rowCount: number, columnCount: number): string => {
  return `A${firstRow}:${columnLetter(columnCount)}${firstRow + rowCount - 1}`;
};

const cellText = (value: CellValue | undefined): string => {
  return value === undefined ? '' : String(value).trim();
};

export const createSheetsClient = (
  gateway: SpreadsheetGateway,
  options: SheetsClientOptions = {},
): SheetsClient => {
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;
  const now = options.now ?? (() => new Date());

  const writeHeader = async (name: SheetName): Promise<void> => {
    const headers = SHEET_HEADERS[name];
    await gateway.writeRows(name, rowRange(1, 1, headers.length), [headers]);
    await gateway.formatRange(
      name,
      { startRow: 0, endRow: 1, startColumn: 0, endColumn: headers.length },
      'header',
    );
  };

  // Clear, re-create the header, then write every data row in one batch
  const replaceRows = async (name: SheetName, rows: CellValue[][]): Promise<void> => {
    await gateway.clearSheet(name);
    await writeHeader(name);
    if (rows.length) {
      await gateway.writeRows(name, rowRange(2, rows.length, SHEET_HEADERS[name].length), rows);
    }
  };

  const ensureSheetsExist = async (): Promise<boolean> => {
    try {
      const existing = new Set(await gateway.listSheetTitles());
      for (const name of Object.values(SHEET_NAMES)) {
        if (existing.has(name)) continue;
        await gateway.addSheet(name, NEW_SHEET_ROWS, NEW_SHEET_COLUMNS);
        await writeHeader(name);
        logger.info(`Created sheet: ${name}`);
      }
      return true;
    } catch (error) {
      logger.error('Failed to ensure required sheets exist:', error);
      return false;
    }
  };

  const updateProblemsSheet = async (problems: readonly ProblemRecord[]): Promise<boolean> => {
    try {
      const updatedAt = formatTimestamp(now(), timezone);
      const rows: CellValue[][] = problems.map((problem) => [
        problem.title,
        problem.difficulty,
        problem.topics.join(', '),
        problem.dateSolved,
        problem.attempts,
        problem.status,
        problem.problemId,
        updatedAt,
      ]);

      await replaceRows(SHEET_NAMES.problems, rows);
      logger.info(`Updated Problems sheet with ${rows.length} problems`);
      return true;
    } catch (error) {
      logger.error('Failed to update Problems sheet:', error);
      return false;
    }
  };

  const updateAnalyticsSheet = async (topicAnalytics: TopicAnalytics): Promise<boolean> => {
    try {
      const rows: CellValue[][] = Object.entries(topicAnalytics).map(([topic, stat]) => [
        topic,
        stat.total,
        stat.solved,
        ratio(stat.solved, stat.total),
        stat.lastSolved,
        stat.easy,
        stat.medium,
        stat.hard,
      ]);

      await replaceRows(SHEET_NAMES.analytics, rows);
      if (rows.length) {
        // Column D holds solved/total
        await gateway.formatRange(
          SHEET_NAMES.analytics,
          { startRow: 1, endRow: rows.length + 1, startColumn: 3, endColumn: 4 },
          'percent',
        );
      }
      logger.info(`Updated Analytics sheet with ${rows.length} topics`);
      return true;
    } catch (error) {
      logger.error('Failed to update Analytics sheet:', error);
      return false;
    }
  };

  const updateProgressSheet = async (progressData: readonly DailyProgressEntry[]): Promise<boolean> => {
    try {
      const updatedAt = formatTimestamp(now(), timezone);
      const rows: CellValue[][] = progressData.map((entry) => [
        entry.date,
        entry.dailyCount,
        entry.weeklyCount,
        entry.monthlyCount,
        entry.streak,
        entry.totalSolved,
        updatedAt,
      ]);

      await replaceRows(SHEET_NAMES.progress, rows);
      logger.info(`Updated Progress sheet with ${rows.length} progress entries`);
      return true;
    } catch (error) {
      logger.error('Failed to update Progress sheet:', error);
      return false;
    }
  };

  const updateSummarySheet = async (report: AnalyticsReport): Promise<boolean> => {
    try {
      const { summaryStats, patterns, difficultyProgression } = report;
      const { difficultyRatio } = difficultyProgression;
      const rows: CellValue[][] = [
        ['Total Problems', summaryStats.totalProblems],
        ['Total Solved', summaryStats.totalSolved],
        ['Current Streak', summaryStats.currentStreak],
        ['Longest Streak', summaryStats.longestStreak],
        ['Most Productive Day', patterns.mostProductiveDay],
        ['Complexity Trend', difficultyProgression.complexityTrend],
        ['Easy Share', difficultyRatio.easy],
        ['Medium Share', difficultyRatio.medium],
        ['Hard Share', difficultyRatio.hard],
        ['Last Updated', summaryStats.lastUpdated],
      ];

      await replaceRows(SHEET_NAMES.summary, rows);
      logger.info('Updated Summary sheet');
      return true;
    } catch (error) {
      logger.error('Failed to update Summary sheet:', error);
      return false;
    }
  };

  const getExistingProblems = async (): Promise<RawProblem[] | null> => {
    try {
      const titles = await gateway.listSheetTitles();
      if (!titles.includes(SHEET_NAMES.problems)) return [];

      const [header = [], ...rows] = await gateway.readRows(SHEET_NAMES.problems);
      const columns = header.map(cellText);
      const read = (row: CellValue[], name: string): string => {
        const index = columns.indexOf(name);
        return index === -1 ? '' : cellText(row[index]);
      };

      const problems: RawProblem[] = [];
      for (const row of rows) {
        const title = read(row, 'Problem Name');
        if (!title) continue;

        const topics = read(row, 'Topics');
        problems.push({
          title,
          difficulty: read(row, 'Difficulty'),
          topics: topics ? topics.split(', ') : [],
          dateSolved: read(row, 'Date Solved'),
          attempts: Number.parseInt(read(row, 'Attempts'), 10) || 1,
          status: read(row, 'Status'),
          problemId: read(row, 'Problem ID'),
          lastUpdated: read(row, 'Last Updated'),
        });
      }
      return problems;
    } catch (error) {
      logger.error('Failed to get existing problems:', error);
      return null;
    }
  };

  const testConnection = async (): Promise<boolean> => {
    try {
      const title = await gateway.getTitle();
      logger.info(`Successfully connected to spreadsheet: ${title}`);
      return true;
    } catch (error) {
      logger.error('Connection test failed:', error);
      return false;
    }
  };

  return {
    ensureSheetsExist,
    updateProblemsSheet,
    updateAnalyticsSheet,
    updateProgressSheet,
    updateSummarySheet,
    getExistingProblems,
    testConnection,
  };
};
