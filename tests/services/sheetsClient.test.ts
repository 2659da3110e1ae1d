import { beforeEach, describe, it, expect } from 'vitest';
import { generateAnalytics } from '@/analytics/analytics';
import { columnLetter, createSheetsClient, SHEET_HEADERS, SheetsClient } from '@/services/sheetsClient';
import { createFakeProblem } from '../helpers/factories';
import { createInMemorySpreadsheet, InMemorySpreadsheet } from '../helpers/inMemorySpreadsheet';

const NOW = new Date('2024-01-03T10:15:00Z');
const STAMP = '2024-01-03 10:15:00';

let spreadsheet: InMemorySpreadsheet;
let sheets: SheetsClient;

beforeEach(() => {
  spreadsheet = createInMemorySpreadsheet('Test Tracker');
  sheets = createSheetsClient(spreadsheet, { timezone: 'UTC', now: () => NOW });
});

describe('columnLetter', () => {
  it('converts 1-based indexes to A1 letters', () => {
    expect(columnLetter(1)).toBe('A');
    expect(columnLetter(8)).toBe('H');
    expect(columnLetter(26)).toBe('Z');
    expect(columnLetter(27)).toBe('AA');
  });
});

describe('ensureSheetsExist', () => {
  it('creates missing worksheets with formatted headers', async () => {
    expect(await sheets.ensureSheetsExist()).toBe(true);

    expect([...spreadsheet.sheets.keys()]).toEqual(['Problems', 'Analytics', 'Progress', 'Summary']);
    expect(spreadsheet.sheets.get('Progress')).toEqual([SHEET_HEADERS.Progress]);
    expect(spreadsheet.sizes.get('Summary')).toEqual({ rows: 1000, columns: 20 });
    expect(spreadsheet.formats[0]).toEqual({
      title: 'Problems',
      range: { startRow: 0, endRow: 1, startColumn: 0, endColumn: 8 },
      format: 'header',
    });
  });

  it('leaves existing worksheets alone', async () => {
    spreadsheet.sheets.set('Problems', [['kept']]);

    await sheets.ensureSheetsExist();

    expect(spreadsheet.sheets.get('Problems')).toEqual([['kept']]);
    expect(spreadsheet.formats.map((call) => call.title)).toEqual(['Analytics', 'Progress', 'Summary']);
  });

  it('returns false when the spreadsheet cannot be listed', async () => {
    spreadsheet.failOn.add('listSheetTitles');
    expect(await sheets.ensureSheetsExist()).toBe(false);
  });
});

describe('updateProblemsSheet', () => {
  beforeEach(async () => {
    await sheets.ensureSheetsExist();
  });

  it('replaces the sheet contents with one row per problem', async () => {
    spreadsheet.sheets.get('Problems')?.push(['stale row']);
    const problems = [
      createFakeProblem({ title: 'Two Sum', problemId: '1', difficulty: 'Easy', topics: ['Array', 'Hash Table'] }),
      createFakeProblem({ title: 'LRU Cache', problemId: '146', difficulty: 'Medium', topics: [], attempts: 3 }),
    ];

    expect(await sheets.updateProblemsSheet(problems)).toBe(true);

    expect(spreadsheet.sheets.get('Problems')).toEqual([
      SHEET_HEADERS.Problems,
      ['Two Sum', 'Easy', 'Array, Hash Table', '2024-01-01', 1, 'Solved', '1', STAMP],
      ['LRU Cache', 'Medium', '', '2024-01-01', 3, 'Solved', '146', STAMP],
    ]);
  });

  it('returns false when the write fails', async () => {
    spreadsheet.failOn.add('writeRows');

    expect(await sheets.updateProblemsSheet([createFakeProblem()])).toBe(false);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Failed to update Problems sheet:'),
      expect.any(Error),
    );
  });
});

describe('updateAnalyticsSheet', () => {
  it('writes a percentage column formatted as percent', async () => {
    await sheets.ensureSheetsExist();

    const ok = await sheets.updateAnalyticsSheet({
      Array: { total: 4, solved: 3, easy: 2, medium: 1, hard: 1, lastSolved: '2024-01-02' },
      Graph: { total: 0, solved: 0, easy: 0, medium: 0, hard: 0, lastSolved: '' },
    });

    expect(ok).toBe(true);
    expect(spreadsheet.sheets.get('Analytics')).toEqual([
      SHEET_HEADERS.Analytics,
      ['Array', 4, 3, 0.75, '2024-01-02', 2, 1, 1],
      ['Graph', 0, 0, 0, '', 0, 0, 0],
    ]);
    expect(spreadsheet.formats.at(-1)).toEqual({
      title: 'Analytics',
      range: { startRow: 1, endRow: 3, startColumn: 3, endColumn: 4 },
      format: 'percent',
    });
  });

  it('fails when the worksheet is missing', async () => {
    expect(await sheets.updateAnalyticsSheet({})).toBe(false);
  });
});

describe('updateProgressSheet and updateSummarySheet', () => {
  it('write the progress rows and summary metrics', async () => {
    await sheets.ensureSheetsExist();
    const report = generateAnalytics(
      [
        createFakeProblem({ difficulty: 'Easy', dateSolved: '2024-01-02' }),
        createFakeProblem({ difficulty: 'Hard', dateSolved: '2024-01-03' }),
      ],
      { now: NOW, timezone: 'UTC' },
    );

    expect(await sheets.updateProgressSheet(report.progressData)).toBe(true);
    expect(await sheets.updateSummarySheet(report)).toBe(true);

    expect(spreadsheet.sheets.get('Progress')).toEqual([
      SHEET_HEADERS.Progress,
      ['2024-01-02', 1, 2, 2, 1, 1, STAMP],
      ['2024-01-03', 1, 2, 2, 2, 2, STAMP],
    ]);
    expect(spreadsheet.sheets.get('Summary')).toEqual([
      SHEET_HEADERS.Summary,
      ['Total Problems', 2],
      ['Total Solved', 2],
      ['Current Streak', 2],
      ['Longest Streak', 2],
      ['Most Productive Day', 'Tuesday'],
      ['Complexity Trend', 'Insufficient data'],
      ['Easy Share', 0.5],
      ['Medium Share', 0],
      ['Hard Share', 0.5],
      ['Last Updated', STAMP],
    ]);
  });
});

describe('getExistingProblems', () => {
  it('reads rows back by header name', async () => {
    await sheets.ensureSheetsExist();
    await sheets.updateProblemsSheet([
      createFakeProblem({ title: 'Two Sum', problemId: '1', topics: ['Array', 'Hash Table'], attempts: 2 }),
    ]);
    spreadsheet.sheets.get('Problems')?.push(['', 'Easy']);

    expect(await sheets.getExistingProblems()).toEqual([
      {
        title: 'Two Sum',
        difficulty: 'Easy',
        topics: ['Array', 'Hash Table'],
        dateSolved: '2024-01-01',
        attempts: 2,
        status: 'Solved',
        problemId: '1',
        lastUpdated: STAMP,
      },
    ]);
  });

  it('returns an empty list before the worksheet exists', async () => {
    expect(await sheets.getExistingProblems()).toEqual([]);
  });

  it('returns null when an existing worksheet cannot be read', async () => {
    await sheets.ensureSheetsExist();
    spreadsheet.failOn.add('readRows');

    expect(await sheets.getExistingProblems()).toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Failed to get existing problems:'),
      expect.any(Error),
    );
  });
});

describe('testConnection', () => {
  it('reports whether the spreadsheet answers', async () => {
    expect(await sheets.testConnection()).toBe(true);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Successfully connected to spreadsheet: Test Tracker'),
    );

    spreadsheet.failOn.add('getTitle');
    expect(await sheets.testConnection()).toBe(false);
  });
});
