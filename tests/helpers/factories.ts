import type { AppConfig } from '@/config';
import type { ProblemRecord, RawProblem } from '@/types';

let idCounter = 0;

export function createFakeProblem(overrides?: Partial<ProblemRecord>): ProblemRecord {
  const n = ++idCounter;
  return {
    title: `Problem ${n}`,
    problemId: String(n),
    titleSlug: `problem-${n}`,
    difficulty: 'Easy',
    topics: ['Array'],
    companies: [],
    dateSolved: '2024-01-01',
    language: 'typescript',
    runtime: 52,
    memory: 17.4,
    submissionId: `sub-${n}`,
    isPaidOnly: false,
    category: 'Algorithms',
    acceptanceRate: 50,
    attempts: 1,
    status: 'Solved',
    ...overrides,
  };
}

export function createRawProblem(overrides?: RawProblem): RawProblem {
  const n = ++idCounter;
  return {
    title: `Raw Problem ${n}`,
    problemId: String(n),
    difficulty: 'Medium',
    topics: ['Hash Table'],
    dateSolved: '2024-02-01',
    attempts: 1,
    status: 'Solved',
    ...overrides,
  };
}

export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    leetcode: { username: 'test-user', maxWorkers: 2 },
    googleSheets: { spreadsheetId: 'test-sheet-id', credentialsJson: '{}' },
    sync: {
      interval: 'daily',
      maxRetries: 1,
      timeout: 5,
      timezone: 'UTC',
      stateFile: './.sync-state.json',
    },
    backup: { enabled: false, path: './backups', retentionDays: 30 },
    logging: { level: 'INFO' },
    topicMapping: {},
    ...overrides,
  };
}
