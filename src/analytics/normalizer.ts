import { Difficulty, ProblemRecord, RawProblem } from '../types';
import { isDateKey } from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { clamp, parseNumericValue } from '../utils/numberUtils';

const logger = createLogger('analytics.normalizer');

const DIFFICULTIES: readonly Difficulty[] = ['Easy', 'Medium', 'Hard'];

const toText = (value: unknown): string => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value).trim();
  }
  return '';
};

// Unique, trimmed, non-empty; a "A, B" string (as stored in the Problems sheet) is split on commas
const toTextList = (value: unknown): string[] => {
  const items = Array.isArray(value)
    ? value
    : typeof value === 'string'
      ? value.split(',')
      : [];

  const seen = new Set<string>();
  for (const item of items) {
    const text = toText(item);
    if (text) seen.add(text);
  }
  return [...seen];
};

export const normalizeDifficulty = (value: unknown): Difficulty => {
  const lower = toText(value).toLowerCase();
  const match = DIFFICULTIES.find((difficulty) => difficulty.toLowerCase() === lower);
  return match ?? 'Unknown';
};

const toAttempts = (value: unknown): number => {
  const parsed = typeof value === 'number' ? value : Number.parseInt(toText(value), 10);
  if (!Number.isFinite(parsed) || parsed < 1) return 1;
  return Math.floor(parsed);
};

const toFlag = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1;
  return toText(value).toLowerCase() === 'true';
};

/**
 * Coerces one loosely-typed record into a ProblemRecord.
 * Returns null when the record has no usable title.
 */
export const normalizeProblem = (problem: RawProblem): ProblemRecord | null => {
  const title = toText(problem.title);
  if (!title) return null;

  let dateSolved = toText(problem.dateSolved);
  if (dateSolved && !isDateKey(dateSolved)) {
    logger.warn(`Invalid date format for problem ${title}: ${dateSolved}`);
    dateSolved = '';
  }

  return {
    title,
    problemId: toText(problem.problemId),
    titleSlug: toText(problem.titleSlug),
    difficulty: normalizeDifficulty(problem.difficulty),
    topics: toTextList(problem.topics),
    companies: toTextList(problem.companies),
    dateSolved,
    language: toText(problem.language),
    runtime: parseNumericValue(problem.runtime),
    memory: parseNumericValue(problem.memory),
    submissionId: toText(problem.submissionId),
    isPaidOnly: toFlag(problem.isPaidOnly),
    category: toText(problem.category),
    acceptanceRate: clamp(parseNumericValue(problem.acceptanceRate), 0, 100),
    attempts: toAttempts(problem.attempts),
    status: toText(problem.status) || 'Solved',
  };
};

/**
 * Validates and cleans a batch of fetched problems. Records without a title are
 * dropped; every other malformed field is repaired, so this never throws.
 */
export const validateProblemData = (problems: readonly RawProblem[]): ProblemRecord[] => {
  const validated: ProblemRecord[] = [];

  for (const problem of problems) {
    const record = normalizeProblem(problem);
    if (!record) {
      logger.warn('Skipping problem without title', problem);
      continue;
    }
    validated.push(record);
  }

  logger.info(`Validated ${validated.length} problems`);
  return validated;
};
