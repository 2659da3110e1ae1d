import { z } from 'zod';
import {
  AcceptedSubmission,
  ProblemDetails,
  RawProblem,
  UserStatistics,
} from '../types';
import { mapWithConcurrency, sleep } from '../utils/concurrency';
import { DEFAULT_TIMEZONE, epochSecondsToDateKey } from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { parseNumericValue } from '../utils/numberUtils';

const logger = createLogger('leetcode');

export const LEETCODE_BASE_URL = 'https://leetcode.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_SUBMISSION_LIMIT = 2000;

export class LeetCodeApiError extends Error {
  constructor(
    public status: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = 'LeetCodeApiError';
  }
}

export interface LeetCodeClientOptions {
  username: string;
  // Only used when both are present (private profiles)
  sessionId?: string;
  csrfToken?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  // Backoff base: attempt n waits retryDelayMs * 2^(n-1)
  retryDelayMs?: number;
  maxWorkers?: number;
  requestDelayMs?: number;
  timezone?: string;
}

export interface LeetCodeClient {
  readonly username: string;
  graphql: <S extends z.ZodTypeAny>(
    query: string,
    variables: Record<string, unknown>,
    schema: S,
  ) => Promise<z.infer<S> | null>;
  getUserStatistics: () => Promise<UserStatistics | null>;
  getUserSubmissions: (limit?: number) => Promise<AcceptedSubmission[]>;
  getProblemDetails: (slug: string) => Promise<ProblemDetails | null>;
  getAllSolvedProblems: () => Promise<RawProblem[]>;
  testConnection: () => Promise<boolean>;
}

// ── GraphQL documents ──

const USER_STATS_QUERY = `
query userStats($username: String!) {
  matchedUser(username: $username) {
    username
    profile { realName countryName starRating ranking reputation }
    submitStats {
      acSubmissionNum { difficulty count submissions }
      totalSubmissionNum { difficulty count submissions }
    }
    badges { id displayName icon category }
  }
  userContestRanking(username: $username) { attendedContestsCount rating globalRanking }
}`;

const RECENT_SUBMISSIONS_QUERY = `
query recentSubmissions($username: String!, $limit: Int!) {
  recentSubmissionList(username: $username, limit: $limit) {
    title titleSlug timestamp statusDisplay lang runtime memory
  }
}`;

const PROBLEM_DETAILS_QUERY = `
query problemDetails($titleSlug: String!) {
  question(titleSlug: $titleSlug) {
    questionId title titleSlug difficulty
    topicTags { name slug }
    companyTagStats stats isPaidOnly categoryTitle
  }
}`;

// ── Response schemas ──

const GraphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.unknown()).nullish(),
});

const SubmissionCountSchema = z.object({
  difficulty: z.string().nullish(),
  count: z.number().nullish(),
  submissions: z.number().nullish(),
});

const UserStatsSchema = z.object({
  matchedUser: z
    .object({
      username: z.string().nullish(),
      profile: z
        .object({
          realName: z.string().nullish(),
          countryName: z.string().nullish(),
          starRating: z.number().nullish(),
          ranking: z.number().nullish(),
          reputation: z.number().nullish(),
        })
        .nullish(),
      submitStats: z
        .object({
          acSubmissionNum: z.array(SubmissionCountSchema).nullish(),
          totalSubmissionNum: z.array(SubmissionCountSchema).nullish(),
        })
        .nullish(),
      badges: z
        .array(
          z.object({
            displayName: z.string().nullish(),
            category: z.string().nullish(),
            icon: z.string().nullish(),
          }),
        )
        .nullish(),
    })
    .nullish(),
  userContestRanking: z
    .object({
      attendedContestsCount: z.number().nullish(),
      rating: z.number().nullish(),
      globalRanking: z.number().nullish(),
    })
    .nullish(),
});

const SubmissionListSchema = z.object({
  recentSubmissionList: z
    .array(
      z.object({
        title: z.string().nullish(),
        titleSlug: z.string().nullish(),
        timestamp: z.union([z.string(), z.number()]).nullish(),
        statusDisplay: z.string().nullish(),
        lang: z.string().nullish(),
        runtime: z.string().nullish(),
        memory: z.string().nullish(),
      }),
    )
    .nullish(),
});

const QuestionSchema = z.object({
  question: z
    .object({
      questionId: z.union([z.string(), z.number()]).nullish(),
      title: z.string().nullish(),
      titleSlug: z.string().nullish(),
      difficulty: z.string().nullish(),
      topicTags: z.array(z.object({ name: z.string().nullish() })).nullish(),
      companyTagStats: z.unknown(),
      stats: z.unknown(),
      isPaidOnly: z.boolean().nullish(),
      categoryTitle: z.string().nullish(),
    })
    .nullish(),
});

const CompanyTagSchema = z.object({
  tagName: z.string().nullish(),
  name: z.string().nullish(),
});

const QuestionStatsSchema = z.object({
  acRate: z.union([z.string(), z.number()]).nullish(),
  totalAcceptedRaw: z.number().nullish(),
  totalSubmissionRaw: z.number().nullish(),
  totalAccepted: z.union([z.string(), z.number()]).nullish(),
  totalSubmission: z.union([z.string(), z.number()]).nullish(),
});

// LeetCode returns some fields as JSON-encoded strings and others as objects
const safeJsonLoad = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    logger.debug('Value is a string but not valid JSON');
    return null;
  }
};

const companyNames = (raw: unknown): string[] => {
  const parsed = safeJsonLoad(raw);
  const toName = (entry: unknown): string => {
    const result = CompanyTagSchema.safeParse(entry);
    return result.success ? result.data.tagName ?? result.data.name ?? '' : '';
  };

  if (Array.isArray(parsed)) return parsed.map(toName).filter(Boolean);
  if (parsed && typeof parsed === 'object') {
    const groups = Object.values(parsed);
    // { stats: [...] } or { "1": [...], "2": [...] }
    return groups.flatMap((group) => (Array.isArray(group) ? group.map(toName) : [])).filter(Boolean);
  }
  return [];
};

const countsByDifficulty = (
  entries: z.infer<typeof SubmissionCountSchema>[] | null | undefined,
  field: 'count' | 'submissions',
): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const entry of entries ?? []) {
    counts[(entry.difficulty ?? '').toLowerCase()] = entry[field] ?? 0;
  }
  return counts;
};

export const createLeetCodeClient = (options: LeetCodeClientOptions): LeetCodeClient => {
  const {
    username,
    baseUrl = LEETCODE_BASE_URL,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxRetries = 3,
    retryDelayMs = 1000,
    maxWorkers = 5,
    requestDelayMs = 50,
    timezone = DEFAULT_TIMEZONE,
  } = options;

  const endpoint = `${baseUrl}/graphql`;
  const headers: Record<string, string> = {
    'User-Agent': 'Mozilla/5.0 (compatible; LeetCodeSheetsTracker/1.0)',
    Accept: 'application/json, text/plain, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'gzip, deflate',
    'Content-Type': 'application/json',
    Referer: `${baseUrl}/`,
  };
  if (options.sessionId && options.csrfToken) {
    headers.Cookie = `LEETCODE_SESSION=${options.sessionId}; csrftoken=${options.csrfToken}`;
    headers['X-CSRFToken'] = options.csrfToken;
  }

  const requestOnce = async (url: string, init: RequestInit): Promise<Response> => {
    const ctrl = new AbortController();
    const timer = setTimeout(() => ctrl.abort(), timeoutMs);
    try {
      return await fetch(url, { ...init, signal: ctrl.signal });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new LeetCodeApiError(0, 'TIMEOUT', `Request to ${url} timed out after ${timeoutMs}ms`);
      }
      throw new LeetCodeApiError(0, 'NETWORK_ERROR', err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timer);
    }
  };

  const post = async (payload: Record<string, unknown>): Promise<Response | null> => {
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        logger.debug(`Sending request to ${endpoint}`, payload);
        const response = await requestOnce(endpoint, {
          method: 'POST',
          headers,
          body: JSON.stringify(payload),
        });
        logger.debug(`Response status: ${response.status}`);

        if (response.status === 200) return response;

        logger.warn(`GraphQL POST returned status ${response.status} (attempt ${attempt})`);
        try {
          const body = GraphQLEnvelopeSchema.safeParse(await response.json());
          if (body.success && body.data.errors) {
            logger.error('GraphQL errors:', body.data.errors);
          }
        } catch {
          logger.debug('Could not parse error response as JSON');
        }
      } catch (err) {
        const detail = err instanceof LeetCodeApiError ? `${err.code}: ${err.message}` : String(err);
        logger.warn(`Request exception on attempt ${attempt}: ${detail}`);
      }

      if (attempt < maxRetries) {
        await sleep(retryDelayMs * 2 ** (attempt - 1));
      }
    }

    logger.error(`Failed to POST after ${maxRetries} attempts`);
    return null;
  };

  const graphql = async <S extends z.ZodTypeAny>(
    query: string,
    variables: Record<string, unknown>,
    schema: S,
  ): Promise<z.infer<S> | null> => {
    const response = await post({ query, variables });
    if (!response) return null;

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      logger.warn('Non-JSON response received from GraphQL endpoint');
      return null;
    }

    const envelope = GraphQLEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      logger.warn('Unexpected response format from GraphQL');
      return null;
    }
    if (envelope.data.errors) {
      logger.error('GraphQL errors:', envelope.data.errors);
      return null;
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      logger.warn(`GraphQL data did not match the expected shape: ${parsed.error.message}`);
      return null;
    }
    return parsed.data;
  };

  const getUserStatistics = async (): Promise<UserStatistics | null> => {
    const data = await graphql(USER_STATS_QUERY, { username }, UserStatsSchema);
    if (!data) return null;

    const user = data.matchedUser;
    const profile = user?.profile;
    const contest = data.userContestRanking;

    const solved = countsByDifficulty(user?.submitStats?.acSubmissionNum, 'count');
    const submissions = countsByDifficulty(user?.submitStats?.acSubmissionNum, 'submissions');

    const easySolved = solved.easy ?? 0;
    const mediumSolved = solved.medium ?? 0;
    const hardSolved = solved.hard ?? 0;
    const totalSolved = easySolved + mediumSolved + hardSolved;
    const totalSubmissions = (submissions.easy ?? 0) + (submissions.medium ?? 0) + (submissions.hard ?? 0);

    return {
      username: user?.username ?? '',
      realName: profile?.realName ?? '',
      country: profile?.countryName ?? '',
      starRating: profile?.starRating ?? 0,
      ranking: profile?.ranking ?? 0,
      reputation: profile?.reputation ?? 0,
      totalSolved,
      totalSubmissions,
      acceptanceRate: totalSubmissions > 0 ? (totalSolved / totalSubmissions) * 100 : 0,
      easySolved,
      mediumSolved,
      hardSolved,
      contestRating: contest?.rating ?? 0,
      contestRank: contest?.globalRanking ?? 0,
      contestsAttended: contest?.attendedContestsCount ?? 0,
      badges: (user?.badges ?? []).map((badge) => ({
        name: badge.displayName ?? '',
        category: badge.category ?? '',
        icon: badge.icon ?? '',
      })),
    };
  };

  const getUserSubmissions = async (limit = DEFAULT_SUBMISSION_LIMIT): Promise<AcceptedSubmission[]> => {
    const data = await graphql(RECENT_SUBMISSIONS_QUERY, { username, limit }, SubmissionListSchema);
    if (!data) return [];

    const accepted = (data.recentSubmissionList ?? [])
      .filter((submission) => submission.statusDisplay === 'Accepted')
      .map((submission) => ({
        title: submission.title ?? '',
        titleSlug: submission.titleSlug ?? '',
        timestamp: submission.timestamp === null || submission.timestamp === undefined ? '' : String(submission.timestamp),
        status: submission.statusDisplay ?? '',
        language: submission.lang ?? '',
        runtime: submission.runtime ?? '',
        memory: submission.memory ?? '',
        // The public API no longer exposes submission ids
        submissionId: '',
        dateSolved: epochSecondsToDateKey(submission.timestamp, timezone),
      }));

    logger.info(`Fetched ${accepted.length} accepted submissions for ${username}`);
    return accepted;
  };

  const getProblemDetails = async (slug: string): Promise<ProblemDetails | null> => {
    const data = await graphql(PROBLEM_DETAILS_QUERY, { titleSlug: slug }, QuestionSchema);
    const question = data?.question;
    if (!question) return null;

    const stats = QuestionStatsSchema.safeParse(safeJsonLoad(question.stats));
    const questionStats: z.infer<typeof QuestionStatsSchema> = stats.success ? stats.data : {};

    return {
      problemId: question.questionId === null || question.questionId === undefined ? '' : String(question.questionId),
      title: question.title ?? '',
      titleSlug: question.titleSlug ?? slug,
      difficulty: question.difficulty ?? '',
      topics: (question.topicTags ?? []).map((tag) => tag.name ?? '').filter(Boolean),
      companies: companyNames(question.companyTagStats),
      isPaidOnly: question.isPaidOnly ?? false,
      category: question.categoryTitle ?? '',
      acceptanceRate: parseNumericValue(questionStats.acRate),
      totalAccepted: questionStats.totalAcceptedRaw ?? parseNumericValue(questionStats.totalAccepted),
      totalSubmissions: questionStats.totalSubmissionRaw ?? parseNumericValue(questionStats.totalSubmission),
    };
  };

  const getAllSolvedProblems = async (): Promise<RawProblem[]> => {
    const submissions = await getUserSubmissions(DEFAULT_SUBMISSION_LIMIT);
    if (!submissions.length) return [];

    // One entry per problem; the first (most recent) accepted submission wins
    const unique = new Map<string, AcceptedSubmission>();
    for (const submission of submissions) {
      if (submission.titleSlug && !unique.has(submission.titleSlug)) {
        unique.set(submission.titleSlug, submission);
      }
    }

    const slugs = [...unique.keys()];
    const settled = await mapWithConcurrency(slugs, maxWorkers, getProblemDetails, {
      delayMs: requestDelayMs,
    });

    const results: RawProblem[] = [];
    settled.forEach((outcome, index) => {
      const slug = slugs[index];
      if (outcome.status === 'rejected') {
        logger.error(`Failed to fetch details for ${slug}:`, outcome.reason);
        return;
      }
      const details = outcome.value;
      if (!details) return;

      const submission = unique.get(slug);
      results.push({
        title: details.title || submission?.title || '',
        problemId: details.problemId,
        titleSlug: slug,
        difficulty: details.difficulty,
        topics: details.topics,
        companies: details.companies,
        dateSolved: submission?.dateSolved ?? '',
        language: submission?.language ?? '',
        runtime: parseNumericValue(submission?.runtime),
        memory: parseNumericValue(submission?.memory),
        submissionId: submission?.submissionId ?? '',
        isPaidOnly: details.isPaidOnly,
        category: details.category,
        acceptanceRate: details.acceptanceRate,
        attempts: 1,
        status: 'Solved',
      });
    });

    logger.info(`Fetched details for ${results.length} solved problems`);
    return results;
  };

  const testBasicConnection = async (): Promise<boolean> => {
    try {
      const response = await requestOnce(`${baseUrl}/${username}/`, { method: 'GET', headers });
      logger.debug(`Basic connection status: ${response.status}`);
      return response.status === 200;
    } catch (err) {
      logger.warn(`Basic connection failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  };

  const testConnection = async (): Promise<boolean> => {
    logger.info(`Testing LeetCode connection for user: ${username}`);
    const stats = await getUserStatistics();
    if (stats?.username) {
      logger.info(`GraphQL connection ok for ${stats.username}`);
      return true;
    }

    logger.warn('GraphQL stats failed; attempting basic connectivity check');
    const basic = await testBasicConnection();
    if (basic) {
      logger.info('Basic connectivity succeeded, but GraphQL failed; check rate limiting or headers');
    } else {
      logger.error('Both GraphQL and basic checks failed');
    }
    return basic;
  };

  return {
    username,
    graphql,
    getUserStatistics,
    getUserSubmissions,
    getProblemDetails,
    getAllSolvedProblems,
    testConnection,
  };
};
