export type Difficulty = 'Easy' | 'Medium' | 'Hard' | 'Unknown';

export type DifficultyKey = 'easy' | 'medium' | 'hard';

export interface DifficultyCounts {
    easy: number;
    medium: number;
    hard: number;
}

export interface ProblemRecord {
    title: string;
    problemId: string;
    titleSlug: string;
    difficulty: Difficulty;
    topics: string[];
    companies: string[];
    dateSolved: string; // "YYYY-MM-DD" or ""
    language: string;
    runtime: number;
    memory: number;
    submissionId: string;
    isPaidOnly: boolean;
    category: string;
    acceptanceRate: number;
    attempts: number;
    status: string;
}

// Loosely-typed input: anything fetched, read back from a sheet or restored from a backup.
export type RawProblem = Record<string, unknown>;

export type TopicMapping = ReadonlyMap<string, string>;

export interface TopicStat extends DifficultyCounts {
    total: number;
    solved: number;
    lastSolved: string;
}

export type TopicAnalytics = Record<string, TopicStat>;

export interface DailyProgressEntry {
    date: string;
    dailyCount: number;
    weeklyCount: number;
    monthlyCount: number;
    streak: number;
    totalSolved: number;
}

export interface StreakResult {
    currentStreak: number;
    longestStreak: number;
    streakByDate: Map<string, number>;
}

export interface DifficultyTrendPoint {
    date: string;
    difficulty: string;
}

export interface SolvingPatterns {
    mostProductiveDay: string;
    dayDistribution: Record<string, number>;
    difficultyTrends: DifficultyTrendPoint[];
}

export type ComplexityTrend =
    | 'Insufficient data'
    | 'Improving - solving harder problems'
    | 'Focusing on easier problems'
    | 'Consistent difficulty level';

export interface DifficultyProgression {
    monthlyBreakdown: Record<string, DifficultyCounts>;
    difficultyRatio: DifficultyCounts;
    complexityTrend: ComplexityTrend;
}

export interface ProgressMetrics {
    totalProblems: number;
    totalSolved: number;
    currentStreak: number;
    longestStreak: number;
    dailyProgress: DailyProgressEntry[];
    patterns: SolvingPatterns;
    difficultyProgression: DifficultyProgression;
    lastUpdated: string;
}

export interface SummaryStats {
    totalProblems: number;
    totalSolved: number;
    currentStreak: number;
    longestStreak: number;
    lastUpdated: string;
}

export interface AnalyticsReport {
    topicAnalytics: TopicAnalytics;
    progressData: DailyProgressEntry[];
    summaryStats: SummaryStats;
    patterns: SolvingPatterns;
    difficultyProgression: DifficultyProgression;
}

export interface AnalyticsOptions {
    topicMapping?: TopicMapping;
    now?: Date;
    timezone?: string;
}

export interface SyncStats {
    totalProblems: number;
    newProblems: number;
    updatedProblems: number;
    errors: number;
    lastSync: string | null; // "yyyy-MM-dd HH:mm:ss"
}

export interface SyncState {
    lastSyncTime: string | null; // ISO timestamp
    stats: SyncStats;
}

export interface ConnectionResults {
    leetcode: boolean;
    googleSheets: boolean;
}

export interface SyncStatus {
    lastSyncTime: string | null;
    syncStats: SyncStats;
    connections: ConnectionResults;
    configLoaded: boolean;
}

export interface BackupFile {
    backupTimestamp: string;
    syncStats: SyncStats;
    problemsCount: number;
    problemsData: RawProblem[];
}

export interface UserStatistics {
    username: string;
    realName: string;
    country: string;
    starRating: number;
    ranking: number;
    reputation: number;
    totalSolved: number;
    totalSubmissions: number;
    acceptanceRate: number;
    easySolved: number;
    mediumSolved: number;
    hardSolved: number;
    contestRating: number;
    contestRank: number;
    contestsAttended: number;
    badges: { name: string; category: string; icon: string }[];
}

export interface AcceptedSubmission {
    title: string;
    titleSlug: string;
    timestamp: string;
    status: string;
    language: string;
    runtime: string;
    memory: string;
    submissionId: string;
    dateSolved: string;
}

export interface ProblemDetails {
    problemId: string;
    title: string;
    titleSlug: string;
    difficulty: string;
    topics: string[];
    companies: string[];
    isPaidOnly: boolean;
    category: string;
    acceptanceRate: number;
    totalAccepted: number;
    totalSubmissions: number;
}
