export { generateAnalytics } from './analytics';
export { normalizeDifficulty, normalizeProblem, validateProblemData } from './normalizer';
export {
  analyzeDifficultyProgression,
  analyzeSolvingPatterns,
  calculateComplexityTrend,
  calculateDailyProgress,
  calculateDifficultyRatio,
  calculateProgressMetrics,
  calculateStreaks,
  sortByDateSolved,
} from './progressAnalyzer';
export type { ProgressOptions } from './progressAnalyzer';
export { categorizeByTopic } from './topicAggregator';
export { createTopicMapping, mapTopics } from './topicMapper';
