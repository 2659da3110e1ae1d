import { ProblemRecord, TopicAnalytics, TopicMapping, TopicStat } from '../types';
import { createLogger } from '../utils/logger';
import { mapTopics } from './topicMapper';

const logger = createLogger('analytics.topics');

const emptyTopicStat = (): TopicStat => ({
  total: 0,
  solved: 0,
  easy: 0,
  medium: 0,
  hard: 0,
  lastSolved: '',
});

/**
 * Groups problems by (mapped) topic. A problem with several topics counts once
 * for each of them, so topic totals can exceed the number of problems.
 */
export const categorizeByTopic = (
  problems: readonly ProblemRecord[],
  topicMapping?: TopicMapping,
): TopicAnalytics => {
  // Map, not an object literal: topic names like "constructor" must not hit the prototype
  const stats = new Map<string, TopicStat>();

  for (const problem of problems) {
    for (const topic of mapTopics(problem.topics, topicMapping)) {
      let stat = stats.get(topic);
      if (!stat) {
        stat = emptyTopicStat();
        stats.set(topic, stat);
      }

      stat.total += 1;
      stat.solved += 1;

      if (problem.difficulty === 'Easy') stat.easy += 1;
      else if (problem.difficulty === 'Medium') stat.medium += 1;
      else if (problem.difficulty === 'Hard') stat.hard += 1;

      // ISO dates are fixed-width, so string order is date order
      if (problem.dateSolved && problem.dateSolved > stat.lastSolved) {
        stat.lastSolved = problem.dateSolved;
      }
    }
  }

  logger.info(`Categorized ${problems.length} problems into ${stats.size} topics`);
  return Object.fromEntries(stats);
};
