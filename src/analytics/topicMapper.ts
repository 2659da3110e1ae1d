import { TopicMapping } from '../types';

/**
 * Builds an ordered topic mapping from a plain object, e.g. the `topicMapping`
 * section of the configuration file. Key order is kept and decides which
 * partial match wins in `mapTopics`.
 */
export const createTopicMapping = (entries: Record<string, string> = {}): TopicMapping => {
  return new Map(Object.entries(entries));
};

const findPartialMatch = (topic: string, mapping: TopicMapping): string | undefined => {
  const needle = topic.toLowerCase();
  for (const [key, value] of mapping) {
    const candidate = key.toLowerCase();
    if (candidate.includes(needle) || needle.includes(candidate)) {
      return value;
    }
  }
  return undefined;
};

/**
 * Maps LeetCode topic tags onto custom categories.
 *
 * Resolution per topic: exact key, then the first key (in mapping order) that
 * contains or is contained by the topic ignoring case, then the topic itself.
 * Duplicates in the result are collapsed.
 */
export const mapTopics = (topics: readonly string[], mapping?: TopicMapping): string[] => {
  const mapped = new Set<string>();

  for (const topic of topics) {
    if (!mapping || mapping.size === 0) {
      mapped.add(topic);
      continue;
    }
    mapped.add(mapping.get(topic) ?? findPartialMatch(topic, mapping) ?? topic);
  }

  return [...mapped];
};
