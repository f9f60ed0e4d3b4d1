import type { ClassificationConfig } from '../../config/extraction/extractionConfig.js';
import { containsPhrase } from '../../utils/textTerms.js';

export interface QueryFilter {
  topic?: string;
  category?: string;
  /** True when at least one value came from the query text rather than the caller */
  detected: boolean;
}

function topicVariants(topic: string): string[] {
  const spaced = topic.replace(/[-_]+/g, ' ');
  return spaced === topic ? [topic] : [topic, spaced];
}

/**
 * Resolve the topic and category a query is about.
 *
 * Explicit values win. Otherwise a known topic named in the query is used,
 * and the category whose name or keywords the query mentions most (earlier
 * categories win ties).
 */
export function resolveQueryFilter(
  query: string,
  explicit: { topic?: string; category?: string },
  knownTopics: string[],
  classification: ClassificationConfig
): QueryFilter {
  let detected = false;

  let topic = explicit.topic;
  if (topic === undefined) {
    topic = knownTopics.find(known => topicVariants(known).some(variant => containsPhrase(query, variant)));
    if (topic !== undefined) detected = true;
  }

  let category = explicit.category;
  if (category === undefined) {
    let bestCount = 0;
    for (const candidate of classification.categories) {
      const count = [candidate.name, ...candidate.keywords].filter(phrase => containsPhrase(query, phrase)).length;
      if (count > bestCount) {
        bestCount = count;
        category = candidate.name;
      }
    }
    if (category !== undefined) detected = true;
  }

  return { topic, category, detected };
}
