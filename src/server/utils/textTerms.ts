/**
 * Term extraction shared by keyword scoring and query filtering
 */

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can', 'her', 'was', 'one',
  'our', 'out', 'has', 'have', 'had', 'his', 'how', 'its', 'who', 'did', 'get', 'may', 'him',
  'what', 'when', 'where', 'which', 'with', 'this', 'that', 'from', 'they', 'will', 'would',
  'there', 'their', 'about', 'into', 'than', 'then', 'them', 'these', 'those', 'does', 'should',
  'could', 'your', 'also', 'some', 'such', 'been', 'being', 'were', 'more', 'most', 'need',
]);

/**
 * Lower-cased word tokens (letters and digits), in order of appearance
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Distinct content terms: tokens of length >= 3 that are not stop words
 */
export function extractTerms(text: string): Set<string> {
  const terms = new Set<string>();
  for (const token of tokenize(text)) {
    if (token.length >= 3 && !STOP_WORDS.has(token)) {
      terms.add(token);
    }
  }
  return terms;
}

/**
 * Whole-word (or whole-phrase) containment test, case-insensitive
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const normalizedPhrase = phrase.trim().toLowerCase();
  if (!normalizedPhrase) {
    return false;
  }
  const escaped = normalizedPhrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, 'iu').test(text);
}
