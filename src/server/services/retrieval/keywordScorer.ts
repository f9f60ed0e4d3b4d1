/**
 * Share of query terms present in the candidate, in [0, 1]
 */
export function keywordOverlap(queryTerms: Set<string>, candidateTerms: Set<string>): number {
  if (queryTerms.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const term of queryTerms) {
    if (candidateTerms.has(term)) shared++;
  }
  return shared / queryTerms.size;
}

/**
 * Cosine similarity clamped to [0, 1]; 0 for empty or mismatched vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, similarity));
}
