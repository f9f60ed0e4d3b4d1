/**
 * Cross-scoring of a candidate pool against the query
 */
export interface RerankProvider {
  getName(): string;
  isAvailable(): Promise<boolean>;
  /**
   * Relevance of each text to the query in [0, 1], one score per text in input order
   */
  rerank(query: string, texts: string[]): Promise<number[]>;
}
