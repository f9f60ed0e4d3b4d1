/**
 * Text embedding capability used by the semantic ranking tier
 */
export interface EmbeddingProvider {
  getName(): string;
  isAvailable(): Promise<boolean>;
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order */
  embedMany(texts: string[]): Promise<number[][]>;
}
