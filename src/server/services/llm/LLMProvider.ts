/**
 * Chat-completion seam shared by the reranker and assisted extraction.
 * Both only ever ask for a JSON object back, so the options say so directly.
 */

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMGenerateOptions {
  /** Overrides the provider's default model */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider to constrain output to a single JSON object */
  json?: boolean;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: LLMUsage;
}

export interface LLMProvider {
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;
  /** True when the provider has the credentials it needs; makes no network call */
  isAvailable(): Promise<boolean>;
  getName(): string;
}

/**
 * Pull the JSON payload out of a completion that may wrap it in a markdown code fence
 */
export function extractJsonPayload(content: string): string {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return (fenced?.[1] ?? content).trim();
}
