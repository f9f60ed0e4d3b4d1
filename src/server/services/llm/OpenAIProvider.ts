import OpenAI from 'openai';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from './LLMProvider.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';
import { ExternalServiceError, ServiceConfigurationError, isAppError } from '../../types/errors.js';
import { getEnv } from '../../config/env.js';

const logger = createChildLogger({ component: 'OpenAIProvider' });

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toChatMessage({ role, content }: LLMMessage): ChatMessage {
  switch (role) {
    case 'system':
      return { role: 'system', content };
    case 'user':
      return { role: 'user', content };
    case 'assistant':
      return { role: 'assistant', content };
  }
}

export interface OpenAIProviderConfig {
  apiKey?: string;
  model: string;
  /** Per-request timeout handed to the SDK */
  requestTimeoutMs: number;
  maxRetries: number;
}

/**
 * LLMProvider backed by the OpenAI chat completions API.
 * The SDK client is built on first use, so an unconfigured provider can still be constructed.
 */
export class OpenAIProvider implements LLMProvider {
  private readonly config: OpenAIProviderConfig;
  private client: OpenAI | null = null;

  constructor(config: Partial<OpenAIProviderConfig> = {}) {
    const env = getEnv();
    this.config = {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      requestTimeoutMs: 60000,
      maxRetries: 2,
      ...config,
    };
  }

  getName(): string {
    return 'openai';
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError('OpenAI', ['OPENAI_API_KEY']);
      }
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.requestTimeoutMs,
        maxRetries: this.config.maxRetries,
      });
    }
    return this.client;
  }

  async generate(messages: LLMMessage[], options: LLMGenerateOptions = {}): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options.model ?? this.config.model;

    try {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map(toChatMessage),
        temperature: options.temperature ?? 0,
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
        ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty completion', { model });
      }

      const usage = response.usage;
      return {
        content,
        model: response.model,
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens,
              completionTokens: usage.completion_tokens,
              totalTokens: usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      logger.warn({ model, error: errorMessage(error) }, 'Chat completion failed');
      throw new ExternalServiceError('OpenAI', errorMessage(error), { model });
    }
  }
}
