import OpenAI from 'openai';
import { z } from 'zod';
import { withRetry, ExternalServiceError } from '@vetqueue/core';
import type { ReasoningCallOptions, ReasoningService, TriagePrompt } from '@vetqueue/domain';

/**
 * Input validation schemas for OpenAI client
 */
const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1).max(100000, 'Message content too long'),
});

const ChatCompletionOptionsSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1, 'At least one message required'),
  model: z.string().optional(),
  maxTokens: z.number().int().min(1).max(128000).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

const OpenAIClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  model: z.string().optional(),
  organization: z.string().optional(),
  maxTokens: z.number().int().min(1).max(128000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  retryConfig: z
    .object({
      maxRetries: z.number().int().min(0).max(10),
      baseDelayMs: z.number().int().min(100).max(30000),
    })
    .optional(),
  timeoutMs: z.number().int().min(1000).max(300000).optional(),
});

/**
 * OpenAI Integration Client
 * Thin wrapper over the SDK used by the triage reasoning tier
 */

export interface OpenAIClientConfig {
  apiKey: string;
  model?: string | undefined;
  organization?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  retryConfig?:
    | {
        maxRetries: number;
        baseDelayMs: number;
      }
    | undefined;
  /** Request timeout in milliseconds (default: 60000ms, max: 300000ms) */
  timeoutMs?: number | undefined;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionOptions {
  messages: ChatMessage[];
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Cancels the request in flight and any retry still pending */
  signal?: AbortSignal;
}

/** Default timeout for OpenAI API requests (60 seconds) */
const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Transient failures worth another attempt: rate limits, gateway errors, timeouts
 */
export function isRetryableOpenAIError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  const message = error.message.toLowerCase();
  return (
    message.includes('rate_limit') ||
    message.includes('502') ||
    message.includes('503') ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('econnreset') ||
    message.includes('socket hang up')
  );
}

export class OpenAIClient {
  private client: OpenAI;
  private config: OpenAIClientConfig;
  private timeoutMs: number;

  constructor(config: OpenAIClientConfig) {
    // Validate config at construction time
    const validatedConfig = OpenAIClientConfigSchema.parse(config);
    this.config = validatedConfig;
    this.timeoutMs = validatedConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: validatedConfig.apiKey,
      organization: validatedConfig.organization,
      timeout: this.timeoutMs,
      // Retries are owned by chatCompletion so that an abort stops all of them
      maxRetries: 0,
    });
  }

  /**
   * Create a chat completion and return the first choice's text
   */
  async chatCompletion(options: ChatCompletionOptions): Promise<string> {
    const { signal } = options;
    const validated = ChatCompletionOptionsSchema.parse(options);
    const {
      messages,
      model = this.config.model ?? DEFAULT_MODEL,
      maxTokens = this.config.maxTokens ?? 1000,
      temperature = this.config.temperature ?? 0.7,
    } = validated;

    const makeRequest = async () => {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages,
          max_tokens: maxTokens,
          temperature,
        },
        { signal }
      );

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from API');
      }

      return content;
    };

    try {
      return await withRetry(makeRequest, {
        maxRetries: this.config.retryConfig?.maxRetries ?? 3,
        baseDelayMs: this.config.retryConfig?.baseDelayMs ?? 1000,
        shouldRetry: isRetryableOpenAIError,
        signal,
      });
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ExternalServiceError('OpenAI', cause.message, cause);
    }
  }
}

/**
 * Create a configured OpenAI client
 */
export function createOpenAIClient(config: OpenAIClientConfig): OpenAIClient {
  return new OpenAIClient(config);
}

// =============================================================================
// Reasoning service adapter
// =============================================================================

/** Sampling settings for triage replies: short and near-deterministic */
export const TRIAGE_COMPLETION_SETTINGS = {
  temperature: 0.2,
  maxTokens: 200,
} as const;

type ChatCompleter = Pick<OpenAIClient, 'chatCompletion'>;

/**
 * ReasoningService backed by an OpenAI chat model
 */
export class OpenAIReasoningService implements ReasoningService {
  constructor(private readonly client: ChatCompleter) {}

  complete(prompt: TriagePrompt, options: ReasoningCallOptions = {}): Promise<string> {
    return this.client.chatCompletion({
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      temperature: TRIAGE_COMPLETION_SETTINGS.temperature,
      maxTokens: TRIAGE_COMPLETION_SETTINGS.maxTokens,
      signal: options.signal,
    });
  }
}

export function createOpenAIReasoningService(config: OpenAIClientConfig): OpenAIReasoningService {
  return new OpenAIReasoningService(createOpenAIClient(config));
}
