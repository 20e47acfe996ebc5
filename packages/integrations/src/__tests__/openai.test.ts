import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExternalServiceError } from '@vetqueue/core';
import { buildTriagePrompt } from '@vetqueue/domain';

// Create a hoisted mock function
const mockCreate = vi.hoisted(() => vi.fn());

// Mock OpenAI with hoisted mock
vi.mock('openai', () => {
  class MockOpenAI {
    chat = {
      completions: {
        create: mockCreate,
      },
    };
  }
  return { default: MockOpenAI };
});

import {
  OpenAIClient,
  OpenAIReasoningService,
  createOpenAIClient,
  createOpenAIReasoningService,
  isRetryableOpenAIError,
  type OpenAIClientConfig,
} from '../openai.js';

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe('OpenAIClient', () => {
  const validConfig: OpenAIClientConfig = {
    apiKey: 'sk-test-api-key-12345',
    model: 'gpt-4o',
    maxTokens: 1000,
    temperature: 0.7,
    retryConfig: { maxRetries: 1, baseDelayMs: 100 },
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mockCreate.mockReset();
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: 'Test response' } }],
    });
  });

  describe('constructor', () => {
    it('should accept minimal config with only apiKey', () => {
      expect(new OpenAIClient({ apiKey: 'sk-test-key-12345' })).toBeDefined();
    });

    it('should reject an empty api key', () => {
      expect(() => new OpenAIClient({ apiKey: '' })).toThrow('API key is required');
    });

    it('should reject a timeout above the maximum', () => {
      expect(() => new OpenAIClient({ apiKey: 'sk-test-key-12345', timeoutMs: 400000 })).toThrow();
    });
  });

  describe('chatCompletion', () => {
    it('should send configured model and sampling settings', async () => {
      const client = createOpenAIClient(validConfig);

      const result = await client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }] });

      expect(result).toBe('Test response');
      expect(mockCreate).toHaveBeenCalledWith(
        {
          model: 'gpt-4o',
          messages: [{ role: 'user', content: 'Hello' }],
          max_tokens: 1000,
          temperature: 0.7,
        },
        { signal: undefined }
      );
    });

    it('should fall back to default model and settings', async () => {
      const client = new OpenAIClient({ apiKey: 'sk-test-key-12345' });

      await client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }] });

      expect(mockCreate).toHaveBeenCalledWith(
        {
          model: 'gpt-4o-mini',
          messages: [{ role: 'user', content: 'Hello' }],
          max_tokens: 1000,
          temperature: 0.7,
        },
        { signal: undefined }
      );
    });

    it('should let per-call options override the config', async () => {
      const client = createOpenAIClient(validConfig);

      await client.chatCompletion({
        messages: [{ role: 'user', content: 'Hello' }],
        model: 'gpt-4o-mini',
        maxTokens: 50,
        temperature: 0,
      });

      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'gpt-4o-mini', max_tokens: 50, temperature: 0 }),
        { signal: undefined }
      );
    });

    it('should reject an empty message list before calling the API', async () => {
      const client = createOpenAIClient(validConfig);

      await expect(client.chatCompletion({ messages: [] })).rejects.toThrow('At least one message required');
      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('should throw ExternalServiceError on empty content without retrying', async () => {
      mockCreate.mockResolvedValue({ choices: [{ message: { content: '' } }] });
      const client = createOpenAIClient(validConfig);

      const error: unknown = await client
        .chatCompletion({ messages: [{ role: 'user', content: 'Hello' }] })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).toHaveProperty('message', 'OpenAI error: Empty response from API');
      expect(mockCreate).toHaveBeenCalledTimes(1);
    });

    it('should retry once after a rate limit', async () => {
      mockCreate.mockRejectedValueOnce(httpError(429, 'Rate limit reached'));
      const client = createOpenAIClient(validConfig);

      const result = await client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }] });

      expect(result).toBe('Test response');
      expect(mockCreate).toHaveBeenCalledTimes(2);
    });

    it('should wrap a client error without retrying', async () => {
      mockCreate.mockRejectedValue(httpError(400, 'Bad request'));
      const client = createOpenAIClient(validConfig);

      const error: unknown = await client
        .chatCompletion({ messages: [{ role: 'user', content: 'Hello' }] })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).toHaveProperty('message', 'OpenAI error: Bad request');
      expect(error).toHaveProperty('service', 'OpenAI');
      expect(mockCreate).toHaveBeenCalledTimes(1);
    });

    it('should give up after the configured retries', async () => {
      mockCreate.mockRejectedValue(httpError(503, 'Service unavailable'));
      const client = createOpenAIClient(validConfig);

      await expect(
        client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }] })
      ).rejects.toThrow('OpenAI error: Service unavailable');
      expect(mockCreate).toHaveBeenCalledTimes(2);
    });

    it('should pass the abort signal to the SDK request', async () => {
      const client = createOpenAIClient(validConfig);
      const controller = new AbortController();

      await client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }], signal: controller.signal });

      expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'gpt-4o' }), {
        signal: controller.signal,
      });
    });

    it('should not retry once the caller has aborted', async () => {
      const controller = new AbortController();
      mockCreate.mockImplementation(() => {
        controller.abort();
        return Promise.reject(httpError(503, 'Service unavailable'));
      });
      const client = createOpenAIClient({ ...validConfig, retryConfig: { maxRetries: 3, baseDelayMs: 100 } });

      await expect(
        client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }], signal: controller.signal })
      ).rejects.toThrow('OpenAI error: Service unavailable');
      expect(mockCreate).toHaveBeenCalledTimes(1);
    });

    it('should not call the API with an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort(new Error('triage gave up'));
      const client = createOpenAIClient(validConfig);

      await expect(
        client.chatCompletion({ messages: [{ role: 'user', content: 'Hello' }], signal: controller.signal })
      ).rejects.toThrow('OpenAI error: triage gave up');
      expect(mockCreate).not.toHaveBeenCalled();
    });
  });
});

describe('isRetryableOpenAIError', () => {
  it.each([
    [httpError(429, 'Too many requests'), true],
    [httpError(500, 'Internal error'), true],
    [httpError(503, 'Unavailable'), true],
    [httpError(400, 'Bad request'), false],
    [httpError(401, 'Unauthorized'), false],
  ])('should classify status errors (%s)', (error, expected) => {
    expect(isRetryableOpenAIError(error)).toBe(expected);
  });

  it.each([
    ['rate_limit_exceeded', true],
    ['Request timed out', true],
    ['read ECONNRESET', true],
    ['socket hang up', true],
    ['Invalid model', false],
  ])('should classify errors without a status by message: %s', (message, expected) => {
    expect(isRetryableOpenAIError(new Error(message))).toBe(expected);
  });

  it('should not retry non-Error values', () => {
    expect(isRetryableOpenAIError('timeout')).toBe(false);
  });
});

describe('OpenAIReasoningService', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: 'Category: Urgent\nReason: Needs a vet within a day' } }],
    });
  });

  it('should send the triage prompt as system and user messages', async () => {
    const chatCompletion = vi.fn().mockResolvedValue('Category: Routine\nReason: Mild');
    const service = new OpenAIReasoningService({ chatCompletion });
    const prompt = buildTriagePrompt('Dog is limping');

    await expect(service.complete(prompt)).resolves.toBe('Category: Routine\nReason: Mild');
    expect(chatCompletion).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      temperature: 0.2,
      maxTokens: 200,
      signal: undefined,
    });
  });

  it('should hand the abort signal down to the completion call', async () => {
    const chatCompletion = vi.fn().mockResolvedValue('Category: Routine\nReason: Mild');
    const service = new OpenAIReasoningService({ chatCompletion });
    const controller = new AbortController();

    await service.complete({ system: 'sys', user: 'usr' }, { signal: controller.signal });

    expect(chatCompletion).toHaveBeenCalledWith(expect.objectContaining({ signal: controller.signal }));
  });

  it('should call the API with triage sampling settings and the configured model', async () => {
    const service = createOpenAIReasoningService({ apiKey: 'sk-test-key-12345', model: 'gpt-4o-mini' });

    const reply = await service.complete({ system: 'You are a triage assistant.', user: 'Dog is limping' });

    expect(reply).toBe('Category: Urgent\nReason: Needs a vet within a day');
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'You are a triage assistant.' },
          { role: 'user', content: 'Dog is limping' },
        ],
        max_tokens: 200,
        temperature: 0.2,
      },
      { signal: undefined }
    );
  });
});
