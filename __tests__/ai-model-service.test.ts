import { APIConnectionTimeoutError } from 'openai';
import {
  AIModelService,
  AIModelServiceError,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatCompletionsClient,
  ChatRequestOptions,
  createChatCompletionsClient,
  createModelService,
} from '../lib/services/ai-model-service';
import { ERROR_CODES } from '../lib/agents/types';
import { LogLevel } from '../lib/logging/logging';
import { makeConfig, makeLogger } from './helpers/fakes';

class FakeChatClient implements ChatCompletionsClient {
  readonly requests: Array<{ body: ChatCompletionRequest; options?: ChatRequestOptions }> = [];

  constructor(private readonly reply: () => Promise<ChatCompletionResponse>) {}

  chat = {
    completions: {
      create: (body: ChatCompletionRequest, options?: ChatRequestOptions) => {
        this.requests.push({ body, options });
        return this.reply();
      },
    },
  };
}

const textReply = (content: string | null, totalTokens = 0): ChatCompletionResponse => ({
  choices: [{ message: { content } }],
  usage: totalTokens > 0 ? { prompt_tokens: totalTokens - 10, completion_tokens: 10, total_tokens: totalTokens } : null,
});

const definition = { label: 'A', provider: 'openai' as const, model: 'gpt-4o' };

describe('AIModelService', () => {
  it('sends the prompt as a single user message with the configured settings', async () => {
    const client = new FakeChatClient(async () => textReply('CONFIRMED'));
    const service = createModelService(definition, makeConfig({ maxTokens: 512, requestTimeoutMs: 5000 }), client);

    const text = await service.generateText('Is E11.9 right?');

    expect(text).toBe('CONFIRMED');
    expect(client.requests).toEqual([
      {
        body: {
          model: 'gpt-4o',
          messages: [{ role: 'user', content: 'Is E11.9 right?' }],
          temperature: 0.1,
          max_tokens: 512,
        },
        options: { timeout: 5000, maxRetries: 0 },
      },
    ]);
  });

  it('returns an empty string when the reply has no content', async () => {
    const service = createModelService(definition, makeConfig(), new FakeChatClient(async () => textReply(null)));

    await expect(service.generateText('prompt')).resolves.toBe('');
  });

  it('logs token usage and tracks usage stats', async () => {
    const logger = makeLogger();
    const service = createModelService(definition, makeConfig(), new FakeChatClient(async () => textReply('ok', 110)));

    await service.generateText('prompt', logger);

    const usage = logger.getFullLog().filter((entry) => entry.level === LogLevel.AI_USAGE);
    expect(usage).toHaveLength(1);
    expect(usage[0].aiUsage?.totalTokens).toBe(110);
    expect(usage[0].aiUsage?.provider).toBe('openai');
    expect(service.getUsageStats()).toEqual({
      requestCount: 1,
      failedRequestCount: 0,
      totalTokensUsed: 110,
      averageTokensPerRequest: 110,
    });
  });

  it('maps a 429 response to RATE_LIMITED', async () => {
    const rateLimited = Object.assign(new Error('Too many requests'), { status: 429 });
    const service = createModelService(definition, makeConfig(), new FakeChatClient(async () => Promise.reject(rateLimited)));

    const error = await service.generateText('prompt').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AIModelServiceError);
    expect(error).toMatchObject({
      code: ERROR_CODES.RATE_LIMITED,
      message: 'Rate limit hit (429) for A: Too many requests',
    });
    expect(service.getUsageStats().failedRequestCount).toBe(1);
  });

  it('maps a client timeout to TIMEOUT_EXCEEDED', async () => {
    const service = createModelService(
      definition,
      makeConfig({ requestTimeoutMs: 2000 }),
      new FakeChatClient(async () => Promise.reject(new APIConnectionTimeoutError())),
    );

    await expect(service.generateText('prompt')).rejects.toMatchObject({
      code: ERROR_CODES.TIMEOUT_EXCEEDED,
      message: 'Request to A timed out after 2000ms',
    });
  });

  it('maps other failures to EXTERNAL_API_ERROR', async () => {
    const service = createModelService(
      definition,
      makeConfig(),
      new FakeChatClient(async () => Promise.reject(new Error('bad gateway'))),
    );

    await expect(service.generateText('prompt')).rejects.toMatchObject({
      code: ERROR_CODES.EXTERNAL_API_ERROR,
      message: 'Request to A failed: bad gateway',
    });
  });

  it('reports connection test failures without throwing', async () => {
    const service = new AIModelService(
      { ...definition, temperature: 0.1, maxTokens: 10, timeout: 1000 },
      new FakeChatClient(async () => Promise.reject(new Error('unauthorized'))),
    );

    const result = await service.testConnection();

    expect(result.success).toBe(false);
    expect(result.error).toBe('Request to A failed: unauthorized');
  });

  it('resets usage stats', async () => {
    const service = createModelService(definition, makeConfig(), new FakeChatClient(async () => textReply('ok', 50)));
    await service.generateText('prompt');

    service.resetStats();

    expect(service.getUsageStats().requestCount).toBe(0);
    expect(service.getUsageStats().totalTokensUsed).toBe(0);
  });

  it('keeps its configuration private', () => {
    expect(Object.getOwnPropertyNames(AIModelService.prototype)).not.toContain('getConfig');
  });
});

describe('createChatCompletionsClient', () => {
  it('refuses a provider without credentials', () => {
    const config = makeConfig({ credentials: { openai: { apiKey: 'test-secret' } } });

    expect(() => createChatCompletionsClient('groq', config)).toThrow("No credentials configured for provider 'groq'");
  });
});
