/**
 * Chat adapters: retry wrapper, OpenAI completer and client construction
 */

import { AzureOpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import {
  config,
  ConfigurationError,
  OpenAiChatCompleter,
  OpenAiEmbedder,
  RetryingChatCompleter,
  ServiceCallError,
  backoffDelay,
  createOpenAiClient,
  llmRequestsCounter,
  type ChatCompletionsClient,
} from '@epiparam/shared';
import { FakeChatCompleter } from './helpers';

function failing(times: number, error: () => Error): FakeChatCompleter {
  let failures = 0;
  return new FakeChatCompleter(() => {
    if (failures < times) {
      failures++;
      throw error();
    }
    return 'ok';
  });
}

describe('RetryingChatCompleter', () => {
  const messages = [{ role: 'user' as const, content: 'hello' }];

  it('backs off exponentially between attempts', async () => {
    const inner = failing(2, () => new ServiceCallError('chat', 'rate limited'));
    const delays: number[] = [];
    const chat = new RetryingChatCompleter(inner, { maxAttempts: 3, backoffBaseMs: 10 }, async (ms) => {
      delays.push(ms);
    });

    await expect(chat.complete(messages)).resolves.toBe('ok');
    expect(inner.calls).toHaveLength(3);
    expect(delays).toEqual([10, 20]);
  });

  it('rethrows the last error once attempts run out', async () => {
    let n = 0;
    const inner = failing(5, () => new ServiceCallError('chat', `failure ${++n}`));
    const chat = new RetryingChatCompleter(inner, { maxAttempts: 2, backoffBaseMs: 1 }, async () => {});

    await expect(chat.complete(messages)).rejects.toThrow('failure 2');
    expect(inner.calls).toHaveLength(2);
  });

  it('does not retry configuration errors', async () => {
    const inner = failing(5, () => new ConfigurationError('OPENAI_API_KEY is not set'));
    const chat = new RetryingChatCompleter(inner, { maxAttempts: 3, backoffBaseMs: 1 }, async () => {});

    await expect(chat.complete(messages)).rejects.toThrow(ConfigurationError);
    expect(inner.calls).toHaveLength(1);
  });

  it('reports the wrapped model', () => {
    const chat = new RetryingChatCompleter(new FakeChatCompleter(() => 'x', 'model-a'));

    expect(chat.model).toBe('model-a');
  });

  it('computes backoff delays', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, 2000))).toEqual([2000, 4000, 8000]);
  });
});

describe('createOpenAiClient', () => {
  it('requires an API key', () => {
    expect(() => createOpenAiClient({ ...config, openaiApiKey: '' })).toThrow(
      'OPENAI_API_KEY is not set'
    );
  });

  it('targets Azure when an endpoint is configured', () => {
    const client = createOpenAiClient({
      ...config,
      openaiApiKey: 'test-secret',
      azureEndpoint: 'https://example.invalid',
    });

    expect(client).toBeInstanceOf(AzureOpenAI);
  });
});

describe('OpenAiEmbedder', () => {
  it('makes no request for an empty batch', async () => {
    const embedder = new OpenAiEmbedder({
      config: { ...config, openaiApiKey: 'test-secret', embeddingEndpoint: '' },
    });

    await expect(embedder.embed([])).resolves.toEqual([]);
  });
});

class StubChatClient implements ChatCompletionsClient {
  readonly requests: ChatCompletionCreateParamsNonStreaming[] = [];
  readonly chat = {
    completions: {
      create: async (body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> => {
        this.requests.push(body);
        return this.reply(body.model);
      },
    },
  };

  constructor(private readonly reply: (model: string) => ChatCompletion | Promise<ChatCompletion>) {}
}

function completion(model: string, content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model,
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

async function requestCount(model: string, status: 'success' | 'error'): Promise<number> {
  const metric = await llmRequestsCounter.get();
  return metric.values.find((v) => v.labels.model === model && v.labels.status === status)?.value ?? 0;
}

describe('OpenAiChatCompleter', () => {
  const messages = [
    { role: 'system' as const, content: 'You read papers.' },
    { role: 'user' as const, content: 'hello' },
  ];
  const cfg = { ...config, llmTemperature: 0 };

  it('returns the assistant text and counts the success', async () => {
    const client = new StubChatClient((model) => completion(model, 'Answer: 12%'));
    const chat = new OpenAiChatCompleter({ config: cfg, model: 'stub-plain', client });

    await expect(chat.complete(messages)).resolves.toBe('Answer: 12%');
    expect(client.requests).toEqual([
      {
        model: 'stub-plain',
        messages: [
          { role: 'system', content: 'You read papers.' },
          { role: 'user', content: 'hello' },
        ],
        temperature: 0,
      },
    ]);
    expect(await requestCount('stub-plain', 'success')).toBe(1);
    expect(await requestCount('stub-plain', 'error')).toBe(0);
  });

  it('forwards a JSON schema response format when one is requested', async () => {
    const client = new StubChatClient((model) => completion(model, '{"value":"12%"}'));
    const chat = new OpenAiChatCompleter({ config: cfg, model: 'stub-default', client });
    const responseFormat = { name: 'extraction', strict: true, schema: { type: 'object' } };

    await chat.complete(messages, { model: 'stub-structured', responseFormat });

    expect(client.requests[0]?.model).toBe('stub-structured');
    expect(client.requests[0]?.response_format).toEqual({
      type: 'json_schema',
      json_schema: responseFormat,
    });
  });

  it('rejects an empty or blank response', async () => {
    const replies = [null, '', '  \n '];
    const client = new StubChatClient((model) => completion(model, replies.shift() ?? null));
    const chat = new OpenAiChatCompleter({ config: cfg, model: 'stub-empty', client });

    for (let i = 0; i < 3; i++) {
      const failure = chat.complete(messages);
      await expect(failure).rejects.toThrow(ServiceCallError);
      await expect(failure).rejects.toThrow('Empty chat completion response from stub-empty');
    }
    expect(await requestCount('stub-empty', 'error')).toBe(3);
    expect(await requestCount('stub-empty', 'success')).toBe(0);
  });

  it('wraps client errors and keeps the cause', async () => {
    const cause = new Error('socket hang up');
    const client = new StubChatClient(() => Promise.reject(cause));
    const chat = new OpenAiChatCompleter({ config: cfg, model: 'stub-broken', client });

    const failure = chat.complete(messages);

    await expect(failure).rejects.toBeInstanceOf(ServiceCallError);
    await expect(failure).rejects.toThrow('Chat completion failed (stub-broken): socket hang up');
    await expect(failure).rejects.toHaveProperty('service', 'chat');
    await expect(failure).rejects.toHaveProperty('cause', cause);
    expect(await requestCount('stub-broken', 'error')).toBe(1);
  });
});
