import { FakeListChatModel } from '@langchain/core/utils/testing';
import { ConfigService } from '@nestjs/config';
import { GenerationError } from '../../common/errors';
import { TimeoutError } from '../../common/utils/async.utils';
import { testPipelineConfig } from '../../testing/fixtures';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import {
  contentToText,
  LangChainGenerationClient,
  toGenerationError,
} from './generation.client';

describe('toGenerationError', () => {
  it.each([
    [new TimeoutError('Generation timed out after 50ms', 50), 'Timeout'],
    [new Error('Request timed out'), 'Timeout'],
    [Object.assign(new Error('Too Many Requests'), { status: 429 }), 'RateLimited'],
    [new Error('429 rate_limit_exceeded'), 'RateLimited'],
    [new Error('Internal server error'), 'Upstream'],
    ['plain string failure', 'Upstream'],
  ])('maps %p to %s', (error, reason) => {
    expect(toGenerationError(error).reason).toBe(reason);
  });

  it('passes GenerationError through', () => {
    const original = new GenerationError('bad output', 'Malformed');
    expect(toGenerationError(original)).toBe(original);
  });
});

describe('contentToText', () => {
  it('joins text parts and skips other content', () => {
    expect(
      contentToText([
        { type: 'text', text: 'Hello ' },
        { type: 'image_url', image_url: 'http://localhost/x.png' },
        { type: 'text', text: 'world' },
      ]),
    ).toBe('Hello world');
  });
});

describe('LangChainGenerationClient', () => {
  function clientWith(model: FakeListChatModel): {
    client: LangChainGenerationClient;
    createChatModel: jest.SpyInstance;
  } {
    const factory = new LLMProviderFactory(new ConfigService());
    const createChatModel = jest
      .spyOn(factory, 'createChatModel')
      .mockReturnValue(model);
    return {
      client: new LangChainGenerationClient(factory, testPipelineConfig()),
      createChatModel,
    };
  }

  const request = {
    prompt: 'Context...',
    systemPrompt: 'You are an analyst',
    maxTokens: 800,
    timeoutMs: 1000,
  };

  it('returns trimmed text and disables provider retries', async () => {
    const { client, createChatModel } = clientWith(
      new FakeListChatModel({ responses: ['  An answer [Document 1].  '] }),
    );

    await expect(client.generate(request)).resolves.toBe('An answer [Document 1].');
    expect(createChatModel).toHaveBeenCalledWith(undefined, {
      maxTokens: 800,
      temperature: 0.3,
      maxRetries: 0,
    });
  });

  it('reports empty output as Malformed', async () => {
    const { client } = clientWith(new FakeListChatModel({ responses: ['   '] }));

    await expect(client.generate(request)).rejects.toMatchObject({
      kind: 'GenerationError',
      reason: 'Malformed',
    });
  });

  it('reports a slow model as Timeout', async () => {
    const { client } = clientWith(
      new FakeListChatModel({ responses: ['late'], sleep: 200 }),
    );

    await expect(
      client.generate({ ...request, timeoutMs: 20 }),
    ).rejects.toMatchObject({ reason: 'Timeout' });
  });

  it('aborts the in-flight model call when the timeout fires', async () => {
    const model = new FakeListChatModel({ responses: ['late'], sleep: 300 });
    const invoke = jest.spyOn(model, 'invoke');
    const { client } = clientWith(model);

    await expect(
      client.generate({ ...request, timeoutMs: 20 }),
    ).rejects.toMatchObject({ reason: 'Timeout' });

    expect(invoke).toHaveBeenCalledTimes(1);
    const signal = invoke.mock.calls[0][1]?.signal;
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(true);
  });

  it('aborts the model call when the caller cancels', async () => {
    const model = new FakeListChatModel({ responses: ['late'], sleep: 300 });
    const invoke = jest.spyOn(model, 'invoke');
    const { client } = clientWith(model);
    const caller = new AbortController();

    const attempt = client.generate({ ...request, signal: caller.signal });
    caller.abort();

    await expect(attempt).rejects.toMatchObject({ kind: 'GenerationError' });
    expect(invoke.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });
});
