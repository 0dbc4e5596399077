import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LLMCallFailure } from '../../../../lib/errors.js';

const mocks = vi.hoisted(() => ({
  httpFetchMock: vi.fn(),
}));

vi.mock('../../../../lib/http.js', () => ({
  httpFetch: mocks.httpFetchMock,
}));

import { createGrokClient } from './grok.js';

const settings = {
  provider: 'grok' as const,
  apiKey: 'test-key',
  model: 'grok-2-latest',
  timeoutMs: 1000,
};

const completion = (content: string | null, model = 'grok-test') =>
  new Response(JSON.stringify({ model, choices: [{ message: { content } }] }), { status: 200 });

describe('createGrokClient', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('posts one chat completion to xAI', async () => {
    mocks.httpFetchMock.mockResolvedValue(completion('{"fields":{"FDM":"$25"}}'));

    const reply = await createGrokClient(settings).complete({ system: 'sys', user: 'analyze' });

    expect(reply).toEqual({ text: '{"fields":{"FDM":"$25"}}', model: 'grok-test' });
    const [url, init] = mocks.httpFetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.x.ai/v1/chat/completions');
    expect(init).toEqual(
      expect.objectContaining({
        method: 'POST',
        timeoutMs: 1000,
        headers: { authorization: 'Bearer test-key', 'content-type': 'application/json' },
      })
    );
    expect(JSON.parse(init.body)).toEqual(
      expect.objectContaining({ model: 'grok-2-latest', response_format: { type: 'json_object' } })
    );
  });

  it('honours a custom base URL', async () => {
    mocks.httpFetchMock.mockResolvedValue(completion('{}'));

    await createGrokClient({ ...settings, baseUrl: 'https://llm.example.test/v1' }).complete({
      system: 'sys',
      user: 'analyze',
    });

    expect(mocks.httpFetchMock.mock.calls[0]?.[0]).toBe('https://llm.example.test/v1/chat/completions');
  });

  it('turns HTTP errors into LLMCallFailure', async () => {
    mocks.httpFetchMock.mockResolvedValue(
      new Response('quota', { status: 429, statusText: 'Too Many Requests' })
    );

    const err = await createGrokClient(settings)
      .complete({ system: 'sys', user: 'analyze' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LLMCallFailure);
    if (!(err instanceof LLMCallFailure)) return;
    expect(err.message).toBe('Grok request failed: 429 Too Many Requests');
    expect(err.status).toBe(429);
  });

  it('turns network errors into LLMCallFailure', async () => {
    mocks.httpFetchMock.mockRejectedValue(new Error('socket hang up'));

    await expect(createGrokClient(settings).complete({ system: 'sys', user: 'analyze' })).rejects.toThrow(
      'Grok request failed: socket hang up'
    );
  });

  it('rejects empty or malformed completions', async () => {
    mocks.httpFetchMock.mockResolvedValueOnce(completion(null));
    await expect(createGrokClient(settings).complete({ system: 'sys', user: 'analyze' })).rejects.toThrow(
      'Grok returned an empty completion'
    );

    mocks.httpFetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));
    await expect(createGrokClient(settings).complete({ system: 'sys', user: 'analyze' })).rejects.toThrow(
      LLMCallFailure
    );
  });
});
