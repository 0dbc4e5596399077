import { describe, expect, it } from 'vitest';
import { createLlmClient } from './client.js';

describe('createLlmClient', () => {
  it('selects the adapter by provider', () => {
    const base = { apiKey: 'test-key', timeoutMs: 1000 };

    const openai = createLlmClient({ ...base, provider: 'openai', model: 'gpt-4o-mini' });
    const grok = createLlmClient({ ...base, provider: 'grok', model: 'grok-2-latest' });

    expect([openai.provider, openai.model]).toEqual(['openai', 'gpt-4o-mini']);
    expect([grok.provider, grok.model]).toEqual(['grok', 'grok-2-latest']);
  });
});
