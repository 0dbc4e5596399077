import OpenAI from 'openai';
import type { LlmSettings } from '../../../../lib/env.js';
import { formatError, LLMCallFailure } from '../../../../lib/errors.js';
import type { LlmClient } from './client.js';

export function createOpenAIClient(settings: LlmSettings): LlmClient {
  const openai = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  });

  return {
    provider: 'openai',
    model: settings.model,
    async complete({ system, user }) {
      let resp: OpenAI.Chat.Completions.ChatCompletion;
      try {
        resp = await openai.chat.completions.create({
          model: settings.model,
          temperature: 0.1,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
        });
      } catch (e) {
        const status = e instanceof OpenAI.APIError ? e.status : undefined;
        throw new LLMCallFailure(`OpenAI request failed: ${formatError(e)}`, { status, cause: e });
      }

      const text = resp.choices[0]?.message?.content ?? '';
      if (!text.trim()) throw new LLMCallFailure('OpenAI returned an empty completion');
      return { text, model: resp.model || settings.model };
    },
  };
}
