import { z } from 'zod/v4';
import type { LlmSettings } from '../../../../lib/env.js';
import { formatError, LLMCallFailure } from '../../../../lib/errors.js';
import { httpFetch } from '../../../../lib/http.js';
import type { LlmClient } from './client.js';

const GROK_URL = 'https://api.x.ai/v1/chat/completions';

const CompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .default([]),
});

export function createGrokClient(settings: LlmSettings): LlmClient {
  const url = settings.baseUrl ? new URL('chat/completions', withSlash(settings.baseUrl)).href : GROK_URL;

  return {
    provider: 'grok',
    model: settings.model,
    async complete({ system, user }) {
      const body = {
        model: settings.model,
        temperature: 0.1,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
      };

      let r: Response;
      try {
        r = await httpFetch(url, {
          method: 'POST',
          headers: { authorization: `Bearer ${settings.apiKey}`, 'content-type': 'application/json' },
          body: JSON.stringify(body),
          timeoutMs: settings.timeoutMs,
        });
      } catch (e) {
        throw new LLMCallFailure(`Grok request failed: ${formatError(e)}`, { cause: e });
      }
      if (!r.ok) {
        throw new LLMCallFailure(`Grok request failed: ${r.status} ${r.statusText}`.trim(), {
          status: r.status,
        });
      }

      let data: z.infer<typeof CompletionSchema>;
      try {
        data = CompletionSchema.parse(await r.json());
      } catch (e) {
        throw new LLMCallFailure(`Grok response was not a chat completion: ${formatError(e)}`, {
          cause: e,
        });
      }

      const text = data.choices[0]?.message.content ?? '';
      if (!text.trim()) throw new LLMCallFailure('Grok returned an empty completion');
      return { text, model: data.model || settings.model };
    },
  };
}

const withSlash = (u: string) => (u.endsWith('/') ? u : `${u}/`);
