import type { LlmProvider, LlmSettings } from '../../../../lib/env.js';
import { createGrokClient } from './grok.js';
import { createOpenAIClient } from './openai.js';

export type LlmPrompt = { system: string; user: string };

export type LlmReply = {
  text: string;
  /** Model name the provider reports, or the configured one. */
  model: string;
};

/** One chat completion per call. Implementations throw LLMCallFailure; they never retry. */
export interface LlmClient {
  readonly provider: LlmProvider;
  readonly model: string;
  complete(prompt: LlmPrompt): Promise<LlmReply>;
}

export function createLlmClient(settings: LlmSettings): LlmClient {
  switch (settings.provider) {
    case 'grok':
      return createGrokClient(settings);
    case 'openai':
      return createOpenAIClient(settings);
  }
}
