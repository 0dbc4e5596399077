import { fileURLToPath } from 'node:url';
import { CredentialError } from './errors.js';

export const DEFAULT_STATE_CONFIGS_DIR = fileURLToPath(new URL('../../state-configs/', import.meta.url));

export type LlmProvider = 'openai' | 'grok';

export type ConfidenceThresholds = { high: number; medium: number };

export const DEFAULT_CONFIDENCE_THRESHOLDS: ConfidenceThresholds = { high: 90, medium: 70 };

export type LlmSettings = {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
};

export type ExtractorEnv = {
  llm: LlmSettings;
  pageTimeoutMs: number;
  confidence: ConfidenceThresholds;
  configsDir: string;
  outputDir: string;
};

type EnvSource = Record<string, string | undefined>;

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o-mini',
  grok: 'grok-2-latest',
};

const read = (env: EnvSource, name: string) => (env[name] ?? '').trim();

function parsePositiveInt(env: EnvSource, name: string, fallback: number): number {
  const raw = read(env, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

function parsePercent(env: EnvSource, name: string, fallback: number): number {
  const raw = read(env, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(`Invalid ${name}: expected a number between 0 and 100, got "${raw}"`);
  }
  return parsed;
}

export function resolveLlmProvider(env: EnvSource = process.env): LlmProvider {
  const raw = read(env, 'LLM_PROVIDER').toLowerCase();
  if (!raw) return 'openai';
  if (raw === 'openai' || raw === 'grok') return raw;
  throw new CredentialError(`Invalid LLM_PROVIDER: expected "openai" or "grok", got "${raw}"`);
}

export function resolveConfidenceThresholds(env: EnvSource = process.env): ConfidenceThresholds {
  const high = parsePercent(env, 'CONFIDENCE_HIGH', DEFAULT_CONFIDENCE_THRESHOLDS.high);
  const medium = parsePercent(env, 'CONFIDENCE_MEDIUM', DEFAULT_CONFIDENCE_THRESHOLDS.medium);
  if (medium >= high) {
    throw new Error(`CONFIDENCE_MEDIUM (${medium}) must be below CONFIDENCE_HIGH (${high})`);
  }
  return { high, medium };
}

/**
 * LLM credentials come from the environment (after dotenv has loaded .env / config.env).
 * A missing key is fatal for the run, not for a single state.
 */
export function resolveLlmSettings(env: EnvSource = process.env): LlmSettings {
  const provider = resolveLlmProvider(env);
  const providerKey = provider === 'grok' ? read(env, 'XAI_API_KEY') : read(env, 'OPENAI_API_KEY');
  const apiKey = read(env, 'LLM_API_KEY') || providerKey;
  if (!apiKey) {
    const names = provider === 'grok' ? 'LLM_API_KEY or XAI_API_KEY' : 'LLM_API_KEY or OPENAI_API_KEY';
    throw new CredentialError(`Missing LLM API key: set ${names} in the environment or config.env`);
  }
  if (/\s/.test(apiKey)) {
    throw new CredentialError('Invalid LLM API key: value contains whitespace');
  }

  const baseUrl = read(env, 'LLM_BASE_URL');
  if (baseUrl) {
    try {
      new URL(baseUrl);
    } catch {
      throw new CredentialError(`Invalid LLM_BASE_URL: "${baseUrl}" is not a URL`);
    }
  }

  return {
    provider,
    apiKey,
    model: read(env, 'LLM_MODEL') || DEFAULT_MODELS[provider],
    baseUrl: baseUrl || undefined,
    timeoutMs: parsePositiveInt(env, 'LLM_TIMEOUT_MS', 60_000),
  };
}

export function validateExtractorEnv(env: EnvSource = process.env): ExtractorEnv {
  return {
    llm: resolveLlmSettings(env),
    pageTimeoutMs: parsePositiveInt(env, 'PAGE_TIMEOUT_MS', 30_000),
    confidence: resolveConfidenceThresholds(env),
    configsDir: read(env, 'STATE_CONFIGS_DIR') || DEFAULT_STATE_CONFIGS_DIR,
    outputDir: read(env, 'OUTPUT_DIR') || 'output',
  };
}
