import type { FailureStage, FetchAttempt } from '@statetax/types';

/** Per-state pipeline error. Caught at the state boundary, never fatal for a batch. */
export class ExtractionError extends Error {
  readonly stage: FailureStage;

  constructor(stage: FailureStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class FetchFailure extends ExtractionError {
  readonly attempts: FetchAttempt[];

  constructor(message: string, attempts: FetchAttempt[]) {
    super('fetch', message);
    this.attempts = attempts;
  }
}

export class LLMCallFailure extends ExtractionError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('llm', message, { cause: options.cause });
    this.status = options.status;
  }
}

export class ParseFailure extends ExtractionError {
  constructor(message: string) {
    super('parse', message);
  }
}

export type ConfigIssue = { path: string; message: string };

export class ConfigError extends ExtractionError {
  readonly file?: string;
  readonly issues: ConfigIssue[];

  constructor(message: string, options: { file?: string; issues?: ConfigIssue[]; cause?: unknown } = {}) {
    super('config', message, { cause: options.cause });
    this.file = options.file;
    this.issues = options.issues ?? [];
  }
}

/** Missing or unusable LLM credentials. Aborts the whole run before any state is processed. */
export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
  }
}

export function formatError(e: unknown, fallback = 'Unknown error'): string {
  if (e instanceof ConfigError && e.issues.length > 0) {
    const details = e.issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message));
    return `${e.message} (${details.join('; ')})`;
  }
  if (e instanceof Error) return e.message || e.name || fallback;
  if (e && typeof e === 'object') {
    const status = 'status' in e ? e.status : undefined;
    const message = 'message' in e ? e.message : undefined;
    if (typeof status === 'number' && typeof message === 'string') {
      return `${status} ${message}`;
    }
    if (typeof message === 'string' && message.length) return message;
  }
  if (e == null) return fallback;
  return String(e);
}
