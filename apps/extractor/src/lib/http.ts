const DEFAULT_TIMEOUT_MS = Number(process.env.HTTP_TIMEOUT_MS ?? 15000);

export const USER_AGENT =
  process.env.HTTP_USER_AGENT ?? 'statetax-extractor/0.1 (+state corporate tax research)';

function linkAbort(external: AbortSignal | null | undefined, controller: AbortController) {
  if (!external) return () => {};
  if (external.aborted) {
    controller.abort(external.reason);
    return () => {};
  }
  const onAbort = () => controller.abort(external.reason);
  external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

/** One attempt per call: callers fail over to other URLs or report the failure. */
export type HttpFetchInit = RequestInit & {
  timeoutMs?: number;
};

export class HttpTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

const urlOf = (input: string | URL | Request) =>
  typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;

export async function httpFetch(input: string | URL | Request, init: HttpFetchInit = {}): Promise<Response> {
  const { timeoutMs, ...reqInit } = init;
  const timeout = Number.isFinite(timeoutMs) ? Number(timeoutMs) : DEFAULT_TIMEOUT_MS;
  const headers = new Headers(reqInit.headers);
  if (!headers.has('user-agent')) headers.set('user-agent', USER_AGENT);

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeout);
  const unlink = linkAbort(reqInit.signal, controller);

  try {
    return await fetch(input, { ...reqInit, headers, signal: controller.signal });
  } catch (err) {
    throw timedOut ? new HttpTimeoutError(urlOf(input), timeout) : err;
  } finally {
    clearTimeout(timeoutId);
    unlink();
  }
}
