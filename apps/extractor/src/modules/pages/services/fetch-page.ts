import type { FetchAttempt } from '@statetax/types';
import { FetchFailure, formatError } from '../../../lib/errors.js';
import { httpFetch, HttpTimeoutError } from '../../../lib/http.js';
import { createLogger } from '../../../lib/logger.js';

const log = createLogger('page-fetcher');

export type FetchResult = {
  url: string;
  body: string;
  attempts: FetchAttempt[];
};

export type FetchPageOptions = {
  timeoutMs?: number;
  stateCode?: string;
};

export type PageFetcher = (urls: readonly string[], opts?: FetchPageOptions) => Promise<FetchResult>;

/**
 * Try each candidate URL once, in order, and return the first page that comes back
 * with a 2xx status and a non-empty body. Exhausting the list throws FetchFailure
 * with the reason for every attempt.
 */
export const fetchFirstAvailable: PageFetcher = async (urls, opts = {}) => {
  const attempts: FetchAttempt[] = [];
  const candidates = [...new Set(urls)];

  if (candidates.length === 0) {
    throw new FetchFailure('No candidate URLs configured', attempts);
  }

  for (const url of candidates) {
    log.debug({ stateCode: opts.stateCode, url }, 'fetching page');
    try {
      const res = await httpFetch(url, {
        timeoutMs: opts.timeoutMs,
        redirect: 'follow',
        headers: { accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8' },
      });

      if (!res.ok) {
        const reason = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`;
        attempts.push({ url, ok: false, status: res.status, reason });
        log.warn({ stateCode: opts.stateCode, url, status: res.status }, 'page fetch rejected');
        continue;
      }

      const body = await res.text();
      if (!body.trim()) {
        attempts.push({ url, ok: false, status: res.status, reason: 'Empty response body' });
        log.warn({ stateCode: opts.stateCode, url }, 'page fetch returned empty body');
        continue;
      }

      attempts.push({ url, ok: true, status: res.status });
      log.info({ stateCode: opts.stateCode, url, bytes: body.length }, 'page fetched');
      return { url, body, attempts };
    } catch (err) {
      const reason =
        err instanceof HttpTimeoutError ? err.message : `Network error: ${formatError(err)}`;
      attempts.push({ url, ok: false, reason });
      log.warn({ stateCode: opts.stateCode, url, err: reason }, 'page fetch failed');
    }
  }

  throw new FetchFailure(
    `All ${attempts.length} candidate URL(s) failed: ${attempts
      .map((a) => `${a.url} (${a.reason ?? 'failed'})`)
      .join('; ')}`,
    attempts
  );
};
