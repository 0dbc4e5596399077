import { formatError } from '../errors.js';
import { createLogger } from '../logger.js';
import { runErrors, setLastRunNow } from '../metrics.js';

export type Command = (args: string[]) => Promise<void>;

export { flagCSV, flagStr, parseFlags, positionals } from './utils.js';

const log = createLogger('cli');

export async function withRun<T>(
  ctx: { job: string; params?: Record<string, unknown> },
  work: () => Promise<T>
): Promise<T> {
  const started = Date.now();
  log.info({ job: ctx.job, params: ctx.params ?? {} }, 'run started');
  try {
    const payload = await work();
    setLastRunNow(ctx.job);
    log.info({ job: ctx.job, ms: Date.now() - started }, 'run finished');
    return payload;
  } catch (err) {
    runErrors.inc({ job: ctx.job });
    log.error({ job: ctx.job, err: formatError(err) }, 'run failed');
    throw err;
  }
}
