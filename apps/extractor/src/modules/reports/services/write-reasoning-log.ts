import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ReasoningLogEntry } from '@statetax/types';
import { createLogger } from '../../../lib/logger.js';

const log = createLogger('reasoning-log');

export const REASONING_LOG_FILE = 'state_tax_reasoning_log.txt';

export function formatReasoningLog(entries: readonly ReasoningLogEntry[]): string {
  return entries
    .map((e) => `=== ${e.stateCode} | ${e.status} | ${e.timestamp} ===\n${e.text.trimEnd()}\n`)
    .join('\n');
}

/** One entry per attempted state, in processing order. Overwrites any previous log. */
export async function writeReasoningLog(
  entries: readonly ReasoningLogEntry[],
  opts: { outDir: string }
): Promise<string> {
  await mkdir(opts.outDir, { recursive: true });
  const path = join(opts.outDir, REASONING_LOG_FILE);
  await writeFile(path, formatReasoningLog(entries), 'utf8');
  log.info({ path, entries: entries.length }, 'reasoning log written');
  return path;
}
