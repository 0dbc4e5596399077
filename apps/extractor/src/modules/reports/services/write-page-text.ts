import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PageText } from '../../extraction/services/extract-state.js';
import { createLogger } from '../../../lib/logger.js';

const log = createLogger('page-text');

export const PAGE_TEXT_FILE = 'state_tax_page_text.txt';

export function formatPageText(pages: readonly PageText[]): string {
  return pages.map((p) => `=== ${p.stateCode} | ${p.url} ===\n${p.text.trimEnd()}\n`).join('\n');
}

/** Cleaned text of every analysed page, for auditing what the model was shown. */
export async function writePageText(pages: readonly PageText[], opts: { outDir: string }): Promise<string> {
  await mkdir(opts.outDir, { recursive: true });
  const path = join(opts.outDir, PAGE_TEXT_FILE);
  await writeFile(path, formatPageText(pages), 'utf8');
  log.info({ path, pages: pages.length }, 'page text written');
  return path;
}
