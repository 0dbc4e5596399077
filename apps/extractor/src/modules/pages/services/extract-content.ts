import { HTMLElement, type Node, parse, TextNode } from 'node-html-parser';
import { formatError } from '../../../lib/errors.js';
import { createLogger } from '../../../lib/logger.js';

const log = createLogger('page-content');

const STRIP_SELECTOR = 'script, style, noscript, template, nav, footer, header';

export const DEFAULT_CONTENT_SELECTORS = [
  'main',
  "[role='main']",
  '.main-content',
  '.content',
  '#content',
  '.tax-content',
] as const;

const BLOCK_TAGS = new Set([
  'ADDRESS',
  'ARTICLE',
  'ASIDE',
  'BLOCKQUOTE',
  'CAPTION',
  'DD',
  'DIV',
  'DL',
  'DT',
  'FIGCAPTION',
  'FIGURE',
  'H1',
  'H2',
  'H3',
  'H4',
  'H5',
  'H6',
  'HR',
  'LI',
  'MAIN',
  'OL',
  'P',
  'PRE',
  'SECTION',
  'TABLE',
  'TBODY',
  'TFOOT',
  'THEAD',
  'UL',
]);

export type PageContent = {
  text: string;
  /** Selector that matched the content area ("body" or ":root" when none did). */
  selector: string;
};

const squash = (s: string) => s.replace(/\s+/g, ' ').trim();

const isCell = (n: Node): n is HTMLElement =>
  n instanceof HTMLElement && (n.tagName === 'TD' || n.tagName === 'TH');

/** Flatten an element into text lines: one per block, table rows as `cell | cell`. */
export function renderLines(root: HTMLElement): string[] {
  const lines: string[] = [];
  let buf = '';

  const flush = () => {
    const line = squash(buf);
    if (line) lines.push(line);
    buf = '';
  };

  const walk = (node: Node) => {
    if (node instanceof TextNode) {
      buf += node.text;
      return;
    }
    if (!(node instanceof HTMLElement)) return;

    const tag = node.tagName;
    if (tag === 'BR') {
      flush();
      return;
    }
    if (tag === 'TR') {
      flush();
      const cells = node.childNodes
        .filter(isCell)
        .map((c) => squash(c.text))
        .filter(Boolean);
      if (cells.length) lines.push(cells.join(' | '));
      return;
    }

    const block = BLOCK_TAGS.has(tag);
    if (block) flush();
    for (const child of node.childNodes) walk(child);
    if (block) flush();
  };

  walk(root);
  flush();
  return lines;
}

function selectOne(root: HTMLElement, selector: string): HTMLElement | null {
  try {
    return root.querySelector(selector);
  } catch (err) {
    log.warn({ selector, err: formatError(err) }, 'invalid content selector skipped');
    return null;
  }
}

/**
 * Strip page chrome (scripts, navigation, header, footer), then pick the main content
 * area: the generic selectors first, then the state's own fallback selectors, then <body>.
 */
export function extractPageContent(html: string, extraSelectors: readonly string[] = []): PageContent {
  const root = parse(html);
  for (const el of root.querySelectorAll(STRIP_SELECTOR)) el.remove();

  for (const selector of [...DEFAULT_CONTENT_SELECTORS, ...extraSelectors]) {
    const el = selectOne(root, selector);
    if (el && squash(el.text)) {
      return { text: renderLines(el).join('\n'), selector };
    }
  }

  const body = root.querySelector('body');
  if (body) return { text: renderLines(body).join('\n'), selector: 'body' };
  return { text: renderLines(root).join('\n'), selector: ':root' };
}
