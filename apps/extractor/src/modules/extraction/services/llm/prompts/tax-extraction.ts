import { TAX_FIELD_LABELS, type StateConfig, type TaxField } from '@statetax/types';

/** Page text budget per prompt, in characters. */
export const MAX_PROMPT_CONTENT_CHARS = 8000;

const FIELD_GUIDANCE: Record<TaxField, string> = {
  ENI: 'the standard corporate income tax rate(s) on entire/business net income, with thresholds',
  FDM: 'the fixed dollar minimum or other minimum tax amounts, with the range and basis',
  Capital: 'any tax measured by business capital, with the rate and caps',
  Franchise: 'franchise or margin tax rates that stand in for a corporate income tax',
  GrossReceipts: 'gross receipts taxes that apply to corporations',
  AMT: 'alternative minimum tax rates for corporations',
  Surcharge: 'surcharges on top of the base corporate tax (e.g. metropolitan surcharges)',
};

export const taxExtractionSystemPrompt = `
You are a state tax research assistant. You read official state revenue department pages
and report corporate tax figures exactly as the page states them.
Never invent a rate. When the page does not support a value, answer "N/A".
Always answer with a single JSON object and nothing else.
`.trim();

export type TaxPromptInput = {
  content: string;
  config: Pick<
    StateConfig,
    'stateName' | 'stateCode' | 'entityType' | 'industry' | 'includedFields' | 'extractionHints' | 'fallbackSelectors'
  >;
  maxContentChars?: number;
};

/** "C_corp" → "C-Corp" for prose and report cells. */
export const displayEntity = (entityType: string) =>
  entityType
    .split(/[_-]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');

function entityContext(entityType: string): string {
  if (entityType.toLowerCase().replace(/[^a-z]/g, '') === 'ccorp') {
    return `
ENTITY TYPE: C-CORPORATION (regular corporation).
- Focus ONLY on rates applicable to C-corporations.
- IGNORE rules for S-corporations, LLCs, partnerships and sole proprietorships.
- IGNORE special regimes for banks, insurance companies, utilities and REITs.
- Prefer rates for "general business taxpayers" or "all other corporations".`;
  }
  return `
ENTITY TYPE: ${displayEntity(entityType)}.
- Focus ONLY on rates applicable to this entity type; ignore rules for other entity types.`;
}

function industryContext(industry: string, shippingKeywords: readonly string[]): string {
  if (industry.toLowerCase() === 'shipping') {
    const hints = shippingKeywords.length ? `\n- Watch for: ${shippingKeywords.join(', ')}.` : '';
    return `
INDUSTRY: SHIPPING / MARINE TRANSPORTATION.
- Flag any special rates, exemptions or rules for water transportation, marine services or shipping companies.
- Note tonnage taxes, port fees or other maritime-specific tax structures.
- Say whether standard corporate rates apply or an industry-specific override exists.${hints}`;
  }
  return `
INDUSTRY: ${industry}.
- Flag any rates, exemptions or rules specific to this industry.`;
}

/**
 * Cut page text to the budget. With keyword preference on, lines mentioning a keyword
 * are kept first (an oversized one is cut to the room left); the kept lines are emitted
 * in page order either way. Falls back to a prefix cut when no kept line has a keyword.
 */
export function fitContent(
  text: string,
  opts: { maxChars: number; keywords?: readonly string[]; preferKeywords?: boolean }
): string {
  if (text.length <= opts.maxChars) return text;

  const keywords = (opts.keywords ?? []).map((k) => k.toLowerCase()).filter(Boolean);
  if (!opts.preferKeywords || keywords.length === 0) return text.slice(0, opts.maxChars);

  const lines = text.split('\n');
  const hits = (line: string) => {
    const lower = line.toLowerCase();
    return keywords.some((k) => lower.includes(k));
  };
  const order = [
    ...lines.map((_, i) => i).filter((i) => hits(lines[i] ?? '')),
    ...lines.map((_, i) => i).filter((i) => !hits(lines[i] ?? '')),
  ];

  const kept = new Map<number, string>();
  let used = 0;
  for (const i of order) {
    const line = lines[i] ?? '';
    const sep = kept.size ? 1 : 0;
    const room = opts.maxChars - used - sep;
    if (room <= 0) break;
    if (line.length <= room) {
      kept.set(i, line);
      used += sep + line.length;
    } else if (hits(line)) {
      kept.set(i, line.slice(0, room));
      used += sep + room;
    }
  }

  if (![...kept.values()].some(hits)) return text.slice(0, opts.maxChars);
  return [...kept.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, line]) => line)
    .join('\n');
}

function responseShape(fields: readonly TaxField[]): string {
  const entries = fields
    .map((f) => `    "${f}": { "summary": "<complete sentence for ${TAX_FIELD_LABELS[f]}> or N/A", "rate": "<e.g. 6.5% or $25> or N/A" }`)
    .join(',\n');
  return `{
  "fields": {
${entries}
  },
  "shipping_special_rule": "<shipping / water-transportation / marine carve-out, or N/A>",
  "confidence": <number 0-100>,
  "reasoning": "<how you reached these figures, citing the page sections used>",
  "source_sections": ["<headings or table captions used>"]
}`;
}

/** Render the per-state analysis request sent to the model. */
export function buildTaxExtractionPrompt(input: TaxPromptInput): string {
  const { config } = input;
  const maxChars = input.maxContentChars ?? MAX_PROMPT_CONTENT_CHARS;
  const entity = displayEntity(config.entityType);
  const content = fitContent(input.content, {
    maxChars,
    keywords: [...config.extractionHints.keywords, ...config.extractionHints.shippingKeywords],
    preferKeywords: config.fallbackSelectors.contentArea.length > 0,
  });

  const fieldLines = config.includedFields
    .map((f) => `- ${TAX_FIELD_LABELS[f]}: ${FIELD_GUIDANCE[f]}`)
    .join('\n');
  const keywordLine = config.extractionHints.keywords.length
    ? `\nKEYWORD HINTS: ${config.extractionHints.keywords.join(', ')}`
    : '';

  return `
You are a tax analysis expert specializing in ${entity} taxation in the ${config.industry} industry.
Analyze the ${config.stateName} (${config.stateCode}) page content below.
${entityContext(config.entityType)}
${industryContext(config.industry, config.extractionHints.shippingKeywords)}
${keywordLine}

CONTENT TO ANALYZE:
"""
${content}
"""

TASKS:
1. Identify the corporate income tax rate(s), or the tax that stands in for one, that apply to a ${entity} in ${config.stateName}.
2. Report ONLY these fields:
${fieldLines}
3. For a field the page does not cover, or that does not apply, answer "N/A". Do not guess and do not report fields that were not requested.
4. Flag any shipping, water-transportation or marine-specific rate carve-outs in "shipping_special_rule".
5. Give your confidence as a number from 0 to 100 and explain your reasoning.

OUTPUT FORMAT (JSON only, no markdown):
${responseShape(config.includedFields)}
`.trim();
}
