import {
  type ConfidenceLabel,
  type ExtractedField,
  TAX_FIELD_LABELS,
  TAX_FIELD_VALUES,
  type TaxField,
} from '@statetax/types';
import type { ConfidenceThresholds } from '../../../lib/env.js';
import { ParseFailure } from '../../../lib/errors.js';
import { capConfidence, classifyConfidence, confidenceFromWord, parseConfidenceScore } from './confidence.js';
import { matchFieldKey, normalizeKey } from './tax-fields.js';

export type ParseTaxResponseOptions = {
  includedFields: readonly TaxField[];
  thresholds?: ConfidenceThresholds;
};

export type ParsedTaxResponse = {
  /** Resolved requested fields, in the config's order. */
  fields: ExtractedField[];
  /** Requested fields the reply left empty or N/A. */
  unresolvedFields: TaxField[];
  /** Vocabulary fields the reply filled in without being asked. */
  ignoredFields: TaxField[];
  confidence: ConfidenceLabel;
  confidenceScore?: number;
  shippingNotes: string[];
  reasoning: string;
  sourceSections: string[];
};

type Draft = { summary?: string; rate?: string };

const SHIPPING_KEYS = new Set([
  'shippingspecialrule',
  'specialshippingrule',
  'specialindustryrates',
  'shippingnotes',
  'shippingrule',
  'shipping',
]);
const CONFIDENCE_KEYS = ['confidence', 'confidencescore', 'confidencelevel'];
const REASONING_KEYS = ['reasoning', 'analysis', 'explanation'];
const SOURCE_KEYS = ['sourcesections', 'sources'];

const NA_WORDS = new Set(['none', 'not applicable', 'not found', 'not available', 'unknown', 'null', '-']);

export function isNotApplicable(value: string | undefined): boolean {
  const v = (value ?? '').trim().replace(/[.\s]+$/, '').toLowerCase();
  if (!v) return true;
  return /^n\/?a\b/.test(v) || NA_WORDS.has(v);
}

const RATE_RE = /\$\s?\d[\d,]*(?:\.\d+)?|\d+(?:\.\d+)?\s?%/;

/** First dollar amount or percentage in a statement: "6.5%", "$25". */
export function findRate(text: string): string | undefined {
  const m = RATE_RE.exec(text);
  return m ? m[0].replace(/\s+/g, '') : undefined;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const joinItems = (items: readonly unknown[], of: (item: unknown) => string | undefined) => {
  const parts = items.map(of).filter((t): t is string => !isNotApplicable(t));
  return parts.length ? parts.join('; ') : undefined;
};

/** Strings and numbers as text; lists of them (graduated brackets) joined with "; ". */
function textOf(v: unknown): string | undefined {
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  if (Array.isArray(v)) return joinItems(v, textOf);
  return undefined;
}

const rateOf = (field: TaxField, v: unknown): string | undefined => {
  if (typeof v === 'number' && Number.isFinite(v)) return field === 'FDM' ? `$${v}` : `${v}%`;
  if (Array.isArray(v)) return joinItems(v, (item) => rateOf(field, item));
  return textOf(v);
};

const isNumberList = (v: unknown) => Array.isArray(v) && v.length > 0 && v.every((i) => typeof i === 'number');

/** Drop a surrounding ```json fence, if any. */
export function stripCodeFences(raw: string): string {
  const m = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/.exec(raw);
  return (m ? (m[1] ?? '') : raw).trim();
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  const tryParse = (s: string) => {
    try {
      const v: unknown = JSON.parse(s);
      return isRecord(v) ? v : undefined;
    } catch {
      return undefined;
    }
  };
  const whole = tryParse(text);
  if (whole) return whole;
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start >= 0 && end > start ? tryParse(text.slice(start, end + 1)) : undefined;
}

const prefer = (current: string | undefined, next: string | undefined) =>
  isNotApplicable(current) ? (next ?? current) : current;

class Collector {
  readonly drafts = new Map<TaxField, Draft>();
  readonly shipping: string[] = [];

  field(key: string, value: unknown) {
    const match = matchFieldKey(key);
    if (!match) return false;
    const draft = this.drafts.get(match.field) ?? {};

    // a usable value already collected stays; the nested `fields` map is read first
    if (isRecord(value)) {
      draft.summary = prefer(draft.summary, textOf(value.summary ?? value.description ?? value.statement));
      draft.rate = prefer(draft.rate, rateOf(match.field, value.rate));
    } else if (match.part === 'rate' || typeof value === 'number' || isNumberList(value)) {
      draft.rate = prefer(draft.rate, rateOf(match.field, value));
    } else {
      draft.summary = prefer(draft.summary, textOf(value));
    }
    this.drafts.set(match.field, draft);
    return true;
  }

  shippingNote(value: unknown) {
    if (Array.isArray(value)) {
      for (const v of value) this.shippingNote(v);
      return;
    }
    if (isRecord(value)) {
      for (const [k, v] of Object.entries(value)) {
        const t = textOf(v);
        if (!isNotApplicable(t)) this.addShipping(`${k}: ${t}`);
      }
      return;
    }
    const t = textOf(value);
    if (!isNotApplicable(t) && t) this.addShipping(t);
  }

  private addShipping(note: string) {
    if (!this.shipping.includes(note)) this.shipping.push(note);
  }
}

const pick = (obj: Record<string, unknown>, keys: readonly string[]): unknown => {
  for (const [k, v] of Object.entries(obj)) {
    if (keys.includes(normalizeKey(k))) return v;
  }
  return undefined;
};

/** Resolve a draft to a statement and a rate; undefined when both are N/A. */
function resolveDraft(draft: Draft | undefined): Draft | undefined {
  if (!draft) return undefined;
  const summary = isNotApplicable(draft.summary) ? undefined : draft.summary;
  const explicit = isNotApplicable(draft.rate) ? undefined : draft.rate;
  if (!summary && !explicit) return undefined;
  const rate = explicit ?? (summary ? findRate(summary) : undefined);
  return { summary: summary ?? explicit, rate };
}

/**
 * Turn a model reply into per-field statements. Accepts a JSON object (nested `fields`
 * map or flat keys, possibly wrapped in a code fence) and falls back to `Label: value`
 * lines for prose replies. Throws ParseFailure only when no tax field carries a value.
 */
export function parseTaxResponse(raw: string, opts: ParseTaxResponseOptions): ParsedTaxResponse {
  const text = stripCodeFences(raw);
  const obj = parseJsonObject(text);
  const c = new Collector();

  let confidenceRaw: unknown;
  let reasoning = raw.trim();
  let sourceSections: string[] = [];

  if (obj) {
    if (isRecord(obj.fields)) {
      for (const [k, v] of Object.entries(obj.fields)) c.field(k, v);
    }
    for (const [k, v] of Object.entries(obj)) {
      if (SHIPPING_KEYS.has(normalizeKey(k))) c.shippingNote(v);
      else c.field(k, v);
    }
    confidenceRaw = pick(obj, CONFIDENCE_KEYS);
    const r = textOf(pick(obj, REASONING_KEYS));
    if (r) reasoning = r;
    const sources = pick(obj, SOURCE_KEYS);
    if (Array.isArray(sources)) {
      sourceSections = sources.map(textOf).filter((s): s is string => Boolean(s));
    }
  } else {
    for (const line of text.split('\n')) {
      const m = /^\s*(?:[-*•]\s*)?\**([^:]{1,80}?)\**\s*:\s*(.+)$/.exec(line);
      if (!m) continue;
      const key = m[1] ?? '';
      const value = (m[2] ?? '').replace(/^\*+\s*/, '').trim();
      const norm = normalizeKey(key);
      if (SHIPPING_KEYS.has(norm)) c.shippingNote(value);
      else if (CONFIDENCE_KEYS.includes(norm)) confidenceRaw = confidenceRaw ?? value;
      else c.field(key, value);
    }
  }

  const resolved = new Map<TaxField, Draft>();
  for (const field of TAX_FIELD_VALUES) {
    const d = resolveDraft(c.drafts.get(field));
    if (d) resolved.set(field, d);
  }
  if (resolved.size === 0) {
    throw new ParseFailure('LLM response contained no recognizable tax field values');
  }

  const requested = new Set(opts.includedFields);
  const fields: ExtractedField[] = [];
  const unresolvedFields: TaxField[] = [];
  for (const field of opts.includedFields) {
    const d = resolved.get(field);
    if (!d?.summary) {
      unresolvedFields.push(field);
      continue;
    }
    fields.push({
      field,
      label: TAX_FIELD_LABELS[field],
      summary: d.summary,
      ...(d.rate ? { rate: d.rate } : {}),
    });
  }
  const ignoredFields = [...resolved.keys()].filter((f) => !requested.has(f));

  const confidenceScore = parseConfidenceScore(confidenceRaw);
  let confidence: ConfidenceLabel =
    confidenceScore !== undefined
      ? classifyConfidence(confidenceScore, opts.thresholds)
      : (confidenceFromWord(confidenceRaw) ?? 'Low');
  if (fields.length === 0) confidence = 'Low';
  else if (unresolvedFields.length > 0) confidence = capConfidence(confidence, 'Medium');

  return {
    fields,
    unresolvedFields,
    ignoredFields,
    confidence,
    ...(confidenceScore !== undefined ? { confidenceScore } : {}),
    shippingNotes: c.shipping,
    reasoning,
    sourceSections,
  };
}
