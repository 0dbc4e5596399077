import { z } from 'zod/v4';
import { TAX_FIELD_VALUES, TaxFieldSchema, TaxTypeSchema } from './tax-fields.js';

const trimmed = z.string().trim().min(1);

// YAML turns bare years (2008) and percentages without quotes into numbers.
const looseText = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const canonicalField = (raw: string) =>
  TAX_FIELD_VALUES.find((f) => f.toLowerCase() === raw.trim().toLowerCase()) ?? raw.trim();

export const ExtractionHintsSchema = z.object({
  keywords: z.array(trimmed).default([]),
  shipping_keywords: z.array(trimmed).default([]),
  known_rates: z.array(looseText).default([]),
});

export const FallbackSelectorsSchema = z.object({
  content_area: z.array(trimmed).default([]),
});

/** One state config file as written on disk (snake_case keys). */
export const StateConfigFileSchema = z.object({
  state_name: trimmed,
  state_code: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/, 'state_code must be a two-letter code')
    .transform((s) => s.toUpperCase()),
  base_url: z.url(),
  tax_definitions_url: z.url(),
  backup_urls: z.array(z.url()).default([]),
  entity_type: trimmed.default('C_corp'),
  industry: trimmed.default('shipping'),
  included_fields: z
    .array(z.string().transform(canonicalField).pipe(TaxFieldSchema))
    .min(1, 'included_fields must list at least one tax field'),
  tax_types: z.array(TaxTypeSchema).min(1),
  extraction_hints: ExtractionHintsSchema,
  nexus_standard: trimmed,
  nexus_effective_date: looseText,
  sales_factor_method: trimmed,
  sales_factor_date: looseText,
  fallback_selectors: FallbackSelectorsSchema.optional(),
});

/** Normalised, camelCase view used throughout the pipeline. */
export const StateConfigSchema = StateConfigFileSchema.transform((raw) => ({
  stateName: raw.state_name,
  stateCode: raw.state_code,
  baseUrl: raw.base_url,
  taxDefinitionsUrl: raw.tax_definitions_url,
  backupUrls: raw.backup_urls,
  entityType: raw.entity_type,
  industry: raw.industry,
  includedFields: [...new Set(raw.included_fields)],
  taxTypes: raw.tax_types,
  extractionHints: {
    keywords: raw.extraction_hints.keywords,
    shippingKeywords: raw.extraction_hints.shipping_keywords,
    knownRates: raw.extraction_hints.known_rates,
  },
  nexusStandard: raw.nexus_standard,
  nexusEffectiveDate: raw.nexus_effective_date,
  salesFactorMethod: raw.sales_factor_method,
  salesFactorDate: raw.sales_factor_date,
  fallbackSelectors: {
    contentArea: raw.fallback_selectors?.content_area ?? [],
  },
}));
