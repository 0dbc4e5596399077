import { z } from 'zod/v4';
import { TaxFieldSchema } from './tax-fields.js';

export const CONFIDENCE_LABEL_VALUES = ['High', 'Medium', 'Low'] as const;
export const ConfidenceLabelSchema = z.enum(CONFIDENCE_LABEL_VALUES);

export const FAILURE_STAGE_VALUES = ['config', 'fetch', 'llm', 'parse'] as const;
export const FailureStageSchema = z.enum(FAILURE_STAGE_VALUES);

export const ExtractedFieldSchema = z.object({
  field: TaxFieldSchema,
  label: z.string(),
  summary: z.string().min(1),
  rate: z.string().optional(),
});

export const FetchAttemptSchema = z.object({
  url: z.string(),
  ok: z.boolean(),
  status: z.number().int().optional(),
  reason: z.string().optional(),
});

/** One report row: a state whose page was fetched, analysed and parsed. */
export const ExtractionRecordSchema = z.object({
  stateName: z.string(),
  stateCode: z.string().length(2),
  entityType: z.string(),
  industry: z.string(),
  nexusStandard: z.string(),
  nexusEffectiveDate: z.string(),
  salesFactorMethod: z.string(),
  salesFactorDate: z.string(),
  fields: z.array(ExtractedFieldSchema),
  taxBaseSummary: z.string(),
  unresolvedFields: z.array(TaxFieldSchema),
  confidence: ConfidenceLabelSchema,
  confidenceScore: z.number().min(0).max(100).optional(),
  sourceUrl: z.string(),
  shippingNotes: z.array(z.string()),
  sanityWarnings: z.array(z.string()),
  reasoning: z.string(),
  model: z.string(),
  extractedAt: z.string(),
});

export const FailedStateSchema = z.object({
  stateCode: z.string(),
  stateName: z.string().optional(),
  stage: FailureStageSchema,
  reason: z.string(),
  attempts: z.array(FetchAttemptSchema).optional(),
});

export const ReasoningLogEntrySchema = z.object({
  stateCode: z.string(),
  timestamp: z.string(),
  status: z.enum(['success', 'failure']),
  text: z.string(),
});
