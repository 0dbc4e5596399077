import { z } from 'zod/v4';
import {
  ConfidenceLabelSchema,
  ExtractedFieldSchema,
  ExtractionRecordSchema,
  FailedStateSchema,
  FailureStageSchema,
  FetchAttemptSchema,
  ReasoningLogEntrySchema,
} from '../schemas/index.js';

export type ConfidenceLabel = z.infer<typeof ConfidenceLabelSchema>;
export type FailureStage = z.infer<typeof FailureStageSchema>;
export type ExtractedField = z.infer<typeof ExtractedFieldSchema>;
export type FetchAttempt = z.infer<typeof FetchAttemptSchema>;
export type ExtractionRecord = z.infer<typeof ExtractionRecordSchema>;
export type FailedState = z.infer<typeof FailedStateSchema>;
export type ReasoningLogEntry = z.infer<typeof ReasoningLogEntrySchema>;
