import type {
  ExtractionRecord,
  FailedState,
  FailureStage,
  ReasoningLogEntry,
  StateConfig,
} from '@statetax/types';
import { type ConfidenceThresholds, DEFAULT_CONFIDENCE_THRESHOLDS } from '../../../lib/env.js';
import { ExtractionError, FetchFailure, formatError } from '../../../lib/errors.js';
import { createLogger } from '../../../lib/logger.js';
import { stageFailures, startStateTimer, statesProcessed } from '../../../lib/metrics.js';
import { extractPageContent } from '../../pages/services/extract-content.js';
import { fetchFirstAvailable, type PageFetcher } from '../../pages/services/fetch-page.js';
import { candidateUrls } from '../../state-configs/services/load-state-configs.js';
import type { LlmClient } from './llm/client.js';
import {
  buildTaxExtractionPrompt,
  displayEntity,
  taxExtractionSystemPrompt,
} from './llm/prompts/tax-extraction.js';
import { type ParsedTaxResponse, parseTaxResponse } from './parse-response.js';
import { checkKnownRates } from './sanity-check.js';

const log = createLogger('extract-state');

export const NO_RATES_SUMMARY = 'No applicable rates found';

export type ExtractStateDeps = {
  llm: LlmClient;
  fetchPage?: PageFetcher;
  pageTimeoutMs?: number;
  thresholds?: ConfidenceThresholds;
  now?: () => Date;
};

/** Cleaned page text as sent for analysis (before prompt truncation). */
export type PageText = { stateCode: string; url: string; text: string };

export type StateOutcome =
  | { ok: true; stateCode: string; record: ExtractionRecord; page: PageText; log: ReasoningLogEntry }
  | { ok: false; stateCode: string; failure: FailedState; log: ReasoningLogEntry };

export function formatSuccessLog(
  record: ExtractionRecord,
  parsed: Pick<ParsedTaxResponse, 'ignoredFields' | 'sourceSections'>
): string {
  const score = record.confidenceScore !== undefined ? ` (${record.confidenceScore})` : '';
  const lines = [
    `State: ${record.stateName} (${record.stateCode})`,
    `Entity / Industry: ${displayEntity(record.entityType)} in ${record.industry}`,
    `Source: ${record.sourceUrl}`,
    `Model: ${record.model}`,
    `Confidence: ${record.confidence}${score}`,
    `Fields: ${record.fields.map((f) => (f.rate ? `${f.field} (${f.rate})` : f.field)).join(', ') || 'none'}`,
  ];
  if (record.unresolvedFields.length) lines.push(`Unresolved: ${record.unresolvedFields.join(', ')}`);
  if (parsed.ignoredFields.length) lines.push(`Ignored (not requested): ${parsed.ignoredFields.join(', ')}`);
  if (parsed.sourceSections.length) lines.push(`Sections: ${parsed.sourceSections.join('; ')}`);
  for (const note of record.shippingNotes) lines.push(`Shipping: ${note}`);
  for (const warning of record.sanityWarnings) lines.push(`Warning: ${warning}`);
  lines.push('Reasoning:', record.reasoning);
  return lines.join('\n');
}

export function formatFailureLog(failure: FailedState): string {
  const lines = [
    `State: ${failure.stateName ? `${failure.stateName} (${failure.stateCode})` : failure.stateCode}`,
    `Stage: ${failure.stage}`,
    `Reason: ${failure.reason}`,
  ];
  if (failure.attempts?.length) {
    lines.push('Attempts:');
    for (const a of failure.attempts) {
      lines.push(`  - ${a.url}: ${a.ok ? 'ok' : (a.reason ?? 'failed')}`);
    }
  }
  return lines.join('\n');
}

/** Record a failure for a state that never reached the pipeline (bad or missing config). */
export function failedOutcome(failure: FailedState, at: Date): StateOutcome {
  return {
    ok: false,
    stateCode: failure.stateCode,
    failure,
    log: {
      stateCode: failure.stateCode,
      timestamp: at.toISOString(),
      status: 'failure',
      text: formatFailureLog(failure),
    },
  };
}

function freezeRecord(record: ExtractionRecord): ExtractionRecord {
  for (const f of record.fields) Object.freeze(f);
  Object.freeze(record.fields);
  Object.freeze(record.unresolvedFields);
  Object.freeze(record.shippingNotes);
  Object.freeze(record.sanityWarnings);
  return Object.freeze(record);
}

/**
 * Run one state through fetch → prompt → LLM → parse. Never throws: every failure
 * comes back as an outcome tagged with the stage it happened in.
 */
export async function extractState(config: StateConfig, deps: ExtractStateDeps): Promise<StateOutcome> {
  const fetchPage = deps.fetchPage ?? fetchFirstAvailable;
  const now = deps.now ?? (() => new Date());
  const { stateCode, stateName } = config;
  const endTimer = startStateTimer(stateCode);
  let stage: FailureStage = 'fetch';

  try {
    const page = await fetchPage(candidateUrls(config), { timeoutMs: deps.pageTimeoutMs, stateCode });
    const content = extractPageContent(page.body, config.fallbackSelectors.contentArea);
    if (!content.text) {
      throw new FetchFailure(`No readable text on ${page.url}`, page.attempts);
    }
    log.debug(
      { stateCode, url: page.url, selector: content.selector, chars: content.text.length },
      'page content extracted'
    );

    stage = 'llm';
    const reply = await deps.llm.complete({
      system: taxExtractionSystemPrompt,
      user: buildTaxExtractionPrompt({ content: content.text, config }),
    });

    stage = 'parse';
    const parsed = parseTaxResponse(reply.text, {
      includedFields: config.includedFields,
      thresholds: deps.thresholds ?? DEFAULT_CONFIDENCE_THRESHOLDS,
    });

    const at = now();
    const record = freezeRecord({
      stateName,
      stateCode,
      entityType: config.entityType,
      industry: config.industry,
      nexusStandard: config.nexusStandard,
      nexusEffectiveDate: config.nexusEffectiveDate,
      salesFactorMethod: config.salesFactorMethod,
      salesFactorDate: config.salesFactorDate,
      fields: parsed.fields,
      taxBaseSummary: parsed.fields.length
        ? parsed.fields.map((f) => `${f.label}: ${f.summary}`).join('\n\n')
        : NO_RATES_SUMMARY,
      unresolvedFields: parsed.unresolvedFields,
      confidence: parsed.confidence,
      ...(parsed.confidenceScore !== undefined ? { confidenceScore: parsed.confidenceScore } : {}),
      sourceUrl: page.url,
      shippingNotes: parsed.shippingNotes,
      sanityWarnings: checkKnownRates(parsed.fields, config.extractionHints.knownRates),
      reasoning: parsed.reasoning,
      model: reply.model,
      extractedAt: at.toISOString(),
    });

    statesProcessed.inc({ stateCode, outcome: 'success' });
    log.info(
      { stateCode, url: page.url, confidence: record.confidence, unresolved: record.unresolvedFields },
      'state extracted'
    );
    return {
      ok: true,
      stateCode,
      record,
      page: { stateCode, url: page.url, text: content.text },
      log: {
        stateCode,
        timestamp: record.extractedAt,
        status: 'success',
        text: formatSuccessLog(record, parsed),
      },
    };
  } catch (err) {
    const failedStage = err instanceof ExtractionError ? err.stage : stage;
    const failure: FailedState = {
      stateCode,
      stateName,
      stage: failedStage,
      reason: formatError(err),
      ...(err instanceof FetchFailure ? { attempts: err.attempts } : {}),
    };
    statesProcessed.inc({ stateCode, outcome: 'failure' });
    stageFailures.inc({ stateCode, stage: failedStage });
    log.error({ stateCode, stage: failedStage, err: failure.reason }, 'state extraction failed');
    return failedOutcome(failure, now());
  } finally {
    endTimer();
  }
}
