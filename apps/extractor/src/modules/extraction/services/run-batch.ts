import type { ExtractionRecord, FailedState, ReasoningLogEntry } from '@statetax/types';
import { formatError } from '../../../lib/errors.js';
import { createLogger } from '../../../lib/logger.js';
import { stageFailures, statesProcessed } from '../../../lib/metrics.js';
import {
  applyOverrides,
  type StateConfigLoad,
  type StateOverrides,
} from '../../state-configs/services/load-state-configs.js';
import {
  type ExtractStateDeps,
  extractState,
  failedOutcome,
  type PageText,
  type StateOutcome,
} from './extract-state.js';

const log = createLogger('run-batch');

export type RunBatchDeps = ExtractStateDeps & { overrides?: StateOverrides };

export type BatchResult = {
  outcomes: StateOutcome[];
  records: ExtractionRecord[];
  failures: FailedState[];
  log: ReasoningLogEntry[];
  pages: PageText[];
};

/**
 * Process states one at a time in input order. Config load failures are carried
 * through as failed outcomes so every requested state gets a log entry.
 */
export async function runBatch(loads: readonly StateConfigLoad[], deps: RunBatchDeps): Promise<BatchResult> {
  const now = deps.now ?? (() => new Date());
  const result: BatchResult = { outcomes: [], records: [], failures: [], log: [], pages: [] };

  for (const load of loads) {
    let outcome: StateOutcome;
    if (load.ok) {
      const config = deps.overrides ? applyOverrides(load.config, deps.overrides) : load.config;
      outcome = await extractState(config, deps);
    } else {
      statesProcessed.inc({ stateCode: load.stateCode, outcome: 'failure' });
      stageFailures.inc({ stateCode: load.stateCode, stage: 'config' });
      outcome = failedOutcome(
        { stateCode: load.stateCode, stage: 'config', reason: formatError(load.error) },
        now()
      );
    }

    result.outcomes.push(outcome);
    result.log.push(outcome.log);
    if (outcome.ok) {
      result.records.push(outcome.record);
      result.pages.push(outcome.page);
    } else {
      result.failures.push(outcome.failure);
    }
  }

  log.info(
    { states: loads.length, succeeded: result.records.length, failed: result.failures.length },
    'batch finished'
  );
  return result;
}
