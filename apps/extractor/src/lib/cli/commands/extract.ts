import type { Command } from '../runtime.js';
import type { Flags } from '../utils.js';
import { flagCSV, flagStr, parseFlags, positionals, withRun } from '../runtime.js';
import { validateExtractorEnv } from '../../env.js';
import { writeMetricsFile } from '../../metrics.js';
import {
  DEFAULT_STATE_CODES,
  loadStateConfigs,
} from '../../../modules/state-configs/services/load-state-configs.js';
import { createLlmClient } from '../../../modules/extraction/services/llm/client.js';
import { runBatch } from '../../../modules/extraction/services/run-batch.js';
import { writeReport } from '../../../modules/reports/services/write-report.js';
import { writePageText } from '../../../modules/reports/services/write-page-text.js';
import { writeReasoningLog } from '../../../modules/reports/services/write-reasoning-log.js';

/** `--states=NY,TX` or `--states NY TX`; a bare `--states` with no codes is an error. */
export function requestedStates(flags: Flags, args: string[]): string[] {
  const bare = flags.states === 'true';
  const raw = bare ? positionals(args) : flagCSV(flags, 'states');
  const codes = raw.flatMap((s) => s.split(',')).map((s) => s.trim().toUpperCase()).filter(Boolean);
  if (bare && codes.length === 0) {
    throw new Error('--states needs state codes: --states=NY,TX or --states NY TX');
  }
  return codes;
}

/**
 * Fetch, analyse and report on each requested state.
 *
 *   extract [--states=NY,TX|all] [--entity-type=C_corp] [--industry=shipping]
 *           [--configs=<dir>] [--out=<dir>] [--metrics=<file>] [--save-page-text]
 */
export const extractStates: Command = async (args) => {
  const flags = parseFlags(args);
  // credentials are checked before any state is touched
  const env = validateExtractorEnv();

  const requested = requestedStates(flags, args);
  const states = requested.includes('ALL') ? [] : requested.length ? requested : [...DEFAULT_STATE_CODES];
  const configsDir = flagStr(flags, 'configs') ?? env.configsDir;
  const outDir = flagStr(flags, 'out') ?? env.outputDir;
  const overrides = { entityType: flagStr(flags, 'entity-type'), industry: flagStr(flags, 'industry') };
  const savePageText = flagStr(flags, 'save-page-text') === 'true';

  const summary = await withRun(
    {
      job: 'extract',
      params: {
        states: states.length ? states : 'all',
        configsDir,
        outDir,
        provider: env.llm.provider,
        model: env.llm.model,
        ...overrides,
      },
    },
    async () => {
      const loads = await loadStateConfigs(configsDir, states);
      const result = await runBatch(loads, {
        llm: createLlmClient(env.llm),
        pageTimeoutMs: env.pageTimeoutMs,
        thresholds: env.confidence,
        overrides,
      });

      const reportPath = await writeReport(result.records, { outDir });
      const logPath = await writeReasoningLog(result.log, { outDir });
      const pageTextPath = savePageText ? await writePageText(result.pages, { outDir }) : undefined;
      return { result, reportPath, logPath, pageTextPath };
    }
  );

  const metricsPath = flagStr(flags, 'metrics');
  if (metricsPath) await writeMetricsFile(metricsPath);

  const { result, reportPath, logPath, pageTextPath } = summary;
  const lines = [
    `Processed ${result.outcomes.length} state(s): ${result.records.length} succeeded, ${result.failures.length} failed`,
    ...result.records.map((r) => `  ✔ ${r.stateCode} ${r.confidence} ${r.sourceUrl}`),
    ...result.failures.map((f) => `  ✖ ${f.stateCode} [${f.stage}] ${f.reason}`),
    `Report: ${reportPath}`,
    `Reasoning log: ${logPath}`,
  ];
  if (pageTextPath) lines.push(`Page text: ${pageTextPath}`);
  if (metricsPath) lines.push(`Metrics: ${metricsPath}`);
  console.log(lines.join('\n'));
};
