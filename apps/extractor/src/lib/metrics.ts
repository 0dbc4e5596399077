import { writeFile } from 'node:fs/promises';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export const registry = new Registry();

export const statesProcessed = new Counter({
  name: 'statetax_states_processed_total',
  help: 'States run through the extraction pipeline, by outcome.',
  labelNames: ['stateCode', 'outcome'] as const,
  registers: [registry],
});

export const stageFailures = new Counter({
  name: 'statetax_stage_failures_total',
  help: 'Per-state failures by pipeline stage.',
  labelNames: ['stateCode', 'stage'] as const,
  registers: [registry],
});

export const stateDuration = new Histogram({
  name: 'statetax_state_duration_seconds',
  help: 'Wall time of one state pipeline (fetch, prompt, LLM call, parse).',
  labelNames: ['stateCode'] as const,
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [registry],
});

export const runErrors = new Counter({
  name: 'statetax_run_errors_total',
  help: 'CLI runs that aborted before producing output.',
  labelNames: ['job'] as const,
  registers: [registry],
});

export const lastRun = new Gauge({
  name: 'statetax_last_run_timestamp',
  help: 'UNIX timestamp (seconds) of the last completed run.',
  labelNames: ['job'] as const,
  registers: [registry],
});

export function startStateTimer(stateCode: string) {
  const end = stateDuration.startTimer({ stateCode });
  return () => end();
}

export function setLastRunNow(job: string) {
  lastRun.set({ job }, Date.now() / 1000);
}

/** Dump the registry in Prometheus text format (node_exporter textfile collector). */
export async function writeMetricsFile(path: string): Promise<void> {
  await writeFile(path, await registry.metrics(), 'utf8');
}
