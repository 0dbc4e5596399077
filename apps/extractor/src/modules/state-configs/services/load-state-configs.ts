import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import YAML from 'yaml';
import { type StateConfig, StateConfigSchema } from '@statetax/types';
import { ConfigError, formatError } from '../../../lib/errors.js';
import { createLogger } from '../../../lib/logger.js';

const log = createLogger('state-configs');

const CONFIG_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

/** Priority states processed when no --states flag is given. */
export const DEFAULT_STATE_CODES = ['NY', 'CA', 'TX', 'FL', 'IL'] as const;

export type StateConfigLoad =
  | { ok: true; stateCode: string; file: string; config: StateConfig }
  | { ok: false; stateCode: string; file?: string; error: ConfigError };

export type StateOverrides = { entityType?: string; industry?: string };

function parseDocument(file: string, text: string): unknown {
  try {
    return extname(file).toLowerCase() === '.json' ? JSON.parse(text) : YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`Could not parse ${basename(file)}: ${formatError(err)}`, {
      file,
      cause: err,
    });
  }
}

/** Read and validate one config file. Throws ConfigError on any problem. */
export async function loadStateConfigFile(file: string): Promise<StateConfig> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError(`Could not read ${file}: ${formatError(err)}`, { file, cause: err });
  }

  const parsed = StateConfigSchema.safeParse(parseDocument(file, text));
  if (!parsed.success) {
    throw new ConfigError(`Invalid state config ${basename(file)}`, {
      file,
      issues: parsed.error.issues.map((i) => ({ path: i.path.map(String).join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

async function listConfigFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && CONFIG_EXTENSIONS.some((ext) => e.name.toLowerCase().endsWith(ext)))
    .map((e) => join(dir, e.name))
    .sort();
}

function findFileForCode(files: string[], code: string): string | undefined {
  const wanted = code.toLowerCase();
  for (const ext of CONFIG_EXTENSIONS) {
    const hit = files.find((f) => basename(f).toLowerCase() === `${wanted}${ext}`);
    if (hit) return hit;
  }
  return undefined;
}

/**
 * Load configs for the requested state codes (in the order given), or every config
 * in the directory when `codes` is empty. A bad file fails only its own state.
 */
export async function loadStateConfigs(
  dir: string,
  codes: readonly string[] = []
): Promise<StateConfigLoad[]> {
  const files = await listConfigFiles(dir);
  const wanted = [...new Set(codes.map((c) => c.trim().toUpperCase()).filter(Boolean))];

  const targets: Array<{ stateCode: string; file?: string }> = wanted.length
    ? wanted.map((stateCode) => ({ stateCode, file: findFileForCode(files, stateCode) }))
    : files.map((file) => ({
        stateCode: basename(file, extname(file)).toUpperCase(),
        file,
      }));

  const seen = new Map<string, string>();
  const out: StateConfigLoad[] = [];

  for (const { stateCode, file } of targets) {
    if (!file) {
      const error = new ConfigError(`No config file for ${stateCode} in ${dir}`);
      log.warn({ stateCode, dir }, 'state config not found');
      out.push({ ok: false, stateCode, error });
      continue;
    }

    try {
      const config = await loadStateConfigFile(file);
      if (wanted.length && config.stateCode !== stateCode) {
        throw new ConfigError(
          `${basename(file)} declares state_code ${config.stateCode}, expected ${stateCode}`,
          { file }
        );
      }
      const previous = seen.get(config.stateCode);
      if (previous) {
        throw new ConfigError(
          `Duplicate state_code ${config.stateCode} (already defined in ${basename(previous)})`,
          { file }
        );
      }
      seen.set(config.stateCode, file);
      out.push({ ok: true, stateCode: config.stateCode, file, config });
    } catch (err) {
      const error =
        err instanceof ConfigError ? err : new ConfigError(formatError(err), { file, cause: err });
      log.warn({ stateCode, file, err: formatError(error) }, 'state config rejected');
      out.push({ ok: false, stateCode, file, error });
    }
  }

  return out;
}

/** Apply run-wide entity type / industry overrides without mutating the loaded config. */
export function applyOverrides(config: StateConfig, overrides: StateOverrides): StateConfig {
  const entityType = overrides.entityType?.trim();
  const industry = overrides.industry?.trim();
  if (!entityType && !industry) return config;
  return {
    ...config,
    entityType: entityType || config.entityType,
    industry: industry || config.industry,
  };
}

/** Primary URL first, then backups in listed order, each URL once. */
export function candidateUrls(config: Pick<StateConfig, 'taxDefinitionsUrl' | 'backupUrls'>): string[] {
  return [...new Set([config.taxDefinitionsUrl, ...config.backupUrls])];
}
