import type { Command } from '../runtime.js';
import { flagStr, parseFlags } from '../runtime.js';
import { DEFAULT_STATE_CONFIGS_DIR } from '../../env.js';
import { formatError } from '../../errors.js';
import { loadStateConfigs } from '../../../modules/state-configs/services/load-state-configs.js';

const configsDirFrom = (args: string[]) =>
  flagStr(parseFlags(args), 'configs') ?? (process.env.STATE_CONFIGS_DIR?.trim() || DEFAULT_STATE_CONFIGS_DIR);

/** Load every config in the directory; fails when any of them is invalid. */
export const configsValidate: Command = async (args) => {
  const dir = configsDirFrom(args);
  const loads = await loadStateConfigs(dir);
  if (loads.length === 0) throw new Error(`No state configs found in ${dir}`);

  const lines = loads.map((l) =>
    l.ok ? `✔ ${l.stateCode}  ${l.config.stateName}` : `✖ ${l.stateCode}  ${formatError(l.error)}`
  );
  console.log(lines.join('\n'));

  const bad = loads.filter((l) => !l.ok).length;
  if (bad > 0) throw new Error(`${bad} of ${loads.length} state config(s) invalid`);
};

/** Code, name and primary URL of each valid config. */
export const configsList: Command = async (args) => {
  const loads = await loadStateConfigs(configsDirFrom(args));
  const rows = loads.flatMap((l) =>
    l.ok ? [`${l.stateCode}  ${l.config.stateName}  ${l.config.taxDefinitionsUrl}`] : []
  );
  console.log(rows.join('\n'));
};
