import type { Command } from './runtime.js';
import { extractStates } from './commands/extract.js';
import { configsList, configsValidate } from './commands/configs.js';

export const commands: Record<string, Command> = {
  extract: extractStates,
  'configs:list': configsList,
  'configs:validate': configsValidate,
};
