import { formatError } from '../errors.js';
import { commands } from './registry.js';

export const DEFAULT_COMMAND = 'extract';

function usage(): string {
  return `Usage: statetax <command> [--flags]\n\nCommands:\n  ${Object.keys(commands).sort().join('\n  ')}`;
}

/** Run one command and resolve to the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const [first, ...rest] = argv;
  if (first === 'help' || first === '--help') {
    console.log(usage());
    return 0;
  }
  // bare flags run the default command
  const [cmd, args] = !first || first.startsWith('--') ? [DEFAULT_COMMAND, argv] : [first, rest];

  const fn = commands[cmd];
  if (!fn) {
    console.error(`Unknown command: ${cmd}\n\n${usage()}`);
    return 1;
  }

  try {
    await fn(args);
    return 0;
  } catch (err) {
    console.error(`✖ ${cmd} failed: ${formatError(err)}`);
    return 1;
  }
}
