import pino from 'pino';
import { formatError } from './errors.js';

const level = process.env.LOG_LEVEL || 'info';
const pretty = process.env.LOG_PRETTY === '1' || (process.stdout.isTTY && !process.env.VITEST);

let transport: pino.DestinationStream | undefined;
let prettyError: string | undefined;
if (pretty && level !== 'silent') {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch (err) {
    prettyError = formatError(err);
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });
if (prettyError) rootLogger.warn({ err: prettyError }, 'pino-pretty unavailable, logging JSON');

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
