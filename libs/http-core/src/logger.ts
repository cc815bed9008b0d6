import { format } from 'node:util';
import type { Logger } from './types';

/**
 * Logger that writes printf-style lines to stdout.
 */
export const consoleLogger: Logger = {
  printf(fmt: string, ...args: unknown[]): void {
    console.log(format(fmt, ...args));
  },
};

const formatArg = (arg: unknown): string => {
  if (typeof arg === 'string') {
    return arg;
  }
  const json = JSON.stringify(arg);
  return json === undefined ? String(arg) : json;
};

/**
 * Logs `name(arg1, arg2)`. Strings appear verbatim, everything else as JSON.
 * Callers decide which arguments are safe to pass.
 */
export function logCall(logger: Logger | undefined, methodName: string, ...args: unknown[]): void {
  if (!logger) {
    return;
  }
  logger.printf('%s(%s)', methodName, args.map(formatArg).join(', '));
}
