import { Logger } from './types';

/**
 * Default for library calls; the CLI passes console instead
 */
export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
