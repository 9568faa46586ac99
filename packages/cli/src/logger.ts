import { consola } from 'consola';
import type { Logger } from '@tailwarden/types';

/**
 * Route engine and client logging through consola.
 */
export function createCliLogger(): Logger {
  return {
    info: (msg, ...args) => consola.info(msg, ...args),
    warn: (msg, ...args) => consola.warn(msg, ...args),
    error: (msg, ...args) => consola.error(msg, ...args),
    debug: (msg, ...args) => consola.debug(msg, ...args),
  };
}

/** consola's debug level */
const DEBUG_LEVEL = 4;

export function setVerbose(verbose: boolean): void {
  if (verbose) {
    consola.level = DEBUG_LEVEL;
  }
}
