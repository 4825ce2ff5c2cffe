/**
 * Console logger used by the core for diagnostics.
 *
 * Info goes to stdout and is silenced by --quiet; debug needs --verbose;
 * warnings and errors always go to stderr.
 */

import { c, formatWarning } from './format.js';
import type { Logger } from './types.js';

export interface LoggerOptions {
  quiet?: boolean | undefined;
  verbose?: boolean | undefined;
}

export function createConsoleLogger(options: LoggerOptions = {}): Logger {
  return {
    debug(message: string): void {
      if (options.verbose) {
        console.error(c.muted(message));
      }
    },
    info(message: string): void {
      if (!options.quiet) {
        console.log(message);
      }
    },
    warn(message: string): void {
      console.error(formatWarning(message));
    },
    error(message: string): void {
      console.error(c.error(message));
    },
  };
}

