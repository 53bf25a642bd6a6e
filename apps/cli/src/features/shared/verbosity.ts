import { setLogLevel } from '@swaptrace/logger';

export type GlobalOptions = {
  verbose?: boolean | undefined;
};

/**
 * Raise every logger to debug when --verbose is passed. Logs go to stderr, so
 * the JSON lines on stdout are unaffected.
 */
export function applyVerbosity(options: GlobalOptions): void {
  if (options.verbose) {
    setLogLevel('debug');
  }
}
