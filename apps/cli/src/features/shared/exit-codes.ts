/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Resource not found (dump file, asset history) */
  NOT_FOUND: 4,

  /** Database error */
  DATABASE_ERROR: 7,

  /** Configuration error */
  CONFIG_ERROR: 11,

  /** A transaction source failed for the whole wallet/chain batch */
  UPSTREAM_ERROR: 12,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}

/**
 * Machine-readable name of an exit code
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  for (const [name, code] of Object.entries(ExitCodes)) {
    if (code === exitCode) return name;
  }
  return 'UNKNOWN_ERROR';
}
