/**
 * Error line written to stdout when a command fails, so a consumer reading
 * JSON lines sees the failure in-band.
 */
export interface CLIErrorResponse {
  success: false;
  command: string;
  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;
  error: {
    /** Machine-readable error code */
    code: string;
    message: string;
    /** DomainError payload, when the failure carries one */
    details?: unknown;
    /** Stack trace (development only) */
    stack?: string | undefined;
  };
}

export function createErrorResponse(command: string, error: Error, code: string, details?: unknown): CLIErrorResponse {
  const errorObj: CLIErrorResponse['error'] = { code, message: error.message };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    command,
    error: errorObj,
    success: false,
    timestamp: new Date().toISOString(),
  };
}
