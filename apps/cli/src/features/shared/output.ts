import { DomainError } from '@swaptrace/core';
import pc from 'picocolors';

import { createErrorResponse } from './cli-response.js';
import { exitCodeToErrorCode, ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

export interface OutputStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

/**
 * Writes command output as JSON lines on stdout. Human-readable notices go to
 * stderr, next to the logs.
 */
export class OutputManager {
  constructor(private readonly streams: OutputStreams = { stderr: process.stderr, stdout: process.stdout }) {}

  /**
   * Write one pre-serialized JSON line
   */
  line(json: string): void {
    this.streams.stdout.write(`${json}\n`);
  }

  json(data: unknown): void {
    this.line(JSON.stringify(data));
  }

  /**
   * Write an error line and exit with the given code.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const details = error instanceof DomainError ? error.toJSON() : undefined;
    const response = createErrorResponse(command, error, exitCodeToErrorCode(exitCode), details);

    this.line(JSON.stringify(response));
    this.streams.stderr.write(`${pc.red('Error')}: ${error.message}\n`);

    return exitWithCode(exitCode);
  }
}
