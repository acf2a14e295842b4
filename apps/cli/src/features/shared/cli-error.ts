import type { ExitCode } from './exit-codes.js';

/**
 * An error that knows which exit code it maps to.
 * Handlers return it in the error channel; commands turn it into an exit.
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode
  ) {
    super(message);
    this.name = 'CliError';
  }
}
