import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

/**
 * Anything output can be written to; process.stdout and process.stderr qualify.
 */
export interface OutputWriter {
  write(chunk: string): unknown;
}

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  CONFIG_ERROR:
    'Check coinbridge.config.json (or the file named by COINBRIDGE_CONFIG_PATH) and the venue API key variables.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Command output goes to stdout; logs stay on stderr.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(
    private readonly format: OutputFormat = 'text',
    private readonly stdout: OutputWriter = process.stdout,
    private readonly stderr: OutputWriter = process.stderr
  ) {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Write lines of human-readable output (text mode only).
   */
  text(lines: readonly string[]): void {
    if (this.format === 'text') {
      this.stdout.write(`${lines.join('\n')}\n`);
    }
  }

  /**
   * Output a success response (JSON mode only).
   */
  success<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      this.stdout.write(`${JSON.stringify(response, undefined, 2)}\n`);
    }
  }

  /**
   * Output a warning (text mode only).
   */
  warn(message: string): void {
    if (this.format === 'text') {
      this.stderr.write(`${pc.yellow('!')} ${message}\n`);
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // Stdout, so callers can parse the response
      this.stdout.write(`${JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2)}\n`);
    } else {
      this.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

      const tip = ERROR_TIPS[errorCode];
      if (tip) {
        this.stderr.write(`\n${pc.dim(tip)}\n`);
      }
    }

    exitWithCode(exitCode);
  }
}
