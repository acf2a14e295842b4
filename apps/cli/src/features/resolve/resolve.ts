import { setLoggerTransports } from '@coinbridge/logger';
import type { Command } from 'commander';
import type { z } from 'zod';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ResolveCommandOptionsSchema, SymbolArgumentSchema } from '../shared/schemas.js';

import { ResolveHandler } from './resolve-handler.js';
import { formatResolveReport } from './resolve-utils.js';

/**
 * Command options (validated at CLI boundary).
 */
export type ResolveCommandOptions = z.infer<typeof ResolveCommandOptionsSchema>;

/**
 * Register the resolve command.
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Find every venue listing of an asset, by symbol and by shared contract')
    .argument('<symbol>', 'Ticker to look up, e.g. CAT or SATS')
    .option('--config <path>', 'Venue config file (default: coinbridge.config.json)')
    .option('--timeout <ms>', 'Per-venue fetch timeout in milliseconds')
    .option('--json', 'Output results in JSON format')
    .action(async (rawSymbol: unknown, rawOptions: unknown) => {
      await executeResolveCommand(rawSymbol, rawOptions);
    });
}

async function executeResolveCommand(rawSymbol: unknown, rawOptions: unknown): Promise<void> {
  const optionsResult = ResolveCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    new OutputManager('text').error(
      'resolve',
      new Error(optionsResult.error.issues[0]?.message || 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = optionsResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  // Keep JSON output clean for piping
  if (output.isJsonMode()) {
    setLoggerTransports({ console: false });
  }

  const symbolResult = SymbolArgumentSchema.safeParse(rawSymbol);
  if (!symbolResult.success) {
    output.error(
      'resolve',
      new Error(symbolResult.error.issues[0]?.message || 'Invalid symbol'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  try {
    const handler = new ResolveHandler();
    const result = await handler.execute({
      symbol: symbolResult.data,
      configPath: options.config,
      timeoutMs: options.timeout,
    });

    if (result.isErr()) {
      output.error('resolve', result.error, result.error.exitCode);
      return;
    }

    const data = result.value;
    output.text(formatResolveReport(data));
    output.success('resolve', data);
  } catch (error) {
    output.error('resolve', error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }
}
