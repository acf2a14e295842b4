#!/usr/bin/env node
import { getLogger } from '@coinbridge/logger';
import { Command } from 'commander';

import { registerNetworksCommand } from './features/networks/networks.js';
import { registerResolveCommand } from './features/resolve/resolve.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('coinbridge')
    .description('Match coin listings across exchanges by symbol and contract')
    .version('0.1.0')
    .exitOverride((error) => {
      // Help and version exit 0; every other commander error is a usage error
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    });

  // Resolve command - cross-venue listing lookup
  registerResolveCommand(program);

  // Networks command - alias table lookup
  registerNetworksCommand(program);

  await program.parseAsync();
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Unhandled CLI failure');
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
