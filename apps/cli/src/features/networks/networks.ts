import { defaultNetworkStandardizer } from '@coinbridge/asset-identity';
import type { Command } from 'commander';
import { z } from 'zod';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { NetworksCommandOptionsSchema } from '../shared/schemas.js';

import { formatStandardizedLabels, standardizeLabels } from './networks-utils.js';

const LabelsArgumentSchema = z.array(z.string()).min(1, 'At least one network label is required');

/**
 * Register the networks command.
 */
export function registerNetworksCommand(program: Command): void {
  program
    .command('networks')
    .description('Show the canonical code each network label standardizes to')
    .argument('<label...>', 'Network labels as venues spell them, e.g. "BNB Smart Chain (BEP20)"')
    .option('--json', 'Output results in JSON format')
    .action((rawLabels: unknown, rawOptions: unknown) => {
      executeNetworksCommand(rawLabels, rawOptions);
    });
}

function executeNetworksCommand(rawLabels: unknown, rawOptions: unknown): void {
  const optionsResult = NetworksCommandOptionsSchema.safeParse(rawOptions);
  const output = new OutputManager(optionsResult.success && optionsResult.data.json ? 'json' : 'text');

  if (!optionsResult.success) {
    output.error(
      'networks',
      new Error(optionsResult.error.issues[0]?.message || 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const labelsResult = LabelsArgumentSchema.safeParse(rawLabels);
  if (!labelsResult.success) {
    output.error(
      'networks',
      new Error(labelsResult.error.issues[0]?.message || 'Invalid labels'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const entries = standardizeLabels(labelsResult.data, defaultNetworkStandardizer);
  output.text(formatStandardizedLabels(entries));
  output.success('networks', { labels: entries });
}
