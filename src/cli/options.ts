// Research CLI options
// Flag parsing and the provider listing, kept apart from the terminal loop.

import { Command, InvalidArgumentError } from 'commander';
import type { ProviderListing } from '../providers/index.js';

export interface CliOptions {
  provider?: string;
  model?: string;
  agents?: number;
  single: boolean;
  listProviders: boolean;
  verbose: boolean;
}

function parseAgentCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1 || count > 16) {
    throw new InvalidArgumentError('Expected an integer from 1 to 16.');
  }
  return count;
}

export function createCliProgram(): Command {
  return new Command()
    .name('research-cli')
    .description('Ask questions to one agent or to a team of parallel research agents')
    .option('-p, --provider <name>', 'provider preset to use (defaults to DEFAULT_PROVIDER)')
    .option('-m, --model <model>', 'model override for the provider')
    .option('-a, --agents <count>', 'number of parallel agents', parseAgentCount)
    .option('-s, --single', 'answer with a single agent, without decomposition', false)
    .option('--list-providers', 'list provider presets and exit', false)
    .option('-v, --verbose', 'log at debug level', false);
}

/** Throws a CommanderError on bad flags instead of exiting. */
export function parseCliOptions(argv: readonly string[], program: Command = createCliProgram()): CliOptions {
  program.exitOverride();
  program.parse([...argv], { from: 'user' });
  return program.opts<CliOptions>();
}

export function formatProviderList(providers: readonly ProviderListing[], defaultProvider: string): string {
  const lines = providers.map(p => {
    const marker = p.name === defaultProvider ? '*' : ' ';
    const status = p.configured ? '' : ' (not configured)';
    return `${marker} ${p.name.padEnd(11)} ${p.displayName} - ${p.defaultModel}${status}`;
  });
  return ['Available providers (* = default):', ...lines].join('\n');
}
