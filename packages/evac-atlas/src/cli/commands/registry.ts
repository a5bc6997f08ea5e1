/**
 * Registry Commands
 *
 * Inspect the county reference registry:
 * - counties <state>: every county of a state, in reference order
 * - lookup <state> <county>: FIPS for a county name, after the resolver's cleaning
 *
 * Usage:
 *   evac-atlas registry counties FL --format csv
 *   evac-atlas registry lookup VA "City of Suffolk"
 */

import type { Command } from 'commander';

import { ReferenceRegistry } from '../../registry/reference-registry.js';
import { cleanCountyName, createResolver } from '../../resolution/resolver.js';
import { EXIT_CODES, type CommandContext, type ContextProvider, type ExitCode } from '../lib/context.js';
import {
  OUTPUT_FORMATS,
  formatJson,
  formatOutput,
  isOutputFormat,
  printOutput,
  type TableColumn,
} from '../lib/output.js';

interface CountiesOptions {
  readonly format: string;
}

const COUNTY_COLUMNS: readonly TableColumn[] = [
  { key: 'state', header: 'ST' },
  { key: 'countyName', header: 'County' },
  { key: 'fips', header: 'FIPS' },
];

async function loadRegistry(context: CommandContext): Promise<ReferenceRegistry> {
  return ReferenceRegistry.load(context.config.paths.reference, { logger: context.logger });
}

/**
 * List the counties of one state
 *
 * Unknown states print nothing and exit with ERRORS.
 */
export async function runCounties(
  state: string,
  options: CountiesOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { format } = options;
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid format: ${format}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  const code = state.toUpperCase();
  const registry = await loadRegistry(context);
  if (!registry.hasState(code)) {
    context.logger.error('State not in reference registry', { state: code });
    return EXIT_CODES.ERRORS;
  }

  const rows = registry.allCountiesOf(code).map((countyName) => ({
    state: code,
    countyName,
    fips: registry.lookup(code, countyName),
  }));
  printOutput(formatOutput(rows, format, COUNTY_COLUMNS));
  return EXIT_CODES.SUCCESS;
}

/**
 * Look up one county name the way the resolver would
 */
export async function runLookup(
  state: string,
  county: string,
  context: CommandContext
): Promise<ExitCode> {
  const code = state.toUpperCase();
  const registry = await loadRegistry(context);
  const resolver = createResolver(registry, { logger: context.logger });

  const cleaned = cleanCountyName(code, county);
  const fips = resolver.lookup(code, county);

  if (context.config.json) {
    printOutput(formatJson({ state: code, input: county, cleaned, fips }, false));
  } else {
    printOutput(fips === null ? `${code} ${cleaned}: not found` : `${code} ${cleaned}: ${fips}`);
  }

  return fips === null ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}

/**
 * Register registry subcommands
 */
export function registerRegistryCommands(
  program: Command,
  getContext: ContextProvider,
  setExitCode: (code: ExitCode) => void
): void {
  const registry = program.command('registry').description('Inspect the county reference registry');

  registry
    .command('counties')
    .description('List every county of a state')
    .argument('<state>', 'Two-letter state abbreviation')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (state: string, options: CountiesOptions) => {
      setExitCode(await runCounties(state, options, getContext()));
    });

  registry
    .command('lookup')
    .description('Clean a county name and look up its FIPS code')
    .argument('<state>', 'Two-letter state abbreviation')
    .argument('<county>', 'County name as it appears in an order')
    .action(async (state: string, county: string) => {
      setExitCode(await runLookup(state, county, getContext()));
    });
}
