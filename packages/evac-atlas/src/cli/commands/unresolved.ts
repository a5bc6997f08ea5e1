/**
 * Unresolved Command
 *
 * Print county names that could not be given a FIPS code, grouped and
 * counted, as a worklist for extending the correction tables.
 *
 * Usage:
 *   evac-atlas unresolved <file> [--format table|json|ndjson|csv] [--rejected]
 */

import type { Command } from 'commander';

import { EXIT_CODES, type CommandContext, type ContextProvider, type ExitCode } from '../lib/context.js';
import {
  OUTPUT_FORMATS,
  UNRESOLVED_SUMMARY_COLUMNS,
  formatOutput,
  isOutputFormat,
  printOutput,
  type TableColumn,
} from '../lib/output.js';
import { resolveAlertFile } from '../lib/resolution.js';

export interface UnresolvedOptions {
  readonly format: string;
  readonly rejected?: boolean;
}

const REJECTED_COLUMNS: readonly TableColumn[] = [
  { key: 'state', header: 'ST', width: 2 },
  { key: 'eventName', header: 'Event', width: 24 },
  { key: 'year', header: 'Year', width: 4 },
  { key: 'fragment', header: 'Fragment', width: 30 },
];

/**
 * Execute the unresolved command
 *
 * Exits with WARNINGS when anything is listed.
 */
export async function runUnresolved(
  file: string,
  options: UnresolvedOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { format } = options;
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid format: ${format}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  context.logger.commandStart('unresolved', { file });
  const { result } = await resolveAlertFile(file, context);

  const listed = options.rejected
    ? formatOutput(result.rejected, format, REJECTED_COLUMNS)
    : formatOutput(result.unresolvedSummary, format, UNRESOLVED_SUMMARY_COLUMNS);
  printOutput(listed);

  const count = options.rejected ? result.rejected.length : result.unresolvedSummary.length;
  context.logger.commandEnd(true, { listed: count, unknownStates: result.unknownStates.length });

  return count === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

/**
 * Register the unresolved command
 */
export function registerUnresolvedCommand(
  program: Command,
  getContext: ContextProvider,
  setExitCode: (code: ExitCode) => void
): void {
  program
    .command('unresolved')
    .description('Summarize county names that did not resolve')
    .argument('<file>', 'Delimited evacuation-order file')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .option('--rejected', 'List fragments discarded by the normalizer instead')
    .action(async (file: string, options: UnresolvedOptions) => {
      setExitCode(await runUnresolved(file, options, getContext()));
    });
}
