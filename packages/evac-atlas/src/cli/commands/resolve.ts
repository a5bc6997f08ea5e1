/**
 * Resolve Command
 *
 * Run the resolution pipeline over an evacuation-order file and write the
 * county-level dataset.
 *
 * Usage:
 *   evac-atlas resolve <file> [options]
 *
 * Options:
 *   --format <fmt>       csv | ndjson | json (default: csv)
 *   -o, --output <path>  Write to a file (relative to paths.output) instead of stdout
 *   --keep-unresolved    Append unresolved rows, with a Reason column
 */

import { resolve as resolvePath } from 'node:path';
import type { Command } from 'commander';

import { finalizeDataset } from '../../pipeline/orchestrator.js';
import type { ResolvedCountyRecord, UnresolvedRecord } from '../../core/types.js';
import { EXIT_CODES, type CommandContext, type ContextProvider, type ExitCode } from '../lib/context.js';
import {
  RESOLVED_COLUMNS,
  datasetColumns,
  formatOutput,
  isOutputFormat,
  printOutput,
  toDatasetRow,
  writeOutputFile,
  type OutputFormat,
} from '../lib/output.js';
import { resolveAlertFile } from '../lib/resolution.js';

export interface ResolveOptions {
  readonly format: string;
  readonly output?: string;
  readonly keepUnresolved?: boolean;
}

const DATASET_FORMATS: readonly OutputFormat[] = ['csv', 'ndjson', 'json'];

/**
 * Parse a dataset format flag
 *
 * @throws Error for table or unknown formats
 */
export function parseDatasetFormat(format: string): OutputFormat {
  if (!isOutputFormat(format) || !DATASET_FORMATS.includes(format)) {
    throw new Error(`Invalid format: ${format}. Must be one of: ${DATASET_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Write to the output path when one is given, stdout otherwise
 */
export async function emitDataset(
  content: string,
  output: string | undefined,
  context: CommandContext
): Promise<void> {
  if (output === undefined) {
    printOutput(content);
    return;
  }
  const path = resolvePath(context.config.paths.output, output);
  await writeOutputFile(path, content);
  context.logger.info('Dataset written', { path });
}

/**
 * Execute the resolve command
 */
export async function runResolve(
  file: string,
  options: ResolveOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  const format = parseDatasetFormat(options.format);

  logger.commandStart('resolve', { file, format });

  const { result, issues } = await resolveAlertFile(file, context);

  const records: (ResolvedCountyRecord | UnresolvedRecord)[] = options.keepUnresolved
    ? [...result.resolved, ...result.unresolved]
    : [...finalizeDataset(result, logger)];
  const base = options.keepUnresolved
    ? [...RESOLVED_COLUMNS, { key: 'Reason', header: 'Reason' }]
    : RESOLVED_COLUMNS;

  const content = formatOutput(records.map(toDatasetRow), format, datasetColumns(records, base));
  await emitDataset(content, options.output, context);

  const clean = result.unresolved.length === 0 && issues.length === 0;
  logger.commandEnd(true, {
    resolved: result.stats.resolved,
    unresolved: result.stats.unresolved,
    rejectedFragments: result.stats.rejectedFragments,
    invalidRows: issues.length,
  });

  return clean ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

/**
 * Register the resolve command
 */
export function registerResolveCommand(
  program: Command,
  getContext: ContextProvider,
  setExitCode: (code: ExitCode) => void
): void {
  program
    .command('resolve')
    .description('Resolve an evacuation-order file to FIPS-coded county records')
    .argument('<file>', 'Delimited evacuation-order file')
    .option('--format <fmt>', 'Output format: csv|ndjson|json', 'csv')
    .option('-o, --output <path>', 'Output file (relative to paths.output); stdout when omitted')
    .option('--keep-unresolved', 'Include unresolved rows with a Reason column')
    .action(async (file: string, options: ResolveOptions) => {
      setExitCode(await runResolve(file, options, getContext()));
    });
}
