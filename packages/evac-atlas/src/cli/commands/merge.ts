/**
 * Merge Command
 *
 * Resolve an evacuation-order file, then inner-join it with storm exposure
 * data on (storm, county FIPS, year). With --effects, the merged records are
 * inner-joined once more with a treatment-effects file of the same layout.
 *
 * Usage:
 *   evac-atlas merge <evac-file> <exposure-file> [--effects effects.csv] [--format csv] [-o merged.csv]
 */

import type { Command } from 'commander';

import { finalizeDataset } from '../../pipeline/orchestrator.js';
import {
  joinOnStormCountyYear,
  joinTreatmentEffects,
  loadExposureRows,
  type ExposureParseResult,
  type MergedRecord,
} from '../../merge/exposure-join.js';
import { EXIT_CODES, type CommandContext, type ContextProvider, type ExitCode } from '../lib/context.js';
import {
  appendColumns,
  datasetColumns,
  extendColumns,
  formatOutput,
  toDatasetRow,
  type TableColumn,
} from '../lib/output.js';
import { resolveAlertFile } from '../lib/resolution.js';
import { emitDataset, parseDatasetFormat } from './resolve.js';

export interface MergeOptions {
  readonly format: string;
  readonly output?: string;
  /** Treatment-effects file joined after the exposure data */
  readonly effects?: string;
}

/**
 * Dataset columns followed by every exposure and treatment-effect column
 */
function mergedColumns(records: readonly MergedRecord[]): TableColumn[] {
  return extendColumns(datasetColumns(records), [
    ...records.map((record) => record.exposure),
    ...records.map((record) => record.effects ?? {}),
  ]);
}

const toMergedRow = (record: MergedRecord) =>
  appendColumns(appendColumns(toDatasetRow(record), record.exposure), record.effects ?? {});

async function loadJoinRows(
  path: string,
  kind: string,
  context: CommandContext
): Promise<ExposureParseResult> {
  const parsed = await loadExposureRows(path);
  if (parsed.skipped > 0) {
    context.logger.warn(`Skipped ${kind} rows without a storm id or FIPS`, {
      path,
      skipped: parsed.skipped,
    });
  }
  return parsed;
}

/**
 * Execute the merge command
 */
export async function runMerge(
  evacFile: string,
  exposureFile: string,
  options: MergeOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;
  const format = parseDatasetFormat(options.format);

  logger.commandStart('merge', { evacFile, exposureFile, effectsFile: options.effects, format });

  const { result } = await resolveAlertFile(evacFile, context);
  const resolved = finalizeDataset(result, logger);

  const exposure = await loadJoinRows(exposureFile, 'exposure', context);
  const exposureJoin = joinOnStormCountyYear(resolved, exposure.rows);
  let merged = exposureJoin.merged;
  let unmatchedEffects = 0;

  if (options.effects !== undefined) {
    const effects = await loadJoinRows(options.effects, 'treatment-effect', context);
    const effectsJoin = joinTreatmentEffects(merged, effects.rows);
    merged = effectsJoin.merged;
    unmatchedEffects = effectsJoin.unmatched;
  }

  const content = formatOutput(merged.map(toMergedRow), format, mergedColumns(merged));
  await emitDataset(content, options.output, context);

  logger.commandEnd(true, {
    merged: merged.length,
    unmatched: exposureJoin.unmatched,
    exposureRowsConsidered: exposureJoin.exposureRowsConsidered,
    ...(options.effects !== undefined ? { unmatchedEffects } : {}),
  });

  return exposureJoin.unmatched === 0 && unmatchedEffects === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

/**
 * Register the merge command
 */
export function registerMergeCommand(
  program: Command,
  getContext: ContextProvider,
  setExitCode: (code: ExitCode) => void
): void {
  program
    .command('merge')
    .description('Resolve evacuation orders and join them with storm exposure data')
    .argument('<evac>', 'Delimited evacuation-order file')
    .argument('<exposure>', 'Comma-delimited exposure file with a storm_id column')
    .option('--effects <file>', 'Treatment-effects file joined on storm_id, FIPS and year')
    .option('--format <fmt>', 'Output format: csv|ndjson|json', 'csv')
    .option('-o, --output <path>', 'Output file (relative to paths.output); stdout when omitted')
    .action(async (evac: string, exposure: string, options: MergeOptions) => {
      setExitCode(await runMerge(evac, exposure, options, getContext()));
    });
}
