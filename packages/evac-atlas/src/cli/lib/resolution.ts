/**
 * Shared resolve step for the resolve, unresolved and merge commands
 *
 * @module cli/lib/resolution
 */

import { loadAlertRecords, type AlertRowIssue } from '../../ingestion/alert-loader.js';
import { runResolutionPipeline, type PipelineResult } from '../../pipeline/orchestrator.js';
import { ReferenceRegistry } from '../../registry/reference-registry.js';
import type { CommandContext } from './context.js';

export interface FileResolution {
  readonly result: PipelineResult;
  /** Input rows rejected before the pipeline (bad state, year, ...) */
  readonly issues: readonly AlertRowIssue[];
  readonly registry: ReferenceRegistry;
}

/**
 * Load the registry and alert file, then run the pipeline
 *
 * @throws ReferenceLoadError when the registry cannot be built
 * @throws AlertFileError when the alert file cannot be read
 */
export async function resolveAlertFile(
  file: string,
  context: CommandContext
): Promise<FileResolution> {
  const { config, logger } = context;

  const registry = await ReferenceRegistry.load(config.paths.reference, { logger });
  logger.debug('Reference registry loaded', {
    path: config.paths.reference,
    states: registry.stateCount,
    counties: registry.size,
  });

  const { records, issues } = await loadAlertRecords(file, {
    delimiter: config.input.delimiter,
    encoding: config.input.encoding,
  });

  for (const issue of issues) {
    logger.warn('Skipping invalid alert row', { file, line: issue.line, issue: issue.message });
  }

  const result = runResolutionPipeline(records, { registry, logger });
  return { result, issues, registry };
}
