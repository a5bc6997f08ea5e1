/**
 * CLI Command Context
 *
 * Exit codes and the per-invocation context (config + logger) that every
 * command receives from the entry point's preAction hook.
 *
 * @module cli/lib/context
 */

import { loadConfig, type EvacAtlasConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Finished, but some rows were unresolved or skipped */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Context
// ============================================================================

export interface CommandContext {
  readonly config: EvacAtlasConfig;
  readonly logger: CLILogger;
}

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly reference?: string;
  readonly delimiter?: string;
}

export type ContextProvider = () => CommandContext;

export async function createCommandContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      reference: options.reference,
      delimiter: options.delimiter,
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.logging.level,
    json: config.json,
  });

  return { config, logger };
}
