#!/usr/bin/env tsx
/**
 * Evac Atlas CLI Entry Point
 *
 * Resolves hurricane evacuation-order files to FIPS-coded county records,
 * inspects the reference registry and joins results with exposure data.
 *
 * @module evac-atlas-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { AlertFileError, ConfigError, ReferenceLoadError, errorMessage } from '../src/core/errors.js';
import {
  EXIT_CODES,
  createCommandContext,
  type CommandContext,
  type ExitCode,
  type GlobalOptions,
} from '../src/cli/lib/context.js';
import {
  registerMergeCommand,
  registerRegistryCommands,
  registerResolveCommand,
  registerUnresolvedCommand,
} from '../src/cli/commands/index.js';

// ============================================================================
// Global State
// ============================================================================

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

function setExitCode(code: ExitCode): void {
  process.exitCode = code;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    console.error(`Cannot read package version: ${errorMessage(error)}`);
    return '0.0.0';
  }
}

/**
 * Map a failure to its exit code
 */
function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof ReferenceLoadError) return EXIT_CODES.DATA_INTEGRITY_ERROR;
  return EXIT_CODES.ERRORS;
}

function describeError(error: unknown): string {
  if (error instanceof ReferenceLoadError) return error.getSummary();
  if (error instanceof AlertFileError) return `${error.path}: ${error.message}`;
  if (error instanceof ConfigError && error.configPath) return `${error.configPath}: ${error.message}`;
  return errorMessage(error);
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('evac-atlas')
    .description('Evac Atlas CLI - county-level resolution of hurricane evacuation orders')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Log as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .evac-atlasrc)')
    .option('--reference <path>', 'County reference table (default: bundled census table)')
    .option('--delimiter <char>', 'Alert file delimiter (default: |)')
    .hook('preAction', async (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      globalContext = await createCommandContext(options);
    });

  registerResolveCommand(program, getGlobalContext, setExitCode);
  registerUnresolvedCommand(program, getGlobalContext, setExitCode);
  registerRegistryCommands(program, getGlobalContext, setExitCode);
  registerMergeCommand(program, getGlobalContext, setExitCode);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.commandEnd(false, { error: describeError(error) });
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    process.exitCode = exitCodeFor(error);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = EXIT_CODES.ERRORS;
});
