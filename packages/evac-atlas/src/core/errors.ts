/**
 * Evac Atlas Error Types
 *
 * Only failures that stop a whole run are exceptions. Per-row problems
 * (malformed fragments, unknown states, unresolved names) are returned as
 * data by the pipeline stages.
 */

/**
 * Error thrown when the county reference table cannot be built
 *
 * Fatal: without the registry no record can be resolved, so the pipeline
 * must stop before touching any input.
 *
 * RECOVERY:
 * - Check that the reference path points at a county table in the expected shape
 * - Re-export the table if validation reports malformed rows
 */
export class ReferenceLoadError extends Error {
  /**
   * @param message - Human-readable error message
   * @param source - Path of the reference file that failed to load
   * @param issues - Validation messages, when the file parsed but was malformed
   */
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReferenceLoadError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReferenceLoadError);
    }
  }

  /**
   * Get formatted summary of the failure
   */
  getSummary(): string {
    const lines: string[] = [`Reference load failed for ${this.source}: ${this.message}`];

    for (const issue of this.issues.slice(0, 5)) {
      lines.push(`  - ${issue}`);
    }

    if (this.issues.length > 5) {
      lines.push(`  ... and ${this.issues.length - 5} more issues`);
    }

    return lines.join('\n');
  }
}

/**
 * Error thrown when an alert file cannot be read or parsed as a table
 *
 * Individual bad rows do not raise this; they come back as row issues.
 */
export class AlertFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AlertFileError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AlertFileError);
    }
  }
}

/**
 * Error thrown for an unreadable or invalid configuration file
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
