/**
 * Shared builders for pipeline tests
 */

import { fileURLToPath } from 'node:url';

import type {
  CandidateCountyRow,
  RawAlertRecord,
  ReferenceEntry,
  ResolvedCountyRecord,
} from '../core/types.js';
import type { LogLevel, LogMetadata, Logger } from '../core/utils/logger.js';
import { ReferenceRegistry } from '../registry/reference-registry.js';
import { DEFAULT_REFERENCE_PATH } from '../registry/reference-loader.js';
import type { CommandContext } from '../cli/lib/context.js';
import { createCLILogger } from '../cli/lib/logger.js';

export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

/**
 * Small registry covering the states the tests use
 */
export const TEST_ENTRIES: readonly ReferenceEntry[] = [
  { state: 'GA', countyName: 'Bryan', fips: '13029' },
  { state: 'GA', countyName: 'Camden', fips: '13039' },
  { state: 'GA', countyName: 'Chatham', fips: '13051' },
  { state: 'GA', countyName: 'Glynn', fips: '13127' },
  { state: 'GA', countyName: 'Mcintosh', fips: '13191' },
  { state: 'GA', countyName: 'Meriwether', fips: '13199' },
  { state: 'TX', countyName: 'Comal', fips: '48091' },
  { state: 'TX', countyName: 'Dewitt', fips: '48123' },
  { state: 'VA', countyName: 'King And Queen', fips: '51097' },
  { state: 'VA', countyName: 'Northampton', fips: '51131' },
  { state: 'VA', countyName: 'Suffolk City', fips: '51800' },
  { state: 'DE', countyName: 'Kent', fips: '10001' },
  { state: 'DE', countyName: 'New Castle', fips: '10003' },
  { state: 'DE', countyName: 'Sussex', fips: '10005' },
  { state: 'FL', countyName: 'Miami-Dade', fips: '12086' },
  { state: 'FL', countyName: 'St. Johns', fips: '12109' },
  { state: 'LA', countyName: 'St. Mary', fips: '22101' },
];

export function testRegistry(logger?: Logger): ReferenceRegistry {
  return ReferenceRegistry.fromEntries(TEST_ENTRIES, { logger });
}

export function alertRecord(overrides: Partial<RawAlertRecord> = {}): RawAlertRecord {
  return {
    eventName: 'Hurricane Matthew',
    state: 'GA',
    countyText: 'Bryan',
    countyFips: null,
    year: 2016,
    attributes: { 'Order Type': 'Mandatory' },
    ...overrides,
  };
}

export function candidateRow(overrides: Partial<CandidateCountyRow> = {}): CandidateCountyRow {
  return {
    eventName: 'Hurricane Matthew',
    state: 'GA',
    countyName: 'Bryan',
    countyFips: null,
    year: 2016,
    attributes: { 'Order Type': 'Mandatory' },
    sourceText: 'Bryan',
    origin: 'source',
    ...overrides,
  };
}

export function resolvedRecord(overrides: Partial<ResolvedCountyRecord> = {}): ResolvedCountyRecord {
  return {
    ...candidateRow(),
    countyName: 'Bryan',
    countyFips: '13029',
    fipsSource: 'registry',
    storm: 'Matthew',
    ...overrides,
  };
}

export interface LogRecord {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata?: LogMetadata;
}

export interface RecordingLogger extends Logger {
  readonly records: LogRecord[];
  messages(level: LogLevel): string[];
}

/**
 * Logger that keeps every entry for assertions
 */
export function recordingLogger(): RecordingLogger {
  const records: LogRecord[] = [];
  const at =
    (level: LogLevel) =>
    (message: string, metadata?: LogMetadata): void => {
      records.push({ level, message, metadata });
    };

  return {
    records,
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    messages: (level) => records.filter((entry) => entry.level === level).map((entry) => entry.message),
  };
}

export interface TestCommandContext extends CommandContext {
  /** JSON log lines written by the command */
  readonly logLines: string[];
}

/**
 * Command context over the bundled registry, logging JSON into memory
 */
export function commandContext(outputDir: string): TestCommandContext {
  const logLines: string[] = [];
  return {
    config: {
      version: 1,
      paths: { reference: DEFAULT_REFERENCE_PATH, output: outputDir },
      input: { delimiter: '|', encoding: 'utf-8' },
      logging: { level: 'debug' },
      verbose: false,
      json: true,
      configPath: null,
    },
    logger: createCLILogger({ level: 'debug', json: true, write: (line) => logLines.push(line) }),
    logLines,
  };
}
