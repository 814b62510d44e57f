/**
 * Command-line driver: arguments -> config -> reader -> evaluator -> stdout
 */

import { basename, resolve } from 'node:path';
import { ConnectorError, type IConnector } from '@longflag/core';
import {
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
} from '@longflag/connector-file';
import {
  CHANGE_METHODS,
  EvaluationError,
  createChangeEvaluator,
  parseEvaluateOptions,
} from '@longflag/evaluator';
import {
  ConfigError,
  inferSourceType,
  loadConfig,
  parseConfig,
  type ConfigFile,
  type SourceConfig,
} from './config.js';
import { Logger } from './logger.js';
import { renderReport } from './output.js';

const FLAG_NAMES = [
  'config',
  'file',
  'id',
  'time',
  'value',
  'threshold',
  'method',
  'format',
  'sheet',
  'records-path',
  'delimiter',
  'log-level',
  'log-format',
] as const;

type FlagName = (typeof FLAG_NAMES)[number];

const FLAG_SET: ReadonlySet<string> = new Set(FLAG_NAMES);

/** Flags that may accompany --config and override it */
const CONFIG_OVERRIDES: ReadonlySet<FlagName> = new Set(['config', 'format', 'log-level', 'log-format']);

const REQUIRED_WITHOUT_CONFIG: readonly FlagName[] = ['file', 'id', 'time', 'value', 'threshold'];

export type CliFlags = Partial<Record<FlagName, string>> & { help?: boolean };

export const USAGE = [
  'Usage:',
  '  longflag --config <config.json> [--format text|json|csv]',
  '  longflag --file <data.csv|data.json|data.xlsx> --id <field> --time <field> --value <field>',
  '           --threshold <number> [--method <method>] [--format text|json|csv]',
  '           [--sheet <name|index>] [--records-path <a.b>] [--delimiter <char>]',
  '           [--log-level debug|info|warn|error] [--log-format text|json]',
  '',
  `Methods: ${CHANGE_METHODS.join(', ')} (default: first_last)`,
  '',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isFlagName(name: string): name is FlagName {
  return FLAG_SET.has(name);
}

export function parseArgs(args: readonly string[]): CliFlags {
  const flags: CliFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      flags.help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!isFlagName(name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i += 1;
    }
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for --${name}`);
    }

    flags[name] = value;
  }

  return flags;
}

/**
 * Build and validate a config from command-line flags
 */
export function configFromFlags(flags: CliFlags): ConfigFile {
  const missing = REQUIRED_WITHOUT_CONFIG.filter((name) => flags[name] === undefined);
  if (missing.length > 0) {
    throw new UsageError(`Missing required option(s): ${missing.map((m) => `--${m}`).join(', ')}`);
  }

  const filePath = flags.file ?? '';
  const type = inferSourceType(filePath);
  const source: Record<string, unknown> = { type, filePath };
  if (flags.delimiter !== undefined) source['delimiter'] = flags.delimiter;
  if (flags['records-path'] !== undefined) source['recordsPath'] = flags['records-path'];
  if (flags.sheet !== undefined) {
    source['sheet'] = /^\d+$/.test(flags.sheet) ? Number(flags.sheet) : flags.sheet;
  }

  return parseConfig(
    {
      source,
      evaluation: {
        subjectField: flags.id,
        timeField: flags.time,
        valueField: flags.value,
        threshold: flags.threshold,
        method: flags.method,
      },
      output: { format: flags.format },
      logging: { level: flags['log-level'], format: flags['log-format'] },
    },
    'Invalid arguments'
  );
}

async function resolveConfig(flags: CliFlags): Promise<ConfigFile> {
  if (flags.config === undefined) {
    return configFromFlags(flags);
  }

  const extra = FLAG_NAMES.filter((name) => flags[name] !== undefined && !CONFIG_OVERRIDES.has(name));
  if (extra.length > 0) {
    throw new UsageError(
      `--config cannot be combined with ${extra.map((name) => `--${name}`).join(', ')}`
    );
  }

  const config = await loadConfig(flags.config);
  return parseConfig(
    {
      ...config,
      output: { ...config.output, format: flags.format ?? config.output?.format },
      logging: {
        level: flags['log-level'] ?? config.logging?.level,
        format: flags['log-format'] ?? config.logging?.format,
      },
    },
    'Invalid arguments'
  );
}

export function createConnector(source: SourceConfig): IConnector {
  const filePath = resolve(process.cwd(), source.filePath);
  const name = source.name ?? basename(source.filePath);

  switch (source.type) {
    case 'csv':
      return createCsvConnector({
        id: source.id,
        name,
        filePath,
        encoding: source.encoding,
        delimiter: source.delimiter,
        headers: source.headers,
        quote: source.quote,
        skipEmptyLines: source.skipEmptyLines,
      });

    case 'json':
      return createJsonConnector({
        id: source.id,
        name,
        filePath,
        encoding: source.encoding,
        recordsPath: source.recordsPath,
      });

    case 'excel':
      return createExcelConnector({
        id: source.id,
        name,
        filePath,
        sheet: source.sheet,
        headers: source.headers,
        startRow: source.startRow,
        startColumn: source.startColumn,
      });

    default: {
      const exhaustive: never = source;
      throw new ConfigError(`Unknown source type: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof EvaluationError || error instanceof ConnectorError) {
    return error.toActionableMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Run the command and return its exit code: 0 success, 1 failure, 2 usage error
 */
export async function runCli(args: readonly string[], io: CliIO = processIO): Promise<number> {
  let logger = new Logger({ sink: io.stderr });

  try {
    const flags = parseArgs(args);
    if (flags.help) {
      io.stdout(USAGE);
      return 0;
    }

    const config = await resolveConfig(flags);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
      sink: io.stderr,
    });

    const options = parseEvaluateOptions(config.evaluation);
    const connector = createConnector(config.source);
    const log = logger.child({ source: connector.config.id });

    if (options.threshold < 0) {
      log.warn('Negative threshold flags every row with a defined change', {
        threshold: options.threshold,
      });
    }

    await connector.connect();
    try {
      const schema = await connector.getSchema();
      log.debug('Source loaded', {
        file: config.source.filePath,
        columns: schema.fields.map((field) => `${field.name}:${field.type}`),
      });

      const report = await createChangeEvaluator().evaluateConnector(connector, options);
      io.stdout(renderReport(report, config.output?.format ?? 'text'));

      log.info('Evaluation complete', {
        method: report.method,
        subjects: report.summary.subjectCount,
        rows: report.summary.rowCount,
        flagged: report.summary.flaggedCount,
        ms: report.processingTimeMs,
      });
    } finally {
      await connector.disconnect();
    }

    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return 2;
    }

    logger.error(describeError(error));
    return 1;
  }
}
