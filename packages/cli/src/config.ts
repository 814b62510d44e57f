import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { z } from 'zod';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace ${VAR} and ${VAR:-default} in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const encodingSchema = z.enum(['utf-8', 'utf8', 'utf16le', 'utf-16le', 'latin1', 'ascii']);

const fileSourceBase = z.object({
  id: z.string().min(1).default('input'),
  name: z.string().optional(),
  filePath: z.string().min(1),
  encoding: encodingSchema.optional(),
});

const csvSource = fileSourceBase
  .extend({
    type: z.literal('csv'),
    delimiter: z.string().min(1).optional(),
    headers: z.boolean().optional(),
    quote: z.string().min(1).optional(),
    skipEmptyLines: z.boolean().optional(),
  })
  .strict();

const jsonSource = fileSourceBase
  .extend({
    type: z.literal('json'),
    recordsPath: z.string().min(1).optional(),
  })
  .strict();

const excelSource = fileSourceBase
  .extend({
    type: z.literal('excel'),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    headers: z.boolean().optional(),
    startRow: z.number().int().min(1).optional(),
    startColumn: z.number().int().min(1).optional(),
  })
  .strict();

export const sourceSchema = z.discriminatedUnion('type', [csvSource, jsonSource, excelSource]);

export type SourceConfig = z.infer<typeof sourceSchema>;

/** Numbers may arrive as strings from flags or ${VAR} expansion */
const numberish = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number()
);

export const evaluationSchema = z
  .object({
    subjectField: z.string().min(1),
    timeField: z.string().min(1),
    valueField: z.string().min(1),
    threshold: numberish,
    // Checked by the evaluator so an unknown method surfaces as INVALID_METHOD
    method: z.string().min(1).default('first_last'),
    rejectEmpty: z.boolean().optional(),
  })
  .strict();

export const outputFormatSchema = z.enum(['text', 'json', 'csv']);

export type OutputFormat = z.infer<typeof outputFormatSchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    source: sourceSchema,
    evaluation: evaluationSchema,
    output: z
      .object({
        format: outputFormatSchema.optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config.json'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate an already-parsed config object
 * @throws ConfigError listing every issue
 */
export function parseConfig(raw: unknown, label?: string): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, label));
  }
  return result.data;
}

export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${message}`);
  }

  return parseConfig(expandEnvVars(parsed, options));
}

const EXTENSION_TYPES: Record<string, SourceConfig['type']> = {
  '.csv': 'csv',
  '.txt': 'csv',
  '.json': 'json',
  '.xlsx': 'excel',
};

/**
 * Pick the reader from the file extension
 */
export function inferSourceType(filePath: string): SourceConfig['type'] {
  const type = EXTENSION_TYPES[extname(filePath).toLowerCase()];
  if (!type) {
    throw new ConfigError(
      `Cannot tell the format of ${filePath}; use a .csv, .json or .xlsx file, or a config file with source.type`
    );
  }
  return type;
}
