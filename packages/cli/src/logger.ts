export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogSink = (line: string) => void;

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Where lines go. Default: stderr; stdout is reserved for results. */
  sink?: LogSink;
}

function writeStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Make log fields JSON-safe: errors become their JSON form, NaN and bigint
 * become strings.
 */
export function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      const json: unknown = value.toJSON();
      return json;
    }
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(serializeField);
  return value;
}

function formatTextField(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  return JSON.stringify(value) ?? String(value);
}

export class Logger {
  constructor(
    private readonly options: LoggerOptions = {},
    /** Fields added to every record, set by child() */
    private readonly bound: Record<string, unknown> = {}
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  child(fields: Record<string, unknown>): Logger {
    return new Logger(this.options, { ...this.bound, ...fields });
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({ ...this.bound, ...(extra ?? {}) })) {
      fields[key] = serializeField(value);
    }

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };

    const sink = this.options.sink ?? writeStderr;

    if ((this.options.format ?? 'text') === 'json') {
      sink(`${JSON.stringify(record)}\n`);
      return;
    }

    const fieldPart = Object.entries(fields)
      .map(([key, value]) => ` ${key}=${formatTextField(value)}`)
      .join('');
    sink(`[${record.ts}] ${level.toUpperCase()} ${msg}${fieldPart}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
