/**
 * Errors raised while opening or reading a table source
 */

export type ConnectorErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_CONNECTED'
  | 'READ_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'CONFIGURATION_ERROR';

const DEFAULT_SUGGESTIONS: { readonly [C in ConnectorErrorCode]: string } = {
  NOT_FOUND: 'Check that the path is correct and the file exists.',
  PERMISSION_DENIED: 'Check that the current user can read the file.',
  NOT_CONNECTED: 'Call connect() before reading from the source.',
  READ_FAILED: 'Check that the file is a valid file of the type its extension names.',
  SCHEMA_MISMATCH: 'Check that the file holds one observation per row under a header row.',
  CONFIGURATION_ERROR: 'Check the source options in the configuration.',
};

export interface ConnectorErrorDetails {
  code: ConnectorErrorCode;
  message: string;
  /** Id of the source that failed */
  sourceId?: string;
  /** File path (or other locator) of the source */
  location?: string;
  /** Overrides the code's default suggestion */
  suggestion?: string;
  cause?: unknown;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ConnectorError extends Error {
  readonly code: ConnectorErrorCode;
  readonly sourceId?: string;
  readonly location?: string;
  readonly suggestion: string;

  constructor(details: ConnectorErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ConnectorError';
    this.code = details.code;
    this.sourceId = details.sourceId;
    this.location = details.location;
    this.suggestion = details.suggestion ?? DEFAULT_SUGGESTIONS[details.code];
  }

  /**
   * Classify a failure to open or parse the file at `location`.
   * ConnectorErrors pass through unchanged.
   */
  static fromFileError(error: unknown, sourceId: string, location: string): ConnectorError {
    if (error instanceof ConnectorError) {
      return error;
    }

    const details = { sourceId, location, cause: error };
    switch (isErrnoException(error) ? error.code : undefined) {
      case 'ENOENT':
        return new ConnectorError({ ...details, code: 'NOT_FOUND', message: `File not found: ${location}` });
      case 'EACCES':
      case 'EPERM':
        return new ConnectorError({
          ...details,
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${location}`,
        });
      default: {
        const reason = error instanceof Error ? error.message : String(error);
        return new ConnectorError({
          ...details,
          code: 'READ_FAILED',
          message: `Failed to read ${location}: ${reason}`,
        });
      }
    }
  }

  toActionableMessage(): string {
    const lines = [`Error [${this.code}]: ${this.message}`];
    if (this.sourceId) {
      lines.push(`Source: ${this.sourceId}`);
    }
    lines.push(`Suggested action: ${this.suggestion}`);
    return lines.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      sourceId: this.sourceId,
      location: this.location,
      suggestion: this.suggestion,
    };
  }
}
