/**
 * Error taxonomy for the summarize and render commands.
 *
 * Only ConfigError is fatal; everything else is contained at the file or
 * command level and logged.
 */

export const ErrorCodes = {
  CONFIG_MISSING_CREDENTIAL: 'E1000',
  CONFIG_FILE_INVALID: 'E1001',
  FILE_READ_FAILED: 'E2000',
  SUMMARY_TRANSIENT: 'E3000',
  SUMMARY_PERMANENT: 'E3001',
  OUTPUT_WRITE_FAILED: 'E4000',
  TREE_CONFLICT: 'E5000',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class SummaryTreeError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SummaryTreeError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Missing API credential after merging environment and config file.
 */
export class ConfigError extends SummaryTreeError {
  constructor(
    message: string,
    public remediation: string[] = []
  ) {
    super(message, ErrorCodes.CONFIG_MISSING_CREDENTIAL);
    this.name = 'ConfigError';
  }
}

export class ConfigFileError extends SummaryTreeError {
  constructor(configPath: string, reason: string, cause?: unknown) {
    super(`Invalid config file ${configPath}: ${reason}`, ErrorCodes.CONFIG_FILE_INVALID, { configPath }, { cause });
    this.name = 'ConfigFileError';
  }
}

export class FileReadError extends SummaryTreeError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Failed to read ${filePath}: ${reason}`, ErrorCodes.FILE_READ_FAILED, { filePath }, { cause });
    this.name = 'FileReadError';
  }
}

/**
 * API failure or blank response. Retried under the configured policy.
 */
export class SummaryTransientError extends SummaryTreeError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCodes.SUMMARY_TRANSIENT, undefined, { cause });
    this.name = 'SummaryTransientError';
  }
}

/**
 * API failure that another attempt cannot fix (bad credentials, unknown model).
 */
export class SummaryPermanentError extends SummaryTreeError {
  constructor(
    message: string,
    public status?: number,
    cause?: unknown
  ) {
    super(message, ErrorCodes.SUMMARY_PERMANENT, status === undefined ? undefined : { status }, { cause });
    this.name = 'SummaryPermanentError';
  }
}

export class OutputWriteError extends SummaryTreeError {
  constructor(outputPath: string, cause?: unknown) {
    super(`Failed to write ${outputPath}: ${errorMessage(cause)}`, ErrorCodes.OUTPUT_WRITE_FAILED, { outputPath }, { cause });
    this.name = 'OutputWriteError';
  }
}

/**
 * A path is used both as a file and as a directory.
 */
export class TreeConflictError extends SummaryTreeError {
  constructor(filePath: string, segment: string) {
    super(
      `Path ${filePath} conflicts at "${segment}": a name cannot be both a file and a directory`,
      ErrorCodes.TREE_CONFLICT,
      { filePath, segment }
    );
    this.name = 'TreeConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
