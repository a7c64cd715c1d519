export abstract class TrimmerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidTimestampError extends TrimmerError {
  readonly code = 'INVALID_TIMESTAMP';
}

export class InvalidInTimestampError extends TrimmerError {
  readonly code = 'INVALID_IN_TIMESTAMP';

  constructor(cause: InvalidTimestampError) {
    super(`Invalid IN timestamp: ${cause.message}`, { cause });
  }
}

export class InvalidOutTimestampError extends TrimmerError {
  readonly code = 'INVALID_OUT_TIMESTAMP';

  constructor(cause: InvalidTimestampError) {
    super(`Invalid OUT timestamp: ${cause.message}`, { cause });
  }
}

export class InvalidRangeError extends TrimmerError {
  readonly code = 'INVALID_RANGE';

  constructor(inTimestamp: string, outTimestamp: string) {
    super(
      `OUT timestamp (${outTimestamp}) must be greater than IN timestamp (${inTimestamp})`,
    );
  }
}

export class SourceNotFoundError extends TrimmerError {
  readonly code = 'SOURCE_NOT_FOUND';

  constructor(readonly source: string) {
    super(`Source file not found: ${source}`);
  }
}

export class OutputDirError extends TrimmerError {
  readonly code = 'OUTPUT_DIR';

  constructor(readonly directory: string, cause: unknown) {
    super(`Error creating output directory ${directory}: ${errorMessage(cause)}`, { cause });
  }
}

export class ToolUnavailableError extends TrimmerError {
  readonly code = 'TOOL_UNAVAILABLE';
}

export class ExternalToolFailureError extends TrimmerError {
  readonly code = 'EXTERNAL_TOOL_FAILURE';

  constructor(
    readonly tool: string,
    readonly exitCode: number | null,
    detail?: string,
    options?: ErrorOptions,
  ) {
    super(
      exitCode === null
        ? `${tool} failed${detail ? `: ${detail}` : ''}`
        : `${tool} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`,
      options,
    );
  }
}

export class ConfigNotFoundError extends TrimmerError {
  readonly code = 'CONFIG_NOT_FOUND';

  constructor(readonly configPath: string) {
    super(`Config file not found: ${configPath}`);
  }
}

export class ConfigParseError extends TrimmerError {
  readonly code = 'CONFIG_PARSE';

  constructor(readonly configPath: string, cause: unknown) {
    super(
      `Error parsing config file ${configPath}: ${errorMessage(cause)}. Make sure the config file is valid JSON`,
      { cause },
    );
  }
}

export class NoValidConfigsError extends TrimmerError {
  readonly code = 'NO_VALID_CONFIGS';

  constructor() {
    super('No valid configurations found in the config file');
  }
}

export class MissingFieldError extends TrimmerError {
  readonly code = 'MISSING_FIELD';

  constructor(readonly fields: string[]) {
    super(`Missing required parameters: ${fields.join(', ')}`);
  }
}

export class InvalidFieldError extends TrimmerError {
  readonly code = 'INVALID_FIELD';

  constructor(readonly fields: string[]) {
    super(`Parameters must be strings: ${fields.join(', ')}`);
  }
}

export class CliUsageError extends TrimmerError {
  readonly code = 'CLI_USAGE';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
