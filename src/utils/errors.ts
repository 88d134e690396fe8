export enum ErrorCode {
  // Input Errors (1xxx)
  FILE_READ_FAILED = 1001,
  INPUT_DIR_MISSING = 1002,
  NO_INPUT_FILES = 1003,

  // Output Errors (2xxx)
  OUTPUT_WRITE_FAILED = 2001,
  PERSISTED_DATA_INVALID = 2002,

  // Configuration Errors (3xxx)
  CONFIG_INVALID = 3001,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
  INVALID_PARAMETER = 9002,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
  recoverable: boolean;
}

export class TopologyError extends Error {
  readonly code: ErrorCode;
  declare readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      recoverable?: boolean;
    }
  ) {
    super(message);
    this.name = 'TopologyError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    Error.captureStackTrace?.(this, TopologyError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
      recoverable: this.recoverable,
    };
  }

  static fromError(err: Error, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): TopologyError {
    if (err instanceof TopologyError) return err;
    return new TopologyError(code, err.message, { cause: err });
  }
}

/**
 * A single input file or directory could not be read. The batch skips the
 * file and carries on, hence recoverable.
 */
export class FileAccessError extends TopologyError {
  constructor(
    code: ErrorCode.FILE_READ_FAILED | ErrorCode.INPUT_DIR_MISSING,
    message: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(code, message, { ...options, recoverable: code === ErrorCode.FILE_READ_FAILED });
    this.name = 'FileAccessError';
  }
}

export class OutputError extends TopologyError {
  constructor(
    code: ErrorCode.OUTPUT_WRITE_FAILED | ErrorCode.PERSISTED_DATA_INVALID,
    message: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(code, message, { ...options, recoverable: false });
    this.name = 'OutputError';
  }
}

export class ConfigurationError extends TopologyError {
  constructor(
    message: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(ErrorCode.CONFIG_INVALID, message, { ...options, recoverable: false });
    this.name = 'ConfigurationError';
  }
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof TopologyError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
