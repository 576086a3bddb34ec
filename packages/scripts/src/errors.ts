/**
 * Error handling for the device-sim scripts
 *
 * Structured error codes for failures a script reports itself. An unknown
 * mock command is not an error: the device answers with its own sentinel.
 */

export enum CliErrorCode {
  /** A value that should be an integer is not one */
  INVALID_NUMBER = 'INVALID_NUMBER',
  /** Environment configuration failed validation */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Writing the output file failed */
  SAVE_FAILED = 'SAVE_FAILED',
}

/**
 * Error with a code and optional context, raised by the scripts
 */
export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: CliErrorCode,
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });

    this.name = 'CliError';
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, CliError);
  }
}

/**
 * The bare message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a foreign error in a CliError, keeping the original message and cause
 */
export function wrapError(
  error: unknown,
  code: CliErrorCode,
  context?: Record<string, unknown>
): CliError {
  if (error instanceof CliError) {
    return error;
  }

  return new CliError(code, errorMessage(error), context, error);
}
