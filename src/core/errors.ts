/**
 * Harness error types
 * These describe misuse of the harness itself (programming/protocol violations).
 * Simulated command failures are NOT errors here: they are "Error: " lines on
 * the captured stderr.
 */

export enum ErrorCode {
  // Capture errors
  /** A capture scope is already open on this context */
  CAPTURE_ALREADY_ACTIVE = 'CAPTURE_ALREADY_ACTIVE',
  /** end() called with no open capture scope */
  CAPTURE_NOT_ACTIVE = 'CAPTURE_NOT_ACTIVE',

  // Dispatch errors
  /** Command string is blank or otherwise unusable */
  INVALID_COMMAND = 'INVALID_COMMAND',
  /** A handler is already registered for this (family, subcommand) */
  DUPLICATE_HANDLER = 'DUPLICATE_HANDLER',
  /** A simulated handler threw instead of writing to stderr */
  HANDLER_FAILED = 'HANDLER_FAILED',

  // Lifecycle errors
  /** The test context was disposed at scenario end */
  CONTEXT_DISPOSED = 'CONTEXT_DISPOSED',

  // Replay errors
  /** A seed file could not be read or did not match the expected shape */
  INVALID_SEED = 'INVALID_SEED',

  // System errors
  /** Configuration loading or validation failed */
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Error class for the harness
 * Carries an error code and optional context for debugging
 *
 * @example
 * return err(new HarnessError(
 *   ErrorCode.INVALID_COMMAND,
 *   'Command must not be blank',
 *   { command }
 * ));
 */
export class HarnessError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarnessError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error factory functions
 */
export const captureAlreadyActive = (): HarnessError =>
  new HarnessError(
    ErrorCode.CAPTURE_ALREADY_ACTIVE,
    'A capture scope is already active on this context'
  );

export const captureNotActive = (): HarnessError =>
  new HarnessError(
    ErrorCode.CAPTURE_NOT_ACTIVE,
    'No capture scope is active on this context'
  );

export const invalidCommand = (command: string, reason: string): HarnessError =>
  new HarnessError(
    ErrorCode.INVALID_COMMAND,
    `Invalid command "${command}": ${reason}`,
    { command }
  );

export const duplicateHandler = (family: string, subcommand: string): HarnessError =>
  new HarnessError(
    ErrorCode.DUPLICATE_HANDLER,
    `Handler already registered for ${family} ${subcommand}`,
    { family, subcommand }
  );

export const handlerFailed = (family: string, subcommand: string, cause: unknown): HarnessError =>
  new HarnessError(
    ErrorCode.HANDLER_FAILED,
    `Handler for ${family} ${subcommand} threw: ${errorMessage(cause)}`,
    { family, subcommand }
  );

export const contextDisposed = (): HarnessError =>
  new HarnessError(
    ErrorCode.CONTEXT_DISPOSED,
    'Test context has been disposed'
  );

export const invalidSeed = (source: string, reason: string): HarnessError =>
  new HarnessError(
    ErrorCode.INVALID_SEED,
    `Invalid seed ${source}: ${reason}`,
    { source }
  );

export const configurationError = (message: string, context?: Record<string, unknown>): HarnessError =>
  new HarnessError(ErrorCode.CONFIGURATION_ERROR, message, context);

/** Extract a safe error message from an unknown catch value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize an unknown catch value into an Error instance. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
