/**
 * Error hierarchy for the downloader.
 *
 * Only programmer-facing contract violations and startup problems are thrown.
 * Per-task failures (no playlist, tool exit code) travel as task outcomes.
 */

export enum ErrorCode {
  TASK_INVALID = 'TASK_INVALID',
  ARGUMENT_INVALID = 'ARGUMENT_INVALID',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export abstract class AppError extends Error {
  public readonly code: ErrorCode;

  protected constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown when a download task breaks its invariants (e.g. episode without season).
 */
export class TaskValidationError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.TASK_INVALID);
  }
}

export class ArgumentError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.ARGUMENT_INVALID);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIG_INVALID);
  }
}

/**
 * Safely extracts a message from an unknown thrown value.
 */
export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
};
