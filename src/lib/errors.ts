/**
 * Error types surfaced to callers of the bundle builder and CLI.
 */

export enum ErrorCodes {
  CONFIG_ERROR = 'CONFIG_ERROR',
  INVALID_PRIMARY_FILES = 'INVALID_PRIMARY_FILES',
  INVALID_DEPTH = 'INVALID_DEPTH',
  FIND_COMMAND_FAILED = 'FIND_COMMAND_FAILED',
  NO_FILES = 'NO_FILES',
}

export class ContextBundleError extends Error {
  public code: ErrorCodes;
  public hint?: string;

  constructor(message: string, code: ErrorCodes, hint?: string) {
    super(message);
    this.name = 'ContextBundleError';
    this.code = code;
    this.hint = hint;
  }
}

export function isContextBundleError(error: unknown): error is ContextBundleError {
  return error instanceof ContextBundleError;
}
