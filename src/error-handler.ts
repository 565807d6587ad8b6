// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * @file error-handler.ts
 * @description Structured error handling with error codes
 *
 * Every failure in the pipeline is terminal for the current job. Library
 * code throws; only the CLI boundary (runCLI) turns errors into an exit code.
 */

const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

interface MessageLikeError {
  message: string;
}

function hasMessage(value: unknown): value is MessageLikeError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * Typed error for process exit signals from library code.
 * CLI entry boundaries catch this and call process.exit with the exitCode.
 */
export class ProcessExitError extends Error {
  /** Process exit code to use when caught at CLI boundary */
  exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'ProcessExitError';
    this.exitCode = exitCode;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProcessExitError);
    }
  }
}

/**
 * Structured error class with error codes and details
 */
export class ConversionError extends Error {
  /** Error code (e.g., 'FILE_NOT_FOUND') */
  code: string;
  /** Additional error context */
  details: Record<string, unknown>;

  constructor(code: string, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Output captured from a failed external tool run
 */
export interface ExternalToolFailure {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: string | null;
  stdout: string;
  stderr: string;
}

/**
 * Raised when the external tool exits with anything other than 0.
 */
export class ExternalToolError extends ConversionError {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;

  constructor(message: string, failure: ExternalToolFailure, details: Record<string, unknown> = {}) {
    super(ErrorCodes.EXTERNAL_TOOL_FAILED, message, {
      ...details,
      exitCode: failure.exitCode,
      signal: failure.signal,
    });
    this.name = 'ExternalToolError';
    this.exitCode = failure.exitCode;
    this.signal = failure.signal;
    this.stdout = failure.stdout;
    this.stderr = failure.stderr;
  }
}

/**
 * Normalize unknown thrown values into Error instances.
 *
 * This is the strict-mode-safe boundary helper for `catch (err: unknown)`.
 */
export function toError(error: unknown, fallbackMessage = UNKNOWN_ERROR_MESSAGE): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string' && error.length > 0) {
    return new Error(error);
  }

  if (hasMessage(error)) {
    return new Error(error.message);
  }

  return new Error(fallbackMessage);
}

/**
 * Strict-safe helper for extracting error messages from unknown values.
 */
export function getErrorMessage(error: unknown, fallbackMessage = UNKNOWN_ERROR_MESSAGE): string {
  return toError(error, fallbackMessage).message;
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...), if any.
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Create a ConversionError instance (factory function)
 *
 * @example
 * throw createError(ErrorCodes.FILE_NOT_FOUND, 'notes.txt not found', { path: 'notes.txt' });
 */
export function createError(code: string, message: string, details: Record<string, unknown> = {}) {
  return new ConversionError(code, message, details);
}

/**
 * Wrap a filesystem failure as an IO_ERROR, keeping the system error code.
 */
export function createIOError(operation: string, filePath: string, cause: unknown) {
  return createError(
    ErrorCodes.IO_ERROR,
    `Failed to ${operation} ${filePath}: ${getErrorMessage(cause)}`,
    { operation, path: filePath, systemCode: getSystemErrorCode(cause) },
  );
}

/**
 * Common error codes
 */
export const ErrorCodes = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  IO_ERROR: 'IO_ERROR',
  EXTERNAL_TOOL_FAILED: 'EXTERNAL_TOOL_FAILED',
  TOOL_NOT_FOUND: 'TOOL_NOT_FOUND',
  TOOL_TIMEOUT: 'TOOL_TIMEOUT',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  CONFIG_ERROR: 'CONFIG_ERROR',
  STATE_ERROR: 'STATE_ERROR',
  NO_CONTENT: 'NO_CONTENT',
  CANCELLED_BY_USER: 'CANCELLED_BY_USER',
} as const;
