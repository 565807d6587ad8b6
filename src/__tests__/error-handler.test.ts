/**
 * @file error-handler.test.ts
 * @description Tests for structured errors and unknown-value normalisation
 */

import { describe, it, expect } from 'vitest';
import {
  ConversionError,
  createError,
  createIOError,
  ErrorCodes,
  ExternalToolError,
  getErrorMessage,
  getSystemErrorCode,
  ProcessExitError,
  toError,
} from '../error-handler.js';

describe('toError', () => {
  it('should return Error instances unchanged', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
  });

  it('should wrap non-empty strings', () => {
    expect(toError('plain failure').message).toBe('plain failure');
  });

  it('should use the message of message-like objects', () => {
    expect(toError({ message: 'from object' }).message).toBe('from object');
  });

  it('should fall back for null and empty strings', () => {
    expect(toError(null).message).toBe('Unknown error');
    expect(toError('', 'fallback').message).toBe('fallback');
  });
});

describe('getErrorMessage', () => {
  it('should extract the message from any thrown value', () => {
    expect(getErrorMessage(new Error('a'))).toBe('a');
    expect(getErrorMessage(42)).toBe('Unknown error');
  });
});

describe('getSystemErrorCode', () => {
  it('should read string codes only', () => {
    expect(getSystemErrorCode(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(getSystemErrorCode({ code: 2 })).toBeUndefined();
    expect(getSystemErrorCode('ENOENT')).toBeUndefined();
  });
});

describe('createError', () => {
  it('should build a ConversionError with code and details', () => {
    const error = createError(ErrorCodes.FILE_NOT_FOUND, 'missing', { path: 'a.txt' });

    expect(error).toBeInstanceOf(ConversionError);
    expect(error.name).toBe('ConversionError');
    expect(error.code).toBe('FILE_NOT_FOUND');
    expect(error.details).toEqual({ path: 'a.txt' });
  });
});

describe('createIOError', () => {
  it('should keep the operation, path and system code', () => {
    const cause = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    const error = createIOError('write', '/out/a.md', cause);

    expect(error.code).toBe(ErrorCodes.IO_ERROR);
    expect(error.message).toBe('Failed to write /out/a.md: EACCES: permission denied');
    expect(error.details).toEqual({ operation: 'write', path: '/out/a.md', systemCode: 'EACCES' });
  });
});

describe('ExternalToolError', () => {
  it('should carry the exit code and captured output', () => {
    const error = new ExternalToolError(
      'tool failed',
      { exitCode: 1, signal: null, stdout: 'out', stderr: 'err' },
      { scratchPath: '/s/f.md' },
    );

    expect(error).toBeInstanceOf(ConversionError);
    expect(error.name).toBe('ExternalToolError');
    expect(error.code).toBe(ErrorCodes.EXTERNAL_TOOL_FAILED);
    expect(error.exitCode).toBe(1);
    expect(error.stdout).toBe('out');
    expect(error.stderr).toBe('err');
    expect(error.details).toEqual({ scratchPath: '/s/f.md', exitCode: 1, signal: null });
  });
});

describe('ProcessExitError', () => {
  it('should default to exit code 1', () => {
    expect(new ProcessExitError('x').exitCode).toBe(1);
    expect(new ProcessExitError('x', 3).exitCode).toBe(3);
  });
});
