/**
 * Tests for CLI entry point error handling
 *
 * Verifies that runCLI wrapper properly:
 * - Catches async errors from main()
 * - Logs error messages to stderr
 * - Exits with EXIT_CODES.ERROR on failure
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getCliVersion, isMainModule, runCLI } from '../cli-entry-point.js';
import { EXIT_CODES } from '../constants.js';
import { ProcessExitError } from '../error-handler.js';

const thisFile = fileURLToPath(import.meta.url);

describe('runCLI', () => {
  let mockExit: MockInstance<typeof process.exit>;
  let mockConsoleError: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    mockExit.mockRestore();
    mockConsoleError.mockRestore();
  });

  it('should call main() and do nothing on success', async () => {
    const main = vi.fn().mockResolvedValue(undefined);

    await runCLI(main);

    expect(main).toHaveBeenCalledOnce();
    expect(mockExit).not.toHaveBeenCalled();
    expect(mockConsoleError).not.toHaveBeenCalled();
  });

  it('should catch errors and exit with ERROR code', async () => {
    const main = vi.fn().mockRejectedValue(new Error('Test error message'));

    await runCLI(main);

    expect(mockConsoleError).toHaveBeenCalledWith('Test error message');
    expect(mockExit).toHaveBeenCalledWith(EXIT_CODES.ERROR);
  });

  it('should handle errors without message property', async () => {
    const main = vi.fn().mockRejectedValue('string error');

    await runCLI(main);

    expect(mockConsoleError).toHaveBeenCalledWith('string error');
    expect(mockExit).toHaveBeenCalledWith(EXIT_CODES.ERROR);
  });

  it('should print --help hint for unknown option errors', async () => {
    const error = Object.assign(new Error("unknown option '--bogus'"), {
      code: 'commander.unknownOption',
    });
    const main = vi.fn().mockRejectedValue(error);

    await runCLI(main);

    expect(mockConsoleError).toHaveBeenNthCalledWith(1, "unknown option '--bogus'");
    expect(mockConsoleError).toHaveBeenNthCalledWith(
      2,
      'Hint: Run with --help to see valid options.',
    );
  });

  it('should print the header when asked', async () => {
    const mockLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    const main = vi.fn().mockResolvedValue(undefined);

    await runCLI(main, { showHeader: true });

    expect(mockLog).toHaveBeenCalledOnce();
    expect(mockLog).toHaveBeenCalledWith(expect.stringContaining('file-to-markdown v'));
    mockLog.mockRestore();
  });

  it('should exit with the code of a ProcessExitError without logging it again', async () => {
    const main = async () => {
      throw new ProcessExitError('External tool failed', 2);
    };

    await runCLI(main);

    expect(mockExit).toHaveBeenCalledWith(2);
    expect(mockConsoleError).not.toHaveBeenCalled();
  });
});

describe('isMainModule', () => {
  it('should match the script path of the module itself', () => {
    expect(isMainModule(import.meta.url, thisFile)).toBe(true);
  });

  it('should not match another script', () => {
    const other = path.resolve(path.dirname(thisFile), 'config.test.ts');
    expect(isMainModule(import.meta.url, other)).toBe(false);
  });

  it('should be false without a script path or for missing files', () => {
    expect(isMainModule(import.meta.url, undefined)).toBe(false);
    expect(isMainModule(import.meta.url, path.join(path.dirname(thisFile), 'nope.ts'))).toBe(
      false,
    );
  });
});

describe('getCliVersion', () => {
  it('should read the version from package.json', () => {
    expect(getCliVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});

describe('CLI entry point pattern', () => {
  it('should guard the bin with isMainModule and runCLI with the header', () => {
    const entry = readFileSync(
      path.resolve(path.dirname(thisFile), '..', 'file-to-markdown.ts'),
      'utf-8',
    );

    expect(entry).toMatch(/if\s*\(\s*isMainModule\(import\.meta\.url\)\s*\)/);
    expect(entry).toMatch(/runCLI\(main, \{ showHeader: true \}\)/);
    expect(entry).not.toMatch(/main\(\)\.catch\(/);
  });
});
