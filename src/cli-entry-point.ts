// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Shared CLI entry point wrapper
 *
 * Provides consistent error handling for the CLI: catches async errors,
 * logs them, and exits with the proper code.
 *
 * `import.meta.main` needs Node.js 22, so entry files compare their own
 * real path with the script Node was started with instead.
 *
 * @example
 * ```typescript
 * // At the bottom of a CLI file:
 * import { isMainModule, runCLI } from './cli-entry-point.js';
 *
 * if (isMainModule(import.meta.url)) {
 *   void runCLI(main, { showHeader: true });
 * }
 * ```
 */
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { EXIT_CODES } from './constants.js';
import { getErrorMessage, ProcessExitError } from './error-handler.js';
import { formatHeader, initColorSupport } from './formatters.js';

const HELP_HINT_MESSAGE = 'Hint: Run with --help to see valid options.';
const COMMANDER_USAGE_ERROR_CODES = new Set([
  'commander.unknownOption',
  'commander.missingArgument',
  'commander.missingMandatoryOptionValue',
  'commander.optionMissingArgument',
  'commander.excessArguments',
]);

/**
 * Read the package version from the nearest package.json above this file
 * (src/ when run from sources, dist/src/ once built).
 * Returns empty string when none is found.
 */
export function getCliVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 3; depth++) {
    dir = dirname(dir);
    const pkgPath = join(dir, 'package.json');
    if (!existsSync(pkgPath)) {
      continue;
    }
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
        return typeof pkg.version === 'string' ? pkg.version : '';
      }
    } catch {
      return '';
    }
  }
  return '';
}

/**
 * True when the module at `moduleUrl` is the script Node was started with.
 * Symlinked bins (npm link, node_modules/.bin) resolve to the same real path.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

/**
 * Options for runCLI wrapper.
 */
export interface RunCLIOptions {
  /** Print the header before executing the command */
  showHeader?: boolean;
}

/**
 * Wraps an async main function with proper error handling.
 * ProcessExitError carries its own exit code; anything else is logged and
 * exits with EXIT_CODES.ERROR.
 */
export async function runCLI(main: () => Promise<void>, options?: RunCLIOptions): Promise<void> {
  initColorSupport();

  if (options?.showHeader) {
    console.log(formatHeader({ version: getCliVersion() }));
  }

  try {
    await main();
  } catch (err: unknown) {
    // The thrower already reported the failure, so only the code is left to apply.
    if (err instanceof ProcessExitError) {
      process.exit(err.exitCode);
      return;
    }

    const message = getErrorMessage(err);
    console.error(message);
    if (shouldPrintHelpHint(err, message)) {
      console.error(HELP_HINT_MESSAGE);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

function shouldPrintHelpHint(err: unknown, message: string): boolean {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    if (COMMANDER_USAGE_ERROR_CODES.has(err.code)) {
      return true;
    }
  }

  const normalized = message.toLowerCase();
  return (
    normalized.includes('unknown option') ||
    normalized.includes('missing argument') ||
    normalized.includes('option argument missing')
  );
}
