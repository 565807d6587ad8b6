// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * CLI Output Formatters
 *
 * Colour control, the header line, per-state progress lines and the failure
 * report. Colour follows NO_COLOR, then --no-color, then FORCE_COLOR, then
 * chalk's own detection.
 *
 * @see https://no-color.org/
 * @module formatters
 */

import chalk from 'chalk';
import { TOOL_NAME } from './constants.js';
import {
  ConversionError,
  ErrorCodes,
  ExternalToolError,
  getErrorMessage,
} from './error-handler.js';
import type { ConversionSource, StateChange } from './pipeline.js';

const HEADER_WIDTH = 50;
const NO_OUTPUT_PLACEHOLDER = {
  stdout: '[No standard output]',
  stderr: '[No standard error]',
};

type ColorLevel = 0 | 1 | 2 | 3;

function parseColorLevel(value: string): ColorLevel | null {
  const level = parseInt(value, 10);
  return level === 0 || level === 1 || level === 2 || level === 3 ? level : null;
}

/**
 * Apply the colour preference from the environment and argv to chalk.
 *
 * @returns The colour level now in effect
 */
export function initColorSupport(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): number {
  if (env.NO_COLOR !== undefined || argv.includes('--no-color')) {
    chalk.level = 0;
  } else if (env.FORCE_COLOR !== undefined) {
    // Invalid values keep chalk's detected level
    const level = parseColorLevel(env.FORCE_COLOR);
    if (level !== null) {
      chalk.level = level;
    }
  }
  return chalk.level;
}

export function formatHeader(options: { version?: string } = {}): string {
  const separator = chalk.dim('─'.repeat(HEADER_WIDTH));
  const versionStr = options.version ? ` v${options.version}` : '';
  const title = chalk.bold.cyan(`${TOOL_NAME}${versionStr}`);
  return [separator, title, separator].join('\n');
}

export function describeSource(source: ConversionSource): string {
  return source.kind === 'file' ? source.path : 'pasted content';
}

/**
 * Progress line for a state change, or null for `failed` (see formatFailure).
 */
export function formatStateChange(change: StateChange): string | null {
  const { job } = change;
  switch (change.to) {
    case 'staged':
      return `${chalk.green('✓')} Staged ${describeSource(job.source)} → ${job.scratchPath}`;
    case 'invoked':
      return `${chalk.green('✓')} External tool finished editing ${job.scratchPath}`;
    case 'published':
      return `${chalk.green('✓')} Markdown written to ${job.outputPath}`;
    default:
      return null;
  }
}

function formatCapturedOutput(label: string, text: string, placeholder: string): string {
  const trimmed = text.trim();
  return `${label}:\n${trimmed ? trimmed : placeholder}`;
}

function getScratchPath(error: unknown): string | undefined {
  if (error instanceof ConversionError) {
    const { scratchPath } = error.details;
    return typeof scratchPath === 'string' ? scratchPath : undefined;
  }
  return undefined;
}

/**
 * Lines to print when a run fails. The scratch file is never cleaned up, so
 * the report points at it whenever the tool may already have edited it.
 */
export function formatFailure(error: unknown): string[] {
  const scratchPath = getScratchPath(error);
  const lines = [chalk.red(`Error: ${getErrorMessage(error)}`)];

  if (error instanceof ExternalToolError) {
    lines.push(formatCapturedOutput('Stdout', error.stdout, NO_OUTPUT_PLACEHOLDER.stdout));
    lines.push(formatCapturedOutput('Stderr', error.stderr, NO_OUTPUT_PLACEHOLDER.stderr));
  }

  const toolMayHaveRun =
    error instanceof ExternalToolError ||
    (error instanceof ConversionError && error.code === ErrorCodes.TOOL_TIMEOUT);
  if (scratchPath && toolMayHaveRun) {
    lines.push(chalk.yellow(`Intermediate file '${scratchPath}' might contain partial results.`));
  }

  return lines;
}
