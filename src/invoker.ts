// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Invoker
 *
 * Runs the external coding assistant against the scratch file. The tool is
 * opaque and edits the file in place, so a failed run is never retried.
 *
 * Usage of the wrapper:
 *   <tool_command> <scratch file> <prompt>
 *
 * @module invoker
 */

import {
  spawnSync,
  type SpawnSyncOptionsWithStringEncoding,
  type SpawnSyncReturns,
} from 'node:child_process';
import { existsSync, statSync } from 'node:fs';
import path from 'node:path';
import {
  EXIT_CODES,
  TOOL_OUTPUT_MAX_BUFFER,
  UTF8_ENCODING,
  WINDOWS_SCRIPT_EXTENSIONS,
} from './constants.js';
import {
  createError,
  ErrorCodes,
  ExternalToolError,
  getErrorMessage,
  getSystemErrorCode,
} from './error-handler.js';

/**
 * What the tool reports once its process has exited
 */
export interface ToolRunResult {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
}

/**
 * Capability the pipeline depends on. Tests substitute a fake.
 */
export interface ExternalTool {
  /** Human-readable description used in progress and error messages */
  readonly description: string;
  /** Run to completion, blocking the caller */
  run(filePath: string, prompt: string): ToolRunResult;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

export interface SubprocessToolOptions {
  /** Wrapper command name or path */
  command: string;
  /** Working directory for command lookup and the child process */
  cwd?: string;
  /** Kill the tool after this many ms; unset means wait indefinitely */
  timeoutMs?: number;
  platform?: NodeJS.Platform;
  spawn?: SpawnFn;
}

/**
 * Prefer a wrapper sitting in the working directory; otherwise leave the bare
 * name for PATH lookup.
 */
export function resolveToolCommand(command: string, cwd: string = process.cwd()): string {
  if (path.isAbsolute(command)) {
    return command;
  }
  const local = path.resolve(cwd, command);
  if (existsSync(local) && statSync(local).isFile()) {
    return local;
  }
  return command;
}

/**
 * Quote an argument for cmd.exe. Inner double quotes are doubled.
 */
export function quoteWindowsArg(arg: string): string {
  return `"${arg.replace(/"/g, '""')}"`;
}

function needsCommandInterpreter(command: string, platform: NodeJS.Platform): boolean {
  return (
    platform === 'win32' && WINDOWS_SCRIPT_EXTENSIONS.includes(path.extname(command).toLowerCase())
  );
}

/**
 * ExternalTool backed by a synchronous child process.
 */
export class SubprocessTool implements ExternalTool {
  private readonly command: string;
  private readonly cwd: string;
  private readonly timeoutMs?: number;
  private readonly platform: NodeJS.Platform;
  private readonly spawn: SpawnFn;

  constructor(options: SubprocessToolOptions) {
    this.cwd = options.cwd ?? process.cwd();
    this.command = resolveToolCommand(options.command, this.cwd);
    this.timeoutMs = options.timeoutMs;
    this.platform = options.platform ?? process.platform;
    this.spawn = options.spawn ?? spawnSync;
  }

  get description(): string {
    return this.command;
  }

  /**
   * @throws {ConversionError} TOOL_NOT_FOUND, TOOL_TIMEOUT or IO_ERROR when the process cannot run
   */
  run(filePath: string, prompt: string): ToolRunResult {
    const viaShell = needsCommandInterpreter(this.command, this.platform);
    const command = viaShell ? quoteWindowsArg(this.command) : this.command;
    const args = viaShell ? [filePath, prompt].map(quoteWindowsArg) : [filePath, prompt];

    const result = this.spawn(command, args, {
      cwd: this.cwd,
      encoding: UTF8_ENCODING,
      maxBuffer: TOOL_OUTPUT_MAX_BUFFER,
      shell: viaShell,
      timeout: this.timeoutMs,
      windowsHide: true,
    });

    if (result.error) {
      const systemCode = getSystemErrorCode(result.error);
      if (systemCode === 'ENOENT') {
        throw createError(
          ErrorCodes.TOOL_NOT_FOUND,
          `Command '${this.command}' not found. Put it in the working directory or on PATH.`,
          { command: this.command },
        );
      }
      if (systemCode === 'ETIMEDOUT') {
        throw createError(
          ErrorCodes.TOOL_TIMEOUT,
          `Command '${this.command}' did not finish within ${this.timeoutMs}ms`,
          { command: this.command, timeoutMs: this.timeoutMs, scratchPath: filePath },
        );
      }
      throw createError(
        ErrorCodes.IO_ERROR,
        `Failed to run '${this.command}': ${getErrorMessage(result.error)}`,
        { command: this.command, systemCode },
      );
    }

    return {
      exitCode: result.status,
      signal: result.signal,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }
}

/**
 * Run the tool on the scratch file and require a zero exit code.
 *
 * @throws {ExternalToolError} When the tool exits non-zero or is killed
 */
export function invokeTool(tool: ExternalTool, scratchPath: string, prompt: string): ToolRunResult {
  const result = tool.run(scratchPath, prompt);

  if (result.exitCode !== EXIT_CODES.SUCCESS) {
    const reason =
      result.exitCode === null ? `killed by ${result.signal ?? 'signal'}` : `exit code ${result.exitCode}`;
    throw new ExternalToolError(`External tool failed (${reason}): ${tool.description}`, result, {
      command: tool.description,
      scratchPath,
    });
  }

  return result;
}
