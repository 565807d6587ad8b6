#!/usr/bin/env node
// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only
/**
 * File to Markdown CLI
 *
 * Stages a source file (or pasted text) in the scratch directory, lets the
 * external coding assistant rewrite it as markdown, and copies the result
 * to the output path.
 *
 * Usage:
 *   file-to-markdown [source] [output] [--tool <command>] [--prompt <text>]
 *
 * Missing source/output arguments are asked for interactively.
 */

import path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { TOOL_NAME, EXIT_CODES } from './constants.js';
import { getErrorMessage, ProcessExitError } from './error-handler.js';
import { describeSource, formatFailure, formatStateChange } from './formatters.js';
import { SubprocessTool, type ExternalTool } from './invoker.js';
import { runConversion, type ConversionResult, type ConversionSource } from './pipeline.js';
import { resolveOutputPath } from './publisher.js';
import { LineReader, promptForOutputPath, promptForSource } from './source-input.js';
import { resolveScratchPath } from './stager.js';
import { getCliVersion, isMainModule, runCLI } from './cli-entry-point.js';

export interface FileToMarkdownOptions {
  /** Source file; asked for when absent */
  source?: string;
  /** Output file; asked for when absent */
  output?: string;
  prompt?: string;
  tool?: string;
  scratchDir?: string;
  config?: string;
}

/**
 * Seams for tests: a fake tool and in-memory streams instead of a real
 * subprocess and the terminal.
 */
export interface FileToMarkdownDeps {
  cwd?: string;
  tool?: ExternalTool;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

interface CollectInputsContext {
  cwd: string;
  pasteTimeoutMs: number;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Take source and output from the arguments, asking for whichever is missing.
 */
async function collectInputs(
  options: FileToMarkdownOptions,
  context: CollectInputsContext,
): Promise<{ source: ConversionSource; output: string }> {
  const { cwd, pasteTimeoutMs } = context;
  const given: ConversionSource | undefined = options.source
    ? { kind: 'file', path: path.resolve(cwd, options.source) }
    : undefined;

  if (given && options.output) {
    return { source: given, output: options.output };
  }

  const reader = new LineReader({
    input: context.input ?? process.stdin,
    output: context.output ?? process.stdout,
  });
  try {
    const source = given ?? (await promptForSource(reader, { pasteTimeoutMs, cwd }));
    const output = options.output ?? (await promptForOutputPath(reader));
    return { source, output };
  } finally {
    reader.close();
  }
}

/**
 * Resolve inputs, then run one conversion job.
 *
 * @throws {ConversionError} From config loading, input or any pipeline step
 */
export async function fileToMarkdown(
  options: FileToMarkdownOptions,
  deps: FileToMarkdownDeps = {},
): Promise<ConversionResult> {
  const cwd = deps.cwd ?? process.cwd();
  const config = loadConfig({
    configPath: options.config,
    cwd,
    overrides: {
      scratchDir: options.scratchDir,
      toolCommand: options.tool,
      prompt: options.prompt,
    },
  });

  const { source, output: requestedOutput } = await collectInputs(options, {
    cwd,
    pasteTimeoutMs: config.pasteTimeoutMs,
    input: deps.input,
    output: deps.output,
  });

  const resolvedOutput = resolveOutputPath(requestedOutput, config.defaultExtension);
  if (resolvedOutput !== requestedOutput.trim()) {
    console.log(`Appending ${config.defaultExtension} extension. Output: ${resolvedOutput}`);
  }

  const scratchPath = resolveScratchPath(config.scratchDir, config.scratchFileName, cwd);
  const tool =
    deps.tool ??
    new SubprocessTool({ command: config.toolCommand, cwd, timeoutMs: config.toolTimeoutMs });

  console.log(chalk.bold('\n--- Setup Complete ---'));
  console.log(`Source:       ${describeSource(source)}`);
  console.log(`Intermediate: ${scratchPath}`);
  console.log(`Output:       ${path.resolve(cwd, resolvedOutput)}`);
  console.log(`Tool:         ${tool.description}`);

  return runConversion(
    {
      source,
      scratchPath,
      outputPath: path.resolve(cwd, resolvedOutput),
      prompt: config.prompt,
    },
    {
      tool,
      onStateChange: (change) => {
        const line = formatStateChange(change);
        if (line) {
          console.log(line);
        }
      },
    },
  );
}

interface CliOptions {
  prompt?: string;
  tool?: string;
  scratchDir?: string;
  config?: string;
  color: boolean;
}

function createProgram(): Command {
  return new Command()
    .name(TOOL_NAME)
    .description('Convert a file to markdown with an external AI coding assistant')
    .version(getCliVersion() || '0.0.0')
    .argument('[source]', 'Source file (asked for interactively when omitted)')
    .argument('[output]', 'Output file; .md is appended when it has no extension')
    .option('--prompt <text>', 'Instruction passed to the external tool')
    .option('--tool <command>', 'Wrapper command that runs the external tool')
    .option('--scratch-dir <dir>', 'Directory for the intermediate file')
    .option('--config <path>', `Config file (default: ${TOOL_NAME}.yaml in the project root)`)
    .option('--no-color', 'Disable colored output (respects NO_COLOR env var)')
    .action(async (source: string | undefined, output: string | undefined, opts: CliOptions) => {
      try {
        const result = await fileToMarkdown({
          source,
          output,
          prompt: opts.prompt,
          tool: opts.tool,
          scratchDir: opts.scratchDir,
          config: opts.config,
        });
        console.log(chalk.green(`\n✓ Conversion complete: ${result.outputPath}`));
      } catch (err: unknown) {
        for (const line of formatFailure(err)) {
          console.error(line);
        }
        throw new ProcessExitError(getErrorMessage(err), EXIT_CODES.ERROR);
      }
    });
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (isMainModule(import.meta.url)) {
  void runCLI(main, { showHeader: true });
}
