// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Interactive input for the source and output paths.
 *
 * The first answer is either a file path or the first line of pasted
 * content. In paste mode, input ends once no new line has arrived for
 * `pasteTimeoutMs`, or when the stream closes.
 *
 * @module source-input
 */

import * as readline from 'node:readline';
import path from 'node:path';
import { existsSync, statSync } from 'node:fs';
import chalk from 'chalk';
import { createError, ErrorCodes } from './error-handler.js';
import type { ConversionSource } from './pipeline.js';

export type LineResult = { kind: 'line'; line: string } | { kind: 'timeout' } | { kind: 'end' };

export interface LineReaderOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Defaults to whether output is a TTY */
  terminal?: boolean;
}

/**
 * Queues readline lines so callers can await them one at a time, with an
 * optional per-line timeout.
 */
export class LineReader {
  private readonly rl: readline.Interface;
  private readonly queue: string[] = [];
  private waiter: ((result: LineResult) => void) | null = null;
  private ended = false;
  private interrupted = false;

  constructor(options: LineReaderOptions) {
    this.rl = readline.createInterface({
      input: options.input,
      output: options.output,
      terminal: options.terminal,
    });
    this.rl.on('line', (line) => {
      if (!this.deliver({ kind: 'line', line })) {
        this.queue.push(line);
      }
    });
    this.rl.on('close', () => {
      this.ended = true;
      this.deliver({ kind: 'end' });
    });
    this.rl.on('SIGINT', () => {
      this.interrupted = true;
      this.rl.close();
    });
  }

  /** True once Ctrl-C was pressed */
  get wasInterrupted(): boolean {
    return this.interrupted;
  }

  private deliver(result: LineResult): boolean {
    const waiter = this.waiter;
    if (!waiter) {
      return false;
    }
    this.waiter = null;
    waiter(result);
    return true;
  }

  /**
   * Next line, `timeout` when none arrives in time, or `end` once input closed.
   */
  next(timeoutMs?: number): Promise<LineResult> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve({ kind: 'line', line: queued });
    }
    if (this.ended) {
      return Promise.resolve({ kind: 'end' });
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      this.waiter = (result) => {
        if (timer) clearTimeout(timer);
        resolve(result);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiter = null;
          resolve({ kind: 'timeout' });
        }, timeoutMs);
      }
    });
  }

  /** Show a prompt and wait for the answer */
  ask(prompt: string, timeoutMs?: number): Promise<LineResult> {
    if (!this.ended) {
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    }
    return this.next(timeoutMs);
  }

  close(): void {
    if (!this.ended) {
      this.rl.close();
    }
  }
}

function throwIfInterrupted(reader: LineReader, stage: string): void {
  if (reader.wasInterrupted) {
    throw createError(ErrorCodes.CANCELLED_BY_USER, `Input aborted by user during ${stage}.`);
  }
}

function isFile(candidate: string): boolean {
  return existsSync(candidate) && statSync(candidate).isFile();
}

function isDirectory(candidate: string): boolean {
  return existsSync(candidate) && statSync(candidate).isDirectory();
}

export interface SourcePromptOptions {
  pasteTimeoutMs: number;
  /** Base for relative paths */
  cwd?: string;
}

/**
 * Ask for a file path or pasted content.
 *
 * @throws {ConversionError} NO_CONTENT when nothing usable was entered, CANCELLED_BY_USER on Ctrl-C
 */
export async function promptForSource(
  reader: LineReader,
  options: SourcePromptOptions,
): Promise<ConversionSource> {
  const { pasteTimeoutMs, cwd = process.cwd() } = options;
  const seconds = (pasteTimeoutMs / 1000).toFixed(1);

  console.log('Enter file path OR paste content directly (first line then subsequent lines).');
  console.log(chalk.gray(`(If pasting, input finalizes when no new line arrives for ${seconds}s)`));

  const first = await reader.ask('File path or first line of content: ');
  throwIfInterrupted(reader, 'source input');
  const firstLine = first.kind === 'line' ? first.line.trim() : '';

  if (firstLine) {
    const candidate = path.resolve(cwd, firstLine);
    if (isFile(candidate)) {
      console.log(`Reading from file: ${candidate}`);
      return { kind: 'file', path: candidate };
    }
    if (isDirectory(candidate)) {
      console.log(
        chalk.yellow(`'${firstLine}' is a directory. Treating it as the first line of pasted content.`),
      );
    }
  } else if (first.kind === 'line') {
    console.log('Empty first line. Assuming direct multi-line paste mode...');
  }

  const lines = firstLine ? [firstLine] : [];

  if (first.kind === 'line') {
    console.log(chalk.gray('Paste mode active. End the paste by pausing input.'));
    while (true) {
      const result = await reader.ask(lines.length === 0 ? '> ' : '.. ', pasteTimeoutMs);
      if (result.kind === 'line') {
        lines.push(result.line);
        continue;
      }
      throwIfInterrupted(reader, 'paste');
      if (result.kind === 'timeout' && lines.length > 0) {
        console.log(chalk.gray(`--- Input finalized (paused >${seconds}s) ---`));
      } else if (result.kind === 'end') {
        console.log(chalk.gray('--- Input stream ended ---'));
      }
      break;
    }
  }

  const text = lines.join('\n');
  if (!text.trim()) {
    throw createError(ErrorCodes.NO_CONTENT, 'No source content provided.');
  }
  return { kind: 'content', text };
}

/**
 * Ask for the output path until a non-empty answer is given.
 *
 * @throws {ConversionError} INVALID_ARGUMENT when input ends first, CANCELLED_BY_USER on Ctrl-C
 */
export async function promptForOutputPath(reader: LineReader): Promise<string> {
  while (true) {
    const answer = await reader.ask(
      'Specify path for output markdown file (e.g., output/my_doc.md): ',
    );
    throwIfInterrupted(reader, 'output path input');
    if (answer.kind !== 'line') {
      throw createError(ErrorCodes.INVALID_ARGUMENT, 'No output file path given.');
    }
    const value = answer.line.trim();
    if (value) {
      return value;
    }
    console.log(chalk.yellow('Output file path cannot be empty.'));
  }
}
