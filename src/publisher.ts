// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Publisher
 *
 * Copies the scratch file, as the external tool left it, to the output path.
 * The content is not inspected.
 *
 * @module publisher
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { OUTPUT_DEFAULTS } from './constants.js';
import { createError, createIOError, ErrorCodes } from './error-handler.js';

export interface PublishResult {
  /** Absolute output path */
  outputPath: string;
  bytesWritten: number;
}

/**
 * Append the default extension when the path has none.
 *
 * @example
 * resolveOutputPath('notes'); // 'notes.md'
 * resolveOutputPath('out/report.txt'); // 'out/report.txt'
 * resolveOutputPath('out/'); // 'out.md'
 */
export function resolveOutputPath(
  outputPath: string,
  defaultExtension: string = OUTPUT_DEFAULTS.EXTENSION,
): string {
  const trimmed = outputPath.trim();
  if (!trimmed) {
    throw createError(ErrorCodes.INVALID_ARGUMENT, 'Output file path cannot be empty.');
  }
  // 'out/' names the file 'out', not a hidden file inside it
  const withoutTrailingSeparator = trimmed.replace(/[\\/]+$/, '');
  if (!withoutTrailingSeparator || withoutTrailingSeparator.endsWith(':')) {
    throw createError(
      ErrorCodes.INVALID_ARGUMENT,
      `Output file path '${trimmed}' names a directory, not a file.`,
      { path: trimmed },
    );
  }
  return path.extname(withoutTrailingSeparator) === ''
    ? `${withoutTrailingSeparator}${defaultExtension}`
    : withoutTrailingSeparator;
}

/**
 * Copy the scratch file's current content to outputPath, creating parent
 * directories.
 *
 * @throws {ConversionError} IO_ERROR on read, mkdir or write failure
 */
export async function publish(scratchPath: string, outputPath: string): Promise<PublishResult> {
  const target = path.resolve(outputPath);

  let content: Buffer;
  try {
    content = await readFile(scratchPath);
  } catch (error) {
    throw createIOError('read', scratchPath, error);
  }

  try {
    await mkdir(path.dirname(target), { recursive: true });
  } catch (error) {
    throw createIOError('create directory for', target, error);
  }

  try {
    await writeFile(target, content);
  } catch (error) {
    throw createIOError('write', target, error);
  }

  return { outputPath: target, bytesWritten: content.byteLength };
}
