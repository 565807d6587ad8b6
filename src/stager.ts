// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Stager
 *
 * Copies the source into the scratch file the external tool will edit.
 * Content is copied as bytes; nothing is transformed here.
 *
 * @module stager
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { UTF8_ENCODING } from './constants.js';
import { createError, createIOError, ErrorCodes, getSystemErrorCode } from './error-handler.js';

export interface StageResult {
  /** Absolute scratch file path */
  scratchPath: string;
  bytesWritten: number;
}

/**
 * Resolve the scratch file location for a run.
 */
export function resolveScratchPath(
  scratchDir: string,
  scratchFileName: string,
  cwd: string = process.cwd(),
): string {
  return resolve(cwd, scratchDir, scratchFileName);
}

async function writeScratch(scratchPath: string, content: Buffer): Promise<StageResult> {
  const target = resolve(scratchPath);
  try {
    await mkdir(dirname(target), { recursive: true });
  } catch (error) {
    throw createIOError('create directory for', target, error);
  }
  try {
    await writeFile(target, content);
  } catch (error) {
    throw createIOError('write', target, error);
  }
  return { scratchPath: target, bytesWritten: content.byteLength };
}

/**
 * Stage a source file: read it fully, then write it verbatim to the scratch path.
 *
 * The source is read before the scratch location is touched, so a failed read
 * leaves any previous scratch file as it was.
 *
 * @throws {ConversionError} FILE_NOT_FOUND, INVALID_ARGUMENT (directory) or IO_ERROR
 */
export async function stageFile(sourcePath: string, scratchPath: string): Promise<StageResult> {
  const source = resolve(sourcePath);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(source)).isDirectory();
  } catch (error) {
    const systemCode = getSystemErrorCode(error);
    if (systemCode === 'ENOENT' || systemCode === 'ENOTDIR') {
      throw createError(ErrorCodes.FILE_NOT_FOUND, `Source file not found: ${sourcePath}`, {
        path: source,
      });
    }
    throw createIOError('stat', source, error);
  }

  if (isDirectory) {
    throw createError(
      ErrorCodes.INVALID_ARGUMENT,
      `'${sourcePath}' is a directory. Provide a file path or paste content.`,
      { path: source },
    );
  }

  let content: Buffer;
  try {
    content = await readFile(source);
  } catch (error) {
    throw createIOError('read', source, error);
  }

  return writeScratch(scratchPath, content);
}

/**
 * Stage pasted text as UTF-8.
 */
export async function stageContent(content: string, scratchPath: string): Promise<StageResult> {
  return writeScratch(scratchPath, Buffer.from(content, UTF8_ENCODING));
}
