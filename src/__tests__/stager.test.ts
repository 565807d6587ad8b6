/**
 * @file stager.test.ts
 * @description Tests for copying the source into the scratch file
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { resolveScratchPath, stageContent, stageFile } from '../stager.js';
import { ErrorCodes } from '../error-handler.js';

describe('stager', () => {
  let tempDir: string;
  let scratchPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'ftm-stager-'));
    scratchPath = join(tempDir, 'scratch-pad', 'file_to_markdown_source.md');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('resolveScratchPath', () => {
    it('should place the scratch file under cwd', () => {
      expect(resolveScratchPath('scratch-pad', 'source.md', '/work')).toBe(
        resolve('/work', 'scratch-pad', 'source.md'),
      );
    });
  });

  describe('stageFile', () => {
    it('should copy the source bytes exactly', async () => {
      const bytes = Buffer.concat([
        Buffer.from('Quarterly notes\r\n\tcafé\n', 'utf-8'),
        Buffer.from([0x00, 0xff, 0xfe, 0x0a]),
      ]);
      const sourcePath = join(tempDir, 'notes.txt');
      await writeFile(sourcePath, bytes);

      const result = await stageFile(sourcePath, scratchPath);

      expect(result).toEqual({ scratchPath, bytesWritten: bytes.byteLength });
      expect((await readFile(scratchPath)).equals(bytes)).toBe(true);
    });

    it('should create the scratch directory when missing', async () => {
      const sourcePath = join(tempDir, 'a.txt');
      await writeFile(sourcePath, 'alpha');
      const nestedScratch = join(tempDir, 'one', 'two', 'scratch.md');

      await stageFile(sourcePath, nestedScratch);

      expect(await readFile(nestedScratch, 'utf-8')).toBe('alpha');
    });

    it('should overwrite a previous scratch file', async () => {
      await mkdir(join(tempDir, 'scratch-pad'));
      await writeFile(scratchPath, 'old run');
      const sourcePath = join(tempDir, 'b.txt');
      await writeFile(sourcePath, 'new');

      await stageFile(sourcePath, scratchPath);

      expect(await readFile(scratchPath, 'utf-8')).toBe('new');
    });

    it('should fail with FILE_NOT_FOUND and not create the scratch file', async () => {
      await expect(stageFile(join(tempDir, 'missing.txt'), scratchPath)).rejects.toMatchObject({
        code: ErrorCodes.FILE_NOT_FOUND,
      });
      expect(existsSync(scratchPath)).toBe(false);
      expect(existsSync(join(tempDir, 'scratch-pad'))).toBe(false);
    });

    it('should leave an existing scratch file untouched when the source is missing', async () => {
      await mkdir(join(tempDir, 'scratch-pad'));
      await writeFile(scratchPath, 'previous result');

      await expect(stageFile(join(tempDir, 'missing.txt'), scratchPath)).rejects.toMatchObject({
        code: ErrorCodes.FILE_NOT_FOUND,
      });
      expect(await readFile(scratchPath, 'utf-8')).toBe('previous result');
    });

    it('should reject a directory as source', async () => {
      const dir = join(tempDir, 'folder');
      await mkdir(dir);

      await expect(stageFile(dir, scratchPath)).rejects.toMatchObject({
        code: ErrorCodes.INVALID_ARGUMENT,
      });
      expect(existsSync(scratchPath)).toBe(false);
    });

    it('should fail with IO_ERROR when the scratch location is a directory', async () => {
      const sourcePath = join(tempDir, 'c.txt');
      await writeFile(sourcePath, 'gamma');
      await mkdir(scratchPath, { recursive: true });

      await expect(stageFile(sourcePath, scratchPath)).rejects.toMatchObject({
        code: ErrorCodes.IO_ERROR,
        details: { operation: 'write', path: scratchPath },
      });
    });
  });

  describe('stageContent', () => {
    it('should write pasted text as UTF-8', async () => {
      const result = await stageContent('line one\nligne deux é', scratchPath);

      expect(result.bytesWritten).toBe(Buffer.byteLength('line one\nligne deux é', 'utf-8'));
      expect(await readFile(scratchPath, 'utf-8')).toBe('line one\nligne deux é');
    });
  });
});
