// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Configuration Schema
 *
 * Zod schema for file-to-markdown.yaml. Keys are snake_case in YAML and
 * camelCase in the parsed config.
 *
 * @example
 * ```yaml
 * scratch_dir: scratch-pad
 * tool_command: ./run-aider.sh
 * default_extension: .md
 * tool_timeout_ms: 600000
 * ```
 *
 * @module config-schema
 */

import { z } from 'zod';
import {
  DEFAULT_PROMPT,
  INPUT_DEFAULTS,
  OUTPUT_DEFAULTS,
  SCRATCH_DEFAULTS,
  TOOL_DEFAULTS,
} from './constants.js';

/**
 * Wrapper command for the current platform.
 */
export function getDefaultToolCommand(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? TOOL_DEFAULTS.WINDOWS_COMMAND : TOOL_DEFAULTS.POSIX_COMMAND;
}

export const ConfigFileSchema = z
  .object({
    scratch_dir: z.string().min(1).default(SCRATCH_DEFAULTS.DIR_NAME),
    scratch_file_name: z.string().min(1).default(SCRATCH_DEFAULTS.FILE_NAME),
    tool_command: z.string().min(1).optional(),
    prompt: z.string().min(1).default(DEFAULT_PROMPT),
    default_extension: z
      .string()
      .regex(/^\.[^./\\]+$/, 'default_extension must look like ".md"')
      .default(OUTPUT_DEFAULTS.EXTENSION),
    paste_timeout_ms: z.number().int().positive().default(INPUT_DEFAULTS.PASTE_TIMEOUT_MS),
    /** Unset means the tool may run for as long as it likes */
    tool_timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

export interface ConversionConfig {
  scratchDir: string;
  scratchFileName: string;
  toolCommand: string;
  prompt: string;
  defaultExtension: string;
  pasteTimeoutMs: number;
  toolTimeoutMs?: number;
}

/**
 * Parse raw (YAML-decoded) config into a ConversionConfig.
 *
 * @throws {z.ZodError} When the input violates the schema
 */
export function parseConfig(raw: unknown = {}): ConversionConfig {
  const file = ConfigFileSchema.parse(raw ?? {});
  return {
    scratchDir: file.scratch_dir,
    scratchFileName: file.scratch_file_name,
    toolCommand: file.tool_command ?? getDefaultToolCommand(),
    prompt: file.prompt,
    defaultExtension: file.default_extension,
    pasteTimeoutMs: file.paste_timeout_ms,
    toolTimeoutMs: file.tool_timeout_ms,
  };
}

export function getDefaultConfig(): ConversionConfig {
  return parseConfig({});
}
