// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Shared constants for the file-to-markdown pipeline.
 *
 * @module constants
 */

/** Tool name used in CLI help, log prefixes and the config file name */
export const TOOL_NAME = 'file-to-markdown';

/** Prefix for warnings printed outside the CLI progress output */
export const LOG_PREFIX = `[${TOOL_NAME}]`;

/** Config file looked up in the project root */
export const CONFIG_FILE_NAME = `${TOOL_NAME}.yaml`;

/** Marker directory that also identifies a project root */
export const GIT_DIRECTORY_NAME = '.git';

export const SCRATCH_DEFAULTS = {
  /** Directory (relative to cwd) holding the intermediate file */
  DIR_NAME: 'scratch-pad',
  /** Intermediate file, overwritten on every run */
  FILE_NAME: 'file_to_markdown_source.md',
} as const;

export const OUTPUT_DEFAULTS = {
  /** Appended when the output path has no extension */
  EXTENSION: '.md',
} as const;

export const TOOL_DEFAULTS = {
  /** Wrapper that launches the coding assistant on Windows */
  WINDOWS_COMMAND: 'run-aider.bat',
  /** Wrapper that launches the coding assistant elsewhere */
  POSIX_COMMAND: 'run-aider.sh',
} as const;

/** Extensions that Windows only runs through the command interpreter */
export const WINDOWS_SCRIPT_EXTENSIONS = ['.bat', '.cmd'];

/** Captured stdout/stderr size per stream; the tool is never cut off for being chatty */
export const TOOL_OUTPUT_MAX_BUFFER = Infinity;

export const INPUT_DEFAULTS = {
  /** Paste mode ends when no new line arrives within this window */
  PASTE_TIMEOUT_MS: 2000,
} as const;

/** Instruction handed to the external tool together with the scratch path */
export const DEFAULT_PROMPT =
  'Please convert the entire content of this file into well-formatted markdown. ' +
  'Replace the existing content of this file with *only* the generated markdown. ' +
  'Do not add any conversational text, commentary, introductions, or summaries.';

export const UTF8_ENCODING = 'utf-8';

export const EXIT_CODES = {
  /** Success exit code */
  SUCCESS: 0,
  /** Generic error exit code */
  ERROR: 1,
} as const;
