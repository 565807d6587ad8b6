// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Configuration Loader
 *
 * Loads file-to-markdown.yaml from the project root. A missing file means
 * defaults, as does an empty one (with a warning); a file that does not parse
 * or validate is a CONFIG_ERROR.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ZodError } from 'zod';
import { type ConversionConfig, parseConfig } from './config-schema.js';
import { CONFIG_FILE_NAME, GIT_DIRECTORY_NAME, LOG_PREFIX, UTF8_ENCODING } from './constants.js';
import { createError, ErrorCodes, getErrorMessage } from './error-handler.js';

export { type ConversionConfig, getDefaultConfig } from './config-schema.js';

/**
 * Values given on the command line; they win over the config file.
 */
export type ConfigOverrides = Partial<
  Pick<ConversionConfig, 'scratchDir' | 'toolCommand' | 'prompt'>
>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Directory to start the project root search from */
  cwd?: string;
  overrides?: ConfigOverrides;
}

/**
 * Find project root by looking for the config file, then .git
 *
 * @param startDir - Directory to start searching from
 * @returns Project root path or the start directory
 */
export function findProjectRoot(startDir: string = process.cwd()): string {
  const start = path.resolve(startDir);
  let currentDir = start;
  const filesystemRoot = path.parse(currentDir).root;

  while (true) {
    if (fs.existsSync(path.join(currentDir, CONFIG_FILE_NAME))) {
      return currentDir;
    }

    if (fs.existsSync(path.join(currentDir, GIT_DIRECTORY_NAME))) {
      return currentDir;
    }

    if (currentDir === filesystemRoot) {
      break;
    }

    currentDir = path.dirname(currentDir);
  }

  return start;
}

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate a config file.
 *
 * @throws {ConversionError} CONFIG_ERROR when the file cannot be read, parsed or validated
 */
export function readConfigFile(configPath: string): ConversionConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, UTF8_ENCODING);
  } catch (error) {
    throw createError(
      ErrorCodes.CONFIG_ERROR,
      `Cannot read config ${configPath}: ${getErrorMessage(error)}`,
      { path: configPath },
    );
  }

  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    throw createError(
      ErrorCodes.CONFIG_ERROR,
      `Invalid YAML in ${configPath}: ${getErrorMessage(error)}`,
      { path: configPath },
    );
  }

  if (raw === null || raw === undefined) {
    console.warn(`${LOG_PREFIX} ${configPath} is empty. Using defaults.`);
  }

  try {
    return parseConfig(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw createError(
        ErrorCodes.CONFIG_ERROR,
        `Invalid config in ${configPath}: ${formatZodIssues(error)}`,
        { path: configPath, issues: error.issues },
      );
    }
    throw error;
  }
}

/**
 * Resolve the effective configuration for one run.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConversionConfig {
  const { configPath, cwd = process.cwd(), overrides = {} } = options;

  let config: ConversionConfig;
  if (configPath) {
    config = readConfigFile(path.resolve(cwd, configPath));
  } else {
    const defaultPath = path.join(findProjectRoot(cwd), CONFIG_FILE_NAME);
    config = fs.existsSync(defaultPath) ? readConfigFile(defaultPath) : parseConfig({});
  }

  return {
    ...config,
    ...(overrides.scratchDir !== undefined && { scratchDir: overrides.scratchDir }),
    ...(overrides.toolCommand !== undefined && { toolCommand: overrides.toolCommand }),
    ...(overrides.prompt !== undefined && { prompt: overrides.prompt }),
  };
}
