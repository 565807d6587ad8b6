// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Library entry: the conversion pipeline and its building blocks, for use
 * without the CLI.
 */

export * from './error-handler.js';
export * from './config.js';
export { ConfigFileSchema, getDefaultToolCommand, parseConfig } from './config-schema.js';
export * from './state-machine.js';
export * from './stager.js';
export * from './invoker.js';
export * from './publisher.js';
export * from './pipeline.js';
export { LineReader, promptForOutputPath, promptForSource } from './source-input.js';
export { fileToMarkdown, type FileToMarkdownDeps, type FileToMarkdownOptions } from './file-to-markdown.js';
