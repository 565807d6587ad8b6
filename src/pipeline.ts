// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Conversion pipeline: stage → invoke → publish.
 *
 * One job runs start to finish. A failure at any step moves the job to
 * `failed` and stops it; the scratch file is left for inspection.
 *
 * @module pipeline
 */

import { LOG_PREFIX } from './constants.js';
import { getErrorMessage } from './error-handler.js';
import { invokeTool, type ExternalTool, type ToolRunResult } from './invoker.js';
import { publish } from './publisher.js';
import { stageContent, stageFile } from './stager.js';
import { assertTransition, isTerminalState, type PipelineState } from './state-machine.js';

/**
 * Where the content comes from: a file, or text pasted by the user.
 */
export type ConversionSource = { kind: 'file'; path: string } | { kind: 'content'; text: string };

export interface ConversionJob {
  source: ConversionSource;
  /** Absolute scratch file path */
  scratchPath: string;
  /** Output path with the default extension already applied */
  outputPath: string;
  prompt: string;
}

export interface StateChange {
  from: PipelineState;
  to: PipelineState;
  job: ConversionJob;
  /** Set when to === 'failed' */
  error?: unknown;
}

export interface RunConversionOptions {
  tool: ExternalTool;
  onStateChange?: (change: StateChange) => void;
}

export interface ConversionResult {
  state: 'published';
  scratchPath: string;
  outputPath: string;
  bytesWritten: number;
  toolResult: ToolRunResult;
}

/**
 * Run one conversion job.
 *
 * @throws The error of the step that failed, after reporting `failed`
 */
export async function runConversion(
  job: ConversionJob,
  options: RunConversionOptions,
): Promise<ConversionResult> {
  const { tool, onStateChange } = options;
  let state: PipelineState = 'idle';

  const moveTo = (to: PipelineState, error?: unknown): void => {
    assertTransition(state, to);
    const from = state;
    state = to;
    onStateChange?.({ from, to, job, ...(error !== undefined && { error }) });
  };

  try {
    if (job.source.kind === 'file') {
      await stageFile(job.source.path, job.scratchPath);
    } else {
      await stageContent(job.source.text, job.scratchPath);
    }
    moveTo('staged');

    const toolResult = invokeTool(tool, job.scratchPath, job.prompt);
    moveTo('invoked');

    const published = await publish(job.scratchPath, job.outputPath);
    moveTo('published');

    return {
      state: 'published',
      scratchPath: job.scratchPath,
      outputPath: published.outputPath,
      bytesWritten: published.bytesWritten,
      toolResult,
    };
  } catch (error) {
    if (!isTerminalState(state)) {
      try {
        moveTo('failed', error);
      } catch (reportError) {
        // The step's own error is the one callers see
        console.warn(
          `${LOG_PREFIX} Failed to report pipeline failure: ${getErrorMessage(reportError)}`,
        );
      }
    }
    throw error;
  }
}
