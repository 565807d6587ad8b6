// Copyright (c) 2026 Hellmai Ltd
// SPDX-License-Identifier: AGPL-3.0-only

/**
 * Conversion pipeline state machine
 *
 * - idle → staged (source copied to scratch)
 * - staged → invoked (external tool exited 0)
 * - invoked → published (scratch copied to output)
 * - idle | staged | invoked → failed
 * - published, failed → (terminal, no transitions)
 */

import { createError, ErrorCodes } from './error-handler.js';

export const PIPELINE_STATES = ['idle', 'staged', 'invoked', 'published', 'failed'] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['staged', 'failed'],
  staged: ['invoked', 'failed'],
  invoked: ['published', 'failed'],
  published: [],
  failed: [],
};

export function isTerminalState(state: PipelineState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Validates a state transition and throws if illegal
 *
 * @throws {ConversionError} STATE_ERROR for backwards, skipping or terminal transitions
 */
export function assertTransition(from: PipelineState, to: PipelineState): void {
  const allowedNextStates = TRANSITIONS[from];
  if (!allowedNextStates.includes(to)) {
    const terminalHint = isTerminalState(from) ? ` (${from} is a terminal state)` : '';
    throw createError(
      ErrorCodes.STATE_ERROR,
      `Illegal pipeline transition: ${from} → ${to}${terminalHint}`,
      { from, to, allowedNextStates },
    );
  }
}
