/**
 * @fileoverview Error taxonomy for the dispatcher.
 *
 * - AppError: base class carrying a stable code, a recoverability flag and context
 * - Registry misuse (DuplicateAgentError, UnknownAgentError) surfaces immediately
 * - Dispatch failures distinguish "no one could do this" (NoCandidateError) from
 *   "everyone tried and failed" (AllCandidatesFailedError)
 * - withErrorContext: wraps operations with consistent error logging
 */

import { createLogger } from './observability/index.js';
import type { AttemptRecord } from '../dispatcher/types.js';

const logger = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class DuplicateAgentError extends AppError {
  constructor(public readonly agentId: string) {
    super(`Agent already registered: ${agentId}`, 'duplicate_agent', false, { agentId });
    this.name = 'DuplicateAgentError';
  }
}

export class UnknownAgentError extends AppError {
  constructor(public readonly agentId: string) {
    super(`Unknown agent: ${agentId}`, 'unknown_agent', false, { agentId });
    this.name = 'UnknownAgentError';
  }
}

/**
 * No registered agent matched the request. Nothing was sent to any agent.
 */
export class NoCandidateError extends AppError {
  constructor(public readonly requiredCapabilities: readonly string[] = []) {
    super(
      requiredCapabilities.length > 0
        ? `No agent declares capabilities: ${requiredCapabilities.join(', ')}`
        : 'No agent available for this request',
      'no_candidate',
      false,
      { requiredCapabilities }
    );
    this.name = 'NoCandidateError';
  }
}

/**
 * Every ranked candidate was tried and none produced a response.
 */
export class AllCandidatesFailedError extends AppError {
  constructor(public readonly attempts: readonly AttemptRecord[]) {
    super(
      `All ${attempts.length} candidate agent(s) failed`,
      'all_candidates_failed',
      false,
      { attempts: attempts.map(a => ({ agentId: a.agentId, outcome: a.outcome })) }
    );
    this.name = 'AllCandidatesFailedError';
  }
}

export class DispatchCancelledError extends AppError {
  constructor(public readonly attempts: readonly AttemptRecord[]) {
    super('Dispatch cancelled by caller', 'dispatch_cancelled', false, { attemptCount: attempts.length });
    this.name = 'DispatchCancelledError';
  }
}

/**
 * A turn was submitted for a session that already has one in flight
 * and the store is configured to reject rather than queue.
 */
export class SessionBusyError extends AppError {
  constructor(public readonly sessionId: string) {
    super(`Session has a dispatch in flight: ${sessionId}`, 'session_busy', true, { sessionId });
    this.name = 'SessionBusyError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'validation_failed', false, { issues });
    this.name = 'ValidationError';
  }
}

/** Terminal dispatch errors that end up in DispatchResult.error. */
export type DispatchError =
  | NoCandidateError
  | AllCandidatesFailedError
  | DispatchCancelledError;

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logger.error('operation_failed', {
      operation: context,
      error: error instanceof Error ? error.message : String(error),
      code: error instanceof AppError ? error.code : undefined,
    });
    throw error;
  }
}
