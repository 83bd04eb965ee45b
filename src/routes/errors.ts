/**
 * @fileoverview Shared HTTP error and result serialization for routes.
 */

import type { Response } from 'express';
import type { DispatchEvent, DispatchResult } from '../dispatcher/types.js';
import { AppError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http-api' });

const STATUS_BY_CODE: Record<string, number> = {
  validation_failed: 400,
  unknown_agent: 404,
  unknown_session: 404,
  no_candidate: 404,
  duplicate_agent: 409,
  session_busy: 409,
  dispatch_cancelled: 499,
  all_candidates_failed: 502,
  transport_unreachable: 502,
  transport_protocol: 502,
  transport_timeout: 504,
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function statusForError(error: unknown): number {
  if (error instanceof AppError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

export function errorBody(error: unknown): { error: { code: string; message: string; issues?: string[] } } {
  if (error instanceof ValidationError) {
    return { error: { code: error.code, message: error.message, issues: error.issues } };
  }
  if (error instanceof AppError) {
    return { error: { code: error.code, message: error.message } };
  }
  return { error: { code: 'internal_error', message: 'Internal server error' } };
}

/**
 * Send an error response. Unexpected errors are logged; AppErrors are
 * caller-facing and only logged at debug.
 */
export function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  if (status >= 500 && !(error instanceof AppError)) {
    logger.error('request_failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  res.status(status).json(errorBody(error));
}

export function resultBody(result: DispatchResult): Record<string, unknown> {
  if (result.error) {
    return {
      sessionId: result.sessionId,
      attempts: result.attempts,
      ...errorBody(result.error),
    };
  }
  return {
    sessionId: result.sessionId,
    agentId: result.agentId,
    response: result.response,
    attempts: result.attempts,
  };
}

export function resultStatus(result: DispatchResult): number {
  return result.error ? statusForError(result.error) : 200;
}

export function eventBody(event: DispatchEvent): Record<string, unknown> {
  if (event.type === 'result') {
    return { type: 'result', result: resultBody(event.result) };
  }
  return { ...event };
}
