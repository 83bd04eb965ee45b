/**
 * @fileoverview Dispatch routes.
 *
 * Routes:
 * - POST /dispatch         - Route a request to one agent, respond with the result
 * - POST /dispatch/stream  - Same, streamed as NDJSON events
 *
 * A client disconnect cancels the dispatch, including the in-flight attempt.
 */

import { Router, type Request, type Response } from 'express';
import type { Dispatcher } from '../dispatcher/index.js';
import type { DispatchRequest } from '../dispatcher/types.js';
import { ValidationError } from '../utils/errors.js';
import { eventBody, errorBody, isRecord, resultBody, resultStatus, sendError, statusForError } from './errors.js';

function optionalStringArray(value: unknown, field: string, issues: string[]): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every(v => typeof v === 'string')) {
    issues.push(`${field} must be an array of strings`);
    return undefined;
  }
  return value.filter((v): v is string => typeof v === 'string');
}

export function parseDispatchRequest(body: unknown): DispatchRequest {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const fields = body;
  const issues: string[] = [];

  if (fields.payload === undefined || fields.payload === null || fields.payload === '') {
    issues.push('payload is required');
  }
  const requiredCapabilities = optionalStringArray(fields.requiredCapabilities, 'requiredCapabilities', issues);
  const preferredCapabilities = optionalStringArray(fields.preferredCapabilities, 'preferredCapabilities', issues);
  if (fields.sessionId !== undefined && (typeof fields.sessionId !== 'string' || !fields.sessionId.trim())) {
    issues.push('sessionId must be a non-empty string');
  }

  if (issues.length > 0) {
    throw new ValidationError('Invalid dispatch request', issues);
  }

  return Object.freeze({
    payload: fields.payload,
    ...(requiredCapabilities ? { requiredCapabilities } : {}),
    ...(preferredCapabilities ? { preferredCapabilities } : {}),
    ...(typeof fields.sessionId === 'string' ? { sessionId: fields.sessionId } : {}),
  });
}

/** Abort when the client goes away before the response is finished. */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
  });
  return controller;
}

export function createDispatchRouter(dispatcher: Dispatcher): Router {
  const router = Router();

  router.post('/dispatch', async (req: Request, res: Response) => {
    try {
      const request = parseDispatchRequest(req.body);
      const controller = abortOnDisconnect(res);
      const result = await dispatcher.submit(request, { signal: controller.signal });
      res.status(resultStatus(result)).json(resultBody(result));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/dispatch/stream', async (req: Request, res: Response) => {
    let request: DispatchRequest;
    try {
      request = parseDispatchRequest(req.body);
    } catch (error) {
      sendError(res, error);
      return;
    }

    const controller = abortOnDisconnect(res);
    try {
      for await (const event of dispatcher.submitStream(request, { signal: controller.signal })) {
        if (!res.headersSent) {
          res.status(200).type('application/x-ndjson');
        }
        res.write(`${JSON.stringify(eventBody(event))}\n`);
      }
      res.end();
    } catch (error) {
      if (!res.headersSent) {
        sendError(res, error);
        return;
      }
      res.end(`${JSON.stringify({ type: 'error', status: statusForError(error), ...errorBody(error) })}\n`);
    }
  });

  return router;
}
