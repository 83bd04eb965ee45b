/**
 * @fileoverview Session inspection routes.
 *
 * Routes:
 * - GET    /sessions/:id - Session pin and dispatch history
 * - DELETE /sessions/:id - Close a session (deferred while a turn is in flight)
 */

import { Router, type Request, type Response } from 'express';
import type { Dispatcher } from '../dispatcher/index.js';
import { resultBody, sendError } from './errors.js';

export function createSessionsRouter(dispatcher: Dispatcher): Router {
  const router = Router();

  router.get('/sessions/:id', async (req: Request<{ id: string }>, res: Response) => {
    try {
      const session = await dispatcher.getSession(req.params.id);
      if (!session) {
        res.status(404).json({ error: { code: 'unknown_session', message: 'Session not found' } });
        return;
      }
      res.json({
        session: {
          sessionId: session.sessionId,
          pinnedAgentId: session.pinnedAgentId ?? null,
          createdAt: session.createdAt,
          lastActiveAt: session.lastActiveAt,
          history: session.history.map(resultBody),
        },
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.delete('/sessions/:id', async (req: Request<{ id: string }>, res: Response) => {
    try {
      const closed = await dispatcher.closeSession(req.params.id);
      if (!closed) {
        res.status(404).json({ error: { code: 'unknown_session', message: 'Session not found' } });
        return;
      }
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
