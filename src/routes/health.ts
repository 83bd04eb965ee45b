/**
 * @fileoverview Service health endpoint.
 */

import type { Request, Response } from 'express';
import type { Dispatcher } from '../dispatcher/index.js';

export function createHealthHandler(dispatcher: Dispatcher) {
  return (_req: Request, res: Response): void => {
    const agents = dispatcher.listAgents();
    res.json({
      status: 'ok',
      agents: {
        total: agents.length,
        reachable: agents.filter(agent => agent.health !== 'UNREACHABLE').length,
      },
      timestamp: new Date().toISOString(),
    });
  };
}
