/**
 * @fileoverview Agent registration routes.
 *
 * Routes:
 * - GET    /agents              - List registered agents
 * - POST   /agents              - Register an agent
 * - POST   /agents/discover     - Register an agent from its published card
 * - DELETE /agents/:id          - Deregister an agent
 * - PUT    /agents/:id/health   - Report an agent's health (external checkers)
 */

import { Router, type Request, type Response } from 'express';
import type { Dispatcher } from '../dispatcher/index.js';
import { AGENT_HEALTH_STATES, type AgentHealth, type AgentRegistration } from '../dispatcher/types.js';
import { discoverAgent } from '../transport/index.js';
import { ValidationError } from '../utils/errors.js';
import { isRecord, sendError } from './errors.js';

function isHealth(value: unknown): value is AgentHealth {
  return AGENT_HEALTH_STATES.some(state => state === value);
}

function parseRegistration(body: unknown): AgentRegistration {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const { id, name, description, capabilities, endpointRef } = body;
  const issues: string[] = [];

  if (typeof id !== 'string' || !id.trim()) issues.push('id is required');
  if (typeof endpointRef !== 'string' || !endpointRef.trim()) issues.push('endpointRef is required');
  if (!Array.isArray(capabilities) || !capabilities.every(c => typeof c === 'string')) {
    issues.push('capabilities must be an array of strings');
  }
  if (name !== undefined && typeof name !== 'string') issues.push('name must be a string');
  if (description !== undefined && typeof description !== 'string') issues.push('description must be a string');

  if (issues.length > 0 || typeof id !== 'string' || typeof endpointRef !== 'string' || !Array.isArray(capabilities)) {
    throw new ValidationError('Invalid agent registration', issues);
  }

  return {
    id,
    endpointRef,
    capabilities: capabilities.filter((c): c is string => typeof c === 'string'),
    ...(typeof name === 'string' ? { name } : {}),
    ...(typeof description === 'string' ? { description } : {}),
  };
}

export function createAgentsRouter(dispatcher: Dispatcher): Router {
  const router = Router();

  router.get('/agents', (_req: Request, res: Response) => {
    res.json({ agents: dispatcher.listAgents() });
  });

  router.post('/agents', (req: Request, res: Response) => {
    try {
      const agent = dispatcher.registerAgent(parseRegistration(req.body));
      res.status(201).json({ agent });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/agents/discover', async (req: Request, res: Response) => {
    try {
      const url: unknown = req.body?.url;
      if (typeof url !== 'string' || !/^https?:\/\//.test(url)) {
        throw new ValidationError('url must be an http(s) URL');
      }
      const agent = dispatcher.registerAgent(await discoverAgent(url));
      res.status(201).json({ agent });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.delete('/agents/:id', (req: Request<{ id: string }>, res: Response) => {
    try {
      dispatcher.deregisterAgent(req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  router.put('/agents/:id/health', (req: Request<{ id: string }>, res: Response) => {
    try {
      const health: unknown = req.body?.health;
      if (!isHealth(health)) {
        throw new ValidationError(`health must be one of ${AGENT_HEALTH_STATES.join(', ')}`);
      }
      const applied = dispatcher.updateHealth(req.params.id, health);
      res.json({ applied });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
