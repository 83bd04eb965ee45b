/**
 * Dispatcher facade.
 *
 * The caller-facing API: submit requests (plain or streaming), manage
 * registrations, and inspect sessions. Wires the registry, matcher,
 * transport and session store into a DispatchRouter.
 */

import type {
  AgentDescriptor,
  AgentHealth,
  AgentRegistration,
  AgentRegistry,
  CapabilityMatcher,
  DispatchEvent,
  DispatchRequest,
  DispatchResult,
} from './types.js';
import type { AgentTransport } from '../transport/types.js';
import type { ConversationSession, SessionStore } from '../services/session/types.js';
import { createDispatchRouter, type SubmitOptions } from './router.js';

export type * from './types.js';
export { createAgentRegistry, normalizeCapabilities } from './registry.js';
export { createTagMatcher } from './matcher.js';
export { createClassifierMatcher, createAnthropicClassifier } from './classifier.js';
export { createHealthChecker, checkAgentHealth } from './health-checker.js';
export type { SubmitOptions } from './router.js';

export interface DispatcherDependencies {
  registry: AgentRegistry;
  matcher: CapabilityMatcher;
  transport: AgentTransport;
  sessions: SessionStore;
  attemptTimeoutMs: number;
  minConfidence?: number;
  now?: () => number;
}

export interface Dispatcher {
  submit(request: DispatchRequest, options?: SubmitOptions): Promise<DispatchResult>;
  submitStream(request: DispatchRequest, options?: Pick<SubmitOptions, 'signal'>): AsyncGenerator<DispatchEvent, void, undefined>;
  registerAgent(registration: AgentRegistration): AgentDescriptor;
  deregisterAgent(id: string): AgentDescriptor;
  listAgents(): readonly AgentDescriptor[];
  updateHealth(id: string, health: AgentHealth): boolean;
  getSession(sessionId: string): Promise<ConversationSession | undefined>;
  closeSession(sessionId: string): Promise<boolean>;
}

export function createDispatcher(deps: DispatcherDependencies): Dispatcher {
  const router = createDispatchRouter(deps);
  const { registry, sessions } = deps;

  return {
    submit: (request, options) => router.submit(request, options),
    submitStream: (request, options) => router.submitStream(request, options),
    registerAgent: registration => registry.register(registration),
    deregisterAgent: id => registry.deregister(id),
    listAgents: () => registry.snapshot(),
    updateHealth: (id, health) => registry.updateHealth(id, health),
    getSession: sessionId => sessions.get(sessionId),
    closeSession: sessionId => sessions.close(sessionId),
  };
}
