/**
 * Dispatcher test harness.
 *
 * Builds a registry, in-process transport, memory session store and
 * router wired together, with helpers for scripting fake agents.
 */

import { vi } from 'vitest';
import { createAgentRegistry } from '../../src/dispatcher/registry.js';
import { createTagMatcher } from '../../src/dispatcher/matcher.js';
import { createDispatcher, type Dispatcher } from '../../src/dispatcher/index.js';
import type { AgentRegistry, CapabilityMatcher } from '../../src/dispatcher/types.js';
import {
  InProcessTransport,
  completed,
  declined,
  type LocalAgentHandler,
} from '../../src/transport/in-process.js';
import { TransportError, type TransportReply } from '../../src/transport/types.js';
import { MemorySessionStore } from '../../src/services/session/memory.js';
import type { SessionConcurrencyPolicy } from '../../src/services/session/types.js';

export interface Harness {
  registry: AgentRegistry;
  transport: InProcessTransport;
  sessions: MemorySessionStore;
  dispatcher: Dispatcher;
  /** Register an agent backed by an in-process handler */
  addAgent(id: string, capabilities: string[], handler: LocalAgentHandler): void;
}

export interface HarnessOptions {
  attemptTimeoutMs?: number;
  minConfidence?: number;
  matcher?: CapabilityMatcher;
  concurrency?: SessionConcurrencyPolicy;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const registry = createAgentRegistry();
  const transport = new InProcessTransport();
  const sessions = new MemorySessionStore({ idleTtlMs: 60_000, concurrency: options.concurrency });
  const dispatcher = createDispatcher({
    registry,
    matcher: options.matcher ?? createTagMatcher(),
    transport,
    sessions,
    attemptTimeoutMs: options.attemptTimeoutMs ?? 1000,
    minConfidence: options.minConfidence,
  });

  return {
    registry,
    transport,
    sessions,
    dispatcher,
    addAgent(id, capabilities, handler) {
      registry.register({ id, capabilities, endpointRef: transport.register(id, handler) });
    },
  };
}

/** Handler that answers with fixed text. */
export function answers(text: string) {
  return vi.fn<LocalAgentHandler>(async () => completed(text));
}

/** Handler that declines every request. */
export function declines(reason = 'not mine') {
  return vi.fn<LocalAgentHandler>(async () => declined(reason));
}

/** Handler that fails as if the agent could not be reached. */
export function unreachable() {
  return vi.fn<LocalAgentHandler>(async () => {
    throw new TransportError('connection refused', 'UNREACHABLE');
  });
}

/** Handler that never answers until its signal aborts. */
export function hangs() {
  return vi.fn<LocalAgentHandler>((_message, context) => new Promise<TransportReply>((_, reject) => {
    context.signal.addEventListener('abort', () => reject(context.signal.reason), { once: true });
  }));
}
