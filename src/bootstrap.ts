/**
 * @fileoverview Builds the dispatcher service from configuration.
 *
 * Kept separate from the server entry point so tests and embedding
 * applications can construct the same object graph without listening
 * on a port.
 */

import fs from 'fs';
import Anthropic from '@anthropic-ai/sdk';
import type { AppConfig } from './config.js';
import {
  createAgentRegistry,
  createAnthropicClassifier,
  createClassifierMatcher,
  createDispatcher,
  createHealthChecker,
  createTagMatcher,
  type AgentRegistration,
  type AgentRegistry,
  type CapabilityMatcher,
  type Dispatcher,
} from './dispatcher/index.js';
import {
  InProcessTransport,
  createHttpTransport,
  createSchemeTransport,
  type AgentTransport,
} from './transport/index.js';
import { createSessionEvictor, createSessionStore, type SessionStore } from './services/session/index.js';
import type { Poller } from './services/poller.js';
import { ValidationError } from './utils/errors.js';
import { createLogger } from './utils/observability/index.js';

const logger = createLogger({ domain: 'bootstrap' });

export interface DispatcherService {
  dispatcher: Dispatcher;
  registry: AgentRegistry;
  /** Register in-process agents here; their endpoint refs use `local:` */
  localAgents: InProcessTransport;
  sessions: SessionStore;
  /** Start background pollers (session eviction, optional health checks) */
  start(): void;
  /** Stop pollers and release the session store */
  shutdown(): Promise<void>;
}

export interface ServiceOverrides {
  transport?: AgentTransport;
  matcher?: CapabilityMatcher;
  sessions?: SessionStore;
}

function isRegistration(value: unknown): value is AgentRegistration {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && 'endpointRef' in value && 'capabilities' in value;
}

/**
 * Read agent registrations from a JSON file containing an array.
 */
export function loadAgentsFile(filePath: string): AgentRegistration[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new ValidationError(`Agents file must contain a JSON array: ${filePath}`);
  }
  const invalid = parsed
    .map((entry, index) => (isRegistration(entry) ? null : `entry ${index} needs id, endpointRef and capabilities`))
    .filter((issue): issue is string => issue !== null);
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid agents file: ${filePath}`, invalid);
  }
  return parsed.filter(isRegistration);
}

function buildMatcher(config: AppConfig): CapabilityMatcher {
  const unreachablePolicy = config.dispatch.unreachablePolicy;
  if (config.matcher.strategy === 'classifier' && config.anthropicApiKey) {
    const client = new Anthropic({ apiKey: config.anthropicApiKey });
    return createClassifierMatcher({
      classify: createAnthropicClassifier(client, config.matcher.classifierModel),
      unreachablePolicy,
    });
  }
  return createTagMatcher({ unreachablePolicy });
}

export function createDispatcherService(config: AppConfig, overrides: ServiceOverrides = {}): DispatcherService {
  const registry = createAgentRegistry();
  const localAgents = new InProcessTransport();
  const httpTransport = createHttpTransport();
  const transport = overrides.transport ?? createSchemeTransport({
    'local:': localAgents,
    'http:': httpTransport,
    'https:': httpTransport,
  });
  const sessions = overrides.sessions ?? createSessionStore(config.session);

  const dispatcher = createDispatcher({
    registry,
    matcher: overrides.matcher ?? buildMatcher(config),
    transport,
    sessions,
    attemptTimeoutMs: config.dispatch.attemptTimeoutMs,
    minConfidence: config.dispatch.minConfidence,
  });

  if (config.agentsFile) {
    const registrations = loadAgentsFile(config.agentsFile);
    for (const registration of registrations) {
      dispatcher.registerAgent(registration);
    }
    logger.info('agents_file_loaded', { count: registrations.length });
  }

  const pollers: Poller[] = [createSessionEvictor(sessions, config.session.evictionIntervalMs)];
  if (config.healthCheck.intervalMs > 0) {
    pollers.push(createHealthChecker(
      { registry, transport, timeoutMs: config.healthCheck.timeoutMs },
      config.healthCheck.intervalMs
    ));
  }

  return {
    dispatcher,
    registry,
    localAgents,
    sessions,
    start(): void {
      for (const poller of pollers) poller.start();
    },
    async shutdown(): Promise<void> {
      await Promise.all(pollers.map(poller => poller.stop()));
      sessions.shutdown();
    },
  };
}
