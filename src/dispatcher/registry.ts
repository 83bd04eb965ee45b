/**
 * Agent Registry
 *
 * Source of truth for "who can be dispatched to". Descriptors are frozen
 * and replaced on every mutation, so a snapshot handed to the matcher
 * stays consistent while registrations and health updates continue.
 */

import type {
  AgentDescriptor,
  AgentHealth,
  AgentRegistration,
  AgentRegistry,
  RegistrySnapshot,
} from './types.js';
import { DuplicateAgentError, UnknownAgentError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'agent-registry' });

export interface RegistryOptions {
  /** Clock used for registration and health timestamps */
  now?: () => number;
}

/**
 * Normalise capability tags: trim, lower-case, drop empties and duplicates.
 * Declaration order is kept.
 */
export function normalizeCapabilities(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const normalized = tag.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

function validateRegistration(registration: AgentRegistration): void {
  const issues: string[] = [];
  if (typeof registration.id !== 'string' || registration.id.trim() === '') {
    issues.push('id must be a non-empty string');
  }
  if (typeof registration.endpointRef !== 'string' || registration.endpointRef.trim() === '') {
    issues.push('endpointRef must be a non-empty string');
  }
  if (!Array.isArray(registration.capabilities) || registration.capabilities.some(c => typeof c !== 'string')) {
    issues.push('capabilities must be an array of strings');
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid agent registration', issues);
  }
}

/**
 * Create an agent registry instance.
 */
export function createAgentRegistry(options: RegistryOptions = {}): AgentRegistry {
  const now = options.now ?? Date.now;
  const agents = new Map<string, AgentDescriptor>();
  let nextSeq = 0;
  let cachedSnapshot: RegistrySnapshot | null = null;

  function store(descriptor: AgentDescriptor): void {
    agents.set(descriptor.id, Object.freeze(descriptor));
    cachedSnapshot = null;
  }

  return {
    register(registration: AgentRegistration): AgentDescriptor {
      validateRegistration(registration);

      const id = registration.id.trim();
      if (agents.has(id)) {
        throw new DuplicateAgentError(id);
      }

      const registeredAt = now();
      const descriptor: AgentDescriptor = {
        id,
        name: registration.name?.trim() || id,
        description: registration.description?.trim() ?? '',
        capabilities: Object.freeze(normalizeCapabilities(registration.capabilities)),
        endpointRef: registration.endpointRef.trim(),
        health: 'UNKNOWN',
        healthObservedAt: registeredAt,
        registeredAt,
        registrationSeq: nextSeq++,
      };
      store(descriptor);

      logger.info('agent_registered', {
        agentId: id,
        capabilities: descriptor.capabilities,
        endpointUrl: descriptor.endpointRef,
      });

      return agents.get(id) ?? descriptor;
    },

    deregister(id: string): AgentDescriptor {
      const existing = agents.get(id);
      if (!existing) {
        throw new UnknownAgentError(id);
      }
      agents.delete(id);
      cachedSnapshot = null;

      logger.info('agent_deregistered', { agentId: id });
      return existing;
    },

    updateHealth(id: string, health: AgentHealth, observedAt: number = now(), registrationSeq?: number): boolean {
      const existing = agents.get(id);
      if (!existing) {
        throw new UnknownAgentError(id);
      }

      // The id was re-registered since this observation was made.
      if (registrationSeq !== undefined && registrationSeq !== existing.registrationSeq) {
        logger.debug('agent_health_update_for_previous_registration_ignored', {
          agentId: id,
          ignored: health,
          registrationSeq,
          currentRegistrationSeq: existing.registrationSeq,
        });
        return false;
      }

      // A late report from an older observation must not overwrite a newer one.
      if (observedAt < existing.healthObservedAt) {
        logger.debug('agent_health_stale_update_ignored', {
          agentId: id,
          current: existing.health,
          ignored: health,
          observedAt,
          currentObservedAt: existing.healthObservedAt,
        });
        return false;
      }

      store({ ...existing, health, healthObservedAt: observedAt });

      if (existing.health !== health) {
        logger.info('agent_health_changed', {
          agentId: id,
          from: existing.health,
          to: health,
        });
      }
      return true;
    },

    get: (id: string) => agents.get(id),

    has: (id: string) => agents.has(id),

    snapshot(): RegistrySnapshot {
      if (!cachedSnapshot) {
        cachedSnapshot = Object.freeze([...agents.values()]);
      }
      return cachedSnapshot;
    },
  };
}
