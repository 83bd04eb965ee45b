/**
 * Capability Matcher
 *
 * Ranks registered agents for a request. Every strategy shares the same
 * eligibility rules (required capabilities, unreachable policy) and the
 * same health ordering; strategies differ only in how eligible agents
 * are scored.
 *
 * Ranking is deterministic: ties fall back to registration order.
 */

import type {
  AgentDescriptor,
  AgentHealth,
  CapabilityMatcher,
  DispatchRequest,
  RankedCandidate,
  RegistrySnapshot,
  UnreachablePolicy,
} from './types.js';
import { normalizeCapabilities } from './registry.js';
import { payloadText } from '../transport/types.js';

export interface MatcherOptions {
  /** 'last-resort' keeps unreachable agents at the tail; 'exclude' drops them */
  unreachablePolicy?: UnreachablePolicy;
}

const HEALTH_TIER: Record<AgentHealth, number> = {
  HEALTHY: 0,
  UNKNOWN: 0,
  DEGRADED: 1,
  UNREACHABLE: 2,
};

export function healthTier(health: AgentHealth): number {
  return HEALTH_TIER[health];
}

/**
 * Whether an agent declares every required capability tag.
 */
export function declaresAll(agent: AgentDescriptor, required: readonly string[]): boolean {
  return required.every(tag => agent.capabilities.includes(tag));
}

/**
 * Agents that satisfy the request's required capabilities and the
 * unreachable policy, in registration order.
 */
export function eligibleAgents(
  request: DispatchRequest,
  snapshot: RegistrySnapshot,
  unreachablePolicy: UnreachablePolicy = 'last-resort'
): AgentDescriptor[] {
  const required = normalizeCapabilities(request.requiredCapabilities ?? []);
  return snapshot
    .filter(agent => declaresAll(agent, required))
    .filter(agent => unreachablePolicy !== 'exclude' || agent.health !== 'UNREACHABLE')
    .sort((a, b) => a.registrationSeq - b.registrationSeq);
}

/**
 * Capability tags a request asks for: required and preferred tags, plus
 * any tag declared in the registry that the text payload mentions as a word.
 */
export function requestTags(request: DispatchRequest, snapshot: RegistrySnapshot): string[] {
  const explicit = normalizeCapabilities([
    ...(request.requiredCapabilities ?? []),
    ...(request.preferredCapabilities ?? []),
  ]);

  const words = payloadText(request.payload).toLowerCase().split(/[^a-z0-9_-]+/).filter(Boolean);
  if (words.length === 0) return explicit;

  const padded = ` ${words.join(' ')} `;
  const mentioned = new Set<string>();
  for (const agent of snapshot) {
    for (const tag of agent.capabilities) {
      const tagWords = tag.split(/[^a-z0-9_-]+/).filter(Boolean).join(' ');
      if (tagWords && padded.includes(` ${tagWords} `)) {
        mentioned.add(tag);
      }
    }
  }

  return normalizeCapabilities([...explicit, ...mentioned]);
}

/**
 * Default strategy: capability-tag intersection scored by overlap size.
 * Order is health tier, then overlap (desc), then registration order.
 */
export function createTagMatcher(options: MatcherOptions = {}): CapabilityMatcher {
  const unreachablePolicy = options.unreachablePolicy ?? 'last-resort';

  return {
    async rank(request: DispatchRequest, snapshot: RegistrySnapshot): Promise<RankedCandidate[]> {
      const eligible = eligibleAgents(request, snapshot, unreachablePolicy);
      if (eligible.length === 0) return [];

      const tags = requestTags(request, snapshot);
      const scored = eligible.map(agent => ({
        agent,
        score: tags.filter(tag => agent.capabilities.includes(tag)).length,
      }));

      scored.sort((a, b) =>
        healthTier(a.agent.health) - healthTier(b.agent.health) ||
        b.score - a.score ||
        a.agent.registrationSeq - b.agent.registrationSeq
      );

      return scored.map(({ agent, score }) => ({
        agentId: agent.id,
        confidence: tags.length === 0 ? 1 : score / tags.length,
      }));
    },
  };
}
