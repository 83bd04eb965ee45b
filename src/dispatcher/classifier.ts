/**
 * Classifier-backed capability matching.
 *
 * Asks an external classifier (an LLM by default) which of the eligible
 * agents can handle a request. The classifier only sees agents that
 * already pass the required-capability filter, and its answer is
 * re-checked against that set, so it can reorder but never widen the
 * candidate list.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import type {
  AgentDescriptor,
  CapabilityMatcher,
  DispatchRequest,
  RankedCandidate,
  RegistrySnapshot,
} from './types.js';
import type { MatcherOptions } from './matcher.js';
import { createTagMatcher, eligibleAgents, healthTier } from './matcher.js';
import { payloadText } from '../transport/types.js';
import { createLogger, safeSnippet } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'classifier-matcher' });

/** Sends a prompt to a classifier and returns its raw text reply. */
export type ClassifyFn = (prompt: string) => Promise<string>;

export interface ClassifierMatcherOptions extends MatcherOptions {
  classify: ClassifyFn;
  /** Used when the classifier fails or replies with something unparsable */
  fallback?: CapabilityMatcher;
}

/**
 * Build the routing prompt listing eligible agents and the request.
 */
export function buildClassifierPrompt(request: DispatchRequest, agents: readonly AgentDescriptor[]): string {
  const agentInfo = agents.map(agent => ({
    id: agent.id,
    name: agent.name,
    description: agent.description,
    capabilities: agent.capabilities,
  }));

  const text = payloadText(request.payload) || JSON.stringify(request.payload ?? null);

  return `You are a dispatcher that routes user requests to the appropriate agent.

Available agents:
${JSON.stringify(agentInfo, null, 2)}

User request: ${JSON.stringify(text)}

Decide which agents can handle this request, best first.
If no agent can handle it, return an empty list.

Respond with JSON only, in the form {"agents": ["agent-id", ...]}.`;
}

/**
 * Parse a classifier reply into agent ids.
 * Accepts a bare JSON array or an object with an `agents` array, optionally
 * wrapped in a markdown code fence. Returns null when the reply is unusable.
 */
export function parseClassifierReply(reply: string): string[] | null {
  const unfenced = reply.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced);
  } catch {
    return null;
  }

  const list: unknown =
    Array.isArray(parsed)
      ? parsed
      : typeof parsed === 'object' && parsed !== null && 'agents' in parsed
        ? parsed.agents
        : null;

  if (!Array.isArray(list) || !list.every((item): item is string => typeof item === 'string')) {
    return null;
  }
  return list;
}

/**
 * Create a matcher that defers the ordering decision to a classifier.
 */
export function createClassifierMatcher(options: ClassifierMatcherOptions): CapabilityMatcher {
  const unreachablePolicy = options.unreachablePolicy ?? 'last-resort';
  const fallback = options.fallback ?? createTagMatcher({ unreachablePolicy });

  return {
    async rank(request: DispatchRequest, snapshot: RegistrySnapshot): Promise<RankedCandidate[]> {
      const eligible = eligibleAgents(request, snapshot, unreachablePolicy);
      if (eligible.length === 0) return [];

      let reply: string;
      try {
        reply = await options.classify(buildClassifierPrompt(request, eligible));
      } catch (error) {
        logger.warn('classifier_failed_using_fallback', {
          error: error instanceof Error ? error.message : String(error),
        });
        return fallback.rank(request, snapshot);
      }

      const ids = parseClassifierReply(reply);
      if (ids === null) {
        logger.warn('classifier_reply_unparsable_using_fallback', { replySnippet: safeSnippet(reply, 80) });
        return fallback.rank(request, snapshot);
      }

      const byId = new Map(eligible.map(agent => [agent.id, agent]));
      const chosen: AgentDescriptor[] = [];
      for (const id of ids) {
        const agent = byId.get(id);
        if (agent && !chosen.includes(agent)) chosen.push(agent);
      }

      // Stable sort keeps the classifier's order within a health tier.
      chosen.sort((a, b) => healthTier(a.health) - healthTier(b.health));

      logger.debug('classifier_ranked', {
        eligibleCount: eligible.length,
        chosen: chosen.map(agent => agent.id),
      });

      return chosen.map(agent => ({ agentId: agent.id }));
    },
  };
}

/**
 * Adapt an Anthropic client to a ClassifyFn.
 */
export function createAnthropicClassifier(client: Anthropic, model: string): ClassifyFn {
  return async (prompt: string): Promise<string> => {
    const response = await client.messages.create({
      model,
      max_tokens: 512,
      temperature: 0,
      messages: [{ role: 'user', content: prompt }],
    });

    const textBlock = response.content.find(
      (block): block is TextBlock => block.type === 'text'
    );
    return textBlock?.text ?? '';
  };
}
