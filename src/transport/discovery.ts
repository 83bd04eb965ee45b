/**
 * @fileoverview Agent card discovery.
 *
 * Agents publish a card at `/.well-known/agent.json` describing their
 * skills. Discovery turns a card into a registration whose capability
 * tags are the skills' ids and tags.
 */

import type { AgentRegistration } from '../dispatcher/types.js';
import { normalizeCapabilities } from '../dispatcher/registry.js';
import { TransportError } from './types.js';

type FetchFn = typeof fetch;

interface AgentCardSkill {
  id?: string;
  name?: string;
  tags?: string[];
}

export interface AgentCard {
  name: string;
  description?: string;
  url?: string;
  skills: AgentCardSkill[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Boundary: validate an agent card.
 */
export function parseAgentCard(value: unknown): AgentCard {
  if (!isRecord(value) || typeof value.name !== 'string' || value.name.trim() === '') {
    throw new TransportError('Agent card is missing a name', 'PROTOCOL');
  }
  const skills = Array.isArray(value.skills)
    ? value.skills.filter(isRecord).map(skill => ({
        id: typeof skill.id === 'string' ? skill.id : undefined,
        name: typeof skill.name === 'string' ? skill.name : undefined,
        tags: stringArray(skill.tags),
      }))
    : [];

  return {
    name: value.name,
    description: typeof value.description === 'string' ? value.description : undefined,
    url: typeof value.url === 'string' ? value.url : undefined,
    skills,
  };
}

/**
 * Lower-case, hyphenated identifier derived from a card name.
 * "Math Agent" → "math-agent"
 */
export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function cardToRegistration(card: AgentCard, fallbackUrl: string): AgentRegistration {
  const capabilities = normalizeCapabilities(
    card.skills.flatMap(skill => [...(skill.id ? [skill.id] : []), ...(skill.tags ?? [])])
  );

  return {
    id: slugify(card.name) || slugify(fallbackUrl),
    name: card.name,
    description: card.description,
    capabilities,
    endpointRef: card.url ?? fallbackUrl,
  };
}

/**
 * Fetch an agent's card and build its registration.
 */
export async function discoverAgent(
  baseUrl: string,
  options: { fetch?: FetchFn; signal?: AbortSignal } = {}
): Promise<AgentRegistration> {
  const fetchImpl = options.fetch ?? fetch;
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;

  let response: Response;
  try {
    response = await fetchImpl(new URL('.well-known/agent.json', base), { signal: options.signal });
  } catch (error) {
    throw new TransportError(
      `Agent card unreachable at ${baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
      'UNREACHABLE'
    );
  }
  if (!response.ok) {
    throw new TransportError(`Agent card request failed (HTTP ${response.status})`, 'UNREACHABLE');
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    throw new TransportError('Agent card is not valid JSON', 'PROTOCOL');
  }
  return cardToRegistration(parseAgentCard(json), baseUrl);
}
