/**
 * Dispatch Type Definitions
 *
 * Core types shared by the registry, matcher and router. Agents are
 * external workers reached through an AgentTransport; the dispatcher
 * only decides who gets a request and records what happened.
 */

import type { DispatchError } from '../utils/errors.js';
import type { AgentResponse } from '../transport/types.js';

export type { AgentResponse } from '../transport/types.js';

// ============================================================================
// Agent Descriptor Types
// ============================================================================

export type AgentHealth = 'UNKNOWN' | 'HEALTHY' | 'DEGRADED' | 'UNREACHABLE';

export const AGENT_HEALTH_STATES: readonly AgentHealth[] = ['UNKNOWN', 'HEALTHY', 'DEGRADED', 'UNREACHABLE'];

/**
 * Metadata about one registered agent.
 * Descriptors are frozen; the registry replaces them on every mutation.
 */
export interface AgentDescriptor {
  /** Unique, stable identifier */
  readonly id: string;

  /** Human-readable name (defaults to the id) */
  readonly name: string;

  /** What the agent does; shown to classifier matchers */
  readonly description: string;

  /** Normalised capability tags (lower-case, de-duplicated) */
  readonly capabilities: readonly string[];

  /** Opaque handle consumed by the AgentTransport */
  readonly endpointRef: string;

  readonly health: AgentHealth;

  /** Timestamp (ms) of the observation that produced the current health */
  readonly healthObservedAt: number;

  /** Unix timestamp (ms) of registration */
  readonly registeredAt: number;

  /** Monotonic registration counter; the deterministic tie-breaker for ranking */
  readonly registrationSeq: number;
}

/**
 * Input accepted by AgentRegistry.register.
 */
export interface AgentRegistration {
  id: string;
  name?: string;
  description?: string;
  capabilities: readonly string[];
  endpointRef: string;
}

/** Immutable point-in-time view of the registry, in registration order. */
export type RegistrySnapshot = readonly AgentDescriptor[];

export interface AgentRegistry {
  register(registration: AgentRegistration): AgentDescriptor;
  deregister(id: string): AgentDescriptor;
  /**
   * Returns false when the update was ignored: older than the current
   * observation, or aimed at an earlier registration of the same id.
   */
  updateHealth(id: string, health: AgentHealth, observedAt?: number, registrationSeq?: number): boolean;
  get(id: string): AgentDescriptor | undefined;
  has(id: string): boolean;
  snapshot(): RegistrySnapshot;
}

// ============================================================================
// Request / Result Types
// ============================================================================

/**
 * A task-shaped request from a caller. Treated as immutable once submitted.
 */
export interface DispatchRequest {
  /** Task content; opaque to the router beyond what the matcher inspects */
  readonly payload: unknown;

  /** Candidates must declare every one of these tags */
  readonly requiredCapabilities?: readonly string[];

  /** Tags that raise an agent's rank without excluding anyone */
  readonly preferredCapabilities?: readonly string[];

  /** Ties this request to an existing conversation session */
  readonly sessionId?: string;
}

export type AttemptOutcome =
  | 'SUCCESS'
  | 'TIMEOUT'
  | 'UNREACHABLE'
  | 'DECLINED'
  | 'PROTOCOL_ERROR'
  | 'CANCELLED';

/**
 * One entry of the audit trail: a candidate that was tried and what happened.
 */
export interface AttemptRecord {
  agentId: string;
  outcome: AttemptOutcome;
  durationMs: number;
  /** Decline reason or transport error message */
  detail?: string;
}

interface DispatchResultBase {
  sessionId: string;
  attempts: AttemptRecord[];
}

export interface DispatchSuccess extends DispatchResultBase {
  agentId: string;
  response: AgentResponse;
  error?: undefined;
}

export interface DispatchFailure extends DispatchResultBase {
  agentId?: undefined;
  response?: undefined;
  error: DispatchError;
}

/** Exactly one of `response` or `error` is populated. */
export type DispatchResult = DispatchSuccess | DispatchFailure;

/**
 * Events yielded by the streaming variant of submit.
 * Chunks from an attempt that later fails are followed by its `attempt`
 * event with a non-SUCCESS outcome; callers discard them.
 */
export type DispatchEvent =
  | { type: 'chunk'; agentId: string; data: string }
  | { type: 'attempt'; attempt: AttemptRecord }
  | { type: 'result'; result: DispatchResult };

// ============================================================================
// Matcher Types
// ============================================================================

export interface RankedCandidate {
  agentId: string;
  /** Optional 0-1 confidence; the router drops candidates below its threshold */
  confidence?: number;
}

/**
 * Pluggable decision function: one method, best-first ordering.
 */
export interface CapabilityMatcher {
  rank(request: DispatchRequest, snapshot: RegistrySnapshot): Promise<RankedCandidate[]>;
}

export type UnreachablePolicy = 'last-resort' | 'exclude';
