/**
 * Conversation Session Types
 *
 * A session correlates the dispatches of one multi-turn interaction and
 * pins later turns to the agent that served the previous one.
 */

import type { DispatchResult } from '../../dispatcher/types.js';

export interface ConversationSession {
  sessionId: string;

  /** Agent that handled the previous successful turn */
  pinnedAgentId?: string;

  /** Past results for this session, oldest first (append-only) */
  history: DispatchResult[];

  /** Unix timestamp (milliseconds) when the session was created */
  createdAt: number;

  /** Unix timestamp (milliseconds) of the last read or write */
  lastActiveAt: number;
}

/**
 * Held for the duration of one dispatch. While any lease is outstanding the
 * session cannot be evicted, and a close request waits for release.
 */
export interface SessionLease {
  readonly sessionId: string;
  release(): void;
}

/**
 * Behaviour when a second turn arrives while one is in flight:
 * 'queue' waits for the first to finish, 'reject' throws SessionBusyError.
 */
export type SessionConcurrencyPolicy = 'queue' | 'reject';

export interface SessionStoreOptions {
  /** Sessions idle longer than this are eligible for eviction */
  idleTtlMs: number;
  concurrency?: SessionConcurrencyPolicy;
  now?: () => number;
}

/**
 * Interface for session storage operations.
 *
 * Methods return Promises for interface flexibility; the in-memory and
 * SQLite implementations are synchronous underneath.
 */
export interface SessionStore {
  /** Return the session with this id, creating it (with a new id when omitted) if absent */
  getOrCreate(sessionId?: string): Promise<ConversationSession>;

  /** Read a copy of a session without creating it */
  get(sessionId: string): Promise<ConversationSession | undefined>;

  pin(sessionId: string, agentId: string): Promise<void>;

  append(sessionId: string, result: DispatchResult): Promise<void>;

  /**
   * Serialize turns for one session. Resolves with a lease once no other
   * dispatch holds the session. Rejects with DispatchCancelledError when
   * `signal` aborts while waiting.
   */
  acquire(sessionId: string, signal?: AbortSignal): Promise<SessionLease>;

  /**
   * Remove a session. Deferred until in-flight leases are released.
   * @returns false when the session does not exist
   */
  close(sessionId: string): Promise<boolean>;

  /**
   * Remove sessions idle longer than the configured TTL and not leased.
   * @returns ids of evicted sessions
   */
  evictIdle(now?: number): Promise<string[]>;

  /** Release underlying resources */
  shutdown(): void;
}
