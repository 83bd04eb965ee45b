/**
 * @fileoverview In-memory session store.
 *
 * Default store. Sessions live for the life of the process; reads return
 * copies so a caller never observes a later append through an old reference.
 */

import { randomUUID } from 'crypto';
import type { DispatchResult } from '../../dispatcher/types.js';
import { SessionLeaseTracker } from './lease.js';
import type { ConversationSession, SessionLease, SessionStore, SessionStoreOptions } from './types.js';

function copySession(session: ConversationSession): ConversationSession {
  return { ...session, history: [...session.history] };
}

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, ConversationSession>();
  private leases: SessionLeaseTracker;
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.idleTtlMs = options.idleTtlMs;
    this.now = options.now ?? Date.now;
    this.leases = new SessionLeaseTracker(options.concurrency);
  }

  private touch(sessionId: string): ConversationSession {
    const timestamp = this.now();
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = { sessionId, history: [], createdAt: timestamp, lastActiveAt: timestamp };
      this.sessions.set(sessionId, session);
    }
    session.lastActiveAt = timestamp;
    return session;
  }

  async getOrCreate(sessionId?: string): Promise<ConversationSession> {
    return copySession(this.touch(sessionId ?? randomUUID()));
  }

  async get(sessionId: string): Promise<ConversationSession | undefined> {
    const session = this.sessions.get(sessionId);
    return session ? copySession(session) : undefined;
  }

  async pin(sessionId: string, agentId: string): Promise<void> {
    this.touch(sessionId).pinnedAgentId = agentId;
  }

  async append(sessionId: string, result: DispatchResult): Promise<void> {
    this.touch(sessionId).history.push(result);
  }

  acquire(sessionId: string, signal?: AbortSignal): Promise<SessionLease> {
    return this.leases.acquire(sessionId, signal);
  }

  async close(sessionId: string): Promise<boolean> {
    if (!this.sessions.has(sessionId)) return false;
    this.leases.whenIdle(sessionId, () => {
      this.sessions.delete(sessionId);
    });
    return true;
  }

  async evictIdle(now: number = this.now()): Promise<string[]> {
    const evicted: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastActiveAt < this.idleTtlMs) continue;
      if (this.leases.isBusy(sessionId)) continue;
      this.sessions.delete(sessionId);
      evicted.push(sessionId);
    }
    return evicted;
  }

  shutdown(): void {
    this.sessions.clear();
  }
}
