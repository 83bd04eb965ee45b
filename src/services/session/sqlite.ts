/**
 * @fileoverview SQLite session store.
 *
 * Keeps session pins and dispatch history in a local database so they can
 * be inspected after a restart. Turn serialization is still per-process.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import type { AttemptRecord, DispatchResult } from '../../dispatcher/types.js';
import type { AgentResponse } from '../../transport/types.js';
import {
  AllCandidatesFailedError,
  DispatchCancelledError,
  NoCandidateError,
  type DispatchError,
} from '../../utils/errors.js';
import { SessionLeaseTracker } from './lease.js';
import type { ConversationSession, SessionLease, SessionStore, SessionStoreOptions } from './types.js';

interface SessionRow {
  session_id: string;
  pinned_agent_id: string | null;
  created_at: number;
  last_active_at: number;
}

interface ResultRow {
  agent_id: string | null;
  response_json: string | null;
  error_json: string | null;
  attempts_json: string;
}

interface StoredError {
  code: string;
  requiredCapabilities?: string[];
}

function serializeError(error: DispatchError): StoredError {
  if (error instanceof NoCandidateError) {
    return { code: error.code, requiredCapabilities: [...error.requiredCapabilities] };
  }
  return { code: error.code };
}

function deserializeError(stored: StoredError, attempts: AttemptRecord[]): DispatchError {
  switch (stored.code) {
    case 'no_candidate':
      return new NoCandidateError(stored.requiredCapabilities ?? []);
    case 'dispatch_cancelled':
      return new DispatchCancelledError(attempts);
    default:
      return new AllCandidatesFailedError(attempts);
  }
}

/**
 * SQLite implementation of the session store.
 */
export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;
  private leases: SessionLeaseTracker;
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(dbPath: string, options: SessionStoreOptions) {
    // Ensure directory exists
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.idleTtlMs = options.idleTtlMs;
    this.now = options.now ?? Date.now;
    this.leases = new SessionLeaseTracker(options.concurrency);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS dispatch_sessions (
        session_id TEXT PRIMARY KEY,
        pinned_agent_id TEXT,
        created_at INTEGER NOT NULL,
        last_active_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS dispatch_session_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES dispatch_sessions(session_id) ON DELETE CASCADE,
        agent_id TEXT,
        response_json TEXT,
        error_json TEXT,
        attempts_json TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_session_results_session
        ON dispatch_session_results(session_id, id);

      CREATE INDEX IF NOT EXISTS idx_sessions_last_active
        ON dispatch_sessions(last_active_at);
    `);
    this.db.pragma('foreign_keys = ON');
  }

  private touch(sessionId: string): void {
    const timestamp = this.now();
    this.db
      .prepare(
        `INSERT INTO dispatch_sessions (session_id, created_at, last_active_at)
         VALUES (?, ?, ?)
         ON CONFLICT(session_id) DO UPDATE SET last_active_at = excluded.last_active_at`
      )
      .run(sessionId, timestamp, timestamp);
  }

  private read(sessionId: string): ConversationSession | undefined {
    const row = this.db
      .prepare(`SELECT * FROM dispatch_sessions WHERE session_id = ?`)
      .get(sessionId) as SessionRow | undefined;
    if (!row) return undefined;

    const resultRows = this.db
      .prepare(
        `SELECT agent_id, response_json, error_json, attempts_json
         FROM dispatch_session_results WHERE session_id = ? ORDER BY id ASC`
      )
      .all(sessionId) as ResultRow[];

    return {
      sessionId: row.session_id,
      pinnedAgentId: row.pinned_agent_id ?? undefined,
      history: resultRows.map(result => this.rowToResult(row.session_id, result)),
      createdAt: row.created_at,
      lastActiveAt: row.last_active_at,
    };
  }

  private rowToResult(sessionId: string, row: ResultRow): DispatchResult {
    const attempts = JSON.parse(row.attempts_json) as AttemptRecord[];
    if (row.agent_id !== null && row.response_json !== null) {
      return {
        sessionId,
        agentId: row.agent_id,
        response: JSON.parse(row.response_json) as AgentResponse,
        attempts,
      };
    }
    const stored = JSON.parse(row.error_json ?? '{}') as StoredError;
    return { sessionId, error: deserializeError(stored, attempts), attempts };
  }

  async getOrCreate(sessionId?: string): Promise<ConversationSession> {
    const id = sessionId ?? randomUUID();
    this.touch(id);
    const session = this.read(id);
    if (!session) {
      throw new Error(`Session row missing after upsert: ${id}`);
    }
    return session;
  }

  async get(sessionId: string): Promise<ConversationSession | undefined> {
    return this.read(sessionId);
  }

  async pin(sessionId: string, agentId: string): Promise<void> {
    this.touch(sessionId);
    this.db
      .prepare(`UPDATE dispatch_sessions SET pinned_agent_id = ? WHERE session_id = ?`)
      .run(agentId, sessionId);
  }

  async append(sessionId: string, result: DispatchResult): Promise<void> {
    this.touch(sessionId);
    this.db
      .prepare(
        `INSERT INTO dispatch_session_results
         (session_id, agent_id, response_json, error_json, attempts_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        sessionId,
        result.agentId ?? null,
        result.response ? JSON.stringify(result.response) : null,
        result.error ? JSON.stringify(serializeError(result.error)) : null,
        JSON.stringify(result.attempts),
        this.now()
      );
  }

  acquire(sessionId: string, signal?: AbortSignal): Promise<SessionLease> {
    return this.leases.acquire(sessionId, signal);
  }

  async close(sessionId: string): Promise<boolean> {
    const exists = this.db
      .prepare(`SELECT 1 FROM dispatch_sessions WHERE session_id = ?`)
      .get(sessionId);
    if (!exists) return false;

    this.leases.whenIdle(sessionId, () => {
      this.db.prepare(`DELETE FROM dispatch_sessions WHERE session_id = ?`).run(sessionId);
    });
    return true;
  }

  async evictIdle(now: number = this.now()): Promise<string[]> {
    const rows = this.db
      .prepare(`SELECT session_id FROM dispatch_sessions WHERE last_active_at <= ?`)
      .all(now - this.idleTtlMs) as Array<{ session_id: string }>;

    const evicted = rows
      .map(row => row.session_id)
      .filter(sessionId => !this.leases.isBusy(sessionId));

    const remove = this.db.prepare(`DELETE FROM dispatch_sessions WHERE session_id = ?`);
    const removeAll = this.db.transaction((ids: string[]) => {
      for (const id of ids) remove.run(id);
    });
    removeAll(evicted);

    return evicted;
  }

  shutdown(): void {
    this.db.close();
  }
}
