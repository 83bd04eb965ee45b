/**
 * @fileoverview Session store factory and idle eviction.
 */

import type { AppConfig } from '../../config.js';
import { createIntervalPoller, type Poller } from '../poller.js';
import { createLogger } from '../../utils/observability/index.js';
import { MemorySessionStore } from './memory.js';
import { SqliteSessionStore } from './sqlite.js';
import type { SessionStore } from './types.js';

export type {
  ConversationSession,
  SessionConcurrencyPolicy,
  SessionLease,
  SessionStore,
  SessionStoreOptions,
} from './types.js';
export { MemorySessionStore } from './memory.js';
export { SqliteSessionStore } from './sqlite.js';

const logger = createLogger({ domain: 'session-store' });

/**
 * Create the session store selected by configuration.
 */
export function createSessionStore(sessionConfig: AppConfig['session']): SessionStore {
  const options = {
    idleTtlMs: sessionConfig.idleTtlMs,
    concurrency: sessionConfig.concurrency,
  };

  if (sessionConfig.provider === 'sqlite') {
    return new SqliteSessionStore(sessionConfig.sqlitePath, options);
  }
  return new MemorySessionStore(options);
}

/**
 * Periodically evict idle sessions. Leased sessions are skipped by the store.
 */
export function createSessionEvictor(store: SessionStore, intervalMs: number): Poller {
  return createIntervalPoller('session-eviction', async () => {
    const evicted = await store.evictIdle();
    if (evicted.length > 0) {
      logger.info('sessions_evicted', { count: evicted.length });
    }
  }, intervalMs);
}
