/**
 * @fileoverview Per-session turn serialization.
 *
 * Tracks which sessions have a dispatch in flight, queues (or rejects)
 * concurrent turns, and runs deferred work once a session goes idle.
 */

import { DispatchCancelledError, SessionBusyError } from '../../utils/errors.js';
import type { SessionConcurrencyPolicy, SessionLease } from './types.js';

interface SessionSlot {
  held: boolean;
  waiters: Array<() => void>;
  onIdle: Array<() => void>;
}

export class SessionLeaseTracker {
  private slots = new Map<string, SessionSlot>();

  constructor(private readonly policy: SessionConcurrencyPolicy = 'queue') {}

  /**
   * Wait for the session. A queued turn whose signal aborts leaves the
   * queue and rejects with DispatchCancelledError.
   */
  async acquire(sessionId: string, signal?: AbortSignal): Promise<SessionLease> {
    let slot = this.slots.get(sessionId);
    if (!slot) {
      slot = { held: false, waiters: [], onIdle: [] };
      this.slots.set(sessionId, slot);
    }

    if (slot.held) {
      if (this.policy === 'reject') {
        throw new SessionBusyError(sessionId);
      }
      if (signal?.aborted) {
        throw new DispatchCancelledError([]);
      }
      const waiting = slot;
      await new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
          const index = waiting.waiters.indexOf(grant);
          if (index !== -1) waiting.waiters.splice(index, 1);
          reject(new DispatchCancelledError([]));
        };
        const grant = (): void => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
        waiting.waiters.push(grant);
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }

    slot.held = true;
    let released = false;

    return {
      sessionId,
      release: () => {
        if (released) return;
        released = true;
        this.handOff(sessionId);
      },
    };
  }

  /** Whether a dispatch currently holds or waits for this session. */
  isBusy(sessionId: string): boolean {
    return this.slots.get(sessionId)?.held ?? false;
  }

  /**
   * Run `fn` now if the session is idle, otherwise once the last
   * queued turn releases it.
   */
  whenIdle(sessionId: string, fn: () => void): void {
    const slot = this.slots.get(sessionId);
    if (!slot?.held) {
      fn();
      return;
    }
    slot.onIdle.push(fn);
  }

  private handOff(sessionId: string): void {
    const slot = this.slots.get(sessionId);
    if (!slot) return;

    const next = slot.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `held` stays true.
      next();
      return;
    }

    slot.held = false;
    this.slots.delete(sessionId);
    for (const fn of slot.onIdle.splice(0)) {
      fn();
    }
  }
}
