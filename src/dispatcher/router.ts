/**
 * Dispatch Router
 *
 * Orchestrates one dispatch: resolves the session pin, asks the matcher
 * for a ranking over a registry snapshot, and tries candidates strictly
 * one at a time until one succeeds. At most one agent handles a request.
 *
 * Per-attempt outcomes:
 * - SUCCESS        → health HEALTHY, session pinned, stop
 * - TIMEOUT        → health DEGRADED, next candidate
 * - UNREACHABLE    → health UNREACHABLE, next candidate
 * - PROTOCOL_ERROR → health DEGRADED, next candidate
 * - DECLINED       → health unchanged, next candidate
 * - CANCELLED      → stop, DispatchCancelledError
 *
 * The router owns no persistent state; results are produced by value.
 */

import { randomUUID } from 'crypto';
import type {
  AgentDescriptor,
  AgentHealth,
  AgentRegistry,
  AttemptRecord,
  CapabilityMatcher,
  DispatchEvent,
  DispatchRequest,
  DispatchResult,
  RegistrySnapshot,
} from './types.js';
import type { AgentTransport } from '../transport/types.js';
import type { ConversationSession, SessionLease, SessionStore } from '../services/session/types.js';
import { runAttempt } from './attempt.js';
import { declaresAll } from './matcher.js';
import { normalizeCapabilities } from './registry.js';
import {
  AllCandidatesFailedError,
  DispatchCancelledError,
  NoCandidateError,
  UnknownAgentError,
} from '../utils/errors.js';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'dispatch-router' });

export interface RouterDependencies {
  registry: AgentRegistry;
  matcher: CapabilityMatcher;
  transport: AgentTransport;
  sessions: SessionStore;
  /** Upper bound for each transport call */
  attemptTimeoutMs: number;
  /** Candidates ranked below this confidence are not tried (default 0) */
  minConfidence?: number;
  now?: () => number;
}

export interface SubmitOptions {
  /** Cancels the dispatch, including the in-flight attempt */
  signal?: AbortSignal;
  /** Receives chunk, attempt and result events as they happen */
  onEvent?: (event: DispatchEvent) => void;
}

export interface DispatchRouter {
  submit(request: DispatchRequest, options?: SubmitOptions): Promise<DispatchResult>;
  submitStream(request: DispatchRequest, options?: Pick<SubmitOptions, 'signal'>): AsyncGenerator<DispatchEvent, void, undefined>;
}

const HEALTH_ON_FAILURE: Partial<Record<AttemptRecord['outcome'], AgentHealth>> = {
  TIMEOUT: 'DEGRADED',
  UNREACHABLE: 'UNREACHABLE',
  PROTOCOL_ERROR: 'DEGRADED',
};

export function createDispatchRouter(deps: RouterDependencies): DispatchRouter {
  const { registry, matcher, transport, sessions, attemptTimeoutMs } = deps;
  const minConfidence = deps.minConfidence ?? 0;
  const now = deps.now ?? Date.now;

  /**
   * Record a health observation for the registration that was attempted.
   * The agent may have been deregistered (or replaced under the same id)
   * while its attempt was in flight; that is expected and not an error here.
   */
  function observeHealth(agent: AgentDescriptor, health: AgentHealth, observedAt: number): void {
    try {
      registry.updateHealth(agent.id, health, observedAt, agent.registrationSeq);
    } catch (error) {
      if (!(error instanceof UnknownAgentError)) throw error;
      logger.debug('health_update_skipped_deregistered', { agentId: agent.id, health });
    }
  }

  /**
   * The pinned agent is usable when it is still registered, not
   * UNREACHABLE, and declares the request's required capabilities.
   */
  function usablePin(
    session: ConversationSession,
    snapshot: RegistrySnapshot,
    required: readonly string[]
  ): AgentDescriptor | undefined {
    if (!session.pinnedAgentId) return undefined;
    const pinned = snapshot.find(agent => agent.id === session.pinnedAgentId);
    if (!pinned || pinned.health === 'UNREACHABLE') return undefined;
    return declaresAll(pinned, required) ? pinned : undefined;
  }

  async function selectCandidates(
    request: DispatchRequest,
    session: ConversationSession
  ): Promise<AgentDescriptor[]> {
    const snapshot = registry.snapshot();
    const required = normalizeCapabilities(request.requiredCapabilities ?? []);
    const byId = new Map(snapshot.map(agent => [agent.id, agent]));

    const ranked = await matcher.rank(request, snapshot);
    const candidates: AgentDescriptor[] = [];
    for (const candidate of ranked) {
      if ((candidate.confidence ?? 1) < minConfidence) continue;
      const agent = byId.get(candidate.agentId);
      if (!agent) {
        logger.warn('matcher_returned_unknown_agent', { agentId: candidate.agentId });
        continue;
      }
      if (!candidates.includes(agent)) candidates.push(agent);
    }

    const pinned = usablePin(session, snapshot, required);
    if (pinned) {
      return [pinned, ...candidates.filter(agent => agent.id !== pinned.id)];
    }
    if (session.pinnedAgentId) {
      logger.info('session_pin_unusable_reselecting', { pinnedAgentId: session.pinnedAgentId });
    }
    return candidates;
  }

  async function dispatch(
    request: DispatchRequest,
    session: ConversationSession,
    options: SubmitOptions
  ): Promise<DispatchResult> {
    const { sessionId } = session;
    const attempts: AttemptRecord[] = [];

    // Ranking may call an external classifier; skip it for a cancelled turn.
    if (options.signal?.aborted) {
      logger.info('dispatch_cancelled_before_selection');
      return { sessionId, attempts, error: new DispatchCancelledError(attempts) };
    }

    const candidates = await selectCandidates(request, session);
    if (candidates.length === 0) {
      const required = normalizeCapabilities(request.requiredCapabilities ?? []);
      logger.warn('dispatch_no_candidate', { requiredCapabilities: required });
      return { sessionId, attempts, error: new NoCandidateError(required) };
    }

    logger.info('dispatch_candidates_selected', {
      candidates: candidates.map(agent => agent.id),
      pinnedAgentId: session.pinnedAgentId,
    });

    for (const agent of candidates) {
      const startedAt = now();
      const run = await runAttempt({
        transport,
        agent,
        message: { taskId: randomUUID(), sessionId, payload: request.payload },
        timeoutMs: attemptTimeoutMs,
        signal: options.signal,
        onChunk: options.onEvent
          ? (data: string) => options.onEvent?.({ type: 'chunk', agentId: agent.id, data })
          : undefined,
      });
      const finishedAt = now();

      const record: AttemptRecord = {
        agentId: agent.id,
        outcome: run.outcome,
        durationMs: finishedAt - startedAt,
        ...(run.outcome !== 'SUCCESS' && run.detail ? { detail: run.detail } : {}),
      };
      attempts.push(record);
      options.onEvent?.({ type: 'attempt', attempt: record });

      logger.info('dispatch_attempt_finished', {
        agentId: agent.id,
        outcome: run.outcome,
        durationMs: record.durationMs,
      });

      if (run.outcome === 'SUCCESS') {
        // Success is dated at the start of the attempt so it never outranks
        // a failure observed while this attempt was running.
        observeHealth(agent, 'HEALTHY', startedAt);
        await sessions.pin(sessionId, agent.id);
        return { sessionId, agentId: agent.id, response: run.response, attempts };
      }

      if (run.outcome === 'CANCELLED') {
        logger.info('dispatch_cancelled', { attemptCount: attempts.length });
        return { sessionId, attempts, error: new DispatchCancelledError(attempts) };
      }

      const demoted = HEALTH_ON_FAILURE[run.outcome];
      if (demoted) {
        observeHealth(agent, demoted, finishedAt);
      }
    }

    logger.warn('dispatch_all_candidates_failed', {
      attempts: attempts.map(a => `${a.agentId}:${a.outcome}`),
    });
    return { sessionId, attempts, error: new AllCandidatesFailedError(attempts) };
  }

  async function submit(request: DispatchRequest, options: SubmitOptions = {}): Promise<DispatchResult> {
    // Without a session id a fresh session is created for this dispatch.
    const { sessionId } = await sessions.getOrCreate(request.sessionId);

    return withLogContext({ requestId: createRequestId('dsp'), sessionId }, async () => {
      let lease: SessionLease;
      try {
        lease = await sessions.acquire(sessionId, options.signal);
      } catch (error) {
        if (!(error instanceof DispatchCancelledError)) throw error;
        logger.info('dispatch_cancelled_while_queued');
        const result: DispatchResult = { sessionId, attempts: [], error };
        await sessions.append(sessionId, result);
        options.onEvent?.({ type: 'result', result });
        return result;
      }

      try {
        // Re-read under the lease: a queued turn must see the pin set by the previous one.
        const session = await sessions.getOrCreate(sessionId);
        const result = await dispatch(request, session, options);
        await sessions.append(sessionId, result);
        options.onEvent?.({ type: 'result', result });
        return result;
      } finally {
        lease.release();
      }
    });
  }

  async function* submitStream(
    request: DispatchRequest,
    options: Pick<SubmitOptions, 'signal'> = {}
  ): AsyncGenerator<DispatchEvent, void, undefined> {
    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const queue: DispatchEvent[] = [];
    let wake: (() => void) | null = null;
    let done = false;
    let failure: unknown = null;

    const notify = (): void => {
      const resolve = wake;
      wake = null;
      resolve?.();
    };

    const run = submit(request, {
      signal: controller.signal,
      onEvent: event => {
        queue.push(event);
        notify();
      },
    }).then(
      () => {
        done = true;
        notify();
      },
      (error: unknown) => {
        failure = error;
        done = true;
        notify();
      }
    );

    try {
      while (true) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (done) break;
        await new Promise<void>(resolve => {
          wake = resolve;
        });
      }
      if (failure !== null) throw failure;
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
      // A consumer that stops early cancels the dispatch.
      if (!done) controller.abort(new Error('Stream consumer stopped'));
      await run;
    }
  }

  return { submit, submitStream };
}
