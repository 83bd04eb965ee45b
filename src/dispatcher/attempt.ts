/**
 * Single dispatch attempt.
 *
 * Sends one message to one agent under a per-attempt timeout, links the
 * caller's cancellation signal, and classifies what happened. The
 * transport call is raced against the attempt's own abort signal, so an
 * attempt is always settled (and its transport call aborted) before this
 * function returns.
 */

import type { AgentDescriptor, AttemptOutcome } from './types.js';
import type { AgentMessage, AgentResponse, AgentTransport } from '../transport/types.js';
import { TransportError } from '../transport/types.js';

export interface AttemptInput {
  transport: AgentTransport;
  agent: AgentDescriptor;
  message: AgentMessage;
  timeoutMs: number;
  /** Caller cancellation for the whole dispatch */
  signal?: AbortSignal;
  onChunk?: (data: string) => void;
}

export type AttemptRun =
  | { outcome: 'SUCCESS'; response: AgentResponse }
  | { outcome: Exclude<AttemptOutcome, 'SUCCESS'>; detail?: string };

function classifyError(error: unknown): AttemptRun {
  if (error instanceof TransportError) {
    switch (error.transportCode) {
      case 'TIMEOUT':
        return { outcome: 'TIMEOUT', detail: error.message };
      case 'UNREACHABLE':
        return { outcome: 'UNREACHABLE', detail: error.message };
      case 'PROTOCOL':
        return { outcome: 'PROTOCOL_ERROR', detail: error.message };
    }
  }
  // Anything else thrown by a transport is a broken exchange, not a decline.
  return {
    outcome: 'PROTOCOL_ERROR',
    detail: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Run one attempt against one agent.
 */
export async function runAttempt(input: AttemptInput): Promise<AttemptRun> {
  const { transport, agent, message, timeoutMs, signal } = input;

  if (signal?.aborted) {
    return { outcome: 'CANCELLED', detail: 'cancelled before attempt started' };
  }

  const controller = new AbortController();
  let timedOut = false;
  let settled = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new TransportError(`Agent ${agent.id} timed out after ${timeoutMs}ms`, 'TIMEOUT'));
  }, timeoutMs);

  const onCallerAbort = (): void => {
    controller.abort(new Error('Dispatch cancelled by caller'));
  };
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  const abortedByAttempt = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  try {
    const reply = await Promise.race([
      transport.send(agent.endpointRef, message, {
        signal: controller.signal,
        timeoutMs,
        onChunk: input.onChunk
          ? (data: string) => {
              // Late chunks from an abandoned call are dropped.
              if (!settled && !controller.signal.aborted) input.onChunk?.(data);
            }
          : undefined,
      }),
      abortedByAttempt,
    ]);

    if (reply.status === 'declined') {
      return { outcome: 'DECLINED', detail: reply.reason };
    }
    return { outcome: 'SUCCESS', response: reply.response };
  } catch (error) {
    if (timedOut) {
      return { outcome: 'TIMEOUT', detail: `timed out after ${timeoutMs}ms` };
    }
    if (signal?.aborted) {
      return { outcome: 'CANCELLED', detail: 'cancelled during attempt' };
    }
    return classifyError(error);
  } finally {
    settled = true;
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCallerAbort);
    if (!controller.signal.aborted) {
      controller.abort(new Error('Attempt settled'));
    }
  }
}
