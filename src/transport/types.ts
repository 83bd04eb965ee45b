/**
 * Agent Transport Types
 *
 * The sole boundary between the dispatcher and agent execution. Wire
 * protocols (HTTP, in-process calls) live behind this interface.
 */

import { AppError } from '../utils/errors.js';

/**
 * What an agent produced for a request.
 */
export interface AgentResponse {
  /** Text answer, concatenated from streamed chunks when the agent streams */
  text: string;

  /** Structured artifacts, if the agent returned any */
  data?: unknown;

  /** The agent is asking the caller a follow-up question (multi-turn) */
  inputRequired: boolean;
}

export type TransportReply =
  | { status: 'completed'; response: AgentResponse }
  | { status: 'declined'; reason?: string };

/**
 * Message handed to the agent for one attempt.
 */
export interface AgentMessage {
  /** Unique id for this attempt; agents may use it for idempotency */
  taskId: string;
  sessionId: string;
  payload: unknown;
}

export interface SendOptions {
  /** Aborted on per-attempt timeout or caller cancellation */
  signal: AbortSignal;
  timeoutMs: number;
  /** Called for each streamed chunk before the reply settles */
  onChunk?: (data: string) => void;
}

export interface AgentTransport {
  send(endpointRef: string, message: AgentMessage, options: SendOptions): Promise<TransportReply>;

  /** Liveness check used by the background health checker */
  probe?(endpointRef: string, signal: AbortSignal): Promise<boolean>;
}

export type TransportErrorCode = 'TIMEOUT' | 'UNREACHABLE' | 'PROTOCOL';

export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly transportCode: TransportErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, `transport_${transportCode.toLowerCase()}`, true, context);
    this.name = 'TransportError';
  }
}

/**
 * Extract a text rendering of an opaque payload.
 * Strings pass through; objects with a `text` field use it.
 */
export function payloadText(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  if (typeof payload === 'object' && payload !== null && 'text' in payload) {
    const text = payload.text;
    if (typeof text === 'string') return text;
  }
  return '';
}
