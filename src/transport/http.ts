/**
 * @fileoverview HTTP agent transport.
 *
 * Talks to agents that expose an A2A-style task endpoint:
 *
 *   POST {endpoint}/tasks/send
 *   { id, sessionId, message: { role: 'user', parts: [...] } }
 *
 * The agent answers with a task object, or with an NDJSON stream of
 * `{ "chunk": "..." }` lines terminated by a `{ "task": { ... } }` line.
 *
 * Task state mapping:
 * - completed, input-required → completed reply
 * - rejected, canceled        → declined reply
 * - failed, anything else     → PROTOCOL error
 * HTTP 409/422 are declines, 408/504 timeouts, other 5xx and network
 * failures unreachable.
 */

import type { AgentMessage, AgentResponse, AgentTransport, SendOptions, TransportReply } from './types.js';
import { TransportError } from './types.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'transport-http' });

type FetchFn = typeof fetch;

export interface HttpTransportOptions {
  fetch?: FetchFn;
  /** Extra headers sent with every request (e.g. an agent API token) */
  headers?: Record<string, string>;
}

type TaskPart =
  | { type: 'text'; text: string }
  | { type: 'data'; data: unknown };

interface AgentTask {
  id?: string;
  status: { state: string; message?: { parts?: TaskPart[] } };
  artifacts?: Array<{ parts?: TaskPart[] }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTaskPart(value: unknown): value is TaskPart {
  if (!isRecord(value)) return false;
  if (value.type === 'text') return typeof value.text === 'string';
  return value.type === 'data' && 'data' in value;
}

function toParts(value: unknown): TaskPart[] {
  return Array.isArray(value) ? value.filter(isTaskPart) : [];
}

/**
 * Boundary: validate the agent's task object before use.
 */
export function parseTask(value: unknown): AgentTask {
  if (!isRecord(value) || !isRecord(value.status) || typeof value.status.state !== 'string') {
    throw new TransportError('Agent returned a malformed task', 'PROTOCOL');
  }
  const message = isRecord(value.status.message) ? { parts: toParts(value.status.message.parts) } : undefined;
  const artifacts = Array.isArray(value.artifacts)
    ? value.artifacts.filter(isRecord).map(artifact => ({ parts: toParts(artifact.parts) }))
    : undefined;

  return {
    id: typeof value.id === 'string' ? value.id : undefined,
    status: { state: value.status.state, message },
    artifacts,
  };
}

function textOf(parts: TaskPart[] | undefined): string {
  return (parts ?? [])
    .flatMap(part => (part.type === 'text' ? [part.text] : []))
    .join('\n');
}

function dataOf(parts: TaskPart[]): unknown {
  const data = parts.flatMap(part => (part.type === 'data' ? [part.data] : []));
  if (data.length === 0) return undefined;
  return data.length === 1 ? data[0] : data;
}

/**
 * Turn a validated task into a transport reply.
 * `streamedText` is used when a completed task carries no text artifacts.
 */
export function taskToReply(task: AgentTask, streamedText = ''): TransportReply {
  const statusText = textOf(task.status.message?.parts);

  switch (task.status.state) {
    case 'completed': {
      const artifactParts = (task.artifacts ?? []).flatMap(artifact => artifact.parts ?? []);
      const response: AgentResponse = {
        text: textOf(artifactParts) || streamedText || statusText,
        inputRequired: false,
      };
      const data = dataOf(artifactParts);
      if (data !== undefined) response.data = data;
      return { status: 'completed', response };
    }
    case 'input-required':
      return { status: 'completed', response: { text: statusText || streamedText, inputRequired: true } };
    case 'rejected':
    case 'canceled':
      return statusText ? { status: 'declined', reason: statusText } : { status: 'declined' };
    case 'failed':
      throw new TransportError(`Agent task failed${statusText ? `: ${statusText}` : ''}`, 'PROTOCOL');
    default:
      throw new TransportError(`Agent returned unknown task state: ${task.status.state}`, 'PROTOCOL');
  }
}

function messageParts(payload: unknown): TaskPart[] {
  if (typeof payload === 'string') return [{ type: 'text', text: payload }];
  if (isRecord(payload) && typeof payload.text === 'string' && Object.keys(payload).length === 1) {
    return [{ type: 'text', text: payload.text }];
  }
  return [{ type: 'data', data: payload ?? null }];
}

function endpointUrl(endpointRef: string, path: string): URL {
  const base = endpointRef.endsWith('/') ? endpointRef : `${endpointRef}/`;
  return new URL(path, base);
}

async function readNdjson(
  body: NonNullable<Response['body']>,
  onChunk: ((data: string) => void) | undefined
): Promise<TransportReply> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let streamedText = '';

  const handleLine = (line: string): TransportReply | null => {
    if (!line.trim()) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new TransportError('Agent stream contained invalid JSON', 'PROTOCOL');
    }
    if (isRecord(parsed) && typeof parsed.chunk === 'string') {
      streamedText += parsed.chunk;
      onChunk?.(parsed.chunk);
      return null;
    }
    if (isRecord(parsed) && 'task' in parsed) {
      return taskToReply(parseTask(parsed.task), streamedText);
    }
    throw new TransportError('Agent stream contained an unknown event', 'PROTOCOL');
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline >= 0) {
        const reply = handleLine(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        if (reply) return reply;
        newline = buffer.indexOf('\n');
      }

      if (done) {
        const reply = handleLine(buffer);
        if (reply) return reply;
        throw new TransportError('Agent stream ended without a completion', 'PROTOCOL');
      }
    }
  } finally {
    reader.releaseLock();
  }
}

function statusError(status: number, endpointRef: string): TransportError {
  if (status === 408 || status === 504) {
    return new TransportError(`Agent at ${endpointRef} timed out (HTTP ${status})`, 'TIMEOUT');
  }
  if (status >= 500 || status === 404) {
    return new TransportError(`Agent at ${endpointRef} unavailable (HTTP ${status})`, 'UNREACHABLE');
  }
  return new TransportError(`Agent at ${endpointRef} rejected the request (HTTP ${status})`, 'PROTOCOL');
}

/**
 * Create an HTTP transport backed by fetch.
 */
export function createHttpTransport(options: HttpTransportOptions = {}): AgentTransport {
  const fetchImpl = options.fetch ?? fetch;

  return {
    async send(endpointRef: string, message: AgentMessage, sendOptions: SendOptions): Promise<TransportReply> {
      const startTime = Date.now();
      const body = {
        id: message.taskId,
        sessionId: message.sessionId,
        message: { role: 'user', parts: messageParts(message.payload) },
      };

      let response: Response;
      try {
        response = await fetchImpl(endpointUrl(endpointRef, 'tasks/send'), {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            accept: 'application/json, application/x-ndjson',
            ...options.headers,
          },
          body: JSON.stringify(body),
          signal: sendOptions.signal,
        });
      } catch (error) {
        if (sendOptions.signal.aborted) throw sendOptions.signal.reason;
        throw new TransportError(
          `Agent at ${endpointRef} unreachable: ${error instanceof Error ? error.message : String(error)}`,
          'UNREACHABLE'
        );
      }

      if (response.status === 409 || response.status === 422) {
        return { status: 'declined', reason: `HTTP ${response.status}` };
      }
      if (!response.ok) {
        logger.warn('agent_http_error', { endpointUrl: endpointRef, status: response.status });
        throw statusError(response.status, endpointRef);
      }

      const contentType = response.headers.get('content-type') ?? '';
      let reply: TransportReply;
      if (contentType.includes('application/x-ndjson') && response.body) {
        reply = await readNdjson(response.body, sendOptions.onChunk);
      } else {
        let json: unknown;
        try {
          json = await response.json();
        } catch {
          throw new TransportError(`Agent at ${endpointRef} returned invalid JSON`, 'PROTOCOL');
        }
        reply = taskToReply(parseTask(json));
      }

      logger.debug('agent_http_reply', {
        endpointUrl: endpointRef,
        state: reply.status,
        durationMs: Date.now() - startTime,
      });
      return reply;
    },

    async probe(endpointRef: string, signal: AbortSignal): Promise<boolean> {
      try {
        const response = await fetchImpl(endpointUrl(endpointRef, '.well-known/agent.json'), { signal });
        // Only the status matters; release the connection.
        await response.body?.cancel();
        return response.ok;
      } catch (error) {
        logger.debug('agent_probe_failed', {
          endpointUrl: endpointRef,
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },
  };
}
