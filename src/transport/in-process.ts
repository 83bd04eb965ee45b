/**
 * In-process agent transport.
 *
 * Endpoint refs of the form `local:<name>` resolve to handler functions
 * registered on this transport. Used for agents that live inside the
 * dispatcher process and as the test double for remote agents.
 */

import type { AgentMessage, AgentResponse, AgentTransport, SendOptions, TransportReply } from './types.js';
import { TransportError } from './types.js';

export const LOCAL_SCHEME = 'local:';

export interface LocalAgentContext {
  signal: AbortSignal;
  /** Stream a chunk to the caller before the reply settles */
  emit(data: string): void;
}

export type LocalAgentHandler = (
  message: AgentMessage,
  context: LocalAgentContext
) => Promise<TransportReply>;

/** Build a completed reply. */
export function completed(text: string, extra: Partial<Omit<AgentResponse, 'text'>> = {}): TransportReply {
  return {
    status: 'completed',
    response: { text, inputRequired: extra.inputRequired ?? false, ...(extra.data !== undefined ? { data: extra.data } : {}) },
  };
}

/** Build a declined reply. */
export function declined(reason?: string): TransportReply {
  return { status: 'declined', ...(reason ? { reason } : {}) };
}

export class InProcessTransport implements AgentTransport {
  private handlers = new Map<string, LocalAgentHandler>();

  /** Register a handler and return the endpoint ref that reaches it. */
  register(name: string, handler: LocalAgentHandler): string {
    this.handlers.set(name, handler);
    return `${LOCAL_SCHEME}${name}`;
  }

  unregister(name: string): boolean {
    return this.handlers.delete(name);
  }

  private resolve(endpointRef: string): LocalAgentHandler | undefined {
    if (!endpointRef.startsWith(LOCAL_SCHEME)) return undefined;
    return this.handlers.get(endpointRef.slice(LOCAL_SCHEME.length));
  }

  async send(endpointRef: string, message: AgentMessage, options: SendOptions): Promise<TransportReply> {
    const handler = this.resolve(endpointRef);
    if (!handler) {
      throw new TransportError(`No local agent at ${endpointRef}`, 'UNREACHABLE');
    }

    try {
      return await handler(message, {
        signal: options.signal,
        emit: (data: string) => options.onChunk?.(data),
      });
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(
        `Local agent ${endpointRef} failed: ${error instanceof Error ? error.message : String(error)}`,
        'PROTOCOL'
      );
    }
  }

  async probe(endpointRef: string): Promise<boolean> {
    return this.resolve(endpointRef) !== undefined;
  }
}
