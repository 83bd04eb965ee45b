/**
 * Transport wiring.
 *
 * Picks a transport by endpoint scheme: `local:` refs go to the
 * in-process transport, `http:`/`https:` refs to the HTTP transport.
 */

import type { AgentMessage, AgentTransport, SendOptions, TransportReply } from './types.js';
import { TransportError } from './types.js';

export * from './types.js';
export { InProcessTransport, completed, declined, LOCAL_SCHEME } from './in-process.js';
export type { LocalAgentHandler, LocalAgentContext } from './in-process.js';
export { createHttpTransport } from './http.js';
export type { HttpTransportOptions } from './http.js';
export { discoverAgent } from './discovery.js';

function schemeOf(endpointRef: string): string {
  const colon = endpointRef.indexOf(':');
  return colon > 0 ? endpointRef.slice(0, colon + 1).toLowerCase() : '';
}

/**
 * Route each call to the transport registered for the endpoint's scheme.
 */
export function createSchemeTransport(bySchemes: Record<string, AgentTransport>): AgentTransport {
  const pick = (endpointRef: string): AgentTransport | undefined => bySchemes[schemeOf(endpointRef)];

  return {
    async send(endpointRef: string, message: AgentMessage, options: SendOptions): Promise<TransportReply> {
      const transport = pick(endpointRef);
      if (!transport) {
        throw new TransportError(`No transport for endpoint ${endpointRef}`, 'UNREACHABLE');
      }
      return transport.send(endpointRef, message, options);
    },

    async probe(endpointRef: string, signal: AbortSignal): Promise<boolean> {
      const transport = pick(endpointRef);
      if (!transport?.probe) return false;
      return transport.probe(endpointRef, signal);
    },
  };
}
