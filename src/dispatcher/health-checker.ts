/**
 * Background agent health checks.
 *
 * Optional collaborator: probes every registered agent on an interval and
 * reports HEALTHY or UNREACHABLE to the registry. Observations are dated
 * at probe start, so a slow probe never overrides a failure the router
 * recorded while it was running.
 */

import type { AgentRegistry } from './types.js';
import type { AgentTransport } from '../transport/types.js';
import { createIntervalPoller, type Poller } from '../services/poller.js';
import { UnknownAgentError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'health-checker' });

export interface HealthCheckOptions {
  registry: AgentRegistry;
  transport: AgentTransport;
  timeoutMs: number;
  now?: () => number;
}

async function probeWithTimeout(
  probe: NonNullable<AgentTransport['probe']>,
  endpointRef: string,
  timeoutMs: number
): Promise<boolean> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<boolean>(resolve => {
    timer = setTimeout(() => {
      controller.abort(new Error('probe timeout'));
      resolve(false);
    }, timeoutMs);
  });

  try {
    return await Promise.race([probe(endpointRef, controller.signal), timedOut]);
  } catch (error) {
    logger.debug('agent_probe_error', {
      endpointUrl: endpointRef,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Probe every registered agent once.
 * @returns number of agents whose health was updated
 */
export async function checkAgentHealth(options: HealthCheckOptions): Promise<number> {
  const now = options.now ?? Date.now;
  const snapshot = options.registry.snapshot();
  const { transport } = options;
  if (!transport.probe) {
    logger.debug('health_check_skipped_no_probe');
    return 0;
  }
  const probe = transport.probe.bind(transport);

  const results = await Promise.all(snapshot.map(async agent => {
    const startedAt = now();
    const reachable = await probeWithTimeout(probe, agent.endpointRef, options.timeoutMs);
    try {
      return options.registry.updateHealth(
        agent.id,
        reachable ? 'HEALTHY' : 'UNREACHABLE',
        startedAt,
        agent.registrationSeq
      );
    } catch (error) {
      if (error instanceof UnknownAgentError) return false;
      throw error;
    }
  }));

  const updated = results.filter(Boolean).length;
  logger.debug('health_check_completed', { agentCount: snapshot.length, updated });
  return updated;
}

export function createHealthChecker(options: HealthCheckOptions, intervalMs: number): Poller {
  return createIntervalPoller('health-check', async () => {
    await checkAgentHealth(options);
  }, intervalMs);
}
