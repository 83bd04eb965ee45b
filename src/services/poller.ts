/**
 * @fileoverview Polling abstraction for background maintenance jobs.
 *
 * Used by session eviction and the optional agent health checker.
 * Runs never overlap: a tick that arrives while the previous run is
 * still in progress is skipped.
 */

import { createLogger } from '../utils/observability/index.js';

const baseLogger = createLogger({ domain: 'poller' });

/**
 * Interface for job polling implementations.
 */
export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight run to complete */
  stop(): Promise<void>;
  /** Check if the poller is running */
  isRunning(): boolean;
}

/**
 * Create an interval-based poller.
 *
 * @param name - Label used in log events
 * @param run - Function to call on each interval
 * @param intervalMs - Polling interval in milliseconds
 */
export function createIntervalPoller(
  name: string,
  run: () => Promise<void>,
  intervalMs: number
): Poller {
  const logger = baseLogger.child({ poller: name });
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  return {
    start(): void {
      if (intervalId !== null) {
        logger.debug('poller_already_running');
        return;
      }

      logger.info('poller_started', { intervalMs });

      intervalId = setInterval(() => {
        void runSafe();
      }, intervalMs);
      // Background maintenance must not keep the process alive on its own.
      intervalId.unref();
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      if (inFlight) {
        await inFlight;
      }

      logger.info('poller_stopped');
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };

  /**
   * Wrapper to prevent overlapping executions and log failures.
   */
  async function runSafe(): Promise<void> {
    if (inFlight) {
      logger.debug('poller_skip_overlap');
      return;
    }

    inFlight = (async () => {
      try {
        await run();
      } catch (error) {
        logger.error('poller_error', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    })();

    try {
      await inFlight;
    } finally {
      inFlight = null;
    }
  }
}
