import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createIntervalPoller } from '../../../src/services/poller.js';

describe('interval poller', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on every interval until stopped', async () => {
    const run = vi.fn(async () => undefined);
    const poller = createIntervalPoller('test', run, 1000);

    poller.start();
    expect(poller.isRunning()).toBe(true);
    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(3);

    await poller.stop();
    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(3);
    expect(poller.isRunning()).toBe(false);
  });

  it('skips ticks while the previous run is still going', async () => {
    let finish: () => void = () => undefined;
    const run = vi.fn(() => new Promise<void>(resolve => {
      finish = resolve;
    }));
    const poller = createIntervalPoller('test', run, 1000);

    poller.start();
    await vi.advanceTimersByTimeAsync(3500);
    expect(run).toHaveBeenCalledTimes(1);

    finish();
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);

    finish();
    await poller.stop();
  });

  it('keeps polling after a failed run', async () => {
    const run = vi.fn(async () => {
      throw new Error('store unavailable');
    });
    const poller = createIntervalPoller('test', run, 1000);

    poller.start();
    await vi.advanceTimersByTimeAsync(2000);

    expect(run).toHaveBeenCalledTimes(2);
    await poller.stop();
  });

  it('waits for an in-flight run when stopping', async () => {
    let finish: () => void = () => undefined;
    const poller = createIntervalPoller('test', () => new Promise<void>(resolve => {
      finish = resolve;
    }), 1000);
    poller.start();
    await vi.advanceTimersByTimeAsync(1000);

    let stopped = false;
    const stopping = poller.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finish();
    await stopping;
    expect(stopped).toBe(true);
  });
});
