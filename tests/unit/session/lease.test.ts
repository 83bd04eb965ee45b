import { describe, expect, it, vi } from 'vitest';
import { SessionLeaseTracker } from '../../../src/services/session/lease.js';
import { DispatchCancelledError, SessionBusyError } from '../../../src/utils/errors.js';

describe('SessionLeaseTracker', () => {
  it('hands the session to queued turns in arrival order', async () => {
    const tracker = new SessionLeaseTracker('queue');
    const order: string[] = [];

    const first = await tracker.acquire('s1');
    const second = tracker.acquire('s1').then(lease => {
      order.push('second');
      return lease;
    });
    const third = tracker.acquire('s1').then(lease => {
      order.push('third');
      return lease;
    });

    expect(tracker.isBusy('s1')).toBe(true);
    first.release();
    (await second).release();
    (await third).release();

    expect(order).toEqual(['second', 'third']);
    expect(tracker.isBusy('s1')).toBe(false);
  });

  it('drops a queued turn whose signal aborts', async () => {
    const tracker = new SessionLeaseTracker('queue');
    const first = await tracker.acquire('s1');
    const controller = new AbortController();

    const second = tracker.acquire('s1', controller.signal);
    controller.abort();

    await expect(second).rejects.toBeInstanceOf(DispatchCancelledError);
    first.release();
    expect(tracker.isBusy('s1')).toBe(false);
  });

  it('refuses to queue a turn that is already cancelled', async () => {
    const tracker = new SessionLeaseTracker('queue');
    const first = await tracker.acquire('s1');
    const controller = new AbortController();
    controller.abort();

    await expect(tracker.acquire('s1', controller.signal)).rejects.toBeInstanceOf(DispatchCancelledError);
    first.release();
    expect(tracker.isBusy('s1')).toBe(false);
  });

  it('rejects a concurrent turn under the reject policy', async () => {
    const tracker = new SessionLeaseTracker('reject');
    const lease = await tracker.acquire('s1');

    await expect(tracker.acquire('s1')).rejects.toBeInstanceOf(SessionBusyError);

    lease.release();
    await expect(tracker.acquire('s1')).resolves.toMatchObject({ sessionId: 's1' });
  });

  it('ignores a second release of the same lease', async () => {
    const tracker = new SessionLeaseTracker();
    const first = await tracker.acquire('s1');
    const second = tracker.acquire('s1');

    first.release();
    const held = await second;
    first.release();

    expect(tracker.isBusy('s1')).toBe(true);
    held.release();
    expect(tracker.isBusy('s1')).toBe(false);
  });

  it('runs idle callbacks immediately or after the last release', async () => {
    const tracker = new SessionLeaseTracker();
    const now = vi.fn();
    tracker.whenIdle('free', now);
    expect(now).toHaveBeenCalledTimes(1);

    const lease = await tracker.acquire('s1');
    const later = vi.fn();
    tracker.whenIdle('s1', later);
    expect(later).not.toHaveBeenCalled();

    lease.release();
    expect(later).toHaveBeenCalledTimes(1);
  });
});
