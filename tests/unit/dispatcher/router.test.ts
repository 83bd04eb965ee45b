import { describe, expect, it, vi } from 'vitest';
import { answers, createHarness, declines, hangs, unreachable } from '../../helpers/agents.js';
import { completed, type LocalAgentHandler } from '../../../src/transport/in-process.js';
import { TransportError, type TransportReply } from '../../../src/transport/types.js';
import { createTagMatcher } from '../../../src/dispatcher/matcher.js';
import type { CapabilityMatcher, DispatchEvent } from '../../../src/dispatcher/types.js';
import {
  AllCandidatesFailedError,
  DispatchCancelledError,
  NoCandidateError,
  SessionBusyError,
} from '../../../src/utils/errors.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Handler that waits for the test to release it, then answers. */
function gated(text: string) {
  const gate = deferred<void>();
  const handler = vi.fn<LocalAgentHandler>(async () => {
    await gate.promise;
    return completed(text);
  });
  return { handler, open: () => gate.resolve() };
}

describe('dispatch router', () => {
  it('falls back to the next candidate after a timeout and demotes the slow agent', async () => {
    const h = createHarness({ attemptTimeoutMs: 50 });
    const slow = hangs();
    h.addAgent('A', ['math'], answers('4'));
    h.addAgent('B', ['math', 'code'], slow);
    h.registry.updateHealth('A', 'HEALTHY');
    h.registry.updateHealth('B', 'HEALTHY');

    // B ranks first only because the payload mentions its "code" tag.
    const result = await h.dispatcher.submit({ payload: 'Check this code: 2+2', requiredCapabilities: ['math'] });

    expect(result.error).toBeUndefined();
    expect(result.agentId).toBe('A');
    expect(result.response?.text).toBe('4');
    expect(result.attempts.map(a => [a.agentId, a.outcome])).toEqual([['B', 'TIMEOUT'], ['A', 'SUCCESS']]);
    expect(h.registry.get('B')?.health).toBe('DEGRADED');
    expect(h.registry.get('A')?.health).toBe('HEALTHY');
    expect(slow.mock.calls[0][1].signal.aborted).toBe(true);
  });

  it('returns NoCandidateError without calling any agent', async () => {
    const h = createHarness();
    const imageAgent = answers('picture');
    h.addAgent('C', ['image'], imageAgent);

    const result = await h.dispatcher.submit({ payload: 'hello', requiredCapabilities: ['text'] });

    expect(result.error).toBeInstanceOf(NoCandidateError);
    expect(result.attempts).toEqual([]);
    expect(imageAgent).not.toHaveBeenCalled();
  });

  it('tries a degraded agent before unreachable ones and reports every attempt', async () => {
    const h = createHarness();
    h.addAgent('U1', ['math'], unreachable());
    h.addAgent('D', ['math'], declines('busy'));
    h.addAgent('U2', ['math'], unreachable());
    h.registry.updateHealth('U1', 'UNREACHABLE');
    h.registry.updateHealth('D', 'DEGRADED');
    h.registry.updateHealth('U2', 'UNREACHABLE');

    const result = await h.dispatcher.submit({ payload: 'x', requiredCapabilities: ['math'] });

    expect(result.error).toBeInstanceOf(AllCandidatesFailedError);
    expect(result.attempts.map(a => [a.agentId, a.outcome])).toEqual([
      ['D', 'DECLINED'],
      ['U1', 'UNREACHABLE'],
      ['U2', 'UNREACHABLE'],
    ]);
    expect(result.attempts[0].detail).toBe('busy');
    expect(h.registry.get('D')?.health).toBe('DEGRADED');
  });

  it('stops at the first success so only one agent handles the request', async () => {
    const h = createHarness();
    const first = answers('done');
    const second = answers('done again');
    h.addAgent('a', ['email'], first);
    h.addAgent('b', ['email'], second);

    const result = await h.dispatcher.submit({ payload: 'send it', requiredCapabilities: ['email'] });

    expect(result.agentId).toBe('a');
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();
  });

  it('marks agents that break the protocol as degraded', async () => {
    const h = createHarness();
    h.addAgent('broken', ['math'], vi.fn<LocalAgentHandler>(async () => {
      throw new Error('bad frame');
    }));
    h.addAgent('ok', ['math'], answers('fine'));

    const result = await h.dispatcher.submit({ payload: 'x' });

    expect(result.attempts.map(a => a.outcome)).toEqual(['PROTOCOL_ERROR', 'SUCCESS']);
    expect(h.registry.get('broken')?.health).toBe('DEGRADED');
  });

  it('skips candidates below the minimum confidence', async () => {
    const h = createHarness({ minConfidence: 0.5 });
    h.addAgent('a', ['math'], declines());
    const other = answers('nope');
    h.addAgent('b', ['code'], other);

    const result = await h.dispatcher.submit({ payload: 'x', preferredCapabilities: ['math'] });

    expect(result.error).toBeInstanceOf(AllCandidatesFailedError);
    expect(result.attempts.map(a => a.agentId)).toEqual(['a']);
    expect(other).not.toHaveBeenCalled();
  });

  it('creates a session when none is given and records the result in its history', async () => {
    const h = createHarness();
    h.addAgent('a', [], answers('hi'));

    const result = await h.dispatcher.submit({ payload: 'hello' });
    const session = await h.sessions.get(result.sessionId);

    expect(session?.pinnedAgentId).toBe('a');
    expect(session?.history).toHaveLength(1);
    expect(session?.history[0].response?.text).toBe('hi');
  });

  it('appends failed dispatches to the session history', async () => {
    const h = createHarness();

    const result = await h.dispatcher.submit({ payload: 'hello', sessionId: 's1' });
    const session = await h.sessions.get('s1');

    expect(result.sessionId).toBe('s1');
    expect(session?.pinnedAgentId).toBeUndefined();
    expect(session?.history[0].error).toBeInstanceOf(NoCandidateError);
  });

  describe('session pinning', () => {
    it('reuses the pinned agent while it is reachable and re-pins after it becomes unreachable', async () => {
      const h = createHarness();
      const a = answers('from a');
      const b = answers('from b');
      h.addAgent('a', ['math'], a);
      h.addAgent('b', ['math', 'code'], b);

      const first = await h.dispatcher.submit({ payload: 'x', requiredCapabilities: ['math'], sessionId: 's1' });
      expect(first.agentId).toBe('a');

      // b ranks higher for this request, but the pin wins.
      const second = await h.dispatcher.submit({ payload: 'now some code', sessionId: 's1' });
      expect(second.agentId).toBe('a');
      expect(b).not.toHaveBeenCalled();

      h.registry.updateHealth('a', 'UNREACHABLE');
      const third = await h.dispatcher.submit({ payload: 'again', sessionId: 's1' });

      expect(third.agentId).toBe('b');
      expect((await h.sessions.get('s1'))?.pinnedAgentId).toBe('b');
    });

    it('ignores a pin that lacks the required capabilities', async () => {
      const h = createHarness();
      h.addAgent('a', ['math'], answers('from a'));
      h.addAgent('b', ['code'], answers('from b'));
      await h.sessions.pin('s1', 'a');

      const result = await h.dispatcher.submit({ payload: 'x', requiredCapabilities: ['code'], sessionId: 's1' });

      expect(result.agentId).toBe('b');
    });

    it('ignores a pin to an agent that has been deregistered', async () => {
      const h = createHarness();
      h.addAgent('a', ['math'], answers('from a'));
      await h.sessions.pin('s1', 'gone');

      const result = await h.dispatcher.submit({ payload: 'x', sessionId: 's1' });

      expect(result.agentId).toBe('a');
    });
  });

  it('lets an in-flight attempt finish after its agent is deregistered, then never selects it again', async () => {
    const h = createHarness();
    const { handler, open } = gated('late answer');
    h.addAgent('a', ['math'], handler);

    const inFlight = h.dispatcher.submit({ payload: 'x', requiredCapabilities: ['math'] });
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

    h.dispatcher.deregisterAgent('a');
    open();
    const result = await inFlight;

    expect(result.agentId).toBe('a');
    expect(result.response?.text).toBe('late answer');

    const next = await h.dispatcher.submit({ payload: 'x', requiredCapabilities: ['math'] });
    expect(next.error).toBeInstanceOf(NoCandidateError);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('keeps a late failure from a replaced registration off the new agent', async () => {
    const h = createHarness();
    const gate = deferred<void>();
    const oldEndpoint = vi.fn<LocalAgentHandler>(async () => {
      await gate.promise;
      throw new TransportError('connection refused', 'UNREACHABLE');
    });
    h.addAgent('x', ['math'], oldEndpoint);

    const inFlight = h.dispatcher.submit({ payload: 'x', requiredCapabilities: ['math'] });
    await vi.waitFor(() => expect(oldEndpoint).toHaveBeenCalledTimes(1));

    h.dispatcher.deregisterAgent('x');
    h.registry.register({ id: 'x', capabilities: ['math'], endpointRef: h.transport.register('x-new', answers('new')) });
    h.registry.updateHealth('x', 'HEALTHY');
    gate.resolve();
    const result = await inFlight;

    expect(result.attempts.map(a => [a.agentId, a.outcome])).toEqual([['x', 'UNREACHABLE']]);
    expect(h.registry.get('x')?.endpointRef).toBe('local:x-new');
    expect(h.registry.get('x')?.health).toBe('HEALTHY');
  });

  it('cancels the in-flight attempt when the caller aborts', async () => {
    const h = createHarness({ attemptTimeoutMs: 5000 });
    const slow = hangs();
    const backup = answers('backup');
    h.addAgent('slow', ['math'], slow);
    h.addAgent('backup', ['math'], backup);

    const controller = new AbortController();
    const pending = h.dispatcher.submit({ payload: 'x' }, { signal: controller.signal });
    await vi.waitFor(() => expect(slow).toHaveBeenCalled());
    controller.abort();
    const result = await pending;

    expect(result.error).toBeInstanceOf(DispatchCancelledError);
    expect(result.attempts.map(a => a.outcome)).toEqual(['CANCELLED']);
    expect(slow.mock.calls[0][1].signal.aborted).toBe(true);
    expect(backup).not.toHaveBeenCalled();
    expect(h.registry.get('slow')?.health).toBe('UNKNOWN');
  });

  describe('session concurrency', () => {
    it('queues a second turn for the same session until the first finishes', async () => {
      const h = createHarness();
      const { handler, open } = gated('first');
      h.addAgent('a', [], handler);

      const first = h.dispatcher.submit({ payload: 'one', sessionId: 's1' });
      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
      const second = h.dispatcher.submit({ payload: 'two', sessionId: 's1' });

      await new Promise(resolve => setTimeout(resolve, 20));
      expect(handler).toHaveBeenCalledTimes(1);

      open();
      await Promise.all([first, second]);

      expect(handler).toHaveBeenCalledTimes(2);
      expect((await h.sessions.get('s1'))?.history).toHaveLength(2);
    });

    it('cancels a queued turn without waiting for the session or ranking agents', async () => {
      const tags = createTagMatcher();
      const rank = vi.fn<CapabilityMatcher['rank']>((request, snapshot) => tags.rank(request, snapshot));
      const h = createHarness({ matcher: { rank } });
      const { handler, open } = gated('first');
      h.addAgent('a', [], handler);

      const first = h.dispatcher.submit({ payload: 'one', sessionId: 's1' });
      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

      const controller = new AbortController();
      const second = h.dispatcher.submit({ payload: 'two', sessionId: 's1' }, { signal: controller.signal });
      await new Promise(resolve => setTimeout(resolve, 10));
      controller.abort();
      const cancelled = await second;

      expect(cancelled.error).toBeInstanceOf(DispatchCancelledError);
      expect(cancelled.attempts).toEqual([]);
      expect(rank).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledTimes(1);

      open();
      expect((await first).agentId).toBe('a');
      expect((await h.sessions.get('s1'))?.history).toHaveLength(2);
    });

    it('rejects a concurrent turn when configured to', async () => {
      const h = createHarness({ concurrency: 'reject' });
      const { handler, open } = gated('first');
      h.addAgent('a', [], handler);

      const first = h.dispatcher.submit({ payload: 'one', sessionId: 's1' });
      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

      await expect(h.dispatcher.submit({ payload: 'two', sessionId: 's1' })).rejects.toBeInstanceOf(SessionBusyError);

      open();
      expect((await first).agentId).toBe('a');
    });

    it('does not serialize dispatches for different sessions', async () => {
      const h = createHarness();
      const { handler, open } = gated('shared');
      h.addAgent('a', [], handler);

      const one = h.dispatcher.submit({ payload: 'one', sessionId: 's1' });
      const two = h.dispatcher.submit({ payload: 'two', sessionId: 's2' });
      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(2));

      open();
      const results = await Promise.all([one, two]);
      expect(results.map(r => r.agentId)).toEqual(['a', 'a']);
    });
  });

  describe('streaming', () => {
    it('yields chunks tagged with the agent, then the attempt and the final result', async () => {
      const h = createHarness();
      h.addAgent('writer', ['text'], vi.fn<LocalAgentHandler>(async (_message, context) => {
        context.emit('Hel');
        context.emit('lo');
        return completed('Hello');
      }));

      const events: DispatchEvent[] = [];
      for await (const event of h.dispatcher.submitStream({ payload: 'greet me' })) {
        events.push(event);
      }

      expect(events.map(e => e.type)).toEqual(['chunk', 'chunk', 'attempt', 'result']);
      expect(events[0]).toEqual({ type: 'chunk', agentId: 'writer', data: 'Hel' });
      const last = events[3];
      expect(last.type === 'result' && last.result.response?.text).toBe('Hello');
    });

    it('reports chunks from a failed attempt before moving on', async () => {
      const h = createHarness();
      h.addAgent('flaky', [], vi.fn<LocalAgentHandler>(async (_message, context): Promise<TransportReply> => {
        context.emit('partial');
        throw new Error('stream broke');
      }));
      h.addAgent('steady', [], answers('ok'));

      const events: DispatchEvent[] = [];
      for await (const event of h.dispatcher.submitStream({ payload: 'x' })) {
        events.push(event);
      }

      expect(events.map(e => (e.type === 'attempt' ? `${e.attempt.agentId}:${e.attempt.outcome}` : e.type))).toEqual([
        'chunk',
        'flaky:PROTOCOL_ERROR',
        'steady:SUCCESS',
        'result',
      ]);
    });

    it('cancels the dispatch when the consumer stops reading', async () => {
      const h = createHarness({ attemptTimeoutMs: 5000 });
      let agentSignal: AbortSignal | undefined;
      h.addAgent('talker', [], vi.fn<LocalAgentHandler>((_message, context) => {
        agentSignal = context.signal;
        context.emit('first');
        return new Promise<TransportReply>((_, reject) => {
          context.signal.addEventListener('abort', () => reject(context.signal.reason), { once: true });
        });
      }));

      for await (const event of h.dispatcher.submitStream({ payload: 'x', sessionId: 's1' })) {
        expect(event.type).toBe('chunk');
        break;
      }

      expect(agentSignal?.aborted).toBe(true);
      const session = await h.sessions.get('s1');
      expect(session?.history[0].error).toBeInstanceOf(DispatchCancelledError);
    });
  });
});
