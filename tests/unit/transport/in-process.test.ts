import { describe, expect, it } from 'vitest';
import { InProcessTransport, completed, declined } from '../../../src/transport/in-process.js';
import { TransportError } from '../../../src/transport/types.js';

const message = { taskId: 't1', sessionId: 's1', payload: 'ping' };

function sendOptions() {
  return { signal: new AbortController().signal, timeoutMs: 100 };
}

describe('InProcessTransport', () => {
  it('returns the local: endpoint ref for a registered handler', () => {
    const transport = new InProcessTransport();
    expect(transport.register('echo', async m => completed(String(m.payload)))).toBe('local:echo');
  });

  it('delivers the message to the handler', async () => {
    const transport = new InProcessTransport();
    transport.register('echo', async m => completed(`${m.sessionId}:${String(m.payload)}`));

    const reply = await transport.send('local:echo', message, sendOptions());

    expect(reply).toEqual({ status: 'completed', response: { text: 's1:ping', inputRequired: false } });
  });

  it('passes declines through', async () => {
    const transport = new InProcessTransport();
    transport.register('picky', async () => declined());

    await expect(transport.send('local:picky', message, sendOptions())).resolves.toEqual({ status: 'declined' });
  });

  it('is unreachable for unknown or unregistered handlers', async () => {
    const transport = new InProcessTransport();
    transport.register('gone', async () => completed('x'));
    transport.unregister('gone');

    const error = await transport.send('local:gone', message, sendOptions()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ transportCode: 'UNREACHABLE', code: 'transport_unreachable' });
  });

  it('wraps handler failures as protocol errors', async () => {
    const transport = new InProcessTransport();
    transport.register('boom', async () => {
      throw new Error('kaboom');
    });

    await expect(transport.send('local:boom', message, sendOptions()))
      .rejects.toMatchObject({ transportCode: 'PROTOCOL' });
  });

  it('probes registered handlers only', async () => {
    const transport = new InProcessTransport();
    transport.register('here', async () => completed('x'));

    expect(await transport.probe('local:here')).toBe(true);
    expect(await transport.probe('local:elsewhere')).toBe(false);
    expect(await transport.probe('http://here')).toBe(false);
  });
});
