import { describe, expect, it } from 'vitest';
import { redactSecrets, redactUrl, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('strips credentials and query strings from URLs', () => {
    expect(redactUrl('https://user:pw@agent.test:8443/a2a?token=x')).toBe('https://***@agent.test:8443/a2a?[REDACTED]');
    expect(redactUrl('http://agent.test/a2a')).toBe('http://agent.test/a2a');
  });

  it('leaves non-URL endpoint refs untouched', () => {
    expect(redactUrl('local:math')).toBe('local:math');
  });

  it('redacts sensitive keys and request content', () => {
    const input = {
      agentId: 'math',
      accessToken: 'abc123',
      payload: 'What is 2+2?',
      chunk: ['a', 'b'],
      response: { text: 'four' },
      nested: {
        client_secret: 'my-secret',
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted.agentId).toBe('math');
    expect(redacted.accessToken).toBe('[REDACTED]');
    expect(redacted.payload).toBe(`[REDACTED_TEXT len=${input.payload.length}]`);
    expect(redacted.chunk).toBe('[REDACTED_ARRAY len=2]');
    expect(redacted.response).toBe('[REDACTED_OBJECT]');
    expect(redacted.nested).toEqual({ client_secret: '[REDACTED]' });
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    const snippet = safeSnippet(value, 20);
    expect(snippet).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
  });
});
