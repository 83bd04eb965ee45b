const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential)/i;
const URL_KEY_PATTERN = /(url|endpoint)$/i;
const CONTENT_KEY_PATTERN = /^(payload|text|body|content|prompt|response|chunk)$/i;

type RedactOptions = {
  depth?: number;
};

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && URL_KEY_PATTERN.test(key)) {
    return redactUrl(value);
  }
  return value;
}

function redactUnknown(
  value: unknown,
  key?: string,
  options: RedactOptions = {},
): unknown {
  const depth = options.depth ?? 0;
  if (depth > 6) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringByKey(key, value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, { depth: depth + 1 }));
  }

  if (typeof value === 'object') {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return '[REDACTED_OBJECT]';
    }
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(childKey)) {
        result[childKey] = '[REDACTED]';
        continue;
      }
      result[childKey] = redactUnknown(childValue, childKey, { depth: depth + 1 });
    }
    return result;
  }

  return String(value);
}

/**
 * Strip credentials and query strings from an endpoint URL.
 * Values that are not absolute URLs (e.g. `local:math`) pass through.
 */
export function redactUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return value;
  }
  if (!parsed.host) return value;

  const auth = parsed.username || parsed.password ? '***@' : '';
  const query = parsed.search ? '?[REDACTED]' : '';
  return `${parsed.protocol}//${auth}${parsed.host}${parsed.pathname}${query}`;
}

export function redactSecrets<T extends Record<string, unknown>>(value: T): Record<string, unknown> {
  const redacted = redactUnknown(value);
  return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
    ? { ...redacted }
    : {};
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
