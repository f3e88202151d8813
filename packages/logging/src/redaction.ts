const SENSITIVE_KEY_FRAGMENTS = [
  'authorization',
  'cookie',
  'token',
  'secret',
  'password',
  'apikey',
  'api_key',
  'privatekey',
  'private_key',
  'body'
] as const;

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;
const MAX_STRING_LENGTH = 4096;

const normalizeKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

export type Redactor = (value: unknown) => unknown;

type Walk = {
  depth: number;
  seen: WeakSet<object>;
};

const clipString = (value: string) =>
  value.length > MAX_STRING_LENGTH
    ? `${value.slice(0, MAX_STRING_LENGTH)}...[+${value.length - MAX_STRING_LENGTH} chars]`
    : value;

// Upstream URLs end up in gateway logs; credentials in the userinfo part must not.
const describeUrl = (url: URL) => {
  if (url.username.length === 0 && url.password.length === 0) {
    return url.href;
  }

  const masked = new URL(url.href);
  masked.username = '';
  masked.password = '';
  return `${masked.protocol}//${REDACTED}@${masked.href.slice(masked.protocol.length + 2)}`;
};

/**
 * Builds a sanitizer for log metadata. Values under keys containing a
 * sensitive fragment (or matching one of `extraSensitiveKeys`) are replaced
 * by `[REDACTED]`; everything else is reduced to JSON-safe data.
 */
export const createRedactor = ({extraSensitiveKeys = []}: {extraSensitiveKeys?: string[]} = {}): Redactor => {
  const extraKeys = new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0));

  const isSensitive = (key: string) => {
    const normalized = normalizeKey(key);
    return extraKeys.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
  };

  const redactEntries = (entries: Iterable<[string, unknown]>, walk: Walk) => {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      result[key] = isSensitive(key) ? REDACTED : visit(entry, {...walk, depth: walk.depth + 1});
    }
    return result;
  };

  const visit = (value: unknown, walk: Walk): unknown => {
    if (walk.depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    switch (typeof value) {
      case 'undefined':
      case 'number':
      case 'boolean':
        return value;
      case 'string':
        return clipString(value);
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
      default:
        break;
    }

    if (value === null || typeof value !== 'object') {
      return null;
    }

    if (Buffer.isBuffer(value)) {
      return `[BINARY ${value.length} bytes]`;
    }

    if (value instanceof Date) {
      return value.toISOString();
    }

    if (value instanceof URL) {
      return describeUrl(value);
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        ...(value.stack ? {stack: value.stack} : {})
      };
    }

    if (walk.seen.has(value)) {
      return '[CIRCULAR]';
    }
    walk.seen.add(value);

    if (Array.isArray(value)) {
      return value.map(item => visit(item, {...walk, depth: walk.depth + 1}));
    }

    if (value instanceof Map) {
      return redactEntries(
        [...value.entries()].map(([key, entry]): [string, unknown] => [String(key), entry]),
        walk
      );
    }

    if (value instanceof Set) {
      return [...value].map(item => visit(item, {...walk, depth: walk.depth + 1}));
    }

    return redactEntries(Object.entries(value), walk);
  };

  return value => visit(value, {depth: 0, seen: new WeakSet<object>()});
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => createRedactor(extraSensitiveKeys ? {extraSensitiveKeys} : {})(value);
