import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'access_token',
  'accesstoken',
  'api_key',
  'apikey',
  'xapikey',
  'authorization',
  'password',
  'secret',
  'token',
  'user_key',
  'userkey',
]);

const EMAIL_KEYS = new Set(['email', 'customer_email', 'customeremail', 'emails']);

const REDACTED_LITERAL = '[REDACTED]';

export function redactSensitiveData(value: unknown): unknown {
  const visited = new WeakSet<object>();
  return redactRecursive(value, undefined, visited);
}

export function maskEmail(value: unknown): string {
  if (typeof value !== 'string') {
    return REDACTED_LITERAL;
  }

  const trimmed = value.trim();
  const at = trimmed.lastIndexOf('@');
  if (at <= 0 || at === trimmed.length - 1) {
    return REDACTED_LITERAL;
  }

  return `${trimmed[0]}***${trimmed.slice(at)}`;
}

function redactRecursive(
  value: unknown,
  key: string | undefined,
  visited: WeakSet<object>,
): unknown {
  const normalizedKey = key ? normalizeKey(key) : '';

  if (shouldHardRedact(normalizedKey)) {
    return REDACTED_LITERAL;
  }

  if (EMAIL_KEYS.has(normalizedKey) && !Array.isArray(value) && !isRecord(value)) {
    return maskEmail(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, key, visited));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactAuthorizationValue(value);
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  if (HARD_REDACT_KEYS.has(normalizedKey)) {
    return true;
  }

  return normalizedKey.includes('secret') || normalizedKey.includes('password');
}

function redactAuthorizationValue(value: string): string {
  return value.replace(/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, '$1 [REDACTED]');
}
