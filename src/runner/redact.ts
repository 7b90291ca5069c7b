/**
 * Denylist-based redaction for logs and failure envelopes.
 *
 * Keys on the denylist are masked recursively before any data leaves the
 * process (structured logs, CLI output, envelope details).
 */

/** Key fragments that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'access_key',
  'account_key',
  'accountkey',
  'private_key',
  'authorization',
  'credential',
  'certificate',
  'connection_string',
  'connectionstring',
  'sas',
];

const REDACTED = '[REDACTED]';

/** Patterns that match sensitive values regardless of key name. */
const VALUE_PATTERNS: readonly RegExp[] = [
  /Bearer\s+[A-Za-z0-9._~+/-]{20,}=*/g,                     // Authorization header value
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, // JWT
  /AccountKey=[A-Za-z0-9+/=]{20,}/g,                         // storage connection string
  /[?&]sig=[A-Za-z0-9%+/=]{20,}/g,                           // SAS signature
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/g,
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,         // email (PII)
];

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return VALUE_PATTERNS.some((p) => {
    p.lastIndex = 0;
    return p.test(value);
  });
}

/**
 * Deep-redact a value: denylisted keys become `[REDACTED]`, and so does any
 * string matching a sensitive pattern.  Returns a new value.
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : obj;
  }

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  return redactRecord(obj);
}

/** `redact` for a plain record, keeping the record type. */
export function redactRecord(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Replace inline secrets inside a free-text string.
 */
export function redactString(input: string): string {
  let result = input;
  for (const pattern of VALUE_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  result = result.replace(/client_secret\s*[:=]\s*['"]?[^\s'"&]{8,}['"]?/gi, REDACTED);
  return result;
}

/**
 * Shorten a subscription or tenant ID for log lines (`1234abcd...`).
 */
export function maskId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}
