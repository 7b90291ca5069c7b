import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  redact,
  redactRecord,
  redactString,
  maskId,
  REDACT_DENYLIST_KEYS,
  classifyFailure,
  toFailureEnvelope,
  runOperation,
  fromZodError,
  exitCodeFor,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  ServiceAuthenticationError,
  ServiceHttpError,
  ServiceNetworkError,
  AuthenticationExpiredError,
  RateLimitExceededError,
  ValidationError,
  createLogger,
  createRunContext,
  mapWithConcurrency,
  parseRecords,
  DEFAULT_RETRY_POLICY,
} from '../runner/index.js';

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

describe('Redaction', () => {
  it('redacts denylist keys at any depth', () => {
    const result = redactRecord({
      name: 'ops',
      client_secret: 'test-secret',
      nested: { AccountKey: 'test-secret', region: 'qatarcentral' },
    });
    expect(result).toEqual({
      name: 'ops',
      client_secret: '[REDACTED]',
      nested: { AccountKey: '[REDACTED]', region: 'qatarcentral' },
    });
  });

  it('redacts sensitive values regardless of key', () => {
    expect(redact('Bearer test-token-placeholder-value')).toBe('[REDACTED]');
    expect(redact('user@example.com')).toBe('[REDACTED]');
    expect(redact(['safe', 'ops@example.com'])).toEqual(['safe', '[REDACTED]']);
  });

  it('leaves safe values alone', () => {
    expect(redact('eastus')).toBe('eastus');
    expect(redact(42)).toBe(42);
    expect(redact(null)).toBeNull();
    expect(redact(undefined)).toBeUndefined();
  });

  it('replaces inline secrets inside free text', () => {
    expect(redactString('login failed: client_secret=test-secret-value')).toBe('login failed: [REDACTED]');
    expect(redactString('conn AccountKey=testsecrettestsecret00 end')).toBe('conn [REDACTED] end');
  });

  it('covers the credential-bearing keys', () => {
    for (const key of ['password', 'secret', 'token', 'certificate', 'connection_string', 'sas']) {
      expect(REDACT_DENYLIST_KEYS).toContain(key);
    }
  });

  it('masks long IDs to their first eight characters', () => {
    expect(maskId('00000000-1111-2222-3333-444444444444')).toBe('00000000...');
    expect(maskId('short')).toBe('short');
  });
});

// ---------------------------------------------------------------------------
// Failure classification and envelopes
// ---------------------------------------------------------------------------

describe('classifyFailure', () => {
  it('classifies by class, status and network code', () => {
    expect(classifyFailure(new ServiceAuthenticationError('x'))).toBe('authentication');
    expect(classifyFailure(new ServiceHttpError(429, 'x'))).toBe('rate_limit');
    expect(classifyFailure(new ServiceHttpError(500, 'x'))).toBe('server');
    expect(classifyFailure(new ServiceHttpError(599, 'x'))).toBe('server');
    expect(classifyFailure(new ServiceHttpError(400, 'x'))).toBe('client');
    expect(classifyFailure(new ServiceNetworkError('x'))).toBe('network');
    expect(classifyFailure(Object.assign(new Error('x'), { code: 'ETIMEDOUT' }))).toBe('network');
    expect(classifyFailure(new Error('x'))).toBe('unknown');
    expect(classifyFailure('boom')).toBe('unknown');
  });

  it('reads statusCode from SDK-shaped errors', () => {
    expect(classifyFailure({ statusCode: 503 })).toBe('server');
    expect(classifyFailure({ statusCode: '503' })).toBe('unknown');
  });
});

describe('toFailureEnvelope', () => {
  it('maps core errors to their kinds', () => {
    expect(toFailureEnvelope(new AuthenticationExpiredError()).error_kind).toBe('AUTHENTICATION_EXPIRED');
    expect(toFailureEnvelope(new RateLimitExceededError(3)).error_kind).toBe('RATE_LIMIT_EXCEEDED');
    expect(toFailureEnvelope(new ValidationError('bad')).error_kind).toBe('VALIDATION_ERROR');
    expect(toFailureEnvelope(new ServiceHttpError(404, 'gone')).error_kind).toBe('NOT_FOUND');
    expect(toFailureEnvelope(new ServiceNetworkError('down')).error_kind).toBe('TRANSIENT_SERVICE_ERROR');
    expect(toFailureEnvelope(new TypeError('bug')).error_kind).toBe('UNKNOWN_ERROR');
  });

  it('marks only rate limits and transient failures retryable', () => {
    expect(toFailureEnvelope(new RateLimitExceededError(3)).retryable).toBe(true);
    expect(toFailureEnvelope(new ServiceHttpError(502, 'x')).retryable).toBe(true);
    expect(toFailureEnvelope(new AuthenticationExpiredError()).retryable).toBe(false);
    expect(toFailureEnvelope(new ValidationError('x')).retryable).toBe(false);
  });

  it('names the status for client errors', () => {
    const envelope = toFailureEnvelope(new ServiceHttpError(403, 'AuthorizationFailed'));
    expect(envelope).toMatchObject({
      error_kind: 'CLIENT_ERROR',
      message: 'Azure API Error (403)',
      details: 'AuthorizationFailed',
      retryable: false,
    });
    expect(envelope.remediation.length).toBeGreaterThan(0);
  });

  it('redacts secrets from details', () => {
    const envelope = toFailureEnvelope(new Error('token for ops@example.com rejected'));
    expect(envelope.details).toBe('token for [REDACTED] rejected');
  });

  it('treats raw zod errors as validation failures', () => {
    const result = z.object({ cost: z.number() }).safeParse({ cost: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(toFailureEnvelope(result.error).error_kind).toBe('VALIDATION_ERROR');
      const wrapped = fromZodError('cost records', result.error);
      expect(wrapped.message).toBe('cost records: cost: Expected number, received string');
      expect(wrapped.issues).toEqual(['cost: Expected number, received string']);
    }
  });

  it('maps kinds to exit codes', () => {
    expect(exitCodeFor('VALIDATION_ERROR')).toBe(EXIT_VALIDATION);
    expect(exitCodeFor('NOT_FOUND')).toBe(EXIT_VALIDATION);
    expect(exitCodeFor('AUTHENTICATION_EXPIRED')).toBe(EXIT_DEPENDENCY);
    expect(exitCodeFor('RATE_LIMIT_EXCEEDED')).toBe(EXIT_DEPENDENCY);
    expect(exitCodeFor('UNKNOWN_ERROR')).toBe(EXIT_BUG);
  });
});

describe('runOperation', () => {
  it('wraps a value', async () => {
    await expect(runOperation(() => 7)).resolves.toEqual({ ok: true, value: 7 });
  });

  it('folds a rejection into an envelope', async () => {
    const outcome = await runOperation(async () => {
      throw new ValidationError('No resources found in template');
    });
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.error_kind).toBe('VALIDATION_ERROR');
      expect(outcome.error.details).toBe('No resources found in template');
    }
  });
});

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'finops-signals-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('drops entries below the minimum level', () => {
    const logger = createLogger({ module: 'test', silent: true, minLevel: 'warn' });
    logger.info('a', 'skipped');
    logger.warn('b', 'kept');
    expect(logger.entries().map((e) => e.action)).toEqual(['b']);
  });

  it('binds correlation, tenant and subscription fields on children', () => {
    const logger = createLogger({ module: 'test', silent: true, correlationId: 'run-1' });
    const child = logger.child({ tenantId: 't-1' }).child({ subscriptionId: 's-1' });
    child.info('x', 'hello');
    logger.info('y', 'root');

    const [fromChild, fromRoot] = logger.entries();
    expect(fromChild).toMatchObject({ correlation_id: 'run-1', tenant_id: 't-1', subscription_id: 's-1' });
    expect(fromRoot.correlation_id).toBe('run-1');
    expect(fromRoot).not.toHaveProperty('subscription_id');
  });

  it('redacts data payloads', () => {
    const logger = createLogger({ module: 'test', silent: true });
    logger.error('auth', 'failed', { client_secret: 'test-secret', tenant: 'contoso' });
    expect(logger.entries()[0].data).toEqual({ client_secret: '[REDACTED]', tenant: 'contoso' });
  });

  it('appends JSON lines to a log file', () => {
    const filePath = join(dir, 'logs', 'run.jsonl');
    const logger = createLogger({ module: 'test', silent: true, filePath });
    logger.info('first', 'one');
    logger.warn('second', 'two');

    const lines = readFileSync(filePath, 'utf-8').trim().split('\n');
    expect(lines.map((l) => JSON.parse(l).action)).toEqual(['first', 'second']);
  });
});

// ---------------------------------------------------------------------------
// Run context and fan-out
// ---------------------------------------------------------------------------

describe('createRunContext', () => {
  it('applies defaults', () => {
    const ctx = createRunContext({ silent: true });
    expect(ctx.retryPolicy).toEqual(DEFAULT_RETRY_POLICY);
    expect(ctx.concurrency).toBe(4);
    expect(ctx.correlationId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('keeps concurrency at least 1', () => {
    expect(createRunContext({ silent: true, concurrency: 0 }).concurrency).toBe(1);
  });
});

describe('mapWithConcurrency', () => {
  it('returns results in input order whatever the completion order', async () => {
    const delays = [30, 5, 15, 0];
    const result = await mapWithConcurrency(delays, 4, async (ms, i) => {
      await new Promise((r) => setTimeout(r, ms));
      return `${i}:${ms}`;
    });
    expect(result).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 2));
      running--;
    });
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });

  it('stops starting items after a rejection and rethrows it', async () => {
    const started: number[] = [];
    const run = mapWithConcurrency([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new AuthenticationExpiredError();
      return n;
    });
    await expect(run).rejects.toBeInstanceOf(AuthenticationExpiredError);
    expect(started).toEqual([1, 2]);
  });
});

describe('parseRecords', () => {
  const Row = z.object({ id: z.string().min(1), size: z.number() });

  it('keeps valid rows in order and logs each skipped one', () => {
    const logger = createLogger({ module: 'test', silent: true });
    const rows = parseRecords(Row, [{ id: 'a', size: 1 }, { id: '', size: 2 }, { id: 'c', size: 3 }], {
      label: 'sizes',
      logger,
    });

    expect(rows).toEqual([
      { id: 'a', size: 1 },
      { id: 'c', size: 3 },
    ]);
    const [skipped] = logger.entries().filter((e) => e.action === 'records.skipped');
    expect(skipped.level).toBe('warn');
    expect(skipped.message).toBe('Skipping malformed row 1 in sizes');
    expect(skipped.data).toEqual({ index: 1, issues: ['id: String must contain at least 1 character(s)'] });
  });

  it('rejects a payload that is not an array', () => {
    const logger = createLogger({ module: 'test', silent: true });
    expect(() => parseRecords(Row, { id: 'a', size: 1 }, { label: 'sizes', logger })).toThrow(
      new ValidationError('sizes: expected an array'),
    );
  });
});
