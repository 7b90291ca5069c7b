/**
 * Settings
 *
 * Resolved from the environment, then overridden key-by-key by an optional
 * JSON config file.  Everything is validated with zod; a bad value is a
 * ValidationError naming the offending key.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_ANOMALY_THRESHOLD } from '../anomalies/index.js';
import { DECIMAL_PATTERN } from '../contracts/index.js';
import { DEFAULT_MIN_RISK_SCORE } from '../governance/index.js';
import { DEFAULT_REGION } from '../pricing/index.js';
import { DEFAULT_CONCURRENCY } from '../runner/context.js';
import { ValidationError, fromZodError } from '../runner/errors.js';
import { LOG_LEVELS, type LogLevel } from '../runner/logger.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../runner/retry.js';
import { safeJsonParse, validateAzureId, validateSafePath } from '../security/index.js';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']) satisfies z.ZodType<LogLevel>;

const IdListSchema = z.array(z.string().min(1));

export const SettingsSchema = z.object({
  subscription_ids: IdListSchema.default([]),
  csp_tenant_ids: IdListSchema.default([]),
  log_level: LogLevelSchema.default('info'),
  anomaly_threshold: z.number().nonnegative().default(DEFAULT_ANOMALY_THRESHOLD),
  min_risk_score: z.number().int().min(0).max(10).default(DEFAULT_MIN_RISK_SCORE),
  region: z.string().min(1).default(DEFAULT_REGION),
  retry: z
    .object({
      max_retries: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),
      initial_delay_ms: z.number().min(0).default(DEFAULT_RETRY_POLICY.initialDelayMs),
      backoff_factor: z.number().min(1).default(DEFAULT_RETRY_POLICY.backoffFactor),
      max_delay_ms: z.number().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
    })
    .default({}),
  concurrency: z.number().int().min(1).default(DEFAULT_CONCURRENCY),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

/** Partial settings as read from a config file. */
const SettingsFileSchema = z
  .object({
    subscription_ids: IdListSchema,
    csp_tenant_ids: IdListSchema,
    log_level: LogLevelSchema,
    anomaly_threshold: z.number(),
    min_risk_score: z.number(),
    region: z.string(),
    retry: z
      .object({
        max_retries: z.number(),
        initial_delay_ms: z.number(),
        backoff_factor: z.number(),
        max_delay_ms: z.number(),
      })
      .partial(),
    concurrency: z.number(),
  })
  .partial()
  .strict();

type SettingsFile = z.infer<typeof SettingsFileSchema>;

type Env = Readonly<Record<string, string | undefined>>;

/** `"a, b,,c"` → `['a', 'b', 'c']` */
export function parseIdList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw.trim());
  if (!DECIMAL_PATTERN.test(raw.trim()) || !Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number, got "${raw}"`, [`${key}: not a number`]);
  }
  return value;
}

function envLogLevel(env: Env): LogLevel | undefined {
  const raw = env.FINOPS_LOG_LEVEL?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new ValidationError(`FINOPS_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, [
      'FINOPS_LOG_LEVEL: unknown level',
    ]);
  }
  return level;
}

/**
 * Settings input drawn from environment variables.  Unset variables stay
 * `undefined`, which lets the schema defaults apply.
 */
export function settingsFromEnv(env: Env = process.env): SettingsInput {
  return {
    subscription_ids: parseIdList(env.AZURE_SUBSCRIPTION_IDS),
    csp_tenant_ids: parseIdList(env.CSP_TENANT_IDS),
    log_level: envLogLevel(env),
    anomaly_threshold: envNumber(env, 'FINOPS_ANOMALY_THRESHOLD'),
    min_risk_score: envNumber(env, 'FINOPS_MIN_RISK_SCORE'),
    region: env.FINOPS_REGION?.trim() || undefined,
    retry: {
      max_retries: envNumber(env, 'FINOPS_MAX_RETRIES'),
      initial_delay_ms: envNumber(env, 'FINOPS_INITIAL_DELAY_MS'),
      backoff_factor: envNumber(env, 'FINOPS_BACKOFF_FACTOR'),
      max_delay_ms: envNumber(env, 'FINOPS_MAX_DELAY_MS'),
    },
    concurrency: envNumber(env, 'FINOPS_CONCURRENCY'),
  };
}

function readSettingsFile(configPath: string): SettingsFile {
  const check = validateSafePath(configPath);
  if (!check.valid) throw new ValidationError(`Config path rejected: ${check.error}`);

  const resolved = resolve(check.sanitized);
  if (!existsSync(resolved)) {
    throw new ValidationError(`Config file not found: ${resolved}`);
  }

  const parsed = safeJsonParse(readFileSync(resolved, 'utf-8'), SettingsFileSchema);
  if (!parsed.success) throw new ValidationError(`Invalid config file ${resolved}: ${parsed.error}`);
  return parsed.data;
}

export interface LoadSettingsOptions {
  env?: Env;
  configPath?: string;
  /** Reject subscription and tenant IDs that are not GUIDs. */
  strictIds?: boolean;
}

/**
 * Load settings: schema defaults, then environment, then config file.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const fromEnv = settingsFromEnv(options.env ?? process.env);
  const fromFile: SettingsFile = options.configPath ? readSettingsFile(options.configPath) : {};

  // Keys absent from the file are absent from its parsed form too.
  const merged: SettingsInput = {
    ...fromEnv,
    ...fromFile,
    retry: { ...fromEnv.retry, ...fromFile.retry },
  };

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) throw fromZodError('settings', parsed.error);

  const settings = parsed.data;
  if (settings.retry.max_delay_ms < settings.retry.initial_delay_ms) {
    throw new ValidationError('settings: retry.max_delay_ms must not be below retry.initial_delay_ms', [
      'retry.max_delay_ms: below initial_delay_ms',
    ]);
  }

  if (options.strictIds) {
    const bad = [
      ...settings.subscription_ids.map((id) => ({ id, check: validateAzureId(id, 'subscription ID') })),
      ...settings.csp_tenant_ids.map((id) => ({ id, check: validateAzureId(id, 'tenant ID') })),
    ].filter((r) => !r.check.valid);
    if (bad.length > 0) {
      throw new ValidationError(
        `settings: ${bad.length} malformed ID(s)`,
        bad.map((r) => r.check.error ?? 'invalid ID'),
      );
    }
  }

  return settings;
}

export function retryPolicyFrom(settings: Settings): RetryPolicy {
  return {
    maxRetries: settings.retry.max_retries,
    initialDelayMs: settings.retry.initial_delay_ms,
    backoffFactor: settings.retry.backoff_factor,
    maxDelayMs: settings.retry.max_delay_ms,
  };
}
