/**
 * Cost Anomaly Detection
 *
 * Flags daily spend spikes: each of today's cost rows is compared with the
 * mean of the preceding seven days for the same resource group and service.
 * A row is an anomaly when `cost > average * threshold` and the average is
 * positive; keys with no history are never flagged.
 */

import type { AnomalyRecord, AnomalyReport, CostRecord, CostWindow } from '../contracts/index.js';
import { CostRecordSchema } from '../contracts/index.js';
import type { RunContext } from '../runner/context.js';
import { AuthenticationExpiredError, ValidationError } from '../runner/errors.js';
import { mapWithConcurrency } from '../runner/fanout.js';
import type { StructuredLogger } from '../runner/logger.js';
import { parseRecords } from '../runner/records.js';
import { maskId } from '../runner/redact.js';
import { executeWithRetry } from '../runner/retry.js';
import { roundCurrency } from '../pricing/index.js';
import type { CostQuerySource } from '../sources/index.js';

export const DEFAULT_ANOMALY_THRESHOLD = 1.5;
export const BASELINE_DAYS = 7;

export interface AnomalyOptions {
  source: CostQuerySource;
  context: RunContext;
  /** Multiplier over the baseline average (1.5 = 50% above). */
  threshold?: number;
  /** ISO date treated as "today"; defaults to the current UTC date. */
  referenceDate?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function shiftDate(isoDate: string, days: number): string {
  const base = Date.parse(`${isoDate.slice(0, 10)}T00:00:00Z`);
  return new Date(base + days * DAY_MS).toISOString().slice(0, 10);
}

/** The one-day window ending at `referenceDate`. */
export function todayWindow(referenceDate: string): CostWindow {
  const day = referenceDate.slice(0, 10);
  return { from: day, to: day };
}

/** The seven days before `referenceDate`, excluding it. */
export function baselineWindow(referenceDate: string): CostWindow {
  return {
    from: shiftDate(referenceDate, -BASELINE_DAYS),
    to: shiftDate(referenceDate, -1),
  };
}

function groupKey(record: Pick<CostRecord, 'resource_group' | 'service_name'>): string {
  return JSON.stringify([record.resource_group, record.service_name]);
}

/**
 * Arithmetic mean of cost per (resource_group, service_name).
 */
export function calculateAverages(records: readonly CostRecord[]): Map<string, number> {
  const sums = new Map<string, { total: number; count: number }>();
  for (const record of records) {
    const key = groupKey(record);
    const entry = sums.get(key) ?? { total: 0, count: 0 };
    entry.total += record.cost;
    entry.count += 1;
    sums.set(key, entry);
  }

  const averages = new Map<string, number>();
  for (const [key, { total, count }] of sums) {
    averages.set(key, total / count);
  }
  return averages;
}

/**
 * Compare today's rows with baseline averages.  Pure; values keep full
 * precision.
 */
export function findAnomalies(
  today: readonly CostRecord[],
  averages: ReadonlyMap<string, number>,
  threshold: number,
): AnomalyRecord[] {
  const anomalies: AnomalyRecord[] = [];

  for (const record of today) {
    const average = averages.get(groupKey(record)) ?? 0;
    if (average > 0 && record.cost > average * threshold) {
      anomalies.push({
        subscription_id: record.subscription_id,
        resource_group: record.resource_group,
        service_name: record.service_name,
        actual_cost: record.cost,
        average_cost: average,
        variance_percent: ((record.cost - average) / average) * 100,
        date: record.date,
      });
    }
  }

  return anomalies;
}

async function fetchCosts(
  subscriptionId: string,
  window: CostWindow,
  options: AnomalyOptions,
  logger: StructuredLogger,
): Promise<CostRecord[]> {
  const { context, source } = options;
  const rows = await executeWithRetry(() => source.queryCosts(subscriptionId, window), {
    policy: context.retryPolicy,
    sleep: context.sleep,
    logger,
    label: `cost query ${window.from}..${window.to}`,
  });

  return parseRecords(CostRecordSchema, rows, { label: 'cost records', logger });
}

async function detectSubscription(
  subscriptionId: string,
  referenceDate: string,
  threshold: number,
  options: AnomalyOptions,
): Promise<AnomalyRecord[] | null> {
  const logger = options.context.logger.child({ subscriptionId });
  logger.info('anomalies.subscription_start', `Analyzing subscription ${maskId(subscriptionId)}`);

  try {
    const today = await fetchCosts(subscriptionId, todayWindow(referenceDate), options, logger);
    const baseline = await fetchCosts(subscriptionId, baselineWindow(referenceDate), options, logger);
    const anomalies = findAnomalies(today, calculateAverages(baseline), threshold);
    logger.debug('anomalies.subscription_done', `Found ${anomalies.length} anomalies`, {
      today_rows: today.length,
      baseline_rows: baseline.length,
    });
    return anomalies;
  } catch (err) {
    if (err instanceof AuthenticationExpiredError) throw err;
    logger.error('anomalies.subscription_failed', `Failed to detect anomalies for subscription ${maskId(subscriptionId)}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Detect daily spend spikes across subscriptions.  A subscription whose
 * fetch fails is logged and contributes no anomalies; malformed rows are
 * skipped one by one.  Expired credentials reject the whole call.
 */
export async function detectCostAnomalies(
  subscriptionIds: readonly string[],
  options: AnomalyOptions,
): Promise<AnomalyReport> {
  if (subscriptionIds.length === 0) {
    throw new ValidationError(
      'No subscription IDs provided. Set AZURE_SUBSCRIPTION_IDS environment variable.',
    );
  }

  const threshold = options.threshold ?? DEFAULT_ANOMALY_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new ValidationError(`Invalid anomaly threshold: ${threshold}`);
  }

  const { context } = options;
  const referenceDate = options.referenceDate ?? new Date().toISOString().slice(0, 10);
  context.logger.info('anomalies.start', `Starting anomaly detection with threshold ${threshold}x`, {
    subscriptions: subscriptionIds.length,
    reference_date: referenceDate,
  });

  const perSubscription = await mapWithConcurrency(subscriptionIds, context.concurrency, (id) =>
    detectSubscription(id, referenceDate, threshold, options),
  );

  const anomalies: AnomalyRecord[] = [];
  const failed: string[] = [];
  perSubscription.forEach((result, i) => {
    if (result === null) failed.push(subscriptionIds[i]);
    else anomalies.push(...result);
  });

  // Array.prototype.sort is stable: ties keep fetch order.
  anomalies.sort((a, b) => b.variance_percent - a.variance_percent);

  const excess = anomalies.reduce((sum, a) => sum + (a.actual_cost - a.average_cost), 0);

  const report: AnomalyReport = {
    anomalies,
    total_anomalies: anomalies.length,
    total_excess_spend: roundCurrency(excess),
    analysis_date: new Date().toISOString(),
    threshold,
    subscriptions_analyzed: subscriptionIds.length - failed.length,
    subscriptions_failed: failed,
  };

  context.logger.info(
    'anomalies.complete',
    `Detected ${report.total_anomalies} anomalies with $${report.total_excess_spend.toFixed(2)} excess spend`,
  );
  return report;
}
