/**
 * Collaborator interfaces
 *
 * The core never talks to the network itself: cost, advisor and inventory
 * records arrive through these interfaces, already deserialized.  Failures
 * are signalled with the Service*Error classes in runner/errors.
 *
 * The static sources serve records from memory (CLI export files, tests).
 */

import type { CostWindow } from '../contracts/index.js';

export interface CostQuerySource {
  /** Daily cost rows for one subscription within an inclusive date window. */
  queryCosts(subscriptionId: string, window: CostWindow): Promise<unknown[]>;
}

export interface AdvisorSource {
  listRecommendations(subscriptionId: string): Promise<unknown[]>;
}

export interface InventorySource {
  listDisks(subscriptionId: string): Promise<unknown[]>;
  listPublicIps(subscriptionId: string): Promise<unknown[]>;
}

// ---- Record helpers ----------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: unknown, key: string): string | undefined {
  if (!isRecord(record)) return undefined;
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/** `2024-05-01T00:00:00Z` → `2024-05-01` */
export function toIsoDate(value: string): string {
  return value.slice(0, 10);
}

export function inWindow(date: string, window: CostWindow): boolean {
  const day = toIsoDate(date);
  return day >= toIsoDate(window.from) && day <= toIsoDate(window.to);
}

/**
 * Records without a `subscription_id` are treated as belonging to every
 * subscription, which is how a single-subscription export reads.
 */
function belongsTo(record: unknown, subscriptionId: string): boolean {
  const owner = stringField(record, 'subscription_id');
  return owner === undefined || owner === subscriptionId;
}

/** Stamp the subscription onto records that lack one. */
function withSubscription(record: unknown, subscriptionId: string): unknown {
  if (!isRecord(record) || typeof record.subscription_id === 'string') return record;
  return { ...record, subscription_id: subscriptionId };
}

// ---- Static sources ----------------------------------------------------

export function createStaticCostSource(records: readonly unknown[]): CostQuerySource {
  return {
    async queryCosts(subscriptionId, window) {
      return records
        .filter((r) => belongsTo(r, subscriptionId))
        .filter((r) => {
          const date = stringField(r, 'date');
          return date !== undefined && inWindow(date, window);
        })
        .map((r) => withSubscription(r, subscriptionId));
    },
  };
}

export function createStaticAdvisorSource(records: readonly unknown[]): AdvisorSource {
  return {
    async listRecommendations(subscriptionId) {
      return records
        .filter((r) => belongsTo(r, subscriptionId))
        .map((r) => withSubscription(r, subscriptionId));
    },
  };
}

export interface InventorySnapshot {
  disks?: readonly unknown[];
  public_ips?: readonly unknown[];
}

/**
 * Inventory records are scoped by the subscription segment of their
 * resource ID (`/subscriptions/<id>/...`) when they carry no
 * `subscription_id` of their own.
 */
export function createStaticInventorySource(snapshot: InventorySnapshot): InventorySource {
  const scoped = (records: readonly unknown[], subscriptionId: string): unknown[] =>
    records.filter((r) => {
      const owner = stringField(r, 'subscription_id') ?? subscriptionFromResourceId(stringField(r, 'id') ?? '');
      return owner === undefined || owner === subscriptionId;
    });

  return {
    async listDisks(subscriptionId) {
      return scoped(snapshot.disks ?? [], subscriptionId);
    },
    async listPublicIps(subscriptionId) {
      return scoped(snapshot.public_ips ?? [], subscriptionId);
    },
  };
}

/** Subscription segment of an ARM resource ID, if present. */
export function subscriptionFromResourceId(resourceId: string): string | undefined {
  const parts = resourceId.split('/');
  const idx = parts.findIndex((p) => p.toLowerCase() === 'subscriptions');
  return idx >= 0 && parts[idx + 1] ? parts[idx + 1] : undefined;
}

/**
 * Resource group segment of an ARM resource ID
 * (`/subscriptions/<sub>/resourceGroups/<rg>/...` → `<rg>`).
 */
export function resourceGroupFromResourceId(resourceId: string): string {
  return resourceId.split('/')[4] ?? 'Unknown';
}
