/**
 * Unused Resource Audit
 *
 * Finds unattached managed disks and idle public IPs and prices them as
 * monthly savings.  In CSP mode the configured subscriptions are audited
 * once per delegated tenant; enumerating a tenant's own subscriptions
 * happens upstream.
 */

import type {
  CspAuditReport,
  DiskRecord,
  IdlePublicIpFinding,
  PublicIpRecord,
  TenantAuditResult,
  UnattachedDiskFinding,
} from '../contracts/index.js';
import { DiskRecordSchema, PublicIpRecordSchema } from '../contracts/index.js';
import type { RunContext } from '../runner/context.js';
import { AuthenticationExpiredError, ValidationError } from '../runner/errors.js';
import { mapWithConcurrency } from '../runner/fanout.js';
import type { StructuredLogger } from '../runner/logger.js';
import { parseRecords } from '../runner/records.js';
import { maskId } from '../runner/redact.js';
import { executeWithRetry } from '../runner/retry.js';
import {
  DEFAULT_DISK_SIZE_GB,
  getDiskMonthlyCost,
  getPublicIpMonthlyCost,
  roundCurrency,
} from '../pricing/index.js';
import { resourceGroupFromResourceId, type InventorySource } from '../sources/index.js';

export const CURRENT_TENANT = 'current';

export interface AuditOptions {
  source: InventorySource;
  context: RunContext;
}

// ---- Findings ----------------------------------------------------------

export function toDiskFinding(subscriptionId: string, disk: DiskRecord): UnattachedDiskFinding {
  const sku = disk.sku?.name ?? 'Unknown';
  return {
    subscription_id: subscriptionId,
    resource_group: resourceGroupFromResourceId(disk.id),
    disk_name: disk.name,
    size_gb: disk.disk_size_gb ?? null,
    sku,
    monthly_cost: getDiskMonthlyCost(sku, disk.disk_size_gb ?? DEFAULT_DISK_SIZE_GB) ?? 0,
    created_date: disk.time_created ? disk.time_created.slice(0, 10) : 'Unknown',
    location: disk.location ?? 'Unknown',
  };
}

export function toPublicIpFinding(subscriptionId: string, ip: PublicIpRecord): IdlePublicIpFinding {
  const sku = ip.sku?.name || 'Standard';
  return {
    subscription_id: subscriptionId,
    resource_group: resourceGroupFromResourceId(ip.id),
    ip_name: ip.name,
    ip_address: ip.ip_address || 'Not allocated',
    sku,
    monthly_cost: getPublicIpMonthlyCost(sku) ?? 0,
    location: ip.location ?? 'Unknown',
  };
}

export function isUnattached(disk: DiskRecord): boolean {
  return disk.disk_state === 'Unattached';
}

export function isIdle(ip: PublicIpRecord): boolean {
  return ip.ip_configuration === undefined || ip.ip_configuration === null;
}

// ---- Inventory fetches -------------------------------------------------

async function findUnattachedDisks(
  subscriptionId: string,
  options: AuditOptions,
  logger: StructuredLogger,
): Promise<UnattachedDiskFinding[]> {
  const { context, source } = options;
  try {
    const raw = await executeWithRetry(() => source.listDisks(subscriptionId), {
      policy: context.retryPolicy,
      sleep: context.sleep,
      logger,
      label: 'disk inventory',
    });
    const disks = parseRecords(DiskRecordSchema, raw, { label: 'disk inventory', logger });

    const findings = disks.filter(isUnattached).map((d) => toDiskFinding(subscriptionId, d));
    logger.info('audit.disks', `Found ${findings.length} unattached disks in subscription ${maskId(subscriptionId)}`);
    return findings;
  } catch (err) {
    if (err instanceof AuthenticationExpiredError) throw err;
    logger.error('audit.disks_failed', `Failed to find unattached disks in ${maskId(subscriptionId)}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }
}

async function findIdlePublicIps(
  subscriptionId: string,
  options: AuditOptions,
  logger: StructuredLogger,
): Promise<IdlePublicIpFinding[]> {
  const { context, source } = options;
  try {
    const raw = await executeWithRetry(() => source.listPublicIps(subscriptionId), {
      policy: context.retryPolicy,
      sleep: context.sleep,
      logger,
      label: 'public IP inventory',
    });
    const ips = parseRecords(PublicIpRecordSchema, raw, { label: 'public IP inventory', logger });

    const findings = ips.filter(isIdle).map((ip) => toPublicIpFinding(subscriptionId, ip));
    logger.info('audit.public_ips', `Found ${findings.length} idle public IPs in subscription ${maskId(subscriptionId)}`);
    return findings;
  } catch (err) {
    if (err instanceof AuthenticationExpiredError) throw err;
    logger.error('audit.public_ips_failed', `Failed to find idle public IPs in ${maskId(subscriptionId)}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }
}

// ---- Audits ------------------------------------------------------------

/**
 * Audit subscriptions on behalf of one tenant.  Inventory failures are
 * logged and contribute no findings, except expired credentials, which
 * reject the audit.
 */
export async function auditSubscriptions(
  subscriptionIds: readonly string[],
  options: AuditOptions & { tenantId?: string },
): Promise<TenantAuditResult> {
  if (subscriptionIds.length === 0) {
    throw new ValidationError('No subscriptions configured. Set AZURE_SUBSCRIPTION_IDS.');
  }

  const tenantId = options.tenantId ?? CURRENT_TENANT;
  const { context } = options;
  const tenantLogger = context.logger.child({ tenantId });

  const perSubscription = await mapWithConcurrency(subscriptionIds, context.concurrency, async (id) => {
    const logger = tenantLogger.child({ subscriptionId: id });
    logger.info('audit.subscription_start', `Auditing subscription ${maskId(id)}`);
    const disks = await findUnattachedDisks(id, options, logger);
    const ips = await findIdlePublicIps(id, options, logger);
    return { disks, ips };
  });

  const unattachedDisks = perSubscription.flatMap((r) => r.disks);
  const idleIps = perSubscription.flatMap((r) => r.ips);
  const savings =
    unattachedDisks.reduce((sum, d) => sum + d.monthly_cost, 0) +
    idleIps.reduce((sum, ip) => sum + ip.monthly_cost, 0);

  return {
    tenant_id: tenantId,
    subscriptions_audited: subscriptionIds.length,
    findings: {
      unattached_disks: unattachedDisks,
      idle_public_ips: idleIps,
    },
    total_monthly_savings: roundCurrency(savings),
  };
}

/**
 * Audit every delegated tenant, or the current tenant when none are given.
 */
export async function auditCspTenants(
  tenantIds: readonly string[],
  subscriptionIds: readonly string[],
  options: AuditOptions,
): Promise<CspAuditReport> {
  const { logger } = options.context;
  logger.info('audit.start', 'Starting CSP tenant audit', { tenants: tenantIds.length });

  if (tenantIds.length === 0) {
    logger.warn('audit.no_tenants', 'No CSP_TENANT_IDS configured. Auditing current subscriptions.');
  }

  const targets = tenantIds.length > 0 ? tenantIds : [CURRENT_TENANT];
  const tenantResults: TenantAuditResult[] = [];
  for (const tenantId of targets) {
    logger.info('audit.tenant_start', `Auditing tenant ${maskId(tenantId)}`);
    tenantResults.push(await auditSubscriptions(subscriptionIds, { ...options, tenantId }));
  }

  const monthly = tenantResults.reduce((sum, r) => sum + r.total_monthly_savings, 0);

  return {
    tenants_audited: tenantResults.length,
    total_subscriptions_audited: tenantResults.reduce((sum, r) => sum + r.subscriptions_audited, 0),
    total_monthly_savings: roundCurrency(monthly),
    total_annual_savings: roundCurrency(monthly * 12),
    tenant_results: tenantResults,
    audit_date: new Date().toISOString(),
  };
}
