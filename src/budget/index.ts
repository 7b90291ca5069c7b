/**
 * Deployment Budget Validation
 *
 * Prices the resources of an ARM template (or Bicep JSON output) before it
 * is deployed and checks the monthly total against an optional budget.
 */

import type {
  BudgetValidationReport,
  CostBreakdownItem,
  TemplateResource,
} from '../contracts/index.js';
import { DeploymentTemplateSchema } from '../contracts/index.js';
import { ValidationError, fromZodError } from '../runner/errors.js';
import type { StructuredLogger } from '../runner/logger.js';
import {
  DEFAULT_DISK_SIZE_GB,
  DEFAULT_REGION,
  DEFAULT_STORAGE_SIZE_GB,
  RESOURCE_TYPES,
  estimateResourceCost,
  roundCurrency,
} from '../pricing/index.js';

/** Premium SKUs above this monthly cost draw a warning. */
export const PREMIUM_WARNING_THRESHOLD = 50;

export interface BudgetOptions {
  budgetLimit?: number;
  region?: string;
  logger?: StructuredLogger;
}

export interface SkuInfo {
  sku: string;
  sizeGb?: number;
}

function diskSize(value: number | string | undefined): number {
  if (value === undefined) return DEFAULT_DISK_SIZE_GB;
  const size = Number(value);
  // Template expressions such as "[parameters('size')]" are not resolvable here.
  return Number.isFinite(size) && size > 0 ? size : DEFAULT_DISK_SIZE_GB;
}

/**
 * SKU (and size, where pricing is size-dependent) of a template resource,
 * or `null` for types the pricing table does not cover.
 */
export function extractSkuInfo(resource: TemplateResource): SkuInfo | null {
  const skuName = resource.sku?.name;

  switch (resource.type) {
    case RESOURCE_TYPES.virtualMachine: {
      const vmSize = resource.properties?.hardwareProfile?.vmSize;
      return vmSize ? { sku: vmSize } : null;
    }
    case RESOURCE_TYPES.disk:
      return skuName ? { sku: skuName, sizeGb: diskSize(resource.properties?.diskSizeGB) } : null;
    case RESOURCE_TYPES.publicIp:
      return { sku: skuName ?? 'Standard' };
    case RESOURCE_TYPES.storageAccount:
      return skuName ? { sku: skuName, sizeGb: DEFAULT_STORAGE_SIZE_GB } : null;
    default:
      return null;
  }
}

/**
 * Estimate the monthly and annual cost of a template.
 *
 * @throws ValidationError when the template is malformed or has no resources
 */
export function validateDeploymentBudget(
  template: unknown,
  options: BudgetOptions = {},
): BudgetValidationReport {
  const region = options.region ?? DEFAULT_REGION;
  const budgetLimit = options.budgetLimit ?? null;
  const log = options.logger;

  if (budgetLimit !== null && (!Number.isFinite(budgetLimit) || budgetLimit < 0)) {
    throw new ValidationError(`Invalid budget limit: ${budgetLimit}`);
  }

  const parsed = DeploymentTemplateSchema.safeParse(template);
  if (!parsed.success) throw fromZodError('deployment template', parsed.error);

  const { resources } = parsed.data;
  if (resources.length === 0) {
    throw new ValidationError('No resources found in template');
  }

  log?.info('budget.start', `Validating deployment budget for region ${region}`, {
    resources: resources.length,
  });

  const breakdown: CostBreakdownItem[] = [];
  const warnings: string[] = [];
  let monthly = 0;

  for (const resource of resources) {
    const info = extractSkuInfo(resource);
    if (!info) {
      log?.debug('budget.no_sku', `Could not extract SKU info for ${resource.type || '(untyped resource)'}`);
      continue;
    }

    const cost = estimateResourceCost(resource.type, info.sku, { sizeGb: info.sizeGb, region });
    if (cost === null) {
      log?.warn('budget.no_pricing', `No pricing data for ${resource.type} with SKU ${info.sku}`);
      continue;
    }

    breakdown.push({
      resource_type: resource.type,
      resource_name: resource.name,
      sku: info.sku,
      monthly_cost: roundCurrency(cost),
    });
    monthly += cost;

    if (info.sku.includes('Premium') && cost > PREMIUM_WARNING_THRESHOLD) {
      warnings.push(
        `${resource.name}: Premium SKU detected - consider Standard for non-production ($${cost.toFixed(2)}/mo)`,
      );
    }
  }

  let withinBudget = true;
  if (budgetLimit !== null && monthly > budgetLimit) {
    withinBudget = false;
    warnings.unshift(
      `BUDGET EXCEEDED: Estimated cost $${monthly.toFixed(2)} exceeds budget $${budgetLimit.toFixed(2)}`,
    );
  }

  log?.info(
    'budget.complete',
    `Budget validation complete: $${monthly.toFixed(2)}/mo, within budget: ${withinBudget}`,
  );

  return {
    estimated_monthly_cost: roundCurrency(monthly),
    estimated_annual_cost: roundCurrency(monthly * 12),
    budget_limit: budgetLimit,
    within_budget: withinBudget,
    cost_breakdown: breakdown,
    warnings,
    region,
    resources_analyzed: resources.length,
    resources_priced: breakdown.length,
  };
}
