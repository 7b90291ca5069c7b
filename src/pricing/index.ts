/**
 * Pricing Estimator
 *
 * Monthly USD estimates for the SKUs the audit and budget tools price.
 * The tables are East US pay-as-you-go list prices, frozen at load time.
 * Unknown resource types and SKUs yield `null`; callers treat a missing
 * price as a soft warning.
 */

export const RESOURCE_TYPES = {
  virtualMachine: 'Microsoft.Compute/virtualMachines',
  disk: 'Microsoft.Compute/disks',
  publicIp: 'Microsoft.Network/publicIPAddresses',
  storageAccount: 'Microsoft.Storage/storageAccounts',
} as const;

export const DEFAULT_DISK_SIZE_GB = 128;
export const DEFAULT_STORAGE_SIZE_GB = 100;
export const DEFAULT_REGION = 'eastus';

type FlatPrices = Readonly<Record<string, number>>;
/** Size tier (GB) → monthly price. */
type TieredPrices = ReadonlyMap<number, number>;

function tiers(entries: [number, number][]): TieredPrices {
  return new Map([...entries].sort((a, b) => a[0] - b[0]));
}

const VM_PRICES: FlatPrices = Object.freeze({
  Standard_B1s: 7.59,
  Standard_B2s: 30.37,
  Standard_D2s_v3: 96.36,
  Standard_D4s_v3: 192.72,
  Standard_D8s_v3: 385.44,
  Standard_E2s_v3: 109.5,
  Standard_E4s_v3: 219.0,
});

const DISK_PRICES: Readonly<Record<string, TieredPrices>> = Object.freeze({
  Standard_LRS: tiers([
    [32, 1.54],
    [64, 3.07],
    [128, 6.14],
    [256, 12.29],
    [512, 24.58],
    [1024, 49.15],
  ]),
  Premium_LRS: tiers([
    [32, 4.81],
    [64, 9.62],
    [128, 19.71],
    [256, 39.42],
    [512, 78.85],
    [1024, 157.7],
  ]),
});

const PUBLIC_IP_PRICES: FlatPrices = Object.freeze({
  Basic: 3.65,
  Standard: 3.65,
});

/** Price per GB per month. */
const STORAGE_PRICES_PER_GB: FlatPrices = Object.freeze({
  Standard_LRS: 0.0184,
  Standard_GRS: 0.0368,
  Premium_LRS: 0.15,
});

function lookup(table: FlatPrices, sku: string): number | null {
  return Object.prototype.hasOwnProperty.call(table, sku) ? table[sku] : null;
}

/**
 * Pick the smallest tier that fits `sizeGb`, or the largest tier when the
 * request exceeds all of them.
 */
export function selectTier(available: Iterable<number>, sizeGb: number): number | null {
  const sizes = [...available].sort((a, b) => a - b);
  if (sizes.length === 0) return null;
  return sizes.find((size) => size >= sizeGb) ?? sizes[sizes.length - 1];
}

// Region is accepted for call-site symmetry; the table holds one region.
export function getVmMonthlyCost(sku: string, _region: string = DEFAULT_REGION): number | null {
  return lookup(VM_PRICES, sku);
}

export function getDiskMonthlyCost(sku: string, sizeGb: number = DEFAULT_DISK_SIZE_GB): number | null {
  if (!Object.prototype.hasOwnProperty.call(DISK_PRICES, sku)) return null;
  const table = DISK_PRICES[sku];
  const tier = selectTier(table.keys(), sizeGb);
  return tier === null ? null : table.get(tier) ?? null;
}

export function getPublicIpMonthlyCost(sku: string): number | null {
  return lookup(PUBLIC_IP_PRICES, sku);
}

export function getStorageAccountMonthlyCost(sku: string, sizeGb: number = DEFAULT_STORAGE_SIZE_GB): number | null {
  const perGb = lookup(STORAGE_PRICES_PER_GB, sku);
  return perGb === null ? null : perGb * sizeGb;
}

export interface EstimateOptions {
  sizeGb?: number;
  region?: string;
}

/**
 * Estimate the monthly cost of one resource, or `null` when there is no
 * pricing for its type or SKU.
 */
export function estimateResourceCost(
  resourceType: string,
  sku: string,
  options: EstimateOptions = {},
): number | null {
  switch (resourceType) {
    case RESOURCE_TYPES.virtualMachine:
      return getVmMonthlyCost(sku, options.region);
    case RESOURCE_TYPES.disk:
      return getDiskMonthlyCost(sku, options.sizeGb ?? DEFAULT_DISK_SIZE_GB);
    case RESOURCE_TYPES.publicIp:
      return getPublicIpMonthlyCost(sku);
    case RESOURCE_TYPES.storageAccount:
      return getStorageAccountMonthlyCost(sku, options.sizeGb ?? DEFAULT_STORAGE_SIZE_GB);
    default:
      return null;
  }
}

export interface PricedResource {
  resource_type: string;
  sku: string;
  size_gb?: number;
  region?: string;
}

/**
 * Monthly and annual savings from removing the given resources.  Resources
 * without a price contribute nothing.
 */
export function calculateSavingsPotential(resources: readonly PricedResource[]): {
  monthly_savings: number;
  annual_savings: number;
} {
  let monthly = 0;
  for (const resource of resources) {
    const cost = estimateResourceCost(resource.resource_type, resource.sku, {
      sizeGb: resource.size_gb ?? DEFAULT_DISK_SIZE_GB,
      region: resource.region ?? DEFAULT_REGION,
    });
    if (cost !== null) monthly += cost;
  }

  return {
    monthly_savings: roundCurrency(monthly),
    annual_savings: roundCurrency(monthly * 12),
  };
}

export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

const currencyFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `1234.5` → `$1,234.50 USD` */
export function formatCurrency(amount: number, currency = 'USD'): string {
  return `$${currencyFormatter.format(amount)} ${currency}`;
}
