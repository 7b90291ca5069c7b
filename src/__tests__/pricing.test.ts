import { describe, expect, it } from 'vitest';
import {
  calculateSavingsPotential,
  estimateResourceCost,
  formatCurrency,
  getDiskMonthlyCost,
  getPublicIpMonthlyCost,
  getStorageAccountMonthlyCost,
  getVmMonthlyCost,
  roundCurrency,
  selectTier,
  RESOURCE_TYPES,
} from '../pricing/index.js';

describe('selectTier', () => {
  it('picks the smallest tier that fits', () => {
    expect(selectTier([64, 32, 128], 40)).toBe(64);
    expect(selectTier([32, 64], 32)).toBe(32);
  });

  it('falls back to the largest tier when nothing fits', () => {
    expect(selectTier([32, 64], 4096)).toBe(64);
  });

  it('returns null without tiers', () => {
    expect(selectTier([], 10)).toBeNull();
  });
});

describe('disk pricing', () => {
  it('rounds the size up to the next tier', () => {
    expect(getDiskMonthlyCost('Standard_LRS', 200)).toBe(12.29);
  });

  it('prices oversized disks at the largest tier', () => {
    expect(getDiskMonthlyCost('Standard_LRS', 2000)).toBe(49.15);
  });

  it('defaults to a 128 GB disk', () => {
    expect(getDiskMonthlyCost('Premium_LRS')).toBe(19.71);
  });

  it('returns null for unknown SKUs', () => {
    expect(getDiskMonthlyCost('UltraSSD_LRS', 128)).toBeNull();
    expect(getDiskMonthlyCost('constructor', 128)).toBeNull();
  });
});

describe('flat and linear pricing', () => {
  it('looks up VM sizes', () => {
    expect(getVmMonthlyCost('Standard_D2s_v3')).toBe(96.36);
    expect(getVmMonthlyCost('Standard_Z99')).toBeNull();
  });

  it('prices public IPs per SKU', () => {
    expect(getPublicIpMonthlyCost('Basic')).toBe(3.65);
    expect(getPublicIpMonthlyCost('Global')).toBeNull();
  });

  it('scales storage linearly with size', () => {
    expect(getStorageAccountMonthlyCost('Standard_LRS', 1000)).toBeCloseTo(18.4, 10);
    expect(getStorageAccountMonthlyCost('Standard_GRS', 1000)).toBeCloseTo(36.8, 10);
    expect(getStorageAccountMonthlyCost('Premium_LRS')).toBeCloseTo(15, 10);
  });
});

describe('estimateResourceCost', () => {
  it('dispatches on resource type', () => {
    expect(estimateResourceCost(RESOURCE_TYPES.virtualMachine, 'Standard_B2s')).toBe(30.37);
    expect(estimateResourceCost(RESOURCE_TYPES.disk, 'Standard_LRS', { sizeGb: 500 })).toBe(24.58);
    expect(estimateResourceCost(RESOURCE_TYPES.publicIp, 'Standard')).toBe(3.65);
    expect(estimateResourceCost(RESOURCE_TYPES.storageAccount, 'Standard_LRS')).toBeCloseTo(1.84, 10);
  });

  it('returns null for unpriced resource types', () => {
    expect(estimateResourceCost('Microsoft.Web/sites', 'P1v3')).toBeNull();
  });
});

describe('calculateSavingsPotential', () => {
  it('sums priced resources and skips the rest', () => {
    expect(
      calculateSavingsPotential([
        { resource_type: RESOURCE_TYPES.disk, sku: 'Premium_LRS', size_gb: 128 },
        { resource_type: RESOURCE_TYPES.publicIp, sku: 'Standard' },
        { resource_type: 'Microsoft.Web/sites', sku: 'P1v3' },
      ]),
    ).toEqual({ monthly_savings: 23.36, annual_savings: 280.32 });
  });

  it('is zero for an empty list', () => {
    expect(calculateSavingsPotential([])).toEqual({ monthly_savings: 0, annual_savings: 0 });
  });
});

describe('formatting', () => {
  it('rounds to cents', () => {
    expect(roundCurrency(12.345678)).toBe(12.35);
    expect(roundCurrency(0.004)).toBe(0);
  });

  it('formats with grouping and two decimals', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50 USD');
    expect(formatCurrency(0)).toBe('$0.00 USD');
  });
});
