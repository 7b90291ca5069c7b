/**
 * Health and capability metadata
 *
 * Backs the `health` command: what this build can do, and how it treats
 * failed collaborator calls.
 */

import { ISO_27001_BUCKETS, NIA_QATAR_BUCKETS } from '../compliance/index.js';
import { getDiskMonthlyCost, getPublicIpMonthlyCost, getVmMonthlyCost } from '../pricing/index.js';
import type { ErrorKind } from '../runner/errors.js';
import { REMEDIATION } from '../runner/errors.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../runner/retry.js';

export const MODULE_ID = 'finops-signals';
export const MODULE_VERSION = '0.1.0';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  module_id: string;
  module_version: string;
  timestamp: string;
  checks: {
    pricing_tables: boolean;
    compliance_catalogs: boolean;
    remediation_catalog: boolean;
  };
  capabilities: string[];
}

export interface OperationCapability {
  operation: string;
  description: string;
  input: string;
  output: string;
  uses_retry: boolean;
  partial_failure_isolation: boolean;
}

export interface RetrySemantics {
  max_retries: number;
  backoff_strategy: 'exponential';
  initial_delay_ms: number;
  backoff_factor: number;
  max_delay_ms: number;
  honours_retry_after: boolean;
  retryable_errors: ErrorKind[];
  non_retryable_errors: ErrorKind[];
}

export interface CapabilityMetadata {
  module_id: string;
  module_version: string;
  operations: OperationCapability[];
  input_formats: string[];
  output_formats: string[];
  retry_semantics: RetrySemantics;
}

const OPERATIONS: readonly OperationCapability[] = [
  {
    operation: 'anomalies',
    description: 'Detect daily cost spikes against a 7-day baseline',
    input: 'CostRecord[]',
    output: 'AnomalyReport',
    uses_retry: true,
    partial_failure_isolation: true,
  },
  {
    operation: 'governance',
    description: 'Risk-score advisor recommendations (ISO 27001 / NIA Qatar)',
    input: 'Recommendation[]',
    output: 'GovernanceReport',
    uses_retry: true,
    partial_failure_isolation: true,
  },
  {
    operation: 'compliance',
    description: 'Flag recommendations that touch compliance controls',
    input: 'recommendation records',
    output: 'ComplianceReport',
    uses_retry: false,
    partial_failure_isolation: false,
  },
  {
    operation: 'budget',
    description: 'Price an ARM/Bicep template against a monthly budget',
    input: 'DeploymentTemplate',
    output: 'BudgetValidationReport',
    uses_retry: false,
    partial_failure_isolation: false,
  },
  {
    operation: 'audit',
    description: 'Find unattached disks and idle public IPs',
    input: 'InventorySnapshot',
    output: 'CspAuditReport',
    uses_retry: true,
    partial_failure_isolation: true,
  },
];

export function getHealthStatus(): HealthStatus {
  const checks = {
    pricing_tables:
      getVmMonthlyCost('Standard_B1s') !== null &&
      getDiskMonthlyCost('Standard_LRS') !== null &&
      getPublicIpMonthlyCost('Standard') !== null,
    compliance_catalogs:
      Object.keys(ISO_27001_BUCKETS).length > 0 && Object.keys(NIA_QATAR_BUCKETS).length > 0,
    remediation_catalog: Object.values(REMEDIATION).every((steps) => steps.length > 0),
  };
  const passing = Object.values(checks).filter(Boolean).length;

  return {
    status: passing === 3 ? 'healthy' : passing === 0 ? 'unhealthy' : 'degraded',
    module_id: MODULE_ID,
    module_version: MODULE_VERSION,
    timestamp: new Date().toISOString(),
    checks,
    capabilities: OPERATIONS.map((o) => o.operation),
  };
}

export function getCapabilityMetadata(policy: RetryPolicy = DEFAULT_RETRY_POLICY): CapabilityMetadata {
  return {
    module_id: MODULE_ID,
    module_version: MODULE_VERSION,
    operations: OPERATIONS.map((o) => ({ ...o })),
    input_formats: ['json'],
    output_formats: ['json', 'text'],
    retry_semantics: getRetrySemantics(policy),
  };
}

export function getRetrySemantics(policy: RetryPolicy = DEFAULT_RETRY_POLICY): RetrySemantics {
  return {
    max_retries: policy.maxRetries,
    backoff_strategy: 'exponential',
    initial_delay_ms: policy.initialDelayMs,
    backoff_factor: policy.backoffFactor,
    max_delay_ms: policy.maxDelayMs,
    honours_retry_after: true,
    retryable_errors: ['RATE_LIMIT_EXCEEDED', 'TRANSIENT_SERVICE_ERROR'],
    non_retryable_errors: ['AUTHENTICATION_EXPIRED', 'CLIENT_ERROR', 'NOT_FOUND', 'VALIDATION_ERROR', 'UNKNOWN_ERROR'],
  };
}

export function isSupportedOperation(operation: string): boolean {
  return OPERATIONS.some((o) => o.operation === operation);
}
