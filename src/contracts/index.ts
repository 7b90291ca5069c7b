/**
 * Record contracts and Zod schemas for finops-signals
 *
 * Inbound records (cost rows, advisor recommendations, inventory items,
 * deployment templates) are parsed here before any analytics touch them.
 * Optional fields stay optional in the inferred types; defaults are applied
 * only where the source system has a documented fallback.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Types
// ============================================================================

export const SubscriptionIdSchema = z.string().min(1);
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}/, 'expected an ISO date');

export const ImpactSchema = z.enum(['High', 'Medium', 'Low']);
export type Impact = z.infer<typeof ImpactSchema>;

/** Plain decimal notation only: no hex, binary, octal or `Infinity`. */
export const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** A number, or a string in decimal notation read as one. */
export const DecimalSchema = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(DECIMAL_PATTERN, 'expected a decimal number')
    .transform(Number)
    .pipe(z.number().finite()),
]);

/** Collaborators send `null` for fields they have no value for. */
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const KNOWN_CATEGORIES = [
  'Security',
  'Cost',
  'Performance',
  'HighAvailability',
  'OperationalExcellence',
] as const;
export type RecommendationCategory = (typeof KNOWN_CATEGORIES)[number];

// ============================================================================
// Cost records
// ============================================================================

export const CostRecordSchema = z.object({
  subscription_id: SubscriptionIdSchema,
  resource_group: z.string().nullish().transform((v) => v || 'Unassigned'),
  service_name: z.string().nullish().transform((v) => v || 'Unknown'),
  cost: DecimalSchema.nullish().transform((v) => v ?? 0),
  date: IsoDateSchema,
});

export type CostRecord = z.infer<typeof CostRecordSchema>;

export interface CostWindow {
  /** Inclusive ISO date. */
  from: string;
  /** Inclusive ISO date. */
  to: string;
}

export const AnomalyRecordSchema = z.object({
  subscription_id: SubscriptionIdSchema,
  resource_group: z.string(),
  service_name: z.string(),
  actual_cost: z.number(),
  average_cost: z.number().positive(),
  variance_percent: z.number(),
  date: z.string(),
});

export type AnomalyRecord = z.infer<typeof AnomalyRecordSchema>;

export interface AnomalyReport {
  anomalies: AnomalyRecord[];
  total_anomalies: number;
  total_excess_spend: number;
  analysis_date: string;
  threshold: number;
  subscriptions_analyzed: number;
  subscriptions_failed: string[];
}

// ============================================================================
// Advisor recommendations
// ============================================================================

export const RecommendationSchema = z.object({
  id: z.string().min(1),
  subscription_id: SubscriptionIdSchema,
  category: z.string().min(1),
  // Null and unrecognised impacts are scored as if absent.
  impact: ImpactSchema.optional().catch(undefined),
  problem_text: optionalText,
  solution_text: optionalText,
  extended_properties: z
    .record(z.unknown())
    .nullish()
    .transform((v) => v ?? undefined),
  impacted_resource: optionalText,
  resource_type: optionalText,
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

export const CostImpactLevelSchema = z.enum(['High', 'Medium', 'Low', 'Unknown']);
export const SecurityImpactLevelSchema = z.enum(['Critical', 'High', 'Medium', 'Unknown']);

export const RiskFactorsSchema = z.object({
  iso_controls: z.array(z.string()),
  framework_requirements: z.array(z.string()),
  cost_impact_level: CostImpactLevelSchema,
  security_impact_level: SecurityImpactLevelSchema,
});

export type RiskFactors = z.infer<typeof RiskFactorsSchema>;
export type CostImpactLevel = z.infer<typeof CostImpactLevelSchema>;
export type SecurityImpactLevel = z.infer<typeof SecurityImpactLevelSchema>;

export const ScoredRecommendationSchema = z.object({
  id: z.string(),
  subscription_id: SubscriptionIdSchema,
  category: z.string(),
  impact: ImpactSchema,
  title: z.string(),
  description: z.string(),
  resource_type: z.string().optional(),
  risk_score: z.number().int().min(0).max(10),
  risk_factors: RiskFactorsSchema,
  remediation_steps: z.array(z.string()),
  estimated_cost: z.number(),
  estimated_effort_hours: z.number().min(0),
  impacted_resource: z.string(),
});

export type ScoredRecommendation = z.infer<typeof ScoredRecommendationSchema>;

export interface GovernanceSummary {
  total_recommendations: number;
  high_risk_count: number;
  medium_risk_count: number;
  low_risk_count: number;
  potential_monthly_savings: number;
  potential_annual_savings: number;
}

export interface GovernanceReport {
  recommendations: ScoredRecommendation[];
  summary: GovernanceSummary;
  min_risk_score: number;
  subscriptions_failed: string[];
}

// ============================================================================
// Compliance overlay
// ============================================================================

export const ComplianceSeveritySchema = z.enum(['critical', 'high', 'medium', 'low']);
export type ComplianceSeverity = z.infer<typeof ComplianceSeveritySchema>;

/**
 * Anything with an optional title/description/resource_type; extra fields
 * pass through untouched onto the flagged or safe output.
 */
export const ComplianceCandidateSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    resource_type: z.string().optional(),
  })
  .passthrough();

export type ComplianceCandidate = z.infer<typeof ComplianceCandidateSchema>;

export type ComplianceFlag =
  | {
      framework: 'ISO 27001';
      controls: string[];
      impact: string;
      warning: string;
      severity: ComplianceSeverity;
    }
  | {
      framework: 'NIA Qatar';
      requirement: string;
      warning: string;
      severity: ComplianceSeverity;
    };

export type Framework = ComplianceFlag['framework'];

export interface ComplianceWarning {
  recommendation_id: string;
  recommendation_title: string;
  severity: ComplianceSeverity;
  frameworks_impacted: Framework[];
  flags: ComplianceFlag[];
  action_required: string;
}

export type FlaggedRecommendation = ComplianceCandidate & {
  compliance_flags: ComplianceFlag[];
  requires_compliance_review: true;
};

export type SafeRecommendation = ComplianceCandidate & {
  requires_compliance_review: false;
};

export interface ComplianceReport {
  flagged_recommendations: FlaggedRecommendation[];
  safe_recommendations: SafeRecommendation[];
  compliance_warnings: ComplianceWarning[];
  summary: {
    total_recommendations: number;
    flagged_count: number;
    safe_count: number;
  };
}

// ============================================================================
// Deployment templates (ARM / Bicep JSON output)
// ============================================================================

export const TemplateResourceSchema = z
  .object({
    type: z.string().default(''),
    name: z.string().default('Unknown'),
    sku: z.object({ name: z.string().optional() }).passthrough().optional(),
    properties: z
      .object({
        hardwareProfile: z.object({ vmSize: z.string().optional() }).passthrough().optional(),
        diskSizeGB: z.union([z.number(), z.string()]).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const DeploymentTemplateSchema = z
  .object({
    resources: z.array(TemplateResourceSchema).default([]),
  })
  .passthrough();

export type TemplateResource = z.infer<typeof TemplateResourceSchema>;
export type DeploymentTemplate = z.infer<typeof DeploymentTemplateSchema>;

export interface CostBreakdownItem {
  resource_type: string;
  resource_name: string;
  sku: string;
  monthly_cost: number;
}

export interface BudgetValidationReport {
  estimated_monthly_cost: number;
  estimated_annual_cost: number;
  budget_limit: number | null;
  within_budget: boolean;
  cost_breakdown: CostBreakdownItem[];
  warnings: string[];
  region: string;
  resources_analyzed: number;
  resources_priced: number;
}

// ============================================================================
// Inventory (disks / public IPs)
// ============================================================================

export const DiskRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  disk_state: z.string().optional(),
  disk_size_gb: z.number().positive().nullish(),
  sku: z.object({ name: z.string() }).nullish(),
  location: z.string().optional(),
  time_created: z.string().nullish(),
});

export const PublicIpRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  ip_address: z.string().nullish(),
  ip_configuration: z.unknown().optional(),
  sku: z.object({ name: z.string().nullish() }).nullish(),
  location: z.string().optional(),
});

export type DiskRecord = z.infer<typeof DiskRecordSchema>;
export type PublicIpRecord = z.infer<typeof PublicIpRecordSchema>;

export interface UnattachedDiskFinding {
  subscription_id: string;
  resource_group: string;
  disk_name: string;
  size_gb: number | null;
  sku: string;
  monthly_cost: number;
  created_date: string;
  location: string;
}

export interface IdlePublicIpFinding {
  subscription_id: string;
  resource_group: string;
  ip_name: string;
  ip_address: string;
  sku: string;
  monthly_cost: number;
  location: string;
}

export interface TenantAuditResult {
  tenant_id: string;
  subscriptions_audited: number;
  findings: {
    unattached_disks: UnattachedDiskFinding[];
    idle_public_ips: IdlePublicIpFinding[];
  };
  total_monthly_savings: number;
}

export interface CspAuditReport {
  tenants_audited: number;
  total_subscriptions_audited: number;
  total_monthly_savings: number;
  total_annual_savings: number;
  tenant_results: TenantAuditResult[];
  audit_date: string;
}
