/**
 * finops-signals
 *
 * Resilient retrieval and analytics for Azure spend: cost anomalies,
 * risk-scored governance recommendations, compliance flags, template
 * budget checks and unused-resource audits.
 *
 * Boundary Statement:
 * - No authentication and no network transport: collaborators hand over
 *   already-deserialized records through the interfaces in ./sources
 * - Every operation returns a result or throws a typed error that
 *   `toFailureEnvelope` turns into a structured failure
 * - No report rendering beyond the CLI's plain-text summaries
 */

// Contracts
export {
  SubscriptionIdSchema,
  IsoDateSchema,
  ImpactSchema,
  DECIMAL_PATTERN,
  DecimalSchema,
  KNOWN_CATEGORIES,
  CostRecordSchema,
  AnomalyRecordSchema,
  RecommendationSchema,
  CostImpactLevelSchema,
  SecurityImpactLevelSchema,
  RiskFactorsSchema,
  ScoredRecommendationSchema,
  ComplianceSeveritySchema,
  ComplianceCandidateSchema,
  TemplateResourceSchema,
  DeploymentTemplateSchema,
  DiskRecordSchema,
  PublicIpRecordSchema,
} from './contracts/index.js';

export type {
  Impact,
  RecommendationCategory,
  CostRecord,
  CostWindow,
  AnomalyRecord,
  AnomalyReport,
  Recommendation,
  RiskFactors,
  CostImpactLevel,
  SecurityImpactLevel,
  ScoredRecommendation,
  GovernanceSummary,
  GovernanceReport,
  ComplianceSeverity,
  ComplianceCandidate,
  ComplianceFlag,
  Framework,
  ComplianceWarning,
  FlaggedRecommendation,
  SafeRecommendation,
  ComplianceReport,
  TemplateResource,
  DeploymentTemplate,
  CostBreakdownItem,
  BudgetValidationReport,
  DiskRecord,
  PublicIpRecord,
  UnattachedDiskFinding,
  IdlePublicIpFinding,
  TenantAuditResult,
  CspAuditReport,
} from './contracts/index.js';

// Runner (retry, errors, logging, context)
export * from './runner/index.js';

// Collaborators
export {
  createStaticCostSource,
  createStaticAdvisorSource,
  createStaticInventorySource,
  subscriptionFromResourceId,
  resourceGroupFromResourceId,
} from './sources/index.js';

export type {
  CostQuerySource,
  AdvisorSource,
  InventorySource,
  InventorySnapshot,
} from './sources/index.js';

// Pricing
export {
  estimateResourceCost,
  getVmMonthlyCost,
  getDiskMonthlyCost,
  getPublicIpMonthlyCost,
  getStorageAccountMonthlyCost,
  selectTier,
  calculateSavingsPotential,
  formatCurrency,
  roundCurrency,
  RESOURCE_TYPES,
} from './pricing/index.js';

export type {
  EstimateOptions,
  PricedResource,
} from './pricing/index.js';

// Anomalies
export {
  detectCostAnomalies,
  findAnomalies,
  calculateAverages,
  todayWindow,
  baselineWindow,
  DEFAULT_ANOMALY_THRESHOLD,
} from './anomalies/index.js';

export type {
  AnomalyOptions,
} from './anomalies/index.js';

// Governance
export {
  scoreRecommendation,
  scoreGovernanceRecommendations,
  calculateRiskScore,
  calculateSummary,
  extractCostImpact,
  estimateEffort,
  DEFAULT_MIN_RISK_SCORE,
} from './governance/index.js';

export type {
  GovernanceOptions,
} from './governance/index.js';

// Compliance
export {
  applyComplianceOverlay,
  checkComplianceImpact,
  buildComplianceWarning,
  maxSeverity,
  ACTION_REQUIRED,
} from './compliance/index.js';

export type {
  ComplianceOptions,
} from './compliance/index.js';

// Budget
export {
  validateDeploymentBudget,
  extractSkuInfo,
} from './budget/index.js';

export type {
  BudgetOptions,
  SkuInfo,
} from './budget/index.js';

// Audit
export {
  auditSubscriptions,
  auditCspTenants,
} from './audit/index.js';

export type {
  AuditOptions,
} from './audit/index.js';

// Settings
export {
  loadSettings,
  settingsFromEnv,
  retryPolicyFrom,
  SettingsSchema,
} from './config/index.js';

export type {
  Settings,
  LoadSettingsOptions,
} from './config/index.js';

// Health and Capabilities
export {
  getHealthStatus,
  getCapabilityMetadata,
  getRetrySemantics,
  isSupportedOperation,
  MODULE_ID,
  MODULE_VERSION,
} from './health/index.js';

export type {
  HealthStatus,
  CapabilityMetadata,
  OperationCapability,
  RetrySemantics,
} from './health/index.js';
