/**
 * Governance Risk Scoring
 *
 * Scores advisor recommendations 0-10 against ISO 27001 controls and NIA
 * Qatar requirements, then filters and ranks them across subscriptions.
 */

import type {
  GovernanceReport,
  GovernanceSummary,
  Impact,
  Recommendation,
  RiskFactors,
  ScoredRecommendation,
} from '../contracts/index.js';
import { DECIMAL_PATTERN, RecommendationSchema } from '../contracts/index.js';
import type { RunContext } from '../runner/context.js';
import { AuthenticationExpiredError, ValidationError } from '../runner/errors.js';
import { mapWithConcurrency } from '../runner/fanout.js';
import { parseRecords } from '../runner/records.js';
import { maskId } from '../runner/redact.js';
import { executeWithRetry } from '../runner/retry.js';
import { roundCurrency } from '../pricing/index.js';
import type { AdvisorSource } from '../sources/index.js';

export const DEFAULT_MIN_RISK_SCORE = 5;
export const MAX_RISK_SCORE = 10;
export const DEFAULT_EFFORT_HOURS = 2;
export const DEFAULT_REMEDIATION_STEP = 'Review Azure Advisor recommendation details in Azure Portal';

export const ISO_27001_CONTROLS = Object.freeze({
  encryption: Object.freeze(['A.8.2.3', 'A.10.1.1']),
  access_control: Object.freeze(['A.9.1.1', 'A.9.2.1']),
});

export const NIA_QATAR_REQUIREMENTS = Object.freeze({
  encryption_at_rest: 'All data must be encrypted at rest',
  multi_factor_auth: 'MFA required for all administrative access',
});

const EFFORT_HOURS: Readonly<Record<string, Readonly<Record<Impact, number>>>> = Object.freeze({
  Security: { High: 4, Medium: 2, Low: 1 },
  Cost: { High: 2, Medium: 1, Low: 0.5 },
  Performance: { High: 3, Medium: 2, Low: 1 },
  HighAvailability: { High: 4, Medium: 3, Low: 2 },
  OperationalExcellence: { High: 2, Medium: 1, Low: 0.5 },
});

const BY_IMPACT = { High: 3, Medium: 2, Low: 1 } as const satisfies Record<Impact, number>;
const SECURITY_BY_IMPACT = { High: 4, Medium: 3, Low: 2 } as const satisfies Record<Impact, number>;
const SECURITY_LEVEL = { High: 'Critical', Medium: 'High', Low: 'Medium' } as const satisfies Record<
  Impact,
  RiskFactors['security_impact_level']
>;

// ============================================================================
// Scoring
// ============================================================================

/**
 * Monthly savings from `extended_properties.savingsAmount`.  Absent or
 * unparseable values are 0; strings must be plain decimals.
 */
export function extractCostImpact(rec: Pick<Recommendation, 'extended_properties'>): number {
  const raw = rec.extended_properties?.savingsAmount;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : 0;
  if (typeof raw === 'string' && DECIMAL_PATTERN.test(raw.trim())) {
    const value = Number(raw.trim());
    return Number.isFinite(value) ? value : 0;
  }
  return 0;
}

export function estimateEffort(rec: Pick<Recommendation, 'category' | 'impact'>): number {
  const table = Object.prototype.hasOwnProperty.call(EFFORT_HOURS, rec.category)
    ? EFFORT_HOURS[rec.category]
    : undefined;
  return table?.[rec.impact ?? 'Medium'] ?? DEFAULT_EFFORT_HOURS;
}

export function extractRemediationSteps(rec: Pick<Recommendation, 'solution_text'>): string[] {
  return rec.solution_text ? [rec.solution_text] : [DEFAULT_REMEDIATION_STEP];
}

function pushUnique(target: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

/**
 * Additive risk score, capped at 10.  Keyword bonuses stack on top of the
 * category base.
 */
export function calculateRiskScore(rec: Recommendation): { score: number; factors: RiskFactors } {
  const impact: Impact = rec.impact ?? 'Medium';
  const problem = (rec.problem_text ?? '').toLowerCase();
  const factors: RiskFactors = {
    iso_controls: [],
    framework_requirements: [],
    cost_impact_level: 'Unknown',
    security_impact_level: 'Unknown',
  };
  let score = 0;

  switch (rec.category) {
    case 'Security':
      score += SECURITY_BY_IMPACT[impact];
      factors.security_impact_level = SECURITY_LEVEL[impact];

      if (problem.includes('encrypt')) {
        pushUnique(factors.iso_controls, ISO_27001_CONTROLS.encryption);
        pushUnique(factors.framework_requirements, [NIA_QATAR_REQUIREMENTS.encryption_at_rest]);
        score += 2;
      }
      if (problem.includes('access') || problem.includes('authentication')) {
        pushUnique(factors.iso_controls, ISO_27001_CONTROLS.access_control);
        pushUnique(factors.framework_requirements, [NIA_QATAR_REQUIREMENTS.multi_factor_auth]);
        score += 2;
      }
      break;

    case 'Cost': {
      const savings = extractCostImpact(rec);
      if (savings > 1000) {
        score += 3;
        factors.cost_impact_level = 'High';
      } else if (savings > 100) {
        score += 2;
        factors.cost_impact_level = 'Medium';
      } else {
        score += 1;
        factors.cost_impact_level = 'Low';
      }
      break;
    }

    case 'Performance':
    case 'HighAvailability':
      score += BY_IMPACT[impact];
      break;

    case 'OperationalExcellence':
      score += 1;
      break;
  }

  // "production" contains "prod"
  if (problem.includes('prod')) score += 2;

  return { score: Math.max(0, Math.min(score, MAX_RISK_SCORE)), factors };
}

/**
 * Score one recommendation.  Pure.
 */
export function scoreRecommendation(rec: Recommendation): ScoredRecommendation {
  const { score, factors } = calculateRiskScore(rec);
  return {
    id: rec.id,
    subscription_id: rec.subscription_id,
    category: rec.category,
    impact: rec.impact ?? 'Medium',
    title: rec.problem_text ?? 'Unknown',
    description: rec.solution_text ?? 'No description',
    ...(rec.resource_type !== undefined && { resource_type: rec.resource_type }),
    risk_score: score,
    risk_factors: factors,
    remediation_steps: extractRemediationSteps(rec),
    estimated_cost: extractCostImpact(rec),
    estimated_effort_hours: estimateEffort(rec),
    impacted_resource: rec.impacted_resource || 'Unknown',
  };
}

export function calculateSummary(recommendations: readonly ScoredRecommendation[]): GovernanceSummary {
  const savings = recommendations.reduce((sum, r) => sum + r.estimated_cost, 0);
  return {
    total_recommendations: recommendations.length,
    high_risk_count: recommendations.filter((r) => r.risk_score >= 7).length,
    medium_risk_count: recommendations.filter((r) => r.risk_score >= 4 && r.risk_score < 7).length,
    low_risk_count: recommendations.filter((r) => r.risk_score < 4).length,
    potential_monthly_savings: roundCurrency(savings),
    potential_annual_savings: roundCurrency(savings * 12),
  };
}

// ============================================================================
// Multi-subscription run
// ============================================================================

export interface GovernanceOptions {
  source: AdvisorSource;
  context: RunContext;
  minRiskScore?: number;
}

async function scoreSubscription(
  subscriptionId: string,
  options: GovernanceOptions,
): Promise<ScoredRecommendation[] | null> {
  const { context, source } = options;
  const logger = context.logger.child({ subscriptionId });
  logger.info('governance.subscription_start', `Analyzing subscription ${maskId(subscriptionId)}`);

  try {
    const raw = await executeWithRetry(() => source.listRecommendations(subscriptionId), {
      policy: context.retryPolicy,
      sleep: context.sleep,
      logger,
      label: 'advisor recommendations',
    });
    return parseRecords(RecommendationSchema, raw, { label: 'advisor recommendations', logger }).map(
      scoreRecommendation,
    );
  } catch (err) {
    if (err instanceof AuthenticationExpiredError) throw err;
    logger.error('governance.subscription_failed', `Failed to get recommendations for ${maskId(subscriptionId)}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Fetch, score, filter and rank recommendations across subscriptions.
 * Summary figures cover the filtered set only.  Expired credentials reject
 * the whole call; other fetch failures are listed in `subscriptions_failed`.
 */
export async function scoreGovernanceRecommendations(
  subscriptionIds: readonly string[],
  options: GovernanceOptions,
): Promise<GovernanceReport> {
  if (subscriptionIds.length === 0) {
    throw new ValidationError('No subscription IDs provided. Set AZURE_SUBSCRIPTION_IDS.');
  }

  const minRiskScore = options.minRiskScore ?? DEFAULT_MIN_RISK_SCORE;
  if (!Number.isFinite(minRiskScore)) {
    throw new ValidationError(`Invalid minimum risk score: ${minRiskScore}`);
  }

  const { context } = options;
  context.logger.info('governance.start', `Fetching governance recommendations (min risk score: ${minRiskScore})`);

  const perSubscription = await mapWithConcurrency(subscriptionIds, context.concurrency, (id) =>
    scoreSubscription(id, options),
  );

  const all: ScoredRecommendation[] = [];
  const failed: string[] = [];
  perSubscription.forEach((result, i) => {
    if (result === null) failed.push(subscriptionIds[i]);
    else all.push(...result);
  });

  const recommendations = all
    .filter((r) => r.risk_score >= minRiskScore)
    .sort((a, b) => b.risk_score - a.risk_score);
  const summary = calculateSummary(recommendations);

  context.logger.info(
    'governance.complete',
    `Found ${summary.total_recommendations} recommendations with ${summary.high_risk_count} high-risk items`,
  );

  return {
    recommendations,
    summary,
    min_risk_score: minRiskScore,
    subscriptions_failed: failed,
  };
}
