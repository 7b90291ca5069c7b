/**
 * Compliance Overlay
 *
 * Flags recommendations whose text touches ISO 27001 controls or NIA Qatar
 * requirements that cost optimization could weaken.  Matching is keyword
 * based over `title + description + resource_type`, lowercased.  Each
 * matching bucket adds one flag; a recommendation with any flag needs
 * compliance review.
 */

import { z } from 'zod';
import type {
  ComplianceCandidate,
  ComplianceFlag,
  ComplianceReport,
  ComplianceSeverity,
  ComplianceWarning,
  FlaggedRecommendation,
  Framework,
  SafeRecommendation,
} from '../contracts/index.js';
import { ComplianceCandidateSchema } from '../contracts/index.js';
import { fromZodError } from '../runner/errors.js';
import type { StructuredLogger } from '../runner/logger.js';

// ============================================================================
// Catalogs
// ============================================================================

interface IsoBucket {
  keywords: readonly string[];
  controls: readonly string[];
  description: string;
  costImpact: string;
  severity: ComplianceSeverity;
}

interface NiaBucket {
  keywords: readonly string[];
  requirement: string;
  costImpact: string;
  severity: ComplianceSeverity;
}

export const ISO_27001_BUCKETS: Readonly<Record<string, IsoBucket>> = Object.freeze({
  encryption: {
    keywords: ['encrypt', 'storage', 'disk', 'premium'],
    controls: ['A.8.2.3', 'A.10.1.1', 'A.10.1.2'],
    description: 'Encryption of information',
    costImpact: 'Premium storage SKUs required for encryption',
    severity: 'high',
  },
  backup: {
    keywords: ['backup', 'snapshot', 'retention'],
    controls: ['A.12.3.1'],
    description: 'Information backup',
    costImpact: 'Backup storage and retention costs',
    severity: 'high',
  },
  monitoring: {
    keywords: ['monitor', 'log', 'analytics', 'diagnostic'],
    controls: ['A.12.4.1', 'A.12.4.2'],
    description: 'Event logging and monitoring',
    costImpact: 'Log Analytics and monitoring costs',
    severity: 'medium',
  },
  availability: {
    keywords: ['redundan', 'availability', 'zone', 'geo'],
    controls: ['A.17.1.1', 'A.17.2.1'],
    description: 'Availability of information processing facilities',
    costImpact: 'Redundancy and high-availability configurations',
    severity: 'high',
  },
});

export const NIA_QATAR_BUCKETS: Readonly<Record<string, NiaBucket>> = Object.freeze({
  data_sovereignty: {
    keywords: ['region', 'location', 'geo'],
    requirement: 'Data must be stored in Qatar or approved regions',
    costImpact: 'Qatar region may have higher costs than other regions',
    severity: 'critical',
  },
  encryption_at_rest: {
    keywords: ['encrypt', 'storage', 'disk'],
    requirement: 'All data must be encrypted at rest',
    costImpact: 'Premium storage SKUs required',
    severity: 'critical',
  },
  high_availability: {
    keywords: ['availability', 'redundan', 'uptime'],
    requirement: 'Critical systems must have 99.9% uptime',
    costImpact: 'Zone-redundant and geo-redundant configurations',
    severity: 'high',
  },
  audit_logging: {
    keywords: ['log', 'audit', 'retention'],
    requirement: 'All access must be logged for 90+ days',
    costImpact: 'Log retention and storage costs',
    severity: 'medium',
  },
});

const SEVERITY_RANK: Readonly<Record<ComplianceSeverity, number>> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export const ACTION_REQUIRED: Readonly<Record<ComplianceSeverity, string>> = Object.freeze({
  critical: 'STOP: Do not implement without compliance officer approval. May violate regulatory requirements.',
  high: 'REVIEW: Requires security/compliance team review before implementation. May impact critical controls.',
  medium: 'ASSESS: Review impact on compliance controls. Document justification if proceeding.',
  low: 'MONITOR: Minimal compliance impact. Proceed with standard change management.',
});

// ============================================================================
// Classification
// ============================================================================

export interface ComplianceOptions {
  checkIso27001?: boolean;
  checkNiaQatar?: boolean;
  logger?: StructuredLogger;
}

function recommendationText(rec: ComplianceCandidate): string {
  return `${rec.title ?? ''} ${rec.description ?? ''} ${rec.resource_type ?? ''}`.toLowerCase();
}

function mentions(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => text.includes(k));
}

/**
 * Flags raised by one recommendation, in catalog order (ISO first).
 */
export function checkComplianceImpact(
  rec: ComplianceCandidate,
  checkIso27001 = true,
  checkNiaQatar = true,
): ComplianceFlag[] {
  const text = recommendationText(rec);
  const flags: ComplianceFlag[] = [];

  if (checkIso27001) {
    for (const bucket of Object.values(ISO_27001_BUCKETS)) {
      if (!mentions(text, bucket.keywords)) continue;
      flags.push({
        framework: 'ISO 27001',
        controls: [...bucket.controls],
        impact: bucket.description,
        warning: bucket.costImpact,
        severity: bucket.severity,
      });
    }
  }

  if (checkNiaQatar) {
    for (const bucket of Object.values(NIA_QATAR_BUCKETS)) {
      if (!mentions(text, bucket.keywords)) continue;
      flags.push({
        framework: 'NIA Qatar',
        requirement: bucket.requirement,
        warning: bucket.costImpact,
        severity: bucket.severity,
      });
    }
  }

  return flags;
}

export function maxSeverity(flags: readonly ComplianceFlag[]): ComplianceSeverity {
  let highest: ComplianceSeverity = 'low';
  for (const flag of flags) {
    if (SEVERITY_RANK[flag.severity] > SEVERITY_RANK[highest]) highest = flag.severity;
  }
  return highest;
}

export function buildComplianceWarning(
  rec: ComplianceCandidate,
  flags: ComplianceFlag[],
): ComplianceWarning {
  const severity = maxSeverity(flags);
  const frameworks: Framework[] = [...new Set(flags.map((f) => f.framework))].sort();

  return {
    recommendation_id: rec.id ?? 'unknown',
    recommendation_title: rec.title ?? 'Unknown',
    severity,
    frameworks_impacted: frameworks,
    flags,
    action_required: ACTION_REQUIRED[severity],
  };
}

const CandidatesSchema = z.array(ComplianceCandidateSchema);

/**
 * Partition recommendations into flagged and safe.  Pure: inputs are
 * copied, never mutated.
 *
 * @throws ValidationError when `recommendations` is not a list of records
 */
export function applyComplianceOverlay(
  recommendations: readonly unknown[],
  options: ComplianceOptions = {},
): ComplianceReport {
  const parsed = CandidatesSchema.safeParse(recommendations);
  if (!parsed.success) throw fromZodError('compliance overlay input', parsed.error);

  const checkIso = options.checkIso27001 ?? true;
  const checkNia = options.checkNiaQatar ?? true;
  options.logger?.info('compliance.start', 'Applying compliance overlay to cost recommendations', {
    iso27001: checkIso,
    nia_qatar: checkNia,
  });

  const flagged: FlaggedRecommendation[] = [];
  const safe: SafeRecommendation[] = [];
  const warnings: ComplianceWarning[] = [];

  for (const rec of parsed.data) {
    const flags = checkComplianceImpact(rec, checkIso, checkNia);
    if (flags.length > 0) {
      flagged.push({ ...rec, compliance_flags: flags, requires_compliance_review: true });
      warnings.push(buildComplianceWarning(rec, flags));
    } else {
      safe.push({ ...rec, requires_compliance_review: false });
    }
  }

  options.logger?.info(
    'compliance.complete',
    `Compliance overlay complete: ${flagged.length} flagged, ${safe.length} safe`,
  );

  return {
    flagged_recommendations: flagged,
    safe_recommendations: safe,
    compliance_warnings: warnings,
    summary: {
      total_recommendations: parsed.data.length,
      flagged_count: flagged.length,
      safe_count: safe.length,
    },
  };
}
