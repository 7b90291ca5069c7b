#!/usr/bin/env node
/**
 * finops-signals CLI
 *
 * Commands:
 *   finops-signals anomalies  --costs <path>            [--threshold <n>]
 *   finops-signals governance --recommendations <path>  [--min-risk-score <n>] [--compliance]
 *   finops-signals compliance --recommendations <path>  [--no-iso27001] [--no-nia-qatar]
 *   finops-signals budget     --template <path>         [--budget <usd>] [--region <name>]
 *   finops-signals audit      --inventory <path>        [--tenants <ids>]
 *   finops-signals health
 *
 * Inputs are JSON exports; subscriptions come from --subscriptions,
 * AZURE_SUBSCRIPTION_IDS or the --config file.
 *
 * Exit codes:
 *   0: success
 *   2: validation error (bad input, missing configuration)
 *   3: Azure dependency failure (auth, throttling, service errors)
 *   4: unexpected bug
 */

import { Command, InvalidArgumentError } from 'commander';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { detectCostAnomalies } from './anomalies/index.js';
import { auditCspTenants } from './audit/index.js';
import { validateDeploymentBudget } from './budget/index.js';
import { applyComplianceOverlay } from './compliance/index.js';
import { loadSettings, parseIdList, retryPolicyFrom, type Settings } from './config/index.js';
import { scoreGovernanceRecommendations } from './governance/index.js';
import { getCapabilityMetadata, getHealthStatus, MODULE_VERSION } from './health/index.js';
import { formatCurrency } from './pricing/index.js';
import { safeJsonParse, validateSafePath } from './security/index.js';
import {
  createStaticAdvisorSource,
  createStaticCostSource,
  createStaticInventorySource,
} from './sources/index.js';
import {
  createRunContext,
  exitCodeFor,
  runOperation,
  ValidationError,
  EXIT_BUG,
  EXIT_SUCCESS,
  type FailureEnvelope,
  type RunContext,
} from './runner/index.js';

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('finops-signals')
  .description('Azure FinOps signals - cost anomalies, governance risk, compliance overlay')
  .version(MODULE_VERSION);

interface CommonOptions {
  config?: string;
  subscriptions?: string;
  json?: boolean;
  out?: string;
  logFile?: string;
  verbose?: boolean;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'JSON settings file (overrides environment)')
    .option('--subscriptions <ids>', 'Comma-separated subscription IDs (overrides AZURE_SUBSCRIPTION_IDS)')
    .option('--json', 'Emit structured JSON to stdout')
    .option('--out <path>', 'Also write the JSON result to this file')
    .option('--log-file <path>', 'Append JSON-lines logs to this file')
    .option('--verbose', 'Echo every log line to stderr', false);
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

// ---------------------------------------------------------------------------
// anomalies
// ---------------------------------------------------------------------------

interface AnomaliesOptions extends CommonOptions {
  costs: string;
  threshold?: number;
  referenceDate?: string;
}

withCommonOptions(
  program
    .command('anomalies')
    .description('Detect daily cost spikes against the 7-day baseline')
    .addHelpText('after', '\nExample:\n  finops-signals anomalies --costs ./costs.json --threshold 1.5\n')
    .requiredOption('--costs <path>', 'Path to a cost export (array of cost rows)')
    .option('--threshold <n>', 'Anomaly multiplier over the baseline average', parseNumber)
    .option('--reference-date <date>', 'Date treated as today (YYYY-MM-DD)'),
).action(async (options: AnomaliesOptions) => {
  await runCommand(options, async (settings, context) => {
    const records = loadJsonFile(options.costs, z.array(z.unknown()), 'cost export');
    const report = await detectCostAnomalies(subscriptionsFor(options, settings), {
      source: createStaticCostSource(records),
      context,
      threshold: options.threshold ?? settings.anomaly_threshold,
      referenceDate: options.referenceDate,
    });

    return {
      result: report,
      text: () => {
        console.log('\nCost Anomaly Detection:');
        console.log(`  Threshold: ${report.threshold}x`);
        console.log(`  Subscriptions analyzed: ${report.subscriptions_analyzed}`);
        if (report.subscriptions_failed.length > 0) {
          console.log(`  Subscriptions failed: ${report.subscriptions_failed.length}`);
        }
        console.log(`  Anomalies: ${report.total_anomalies}`);
        console.log(`  Excess spend: ${formatCurrency(report.total_excess_spend)}`);
        for (const a of report.anomalies.slice(0, 10)) {
          console.log(
            `    ${a.resource_group} / ${a.service_name}: ${formatCurrency(a.actual_cost)} vs avg ${formatCurrency(a.average_cost)} (+${a.variance_percent.toFixed(2)}%)`,
          );
        }
      },
    };
  });
});

// ---------------------------------------------------------------------------
// governance
// ---------------------------------------------------------------------------

interface GovernanceCliOptions extends CommonOptions {
  recommendations: string;
  minRiskScore?: number;
  compliance?: boolean;
}

withCommonOptions(
  program
    .command('governance')
    .description('Risk-score advisor recommendations against ISO 27001 and NIA Qatar')
    .addHelpText('after', '\nExample:\n  finops-signals governance --recommendations ./advisor.json --min-risk-score 7 --compliance\n')
    .requiredOption('--recommendations <path>', 'Path to an advisor export (array of recommendations)')
    .option('--min-risk-score <n>', 'Drop recommendations scoring below this (0-10)', parseNumber)
    .option('--compliance', 'Also run the compliance overlay on the scored recommendations', false),
).action(async (options: GovernanceCliOptions) => {
  await runCommand(options, async (settings, context) => {
    const records = loadJsonFile(options.recommendations, z.array(z.unknown()), 'advisor export');
    const report = await scoreGovernanceRecommendations(subscriptionsFor(options, settings), {
      source: createStaticAdvisorSource(records),
      context,
      minRiskScore: options.minRiskScore ?? settings.min_risk_score,
    });
    const compliance = options.compliance
      ? applyComplianceOverlay(report.recommendations, { logger: context.logger })
      : undefined;

    return {
      result: compliance ? { governance: report, compliance } : report,
      text: () => {
        const { summary } = report;
        console.log('\nGovernance Recommendations:');
        console.log(`  Min risk score: ${report.min_risk_score}`);
        console.log(`  Total: ${summary.total_recommendations} (high ${summary.high_risk_count}, medium ${summary.medium_risk_count}, low ${summary.low_risk_count})`);
        console.log(`  Potential savings: ${formatCurrency(summary.potential_monthly_savings)}/mo, ${formatCurrency(summary.potential_annual_savings)}/yr`);
        for (const r of report.recommendations.slice(0, 10)) {
          console.log(`    [${r.risk_score}] ${r.category}: ${r.title.slice(0, 70)}`);
        }
        if (compliance) {
          console.log(`\n  Compliance review required: ${compliance.summary.flagged_count} of ${compliance.summary.total_recommendations}`);
        }
      },
    };
  });
});

// ---------------------------------------------------------------------------
// compliance
// ---------------------------------------------------------------------------

interface ComplianceCliOptions extends CommonOptions {
  recommendations: string;
  iso27001: boolean;
  niaQatar: boolean;
}

withCommonOptions(
  program
    .command('compliance')
    .description('Flag recommendations that may impact ISO 27001 or NIA Qatar controls')
    .requiredOption('--recommendations <path>', 'Path to a JSON array of recommendations')
    .option('--no-iso27001', 'Skip the ISO 27001 checks')
    .option('--no-nia-qatar', 'Skip the NIA Qatar checks'),
).action(async (options: ComplianceCliOptions) => {
  await runCommand(options, async (_settings, context) => {
    const records = loadJsonFile(options.recommendations, z.array(z.unknown()), 'recommendations');
    const report = applyComplianceOverlay(records, {
      checkIso27001: options.iso27001,
      checkNiaQatar: options.niaQatar,
      logger: context.logger,
    });

    return {
      result: report,
      text: () => {
        console.log('\nCompliance Overlay:');
        console.log(`  Total: ${report.summary.total_recommendations}`);
        console.log(`  Flagged: ${report.summary.flagged_count}`);
        console.log(`  Safe: ${report.summary.safe_count}`);
        for (const w of report.compliance_warnings.slice(0, 10)) {
          console.log(`    [${w.severity.toUpperCase()}] ${w.recommendation_title}: ${w.action_required}`);
        }
      },
    };
  });
});

// ---------------------------------------------------------------------------
// budget
// ---------------------------------------------------------------------------

interface BudgetCliOptions extends CommonOptions {
  template: string;
  budget?: number;
  region?: string;
}

withCommonOptions(
  program
    .command('budget')
    .description('Estimate the monthly cost of an ARM/Bicep template')
    .addHelpText('after', '\nExample:\n  finops-signals budget --template ./main.json --budget 500\n')
    .requiredOption('--template <path>', 'Path to the ARM template (or Bicep JSON output)')
    .option('--budget <usd>', 'Monthly budget limit in USD', parseNumber)
    .option('--region <name>', 'Azure region for pricing'),
).action(async (options: BudgetCliOptions) => {
  await runCommand(options, async (settings, context) => {
    const template = loadJsonFile(options.template, z.unknown(), 'template');
    const report = validateDeploymentBudget(template, {
      budgetLimit: options.budget,
      region: options.region ?? settings.region,
      logger: context.logger,
    });

    return {
      result: report,
      text: () => {
        console.log('\nDeployment Budget:');
        console.log(`  Region: ${report.region}`);
        console.log(`  Resources priced: ${report.resources_priced}/${report.resources_analyzed}`);
        console.log(`  Monthly: ${formatCurrency(report.estimated_monthly_cost)}`);
        console.log(`  Annual: ${formatCurrency(report.estimated_annual_cost)}`);
        if (report.budget_limit !== null) {
          console.log(`  Within budget (${formatCurrency(report.budget_limit)}): ${report.within_budget}`);
        }
        for (const w of report.warnings) console.log(`    ! ${w}`);
      },
    };
  });
});

// ---------------------------------------------------------------------------
// audit
// ---------------------------------------------------------------------------

interface AuditCliOptions extends CommonOptions {
  inventory: string;
  tenants?: string;
}

const InventoryFileSchema = z.object({
  disks: z.array(z.unknown()).default([]),
  public_ips: z.array(z.unknown()).default([]),
});

withCommonOptions(
  program
    .command('audit')
    .description('Find unattached disks and idle public IPs across tenants')
    .requiredOption('--inventory <path>', 'Path to an inventory export ({ disks, public_ips })')
    .option('--tenants <ids>', 'Comma-separated CSP tenant IDs (overrides CSP_TENANT_IDS)'),
).action(async (options: AuditCliOptions) => {
  await runCommand(options, async (settings, context) => {
    const inventory = loadJsonFile(options.inventory, InventoryFileSchema, 'inventory export');
    const tenants = parseIdList(options.tenants) ?? settings.csp_tenant_ids;
    const report = await auditCspTenants(tenants, subscriptionsFor(options, settings), {
      source: createStaticInventorySource(inventory),
      context,
    });

    return {
      result: report,
      text: () => {
        console.log('\nUnused Resource Audit:');
        console.log(`  Tenants: ${report.tenants_audited}, subscriptions: ${report.total_subscriptions_audited}`);
        console.log(`  Savings: ${formatCurrency(report.total_monthly_savings)}/mo, ${formatCurrency(report.total_annual_savings)}/yr`);
        for (const t of report.tenant_results) {
          console.log(
            `    ${t.tenant_id}: ${t.findings.unattached_disks.length} unattached disks, ${t.findings.idle_public_ips.length} idle public IPs`,
          );
        }
      },
    };
  });
});

// ---------------------------------------------------------------------------
// health
// ---------------------------------------------------------------------------

program
  .command('health')
  .description('Display module health status and capabilities')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const health = getHealthStatus();
    const capabilities = getCapabilityMetadata();

    if (options.json) {
      process.stdout.write(JSON.stringify({ health, capabilities }, null, 2) + '\n');
      return;
    }

    console.log('\nHealth Status:');
    console.log(`  Module: ${health.module_id}@${health.module_version}`);
    console.log(`  Status: ${health.status}`);
    console.log(`  Timestamp: ${health.timestamp}`);
    console.log(`  Checks: pricing_tables=${health.checks.pricing_tables}, compliance_catalogs=${health.checks.compliance_catalogs}, remediation_catalog=${health.checks.remediation_catalog}`);
    console.log('\nCapabilities:');
    console.log(`  Operations: ${capabilities.operations.map((o) => o.operation).join(', ')}`);
    console.log(`  Input Formats: ${capabilities.input_formats.join(', ')}`);
    console.log(`  Output Formats: ${capabilities.output_formats.join(', ')}`);
    console.log('\nRetry Semantics:');
    console.log(`  Max Retries: ${capabilities.retry_semantics.max_retries}`);
    console.log(`  Backoff: ${capabilities.retry_semantics.backoff_strategy} x${capabilities.retry_semantics.backoff_factor}, cap ${capabilities.retry_semantics.max_delay_ms}ms`);
    console.log(`  Retryable: ${capabilities.retry_semantics.retryable_errors.join(', ')}`);
  });

// ---------------------------------------------------------------------------
// Shared plumbing
// ---------------------------------------------------------------------------

interface CommandOutput {
  result: unknown;
  text: () => void;
}

async function runCommand(
  options: CommonOptions,
  body: (settings: Settings, context: RunContext) => Promise<CommandOutput>,
): Promise<void> {
  const outcome = await runOperation(async () => {
    const settings = loadSettings({ configPath: options.config });
    const context = createRunContext({
      logLevel: settings.log_level,
      logFilePath: options.logFile,
      json: options.verbose,
      retryPolicy: retryPolicyFrom(settings),
      concurrency: settings.concurrency,
    });
    return body(settings, context);
  });

  if (!outcome.ok) exitWithEnvelope(outcome.error, options.json);

  const { result, text } = outcome.value;
  if (options.json) {
    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
  } else {
    text();
  }

  if (options.out) {
    const outPath = resolve(options.out);
    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, JSON.stringify(result, null, 2), 'utf-8');
    if (!options.json) console.log(`\n  Written to: ${outPath}`);
  }
  process.exitCode = EXIT_SUCCESS;
}

function subscriptionsFor(options: CommonOptions, settings: Settings): string[] {
  return parseIdList(options.subscriptions) ?? settings.subscription_ids;
}

function loadJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  const check = validateSafePath(path);
  if (!check.valid) throw new ValidationError(`${label} path rejected: ${check.error}`);

  const resolved = resolve(check.sanitized);
  if (!existsSync(resolved)) throw new ValidationError(`${label} file not found: ${resolved}`);

  const parsed = safeJsonParse(readFileSync(resolved, 'utf-8'), schema);
  if (!parsed.success) throw new ValidationError(`${label}: ${parsed.error}`);
  return parsed.data;
}

function exitWithEnvelope(envelope: FailureEnvelope, json?: boolean): never {
  if (json) {
    process.stderr.write(JSON.stringify({ error: envelope }, null, 2) + '\n');
  } else {
    console.error(`Error [${envelope.error_kind}]: ${envelope.message}`);
    if (envelope.details && envelope.details !== envelope.message) {
      console.error(`  details: ${envelope.details}`);
    }
    for (const step of envelope.remediation) console.error(`  - ${step}`);
  }
  process.exit(exitCodeFor(envelope.error_kind));
}

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(EXIT_BUG);
});
