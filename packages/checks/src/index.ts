/**
 * Record lint rules
 *
 * Main entry point for running rules with per-rule configuration.
 */

export * from './types.js';
export * from './registry.js';

import type { SubjectRecord } from '@phenoxform/collector';
import type { CheckConfig, LintFinding, LintReport, LintRule, Severity } from './types.js';
import { ALL_RULES } from './registry.js';

/**
 * Run rules over every record
 *
 * Rules disabled in `configs` are skipped; a severity override replaces the
 * severity of every finding of that rule.
 */
export function runChecks(
  records: readonly SubjectRecord[],
  configs?: CheckConfig[],
  rules: readonly LintRule[] = ALL_RULES
): LintReport {
  const configMap = new Map<string, CheckConfig>();
  for (const config of configs ?? []) {
    configMap.set(config.checkKey, config);
  }

  const findings: LintFinding[] = [];

  for (const rule of rules) {
    const config = configMap.get(rule.key);

    // Skip if disabled
    if (config && !config.enabled) {
      continue;
    }

    for (const record of records) {
      for (const finding of rule.run(record)) {
        findings.push(config?.severityOverride ? { ...finding, severity: config.severityOverride } : finding);
      }
    }
  }

  const countBySeverity: Record<Severity, number> = { INFO: 0, WARN: 0, ERROR: 0 };
  for (const finding of findings) {
    countBySeverity[finding.severity]++;
  }

  return {
    findings,
    hasViolations: countBySeverity.ERROR > 0,
    countBySeverity,
  };
}

/**
 * Plain-text summary of a lint report, grouped by subject
 */
export function formatLintReport(report: LintReport): string {
  if (report.findings.length === 0) {
    return 'No lint findings.';
  }

  const bySubject = new Map<string, LintFinding[]>();
  for (const finding of report.findings) {
    const list = bySubject.get(finding.subjectId) ?? [];
    list.push(finding);
    bySubject.set(finding.subjectId, list);
  }

  const { INFO, WARN, ERROR } = report.countBySeverity;
  const sections = [`Lint: ${ERROR} error(s), ${WARN} warning(s), ${INFO} info`];

  for (const [subjectId, findings] of bySubject) {
    const items = findings.map(finding => {
      let item = `  - [${finding.severity}] ${finding.key}: ${finding.message}`;
      if (finding.fix) {
        item += ` (fix: ${finding.fix.action} ${finding.fix.target})`;
      }
      return item;
    });
    sections.push(`${subjectId}\n${items.join('\n')}`);
  }

  return sections.join('\n');
}
