/**
 * Types for record lint rules
 */

import type { SubjectRecord } from '@phenoxform/collector';

export type Severity = 'INFO' | 'WARN' | 'ERROR';

export type RuleCategory =
  | 'PHENOTYPE'
  | 'SUBJECT'
  | 'IDENTIFIERS'
  | 'INTERPRETATION'
  | 'MEASUREMENT';

/** Suggested repair; never applied automatically */
export interface FixAction {
  action: 'remove' | 'merge' | 'add';
  target: string;
  detail?: string;
}

export interface LintFinding {
  key: string;
  title: string;
  category: RuleCategory;
  severity: Severity;
  subjectId: string;
  message: string;
  /** Dotted location inside the record, e.g. phenotypicFeatures.2 */
  path?: string;
  fix?: FixAction;
}

export interface LintRule {
  key: string;
  title: string;
  category: RuleCategory;
  defaultSeverity: Severity;
  rationale: string;
  run: (record: SubjectRecord) => LintFinding[];
}

export interface CheckConfig {
  checkKey: string;
  enabled: boolean;
  severityOverride?: Severity;
}

export interface LintReport {
  findings: LintFinding[];
  /** True when any finding is at ERROR severity */
  hasViolations: boolean;
  countBySeverity: Record<Severity, number>;
}
