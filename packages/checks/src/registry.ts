/**
 * Rule registry - all available lint rules
 */

import type { LintRule } from './types.js';
import { phenotypeRules } from './checks/phenotypes.js';
import { subjectRules } from './checks/subject.js';
import { identifierRules } from './checks/identifiers.js';
import { interpretationRules } from './checks/interpretation.js';
import { measurementRules } from './checks/measurements.js';

/**
 * All available rule definitions
 */
export const ALL_RULES: LintRule[] = [
  ...phenotypeRules,
  ...subjectRules,
  ...identifierRules,
  ...interpretationRules,
  ...measurementRules,
];

/**
 * Get rule definition by key
 */
export function getRuleDefinition(key: string): LintRule | undefined {
  return ALL_RULES.find(rule => rule.key === key);
}
