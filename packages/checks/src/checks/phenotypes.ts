/**
 * Phenotype rules
 */

import type { LintFinding, LintRule } from '../types.js';

export const phenotypeRules: LintRule[] = [
  {
    key: 'duplicate-phenotype',
    title: 'Duplicate phenotype',
    category: 'PHENOTYPE',
    defaultSeverity: 'WARN',
    rationale: 'The same term recorded twice with the same status usually comes from overlapping source columns.',
    run: (record) => {
      const seen = new Map<string, number>();
      const findings: LintFinding[] = [];

      record.phenotypicFeatures.forEach((feature, index) => {
        const key = `${feature.id}|${feature.excluded}`;
        const first = seen.get(key);
        if (first === undefined) {
          seen.set(key, index);
          return;
        }
        findings.push({
          key: 'duplicate-phenotype',
          title: 'Duplicate phenotype',
          category: 'PHENOTYPE',
          severity: 'WARN',
          subjectId: record.id,
          message: `${feature.id} is listed more than once (entries ${first} and ${index})`,
          path: `phenotypicFeatures.${index}`,
          fix: { action: 'merge', target: feature.id, detail: `merge into phenotypicFeatures.${first}` },
        });
      });

      return findings;
    },
  },
  {
    key: 'contradictory-phenotype',
    title: 'Phenotype both observed and excluded',
    category: 'PHENOTYPE',
    defaultSeverity: 'ERROR',
    rationale: 'A term cannot be present and absent in the same subject.',
    run: (record) => {
      const observed = new Set(record.phenotypicFeatures.filter(f => !f.excluded).map(f => f.id));
      const excluded = new Set(record.phenotypicFeatures.filter(f => f.excluded).map(f => f.id));

      return [...observed].filter(id => excluded.has(id)).map((id): LintFinding => ({
        key: 'contradictory-phenotype',
        title: 'Phenotype both observed and excluded',
        category: 'PHENOTYPE',
        severity: 'ERROR',
        subjectId: record.id,
        message: `${id} is recorded as both observed and excluded`,
        fix: { action: 'remove', target: id, detail: 'remove the entry the source does not support' },
      }));
    },
  },
];
