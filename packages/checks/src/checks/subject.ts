/**
 * Subject rules
 */

import type { LintRule } from '../types.js';

export const subjectRules: LintRule[] = [
  {
    key: 'missing-sex',
    title: 'Missing sex',
    category: 'SUBJECT',
    defaultSeverity: 'WARN',
    rationale: 'Sex is needed to interpret sex-linked findings.',
    run: (record) => {
      const sex = record.subject.SubjectSex;
      if (sex !== undefined && sex !== null) return [];

      return [{
        key: 'missing-sex',
        title: 'Missing sex',
        category: 'SUBJECT',
        severity: 'WARN',
        subjectId: record.id,
        message: `Subject ${record.id} has no sex`,
        path: 'subject.SubjectSex',
        fix: { action: 'add', target: 'SubjectSex' },
      }];
    },
  },
];
