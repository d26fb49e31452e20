/**
 * Identifier rules
 */

import { isCurie } from '@phenoxform/ontology';
import type { LintFinding, LintRule } from '../types.js';

export const identifierRules: LintRule[] = [
  {
    key: 'non-curie-id',
    title: 'Ontology id is not a CURIE',
    category: 'IDENTIFIERS',
    defaultSeverity: 'ERROR',
    rationale: 'Terms left as free text were not normalised and cannot be matched across subjects.',
    run: (record) => {
      const candidates: Array<{ path: string; value: string | undefined }> = [
        ...record.phenotypicFeatures.map((f, i) => ({ path: `phenotypicFeatures.${i}.id`, value: f.id })),
        ...record.diseases.map((d, i) => ({ path: `diseases.${i}.id`, value: d.id })),
        ...record.variants.map((v, i) => ({ path: `variants.${i}.gene`, value: v.gene })),
        ...record.measurements.map((m, i) => ({ path: `measurements.${i}.assayId`, value: m.assayId })),
      ];

      return candidates
        .filter(candidate => candidate.value !== undefined && !isCurie(candidate.value))
        .map(({ path, value }): LintFinding => ({
          key: 'non-curie-id',
          title: 'Ontology id is not a CURIE',
          category: 'IDENTIFIERS',
          severity: 'ERROR',
          subjectId: record.id,
          message: `"${value}" at ${path} is not a PREFIX:id identifier`,
          path,
        }));
    },
  },
];
