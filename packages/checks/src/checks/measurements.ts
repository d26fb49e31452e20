/**
 * Measurement rules
 */

import type { CellValue } from '@phenoxform/core';
import type { LintFinding, LintRule } from '../types.js';

function numeric(value: CellValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export const measurementRules: LintRule[] = [
  {
    key: 'inverted-reference-range',
    title: 'Inverted reference range',
    category: 'MEASUREMENT',
    defaultSeverity: 'ERROR',
    rationale: 'A reference range whose low bound exceeds its high bound is usually swapped columns.',
    run: (record) => {
      const findings: LintFinding[] = [];

      record.measurements.forEach((measurement, index) => {
        const low = numeric(measurement.referenceRange?.low);
        const high = numeric(measurement.referenceRange?.high);
        if (low === undefined || high === undefined || low <= high) return;

        findings.push({
          key: 'inverted-reference-range',
          title: 'Inverted reference range',
          category: 'MEASUREMENT',
          severity: 'ERROR',
          subjectId: record.id,
          message: `${measurement.assayId} has reference range ${low}..${high}`,
          path: `measurements.${index}.referenceRange`,
        });
      });

      return findings;
    },
  },
];
