import { describe, it, expect } from 'vitest';
import { DiagnosticsReport, exact, matchTable, seriesContext } from '@phenoxform/core';
import { StringCorrectionStrategy } from './string-correction.js';

const tagged = matchTable(
  {
    name: 'visits',
    columns: [
      { name: 'patient_id', values: ['P001', 'P002'] },
      { name: 'phenotype', values: ['Seizure   disorder\tfocal', 'Nausea_and_vomiting'] },
      { name: 'notes', values: ['two  spaces', 'x'] },
    ],
  },
  {
    name: 'visits',
    series: [
      seriesContext(exact('patient_id'), { dataContext: { kind: 'SubjectId' } }),
      seriesContext(exact('phenotype'), { dataContext: { kind: 'HpoLabelOrId' } }),
      seriesContext(exact('notes')),
    ],
  }
);

describe('StringCorrectionStrategy', () => {
  it('should collapse whitespace in the selected contexts only', async () => {
    const result = await new StringCorrectionStrategy().transform(tagged, new DiagnosticsReport());

    expect(result.column('phenotype')?.values).toEqual(['Seizure disorder focal', 'Nausea_and_vomiting']);
    expect(result.column('notes')?.values).toEqual(['two  spaces', 'x']);
  });

  it('should apply a literal replacement before cleanup', async () => {
    const strategy = new StringCorrectionStrategy({ replace: '_', with: ' ' });

    const result = await strategy.transform(tagged, new DiagnosticsReport());

    expect(result.column('phenotype')?.values[1]).toBe('Nausea and vomiting');
  });
});
