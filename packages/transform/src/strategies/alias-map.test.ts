import { describe, it, expect } from 'vitest';
import { DiagnosticsReport, exact, matchTable, seriesContext } from '@phenoxform/core';
import { AliasMapStrategy } from './alias-map.js';

const tagged = matchTable(
  {
    name: 'patients',
    columns: [
      { name: 'patient_id', values: ['P001', 'P002', 'P003'] },
      { name: 'sex', values: ['M', 'F', 'X'] },
      { name: 'weight', values: ['70', 'heavy', 'n/a'] },
    ],
  },
  {
    name: 'patients',
    series: [
      seriesContext(exact('patient_id'), { dataContext: { kind: 'SubjectId' } }),
      seriesContext(exact('sex'), {
        dataContext: { kind: 'SubjectSex' },
        aliasMap: { map: { M: 'Male', F: 'Female' }, outputType: 'string' },
      }),
      seriesContext(exact('weight'), {
        aliasMap: { map: { 'n/a': null }, outputType: 'float' },
      }),
    ],
  }
);

describe('AliasMapStrategy', () => {
  it('should replace mapped values and pass unmapped ones through', async () => {
    const result = await new AliasMapStrategy().transform(tagged, new DiagnosticsReport());

    expect(result.column('sex')?.values).toEqual(['Male', 'Female', 'X']);
  });

  it('should coerce to the output type and null what fails', async () => {
    const diagnostics = new DiagnosticsReport();

    const result = await new AliasMapStrategy().transform(tagged, diagnostics);

    expect(result.column('weight')?.values).toEqual([70, null, null]);
    expect(diagnostics.all).toEqual([{
      kind: 'TypeCoercion',
      message: '"heavy" is not a float',
      table: 'patients',
      source: 'unknown',
      column: 'weight',
      row: 1,
      value: 'heavy',
      origin: 'alias_map',
    }]);
  });

  it('should leave its input table untouched', async () => {
    await new AliasMapStrategy().transform(tagged, new DiagnosticsReport());

    expect(tagged.column('sex')?.values).toEqual(['M', 'F', 'X']);
    expect(tagged.column('weight')?.values).toEqual(['70', 'heavy', 'n/a']);
  });

  it('should only apply to tables with alias maps', () => {
    const plain = matchTable(
      { name: 'p', columns: [{ name: 'id', values: ['P001'] }] },
      { name: 'p', series: [seriesContext(exact('id'), { dataContext: { kind: 'SubjectId' } })] }
    );

    expect(new AliasMapStrategy().appliesTo(plain)).toBe(false);
    expect(new AliasMapStrategy().appliesTo(tagged)).toBe(true);
  });
});
