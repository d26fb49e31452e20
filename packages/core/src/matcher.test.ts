import { describe, it, expect } from 'vitest';
import { matchTable } from './matcher.js';
import { exact, list, regex } from './identifier.js';
import { seriesContext, type TableContext } from './table-context.js';
import { IdentifierMatchError } from './errors.js';
import type { RawTable } from './table.js';

const raw: RawTable = {
  name: 'visits',
  columns: [
    { name: 'patient_id', values: ['P001', 'P002'] },
    { name: 'hpo_1', values: ['HP:0001250', ' '] },
    { name: 'hpo_2', values: ['Seizure', null] },
    { name: 'notes', values: ['a', 'b'] },
    { name: 'sex', values: ['  M ', 'F'] },
  ],
};

function tableContext(...series: TableContext['series']): TableContext {
  return {
    name: 'visits',
    series: [seriesContext(exact('patient_id'), { dataContext: { kind: 'SubjectId' } }), ...series],
  };
}

describe('matchTable', () => {
  it('should bind exactly the columns whose header matches a regex', () => {
    const tagged = matchTable(raw, tableContext(
      seriesContext(regex('^hpo_'), { dataContext: { kind: 'HpoLabelOrId' } })
    ));

    expect(tagged.filterColumns({ data: { kind: 'HpoLabelOrId' } }).map(c => c.name)).toEqual(['hpo_1', 'hpo_2']);
  });

  it('should fail when a required regex matches nothing', () => {
    expect(() => matchTable(raw, tableContext(
      seriesContext(regex('^omim'), { dataContext: { kind: 'DiseaseLabelOrId' } })
    ))).toThrow(IdentifierMatchError);
  });

  it('should ignore an optional regex that matches nothing', () => {
    const tagged = matchTable(raw, tableContext(
      seriesContext(regex('^omim'), { dataContext: { kind: 'DiseaseLabelOrId' }, optional: true })
    ));

    expect(tagged.columns.map(c => c.name)).toEqual(['patient_id']);
  });

  it('should bind a header equal to the pattern alone', () => {
    const tagged = matchTable(raw, tableContext(
      seriesContext(regex('hpo_1'), { dataContext: { kind: 'HpoLabelOrId' } })
    ));

    expect(tagged.filterColumns({ data: { kind: 'HpoLabelOrId' } }).map(c => c.name)).toEqual(['hpo_1']);
  });

  it('should fail when a listed column is absent', () => {
    const context = tableContext(seriesContext(list(['hpo_1', 'hpo_3']), { dataContext: { kind: 'HpoLabelOrId' } }));

    expect(() => matchTable(raw, context)).toThrow(/hpo_3/);
  });

  it('should bind a column to every series that matches it', () => {
    const tagged = matchTable(raw, tableContext(
      seriesContext(exact('hpo_1'), { headerContext: { kind: 'HpoLabelOrId' } }),
      seriesContext(regex('^hpo'), { dataContext: { kind: 'ObservationStatus' } })
    ));

    expect(tagged.column('hpo_1')?.series).toHaveLength(2);
    expect(tagged.column('hpo_2')?.series).toHaveLength(1);
  });

  it('should trim cells, null empty strings and apply fill_missing', () => {
    const tagged = matchTable(raw, tableContext(
      seriesContext(exact('sex'), { dataContext: { kind: 'SubjectSex' } }),
      seriesContext(exact('hpo_1'), { dataContext: { kind: 'HpoLabelOrId' }, fillMissing: 'HP:0000118' }),
      seriesContext(exact('hpo_2'), { dataContext: { kind: 'HpoLabelOrId' } })
    ));

    expect(tagged.column('sex')?.values).toEqual(['M', 'F']);
    expect(tagged.column('hpo_1')?.values).toEqual(['HP:0001250', 'HP:0000118']);
    expect(tagged.column('hpo_2')?.values).toEqual(['Seizure', null]);
  });

  it('should drop columns that no series binds', () => {
    const tagged = matchTable(raw, tableContext());

    expect(tagged.column('notes')).toBeUndefined();
    expect(tagged.rowCount).toBe(2);
  });
});
