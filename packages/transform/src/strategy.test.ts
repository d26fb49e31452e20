import { describe, it, expect } from 'vitest';
import {
  DiagnosticsReport,
  StrategyError,
  exact,
  matchTable,
  seriesContext,
  type TaggedTable,
} from '@phenoxform/core';
import { runStrategies, type Strategy } from './strategy.js';
import { mapLimit } from './limit.js';

const tagged = matchTable(
  { name: 'patients', columns: [{ name: 'id', values: ['P001'] }, { name: 'sex', values: ['M'] }] },
  {
    name: 'patients',
    series: [
      seriesContext(exact('id'), { dataContext: { kind: 'SubjectId' } }),
      seriesContext(exact('sex'), { dataContext: { kind: 'SubjectSex' } }),
    ],
  }
);

function appending(name: string, suffix: string, applies = true): Strategy {
  return {
    name,
    appliesTo: () => applies,
    transform: async (table: TaggedTable) => table.withColumnValues(
      'sex',
      (table.column('sex')?.values ?? []).map(value => `${String(value)}${suffix}`)
    ),
  };
}

describe('runStrategies', () => {
  it('should feed each strategy the output of the previous one', async () => {
    const result = await runStrategies(
      [appending('a', '1'), appending('skipped', 'x', false), appending('b', '2')],
      tagged,
      new DiagnosticsReport()
    );

    expect(result.column('sex')?.values).toEqual(['M12']);
  });

  it('should wrap unexpected failures in a StrategyError', async () => {
    const failing: Strategy = {
      name: 'broken',
      appliesTo: () => true,
      transform: async () => {
        throw new Error('boom');
      },
    };

    await expect(runStrategies([failing], tagged, new DiagnosticsReport())).rejects.toThrow(StrategyError);
    await expect(runStrategies([failing], tagged, new DiagnosticsReport())).rejects.toThrow('[broken] boom');
  });
});

describe('mapLimit', () => {
  it('should never run more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapLimit([1, 2, 3, 4, 5, 6], 2, async item => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 2));
      active--;
      return item * 10;
    });

    expect(results).toEqual([10, 20, 30, 40, 50, 60]);
    expect(peak).toBe(2);
  });

  it('should reject a non-positive limit', async () => {
    await expect(mapLimit([1], 0, async item => item)).rejects.toThrow(RangeError);
  });

  it('should resolve to an empty list without calling the function', async () => {
    let calls = 0;
    expect(await mapLimit([], 3, async () => ++calls)).toEqual([]);
    expect(calls).toBe(0);
  });
});
