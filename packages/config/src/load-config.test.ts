import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError } from '@phenoxform/core';
import { loadPipelineConfig, parseConfigText, parsePipelineConfig } from './load-config.js';

const VISITS_YAML = `
data_sources:
  - type: csv
    source: data/visits.csv
    separator: ";"
    tables:
      - name: visits
        context:
          - identifier: patient_id
            data_context: subject_id
          - identifier: sex
            data_context: subject_sex
            alias_map:
              hash_map: { M: Male, F: Female }
  - type: inline
    name: genetics-db
    data:
      - name: variants
        columns:
          - { name: patient_id, values: [P001] }
          - { name: gene, values: [HGNC:1100] }
    tables:
      - name: variants
        context:
          - identifier: patient_id
            data_context: subject_id
          - identifier: gene
            data_context: hgnc_symbol_or_id
pipeline:
  strategies:
    - string_correction
    - alias_map
  ontologies:
    - HP
    - { prefix: mondo, version: "2024-06-04" }
loader:
  type: file_system
  out_dir: out
checks:
  - key: missing-sex
    severity_override: ERROR
`;

describe('loadPipelineConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'phenoxform-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a YAML file and resolve paths against its directory', async () => {
    const path = join(dir, 'pipeline.yaml');
    await writeFile(path, VISITS_YAML);

    const config = await loadPipelineConfig(path);

    expect(config.dataSources).toHaveLength(2);
    const [csv, inline] = config.dataSources;
    expect(csv).toMatchObject({ type: 'csv', source: join(dir, 'data/visits.csv'), separator: ';', hasHeaders: true });
    expect(inline).toMatchObject({ type: 'inline', name: 'genetics-db' });
    expect(config.strategies).toEqual(['string_correction', 'alias_map']);
    expect(config.ontologies.map(ref => ref.key)).toEqual(['HP:latest', 'MONDO:2024-06-04']);
    expect(config.concurrency).toBe(4);
    expect(config.lookupConcurrency).toBe(8);
    expect(config.loader).toEqual({ type: 'file_system', outDir: join(dir, 'out'), createDir: false });
    expect(config.checks).toEqual([{ checkKey: 'missing-sex', enabled: true, severityOverride: 'ERROR' }]);
  });

  it('should convert table contexts', async () => {
    const path = join(dir, 'pipeline.yaml');
    await writeFile(path, VISITS_YAML);

    const config = await loadPipelineConfig(path);
    const csv = config.dataSources[0];
    if (csv.type !== 'csv') throw new Error('expected a csv source');

    expect(csv.table.name).toBe('visits');
    expect(csv.table.series[1].dataContext).toEqual({ kind: 'SubjectSex' });
    expect(csv.table.series[1].aliasMap).toEqual({ map: { M: 'Male', F: 'Female' }, outputType: 'string' });
  });

  it('should reject a missing file', async () => {
    await expect(loadPipelineConfig(join(dir, 'absent.yaml'))).rejects.toThrow(ConfigurationError);
  });
});

describe('parsePipelineConfig', () => {
  const table = (name: string, context: unknown[]) => ({ name, context });

  it('should report schema problems with their paths', () => {
    try {
      parsePipelineConfig({ data_sources: [] });
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toEqual([
        'data_sources: Array must contain at least 1 element(s)',
        'loader: Required',
      ]);
    }
  });

  it('should collect table and strategy order problems together', () => {
    const raw = {
      data_sources: [{
        type: 'inline',
        name: 'clinic',
        data: [],
        tables: [table('visits', [{ identifier: 'hpo', data_context: 'hpo_label_or_id' }])],
      }],
      pipeline: { strategies: ['alias_map', 'string_correction'] },
      loader: { type: 'memory' },
    };

    try {
      parsePipelineConfig(raw);
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.issues).toEqual([
        'data_sources.0 table "visits": expected exactly one subject_id series, found 0',
        'string_correction (position 2) must come before alias_map (position 1)',
      ]);
    }
  });

  it('should leave checks undefined when none are declared', () => {
    const config = parsePipelineConfig({
      data_sources: [{
        type: 'excel',
        source: '/data/cohort.xlsx',
        tables: [table('Sheet1', [{ identifier: 'id', data_context: 'subject_id' }])],
      }],
      loader: { type: 'memory' },
    });

    expect(config.checks).toBeUndefined();
    expect(config.strategies).toEqual([]);
    expect(config.dataSources[0]).toMatchObject({ type: 'excel', source: '/data/cohort.xlsx' });
  });
});

describe('parseConfigText', () => {
  it('should parse JSON by extension', () => {
    expect(parseConfigText('{"loader": {"type": "memory"}}', 'pipeline.json')).toEqual({ loader: { type: 'memory' } });
  });

  it('should wrap parser failures', () => {
    expect(() => parseConfigText('{ not json', 'pipeline.json')).toThrow(ConfigurationError);
  });
});
