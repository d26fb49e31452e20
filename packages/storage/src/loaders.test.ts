import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LoadError } from '@phenoxform/core';
import type { SubjectRecord } from '@phenoxform/collector';
import { FileSystemLoader, recordFileName } from './file-system.js';
import { MemoryLoader } from './memory.js';

function record(id: string): SubjectRecord {
  return {
    id,
    subject: { SubjectSex: 'Male' },
    phenotypicFeatures: [],
    diseases: [],
    variants: [],
    measurements: [],
    blocks: {},
    sources: ['visits.csv/visits'],
  };
}

describe('FileSystemLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'phenoxform-storage-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one JSON file per subject', async () => {
    await new FileSystemLoader({ outDir: dir }).load([record('P001'), record('P002')]);

    expect((await readdir(dir)).sort()).toEqual(['P001.json', 'P002.json']);
    const stored: unknown = JSON.parse(await readFile(join(dir, 'P001.json'), 'utf-8'));
    expect(stored).toEqual(record('P001'));
  });

  it('should create the output directory when asked', async () => {
    const outDir = join(dir, 'nested', 'out');
    await new FileSystemLoader({ outDir, createDir: true }).load([record('P001')]);

    expect(await readdir(outDir)).toEqual(['P001.json']);
  });

  it('should fail on a missing directory without createDir', async () => {
    const loader = new FileSystemLoader({ outDir: join(dir, 'absent') });
    await expect(loader.load([record('P001')])).rejects.toThrow(LoadError);
  });

  it('should refuse two subjects sharing a file name', async () => {
    const loader = new FileSystemLoader({ outDir: dir });
    await expect(loader.load([record('P/1'), record('P:1')])).rejects.toThrow(
      'Subjects "P/1" and "P:1" map to the same file P_1.json'
    );
  });
});

describe('recordFileName', () => {
  it('should replace path separators', () => {
    expect(recordFileName('../P001')).toBe('.._P001.json');
  });
});

describe('MemoryLoader', () => {
  it('should keep the last record per subject', async () => {
    const loader = new MemoryLoader();
    await loader.load([record('P001')]);
    await loader.load([{ ...record('P001'), subject: { SubjectSex: 'Female' } }]);

    expect(loader.records).toHaveLength(1);
    expect(loader.get('P001')?.subject).toEqual({ SubjectSex: 'Female' });
  });
});
