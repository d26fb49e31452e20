import { describe, it, expect } from 'vitest';
import { CacheError, InvalidIdError, OntologyLookupError } from '@phenoxform/core';
import { CachedBiDict } from './bidict.js';
import { CachedOntologyFactory } from './factory.js';
import { OntologyRef } from './ontology-ref.js';
import { InMemoryTermProvider } from './providers/in-memory.js';
import type { OntologyTerm, OntologyTermProvider } from './types.js';

const TERMS: OntologyTerm[] = [
  { id: 'HP:0001250', label: 'Seizure', synonyms: ['Seizures', 'Epileptic seizure'] },
  { id: 'HP:0002017', label: 'Nausea and vomiting', synonyms: [] },
];

/**
 * Provider that counts calls and resolves after a tick
 */
class CountingProvider implements OntologyTermProvider {
  readonly name = 'counting';
  idCalls = 0;
  labelCalls = 0;
  failOn = new Set<string>();
  private readonly inner = new InMemoryTermProvider(TERMS);

  async lookupById(id: string): Promise<OntologyTerm | undefined> {
    this.idCalls++;
    await new Promise(resolve => setTimeout(resolve, 5));
    if (this.failOn.has(id)) throw new Error('connection reset');
    return this.inner.lookupById(id);
  }

  async lookupByLabel(label: string): Promise<OntologyTerm | undefined> {
    this.labelCalls++;
    await new Promise(resolve => setTimeout(resolve, 5));
    return this.inner.lookupByLabel(label);
  }
}

function hpDict(): { dict: CachedBiDict; provider: CountingProvider } {
  const provider = new CountingProvider();
  return { dict: new CachedBiDict(OntologyRef.hp(), provider), provider };
}

describe('CachedBiDict', () => {
  it('should serve repeated lookups from the cache', async () => {
    const { dict, provider } = hpDict();

    expect(await dict.getLabel('HP:0001250')).toBe('Seizure');
    expect(await dict.getLabel('HP:0001250')).toBe('Seizure');

    expect(provider.idCalls).toBe(1);
    expect(dict.stats()).toMatchObject({ hits: 1, misses: 1, providerCalls: 1 });
  });

  it('should issue one provider call for concurrent lookups of the same key', async () => {
    const { dict, provider } = hpDict();

    const labels = await Promise.all([
      dict.getLabel('HP:0001250'),
      dict.getLabel('HP:0001250'),
      dict.getLabel('hp:0001250'),
    ]);

    expect(labels).toEqual(['Seizure', 'Seizure', 'Seizure']);
    expect(provider.idCalls).toBe(1);
  });

  it('should reject a malformed id before calling the provider', async () => {
    const provider = new CountingProvider();
    const dict = new CachedBiDict(OntologyRef.omim(), provider);

    expect(() => dict.validateId('OMIM:ABC')).toThrow(InvalidIdError);
    await expect(dict.getLabel('OMIM:ABC')).rejects.toThrow(InvalidIdError);
    expect(dict.isId('OMIM:123456')).toBe(true);
    expect(dict.isId('HP:0001250')).toBe(false);
    expect(provider.idCalls).toBe(0);
  });

  it('should treat a malformed id with its own prefix as invalid on every lookup path', async () => {
    const provider = new CountingProvider();
    const dict = new CachedBiDict(OntologyRef.omim(), provider);

    await expect(dict.get('OMIM:ABC')).rejects.toThrow(InvalidIdError);
    await expect(dict.getId('OMIM:ABC')).rejects.toThrow(InvalidIdError);
    await expect(dict.getId('omim:12')).rejects.toThrow('"omim:12" is not a valid OMIM identifier');

    expect(provider.idCalls).toBe(0);
    expect(provider.labelCalls).toBe(0);
    expect(dict.stats().providerCalls).toBe(0);
  });

  it('should answer the reverse direction from a seeded forward lookup', async () => {
    const { dict, provider } = hpDict();

    const label = await dict.getLabel('HP:0001250');
    expect(await dict.getId(label)).toBe('HP:0001250');
    expect(await dict.getId('  epileptic   SEIZURE ')).toBe('HP:0001250');

    expect(provider.labelCalls).toBe(0);
  });

  it('should pass canonical ids through getId', async () => {
    const { dict, provider } = hpDict();

    expect(await dict.getId('hp:0002017')).toBe('HP:0002017');
    expect(provider.labelCalls).toBe(0);
  });

  it('should fail unknown keys with a lookup error', async () => {
    const { dict } = hpDict();

    await expect(dict.getId('Not a phenotype')).rejects.toThrow(OntologyLookupError);
    await expect(dict.getLabel('HP:9999999')).rejects.toThrow(OntologyLookupError);
  });

  it('should scope provider failures to the failing key and retry later', async () => {
    const { dict, provider } = hpDict();
    provider.failOn.add('HP:0001250');

    const [failed, ok] = await Promise.allSettled([
      dict.getLabel('HP:0001250'),
      dict.getLabel('HP:0002017'),
    ]);

    expect(failed.status).toBe('rejected');
    expect(failed.status === 'rejected' ? failed.reason : undefined).toBeInstanceOf(CacheError);
    expect(ok).toEqual({ status: 'fulfilled', value: 'Nausea and vomiting' });

    provider.failOn.clear();
    expect(await dict.getLabel('HP:0001250')).toBe('Seizure');
    expect(provider.idCalls).toBe(3);
  });

  it('should dispatch get() by the shape of its argument', async () => {
    const { dict } = hpDict();

    expect(await dict.get('HP:0001250')).toBe('Seizure');
    expect(await dict.get('Nausea and vomiting')).toBe('HP:0002017');
  });
});

describe('CachedOntologyFactory', () => {
  it('should hand out one dictionary per ontology reference', () => {
    const resolved: string[] = [];
    const factory = new CachedOntologyFactory(ref => {
      resolved.push(ref.key);
      return new InMemoryTermProvider(TERMS);
    });

    const first = factory.getBiDict('hp');
    const second = factory.getBiDict(OntologyRef.hp());
    factory.preload(['HP', 'MONDO']);

    expect(first).toBe(second);
    expect(resolved).toEqual(['HP:latest', 'MONDO:latest']);
    expect(factory.size).toBe(2);
  });

  it('should keep versions apart', () => {
    const factory = new CachedOntologyFactory(() => new InMemoryTermProvider(TERMS));

    expect(factory.getBiDict(OntologyRef.hp('2024-04-26'))).not.toBe(factory.getBiDict(OntologyRef.hp()));
  });
});
