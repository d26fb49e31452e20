import { describe, it, expect, vi } from 'vitest';
import { BioPortalProvider, curieToIri, iriToCurie } from './bioportal.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('BioPortalProvider', () => {
  it('should translate between CURIEs and class IRIs', () => {
    expect(curieToIri('HP:0001250')).toBe('http://purl.obolibrary.org/obo/HP_0001250');
    expect(curieToIri('OMIM:147920')).toBe('http://purl.bioontology.org/ontology/OMIM/147920');
    expect(iriToCurie('http://purl.obolibrary.org/obo/MONDO_0007739')).toBe('MONDO:0007739');
    expect(iriToCurie('http://purl.bioontology.org/ontology/OMIM/147920')).toBe('OMIM:147920');
  });

  it('should look up a class by id with the api key header', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse({
      '@id': 'http://purl.obolibrary.org/obo/HP_0001250',
      prefLabel: 'Seizure',
      synonym: ['Seizures'],
    }));
    const provider = new BioPortalProvider({ apiKey: 'test-secret', ontology: 'hp', fetchFn });

    const term = await provider.lookupById('HP:0001250');

    expect(term).toEqual({ id: 'HP:0001250', label: 'Seizure', synonyms: ['Seizures'] });
    const [url, init] = fetchFn.mock.calls[0];
    expect(String(url)).toBe(
      'https://data.bioontology.org/ontologies/HP/classes/http%3A%2F%2Fpurl.obolibrary.org%2Fobo%2FHP_0001250'
    );
    expect(init?.headers).toEqual({
      'Authorization': 'apikey token=test-secret',
      'Accept': 'application/json',
    });
  });

  it('should resolve unknown ids to undefined', async () => {
    const fetchFn = vi.fn(async () => new Response('not found', { status: 404 }));
    const provider = new BioPortalProvider({ apiKey: 'test-secret', ontology: 'HP', fetchFn });

    expect(await provider.lookupById('HP:9999999')).toBeUndefined();
  });

  it('should take the first exact search hit for a label', async () => {
    const fetchFn = vi.fn(async () => jsonResponse({
      collection: [
        { '@id': 'http://purl.obolibrary.org/obo/HP_0002017', prefLabel: 'Nausea and vomiting' },
      ],
    }));
    const provider = new BioPortalProvider({ apiKey: 'test-secret', ontology: 'HP', fetchFn });

    expect(await provider.lookupByLabel('nausea and vomiting')).toEqual({
      id: 'HP:0002017',
      label: 'Nausea and vomiting',
      synonyms: [],
    });
  });

  it('should reject on server errors', async () => {
    const fetchFn = vi.fn(async () => new Response('boom', { status: 500, statusText: 'Internal Server Error' }));
    const provider = new BioPortalProvider({ apiKey: 'test-secret', ontology: 'HP', fetchFn });

    await expect(provider.lookupById('HP:0001250')).rejects.toThrow('BioPortal error: 500 Internal Server Error');
  });
});
