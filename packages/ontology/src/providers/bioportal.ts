/**
 * BioPortal term provider
 */

import { z } from 'zod';
import { pino } from 'pino';
import type { OntologyTerm, OntologyTermProvider } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ClassSchema = z.object({
  '@id': z.string(),
  prefLabel: z.string(),
  synonym: z.array(z.string()).optional(),
});

const SearchSchema = z.object({
  collection: z.array(ClassSchema),
});

type BioPortalClass = z.infer<typeof ClassSchema>;

export interface BioPortalConfig {
  apiKey: string;
  /** BioPortal acronym, e.g. HP, MONDO, OMIM */
  ontology: string;
  baseUrl?: string;
  timeout?: number;
  fetchFn?: typeof fetch;
}

/**
 * IRI of a CURIE as BioPortal knows it
 */
export function curieToIri(curie: string): string {
  const separator = curie.indexOf(':');
  const prefix = curie.slice(0, separator).toUpperCase();
  const local = curie.slice(separator + 1);
  if (prefix === 'OMIM') {
    return `http://purl.bioontology.org/ontology/OMIM/${local}`;
  }
  return `http://purl.obolibrary.org/obo/${prefix}_${local}`;
}

/**
 * CURIE of a BioPortal class IRI, or the IRI itself when unrecognized
 */
export function iriToCurie(iri: string): string {
  const obo = /\/obo\/([A-Za-z]+)_([A-Za-z0-9.-]+)$/.exec(iri);
  if (obo) return `${obo[1].toUpperCase()}:${obo[2]}`;

  const purl = /\/ontology\/([A-Za-z]+)\/([A-Za-z0-9.-]+)$/.exec(iri);
  if (purl) return `${purl[1].toUpperCase()}:${purl[2]}`;

  return iri;
}

function toTerm(cls: BioPortalClass): OntologyTerm {
  return { id: iriToCurie(cls['@id']), label: cls.prefLabel, synonyms: cls.synonym ?? [] };
}

export class BioPortalProvider implements OntologyTermProvider {
  readonly name: string;
  private readonly apiKey: string;
  private readonly ontology: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: BioPortalConfig) {
    this.apiKey = config.apiKey;
    this.ontology = config.ontology.toUpperCase();
    this.baseUrl = (config.baseUrl ?? 'https://data.bioontology.org').replace(/\/+$/, '');
    this.timeout = config.timeout ?? 30000;
    this.fetchFn = config.fetchFn ?? fetch;
    this.name = `bioportal:${this.ontology}`;
  }

  async lookupById(id: string): Promise<OntologyTerm | undefined> {
    const path = `/ontologies/${this.ontology}/classes/${encodeURIComponent(curieToIri(id))}`;
    const data = await this.request(path);
    if (data === undefined) return undefined;

    const parsed = ClassSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected BioPortal class response: ${parsed.error.message}`);
    }
    return toTerm(parsed.data);
  }

  async lookupByLabel(labelOrSynonym: string): Promise<OntologyTerm | undefined> {
    const query = new URLSearchParams({
      q: labelOrSynonym,
      ontologies: this.ontology,
      require_exact_match: 'true',
      include: 'prefLabel,synonym',
    });
    const data = await this.request(`/search?${query.toString()}`);
    if (data === undefined) return undefined;

    const parsed = SearchSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected BioPortal search response: ${parsed.error.message}`);
    }
    const first = parsed.data.collection[0];
    return first ? toTerm(first) : undefined;
  }

  /**
   * GET a BioPortal resource; undefined on 404
   */
  private async request(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          'Authorization': `apikey token=${this.apiKey}`,
          'Accept': 'application/json',
        },
        signal: controller.signal,
      });

      logger.debug({
        event: 'bioportal.request.complete',
        ontology: this.ontology,
        path,
        statusCode: response.status,
        durationMs: Date.now() - startTime,
      }, 'BioPortal request complete');

      if (response.status === 404) {
        await response.text().catch(() => ''); // Consume response
        return undefined;
      }
      if (response.status === 401 || response.status === 403) {
        await response.text().catch(() => '');
        throw new Error(`BioPortal authentication error: ${response.status} ${response.statusText}`);
      }
      if (!response.ok) {
        await response.text().catch(() => '');
        throw new Error(`BioPortal error: ${response.status} ${response.statusText}`);
      }

      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`BioPortal request timed out after ${this.timeout}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
