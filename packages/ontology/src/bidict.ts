/**
 * Cached bidirectional id <-> label dictionary
 */

import { pino } from 'pino';
import {
  CacheError,
  InvalidIdError,
  OntologyLookupError,
  PipelineError,
  errorMessage,
} from '@phenoxform/core';
import { canonicalId, hasOwnPrefix, type OntologyRef } from './ontology-ref.js';
import type { BiDict, BiDictStats, OntologyTerm, OntologyTermProvider } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

function labelKey(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * BiDict memoizing every term its provider returns
 *
 * Concurrent lookups of the same key share one provider call. A failed call
 * is not remembered, so a later lookup of the same key retries.
 */
export class CachedBiDict implements BiDict {
  readonly ref: OntologyRef;
  private readonly provider: OntologyTermProvider;
  private readonly labelsById = new Map<string, string>();
  private readonly idsByLabel = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<OntologyTerm | undefined>>();
  private hits = 0;
  private misses = 0;
  private providerCalls = 0;

  constructor(ref: OntologyRef, provider: OntologyTermProvider) {
    this.ref = ref;
    this.provider = provider;
  }

  isId(value: string): boolean {
    return canonicalId(this.ref, value) !== undefined;
  }

  validateId(value: string): string {
    const id = canonicalId(this.ref, value);
    if (id === undefined) {
      throw new InvalidIdError(this.ref.prefix, value);
    }
    return id;
  }

  async getLabel(id: string): Promise<string> {
    const canonical = this.validateId(id);

    const cached = this.labelsById.get(canonical);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const term = await this.fetchOnce(`id:${canonical}`, canonical, () => this.provider.lookupById(canonical));
    if (!term) {
      throw new OntologyLookupError(this.ref.prefix, id);
    }
    return term.label;
  }

  async getId(labelOrSynonym: string): Promise<string> {
    const id = canonicalId(this.ref, labelOrSynonym);
    if (id !== undefined) return id;
    if (hasOwnPrefix(this.ref, labelOrSynonym)) {
      throw new InvalidIdError(this.ref.prefix, labelOrSynonym);
    }

    const key = labelKey(labelOrSynonym);
    if (key.length === 0) {
      throw new OntologyLookupError(this.ref.prefix, labelOrSynonym);
    }

    const cached = this.idsByLabel.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const term = await this.fetchOnce(`label:${key}`, labelOrSynonym, () =>
      this.provider.lookupByLabel(labelOrSynonym.trim())
    );
    if (!term) {
      throw new OntologyLookupError(this.ref.prefix, labelOrSynonym);
    }
    return canonicalId(this.ref, term.id) ?? term.id;
  }

  get(idOrLabel: string): Promise<string> {
    return hasOwnPrefix(this.ref, idOrLabel) ? this.getLabel(idOrLabel) : this.getId(idOrLabel);
  }

  stats(): BiDictStats {
    return {
      hits: this.hits,
      misses: this.misses,
      providerCalls: this.providerCalls,
      cachedIds: this.labelsById.size,
      cachedLabels: this.idsByLabel.size,
    };
  }

  /**
   * Seed both directions from a resolved term
   */
  remember(term: OntologyTerm): void {
    const id = canonicalId(this.ref, term.id) ?? term.id;
    this.labelsById.set(id, term.label);
    this.idsByLabel.set(labelKey(term.label), id);
    for (const synonym of term.synonyms) {
      const key = labelKey(synonym);
      if (key.length > 0 && !this.idsByLabel.has(key)) {
        this.idsByLabel.set(key, id);
      }
    }
  }

  private fetchOnce(
    flightKey: string,
    requested: string,
    lookup: () => Promise<OntologyTerm | undefined>
  ): Promise<OntologyTerm | undefined> {
    const pending = this.inFlight.get(flightKey);
    if (pending) return pending;

    this.providerCalls++;
    const promise = Promise.resolve()
      .then(lookup)
      .then(term => {
        if (term) this.remember(term);
        return term;
      })
      .catch((error: unknown) => {
        logger.warn({
          event: 'ontology.lookup.failed',
          ontology: this.ref.key,
          provider: this.provider.name,
          key: requested,
          error: errorMessage(error),
        }, 'Ontology provider lookup failed');

        if (error instanceof PipelineError) throw error;
        throw new CacheError(
          this.ref.prefix,
          requested,
          `Lookup of "${requested}" in ${this.ref.prefix} failed: ${errorMessage(error)}`,
          { cause: error }
        );
      })
      .finally(() => {
        this.inFlight.delete(flightKey);
      });

    this.inFlight.set(flightKey, promise);
    return promise;
  }
}
