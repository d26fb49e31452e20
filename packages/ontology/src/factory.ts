/**
 * Cached ontology factory
 *
 * Hands out one BiDict per OntologyRef for the lifetime of a run so that
 * every strategy shares the same cache.
 */

import { pino } from 'pino';
import { CachedBiDict } from './bidict.js';
import { OntologyRef } from './ontology-ref.js';
import type { BiDict, ProviderResolver } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export class CachedOntologyFactory {
  private readonly dicts = new Map<string, CachedBiDict>();
  private readonly resolveProvider: ProviderResolver;

  constructor(resolveProvider: ProviderResolver) {
    this.resolveProvider = resolveProvider;
  }

  getBiDict(ref: OntologyRef | string): BiDict {
    const resolved = typeof ref === 'string' ? OntologyRef.from(ref) : ref;
    const existing = this.dicts.get(resolved.key);
    if (existing) return existing;

    const provider = this.resolveProvider(resolved);
    const dict = new CachedBiDict(resolved, provider);
    this.dicts.set(resolved.key, dict);

    logger.debug({
      event: 'ontology.bidict.created',
      ontology: resolved.key,
      provider: provider.name,
    }, 'Created ontology dictionary');

    return dict;
  }

  preload(refs: Array<OntologyRef | string>): BiDict[] {
    return refs.map(ref => this.getBiDict(ref));
  }

  has(ref: OntologyRef | string): boolean {
    const resolved = typeof ref === 'string' ? OntologyRef.from(ref) : ref;
    return this.dicts.has(resolved.key);
  }

  get size(): number {
    return this.dicts.size;
  }

  /** Per-ontology cache counters, keyed by PREFIX:version */
  stats(): Record<string, ReturnType<BiDict['stats']>> {
    const result: Record<string, ReturnType<BiDict['stats']>> = {};
    for (const [key, dict] of this.dicts) {
      result[key] = dict.stats();
    }
    return result;
  }
}
