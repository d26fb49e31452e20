/**
 * Types for ontology lookups
 */

import type { OntologyRef } from './ontology-ref.js';

export interface OntologyTerm {
  id: string;
  label: string;
  synonyms: string[];
}

/**
 * Backing store of a BiDict. Resolves to undefined when the key is unknown;
 * rejects on transport or format failures.
 */
export interface OntologyTermProvider {
  readonly name: string;
  lookupById(id: string): Promise<OntologyTerm | undefined>;
  lookupByLabel(labelOrSynonym: string): Promise<OntologyTerm | undefined>;
}

export type ProviderResolver = (ref: OntologyRef) => OntologyTermProvider;

export interface BiDictStats {
  hits: number;
  misses: number;
  providerCalls: number;
  cachedIds: number;
  cachedLabels: number;
}

export interface BiDict {
  readonly ref: OntologyRef;
  /** Synchronous, side-effect-free lexical check */
  isId(value: string): boolean;
  /** Canonical id, or InvalidIdError thrown synchronously */
  validateId(value: string): string;
  /** Rejects with InvalidIdError before any provider call when the id is malformed */
  getLabel(id: string): Promise<string>;
  /** Values with this ontology's prefix are ids, never labels */
  getId(labelOrSynonym: string): Promise<string>;
  /** Label for an id, id for a label */
  get(idOrLabel: string): Promise<string>;
  stats(): BiDictStats;
}
