/**
 * Provider selection
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigurationError } from '@phenoxform/core';
import { BioPortalProvider } from './providers/bioportal.js';
import { InMemoryTermProvider, JsonFileTermProvider } from './providers/in-memory.js';
import type { OntologyRef } from './ontology-ref.js';
import type { OntologyTerm, OntologyTermProvider, ProviderResolver } from './types.js';

export interface ProviderOptions {
  /** Directory of `<prefix>.json` term files, e.g. hp.json */
  ontologyDir?: string;
  bioportalApiKey?: string;
  bioportalUrl?: string;
  timeout?: number;
  /** Inline term lists keyed by prefix; take precedence over everything else */
  terms?: Record<string, OntologyTerm[]>;
  fetchFn?: typeof fetch;
}

/**
 * Resolve a provider per ontology: inline terms, then a local term file,
 * then BioPortal.
 */
export function createProviderResolver(options: ProviderOptions): ProviderResolver {
  return (ref: OntologyRef): OntologyTermProvider => {
    const inline = options.terms?.[ref.prefix] ?? options.terms?.[ref.prefix.toLowerCase()];
    if (inline) {
      return new InMemoryTermProvider(inline, `inline:${ref.prefix}`);
    }

    if (options.ontologyDir) {
      const path = join(options.ontologyDir, `${ref.prefix.toLowerCase()}.json`);
      if (existsSync(path)) {
        return new JsonFileTermProvider(path);
      }
    }

    if (options.bioportalApiKey) {
      return new BioPortalProvider({
        apiKey: options.bioportalApiKey,
        ontology: ref.prefix,
        baseUrl: options.bioportalUrl,
        timeout: options.timeout,
        fetchFn: options.fetchFn,
      });
    }

    throw new ConfigurationError(
      `No term source for ontology ${ref.key}: add ${ref.prefix.toLowerCase()}.json to the ontology directory or set BIOPORTAL_API_KEY`
    );
  };
}
