/**
 * Term providers backed by a local term list
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ExtractionError, errorMessage } from '@phenoxform/core';
import type { OntologyTerm, OntologyTermProvider } from '../types.js';

export const OntologyTermSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  synonyms: z.array(z.string()).default([]),
});

export const TermFileSchema = z.array(OntologyTermSchema);

function idKey(id: string): string {
  const trimmed = id.trim();
  const separator = trimmed.indexOf(':');
  return separator > 0
    ? `${trimmed.slice(0, separator).toUpperCase()}${trimmed.slice(separator)}`
    : trimmed;
}

function labelKey(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Provider over an in-memory term list
 *
 * Ids are compared with an upper-cased prefix; labels and synonyms
 * case-insensitively.
 */
export class InMemoryTermProvider implements OntologyTermProvider {
  readonly name: string;
  private readonly byId = new Map<string, OntologyTerm>();
  private readonly byLabel = new Map<string, OntologyTerm>();

  constructor(terms: OntologyTerm[], name = 'in-memory') {
    this.name = name;
    for (const term of terms) {
      this.byId.set(idKey(term.id), term);
      this.byLabel.set(labelKey(term.label), term);
    }
    // Labels win over synonyms when both collide
    for (const term of terms) {
      for (const synonym of term.synonyms) {
        const key = labelKey(synonym);
        if (!this.byLabel.has(key)) this.byLabel.set(key, term);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  async lookupById(id: string): Promise<OntologyTerm | undefined> {
    return this.byId.get(idKey(id));
  }

  async lookupByLabel(labelOrSynonym: string): Promise<OntologyTerm | undefined> {
    return this.byLabel.get(labelKey(labelOrSynonym));
  }
}

/**
 * Provider over a JSON term file, read on first lookup
 */
export class JsonFileTermProvider implements OntologyTermProvider {
  readonly name: string;
  private readonly path: string;
  private loading?: Promise<InMemoryTermProvider>;

  constructor(path: string) {
    this.path = path;
    this.name = `file:${path}`;
  }

  async lookupById(id: string): Promise<OntologyTerm | undefined> {
    const terms = await this.load();
    return terms.lookupById(id);
  }

  async lookupByLabel(labelOrSynonym: string): Promise<OntologyTerm | undefined> {
    const terms = await this.load();
    return terms.lookupByLabel(labelOrSynonym);
  }

  private load(): Promise<InMemoryTermProvider> {
    if (!this.loading) {
      this.loading = this.read().catch((error: unknown) => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  private async read(): Promise<InMemoryTermProvider> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new ExtractionError(this.path, `Cannot read term file: ${errorMessage(error)}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ExtractionError(this.path, `Term file is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = TermFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExtractionError(this.path, `Malformed term file: ${parsed.error.message}`);
    }
    return new InMemoryTermProvider(parsed.data, this.name);
  }
}
