/**
 * Ontology references
 *
 * (prefix, version) identifying an ontology or controlled vocabulary.
 */

/**
 * Local-part grammar of identifiers per known prefix
 */
export const KNOWN_ID_PATTERNS: Record<string, RegExp> = {
  HP: /^\d{7}$/,
  MONDO: /^\d{7}$/,
  OMIM: /^\d{6}$/,
  ORPHA: /^\d+$/,
  HGNC: /^\d+$/,
  GENO: /^\d{7}$/,
  UO: /^\d{7}$/,
  LOINC: /^\d+-\d$/,
};

const GENERIC_LOCAL_ID = /^[A-Za-z0-9_.-]+$/;

export const LATEST = 'latest';

export class OntologyRef {
  readonly prefix: string;
  readonly version: string;

  constructor(prefix: string, version?: string) {
    this.prefix = prefix.trim().toUpperCase();
    this.version = version && version.trim().length > 0 ? version.trim() : LATEST;
  }

  /**
   * From a free-text prefix, case-insensitive ("hp", "Mondo")
   */
  static from(prefix: string): OntologyRef {
    return new OntologyRef(prefix);
  }

  static hp(version?: string): OntologyRef {
    return new OntologyRef('HP', version);
  }

  static mondo(version?: string): OntologyRef {
    return new OntologyRef('MONDO', version);
  }

  static omim(version?: string): OntologyRef {
    return new OntologyRef('OMIM', version);
  }

  static hgnc(version?: string): OntologyRef {
    return new OntologyRef('HGNC', version);
  }

  get key(): string {
    return `${this.prefix}:${this.version}`;
  }

  get localIdPattern(): RegExp {
    return KNOWN_ID_PATTERNS[this.prefix] ?? GENERIC_LOCAL_ID;
  }

  equals(other: OntologyRef): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.key;
  }
}

/**
 * Canonical CURIE if the value has this ontology's id grammar
 *
 * The prefix is matched case-insensitively and upper-cased; the local part
 * must satisfy the prefix's grammar.
 */
export function canonicalId(ref: OntologyRef, value: string): string | undefined {
  const trimmed = value.trim();
  const separator = trimmed.indexOf(':');
  if (separator <= 0) return undefined;

  const prefix = trimmed.slice(0, separator).toUpperCase();
  const local = trimmed.slice(separator + 1);
  if (prefix !== ref.prefix || !ref.localIdPattern.test(local)) {
    return undefined;
  }
  return `${prefix}:${local}`;
}

/**
 * Whether the value carries this ontology's prefix, valid local part or not
 */
export function hasOwnPrefix(ref: OntologyRef, value: string): boolean {
  const trimmed = value.trim();
  const separator = trimmed.indexOf(':');
  return separator > 0 && trimmed.slice(0, separator).toUpperCase() === ref.prefix;
}

/**
 * Whether a string looks like any CURIE (PREFIX:local)
 */
export function isCurie(value: string): boolean {
  return /^[A-Za-z][A-Za-z0-9_.-]*:[A-Za-z0-9_.-]+$/.test(value.trim());
}
