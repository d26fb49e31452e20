/**
 * Error taxonomy
 *
 * Fatal problems are thrown as PipelineError subclasses. Row-scoped problems
 * are never thrown; they are recorded as diagnostics (see diagnostics.ts).
 */

export type PipelineErrorCode =
  | 'CONFIGURATION'     // Malformed mapping declarations, bad config file
  | 'IDENTIFIER_MATCH'  // Required column absent from a table
  | 'EXTRACTION'        // Data source could not produce a table
  | 'STRATEGY'          // Structural failure inside a strategy
  | 'CACHE'             // Backing provider failed for one key
  | 'ONTOLOGY_LOOKUP'   // Key not found in an ontology
  | 'INVALID_ID'        // Lexically invalid ontology id
  | 'LOAD';             // Loader could not store records

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    code: PipelineErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { code: PipelineErrorCode; message: string; details: Record<string, unknown> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class ConfigurationError extends PipelineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION', issues.length > 0 ? `${message}:\n- ${issues.join('\n- ')}` : message, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class IdentifierMatchError extends PipelineError {
  public readonly table: string;
  public readonly identifier: string;

  constructor(table: string, identifier: string, message: string) {
    super('IDENTIFIER_MATCH', message, { table, identifier });
    this.name = 'IdentifierMatchError';
    this.table = table;
    this.identifier = identifier;
  }
}

export class ExtractionError extends PipelineError {
  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('EXTRACTION', message, { source }, options);
    this.name = 'ExtractionError';
  }
}

export class StrategyError extends PipelineError {
  public readonly strategy: string;
  public readonly table: string;

  constructor(strategy: string, table: string, message: string, options?: { cause?: unknown }) {
    super('STRATEGY', `[${strategy}] ${message}`, { strategy, table }, options);
    this.name = 'StrategyError';
    this.strategy = strategy;
    this.table = table;
  }
}

export class CacheError extends PipelineError {
  public readonly key: string;

  constructor(ontology: string, key: string, message: string, options?: { cause?: unknown }) {
    super('CACHE', message, { ontology, key }, options);
    this.name = 'CacheError';
    this.key = key;
  }
}

export class OntologyLookupError extends PipelineError {
  public readonly ontology: string;
  public readonly key: string;

  constructor(ontology: string, key: string, message?: string, code: PipelineErrorCode = 'ONTOLOGY_LOOKUP') {
    super(code, message ?? `No term found for "${key}" in ${ontology}`, { ontology, key });
    this.name = 'OntologyLookupError';
    this.ontology = ontology;
    this.key = key;
  }
}

export class InvalidIdError extends OntologyLookupError {
  constructor(ontology: string, id: string) {
    super(ontology, id, `"${id}" is not a valid ${ontology} identifier`, 'INVALID_ID');
    this.name = 'InvalidIdError';
  }
}

export class LoadError extends PipelineError {
  public readonly recordId?: string;

  constructor(message: string, recordId?: string, options?: { cause?: unknown }) {
    super('LOAD', message, recordId ? { recordId } : {}, options);
    this.name = 'LoadError';
    this.recordId = recordId;
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
