/**
 * Column identifiers
 *
 * An Identifier selects the physical columns a SeriesContext applies to.
 */

import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';

export type Identifier =
  | { kind: 'exact'; name: string }
  | { kind: 'regex'; pattern: string }
  | { kind: 'list'; names: string[] };

export interface IdentifierResolution {
  /** Bound headers, in table order for regex, in declared order otherwise */
  matched: string[];
  /** Declared names absent from the headers (exact and list only) */
  missing: string[];
}

export function exact(name: string): Identifier {
  return { kind: 'exact', name };
}

/**
 * Regex identifier. The pattern is compiled eagerly so a bad pattern fails
 * at declaration time rather than mid-run.
 */
export function regex(pattern: string): Identifier {
  compilePattern(pattern);
  return { kind: 'regex', pattern };
}

export function list(names: string[]): Identifier {
  return { kind: 'list', names: [...names] };
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(`Invalid regex identifier "${pattern}": ${errorMessage(error)}`);
  }
}

/**
 * Resolve an identifier against the headers of a table
 *
 * A regex pattern that equals a header literally binds that header alone;
 * otherwise every header containing a match is bound.
 */
export function resolveIdentifier(identifier: Identifier, headers: readonly string[]): IdentifierResolution {
  switch (identifier.kind) {
    case 'exact':
      return headers.includes(identifier.name)
        ? { matched: [identifier.name], missing: [] }
        : { matched: [], missing: [identifier.name] };
    case 'list': {
      const matched = identifier.names.filter(name => headers.includes(name));
      const missing = identifier.names.filter(name => !headers.includes(name));
      return { matched, missing };
    }
    case 'regex': {
      if (headers.includes(identifier.pattern)) {
        return { matched: [identifier.pattern], missing: [] };
      }
      const re = compilePattern(identifier.pattern);
      return { matched: headers.filter(header => re.test(header)), missing: [] };
    }
  }
}

export function describeIdentifier(identifier: Identifier): string {
  switch (identifier.kind) {
    case 'exact':
      return identifier.name;
    case 'regex':
      return `/${identifier.pattern}/`;
    case 'list':
      return `[${identifier.names.join(', ')}]`;
  }
}

export const IdentifierConfigSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
  z.object({ regex: z.string().min(1) }).strict(),
  z.object({ list: z.array(z.string().min(1)).min(1) }).strict(),
]);

export type IdentifierConfig = z.infer<typeof IdentifierConfigSchema>;

/**
 * A plain string is an exact column name; an array is a list.
 */
export function identifierFromConfig(config: IdentifierConfig): Identifier {
  if (typeof config === 'string') {
    return exact(config);
  }
  if (Array.isArray(config)) {
    return list(config);
  }
  if ('regex' in config) {
    return regex(config.regex);
  }
  return list(config.list);
}
