/**
 * Row-scoped diagnostics
 *
 * Problems that concern one cell or one row are recorded here and processing
 * continues. The report travels back to the caller with the results.
 */

import type { CellValue } from './table.js';

export type DiagnosticKind =
  | 'TypeCoercion'      // alias map output could not be coerced
  | 'OntologyLookup'    // value not resolvable in the ontology
  | 'MappingViolation'  // value outside a controlled vocabulary
  | 'MissingSubjectId'  // row without a subject identifier
  | 'IncompleteBlock'   // building block with a null required member
  | 'ConflictingValue'; // subject-level field seen with two values

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  table: string;
  source?: string;
  column?: string;
  row?: number;
  value?: CellValue;
  subjectId?: string;
  /** Strategy or component that raised it */
  origin?: string;
}

export class DiagnosticsReport {
  private readonly entries: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
  }

  merge(other: DiagnosticsReport): void {
    this.entries.push(...other.all);
  }

  get all(): readonly Diagnostic[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  byKind(kind: DiagnosticKind): Diagnostic[] {
    return this.entries.filter(entry => entry.kind === kind);
  }

  countByKind(): Partial<Record<DiagnosticKind, number>> {
    const counts: Partial<Record<DiagnosticKind, number>> = {};
    for (const entry of this.entries) {
      counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    }
    return counts;
  }

  clear(): void {
    this.entries.length = 0;
  }

  toJSON(): Diagnostic[] {
    return [...this.entries];
  }
}
