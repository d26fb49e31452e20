/**
 * Semantic context model
 *
 * A Context names the role of a column header or of a cell value. The set is
 * closed: every consumer that branches on it switches over `kind` and ends in
 * assertNever, so a new variant does not compile until each one handles it.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export type TimeElementType = 'age' | 'date';
export type Boundary = 'start' | 'end';

export type Context =
  // individual
  | { kind: 'SubjectId' }
  | { kind: 'SubjectSex' }
  | { kind: 'DateOfBirth' }
  | { kind: 'VitalStatus' }
  | { kind: 'LastEncounter'; time: TimeElementType }
  | { kind: 'TimeOfDeath'; time: TimeElementType }
  | { kind: 'CauseOfDeath' }
  | { kind: 'SurvivalTimeDays' }
  // ontologies and databases
  | { kind: 'HpoLabelOrId' }
  | { kind: 'DiseaseLabelOrId' }
  | { kind: 'HgncSymbolOrId' }
  // variants
  | { kind: 'Hgvs' }
  // measurements
  | { kind: 'QuantitativeMeasurement'; assayId: string; unitOntologyId: string }
  | { kind: 'QualitativeMeasurement'; assayId: string }
  | { kind: 'ReferenceRange'; boundary: Boundary }
  // other
  | { kind: 'ObservationStatus' }
  | { kind: 'MultiHpoId' }
  | { kind: 'Onset'; time: TimeElementType }
  | { kind: 'None' };

export type ContextKind = Context['kind'];

/**
 * How the collector treats a value carrying this context
 *
 * - identity: the subject identifier
 * - subject: one value per subject
 * - entry: every value is its own entry (phenotype, disease, measurement...)
 * - qualifier: refines an entry inside a building block (onset, status, range)
 * - none: untagged
 */
export type ContextRole = 'identity' | 'subject' | 'entry' | 'qualifier' | 'none';

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

const SIMPLE_CONTEXT_NAMES = [
  'subject_id',
  'subject_sex',
  'date_of_birth',
  'vital_status',
  'cause_of_death',
  'survival_time_days',
  'hpo_label_or_id',
  'disease_label_or_id',
  'hgnc_symbol_or_id',
  'hgvs',
  'observation_status',
  'multi_hpo_id',
  'none',
] as const;

type SimpleContextName = (typeof SIMPLE_CONTEXT_NAMES)[number];

const SIMPLE_CONTEXTS = {
  subject_id: { kind: 'SubjectId' },
  subject_sex: { kind: 'SubjectSex' },
  date_of_birth: { kind: 'DateOfBirth' },
  vital_status: { kind: 'VitalStatus' },
  cause_of_death: { kind: 'CauseOfDeath' },
  survival_time_days: { kind: 'SurvivalTimeDays' },
  hpo_label_or_id: { kind: 'HpoLabelOrId' },
  disease_label_or_id: { kind: 'DiseaseLabelOrId' },
  hgnc_symbol_or_id: { kind: 'HgncSymbolOrId' },
  hgvs: { kind: 'Hgvs' },
  observation_status: { kind: 'ObservationStatus' },
  multi_hpo_id: { kind: 'MultiHpoId' },
  none: { kind: 'None' },
} satisfies Record<SimpleContextName, Context>;

export const NONE: Context = SIMPLE_CONTEXTS.none;

const TimeElementSchema = z.enum(['age', 'date']);

export const ContextConfigSchema = z.union([
  z.enum(SIMPLE_CONTEXT_NAMES),
  z.object({ last_encounter: TimeElementSchema }).strict(),
  z.object({ time_of_death: TimeElementSchema }).strict(),
  z.object({ onset: TimeElementSchema }).strict(),
  z.object({ reference_range: z.enum(['start', 'end']) }).strict(),
  z.object({
    quantitative_measurement: z.object({
      assay_id: z.string().min(1),
      unit_ontology_id: z.string().min(1),
    }),
  }).strict(),
  z.object({
    qualitative_measurement: z.object({ assay_id: z.string().min(1) }),
  }).strict(),
]);

export type ContextConfig = z.infer<typeof ContextConfigSchema>;

/**
 * Convert the snake_case configuration form into a Context
 */
export function contextFromConfig(config: ContextConfig): Context {
  if (typeof config === 'string') {
    return SIMPLE_CONTEXTS[config];
  }
  if ('last_encounter' in config) {
    return { kind: 'LastEncounter', time: config.last_encounter };
  }
  if ('time_of_death' in config) {
    return { kind: 'TimeOfDeath', time: config.time_of_death };
  }
  if ('onset' in config) {
    return { kind: 'Onset', time: config.onset };
  }
  if ('reference_range' in config) {
    return { kind: 'ReferenceRange', boundary: config.reference_range };
  }
  if ('quantitative_measurement' in config) {
    return {
      kind: 'QuantitativeMeasurement',
      assayId: config.quantitative_measurement.assay_id,
      unitOntologyId: config.quantitative_measurement.unit_ontology_id,
    };
  }
  return { kind: 'QualitativeMeasurement', assayId: config.qualitative_measurement.assay_id };
}

/**
 * Parse an untrusted configuration value into a Context
 */
export function parseContext(raw: unknown): Context {
  const parsed = ContextConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unknown context ${JSON.stringify(raw)}`,
      parsed.error.issues.map(issue => issue.message)
    );
  }
  return contextFromConfig(parsed.data);
}

/**
 * Canonical string form. Contexts with identical payload share a key.
 */
export function contextKey(ctx: Context): string {
  switch (ctx.kind) {
    case 'LastEncounter':
    case 'TimeOfDeath':
    case 'Onset':
      return `${ctx.kind}(${ctx.time})`;
    case 'QuantitativeMeasurement':
      return `${ctx.kind}(${ctx.assayId},${ctx.unitOntologyId})`;
    case 'QualitativeMeasurement':
      return `${ctx.kind}(${ctx.assayId})`;
    case 'ReferenceRange':
      return `${ctx.kind}(${ctx.boundary})`;
    case 'SubjectId':
    case 'SubjectSex':
    case 'DateOfBirth':
    case 'VitalStatus':
    case 'CauseOfDeath':
    case 'SurvivalTimeDays':
    case 'HpoLabelOrId':
    case 'DiseaseLabelOrId':
    case 'HgncSymbolOrId':
    case 'Hgvs':
    case 'ObservationStatus':
    case 'MultiHpoId':
    case 'None':
      return ctx.kind;
    default:
      return assertNever(ctx);
  }
}

export function contextEquals(a: Context, b: Context): boolean {
  return contextKey(a) === contextKey(b);
}

export function contextRole(ctx: Context): ContextRole {
  switch (ctx.kind) {
    case 'SubjectId':
      return 'identity';
    case 'SubjectSex':
    case 'DateOfBirth':
    case 'VitalStatus':
    case 'LastEncounter':
    case 'TimeOfDeath':
    case 'CauseOfDeath':
    case 'SurvivalTimeDays':
      return 'subject';
    case 'HpoLabelOrId':
    case 'DiseaseLabelOrId':
    case 'HgncSymbolOrId':
    case 'Hgvs':
    case 'QuantitativeMeasurement':
    case 'QualitativeMeasurement':
    case 'MultiHpoId':
      return 'entry';
    case 'ReferenceRange':
    case 'ObservationStatus':
    case 'Onset':
      return 'qualifier';
    case 'None':
      return 'none';
    default:
      return assertNever(ctx);
  }
}

/**
 * Contexts whose values are ontology labels or identifiers
 */
export function isOntologyContext(ctx: Context): boolean {
  switch (ctx.kind) {
    case 'HpoLabelOrId':
    case 'DiseaseLabelOrId':
    case 'HgncSymbolOrId':
    case 'MultiHpoId':
      return true;
    case 'SubjectId':
    case 'SubjectSex':
    case 'DateOfBirth':
    case 'VitalStatus':
    case 'LastEncounter':
    case 'TimeOfDeath':
    case 'CauseOfDeath':
    case 'SurvivalTimeDays':
    case 'Hgvs':
    case 'QuantitativeMeasurement':
    case 'QualitativeMeasurement':
    case 'ReferenceRange':
    case 'ObservationStatus':
    case 'Onset':
    case 'None':
      return false;
    default:
      return assertNever(ctx);
  }
}

/**
 * Single-valued per subject (sex, date of birth, vital status, ...)
 */
export function isSubjectLevel(ctx: Context): boolean {
  return contextRole(ctx) === 'subject';
}

/**
 * Human-readable form for logs and diagnostics
 */
export function describeContext(ctx: Context): string {
  switch (ctx.kind) {
    case 'LastEncounter':
    case 'TimeOfDeath':
    case 'Onset':
      return `${ctx.kind} (${ctx.time})`;
    case 'QuantitativeMeasurement':
      return `${ctx.kind} of ${ctx.assayId} in ${ctx.unitOntologyId}`;
    case 'QualitativeMeasurement':
      return `${ctx.kind} of ${ctx.assayId}`;
    case 'ReferenceRange':
      return `${ctx.kind} ${ctx.boundary}`;
    default:
      return ctx.kind;
  }
}
