/**
 * Per-subject output records
 */

import type { CellValue } from '@phenoxform/core';

/** Where a value was read */
export interface Origin {
  source: string;
  table: string;
  row: number;
  column: string;
}

export interface PhenotypicFeature {
  id: string;
  excluded: boolean;
  onset?: CellValue;
  blockId?: string;
  origin: Origin;
}

export interface DiseaseEntry {
  id: string;
  onset?: CellValue;
  blockId?: string;
  origin: Origin;
}

export interface VariantEntry {
  gene?: string;
  hgvs?: string;
  blockId?: string;
  origin: Origin;
}

export interface ReferenceRange {
  low?: CellValue;
  high?: CellValue;
}

export interface MeasurementEntry {
  kind: 'quantitative' | 'qualitative';
  assayId: string;
  value: CellValue;
  unitId?: string;
  referenceRange?: ReferenceRange;
  blockId?: string;
  origin: Origin;
}

export interface BlockMember {
  column: string;
  /** contextKey of the member's data context */
  context: string;
  value: CellValue;
}

/** One grouped sub-record: the members of a building block in one row */
export interface BuildingBlock {
  id: string;
  source: string;
  table: string;
  row: number;
  members: BlockMember[];
}

export interface SubjectRecord {
  readonly id: string;
  /** Subject-level values keyed by contextKey (e.g. SubjectSex, Onset(age)) */
  readonly subject: Readonly<Record<string, CellValue>>;
  readonly phenotypicFeatures: readonly Readonly<PhenotypicFeature>[];
  readonly diseases: readonly Readonly<DiseaseEntry>[];
  readonly variants: readonly Readonly<VariantEntry>[];
  readonly measurements: readonly Readonly<MeasurementEntry>[];
  readonly blocks: Readonly<Record<string, readonly Readonly<BuildingBlock>[]>>;
  /** "source/table" pairs that contributed, in first-seen order */
  readonly sources: readonly string[];
}

/**
 * Mutable accumulator for one subject
 */
export interface SubjectAggregate {
  id: string;
  subject: Map<string, CellValue>;
  phenotypicFeatures: PhenotypicFeature[];
  diseases: DiseaseEntry[];
  variants: VariantEntry[];
  measurements: MeasurementEntry[];
  blocks: Map<string, BuildingBlock[]>;
  sources: string[];
}

export function createAggregate(id: string): SubjectAggregate {
  return {
    id,
    subject: new Map(),
    phenotypicFeatures: [],
    diseases: [],
    variants: [],
    measurements: [],
    blocks: new Map(),
    sources: [],
  };
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Immutable projection of an aggregate
 */
export function toSubjectRecord(aggregate: SubjectAggregate): SubjectRecord {
  return deepFreeze({
    id: aggregate.id,
    subject: Object.fromEntries(aggregate.subject),
    phenotypicFeatures: aggregate.phenotypicFeatures.map(entry => ({ ...entry })),
    diseases: aggregate.diseases.map(entry => ({ ...entry })),
    variants: aggregate.variants.map(entry => ({ ...entry })),
    measurements: aggregate.measurements.map(entry => ({ ...entry })),
    blocks: Object.fromEntries(
      [...aggregate.blocks].map(([id, blocks]): [string, BuildingBlock[]] => [id, blocks.map(block => ({ ...block, members: [...block.members] }))])
    ),
    sources: [...aggregate.sources],
  });
}
