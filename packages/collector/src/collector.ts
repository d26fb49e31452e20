/**
 * Collector
 *
 * Aggregates tagged rows, possibly from several tables and data sources,
 * into one record per subject.
 */

import { pino } from 'pino';
import {
  DiagnosticsReport,
  cellToString,
  contextKey,
  contextRole,
  isSubjectLevel,
  describeContext,
  type CellValue,
  type Context,
  type SeriesContext,
  type TableContext,
  type TaggedRow,
  type TaggedTable,
} from '@phenoxform/core';
import {
  createAggregate,
  toSubjectRecord,
  type BuildingBlock,
  type MeasurementEntry,
  type Origin,
  type SubjectAggregate,
  type SubjectRecord,
} from './record.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const TERM_SEPARATORS = /[\n\r\t,;]+/;

/** One (cell, series) pair of a row */
interface Binding {
  column: string;
  value: CellValue;
  series: SeriesContext;
}

function bindingsOf(row: TaggedRow): Binding[] {
  return row.cells.flatMap(cell => cell.series.map(series => ({ column: cell.column, value: cell.value, series })));
}

function isHeaderPhenotype(series: SeriesContext): boolean {
  return series.headerContext.kind === 'HpoLabelOrId' && series.dataContext.kind === 'ObservationStatus';
}

function isExcluded(value: CellValue): boolean {
  return cellToString(value)?.trim().toLowerCase() === 'excluded';
}

function text(value: CellValue): string | undefined {
  const result = cellToString(value)?.trim();
  return result && result.length > 0 ? result : undefined;
}

export class Collector {
  private readonly aggregates = new Map<string, SubjectAggregate>();
  private readonly report = new DiagnosticsReport();
  private rowsIngested = 0;

  get diagnostics(): DiagnosticsReport {
    return this.report;
  }

  get subjectCount(): number {
    return this.aggregates.size;
  }

  ingestTable(table: TaggedTable): void {
    for (const row of table.rows()) {
      this.ingest(row, table.context);
    }
    logger.debug({
      event: 'collector.table.ingested',
      table: table.name,
      source: table.source,
      rows: table.rowCount,
      subjects: this.aggregates.size,
    }, 'Ingested table');
  }

  ingest(row: TaggedRow, tableContext: TableContext, source: string = row.source): void {
    const bindings = bindingsOf(row);
    const idBinding = bindings.find(binding => binding.series.dataContext.kind === 'SubjectId' && text(binding.value));
    const subjectId = idBinding ? text(idBinding.value) : undefined;

    if (!subjectId) {
      this.report.add({
        kind: 'MissingSubjectId',
        message: `Row ${row.index} of table "${row.table}" has no subject id`,
        table: row.table,
        source,
        row: row.index,
        origin: 'collector',
      });
      return;
    }

    this.rowsIngested++;
    const aggregate = this.aggregateFor(subjectId);
    const sourceKey = `${source}/${row.table}`;
    if (!aggregate.sources.includes(sourceKey)) aggregate.sources.push(sourceKey);

    const origin = (column: string): Origin => ({ source, table: row.table, row: row.index, column });

    for (const binding of bindings) {
      if (binding.series.buildingBlockId !== undefined || binding.value === null) continue;
      this.addBinding(aggregate, binding, origin(binding.column), row, source);
    }

    for (const blockId of this.blockIds(tableContext)) {
      const members = bindings.filter(binding => binding.series.buildingBlockId === blockId);
      if (members.length === 0 || members.every(member => member.value === null)) continue;

      const missing = members.filter(member => member.value === null && !member.series.optional);
      if (missing.length > 0) {
        this.report.add({
          kind: 'IncompleteBlock',
          message: `Block "${blockId}" lacks required value(s) in: ${missing.map(member => member.column).join(', ')}`,
          table: row.table,
          source,
          row: row.index,
          subjectId,
          origin: 'collector',
        });
        continue;
      }

      const present = members.filter(member => member.value !== null);
      const block: BuildingBlock = {
        id: blockId,
        source,
        table: row.table,
        row: row.index,
        members: present.map(member => ({
          column: member.column,
          context: contextKey(member.series.dataContext),
          value: member.value,
        })),
      };
      const blocks = aggregate.blocks.get(blockId) ?? [];
      blocks.push(block);
      aggregate.blocks.set(blockId, blocks);

      this.addBlockEntries(aggregate, blockId, present, origin, row, source);
    }
  }

  /**
   * Immutable records sorted by subject id; resets the collector
   */
  finalize(): SubjectRecord[] {
    const records = [...this.aggregates.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map(toSubjectRecord);

    logger.info({
      event: 'collector.finalized',
      subjects: records.length,
      rows: this.rowsIngested,
      diagnostics: this.report.size,
    }, 'Collector finalized');

    this.aggregates.clear();
    this.rowsIngested = 0;
    return records;
  }

  private aggregateFor(subjectId: string): SubjectAggregate {
    const existing = this.aggregates.get(subjectId);
    if (existing) return existing;
    const created = createAggregate(subjectId);
    this.aggregates.set(subjectId, created);
    return created;
  }

  private blockIds(tableContext: TableContext): string[] {
    const ids: string[] = [];
    for (const series of tableContext.series) {
      if (series.buildingBlockId !== undefined && !ids.includes(series.buildingBlockId)) {
        ids.push(series.buildingBlockId);
      }
    }
    return ids;
  }

  private addBinding(aggregate: SubjectAggregate, binding: Binding, origin: Origin, row: TaggedRow, source: string): void {
    const { series, value } = binding;

    if (isHeaderPhenotype(series)) {
      aggregate.phenotypicFeatures.push({ id: binding.column, excluded: isExcluded(value), origin });
      return;
    }

    const context = series.dataContext;
    switch (contextRole(context)) {
      case 'identity':
      case 'none':
        return;
      case 'subject':
        this.setSubjectValue(aggregate, context, value, row, source, binding.column);
        return;
      case 'qualifier':
        logger.debug({
          event: 'collector.qualifier.unbound',
          table: row.table,
          column: binding.column,
          context: describeContext(context),
        }, 'Qualifier outside a building block ignored');
        return;
      case 'entry':
        this.addEntry(aggregate, context, value, origin);
        return;
    }
  }

  private addEntry(
    aggregate: SubjectAggregate,
    context: Context,
    value: CellValue,
    origin: Origin,
    qualifiers: { onset?: CellValue; excluded?: boolean; blockId?: string; range?: MeasurementEntry['referenceRange'] } = {}
  ): void {
    const { onset, blockId } = qualifiers;
    const id = text(value);
    if (id === undefined) return;

    switch (context.kind) {
      case 'HpoLabelOrId':
        aggregate.phenotypicFeatures.push({ id, excluded: qualifiers.excluded ?? false, onset, blockId, origin });
        return;
      case 'MultiHpoId':
        for (const term of id.split(TERM_SEPARATORS).map(part => part.trim()).filter(part => part.length > 0)) {
          aggregate.phenotypicFeatures.push({ id: term, excluded: qualifiers.excluded ?? false, onset, blockId, origin });
        }
        return;
      case 'DiseaseLabelOrId':
        aggregate.diseases.push({ id, onset, blockId, origin });
        return;
      case 'HgncSymbolOrId':
        aggregate.variants.push({ gene: id, blockId, origin });
        return;
      case 'Hgvs':
        aggregate.variants.push({ hgvs: id, blockId, origin });
        return;
      case 'QuantitativeMeasurement':
        aggregate.measurements.push({
          kind: 'quantitative',
          assayId: context.assayId,
          unitId: context.unitOntologyId,
          value,
          referenceRange: qualifiers.range,
          blockId,
          origin,
        });
        return;
      case 'QualitativeMeasurement':
        aggregate.measurements.push({
          kind: 'qualitative',
          assayId: context.assayId,
          value,
          referenceRange: qualifiers.range,
          blockId,
          origin,
        });
        return;
      default:
        return;
    }
  }

  private addBlockEntries(
    aggregate: SubjectAggregate,
    blockId: string,
    members: Binding[],
    origin: (column: string) => Origin,
    row: TaggedRow,
    source: string
  ): void {
    const valueOf = (predicate: (context: Context) => boolean): CellValue | undefined =>
      members.find(member => predicate(member.series.dataContext) && member.series.headerContext.kind === 'None')?.value;

    const onset = valueOf(context => context.kind === 'Onset');
    const status = valueOf(context => context.kind === 'ObservationStatus');
    const low = valueOf(context => context.kind === 'ReferenceRange' && context.boundary === 'start');
    const high = valueOf(context => context.kind === 'ReferenceRange' && context.boundary === 'end');
    const range = low !== undefined || high !== undefined ? { low, high } : undefined;
    const excluded = status !== undefined && isExcluded(status);

    const genes = members.filter(member => member.series.dataContext.kind === 'HgncSymbolOrId');
    const alleles = members.filter(member => member.series.dataContext.kind === 'Hgvs');
    const gene = genes.length > 0 ? text(genes[0].value) : undefined;

    for (const member of members) {
      const { series, value } = member;
      if (isHeaderPhenotype(series)) {
        aggregate.phenotypicFeatures.push({ id: member.column, excluded: isExcluded(value), onset, blockId, origin: origin(member.column) });
        continue;
      }

      const context = series.dataContext;
      if (context.kind === 'HgncSymbolOrId' || context.kind === 'Hgvs') continue;
      if (isSubjectLevel(context)) {
        this.setSubjectValue(aggregate, context, value, row, source, member.column);
        continue;
      }
      if (contextRole(context) === 'entry') {
        this.addEntry(aggregate, context, value, origin(member.column), { onset, excluded, blockId, range });
      }
    }

    if (alleles.length > 0) {
      for (const allele of alleles) {
        aggregate.variants.push({ gene, hgvs: text(allele.value), blockId, origin: origin(allele.column) });
      }
    } else if (gene !== undefined) {
      aggregate.variants.push({ gene, blockId, origin: origin(genes[0].column) });
    }
  }

  private setSubjectValue(
    aggregate: SubjectAggregate,
    context: Context,
    value: CellValue,
    row: TaggedRow,
    source: string,
    column: string
  ): void {
    const key = contextKey(context);
    const existing = aggregate.subject.get(key);
    if (existing === undefined) {
      aggregate.subject.set(key, value);
      return;
    }
    if (cellToString(existing) === cellToString(value)) return;

    this.report.add({
      kind: 'ConflictingValue',
      message: `${describeContext(context)} of subject "${aggregate.id}" is already "${String(existing)}"; "${String(value)}" ignored`,
      table: row.table,
      source,
      column,
      row: row.index,
      value,
      subjectId: aggregate.id,
      origin: 'collector',
    });
  }
}
