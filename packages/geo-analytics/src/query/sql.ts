import type { AggregateExpression, CellExpression, QueryPredicate, QuerySpec } from './types';
import { CELL_ALIAS, VALUE_ALIAS } from './types';

export type SqlBind = string | number;

export interface RenderedSql {
  text: string;
  binds: SqlBind[];
}

export function quoteIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/** Quotes each part of a dotted `DATABASE.SCHEMA.TABLE` name. */
export function quoteQualifiedName(value: string): string {
  return value
    .split('.')
    .map((part) => quoteIdentifier(part))
    .join('.');
}

function renderCell(cell: CellExpression, binds: SqlBind[]): string {
  const column = quoteIdentifier(cell.column);
  switch (cell.kind) {
    case 'column':
      return column;
    case 'pointToCell':
      binds.push(cell.resolution);
      return `H3_POINT_TO_CELL_STRING(TO_GEOGRAPHY(${column}), ?)`;
    case 'cellToParent':
      binds.push(cell.resolution);
      return `H3_CELL_TO_PARENT(${column}, ?)`;
  }
}

function renderAggregate(aggregate: AggregateExpression): string {
  const argument = aggregate.column === null ? '*' : quoteIdentifier(aggregate.column);
  return `${aggregate.fn}(${argument})`;
}

function renderPredicate(predicate: QueryPredicate, binds: SqlBind[]): string {
  const column = quoteIdentifier(predicate.column);
  switch (predicate.kind) {
    case 'notNull':
      return `${column} IS NOT NULL`;
    case 'dateBetween':
      binds.push(predicate.start, predicate.end);
      return `TO_DATE(${column}) BETWEEN ? AND ?`;
    case 'timeOfDayBetween':
      binds.push(predicate.start, predicate.end);
      return `TO_TIME(${column}) BETWEEN ? AND ?`;
  }
}

function renderWhere(predicates: readonly QueryPredicate[], binds: SqlBind[]): string {
  if (predicates.length === 0) {
    return '';
  }
  return ` WHERE ${predicates.map((predicate) => renderPredicate(predicate, binds)).join(' AND ')}`;
}

/**
 * Renders a query for a warehouse that speaks Snowflake's H3 functions.
 * Identifiers are quoted; every caller-supplied value becomes a positional
 * `?` bind.
 */
export function renderSql(query: QuerySpec): RenderedSql {
  const binds: SqlBind[] = [];
  const source = quoteQualifiedName(query.source);

  if (query.kind === 'select') {
    const columns = query.columns
      .map(({ alias, column }) => `${quoteIdentifier(column)} AS ${quoteIdentifier(alias)}`)
      .join(', ');
    const where = renderWhere(query.predicates, binds);
    return { text: `SELECT ${columns} FROM ${source}${where}`, binds };
  }

  const cell = renderCell(query.cell, binds);
  const aggregate = renderAggregate(query.aggregate);
  const where = renderWhere(query.predicates, binds);
  const cellAlias = quoteIdentifier(CELL_ALIAS);
  return {
    text: `SELECT ${cell} AS ${cellAlias}, ${aggregate} AS ${quoteIdentifier(VALUE_ALIAS)} FROM ${source}${where} GROUP BY ${cellAlias}`,
    binds
  };
}
