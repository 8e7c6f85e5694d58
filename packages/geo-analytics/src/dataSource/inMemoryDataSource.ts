import { cellToParent, latLngToCell } from 'h3-js';
import { DataSourceError } from '../errors';
import type { AggregateQuerySpec, CellExpression, QueryPredicate, QuerySpec, SelectQuerySpec } from '../query/types';
import { CELL_ALIAS, VALUE_ALIAS } from '../query/types';
import { datePart, normalizeTimestamp, timePart } from '../timeseries/window';
import type { DataRow, DataSource } from './types';
import { isPresent, parsePoint, toFiniteNumber } from './values';

function matches(row: DataRow, predicate: QueryPredicate): boolean {
  const value = row[predicate.column];
  switch (predicate.kind) {
    case 'notNull':
      return isPresent(value);
    case 'dateBetween': {
      const timestamp = normalizeTimestamp(value);
      if (!timestamp) {
        return false;
      }
      const date = datePart(timestamp);
      return date >= predicate.start && date <= predicate.end;
    }
    case 'timeOfDayBetween': {
      const timestamp = normalizeTimestamp(value);
      if (!timestamp) {
        return false;
      }
      const time = timePart(timestamp);
      return time >= predicate.start && time <= predicate.end;
    }
  }
}

function evaluateCell(row: DataRow, cell: CellExpression): string | null {
  const value = row[cell.column];
  if (!isPresent(value)) {
    return null;
  }
  switch (cell.kind) {
    case 'column':
      return String(value);
    case 'cellToParent':
      return cellToParent(String(value), cell.resolution);
    case 'pointToCell': {
      const point = parsePoint(value);
      return point ? latLngToCell(point.latitude, point.longitude, cell.resolution) : null;
    }
  }
}

interface Accumulator {
  rows: number;
  values: number;
  sum: number;
}

/**
 * Evaluates query specs over rows held in memory, with the semantics the
 * rendered SQL has in the warehouse. Used by tests and local tooling.
 */
export class InMemoryDataSource implements DataSource {
  private readonly tables = new Map<string, DataRow[]>();

  constructor(tables: Record<string, DataRow[]> = {}) {
    for (const [source, rows] of Object.entries(tables)) {
      this.register(source, rows);
    }
  }

  register(source: string, rows: DataRow[]): void {
    this.tables.set(source, rows.map((row) => ({ ...row })));
  }

  async execute(query: QuerySpec): Promise<DataRow[]> {
    const rows = this.tables.get(query.source);
    if (!rows) {
      throw new DataSourceError(`Unknown source '${query.source}'`, { source: query.source });
    }
    const filtered = rows.filter((row) => query.predicates.every((predicate) => matches(row, predicate)));
    try {
      return query.kind === 'select' ? this.select(query, filtered) : this.aggregate(query, filtered);
    } catch (err) {
      if (err instanceof DataSourceError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new DataSourceError(`Query against '${query.source}' failed: ${message}`, {
        source: query.source,
        cause: err
      });
    }
  }

  private select(query: SelectQuerySpec, rows: DataRow[]): DataRow[] {
    return rows.map((row) => {
      const projected: DataRow = {};
      for (const { alias, column } of query.columns) {
        projected[alias] = row[column] ?? null;
      }
      return projected;
    });
  }

  private aggregate(query: AggregateQuerySpec, rows: DataRow[]): DataRow[] {
    const groups = new Map<string, Accumulator>();
    const { column, fn } = query.aggregate;

    for (const row of rows) {
      const cellId = evaluateCell(row, query.cell);
      if (cellId === null) {
        continue;
      }
      const group = groups.get(cellId) ?? { rows: 0, values: 0, sum: 0 };
      group.rows += 1;
      if (column !== null) {
        const value = toFiniteNumber(row[column]);
        if (value !== null) {
          group.values += 1;
          group.sum += value;
        }
      }
      groups.set(cellId, group);
    }

    const result: DataRow[] = [];
    for (const [cellId, group] of groups) {
      let value: number | null;
      if (fn === 'COUNT') {
        value = column === null ? group.rows : group.values;
      } else if (group.values === 0) {
        value = null;
      } else {
        value = fn === 'SUM' ? group.sum : group.sum / group.values;
      }
      result.push({ [CELL_ALIAS]: cellId, [VALUE_ALIAS]: value });
    }
    return result;
  }
}
