import type { AggFunction, LocalDate, TimeOfDay } from '../types';

export type CellExpression =
  | { kind: 'column'; column: string }
  | { kind: 'pointToCell'; column: string; resolution: number }
  | { kind: 'cellToParent'; column: string; resolution: number };

export interface AggregateExpression {
  fn: AggFunction;
  /** Null counts rows. */
  column: string | null;
}

export type QueryPredicate =
  | { kind: 'notNull'; column: string }
  | { kind: 'dateBetween'; column: string; start: LocalDate; end: LocalDate }
  | { kind: 'timeOfDayBetween'; column: string; start: TimeOfDay; end: TimeOfDay };

/** Column aliases every aggregate query returns. */
export const CELL_ALIAS = 'cell_id';
export const VALUE_ALIAS = 'value';

export interface AggregateQuerySpec {
  kind: 'aggregate';
  source: string;
  cell: CellExpression;
  aggregate: AggregateExpression;
  predicates: readonly QueryPredicate[];
  groupBy: readonly [typeof CELL_ALIAS];
}

export interface SelectColumn {
  alias: string;
  column: string;
}

export interface SelectQuerySpec {
  kind: 'select';
  source: string;
  columns: readonly SelectColumn[];
  predicates: readonly QueryPredicate[];
}

export type QuerySpec = AggregateQuerySpec | SelectQuerySpec;
