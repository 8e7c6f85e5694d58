import type { ZodIssue } from 'zod';
import {
  DEFAULT_CATALOG,
  resolveDataset,
  resolveDimension,
  resolveMetric,
  type DatasetCatalog,
  type DatasetDefinition,
  type DimensionDefinition
} from '../catalog/datasets';
import {
  InvalidRangeError,
  InvalidResolutionError,
  UnknownFieldError,
  UnsupportedAggregationError
} from '../errors';
import type { AggregationSpec } from '../types';
import { aggregationSpecSchema, type AggregationSpecInput } from './schemas';
import {
  CELL_ALIAS,
  type AggregateQuerySpec,
  type CellExpression,
  type QueryPredicate
} from './types';

export interface ResolutionRange {
  min: number;
  max: number;
}

export const DEFAULT_RESOLUTION_RANGE: ResolutionRange = { min: 1, max: 15 };

export interface QueryBuilderOptions {
  catalog?: DatasetCatalog;
  /** Service-wide bounds; datasets and cell columns can only narrow them. */
  resolution?: ResolutionRange;
}

function toDomainError(issue: ZodIssue, input: AggregationSpecInput, range: ResolutionRange): Error {
  const [field] = issue.path;
  switch (field) {
    case 'resolution':
      return new InvalidResolutionError(Number(input.resolution), range);
    case 'aggFunction':
      return new UnsupportedAggregationError(String(input.aggFunction));
    case 'dataset':
    case 'dimension':
    case 'metric':
      return new UnknownFieldError(field, String(input[field]), `${field}: ${issue.message}`);
    default:
      return new InvalidRangeError(`${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * Validates and normalizes caller parameters. Shape and format problems
 * surface as the matching domain error; nothing is coerced silently.
 */
export function parseAggregationSpec(
  input: AggregationSpecInput,
  range: ResolutionRange = DEFAULT_RESOLUTION_RANGE
): AggregationSpec {
  const parsed = aggregationSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw toDomainError(parsed.error.issues[0], input, range);
  }
  return parsed.data;
}

export function resolveResolutionRange(
  dataset: DatasetDefinition,
  dimension: DimensionDefinition,
  base: ResolutionRange = DEFAULT_RESOLUTION_RANGE
): ResolutionRange {
  let min = base.min;
  let max = base.max;
  if (dataset.resolution) {
    min = Math.max(min, dataset.resolution.min);
    max = Math.min(max, dataset.resolution.max);
  }
  if (dimension.kind === 'cell') {
    max = Math.min(max, dimension.nativeResolution);
  }
  return { min, max };
}

function buildCellExpression(dimension: DimensionDefinition, resolution: number): CellExpression {
  if (dimension.kind === 'point') {
    return { kind: 'pointToCell', column: dimension.column, resolution };
  }
  if (resolution === dimension.nativeResolution) {
    return { kind: 'column', column: dimension.column };
  }
  return { kind: 'cellToParent', column: dimension.column, resolution };
}

function buildTimePredicates(datasetName: string, dataset: DatasetDefinition, spec: AggregationSpec): QueryPredicate[] {
  const column = dataset.timestampColumn;
  if (!column) {
    if (spec.dateRange || spec.timeRange) {
      throw new InvalidRangeError(
        `Dataset '${datasetName}' has no timestamp column; dateRange and timeRange are not supported`
      );
    }
    return [];
  }
  if (!spec.dateRange) {
    throw new InvalidRangeError(`Dataset '${datasetName}' requires a dateRange`);
  }

  const predicates: QueryPredicate[] = [
    { kind: 'dateBetween', column, start: spec.dateRange.start, end: spec.dateRange.end }
  ];
  // start > end is an empty window, not a validation error
  if (spec.timeRange) {
    predicates.push({ kind: 'timeOfDayBetween', column, start: spec.timeRange.start, end: spec.timeRange.end });
  }
  return predicates;
}

/**
 * Builds the structured aggregation query for one map layer. Every
 * identifier comes from the catalog; caller values only appear as predicate
 * operands, which renderers bind rather than splice.
 */
export function buildAggregationQuery(
  input: AggregationSpecInput,
  options: QueryBuilderOptions = {}
): AggregateQuerySpec {
  const catalog = options.catalog ?? DEFAULT_CATALOG;
  const baseRange = options.resolution ?? DEFAULT_RESOLUTION_RANGE;
  const spec = parseAggregationSpec(input, baseRange);

  const dataset = resolveDataset(catalog, spec.dataset);
  const dimension = resolveDimension(dataset, spec.dimension);
  const metric = resolveMetric(dataset, spec.metric);

  if (!metric.aggregations.includes(spec.aggFunction)) {
    throw new UnsupportedAggregationError(
      spec.aggFunction,
      `Aggregation ${spec.aggFunction} is not supported for metric '${spec.metric}' (expected ${metric.aggregations.join(', ')})`
    );
  }

  const range = resolveResolutionRange(dataset, dimension, baseRange);
  if (spec.resolution < range.min || spec.resolution > range.max) {
    throw new InvalidResolutionError(spec.resolution, range);
  }

  const predicates: QueryPredicate[] = [{ kind: 'notNull', column: dimension.column }];
  if (metric.column !== null) {
    predicates.push({ kind: 'notNull', column: metric.column });
  }
  predicates.push(...buildTimePredicates(spec.dataset, dataset, spec));

  return Object.freeze({
    kind: 'aggregate',
    source: dataset.source,
    cell: Object.freeze(buildCellExpression(dimension, spec.resolution)),
    aggregate: Object.freeze({ fn: spec.aggFunction, column: metric.column }),
    predicates: Object.freeze(predicates.map((predicate) => Object.freeze(predicate))),
    groupBy: Object.freeze([CELL_ALIAS] as const)
  } satisfies AggregateQuerySpec);
}
