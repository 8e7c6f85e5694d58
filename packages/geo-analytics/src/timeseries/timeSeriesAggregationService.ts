import { noopLogger, type ServiceLogger } from '@hexcast/shared';
import type { ZodError } from 'zod';
import { DEFAULT_CATALOG, type DatasetCatalog } from '../catalog/datasets';
import { executeQuery } from '../dataSource/execute';
import type { DataRow, DataSource } from '../dataSource/types';
import { toCellId, toFiniteNumber } from '../dataSource/values';
import { InvalidRangeError } from '../errors';
import { recordDroppedRows } from '../observability/metrics';
import { cellFilterSchema, dateRangeSchema, timeRangeSchema } from '../query/schemas';
import type { SelectQuerySpec } from '../query/types';
import type { DateRange, TimeRange, TimeSeriesBucket, TimeSeriesPoint, TimeSeriesResult } from '../types';
import { isWithinWindow, normalizeTimestamp } from './window';

export interface TimeSeriesAggregationServiceOptions {
  dataSource: DataSource;
  catalog?: DatasetCatalog;
  logger?: ServiceLogger;
}

export interface TimeSeriesWindow {
  dateRange: DateRange;
  timeRange: TimeRange;
  cellFilter?: string;
}

const SERIES_LABEL = 'time_series';

/**
 * Reads raw series rows. Rows without a readable timestamp or cell id are
 * counted as invalid; a missing measurement reads as 0, as in a
 * null-skipping SUM.
 */
export function normalizeSeriesRows(rows: DataRow[]): { points: TimeSeriesPoint[]; invalid: number } {
  const points: TimeSeriesPoint[] = [];
  let invalid = 0;
  for (const row of rows) {
    const timestamp = normalizeTimestamp(row.timestamp);
    const cellId = toCellId(row.cell_id);
    if (timestamp === null || cellId === null) {
      invalid += 1;
      continue;
    }
    points.push({
      timestamp,
      cellId,
      actual: toFiniteNumber(row.actual) ?? 0,
      forecast: toFiniteNumber(row.forecast) ?? 0
    });
  }
  return { points, invalid };
}

function rangeError(field: string, error: ZodError): InvalidRangeError {
  const issue = error.issues[0];
  const path = [field, ...issue.path].join('.');
  return new InvalidRangeError(`${path}: ${issue.message}`);
}

function normalizeWindow(dateRange: DateRange, timeRange: TimeRange, cellFilter?: string): TimeSeriesWindow {
  const dates = dateRangeSchema.safeParse(dateRange);
  if (!dates.success) {
    throw rangeError('dateRange', dates.error);
  }
  const times = timeRangeSchema.safeParse(timeRange);
  if (!times.success) {
    throw rangeError('timeRange', times.error);
  }
  return {
    dateRange: dates.data,
    timeRange: times.data,
    cellFilter: cellFilterSchema.parse(cellFilter)
  };
}

/**
 * Actual against forecast demand over time. The whole series is loaded
 * through one unfiltered query and windowed in process, so a memoizing data
 * source can serve every window from the same result.
 */
export class TimeSeriesAggregationService {
  private readonly dataSource: DataSource;
  private readonly catalog: DatasetCatalog;
  private readonly logger: ServiceLogger;

  constructor(options: TimeSeriesAggregationServiceOptions) {
    this.dataSource = options.dataSource;
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.logger = options.logger ?? noopLogger;
  }

  buildQuery(): SelectQuerySpec {
    const series = this.catalog.timeSeries;
    return Object.freeze({
      kind: 'select',
      source: series.source,
      columns: Object.freeze([
        { alias: 'timestamp', column: series.timestampColumn },
        { alias: 'cell_id', column: series.cellColumn },
        { alias: 'actual', column: series.actualColumn },
        { alias: 'forecast', column: series.forecastColumn }
      ]),
      predicates: Object.freeze([
        { kind: 'notNull', column: series.timestampColumn },
        { kind: 'notNull', column: series.cellColumn }
      ] as const)
    } satisfies SelectQuerySpec);
  }

  async fetch(dateRange: DateRange, timeRange: TimeRange, cellFilter?: string): Promise<TimeSeriesBucket[]> {
    const window = normalizeWindow(dateRange, timeRange, cellFilter);
    const rows = await executeQuery(this.dataSource, this.buildQuery(), {
      operation: 'time_series',
      label: SERIES_LABEL,
      logger: this.logger
    });

    const { points, invalid } = normalizeSeriesRows(rows);
    if (invalid > 0) {
      recordDroppedRows(SERIES_LABEL, 'invalid', invalid);
      this.logger.warn('Dropped series rows with unreadable timestamps or cell ids', { count: invalid });
    }

    const buckets = new Map<string, TimeSeriesBucket>();
    for (const point of points) {
      if (!isWithinWindow(point.timestamp, window.dateRange, window.timeRange)) {
        continue;
      }
      if (window.cellFilter !== undefined && point.cellId !== window.cellFilter) {
        continue;
      }
      const bucket = buckets.get(point.timestamp) ?? {
        timestamp: point.timestamp,
        cellId: window.cellFilter ?? null,
        actual: 0,
        forecast: 0,
        samples: 0
      };
      bucket.actual += point.actual;
      bucket.forecast += point.forecast;
      bucket.samples += 1;
      buckets.set(point.timestamp, bucket);
    }

    return [...buckets.values()].sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
  }

  async fetchSeries(dateRange: DateRange, timeRange: TimeRange, cellFilter?: string): Promise<TimeSeriesResult> {
    const points = await this.fetch(dateRange, timeRange, cellFilter);
    return points.length > 0 ? { status: 'ready', points } : { status: 'empty', points: [] };
  }
}
