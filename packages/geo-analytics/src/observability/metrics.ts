import { Counter, Histogram, Registry } from 'prom-client';

export interface MetricsOptions {
  enabled: boolean;
  prefix: string;
}

export type QueryOperation = 'spatial' | 'time_series' | 'forecast_accuracy';

export interface QueryMetricsInput {
  source: string;
  operation: QueryOperation;
  result: 'success' | 'failure';
  durationSeconds?: number;
  rowCount?: number;
}

export type QueryCacheMissReason = 'disabled' | 'cold';

interface MetricsState {
  enabled: boolean;
  registry: Registry;
  prefix: string;
  queryRequestsTotal: Counter<string> | null;
  queryDurationSeconds: Histogram<string> | null;
  queryRowCount: Histogram<string> | null;
  droppedRowsTotal: Counter<string> | null;
  queryCacheHitsTotal: Counter<string> | null;
  queryCacheMissesTotal: Counter<string> | null;
}

const QUERY_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];
const QUERY_ROWS_BUCKETS = [1, 10, 100, 1_000, 10_000, 100_000];

let metricsState: MetricsState | null = null;

export function setupMetrics(options: MetricsOptions): MetricsState {
  if (metricsState) {
    return metricsState;
  }

  const registry = new Registry();
  const enabled = options.enabled;
  const prefix = options.prefix.endsWith('_') ? options.prefix : `${options.prefix}_`;
  const registerMetrics = enabled ? [registry] : undefined;

  const queryRequestsTotal = enabled
    ? new Counter({
        name: `${prefix}query_requests_total`,
        help: 'Data source queries grouped by source, operation, and result',
        labelNames: ['source', 'operation', 'result'],
        registers: registerMetrics
      })
    : null;

  const queryDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}query_duration_seconds`,
        help: 'Latency of data source queries in seconds',
        labelNames: ['source', 'operation'],
        buckets: QUERY_BUCKETS,
        registers: registerMetrics
      })
    : null;

  const queryRowCount = enabled
    ? new Histogram({
        name: `${prefix}query_rows`,
        help: 'Rows returned per data source query',
        labelNames: ['source', 'operation'],
        buckets: QUERY_ROWS_BUCKETS,
        registers: registerMetrics
      })
    : null;

  const droppedRowsTotal = enabled
    ? new Counter({
        name: `${prefix}dropped_rows_total`,
        help: 'Result rows discarded during normalization grouped by reason',
        labelNames: ['source', 'reason'],
        registers: registerMetrics
      })
    : null;

  const queryCacheHitsTotal = enabled
    ? new Counter({
        name: `${prefix}query_cache_hits_total`,
        help: 'Memoized query results served from memory',
        registers: registerMetrics
      })
    : null;

  const queryCacheMissesTotal = enabled
    ? new Counter({
        name: `${prefix}query_cache_misses_total`,
        help: 'Queries forwarded to the underlying data source grouped by reason',
        labelNames: ['reason'],
        registers: registerMetrics
      })
    : null;

  metricsState = {
    enabled,
    registry,
    prefix,
    queryRequestsTotal,
    queryDurationSeconds,
    queryRowCount,
    droppedRowsTotal,
    queryCacheHitsTotal,
    queryCacheMissesTotal
  } satisfies MetricsState;

  return metricsState;
}

export function getMetrics(): MetricsState | null {
  return metricsState;
}

export function getMetricsRegistry(): Registry | null {
  return metricsState?.registry ?? null;
}

export function resetMetrics(): void {
  metricsState = null;
}

export function observeQuery(input: QueryMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.queryRequestsTotal) {
    return;
  }
  state.queryRequestsTotal.labels(input.source, input.operation, input.result).inc();
  if (input.durationSeconds !== undefined && state.queryDurationSeconds) {
    state.queryDurationSeconds.labels(input.source, input.operation).observe(Math.max(input.durationSeconds, 0));
  }
  if (input.rowCount !== undefined && state.queryRowCount) {
    state.queryRowCount.labels(input.source, input.operation).observe(Math.max(input.rowCount, 0));
  }
}

export function recordDroppedRows(source: string, reason: 'invalid' | 'duplicate', count: number): void {
  const state = metricsState;
  if (!state?.enabled || !state.droppedRowsTotal || count <= 0) {
    return;
  }
  state.droppedRowsTotal.labels(source, reason).inc(count);
}

export function recordQueryCacheHit(): void {
  const state = metricsState;
  if (!state?.enabled || !state.queryCacheHitsTotal) {
    return;
  }
  state.queryCacheHitsTotal.inc();
}

export function recordQueryCacheMiss(reason: QueryCacheMissReason): void {
  const state = metricsState;
  if (!state?.enabled || !state.queryCacheMissesTotal) {
    return;
  }
  state.queryCacheMissesTotal.labels(reason).inc();
}
