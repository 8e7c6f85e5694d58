export * from './errors';
export {
  AGG_FUNCTIONS,
  type AggFunction,
  type AggregationSpec,
  type ColoredMetricRow,
  type DateRange,
  type ForecastAccuracyRow,
  type GeoCoordinate,
  type LegendStop,
  type LocalDate,
  type LocalDateTime,
  type MetricRow,
  type QuantileBreaks,
  type RgbColor,
  type SpatialLayer,
  type TimeOfDay,
  type TimeRange,
  type TimeSeriesBucket,
  type TimeSeriesPoint,
  type TimeSeriesResult,
  type ValueRange,
  type ViewMode,
  type ViewState
} from './types';
export {
  DEFAULT_CATALOG,
  resolveDataset,
  resolveDimension,
  resolveMetric,
  type DatasetCatalog,
  type DatasetDefinition,
  type DimensionDefinition,
  type ForecastAccuracyDefinition,
  type MetricDefinition,
  type MetricKind,
  type TimeSeriesDefinition
} from './catalog/datasets';
export {
  DEFAULT_PALETTE,
  H3_MAX_RESOLUTION,
  loadServiceConfig,
  resetCachedServiceConfig,
  type ServiceConfig
} from './config/serviceConfig';
export { parsePalette, type ParsedPalette } from './color/palette';
export {
  BREAK_PERCENTILES,
  buildLegend,
  colorFor,
  computeBreaks,
  createColorScale,
  createQuantilePosition,
  isDegenerate,
  type ColorScale
} from './color/quantileColorMapper';
export {
  aggregationSpecSchema,
  cellFilterSchema,
  dateRangeSchema,
  timeRangeSchema,
  valueRangeSchema,
  type AggregationSpecInput
} from './query/schemas';
export {
  buildAggregationQuery,
  parseAggregationSpec,
  resolveResolutionRange,
  DEFAULT_RESOLUTION_RANGE,
  type QueryBuilderOptions,
  type ResolutionRange
} from './query/builder';
export { quoteIdentifier, quoteQualifiedName, renderSql, type RenderedSql, type SqlBind } from './query/sql';
export {
  CELL_ALIAS,
  VALUE_ALIAS,
  type AggregateExpression,
  type AggregateQuerySpec,
  type CellExpression,
  type QueryPredicate,
  type QuerySpec,
  type SelectColumn,
  type SelectQuerySpec
} from './query/types';
export type { DataRow, DataSource } from './dataSource/types';
export { InMemoryDataSource } from './dataSource/inMemoryDataSource';
export { MemoizingDataSource, queryCacheKey, type MemoizingDataSourceOptions } from './dataSource/memoizingDataSource';
export { parsePoint } from './dataSource/values';
export { getMetrics, getMetricsRegistry, resetMetrics, setupMetrics, type MetricsOptions } from './observability/metrics';
export {
  SpatialAggregationService,
  normalizeMetricRows,
  type SpatialAggregationServiceOptions
} from './spatial/spatialAggregationService';
export { computeViewCenter, resolveViewState, type ViewSettings, type ViewStateOptions } from './spatial/view';
export {
  TimeSeriesAggregationService,
  normalizeSeriesRows,
  type TimeSeriesAggregationServiceOptions,
  type TimeSeriesWindow
} from './timeseries/timeSeriesAggregationService';
export { isWithinWindow, normalizeTimestamp } from './timeseries/window';
export { createGeoAnalytics, type GeoAnalyticsContext, type GeoAnalyticsOptions } from './context';
export { buildForecastAccuracyQuery, fetchForecastAccuracy } from './dashboard/forecastAccuracy';
export { loadDemandDashboard, type DemandDashboard, type DemandDashboardParams } from './dashboard/demandDashboard';
export { loadSentimentMap, type SentimentMap, type SentimentMapParams } from './dashboard/sentimentMap';
