import { createLogger, type ServiceLogger } from '@hexcast/shared';
import { DEFAULT_CATALOG, type DatasetCatalog } from './catalog/datasets';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { MemoizingDataSource } from './dataSource/memoizingDataSource';
import type { DataSource } from './dataSource/types';
import { setupMetrics } from './observability/metrics';
import { SpatialAggregationService } from './spatial/spatialAggregationService';
import { TimeSeriesAggregationService } from './timeseries/timeSeriesAggregationService';

export interface GeoAnalyticsOptions {
  dataSource: DataSource;
  config?: ServiceConfig;
  catalog?: DatasetCatalog;
  logger?: ServiceLogger;
}

export interface GeoAnalyticsContext {
  config: ServiceConfig;
  catalog: DatasetCatalog;
  dataSource: DataSource;
  logger: ServiceLogger;
  spatial: SpatialAggregationService;
  timeSeries: TimeSeriesAggregationService;
}

/** Wires config, metrics, query caching and both services around one data source. */
export function createGeoAnalytics(options: GeoAnalyticsOptions): GeoAnalyticsContext {
  const config = options.config ?? loadServiceConfig();
  const catalog = options.catalog ?? DEFAULT_CATALOG;
  const logger = options.logger ?? createLogger({ level: config.logLevel, name: 'geo-analytics' });

  setupMetrics(config.metrics);

  const dataSource = config.queryCache.enabled
    ? new MemoizingDataSource(options.dataSource, { maxEntries: config.queryCache.maxEntries, logger })
    : options.dataSource;

  return {
    config,
    catalog,
    dataSource,
    logger,
    spatial: new SpatialAggregationService({
      dataSource,
      palette: config.palette,
      catalog,
      resolution: config.resolution,
      logger
    }),
    timeSeries: new TimeSeriesAggregationService({ dataSource, catalog, logger })
  };
}
