import { cellFilterSchema } from '../query/schemas';
import type { GeoAnalyticsContext } from '../context';
import { computeViewCenter, resolveViewState } from '../spatial/view';
import type {
  AggFunction,
  DateRange,
  ForecastAccuracyRow,
  SpatialLayer,
  TimeRange,
  TimeSeriesResult,
  ViewMode,
  ViewState
} from '../types';
import { fetchForecastAccuracy } from './forecastAccuracy';

const DATASET = 'taxi_demand';
const DIMENSION = 'h3';
const DEFAULT_RESOLUTION = 8;

export interface DemandDashboardParams {
  dateRange: DateRange;
  timeRange: TimeRange;
  resolution?: number;
  aggFunction?: AggFunction;
  /** A cell id, or `All` / nothing for every cell. */
  cellFilter?: string;
  /** Defaults to `2d`; only the extrusion changes, the pitch stays. */
  viewMode?: ViewMode;
}

export interface DemandDashboard {
  actual: SpatialLayer;
  forecast: SpatialLayer;
  accuracy: ForecastAccuracyRow[];
  series: TimeSeriesResult;
  view: ViewState;
}

/**
 * Loads the actual-versus-forecast demand view for one time window. The
 * fetches are independent and run concurrently; the first failure rejects
 * the whole snapshot.
 */
export async function loadDemandDashboard(
  params: DemandDashboardParams,
  context: GeoAnalyticsContext
): Promise<DemandDashboard> {
  const cellFilter = cellFilterSchema.parse(params.cellFilter);
  const layerSpec = {
    dataset: DATASET,
    dimension: DIMENSION,
    resolution: params.resolution ?? DEFAULT_RESOLUTION,
    aggFunction: params.aggFunction ?? 'SUM',
    dateRange: params.dateRange,
    timeRange: params.timeRange,
    cellFilter
  };

  const actualLayer = context.spatial.fetchLayer({ ...layerSpec, metric: 'pickups' });
  // The camera frames every cell in the window, not just the selected one.
  const framingLayer = cellFilter
    ? context.spatial.fetchLayer({ ...layerSpec, cellFilter: undefined, metric: 'pickups' })
    : actualLayer;

  const [accuracy, actual, forecast, series, framing] = await Promise.all([
    fetchForecastAccuracy(context.dataSource, context.catalog, { cellFilter, logger: context.logger }),
    actualLayer,
    context.spatial.fetchLayer({ ...layerSpec, metric: 'forecast' }),
    context.timeSeries.fetchSeries(params.dateRange, params.timeRange, cellFilter),
    framingLayer
  ]);

  const cells = framing.status === 'ready' ? framing.rows.map((row) => row.cellId) : [];
  const center = computeViewCenter(cells, context.config.view.defaultCenter);

  return {
    actual,
    forecast,
    accuracy,
    series,
    view: resolveViewState(params.viewMode ?? '2d', center, context.config.view)
  };
}
