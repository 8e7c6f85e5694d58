import { resolveDataset, resolveMetric, type MetricKind } from '../catalog/datasets';
import type { GeoAnalyticsContext } from '../context';
import { resolveViewState } from '../spatial/view';
import type { SpatialLayer, ValueRange, ViewMode, ViewState } from '../types';

const DATASET = 'order_reviews';
const DEFAULT_RESOLUTION = 7;
const SENTIMENT_ZOOM = 7;
const SENTIMENT_PITCH = 50;

export interface SentimentMapParams {
  /** `delivery_location` or `restaurant_location`. */
  dimension: string;
  metric: string;
  resolution?: number;
  /** Applied to score metrics only. */
  scoreRange?: ValueRange;
  /** Honoured for count metrics only; score maps are always flat. */
  viewMode?: ViewMode;
}

export interface SentimentMap {
  layer: SpatialLayer;
  metric: { name: string; label: string; kind: MetricKind };
  viewMode: ViewMode;
  view: ViewState;
}

export async function loadSentimentMap(
  params: SentimentMapParams,
  context: GeoAnalyticsContext
): Promise<SentimentMap> {
  const metric = resolveMetric(resolveDataset(context.catalog, DATASET), params.metric);
  const viewMode: ViewMode = metric.kind === 'count' ? params.viewMode ?? '2d' : '2d';

  const layer = await context.spatial.fetchLayer({
    dataset: DATASET,
    dimension: params.dimension,
    metric: params.metric,
    resolution: params.resolution ?? DEFAULT_RESOLUTION,
    aggFunction: metric.defaultAggregation,
    valueFilter: metric.kind === 'score' ? params.scoreRange : undefined
  });

  return {
    layer,
    metric: { name: params.metric, label: metric.label, kind: metric.kind },
    viewMode,
    view: resolveViewState(viewMode, context.config.view.defaultCenter, {
      zoom: SENTIMENT_ZOOM,
      pitch: SENTIMENT_PITCH,
      elevationScale: context.config.view.elevationScale
    }, { flattenPitch: true })
  };
}
