import type { AggFunction, ValueRange } from '../types';
import { UnknownFieldError } from '../errors';

export type DimensionDefinition =
  | {
      kind: 'point';
      column: string;
      label: string;
    }
  | {
      kind: 'cell';
      column: string;
      label: string;
      /** Resolution the stored cell ids were indexed at. */
      nativeResolution: number;
    };

export type MetricKind = 'count' | 'quantity' | 'score';

export interface MetricDefinition {
  /** Null for row counts that read no column. */
  column: string | null;
  label: string;
  kind: MetricKind;
  defaultAggregation: AggFunction;
  aggregations: readonly AggFunction[];
  /** Bounds of a score metric, used for range filters. */
  valueRange?: ValueRange;
}

export interface DatasetDefinition {
  source: string;
  label: string;
  timestampColumn: string | null;
  resolution?: { min: number; max: number };
  dimensions: Record<string, DimensionDefinition>;
  metrics: Record<string, MetricDefinition>;
}

export interface TimeSeriesDefinition {
  source: string;
  timestampColumn: string;
  cellColumn: string;
  actualColumn: string;
  forecastColumn: string;
}

export interface ForecastAccuracyDefinition {
  source: string;
  cellColumn: string;
  smapeColumn: string;
}

export interface DatasetCatalog {
  datasets: Record<string, DatasetDefinition>;
  timeSeries: TimeSeriesDefinition;
  forecastAccuracy: ForecastAccuracyDefinition;
}

const SCORE_RANGE: ValueRange = { min: 0, max: 5 };

function scoreMetric(column: string, label: string): MetricDefinition {
  return {
    column,
    label,
    kind: 'score',
    defaultAggregation: 'AVG',
    aggregations: ['AVG'],
    valueRange: SCORE_RANGE
  };
}

export const DEFAULT_CATALOG: DatasetCatalog = {
  datasets: {
    taxi_demand: {
      source: 'ADVANCED_ANALYTICS.PUBLIC.NY_TAXI_RIDES_COMPARE',
      label: 'NY taxi pickups vs. forecast',
      timestampColumn: 'PICKUP_TIME',
      dimensions: {
        h3: { kind: 'cell', column: 'H3', label: 'Pickup cell', nativeResolution: 8 }
      },
      metrics: {
        pickups: {
          column: 'PICKUPS',
          label: 'Actual pickups',
          kind: 'quantity',
          defaultAggregation: 'SUM',
          aggregations: ['SUM', 'AVG', 'COUNT']
        },
        forecast: {
          column: 'FORECAST',
          label: 'Forecast pickups',
          kind: 'quantity',
          defaultAggregation: 'SUM',
          aggregations: ['SUM', 'AVG', 'COUNT']
        }
      }
    },
    order_reviews: {
      source: 'ADVANCED_ANALYTICS.PUBLIC.ORDERS_REVIEWS_SENTIMENT_ANALYSIS',
      label: 'Food delivery orders and review sentiment',
      timestampColumn: null,
      resolution: { min: 6, max: 9 },
      dimensions: {
        delivery_location: { kind: 'point', column: 'DELIVERY_LOCATION', label: 'Delivery location' },
        restaurant_location: { kind: 'point', column: 'RESTAURANT_LOCATION', label: 'Restaurant location' }
      },
      metrics: {
        orders: {
          column: null,
          label: 'Orders',
          kind: 'count',
          defaultAggregation: 'COUNT',
          aggregations: ['COUNT']
        },
        sentiment_score: scoreMetric('SENTIMENT_SCORE', 'Sentiment score'),
        cost_score: scoreMetric('COST_SCORE', 'Cost score'),
        food_quality_score: scoreMetric('FOOD_QUALITY_SCORE', 'Food quality score'),
        delivery_time_score: scoreMetric('DELIVERY_TIME_SCORE', 'Delivery time score')
      }
    }
  },
  timeSeries: {
    source: 'ADVANCED_ANALYTICS.PUBLIC.NY_TAXI_RIDES_COMPARE',
    timestampColumn: 'PICKUP_TIME',
    cellColumn: 'H3',
    actualColumn: 'PICKUPS',
    forecastColumn: 'FORECAST'
  },
  forecastAccuracy: {
    source: 'ADVANCED_ANALYTICS.PUBLIC.NY_TAXI_RIDES_METRICS',
    cellColumn: 'H3',
    smapeColumn: 'SMAPE'
  }
};

function lookup<T>(entries: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(entries, key) ? entries[key] : undefined;
}

export function resolveDataset(catalog: DatasetCatalog, name: string): DatasetDefinition {
  const dataset = lookup(catalog.datasets, name);
  if (!dataset) {
    throw new UnknownFieldError('dataset', name);
  }
  return dataset;
}

export function resolveDimension(dataset: DatasetDefinition, name: string): DimensionDefinition {
  const dimension = lookup(dataset.dimensions, name);
  if (!dimension) {
    throw new UnknownFieldError(
      'dimension',
      name,
      `Unknown dimension '${name}'. Expected one of: ${Object.keys(dataset.dimensions).join(', ')}`
    );
  }
  return dimension;
}

export function resolveMetric(dataset: DatasetDefinition, name: string): MetricDefinition {
  const metric = lookup(dataset.metrics, name);
  if (!metric) {
    throw new UnknownFieldError(
      'metric',
      name,
      `Unknown metric '${name}'. Expected one of: ${Object.keys(dataset.metrics).join(', ')}`
    );
  }
  return metric;
}
