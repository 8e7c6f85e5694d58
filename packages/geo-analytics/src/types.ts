export type RgbColor = readonly [r: number, g: number, b: number];

export const AGG_FUNCTIONS = ['SUM', 'COUNT', 'AVG'] as const;

export type AggFunction = (typeof AGG_FUNCTIONS)[number];

/** Calendar date as `YYYY-MM-DD`. */
export type LocalDate = string;

/** Time of day as `HH:mm:ss`. */
export type TimeOfDay = string;

/** Naive date-time as `YYYY-MM-DDTHH:mm:ss`, no zone. */
export type LocalDateTime = string;

export interface DateRange {
  start: LocalDate;
  end: LocalDate;
}

export interface TimeRange {
  start: TimeOfDay;
  end: TimeOfDay;
}

export interface ValueRange {
  min: number;
  max: number;
}

export interface MetricRow {
  cellId: string;
  value: number;
}

export interface ColoredMetricRow extends MetricRow {
  color: RgbColor;
  /** `value / max(value)` across the returned rows, 0 when that max is not positive. */
  intensity: number;
}

export type QuantileBreaks = readonly [number, number, number, number, number];

export interface AggregationSpec {
  dataset: string;
  dimension: string;
  metric: string;
  resolution: number;
  aggFunction: AggFunction;
  dateRange?: DateRange;
  timeRange?: TimeRange;
  cellFilter?: string;
  valueFilter?: ValueRange;
}

export interface TimeSeriesPoint {
  timestamp: LocalDateTime;
  cellId: string;
  actual: number;
  forecast: number;
}

export interface TimeSeriesBucket {
  timestamp: LocalDateTime;
  /** The selected cell, or null when every cell was summed. */
  cellId: string | null;
  actual: number;
  forecast: number;
  samples: number;
}

export interface LegendStop {
  value: number;
  color: RgbColor;
}

export interface ForecastAccuracyRow {
  cellId: string;
  smape: number;
}

export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

export type ViewMode = '2d' | '3d';

export interface ViewState extends GeoCoordinate {
  zoom: number;
  pitch: number;
  elevationScale: number;
}

export type SpatialLayer =
  | {
      status: 'ready';
      rows: ColoredMetricRow[];
      breaks: QuantileBreaks;
      legend: LegendStop[];
      maxValue: number;
    }
  | {
      status: 'empty';
      reason: 'no_rows' | 'filtered';
      breaks: QuantileBreaks | null;
    };

export type TimeSeriesResult =
  | { status: 'ready'; points: TimeSeriesBucket[] }
  | { status: 'empty'; points: [] };
