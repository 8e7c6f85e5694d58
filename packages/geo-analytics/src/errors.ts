export type GeoAnalyticsErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_RESOLUTION'
  | 'INVALID_RANGE'
  | 'UNSUPPORTED_AGGREGATION'
  | 'UNKNOWN_FIELD'
  | 'INVALID_PALETTE'
  | 'DATA_SOURCE_FAILURE';

export class GeoAnalyticsError extends Error {
  readonly code: GeoAnalyticsErrorCode;

  constructor(code: GeoAnalyticsErrorCode, message: string) {
    super(message);
    this.name = 'GeoAnalyticsError';
    this.code = code;
  }
}

export class EmptyInputError extends GeoAnalyticsError {
  constructor(message = 'Cannot compute quantile breaks over an empty distribution') {
    super('EMPTY_INPUT', message);
    this.name = 'EmptyInputError';
  }
}

export class InvalidResolutionError extends GeoAnalyticsError {
  readonly resolution: number;
  readonly min: number;
  readonly max: number;

  constructor(resolution: number, range: { min: number; max: number }) {
    super(
      'INVALID_RESOLUTION',
      `Resolution ${resolution} is outside the supported range ${range.min}-${range.max}`
    );
    this.name = 'InvalidResolutionError';
    this.resolution = resolution;
    this.min = range.min;
    this.max = range.max;
  }
}

export class InvalidRangeError extends GeoAnalyticsError {
  constructor(message: string) {
    super('INVALID_RANGE', message);
    this.name = 'InvalidRangeError';
  }
}

export class UnsupportedAggregationError extends GeoAnalyticsError {
  readonly aggFunction: string;

  constructor(aggFunction: string, detail?: string) {
    super('UNSUPPORTED_AGGREGATION', detail ?? `Unsupported aggregation function: ${aggFunction}`);
    this.name = 'UnsupportedAggregationError';
    this.aggFunction = aggFunction;
  }
}

export class UnknownFieldError extends GeoAnalyticsError {
  readonly field: 'dataset' | 'dimension' | 'metric';
  readonly value: string;

  constructor(field: 'dataset' | 'dimension' | 'metric', value: string, detail?: string) {
    super('UNKNOWN_FIELD', detail ?? `Unknown ${field} '${value}'`);
    this.name = 'UnknownFieldError';
    this.field = field;
    this.value = value;
  }
}

export class InvalidPaletteError extends GeoAnalyticsError {
  constructor(message: string) {
    super('INVALID_PALETTE', message);
    this.name = 'InvalidPaletteError';
  }
}

/**
 * Raised by data source implementations. Services log and rethrow it as is;
 * retry policy belongs to whoever owns the connection.
 */
export class DataSourceError extends GeoAnalyticsError {
  readonly source: string | null;

  constructor(message: string, options?: { source?: string | null; cause?: unknown }) {
    super('DATA_SOURCE_FAILURE', message);
    this.name = 'DataSourceError';
    this.source = options?.source ?? null;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isGeoAnalyticsError(value: unknown): value is GeoAnalyticsError {
  return value instanceof GeoAnalyticsError;
}
