import { z } from 'zod';
import {
  LOG_LEVELS,
  booleanVar,
  integerVar,
  loadEnvConfig,
  numberVar,
  stringListVar,
  stringVar,
  type EnvSource,
  type LogLevel
} from '@hexcast/shared';

/** H3 indexes resolutions 0 through 15. */
export const H3_MAX_RESOLUTION = 15;

export const DEFAULT_PALETTE = ['gray', 'blue', 'green', 'yellow', 'orange', 'red'] as const;

export interface ServiceConfig {
  logLevel: LogLevel;
  palette: string[];
  resolution: {
    min: number;
    max: number;
  };
  queryCache: {
    enabled: boolean;
    maxEntries: number;
  };
  view: {
    zoom: number;
    pitch: number;
    elevationScale: number;
    defaultCenter: {
      latitude: number;
      longitude: number;
    };
  };
  metrics: {
    enabled: boolean;
    prefix: string;
  };
}

const envSchema = z
  .object({
    GEO_ANALYTICS_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true, allowed: LOG_LEVELS }),
    GEO_ANALYTICS_PALETTE: stringListVar({ defaultValue: [...DEFAULT_PALETTE], separator: ',', minLength: 2 }),
    GEO_ANALYTICS_MIN_RESOLUTION: integerVar({ defaultValue: 1, min: 0, max: H3_MAX_RESOLUTION }),
    GEO_ANALYTICS_MAX_RESOLUTION: integerVar({ defaultValue: H3_MAX_RESOLUTION, min: 0, max: H3_MAX_RESOLUTION }),
    GEO_ANALYTICS_QUERY_CACHE_ENABLED: booleanVar({ defaultValue: true }),
    GEO_ANALYTICS_QUERY_CACHE_MAX_ENTRIES: integerVar({ defaultValue: 256, min: 1 }),
    GEO_ANALYTICS_VIEW_ZOOM: numberVar({ defaultValue: 10, min: 0, max: 24 }),
    GEO_ANALYTICS_VIEW_PITCH: numberVar({ defaultValue: 45, min: 0, max: 85 }),
    GEO_ANALYTICS_ELEVATION_SCALE: numberVar({ defaultValue: 10_000, min: 0 }),
    GEO_ANALYTICS_DEFAULT_LATITUDE: numberVar({ defaultValue: 37.633, min: -90, max: 90 }),
    GEO_ANALYTICS_DEFAULT_LONGITUDE: numberVar({ defaultValue: -122.284, min: -180, max: 180 }),
    GEO_ANALYTICS_METRICS_ENABLED: booleanVar({ defaultValue: true }),
    GEO_ANALYTICS_METRICS_PREFIX: stringVar({ defaultValue: 'geo_analytics' })
  })
  .passthrough()
  .superRefine((env, ctx) => {
    const min = env.GEO_ANALYTICS_MIN_RESOLUTION ?? 0;
    const max = env.GEO_ANALYTICS_MAX_RESOLUTION ?? H3_MAX_RESOLUTION;
    if (min > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GEO_ANALYTICS_MIN_RESOLUTION'],
        message: `GEO_ANALYTICS_MIN_RESOLUTION (${min}) must not exceed GEO_ANALYTICS_MAX_RESOLUTION (${max})`
      });
    }
  });

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let cachedConfig: ServiceConfig | null = null;

export function loadServiceConfig(options?: { env?: EnvSource }): ServiceConfig {
  if (cachedConfig && !options?.env) {
    return cachedConfig;
  }

  const env = loadEnvConfig(envSchema, { env: options?.env, context: 'geo-analytics' });
  const logLevel = env.GEO_ANALYTICS_LOG_LEVEL ?? 'info';

  const config: ServiceConfig = {
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    palette: env.GEO_ANALYTICS_PALETTE ?? [...DEFAULT_PALETTE],
    resolution: {
      min: env.GEO_ANALYTICS_MIN_RESOLUTION ?? 1,
      max: env.GEO_ANALYTICS_MAX_RESOLUTION ?? H3_MAX_RESOLUTION
    },
    queryCache: {
      enabled: env.GEO_ANALYTICS_QUERY_CACHE_ENABLED ?? true,
      maxEntries: env.GEO_ANALYTICS_QUERY_CACHE_MAX_ENTRIES ?? 256
    },
    view: {
      zoom: env.GEO_ANALYTICS_VIEW_ZOOM ?? 10,
      pitch: env.GEO_ANALYTICS_VIEW_PITCH ?? 45,
      elevationScale: env.GEO_ANALYTICS_ELEVATION_SCALE ?? 10_000,
      defaultCenter: {
        latitude: env.GEO_ANALYTICS_DEFAULT_LATITUDE ?? 37.633,
        longitude: env.GEO_ANALYTICS_DEFAULT_LONGITUDE ?? -122.284
      }
    },
    metrics: {
      enabled: env.GEO_ANALYTICS_METRICS_ENABLED ?? true,
      prefix: env.GEO_ANALYTICS_METRICS_PREFIX ?? 'geo_analytics'
    }
  };

  if (!options?.env) {
    cachedConfig = config;
  }
  return config;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}
