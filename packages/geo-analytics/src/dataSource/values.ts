import type { GeoCoordinate } from '../types';

const WKT_POINT_PATTERN = /^POINT\s*\(\s*(-?[\d.]+(?:e-?\d+)?)\s+(-?[\d.]+(?:e-?\d+)?)\s*\)$/i;

export function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/** Warehouse drivers return NUMBER columns as numbers or numeric strings. */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toCellId(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function coordinate(longitude: unknown, latitude: unknown): GeoCoordinate | null {
  const lng = toFiniteNumber(longitude);
  const lat = toFiniteNumber(latitude);
  return lng === null || lat === null ? null : { latitude: lat, longitude: lng };
}

/**
 * Reads the point encodings a geography column holds: `{ latitude, longitude }`,
 * a GeoJSON point or `[lng, lat]` pair, or WKT `POINT(lng lat)`.
 */
export function parsePoint(value: unknown): GeoCoordinate | null {
  if (typeof value === 'string') {
    const match = WKT_POINT_PATTERN.exec(value.trim());
    return match ? coordinate(match[1], match[2]) : null;
  }
  if (Array.isArray(value)) {
    return value.length === 2 ? coordinate(value[0], value[1]) : null;
  }
  if (typeof value === 'object' && value !== null) {
    if ('coordinates' in value) {
      return parsePoint(value.coordinates);
    }
    if ('latitude' in value && 'longitude' in value) {
      return coordinate(value.longitude, value.latitude);
    }
  }
  return null;
}
