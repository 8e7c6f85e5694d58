import { cellToLatLng, isValidCell } from 'h3-js';
import type { GeoCoordinate, ViewMode, ViewState } from '../types';

export interface ViewSettings {
  zoom: number;
  pitch: number;
  elevationScale: number;
}

/** Mean latitude and longitude of the cell centres, or the fallback when no cell is valid. */
export function computeViewCenter(cellIds: Iterable<string>, fallback: GeoCoordinate): GeoCoordinate {
  let latitude = 0;
  let longitude = 0;
  let count = 0;
  for (const cellId of cellIds) {
    if (!isValidCell(cellId)) {
      continue;
    }
    const [lat, lng] = cellToLatLng(cellId);
    latitude += lat;
    longitude += lng;
    count += 1;
  }
  if (count === 0) {
    return { latitude: fallback.latitude, longitude: fallback.longitude };
  }
  return { latitude: latitude / count, longitude: longitude / count };
}

export interface ViewStateOptions {
  /** Also drop the camera pitch in 2D instead of only the extrusion. */
  flattenPitch?: boolean;
}

/** 2D turns off extrusion; the camera keeps its pitch unless `flattenPitch` is set. */
export function resolveViewState(
  mode: ViewMode,
  center: GeoCoordinate,
  settings: ViewSettings,
  options: ViewStateOptions = {}
): ViewState {
  const extruded = mode === '3d';
  return {
    latitude: center.latitude,
    longitude: center.longitude,
    zoom: settings.zoom,
    pitch: extruded || !options.flattenPitch ? settings.pitch : 0,
    elevationScale: extruded ? settings.elevationScale : 0
  };
}
