import { latLngToCell } from 'h3-js';

import type { DataRow } from '../src/index';

export const TAXI_SOURCE = 'ADVANCED_ANALYTICS.PUBLIC.NY_TAXI_RIDES_COMPARE';
export const METRICS_SOURCE = 'ADVANCED_ANALYTICS.PUBLIC.NY_TAXI_RIDES_METRICS';
export const ORDERS_SOURCE = 'ADVANCED_ANALYTICS.PUBLIC.ORDERS_REVIEWS_SENTIMENT_ANALYSIS';

export const MIDTOWN = latLngToCell(40.758, -73.9855, 8);
export const AIRPORT = latLngToCell(40.6413, -73.7781, 8);

/** Five resolution 8 cells a few kilometres apart. */
export const TAXI_CELLS = [0, 1, 2, 3, 4].map((step) => latLngToCell(40.7 + step * 0.05, -73.95, 8));

export const SF = { latitude: 37.7749, longitude: -122.4194 };
export const OAKLAND = { latitude: 37.8044, longitude: -122.2711 };

export function demandRows(values: readonly number[], timestamp = '2015-06-07 10:00:00'): DataRow[] {
  return values.map((value, index) => ({
    PICKUP_TIME: timestamp,
    H3: TAXI_CELLS[index],
    PICKUPS: value,
    FORECAST: value + 1
  }));
}

export function orderRows(): DataRow[] {
  return [
    { DELIVERY_LOCATION: SF, RESTAURANT_LOCATION: OAKLAND, SENTIMENT_SCORE: 4, COST_SCORE: 3 },
    {
      DELIVERY_LOCATION: `POINT(${SF.longitude} ${SF.latitude})`,
      RESTAURANT_LOCATION: OAKLAND,
      SENTIMENT_SCORE: 5,
      COST_SCORE: null
    },
    { DELIVERY_LOCATION: [OAKLAND.longitude, OAKLAND.latitude], RESTAURANT_LOCATION: SF, SENTIMENT_SCORE: 1, COST_SCORE: 2 },
    {
      DELIVERY_LOCATION: { type: 'Point', coordinates: [OAKLAND.longitude, OAKLAND.latitude] },
      RESTAURANT_LOCATION: SF,
      SENTIMENT_SCORE: 2,
      COST_SCORE: 4
    },
    { DELIVERY_LOCATION: null, RESTAURANT_LOCATION: SF, SENTIMENT_SCORE: 3, COST_SCORE: 3 }
  ];
}
