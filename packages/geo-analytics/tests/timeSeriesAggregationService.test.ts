import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  InMemoryDataSource,
  InvalidRangeError,
  MemoizingDataSource,
  TimeSeriesAggregationService,
  normalizeSeriesRows,
  type DataRow,
  type DataSource,
  type QuerySpec
} from '../src/index';
import { AIRPORT, MIDTOWN, TAXI_SOURCE } from './fixtures';

function seriesSource(): InMemoryDataSource {
  return new InMemoryDataSource({
    [TAXI_SOURCE]: [
      { PICKUP_TIME: '2015-06-07 10:00:00', H3: MIDTOWN, PICKUPS: 5, FORECAST: 4 },
      { PICKUP_TIME: '2015-06-07 10:00:00', H3: AIRPORT, PICKUPS: 3, FORECAST: 2 },
      { PICKUP_TIME: '2015-06-07 09:00:00', H3: MIDTOWN, PICKUPS: 1, FORECAST: 1 },
      { PICKUP_TIME: '2015-06-07 23:00:00', H3: AIRPORT, PICKUPS: 2, FORECAST: 2 },
      { PICKUP_TIME: '2015-06-08 10:00:00', H3: MIDTOWN, PICKUPS: 9, FORECAST: 9 }
    ]
  });
}

const day = { start: '2015-06-07', end: '2015-06-07' };
const morning = { start: '09:00', end: '12:00' };

test('sums every cell per timestamp in ascending order', async () => {
  const service = new TimeSeriesAggregationService({ dataSource: seriesSource() });
  assert.deepEqual(await service.fetch(day, morning), [
    { timestamp: '2015-06-07T09:00:00', cellId: null, actual: 1, forecast: 1, samples: 1 },
    { timestamp: '2015-06-07T10:00:00', cellId: null, actual: 8, forecast: 6, samples: 2 }
  ]);
});

test('a cell filter restricts the series before aggregation', async () => {
  const service = new TimeSeriesAggregationService({ dataSource: seriesSource() });
  assert.deepEqual(await service.fetch(day, morning, MIDTOWN), [
    { timestamp: '2015-06-07T09:00:00', cellId: MIDTOWN, actual: 1, forecast: 1, samples: 1 },
    { timestamp: '2015-06-07T10:00:00', cellId: MIDTOWN, actual: 5, forecast: 4, samples: 1 }
  ]);
  assert.deepEqual(await service.fetch(day, morning, 'All'), await service.fetch(day, morning));
});

test('a reversed time of day window is empty', async () => {
  const service = new TimeSeriesAggregationService({ dataSource: seriesSource() });
  const reversed = { start: '09:00', end: '08:00' };
  assert.deepEqual(await service.fetch(day, reversed), []);
  assert.deepEqual(await service.fetchSeries(day, reversed), { status: 'empty', points: [] });
});

test('fetchSeries reports ready points', async () => {
  const service = new TimeSeriesAggregationService({ dataSource: seriesSource() });
  const result = await service.fetchSeries({ start: '2015-06-08', end: '2015-06-08' }, { start: '00:00', end: '23:59:59' });
  assert.deepEqual(result, {
    status: 'ready',
    points: [{ timestamp: '2015-06-08T10:00:00', cellId: null, actual: 9, forecast: 9, samples: 1 }]
  });
});

test('reversed or malformed date ranges are rejected', async () => {
  const service = new TimeSeriesAggregationService({ dataSource: seriesSource() });
  await assert.rejects(service.fetch({ start: '2015-06-08', end: '2015-06-07' }, morning), {
    name: 'InvalidRangeError',
    message: 'dateRange.start: dateRange.start must be on or before dateRange.end'
  });
  await assert.rejects(service.fetch({ start: '06/07/2015', end: '2015-06-07' }, morning), InvalidRangeError);
});

test('every window is served from one cached series query', async () => {
  let calls = 0;
  const inner = seriesSource();
  const counting: DataSource = {
    execute(query: QuerySpec): Promise<DataRow[]> {
      calls += 1;
      return inner.execute(query);
    }
  };
  const service = new TimeSeriesAggregationService({ dataSource: new MemoizingDataSource(counting) });

  await service.fetch(day, morning);
  await service.fetch(day, { start: '20:00', end: '23:59' });
  await service.fetch({ start: '2015-06-08', end: '2015-06-08' }, morning, MIDTOWN);

  assert.equal(calls, 1);
});

test('normalizeSeriesRows reads dates and treats missing measurements as zero', () => {
  const result = normalizeSeriesRows([
    { timestamp: new Date(Date.UTC(2015, 5, 7, 11, 0, 0)), cell_id: MIDTOWN, actual: '4', forecast: null },
    { timestamp: 'not a time', cell_id: MIDTOWN, actual: 1, forecast: 1 },
    { timestamp: '2015-06-07 12:00:00', cell_id: null, actual: 1, forecast: 1 }
  ]);
  assert.deepEqual(result, {
    points: [{ timestamp: '2015-06-07T11:00:00', cellId: MIDTOWN, actual: 4, forecast: 0 }],
    invalid: 2
  });
});
