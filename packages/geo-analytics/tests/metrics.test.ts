import assert from 'node:assert/strict';
import { afterEach, beforeEach, test } from 'node:test';

import {
  InMemoryDataSource,
  MemoizingDataSource,
  SpatialAggregationService,
  getMetrics,
  getMetricsRegistry,
  resetMetrics,
  setupMetrics
} from '../src/index';
import { TAXI_SOURCE, demandRows } from './fixtures';

beforeEach(() => {
  resetMetrics();
});

afterEach(() => {
  resetMetrics();
});

const spec = {
  dataset: 'taxi_demand',
  dimension: 'h3',
  metric: 'pickups',
  resolution: 8,
  aggFunction: 'SUM',
  dateRange: { start: '2015-06-07', end: '2015-06-07' },
  timeRange: { start: '00:00', end: '23:59:59' }
};

test('query and cache metrics are recorded', async () => {
  setupMetrics({ enabled: true, prefix: 'geo_test' });
  const dataSource = new MemoizingDataSource(new InMemoryDataSource({ [TAXI_SOURCE]: demandRows([1, 2, 3]) }));
  const service = new SpatialAggregationService({ dataSource });

  await service.fetch(spec);
  await service.fetch(spec);

  const registry = getMetricsRegistry();
  assert.ok(registry, 'registry is initialised');
  const output = registry ? await registry.metrics() : '';
  assert.match(output, /geo_test_query_requests_total\{source="taxi_demand",operation="spatial",result="success"\} 2/);
  assert.match(output, /geo_test_query_cache_hits_total 1/);
  assert.match(output, /geo_test_query_cache_misses_total\{reason="cold"\} 1/);
});

test('failed queries are counted as failures', async () => {
  setupMetrics({ enabled: true, prefix: 'geo_test_' });
  const service = new SpatialAggregationService({ dataSource: new InMemoryDataSource() });

  await assert.rejects(service.fetch(spec));

  const output = await getMetricsRegistry()?.metrics();
  assert.match(output ?? '', /geo_test_query_requests_total\{source="taxi_demand",operation="spatial",result="failure"\} 1/);
});

test('disabled metrics create no collectors', () => {
  const state = setupMetrics({ enabled: false, prefix: 'geo_test' });
  assert.equal(state.queryRequestsTotal, null);
  assert.equal(getMetrics(), state);
});
