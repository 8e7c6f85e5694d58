import type { ServiceLogger } from '@hexcast/shared';
import { observeQuery, type QueryOperation } from '../observability/metrics';
import type { QuerySpec } from '../query/types';
import type { DataRow, DataSource } from './types';

function durationSince(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000_000;
}

/**
 * Runs one query with logging and metrics. Failures are logged, counted and
 * rethrown as they are.
 */
export async function executeQuery(
  dataSource: DataSource,
  query: QuerySpec,
  context: { operation: QueryOperation; label: string; logger: ServiceLogger }
): Promise<DataRow[]> {
  const { operation, label, logger } = context;
  const start = process.hrtime.bigint();
  try {
    const rows = await dataSource.execute(query);
    const durationSeconds = durationSince(start);
    logger.debug('query executed', {
      event: 'geo.query',
      operation,
      dataset: label,
      source: query.source,
      rows: rows.length,
      durationSeconds
    });
    observeQuery({ source: label, operation, result: 'success', durationSeconds, rowCount: rows.length });
    return rows;
  } catch (error) {
    observeQuery({ source: label, operation, result: 'failure', durationSeconds: durationSince(start) });
    logger.error('query failed', {
      event: 'geo.query.failed',
      operation,
      dataset: label,
      source: query.source,
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }
}
