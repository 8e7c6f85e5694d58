import type { ServiceLogger } from '@hexcast/shared';
import type { DatasetCatalog } from '../catalog/datasets';
import { executeQuery } from '../dataSource/execute';
import type { DataSource } from '../dataSource/types';
import { toCellId, toFiniteNumber } from '../dataSource/values';
import type { SelectQuerySpec } from '../query/types';
import type { ForecastAccuracyRow } from '../types';

export function buildForecastAccuracyQuery(catalog: DatasetCatalog): SelectQuerySpec {
  const table = catalog.forecastAccuracy;
  return Object.freeze({
    kind: 'select',
    source: table.source,
    columns: Object.freeze([
      { alias: 'cell_id', column: table.cellColumn },
      { alias: 'smape', column: table.smapeColumn }
    ]),
    predicates: Object.freeze([{ kind: 'notNull', column: table.cellColumn }] as const)
  } satisfies SelectQuerySpec);
}

/** Per-cell SMAPE of the demand forecast, sorted by cell id. */
export async function fetchForecastAccuracy(
  dataSource: DataSource,
  catalog: DatasetCatalog,
  options: { cellFilter?: string; logger: ServiceLogger }
): Promise<ForecastAccuracyRow[]> {
  const rows = await executeQuery(dataSource, buildForecastAccuracyQuery(catalog), {
    operation: 'forecast_accuracy',
    label: 'forecast_accuracy',
    logger: options.logger
  });

  const result: ForecastAccuracyRow[] = [];
  for (const row of rows) {
    const cellId = toCellId(row.cell_id);
    const smape = toFiniteNumber(row.smape);
    if (cellId === null || smape === null) {
      continue;
    }
    if (options.cellFilter !== undefined && cellId !== options.cellFilter) {
      continue;
    }
    result.push({ cellId, smape });
  }
  return result.sort((a, b) => (a.cellId < b.cellId ? -1 : a.cellId > b.cellId ? 1 : 0));
}
