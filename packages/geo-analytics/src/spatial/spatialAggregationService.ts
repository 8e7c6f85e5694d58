import { noopLogger, type ServiceLogger } from '@hexcast/shared';
import { DEFAULT_CATALOG, type DatasetCatalog } from '../catalog/datasets';
import { parsePalette } from '../color/palette';
import { buildLegend, computeBreaks, createColorScale } from '../color/quantileColorMapper';
import { DEFAULT_PALETTE } from '../config/serviceConfig';
import { executeQuery } from '../dataSource/execute';
import type { DataRow, DataSource } from '../dataSource/types';
import { toCellId, toFiniteNumber } from '../dataSource/values';
import { recordDroppedRows } from '../observability/metrics';
import {
  buildAggregationQuery,
  DEFAULT_RESOLUTION_RANGE,
  parseAggregationSpec,
  type ResolutionRange
} from '../query/builder';
import type { AggregationSpecInput } from '../query/schemas';
import { CELL_ALIAS, VALUE_ALIAS } from '../query/types';
import type { AggregationSpec, ColoredMetricRow, MetricRow, SpatialLayer } from '../types';

export interface SpatialAggregationServiceOptions {
  dataSource: DataSource;
  palette?: readonly string[];
  catalog?: DatasetCatalog;
  resolution?: ResolutionRange;
  logger?: ServiceLogger;
}

/** Drops rows without a cell id or a finite value; the first row per cell wins. */
export function normalizeMetricRows(rows: DataRow[]): { rows: MetricRow[]; invalid: number; duplicates: string[] } {
  const seen = new Set<string>();
  const normalized: MetricRow[] = [];
  const duplicates: string[] = [];
  let invalid = 0;

  for (const row of rows) {
    const cellId = toCellId(row[CELL_ALIAS]);
    const value = toFiniteNumber(row[VALUE_ALIAS]);
    if (cellId === null || value === null) {
      invalid += 1;
      continue;
    }
    if (seen.has(cellId)) {
      duplicates.push(cellId);
      continue;
    }
    seen.add(cellId);
    normalized.push({ cellId, value });
  }

  return { rows: normalized, invalid, duplicates };
}

function matchesFilters(row: MetricRow, spec: AggregationSpec): boolean {
  if (spec.cellFilter !== undefined && row.cellId !== spec.cellFilter) {
    return false;
  }
  if (spec.valueFilter && (row.value < spec.valueFilter.min || row.value > spec.valueFilter.max)) {
    return false;
  }
  return true;
}

/**
 * Aggregates a metric per H3 cell and colors each cell by its quantile
 * position. Breaks are computed over every returned cell before the cell
 * and value filters run, so filtering never shifts the colors.
 */
export class SpatialAggregationService {
  private readonly dataSource: DataSource;
  private readonly palette: readonly string[];
  private readonly catalog: DatasetCatalog;
  private readonly resolution: ResolutionRange;
  private readonly logger: ServiceLogger;

  constructor(options: SpatialAggregationServiceOptions) {
    this.dataSource = options.dataSource;
    this.palette = parsePalette(options.palette ?? DEFAULT_PALETTE).names;
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.resolution = options.resolution ?? DEFAULT_RESOLUTION_RANGE;
    this.logger = options.logger ?? noopLogger;
  }

  async fetch(input: AggregationSpecInput): Promise<ColoredMetricRow[]> {
    const layer = await this.fetchLayer(input);
    return layer.status === 'ready' ? layer.rows : [];
  }

  async fetchLayer(input: AggregationSpecInput): Promise<SpatialLayer> {
    const spec = parseAggregationSpec(input, this.resolution);
    const query = buildAggregationQuery(spec, { catalog: this.catalog, resolution: this.resolution });

    const raw = await executeQuery(this.dataSource, query, {
      operation: 'spatial',
      label: spec.dataset,
      logger: this.logger
    });

    const { rows, invalid, duplicates } = normalizeMetricRows(raw);
    if (invalid > 0) {
      recordDroppedRows(spec.dataset, 'invalid', invalid);
      this.logger.warn('Dropped rows without a cell id or numeric value', { dataset: spec.dataset, count: invalid });
    }
    if (duplicates.length > 0) {
      recordDroppedRows(spec.dataset, 'duplicate', duplicates.length);
      this.logger.warn('Dropped duplicate cell rows', { dataset: spec.dataset, cells: duplicates });
    }

    if (rows.length === 0) {
      return { status: 'empty', reason: 'no_rows', breaks: null };
    }

    const breaks = computeBreaks(rows.map((row) => row.value));
    const retained = rows.filter((row) => matchesFilters(row, spec));
    if (retained.length === 0) {
      return { status: 'empty', reason: 'filtered', breaks };
    }

    const scale = createColorScale(breaks, this.palette);
    const maxValue = retained.reduce((max, row) => Math.max(max, row.value), Number.NEGATIVE_INFINITY);
    const colored = retained.map((row) => ({
      cellId: row.cellId,
      value: row.value,
      color: scale(row.value),
      intensity: maxValue > 0 ? row.value / maxValue : 0
    }));

    return {
      status: 'ready',
      rows: colored,
      breaks,
      legend: buildLegend(breaks, this.palette),
      maxValue
    };
  }
}
