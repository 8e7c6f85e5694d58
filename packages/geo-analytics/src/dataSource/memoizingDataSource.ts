import { noopLogger, type ServiceLogger } from '@hexcast/shared';
import { recordQueryCacheHit, recordQueryCacheMiss } from '../observability/metrics';
import type { QuerySpec } from '../query/types';
import type { DataRow, DataSource } from './types';

export interface MemoizingDataSourceOptions {
  enabled?: boolean;
  maxEntries?: number;
  logger?: ServiceLogger;
}

const DEFAULT_MAX_ENTRIES = 256;

function stableStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(',')}]`;
  }
  const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
  const parts = entries.map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`);
  return `{${parts.join(',')}}`;
}

export function queryCacheKey(query: QuerySpec): string {
  return stableStringify(query);
}

/**
 * Serves repeated queries from memory. Identical queries issued while one is
 * running share its promise; failed queries are never cached. Entries past
 * `maxEntries` are evicted least recently used first.
 */
export class MemoizingDataSource implements DataSource {
  private readonly entries = new Map<string, Promise<DataRow[]>>();
  private readonly enabled: boolean;
  private readonly maxEntries: number;
  private readonly logger: ServiceLogger;
  private hitCount = 0;
  private missCount = 0;

  constructor(
    private readonly inner: DataSource,
    options: MemoizingDataSourceOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.logger = options.logger ?? noopLogger;
  }

  get stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hitCount, misses: this.missCount, size: this.entries.size };
  }

  execute(query: QuerySpec): Promise<DataRow[]> {
    if (!this.enabled) {
      this.missCount += 1;
      recordQueryCacheMiss('disabled');
      return this.inner.execute(query);
    }

    const key = queryCacheKey(query);
    const cached = this.entries.get(key);
    if (cached) {
      // refresh recency
      this.entries.delete(key);
      this.entries.set(key, cached);
      this.hitCount += 1;
      recordQueryCacheHit();
      return cached.then((rows) => rows.map((row) => ({ ...row })));
    }

    this.missCount += 1;
    recordQueryCacheMiss('cold');
    const pending = this.inner.execute(query);
    this.entries.set(key, pending);
    this.evictOverflow();

    void pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
        this.logger.debug('Dropped failed query from cache', { source: query.source });
      }
    });

    return pending.then((rows) => rows.map((row) => ({ ...row })));
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}
