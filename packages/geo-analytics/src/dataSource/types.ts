import type { QuerySpec } from '../query/types';

export type DataRow = Record<string, unknown>;

/**
 * Executes structured queries against a warehouse. Implementations own
 * connections, retries and timeouts; callers see rows or a rejection.
 */
export interface DataSource {
  execute(query: QuerySpec): Promise<DataRow[]>;
}
