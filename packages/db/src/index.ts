export { db, closeDb } from './client.js';
export type { Database, DbTransaction, DbOrTransaction } from './client.js';
export * as schema from './schema/index.js';
export type {
  KpiEntryMetadata,
  ManualAggregationMeta,
  SystemAggregationMeta,
} from './schema/kpis.js';
