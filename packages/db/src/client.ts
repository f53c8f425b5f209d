import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

// ─── Connection Pool ──────────────────────────────────────────────────
const connectionString = process.env.DATABASE_URL;
if (!connectionString) {
  throw new Error('DATABASE_URL environment variable is required');
}

// Drizzle's relational query API (db.query.*) does not schema-qualify
// table names even when tables are defined via pgSchema().
const SEARCH_PATH = 'auth,kpis,public';

// Query client. postgres-js connects lazily, so importing this module opens nothing.
const queryClient = postgres(connectionString, {
  max: 20,
  idle_timeout: 20,
  connect_timeout: 10,
  connection: { search_path: SEARCH_PATH },
});

// Drizzle instance with full schema for type-safe queries
export const db = drizzle(queryClient, { schema });

export type Database = typeof db;
export type DbTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];
export type DbOrTransaction = Database | DbTransaction;

// ─── Shutdown ─────────────────────────────────────────────────────────
export async function closeDb(): Promise<void> {
  await queryClient.end({ timeout: 5 });
}

export { schema };
