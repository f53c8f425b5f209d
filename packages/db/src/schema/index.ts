// ─── Schema Barrel Export ─────────────────────────────────────────────
// All Drizzle schema definitions exported from here.
// This is the single import point for migrations and the Drizzle client.

export * from './organizations.js';
export * from './users.js';
export * from './kpis.js';
