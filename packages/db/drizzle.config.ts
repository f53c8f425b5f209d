import { defineConfig } from 'drizzle-kit';

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error('DATABASE_URL environment variable is required');
}

export default defineConfig({
  schema: [
    './src/schema/organizations.ts',
    './src/schema/users.ts',
    './src/schema/kpis.ts',
  ],
  out: './drizzle',
  dialect: 'postgresql',
  schemaFilter: ['auth', 'kpis'],
  dbCredentials: {
    url: databaseUrl,
  },
  verbose: true,
  strict: true,
});
