import { z } from 'zod';
import pino from 'pino';
import 'dotenv/config';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return value;
}, z.boolean());

// ─── Environment Schema ───────────────────────────────────────────────
export const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),

  // Redis (event bus + job queues)
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // JWT
  JWT_SECRET: z.string().min(32),

  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  APP_URL: z.string().url().default('http://localhost:5173'),
  SERVICE_HOST: z.string().default('localhost'),
  KPIS_SERVICE_PORT: z.coerce.number().default(3010),

  // Platform-assigned port (overrides service-specific port)
  PORT: z.coerce.number().optional(),

  // Aggregation trigger transport: BullMQ queue or in-process fallback
  KPI_AGGREGATION_DISPATCH: z.enum(['queue', 'inline']).default('queue'),
  KPI_AGGREGATION_MAX_ATTEMPTS: z.coerce.number().int().positive().max(10).default(3),
  KPI_AGGREGATION_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),

  // Periodic reconciliation pass over active manual KPIs
  KPI_RECONCILIATION_ENABLED: booleanFromEnv.default(true),
  KPI_RECONCILIATION_INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),

  // Trend analysis
  KPI_TREND_STATISTICS_SCOPE: z.enum(['window', 'full_history']).default('window'),
  KPI_DEFAULT_TREND_PERIODS: z.coerce.number().int().min(0).default(12),
});

// ─── Parse & Validate ─────────────────────────────────────────────────
function loadConfig() {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment configuration');
  }
  return parsed.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof envSchema>;

// ─── Service URLs ─────────────────────────────────────────────────────
export const serviceUrls = {
  kpis: `http://${config.SERVICE_HOST}:${config.PORT || config.KPIS_SERVICE_PORT}`,
} as const;

// ─── Structured Logger Factory ───────────────────────────────────────
const LOG_LEVELS: Record<Config['NODE_ENV'], string> = {
  production: 'info',
  development: 'debug',
  test: 'silent',
};

export function createLogger(name: string) {
  return pino({
    name,
    level: LOG_LEVELS[config.NODE_ENV],
    ...(config.NODE_ENV === 'development' && {
      transport: { target: 'pino/file', options: { destination: 1 } },
      formatters: { level: (label: string) => ({ level: label }) },
    }),
  });
}

export type Logger = ReturnType<typeof createLogger>;
