import { config, createLogger } from '@metrica/config';
import { closeDb, db } from '@metrica/db';
import { getEventBus } from '@metrica/events';
import { sql } from 'drizzle-orm';
import { createApp } from './app.js';
import type { ServiceContext } from './context.js';
import { createAggregationDispatcher } from './services/aggregation-dispatcher.js';
import { DrizzleKpiStore } from './services/drizzle-kpi-store.js';
import { startReconciliationScheduler } from './services/reconciliation-scheduler.service.js';
import { DrizzleUserDirectory } from './services/user-directory.js';
import { startAggregationWorker, stopAggregationWorker } from './workers/index.js';

const log = createLogger('kpis');

const store = new DrizzleKpiStore(db);
const events = getEventBus(config.REDIS_URL);
const dispatcher = createAggregationDispatcher({ store, events }, config);

const ctx: ServiceContext = {
  store,
  directory: new DrizzleUserDirectory(db),
  events,
  dispatcher,
};

const app = createApp(ctx, {
  healthChecks: {
    database: () => db.execute(sql`SELECT 1`),
    redis: async () => {
      if (!(await events.ping())) throw new Error('Redis ping failed');
    },
  },
});

const PORT = config.PORT || config.KPIS_SERVICE_PORT;
const server = app.listen(PORT, () => {
  log.info({ port: PORT, dispatch: config.KPI_AGGREGATION_DISPATCH }, 'KPI service started');
});

const aggregationWorker =
  config.KPI_AGGREGATION_DISPATCH === 'queue'
    ? startAggregationWorker({ store, events }, {
        redisUrl: config.REDIS_URL,
        maxAttempts: config.KPI_AGGREGATION_MAX_ATTEMPTS,
      })
    : null;

const reconciliationScheduler = startReconciliationScheduler(
  { store, events },
  {
    enabled: config.KPI_RECONCILIATION_ENABLED,
    intervalMinutes: config.KPI_RECONCILIATION_INTERVAL_MINUTES,
  }
);
void reconciliationScheduler.runOnce();

// ─── Graceful Shutdown ───────────────────────────────────────────────
async function releaseResources(): Promise<void> {
  if (aggregationWorker) await stopAggregationWorker(aggregationWorker);
  await events.shutdown();
  await closeDb();
}

function shutdown(signal: string) {
  log.info({ signal }, 'Shutting down gracefully');
  reconciliationScheduler.stop();
  server.close(() => {
    log.info('HTTP server closed');
    releaseResources()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Error while releasing resources');
        process.exit(1);
      });
  });
  setTimeout(() => {
    log.fatal('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
