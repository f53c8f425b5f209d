import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from '@metrica/config';
import { authMiddleware } from '@metrica/auth-utils';
import type { ServiceContext } from './context.js';
import { createActorMiddleware } from './middleware/actor.js';
import { errorHandler } from './middleware/error-handler.js';
import { createActionsRouter } from './routes/actions.routes.js';
import { createAggregationRouter } from './routes/aggregation.routes.js';
import { createAssignmentsRouter } from './routes/assignments.routes.js';
import { createEntriesRouter } from './routes/entries.routes.js';
import { createKpisRouter } from './routes/kpis.routes.js';
import { createReportsRouter } from './routes/reports.routes.js';

export interface AppOptions {
  /** Named dependency probes for /health; each resolves when the dependency is reachable. */
  healthChecks?: Record<string, () => Promise<unknown>>;
}

export function createApp(ctx: ServiceContext, options: AppOptions = {}): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.APP_URL, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  // ─── Health Check ─────────────────────────────────────────────────────
  app.get('/health', async (_req, res) => {
    const checks: Record<string, string> = {};
    let healthy = true;

    for (const [name, probe] of Object.entries(options.healthChecks ?? {})) {
      try {
        await probe();
        checks[name] = 'ok';
      } catch {
        checks[name] = 'down';
        healthy = false;
      }
    }

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      service: 'kpis',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // Routes: JWT first, then the caller is resolved against the directory
  app.use(authMiddleware);
  app.use(createActorMiddleware(ctx.directory));
  app.use('/kpis', createKpisRouter(ctx));
  app.use('/assignments', createAssignmentsRouter(ctx));
  app.use('/reports', createReportsRouter(ctx));
  app.use('/entries', createEntriesRouter(ctx));
  app.use('/actions', createActionsRouter(ctx));
  app.use('/aggregation', createAggregationRouter(ctx));

  app.use(errorHandler);

  return app;
}
