import { Router } from 'express';
import { z } from 'zod';
import { Permission, requirePermission } from '@metrica/auth-utils';
import type { ServiceContext } from '../context.js';
import { getActor, type ActorRequest } from '../middleware/actor.js';
import { getKpiEntry, listKpiEntries } from '../services/aggregation.service.js';
import { isoDateSchema, toValidationError } from './schemas.js';

const listQuerySchema = z.object({
  kpiId: z.string().optional(),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
});

/** Read-only: entries are written by the aggregation engine alone. */
export function createEntriesRouter(ctx: ServiceContext): Router {
  const router = Router();
  router.use(requirePermission(Permission.KPIS_ENTRIES_READ));

  router.get('/', async (req: ActorRequest, res, next) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const entries = await listKpiEntries(ctx, getActor(req), parsed.data);
      res.json({ data: entries, count: entries.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: ActorRequest, res, next) => {
    try {
      const entry = await getKpiEntry(ctx, getActor(req), req.params.id);
      res.json({ data: entry });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
