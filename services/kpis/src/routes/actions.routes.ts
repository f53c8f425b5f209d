import { Router } from 'express';
import { z } from 'zod';
import { Permission, requirePermission } from '@metrica/auth-utils';
import type { ServiceContext } from '../context.js';
import { getActor, type ActorRequest } from '../middleware/actor.js';
import { getKpiAction, listKpiActions, recordKpiAction } from '../services/kpi-action.service.js';
import { actionTypeSchema, decimalSchema, toValidationError } from './schemas.js';

const createActionSchema = z.object({
  kpiId: z.string().min(1),
  actionType: actionTypeSchema,
  actionData: z.record(z.unknown()).optional(),
  relatedEntityType: z.string().max(50).optional(),
  relatedEntityId: z.string().max(255).optional(),
  contributionValue: decimalSchema.optional(),
});

const listQuerySchema = z.object({
  kpiId: z.string().optional(),
  userId: z.string().optional(),
  actionType: actionTypeSchema.optional(),
});

export function createActionsRouter(ctx: ServiceContext): Router {
  const router = Router();
  router.use(requirePermission(Permission.KPIS_ACTIONS_READ));

  router.get('/', async (req: ActorRequest, res, next) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const actions = await listKpiActions(ctx, getActor(req), parsed.data);
      res.json({ data: actions, count: actions.length });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', requirePermission(Permission.KPIS_ACTIONS_CREATE), async (req: ActorRequest, res, next) => {
    try {
      const parsed = createActionSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const action = await recordKpiAction(ctx, getActor(req), parsed.data);
      res.status(201).json({ data: action });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: ActorRequest, res, next) => {
    try {
      const action = await getKpiAction(ctx, getActor(req), req.params.id);
      res.json({ data: action });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
