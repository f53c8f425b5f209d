import { Router } from 'express';
import { z } from 'zod';
import { Permission, requirePermission } from '@metrica/auth-utils';
import { createLogger } from '@metrica/config';
import type { ServiceContext } from '../context.js';
import { getActor, type ActorRequest } from '../middleware/actor.js';
import { PermissionDeniedError, ValidationError } from '../middleware/error-handler.js';
import { runAggregationTrigger, runReconciliation } from '../services/aggregation.service.js';
import { getKpi } from '../services/kpi-definition.service.js';
import {
  aggregationMethodSchema,
  isoDateSchema,
  periodTypeSchema,
  toValidationError,
} from './schemas.js';

const log = createLogger('kpis:aggregation-routes');

const triggerSchema = z.object({
  kpiId: z.string().min(1),
  periodStart: isoDateSchema,
  periodEnd: isoDateSchema,
  aggregationMethod: aggregationMethodSchema.default('average'),
});

const reconcileSchema = z.object({
  referenceDate: isoDateSchema.optional(),
  aggregationMethod: aggregationMethodSchema.optional(),
  period: periodTypeSchema.optional(),
  kpiId: z.string().min(1).optional(),
  dryRun: z.boolean().optional(),
});

export function createAggregationRouter(ctx: ServiceContext): Router {
  const router = Router();
  router.use(requirePermission(Permission.KPIS_AGGREGATION_RUN));

  // ─── POST /aggregation/trigger ──────────────────────────────────────
  // Synchronous form of the trigger the approval workflow dispatches.
  router.post('/trigger', async (req: ActorRequest, res, next) => {
    try {
      const parsed = triggerSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const actor = getActor(req);
      if (!actor.capabilities.canRunAggregation) {
        throw new PermissionDeniedError('Only supervisors can run aggregation');
      }
      if (parsed.data.periodStart > parsed.data.periodEnd) {
        throw new ValidationError('periodEnd', 'Period end date must be on or after period start date');
      }
      await getKpi(ctx, actor, parsed.data.kpiId);

      const result = await runAggregationTrigger(ctx, parsed.data);
      res.json({ data: result });
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /aggregation/reconcile ────────────────────────────────────
  router.post('/reconcile', async (req: ActorRequest, res, next) => {
    try {
      const parsed = reconcileSchema.safeParse(req.body ?? {});
      if (!parsed.success) return next(toValidationError(parsed.error));

      const actor = getActor(req);
      if (!actor.capabilities.canRunAggregation) {
        throw new PermissionDeniedError('Only supervisors can run aggregation');
      }

      log.info({ organizationId: actor.organizationId, ...parsed.data }, 'Manual reconciliation requested');
      const summary = await runReconciliation(
        ctx,
        { ...parsed.data, organizationId: actor.organizationId },
        ctx.now?.() ?? new Date()
      );
      res.json({ data: summary });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
