import { Router } from 'express';
import { z } from 'zod';
import { Permission, requirePermission } from '@metrica/auth-utils';
import type { ServiceContext } from '../context.js';
import { getActor, type ActorRequest } from '../middleware/actor.js';
import { PermissionDeniedError } from '../middleware/error-handler.js';
import { recordSystemAggregate } from '../services/aggregation.service.js';
import { resolveResponsibleUsers } from '../services/assignment.service.js';
import {
  createKpi,
  deactivateKpi,
  getKpi,
  listKpis,
  updateKpi,
} from '../services/kpi-definition.service.js';
import { getKpiStats, getUserKpiPerformance } from '../services/performance.service.js';
import { analyzeKpiTrend } from '../services/trend-analysis.service.js';
import {
  aggregationMethodSchema,
  booleanQuerySchema,
  decimalSchema,
  isoDateSchema,
  periodTypeSchema,
  sourceTypeSchema,
  toValidationError,
} from './schemas.js';

// ─── Validation Schemas ───────────────────────────────────────────────
const kpiFieldsSchema = z.object({
  name: z.string().min(1).max(255),
  description: z.string().optional(),
  branchId: z.string().uuid().nullable().optional(),
  sourceType: sourceTypeSchema,
  period: periodTypeSchema,
  aggregationMethod: aggregationMethodSchema.optional(),
  targetValue: decimalSchema.nullable().optional(),
  minimumValue: decimalSchema.nullable().optional(),
  maximumValue: decimalSchema.nullable().optional(),
  unit: z.string().max(50).optional(),
  aggregateQuery: z.string().optional(),
  isActive: z.boolean().optional(),
});

const kpiPatchSchema = kpiFieldsSchema.partial().strict();

const listQuerySchema = z.object({
  branchId: z.string().uuid().optional(),
  isActive: booleanQuerySchema.optional(),
  sourceType: sourceTypeSchema.optional(),
  period: periodTypeSchema.optional(),
});

const trendQuerySchema = z.object({
  periods: z.coerce.number().int().min(0).optional(),
  statisticsScope: z.enum(['window', 'full_history']).optional(),
});

const meQuerySchema = z.object({
  date: isoDateSchema.optional(),
});

const systemEntrySchema = z.object({
  periodStart: isoDateSchema,
  periodEnd: isoDateSchema,
  value: decimalSchema,
  notes: z.string().max(2000).optional(),
});

export function createKpisRouter(ctx: ServiceContext): Router {
  const router = Router();

  // ─── GET /kpis ──────────────────────────────────────────────────────
  router.get('/', async (req: ActorRequest, res, next) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const kpis = await listKpis(ctx, getActor(req), parsed.data);
      res.json({ data: kpis, count: kpis.length });
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /kpis ─────────────────────────────────────────────────────
  router.post('/', requirePermission(Permission.KPIS_DEFINITIONS_MANAGE), async (req: ActorRequest, res, next) => {
    try {
      const parsed = kpiFieldsSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const kpi = await createKpi(ctx, getActor(req), parsed.data);
      res.status(201).json({ data: kpi });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /kpis/me ───────────────────────────────────────────────────
  router.get('/me', async (req: ActorRequest, res, next) => {
    try {
      const parsed = meQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const summary = await getUserKpiPerformance(ctx, getActor(req), parsed.data.date);
      res.json({ data: summary });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /kpis/:id ──────────────────────────────────────────────────
  router.get('/:id', async (req: ActorRequest, res, next) => {
    try {
      const kpi = await getKpi(ctx, getActor(req), req.params.id);
      res.json({ data: kpi });
    } catch (err) {
      next(err);
    }
  });

  // ─── PATCH /kpis/:id ────────────────────────────────────────────────
  router.patch('/:id', requirePermission(Permission.KPIS_DEFINITIONS_MANAGE), async (req: ActorRequest, res, next) => {
    try {
      const parsed = kpiPatchSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const kpi = await updateKpi(ctx, getActor(req), req.params.id, parsed.data);
      res.json({ data: kpi });
    } catch (err) {
      next(err);
    }
  });

  // ─── DELETE /kpis/:id (soft) ────────────────────────────────────────
  router.delete('/:id', requirePermission(Permission.KPIS_DEFINITIONS_MANAGE), async (req: ActorRequest, res, next) => {
    try {
      const kpi = await deactivateKpi(ctx, getActor(req), req.params.id);
      res.json({ data: kpi });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /kpis/:id/stats ────────────────────────────────────────────
  router.get('/:id/stats', async (req: ActorRequest, res, next) => {
    try {
      const stats = await getKpiStats(ctx, getActor(req), req.params.id);
      res.json({ data: stats });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /kpis/:id/trend ────────────────────────────────────────────
  router.get('/:id/trend', async (req: ActorRequest, res, next) => {
    try {
      const parsed = trendQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const analysis = await analyzeKpiTrend(ctx, getActor(req), req.params.id, {
        periodsCount: parsed.data.periods,
        statisticsScope: parsed.data.statisticsScope,
      });
      res.json({ data: analysis });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /kpis/:id/responsible-users ────────────────────────────────
  router.get(
    '/:id/responsible-users',
    requirePermission(Permission.KPIS_ASSIGNMENTS_READ),
    async (req: ActorRequest, res, next) => {
      try {
        const actor = getActor(req);
        const kpi = await getKpi(ctx, actor, req.params.id);
        const users = await resolveResponsibleUsers(ctx, actor.organizationId, kpi.id);
        res.json({ data: users, count: users.length });
      } catch (err) {
        next(err);
      }
    }
  );

  // ─── POST /kpis/:id/system-entries ──────────────────────────────────
  router.post(
    '/:id/system-entries',
    requirePermission(Permission.KPIS_ENTRIES_RECORD_SYSTEM),
    async (req: ActorRequest, res, next) => {
      try {
        const parsed = systemEntrySchema.safeParse(req.body);
        if (!parsed.success) return next(toValidationError(parsed.error));

        const actor = getActor(req);
        if (!actor.capabilities.canRecordSystemEntries) {
          throw new PermissionDeniedError('Only supervisors can record system aggregates');
        }
        const kpi = await getKpi(ctx, actor, req.params.id);
        const { entry, created } = await recordSystemAggregate(ctx, kpi, parsed.data);
        res.status(created ? 201 : 200).json({ data: entry });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
