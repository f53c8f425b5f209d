import { Router } from 'express';
import { z } from 'zod';
import { Permission, requirePermission } from '@metrica/auth-utils';
import type { ServiceContext } from '../context.js';
import { getActor, type ActorRequest } from '../middleware/actor.js';
import {
  createReport,
  deleteDraftReport,
  getReport,
  listApprovals,
  listReports,
  reviewReport,
  submitReport,
  updateDraftReport,
} from '../services/report-workflow.service.js';
import { decimalSchema, isoDateSchema, reportStatusSchema, toValidationError } from './schemas.js';

// ─── Validation Schemas ───────────────────────────────────────────────
const createReportSchema = z.object({
  assignmentId: z.string().min(1),
  periodStart: isoDateSchema,
  periodEnd: isoDateSchema,
  reportedValue: decimalSchema,
  notes: z.string().max(5000).optional(),
  supportingDocumentation: z.record(z.unknown()).optional(),
});

const updateDraftSchema = z
  .object({
    reportedValue: decimalSchema,
    notes: z.string().max(5000),
    supportingDocumentation: z.record(z.unknown()),
  })
  .partial()
  .strict();

const reviewSchema = z.object({
  action: z.enum(['approve', 'reject']),
  notes: z.string().max(5000).optional(),
});

const listQuerySchema = z.object({
  kpiId: z.string().optional(),
  assignmentId: z.string().optional(),
  status: reportStatusSchema.optional(),
  periodStart: isoDateSchema.optional(),
  periodEnd: isoDateSchema.optional(),
});

const approvalsQuerySchema = z.object({
  status: reportStatusSchema.default('submitted'),
});

export function createReportsRouter(ctx: ServiceContext): Router {
  const router = Router();

  // ─── GET /reports ───────────────────────────────────────────────────
  router.get('/', async (req: ActorRequest, res, next) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const reports = await listReports(ctx, getActor(req), parsed.data);
      res.json({ data: reports, count: reports.length });
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /reports ──────────────────────────────────────────────────
  router.post('/', requirePermission(Permission.KPIS_REPORTS_CREATE), async (req: ActorRequest, res, next) => {
    try {
      const parsed = createReportSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const report = await createReport(ctx, getActor(req), parsed.data);
      res.status(201).json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /reports/approvals ─────────────────────────────────────────
  router.get('/approvals', requirePermission(Permission.KPIS_REPORTS_REVIEW), async (req: ActorRequest, res, next) => {
    try {
      const parsed = approvalsQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const reports = await listApprovals(ctx, getActor(req), parsed.data.status);
      res.json({ data: reports, count: reports.length });
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /reports/:id ───────────────────────────────────────────────
  router.get('/:id', async (req: ActorRequest, res, next) => {
    try {
      const report = await getReport(ctx, getActor(req), req.params.id);
      res.json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  // ─── PATCH /reports/:id (draft only) ────────────────────────────────
  router.patch('/:id', async (req: ActorRequest, res, next) => {
    try {
      const parsed = updateDraftSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const report = await updateDraftReport(ctx, getActor(req), req.params.id, parsed.data);
      res.json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  // ─── DELETE /reports/:id (draft only) ───────────────────────────────
  router.delete('/:id', async (req: ActorRequest, res, next) => {
    try {
      await deleteDraftReport(ctx, getActor(req), req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /reports/:id/submit ───────────────────────────────────────
  router.post('/:id/submit', async (req: ActorRequest, res, next) => {
    try {
      const report = await submitReport(ctx, getActor(req), req.params.id);
      res.json({ data: report });
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /reports/:id/review ───────────────────────────────────────
  router.post('/:id/review', requirePermission(Permission.KPIS_REPORTS_REVIEW), async (req: ActorRequest, res, next) => {
    try {
      const parsed = reviewSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const outcome = await reviewReport(ctx, getActor(req), req.params.id, parsed.data);
      res.json({ data: outcome.report, aggregation: outcome.aggregation });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
