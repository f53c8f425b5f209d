import { Router } from 'express';
import { z } from 'zod';
import { Permission, requirePermission } from '@metrica/auth-utils';
import type { ServiceContext } from '../context.js';
import { getActor, type ActorRequest } from '../middleware/actor.js';
import {
  createAssignment,
  deactivateAssignment,
  getAssignment,
  listAssignments,
  updateAssignment,
} from '../services/assignment.service.js';
import { booleanQuerySchema, toValidationError, userRoleSchema } from './schemas.js';

const createAssignmentSchema = z.object({
  kpiId: z.string().min(1),
  assignmentType: z.enum(['role', 'user']),
  role: userRoleSchema.nullable().optional(),
  userId: z.string().min(1).nullable().optional(),
  isActive: z.boolean().optional(),
});

const updateAssignmentSchema = z.object({
  isActive: z.boolean(),
});

const listQuerySchema = z.object({
  kpiId: z.string().optional(),
  isActive: booleanQuerySchema.optional(),
  userId: z.string().optional(),
  role: userRoleSchema.optional(),
});

export function createAssignmentsRouter(ctx: ServiceContext): Router {
  const router = Router();
  router.use(requirePermission(Permission.KPIS_ASSIGNMENTS_READ));

  router.get('/', async (req: ActorRequest, res, next) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const assignments = await listAssignments(ctx, getActor(req), parsed.data);
      res.json({ data: assignments, count: assignments.length });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req: ActorRequest, res, next) => {
    try {
      const parsed = createAssignmentSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const assignment = await createAssignment(ctx, getActor(req), parsed.data);
      res.status(201).json({ data: assignment });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: ActorRequest, res, next) => {
    try {
      const assignment = await getAssignment(ctx, getActor(req), req.params.id);
      res.json({ data: assignment });
    } catch (err) {
      next(err);
    }
  });

  router.patch('/:id', async (req: ActorRequest, res, next) => {
    try {
      const parsed = updateAssignmentSchema.safeParse(req.body);
      if (!parsed.success) return next(toValidationError(parsed.error));

      const assignment = await updateAssignment(ctx, getActor(req), req.params.id, parsed.data);
      res.json({ data: assignment });
    } catch (err) {
      next(err);
    }
  });

  // Assignments are deactivated, never removed.
  router.delete('/:id', async (req: ActorRequest, res, next) => {
    try {
      const assignment = await deactivateAssignment(ctx, getActor(req), req.params.id);
      res.json({ data: assignment });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
