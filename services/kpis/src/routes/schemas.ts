import { z, type ZodError } from 'zod';
import {
  AGGREGATION_METHODS,
  KPI_ACTION_TYPES,
  KPI_SOURCE_TYPES,
  PERIOD_TYPES,
  REPORT_STATUSES,
  USER_ROLES,
} from '@metrica/shared-types';
import { ValidationError } from '../middleware/error-handler.js';
import { isIsoDate } from '../services/period.service.js';

// ─── Shared Field Schemas ─────────────────────────────────────────────
export const isoDateSchema = z.string().refine(isIsoDate, { message: 'Must be a valid date (YYYY-MM-DD)' });

export const decimalSchema = z.number().finite();

export const booleanQuerySchema = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true');

export const idParamSchema = z.string().min(1);

export const sourceTypeSchema = z.enum(KPI_SOURCE_TYPES);
export const periodTypeSchema = z.enum(PERIOD_TYPES);
export const aggregationMethodSchema = z.enum(AGGREGATION_METHODS);
export const reportStatusSchema = z.enum(REPORT_STATUSES);
export const userRoleSchema = z.enum(USER_ROLES);
export const actionTypeSchema = z.enum(KPI_ACTION_TYPES);

/** Surfaces the first issue as a ValidationError naming its field. */
export function toValidationError(error: ZodError): ValidationError {
  const [issue] = error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
  return new ValidationError(field, issue?.message ?? 'Invalid request');
}
