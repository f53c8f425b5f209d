// ─── Shared Types for Metrica ─────────────────────────────────────────
// Types used across multiple packages. Import from @metrica/shared-types.

// ─── User Roles ───────────────────────────────────────────────────────
export type UserRole =
  | 'org_admin'
  | 'supervisor'
  | 'manager'
  | 'agent'
  | 'analyst';

export const USER_ROLES = [
  'org_admin',
  'supervisor',
  'manager',
  'agent',
  'analyst',
] as const satisfies readonly UserRole[];

// ─── KPI Definition Types ─────────────────────────────────────────────
export type KpiSourceType = 'aggregate' | 'manual';

export const KPI_SOURCE_TYPES = ['aggregate', 'manual'] as const satisfies readonly KpiSourceType[];

export type PeriodType = 'daily' | 'weekly' | 'monthly' | 'quarterly' | 'yearly';

export const PERIOD_TYPES = [
  'daily',
  'weekly',
  'monthly',
  'quarterly',
  'yearly',
] as const satisfies readonly PeriodType[];

export type AggregationMethod = 'sum' | 'average' | 'count';

export const AGGREGATION_METHODS = ['sum', 'average', 'count'] as const satisfies readonly AggregationMethod[];

// ─── Assignment Types ─────────────────────────────────────────────────
export type AssignmentType = 'role' | 'user';

// ─── Report Workflow Types ────────────────────────────────────────────
export type ReportStatus = 'draft' | 'submitted' | 'approved' | 'rejected';

export const REPORT_STATUSES = [
  'draft',
  'submitted',
  'approved',
  'rejected',
] as const satisfies readonly ReportStatus[];

// ─── KPI Action Types ─────────────────────────────────────────────────
export type KpiActionType =
  | 'ticket_created'
  | 'ticket_resolved'
  | 'message_sent'
  | 'user_created'
  | 'custom';

export const KPI_ACTION_TYPES = [
  'ticket_created',
  'ticket_resolved',
  'message_sent',
  'user_created',
  'custom',
] as const satisfies readonly KpiActionType[];

// ─── Trend Analysis ───────────────────────────────────────────────────
export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export type TrendStatisticsScope = 'window' | 'full_history';

// ─── Pagination ───────────────────────────────────────────────────────
export interface ListResponse<T> {
  data: T[];
  count: number;
}
