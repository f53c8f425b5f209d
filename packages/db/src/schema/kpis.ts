import {
  pgSchema,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  numeric,
  date,
  integer,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import {
  KPI_SOURCE_TYPES,
  PERIOD_TYPES,
  AGGREGATION_METHODS,
  REPORT_STATUSES,
  KPI_ACTION_TYPES,
  type AggregationMethod,
} from '@metrica/shared-types';
import { userRoleEnum } from './users.js';

export const kpisSchema = pgSchema('kpis');

// ─── Enums ────────────────────────────────────────────────────────────
export const kpiSourceTypeEnum = kpisSchema.enum('kpi_source_type', KPI_SOURCE_TYPES);
export const kpiPeriodEnum = kpisSchema.enum('kpi_period', PERIOD_TYPES);
export const aggregationMethodEnum = kpisSchema.enum('aggregation_method', AGGREGATION_METHODS);
export const assignmentTypeEnum = kpisSchema.enum('assignment_type', ['role', 'user']);
export const reportStatusEnum = kpisSchema.enum('report_status', REPORT_STATUSES);
export const kpiActionTypeEnum = kpisSchema.enum('kpi_action_type', KPI_ACTION_TYPES);

// ─── Entry Metadata ───────────────────────────────────────────────────
export interface ManualAggregationMeta {
  source: 'aggregated_reports';
  method: AggregationMethod;
  reportsCount: number;
  reporters: string[];
}

export interface SystemAggregationMeta {
  source: 'system_aggregate';
  queryId: string;
}

export type KpiEntryMetadata = ManualAggregationMeta | SystemAggregationMeta;

// ─── KPI Definitions ──────────────────────────────────────────────────
export const kpis = kpisSchema.table(
  'kpis',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id').notNull(),
    branchId: uuid('branch_id'), // NULL = organization-wide
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description').notNull().default(''),
    sourceType: kpiSourceTypeEnum('source_type').notNull().default('manual'),
    period: kpiPeriodEnum('period').notNull().default('monthly'),
    aggregationMethod: aggregationMethodEnum('aggregation_method').notNull().default('average'),
    targetValue: numeric('target_value', { precision: 15, scale: 2 }),
    minimumValue: numeric('minimum_value', { precision: 15, scale: 2 }),
    maximumValue: numeric('maximum_value', { precision: 15, scale: 2 }),
    unit: varchar('unit', { length: 50 }).notNull().default(''),
    aggregateQuery: text('aggregate_query').notNull().default(''),
    isActive: boolean('is_active').notNull().default(true),
    createdBy: uuid('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('kpis_org_idx').on(table.organizationId),
    index('kpis_org_active_idx').on(table.organizationId, table.isActive),
    index('kpis_branch_idx').on(table.branchId),
  ]
);

// ─── Assignments ──────────────────────────────────────────────────────
export const kpiAssignments = kpisSchema.table(
  'kpi_assignments',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id').notNull(),
    kpiId: uuid('kpi_id')
      .notNull()
      .references(() => kpis.id, { onDelete: 'cascade' }),
    assignmentType: assignmentTypeEnum('assignment_type').notNull(),
    role: userRoleEnum('role'),
    userId: uuid('user_id'),
    isActive: boolean('is_active').notNull().default(true),
    assignedBy: uuid('assigned_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('kpi_assignments_kpi_role_idx').on(table.kpiId, table.role),
    uniqueIndex('kpi_assignments_kpi_user_idx').on(table.kpiId, table.userId),
    index('kpi_assignments_user_idx').on(table.userId),
    index('kpi_assignments_role_idx').on(table.organizationId, table.role),
  ]
);

// ─── Reports ──────────────────────────────────────────────────────────
export const kpiReports = kpisSchema.table(
  'kpi_reports',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id').notNull(),
    kpiId: uuid('kpi_id')
      .notNull()
      .references(() => kpis.id, { onDelete: 'cascade' }),
    assignmentId: uuid('assignment_id')
      .notNull()
      .references(() => kpiAssignments.id, { onDelete: 'cascade' }),
    periodStart: date('period_start').notNull(),
    periodEnd: date('period_end').notNull(),
    reportedValue: numeric('reported_value', { precision: 15, scale: 2 }).notNull(),
    notes: text('notes').notNull().default(''),
    supportingDocumentation: jsonb('supporting_documentation')
      .$type<Record<string, unknown>>()
      .notNull()
      .default({}),
    status: reportStatusEnum('status').notNull().default('draft'),
    reportedBy: uuid('reported_by').notNull(),
    approvedBy: uuid('approved_by'),
    approvalNotes: text('approval_notes').notNull().default(''),
    submittedAt: timestamp('submitted_at', { withTimezone: true }),
    reviewedAt: timestamp('reviewed_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('kpi_reports_assignment_period_idx').on(
      table.assignmentId,
      table.periodStart,
      table.periodEnd
    ),
    index('kpi_reports_kpi_period_status_idx').on(
      table.kpiId,
      table.periodStart,
      table.periodEnd,
      table.status
    ),
    index('kpi_reports_org_status_idx').on(table.organizationId, table.status),
    index('kpi_reports_reporter_idx').on(table.reportedBy),
  ]
);

// ─── Entries ──────────────────────────────────────────────────────────
// Canonical per-period value. Written only by the aggregation engine.
export const kpiEntries = kpisSchema.table(
  'kpi_entries',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id').notNull(),
    kpiId: uuid('kpi_id')
      .notNull()
      .references(() => kpis.id, { onDelete: 'restrict' }),
    periodStart: date('period_start').notNull(),
    periodEnd: date('period_end').notNull(),
    value: numeric('value', { precision: 15, scale: 2 }).notNull(),
    isCalculated: boolean('is_calculated').notNull().default(false),
    enteredBy: uuid('entered_by'),
    notes: text('notes').notNull().default(''),
    metadata: jsonb('metadata').$type<KpiEntryMetadata>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('kpi_entries_kpi_period_idx').on(table.kpiId, table.periodStart, table.periodEnd),
    index('kpi_entries_org_idx').on(table.organizationId),
  ]
);

// ─── Actions ──────────────────────────────────────────────────────────
// Immutable contribution records for aggregate-type KPIs.
export const kpiActions = kpisSchema.table(
  'kpi_actions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id').notNull(),
    kpiId: uuid('kpi_id')
      .notNull()
      .references(() => kpis.id, { onDelete: 'cascade' }),
    actionType: kpiActionTypeEnum('action_type').notNull(),
    actionData: jsonb('action_data').$type<Record<string, unknown>>().notNull().default({}),
    userId: uuid('user_id'),
    relatedEntityType: varchar('related_entity_type', { length: 100 }).notNull().default(''),
    relatedEntityId: varchar('related_entity_id', { length: 255 }).notNull().default(''),
    contributionValue: integer('contribution_value').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('kpi_actions_kpi_created_idx').on(table.kpiId, table.createdAt),
    index('kpi_actions_user_created_idx').on(table.userId, table.createdAt),
    index('kpi_actions_type_idx').on(table.actionType),
  ]
);
