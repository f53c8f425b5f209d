import type {
  AggregationMethod,
  KpiActionType,
  KpiSourceType,
  PeriodType,
  ReportStatus,
  TrendDirection,
  UserRole,
} from '@metrica/shared-types';
import type { KpiCapabilities } from '@metrica/auth-utils';
import type { KpiEntryMetadata } from '@metrica/db';

// ─── Periods ──────────────────────────────────────────────────────────
/** Inclusive calendar window; both ends are ISO dates (YYYY-MM-DD). */
export interface PeriodBounds {
  periodStart: string;
  periodEnd: string;
}

// ─── Directory ────────────────────────────────────────────────────────
export interface DirectoryUser {
  id: string;
  organizationId: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isActive: boolean;
}

/** The authenticated caller, with capabilities resolved from the directory role. */
export interface Actor {
  userId: string;
  organizationId: string;
  role: UserRole;
  capabilities: KpiCapabilities;
}

// ─── KPI Definitions ──────────────────────────────────────────────────
export interface Kpi {
  id: string;
  organizationId: string;
  branchId: string | null;
  name: string;
  description: string;
  sourceType: KpiSourceType;
  period: PeriodType;
  aggregationMethod: AggregationMethod;
  targetValue: number | null;
  minimumValue: number | null;
  maximumValue: number | null;
  unit: string;
  aggregateQuery: string;
  isActive: boolean;
  createdBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewKpi = Omit<Kpi, 'id' | 'createdAt' | 'updatedAt'>;

export type KpiPatch = Partial<
  Pick<
    Kpi,
    | 'branchId'
    | 'name'
    | 'description'
    | 'sourceType'
    | 'period'
    | 'aggregationMethod'
    | 'targetValue'
    | 'minimumValue'
    | 'maximumValue'
    | 'unit'
    | 'aggregateQuery'
    | 'isActive'
  >
>;

// ─── Assignments ──────────────────────────────────────────────────────
interface AssignmentBase {
  id: string;
  organizationId: string;
  kpiId: string;
  isActive: boolean;
  assignedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface RoleAssignment extends AssignmentBase {
  assignmentType: 'role';
  role: UserRole;
  userId: null;
}

export interface UserAssignment extends AssignmentBase {
  assignmentType: 'user';
  role: null;
  userId: string;
}

export type KpiAssignment = RoleAssignment | UserAssignment;

export type AssignmentTarget =
  | { assignmentType: 'role'; role: UserRole; userId: null }
  | { assignmentType: 'user'; role: null; userId: string };

export type NewAssignment = AssignmentTarget & {
  organizationId: string;
  kpiId: string;
  isActive: boolean;
  assignedBy: string | null;
};

// ─── Reports ──────────────────────────────────────────────────────────
export interface KpiReport {
  id: string;
  organizationId: string;
  kpiId: string;
  assignmentId: string;
  periodStart: string;
  periodEnd: string;
  reportedValue: number;
  notes: string;
  supportingDocumentation: Record<string, unknown>;
  status: ReportStatus;
  reportedBy: string;
  approvedBy: string | null;
  approvalNotes: string;
  submittedAt: Date | null;
  reviewedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewReport = Pick<
  KpiReport,
  | 'organizationId'
  | 'kpiId'
  | 'assignmentId'
  | 'periodStart'
  | 'periodEnd'
  | 'reportedValue'
  | 'notes'
  | 'supportingDocumentation'
  | 'reportedBy'
>;

export type DraftReportPatch = Partial<
  Pick<KpiReport, 'reportedValue' | 'notes' | 'supportingDocumentation'>
>;

/** Columns stamped by a status transition alongside the new status. */
export type ReportTransitionStamps = Partial<
  Pick<KpiReport, 'submittedAt' | 'approvedBy' | 'approvalNotes' | 'reviewedAt'>
>;

// ─── Entries ──────────────────────────────────────────────────────────
export interface KpiEntry {
  id: string;
  organizationId: string;
  kpiId: string;
  periodStart: string;
  periodEnd: string;
  value: number;
  isCalculated: boolean;
  enteredBy: string | null;
  notes: string;
  metadata: KpiEntryMetadata;
  createdAt: Date;
  updatedAt: Date;
}

export type EntryUpsert = Pick<
  KpiEntry,
  | 'organizationId'
  | 'kpiId'
  | 'periodStart'
  | 'periodEnd'
  | 'value'
  | 'isCalculated'
  | 'enteredBy'
  | 'notes'
  | 'metadata'
>;

// ─── Actions ──────────────────────────────────────────────────────────
export interface KpiAction {
  id: string;
  organizationId: string;
  kpiId: string;
  actionType: KpiActionType;
  actionData: Record<string, unknown>;
  userId: string | null;
  relatedEntityType: string;
  relatedEntityId: string;
  contributionValue: number;
  createdAt: Date;
}

export type NewKpiAction = Omit<KpiAction, 'id' | 'createdAt'>;

// ─── Aggregation Contracts ────────────────────────────────────────────
export interface AggregationTriggerRequest {
  kpiId: string;
  periodStart: string;
  periodEnd: string;
  aggregationMethod?: AggregationMethod;
}

export type AggregationTriggerResult =
  | { success: true; entryId: string; value: number; periodStart: string; periodEnd: string }
  | { success: false; message: string };

export interface ReconciliationRequest {
  referenceDate?: string;
  aggregationMethod?: AggregationMethod;
  period?: PeriodType;
  kpiId?: string;
  organizationId?: string;
  dryRun?: boolean;
}

export interface ReconciliationError {
  kpiId: string;
  kpiName: string;
  error: string;
}

export interface ReconciliationSummary {
  processed: number;
  created: number;
  updated: number;
  skipped: number;
  /** Approved reports that would contribute; only counted on dry runs. */
  pending: number;
  errors: ReconciliationError[];
}

// ─── Trend Analysis ───────────────────────────────────────────────────
export interface TrendPoint {
  periodStart: string;
  periodEnd: string;
  periodLabel: string;
  value: number;
  percentageChange: number | null;
  isIncrease: boolean | null;
  isCalculated: boolean;
  createdAt: Date;
}

export interface TrendStatistics {
  totalPeriods: number;
  firstValue: number | null;
  currentValue: number | null;
  averageValue: number | null;
  minValue: number | null;
  maxValue: number | null;
  overallChangePercentage: number | null;
  trendDirection: TrendDirection | null;
}
