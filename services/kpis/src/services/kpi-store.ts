import type {
  KpiActionType,
  KpiSourceType,
  PeriodType,
  ReportStatus,
  UserRole,
} from '@metrica/shared-types';
import type {
  DraftReportPatch,
  EntryUpsert,
  Kpi,
  KpiAction,
  KpiAssignment,
  KpiEntry,
  KpiPatch,
  KpiReport,
  NewAssignment,
  NewKpi,
  NewKpiAction,
  NewReport,
  ReportTransitionStamps,
} from '../types.js';

// ─── Store Errors ─────────────────────────────────────────────────────
/** A write collided with one of the store's unique keys. */
export class UniqueConstraintError extends Error {
  constructor(public constraint: string) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = 'UniqueConstraintError';
  }
}

// ─── Filters ──────────────────────────────────────────────────────────
export interface KpiFilters {
  /** Omit to list across every organization (reconciliation). */
  organizationId?: string;
  branchId?: string;
  isActive?: boolean;
  sourceType?: KpiSourceType;
  period?: PeriodType;
}

export interface AssignmentFilters {
  kpiId?: string;
  isActive?: boolean;
  userId?: string;
  role?: UserRole;
}

export interface ReportFilters {
  kpiId?: string;
  assignmentId?: string;
  status?: ReportStatus;
  reportedBy?: string;
  periodStart?: string;
  periodEnd?: string;
}

export interface EntryFilters {
  kpiId?: string;
  /** Entries whose period starts on or after this date. */
  from?: string;
  /** Entries whose period ends on or before this date. */
  to?: string;
}

export interface ActionFilters {
  kpiId?: string;
  userId?: string;
  actionType?: KpiActionType;
}

export interface EntryUpsertResult {
  entry: KpiEntry;
  created: boolean;
}

// ─── Store Contract ───────────────────────────────────────────────────
/**
 * Persistence boundary for the KPI service.
 *
 * Entries are written only through `upsertEntry`, keyed by
 * (kpiId, periodStart, periodEnd). Report status changes go through
 * `transitionReport`, which only succeeds when the stored status still
 * equals `from`.
 */
export interface KpiStore {
  insertKpi(input: NewKpi): Promise<Kpi>;
  updateKpi(organizationId: string, id: string, patch: KpiPatch): Promise<Kpi | null>;
  findKpi(organizationId: string, id: string): Promise<Kpi | null>;
  findKpiById(id: string): Promise<Kpi | null>;
  listKpis(filters: KpiFilters): Promise<Kpi[]>;

  insertAssignment(input: NewAssignment): Promise<KpiAssignment>;
  setAssignmentActive(organizationId: string, id: string, isActive: boolean): Promise<KpiAssignment | null>;
  findAssignment(organizationId: string, id: string): Promise<KpiAssignment | null>;
  listAssignments(organizationId: string, filters: AssignmentFilters): Promise<KpiAssignment[]>;

  insertReport(input: NewReport): Promise<KpiReport>;
  findReport(organizationId: string, id: string): Promise<KpiReport | null>;
  updateDraftReport(id: string, patch: DraftReportPatch): Promise<KpiReport | null>;
  deleteDraftReport(id: string): Promise<boolean>;
  transitionReport(
    id: string,
    from: ReportStatus,
    to: ReportStatus,
    stamps: ReportTransitionStamps
  ): Promise<KpiReport | null>;
  listReports(organizationId: string, filters: ReportFilters): Promise<KpiReport[]>;
  listApprovedReportsForPeriod(kpiId: string, periodStart: string, periodEnd: string): Promise<KpiReport[]>;

  upsertEntry(input: EntryUpsert): Promise<EntryUpsertResult>;
  findEntry(organizationId: string, id: string): Promise<KpiEntry | null>;
  findEntryForPeriod(kpiId: string, periodStart: string, periodEnd: string): Promise<KpiEntry | null>;
  /** Ordered by periodStart ascending. */
  listEntries(organizationId: string, filters: EntryFilters): Promise<KpiEntry[]>;
  countEntries(kpiId: string): Promise<number>;

  insertAction(input: NewKpiAction): Promise<KpiAction>;
  findAction(organizationId: string, id: string): Promise<KpiAction | null>;
  /** Newest first. */
  listActions(organizationId: string, filters: ActionFilters): Promise<KpiAction[]>;
  countActions(kpiId: string): Promise<number>;
}
