import type { ReportStatus } from '@metrica/shared-types';
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
import {
  UniqueConstraintError,
  type ActionFilters,
  type AssignmentFilters,
  type EntryFilters,
  type EntryUpsertResult,
  type KpiFilters,
  type KpiStore,
  type ReportFilters,
} from '../services/kpi-store.js';

function definedPatch<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) result[key] = patch[key];
  }
  return result;
}

/**
 * In-process KpiStore for tests. Honours the same unique keys and
 * compare-and-set semantics as the Postgres schema.
 */
export class MemoryKpiStore implements KpiStore {
  readonly kpis = new Map<string, Kpi>();
  readonly assignments = new Map<string, KpiAssignment>();
  readonly reports = new Map<string, KpiReport>();
  readonly entries = new Map<string, KpiEntry>();
  readonly actions = new Map<string, KpiAction>();

  private sequence = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }

  // ─── KPIs ───────────────────────────────────────────────────────────
  async insertKpi(input: NewKpi): Promise<Kpi> {
    const kpi: Kpi = { ...input, id: this.nextId('kpi'), createdAt: this.now(), updatedAt: this.now() };
    this.kpis.set(kpi.id, kpi);
    return structuredClone(kpi);
  }

  async updateKpi(organizationId: string, id: string, patch: KpiPatch): Promise<Kpi | null> {
    const existing = this.kpis.get(id);
    if (!existing || existing.organizationId !== organizationId) return null;
    const updated: Kpi = { ...existing, ...definedPatch(patch), updatedAt: this.now() };
    this.kpis.set(id, updated);
    return structuredClone(updated);
  }

  async findKpi(organizationId: string, id: string): Promise<Kpi | null> {
    const kpi = this.kpis.get(id);
    return kpi && kpi.organizationId === organizationId ? structuredClone(kpi) : null;
  }

  async findKpiById(id: string): Promise<Kpi | null> {
    const kpi = this.kpis.get(id);
    return kpi ? structuredClone(kpi) : null;
  }

  async listKpis(filters: KpiFilters): Promise<Kpi[]> {
    return [...this.kpis.values()]
      .filter(
        (k) =>
          (filters.organizationId === undefined || k.organizationId === filters.organizationId) &&
          (filters.branchId === undefined || k.branchId === filters.branchId) &&
          (filters.isActive === undefined || k.isActive === filters.isActive) &&
          (filters.sourceType === undefined || k.sourceType === filters.sourceType) &&
          (filters.period === undefined || k.period === filters.period)
      )
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((k) => structuredClone(k));
  }

  // ─── Assignments ────────────────────────────────────────────────────
  async insertAssignment(input: NewAssignment): Promise<KpiAssignment> {
    for (const existing of this.assignments.values()) {
      if (existing.kpiId !== input.kpiId) continue;
      if (input.role !== null && existing.role === input.role) {
        throw new UniqueConstraintError('kpi_assignments_kpi_role_idx');
      }
      if (input.userId !== null && existing.userId === input.userId) {
        throw new UniqueConstraintError('kpi_assignments_kpi_user_idx');
      }
    }
    const base = {
      id: this.nextId('assignment'),
      organizationId: input.organizationId,
      kpiId: input.kpiId,
      isActive: input.isActive,
      assignedBy: input.assignedBy,
      createdAt: this.now(),
      updatedAt: this.now(),
    };
    const assignment: KpiAssignment =
      input.assignmentType === 'role'
        ? { ...base, assignmentType: 'role', role: input.role, userId: null }
        : { ...base, assignmentType: 'user', role: null, userId: input.userId };
    this.assignments.set(assignment.id, assignment);
    return structuredClone(assignment);
  }

  async setAssignmentActive(
    organizationId: string,
    id: string,
    isActive: boolean
  ): Promise<KpiAssignment | null> {
    const existing = this.assignments.get(id);
    if (!existing || existing.organizationId !== organizationId) return null;
    const updated: KpiAssignment = { ...existing, isActive, updatedAt: this.now() };
    this.assignments.set(id, updated);
    return structuredClone(updated);
  }

  async findAssignment(organizationId: string, id: string): Promise<KpiAssignment | null> {
    const assignment = this.assignments.get(id);
    return assignment && assignment.organizationId === organizationId ? structuredClone(assignment) : null;
  }

  async listAssignments(organizationId: string, filters: AssignmentFilters): Promise<KpiAssignment[]> {
    return [...this.assignments.values()]
      .filter(
        (a) =>
          a.organizationId === organizationId &&
          (filters.kpiId === undefined || a.kpiId === filters.kpiId) &&
          (filters.isActive === undefined || a.isActive === filters.isActive) &&
          (filters.userId === undefined || a.userId === filters.userId) &&
          (filters.role === undefined || a.role === filters.role)
      )
      .map((a) => structuredClone(a));
  }

  // ─── Reports ────────────────────────────────────────────────────────
  async insertReport(input: NewReport): Promise<KpiReport> {
    for (const existing of this.reports.values()) {
      if (
        existing.assignmentId === input.assignmentId &&
        existing.periodStart === input.periodStart &&
        existing.periodEnd === input.periodEnd
      ) {
        throw new UniqueConstraintError('kpi_reports_assignment_period_idx');
      }
    }
    const report: KpiReport = {
      ...input,
      id: this.nextId('report'),
      status: 'draft',
      approvedBy: null,
      approvalNotes: '',
      submittedAt: null,
      reviewedAt: null,
      createdAt: this.now(),
      updatedAt: this.now(),
    };
    this.reports.set(report.id, report);
    return structuredClone(report);
  }

  async findReport(organizationId: string, id: string): Promise<KpiReport | null> {
    const report = this.reports.get(id);
    return report && report.organizationId === organizationId ? structuredClone(report) : null;
  }

  async updateDraftReport(id: string, patch: DraftReportPatch): Promise<KpiReport | null> {
    const existing = this.reports.get(id);
    if (!existing || existing.status !== 'draft') return null;
    const updated: KpiReport = { ...existing, ...definedPatch(patch), updatedAt: this.now() };
    this.reports.set(id, updated);
    return structuredClone(updated);
  }

  async deleteDraftReport(id: string): Promise<boolean> {
    const existing = this.reports.get(id);
    if (!existing || existing.status !== 'draft') return false;
    return this.reports.delete(id);
  }

  async transitionReport(
    id: string,
    from: ReportStatus,
    to: ReportStatus,
    stamps: ReportTransitionStamps
  ): Promise<KpiReport | null> {
    const existing = this.reports.get(id);
    if (!existing || existing.status !== from) return null;
    const updated: KpiReport = { ...existing, ...stamps, status: to, updatedAt: this.now() };
    this.reports.set(id, updated);
    return structuredClone(updated);
  }

  async listReports(organizationId: string, filters: ReportFilters): Promise<KpiReport[]> {
    return [...this.reports.values()]
      .filter(
        (r) =>
          r.organizationId === organizationId &&
          (filters.kpiId === undefined || r.kpiId === filters.kpiId) &&
          (filters.assignmentId === undefined || r.assignmentId === filters.assignmentId) &&
          (filters.status === undefined || r.status === filters.status) &&
          (filters.reportedBy === undefined || r.reportedBy === filters.reportedBy) &&
          (filters.periodStart === undefined || r.periodStart === filters.periodStart) &&
          (filters.periodEnd === undefined || r.periodEnd === filters.periodEnd)
      )
      .reverse()
      .sort((a, b) => b.periodStart.localeCompare(a.periodStart))
      .map((r) => structuredClone(r));
  }

  async listApprovedReportsForPeriod(
    kpiId: string,
    periodStart: string,
    periodEnd: string
  ): Promise<KpiReport[]> {
    return [...this.reports.values()]
      .filter(
        (r) =>
          r.kpiId === kpiId &&
          r.periodStart === periodStart &&
          r.periodEnd === periodEnd &&
          r.status === 'approved'
      )
      .map((r) => structuredClone(r));
  }

  // ─── Entries ────────────────────────────────────────────────────────
  async upsertEntry(input: EntryUpsert): Promise<EntryUpsertResult> {
    for (const existing of this.entries.values()) {
      if (
        existing.kpiId === input.kpiId &&
        existing.periodStart === input.periodStart &&
        existing.periodEnd === input.periodEnd
      ) {
        const updated: KpiEntry = {
          ...existing,
          value: input.value,
          isCalculated: input.isCalculated,
          enteredBy: input.enteredBy,
          notes: input.notes,
          metadata: input.metadata,
          updatedAt: this.now(),
        };
        this.entries.set(existing.id, updated);
        return { entry: structuredClone(updated), created: false };
      }
    }
    const entry: KpiEntry = {
      ...input,
      id: this.nextId('entry'),
      createdAt: this.now(),
      updatedAt: this.now(),
    };
    this.entries.set(entry.id, entry);
    return { entry: structuredClone(entry), created: true };
  }

  async findEntry(organizationId: string, id: string): Promise<KpiEntry | null> {
    const entry = this.entries.get(id);
    return entry && entry.organizationId === organizationId ? structuredClone(entry) : null;
  }

  async findEntryForPeriod(kpiId: string, periodStart: string, periodEnd: string): Promise<KpiEntry | null> {
    for (const entry of this.entries.values()) {
      if (entry.kpiId === kpiId && entry.periodStart === periodStart && entry.periodEnd === periodEnd) {
        return structuredClone(entry);
      }
    }
    return null;
  }

  async listEntries(organizationId: string, filters: EntryFilters): Promise<KpiEntry[]> {
    return [...this.entries.values()]
      .filter(
        (e) =>
          e.organizationId === organizationId &&
          (filters.kpiId === undefined || e.kpiId === filters.kpiId) &&
          (filters.from === undefined || e.periodStart >= filters.from) &&
          (filters.to === undefined || e.periodEnd <= filters.to)
      )
      .sort(
        (a, b) => a.periodStart.localeCompare(b.periodStart) || a.periodEnd.localeCompare(b.periodEnd)
      )
      .map((e) => structuredClone(e));
  }

  async countEntries(kpiId: string): Promise<number> {
    return [...this.entries.values()].filter((e) => e.kpiId === kpiId).length;
  }

  // ─── Actions ────────────────────────────────────────────────────────
  async insertAction(input: NewKpiAction): Promise<KpiAction> {
    const action: KpiAction = { ...input, id: this.nextId('action'), createdAt: this.now() };
    this.actions.set(action.id, action);
    return structuredClone(action);
  }

  async findAction(organizationId: string, id: string): Promise<KpiAction | null> {
    const action = this.actions.get(id);
    return action && action.organizationId === organizationId ? structuredClone(action) : null;
  }

  async listActions(organizationId: string, filters: ActionFilters): Promise<KpiAction[]> {
    return [...this.actions.values()]
      .filter(
        (a) =>
          a.organizationId === organizationId &&
          (filters.kpiId === undefined || a.kpiId === filters.kpiId) &&
          (filters.userId === undefined || a.userId === filters.userId) &&
          (filters.actionType === undefined || a.actionType === filters.actionType)
      )
      .reverse()
      .map((a) => structuredClone(a));
  }

  async countActions(kpiId: string): Promise<number> {
    return [...this.actions.values()].filter((a) => a.kpiId === kpiId).length;
  }
}
