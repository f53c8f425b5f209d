import { and, asc, count, desc, eq, gte, lte, getTableColumns, sql, type SQL } from 'drizzle-orm';
import postgres from 'postgres';
import { db as defaultDb, schema, type Database } from '@metrica/db';
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
} from './kpi-store.js';

const { kpis, kpiAssignments, kpiReports, kpiEntries, kpiActions } = schema;

type KpiRow = typeof kpis.$inferSelect;
type AssignmentRow = typeof kpiAssignments.$inferSelect;
type ReportRow = typeof kpiReports.$inferSelect;
type EntryRow = typeof kpiEntries.$inferSelect;
type ActionRow = typeof kpiActions.$inferSelect;

// ─── Row Mapping ──────────────────────────────────────────────────────
// numeric(15,2) columns come back as strings.

function toDecimal(value: number): string {
  return value.toFixed(2);
}

function toOptionalDecimal(value: number | null | undefined): string | null | undefined {
  if (value === undefined) return undefined;
  return value === null ? null : toDecimal(value);
}

function fromDecimal(value: string): number {
  return Number(value);
}

function fromOptionalDecimal(value: string | null): number | null {
  return value === null ? null : Number(value);
}

function toKpi(row: KpiRow): Kpi {
  return {
    ...row,
    targetValue: fromOptionalDecimal(row.targetValue),
    minimumValue: fromOptionalDecimal(row.minimumValue),
    maximumValue: fromOptionalDecimal(row.maximumValue),
  };
}

function toAssignment(row: AssignmentRow): KpiAssignment {
  const base = {
    id: row.id,
    organizationId: row.organizationId,
    kpiId: row.kpiId,
    isActive: row.isActive,
    assignedBy: row.assignedBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
  if (row.assignmentType === 'role') {
    if (!row.role) throw new Error(`Role assignment ${row.id} has no role`);
    return { ...base, assignmentType: 'role', role: row.role, userId: null };
  }
  if (!row.userId) throw new Error(`User assignment ${row.id} has no user`);
  return { ...base, assignmentType: 'user', role: null, userId: row.userId };
}

function toReport(row: ReportRow): KpiReport {
  return { ...row, reportedValue: fromDecimal(row.reportedValue) };
}

function toEntry(row: EntryRow): KpiEntry {
  return { ...row, value: fromDecimal(row.value) };
}

function toAction(row: ActionRow): KpiAction {
  return row;
}

function translateUniqueViolation(err: unknown): unknown {
  if (err instanceof postgres.PostgresError && err.code === '23505') {
    return new UniqueConstraintError(err.constraint_name ?? 'unknown');
  }
  return err;
}

// ─── Drizzle Store ────────────────────────────────────────────────────
export class DrizzleKpiStore implements KpiStore {
  constructor(private readonly db: Database = defaultDb) {}

  // ─── KPIs ───────────────────────────────────────────────────────────
  async insertKpi(input: NewKpi): Promise<Kpi> {
    const [row] = await this.db
      .insert(kpis)
      .values({
        ...input,
        targetValue: toOptionalDecimal(input.targetValue),
        minimumValue: toOptionalDecimal(input.minimumValue),
        maximumValue: toOptionalDecimal(input.maximumValue),
      })
      .returning();
    return toKpi(row);
  }

  async updateKpi(organizationId: string, id: string, patch: KpiPatch): Promise<Kpi | null> {
    const [row] = await this.db
      .update(kpis)
      .set({
        ...patch,
        targetValue: toOptionalDecimal(patch.targetValue),
        minimumValue: toOptionalDecimal(patch.minimumValue),
        maximumValue: toOptionalDecimal(patch.maximumValue),
        updatedAt: new Date(),
      })
      .where(and(eq(kpis.id, id), eq(kpis.organizationId, organizationId)))
      .returning();
    return row ? toKpi(row) : null;
  }

  async findKpi(organizationId: string, id: string): Promise<Kpi | null> {
    const [row] = await this.db
      .select()
      .from(kpis)
      .where(and(eq(kpis.id, id), eq(kpis.organizationId, organizationId)))
      .limit(1);
    return row ? toKpi(row) : null;
  }

  async findKpiById(id: string): Promise<Kpi | null> {
    const [row] = await this.db.select().from(kpis).where(eq(kpis.id, id)).limit(1);
    return row ? toKpi(row) : null;
  }

  async listKpis(filters: KpiFilters): Promise<Kpi[]> {
    const conditions: SQL[] = [];
    if (filters.organizationId) conditions.push(eq(kpis.organizationId, filters.organizationId));
    if (filters.branchId) conditions.push(eq(kpis.branchId, filters.branchId));
    if (filters.isActive !== undefined) conditions.push(eq(kpis.isActive, filters.isActive));
    if (filters.sourceType) conditions.push(eq(kpis.sourceType, filters.sourceType));
    if (filters.period) conditions.push(eq(kpis.period, filters.period));

    const rows = await this.db
      .select()
      .from(kpis)
      .where(and(...conditions))
      .orderBy(asc(kpis.name));
    return rows.map(toKpi);
  }

  // ─── Assignments ────────────────────────────────────────────────────
  async insertAssignment(input: NewAssignment): Promise<KpiAssignment> {
    try {
      const [row] = await this.db.insert(kpiAssignments).values(input).returning();
      return toAssignment(row);
    } catch (err) {
      throw translateUniqueViolation(err);
    }
  }

  async setAssignmentActive(
    organizationId: string,
    id: string,
    isActive: boolean
  ): Promise<KpiAssignment | null> {
    const [row] = await this.db
      .update(kpiAssignments)
      .set({ isActive, updatedAt: new Date() })
      .where(and(eq(kpiAssignments.id, id), eq(kpiAssignments.organizationId, organizationId)))
      .returning();
    return row ? toAssignment(row) : null;
  }

  async findAssignment(organizationId: string, id: string): Promise<KpiAssignment | null> {
    const [row] = await this.db
      .select()
      .from(kpiAssignments)
      .where(and(eq(kpiAssignments.id, id), eq(kpiAssignments.organizationId, organizationId)))
      .limit(1);
    return row ? toAssignment(row) : null;
  }

  async listAssignments(organizationId: string, filters: AssignmentFilters): Promise<KpiAssignment[]> {
    const conditions: SQL[] = [eq(kpiAssignments.organizationId, organizationId)];
    if (filters.kpiId) conditions.push(eq(kpiAssignments.kpiId, filters.kpiId));
    if (filters.isActive !== undefined) conditions.push(eq(kpiAssignments.isActive, filters.isActive));
    if (filters.userId) conditions.push(eq(kpiAssignments.userId, filters.userId));
    if (filters.role) conditions.push(eq(kpiAssignments.role, filters.role));

    const rows = await this.db
      .select()
      .from(kpiAssignments)
      .where(and(...conditions))
      .orderBy(asc(kpiAssignments.createdAt));
    return rows.map(toAssignment);
  }

  // ─── Reports ────────────────────────────────────────────────────────
  async insertReport(input: NewReport): Promise<KpiReport> {
    try {
      const [row] = await this.db
        .insert(kpiReports)
        .values({ ...input, reportedValue: toDecimal(input.reportedValue), status: 'draft' })
        .returning();
      return toReport(row);
    } catch (err) {
      throw translateUniqueViolation(err);
    }
  }

  async findReport(organizationId: string, id: string): Promise<KpiReport | null> {
    const [row] = await this.db
      .select()
      .from(kpiReports)
      .where(and(eq(kpiReports.id, id), eq(kpiReports.organizationId, organizationId)))
      .limit(1);
    return row ? toReport(row) : null;
  }

  async updateDraftReport(id: string, patch: DraftReportPatch): Promise<KpiReport | null> {
    const [row] = await this.db
      .update(kpiReports)
      .set({
        ...patch,
        reportedValue: patch.reportedValue === undefined ? undefined : toDecimal(patch.reportedValue),
        updatedAt: new Date(),
      })
      .where(and(eq(kpiReports.id, id), eq(kpiReports.status, 'draft')))
      .returning();
    return row ? toReport(row) : null;
  }

  async deleteDraftReport(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(kpiReports)
      .where(and(eq(kpiReports.id, id), eq(kpiReports.status, 'draft')))
      .returning({ id: kpiReports.id });
    return deleted.length > 0;
  }

  async transitionReport(
    id: string,
    from: KpiReport['status'],
    to: KpiReport['status'],
    stamps: ReportTransitionStamps
  ): Promise<KpiReport | null> {
    const [row] = await this.db
      .update(kpiReports)
      .set({ ...stamps, status: to, updatedAt: new Date() })
      .where(and(eq(kpiReports.id, id), eq(kpiReports.status, from)))
      .returning();
    return row ? toReport(row) : null;
  }

  async listReports(organizationId: string, filters: ReportFilters): Promise<KpiReport[]> {
    const conditions: SQL[] = [eq(kpiReports.organizationId, organizationId)];
    if (filters.kpiId) conditions.push(eq(kpiReports.kpiId, filters.kpiId));
    if (filters.assignmentId) conditions.push(eq(kpiReports.assignmentId, filters.assignmentId));
    if (filters.status) conditions.push(eq(kpiReports.status, filters.status));
    if (filters.reportedBy) conditions.push(eq(kpiReports.reportedBy, filters.reportedBy));
    if (filters.periodStart) conditions.push(eq(kpiReports.periodStart, filters.periodStart));
    if (filters.periodEnd) conditions.push(eq(kpiReports.periodEnd, filters.periodEnd));

    const rows = await this.db
      .select()
      .from(kpiReports)
      .where(and(...conditions))
      .orderBy(desc(kpiReports.periodStart), desc(kpiReports.createdAt));
    return rows.map(toReport);
  }

  async listApprovedReportsForPeriod(
    kpiId: string,
    periodStart: string,
    periodEnd: string
  ): Promise<KpiReport[]> {
    const rows = await this.db
      .select()
      .from(kpiReports)
      .where(
        and(
          eq(kpiReports.kpiId, kpiId),
          eq(kpiReports.periodStart, periodStart),
          eq(kpiReports.periodEnd, periodEnd),
          eq(kpiReports.status, 'approved')
        )
      );
    return rows.map(toReport);
  }

  // ─── Entries ────────────────────────────────────────────────────────
  async upsertEntry(input: EntryUpsert): Promise<EntryUpsertResult> {
    const value = toDecimal(input.value);
    const [row] = await this.db
      .insert(kpiEntries)
      .values({ ...input, value })
      .onConflictDoUpdate({
        target: [kpiEntries.kpiId, kpiEntries.periodStart, kpiEntries.periodEnd],
        set: {
          value,
          isCalculated: input.isCalculated,
          enteredBy: input.enteredBy,
          notes: input.notes,
          metadata: input.metadata,
          updatedAt: new Date(),
        },
      })
      .returning({
        ...getTableColumns(kpiEntries),
        // xmax is 0 only for a freshly inserted tuple
        created: sql<boolean>`(xmax = 0)`,
      });
    const { created, ...entry } = row;
    return { entry: toEntry(entry), created };
  }

  async findEntry(organizationId: string, id: string): Promise<KpiEntry | null> {
    const [row] = await this.db
      .select()
      .from(kpiEntries)
      .where(and(eq(kpiEntries.id, id), eq(kpiEntries.organizationId, organizationId)))
      .limit(1);
    return row ? toEntry(row) : null;
  }

  async findEntryForPeriod(kpiId: string, periodStart: string, periodEnd: string): Promise<KpiEntry | null> {
    const [row] = await this.db
      .select()
      .from(kpiEntries)
      .where(
        and(
          eq(kpiEntries.kpiId, kpiId),
          eq(kpiEntries.periodStart, periodStart),
          eq(kpiEntries.periodEnd, periodEnd)
        )
      )
      .limit(1);
    return row ? toEntry(row) : null;
  }

  async listEntries(organizationId: string, filters: EntryFilters): Promise<KpiEntry[]> {
    const conditions: SQL[] = [eq(kpiEntries.organizationId, organizationId)];
    if (filters.kpiId) conditions.push(eq(kpiEntries.kpiId, filters.kpiId));
    if (filters.from) conditions.push(gte(kpiEntries.periodStart, filters.from));
    if (filters.to) conditions.push(lte(kpiEntries.periodEnd, filters.to));

    const rows = await this.db
      .select()
      .from(kpiEntries)
      .where(and(...conditions))
      .orderBy(asc(kpiEntries.periodStart), asc(kpiEntries.periodEnd));
    return rows.map(toEntry);
  }

  async countEntries(kpiId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(kpiEntries)
      .where(eq(kpiEntries.kpiId, kpiId));
    return row?.total ?? 0;
  }

  // ─── Actions ────────────────────────────────────────────────────────
  async insertAction(input: NewKpiAction): Promise<KpiAction> {
    const [row] = await this.db.insert(kpiActions).values(input).returning();
    return toAction(row);
  }

  async findAction(organizationId: string, id: string): Promise<KpiAction | null> {
    const [row] = await this.db
      .select()
      .from(kpiActions)
      .where(and(eq(kpiActions.id, id), eq(kpiActions.organizationId, organizationId)))
      .limit(1);
    return row ? toAction(row) : null;
  }

  async listActions(organizationId: string, filters: ActionFilters): Promise<KpiAction[]> {
    const conditions: SQL[] = [eq(kpiActions.organizationId, organizationId)];
    if (filters.kpiId) conditions.push(eq(kpiActions.kpiId, filters.kpiId));
    if (filters.userId) conditions.push(eq(kpiActions.userId, filters.userId));
    if (filters.actionType) conditions.push(eq(kpiActions.actionType, filters.actionType));

    const rows = await this.db
      .select()
      .from(kpiActions)
      .where(and(...conditions))
      .orderBy(desc(kpiActions.createdAt));
    return rows.map(toAction);
  }

  async countActions(kpiId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(kpiActions)
      .where(eq(kpiActions.kpiId, kpiId));
    return row?.total ?? 0;
  }
}
