import { NotFoundError } from '../middleware/error-handler.js';
import type { Actor, Kpi, KpiAssignment, KpiEntry } from '../types.js';
import { listAssignmentsForUser } from './assignment.service.js';
import type { KpiStore } from './kpi-store.js';
import { getPeriodBounds, todayIsoDate } from './period.service.js';

export interface PerformanceDeps {
  store: KpiStore;
}

export interface KpiStats {
  kpiId: string;
  kpiName: string;
  unit: string;
  targetValue: number | null;
  latestValue: number | null;
  latestPeriodStart: string | null;
  latestPeriodEnd: string | null;
  entriesCount: number;
  averageValue: number | null;
  actionsCount: number;
  targetAchievementPercentage: number | null;
}

export interface UserKpiPerformance {
  kpi: Kpi;
  assignment: KpiAssignment;
  latestValue: number | null;
  latestPeriodStart: string | null;
  latestPeriodEnd: string | null;
  currentPeriodValue: number | null;
  currentPeriodStart: string;
  currentPeriodEnd: string;
  targetValue: number | null;
  averageValue: number | null;
  totalEntries: number;
  achievementPercentage: number | null;
  isOnTrack: boolean | null;
  pendingReportsCount: number;
}

export interface UserPerformanceSummary {
  kpis: UserKpiPerformance[];
  totalKpis: number;
  averagePerformance: number | null;
}

const ON_TRACK_THRESHOLD = 90;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function averageOf(values: number[]): number | null {
  if (values.length === 0) return null;
  const totalCents = values.reduce((sum, v) => sum + Math.round(v * 100), 0);
  return round2(totalCents / values.length / 100);
}

/** Latest value as a percentage of target; null without a non-zero target or any entry. */
function achievementOf(latest: KpiEntry | undefined, targetValue: number | null): number | null {
  if (!latest || targetValue === null || targetValue === 0) return null;
  return round2((latest.value / targetValue) * 100);
}

export async function getKpiStats(deps: PerformanceDeps, actor: Actor, kpiId: string): Promise<KpiStats> {
  const kpi = await deps.store.findKpi(actor.organizationId, kpiId);
  if (!kpi) throw new NotFoundError('KPI');

  const [entries, actionsCount] = await Promise.all([
    deps.store.listEntries(actor.organizationId, { kpiId }),
    deps.store.countActions(kpiId),
  ]);
  const latest = entries[entries.length - 1];

  return {
    kpiId: kpi.id,
    kpiName: kpi.name,
    unit: kpi.unit,
    targetValue: kpi.targetValue,
    latestValue: latest?.value ?? null,
    latestPeriodStart: latest?.periodStart ?? null,
    latestPeriodEnd: latest?.periodEnd ?? null,
    entriesCount: entries.length,
    averageValue: averageOf(entries.map((e) => e.value)),
    actionsCount,
    targetAchievementPercentage: achievementOf(latest, kpi.targetValue),
  };
}

/**
 * The caller's active KPIs, reached directly or through their role, with
 * the current period's value and progress against target.
 */
export async function getUserKpiPerformance(
  deps: PerformanceDeps,
  actor: Actor,
  referenceDate: string = todayIsoDate()
): Promise<UserPerformanceSummary> {
  const assignments = await listAssignmentsForUser(deps, actor);

  const firstAssignmentByKpi = new Map<string, KpiAssignment>();
  for (const assignment of assignments) {
    if (!firstAssignmentByKpi.has(assignment.kpiId)) firstAssignmentByKpi.set(assignment.kpiId, assignment);
  }

  const kpis: UserKpiPerformance[] = [];
  for (const [kpiId, assignment] of firstAssignmentByKpi) {
    const kpi = await deps.store.findKpi(actor.organizationId, kpiId);
    if (!kpi || !kpi.isActive) continue;

    const { periodStart, periodEnd } = getPeriodBounds(kpi.period, referenceDate);
    const [entries, currentEntry, ownReports] = await Promise.all([
      deps.store.listEntries(actor.organizationId, { kpiId }),
      deps.store.findEntryForPeriod(kpiId, periodStart, periodEnd),
      assignment.assignmentType === 'user'
        ? deps.store.listReports(actor.organizationId, { assignmentId: assignment.id })
        : Promise.resolve([]),
    ]);
    const latest = entries[entries.length - 1];
    const achievementPercentage = achievementOf(latest, kpi.targetValue);

    kpis.push({
      kpi,
      assignment,
      latestValue: latest?.value ?? null,
      latestPeriodStart: latest?.periodStart ?? null,
      latestPeriodEnd: latest?.periodEnd ?? null,
      currentPeriodValue: currentEntry?.value ?? null,
      currentPeriodStart: periodStart,
      currentPeriodEnd: periodEnd,
      targetValue: kpi.targetValue,
      averageValue: averageOf(entries.map((e) => e.value)),
      totalEntries: entries.length,
      achievementPercentage,
      isOnTrack: achievementPercentage === null ? null : achievementPercentage >= ON_TRACK_THRESHOLD,
      pendingReportsCount: ownReports.filter((r) => r.status === 'draft' || r.status === 'submitted').length,
    });
  }

  const achievements = kpis.flatMap((k) => (k.achievementPercentage === null ? [] : [k.achievementPercentage]));
  return {
    kpis,
    totalKpis: kpis.length,
    averagePerformance: achievements.length > 0 ? round2(achievements.reduce((a, b) => a + b, 0) / achievements.length) : null,
  };
}
