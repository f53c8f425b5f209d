import { config } from '@metrica/config';
import type { PeriodType, TrendDirection, TrendStatisticsScope } from '@metrica/shared-types';
import { NotFoundError } from '../middleware/error-handler.js';
import type { Actor, Kpi, KpiEntry, TrendPoint, TrendStatistics } from '../types.js';
import type { KpiStore } from './kpi-store.js';
import { getPeriodLabel } from './period.service.js';

export interface TrendDeps {
  store: KpiStore;
}

export interface TrendOptions {
  /** Trailing periods to return; 0 returns the whole history. */
  periodsCount?: number;
  statisticsScope?: TrendStatisticsScope;
}

export interface KpiTrendAnalysis {
  kpi: Pick<Kpi, 'id' | 'name' | 'unit' | 'period' | 'sourceType' | 'targetValue'>;
  periodsCount: number;
  statisticsScope: TrendStatisticsScope;
  statistics: TrendStatistics;
  trend: TrendPoint[];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ─── Percentage Change ────────────────────────────────────────────────

function rawPercentageChange(current: number, previous: number | null): number | null {
  if (previous === null) return null;
  if (previous === 0) {
    if (current === 0) return 0;
    return current > 0 ? 100 : -100;
  }
  if (current === 0) return -100;
  return ((current - previous) / previous) * 100;
}

/**
 * Change from `previous` to `current`, in percent, rounded to 2 decimals.
 * Moving off zero counts as ±100 and moving onto zero as −100.
 */
export function calculatePercentageChange(current: number, previous: number | null): number | null {
  const change = rawPercentageChange(current, previous);
  return change === null ? null : round2(change);
}

function directionOf(change: number | null): TrendDirection {
  if (change === null || change === 0) return 'stable';
  return change > 0 ? 'increasing' : 'decreasing';
}

// ─── Series ───────────────────────────────────────────────────────────
export function buildTrendSeries(entries: KpiEntry[], periodType: PeriodType): TrendPoint[] {
  const ordered = [...entries].sort((a, b) => a.periodStart.localeCompare(b.periodStart));

  let previous: number | null = null;
  return ordered.map((entry) => {
    // Direction comes from the unrounded change; rounding is for display.
    const change = rawPercentageChange(entry.value, previous);
    previous = entry.value;
    return {
      periodStart: entry.periodStart,
      periodEnd: entry.periodEnd,
      periodLabel: getPeriodLabel(entry.periodStart, periodType),
      value: entry.value,
      percentageChange: change === null ? null : round2(change),
      isIncrease: change === null ? null : change > 0,
      isCalculated: entry.isCalculated,
      createdAt: entry.createdAt,
    };
  });
}

export function calculateTrendStatistics(points: TrendPoint[]): TrendStatistics {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) {
    return {
      totalPeriods: 0,
      firstValue: null,
      currentValue: null,
      averageValue: null,
      minValue: null,
      maxValue: null,
      overallChangePercentage: null,
      trendDirection: null,
    };
  }

  const values = points.map((p) => p.value);
  const totalCents = values.reduce((sum, v) => sum + Math.round(v * 100), 0);
  const overallChange = rawPercentageChange(last.value, first.value);

  return {
    totalPeriods: points.length,
    firstValue: first.value,
    currentValue: last.value,
    averageValue: round2(totalCents / values.length / 100),
    minValue: Math.min(...values),
    maxValue: Math.max(...values),
    overallChangePercentage: overallChange === null ? null : round2(overallChange),
    trendDirection: directionOf(overallChange),
  };
}

// ─── Analysis ─────────────────────────────────────────────────────────

/**
 * Trend of a KPI's entries. Changes are computed over the full history
 * before truncating, so the first point of a window still compares against
 * its real predecessor. Statistics cover the returned window unless
 * `statisticsScope` is `full_history`.
 */
export async function analyzeKpiTrend(
  deps: TrendDeps,
  actor: Actor,
  kpiId: string,
  options: TrendOptions = {}
): Promise<KpiTrendAnalysis> {
  const periodsCount = options.periodsCount ?? config.KPI_DEFAULT_TREND_PERIODS;
  const statisticsScope = options.statisticsScope ?? config.KPI_TREND_STATISTICS_SCOPE;

  const kpi = await deps.store.findKpi(actor.organizationId, kpiId);
  if (!kpi) throw new NotFoundError('KPI');

  const entries = await deps.store.listEntries(actor.organizationId, { kpiId });
  const series = buildTrendSeries(entries, kpi.period);
  const trend = periodsCount > 0 ? series.slice(-periodsCount) : series;

  return {
    kpi: {
      id: kpi.id,
      name: kpi.name,
      unit: kpi.unit,
      period: kpi.period,
      sourceType: kpi.sourceType,
      targetValue: kpi.targetValue,
    },
    periodsCount,
    statisticsScope,
    statistics: calculateTrendStatistics(statisticsScope === 'full_history' ? series : trend),
    trend,
  };
}
