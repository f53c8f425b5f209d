import { createLogger } from '@metrica/config';
import type { EventPublisher } from '@metrica/events';
import type { AggregationMethod } from '@metrica/shared-types';
import type { ManualAggregationMeta, SystemAggregationMeta } from '@metrica/db';
import {
  AppError,
  NotFoundError,
  StateTransitionError,
  ValidationError,
} from '../middleware/error-handler.js';
import type {
  Actor,
  AggregationTriggerRequest,
  AggregationTriggerResult,
  Kpi,
  KpiEntry,
  ReconciliationRequest,
  ReconciliationSummary,
} from '../types.js';
import type { EntryFilters, KpiStore } from './kpi-store.js';
import { getPeriodBounds, todayIsoDate } from './period.service.js';

const log = createLogger('kpis:aggregation');

export interface AggregationDeps {
  store: KpiStore;
  events: EventPublisher;
}

export const DEFAULT_AGGREGATION_METHOD: AggregationMethod = 'average';

// ─── Arithmetic ───────────────────────────────────────────────────────
// Sums run over integer cents; results are independent of report order.

function toCents(value: number): number {
  return Math.round(value * 100);
}

export function computeAggregateValue(values: number[], method: AggregationMethod): number {
  if (method === 'count') return values.length;
  if (values.length === 0) return 0;

  const totalCents = values.reduce((sum, value) => sum + toCents(value), 0);
  if (method === 'sum') return totalCents / 100;
  return Math.round(totalCents / values.length) / 100;
}

function buildManualNotes(method: AggregationMethod, reportsCount: number): string {
  return `Aggregated ${method} from ${reportsCount} approved report(s)`;
}

function assertPeriodOrder(periodStart: string, periodEnd: string): void {
  if (periodStart > periodEnd) {
    throw new ValidationError('periodEnd', 'Period end date must be on or after period start date');
  }
}

// ─── Events ───────────────────────────────────────────────────────────
async function publishEntryUpdated(
  events: EventPublisher,
  entry: KpiEntry,
  created: boolean
): Promise<void> {
  try {
    await events.publish({
      type: 'kpi.entry_updated',
      organizationId: entry.organizationId,
      kpiId: entry.kpiId,
      entryId: entry.id,
      periodStart: entry.periodStart,
      periodEnd: entry.periodEnd,
      value: entry.value,
      isCalculated: entry.isCalculated,
      created,
      timestamp: new Date().toISOString(),
    });
  } catch (err) {
    log.warn({ err, kpiId: entry.kpiId, entryId: entry.id }, 'Failed to publish kpi.entry_updated event (non-blocking)');
  }
}

// ─── Manual Path ──────────────────────────────────────────────────────
export type ManualAggregationOutcome =
  | { outcome: 'no_reports' }
  | { outcome: 'upserted'; entry: KpiEntry; created: boolean };

/**
 * Recomputes the entry for one exact period from every approved report
 * with identical bounds. The result depends only on that report set, so
 * repeated or concurrent runs converge on the same row.
 */
export async function aggregateApprovedReports(
  deps: AggregationDeps,
  kpi: Kpi,
  periodStart: string,
  periodEnd: string,
  method: AggregationMethod = DEFAULT_AGGREGATION_METHOD
): Promise<ManualAggregationOutcome> {
  assertPeriodOrder(periodStart, periodEnd);
  if (kpi.sourceType !== 'manual') {
    throw new StateTransitionError(`KPI "${kpi.name}" is a system aggregate; reports are not aggregated`, {
      kpiId: kpi.id,
      sourceType: kpi.sourceType,
    });
  }

  const reports = await deps.store.listApprovedReportsForPeriod(kpi.id, periodStart, periodEnd);
  if (reports.length === 0) {
    log.debug({ kpiId: kpi.id, periodStart, periodEnd }, 'No approved reports for period');
    return { outcome: 'no_reports' };
  }

  const value = computeAggregateValue(
    reports.map((r) => r.reportedValue),
    method
  );
  const metadata: ManualAggregationMeta = {
    source: 'aggregated_reports',
    method,
    reportsCount: reports.length,
    reporters: [...new Set(reports.map((r) => r.reportedBy))].sort(),
  };

  const { entry, created } = await deps.store.upsertEntry({
    organizationId: kpi.organizationId,
    kpiId: kpi.id,
    periodStart,
    periodEnd,
    value,
    isCalculated: false,
    enteredBy: null,
    notes: buildManualNotes(method, reports.length),
    metadata,
  });

  log.info(
    { kpiId: kpi.id, kpiName: kpi.name, periodStart, periodEnd, value, method, created },
    'KPI entry aggregated from approved reports'
  );
  await publishEntryUpdated(deps.events, entry, created);
  return { outcome: 'upserted', entry, created };
}

// ─── System Path ──────────────────────────────────────────────────────
export interface SystemAggregateInput {
  periodStart: string;
  periodEnd: string;
  value: number;
  notes?: string;
}

/** Merges a value computed elsewhere into the canonical entry for an aggregate-type KPI. */
export async function recordSystemAggregate(
  deps: AggregationDeps,
  kpi: Kpi,
  input: SystemAggregateInput
): Promise<{ entry: KpiEntry; created: boolean }> {
  assertPeriodOrder(input.periodStart, input.periodEnd);
  if (kpi.sourceType !== 'aggregate') {
    throw new StateTransitionError(`KPI "${kpi.name}" is manual; system aggregates cannot be recorded`, {
      kpiId: kpi.id,
      sourceType: kpi.sourceType,
    });
  }

  const metadata: SystemAggregationMeta = {
    source: 'system_aggregate',
    queryId: kpi.aggregateQuery,
  };

  const result = await deps.store.upsertEntry({
    organizationId: kpi.organizationId,
    kpiId: kpi.id,
    periodStart: input.periodStart,
    periodEnd: input.periodEnd,
    value: toCents(input.value) / 100,
    isCalculated: true,
    enteredBy: null,
    notes: input.notes ?? 'System-calculated aggregate value',
    metadata,
  });

  log.info(
    {
      kpiId: kpi.id,
      kpiName: kpi.name,
      periodStart: input.periodStart,
      periodEnd: input.periodEnd,
      value: result.entry.value,
      created: result.created,
    },
    'KPI entry recorded from system aggregate'
  );
  await publishEntryUpdated(deps.events, result.entry, result.created);
  return result;
}

// ─── Trigger Contract ─────────────────────────────────────────────────

/**
 * Entry point shared by the queue worker, the inline dispatcher and the
 * HTTP trigger. Known rejections come back as `success: false`; anything
 * else is thrown so the caller's retry policy applies.
 */
export async function runAggregationTrigger(
  deps: AggregationDeps,
  request: AggregationTriggerRequest
): Promise<AggregationTriggerResult> {
  const kpi = await deps.store.findKpiById(request.kpiId);
  if (!kpi) {
    return { success: false, message: `KPI ${request.kpiId} not found` };
  }

  try {
    const result = await aggregateApprovedReports(
      deps,
      kpi,
      request.periodStart,
      request.periodEnd,
      request.aggregationMethod ?? DEFAULT_AGGREGATION_METHOD
    );
    if (result.outcome === 'no_reports') {
      return { success: false, message: 'No approved reports found for this period' };
    }
    return {
      success: true,
      entryId: result.entry.id,
      value: result.entry.value,
      periodStart: result.entry.periodStart,
      periodEnd: result.entry.periodEnd,
    };
  } catch (err) {
    if (err instanceof AppError) {
      return { success: false, message: err.message };
    }
    log.error({ err, kpiId: kpi.id, kpiName: kpi.name }, 'Aggregation trigger failed');
    throw err;
  }
}

// ─── Batch Reconciliation ─────────────────────────────────────────────

async function selectReconciliationKpis(
  store: KpiStore,
  request: ReconciliationRequest
): Promise<Kpi[]> {
  if (request.kpiId) {
    const kpi = await store.findKpiById(request.kpiId);
    if (!kpi || !kpi.isActive || kpi.sourceType !== 'manual') return [];
    if (request.organizationId && kpi.organizationId !== request.organizationId) return [];
    if (request.period && kpi.period !== request.period) return [];
    return [kpi];
  }
  return store.listKpis({
    organizationId: request.organizationId,
    isActive: true,
    sourceType: 'manual',
    period: request.period,
  });
}

/**
 * Runs the manual path for the current period of every active manual KPI.
 * A KPI that fails is logged, recorded under `errors` and counted as skipped;
 * the remaining KPIs are still processed.
 */
export async function runReconciliation(
  deps: AggregationDeps,
  request: ReconciliationRequest = {},
  now: Date = new Date()
): Promise<ReconciliationSummary> {
  const referenceDate = request.referenceDate ?? todayIsoDate(now);
  const summary: ReconciliationSummary = {
    processed: 0,
    created: 0,
    updated: 0,
    skipped: 0,
    pending: 0,
    errors: [],
  };

  const kpiList = await selectReconciliationKpis(deps.store, request);

  for (const kpi of kpiList) {
    try {
      const { periodStart, periodEnd } = getPeriodBounds(kpi.period, referenceDate);

      if (request.dryRun) {
        const reports = await deps.store.listApprovedReportsForPeriod(kpi.id, periodStart, periodEnd);
        if (reports.length === 0) {
          summary.skipped += 1;
        } else {
          summary.processed += 1;
          summary.pending += reports.length;
        }
        continue;
      }

      const method = request.aggregationMethod ?? kpi.aggregationMethod;
      const result = await aggregateApprovedReports(deps, kpi, periodStart, periodEnd, method);
      if (result.outcome === 'no_reports') {
        summary.skipped += 1;
      } else {
        summary.processed += 1;
        if (result.created) summary.created += 1;
        else summary.updated += 1;
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ err, kpiId: kpi.id, kpiName: kpi.name }, 'KPI reconciliation failed');
      summary.errors.push({ kpiId: kpi.id, kpiName: kpi.name, error: message });
      summary.skipped += 1;
    }
  }

  log.info(
    {
      referenceDate,
      processed: summary.processed,
      created: summary.created,
      updated: summary.updated,
      skipped: summary.skipped,
      errors: summary.errors.length,
      dryRun: request.dryRun ?? false,
    },
    'KPI reconciliation completed'
  );
  return summary;
}

// ─── Entry Reads ──────────────────────────────────────────────────────
// Entries are written only by the two paths above; callers get read access.

export function listKpiEntries(
  deps: Pick<AggregationDeps, 'store'>,
  actor: Actor,
  filters: EntryFilters = {}
): Promise<KpiEntry[]> {
  return deps.store.listEntries(actor.organizationId, filters);
}

export async function getKpiEntry(
  deps: Pick<AggregationDeps, 'store'>,
  actor: Actor,
  id: string
): Promise<KpiEntry> {
  const entry = await deps.store.findEntry(actor.organizationId, id);
  if (!entry) throw new NotFoundError('KPI entry');
  return entry;
}
