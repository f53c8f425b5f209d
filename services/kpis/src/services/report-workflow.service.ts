import { createLogger } from '@metrica/config';
import type { EventPublisher } from '@metrica/events';
import type { ReportStatus } from '@metrica/shared-types';
import {
  NotFoundError,
  PermissionDeniedError,
  StateTransitionError,
  ValidationError,
} from '../middleware/error-handler.js';
import type {
  Actor,
  DraftReportPatch,
  KpiReport,
  ReportTransitionStamps,
} from '../types.js';
import type { AggregationDispatcher, DispatchReceipt } from './aggregation-dispatcher.js';
import { canReportOnAssignment } from './assignment.service.js';
import { UniqueConstraintError, type KpiStore, type ReportFilters } from './kpi-store.js';

const log = createLogger('kpis:reports');

export interface ReportWorkflowDeps {
  store: KpiStore;
  events: EventPublisher;
  dispatcher: AggregationDispatcher;
  now?: () => Date;
}

// ─── State Machine ────────────────────────────────────────────────────
export const REPORT_TRANSITIONS: Readonly<Record<ReportStatus, readonly ReportStatus[]>> = {
  draft: ['submitted'],
  submitted: ['approved', 'rejected'],
  approved: [],
  rejected: [],
};

export function isValidReportTransition(from: ReportStatus, to: ReportStatus): boolean {
  return REPORT_TRANSITIONS[from].includes(to);
}

const TRANSITION_VERBS: Record<ReportStatus, string> = {
  draft: 'reopen',
  submitted: 'submit',
  approved: 'approve',
  rejected: 'reject',
};

export interface ReportInput {
  assignmentId: string;
  periodStart: string;
  periodEnd: string;
  reportedValue: number;
  notes?: string;
  supportingDocumentation?: Record<string, unknown>;
}

export interface ReviewOutcome {
  report: KpiReport;
  /** Receipt of the aggregation dispatch; null when rejected or when dispatch failed. */
  aggregation: DispatchReceipt | null;
}

// ─── Helpers ──────────────────────────────────────────────────────────
async function loadReport(deps: ReportWorkflowDeps, actor: Actor, id: string): Promise<KpiReport> {
  const report = await deps.store.findReport(actor.organizationId, id);
  if (!report) throw new NotFoundError('KPI report');
  return report;
}

function assertReporter(actor: Actor, report: KpiReport, action: string): void {
  if (report.reportedBy !== actor.userId) {
    throw new PermissionDeniedError(`Only the original reporter can ${action} this report`);
  }
}

function assertDraft(report: KpiReport, action: string): void {
  if (report.status !== 'draft') {
    throw new StateTransitionError(`Only draft reports can be ${action}`, {
      reportId: report.id,
      status: report.status,
    });
  }
}

function assertReviewer(actor: Actor): void {
  if (!actor.capabilities.canApproveKpiReports) {
    throw new PermissionDeniedError('Only supervisors can review KPI reports');
  }
}

async function publishStatusChanged(
  deps: ReportWorkflowDeps,
  actor: Actor,
  report: KpiReport,
  fromStatus: ReportStatus
): Promise<void> {
  try {
    await deps.events.publish({
      type: 'kpi.report_status_changed',
      organizationId: report.organizationId,
      reportId: report.id,
      kpiId: report.kpiId,
      fromStatus,
      toStatus: report.status,
      actorUserId: actor.userId,
      timestamp: new Date().toISOString(),
    });
  } catch (err) {
    log.warn({ err, reportId: report.id }, 'Failed to publish kpi.report_status_changed event (non-blocking)');
  }
}

/**
 * Compare-and-set on the report's current status. A report that moved
 * underneath us fails the same way an illegal request does, and the stored
 * status is left as it was.
 */
async function transition(
  deps: ReportWorkflowDeps,
  actor: Actor,
  report: KpiReport,
  to: ReportStatus,
  stamps: ReportTransitionStamps
): Promise<KpiReport> {
  if (!isValidReportTransition(report.status, to)) {
    throw new StateTransitionError(`Cannot ${TRANSITION_VERBS[to]} a ${report.status} report`, {
      reportId: report.id,
      status: report.status,
      target: to,
    });
  }

  const updated = await deps.store.transitionReport(report.id, report.status, to, stamps);
  if (!updated) {
    throw new StateTransitionError('Report status changed before this action completed', {
      reportId: report.id,
      expectedStatus: report.status,
      target: to,
    });
  }

  log.info(
    { reportId: report.id, kpiId: report.kpiId, from: report.status, to, actorUserId: actor.userId },
    'KPI report status changed'
  );
  await publishStatusChanged(deps, actor, updated, report.status);
  return updated;
}

// ─── Draft Lifecycle ──────────────────────────────────────────────────
export async function createReport(
  deps: ReportWorkflowDeps,
  actor: Actor,
  input: ReportInput
): Promise<KpiReport> {
  if (input.periodStart > input.periodEnd) {
    throw new ValidationError('periodEnd', 'Period end date must be on or after period start date');
  }

  const assignment = await deps.store.findAssignment(actor.organizationId, input.assignmentId);
  if (!assignment) throw new NotFoundError('KPI assignment');

  if (!canReportOnAssignment(actor, assignment)) {
    throw new PermissionDeniedError('You are not responsible for this KPI assignment');
  }
  if (!assignment.isActive) {
    throw new StateTransitionError('KPI assignment is inactive', { assignmentId: assignment.id });
  }

  const kpi = await deps.store.findKpi(actor.organizationId, assignment.kpiId);
  if (!kpi) throw new NotFoundError('KPI');
  if (!kpi.isActive) {
    throw new StateTransitionError(`KPI "${kpi.name}" is inactive`, { kpiId: kpi.id });
  }
  if (kpi.sourceType !== 'manual') {
    throw new StateTransitionError(`KPI "${kpi.name}" is a system aggregate and does not take reports`, {
      kpiId: kpi.id,
    });
  }
  try {
    const report = await deps.store.insertReport({
      organizationId: actor.organizationId,
      kpiId: kpi.id,
      assignmentId: assignment.id,
      periodStart: input.periodStart,
      periodEnd: input.periodEnd,
      reportedValue: input.reportedValue,
      notes: input.notes ?? '',
      supportingDocumentation: input.supportingDocumentation ?? {},
      reportedBy: actor.userId,
    });
    log.info(
      { reportId: report.id, kpiId: kpi.id, periodStart: report.periodStart, periodEnd: report.periodEnd },
      'KPI report created'
    );
    return report;
  } catch (err) {
    if (err instanceof UniqueConstraintError) {
      throw new ValidationError(
        'periodStart',
        'A report already exists for this assignment and period',
        'DUPLICATE_REPORT'
      );
    }
    throw err;
  }
}

export async function updateDraftReport(
  deps: ReportWorkflowDeps,
  actor: Actor,
  id: string,
  patch: DraftReportPatch
): Promise<KpiReport> {
  const report = await loadReport(deps, actor, id);
  assertReporter(actor, report, 'edit');
  assertDraft(report, 'edited');

  const updated = await deps.store.updateDraftReport(id, patch);
  if (!updated) {
    throw new StateTransitionError('Only draft reports can be edited', { reportId: id });
  }
  return updated;
}

export async function deleteDraftReport(deps: ReportWorkflowDeps, actor: Actor, id: string): Promise<void> {
  const report = await loadReport(deps, actor, id);
  assertReporter(actor, report, 'delete');
  assertDraft(report, 'deleted');

  const deleted = await deps.store.deleteDraftReport(id);
  if (!deleted) {
    throw new StateTransitionError('Only draft reports can be deleted', { reportId: id });
  }
  log.info({ reportId: id, kpiId: report.kpiId }, 'Draft KPI report deleted');
}

// ─── Transitions ──────────────────────────────────────────────────────
export async function submitReport(deps: ReportWorkflowDeps, actor: Actor, id: string): Promise<KpiReport> {
  const report = await loadReport(deps, actor, id);
  assertReporter(actor, report, 'submit');
  const now = deps.now?.() ?? new Date();
  return transition(deps, actor, report, 'submitted', { submittedAt: now });
}

/**
 * Approves a submitted report and hands the period to the aggregation
 * dispatcher. A failed dispatch is logged and leaves the approval in place;
 * the next reconciliation pass catches the entry up.
 */
export async function approveReport(
  deps: ReportWorkflowDeps,
  actor: Actor,
  id: string,
  notes = ''
): Promise<ReviewOutcome> {
  assertReviewer(actor);
  const report = await loadReport(deps, actor, id);
  const approved = await transition(deps, actor, report, 'approved', {
    approvedBy: actor.userId,
    approvalNotes: notes,
    reviewedAt: deps.now?.() ?? new Date(),
  });

  let aggregation: DispatchReceipt | null = null;
  try {
    const kpi = await deps.store.findKpiById(approved.kpiId);
    aggregation = await deps.dispatcher.dispatch({
      organizationId: approved.organizationId,
      reportId: approved.id,
      kpiId: approved.kpiId,
      periodStart: approved.periodStart,
      periodEnd: approved.periodEnd,
      aggregationMethod: kpi?.aggregationMethod,
    });
  } catch (err) {
    log.error(
      { err, reportId: approved.id, kpiId: approved.kpiId, periodStart: approved.periodStart },
      'Failed to dispatch aggregation after approval; report stays approved pending reconciliation'
    );
  }

  return { report: approved, aggregation };
}

export async function rejectReport(
  deps: ReportWorkflowDeps,
  actor: Actor,
  id: string,
  notes = ''
): Promise<ReviewOutcome> {
  assertReviewer(actor);
  const report = await loadReport(deps, actor, id);
  const rejected = await transition(deps, actor, report, 'rejected', {
    approvedBy: actor.userId,
    approvalNotes: notes,
    reviewedAt: deps.now?.() ?? new Date(),
  });
  return { report: rejected, aggregation: null };
}

export function reviewReport(
  deps: ReportWorkflowDeps,
  actor: Actor,
  id: string,
  review: { action: 'approve' | 'reject'; notes?: string }
): Promise<ReviewOutcome> {
  return review.action === 'approve'
    ? approveReport(deps, actor, id, review.notes)
    : rejectReport(deps, actor, id, review.notes);
}

// ─── Queries ──────────────────────────────────────────────────────────
export async function getReport(deps: ReportWorkflowDeps, actor: Actor, id: string): Promise<KpiReport> {
  const report = await loadReport(deps, actor, id);
  if (!actor.capabilities.canViewAllReports && report.reportedBy !== actor.userId) {
    throw new PermissionDeniedError('You can only view your own reports');
  }
  return report;
}

/** Reviewers see every report; everyone else sees their own. */
export function listReports(
  deps: ReportWorkflowDeps,
  actor: Actor,
  filters: ReportFilters = {}
): Promise<KpiReport[]> {
  const scoped = actor.capabilities.canViewAllReports ? filters : { ...filters, reportedBy: actor.userId };
  return deps.store.listReports(actor.organizationId, scoped);
}

function timeDesc(a: Date | null, b: Date | null): number {
  return (b?.getTime() ?? 0) - (a?.getTime() ?? 0);
}

/** The review queue: submitted reports by default, newest submission first. */
export async function listApprovals(
  deps: ReportWorkflowDeps,
  actor: Actor,
  status: ReportStatus = 'submitted'
): Promise<KpiReport[]> {
  assertReviewer(actor);
  const reports = await deps.store.listReports(actor.organizationId, { status });

  if (status === 'submitted') return reports.sort((a, b) => timeDesc(a.submittedAt, b.submittedAt));
  if (status === 'approved' || status === 'rejected') {
    return reports.sort((a, b) => timeDesc(a.reviewedAt, b.reviewedAt));
  }
  return reports;
}
