import type { EventPublisher, MetricaEvent } from '@metrica/events';
import { resolveKpiCapabilities } from '@metrica/auth-utils';
import type { UserRole } from '@metrica/shared-types';
import type {
  Actor,
  DirectoryUser,
  Kpi,
  KpiAssignment,
  KpiReport,
  NewKpi,
} from '../types.js';
import type { UserDirectory } from '../services/user-directory.js';
import type {
  AggregationDispatchRequest,
  AggregationDispatcher,
  DispatchReceipt,
} from '../services/aggregation-dispatcher.js';
import type { MemoryKpiStore } from './memory-store.js';

export const ORG_ID = '00000000-0000-0000-0000-000000000001';
export const OTHER_ORG_ID = '00000000-0000-0000-0000-000000000002';

// ─── Directory ────────────────────────────────────────────────────────
export class MemoryUserDirectory implements UserDirectory {
  readonly users = new Map<string, DirectoryUser>();

  addUser(id: string, role: UserRole, overrides: Partial<DirectoryUser> = {}): DirectoryUser {
    const user: DirectoryUser = {
      id,
      organizationId: ORG_ID,
      email: `${id}@example.test`,
      firstName: id,
      lastName: 'Tester',
      role,
      isActive: true,
      ...overrides,
    };
    this.users.set(id, user);
    return user;
  }

  async getUser(userId: string): Promise<DirectoryUser | null> {
    return this.users.get(userId) ?? null;
  }

  async listActiveUsersByIds(organizationId: string, userIds: string[]): Promise<DirectoryUser[]> {
    return [...this.users.values()].filter(
      (u) => u.organizationId === organizationId && u.isActive && userIds.includes(u.id)
    );
  }

  async listActiveUsersByRole(organizationId: string, role: UserRole): Promise<DirectoryUser[]> {
    return this.listActiveUsersByRoles(organizationId, [role]);
  }

  async listActiveUsersByRoles(organizationId: string, roles: UserRole[]): Promise<DirectoryUser[]> {
    return [...this.users.values()].filter(
      (u) => u.organizationId === organizationId && u.isActive && roles.includes(u.role)
    );
  }
}

// ─── Events ───────────────────────────────────────────────────────────
export class RecordingEventPublisher implements EventPublisher {
  readonly events: MetricaEvent[] = [];
  failWith: Error | null = null;

  async publish(event: MetricaEvent): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.events.push(event);
  }
}

// ─── Dispatch ─────────────────────────────────────────────────────────
export class RecordingDispatcher implements AggregationDispatcher {
  readonly requests: AggregationDispatchRequest[] = [];
  failWith: Error | null = null;

  async dispatch(request: AggregationDispatchRequest): Promise<DispatchReceipt> {
    if (this.failWith) throw this.failWith;
    this.requests.push(request);
    return { mode: 'queue', accepted: true, jobId: `job-${this.requests.length}` };
  }
}

// ─── Actors ───────────────────────────────────────────────────────────
export function buildActor(userId: string, role: UserRole, organizationId = ORG_ID): Actor {
  return { userId, organizationId, role, capabilities: resolveKpiCapabilities(role) };
}

// ─── Seeds ────────────────────────────────────────────────────────────
export function kpiInput(overrides: Partial<NewKpi> = {}): NewKpi {
  return {
    organizationId: ORG_ID,
    branchId: null,
    name: 'Customer satisfaction',
    description: '',
    sourceType: 'manual',
    period: 'monthly',
    aggregationMethod: 'average',
    targetValue: null,
    minimumValue: null,
    maximumValue: null,
    unit: '',
    aggregateQuery: '',
    isActive: true,
    createdBy: null,
    ...overrides,
  };
}

export function seedKpi(store: MemoryKpiStore, overrides: Partial<NewKpi> = {}): Promise<Kpi> {
  return store.insertKpi(kpiInput(overrides));
}

export function seedUserAssignment(
  store: MemoryKpiStore,
  kpi: Kpi,
  userId: string,
  isActive = true
): Promise<KpiAssignment> {
  return store.insertAssignment({
    organizationId: kpi.organizationId,
    kpiId: kpi.id,
    assignmentType: 'user',
    role: null,
    userId,
    isActive,
    assignedBy: null,
  });
}

export function seedRoleAssignment(
  store: MemoryKpiStore,
  kpi: Kpi,
  role: UserRole,
  isActive = true
): Promise<KpiAssignment> {
  return store.insertAssignment({
    organizationId: kpi.organizationId,
    kpiId: kpi.id,
    assignmentType: 'role',
    role,
    userId: null,
    isActive,
    assignedBy: null,
  });
}

/** Inserts a report and walks it to `status` through the store's compare-and-set transitions. */
export async function seedReport(
  store: MemoryKpiStore,
  assignment: KpiAssignment,
  input: { periodStart: string; periodEnd: string; reportedValue: number; reportedBy: string },
  status: KpiReport['status'] = 'draft'
): Promise<KpiReport> {
  let report = await store.insertReport({
    organizationId: assignment.organizationId,
    kpiId: assignment.kpiId,
    assignmentId: assignment.id,
    periodStart: input.periodStart,
    periodEnd: input.periodEnd,
    reportedValue: input.reportedValue,
    notes: '',
    supportingDocumentation: {},
    reportedBy: input.reportedBy,
  });
  if (status === 'draft') return report;

  const submitted = await store.transitionReport(report.id, 'draft', 'submitted', {
    submittedAt: new Date('2024-01-01T00:00:00.000Z'),
  });
  if (!submitted) throw new Error(`Could not submit seeded report ${report.id}`);
  report = submitted;
  if (status === 'submitted') return report;

  const reviewed = await store.transitionReport(report.id, 'submitted', status, {
    approvedBy: 'seed-supervisor',
    approvalNotes: '',
    reviewedAt: new Date('2024-01-02T00:00:00.000Z'),
  });
  if (!reviewed) throw new Error(`Could not review seeded report ${report.id}`);
  return reviewed;
}
