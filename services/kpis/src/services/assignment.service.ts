import { createLogger } from '@metrica/config';
import type { AssignmentType, UserRole } from '@metrica/shared-types';
import {
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../middleware/error-handler.js';
import type { Actor, AssignmentTarget, DirectoryUser, KpiAssignment } from '../types.js';
import { UniqueConstraintError, type AssignmentFilters, type KpiStore } from './kpi-store.js';
import type { UserDirectory } from './user-directory.js';

const log = createLogger('kpis:assignments');

export interface AssignmentDeps {
  store: KpiStore;
  directory: UserDirectory;
}

export interface AssignmentInput {
  assignmentType: AssignmentType;
  role?: UserRole | null;
  userId?: string | null;
}

// ─── Validation ───────────────────────────────────────────────────────

/** Exactly one of role/user, matching the declared type. */
export function validateAssignmentInput(input: AssignmentInput): AssignmentTarget {
  const role = input.role ?? null;
  const userId = input.userId ?? null;

  if (input.assignmentType === 'role') {
    if (userId !== null) {
      throw new ValidationError('userId', 'User must not be set for role-based assignments');
    }
    if (role === null) {
      throw new ValidationError('role', 'Role is required for role-based assignments');
    }
    return { assignmentType: 'role', role, userId: null };
  }

  if (role !== null) {
    throw new ValidationError('role', 'Role must not be set for user-based assignments');
  }
  if (userId === null) {
    throw new ValidationError('userId', 'User is required for user-based assignments');
  }
  return { assignmentType: 'user', role: null, userId };
}

function assertCanAssign(actor: Actor): void {
  if (!actor.capabilities.canAssignKpis) {
    throw new PermissionDeniedError('Only supervisors can manage KPI assignments');
  }
}

// ─── Commands ─────────────────────────────────────────────────────────
export async function createAssignment(
  deps: AssignmentDeps,
  actor: Actor,
  input: AssignmentInput & { kpiId: string; isActive?: boolean }
): Promise<KpiAssignment> {
  assertCanAssign(actor);
  const target = validateAssignmentInput(input);

  const kpi = await deps.store.findKpi(actor.organizationId, input.kpiId);
  if (!kpi) throw new NotFoundError('KPI');

  if (target.assignmentType === 'user') {
    const user = await deps.directory.getUser(target.userId);
    if (!user || user.organizationId !== actor.organizationId) {
      throw new ValidationError('userId', 'User not found in this organization');
    }
  }

  try {
    const assignment = await deps.store.insertAssignment({
      ...target,
      organizationId: actor.organizationId,
      kpiId: kpi.id,
      isActive: input.isActive ?? true,
      assignedBy: actor.userId,
    });
    log.info(
      { assignmentId: assignment.id, kpiId: kpi.id, assignmentType: assignment.assignmentType },
      'KPI assignment created'
    );
    return assignment;
  } catch (err) {
    if (err instanceof UniqueConstraintError) {
      const field = target.assignmentType === 'role' ? 'role' : 'userId';
      throw new ValidationError(
        field,
        `This KPI is already assigned to this ${target.assignmentType}`,
        'DUPLICATE_ASSIGNMENT'
      );
    }
    throw err;
  }
}

export async function updateAssignment(
  deps: AssignmentDeps,
  actor: Actor,
  id: string,
  patch: { isActive: boolean }
): Promise<KpiAssignment> {
  assertCanAssign(actor);
  const updated = await deps.store.setAssignmentActive(actor.organizationId, id, patch.isActive);
  if (!updated) throw new NotFoundError('KPI assignment');
  log.info({ assignmentId: id, isActive: patch.isActive }, 'KPI assignment updated');
  return updated;
}

export function deactivateAssignment(deps: AssignmentDeps, actor: Actor, id: string): Promise<KpiAssignment> {
  return updateAssignment(deps, actor, id, { isActive: false });
}

// ─── Queries ──────────────────────────────────────────────────────────
export async function getAssignment(deps: AssignmentDeps, actor: Actor, id: string): Promise<KpiAssignment> {
  const assignment = await deps.store.findAssignment(actor.organizationId, id);
  if (!assignment) throw new NotFoundError('KPI assignment');
  return assignment;
}

export function listAssignments(
  deps: AssignmentDeps,
  actor: Actor,
  filters: AssignmentFilters = {}
): Promise<KpiAssignment[]> {
  return deps.store.listAssignments(actor.organizationId, filters);
}

/** Active assignments that reach a user directly or through their current role. */
export async function listAssignmentsForUser(
  deps: Pick<AssignmentDeps, 'store'>,
  subject: Pick<Actor, 'userId' | 'organizationId' | 'role'>
): Promise<KpiAssignment[]> {
  const [direct, byRole] = await Promise.all([
    deps.store.listAssignments(subject.organizationId, { isActive: true, userId: subject.userId }),
    deps.store.listAssignments(subject.organizationId, { isActive: true, role: subject.role }),
  ]);
  return [...direct, ...byRole];
}

// ─── Resolution ───────────────────────────────────────────────────────

/**
 * Users answerable for a KPI: individually assigned users plus every active
 * holder of an assigned role, over active assignments only.
 */
export async function resolveResponsibleUsers(
  deps: AssignmentDeps,
  organizationId: string,
  kpiId: string
): Promise<DirectoryUser[]> {
  const assignments = await deps.store.listAssignments(organizationId, { kpiId, isActive: true });

  const userIds: string[] = [];
  const roles: UserRole[] = [];
  for (const assignment of assignments) {
    if (assignment.assignmentType === 'user') userIds.push(assignment.userId);
    else roles.push(assignment.role);
  }

  const [direct, byRole] = await Promise.all([
    deps.directory.listActiveUsersByIds(organizationId, userIds),
    deps.directory.listActiveUsersByRoles(organizationId, roles),
  ]);

  const byId = new Map<string, DirectoryUser>();
  for (const user of [...direct, ...byRole]) byId.set(user.id, user);
  return [...byId.values()].sort((a, b) => a.email.localeCompare(b.email));
}

/** Individual assignments match the user; role assignments match the user's current role. */
export function canReportOnAssignment(
  subject: Pick<Actor, 'userId' | 'role'>,
  assignment: KpiAssignment
): boolean {
  if (assignment.assignmentType === 'user') return assignment.userId === subject.userId;
  return assignment.role === subject.role;
}
