import type { Response, NextFunction } from 'express';
import type { UserRole } from '@metrica/shared-types';
import type { AuthRequest } from './middleware.js';

// ─── Permission String Type ──────────────────────────────────────────
// Pattern: service:resource:action

export const Permission = {
  // ─── KPI Definitions ───────────────────────────────────────────────
  KPIS_DEFINITIONS_READ: 'kpis:definitions:read',
  KPIS_DEFINITIONS_MANAGE: 'kpis:definitions:manage',

  // ─── Assignments ───────────────────────────────────────────────────
  KPIS_ASSIGNMENTS_READ: 'kpis:assignments:read',
  KPIS_ASSIGNMENTS_MANAGE: 'kpis:assignments:manage',

  // ─── Reports ───────────────────────────────────────────────────────
  KPIS_REPORTS_CREATE: 'kpis:reports:create',
  KPIS_REPORTS_REVIEW: 'kpis:reports:review',

  // ─── Entries ───────────────────────────────────────────────────────
  KPIS_ENTRIES_READ: 'kpis:entries:read',
  KPIS_ENTRIES_RECORD_SYSTEM: 'kpis:entries:record_system',
  KPIS_AGGREGATION_RUN: 'kpis:aggregation:run',

  // ─── Actions ───────────────────────────────────────────────────────
  KPIS_ACTIONS_READ: 'kpis:actions:read',
  KPIS_ACTIONS_CREATE: 'kpis:actions:create',
} as const;

export type PermissionString = (typeof Permission)[keyof typeof Permission];

// ─── Role → Permission Mapping ───────────────────────────────────────
// org_admin is handled at the middleware level (bypass all checks)

const SUPERVISOR_PERMISSIONS: ReadonlySet<PermissionString> = new Set([
  Permission.KPIS_DEFINITIONS_READ,
  Permission.KPIS_DEFINITIONS_MANAGE,
  Permission.KPIS_ASSIGNMENTS_READ,
  Permission.KPIS_ASSIGNMENTS_MANAGE,
  Permission.KPIS_REPORTS_CREATE,
  Permission.KPIS_REPORTS_REVIEW,
  Permission.KPIS_ENTRIES_READ,
  Permission.KPIS_ENTRIES_RECORD_SYSTEM,
  Permission.KPIS_AGGREGATION_RUN,
  Permission.KPIS_ACTIONS_READ,
  Permission.KPIS_ACTIONS_CREATE,
]);

const ROLE_PERMISSIONS: Record<Exclude<UserRole, 'org_admin'>, ReadonlySet<PermissionString>> = {
  supervisor: SUPERVISOR_PERMISSIONS,

  // Managers act as supervisors for the KPI workflow
  manager: SUPERVISOR_PERMISSIONS,

  agent: new Set([
    Permission.KPIS_DEFINITIONS_READ,
    Permission.KPIS_ASSIGNMENTS_READ,
    Permission.KPIS_REPORTS_CREATE,
    Permission.KPIS_ENTRIES_READ,
    Permission.KPIS_ACTIONS_READ,
    Permission.KPIS_ACTIONS_CREATE,
  ]),

  analyst: new Set([
    Permission.KPIS_DEFINITIONS_READ,
    Permission.KPIS_ASSIGNMENTS_READ,
    Permission.KPIS_ENTRIES_READ,
    Permission.KPIS_ACTIONS_READ,
  ]),
};

// ─── Permission Check Utility ────────────────────────────────────────

/**
 * Check if a role has a specific permission.
 * org_admin always returns true (superuser within the organization).
 */
export function hasPermission(role: UserRole, permission: PermissionString): boolean {
  if (role === 'org_admin') return true;
  return ROLE_PERMISSIONS[role].has(permission);
}

// ─── KPI Capabilities ────────────────────────────────────────────────

/** Whether the holder may move submitted reports to approved or rejected. */
export interface CanApproveKpiReports {
  readonly canApproveKpiReports: boolean;
}

export interface KpiCapabilities extends CanApproveKpiReports {
  readonly canManageKpis: boolean;
  readonly canAssignKpis: boolean;
  readonly canViewAllReports: boolean;
  readonly canRecordSystemEntries: boolean;
  readonly canRunAggregation: boolean;
}

export function resolveKpiCapabilities(role: UserRole): KpiCapabilities {
  return {
    canApproveKpiReports: hasPermission(role, Permission.KPIS_REPORTS_REVIEW),
    canManageKpis: hasPermission(role, Permission.KPIS_DEFINITIONS_MANAGE),
    canAssignKpis: hasPermission(role, Permission.KPIS_ASSIGNMENTS_MANAGE),
    canViewAllReports: hasPermission(role, Permission.KPIS_REPORTS_REVIEW),
    canRecordSystemEntries: hasPermission(role, Permission.KPIS_ENTRIES_RECORD_SYSTEM),
    canRunAggregation: hasPermission(role, Permission.KPIS_AGGREGATION_RUN),
  };
}

// ─── Express Middleware ──────────────────────────────────────────────

/**
 * Express middleware that requires the authenticated user to have every listed permission.
 * Must be used AFTER authMiddleware (req.user must be set).
 *
 * Usage:
 *   router.post('/', requirePermission(Permission.KPIS_DEFINITIONS_MANAGE), handler);
 */
export function requirePermission(...permissions: PermissionString[]) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const role = req.user.role;

    if (!permissions.every((p) => hasPermission(role, p))) {
      res.status(403).json({
        error: 'Insufficient permissions',
        required: permissions,
        role,
      });
      return;
    }

    next();
  };
}
