import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Response, NextFunction } from 'express';
import type { AuthRequest } from './middleware.js';
import {
  Permission,
  hasPermission,
  resolveKpiCapabilities,
  requirePermission,
} from './permissions.js';

function createMockRes() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe('hasPermission', () => {
  it('grants every permission to org_admin', () => {
    for (const permission of Object.values(Permission)) {
      expect(hasPermission('org_admin', permission)).toBe(true);
    }
  });

  it('lets supervisors and managers review reports', () => {
    expect(hasPermission('supervisor', Permission.KPIS_REPORTS_REVIEW)).toBe(true);
    expect(hasPermission('manager', Permission.KPIS_REPORTS_REVIEW)).toBe(true);
  });

  it('keeps agents away from review and definition management', () => {
    expect(hasPermission('agent', Permission.KPIS_REPORTS_REVIEW)).toBe(false);
    expect(hasPermission('agent', Permission.KPIS_DEFINITIONS_MANAGE)).toBe(false);
    expect(hasPermission('agent', Permission.KPIS_REPORTS_CREATE)).toBe(true);
  });

  it('gives analysts read-only access', () => {
    expect(hasPermission('analyst', Permission.KPIS_ENTRIES_READ)).toBe(true);
    expect(hasPermission('analyst', Permission.KPIS_ACTIONS_READ)).toBe(true);
    expect(hasPermission('analyst', Permission.KPIS_ACTIONS_CREATE)).toBe(false);
    expect(hasPermission('analyst', Permission.KPIS_REPORTS_CREATE)).toBe(false);
  });
});

describe('resolveKpiCapabilities', () => {
  it('resolves approval capability for supervisors', () => {
    const caps = resolveKpiCapabilities('supervisor');
    expect(caps.canApproveKpiReports).toBe(true);
    expect(caps.canManageKpis).toBe(true);
    expect(caps.canRunAggregation).toBe(true);
  });

  it('resolves no elevated capability for agents', () => {
    expect(resolveKpiCapabilities('agent')).toEqual({
      canApproveKpiReports: false,
      canManageKpis: false,
      canAssignKpis: false,
      canViewAllReports: false,
      canRecordSystemEntries: false,
      canRunAggregation: false,
    });
  });
});

describe('requirePermission', () => {
  let next: NextFunction;

  beforeEach(() => {
    next = vi.fn();
  });

  it('returns 401 without an authenticated user', () => {
    const res = createMockRes();
    const req: Partial<AuthRequest> = {};

    requirePermission(Permission.KPIS_ENTRIES_READ)(
      req as AuthRequest,
      res as unknown as Response,
      next,
    );

    expect(res.status).toHaveBeenCalledWith(401);
    expect(next).not.toHaveBeenCalled();
  });

  it('returns 403 when the role lacks the permission', () => {
    const res = createMockRes();
    const req: Partial<AuthRequest> = {
      user: { sub: 'user-1', organizationId: 'org-1', email: 'a@example.com', role: 'analyst' },
    };

    requirePermission(Permission.KPIS_AGGREGATION_RUN)(
      req as AuthRequest,
      res as unknown as Response,
      next,
    );

    expect(res.status).toHaveBeenCalledWith(403);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Insufficient permissions',
      required: ['kpis:aggregation:run'],
      role: 'analyst',
    });
  });

  it('calls next when the role holds the permission', () => {
    const res = createMockRes();
    const req: Partial<AuthRequest> = {
      user: { sub: 'user-1', organizationId: 'org-1', email: 'a@example.com', role: 'supervisor' },
    };

    requirePermission(Permission.KPIS_AGGREGATION_RUN)(
      req as AuthRequest,
      res as unknown as Response,
      next,
    );

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.status).not.toHaveBeenCalled();
  });
});
