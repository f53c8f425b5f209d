import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryKpiStore } from '../test/memory-store.js';
import {
  buildActor,
  seedKpi,
  seedReport,
  seedRoleAssignment,
  seedUserAssignment,
} from '../test/fixtures.js';
import type { Kpi } from '../types.js';
import { getKpiStats, getUserKpiPerformance, type PerformanceDeps } from './performance.service.js';

const agent = buildActor('agent-1', 'agent');

function entryFor(kpi: Kpi, periodStart: string, periodEnd: string, value: number) {
  return {
    organizationId: kpi.organizationId,
    kpiId: kpi.id,
    periodStart,
    periodEnd,
    value,
    isCalculated: false,
    enteredBy: null,
    notes: '',
    metadata: { source: 'aggregated_reports' as const, method: 'average' as const, reportsCount: 1, reporters: ['u'] },
  };
}

describe('getKpiStats', () => {
  let store: MemoryKpiStore;
  let deps: PerformanceDeps;

  beforeEach(() => {
    store = new MemoryKpiStore();
    deps = { store };
  });

  it('summarizes entries, actions and target achievement', async () => {
    const kpi = await seedKpi(store, { targetValue: 20 });
    await store.upsertEntry(entryFor(kpi, '2024-03-01', '2024-03-31', 15));
    await store.upsertEntry(entryFor(kpi, '2024-01-01', '2024-01-31', 10));
    await store.upsertEntry(entryFor(kpi, '2024-02-01', '2024-02-29', 0));
    for (const actionType of ['ticket_created', 'ticket_resolved'] as const) {
      await store.insertAction({
        organizationId: kpi.organizationId,
        kpiId: kpi.id,
        actionType,
        actionData: {},
        userId: 'agent-1',
        relatedEntityType: 'ticket',
        relatedEntityId: 't-1',
        contributionValue: 1,
      });
    }

    const stats = await getKpiStats(deps, agent, kpi.id);

    expect(stats).toEqual({
      kpiId: kpi.id,
      kpiName: 'Customer satisfaction',
      unit: '',
      targetValue: 20,
      latestValue: 15,
      latestPeriodStart: '2024-03-01',
      latestPeriodEnd: '2024-03-31',
      entriesCount: 3,
      averageValue: 8.33,
      actionsCount: 2,
      targetAchievementPercentage: 75,
    });
  });

  it('returns nulls for a KPI without entries', async () => {
    const kpi = await seedKpi(store, { targetValue: 20 });

    const stats = await getKpiStats(deps, agent, kpi.id);

    expect(stats).toMatchObject({
      latestValue: null,
      entriesCount: 0,
      averageValue: null,
      targetAchievementPercentage: null,
    });
  });
});

describe('getUserKpiPerformance', () => {
  it("reports the caller's active KPIs against the current period", async () => {
    const store = new MemoryKpiStore();
    const deps: PerformanceDeps = { store };

    const direct = await seedKpi(store, { name: 'Direct', targetValue: 10 });
    const directAssignment = await seedUserAssignment(store, direct, 'agent-1');
    await store.upsertEntry(entryFor(direct, '2024-02-01', '2024-02-29', 9));
    const reporter = { reportedValue: 1, reportedBy: 'agent-1' };
    await seedReport(store, directAssignment, { ...reporter, periodStart: '2024-01-01', periodEnd: '2024-01-31' });
    await seedReport(
      store,
      directAssignment,
      { ...reporter, periodStart: '2024-02-01', periodEnd: '2024-02-29' },
      'submitted'
    );
    await seedReport(
      store,
      directAssignment,
      { ...reporter, periodStart: '2024-03-01', periodEnd: '2024-03-31' },
      'approved'
    );

    const byRole = await seedKpi(store, { name: 'By role', period: 'weekly' });
    await seedRoleAssignment(store, byRole, 'agent');

    const paused = await seedKpi(store, { name: 'Paused assignment' });
    await seedUserAssignment(store, paused, 'agent-1', false);
    const retired = await seedKpi(store, { name: 'Retired', isActive: false });
    await seedUserAssignment(store, retired, 'agent-1');

    const summary = await getUserKpiPerformance(deps, agent, '2024-02-15');

    expect(summary.totalKpis).toBe(2);
    expect(summary.averagePerformance).toBe(90);
    expect(summary.kpis.map((k) => k.kpi.name)).toEqual(['Direct', 'By role']);
    expect(summary.kpis[0]).toMatchObject({
      latestValue: 9,
      currentPeriodValue: 9,
      currentPeriodStart: '2024-02-01',
      currentPeriodEnd: '2024-02-29',
      achievementPercentage: 90,
      isOnTrack: true,
      totalEntries: 1,
      pendingReportsCount: 2,
    });
    expect(summary.kpis[1]).toMatchObject({
      currentPeriodValue: null,
      currentPeriodStart: '2024-02-12',
      currentPeriodEnd: '2024-02-18',
      achievementPercentage: null,
      isOnTrack: null,
      pendingReportsCount: 0,
    });
  });
});
