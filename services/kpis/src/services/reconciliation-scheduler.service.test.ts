import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryKpiStore } from '../test/memory-store.js';
import { RecordingEventPublisher, seedKpi, seedReport, seedUserAssignment } from '../test/fixtures.js';
import type { AggregationDeps } from './aggregation.service.js';
import { startReconciliationScheduler } from './reconciliation-scheduler.service.js';

describe('startReconciliationScheduler', () => {
  let store: MemoryKpiStore;
  let deps: AggregationDeps;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-20T08:00:00.000Z'));
    store = new MemoryKpiStore();
    deps = { store, events: new RecordingEventPublisher() };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('does nothing when disabled', async () => {
    const listKpis = vi.spyOn(store, 'listKpis');
    const handle = startReconciliationScheduler(deps, { enabled: false, intervalMinutes: 1 });

    expect(await handle.runOnce()).toBeNull();
    await vi.advanceTimersByTimeAsync(5 * 60 * 1000);
    expect(listKpis).not.toHaveBeenCalled();
    handle.stop();
  });

  it('reconciles the current period on demand', async () => {
    const kpi = await seedKpi(store);
    const assignment = await seedUserAssignment(store, kpi, 'agent-1');
    await seedReport(
      store,
      assignment,
      { periodStart: '2024-03-01', periodEnd: '2024-03-31', reportedValue: 12, reportedBy: 'agent-1' },
      'approved'
    );
    const handle = startReconciliationScheduler(deps, { enabled: true, intervalMinutes: 60 });

    const summary = await handle.runOnce();

    expect(summary).toMatchObject({ processed: 1, created: 1 });
    expect((await store.findEntryForPeriod(kpi.id, '2024-03-01', '2024-03-31'))?.value).toBe(12);
    handle.stop();
  });

  it('runs on the configured interval until stopped', async () => {
    const listKpis = vi.spyOn(store, 'listKpis');
    const handle = startReconciliationScheduler(deps, { enabled: true, intervalMinutes: 1 });

    await vi.advanceTimersByTimeAsync(60 * 1000);
    expect(listKpis).toHaveBeenCalledTimes(1);

    handle.stop();
    await vi.advanceTimersByTimeAsync(5 * 60 * 1000);
    expect(listKpis).toHaveBeenCalledTimes(1);
  });

  it('skips a run while the previous one is still going', async () => {
    let release: () => void = () => undefined;
    vi.spyOn(store, 'listKpis').mockImplementationOnce(
      () => new Promise((resolve) => {
        release = () => resolve([]);
      })
    );
    const handle = startReconciliationScheduler(deps, { enabled: true, intervalMinutes: 60 });

    const first = handle.runOnce();
    expect(await handle.runOnce()).toBeNull();
    release();
    expect(await first).toMatchObject({ processed: 0 });
    handle.stop();
  });

  it('logs and survives a failing run', async () => {
    vi.spyOn(store, 'listKpis').mockRejectedValueOnce(new Error('db unavailable'));
    const handle = startReconciliationScheduler(deps, { enabled: true, intervalMinutes: 60 });

    expect(await handle.runOnce()).toBeNull();
    expect(await handle.runOnce()).toMatchObject({ processed: 0, errors: [] });
    handle.stop();
  });
});
