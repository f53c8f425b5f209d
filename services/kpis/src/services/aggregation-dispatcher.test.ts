import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockQueueAdd, queueInstances } = vi.hoisted(() => ({
  mockQueueAdd: vi.fn(),
  queueInstances: [] as Array<{ name: string; opts: Record<string, unknown> }>,
}));

vi.mock('bullmq', () => {
  class MockQueue {
    name: string;
    opts: Record<string, unknown>;

    constructor(name: string, opts: Record<string, unknown>) {
      this.name = name;
      this.opts = opts;
      queueInstances.push(this);
    }

    add = mockQueueAdd;
  }

  return { Queue: MockQueue, Worker: class {} };
});

import { MemoryKpiStore } from '../test/memory-store.js';
import { RecordingEventPublisher, seedKpi, seedReport, seedUserAssignment } from '../test/fixtures.js';
import type { AggregationDeps } from './aggregation.service.js';
import {
  AGGREGATION_JOB_TYPE,
  InlineAggregationDispatcher,
  QueueAggregationDispatcher,
  createAggregationDispatcher,
  type AggregationJobQueue,
} from './aggregation-dispatcher.js';

const MARCH = { periodStart: '2024-03-01', periodEnd: '2024-03-31' };

describe('QueueAggregationDispatcher', () => {
  it('enqueues an envelope keyed by the approving report', async () => {
    const add = vi.fn<AggregationJobQueue['add']>(async () => ({ id: 'aggregate-report-report-7' }));
    const dispatcher = new QueueAggregationDispatcher({ add }, 3);

    const receipt = await dispatcher.dispatch({
      organizationId: 'org-1',
      reportId: 'report-7',
      kpiId: 'kpi-1',
      aggregationMethod: 'sum',
      ...MARCH,
    });

    expect(receipt).toEqual({ mode: 'queue', accepted: true, jobId: 'aggregate-report-report-7' });
    expect(add).toHaveBeenCalledTimes(1);
    const [name, envelope, opts] = add.mock.calls[0] ?? [];
    expect(name).toBe(AGGREGATION_JOB_TYPE);
    expect(opts).toEqual({ jobId: 'aggregate-report-report-7' });
    expect(envelope).toMatchObject({
      type: AGGREGATION_JOB_TYPE,
      organizationId: 'org-1',
      maxRetries: 3,
      payload: { kpiId: 'kpi-1', aggregationMethod: 'sum', ...MARCH },
    });
  });

  it('falls back to the envelope id without a report', async () => {
    const add = vi.fn<AggregationJobQueue['add']>(async () => ({}));
    const dispatcher = new QueueAggregationDispatcher({ add }, 3);

    const receipt = await dispatcher.dispatch({ organizationId: 'org-1', kpiId: 'kpi-1', ...MARCH });

    const envelope = add.mock.calls[0]?.[1];
    expect(receipt).toEqual({ mode: 'queue', accepted: true, jobId: envelope?.id });
  });
});

describe('InlineAggregationDispatcher', () => {
  let store: MemoryKpiStore;
  let deps: AggregationDeps;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    store = new MemoryKpiStore();
    deps = { store, events: new RecordingEventPublisher() };
    sleep.mockClear();
  });

  async function seedApprovedKpi() {
    const kpi = await seedKpi(store);
    const assignment = await seedUserAssignment(store, kpi, 'user-a');
    await seedReport(store, assignment, { ...MARCH, reportedValue: 8, reportedBy: 'user-a' }, 'approved');
    return kpi;
  }

  it('runs the trigger in process', async () => {
    const kpi = await seedApprovedKpi();
    const dispatcher = new InlineAggregationDispatcher(deps, { maxAttempts: 3, backoffMs: 10, sleep });

    const receipt = await dispatcher.dispatch({ organizationId: kpi.organizationId, kpiId: kpi.id, ...MARCH });

    expect(receipt).toMatchObject({ mode: 'inline', accepted: true, attempts: 1, error: null });
    expect(receipt.mode === 'inline' && receipt.result).toMatchObject({ success: true, value: 8 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries with exponential backoff and recovers', async () => {
    const kpi = await seedApprovedKpi();
    vi.spyOn(store, 'listApprovedReportsForPeriod').mockRejectedValueOnce(new Error('deadlock'));
    const dispatcher = new InlineAggregationDispatcher(deps, { maxAttempts: 3, backoffMs: 10, sleep });

    const receipt = await dispatcher.dispatch({ organizationId: kpi.organizationId, kpiId: kpi.id, ...MARCH });

    expect(receipt).toMatchObject({ mode: 'inline', accepted: true, attempts: 2 });
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it('reports exhaustion on the receipt instead of throwing', async () => {
    const kpi = await seedApprovedKpi();
    vi.spyOn(store, 'listApprovedReportsForPeriod').mockRejectedValue(new Error('db down'));
    const dispatcher = new InlineAggregationDispatcher(deps, { maxAttempts: 3, backoffMs: 10, sleep });

    const receipt = await dispatcher.dispatch({ organizationId: kpi.organizationId, kpiId: kpi.id, ...MARCH });

    expect(receipt).toEqual({ mode: 'inline', accepted: false, attempts: 3, result: null, error: 'db down' });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });
});

describe('createAggregationDispatcher', () => {
  const deps: AggregationDeps = { store: new MemoryKpiStore(), events: new RecordingEventPublisher() };

  beforeEach(() => {
    queueInstances.length = 0;
  });

  it('selects the inline transport by configuration', () => {
    const dispatcher = createAggregationDispatcher(deps, {
      KPI_AGGREGATION_DISPATCH: 'inline',
      KPI_AGGREGATION_MAX_ATTEMPTS: 3,
      KPI_AGGREGATION_BACKOFF_MS: 1000,
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(dispatcher).toBeInstanceOf(InlineAggregationDispatcher);
    expect(queueInstances).toHaveLength(0);
  });

  it('builds the aggregation queue with the configured retry policy', () => {
    const dispatcher = createAggregationDispatcher(deps, {
      KPI_AGGREGATION_DISPATCH: 'queue',
      KPI_AGGREGATION_MAX_ATTEMPTS: 5,
      KPI_AGGREGATION_BACKOFF_MS: 250,
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(dispatcher).toBeInstanceOf(QueueAggregationDispatcher);
    expect(queueInstances).toHaveLength(1);
    expect(queueInstances[0]?.name).toBe('kpis-aggregation');
    expect(queueInstances[0]?.opts).toMatchObject({
      prefix: 'metrica',
      defaultJobOptions: { attempts: 5, backoff: { type: 'exponential', delay: 250 } },
    });
  });
});
