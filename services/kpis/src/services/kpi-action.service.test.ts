import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError } from '../middleware/error-handler.js';
import { MemoryKpiStore } from '../test/memory-store.js';
import { OTHER_ORG_ID, buildActor, seedKpi } from '../test/fixtures.js';
import { getKpiAction, listKpiActions, recordKpiAction, type KpiActionDeps } from './kpi-action.service.js';

const agent = buildActor('agent-1', 'agent');

describe('KPI actions', () => {
  let store: MemoryKpiStore;
  let deps: KpiActionDeps;

  beforeEach(() => {
    store = new MemoryKpiStore();
    deps = { store };
  });

  it('records an action attributed to the caller', async () => {
    const kpi = await seedKpi(store);

    const action = await recordKpiAction(deps, agent, {
      kpiId: kpi.id,
      actionType: 'ticket_resolved',
      relatedEntityType: 'ticket',
      relatedEntityId: 'ticket-9',
    });

    expect(action).toMatchObject({
      kpiId: kpi.id,
      actionType: 'ticket_resolved',
      actionData: {},
      userId: 'agent-1',
      relatedEntityType: 'ticket',
      relatedEntityId: 'ticket-9',
      contributionValue: 1,
    });
    expect(await getKpiAction(deps, agent, action.id)).toEqual(action);
  });

  it('refuses KPIs from another organization', async () => {
    const foreign = await seedKpi(store, { organizationId: OTHER_ORG_ID });

    await expect(
      recordKpiAction(deps, agent, { kpiId: foreign.id, actionType: 'custom' })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists newest first and filters by type', async () => {
    const kpi = await seedKpi(store);
    const first = await recordKpiAction(deps, agent, { kpiId: kpi.id, actionType: 'message_sent' });
    const second = await recordKpiAction(deps, agent, { kpiId: kpi.id, actionType: 'ticket_created' });

    expect((await listKpiActions(deps, agent)).map((a) => a.id)).toEqual([second.id, first.id]);
    expect((await listKpiActions(deps, agent, { actionType: 'message_sent' })).map((a) => a.id)).toEqual([first.id]);
  });
});
