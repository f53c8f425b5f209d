import { createLogger } from '@metrica/config';
import type { KpiActionType } from '@metrica/shared-types';
import { NotFoundError } from '../middleware/error-handler.js';
import type { Actor, KpiAction } from '../types.js';
import type { ActionFilters, KpiStore } from './kpi-store.js';

const log = createLogger('kpis:actions');

export interface KpiActionDeps {
  store: KpiStore;
}

export interface KpiActionInput {
  kpiId: string;
  actionType: KpiActionType;
  actionData?: Record<string, unknown>;
  relatedEntityType?: string;
  relatedEntityId?: string;
  contributionValue?: number;
}

// Actions are an append-only log; there is no update or delete.

export async function recordKpiAction(
  deps: KpiActionDeps,
  actor: Actor,
  input: KpiActionInput
): Promise<KpiAction> {
  const kpi = await deps.store.findKpi(actor.organizationId, input.kpiId);
  if (!kpi) throw new NotFoundError('KPI');

  const action = await deps.store.insertAction({
    organizationId: actor.organizationId,
    kpiId: kpi.id,
    actionType: input.actionType,
    actionData: input.actionData ?? {},
    userId: actor.userId,
    relatedEntityType: input.relatedEntityType ?? '',
    relatedEntityId: input.relatedEntityId ?? '',
    contributionValue: input.contributionValue ?? 1,
  });
  log.debug({ actionId: action.id, kpiId: kpi.id, actionType: action.actionType }, 'KPI action recorded');
  return action;
}

export async function getKpiAction(deps: KpiActionDeps, actor: Actor, id: string): Promise<KpiAction> {
  const action = await deps.store.findAction(actor.organizationId, id);
  if (!action) throw new NotFoundError('KPI action');
  return action;
}

export function listKpiActions(deps: KpiActionDeps, actor: Actor, filters: ActionFilters = {}): Promise<KpiAction[]> {
  return deps.store.listActions(actor.organizationId, filters);
}
