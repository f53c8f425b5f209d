import { createLogger } from '@metrica/config';
import type { AggregationMethod, KpiSourceType, PeriodType } from '@metrica/shared-types';
import {
  NotFoundError,
  PermissionDeniedError,
  StateTransitionError,
  ValidationError,
} from '../middleware/error-handler.js';
import type { Actor, Kpi, KpiPatch } from '../types.js';
import type { KpiFilters, KpiStore } from './kpi-store.js';

const log = createLogger('kpis:definitions');

export interface KpiDefinitionDeps {
  store: KpiStore;
}

export interface KpiInput {
  name: string;
  description?: string;
  branchId?: string | null;
  sourceType: KpiSourceType;
  period: PeriodType;
  aggregationMethod?: AggregationMethod;
  targetValue?: number | null;
  minimumValue?: number | null;
  maximumValue?: number | null;
  unit?: string;
  aggregateQuery?: string;
  isActive?: boolean;
}

type DefinitionRules = Pick<Kpi, 'sourceType' | 'minimumValue' | 'maximumValue' | 'aggregateQuery'>;

export function validateKpiDefinition(definition: DefinitionRules): void {
  const { minimumValue, maximumValue } = definition;
  if (minimumValue !== null && maximumValue !== null && minimumValue > maximumValue) {
    throw new ValidationError('minimumValue', 'Minimum value cannot be greater than maximum value');
  }
  if (definition.sourceType === 'aggregate' && definition.aggregateQuery.trim() === '') {
    throw new ValidationError('aggregateQuery', 'Aggregate query is required for aggregate KPIs');
  }
}

function assertCanManage(actor: Actor): void {
  if (!actor.capabilities.canManageKpis) {
    throw new PermissionDeniedError('Only supervisors can manage KPI definitions');
  }
}

export async function createKpi(deps: KpiDefinitionDeps, actor: Actor, input: KpiInput): Promise<Kpi> {
  assertCanManage(actor);

  const definition = {
    organizationId: actor.organizationId,
    branchId: input.branchId ?? null,
    name: input.name.trim(),
    description: input.description ?? '',
    sourceType: input.sourceType,
    period: input.period,
    aggregationMethod: input.aggregationMethod ?? 'average',
    targetValue: input.targetValue ?? null,
    minimumValue: input.minimumValue ?? null,
    maximumValue: input.maximumValue ?? null,
    unit: input.unit ?? '',
    aggregateQuery: input.aggregateQuery ?? '',
    isActive: input.isActive ?? true,
    createdBy: actor.userId,
  };
  if (definition.name === '') {
    throw new ValidationError('name', 'Name is required');
  }
  validateKpiDefinition(definition);

  const kpi = await deps.store.insertKpi(definition);
  log.info({ kpiId: kpi.id, kpiName: kpi.name, sourceType: kpi.sourceType, period: kpi.period }, 'KPI created');
  return kpi;
}

/**
 * Applies a partial update after validating the merged definition.
 * Source type and period are frozen once any entry references the KPI,
 * since existing entries were keyed by the old period windows.
 */
export async function updateKpi(
  deps: KpiDefinitionDeps,
  actor: Actor,
  id: string,
  patch: KpiPatch
): Promise<Kpi> {
  assertCanManage(actor);
  const existing = await deps.store.findKpi(actor.organizationId, id);
  if (!existing) throw new NotFoundError('KPI');

  if (patch.name !== undefined && patch.name.trim() === '') {
    throw new ValidationError('name', 'Name is required');
  }
  validateKpiDefinition({
    sourceType: patch.sourceType ?? existing.sourceType,
    minimumValue: patch.minimumValue !== undefined ? patch.minimumValue : existing.minimumValue,
    maximumValue: patch.maximumValue !== undefined ? patch.maximumValue : existing.maximumValue,
    aggregateQuery: patch.aggregateQuery ?? existing.aggregateQuery,
  });

  const frozen: string[] = [];
  if (patch.sourceType !== undefined && patch.sourceType !== existing.sourceType) frozen.push('sourceType');
  if (patch.period !== undefined && patch.period !== existing.period) frozen.push('period');
  if (frozen.length > 0 && (await deps.store.countEntries(id)) > 0) {
    throw new StateTransitionError('Source type and period cannot change once entries exist', {
      kpiId: id,
      fields: frozen,
    });
  }

  const updated = await deps.store.updateKpi(actor.organizationId, id, patch);
  if (!updated) throw new NotFoundError('KPI');
  log.info({ kpiId: id, kpiName: updated.name, fields: Object.keys(patch) }, 'KPI updated');
  return updated;
}

/** KPIs are never hard-deleted; entries and reports keep pointing at them. */
export function deactivateKpi(deps: KpiDefinitionDeps, actor: Actor, id: string): Promise<Kpi> {
  return updateKpi(deps, actor, id, { isActive: false });
}

export async function getKpi(deps: KpiDefinitionDeps, actor: Actor, id: string): Promise<Kpi> {
  const kpi = await deps.store.findKpi(actor.organizationId, id);
  if (!kpi) throw new NotFoundError('KPI');
  return kpi;
}

export function listKpis(
  deps: KpiDefinitionDeps,
  actor: Actor,
  filters: Omit<KpiFilters, 'organizationId'> = {}
): Promise<Kpi[]> {
  return deps.store.listKpis({ ...filters, organizationId: actor.organizationId });
}
