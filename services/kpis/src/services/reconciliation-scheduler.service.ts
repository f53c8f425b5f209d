import { createLogger } from '@metrica/config';
import type { ReconciliationSummary } from '../types.js';
import { runReconciliation, type AggregationDeps } from './aggregation.service.js';

const log = createLogger('kpis:reconciliation-scheduler');

export interface ReconciliationSchedulerOptions {
  enabled: boolean;
  intervalMinutes: number;
}

export interface ReconciliationSchedulerHandle {
  runOnce: () => Promise<ReconciliationSummary | null>;
  stop: () => void;
}

export function startReconciliationScheduler(
  deps: AggregationDeps,
  options: ReconciliationSchedulerOptions
): ReconciliationSchedulerHandle {
  if (!options.enabled) {
    log.info('KPI reconciliation scheduler disabled');
    return {
      runOnce: async () => null,
      stop: () => undefined,
    };
  }

  const intervalMs = Math.max(1, options.intervalMinutes) * 60 * 1000;
  let isRunning = false;

  const runOnce = async (): Promise<ReconciliationSummary | null> => {
    if (isRunning) {
      log.warn('Skipping KPI reconciliation; previous run still in progress');
      return null;
    }

    isRunning = true;
    try {
      return await runReconciliation(deps);
    } catch (err) {
      log.error({ err }, 'KPI reconciliation run failed');
      return null;
    } finally {
      isRunning = false;
    }
  };

  const timer = setInterval(() => {
    void runOnce();
  }, intervalMs);

  if (typeof timer.unref === 'function') {
    timer.unref();
  }

  log.info({ intervalMinutes: options.intervalMinutes }, 'KPI reconciliation scheduler started');

  return {
    runOnce,
    stop: () => clearInterval(timer),
  };
}
