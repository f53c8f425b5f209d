import { parseArgs } from 'node:util';
import {
  AGGREGATION_METHODS,
  PERIOD_TYPES,
  type AggregationMethod,
  type PeriodType,
} from '@metrica/shared-types';
import type { ReconciliationRequest, ReconciliationSummary } from '../types.js';
import { isIsoDate } from '../services/period.service.js';

export const AGGREGATE_USAGE = `Usage: aggregate-entries [options]

  --date <YYYY-MM-DD>              Reference date (default: today)
  --period <type>                  Only KPIs with this period (${PERIOD_TYPES.join(', ')})
  --kpi-id <id>                    Only this KPI
  --aggregation-method <method>    Override each KPI's method (${AGGREGATION_METHODS.join(', ')})
  --dry-run                        Report what would be aggregated without writing
  --help                           Show this message`;

export type AggregateArgsResult =
  | { ok: true; help: boolean; request: ReconciliationRequest }
  | { ok: false; error: string };

function isPeriodType(value: string): value is PeriodType {
  return PERIOD_TYPES.some((p) => p === value);
}

function isAggregationMethod(value: string): value is AggregationMethod {
  return AGGREGATION_METHODS.some((m) => m === value);
}

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      date: { type: 'string' },
      period: { type: 'string' },
      'kpi-id': { type: 'string' },
      'aggregation-method': { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseAggregateArgs(argv: string[]): AggregateArgsResult {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const request: ReconciliationRequest = { dryRun: values['dry-run'] ?? false };

  if (values.date !== undefined) {
    if (!isIsoDate(values.date)) {
      return { ok: false, error: `Invalid --date "${values.date}"; expected YYYY-MM-DD` };
    }
    request.referenceDate = values.date;
  }

  if (values.period !== undefined) {
    if (!isPeriodType(values.period)) {
      return { ok: false, error: `Invalid --period "${values.period}"` };
    }
    request.period = values.period;
  }

  const method = values['aggregation-method'];
  if (method !== undefined) {
    if (!isAggregationMethod(method)) {
      return { ok: false, error: `Invalid --aggregation-method "${method}"` };
    }
    request.aggregationMethod = method;
  }

  const kpiId = values['kpi-id'];
  if (kpiId !== undefined) {
    if (kpiId.trim() === '') {
      return { ok: false, error: '--kpi-id must not be empty' };
    }
    request.kpiId = kpiId.trim();
  }

  return { ok: true, help: values.help ?? false, request };
}

export function formatReconciliationSummary(summary: ReconciliationSummary, dryRun: boolean): string[] {
  const lines = [dryRun ? 'Dry run: no entries written' : 'KPI aggregation complete'];
  lines.push(`  processed: ${summary.processed}`);
  if (dryRun) {
    lines.push(`  pending reports: ${summary.pending}`);
  } else {
    lines.push(`  created:   ${summary.created}`);
    lines.push(`  updated:   ${summary.updated}`);
  }
  lines.push(`  skipped:   ${summary.skipped}`);
  for (const failure of summary.errors) {
    lines.push(`  [FAIL] ${failure.kpiName} (${failure.kpiId}): ${failure.error}`);
  }
  return lines;
}
