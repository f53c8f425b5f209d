/**
 * Batch KPI aggregation.
 *
 * Recomputes the current-period entry of every active manual KPI from its
 * approved reports. Run with: npm run aggregate -- [--dry-run] [--date 2024-03-15]
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { closeDb, db } from '@metrica/db';
import { getEventBus } from '@metrica/events';
import { config } from '@metrica/config';
import { runReconciliation } from '../services/aggregation.service.js';
import { DrizzleKpiStore } from '../services/drizzle-kpi-store.js';
import { AGGREGATE_USAGE, formatReconciliationSummary, parseAggregateArgs } from './aggregate-args.js';

const __filename = fileURLToPath(import.meta.url);

function isExecutedDirectly(): boolean {
  if (!process.argv[1]) return false;
  return resolve(process.argv[1]) === __filename;
}

export async function runAggregateEntries(argv: string[]): Promise<number> {
  const parsed = parseAggregateArgs(argv);
  if (!parsed.ok) {
    console.error(`[FAIL] ${parsed.error}`);
    console.error(AGGREGATE_USAGE);
    return 1;
  }
  if (parsed.help) {
    console.log(AGGREGATE_USAGE);
    return 0;
  }

  const events = getEventBus(config.REDIS_URL);
  try {
    const summary = await runReconciliation({ store: new DrizzleKpiStore(db), events }, parsed.request);
    for (const line of formatReconciliationSummary(summary, parsed.request.dryRun ?? false)) {
      console.log(line);
    }
    return summary.errors.length > 0 ? 1 : 0;
  } finally {
    await events.shutdown();
    await closeDb();
  }
}

if (isExecutedDirectly()) {
  runAggregateEntries(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error: unknown) => {
      console.error('[FAIL] KPI aggregation crashed unexpectedly');
      console.error(error);
      process.exit(1);
    });
}
