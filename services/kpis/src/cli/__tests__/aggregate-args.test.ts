import { describe, it, expect } from 'vitest';
import { formatReconciliationSummary, parseAggregateArgs } from '../aggregate-args.js';

describe('parseAggregateArgs', () => {
  it('defaults to a live run for today with no filters', () => {
    expect(parseAggregateArgs([])).toEqual({ ok: true, help: false, request: { dryRun: false } });
  });

  it('maps every flag onto the reconciliation request', () => {
    const result = parseAggregateArgs([
      '--date',
      '2024-03-15',
      '--period',
      'monthly',
      '--kpi-id',
      ' kpi-7 ',
      '--aggregation-method',
      'sum',
      '--dry-run',
    ]);

    expect(result).toEqual({
      ok: true,
      help: false,
      request: {
        dryRun: true,
        referenceDate: '2024-03-15',
        period: 'monthly',
        aggregationMethod: 'sum',
        kpiId: 'kpi-7',
      },
    });
  });

  it('rejects impossible dates', () => {
    expect(parseAggregateArgs(['--date', '2024-02-30'])).toEqual({
      ok: false,
      error: 'Invalid --date "2024-02-30"; expected YYYY-MM-DD',
    });
  });

  it('rejects unknown periods and methods', () => {
    expect(parseAggregateArgs(['--period', 'hourly'])).toEqual({ ok: false, error: 'Invalid --period "hourly"' });
    expect(parseAggregateArgs(['--aggregation-method', 'median'])).toEqual({
      ok: false,
      error: 'Invalid --aggregation-method "median"',
    });
  });

  it('rejects unknown flags', () => {
    const result = parseAggregateArgs(['--force']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toContain('--force');
  });

  it('recognises --help', () => {
    const result = parseAggregateArgs(['--help']);
    expect(result.ok && result.help).toBe(true);
  });
});

describe('formatReconciliationSummary', () => {
  it('prints created and updated counts for a live run', () => {
    const lines = formatReconciliationSummary(
      {
        processed: 3,
        created: 2,
        updated: 1,
        skipped: 1,
        pending: 0,
        errors: [{ kpiId: 'kpi-9', kpiName: 'Response time', error: 'boom' }],
      },
      false
    );

    expect(lines).toEqual([
      'KPI aggregation complete',
      '  processed: 3',
      '  created:   2',
      '  updated:   1',
      '  skipped:   1',
      '  [FAIL] Response time (kpi-9): boom',
    ]);
  });

  it('prints pending reports for a dry run', () => {
    const lines = formatReconciliationSummary(
      { processed: 2, created: 0, updated: 0, skipped: 0, pending: 5, errors: [] },
      true
    );

    expect(lines).toEqual([
      'Dry run: no entries written',
      '  processed: 2',
      '  pending reports: 5',
      '  skipped:   0',
    ]);
  });
});
