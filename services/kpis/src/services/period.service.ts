import type { PeriodType } from '@metrica/shared-types';
import type { PeriodBounds } from '../types.js';

// ─── ISO Calendar Dates ───────────────────────────────────────────────
// All arithmetic runs on UTC midnights so local timezones and DST never
// shift a boundary.

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatIsoDate(date) === value;
}

export function parseIsoDate(value: string): Date {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid ISO date: ${value}`);
  }
  return new Date(`${value}T00:00:00.000Z`);
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function todayIsoDate(now: Date = new Date()): string {
  return formatIsoDate(now);
}

function utcDate(year: number, monthIndex: number, day: number): string {
  return formatIsoDate(new Date(Date.UTC(year, monthIndex, day)));
}

/** Day 0 of the following month is the last day of this one; Date.UTC rolls December into January. */
function lastDayOfMonth(year: number, monthIndex: number): string {
  return utcDate(year, monthIndex + 1, 0);
}

// ─── Period Bounds ────────────────────────────────────────────────────

/**
 * Inclusive window of the given granularity containing `referenceDate`.
 * Weeks run Monday through Sunday; quarters start in January, April, July and October.
 */
export function getPeriodBounds(periodType: PeriodType, referenceDate: string): PeriodBounds {
  const ref = parseIsoDate(referenceDate);
  const year = ref.getUTCFullYear();
  const month = ref.getUTCMonth();

  switch (periodType) {
    case 'daily':
      return { periodStart: referenceDate, periodEnd: referenceDate };

    case 'weekly': {
      // getUTCDay: Sunday=0. Shift so Monday=0.
      const weekdayIndex = (ref.getUTCDay() + 6) % 7;
      const start = new Date(ref.getTime() - weekdayIndex * DAY_MS);
      const end = new Date(start.getTime() + 6 * DAY_MS);
      return { periodStart: formatIsoDate(start), periodEnd: formatIsoDate(end) };
    }

    case 'monthly':
      return { periodStart: utcDate(year, month, 1), periodEnd: lastDayOfMonth(year, month) };

    case 'quarterly': {
      const firstMonth = Math.floor(month / 3) * 3;
      return {
        periodStart: utcDate(year, firstMonth, 1),
        periodEnd: lastDayOfMonth(year, firstMonth + 2),
      };
    }

    case 'yearly':
      return { periodStart: utcDate(year, 0, 1), periodEnd: utcDate(year, 11, 31) };
  }
}

// ─── Labels ───────────────────────────────────────────────────────────
export function getPeriodLabel(periodStart: string, periodType: PeriodType): string {
  const start = parseIsoDate(periodStart);
  switch (periodType) {
    case 'daily':
      return periodStart;
    case 'weekly':
      return `${periodStart} to ${getPeriodBounds('weekly', periodStart).periodEnd}`;
    case 'monthly':
      return periodStart.slice(0, 7);
    case 'quarterly':
      return `${start.getUTCFullYear()} Q${Math.floor(start.getUTCMonth() / 3) + 1}`;
    case 'yearly':
      return String(start.getUTCFullYear());
  }
}
