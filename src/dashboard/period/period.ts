import { InvalidPeriodException } from '../../common/exceptions/report.exceptions';
import { DateRange } from '../../common/types/date-range';
import {
  addUtcDays,
  diffUtcDays,
  formatIsoDate,
  parseIsoDate,
  startOfUtcDay,
} from '../../common/utils/iso-date';

export enum PeriodName {
  TODAY = 'today',
  THIS_WEEK = 'this_week',
  THIS_MONTH = 'this_month',
  LAST_MONTH = 'last_month',
  THIS_QUARTER = 'this_quarter',
  THIS_YEAR = 'this_year',
  CUSTOM = 'custom',
}

export const DEFAULT_PERIOD = PeriodName.THIS_MONTH;

// periods that resolve from the date alone
export type PresetPeriodName = Exclude<PeriodName, PeriodName.CUSTOM>;

export const PRESET_PERIODS: readonly PresetPeriodName[] = Object.values(PeriodName).filter(
  (name): name is PresetPeriodName => name !== PeriodName.CUSTOM,
);

export type PeriodSelector =
  | { name: PresetPeriodName }
  | { name: PeriodName.CUSTOM; start: string; end: string };

export interface ResolvedPeriod {
  name: PeriodName;
  current: DateRange;
  previous: DateRange;
}

const PERIOD_NAMES = new Set<string>(Object.values(PeriodName));

function isPeriodName(value: string): value is PeriodName {
  return PERIOD_NAMES.has(value);
}

/**
 * Validates raw query input into a selector. A missing name means this month;
 * `custom` needs both dates, in order.
 */
export function parsePeriodSelector(
  name?: string | null,
  start?: string | null,
  end?: string | null,
): PeriodSelector {
  if (!name) {
    return { name: DEFAULT_PERIOD };
  }
  if (!isPeriodName(name)) {
    throw new InvalidPeriodException(`unknown period "${name}"`);
  }
  if (name !== PeriodName.CUSTOM) {
    return { name };
  }

  if (!start || !end) {
    throw new InvalidPeriodException('custom period needs start and end');
  }
  const from = parseIsoDate(start);
  const to = parseIsoDate(end);
  if (!from || !to) {
    throw new InvalidPeriodException('dates must be YYYY-MM-DD');
  }
  if (from > to) {
    throw new InvalidPeriodException('start is after end');
  }
  return { name, start, end };
}

function range(start: Date, end: Date): DateRange {
  return { start: formatIsoDate(start), end: formatIsoDate(end) };
}

function monthStart(year: number, month: number): Date {
  // Date.UTC normalises month overflow in both directions
  return new Date(Date.UTC(year, month, 1));
}

/**
 * Maps a selector to its `[start, end)` range and the period right before it.
 * Calendar selectors step back one calendar unit; `custom` steps back by its
 * own length in days.
 */
export function resolvePeriod(selector: PeriodSelector, now: Date): ResolvedPeriod {
  const today = startOfUtcDay(now);
  const year = today.getUTCFullYear();
  const month = today.getUTCMonth();

  switch (selector.name) {
    case PeriodName.TODAY:
      return {
        name: selector.name,
        current: range(today, addUtcDays(today, 1)),
        previous: range(addUtcDays(today, -1), today),
      };

    case PeriodName.THIS_WEEK: {
      // getUTCDay: Sunday = 0
      const monday = addUtcDays(today, -((today.getUTCDay() + 6) % 7));
      return {
        name: selector.name,
        current: range(monday, addUtcDays(monday, 7)),
        previous: range(addUtcDays(monday, -7), monday),
      };
    }

    case PeriodName.THIS_MONTH:
      return {
        name: selector.name,
        current: range(monthStart(year, month), monthStart(year, month + 1)),
        previous: range(monthStart(year, month - 1), monthStart(year, month)),
      };

    case PeriodName.LAST_MONTH:
      return {
        name: selector.name,
        current: range(monthStart(year, month - 1), monthStart(year, month)),
        previous: range(monthStart(year, month - 2), monthStart(year, month - 1)),
      };

    case PeriodName.THIS_QUARTER: {
      const first = month - (month % 3);
      return {
        name: selector.name,
        current: range(monthStart(year, first), monthStart(year, first + 3)),
        previous: range(monthStart(year, first - 3), monthStart(year, first)),
      };
    }

    case PeriodName.THIS_YEAR:
      return {
        name: selector.name,
        current: range(monthStart(year, 0), monthStart(year + 1, 0)),
        previous: range(monthStart(year - 1, 0), monthStart(year, 0)),
      };

    case PeriodName.CUSTOM: {
      const start = parseIsoDate(selector.start);
      const end = parseIsoDate(selector.end);
      if (!start || !end || start > end) {
        throw new InvalidPeriodException('invalid custom range');
      }
      const length = diffUtcDays(end, start);
      return {
        name: selector.name,
        current: { start: selector.start, end: selector.end },
        previous: range(addUtcDays(start, -length), start),
      };
    }
  }
}

/** Every day in `[start, end)`, as ISO dates. */
export function daysInRange(range: DateRange): string[] {
  const start = parseIsoDate(range.start);
  const end = parseIsoDate(range.end);
  if (!start || !end) return [];

  const days: string[] = [];
  for (let d = start; d < end; d = addUtcDays(d, 1)) {
    days.push(formatIsoDate(d));
  }
  return days;
}

export function rangeKey(range: DateRange): string {
  return `${range.start}..${range.end}`;
}
