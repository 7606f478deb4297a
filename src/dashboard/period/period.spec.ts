import { InvalidPeriodException } from '../../common/exceptions/report.exceptions';
import {
  daysInRange,
  parsePeriodSelector,
  PeriodName,
  rangeKey,
  resolvePeriod,
} from './period';

// Wednesday
const NOW = new Date('2025-03-12T23:30:00.000Z');

describe('resolvePeriod', () => {
  it('today ends at the start of tomorrow', () => {
    expect(resolvePeriod({ name: PeriodName.TODAY }, NOW)).toEqual({
      name: PeriodName.TODAY,
      current: { start: '2025-03-12', end: '2025-03-13' },
      previous: { start: '2025-03-11', end: '2025-03-12' },
    });
  });

  it('this_week starts on Monday', () => {
    const period = resolvePeriod({ name: PeriodName.THIS_WEEK }, NOW);
    expect(period.current).toEqual({ start: '2025-03-10', end: '2025-03-17' });
    expect(period.previous).toEqual({ start: '2025-03-03', end: '2025-03-10' });
  });

  it('this_week on a Sunday still belongs to the week that began on Monday', () => {
    const period = resolvePeriod({ name: PeriodName.THIS_WEEK }, new Date('2025-03-16T08:00:00Z'));
    expect(period.current).toEqual({ start: '2025-03-10', end: '2025-03-17' });
  });

  it('this_month compares against the previous calendar month', () => {
    const period = resolvePeriod({ name: PeriodName.THIS_MONTH }, NOW);
    expect(period.current).toEqual({ start: '2025-03-01', end: '2025-04-01' });
    expect(period.previous).toEqual({ start: '2025-02-01', end: '2025-03-01' });
  });

  it('last_month crosses the year boundary in January', () => {
    const period = resolvePeriod({ name: PeriodName.LAST_MONTH }, new Date('2025-01-20T00:00:00Z'));
    expect(period.current).toEqual({ start: '2024-12-01', end: '2025-01-01' });
    expect(period.previous).toEqual({ start: '2024-11-01', end: '2024-12-01' });
  });

  it('this_quarter and this_year follow the calendar', () => {
    expect(resolvePeriod({ name: PeriodName.THIS_QUARTER }, NOW)).toMatchObject({
      current: { start: '2025-01-01', end: '2025-04-01' },
      previous: { start: '2024-10-01', end: '2025-01-01' },
    });
    expect(resolvePeriod({ name: PeriodName.THIS_YEAR }, NOW)).toMatchObject({
      current: { start: '2025-01-01', end: '2026-01-01' },
      previous: { start: '2024-01-01', end: '2025-01-01' },
    });
  });

  it('custom steps back by its own length', () => {
    const period = resolvePeriod(
      { name: PeriodName.CUSTOM, start: '2025-03-01', end: '2025-03-15' },
      NOW,
    );
    expect(period.current).toEqual({ start: '2025-03-01', end: '2025-03-15' });
    expect(period.previous).toEqual({ start: '2025-02-15', end: '2025-03-01' });
  });
});

describe('parsePeriodSelector', () => {
  it('defaults to this_month', () => {
    expect(parsePeriodSelector()).toEqual({ name: PeriodName.THIS_MONTH });
    expect(parsePeriodSelector('')).toEqual({ name: PeriodName.THIS_MONTH });
  });

  it('accepts named periods and ignores stray dates', () => {
    expect(parsePeriodSelector('this_week', '2020-01-01')).toEqual({ name: PeriodName.THIS_WEEK });
  });

  it('accepts a custom range with equal bounds', () => {
    expect(parsePeriodSelector('custom', '2025-03-05', '2025-03-05')).toEqual({
      name: PeriodName.CUSTOM,
      start: '2025-03-05',
      end: '2025-03-05',
    });
  });

  it.each([
    ['fortnight', undefined, undefined],
    ['custom', '2025-03-10', undefined],
    ['custom', '2025-02-30', '2025-03-10'],
    ['custom', '10/03/2025', '2025-03-20'],
    ['custom', '2025-03-10', '2025-03-01'],
  ])('rejects %s %s..%s', (name, start, end) => {
    expect(() => parsePeriodSelector(name, start, end)).toThrow(InvalidPeriodException);
  });
});

describe('daysInRange', () => {
  it('lists each day of a half-open range', () => {
    expect(daysInRange({ start: '2025-02-27', end: '2025-03-02' })).toEqual([
      '2025-02-27',
      '2025-02-28',
      '2025-03-01',
    ]);
  });

  it('is empty for an empty range', () => {
    expect(daysInRange({ start: '2025-03-05', end: '2025-03-05' })).toEqual([]);
  });

  it('keys ranges by both bounds', () => {
    expect(rangeKey({ start: '2025-03-01', end: '2025-04-01' })).toBe('2025-03-01..2025-04-01');
  });
});
