import {
  inclusiveDayCount,
  parseCalendarDate,
} from './date.util';

describe('parseCalendarDate', () => {
  it('parses a calendar date to UTC midnight', () => {
    expect(parseCalendarDate('2024-06-01')).toBe(Date.UTC(2024, 5, 1));
  });

  it('accepts leap days in leap years only', () => {
    expect(parseCalendarDate('2024-02-29')).toBe(Date.UTC(2024, 1, 29));
    expect(parseCalendarDate('2023-02-29')).toBeNull();
  });

  it('rejects dates that do not exist', () => {
    expect(parseCalendarDate('2024-02-30')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
    expect(parseCalendarDate('2024-00-10')).toBeNull();
  });

  it('rejects anything that is not YYYY-MM-DD', () => {
    expect(parseCalendarDate('2024-6-1')).toBeNull();
    expect(parseCalendarDate('2024-06-01T00:00:00Z')).toBeNull();
    expect(parseCalendarDate('')).toBeNull();
  });
});

describe('inclusiveDayCount', () => {
  const day = (value: string): number => {
    const parsed = parseCalendarDate(value);
    if (parsed === null) throw new Error(`bad fixture ${value}`);
    return parsed;
  };

  it('counts a same-day request as one day', () => {
    expect(inclusiveDayCount(day('2024-06-01'), day('2024-06-01'))).toBe(1);
  });

  it('includes both endpoints', () => {
    expect(inclusiveDayCount(day('2024-06-01'), day('2024-06-03'))).toBe(3);
  });

  it('spans month and year boundaries', () => {
    expect(inclusiveDayCount(day('2024-02-28'), day('2024-03-01'))).toBe(3);
    expect(inclusiveDayCount(day('2024-12-30'), day('2025-01-02'))).toBe(4);
  });
});
