import { describe, it, expect } from 'vitest';
import {
  inferYear,
  parseCalendarDate,
  parseGameStart,
  parseKickoffTime,
  type DateTimeParseOptions,
} from '@server/agents/dateTimeNormalizer';
import { ParseError } from '@server/types/errors';

function isoStart(dateText: string, timeText: string, seasonYear = 2025, options: DateTimeParseOptions = {}): string {
  const result = parseGameStart(dateText, timeText, seasonYear, options);
  if (!result.ok) throw result.error;
  return result.value.start.toISO() ?? '';
}

function failureReason(dateText: string, seasonYear = 2025): string {
  const result = parseCalendarDate(dateText, seasonYear);
  return result.ok ? '(parsed)' : result.error.reason;
}

describe('inferYear', () => {
  it('keeps August through December in the season year', () => {
    expect(inferYear(8, 2025)).toBe(2025);
    expect(inferYear(12, 2025)).toBe(2025);
  });

  it('moves January through July into the following year', () => {
    expect(inferYear(1, 2025)).toBe(2026);
    expect(inferYear(7, 2025)).toBe(2026);
  });
});

describe('parseCalendarDate', () => {
  it.each([
    ['Aug 30', { year: 2025, month: 8, day: 30 }],
    ['Sept. 6', { year: 2025, month: 9, day: 6 }],
    ['Saturday, September 6', { year: 2025, month: 9, day: 6 }],
    ['SaturdayNov 22', { year: 2025, month: 11, day: 22 }],
    ['Thu Nov 27', { year: 2025, month: 11, day: 27 }],
    ['6 Sep', { year: 2025, month: 9, day: 6 }],
    ['Jan 1', { year: 2026, month: 1, day: 1 }],
    ['9/6', { year: 2025, month: 9, day: 6 }],
    ['1/1/26', { year: 2026, month: 1, day: 1 }],
    ['2025-09-20', { year: 2025, month: 9, day: 20 }],
  ])('reads %s', (text, expected) => {
    expect(parseCalendarDate(text, 2025)).toEqual({ ok: true, value: expected });
  });

  it('prefers an explicit year over inference', () => {
    expect(parseCalendarDate('Dec 27, 2025', 2024)).toEqual({ ok: true, value: { year: 2025, month: 12, day: 27 } });
  });

  it('maps two-digit years above 50 to the 1900s', () => {
    expect(parseCalendarDate('12/31/75', 2025)).toEqual({ ok: true, value: { year: 1975, month: 12, day: 31 } });
  });

  it('reports why a date cannot be resolved', () => {
    expect(failureReason('')).toBe('empty date text');
    expect(failureReason('TBA')).toBe('no month found');
    expect(failureReason('November')).toBe('no day found');
    expect(failureReason('13/01/2025')).toBe('month out of range (13)');
    expect(failureReason('9/31/2025')).toBe('invalid calendar date 2025-9-31');
  });

  it.each([2024, 2025])('keeps every real MM/DD/%i date unchanged', (year) => {
    const daysInMonth = [31, year % 4 === 0 ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
    let checked = 0;
    daysInMonth.forEach((days, i) => {
      const month = i + 1;
      for (let day = 1; day <= days; day++) {
        const text = `${String(month).padStart(2, '0')}/${String(day).padStart(2, '0')}/${year}`;
        expect(parseCalendarDate(text, 2000)).toEqual({ ok: true, value: { year, month, day } });
        checked++;
      }
    });
    expect(checked).toBe(year === 2024 ? 366 : 365);
  });

  it('checks leap days against the inferred year', () => {
    expect(failureReason('Feb 29', 2026)).toBe('invalid calendar date 2027-2-29');
    expect(parseCalendarDate('Feb 29', 2027)).toEqual({ ok: true, value: { year: 2028, month: 2, day: 29 } });
  });
});

describe('parseKickoffTime', () => {
  it.each([
    ['3:30 PM', 15, 30],
    ['3:30 PM ET', 15, 30],
    ['7:00 p.m.', 19, 0],
    ['11 a.m.', 11, 0],
    ['12 p.m.', 12, 0],
    ['12:00 AM', 0, 0],
    ['noon', 12, 0],
    ['Noon ET', 12, 0],
    ['noon/3:30 PM', 12, 0],
    ['3:30/4 PM', 15, 30],
    ['3:30 PM/noon', 15, 30],
    ['7 p', 19, 0],
  ])('reads %s', (text, hour, minute) => {
    expect(parseKickoffTime(text)).toEqual({ hour, minute, confirmed: true });
  });

  it('reads small hours without a marker as PM', () => {
    expect(parseKickoffTime('7:30')).toEqual({ hour: 19, minute: 30, confirmed: true });
    expect(parseKickoffTime('8:00')).toEqual({ hour: 8, minute: 0, confirmed: true });
  });

  it('ignores TBA or results in later options', () => {
    expect(parseKickoffTime('7:00 PM/TBA')).toEqual({ hour: 19, minute: 0, confirmed: true });
    expect(parseKickoffTime('TBA/7:00 PM')).toEqual({ hour: 13, minute: 0, confirmed: false });
  });

  it('leaves bare hours alone when the PM bias is disabled', () => {
    expect(parseKickoffTime('7:30', null)).toEqual({ hour: 7, minute: 30, confirmed: true });
  });

  it.each(['', 'TBA', 'tbd', 'W 24-10', 'L, 17-20', 'Final', '13:00 AM', '25:00'])(
    'falls back to an unconfirmed 1:00 PM for %j',
    (text) => {
      expect(parseKickoffTime(text)).toEqual({ hour: 13, minute: 0, confirmed: false });
    },
  );
});

describe('parseGameStart', () => {
  it('builds a zoned start in daylight time', () => {
    expect(isoStart('Aug 30', '3:30 PM')).toBe('2025-08-30T15:30:00.000-04:00');
  });

  it('uses standard time after the November change', () => {
    const result = parseGameStart('SaturdayNov 22', 'TBA', 2025);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.start.toISO()).toBe('2025-11-22T13:00:00.000-05:00');
    expect(result.value.timeConfirmed).toBe(false);
  });

  it('places spring dates in the following calendar year', () => {
    expect(isoStart('Apr 26', 'TBA')).toBe('2026-04-26T13:00:00.000-04:00');
  });

  it('reads numeric dates with explicit years', () => {
    expect(isoStart('9/6/2025', '7:00 PM')).toBe('2025-09-06T19:00:00.000-04:00');
  });

  it('honours the configured zone', () => {
    expect(isoStart('Aug 30', '3:30 PM', 2025, { zone: 'America/Chicago' })).toBe('2025-08-30T15:30:00.000-05:00');
  });

  it('gives the same result for the same inputs', () => {
    const inputs: Array<[string, string]> = [
      ['SaturdayNov 22', 'TBA'],
      ['Aug 30', '3:30 PM'],
      ['9/6', '7:30'],
      ['Apr 26', 'noon'],
    ];
    for (const [dateText, timeText] of inputs) {
      const first = parseGameStart(dateText, timeText, 2025);
      const second = parseGameStart(dateText, timeText, 2025);
      expect(first.ok && second.ok).toBe(true);
      if (!first.ok || !second.ok) return;
      expect(second.value.start.toISO()).toBe(first.value.start.toISO());
      expect(second.value.start.equals(first.value.start)).toBe(true);
      expect(second.value.timeConfirmed).toBe(first.value.timeConfirmed);
    }
  });

  it('returns a ParseError instead of a fallback date', () => {
    const result = parseGameStart('09/31/2025', '7:00 PM', 2025);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.reason).toBe('invalid calendar date 2025-9-31');
    expect(result.error.message).toBe(
      'Cannot parse game record "09/31/2025" / "7:00 PM": invalid calendar date 2025-9-31',
    );
  });
});
