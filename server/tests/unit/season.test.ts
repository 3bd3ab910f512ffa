import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { currentSeason, resolveSeason } from '@server/agents/season';

describe('resolveSeason', () => {
  it.each([
    ['2026-01-15', 2025],
    ['2025-02-01', 2025],
    ['2025-03-10', 2025],
    ['2025-07-31', 2025],
    ['2025-08-01', 2025],
    ['2025-12-31', 2025],
  ])('%s belongs to the %i season', (iso, season) => {
    expect(resolveSeason(DateTime.fromISO(iso, { zone: 'utc' }))).toBe(season);
  });
});

describe('currentSeason', () => {
  it('evaluates the month in the sport timezone', () => {
    // 03:00Z on Jan 1 is still Dec 31 in New York.
    expect(currentSeason('America/New_York', DateTime.fromISO('2026-01-01T03:00:00Z'))).toBe(2025);
    expect(currentSeason('America/New_York', DateTime.fromISO('2026-02-01T03:00:00Z'))).toBe(2025);
    expect(currentSeason('America/New_York', DateTime.fromISO('2026-02-01T06:00:00Z'))).toBe(2026);
  });
});
