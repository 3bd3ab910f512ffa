import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { describeGame, renderCalendar, toEventAttributes } from '@server/calendar/icsWriter';
import { CalendarStore, readEvents } from '@server/calendar/calendarStore';
import { makeGame, TEST_ZONE } from '../helpers/scheduleTestUtils';

const meta = { calName: 'Penn State Football', productId: 'football-calendar-feed', zone: TEST_ZONE };

const homeGame = makeGame('2025-08-30T15:30', {
  uid: '2025-2025-08-30-nevada@football-calendar-feed',
  opponent: 'Nevada',
  title: 'Nevada at Penn State',
  location: 'Beaver Stadium, University Park, Pa.',
  broadcast: 'FOX',
});

const awayGame = makeGame('2025-11-15T13:00', {
  uid: '2025-2025-11-15-michigan-state@football-calendar-feed',
  opponent: 'Michigan State',
  title: 'Penn State at Michigan State',
  isHome: false,
  location: '',
  broadcast: '',
  timeConfirmed: false,
});

describe('describeGame', () => {
  it('lists broadcast, site and opponent', () => {
    expect(describeGame(homeGame, TEST_ZONE)).toBe(
      'Broadcast on: FOX\nHome Game\nOpponent: Nevada\nTimes shown in America/New_York',
    );
  });

  it('notes an unannounced kickoff', () => {
    expect(describeGame(awayGame, TEST_ZONE)).toBe(
      'Away Game\nOpponent: Michigan State\nKickoff time TBA\nTimes shown in America/New_York',
    );
  });
});

describe('toEventAttributes', () => {
  it('converts start and end to UTC', () => {
    const event = toEventAttributes(homeGame, meta);
    if (!('end' in event)) throw new Error('expected an event with an explicit end');
    expect(event.start).toEqual([2025, 8, 30, 19, 30]);
    expect(event.end).toEqual([2025, 8, 30, 23, 0]);
    expect(event.status).toBe('CONFIRMED');
    expect(event.location).toBe('Beaver Stadium, University Park, Pa.');
  });

  it('marks unconfirmed kickoffs tentative and omits an empty location', () => {
    const event = toEventAttributes(awayGame, meta);
    expect(event.status).toBe('TENTATIVE');
    expect(event.location).toBeUndefined();
  });
});

describe('renderCalendar', () => {
  const text = renderCalendar([homeGame, awayGame], meta);

  it('writes one VCALENDAR with UTC start times', () => {
    expect(text.startsWith('BEGIN:VCALENDAR')).toBe(true);
    expect(text).toContain('X-WR-CALNAME:Penn State Football');
    expect(text).toContain('DTSTART:20250830T193000Z');
    expect(text).toContain('DTSTART:20251115T180000Z');
    expect(text).toContain('DTEND:20250830T230000Z');
  });

  it('reads back through an iCalendar parser', () => {
    const events = readEvents(text);
    expect(events).toHaveLength(2);

    expect(events[0].uid).toBe('2025-2025-08-30-nevada@football-calendar-feed');
    expect(events[0].summary).toBe('Nevada at Penn State');
    expect(events[0].start.toISOString()).toBe('2025-08-30T19:30:00.000Z');
    expect(events[0].end.toISOString()).toBe('2025-08-30T23:00:00.000Z');
    expect(events[0].location).toBe('Beaver Stadium, University Park, Pa.');
    expect(events[0].description).toBe(describeGame(homeGame, TEST_ZONE));

    expect(events[1].summary).toBe('Penn State at Michigan State');
    expect(events[1].start.toISOString()).toBe('2025-11-15T18:00:00.000Z');
  });
});

describe('CalendarStore', () => {
  const dirs: string[] = [];

  function tempFile(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calendar-store-'));
    dirs.push(dir);
    return path.join(dir, 'nested', 'football.ics');
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns null before anything is written', async () => {
    await expect(new CalendarStore(tempFile()).read()).resolves.toBeNull();
  });

  it('writes the calendar, creating directories, and leaves no temp file', async () => {
    const file = tempFile();
    const store = new CalendarStore(file);
    await store.write('BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n');

    await expect(store.read()).resolves.toBe('BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n');
    expect(fs.readdirSync(path.dirname(file))).toEqual(['football.ics']);
  });

  it('replaces the previous calendar', async () => {
    const store = new CalendarStore(tempFile());
    await store.write('first');
    await store.write('second');
    await expect(store.read()).resolves.toBe('second');
  });
});
